/**
 * Orchestrator Poller
 * ===================
 * Waits for an SMPC job to finish by polling the orchestrator's job-status
 * endpoint, for deployments where this node cannot accept callbacks.
 *
 * - polls every `intervalMs` until `timeoutMs` has elapsed
 * - COMPLETED → aggregated results are written to `resultsDir`
 * - FAILED / ERROR → stops without writing
 * - timeout is the only cancellation; `stop()` exists for process shutdown
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { errorMessage } from '../common/errors.js';
import { consoleLogger, type Logger } from '../common/logger.js';
import type { JobStatusResponse, OrchestratorGateway } from '../clients/orchestrator.client.js';

export interface PollerConfig {
  intervalMs: number;
  timeoutMs: number;
  resultsDir: string;
}

const DEFAULT_CONFIG: Omit<PollerConfig, 'resultsDir'> = {
  intervalMs: 10_000,
  timeoutMs: 20 * 60 * 1000,
};

export type PollOutcome = 'COMPLETED' | 'FAILED' | 'TIMEOUT' | 'SAVE_FAILED' | 'STOPPED';

export interface PollResult {
  jobId: string;
  outcome: PollOutcome;
  polls: number;
  elapsedMs: number;
  lastStatus?: string;
  resultPath?: string;
}

export interface SavedJobResults {
  jobId: string;
  timestamp: string;
  status: 'COMPLETED';
  aggregatedResults: unknown[];
  metadata: Record<string, unknown>;
  retrievedAt: string;
  source: 'orchestrator_polling';
}

const TERMINAL_FAILURES = ['FAILED', 'ERROR'];

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local-time `YYYYMMDD_HHMMSS` */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class OrchestratorPoller {
  private readonly config: PollerConfig;
  private readonly logger: Logger;
  private readonly pending = new Map<NodeJS.Timeout, () => void>();
  private stopped = false;

  constructor(
    private readonly gateway: OrchestratorGateway,
    config: Partial<PollerConfig> & Pick<PollerConfig, 'resultsDir'>,
    logger?: Logger,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = logger ?? consoleLogger('OrchestratorPoller');
  }

  /**
   * Poll in the background; the outcome is only logged
   */
  start(jobId: string): void {
    this.logger.info(
      { jobId, intervalMs: this.config.intervalMs, timeoutMs: this.config.timeoutMs },
      'Starting background polling',
    );

    this.pollUntilComplete(jobId)
      .then((result) => {
        this.logger.info({ ...result }, 'Polling finished');
      })
      .catch((err: unknown) => {
        this.logger.error({ jobId, err: errorMessage(err) }, 'Polling crashed');
      });
  }

  async pollUntilComplete(jobId: string): Promise<PollResult> {
    const startedAt = Date.now();
    let polls = 0;
    let lastStatus: string | undefined;

    const result = (outcome: PollOutcome, resultPath?: string): PollResult => ({
      jobId,
      outcome,
      polls,
      elapsedMs: Date.now() - startedAt,
      lastStatus,
      resultPath,
    });

    while (Date.now() - startedAt < this.config.timeoutMs) {
      if (this.stopped) return result('STOPPED');
      polls += 1;

      let status: JobStatusResponse | null = null;
      try {
        status = await this.gateway.getJobStatus(jobId);
      } catch (err) {
        this.logger.error({ jobId, poll: polls, err: errorMessage(err) }, 'Poll error');
      }

      if (status) {
        lastStatus = status.status;
        this.logger.info({ jobId, poll: polls, status: status.status }, 'Job status');

        if (status.status === 'COMPLETED') {
          try {
            const resultPath = await this.saveResults(jobId, status);
            return result('COMPLETED', resultPath);
          } catch (err) {
            this.logger.error({ jobId, err: errorMessage(err) }, 'Failed to save results');
            return result('SAVE_FAILED');
          }
        }

        if (TERMINAL_FAILURES.includes(status.status)) {
          this.logger.error({ jobId, status: status.status }, 'Job failed');
          return result('FAILED');
        }
      } else {
        this.logger.warn({ jobId, poll: polls }, 'No status data received');
      }

      await this.sleep(this.config.intervalMs);
    }

    this.logger.error({ jobId, polls }, 'Polling timeout');
    return result('TIMEOUT');
  }

  /**
   * Write the completed job's results snapshot; returns the file path
   */
  async saveResults(jobId: string, status: JobStatusResponse): Promise<string> {
    const now = new Date();
    const snapshot: SavedJobResults = {
      jobId,
      timestamp: now.toISOString(),
      status: 'COMPLETED',
      aggregatedResults: status.aggregatedResults,
      metadata: status.metadata,
      retrievedAt: now.toISOString(),
      source: 'orchestrator_polling',
    };

    await mkdir(this.config.resultsDir, { recursive: true });
    const filePath = path.join(this.config.resultsDir, `${jobId}_results_${fileTimestamp(now)}.json`);
    await writeFile(filePath, JSON.stringify(snapshot, null, 4), 'utf-8');

    this.logger.info(
      { jobId, path: filePath, features: snapshot.aggregatedResults.length },
      'Saved results',
    );
    return filePath;
  }

  /**
   * Wake every sleeping poll loop so it returns STOPPED
   */
  stop(): void {
    this.stopped = true;
    for (const [timer, wake] of this.pending) {
      clearTimeout(timer);
      wake();
    }
    this.pending.clear();
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pending.delete(timer);
        resolve();
      }, ms);
      this.pending.set(timer, resolve);
    });
  }
}
