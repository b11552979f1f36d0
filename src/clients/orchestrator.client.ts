/**
 * Computations Orchestrator HTTP Client
 *
 *   POST {baseUrl}/api/update               → this client finished its SMPC update
 *   GET  {baseUrl}/api/job-status/{jobId}   → job progress / aggregated results
 *
 * Both calls are best-effort: failures are logged and surface as
 * `false` / `null`, never as exceptions.
 */

import axios, { type AxiosInstance } from 'axios';
import { errorMessage } from '../common/errors.js';
import { isRecord } from '../common/guards.js';
import { consoleLogger, type Logger } from '../common/logger.js';
import type { SchemaEntry } from '../modules/vectorization/vectorization.types.js';

// ============================================
// TYPES
// ============================================

export const JOB_STATUSES = ['WAITING', 'IN_PROGRESS', 'AGGREGATING', 'COMPLETED', 'FAILED', 'ERROR'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export interface JobStatusResponse {
  /** Raw status string; not every orchestrator version sticks to JobStatus */
  status: JobStatus | (string & {});
  aggregatedResults: unknown[];
  metadata: Record<string, unknown>;
  [key: string]: unknown;
}

export interface OrchestratorUpdate {
  jobId: string;
  clientId: string;
  totalClients: number;
  schema: SchemaEntry[];
}

export interface OrchestratorGateway {
  notify(update: OrchestratorUpdate): Promise<boolean>;
  getJobStatus(jobId: string): Promise<JobStatusResponse | null>;
}

export interface OrchestratorClientConfig {
  baseUrl: string;
  /** Timeout for the update notification */
  timeout: number;
  /** Timeout for a single job-status poll */
  statusTimeout: number;
}

const DEFAULT_CONFIG: Omit<OrchestratorClientConfig, 'baseUrl'> = {
  timeout: 30_000,
  statusTimeout: 10_000,
};

// ============================================
// ORCHESTRATOR CLIENT
// ============================================

export class OrchestratorClient implements OrchestratorGateway {
  private readonly client: AxiosInstance;
  private readonly config: OrchestratorClientConfig;
  private readonly logger: Logger;

  constructor(
    config: Partial<OrchestratorClientConfig> & Pick<OrchestratorClientConfig, 'baseUrl'>,
    logger?: Logger,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config, baseUrl: config.baseUrl.replace(/\/+$/, '') };
    this.logger = logger ?? consoleLogger('OrchestratorClient');

    this.client = axios.create({
      baseURL: this.config.baseUrl,
      headers: { 'Content-Type': 'application/json' },
      validateStatus: () => true,
    });
  }

  /**
   * Tell the orchestrator this client is done, passing the schema needed to
   * decode the aggregated vector
   */
  async notify(update: OrchestratorUpdate): Promise<boolean> {
    this.logger.info(
      { url: `${this.config.baseUrl}/api/update`, jobId: update.jobId, schemaEntries: update.schema.length },
      'Notifying orchestrator',
    );

    try {
      const response = await this.client.post('/api/update', update, { timeout: this.config.timeout });
      this.logger.info({ jobId: update.jobId, status: response.status }, 'Orchestrator response');
      return response.status === 200;
    } catch (err) {
      this.logger.warn({ jobId: update.jobId, err: errorMessage(err) }, 'Error notifying orchestrator');
      return false;
    }
  }

  /**
   * Current job status, or null on 404, any other non-200 or transport error
   */
  async getJobStatus(jobId: string): Promise<JobStatusResponse | null> {
    try {
      const response = await this.client.get<unknown>(`/api/job-status/${encodeURIComponent(jobId)}`, {
        timeout: this.config.statusTimeout,
      });

      if (response.status === 404) {
        this.logger.warn({ jobId }, 'Job not found (404)');
        return null;
      }
      if (response.status !== 200 || !isRecord(response.data)) {
        this.logger.warn({ jobId, status: response.status }, 'Unexpected job-status response');
        return null;
      }

      const body = response.data;
      return {
        ...body,
        status: typeof body.status === 'string' ? body.status : 'UNKNOWN',
        aggregatedResults: Array.isArray(body.aggregatedResults) ? body.aggregatedResults : [],
        metadata: isRecord(body.metadata) ? body.metadata : {},
      };
    } catch (err) {
      this.logger.error({ jobId, err: errorMessage(err) }, 'Error polling job status');
      return null;
    }
  }
}
