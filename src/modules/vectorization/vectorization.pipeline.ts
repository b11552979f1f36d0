/**
 * VECTORIZATION PIPELINE
 *
 * One request, end to end:
 *   fetch dataset → enhance → write outputs → post encoder to SMPC
 *   → notify orchestrator → (optional) start polling for the job result
 *
 * Each downstream step runs only when the previous one succeeded and its
 * collaborator is configured. Downstream failures are reported as flags;
 * only dataset errors reject.
 */

import { AppError, DatasetLoadError, errorMessage } from '../../common/errors.js';
import { consoleLogger, type Logger } from '../../common/logger.js';
import {
  EMPTY_ENCODER,
  OrchestratorClient,
  SmpcClient,
  type OrchestratorGateway,
  type SmpcGateway,
} from '../../clients/index.js';
import { OrchestratorPoller } from '../../jobs/orchestrator.poller.js';
import { DatasetFetcher, type DatasetProvider, type DatasetSource } from '../dataset/index.js';
import type { Env } from '../../config/env.js';
import { writeVectorizationOutputs, type OutputPaths } from './output.writer.js';
import { VectorizationService } from './vectorization.service.js';
import type { Dataset, EnhanceResult } from './vectorization.types.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface JobPoller {
  start(jobId: string): void;
  stop?(): void;
}

export interface VectorizationPipelineDeps {
  datasets: DatasetProvider;
  vectorizer: VectorizationService;
  /** Output artifacts are skipped when unset */
  outputDir?: string;
  smpc?: SmpcGateway;
  orchestrator?: OrchestratorGateway;
  poller?: JobPoller;
  clientId?: string;
  logger?: Logger;
}

export interface PipelineRequest {
  source: DatasetSource;
  jobId?: string;
  totalClients: number;
  query?: string;
}

export interface PipelineResult extends EnhanceResult {
  outputPaths: OutputPaths | null;
  smpcPosted: boolean;
  orchestratorNotified: boolean;
  pollingStarted: boolean;
}

// ═══════════════════════════════════════════════════════════════
// PIPELINE
// ═══════════════════════════════════════════════════════════════

export class VectorizationPipeline {
  private readonly logger: Logger;

  constructor(private readonly deps: VectorizationPipelineDeps) {
    this.logger = deps.logger ?? consoleLogger('Vectorize');
  }

  get vectorizer(): VectorizationService {
    return this.deps.vectorizer;
  }

  async run(request: PipelineRequest): Promise<PipelineResult> {
    const { jobId, totalClients, query } = request;
    const { smpc, orchestrator, poller, clientId } = this.deps;

    this.logger.info({ source: request.source }, 'Starting dataset fetch');
    const dataset = await this.fetchDataset(request.source);

    const enhanced = this.deps.vectorizer.enhance(dataset, query);
    this.logger.info(
      { encoders: enhanced.encoders.length, schemaEntries: enhanced.schema.length },
      'Dataset vectorization completed',
    );

    const outputPaths = this.deps.outputDir
      ? await writeVectorizationOutputs(this.deps.outputDir, enhanced)
      : null;
    if (outputPaths) {
      this.logger.info({ outputPaths }, 'Outputs written');
    }

    const result: PipelineResult = {
      ...enhanced,
      outputPaths,
      smpcPosted: false,
      orchestratorNotified: false,
      pollingStarted: false,
    };

    if (!smpc || !jobId) {
      this.logger.info({ jobId: jobId ?? null }, 'No SMPC or job id; skipping downstream steps');
      return result;
    }

    result.smpcPosted = await smpc.postEncoder(jobId, enhanced.encoders[0] ?? EMPTY_ENCODER);

    if (!result.smpcPosted || !orchestrator || !clientId) {
      this.logger.info(
        { smpcPosted: result.smpcPosted, orchestrator: Boolean(orchestrator), clientId: clientId ?? null },
        'SMPC update failed or orchestrator info missing; not notifying',
      );
      return result;
    }

    result.orchestratorNotified = await orchestrator.notify({
      jobId,
      clientId,
      totalClients,
      schema: enhanced.schema,
    });

    if (!result.orchestratorNotified) {
      this.logger.warn({ jobId }, 'Failed to notify orchestrator');
      return result;
    }

    this.logger.info({ jobId }, 'Notified computations orchestrator');
    if (poller) {
      poller.start(jobId);
      result.pollingStarted = true;
    }
    return result;
  }

  /**
   * Stop background polling, if any
   */
  shutdown(): void {
    this.deps.poller?.stop?.();
  }

  private async fetchDataset(source: DatasetSource): Promise<Dataset> {
    try {
      return await this.deps.datasets.fetch(source);
    } catch (err) {
      if (err instanceof AppError) throw err;
      throw new DatasetLoadError(errorMessage(err), err);
    }
  }
}

// ═══════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════

export type PipelineSettings = Pick<
  Env,
  | 'CLIENT_ID'
  | 'SMPC_URL'
  | 'ORCHESTRATOR_URL'
  | 'DATASET_API_URL'
  | 'DATASET_SEARCH_ROOTS'
  | 'OUTPUT_ENABLED'
  | 'OUTPUT_DIR'
  | 'RESULTS_DIR'
  | 'DATASET_FETCH_TIMEOUT_MS'
  | 'SMPC_TIMEOUT_MS'
  | 'ORCHESTRATOR_TIMEOUT_MS'
  | 'POLLING_ENABLED'
  | 'POLLING_INTERVAL_MS'
  | 'POLLING_TIMEOUT_MS'
>;

/**
 * Wire the production collaborators from configuration
 */
export function createVectorizationPipeline(settings: PipelineSettings, logger?: Logger): VectorizationPipeline {
  const orchestrator = settings.ORCHESTRATOR_URL
    ? new OrchestratorClient({ baseUrl: settings.ORCHESTRATOR_URL, timeout: settings.ORCHESTRATOR_TIMEOUT_MS }, logger)
    : undefined;

  const poller =
    orchestrator && settings.POLLING_ENABLED
      ? new OrchestratorPoller(
          orchestrator,
          {
            intervalMs: settings.POLLING_INTERVAL_MS,
            timeoutMs: settings.POLLING_TIMEOUT_MS,
            resultsDir: settings.RESULTS_DIR,
          },
          logger,
        )
      : undefined;

  return new VectorizationPipeline({
    datasets: new DatasetFetcher(
      {
        searchRoots: settings.DATASET_SEARCH_ROOTS,
        timeoutMs: settings.DATASET_FETCH_TIMEOUT_MS,
        apiBaseUrl: settings.DATASET_API_URL,
      },
      logger,
    ),
    vectorizer: new VectorizationService(undefined, logger),
    outputDir: settings.OUTPUT_ENABLED ? settings.OUTPUT_DIR : undefined,
    smpc: settings.SMPC_URL ? new SmpcClient({ baseUrl: settings.SMPC_URL, timeout: settings.SMPC_TIMEOUT_MS }, logger) : undefined,
    orchestrator,
    poller,
    clientId: settings.CLIENT_ID,
    logger,
  });
}
