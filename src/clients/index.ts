/**
 * External Service Clients
 *
 * HTTP clients for the SMPC and computations-orchestrator services.
 * Both are reached over HTTP only and never throw on transport failures.
 */

// SMPC Client
export { SmpcClient, EMPTY_ENCODER } from './smpc.client.js';
export type { SmpcGateway, SmpcClientConfig } from './smpc.client.js';

// Computations Orchestrator Client
export { OrchestratorClient, JOB_STATUSES } from './orchestrator.client.js';
export type {
  JobStatus,
  JobStatusResponse,
  OrchestratorGateway,
  OrchestratorUpdate,
  OrchestratorClientConfig,
} from './orchestrator.client.js';
