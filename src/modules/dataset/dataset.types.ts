/**
 * Dataset Fetcher Types
 */

import type { Dataset } from '../vectorization/vectorization.types.js';

/**
 * Where a dataset comes from: a URL or filesystem path, or a study id
 * resolved against the dataset API
 */
export type DatasetSource =
  | { kind: 'location'; location: string }
  | { kind: 'study'; studyId: string };

/** Port used by the pipeline; DatasetFetcher is the production implementation */
export interface DatasetProvider {
  fetch(source: DatasetSource): Promise<Dataset>;
}

export interface DatasetFetcherConfig {
  /** Candidate roots tried in order for relative paths */
  searchRoots: string[];
  timeoutMs: number;
  /** Base URL of the dataset API, required for study sources */
  apiBaseUrl?: string;
  /** Directory relative roots are resolved from; defaults to process.cwd() */
  cwd?: string;
}
