/**
 * Dataset Fetcher
 * ===============
 *
 * Resolves a dataset from:
 * - a URL (scheme + host present)            → HTTP GET
 * - an absolute filesystem path              → read as-is
 * - a relative path                          → first existing candidate root
 * - a study id                               → GET {apiBaseUrl}/api/studies/{id}/metadata
 *
 * Missing local files raise DatasetNotFoundError, transport failures
 * DatasetFetchError, anything that is not a JSON object DatasetParseError.
 */

import axios, { isAxiosError, type AxiosInstance } from 'axios';
import { access, readFile } from 'fs/promises';
import path from 'path';
import {
  ConfigError,
  DatasetFetchError,
  DatasetNotFoundError,
  DatasetParseError,
  errorMessage,
} from '../../common/errors.js';
import { isRecord } from '../../common/guards.js';
import { consoleLogger, type Logger } from '../../common/logger.js';
import type { Dataset } from '../vectorization/vectorization.types.js';
import type { DatasetFetcherConfig, DatasetProvider, DatasetSource } from './dataset.types.js';

export function isUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol !== '' && parsed.host !== '';
  } catch {
    return false;
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

export class DatasetFetcher implements DatasetProvider {
  private readonly client: AxiosInstance;
  private readonly config: DatasetFetcherConfig;
  private readonly logger: Logger;

  constructor(config: DatasetFetcherConfig, logger?: Logger) {
    this.config = config;
    this.logger = logger ?? consoleLogger('DatasetFetcher');
    this.client = axios.create({
      timeout: config.timeoutMs,
      headers: { Accept: 'application/json' },
    });
  }

  async fetch(source: DatasetSource): Promise<Dataset> {
    return source.kind === 'study'
      ? this.fetchStudyDataset(source.studyId)
      : this.fetchDataset(source.location);
  }

  /**
   * Fetch from a URL or read from a local file, whichever `urlOrPath` is
   */
  async fetchDataset(urlOrPath: string): Promise<Dataset> {
    return isUrl(urlOrPath) ? this.fetchFromUrl(urlOrPath) : this.fetchFromFile(urlOrPath);
  }

  async fetchStudyDataset(studyId: string): Promise<Dataset> {
    if (!this.config.apiBaseUrl) {
      throw new ConfigError('DATASET_API_URL is not configured; cannot fetch dataset by study id');
    }
    const base = this.config.apiBaseUrl.replace(/\/+$/, '');
    return this.fetchFromUrl(`${base}/api/studies/${encodeURIComponent(studyId)}/metadata`);
  }

  /**
   * Absolute paths must exist as given; relative ones are tried against
   * each search root in order
   */
  async resolveLocalPath(filePath: string): Promise<string> {
    const cwd = this.config.cwd ?? process.cwd();

    if (path.isAbsolute(filePath)) {
      if (await exists(filePath)) return filePath;
      throw new DatasetNotFoundError(`Local file not found: ${filePath}`, [filePath]);
    }

    const candidates = this.config.searchRoots.map((root) => path.resolve(cwd, root, filePath));
    for (const candidate of candidates) {
      if (await exists(candidate)) return candidate;
    }

    throw new DatasetNotFoundError(
      `Local file not found in any of: ${candidates.join(', ')}`,
      candidates,
    );
  }

  // ═══════════════════════════════════════════════════════════════
  // PRIVATE
  // ═══════════════════════════════════════════════════════════════

  private async fetchFromUrl(url: string): Promise<Dataset> {
    this.logger.info({ url }, 'Fetching dataset from URL');

    let data: unknown;
    try {
      const response = await this.client.get<unknown>(url);
      data = response.data;
    } catch (err) {
      const status = isAxiosError(err) ? err.response?.status : undefined;
      throw new DatasetFetchError(url, errorMessage(err), status, err);
    }

    if (!isRecord(data)) {
      throw new DatasetParseError(url);
    }
    return data;
  }

  private async fetchFromFile(filePath: string): Promise<Dataset> {
    const resolved = await this.resolveLocalPath(filePath);
    this.logger.info({ path: resolved }, 'Reading dataset from local file');

    const raw = await readFile(resolved, 'utf-8');
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new DatasetParseError(resolved, err);
    }

    if (!isRecord(data)) {
      throw new DatasetParseError(resolved);
    }
    return data;
  }
}
