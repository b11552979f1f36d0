/**
 * SMPC Node HTTP Client
 *
 * Posts this data holder's encoder object to the secure multi-party
 * computation node:
 *
 *   POST {baseUrl}/api/update-dataset/{jobId}   body = encoder object
 *
 * Best-effort: any non-200 answer or transport error is logged and
 * reported as `false`. No retries.
 *
 * @example
 * const smpc = new SmpcClient({ baseUrl: 'http://smpc-node:9000' });
 * const posted = await smpc.postEncoder('job-42', encoders[0]);
 */

import axios, { type AxiosInstance } from 'axios';
import { errorMessage } from '../common/errors.js';
import { consoleLogger, type Logger } from '../common/logger.js';
import type { EncoderPayload } from '../modules/vectorization/vectorization.types.js';

// ============================================
// TYPES
// ============================================

export interface SmpcGateway {
  postEncoder(jobId: string, encoder: EncoderPayload): Promise<boolean>;
}

export interface SmpcClientConfig {
  baseUrl: string;
  timeout: number;
}

const DEFAULT_CONFIG: Omit<SmpcClientConfig, 'baseUrl'> = {
  timeout: 30_000,
};

/** Posted when vectorization produced no encoder */
export const EMPTY_ENCODER: EncoderPayload = { type: 'int', data: [], dataType: 'NONE', vectorLength: 0 };

// ============================================
// SMPC CLIENT
// ============================================

export class SmpcClient implements SmpcGateway {
  private readonly client: AxiosInstance;
  private readonly config: SmpcClientConfig;
  private readonly logger: Logger;

  constructor(config: Partial<SmpcClientConfig> & Pick<SmpcClientConfig, 'baseUrl'>, logger?: Logger) {
    this.config = { ...DEFAULT_CONFIG, ...config, baseUrl: config.baseUrl.replace(/\/+$/, '') };
    this.logger = logger ?? consoleLogger('SmpcClient');

    this.client = axios.create({
      baseURL: this.config.baseUrl,
      timeout: this.config.timeout,
      headers: { 'Content-Type': 'application/json' },
      validateStatus: () => true,
    });
  }

  async postEncoder(jobId: string, encoder: EncoderPayload): Promise<boolean> {
    const path = `/api/update-dataset/${encodeURIComponent(jobId)}`;
    this.logger.info(
      { url: `${this.config.baseUrl}${path}`, vectorLength: encoder.vectorLength },
      'Posting encoder to SMPC',
    );

    try {
      const response = await this.client.post(path, encoder);
      if (response.status === 200) {
        this.logger.info({ jobId, status: response.status }, 'SMPC accepted encoder');
        return true;
      }
      this.logger.warn({ jobId, status: response.status, body: response.data }, 'SMPC did not return 200');
      return false;
    } catch (err) {
      this.logger.warn({ jobId, err: errorMessage(err) }, 'Error posting encoder to SMPC');
      return false;
    }
  }
}
