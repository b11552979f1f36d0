/**
 * VECTORIZATION ENGINE: Main Service
 *
 * Entry point for dataset enhancement:
 *   1. detect the dataset format
 *   2. resolve each feature's data type
 *   3. vectorize + encode eligible features, building the schema
 *   4. flatten everything into one aggregated encoder (no query only)
 *
 * Synchronous and I/O free; holds no per-call state, so one instance can
 * serve concurrent requests.
 */

import { consoleLogger, type Logger } from '../../common/logger.js';
import { FeatureEncoder } from './feature.encoder.js';
import { SchemaBuilder } from './schema.builder.js';
import { detectFormat, formatAdapter, resolveDataType } from './dataset.formats.js';
import type {
  AggregatedEncoder,
  Dataset,
  EncoderObject,
  EnhanceResult,
  SkippedDataType,
  VectorSchema,
  VectorizableDataType,
  VectorizedStatistics,
} from './vectorization.types.js';

const SKIPPED_DATA_TYPES: readonly string[] = ['DATETIME', 'UNKNOWN'] satisfies SkippedDataType[];

export class VectorizationService {
  private readonly encoder: FeatureEncoder;
  private readonly logger: Logger;

  constructor(encoder?: FeatureEncoder, logger?: Logger) {
    this.logger = logger ?? consoleLogger('Vectorization');
    this.encoder = encoder ?? new FeatureEncoder(this.logger);
  }

  /**
   * Enhance a dataset with vectorized statistics.
   *
   * With `query`, only the first feature of that exact name is processed and the
   * per-feature encoder is returned as-is. Unrecognized dataset shapes yield
   * the dataset unchanged with no encoders and no schema.
   */
  enhance(dataset: Dataset, query?: string): EnhanceResult {
    const format = detectFormat(dataset);
    const adapter = formatAdapter(format);

    if (!adapter) {
      this.logger.warn({ keys: Object.keys(dataset) }, 'Unrecognized dataset format, nothing to vectorize');
      return { enhancedDataset: dataset, encoders: [], schema: [] };
    }

    const features = adapter.read(dataset);
    const schema = new SchemaBuilder(this.encoder);
    const encoders: EncoderObject[] = [];
    const attachments = new Map<string, VectorizedStatistics>();
    const skipped: string[] = [];

    for (const feature of features) {
      if (query && feature.name !== query) continue;

      const dataType = resolveDataType(feature);
      if (SKIPPED_DATA_TYPES.includes(dataType)) {
        skipped.push(feature.name);
        continue;
      }

      const vector = this.encoder.vectorizeFeatureStatistics(dataType, feature.statistics);
      const encoder = this.encoder.encode(dataType, vector);

      attachments.set(feature.id, { vectorized: vector, encoder, dataType: encoder.dataType });
      encoders.push(encoder);
      schema.append(feature.name, dataType, vector);

      // A repeated name (legacy feature sets) is vectorized once
      if (query) break;
    }

    const enhancedDataset = adapter.write(dataset, attachments);

    this.logger.info(
      {
        format,
        query: query ?? null,
        features: features.length,
        vectorized: encoders.length,
        skipped: skipped.length,
        vectorLength: schema.totalLength,
      },
      'Dataset vectorized',
    );

    if (query || encoders.length === 0) {
      return { enhancedDataset, encoders, schema: schema.build() };
    }

    return {
      enhancedDataset,
      encoders: [this.aggregate(encoders)],
      schema: schema.build(),
    };
  }

  /**
   * Concatenate per-feature vectors, in schema order, into one encoder
   */
  aggregate(encoders: readonly EncoderObject[]): AggregatedEncoder {
    const data = encoders.flatMap((encoder) => encoder.data);
    return {
      type: 'mixed',
      data,
      dataType: 'MIXED',
      vectorLength: data.length,
      totalFeatures: encoders.length,
      supportedDataTypes: this.getSupportedDataTypes(),
    };
  }

  getSupportedDataTypes(): VectorizableDataType[] {
    return this.encoder.getSupportedDataTypes();
  }

  getVectorSchema(dataType: string): VectorSchema {
    return this.encoder.getVectorSchema(dataType);
  }
}
