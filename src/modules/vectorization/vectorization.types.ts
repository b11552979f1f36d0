/**
 * Vectorization Types
 * ===================
 *
 * Feature statistics in, fixed-length numeric vectors out.
 *
 * WIRE CONTRACT
 * -------------
 * - Encoder objects and schema entries are posted as-is to SMPC / orchestrator
 * - Field names are camelCase except `vectorized_statistics`, which existing
 *   consumers of the enhanced dataset read by that name
 */

// ═══════════════════════════════════════════════════════════════
// DATA TYPES
// ═══════════════════════════════════════════════════════════════

export const VECTORIZABLE_DATA_TYPES = ['BOOLEAN', 'NUMERIC', 'NOMINAL', 'ORDINAL'] as const;

export type VectorizableDataType = (typeof VECTORIZABLE_DATA_TYPES)[number];

/** Inferred for records that carry statistics this version does not vectorize */
export type SkippedDataType = 'DATETIME' | 'UNKNOWN';

export type KnownDataType = VectorizableDataType | SkippedDataType;

/**
 * Declared data types come from dataset metadata and are not restricted to
 * the known set; unrecognized names fall back to categorical vectorization.
 */
export type DataTypeName = KnownDataType | (string & {});

export type EncoderType = 'int' | 'float' | 'mixed';

// ═══════════════════════════════════════════════════════════════
// INPUT
// ═══════════════════════════════════════════════════════════════

/** Loosely-typed statistics record, e.g. `{numOfNotNull, numOfTrue}` */
export type StatisticsRecord = Record<string, unknown>;

export type Vector = number[];

/**
 * Feature after format normalization. `id` addresses the feature inside
 * its source dataset so the enhanced copy can be written back.
 */
export interface NormalizedFeature {
  id: string;
  name: string;
  declaredDataType?: string;
  statistics: StatisticsRecord;
}

export type DatasetFormat = 'direct' | 'legacy' | 'unknown';

/** Whatever was fetched; only `entries` (and `features` in direct format) are read */
export type Dataset = Record<string, unknown>;

// ═══════════════════════════════════════════════════════════════
// OUTPUT
// ═══════════════════════════════════════════════════════════════

export interface EncoderObject {
  readonly type: EncoderType;
  readonly data: readonly number[];
  readonly dataType: string;
  readonly vectorLength: number;
}

export interface AggregatedEncoder extends EncoderObject {
  readonly type: 'mixed';
  readonly totalFeatures: number;
  readonly supportedDataTypes: readonly VectorizableDataType[];
}

export type EncoderPayload = EncoderObject | AggregatedEncoder;

export interface SchemaEntry {
  featureName: string;
  dataType: string;
  offset: number;
  length: number;
  fields: string[];
}

export interface VectorizedStatistics {
  vectorized: Vector;
  encoder: EncoderObject;
  dataType: string;
}

export interface VectorSchema {
  dataType: string;
  vectorLength: number;
  fields: string[];
}

export interface EnhanceResult {
  enhancedDataset: Dataset;
  encoders: EncoderPayload[];
  schema: SchemaEntry[];
}
