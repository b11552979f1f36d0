/**
 * Feature Encoder
 * ===============
 *
 * Wraps per-feature vectors into self-describing encoder objects and owns
 * the data type → vectorizer registry.
 *
 * ENCODING RULES (LOCKED v1):
 * - BOOLEAN → "int"
 * - NUMERIC → "float"
 * - NOMINAL / ORDINAL → "int"
 * - anything else → "int"
 */

import { errorMessage } from '../../common/errors.js';
import { consoleLogger, type Logger } from '../../common/logger.js';
import {
  booleanVectorizer,
  categoricalVectorizer,
  numericVectorizer,
  type FeatureVectorizer,
} from './vectorizers.js';
import {
  VECTORIZABLE_DATA_TYPES,
  type EncoderObject,
  type EncoderType,
  type StatisticsRecord,
  type Vector,
  type VectorSchema,
  type VectorizableDataType,
} from './vectorization.types.js';

// ═══════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════

const VECTORIZERS: Record<VectorizableDataType, FeatureVectorizer> = {
  BOOLEAN: booleanVectorizer,
  NUMERIC: numericVectorizer,
  NOMINAL: categoricalVectorizer,
  ORDINAL: categoricalVectorizer,
};

const ENCODER_TYPES: Record<VectorizableDataType, EncoderType> = {
  BOOLEAN: 'int',
  NUMERIC: 'float',
  NOMINAL: 'int',
  ORDINAL: 'int',
};

/** Returned when a vectorizer throws */
export const FALLBACK_VECTOR: readonly number[] = [0];

export function normalizeDataType(dataType: string): string {
  return dataType.trim().toUpperCase();
}

export function isVectorizableDataType(dataType: string): dataType is VectorizableDataType {
  return VECTORIZABLE_DATA_TYPES.some((known) => known === dataType);
}

// ═══════════════════════════════════════════════════════════════
// ENCODER
// ═══════════════════════════════════════════════════════════════

export class FeatureEncoder {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? consoleLogger('FeatureEncoder');
  }

  /**
   * Vectorizer for a data type; unrecognized types get the categorical one
   */
  getVectorizer(dataType: string): FeatureVectorizer {
    const normalized = normalizeDataType(dataType);
    return isVectorizableDataType(normalized) ? VECTORIZERS[normalized] : categoricalVectorizer;
  }

  /**
   * Wrap a vector with its wire type tag and declared data type
   */
  encode(dataType: string, vector: Vector): EncoderObject {
    const normalized = normalizeDataType(dataType);
    const type = isVectorizableDataType(normalized) ? ENCODER_TYPES[normalized] : 'int';

    return {
      type,
      data: [...vector],
      dataType: normalized,
      vectorLength: vector.length,
    };
  }

  /**
   * Vectorize one feature's statistics. A throwing vectorizer yields
   * FALLBACK_VECTOR so one bad feature never aborts the dataset.
   */
  vectorizeFeatureStatistics(dataType: string, statistics: StatisticsRecord): Vector {
    const vectorizer = this.getVectorizer(dataType);
    try {
      return vectorizer.vectorize(statistics);
    } catch (err) {
      this.logger.warn(
        { dataType, family: vectorizer.family, err: errorMessage(err) },
        'Vectorization failed, using fallback vector',
      );
      return [...FALLBACK_VECTOR];
    }
  }

  getVectorSchema(dataType: string): VectorSchema {
    const vectorizer = this.getVectorizer(dataType);
    return {
      dataType: normalizeDataType(dataType),
      vectorLength: vectorizer.vectorLength,
      fields: [...vectorizer.fieldNames],
    };
  }

  getSupportedDataTypes(): VectorizableDataType[] {
    return [...VECTORIZABLE_DATA_TYPES];
  }
}
