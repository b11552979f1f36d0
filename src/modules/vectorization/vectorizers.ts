/**
 * Feature Vectorizers
 * ===================
 *
 * Statistics record → fixed-length numeric vector, one vectorizer per
 * data-type family.
 *
 * VECTOR LAYOUT (LOCKED v1):
 * - BOOLEAN:     [numOfNotNull, numOfTrue]
 * - NUMERIC:     [numOfNotNull, min, max, avg, q1, q2, q3]
 * - CATEGORICAL: [numOfNotNull, numUniqueValues, topValueCount]
 *
 * Missing or non-numeric statistics become 0. A record with no non-null
 * values yields an all-zero vector of the full length, so offsets stay
 * aligned across data holders.
 */

import { isFiniteNumber, isRecord } from '../../common/guards.js';
import type { StatisticsRecord, Vector } from './vectorization.types.js';

export type VectorizerFamily = 'BOOLEAN' | 'NUMERIC' | 'CATEGORICAL';

export interface FeatureVectorizer {
  readonly family: VectorizerFamily;
  readonly vectorLength: number;
  readonly fieldNames: readonly string[];
  vectorize(statistics: StatisticsRecord): Vector;
}

function num(statistics: StatisticsRecord, key: string): number {
  const value = statistics[key];
  return isFiniteNumber(value) ? value : 0;
}

function zeros(length: number): Vector {
  return new Array<number>(length).fill(0);
}

// ═══════════════════════════════════════════════════════════════
// BOOLEAN
// ═══════════════════════════════════════════════════════════════

export const booleanVectorizer: FeatureVectorizer = {
  family: 'BOOLEAN',
  vectorLength: 2,
  fieldNames: ['numOfNotNull', 'numOfTrue'],

  vectorize(statistics) {
    return [num(statistics, 'numOfNotNull'), num(statistics, 'numOfTrue')];
  },
};

// ═══════════════════════════════════════════════════════════════
// NUMERIC
// ═══════════════════════════════════════════════════════════════

const NUMERIC_FIELDS = ['numOfNotNull', 'min', 'max', 'avg', 'q1', 'q2', 'q3'] as const;

export const numericVectorizer: FeatureVectorizer = {
  family: 'NUMERIC',
  vectorLength: NUMERIC_FIELDS.length,
  fieldNames: NUMERIC_FIELDS,

  vectorize(statistics) {
    if (num(statistics, 'numOfNotNull') === 0) {
      return zeros(NUMERIC_FIELDS.length);
    }
    return NUMERIC_FIELDS.map((field) => num(statistics, field));
  },
};

// ═══════════════════════════════════════════════════════════════
// CATEGORICAL (NOMINAL / ORDINAL)
// ═══════════════════════════════════════════════════════════════

function countUnique(valueSet: unknown): number {
  if (Array.isArray(valueSet)) return valueSet.length;
  if (isRecord(valueSet)) return Object.keys(valueSet).length;
  return 0;
}

/**
 * Largest count in `cardinalityPerItem`, given either as a list of counts
 * or as a category → count mapping
 */
function topValueCount(cardinalityPerItem: unknown): number {
  let counts: unknown[] = [];
  if (Array.isArray(cardinalityPerItem)) {
    counts = cardinalityPerItem;
  } else if (isRecord(cardinalityPerItem)) {
    counts = Object.values(cardinalityPerItem);
  }

  return counts.reduce<number>(
    (top, count) => (isFiniteNumber(count) && count > top ? count : top),
    0,
  );
}

export const categoricalVectorizer: FeatureVectorizer = {
  family: 'CATEGORICAL',
  vectorLength: 3,
  fieldNames: ['numOfNotNull', 'numUniqueValues', 'topValueCount'],

  vectorize(statistics) {
    const numOfNotNull = num(statistics, 'numOfNotNull');
    if (numOfNotNull === 0) {
      return zeros(3);
    }
    return [
      numOfNotNull,
      countUnique(statistics.valueSet),
      topValueCount(statistics.cardinalityPerItem),
    ];
  },
};
