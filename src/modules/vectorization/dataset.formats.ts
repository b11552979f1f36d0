/**
 * Dataset Formats
 * ===============
 *
 * Two historical dataset shapes are accepted:
 *
 *   direct:  { features?: [{name, dataType}], entries: { [name]: statistics } }
 *   legacy:  { entries: [{ featureSet: { features: [{name, dataType, statistics}] } }] }
 *
 * Each adapter reads its shape into NormalizedFeature[] and writes
 * vectorized statistics back into a copy of the dataset. The input object
 * is never mutated.
 */

import { isRecord } from '../../common/guards.js';
import { normalizeDataType } from './feature.encoder.js';
import type {
  Dataset,
  DatasetFormat,
  KnownDataType,
  NormalizedFeature,
  StatisticsRecord,
  VectorizedStatistics,
} from './vectorization.types.js';

export interface DatasetFormatAdapter {
  readonly format: Exclude<DatasetFormat, 'unknown'>;
  read(dataset: Dataset): NormalizedFeature[];
  write(dataset: Dataset, attachments: ReadonlyMap<string, VectorizedStatistics>): Dataset;
}

export function detectFormat(dataset: unknown): DatasetFormat {
  if (!isRecord(dataset)) return 'unknown';
  if (Array.isArray(dataset.entries)) return 'legacy';
  if (isRecord(dataset.entries)) return 'direct';
  return 'unknown';
}

// ═══════════════════════════════════════════════════════════════
// TYPE INFERENCE
// ═══════════════════════════════════════════════════════════════

const VECTORIZABLE_KEYS = ['numOfTrue', 'valueSet', 'cardinalityPerItem', 'min', 'max', 'avg', 'q1', 'q2', 'q3'];

/**
 * Data type from the shape of a statistics record.
 *
 * Precedence: numOfTrue → BOOLEAN; valueSet + cardinalityPerItem → NOMINAL;
 * min + max + avg → NUMERIC; numOfNotNull alone → DATETIME; else UNKNOWN.
 */
export function inferDataType(statistics: StatisticsRecord): KnownDataType {
  const has = (key: string) => Object.hasOwn(statistics, key);

  if (has('numOfTrue')) return 'BOOLEAN';
  if (has('valueSet') && has('cardinalityPerItem')) return 'NOMINAL';
  if (has('min') && has('max') && has('avg')) return 'NUMERIC';
  if (has('numOfNotNull') && !VECTORIZABLE_KEYS.some(has)) return 'DATETIME';
  return 'UNKNOWN';
}

/**
 * Declared metadata type (upper-cased) when present, otherwise inferred
 */
export function resolveDataType(feature: NormalizedFeature): string {
  if (feature.declaredDataType && feature.declaredDataType.trim() !== '') {
    return normalizeDataType(feature.declaredDataType);
  }
  return inferDataType(feature.statistics);
}

// ═══════════════════════════════════════════════════════════════
// DIRECT FORMAT
// ═══════════════════════════════════════════════════════════════

function declaredTypes(features: unknown): Map<string, string> {
  const declared = new Map<string, string>();
  if (!Array.isArray(features)) return declared;

  for (const feature of features) {
    if (isRecord(feature) && typeof feature.name === 'string' && typeof feature.dataType === 'string') {
      declared.set(feature.name, feature.dataType);
    }
  }
  return declared;
}

export const directFormat: DatasetFormatAdapter = {
  format: 'direct',

  read(dataset) {
    const entries = isRecord(dataset.entries) ? dataset.entries : {};
    const declared = declaredTypes(dataset.features);
    const features: NormalizedFeature[] = [];

    for (const [name, statistics] of Object.entries(entries)) {
      // Non-object values cannot carry vectorized statistics; they pass through untouched
      if (!isRecord(statistics)) continue;
      features.push({ id: name, name, declaredDataType: declared.get(name), statistics });
    }
    return features;
  },

  write(dataset, attachments) {
    if (!isRecord(dataset.entries) || attachments.size === 0) return { ...dataset };

    const entries = Object.fromEntries(
      Object.entries(dataset.entries).map(([name, statistics]) => {
        const attachment = attachments.get(name);
        if (!attachment || !isRecord(statistics)) return [name, statistics];
        return [name, { ...statistics, vectorized_statistics: attachment }];
      }),
    );
    return { ...dataset, entries };
  },
};

// ═══════════════════════════════════════════════════════════════
// LEGACY FORMAT
// ═══════════════════════════════════════════════════════════════

interface LegacyFeatureSet {
  featureSet: Record<string, unknown>;
  features: unknown[];
}

function legacyFeatureSet(entry: unknown): LegacyFeatureSet | null {
  if (!isRecord(entry) || !isRecord(entry.featureSet)) return null;
  const { features } = entry.featureSet;
  return Array.isArray(features) ? { featureSet: entry.featureSet, features } : null;
}

function legacyId(entryIndex: number, featureIndex: number): string {
  return `${entryIndex}:${featureIndex}`;
}

export const legacyFormat: DatasetFormatAdapter = {
  format: 'legacy',

  read(dataset) {
    const entries = Array.isArray(dataset.entries) ? dataset.entries : [];
    const features: NormalizedFeature[] = [];

    entries.forEach((entry, entryIndex) => {
      const set = legacyFeatureSet(entry);
      if (!set) return;

      set.features.forEach((feature, featureIndex) => {
        if (!isRecord(feature) || typeof feature.name !== 'string') return;
        features.push({
          id: legacyId(entryIndex, featureIndex),
          name: feature.name,
          declaredDataType: typeof feature.dataType === 'string' ? feature.dataType : undefined,
          statistics: isRecord(feature.statistics) ? feature.statistics : {},
        });
      });
    });
    return features;
  },

  write(dataset, attachments) {
    if (!Array.isArray(dataset.entries) || attachments.size === 0) return { ...dataset };

    const entries = dataset.entries.map((entry: unknown, entryIndex) => {
      const set = legacyFeatureSet(entry);
      if (!set || !isRecord(entry)) return entry;

      let changed = false;
      const features = set.features.map((feature, featureIndex) => {
        const attachment = attachments.get(legacyId(entryIndex, featureIndex));
        if (!attachment || !isRecord(feature)) return feature;
        changed = true;
        return { ...feature, vectorized_statistics: attachment };
      });

      return changed ? { ...entry, featureSet: { ...set.featureSet, features } } : entry;
    });
    return { ...dataset, entries };
  },
};

export function formatAdapter(format: DatasetFormat): DatasetFormatAdapter | null {
  switch (format) {
    case 'direct':
      return directFormat;
    case 'legacy':
      return legacyFormat;
    default:
      return null;
  }
}
