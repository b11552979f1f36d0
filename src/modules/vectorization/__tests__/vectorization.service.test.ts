/**
 * Vectorization Service Tests
 *
 * Test scenarios:
 * 1. Direct format end-to-end (aggregate + schema)
 * 2. Legacy format end-to-end
 * 3. Query isolation (single feature, no aggregation)
 * 4. Skipped data types and unknown dataset shapes
 * 5. Offsets line up across independent data holders
 * 6. Input datasets are never mutated
 */

import { readFileSync } from 'fs';
import { describe, it, expect, vi } from 'vitest';
import { VectorizationService } from '../vectorization.service.js';
import type { AggregatedEncoder, Dataset, EncoderPayload } from '../vectorization.types.js';
import { isRecord } from '../../../common/guards.js';

function loadFixture(name: string): Dataset {
  const parsed: unknown = JSON.parse(readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf-8'));
  if (!isRecord(parsed)) throw new Error(`fixture ${name} is not an object`);
  return parsed;
}

function mockLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function isAggregated(encoder: EncoderPayload): encoder is AggregatedEncoder {
  return 'totalFeatures' in encoder;
}

function entryOf(dataset: Dataset, name: string): Record<string, unknown> {
  const entries = dataset.entries;
  if (!isRecord(entries)) throw new Error('entries is not a mapping');
  const entry = entries[name];
  if (!isRecord(entry)) throw new Error(`entry ${name} missing`);
  return entry;
}

describe('VectorizationService', () => {

  describe('direct format', () => {

    it('should aggregate a BOOLEAN and a NUMERIC feature into one vector', () => {
      const service = new VectorizationService(undefined, mockLogger());
      const result = service.enhance({
        entries: {
          smoker: { numOfNotNull: 100, numOfTrue: 75 },
          age: { numOfNotNull: 10, min: 1.5, max: 98.7, avg: 45.2, q1: 25.0, q2: 44.5, q3: 65.8 },
        },
      });

      expect(result.encoders).toHaveLength(1);
      expect(result.encoders[0]).toEqual({
        type: 'mixed',
        data: [100, 75, 10, 1.5, 98.7, 45.2, 25.0, 44.5, 65.8],
        dataType: 'MIXED',
        vectorLength: 9,
        totalFeatures: 2,
        supportedDataTypes: ['BOOLEAN', 'NUMERIC', 'NOMINAL', 'ORDINAL'],
      });
      expect(result.schema.map((entry) => entry.offset)).toEqual([0, 2]);
    });

    it('should vectorize declared metadata types in entry order and skip DATETIME', () => {
      const service = new VectorizationService(undefined, mockLogger());
      const result = service.enhance(loadFixture('cohort.metadata.json'));

      expect(result.schema.map((entry) => [entry.featureName, entry.dataType, entry.offset, entry.length])).toEqual([
        ['sex', 'NOMINAL', 0, 3],
        ['bmi', 'NUMERIC', 3, 7],
        ['insulin', 'BOOLEAN', 10, 2],
      ]);
      expect(result.encoders[0].data).toEqual([20, 3, 11, 19, 17.2, 41.6, 26.3, 22.1, 25.4, 29.8, 20, 6]);

      const visit = entryOf(result.enhancedDataset, 'visit_date');
      expect(visit).toEqual({ numOfNotNull: 20 });
    });

    it('should attach vectorized statistics to each processed entry', () => {
      const service = new VectorizationService(undefined, mockLogger());
      const result = service.enhance(loadFixture('cohort.metadata.json'));

      expect(entryOf(result.enhancedDataset, 'insulin').vectorized_statistics).toEqual({
        vectorized: [20, 6],
        encoder: { type: 'int', data: [20, 6], dataType: 'BOOLEAN', vectorLength: 2 },
        dataType: 'BOOLEAN',
      });
    });
  });

  describe('legacy format', () => {

    it('should vectorize features across feature sets', () => {
      const service = new VectorizationService(undefined, mockLogger());
      const result = service.enhance(loadFixture('cohort.legacy.json'));

      expect(result.schema.map((entry) => [entry.featureName, entry.dataType, entry.offset])).toEqual([
        ['smoker', 'BOOLEAN', 0],
        ['weight', 'NUMERIC', 2],
        ['stage', 'ORDINAL', 9],
      ]);
      expect(result.encoders[0].data).toEqual([30, 9, 28, 48, 112, 76.5, 64, 75, 88, 25, 4, 12]);
    });
  });

  describe('query', () => {

    it('should process only the named feature and return its own encoder', () => {
      const service = new VectorizationService(undefined, mockLogger());
      const result = service.enhance(loadFixture('cohort.metadata.json'), 'bmi');

      expect(result.encoders).toEqual([
        { type: 'float', data: [19, 17.2, 41.6, 26.3, 22.1, 25.4, 29.8], dataType: 'NUMERIC', vectorLength: 7 },
      ]);
      expect(result.schema).toHaveLength(1);
      expect(result.schema[0].offset).toBe(0);
      expect(entryOf(result.enhancedDataset, 'sex').vectorized_statistics).toBeUndefined();
    });

    it('should vectorize only the first feature when a legacy name repeats', () => {
      const service = new VectorizationService(undefined, mockLogger());
      const dataset = {
        entries: [
          { featureSet: { features: [{ name: 'smoker', dataType: 'BOOLEAN', statistics: { numOfNotNull: 30, numOfTrue: 9 } }] } },
          { featureSet: { features: [{ name: 'smoker', dataType: 'BOOLEAN', statistics: { numOfNotNull: 12, numOfTrue: 4 } }] } },
        ],
      };

      const result = service.enhance(dataset, 'smoker');

      expect(result.encoders).toEqual([{ type: 'int', data: [30, 9], dataType: 'BOOLEAN', vectorLength: 2 }]);
      expect(result.schema).toHaveLength(1);
      expect(result.schema[0]).toMatchObject({ featureName: 'smoker', offset: 0, length: 2 });
      expect(result.enhancedDataset.entries).toEqual([
        {
          featureSet: {
            features: [
              {
                name: 'smoker',
                dataType: 'BOOLEAN',
                statistics: { numOfNotNull: 30, numOfTrue: 9 },
                vectorized_statistics: {
                  vectorized: [30, 9],
                  encoder: { type: 'int', data: [30, 9], dataType: 'BOOLEAN', vectorLength: 2 },
                  dataType: 'BOOLEAN',
                },
              },
            ],
          },
        },
        dataset.entries[1],
      ]);
    });

    it('should return nothing when the query matches no feature', () => {
      const service = new VectorizationService(undefined, mockLogger());
      const result = service.enhance(loadFixture('cohort.metadata.json'), 'height');

      expect(result.encoders).toEqual([]);
      expect(result.schema).toEqual([]);
    });
  });

  describe('degraded input', () => {

    it('should return the dataset unchanged for an unrecognized shape', () => {
      const logger = mockLogger();
      const service = new VectorizationService(undefined, logger);
      const dataset = { rows: [1, 2, 3] };

      const result = service.enhance(dataset);

      expect(result.enhancedDataset).toBe(dataset);
      expect(result.encoders).toEqual([]);
      expect(result.schema).toEqual([]);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('should not aggregate when nothing was vectorized', () => {
      const service = new VectorizationService(undefined, mockLogger());
      const result = service.enhance({ entries: { seen_at: { numOfNotNull: 3 }, blob: { foo: 1 } } });

      expect(result.encoders).toEqual([]);
      expect(result.schema).toEqual([]);
    });

    it('should zero-fill empty columns so offsets stay aligned', () => {
      const service = new VectorizationService(undefined, mockLogger());
      const result = service.enhance({
        features: [{ name: 'age', dataType: 'NUMERIC' }, { name: 'smoker', dataType: 'BOOLEAN' }],
        entries: { age: { numOfNotNull: 0 }, smoker: { numOfNotNull: 5, numOfTrue: 2 } },
      });

      expect(result.encoders[0].data).toEqual([0, 0, 0, 0, 0, 0, 0, 5, 2]);
      expect(result.schema[1].offset).toBe(7);
    });

    it('should vectorize unrecognized declared types as categorical', () => {
      const service = new VectorizationService(undefined, mockLogger());
      const result = service.enhance(
        {
          features: [{ name: 'zip', dataType: 'text' }],
          entries: { zip: { numOfNotNull: 6, valueSet: ['10115', '20095'], cardinalityPerItem: [4, 2] } },
        },
        'zip',
      );

      expect(result.encoders).toEqual([{ type: 'int', data: [6, 2, 4], dataType: 'TEXT', vectorLength: 3 }]);
    });
  });

  describe('multi-party alignment', () => {

    it('should let independent holders sum their aggregates element-wise', () => {
      const service = new VectorizationService(undefined, mockLogger());
      const holder = (n: number, yes: number, min: number, max: number) => ({
        entries: {
          vaccinated: { numOfNotNull: n, numOfTrue: yes },
          dose: { numOfNotNull: n, min, max, avg: (min + max) / 2, q1: min, q2: min, q3: max },
        },
      });

      const vectors = [holder(10, 4, 1, 3), holder(20, 5, 2, 6), holder(30, 6, 1, 5)].map((dataset) => {
        const [encoder] = service.enhance(dataset).encoders;
        expect(isAggregated(encoder)).toBe(true);
        return encoder.data;
      });

      const summed = vectors[0].map((_, i) => vectors.reduce((sum, vector) => sum + vector[i], 0));
      expect(summed).toEqual([60, 15, 60, 4, 14, 9, 4, 4, 14]);
    });
  });

  describe('immutability', () => {

    it('should keep the returned encoder intact when the attached vector is modified', () => {
      const service = new VectorizationService(undefined, mockLogger());
      const result = service.enhance({ entries: { smoker: { numOfNotNull: 3, numOfTrue: 1 } } }, 'smoker');

      const attached = entryOf(result.enhancedDataset, 'smoker').vectorized_statistics;
      if (!isRecord(attached) || !Array.isArray(attached.vectorized)) throw new Error('vectorized statistics missing');
      attached.vectorized.push(99);

      expect(result.encoders).toEqual([{ type: 'int', data: [3, 1], dataType: 'BOOLEAN', vectorLength: 2 }]);
    });

    it('should not mutate a direct-format input', () => {
      const service = new VectorizationService(undefined, mockLogger());
      const dataset = loadFixture('cohort.metadata.json');
      const before = JSON.stringify(dataset);

      service.enhance(dataset);

      expect(JSON.stringify(dataset)).toBe(before);
    });

    it('should not mutate a legacy-format input', () => {
      const service = new VectorizationService(undefined, mockLogger());
      const dataset = loadFixture('cohort.legacy.json');
      const before = JSON.stringify(dataset);

      service.enhance(dataset);

      expect(JSON.stringify(dataset)).toBe(before);
    });
  });
});
