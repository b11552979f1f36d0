/**
 * Schema Builder
 *
 * Assigns each processed feature a contiguous [offset, offset + length)
 * slice of the flattened aggregate vector, in processing order. Every data
 * holder encoding the same dataset shape must arrive at the same offsets
 * without talking to each other, so this stays append-only and
 * deterministic.
 */

import { normalizeDataType, type FeatureEncoder } from './feature.encoder.js';
import type { SchemaEntry, Vector } from './vectorization.types.js';

/** `fields` of an entry whose vector came back as the fallback */
export const FALLBACK_FIELDS: readonly string[] = ['fallback'];

export interface SchemaInput {
  featureName: string;
  dataType: string;
  vector: Vector;
}

export class SchemaBuilder {
  private readonly entries: SchemaEntry[] = [];
  private offset = 0;

  constructor(private readonly encoder: FeatureEncoder) {}

  append(featureName: string, dataType: string, vector: Vector): SchemaEntry {
    const declared = this.encoder.getVectorSchema(dataType);
    const entry: SchemaEntry = {
      featureName,
      dataType: normalizeDataType(dataType),
      offset: this.offset,
      length: vector.length,
      fields: vector.length === declared.vectorLength ? declared.fields : [...FALLBACK_FIELDS],
    };

    this.entries.push(entry);
    this.offset += vector.length;
    return entry;
  }

  /** Length of the flattened vector described so far */
  get totalLength(): number {
    return this.offset;
  }

  build(): SchemaEntry[] {
    return this.entries.map((entry) => ({ ...entry, fields: [...entry.fields] }));
  }
}

/**
 * One-shot schema for an ordered list of already-vectorized features
 */
export function buildSchema(encoder: FeatureEncoder, inputs: readonly SchemaInput[]): SchemaEntry[] {
  const builder = new SchemaBuilder(encoder);
  for (const input of inputs) {
    builder.append(input.featureName, input.dataType, input.vector);
  }
  return builder.build();
}
