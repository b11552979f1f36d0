/**
 * Writes the three vectorization artifacts as independent JSON documents
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { EnhanceResult } from './vectorization.types.js';

export const OUTPUT_FILES = {
  enhancedData: 'enhanced_dataset.json',
  encodersOnly: 'encoders_only.json',
  schema: 'schema.json',
} as const;

export type OutputPaths = Record<keyof typeof OUTPUT_FILES, string>;

export async function writeVectorizationOutputs(outputDir: string, result: EnhanceResult): Promise<OutputPaths> {
  await mkdir(outputDir, { recursive: true });

  const paths: OutputPaths = {
    enhancedData: path.join(outputDir, OUTPUT_FILES.enhancedData),
    encodersOnly: path.join(outputDir, OUTPUT_FILES.encodersOnly),
    schema: path.join(outputDir, OUTPUT_FILES.schema),
  };

  await Promise.all([
    writeFile(paths.enhancedData, JSON.stringify(result.enhancedDataset, null, 4), 'utf-8'),
    writeFile(paths.encodersOnly, JSON.stringify(result.encoders, null, 4), 'utf-8'),
    writeFile(paths.schema, JSON.stringify(result.schema, null, 4), 'utf-8'),
  ]);

  return paths;
}
