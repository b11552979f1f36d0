/**
 * Vectorization Module Index
 */

export * from './vectorization.types.js';
export * from './vectorizers.js';
export * from './feature.encoder.js';
export * from './schema.builder.js';
export * from './dataset.formats.js';
export * from './vectorization.service.js';
export * from './output.writer.js';
export * from './vectorization.pipeline.js';
export { registerVectorizationRoutes, datasetErrorMessage } from './vectorization.routes.js';
export type { VectorizationRoutesDeps, VectorizeBody } from './vectorization.routes.js';
