/**
 * VECTORIZATION ROUTES: HTTP Endpoints
 *
 * ENDPOINTS:
 *   POST /vectorize                        - fetch, vectorize, forward downstream
 *   GET  /api/vectorization/data-types     - supported data types + vector layouts
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  ConfigError,
  DatasetFetchError,
  DatasetLoadError,
  DatasetNotFoundError,
  DatasetParseError,
} from '../../common/errors.js';
import type { DatasetSource } from '../dataset/dataset.types.js';
import type { VectorizationPipeline } from './vectorization.pipeline.js';

export interface VectorizationRoutesDeps {
  pipeline: VectorizationPipeline;
}

const VectorizeBodySchema = z.object({
  url: z.string().trim().optional(),
  studyId: z.string().trim().optional(),
  jobId: z.string().trim().optional(),
  clientsList: z.array(z.unknown()).default([]),
  query: z.string().optional(),
});

export type VectorizeBody = z.input<typeof VectorizeBodySchema>;

/**
 * Client-facing message for dataset loading failures, null for anything else
 */
export function datasetErrorMessage(err: unknown): string | null {
  if (err instanceof DatasetNotFoundError) return `File not found: ${err.message}`;
  if (err instanceof DatasetFetchError) return `Failed to fetch dataset: ${err.message}`;
  if (err instanceof DatasetParseError || err instanceof DatasetLoadError || err instanceof ConfigError) {
    return `Error loading dataset: ${err.message}`;
  }
  return null;
}

// ═══════════════════════════════════════════════════════════════
// ROUTE REGISTRATION
// ═══════════════════════════════════════════════════════════════

export async function registerVectorizationRoutes(
  fastify: FastifyInstance,
  deps: VectorizationRoutesDeps,
): Promise<void> {
  /**
   * POST /vectorize
   *
   * Body: { url | studyId, jobId?, clientsList?, query? }
   */
  fastify.post('/vectorize', async (request, reply) => {
    const parsed = VectorizeBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.status(400).send({
        error: 'Invalid request body',
        details: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const { url, studyId, jobId, clientsList, query } = parsed.data;

    let source: DatasetSource;
    if (url) {
      source = { kind: 'location', location: url };
    } else if (studyId) {
      source = { kind: 'study', studyId };
    } else {
      return reply.status(400).send({ error: "Missing 'url' in request body" });
    }

    try {
      const result = await deps.pipeline.run({
        source,
        jobId: jobId || undefined,
        totalClients: clientsList.length,
        query: query || undefined,
      });

      return reply.send({
        message: 'Vectorization completed.',
        outputPaths: result.outputPaths,
        encodersCount: result.encoders.length,
        schemaCount: result.schema.length,
        smpcPosted: result.smpcPosted,
        orchestratorNotified: result.orchestratorNotified,
        pollingStarted: result.pollingStarted,
      });
    } catch (err) {
      const message = datasetErrorMessage(err);
      if (message === null) throw err;

      request.log.error({ err }, '[Vectorize] Dataset load failed');
      return reply.status(400).send({ error: message });
    }
  });

  /**
   * GET /api/vectorization/data-types
   */
  fastify.get('/api/vectorization/data-types', async () => {
    const { vectorizer } = deps.pipeline;
    return {
      ok: true,
      data: vectorizer.getSupportedDataTypes().map((dataType) => vectorizer.getVectorSchema(dataType)),
    };
  });

  fastify.log.info('[Vectorization] Routes registered');
}
