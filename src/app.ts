import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env.js';
import { AppError } from './common/errors.js';
import {
  createVectorizationPipeline,
  registerVectorizationRoutes,
  type VectorizationPipeline,
} from './modules/vectorization/index.js';

export const SERVICE_NAME = 'vectorization-service';

export interface BuildAppOptions {
  /** Defaults to the pipeline wired from environment configuration */
  pipeline?: VectorizationPipeline;
  /** `false` silences request logging (tests) */
  logger?: boolean;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: options.logger === false ? false : { level: env.LOG_LEVEL },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
  });

  const pipeline = options.pipeline ?? createVectorizationPipeline(env, app.log);

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    app.log.error(err);

    if (err instanceof AppError) {
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Fastify validation / body parsing errors
    if (err.validation || err.statusCode === 400) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    return reply.status(err.statusCode ?? 500).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/health', async () => ({
    ok: true,
    service: SERVICE_NAME,
    timestamp: new Date().toISOString(),
  }));

  app.register(async (fastify) => {
    await registerVectorizationRoutes(fastify, { pipeline });
  });

  app.addHook('onClose', async () => {
    pipeline.shutdown();
  });

  return app;
}
