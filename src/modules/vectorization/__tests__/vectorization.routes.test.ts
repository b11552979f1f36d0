import type { FastifyInstance } from 'fastify';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { buildApp } from '../../../app.js';
import { VectorizationPipeline } from '../vectorization.pipeline.js';
import { VectorizationService } from '../vectorization.service.js';
import { DatasetFetchError, DatasetNotFoundError, DatasetParseError } from '../../../common/errors.js';
import type { DatasetProvider, DatasetSource } from '../../dataset/dataset.types.js';
import type { Dataset } from '../vectorization.types.js';
import type { SmpcGateway } from '../../../clients/smpc.client.js';

const dataset: Dataset = {
  entries: {
    smoker: { numOfNotNull: 100, numOfTrue: 75 },
    age: { numOfNotNull: 10, min: 1.5, max: 98.7, avg: 45.2, q1: 25.0, q2: 44.5, q3: 65.8 },
  },
};

function mockLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function setup(fetchImpl: (source: DatasetSource) => Promise<Dataset> = async () => dataset) {
  const fetch = vi.fn(fetchImpl);
  const datasets: DatasetProvider = { fetch };
  const postEncoder = vi.fn<SmpcGateway['postEncoder']>(async () => true);
  const pipeline = new VectorizationPipeline({
    datasets,
    vectorizer: new VectorizationService(undefined, mockLogger()),
    smpc: { postEncoder },
    logger: mockLogger(),
  });
  return { app: buildApp({ pipeline, logger: false }), fetch, postEncoder };
}

describe('Vectorization routes', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  describe('POST /vectorize', () => {

    it('should vectorize a dataset by URL and report downstream flags', async () => {
      const ctx = setup();
      app = ctx.app;

      const res = await app.inject({
        method: 'POST',
        url: '/vectorize',
        payload: { url: 'data/metadata.json', jobId: 'job-1', clientsList: ['a', 'b', 'c'] },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        message: 'Vectorization completed.',
        outputPaths: null,
        encodersCount: 1,
        schemaCount: 2,
        smpcPosted: true,
        orchestratorNotified: false,
        pollingStarted: false,
      });
      expect(ctx.fetch).toHaveBeenCalledWith({ kind: 'location', location: 'data/metadata.json' });
      expect(ctx.postEncoder).toHaveBeenCalledWith('job-1', expect.objectContaining({ vectorLength: 9 }));
    });

    it('should fetch by study id when no URL is given', async () => {
      const ctx = setup();
      app = ctx.app;

      const res = await app.inject({ method: 'POST', url: '/vectorize', payload: { studyId: 'study-7' } });

      expect(res.statusCode).toBe(200);
      expect(ctx.fetch).toHaveBeenCalledWith({ kind: 'study', studyId: 'study-7' });
      expect(ctx.postEncoder).not.toHaveBeenCalled();
    });

    it('should reject a request without a dataset location', async () => {
      app = setup().app;

      const res = await app.inject({ method: 'POST', url: '/vectorize', payload: { jobId: 'job-1' } });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: "Missing 'url' in request body" });
    });

    it('should reject a malformed body', async () => {
      app = setup().app;

      const res = await app.inject({ method: 'POST', url: '/vectorize', payload: { url: 'x.json', clientsList: 'a,b' } });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ error: 'Invalid request body' });
    });

    it('should map a missing file to 400', async () => {
      app = setup(async () => {
        throw new DatasetNotFoundError('Local file not found: /data/x.json', ['/data/x.json']);
      }).app;

      const res = await app.inject({ method: 'POST', url: '/vectorize', payload: { url: '/data/x.json' } });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'File not found: Local file not found: /data/x.json' });
    });

    it('should map a failed fetch to 400', async () => {
      app = setup(async () => {
        throw new DatasetFetchError('http://datasets.test/x.json', 'Request failed with status code 404', 404);
      }).app;

      const res = await app.inject({ method: 'POST', url: '/vectorize', payload: { url: 'http://datasets.test/x.json' } });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'Failed to fetch dataset: Request failed with status code 404' });
    });

    it('should map an unreadable dataset to 400', async () => {
      app = setup(async () => {
        throw new DatasetParseError('/data/x.json');
      }).app;

      const res = await app.inject({ method: 'POST', url: '/vectorize', payload: { url: '/data/x.json' } });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'Error loading dataset: Dataset at /data/x.json is not valid JSON: not a JSON object' });
    });

    it('should hand unexpected failures to the error handler', async () => {
      const ctx = setup();
      ctx.postEncoder.mockRejectedValueOnce(new Error('encoder serialization failed'));
      app = ctx.app;

      const res = await app.inject({ method: 'POST', url: '/vectorize', payload: { url: 'x.json', jobId: 'job-9' } });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({ ok: false, error: 'INTERNAL_ERROR', message: 'encoder serialization failed' });
    });
  });

  describe('GET /api/vectorization/data-types', () => {

    it('should list every supported data type with its layout', async () => {
      app = setup().app;

      const res = await app.inject({ method: 'GET', url: '/api/vectorization/data-types' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        ok: true,
        data: [
          { dataType: 'BOOLEAN', vectorLength: 2, fields: ['numOfNotNull', 'numOfTrue'] },
          { dataType: 'NUMERIC', vectorLength: 7, fields: ['numOfNotNull', 'min', 'max', 'avg', 'q1', 'q2', 'q3'] },
          { dataType: 'NOMINAL', vectorLength: 3, fields: ['numOfNotNull', 'numUniqueValues', 'topValueCount'] },
          { dataType: 'ORDINAL', vectorLength: 3, fields: ['numOfNotNull', 'numUniqueValues', 'topValueCount'] },
        ],
      });
    });
  });

  describe('service endpoints', () => {

    it('should answer the health check', async () => {
      app = setup().app;

      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ ok: true, service: 'vectorization-service' });
    });

    it('should answer unknown routes with 404', async () => {
      app = setup().app;

      const res = await app.inject({ method: 'GET', url: '/nope' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
    });
  });
});
