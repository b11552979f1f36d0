#!/usr/bin/env node
import 'dotenv/config';
import { env } from '../config/env.js';
import { createVectorizationPipeline } from '../modules/vectorization/vectorization.pipeline.js';
import { createCli } from './program.js';

const program = createCli({
  settings: env,
  createPipeline: (settings) => createVectorizationPipeline(settings),
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('[CLI] Fatal error:', err);
  process.exit(1);
});
