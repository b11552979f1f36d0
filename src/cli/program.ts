/**
 * Vectorize CLI
 *
 * One-shot run of the vectorization pipeline from the command line:
 *   vectorize --url ./data/metadata.json
 *   vectorize --study-id 42 --job-id job-1 --total-clients 3 --client-id site-a
 *
 * Flags override the matching environment settings for this run only.
 */

import { Command, InvalidArgumentError } from 'commander';
import { errorMessage } from '../common/errors.js';
import type { DatasetSource } from '../modules/dataset/dataset.types.js';
import type {
  PipelineResult,
  PipelineSettings,
  VectorizationPipeline,
} from '../modules/vectorization/vectorization.pipeline.js';
import { datasetErrorMessage } from '../modules/vectorization/vectorization.routes.js';

export interface VectorizeOptions {
  url?: string;
  studyId?: string;
  query?: string;
  jobId?: string;
  clientId?: string;
  totalClients: number;
  smpcUrl?: string;
  outputDir?: string;
}

export interface CliDeps {
  settings: PipelineSettings;
  createPipeline: (settings: PipelineSettings) => VectorizationPipeline;
  out?: (line: string) => void;
  err?: (line: string) => void;
  setExitCode?: (code: number) => void;
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/**
 * Settings for one run: flags win over the environment
 */
export function applyOverrides(settings: PipelineSettings, options: VectorizeOptions): PipelineSettings {
  return {
    ...settings,
    CLIENT_ID: options.clientId ?? settings.CLIENT_ID,
    SMPC_URL: options.smpcUrl ?? settings.SMPC_URL,
    OUTPUT_DIR: options.outputDir ?? settings.OUTPUT_DIR,
    OUTPUT_ENABLED: options.outputDir ? true : settings.OUTPUT_ENABLED,
  };
}

export function summarize(result: PipelineResult): string[] {
  const lines = [
    'Vectorization completed.',
    `  encoders: ${result.encoders.length}`,
    `  schema entries: ${result.schema.length}`,
  ];
  if (result.outputPaths) {
    lines.push(
      `  enhanced dataset: ${result.outputPaths.enhancedData}`,
      `  encoders: ${result.outputPaths.encodersOnly}`,
      `  schema: ${result.outputPaths.schema}`,
    );
  }
  lines.push(
    `  smpc posted: ${result.smpcPosted}`,
    `  orchestrator notified: ${result.orchestratorNotified}`,
    `  polling started: ${result.pollingStarted}`,
  );
  return lines;
}

async function vectorizeCommand(options: VectorizeOptions, deps: CliDeps): Promise<void> {
  const out = deps.out ?? ((line: string) => console.log(line));
  const err = deps.err ?? ((line: string) => console.error(line));
  const setExitCode = deps.setExitCode ?? ((code: number) => { process.exitCode = code; });

  let source: DatasetSource;
  if (options.url) {
    source = { kind: 'location', location: options.url };
  } else if (options.studyId) {
    source = { kind: 'study', studyId: options.studyId };
  } else {
    err('Either --url or --study-id is required.');
    setExitCode(1);
    return;
  }

  const pipeline = deps.createPipeline(applyOverrides(deps.settings, options));

  try {
    const result = await pipeline.run({
      source,
      jobId: options.jobId,
      totalClients: options.totalClients,
      query: options.query,
    });
    summarize(result).forEach((line) => out(line));
  } catch (error) {
    err(datasetErrorMessage(error) ?? `Vectorization failed: ${errorMessage(error)}`);
    setExitCode(1);
  }
}

export function createCli(deps: CliDeps): Command {
  const program = new Command();

  program
    .name('vectorize')
    .description('Vectorize a feature-statistics dataset and forward it to SMPC')
    .option('-u, --url <location>', 'Dataset URL or local file path')
    .option('-s, --study-id <id>', 'Fetch the dataset of a study from the dataset API')
    .option('-q, --query <feature>', 'Vectorize only the named feature')
    .option('-j, --job-id <id>', 'SMPC job to post the encoder to')
    .option('-c, --client-id <id>', 'Identifier of this client node')
    .option('-n, --total-clients <count>', 'Number of participating clients', parseCount, 0)
    .option('--smpc-url <url>', 'SMPC service base URL')
    .option('-o, --output-dir <dir>', 'Directory for output artifacts')
    .action(async (options: VectorizeOptions) => {
      await vectorizeCommand(options, deps);
    });

  return program;
}
