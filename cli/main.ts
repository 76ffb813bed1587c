import { parseArgs, USAGE } from './args';
import { loadConfig, ExtractorConfig } from './config';
import { ConfigError } from './errors';
import { processBatch } from './process-batch';
import { reportResults } from './report';
import { createAwsServices } from './aws';
import { PipelineServices } from './types';
import { logger } from './logger';

export const EXIT_OK = 0;
export const EXIT_FILE_FAILED = 1;
export const EXIT_USAGE = 2;

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  write?: (line: string) => void;
  writeError?: (line: string) => void;
  createServices?: (config: ExtractorConfig) => PipelineServices;
}

export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const {
    env = process.env,
    write = console.log,
    writeError = console.error,
    createServices = createAwsServices,
  } = options;

  const args = parseArgs(argv);
  if (args.kind === 'help') {
    write(USAGE);
    return EXIT_OK;
  }
  if (args.kind === 'invalid') {
    writeError(args.message);
    writeError(USAGE);
    return EXIT_USAGE;
  }

  let config: ExtractorConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      writeError(error.message);
      return EXIT_USAGE;
    }
    throw error;
  }
  if (config.logLevel) {
    logger.level = config.logLevel;
  }

  const services = createServices(config);
  logger.info({ files: args.files.length, concurrency: config.concurrency }, 'Procesando facturas');
  const results = await processBatch(
    args.files,
    { ...services, bucketName: config.bucketName },
    { concurrency: config.concurrency }
  );

  reportResults(results, write);
  return results.every((result) => result.ok) ? EXIT_OK : EXIT_FILE_FAILED;
}
