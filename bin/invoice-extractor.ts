#!/usr/bin/env node
import 'dotenv/config';
import { runCli } from '../cli/main';
import { logger } from '../cli/logger';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    logger.fatal({ err: error }, 'Error inesperado');
    process.exitCode = 1;
  });
