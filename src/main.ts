#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { runCli } from './cli/cli.runner';
import { getErrorMessage } from './shared/error.utils';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const logger = new Logger('bootstrap');
    logger.error(`Unhandled error: ${getErrorMessage(error)}`);
    process.exitCode = 1;
  });
