import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { MailerService } from '../mailer/mailer.service';
import { formatErrorChain } from '../shared/error.utils';
import { CliUsageError } from '../shared/errors';
import { CLI_NAME, CLI_VERSION, USAGE } from './cli.constants';
import { type CliCommand, parseCliArguments } from './cli.options';
import { StderrLogger, logLevelsFor } from './stderr.logger';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Runs one invocation and resolves to the process exit code.
 *
 * stdout carries help, version, the printed message and `Email sent`;
 * everything else is logged to stderr.
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArguments(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`error: ${error.message}\n\nRun ${CLI_NAME} --help for usage.\n`);
      return EXIT_USAGE;
    }
    throw error;
  }

  switch (command.kind) {
    case 'help':
      process.stdout.write(USAGE);
      return EXIT_SUCCESS;
    case 'version':
      process.stdout.write(`${CLI_NAME} ${CLI_VERSION}\n`);
      return EXIT_SUCCESS;
    case 'dispatch':
      break;
  }

  const logger = new StderrLogger(CLI_NAME, { logLevels: logLevelsFor(command.request.verbose) });

  try {
    const app = await NestFactory.createApplicationContext(AppModule, { logger, abortOnError: false });
    try {
      const mailer = app.get(MailerService);
      const result = await mailer.dispatch(command.request, { onPrint: writeMessage });
      if (result.sent) {
        logger.verbose(`Delivered after ${result.attempts} attempt(s)`);
        process.stdout.write('Email sent\n');
      }
      return EXIT_SUCCESS;
    } finally {
      await app.close();
    }
  } catch (error) {
    logger.error(formatErrorChain(error));
    return EXIT_FAILURE;
  }
}

function writeMessage(raw: Buffer): void {
  process.stdout.write(raw);
  if (raw.length === 0 || raw[raw.length - 1] !== 0x0a) {
    process.stdout.write('\n');
  }
}
