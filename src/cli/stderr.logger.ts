import { ConsoleLogger, type LogLevel } from '@nestjs/common';

const QUIET_LEVELS: LogLevel[] = ['error', 'warn'];
const VERBOSE_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

export function logLevelsFor(verbose: boolean): LogLevel[] {
  return verbose ? VERBOSE_LEVELS : QUIET_LEVELS;
}

/**
 * Console logger that writes every level to stderr, leaving stdout to the
 * printed message and the final status line.
 */
export class StderrLogger extends ConsoleLogger {
  protected printMessages(messages: unknown[], context = '', logLevel: LogLevel = 'log'): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}
