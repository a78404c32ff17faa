import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { setTimeout as delay } from 'timers/promises';
import { getErrorMessage } from '../shared/error.utils';
import { ConfigError, TransportError } from '../shared/errors';
import type { RetryOutcome, RetryPolicy, RetryState, SleepFn } from './interfaces';

export const RETRY_SLEEP = Symbol('RETRY_SLEEP');

/**
 * Rejects attempt budgets below one and non-finite delays before any send.
 *
 * @throws {ConfigError}
 */
export function validateRetryPolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new ConfigError('--max-attempts must be at least 1');
  }
  if (!Number.isFinite(policy.initialDelayMs) || policy.initialDelayMs < 0) {
    throw new ConfigError('--backoff-ms must be a non-negative number');
  }
  if (!Number.isFinite(policy.factor)) {
    throw new ConfigError('--backoff-factor must be a finite number');
  }
}

/**
 * Delay before the next attempt: `max(1, round(current * max(1, factor)))`.
 */
export function nextDelay(currentMs: number, factor: number): number {
  const clamped = factor < 1 ? 1 : factor;
  return Math.max(1, Math.round(currentMs * clamped));
}

/**
 * Runs an operation up to `maxAttempts` times with exponential backoff.
 *
 * Attempt 1 runs immediately. After a failure, unless the budget is spent,
 * the executor waits the current delay, grows it and tries again. Only the
 * final failure is surfaced, wrapped in a {@link TransportError}.
 */
@Injectable()
export class RetryExecutor {
  private readonly logger = new Logger(RetryExecutor.name);
  private readonly sleep: SleepFn;

  constructor(@Optional() @Inject(RETRY_SLEEP) sleep?: SleepFn) {
    this.sleep = sleep ?? ((ms: number) => delay(ms));
  }

  async execute<T>(operation: (attempt: number) => Promise<T>, policy: RetryPolicy): Promise<RetryOutcome<T>> {
    validateRetryPolicy(policy);

    const state: RetryState = { attempt: 1, delayMs: Math.max(1, Math.round(policy.initialDelayMs)) };

    for (;;) {
      this.logger.verbose(`Sending attempt ${state.attempt}/${policy.maxAttempts}`);
      try {
        const result = await operation(state.attempt);
        this.logger.verbose(`Send succeeded on attempt ${state.attempt}`);
        return { result, attempts: state.attempt };
      } catch (error) {
        if (state.attempt >= policy.maxAttempts) {
          throw new TransportError(
            `failed to send message via SMTP after ${state.attempt} attempt(s)`,
            state.attempt,
            { cause: error },
          );
        }

        this.logger.verbose(
          `Attempt ${state.attempt} failed: ${getErrorMessage(error)}. Retrying in ${state.delayMs}ms`,
        );
        await this.sleep(state.delayMs);
        state.delayMs = nextDelay(state.delayMs, policy.factor);
        state.attempt += 1;
      }
    }
  }
}
