/**
 * Runs a storage unit of work with fault injection on the first attempt
 * and exponential backoff between attempts.
 */

import { logger, errorMessage } from '../utils/logger';
import { recordStorageRetry } from '../telemetry/metrics';
import { OperationCancelledError, StorageUnavailableError } from './errors';
import { FaultInjector, createFaultError, isHardFault } from './fault-injector';
import { Sleeper, sleep as defaultSleep } from './sleep';

/**
 * Per-call-site retry strategy.
 */
export interface RetryPolicy {
  /** Retries allowed after the first attempt */
  maxRetries: number;
  /** Wait before the first retry; doubles for each one after */
  baseDelayMs: number;
  /** Errors for which this returns false are rethrown without retrying */
  isRetryable?: (error: unknown) => boolean;
}

export interface RetryOutcome {
  attempts: number;
  lastError: unknown;
}

export type UnitOfWork<T> = () => Promise<T>;

/**
 * Backoff before retry number `attempt` (1-based).
 */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

export class RetryExecutor {
  private readonly sleep: Sleeper;

  constructor(
    private readonly faultInjector: FaultInjector,
    sleep: Sleeper = defaultSleep
  ) {
    this.sleep = sleep;
  }

  async execute<T>(
    work: UnitOfWork<T>,
    operationName: string,
    policy: RetryPolicy,
    signal?: AbortSignal
  ): Promise<T> {
    if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${policy.maxRetries}`);
    }
    if (!Number.isFinite(policy.baseDelayMs) || policy.baseDelayMs < 0) {
      throw new RangeError(`baseDelayMs must be a non-negative number, got ${policy.baseDelayMs}`);
    }

    const outcome: RetryOutcome = { attempts: 0, lastError: undefined };

    while (outcome.attempts <= policy.maxRetries) {
      if (signal?.aborted) {
        throw new OperationCancelledError(operationName);
      }

      logger.debug('Executing storage operation', {
        operation: operationName,
        attempt: outcome.attempts + 1,
      });

      try {
        return await this.attempt(work, operationName, outcome.attempts, signal);
      } catch (error) {
        if (error instanceof OperationCancelledError) {
          throw error;
        }
        if (signal?.aborted) {
          throw new OperationCancelledError(operationName);
        }
        if (policy.isRetryable && !policy.isRetryable(error)) {
          logger.error('Storage operation failed with non-retryable error', {
            operation: operationName,
            attempt: outcome.attempts + 1,
            error: errorMessage(error),
          });
          throw error;
        }

        outcome.lastError = error;
        outcome.attempts++;

        if (outcome.attempts <= policy.maxRetries) {
          const delayMs = backoffDelay(policy.baseDelayMs, outcome.attempts);
          logger.warn('Storage operation failed, retrying', {
            operation: operationName,
            attempt: outcome.attempts,
            delayMs,
            error: errorMessage(error),
          });
          recordStorageRetry(operationName, 'retrying');
          await this.sleep(delayMs, operationName, signal);
        }
      }
    }

    logger.error('Storage operation failed after all attempts', {
      operation: operationName,
      attempts: outcome.attempts,
      error: errorMessage(outcome.lastError),
    });
    recordStorageRetry(operationName, 'exhausted');
    throw new StorageUnavailableError(operationName, outcome.attempts, errorMessage(outcome.lastError));
  }

  private async attempt<T>(
    work: UnitOfWork<T>,
    operationName: string,
    attempt: number,
    signal?: AbortSignal
  ): Promise<T> {
    if (attempt === 0) {
      const decision = this.faultInjector.shouldInjectFault(operationName);
      if (isHardFault(decision)) {
        throw createFaultError(decision.kind, operationName);
      }
      if (decision.kind === 'slowOperation') {
        await this.sleep(decision.delayMs, operationName, signal);
      }
    }
    return work();
  }
}
