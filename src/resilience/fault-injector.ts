/**
 * Decides, per storage call, whether to synthesize a fault and which kind.
 * Only consulted on the first attempt of a unit of work; retries always run
 * the real operation so recovery can be observed.
 */

import { FaultConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { recordFaultInjected } from '../telemetry/metrics';
import {
  ConnectionResetError,
  PoolExhaustedError,
  StorageError,
  StorageTimeoutError,
} from './errors';
import { RandomSource, createRandomSource, randomInt } from './random';

export type HardFaultKind = 'timeout' | 'connectionReset' | 'poolExhausted';

export type FaultDecision =
  | { kind: 'none' }
  | { kind: HardFaultKind }
  | { kind: 'slowOperation'; delayMs: number };

const HARD_FAULT_KINDS: readonly HardFaultKind[] = ['timeout', 'connectionReset', 'poolExhausted'];

export const SLOW_OPERATION_MIN_MS = 1000;
export const SLOW_OPERATION_MAX_MS = 3000;

export function isHardFault(decision: FaultDecision): decision is { kind: HardFaultKind } {
  return decision.kind === 'timeout' || decision.kind === 'connectionReset' || decision.kind === 'poolExhausted';
}

/**
 * Build the error a hard fault decision stands for.
 */
export function createFaultError(kind: HardFaultKind, operationName: string): StorageError {
  switch (kind) {
    case 'timeout':
      return new StorageTimeoutError(`Storage connection timeout during ${operationName}`);
    case 'connectionReset':
      return new ConnectionResetError(`Connection reset by peer during ${operationName}`);
    case 'poolExhausted':
      return new PoolExhaustedError(`Storage connection pool exhausted during ${operationName}`);
  }
}

export class FaultInjector {
  private readonly random: RandomSource;

  constructor(
    private readonly faultConfig: FaultConfig,
    random?: RandomSource
  ) {
    this.random = random ?? createRandomSource(faultConfig.seed);

    logger.info('FaultInjector initialized', {
      enabled: faultConfig.enabled,
      failureRate: faultConfig.failureRate,
      slowOperationRate: faultConfig.slowOperationRate,
      seeded: faultConfig.seed !== null,
    });
  }

  shouldInjectFault(operationName: string): FaultDecision {
    if (!this.faultConfig.enabled) {
      return { kind: 'none' };
    }

    if (this.random.next() < this.faultConfig.failureRate) {
      const kind = HARD_FAULT_KINDS[randomInt(this.random, 0, HARD_FAULT_KINDS.length)];
      logger.warn('Injecting storage fault', { operation: operationName, kind });
      recordFaultInjected(operationName, kind);
      return { kind };
    }

    if (this.random.next() < this.faultConfig.slowOperationRate) {
      const delayMs = randomInt(this.random, SLOW_OPERATION_MIN_MS, SLOW_OPERATION_MAX_MS);
      logger.warn('Simulating slow storage operation', { operation: operationName, delayMs });
      recordFaultInjected(operationName, 'slowOperation');
      return { kind: 'slowOperation', delayMs };
    }

    return { kind: 'none' };
  }
}
