/**
 * Simulates network delays and gateway timeouts for single-shot calls.
 * Nothing here retries; whether to try again is the caller's decision.
 */

import { DelayConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { recordRpcDelay } from '../telemetry/metrics';
import { GatewayTimeoutError } from './errors';
import { RandomSource, mathRandom, randomInt } from './random';
import { Sleeper, sleep as defaultSleep } from './sleep';

export class DelayInjector {
  constructor(
    private readonly delayConfig: DelayConfig,
    private readonly random: RandomSource = mathRandom,
    private readonly sleep: Sleeper = defaultSleep
  ) {}

  /**
   * Possibly wait, then possibly fail with a gateway timeout.
   * Resolves with the delay applied in milliseconds (0 when none).
   */
  async maybeDelay(operationName: string, signal?: AbortSignal): Promise<number> {
    if (!this.delayConfig.enabled) {
      return 0;
    }

    if (this.random.next() >= this.delayConfig.delayProbability) {
      return 0;
    }

    const { minDelayMs, maxDelayMs } = this.delayConfig;
    const delayMs = randomInt(this.random, minDelayMs, maxDelayMs);

    logger.warn('Simulating processing delay', { operation: operationName, delayMs });
    await this.sleep(delayMs, operationName, signal);

    if (this.random.next() < this.delayConfig.timeoutRate) {
      logger.error('Processing timeout after delay', { operation: operationName, delayMs });
      recordRpcDelay(operationName, true);
      throw new GatewayTimeoutError(operationName, delayMs);
    }

    logger.info('Delay simulation completed', { operation: operationName, delayMs });
    recordRpcDelay(operationName, false);
    return delayMs;
  }

  /**
   * Apply the delay scenario in front of a single call.
   */
  async run<T>(operationName: string, call: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.maybeDelay(operationName, signal);
    return call();
  }
}
