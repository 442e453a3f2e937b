/**
 * Shared fixtures for deterministic resilience tests
 */

import { DelayConfig, FaultConfig } from '../src/utils/config';
import { RandomSource } from '../src/resilience/random';
import { Sleeper } from '../src/resilience/sleep';

/**
 * Random source that replays a fixed list of draws and fails loudly when
 * code draws more often than the test expects
 */
export class ScriptedRandom implements RandomSource {
  private index = 0;

  constructor(private readonly values: number[]) {}

  next(): number {
    if (this.index >= this.values.length) {
      throw new Error(`Unexpected random draw #${this.index + 1}`);
    }
    return this.values[this.index++];
  }

  get draws(): number {
    return this.index;
  }
}

export const constantRandom = (value: number): RandomSource => ({ next: () => value });

/**
 * Sleeper that resolves immediately and remembers every requested delay
 */
export function recordingSleeper(): { sleep: Sleeper; delays: number[] } {
  const delays: number[] = [];
  const sleep: Sleeper = async (ms) => {
    delays.push(ms);
  };
  return { sleep, delays };
}

export function faultConfig(overrides: Partial<FaultConfig> = {}): FaultConfig {
  return {
    enabled: false,
    failureRate: 0.3,
    maxRetries: 3,
    baseDelayMs: 100,
    slowOperationRate: 0.1,
    seed: null,
    ...overrides,
  };
}

export function delayConfig(overrides: Partial<DelayConfig> = {}): DelayConfig {
  return {
    enabled: true,
    delayProbability: 0.3,
    minDelayMs: 2000,
    maxDelayMs: 8000,
    timeoutRate: 0.1,
    ...overrides,
  };
}
