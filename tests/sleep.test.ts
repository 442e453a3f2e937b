/**
 * Tests for the abortable sleep and seeded random source
 */

import { sleep } from '../src/resilience/sleep';
import { OperationCancelledError } from '../src/resilience/errors';
import { SeededRandom, createRandomSource, mathRandom, randomInt } from '../src/resilience/random';

describe('sleep', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should resolve once the timer fires', async () => {
    const resolved = jest.fn();
    const pending = sleep(100, 'GetCart').then(resolved);

    jest.advanceTimersByTime(99);
    await Promise.resolve();
    expect(resolved).not.toHaveBeenCalled();

    jest.advanceTimersByTime(1);
    await pending;
    expect(resolved).toHaveBeenCalledTimes(1);
  });

  it('should reject immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(100, 'GetCart', controller.signal)).rejects.toBeInstanceOf(OperationCancelledError);
  });

  it('should reject and clear the timer when aborted while waiting', async () => {
    const controller = new AbortController();
    const pending = sleep(1000, 'AddItem', controller.signal);

    controller.abort();

    await expect(pending).rejects.toMatchObject({
      operationName: 'AddItem',
      message: 'Operation AddItem was cancelled',
    });
    expect(jest.getTimerCount()).toBe(0);
  });
});

describe('random sources', () => {
  it('should produce the same sequence for the same seed', () => {
    const a = new SeededRandom(1234);
    const b = new SeededRandom(1234);
    const seqA = Array.from({ length: 5 }, () => a.next());
    const seqB = Array.from({ length: 5 }, () => b.next());

    expect(seqA).toEqual(seqB);
    seqA.forEach(value => {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    });
  });

  it('should follow the linear congruential recurrence', () => {
    const random = new SeededRandom(0);

    expect(random.next()).toBe(1013904223 / 4294967296);
  });

  it('should fall back to Math.random without a seed', () => {
    expect(createRandomSource(null)).toBe(mathRandom);
    expect(createRandomSource(3)).toBeInstanceOf(SeededRandom);
  });

  it('should map draws onto a half-open integer range', () => {
    expect(randomInt({ next: () => 0 }, 1000, 3000)).toBe(1000);
    expect(randomInt({ next: () => 0.5 }, 1000, 3000)).toBe(2000);
    expect(randomInt({ next: () => 0.9999 }, 1000, 3000)).toBe(2999);
  });
});
