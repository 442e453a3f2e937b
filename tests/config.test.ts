/**
 * Tests for environment configuration loading
 */

import { loadConfig, loadDelayConfig, loadFaultConfig } from '../src/utils/config';

describe('loadFaultConfig', () => {
  it('should fall back to documented defaults', () => {
    expect(loadFaultConfig({})).toEqual({
      enabled: false,
      failureRate: 0.3,
      maxRetries: 3,
      baseDelayMs: 100,
      slowOperationRate: 0.1,
      seed: null,
    });
  });

  it('should read overrides from the environment', () => {
    expect(loadFaultConfig({
      SIMULATE_CONNECTION_ISSUES: 'TRUE',
      CONNECTION_FAILURE_RATE: '1.0',
      MAX_CONNECTION_RETRIES: '0',
      BASE_RETRY_DELAY_MS: '250',
      SLOW_OPERATION_RATE: '0',
      FAULT_INJECTION_SEED: '42',
    })).toEqual({
      enabled: true,
      failureRate: 1,
      maxRetries: 0,
      baseDelayMs: 250,
      slowOperationRate: 0,
      seed: 42,
    });
  });

  it('should only enable injection for the literal true', () => {
    expect(loadFaultConfig({ SIMULATE_CONNECTION_ISSUES: 'yes' }).enabled).toBe(false);
  });

  it('should reject a failure rate outside 0-1', () => {
    expect(() => loadFaultConfig({ CONNECTION_FAILURE_RATE: '1.5' })).toThrow(
      'Invalid CONNECTION_FAILURE_RATE: 1.5. Must be a number between 0 and 1.'
    );
  });

  it('should reject negative or fractional retry counts', () => {
    expect(() => loadFaultConfig({ MAX_CONNECTION_RETRIES: '-1' })).toThrow(
      'Invalid MAX_CONNECTION_RETRIES: -1. Must be a non-negative integer.'
    );
    expect(() => loadFaultConfig({ BASE_RETRY_DELAY_MS: '2.5' })).toThrow(
      'Invalid BASE_RETRY_DELAY_MS: 2.5. Must be a non-negative integer.'
    );
  });

  it('should treat blank values as unset', () => {
    expect(loadFaultConfig({
      MAX_CONNECTION_RETRIES: ' ',
      CONNECTION_FAILURE_RATE: '',
      FAULT_INJECTION_SEED: '  ',
    })).toMatchObject({ maxRetries: 3, failureRate: 0.3, seed: null });
  });

  it('should trim surrounding whitespace from numbers', () => {
    expect(loadFaultConfig({ MAX_CONNECTION_RETRIES: ' 5 ', SLOW_OPERATION_RATE: ' 0.25' })).toMatchObject({
      maxRetries: 5,
      slowOperationRate: 0.25,
    });
  });

  it('should reject hex and exponent forms', () => {
    expect(() => loadFaultConfig({ MAX_CONNECTION_RETRIES: '0x10' })).toThrow(
      'Invalid MAX_CONNECTION_RETRIES: 0x10. Must be a non-negative integer.'
    );
    expect(() => loadFaultConfig({ BASE_RETRY_DELAY_MS: '1e3' })).toThrow(
      'Invalid BASE_RETRY_DELAY_MS: 1e3. Must be a non-negative integer.'
    );
    expect(() => loadFaultConfig({ CONNECTION_FAILURE_RATE: '5e-1' })).toThrow(
      'Invalid CONNECTION_FAILURE_RATE: 5e-1. Must be a number between 0 and 1.'
    );
  });

  it('should reject a non-integer seed', () => {
    expect(() => loadFaultConfig({ FAULT_INJECTION_SEED: 'abc' })).toThrow(
      'Invalid FAULT_INJECTION_SEED: abc. Must be an integer.'
    );
  });
});

describe('loadDelayConfig', () => {
  it('should read the scenario-prefixed variables', () => {
    expect(loadDelayConfig('payment', {
      SIMULATE_PAYMENT_DELAYS: 'true',
      PAYMENT_DELAY_FREQUENCY: '0.5',
      PAYMENT_MIN_DELAY_MS: '100',
      PAYMENT_MAX_DELAY_MS: '200',
      PAYMENT_TIMEOUT_RATE: '0.25',
    })).toEqual({
      enabled: true,
      delayProbability: 0.5,
      minDelayMs: 100,
      maxDelayMs: 200,
      timeoutRate: 0.25,
    });
  });

  it('should fall back to documented defaults', () => {
    expect(loadDelayConfig('CART', {})).toEqual({
      enabled: false,
      delayProbability: 0.3,
      minDelayMs: 2000,
      maxDelayMs: 8000,
      timeoutRate: 0.1,
    });
  });

  it('should reject a window whose minimum exceeds its maximum', () => {
    expect(() => loadDelayConfig('CART', { CART_MIN_DELAY_MS: '500', CART_MAX_DELAY_MS: '100' })).toThrow(
      'Invalid CART delay window: min 500ms is greater than max 100ms.'
    );
  });
});

describe('loadConfig', () => {
  it('should build the service configuration', () => {
    const config = loadConfig({ PORT: '9000', LOG_LEVEL: 'DEBUG', REDIS_ADDR: 'redis-cart:6379' });

    expect(config.port).toBe(9000);
    expect(config.logLevel).toBe('debug');
    expect(config.redisAddr).toBe('redis-cart:6379');
    expect(config.serviceName).toBe('cartservice');
    expect(config.fault.maxRetries).toBe(3);
    expect(config.rpcDelay.enabled).toBe(false);
  });

  it('should reject an invalid port', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow('Invalid PORT: abc. Must be between 1 and 65535.');
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'trace' })).toThrow(
      'Invalid LOG_LEVEL: trace. Must be one of: debug, info, warn, error'
    );
  });
});
