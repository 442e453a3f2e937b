/**
 * Configuration management for Cart Service
 * Loads configuration from environment variables with sensible defaults
 */

/**
 * Settings for storage fault injection and retry behaviour.
 */
export interface FaultConfig {
  /** Whether synthetic storage faults are injected at all */
  enabled: boolean;
  /** Probability (0-1) that a first attempt fails with a hard fault */
  failureRate: number;
  /** Retries allowed after the first attempt */
  maxRetries: number;
  /** Backoff before the first retry; doubles with each further retry */
  baseDelayMs: number;
  /** Probability (0-1) that a first attempt is slowed down instead of failing */
  slowOperationRate: number;
  /** Seed for reproducible injection; unset uses Math.random */
  seed: number | null;
}

/**
 * Settings for one single-shot delay scenario (e.g. CART, PAYMENT).
 */
export interface DelayConfig {
  enabled: boolean;
  delayProbability: number;
  minDelayMs: number;
  maxDelayMs: number;
  timeoutRate: number;
}

export interface Config {
  port: number;
  redisAddr: string | null;
  logLevel: string;
  serviceName: string;
  serviceVersion: string;
  otelExporterEndpoint: string | null;
  fault: FaultConfig;
  rpcDelay: DelayConfig;
}

type Env = Record<string, string | undefined>;

function readFlag(env: Env, name: string): boolean {
  return env[name]?.toLowerCase() === 'true';
}

const DECIMAL = /^(\d+(\.\d*)?|\.\d+)$/;
const NON_NEGATIVE_INTEGER = /^\d+$/;
const INTEGER = /^-?\d+$/;

/**
 * Trimmed value of a variable; blank counts as unset
 */
function readRaw(env: Env, name: string): string | null {
  const raw = env[name]?.trim();
  return raw ? raw : null;
}

function readRate(env: Env, name: string, fallback: number): number {
  const raw = readRaw(env, name);
  if (raw === null) {
    return fallback;
  }
  const value = Number(raw);
  if (!DECIMAL.test(raw) || value > 1) {
    throw new Error(`Invalid ${name}: ${raw}. Must be a number between 0 and 1.`);
  }
  return value;
}

function readCount(env: Env, name: string, fallback: number): number {
  const raw = readRaw(env, name);
  if (raw === null) {
    return fallback;
  }
  const value = Number(raw);
  if (!NON_NEGATIVE_INTEGER.test(raw) || !Number.isSafeInteger(value)) {
    throw new Error(`Invalid ${name}: ${raw}. Must be a non-negative integer.`);
  }
  return value;
}

/**
 * Load fault injection settings (SIMULATE_CONNECTION_ISSUES and friends)
 */
export function loadFaultConfig(env: Env = process.env): FaultConfig {
  const rawSeed = readRaw(env, 'FAULT_INJECTION_SEED');
  let seed: number | null = null;
  if (rawSeed !== null) {
    seed = Number(rawSeed);
    if (!INTEGER.test(rawSeed) || !Number.isSafeInteger(seed)) {
      throw new Error(`Invalid FAULT_INJECTION_SEED: ${rawSeed}. Must be an integer.`);
    }
  }

  return {
    enabled: readFlag(env, 'SIMULATE_CONNECTION_ISSUES'),
    failureRate: readRate(env, 'CONNECTION_FAILURE_RATE', 0.3),
    maxRetries: readCount(env, 'MAX_CONNECTION_RETRIES', 3),
    baseDelayMs: readCount(env, 'BASE_RETRY_DELAY_MS', 100),
    slowOperationRate: readRate(env, 'SLOW_OPERATION_RATE', 0.1),
    seed,
  };
}

/**
 * Load a delay scenario. For scenario "PAYMENT" this reads
 * SIMULATE_PAYMENT_DELAYS, PAYMENT_DELAY_FREQUENCY, PAYMENT_MIN_DELAY_MS,
 * PAYMENT_MAX_DELAY_MS and PAYMENT_TIMEOUT_RATE.
 */
export function loadDelayConfig(scenario: string, env: Env = process.env): DelayConfig {
  const prefix = scenario.toUpperCase();
  const minDelayMs = readCount(env, `${prefix}_MIN_DELAY_MS`, 2000);
  const maxDelayMs = readCount(env, `${prefix}_MAX_DELAY_MS`, 8000);

  if (minDelayMs > maxDelayMs) {
    throw new Error(
      `Invalid ${prefix} delay window: min ${minDelayMs}ms is greater than max ${maxDelayMs}ms.`
    );
  }

  return {
    enabled: readFlag(env, `SIMULATE_${prefix}_DELAYS`),
    delayProbability: readRate(env, `${prefix}_DELAY_FREQUENCY`, 0.3),
    minDelayMs,
    maxDelayMs,
    timeoutRate: readRate(env, `${prefix}_TIMEOUT_RATE`, 0.1),
  };
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: Env = process.env): Config {
  const port = env.PORT ? parseInt(env.PORT, 10) : 7070;
  const redisAddr = env.REDIS_ADDR || null;
  const logLevel = env.LOG_LEVEL || 'info';
  const serviceName = env.OTEL_SERVICE_NAME || env.SERVICE_NAME || 'cartservice';
  const serviceVersion = env.OTEL_SERVICE_VERSION || '1.0.0';
  const otelExporterEndpoint = env.OTEL_EXPORTER_OTLP_ENDPOINT || null;

  // Validate port
  if (isNaN(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid PORT: ${env.PORT}. Must be between 1 and 65535.`);
  }

  // Validate log level
  const validLogLevels = ['debug', 'info', 'warn', 'error'];
  if (!validLogLevels.includes(logLevel.toLowerCase())) {
    throw new Error(`Invalid LOG_LEVEL: ${logLevel}. Must be one of: ${validLogLevels.join(', ')}`);
  }

  return {
    port,
    redisAddr,
    logLevel: logLevel.toLowerCase(),
    serviceName,
    serviceVersion,
    otelExporterEndpoint,
    fault: loadFaultConfig(env),
    rpcDelay: loadDelayConfig('CART', env),
  };
}

/**
 * Singleton config instance
 */
export const config: Config = loadConfig();
