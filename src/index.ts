/**
 * Application entry point for Cart Service
 * Wires configuration, cache, resilience layer and gRPC server
 */

import { shutdownTelemetry } from './telemetry/instrumentation';
import { config } from './utils/config';
import { logger, errorMessage } from './utils/logger';
import { CacheClient } from './storage/cache';
import { RedisCache } from './storage/redis-cache';
import { MemoryCache } from './storage/memory-cache';
import { CartCodec } from './storage/cart-codec';
import { CartStore } from './storage/cart-store';
import { FaultInjector } from './resilience/fault-injector';
import { RetryExecutor } from './resilience/retry-executor';
import { DelayInjector } from './resilience/delay-injector';
import { createRandomSource } from './resilience/random';
import { CartServer } from './server';

/**
 * Initialize cache backend based on configuration
 * Uses Redis if REDIS_ADDR is configured, otherwise falls back to in-memory storage
 */
function initializeCache(): CacheClient {
  if (config.redisAddr) {
    logger.info('Initializing Redis storage', { redisAddr: config.redisAddr });
    return new RedisCache(config.redisAddr);
  }
  logger.info('Initializing in-memory storage (Redis not configured)');
  return new MemoryCache();
}

/**
 * Main application startup
 */
async function main(): Promise<void> {
  try {
    logger.info('Starting Cart Service', {
      serviceName: config.serviceName,
      version: config.serviceVersion,
      port: config.port,
      logLevel: config.logLevel,
      redisAddr: config.redisAddr || 'not configured (using memory store)',
      otelEndpoint: config.otelExporterEndpoint || 'not configured',
      simulateConnectionIssues: config.fault.enabled,
      simulateRpcDelays: config.rpcDelay.enabled,
    });

    // OpenTelemetry is initialized by --require ./dist/telemetry/register.js

    const cache = initializeCache();
    const faultInjector = new FaultInjector(config.fault);
    const executor = new RetryExecutor(faultInjector);
    const store = new CartStore(cache, new CartCodec(), executor, config.fault);

    // RPC delays draw from their own stream
    const delaySeed = config.fault.seed === null ? null : config.fault.seed + 1;
    const delayInjector = new DelayInjector(config.rpcDelay, createRandomSource(delaySeed));

    const server = new CartServer(store, delayInjector, config.port, config.fault);
    await server.start();

    logger.info('Cart Service is ready to accept requests');

    setupShutdownHandlers(server, cache);
  } catch (error) {
    logger.error('Failed to start Cart Service', {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
}

/**
 * Setup handlers for graceful shutdown on process signals
 */
function setupShutdownHandlers(server: CartServer, cache: CacheClient): void {
  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn('Shutdown already in progress, ignoring signal', { signal });
      return;
    }

    isShuttingDown = true;
    logger.info('Received shutdown signal', { signal });

    try {
      // Wait for in-flight requests, then release storage connections
      await server.shutdown();
      await cache.close();

      // Flush pending telemetry
      await shutdownTelemetry();

      logger.info('Cart Service shut down successfully');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', {
        error: errorMessage(error),
      });
      process.exit(1);
    }
  };

  // Kubernetes sends SIGTERM for graceful shutdown
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', {
      error: error.message,
      stack: error.stack,
    });
    server.forceShutdown();
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', {
      reason: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    server.forceShutdown();
    process.exit(1);
  });
}

// Start the application
void main();
