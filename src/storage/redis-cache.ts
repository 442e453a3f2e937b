/**
 * Redis implementation of the cart cache.
 * Stores raw Protobuf bytes under `cart:<userId>` keys.
 */

import Redis from 'ioredis';
import { CacheClient } from './cache';
import { logger, errorMessage } from '../utils/logger';
import {
    ConnectionResetError,
    StorageError,
    StorageTimeoutError,
} from '../resilience/errors';

const CONNECTION_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'EPIPE', 'ENOTCONN']);

/**
 * Map an ioredis failure onto the storage fault taxonomy.
 */
export function classifyRedisError(error: unknown): StorageError {
    if (error instanceof StorageError) {
        return error;
    }

    const message = errorMessage(error);
    const code = error instanceof Error && 'code' in error && typeof error.code === 'string'
        ? error.code
        : undefined;

    if (code === 'ETIMEDOUT' || /timed? ?out/i.test(message)) {
        return new StorageTimeoutError(`Redis timeout: ${message}`);
    }

    if (
        (code !== undefined && CONNECTION_ERROR_CODES.has(code)) ||
        message.includes('Connection is closed') ||
        (error instanceof Error && error.name === 'MaxRetriesPerRequestError')
    ) {
        return new ConnectionResetError(`Redis connection lost: ${message}`);
    }

    return new StorageError(`Redis error: ${message}`);
}

/**
 * Parse a `host:port` address, defaulting the port to 6379.
 */
export function parseRedisAddr(redisAddr: string): { host: string; port: number } {
    const [host, portStr] = redisAddr.split(':');
    const port = parseInt(portStr ?? '', 10) || 6379;
    return { host: host || 'localhost', port };
}

/**
 * Redis cache backed by ioredis.
 */
export class RedisCache implements CacheClient {
    private client: Redis;

    constructor(redisAddr: string) {
        const { host, port } = parseRedisAddr(redisAddr);

        this.client = new Redis({
            host,
            port,
            keyPrefix: 'cart:',
            commandTimeout: 2000,
            retryStrategy: (times: number) => {
                const delay = Math.min(times * 50, 2000);
                logger.warn('Redis connection retry', { attempt: times, delayMs: delay });
                return delay;
            },
            maxRetriesPerRequest: 3,
        });

        this.client.on('error', (err: Error) => {
            logger.error('Redis connection error', { error: err.message });
        });

        this.client.on('connect', () => {
            logger.info('Redis connected', { host, port });
        });
    }

    async get(key: string): Promise<Buffer | null> {
        try {
            return await this.client.getBuffer(key);
        } catch (error) {
            throw classifyRedisError(error);
        }
    }

    async set(key: string, value: Buffer): Promise<void> {
        try {
            await this.client.set(key, value);
        } catch (error) {
            throw classifyRedisError(error);
        }
    }

    /**
     * Check if the storage backend is accessible.
     */
    async ping(): Promise<boolean> {
        try {
            const result = await this.client.ping();
            return result === 'PONG';
        } catch (error) {
            logger.error('Redis ping failed', { error: errorMessage(error) });
            return false;
        }
    }

    /**
     * Close the Redis connection.
     */
    async close(): Promise<void> {
        await this.client.quit();
        logger.info('Redis connection closed');
    }
}
