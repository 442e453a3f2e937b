/**
 * In-memory implementation of the cart cache.
 * Suitable for development and testing. Data is lost on service restart.
 */

import { CacheClient } from './cache';
import { logger } from '../utils/logger';

/**
 * In-memory cache using a Map for storage.
 */
export class MemoryCache implements CacheClient {
    private entries: Map<string, Buffer>;

    constructor() {
        this.entries = new Map();
        logger.info('MemoryCache initialized');
    }

    async get(key: string): Promise<Buffer | null> {
        const value = this.entries.get(key);
        // Copies in and out
        return value ? Buffer.from(value) : null;
    }

    async set(key: string, value: Buffer): Promise<void> {
        this.entries.set(key, Buffer.from(value));
        logger.debug('Stored value in memory', { key, bytes: value.length });
    }

    /**
     * Always returns true for in-memory storage.
     */
    async ping(): Promise<boolean> {
        return true;
    }

    async close(): Promise<void> {
        this.entries.clear();
    }
}
