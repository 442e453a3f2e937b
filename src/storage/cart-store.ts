/**
 * Storage layer for cart operations.
 * Every operation is a read/modify/write against a CacheClient, run
 * through the RetryExecutor so injected and real faults are retried.
 */

import { CacheClient } from './cache';
import { CartCodec } from './cart-codec';
import { logger, errorMessage } from '../utils/logger';
import { recordStorageOperation } from '../telemetry/metrics';
import { RetryExecutor, RetryPolicy } from '../resilience/retry-executor';
import { CartDeserializationError } from '../resilience/errors';

/**
 * Represents a single item in a shopping cart.
 */
export interface CartItem {
  /** Unique identifier for the product */
  productId: string;
  /** Quantity of the product in the cart */
  quantity: number;
}

/**
 * Represents a user's shopping cart.
 */
export interface Cart {
  /** Unique identifier for the user */
  userId: string;
  /** List of items in the cart, at most one per product */
  items: CartItem[];
}

/**
 * Storage interface for cart operations.
 */
export interface ICartStore {
  /**
   * Add an item to a user's cart or increment quantity if it already exists.
   * @param quantity - The quantity to add (must be a positive integer)
   * @throws StorageUnavailableError once retries are exhausted
   */
  addItem(userId: string, productId: string, quantity: number, signal?: AbortSignal): Promise<void>;

  /**
   * Retrieve a user's complete shopping cart.
   * @returns The user's cart, or an empty cart if none exists
   */
  getCart(userId: string, signal?: AbortSignal): Promise<Cart>;

  /**
   * Remove all items from a user's cart.
   */
  emptyCart(userId: string, signal?: AbortSignal): Promise<void>;

  /**
   * Check if the storage backend is accessible.
   */
  ping(): Promise<boolean>;
}

/** Largest quantity the int32 wire field holds */
export const MAX_ITEM_QUANTITY = 2147483647;

export function emptyCartFor(userId: string): Cart {
  return { userId, items: [] };
}

/**
 * Merge an item into a cart: quantities sum for a product already present,
 * otherwise the item is appended.
 * @throws RangeError if the summed quantity would exceed MAX_ITEM_QUANTITY
 */
export function mergeCartItem(cart: Cart, productId: string, quantity: number): Cart {
  const existing = cart.items.find(item => item.productId === productId);
  if (!existing) {
    return { userId: cart.userId, items: [...cart.items, { productId, quantity }] };
  }
  if (existing.quantity + quantity > MAX_ITEM_QUANTITY) {
    throw new RangeError(
      `quantity for product ${productId} would exceed ${MAX_ITEM_QUANTITY} (have ${existing.quantity}, adding ${quantity})`
    );
  }
  return {
    userId: cart.userId,
    items: cart.items.map(item =>
      item.productId === productId ? { productId, quantity: item.quantity + quantity } : item
    ),
  };
}

export type CartRetrySettings = Pick<RetryPolicy, 'maxRetries' | 'baseDelayMs'>;

/**
 * Cart store over a byte cache with retry and fault injection.
 */
export class CartStore implements ICartStore {
  private readonly policy: RetryPolicy;

  constructor(
    private readonly cache: CacheClient,
    private readonly codec: CartCodec,
    private readonly executor: RetryExecutor,
    retry: CartRetrySettings
  ) {
    this.policy = {
      maxRetries: retry.maxRetries,
      baseDelayMs: retry.baseDelayMs,
      // Malformed stored carts and quantity overflow are fatal
      isRetryable: error => !(error instanceof CartDeserializationError || error instanceof RangeError),
    };

    logger.info('CartStore initialized', {
      maxRetries: retry.maxRetries,
      baseDelayMs: retry.baseDelayMs,
    });
  }

  async addItem(userId: string, productId: string, quantity: number, signal?: AbortSignal): Promise<void> {
    if (!Number.isInteger(quantity) || quantity <= 0) {
      throw new RangeError(`quantity must be a positive integer, got ${quantity}`);
    }
    if (quantity > MAX_ITEM_QUANTITY) {
      throw new RangeError(`quantity must not exceed ${MAX_ITEM_QUANTITY}, got ${quantity}`);
    }

    logger.debug('AddItem called', { userId, productId, quantity });

    await this.run('AddItem', async () => {
      const cart = mergeCartItem(await this.readCart(userId), productId, quantity);
      await this.cache.set(userId, this.codec.encode(cart));
    }, signal);
  }

  async emptyCart(userId: string, signal?: AbortSignal): Promise<void> {
    logger.debug('EmptyCart called', { userId });

    await this.run('EmptyCart', async () => {
      await this.cache.set(userId, this.codec.encode(emptyCartFor(userId)));
    }, signal);
  }

  async getCart(userId: string, signal?: AbortSignal): Promise<Cart> {
    logger.debug('GetCart called', { userId });

    return this.run('GetCart', () => this.readCart(userId), signal);
  }

  async ping(): Promise<boolean> {
    return this.cache.ping();
  }

  private async readCart(userId: string): Promise<Cart> {
    const value = await this.cache.get(userId);
    if (value === null) {
      // A user that was never written has an empty cart
      return emptyCartFor(userId);
    }
    return this.codec.decode(userId, value);
  }

  private async run<T>(operationName: string, work: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const startTime = Date.now();
    try {
      const result = await this.executor.execute(work, operationName, this.policy, signal);
      recordStorageOperation(operationName, 'success', (Date.now() - startTime) / 1000);
      return result;
    } catch (error) {
      recordStorageOperation(operationName, 'error', (Date.now() - startTime) / 1000);
      logger.error('Cart storage operation failed', {
        operation: operationName,
        error: errorMessage(error),
      });
      throw error;
    }
  }
}
