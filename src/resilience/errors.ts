/**
 * Error taxonomy for storage and single-shot RPC failures.
 * Synthetic faults reuse the transient classes below, so an injected
 * timeout and a real one look the same to everything downstream.
 */

export type StorageFaultCategory = 'timeout' | 'connectionReset' | 'poolExhausted' | 'unknown';

/**
 * A failed call against the backing cache.
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly category: StorageFaultCategory = 'unknown'
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

export class StorageTimeoutError extends StorageError {
  constructor(message: string) {
    super(message, 'timeout');
    this.name = 'StorageTimeoutError';
  }
}

export class ConnectionResetError extends StorageError {
  constructor(message: string) {
    super(message, 'connectionReset');
    this.name = 'ConnectionResetError';
  }
}

export class PoolExhaustedError extends StorageError {
  constructor(message: string) {
    super(message, 'poolExhausted');
    this.name = 'PoolExhaustedError';
  }
}

/**
 * Raised once a storage operation has used up its retry budget.
 */
export class StorageUnavailableError extends Error {
  constructor(
    public readonly operationName: string,
    public readonly attempts: number,
    public readonly lastError: string
  ) {
    super(`Storage operation ${operationName} failed after ${attempts} attempts. Last error: ${lastError}`);
    this.name = 'StorageUnavailableError';
  }
}

/**
 * Raised by a delayed single-shot call that ends in a timeout.
 */
export class GatewayTimeoutError extends Error {
  constructor(
    public readonly operationName: string,
    public readonly delayMs: number
  ) {
    super(`Gateway timeout during ${operationName} after ${delayMs}ms`);
    this.name = 'GatewayTimeoutError';
  }
}

/**
 * Stored cart bytes that cannot be decoded. Retrying cannot fix these.
 */
export class CartDeserializationError extends Error {
  constructor(
    public readonly userId: string,
    cause: string
  ) {
    super(`Stored cart for user ${userId} is malformed: ${cause}`);
    this.name = 'CartDeserializationError';
  }
}

export class OperationCancelledError extends Error {
  constructor(public readonly operationName: string) {
    super(`Operation ${operationName} was cancelled`);
    this.name = 'OperationCancelledError';
  }
}

/**
 * Whether the caller one layer up may reasonably try the whole call again.
 */
export function isRetryableByCaller(error: unknown): boolean {
  return error instanceof StorageUnavailableError || error instanceof GatewayTimeoutError;
}
