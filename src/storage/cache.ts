/**
 * Byte-oriented key-value capability the cart store persists through.
 * Implementations can use Redis, in-memory storage, or other backends.
 */
export interface CacheClient {
  /**
   * Read the bytes stored under a key.
   * @returns The stored bytes, or null if the key has never been written
   */
  get(key: string): Promise<Buffer | null>;

  /**
   * Store bytes under a key, replacing any previous value.
   */
  set(key: string, value: Buffer): Promise<void>;

  /**
   * Check if the backend is accessible.
   */
  ping(): Promise<boolean>;

  /**
   * Release connections held by the backend.
   */
  close(): Promise<void>;
}
