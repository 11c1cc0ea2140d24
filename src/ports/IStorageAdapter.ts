/**
 * Port interface for persistent storage operations.
 * Keys are slash-separated paths (e.g. "indexes/report.pdf/vocabulary").
 */
export interface IStorageAdapter {
  /**
   * Read data from storage
   * @returns Stored data, or null if not found
   */
  read<T>(key: string): Promise<T | null>;

  /**
   * Write data to storage
   */
  write<T>(key: string, data: T): Promise<void>;

  /**
   * Check if a key exists in storage
   */
  exists(key: string): Promise<boolean>;

  /**
   * Delete data from storage
   */
  delete(key: string): Promise<void>;

  /**
   * Get all keys in storage
   */
  keys(): Promise<string[]>;

  /**
   * Clear all data from storage
   */
  clear(): Promise<void>;
}
