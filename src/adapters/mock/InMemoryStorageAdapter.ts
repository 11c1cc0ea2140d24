import type { IStorageAdapter } from '@/ports/IStorageAdapter';

/**
 * In-memory implementation of IStorageAdapter for tests.
 *
 * Values are cloned on write and on read, like a serializing store would:
 * callers never share references with what is stored.
 */
export class InMemoryStorageAdapter implements IStorageAdapter {
  private storage: Map<string, unknown> = new Map();

  async read<T>(key: string): Promise<T | null> {
    if (!this.storage.has(key)) {
      return null;
    }
    return structuredClone(this.storage.get(key)) as T;
  }

  async write<T>(key: string, data: T): Promise<void> {
    this.storage.set(key, structuredClone(data));
  }

  async exists(key: string): Promise<boolean> {
    return this.storage.has(key);
  }

  async delete(key: string): Promise<void> {
    this.storage.delete(key);
  }

  async keys(): Promise<string[]> {
    return Array.from(this.storage.keys()).sort();
  }

  async clear(): Promise<void> {
    this.storage.clear();
  }

  /**
   * Overwrite a stored value without cloning (for corrupting state in tests)
   */
  _setRaw(key: string, value: unknown): void {
    this.storage.set(key, value);
  }
}
