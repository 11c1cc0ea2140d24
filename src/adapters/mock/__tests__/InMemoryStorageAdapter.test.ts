import { InMemoryStorageAdapter } from '@/adapters/mock/InMemoryStorageAdapter';
import { beforeEach, describe, expect, it } from 'vitest';

describe('InMemoryStorageAdapter', () => {
  let adapter: InMemoryStorageAdapter;

  beforeEach(() => {
    adapter = new InMemoryStorageAdapter();
  });

  describe('read/write', () => {
    it('should write and read string data', async () => {
      await adapter.write('key', 'value');
      const result = await adapter.read<string>('key');
      expect(result).toBe('value');
    });

    it('should write and read object data', async () => {
      const data = { name: 'test', count: 42 };
      await adapter.write('obj', data);
      const result = await adapter.read<typeof data>('obj');
      expect(result).toEqual(data);
    });

    it('should write and read array data', async () => {
      const data = [1, 2, 3, 4, 5];
      await adapter.write('arr', data);
      const result = await adapter.read<number[]>('arr');
      expect(result).toEqual(data);
    });

    it('should return null for non-existent key', async () => {
      const result = await adapter.read('non-existent');
      expect(result).toBeNull();
    });

    it('should overwrite existing data', async () => {
      await adapter.write('key', 'first');
      await adapter.write('key', 'second');
      const result = await adapter.read<string>('key');
      expect(result).toBe('second');
    });
  });

  describe('exists', () => {
    it('should return true for existing key', async () => {
      await adapter.write('key', 'value');
      const exists = await adapter.exists('key');
      expect(exists).toBe(true);
    });

    it('should return false for non-existent key', async () => {
      const exists = await adapter.exists('non-existent');
      expect(exists).toBe(false);
    });
  });

  describe('delete', () => {
    it('should delete existing key', async () => {
      await adapter.write('key', 'value');
      await adapter.delete('key');
      const exists = await adapter.exists('key');
      expect(exists).toBe(false);
    });

    it('should not throw when deleting non-existent key', async () => {
      await expect(adapter.delete('non-existent')).resolves.not.toThrow();
    });
  });

  describe('keys', () => {
    it('should return all keys in sorted order', async () => {
      await adapter.write('docs/b/index', 2);
      await adapter.write('docs/a/chunks', 1);
      await adapter.write('docs/a/vocabulary', 3);
      const keys = await adapter.keys();
      expect(keys).toEqual(['docs/a/chunks', 'docs/a/vocabulary', 'docs/b/index']);
    });

    it('should return empty array when storage is empty', async () => {
      const keys = await adapter.keys();
      expect(keys).toHaveLength(0);
    });
  });

  describe('clear', () => {
    it('should remove all data', async () => {
      await adapter.write('a', 1);
      await adapter.write('b', 2);
      await adapter.clear();
      const keys = await adapter.keys();
      expect(keys).toHaveLength(0);
    });
  });

  describe('isolation', () => {
    it('should not share references with written values', async () => {
      const data = { chunks: ['one'] };
      await adapter.write('obj', data);
      data.chunks.push('two');

      const stored = await adapter.read<{ chunks: string[] }>('obj');
      expect(stored).toEqual({ chunks: ['one'] });
    });

    it('should not share references with read values', async () => {
      await adapter.write('obj', { chunks: ['one'] });
      const first = await adapter.read<{ chunks: string[] }>('obj');
      first?.chunks.push('two');

      const second = await adapter.read<{ chunks: string[] }>('obj');
      expect(second).toEqual({ chunks: ['one'] });
    });
  });

  describe('_setRaw', () => {
    it('should store a value as given', async () => {
      adapter._setRaw('docs/a/index', { version: 'broken' });
      const value = await adapter.read<unknown>('docs/a/index');
      expect(value).toEqual({ version: 'broken' });
    });
  });
});
