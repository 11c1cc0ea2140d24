/**
 * File-based storage adapter
 *
 * Stores data as JSON files under a base directory.
 * Keys map to file paths (e.g., "indexes/report/vocabulary" -> "indexes/report/vocabulary.json").
 */

import { mkdir, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, join, relative, sep } from 'node:path';
import type { IStorageAdapter } from '@/ports/IStorageAdapter';

const EXTENSION = '.json';

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * File-based implementation of IStorageAdapter
 */
export class FileStorageAdapter implements IStorageAdapter {
  constructor(private readonly baseDir: string) {}

  async read<T>(key: string): Promise<T | null> {
    let content: string;
    try {
      content = await readFile(this.getFilePath(key), 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
    try {
      const parsed: T = JSON.parse(content);
      return parsed;
    } catch (error) {
      console.warn(`Unreadable JSON in storage key "${key}":`, error);
      return null;
    }
  }

  async write<T>(key: string, data: T): Promise<void> {
    const filePath = this.getFilePath(key);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, JSON.stringify(data));
  }

  async exists(key: string): Promise<boolean> {
    try {
      return (await stat(this.getFilePath(key))).isFile();
    } catch (error) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    await rm(this.getFilePath(key), { force: true });
  }

  async keys(): Promise<string[]> {
    const keys = await this.collectKeys(this.baseDir);
    return keys.sort();
  }

  async clear(): Promise<void> {
    await rm(this.baseDir, { recursive: true, force: true });
    await mkdir(this.baseDir, { recursive: true });
  }

  private getFilePath(key: string): string {
    return join(this.baseDir, `${key}${EXTENSION}`);
  }

  private async collectKeys(dir: string): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    });
    if (!entries) {
      return [];
    }

    const keys: string[] = [];
    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        keys.push(...(await this.collectKeys(fullPath)));
      } else if (entry.isFile() && entry.name.endsWith(EXTENSION)) {
        keys.push(relative(this.baseDir, fullPath).split(sep).join('/').slice(0, -EXTENSION.length));
      }
    }
    return keys;
  }
}
