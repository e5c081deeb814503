import { promises as fs } from 'node:fs';
import path from 'node:path';

/**
 * Key/value store for durable cache records, shaped after AsyncStorage so the
 * cache does not care where the records live.
 */
export interface CacheStore {
  getItem(key: string): Promise<string | null>;
  setItem(key: string, value: string): Promise<void>;
  removeItem(key: string): Promise<void>;
  getAllKeys(): Promise<string[]>;
}

const RECORD_EXTENSION = '.json';

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * One JSON file per key inside a directory.
 */
export class FileCacheStore implements CacheStore {
  private ready: Promise<void> | null = null;

  constructor(private readonly directory: string) {}

  private ensureDirectory(): Promise<void> {
    if (!this.ready) {
      this.ready = fs.mkdir(this.directory, { recursive: true }).then(() => undefined);
    }
    return this.ready;
  }

  private pathFor(key: string): string {
    return path.join(this.directory, `${encodeURIComponent(key)}${RECORD_EXTENSION}`);
  }

  async getItem(key: string): Promise<string | null> {
    try {
      return await fs.readFile(this.pathFor(key), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  async setItem(key: string, value: string): Promise<void> {
    await this.ensureDirectory();
    await fs.writeFile(this.pathFor(key), value, 'utf8');
  }

  async removeItem(key: string): Promise<void> {
    await fs.rm(this.pathFor(key), { force: true });
  }

  async getAllKeys(): Promise<string[]> {
    try {
      const files = await fs.readdir(this.directory);
      return files
        .filter((file) => file.endsWith(RECORD_EXTENSION))
        .map((file) => decodeURIComponent(file.slice(0, -RECORD_EXTENSION.length)));
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
  }
}

export class MemoryCacheStore implements CacheStore {
  private readonly items = new Map<string, string>();

  async getItem(key: string): Promise<string | null> {
    return this.items.get(key) ?? null;
  }

  async setItem(key: string, value: string): Promise<void> {
    this.items.set(key, value);
  }

  async removeItem(key: string): Promise<void> {
    this.items.delete(key);
  }

  async getAllKeys(): Promise<string[]> {
    return [...this.items.keys()];
  }
}
