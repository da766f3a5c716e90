/**
 * Storage Module
 *
 * Responsibilities:
 * - Define StorageAdapter interface
 * - Implement FileSystemStorageAdapter rooted at a data directory
 * - Implement MemoryStorageAdapter for testing
 * - Track size, checksum and content type of every stored object
 *
 * Keys are "/"-separated paths relative to the root:
 * - scraping/boss_urls.txt
 * - bosses/<name>.png
 * - bosses.csv
 *
 * Usage:
 * const storage = new FileSystemStorageAdapter(process.cwd());
 * await storage.save('bosses/Deerclops.png', bytes);
 */

import { createHash } from 'crypto';
import { mkdir, readFile, readdir, rm, stat, writeFile } from 'fs/promises';
import path from 'path';
import type { StorageAdapter, StoredObjectMetadata } from '../types/index.js';

export type { StorageAdapter, StoredObjectMetadata };

const CONTENT_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.txt': 'text/plain',
  '.csv': 'text/csv',
  '.json': 'application/json',
};

/**
 * Calculate MD5 checksum for content
 */
function calculateChecksum(content: string | Buffer): string {
  const buffer = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
  return createHash('md5').update(buffer).digest('hex');
}

/**
 * Get content size in bytes
 */
function getContentSize(content: string | Buffer): number {
  return typeof content === 'string' ? Buffer.byteLength(content, 'utf-8') : content.length;
}

/**
 * Content type guessed from the key's extension
 */
function contentTypeFor(key: string): string {
  return CONTENT_TYPES[path.extname(key).toLowerCase()] ?? 'application/octet-stream';
}

function toBuffer(content: string | Buffer): Buffer {
  return typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
}

/**
 * ENOENT check by shape; fs errors may come from another realm than `Error`
 */
function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function buildMetadata(
  key: string,
  content: string | Buffer,
  contentType: string | undefined,
  createdAt: string
): StoredObjectMetadata {
  return {
    key,
    contentType: contentType ?? contentTypeFor(key),
    createdAt,
    size: getContentSize(content),
    checksum: calculateChecksum(content),
  };
}

/**
 * Local filesystem implementation of StorageAdapter
 *
 * Every key resolves under `rootDir`; keys that would escape it are rejected.
 */
export class FileSystemStorageAdapter implements StorageAdapter {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  /**
   * Absolute path for a key
   *
   * @throws Error if the key points outside the root directory
   */
  resolvePath(key: string): string {
    const target = path.resolve(this.rootDir, key);
    if (target !== this.rootDir && !target.startsWith(`${this.rootDir}${path.sep}`)) {
      throw new Error(`Storage key escapes root directory: ${key}`);
    }
    return target;
  }

  async save(
    key: string,
    content: string | Buffer,
    metadata?: { contentType?: string }
  ): Promise<StoredObjectMetadata> {
    const target = this.resolvePath(key);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, toBuffer(content));
    return buildMetadata(key, content, metadata?.contentType, new Date().toISOString());
  }

  /**
   * @throws Error if the object does not exist
   */
  async load(key: string): Promise<{ content: Buffer; metadata: StoredObjectMetadata }> {
    const target = this.resolvePath(key);

    try {
      const [content, info] = await Promise.all([readFile(target), stat(target)]);
      return {
        content,
        metadata: buildMetadata(key, content, undefined, info.mtime.toISOString()),
      };
    } catch (error) {
      if (isNotFound(error)) {
        throw new Error(`Object not found: ${key}`);
      }
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      const info = await stat(this.resolvePath(key));
      return info.isFile();
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * List stored files whose key starts with `prefix`
   */
  async list(prefix: string = ''): Promise<StoredObjectMetadata[]> {
    const keys = await this.walk('');
    const objects: StoredObjectMetadata[] = [];

    for (const key of keys.filter((k) => k.startsWith(prefix)).sort()) {
      const { metadata } = await this.load(key);
      objects.push(metadata);
    }

    return objects;
  }

  async delete(key: string): Promise<void> {
    await rm(this.resolvePath(key), { force: true });
  }

  private async walk(relativeDir: string): Promise<string[]> {
    const entries = await readdir(path.join(this.rootDir, relativeDir), { withFileTypes: true }).catch(
      (error: unknown) => {
        if (isNotFound(error)) {
          return [];
        }
        throw error;
      }
    );

    const keys: string[] = [];
    for (const entry of entries) {
      const key = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        keys.push(...(await this.walk(key)));
      } else if (entry.isFile()) {
        keys.push(key);
      }
    }
    return keys;
  }
}

/**
 * In-memory storage adapter for testing and development
 *
 * Provides the same interface as FileSystemStorageAdapter but keeps
 * objects in memory.
 */
export class MemoryStorageAdapter implements StorageAdapter {
  private store: Map<string, { content: Buffer; metadata: StoredObjectMetadata }> = new Map();

  async save(
    key: string,
    content: string | Buffer,
    metadata?: { contentType?: string }
  ): Promise<StoredObjectMetadata> {
    const objectMetadata = buildMetadata(key, content, metadata?.contentType, new Date().toISOString());
    this.store.set(key, { content: toBuffer(content), metadata: objectMetadata });
    return objectMetadata;
  }

  /**
   * @throws Error if the object does not exist
   */
  async load(key: string): Promise<{ content: Buffer; metadata: StoredObjectMetadata }> {
    const item = this.store.get(key);

    if (!item) {
      throw new Error(`Object not found: ${key}`);
    }

    return item;
  }

  async exists(key: string): Promise<boolean> {
    return this.store.has(key);
  }

  async list(prefix: string = ''): Promise<StoredObjectMetadata[]> {
    return Array.from(this.store.entries())
      .filter(([key]) => key.startsWith(prefix))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, value]) => value.metadata);
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  /**
   * Clear all stored objects (useful for test cleanup)
   */
  clear(): void {
    this.store.clear();
  }

  /**
   * Get the number of stored objects (useful for testing)
   */
  size(): number {
    return this.store.size;
  }

  /**
   * Get all stored keys (useful for debugging)
   */
  keys(): string[] {
    return Array.from(this.store.keys());
  }
}

/**
 * Factory function to create the storage adapter for a run
 */
export function createStorageAdapter(
  config: { type: 'filesystem'; rootDir: string } | { type: 'memory' }
): StorageAdapter {
  if (config.type === 'memory') {
    return new MemoryStorageAdapter();
  }
  return new FileSystemStorageAdapter(config.rootDir);
}
