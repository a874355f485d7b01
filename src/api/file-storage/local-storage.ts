/**
 * Filesystem storage implementation.
 *
 * Objects are plain files under a media root that the server also exposes
 * through @fastify/static. Writing an existing key overwrites it.
 */

import { constants } from 'node:fs';
import { access, mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { FileStorage, LocalStorageConfig } from './types.ts';

/**
 * Key escapes the media root
 */
export class InvalidStorageKeyError extends Error {
  constructor(public key: string) {
    super(`Invalid storage key: ${key}`);
    this.name = 'InvalidStorageKeyError';
  }
}

export class LocalFileStorage implements FileStorage {
  private root: string;
  private config: LocalStorageConfig;

  constructor(config: LocalStorageConfig) {
    this.root = path.resolve(config.root);
    this.config = config;
  }

  /** Resolve a key to an absolute path inside the root. */
  private resolveKey(key: string): string {
    const full = path.resolve(this.root, key);
    if (!full.startsWith(this.root + path.sep)) {
      throw new InvalidStorageKeyError(key);
    }
    return full;
  }

  async upload(key: string, data: Buffer, _content_type: string): Promise<string> {
    const full = this.resolveKey(key);
    await mkdir(path.dirname(full), { recursive: true });
    await writeFile(full, data);
    return key;
  }

  async delete(key: string): Promise<void> {
    await rm(this.resolveKey(key), { force: true });
  }

  publicUrl(key: string): string {
    const prefix = this.config.url_prefix.endsWith('/') ? this.config.url_prefix : `${this.config.url_prefix}/`;
    const base = (this.config.base_url ?? '').replace(/\/$/, '');
    const encoded = key.split('/').map(encodeURIComponent).join('/');
    return `${base}${prefix}${encoded}`;
  }

  async isWritable(): Promise<boolean> {
    try {
      await mkdir(this.root, { recursive: true });
      await access(this.root, constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }
}
