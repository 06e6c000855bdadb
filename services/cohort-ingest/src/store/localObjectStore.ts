import { promises as fs } from 'node:fs';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { ObjectHead, ObjectMetadata, ObjectStore, PutObjectOptions } from './types';
import { ObjectNotFoundError } from './types';

const METADATA_SUFFIX = '.meta.json';

const sidecarSchema = z.object({
  contentType: z.string().nullable().optional(),
  metadata: z.record(z.string()).default({})
});

function toPosix(value: string): string {
  return value.split(path.sep).join('/');
}

function isMissing(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Object store backed by a local directory. Side-channel metadata for an
 * object lives in a `<key>.meta.json` sidecar next to it.
 */
export class LocalObjectStore implements ObjectStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private resolveKey(key: string): string {
    const cleaned = key.replace(/^\/+/, '');
    const resolved = path.resolve(this.root, cleaned);
    if (resolved !== this.root && !resolved.startsWith(`${this.root}${path.sep}`)) {
      throw new Error(`Key escapes store root: ${key}`);
    }
    return resolved;
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    const walk = async (directory: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(directory, { withFileTypes: true });
      } catch (error) {
        if (isMissing(error)) {
          return;
        }
        throw error;
      }
      for (const entry of entries) {
        const absolute = path.join(directory, entry.name);
        if (entry.isDirectory()) {
          await walk(absolute);
        } else if (entry.isFile() && !entry.name.endsWith(METADATA_SUFFIX)) {
          keys.push(toPosix(path.relative(this.root, absolute)));
        }
      }
    };
    await walk(this.root);
    return keys.filter((key) => key.startsWith(prefix)).sort();
  }

  async head(key: string): Promise<ObjectHead> {
    const filePath = this.resolveKey(key);
    let size: number;
    try {
      const stats = await fs.stat(filePath);
      size = stats.size;
    } catch (error) {
      if (isMissing(error)) {
        throw new ObjectNotFoundError(key);
      }
      throw error;
    }
    const sidecar = await this.readSidecar(filePath);
    return {
      key,
      sizeBytes: size,
      contentType: sidecar.contentType ?? null,
      metadata: sidecar.metadata
    };
  }

  async get(key: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.resolveKey(key));
    } catch (error) {
      if (isMissing(error)) {
        throw new ObjectNotFoundError(key);
      }
      throw error;
    }
  }

  async put(key: string, body: Buffer, options: PutObjectOptions = {}): Promise<void> {
    const filePath = this.resolveKey(key);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const staging = `${filePath}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.writeFile(staging, body);
      await fs.rename(staging, filePath);
    } catch (error) {
      await fs.rm(staging, { force: true });
      throw error;
    }
    if (options.contentType || options.metadata) {
      const sidecar = { contentType: options.contentType ?? null, metadata: options.metadata ?? {} };
      await fs.writeFile(`${filePath}${METADATA_SUFFIX}`, JSON.stringify(sidecar, null, 2));
    }
  }

  private async readSidecar(filePath: string): Promise<{ contentType?: string | null; metadata: ObjectMetadata }> {
    let raw: string;
    try {
      raw = await fs.readFile(`${filePath}${METADATA_SUFFIX}`, 'utf8');
    } catch (error) {
      if (isMissing(error)) {
        return { metadata: {} };
      }
      throw error;
    }
    return sidecarSchema.parse(JSON.parse(raw));
  }
}
