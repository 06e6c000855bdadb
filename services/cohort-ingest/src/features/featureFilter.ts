import { createReadStream } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import readline from 'node:readline';
import type { Readable } from 'node:stream';
import { createGunzip } from 'node:zlib';
import { request } from 'undici';
import type { Logger } from '@cohortforge/shared';
import { MetadataServiceError, describeError } from '../errors';
import type { FeatureFilterSet, FeatureValue } from '../types';
import { stripVersion } from './identifiers';

export type FeatureFilterOptions = {
  enabled: boolean;
  cachePath: string;
  annotationUrl: string;
  fetchTimeoutMs?: number | null;
  logger: Logger;
};

const GENE_ID_ATTRIBUTE = /gene_id\s+"([^"]+)"/;
const PROTEIN_CODING = 'gene_type "protein_coding"';
const EMPTY_FILTER: FeatureFilterSet = new Set<string>();

function isMissing(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

async function readCache(cachePath: string): Promise<Set<string> | null> {
  let contents: string;
  try {
    contents = await fs.readFile(cachePath, 'utf8');
  } catch (error) {
    if (isMissing(error)) {
      return null;
    }
    throw error;
  }
  const ids = contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return new Set(ids);
}

async function writeCache(cachePath: string, ids: ReadonlySet<string>): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(cachePath)), { recursive: true });
  const sorted = Array.from(ids).sort();
  await fs.writeFile(cachePath, sorted.length > 0 ? `${sorted.join('\n')}\n` : '');
}

export function parseAnnotationLine(line: string): string | null {
  if (line.length === 0 || line.startsWith('#')) {
    return null;
  }
  const fields = line.split('\t');
  if (fields.length < 9 || fields[2] !== 'gene') {
    return null;
  }
  const attributes = fields[8];
  if (!attributes.includes(PROTEIN_CODING)) {
    return null;
  }
  const match = GENE_ID_ATTRIBUTE.exec(attributes);
  return match ? stripVersion(match[1]) : null;
}

export function collectProteinCodingIds(source: Readable): Promise<Set<string>> {
  return new Promise((resolve, reject) => {
    const ids = new Set<string>();
    const lines = readline.createInterface({ input: source, crlfDelay: Infinity });
    // readline re-emits input errors on the interface
    lines.on('error', (error) => {
      reject(error);
      lines.close();
      source.destroy();
    });
    lines.on('line', (line) => {
      const id = parseAnnotationLine(line);
      if (id) {
        ids.add(id);
      }
    });
    lines.once('close', () => resolve(ids));
  });
}

function isGzipLocation(location: string): boolean {
  try {
    return new URL(location).pathname.endsWith('.gz');
  } catch {
    return location.endsWith('.gz');
  }
}

async function openAnnotation(location: string, fetchTimeoutMs: number | null): Promise<Readable> {
  let source: Readable;
  if (/^https?:\/\//i.test(location)) {
    const response = await request(location, {
      method: 'GET',
      headersTimeout: fetchTimeoutMs ?? undefined,
      bodyTimeout: fetchTimeoutMs ?? undefined
    });
    if (response.statusCode < 200 || response.statusCode >= 300) {
      await response.body.dump();
      throw new MetadataServiceError(
        `Annotation download failed with status ${response.statusCode}`,
        response.statusCode,
        location
      );
    }
    source = response.body;
  } else {
    source = createReadStream(location.replace(/^file:\/\//, ''));
  }
  if (!isGzipLocation(location)) {
    return source;
  }
  const gunzip = createGunzip();
  source.on('error', (error) => gunzip.destroy(error));
  gunzip.on('close', () => source.destroy());
  return source.pipe(gunzip);
}

/**
 * Loads the set of protein-coding gene ids, from the cache file when present
 * and otherwise from the reference annotation. Failures degrade to an empty
 * set, which disables filtering.
 */
export async function loadFilterSet(options: FeatureFilterOptions): Promise<FeatureFilterSet> {
  const { logger } = options;
  if (!options.enabled) {
    return EMPTY_FILTER;
  }

  try {
    const cached = await readCache(options.cachePath);
    if (cached) {
      logger.info({ cachePath: options.cachePath, features: cached.size }, 'Loaded feature filter from cache');
      return cached;
    }
  } catch (error) {
    logger.warn({ cachePath: options.cachePath, err: describeError(error) }, 'Feature filter cache unreadable');
  }

  let ids: Set<string>;
  try {
    const source = await openAnnotation(options.annotationUrl, options.fetchTimeoutMs ?? null);
    ids = await collectProteinCodingIds(source);
  } catch (error) {
    logger.warn(
      { annotationUrl: options.annotationUrl, err: describeError(error) },
      'Feature filter unavailable; continuing unfiltered'
    );
    return EMPTY_FILTER;
  }

  try {
    await writeCache(options.cachePath, ids);
  } catch (error) {
    logger.warn({ cachePath: options.cachePath, err: describeError(error) }, 'Failed to persist feature filter cache');
  }
  logger.info({ features: ids.size }, 'Loaded feature filter from annotation');
  return ids;
}

export function applyFeatureFilter(features: readonly FeatureValue[], filterSet: FeatureFilterSet): FeatureValue[] {
  if (filterSet.size === 0) {
    return [...features];
  }
  return features.filter((feature) => filterSet.has(feature.featureId));
}
