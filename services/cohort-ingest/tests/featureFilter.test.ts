import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { gzipSync } from 'node:zlib';
import { applyFeatureFilter, loadFilterSet, parseAnnotationLine } from '../src/features/featureFilter';
import { stripVersion } from '../src/features/identifiers';
import type { FeatureValue } from '../src/types';
import { startHttpStub } from './helpers/httpStub';
import { silentLogger } from './helpers/logger';

const GTF = [
  '##description: test annotation',
  'chr1\tHAVANA\tgene\t11869\t14409\t.\t+\t.\tgene_id "ENSG00000223972.5"; gene_type "transcribed_unprocessed_pseudogene"; gene_name "DDX11L1";',
  'chr1\tHAVANA\tgene\t65419\t71585\t.\t+\t.\tgene_id "ENSG00000186092.7"; gene_type "protein_coding"; gene_name "OR4F5";',
  'chr1\tHAVANA\ttranscript\t65419\t71585\t.\t+\t.\tgene_id "ENSG00000186092.7"; transcript_id "ENST00000641515.2"; gene_type "protein_coding";',
  'chr1\tHAVANA\tgene\t450703\t451697\t.\t-\t.\tgene_id "ENSG00000284733.2"; gene_type "protein_coding"; gene_name "OR4F29";',
  'malformed line without tabs'
].join('\n');

async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), 'feature-filter-'));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

function features(...ids: string[]): FeatureValue[] {
  return ids.map((featureId, index) => ({ featureId, featureName: null, value: index }));
}

test('strips the version suffix at the first dot', () => {
  assert.equal(stripVersion('ENSG00000139.8'), 'ENSG00000139');
  assert.equal(stripVersion('ENSG00000139'), 'ENSG00000139');
  assert.equal(stripVersion('ENSG00000139.8.1'), 'ENSG00000139');
  assert.equal(stripVersion(' ENSG00000139.8 '), 'ENSG00000139');
});

test('keeps only members of a non-empty filter set', () => {
  const filterSet = new Set(['G1', 'G2']);
  const filtered = applyFeatureFilter(features('G1', 'G2', 'G3'), filterSet);
  assert.deepEqual(
    filtered.map((feature) => feature.featureId),
    ['G1', 'G2']
  );
  assert.deepEqual(applyFeatureFilter(filtered, filterSet), filtered);
});

test('an empty filter set keeps every feature', () => {
  const input = features('G1', 'G3');
  assert.deepEqual(applyFeatureFilter(input, new Set()), input);
});

test('parses protein coding gene lines only', () => {
  const lines = GTF.split('\n').map(parseAnnotationLine);
  assert.deepEqual(lines, [null, null, 'ENSG00000186092', null, 'ENSG00000284733', null]);
});

test('downloads a gzip annotation, caches the sorted ids and reuses the cache', async () => {
  const stub = await startHttpStub((_request, url, response) => {
    if (url.pathname === '/gencode.gtf.gz') {
      response.writeHead(200, { 'content-type': 'application/gzip' });
      response.end(gzipSync(Buffer.from(GTF)));
      return;
    }
    response.writeHead(404).end();
  });
  try {
    await withTempDir(async (dir) => {
      const options = {
        enabled: true,
        cachePath: path.join(dir, 'cache', 'protein_coding_genes.txt'),
        annotationUrl: `${stub.baseUrl}/gencode.gtf.gz`,
        logger: silentLogger
      };
      const first = await loadFilterSet(options);
      assert.deepEqual(Array.from(first).sort(), ['ENSG00000186092', 'ENSG00000284733']);
      assert.equal(await readFile(options.cachePath, 'utf8'), 'ENSG00000186092\nENSG00000284733\n');

      const second = await loadFilterSet(options);
      assert.deepEqual(Array.from(second).sort(), ['ENSG00000186092', 'ENSG00000284733']);
      assert.equal(stub.requests.length, 1);
    });
  } finally {
    await stub.close();
  }
});

test('reads an existing cache without touching the annotation source', async () => {
  await withTempDir(async (dir) => {
    const cachePath = path.join(dir, 'genes.txt');
    await writeFile(cachePath, ' ENSG1 \n\nENSG2\n');
    const filterSet = await loadFilterSet({
      enabled: true,
      cachePath,
      annotationUrl: path.join(dir, 'missing.gtf'),
      logger: silentLogger
    });
    assert.deepEqual(Array.from(filterSet).sort(), ['ENSG1', 'ENSG2']);
  });
});

test('reads a plain annotation file from disk', async () => {
  await withTempDir(async (dir) => {
    const annotationPath = path.join(dir, 'annotation.gtf');
    await writeFile(annotationPath, GTF);
    const filterSet = await loadFilterSet({
      enabled: true,
      cachePath: path.join(dir, 'genes.txt'),
      annotationUrl: annotationPath,
      logger: silentLogger
    });
    assert.equal(filterSet.size, 2);
    assert.ok(filterSet.has('ENSG00000284733'));
  });
});

test('a missing annotation file degrades to an empty set and writes no cache', async () => {
  await withTempDir(async (dir) => {
    const cachePath = path.join(dir, 'genes.txt');
    const filterSet = await loadFilterSet({
      enabled: true,
      cachePath,
      annotationUrl: path.join(dir, 'missing.gtf'),
      logger: silentLogger
    });
    assert.equal(filterSet.size, 0);
    await assert.rejects(stat(cachePath), { code: 'ENOENT' });
  });
});

test('a corrupt gzip annotation degrades to an empty set', async () => {
  await withTempDir(async (dir) => {
    const annotationPath = path.join(dir, 'bad.gtf.gz');
    await writeFile(annotationPath, Buffer.concat([Buffer.from([0x1f, 0x8b, 0x08, 0x00]), Buffer.from('not deflate data')]));
    const cachePath = path.join(dir, 'genes.txt');
    const filterSet = await loadFilterSet({
      enabled: true,
      cachePath,
      annotationUrl: annotationPath,
      logger: silentLogger
    });
    assert.equal(filterSet.size, 0);
    await assert.rejects(stat(cachePath), { code: 'ENOENT' });
  });
});

test('a failed download degrades to an empty set and writes no cache', async () => {
  const stub = await startHttpStub((_request, _url, response) => {
    response.writeHead(503).end('unavailable');
  });
  try {
    await withTempDir(async (dir) => {
      const cachePath = path.join(dir, 'genes.txt');
      const filterSet = await loadFilterSet({
        enabled: true,
        cachePath,
        annotationUrl: `${stub.baseUrl}/gencode.gtf.gz`,
        logger: silentLogger
      });
      assert.equal(filterSet.size, 0);
      await assert.rejects(stat(cachePath), { code: 'ENOENT' });
    });
  } finally {
    await stub.close();
  }
});

test('disabled filtering returns an empty set without fetching', async () => {
  const stub = await startHttpStub((_request, _url, response) => {
    response.writeHead(500).end();
  });
  try {
    const filterSet = await loadFilterSet({
      enabled: false,
      cachePath: path.join(tmpdir(), 'never-written.txt'),
      annotationUrl: `${stub.baseUrl}/gencode.gtf.gz`,
      logger: silentLogger
    });
    assert.equal(filterSet.size, 0);
    assert.equal(stub.requests.length, 0);
  } finally {
    await stub.close();
  }
});
