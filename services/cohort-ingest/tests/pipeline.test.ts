import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { loadIngestConfig } from '../src/config/serviceConfig';
import { createIngestRuntime, discoverCohorts, outputDestination, runPipeline } from '../src/pipeline';
import { LocalObjectStore } from '../src/store/localObjectStore';
import { STAR_COUNTS_TSV } from './helpers/fixtures';
import { sendJson, startHttpStub } from './helpers/httpStub';
import { silentLogger } from './helpers/logger';

async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), 'cohort-pipeline-'));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

function dataLines(text: string): string[] {
  const [header, ...rows] = text.split('\n').filter((line) => line.length > 0);
  return [header, ...rows.sort()];
}

test('ingests a row-oriented cohort from a local store and records failed cohorts', async () => {
  await withTempDir(async (dir) => {
    const store = new LocalObjectStore(dir);
    await store.put('raw/C1/samples/S1.tsv', Buffer.from(STAR_COUNTS_TSV), { metadata: { 'patient-id': 'P1' } });
    await store.put('raw/C1/samples/S2.tsv', Buffer.from(STAR_COUNTS_TSV));

    const config = loadIngestConfig({ env: { COHORT_INGEST_STORE: 'local', COHORT_INGEST_LOCAL_ROOT: dir } });
    const runtime = createIngestRuntime(config, { logger: silentLogger, clinicalService: null });
    const summaries = await runPipeline(runtime, ['C1', 'EMPTY']);

    const expectedOutput = path.join(dir, 'processed', 'C1', 'merged_dataset.csv');
    assert.equal(outputDestination(config, 'C1', 'merged_dataset.csv'), expectedOutput);
    assert.deepEqual(summaries[0].outputs, [expectedOutput]);
    assert.equal(summaries[0].status, 'succeeded');
    assert.deepEqual(summaries[0].shape, { rows: 2, columns: 8, samples: 2, features: 3 });
    assert.equal(summaries[0].report?.failed, 0);

    assert.deepEqual(dataLines(await readFile(expectedOutput, 'utf8')), [
      'sample_id,cohort_id,age,patient_id,sex,ENSG00000000003,ENSG00000000005,ENSG00000000419',
      'S1,C1,,P1,unknown,1205,3,980',
      'S2,C1,,,unknown,1205,3,980'
    ]);

    assert.equal(summaries[1].cohortId, 'EMPTY');
    assert.equal(summaries[1].status, 'failed');
    assert.equal(summaries[1].error, 'No artifacts found for cohort EMPTY');
    assert.equal(summaries[1].report?.attempted, 0);
    assert.deepEqual(summaries[1].outputs, []);
  });
});

test('matrix orientation writes the matrix and a sample sheet', async () => {
  await withTempDir(async (dir) => {
    const store = new LocalObjectStore(dir);
    await store.put('raw/C2/matrix.csv', Buffer.from('gene_id,S1,S2\nG1,1,2\nG2,3,\n'));
    await store.put('raw/C2/samples/S1.csv', Buffer.alloc(0));
    await store.put('raw/C2/samples/S2.csv', Buffer.alloc(0));

    const config = loadIngestConfig({
      env: { COHORT_INGEST_STORE: 'local', COHORT_INGEST_LOCAL_ROOT: dir, COHORT_INGEST_ORIENTATION: 'matrix' }
    });
    const runtime = createIngestRuntime(config, { logger: silentLogger, clinicalService: null });
    const [summary] = await runPipeline(runtime, ['C2']);

    assert.equal(summary.status, 'succeeded');
    assert.deepEqual(summary.outputs, [
      path.join(dir, 'processed', 'C2', 'merged_dataset.csv'),
      path.join(dir, 'processed', 'C2', 'samples.csv')
    ]);

    const matrix = (await readFile(summary.outputs[0], 'utf8')).split('\n');
    assert.ok(['feature_id,S1,S2', 'feature_id,S2,S1'].includes(matrix[0]));
    const s1First = matrix[0] === 'feature_id,S1,S2';
    assert.deepEqual(matrix.slice(1), s1First ? ['G1,1,2', 'G2,3,', ''] : ['G1,2,1', 'G2,,3', '']);

    assert.deepEqual(dataLines(await readFile(summary.outputs[1], 'utf8')), [
      'sample_id,cohort_id,age,sample_column,sex',
      'S1,C2,,S1,unknown',
      'S2,C2,,S2,unknown'
    ]);
  });
});

test('discovers cohorts from a GEO series search and ingests the staged ones', async () => {
  const stub = await startHttpStub((_request, url, response) => {
    if (url.pathname === '/eutils/esearch.fcgi') {
      sendJson(response, 200, { esearchresult: { idlist: ['200001', '200002'] } });
      return;
    }
    sendJson(response, 200, {
      result: {
        '200001': { acc: 'GSE1001', title: 'Staged series' },
        '200002': { acc: 'GSE1002', title: 'Unstaged series' }
      }
    });
  });
  try {
    await withTempDir(async (dir) => {
      const store = new LocalObjectStore(dir);
      await store.put('raw/GSE1001/samples/S1.tsv', Buffer.from(STAR_COUNTS_TSV));

      const config = loadIngestConfig({
        env: {
          COHORT_INGEST_STORE: 'local',
          COHORT_INGEST_LOCAL_ROOT: dir,
          COHORT_INGEST_GEO_PLATFORM: 'GPL16791',
          COHORT_INGEST_GEO_MAX_SERIES: '2',
          COHORT_INGEST_EUTILS_BASE_URL: `${stub.baseUrl}/eutils/`
        }
      });
      const runtime = createIngestRuntime(config, { logger: silentLogger, clinicalService: null });
      const cohorts = await discoverCohorts(runtime);
      assert.deepEqual(cohorts, ['GSE1001', 'GSE1002']);
      assert.equal(stub.requests[0].searchParams.get('term'), '"GPL16791"[Platform]');
      assert.equal(stub.requests[0].searchParams.get('retmax'), '2');

      const summaries = await runPipeline(runtime, cohorts);
      assert.deepEqual(
        summaries.map((summary) => [summary.cohortId, summary.status]),
        [
          ['GSE1001', 'succeeded'],
          ['GSE1002', 'failed']
        ]
      );
      assert.deepEqual(summaries[0].shape, { rows: 1, columns: 7, samples: 1, features: 3 });
    });
  } finally {
    await stub.close();
  }
});

test('discovery without a GEO search configured finds nothing', async () => {
  await withTempDir(async (dir) => {
    const config = loadIngestConfig({ env: { COHORT_INGEST_STORE: 'local', COHORT_INGEST_LOCAL_ROOT: dir } });
    const runtime = createIngestRuntime(config, { logger: silentLogger, clinicalService: null });
    assert.deepEqual(await discoverCohorts(runtime), []);
  });
});
