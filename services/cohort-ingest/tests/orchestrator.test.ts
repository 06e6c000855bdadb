import test from 'node:test';
import assert from 'node:assert/strict';
import { CatalogReader } from '../src/catalog/catalogReader';
import type { ClinicalService } from '../src/catalog/clinicalSource';
import { IngestError } from '../src/errors';
import { gdcCaseSchema } from '../src/metadata/gdcClient';
import { DatasetOrchestrator } from '../src/orchestrator/buildDataset';
import type { OrchestratorOptions } from '../src/orchestrator/buildDataset';
import type { CellValue } from '../src/types';
import { STAR_COUNTS_TSV } from './helpers/fixtures';
import { silentLogger } from './helpers/logger';
import { MemoryObjectStore } from './helpers/memoryStore';

const UNDECODABLE = Buffer.from([0xff, 0xfe, 0x00, 0x01]);

function setup(
  store: MemoryObjectStore,
  overrides: Partial<OrchestratorOptions> = {},
  clinicalService: ClinicalService | null = null
) {
  const catalog = new CatalogReader({
    store,
    rawPrefix: 'raw',
    artifactSuffixes: ['.tsv', '.csv', '.tsv.gz'],
    clinicalService,
    logger: silentLogger
  });
  const orchestrator = new DatasetOrchestrator({
    catalog,
    loadFilterSet: async () => new Set<string>(),
    orientation: 'row',
    mode: 'concurrent',
    concurrency: 4,
    sequentialDelayMs: 0,
    reconciliation: 'lenient',
    clinicalTieBreak: 'first-record',
    logger: silentLogger,
    ...overrides
  });
  return { catalog, orchestrator };
}

function bySampleId(rows: CellValue[][]): CellValue[][] {
  return [...rows].sort((a, b) => String(a[0]).localeCompare(String(b[0])));
}

test('assembles the decodable artifacts and reports the rest', async () => {
  const store = new MemoryObjectStore();
  store.seed('raw/C1/samples/S1.tsv', STAR_COUNTS_TSV);
  store.seed('raw/C1/samples/S2.tsv', UNDECODABLE);
  store.seed('raw/C1/samples/S3.tsv', STAR_COUNTS_TSV);
  store.seed('raw/C1/samples/notes.txt', 'ignored');
  const { orchestrator } = setup(store);

  const { dataset, report, units } = await orchestrator.buildDataset('C1');

  assert.equal(units.length, 2);
  assert.deepEqual(
    dataset.columns.map((column) => column.name),
    ['sample_id', 'cohort_id', 'age', 'sex', 'ENSG00000000003', 'ENSG00000000005', 'ENSG00000000419']
  );
  assert.deepEqual(bySampleId(dataset.rows), [
    ['S1', 'C1', null, 'unknown', 1205, 3, 980],
    ['S3', 'C1', null, 'unknown', 1205, 3, 980]
  ]);
  assert.equal(report.cohortId, 'C1');
  assert.equal(report.mode, 'concurrent');
  assert.equal(report.attempted, 3);
  assert.equal(report.succeeded, 2);
  assert.equal(report.failed, 1);
  assert.equal(report.failures.length, 1);
  assert.equal(report.failures[0].artifactKey, 'raw/C1/samples/S2.tsv');
  assert.equal(report.failures[0].sampleId, 'S2');
  assert.equal(report.failures[0].kind, 'DecodeFailed');
});

test('records fetch errors without cancelling siblings', async () => {
  const store = new MemoryObjectStore();
  store.seed('raw/C1/samples/S1.tsv', STAR_COUNTS_TSV);
  store.seed('raw/C1/samples/S2.tsv', STAR_COUNTS_TSV);
  store.failingKeys.add('raw/C1/samples/S2.tsv');
  const { orchestrator } = setup(store);

  const { report } = await orchestrator.buildDataset('C1');
  assert.equal(report.succeeded, 1);
  assert.deepEqual(report.failures, [
    {
      artifactKey: 'raw/C1/samples/S2.tsv',
      sampleId: 'S2',
      kind: 'FetchFailed',
      message: 'connection reset while reading raw/C1/samples/S2.tsv'
    }
  ]);
});

test('an empty cohort fails with NO_ARTIFACTS_FOUND', async () => {
  const store = new MemoryObjectStore();
  store.seed('raw/OTHER/samples/S1.tsv', STAR_COUNTS_TSV);
  const { orchestrator } = setup(store);

  await assert.rejects(orchestrator.buildDataset('C1'), (error: unknown) => {
    assert.ok(error instanceof IngestError);
    assert.equal(error.code, 'NO_ARTIFACTS_FOUND');
    assert.equal(error.report?.attempted, 0);
    return true;
  });
  assert.equal(store.gets, 0);
});

test('a cohort where every artifact fails raises ALL_TRANSFORMS_FAILED with the report', async () => {
  const store = new MemoryObjectStore();
  store.seed('raw/C1/samples/S1.tsv', UNDECODABLE);
  store.seed('raw/C1/samples/S2.tsv', 'gene_id,description\nG1,abc\n');
  const { orchestrator } = setup(store);

  await assert.rejects(orchestrator.buildDataset('C1'), (error: unknown) => {
    assert.ok(error instanceof IngestError);
    assert.equal(error.code, 'ALL_TRANSFORMS_FAILED');
    assert.equal(error.report?.failed, 2);
    assert.deepEqual(
      error.report?.failures.map((failure) => failure.kind).sort(),
      ['DecodeFailed', 'NoValueColumn']
    );
    return true;
  });
});

class ThrowingSet extends Set<string> {
  has(): boolean {
    throw new Error('lookup exploded');
  }
}

class ReleasingCatalog extends CatalogReader {
  readonly released: string[] = [];

  release(cohortId: string): void {
    this.released.push(cohortId);
  }
}

test('a task that throws is reported as TaskFailed and the cohort is released', async () => {
  const store = new MemoryObjectStore();
  store.seed('raw/C1/samples/S1.tsv', STAR_COUNTS_TSV);
  const catalog = new ReleasingCatalog({
    store,
    rawPrefix: 'raw',
    artifactSuffixes: ['.tsv'],
    clinicalService: null,
    logger: silentLogger
  });
  const { orchestrator } = setup(store, { catalog, loadFilterSet: async () => new ThrowingSet(['G1']) });

  await assert.rejects(orchestrator.buildDataset('C1'), (error: unknown) => {
    assert.ok(error instanceof IngestError);
    assert.equal(error.code, 'ALL_TRANSFORMS_FAILED');
    assert.deepEqual(error.report?.failures, [
      { artifactKey: 'raw/C1/samples/S1.tsv', sampleId: 'S1', kind: 'TaskFailed', message: 'lookup exploded' }
    ]);
    return true;
  });
  assert.deepEqual(catalog.released, ['C1']);
});

test('rejects a concurrency limit outside the supported range', async () => {
  const store = new MemoryObjectStore();
  store.seed('raw/C1/samples/S1.tsv', STAR_COUNTS_TSV);
  const { orchestrator } = setup(store);
  await assert.rejects(orchestrator.buildDataset('C1', 0), RangeError);
});

test('sequential mode spaces fetches by the configured delay', async () => {
  const store = new MemoryObjectStore();
  for (const sampleId of ['S1', 'S2', 'S3']) {
    store.seed(`raw/C1/samples/${sampleId}.tsv`, STAR_COUNTS_TSV);
  }
  const { orchestrator } = setup(store, { mode: 'sequential', sequentialDelayMs: 25 });

  const started = Date.now();
  const { report } = await orchestrator.buildDataset('C1');
  const elapsed = Date.now() - started;

  assert.equal(report.mode, 'sequential');
  assert.equal(report.succeeded, 3);
  assert.ok(elapsed >= 45, `expected at least two delays, took ${elapsed}ms`);
});

test('applies the feature filter loaded before fan-out', async () => {
  const store = new MemoryObjectStore();
  store.seed('raw/C1/samples/S1.tsv', STAR_COUNTS_TSV);
  let loads = 0;
  const { orchestrator } = setup(store, {
    loadFilterSet: async () => {
      loads += 1;
      return new Set(['ENSG00000000419']);
    }
  });

  const { dataset } = await orchestrator.buildDataset('C1');
  assert.equal(loads, 1);
  assert.deepEqual(dataset.rows, [['S1', 'C1', null, 'unknown', 980]]);
});

test('joins clinical records once per sample and persists the table', async () => {
  const store = new MemoryObjectStore();
  store.seed('raw/C1/samples/S1.tsv', STAR_COUNTS_TSV, { 'patient-id': 'P1' });
  store.seed('raw/C1/samples/S2.tsv', STAR_COUNTS_TSV);
  const searches: string[] = [];
  const clinicalService: ClinicalService = {
    search: async (filter) => {
      searches.push(filter.projectId);
      return ['case-1'];
    },
    fetchDetails: async () => [
      gdcCaseSchema.parse({
        case_id: 'case-1',
        submitter_id: 'P1',
        demographic: { gender: 'female' },
        treatments: [
          { treatment_type: 'Surgery', days_to_treatment_start: 5 },
          { treatment_type: 'Radiation Therapy, NOS', days_to_treatment_start: 30 }
        ]
      })
    ]
  };
  const { catalog } = setup(store, {}, clinicalService);
  const { orchestrator } = setup(
    store,
    { catalog, persistClinicalTable: (cohortId, table) => catalog.persistClinicalTable(cohortId, table) },
    clinicalService
  );

  const { dataset, units } = await orchestrator.buildDataset('C1');

  assert.deepEqual(searches, ['C1']);
  assert.equal(dataset.rows.length, 2);
  const s1 = units.find((unit) => unit.sampleId === 'S1');
  const s2 = units.find((unit) => unit.sampleId === 'S2');
  assert.equal(s1?.clinicalMatched, true);
  assert.equal(s1?.metadata.clinical_treatment_number, 1);
  assert.equal(s1?.metadata.clinical_treatment_type, 'Surgery');
  assert.equal(s1?.metadata.sex, 'female');
  assert.equal(s2?.clinicalMatched, false);

  const lines = store.text('raw/C1/metadata.csv').split('\n');
  assert.equal(lines.length, 4);
  assert.ok(lines[0].startsWith('case_id,patient_id,gender,'));
  assert.ok(lines[1].startsWith('case-1,P1,female,'));
  assert.equal(lines[3], '');
});

test('matrix orientation projects samples from the shared matrix without downloading them', async () => {
  const store = new MemoryObjectStore();
  store.seed('raw/C1/matrix.tsv', 'gene_id\tS1\tS2\nG2\t3\t4\nG1\t1\t2\n');
  store.seed('raw/C1/samples/S1.tsv', '');
  store.seed('raw/C1/samples/S2.tsv', '');
  store.seed('raw/C1/samples/S9.tsv', '');
  const { orchestrator } = setup(store, { orientation: 'matrix' });

  const { dataset, report } = await orchestrator.buildDataset('C1');

  assert.equal(store.gets, 1);
  assert.equal(dataset.orientation, 'matrix');
  const names = dataset.columns.map((column) => column.name);
  assert.equal(names[0], 'feature_id');
  assert.deepEqual([...names.slice(1)].sort(), ['S1', 'S2']);
  assert.deepEqual(
    dataset.rows.map((row) => row[0]),
    ['G1', 'G2']
  );
  const s2 = names.indexOf('S2');
  assert.deepEqual(
    dataset.rows.map((row) => row[s2]),
    [2, 4]
  );
  assert.deepEqual(report.failures, [
    {
      artifactKey: 'raw/C1/samples/S9.tsv',
      sampleId: 'S9',
      kind: 'SampleNotFound',
      message: 'Sample S9 is not a matrix column'
    }
  ]);
});

test('matrix orientation without a matrix object fails before fan-out', async () => {
  const store = new MemoryObjectStore();
  store.seed('raw/C1/samples/S1.tsv', '');
  const { orchestrator } = setup(store, { orientation: 'matrix' });
  await assert.rejects(orchestrator.buildDataset('C1'), (error: unknown) => {
    assert.ok(error instanceof IngestError);
    assert.equal(error.code, 'MATRIX_UNAVAILABLE');
    return true;
  });
});
