import path from 'node:path';
import { createLogger } from '@cohortforge/shared';
import type { Logger } from '@cohortforge/shared';
import { buildSampleSheet, describeShape } from './assembly/assembler';
import type { DatasetShape } from './assembly/assembler';
import { CatalogReader } from './catalog/catalogReader';
import { GdcArtifactCatalog } from './catalog/gdcArtifactCatalog';
import type { ClinicalService } from './catalog/clinicalSource';
import type { ArtifactCatalog } from './catalog/types';
import type { IngestConfig } from './config/serviceConfig';
import { IngestError, describeError } from './errors';
import { loadFilterSet } from './features/featureFilter';
import { GdcClient } from './metadata/gdcClient';
import { GeoSeriesSearch } from './metadata/geoClient';
import type { GeoSeriesFilter } from './metadata/geoClient';
import { DatasetOrchestrator } from './orchestrator/buildDataset';
import { SinkWriter } from './sink/sinkWriter';
import { LocalObjectStore } from './store/localObjectStore';
import { S3ObjectStore } from './store/s3ObjectStore';
import type { S3CommandSender } from './store/s3ObjectStore';
import type { ObjectStore } from './store/types';
import type { BatchReport } from './types';

export type IngestRuntime = {
  config: IngestConfig;
  logger: Logger;
  store: ObjectStore;
  reader: CatalogReader;
  catalog: ArtifactCatalog;
  orchestrator: DatasetOrchestrator;
  sink: SinkWriter;
  seriesSearch: GeoSeriesSearch;
};

export type RuntimeOverrides = {
  logger?: Logger;
  store?: ObjectStore;
  s3Client?: S3CommandSender;
  clinicalService?: ClinicalService | null;
};

export type CohortRunSummary = {
  cohortId: string;
  status: 'succeeded' | 'failed';
  report: BatchReport | null;
  shape: DatasetShape | null;
  outputs: string[];
  error?: string;
};

function createStore(config: IngestConfig, overrides: RuntimeOverrides): ObjectStore {
  if (overrides.store) {
    return overrides.store;
  }
  if (config.store.kind === 'local') {
    return new LocalObjectStore(config.store.localRoot);
  }
  if (!config.store.bucket) {
    throw new Error('An S3 bucket is required for the s3 store');
  }
  return new S3ObjectStore(
    {
      bucket: config.store.bucket,
      region: config.store.region,
      endpoint: config.store.endpoint,
      forcePathStyle: config.store.forcePathStyle
    },
    overrides.s3Client
  );
}

export function createIngestRuntime(config: IngestConfig, overrides: RuntimeOverrides = {}): IngestRuntime {
  const logger = overrides.logger ?? createLogger({ name: 'cohort-ingest', level: config.logLevel });
  const store = createStore(config, overrides);
  const gdcClient = new GdcClient({ baseUrl: config.gdcBaseUrl, fetchTimeoutMs: config.httpTimeoutMs });
  const clinicalService = overrides.clinicalService === undefined ? gdcClient : overrides.clinicalService;

  const reader = new CatalogReader({
    store,
    rawPrefix: config.rawPrefix,
    artifactSuffixes: config.artifactSuffixes,
    clinicalService,
    logger: logger.child({ component: 'catalog' })
  });
  const catalog: ArtifactCatalog =
    config.source === 'gdc'
      ? new GdcArtifactCatalog({ client: gdcClient, logger: logger.child({ component: 'gdc-catalog' }) })
      : reader;

  const orchestrator = new DatasetOrchestrator({
    catalog,
    loadFilterSet: () =>
      loadFilterSet({
        ...config.featureFilter,
        fetchTimeoutMs: config.httpTimeoutMs,
        logger: logger.child({ component: 'feature-filter' })
      }),
    orientation: config.orientation,
    mode: config.mode,
    concurrency: config.concurrency,
    sequentialDelayMs: config.sequentialDelayMs,
    reconciliation: config.reconciliation,
    clinicalTieBreak: config.clinicalTieBreak,
    persistClinicalTable: config.persistClinical
      ? (cohortId, table) => reader.persistClinicalTable(cohortId, table)
      : null,
    logger: logger.child({ component: 'orchestrator' })
  });

  const sink = new SinkWriter({
    resolveBucket: (bucket) => {
      if (config.store.kind === 's3' && bucket === config.store.bucket) {
        return store;
      }
      return new S3ObjectStore(
        {
          bucket,
          region: config.store.region,
          endpoint: config.store.endpoint,
          forcePathStyle: config.store.forcePathStyle
        },
        overrides.s3Client
      );
    },
    logger: logger.child({ component: 'sink' })
  });

  const seriesSearch = new GeoSeriesSearch({
    baseUrl: config.geo.eutilsBaseUrl,
    fetchTimeoutMs: config.httpTimeoutMs
  });

  return { config, logger, store, reader, catalog, orchestrator, sink, seriesSearch };
}

/** The configured GEO series search, or null when no search clause is set. */
export function geoSeriesFilter(config: IngestConfig): GeoSeriesFilter | null {
  const { platform, instrumentKeywords, gdsType, organism, maxSeries } = config.geo;
  if (!platform && instrumentKeywords.length === 0 && !gdsType && !organism) {
    return null;
  }
  const filter: GeoSeriesFilter = { instrumentKeywords, retmax: maxSeries };
  if (platform) {
    filter.platform = platform;
  }
  if (gdsType) {
    filter.gdsType = gdsType;
  }
  if (organism) {
    filter.organism = organism;
  }
  return filter;
}

/**
 * Cohort ids for a run that names none: the accessions of the GEO series
 * matching the configured search, in search order.
 */
export async function discoverCohorts(runtime: IngestRuntime): Promise<string[]> {
  const filter = geoSeriesFilter(runtime.config);
  if (!filter) {
    return [];
  }
  const ids = await runtime.seriesSearch.search(filter);
  const records = await runtime.seriesSearch.fetchDetails(ids);
  const accessions = Array.from(
    new Set(records.map((record) => record.accession).filter((accession) => accession.length > 0))
  );
  runtime.logger.info({ filter, series: accessions }, 'Discovered GEO series');
  return accessions;
}

/** Where a processed artifact for a cohort is written, as a sink destination. */
export function outputDestination(config: IngestConfig, cohortId: string, fileName: string): string {
  const key = [config.processedPrefix, cohortId, fileName].filter((segment) => segment.length > 0).join('/');
  if (config.store.kind === 's3' && config.store.bucket) {
    return `s3://${config.store.bucket}/${key}`;
  }
  return path.resolve(config.store.localRoot, key);
}

function datasetFileName(config: IngestConfig): string {
  return config.outputFormat === 'columnar-binary' ? 'merged_dataset.parquet' : 'merged_dataset.csv';
}

export async function runCohort(runtime: IngestRuntime, cohortId: string): Promise<CohortRunSummary> {
  const { config, orchestrator, sink } = runtime;
  const { dataset, report } = await orchestrator.buildDataset(cohortId, config.concurrency);
  const outputs: string[] = [];

  const datasetDestination = outputDestination(config, cohortId, datasetFileName(config));
  await sink.write(dataset, datasetDestination, config.outputFormat);
  outputs.push(datasetDestination);

  if (dataset.orientation === 'matrix') {
    const sheetDestination = outputDestination(config, cohortId, 'samples.csv');
    await sink.write(buildSampleSheet(dataset), sheetDestination, 'tabular-text');
    outputs.push(sheetDestination);
  }

  return { cohortId, status: 'succeeded', report, shape: describeShape(dataset), outputs };
}

/**
 * Runs every cohort in turn. A fatal error for one cohort is recorded in its
 * summary and the next cohort still runs.
 */
export async function runPipeline(runtime: IngestRuntime, cohorts: readonly string[]): Promise<CohortRunSummary[]> {
  const summaries: CohortRunSummary[] = [];
  for (const cohortId of cohorts) {
    try {
      const summary = await runCohort(runtime, cohortId);
      runtime.logger.info(
        { cohortId, shape: summary.shape, outputs: summary.outputs },
        'Cohort ingestion complete'
      );
      summaries.push(summary);
    } catch (error) {
      const report = error instanceof IngestError ? error.report ?? null : null;
      runtime.logger.error(
        { cohortId, err: describeError(error), code: error instanceof IngestError ? error.code : undefined },
        'Cohort ingestion failed'
      );
      summaries.push({ cohortId, status: 'failed', report, shape: null, outputs: [], error: describeError(error) });
    }
  }
  return summaries;
}
