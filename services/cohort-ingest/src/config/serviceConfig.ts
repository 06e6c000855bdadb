import { z } from 'zod';
import {
  LOG_LEVELS,
  booleanVar,
  enumVar,
  integerVar,
  loadEnvConfig,
  stringListVar,
  stringVar
} from '@cohortforge/shared';
import type { EnvSource, LogLevel } from '@cohortforge/shared';
import { DEFAULT_EUTILS_BASE_URL } from '../metadata/geoClient';

export const ORIENTATIONS = ['row', 'matrix'] as const;
export const RUN_MODES = ['concurrent', 'sequential'] as const;
export const OUTPUT_FORMATS = ['tabular-text', 'columnar-binary'] as const;
export const RECONCILIATION_POLICIES = ['lenient', 'strict'] as const;
export const TIE_BREAK_POLICIES = ['first-record', 'earliest-start'] as const;
export const STORE_KINDS = ['s3', 'local'] as const;
export const CATALOG_SOURCES = ['store', 'gdc'] as const;

export type Orientation = (typeof ORIENTATIONS)[number];
export type RunMode = (typeof RUN_MODES)[number];
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
export type ReconciliationPolicy = (typeof RECONCILIATION_POLICIES)[number];
export type TieBreakPolicy = (typeof TIE_BREAK_POLICIES)[number];
export type StoreKind = (typeof STORE_KINDS)[number];
export type CatalogSource = (typeof CATALOG_SOURCES)[number];

export const DEFAULT_ARTIFACT_SUFFIXES = ['.csv', '.tsv', '.csv.gz', '.tsv.gz'];
export const DEFAULT_ANNOTATION_URL =
  'https://ftp.ebi.ac.uk/pub/databases/gencode/Gencode_human/release_44/gencode.v44.basic.annotation.gtf.gz';

export type IngestConfig = {
  logLevel: LogLevel;
  cohorts: string[];
  source: CatalogSource;
  orientation: Orientation;
  mode: RunMode;
  concurrency: number;
  sequentialDelayMs: number;
  rawPrefix: string;
  processedPrefix: string;
  artifactSuffixes: string[];
  outputFormat: OutputFormat;
  reconciliation: ReconciliationPolicy;
  clinicalTieBreak: TieBreakPolicy;
  persistClinical: boolean;
  featureFilter: {
    enabled: boolean;
    cachePath: string;
    annotationUrl: string;
  };
  store: {
    kind: StoreKind;
    localRoot: string;
    bucket: string | null;
    region: string;
    endpoint: string | null;
    forcePathStyle: boolean;
  };
  gdcBaseUrl: string;
  /** GEO series discovery, used when a run names no cohorts. */
  geo: {
    platform: string | null;
    instrumentKeywords: string[];
    gdsType: string | null;
    organism: string | null;
    maxSeries: number;
    eutilsBaseUrl: string;
  };
  httpTimeoutMs: number;
};

const ingestEnvSchema = z
  .object({
    COHORT_INGEST_LOG_LEVEL: enumVar(LOG_LEVELS, { defaultValue: 'info' }),
    COHORT_INGEST_COHORTS: stringListVar({ unique: true }),
    COHORT_INGEST_SOURCE: enumVar(CATALOG_SOURCES, { defaultValue: 'store' }),
    COHORT_INGEST_ORIENTATION: enumVar(ORIENTATIONS, { defaultValue: 'row' }),
    COHORT_INGEST_MODE: enumVar(RUN_MODES, { defaultValue: 'concurrent' }),
    COHORT_INGEST_CONCURRENCY: integerVar({ defaultValue: 4, min: 1, max: 64 }),
    COHORT_INGEST_SEQUENTIAL_DELAY_MS: integerVar({ defaultValue: 100, min: 0 }),
    COHORT_INGEST_RAW_PREFIX: stringVar({ defaultValue: 'raw' }),
    COHORT_INGEST_PROCESSED_PREFIX: stringVar({ defaultValue: 'processed' }),
    COHORT_INGEST_ARTIFACT_SUFFIXES: stringListVar({ defaultValue: DEFAULT_ARTIFACT_SUFFIXES, unique: true }),
    COHORT_INGEST_OUTPUT_FORMAT: enumVar(OUTPUT_FORMATS, { defaultValue: 'tabular-text' }),
    COHORT_INGEST_RECONCILIATION: enumVar(RECONCILIATION_POLICIES, { defaultValue: 'lenient' }),
    COHORT_INGEST_CLINICAL_TIE_BREAK: enumVar(TIE_BREAK_POLICIES, { defaultValue: 'first-record' }),
    COHORT_INGEST_PERSIST_CLINICAL: booleanVar({ defaultValue: false }),
    COHORT_INGEST_FEATURE_FILTER: booleanVar({ defaultValue: false }),
    COHORT_INGEST_FEATURE_CACHE: stringVar({ defaultValue: 'protein_coding_genes.txt' }),
    COHORT_INGEST_ANNOTATION_URL: stringVar({ defaultValue: DEFAULT_ANNOTATION_URL }),
    COHORT_INGEST_STORE: enumVar(STORE_KINDS, { defaultValue: 's3' }),
    COHORT_INGEST_LOCAL_ROOT: stringVar({ defaultValue: 'data' }),
    COHORT_INGEST_S3_BUCKET: stringVar(),
    AWS_S3_BUCKET: stringVar(),
    COHORT_INGEST_S3_REGION: stringVar(),
    AWS_REGION: stringVar(),
    COHORT_INGEST_S3_ENDPOINT: stringVar(),
    COHORT_INGEST_S3_FORCE_PATH_STYLE: booleanVar({ defaultValue: false }),
    COHORT_INGEST_GDC_BASE_URL: stringVar({ defaultValue: 'https://api.gdc.cancer.gov' }),
    COHORT_INGEST_GEO_PLATFORM: stringVar(),
    COHORT_INGEST_GEO_KEYWORDS: stringListVar({ separator: ',', unique: true }),
    COHORT_INGEST_GEO_TYPE: stringVar(),
    COHORT_INGEST_GEO_ORGANISM: stringVar(),
    COHORT_INGEST_GEO_MAX_SERIES: integerVar({ defaultValue: 100, min: 1 }),
    COHORT_INGEST_EUTILS_BASE_URL: stringVar({ defaultValue: DEFAULT_EUTILS_BASE_URL }),
    COHORT_INGEST_HTTP_TIMEOUT_MS: integerVar({ defaultValue: 60_000, min: 0 })
  })
  .passthrough();

type IngestEnv = z.infer<typeof ingestEnvSchema>;

let cachedConfig: IngestConfig | null = null;

function normalizePrefix(value: string): string {
  return value.replace(/^\/+/, '').replace(/\/+$/, '');
}

function normalizeBaseUrl(value: string): string {
  return value.replace(/\/+$/, '');
}

function buildConfig(env: IngestEnv): IngestConfig {
  const kind = env.COHORT_INGEST_STORE ?? 's3';
  const bucket = env.COHORT_INGEST_S3_BUCKET ?? env.AWS_S3_BUCKET ?? null;
  if (kind === 's3' && !bucket) {
    throw new Error('Set COHORT_INGEST_S3_BUCKET or AWS_S3_BUCKET when COHORT_INGEST_STORE is s3');
  }

  return {
    logLevel: env.COHORT_INGEST_LOG_LEVEL ?? 'info',
    cohorts: env.COHORT_INGEST_COHORTS,
    source: env.COHORT_INGEST_SOURCE ?? 'store',
    orientation: env.COHORT_INGEST_ORIENTATION ?? 'row',
    mode: env.COHORT_INGEST_MODE ?? 'concurrent',
    concurrency: env.COHORT_INGEST_CONCURRENCY ?? 4,
    sequentialDelayMs: env.COHORT_INGEST_SEQUENTIAL_DELAY_MS ?? 100,
    rawPrefix: normalizePrefix(env.COHORT_INGEST_RAW_PREFIX ?? 'raw'),
    processedPrefix: normalizePrefix(env.COHORT_INGEST_PROCESSED_PREFIX ?? 'processed'),
    artifactSuffixes: env.COHORT_INGEST_ARTIFACT_SUFFIXES.map((suffix) => suffix.toLowerCase()),
    outputFormat: env.COHORT_INGEST_OUTPUT_FORMAT ?? 'tabular-text',
    reconciliation: env.COHORT_INGEST_RECONCILIATION ?? 'lenient',
    clinicalTieBreak: env.COHORT_INGEST_CLINICAL_TIE_BREAK ?? 'first-record',
    persistClinical: env.COHORT_INGEST_PERSIST_CLINICAL ?? false,
    featureFilter: {
      enabled: env.COHORT_INGEST_FEATURE_FILTER ?? false,
      cachePath: env.COHORT_INGEST_FEATURE_CACHE ?? 'protein_coding_genes.txt',
      annotationUrl: env.COHORT_INGEST_ANNOTATION_URL ?? DEFAULT_ANNOTATION_URL
    },
    store: {
      kind,
      localRoot: env.COHORT_INGEST_LOCAL_ROOT ?? 'data',
      bucket,
      region: env.COHORT_INGEST_S3_REGION ?? env.AWS_REGION ?? 'eu-north-1',
      endpoint: env.COHORT_INGEST_S3_ENDPOINT ?? null,
      forcePathStyle: env.COHORT_INGEST_S3_FORCE_PATH_STYLE ?? false
    },
    gdcBaseUrl: normalizeBaseUrl(env.COHORT_INGEST_GDC_BASE_URL ?? 'https://api.gdc.cancer.gov'),
    geo: {
      platform: env.COHORT_INGEST_GEO_PLATFORM ?? null,
      instrumentKeywords: env.COHORT_INGEST_GEO_KEYWORDS,
      gdsType: env.COHORT_INGEST_GEO_TYPE ?? null,
      organism: env.COHORT_INGEST_GEO_ORGANISM ?? null,
      maxSeries: env.COHORT_INGEST_GEO_MAX_SERIES ?? 100,
      eutilsBaseUrl: normalizeBaseUrl(env.COHORT_INGEST_EUTILS_BASE_URL ?? DEFAULT_EUTILS_BASE_URL)
    },
    httpTimeoutMs: env.COHORT_INGEST_HTTP_TIMEOUT_MS ?? 60_000
  };
}

/**
 * Reads the service configuration from `process.env`, caching the result.
 * An explicit `env` is parsed fresh and never cached.
 */
export function loadIngestConfig(options: { env?: EnvSource } = {}): IngestConfig {
  if (options.env) {
    return buildConfig(loadEnvConfig(ingestEnvSchema, { env: options.env, context: 'cohort-ingest' }));
  }
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig(loadEnvConfig(ingestEnvSchema, { context: 'cohort-ingest' }));
  return cachedConfig;
}

export function resetCachedIngestConfig(): void {
  cachedConfig = null;
}
