import path from 'node:path';
import type { Logger } from '@cohortforge/shared';
import { IngestError, describeError } from '../errors';
import { CLINICAL_COLUMNS } from '../metadata/clinical';
import type { ClinicalTable } from '../metadata/types';
import type { ObjectStore } from '../store/types';
import { parseFeatureMatrix } from '../table/featureMatrix';
import { formatDelimited } from '../table/delimited';
import type { FeatureMatrix } from '../transform/types';
import type { ArtifactRef, SampleArtifact } from '../types';
import { loadClinicalTable } from './clinicalSource';
import type { ClinicalService } from './clinicalSource';
import type { ArtifactCatalog } from './types';

export type CatalogReaderOptions = {
  store: ObjectStore;
  rawPrefix: string;
  artifactSuffixes: readonly string[];
  clinicalService?: ClinicalService | null;
  logger: Logger;
};

const MATRIX_BASENAME = 'matrix.';

function joinKey(...segments: string[]): string {
  return segments.filter((segment) => segment.length > 0).join('/');
}

export class CatalogReader implements ArtifactCatalog {
  private readonly store: ObjectStore;
  private readonly rawPrefix: string;
  private readonly suffixes: string[];
  private readonly clinicalService: ClinicalService | null;
  private readonly logger: Logger;

  constructor(options: CatalogReaderOptions) {
    this.store = options.store;
    this.rawPrefix = options.rawPrefix;
    // Longest first so `.tsv.gz` is stripped whole rather than as `.gz`.
    this.suffixes = options.artifactSuffixes
      .map((suffix) => suffix.toLowerCase())
      .sort((a, b) => b.length - a.length);
    this.clinicalService = options.clinicalService ?? null;
    this.logger = options.logger;
  }

  samplesPrefix(cohortId: string): string {
    return `${joinKey(this.rawPrefix, cohortId, 'samples')}/`;
  }

  clinicalKey(cohortId: string): string {
    return joinKey(this.rawPrefix, cohortId, 'metadata.csv');
  }

  private matchSuffix(key: string): string | null {
    const lowered = key.toLowerCase();
    return this.suffixes.find((suffix) => lowered.endsWith(suffix)) ?? null;
  }

  async listArtifacts(cohortId: string): Promise<ArtifactRef[]> {
    const prefix = this.samplesPrefix(cohortId);
    const keys = await this.store.list(prefix);
    const refs: ArtifactRef[] = [];
    for (const key of [...keys].sort()) {
      const suffix = this.matchSuffix(key);
      if (!suffix) {
        continue;
      }
      const basename = path.posix.basename(key);
      refs.push({ key, cohortId, sampleId: basename.slice(0, basename.length - suffix.length) });
    }
    if (refs.length === 0) {
      this.logger.warn({ cohortId, prefix }, 'Empty cohort: no sample artifacts found');
    } else {
      this.logger.info({ cohortId, prefix, artifacts: refs.length }, 'Listed sample artifacts');
    }
    return refs;
  }

  async fetchSideChannel(ref: ArtifactRef): Promise<SampleArtifact> {
    const head = await this.store.head(ref.key);
    return {
      ...ref,
      sizeBytes: head.sizeBytes ?? ref.sizeBytes,
      payload: Buffer.alloc(0),
      sideChannel: Object.freeze({ ...head.metadata })
    };
  }

  async fetchArtifact(ref: ArtifactRef): Promise<SampleArtifact> {
    const withSideChannel = await this.fetchSideChannel(ref);
    const payload = await this.store.get(ref.key);
    return { ...withSideChannel, sizeBytes: payload.length, payload };
  }

  async fetchClinicalTable(cohortId: string): Promise<ClinicalTable> {
    return loadClinicalTable(this.clinicalService, cohortId, this.logger);
  }

  async persistClinicalTable(cohortId: string, table: ClinicalTable): Promise<void> {
    if (table.length === 0) {
      return;
    }
    const key = this.clinicalKey(cohortId);
    const rows = table.map((record) => CLINICAL_COLUMNS.map((column) => record.fields[column] ?? null));
    try {
      await this.store.put(key, Buffer.from(formatDelimited(CLINICAL_COLUMNS, rows)), {
        contentType: 'text/csv'
      });
      this.logger.info({ cohortId, key, records: table.length }, 'Persisted clinical table');
    } catch (error) {
      this.logger.warn({ cohortId, key, err: describeError(error) }, 'Failed to persist clinical table');
    }
  }

  async fetchMatrix(cohortId: string): Promise<FeatureMatrix> {
    const prefix = `${joinKey(this.rawPrefix, cohortId)}/${MATRIX_BASENAME}`;
    try {
      const keys = (await this.store.list(prefix)).sort();
      const key = keys.find((candidate) => path.posix.dirname(candidate) === joinKey(this.rawPrefix, cohortId));
      if (!key) {
        throw new Error(`No object under ${prefix}`);
      }
      const matrix = parseFeatureMatrix(await this.store.get(key));
      this.logger.info(
        { cohortId, key, features: matrix.featureIds.length, samples: matrix.samples.size },
        'Loaded cohort matrix'
      );
      return matrix;
    } catch (error) {
      throw new IngestError(`Matrix for ${cohortId} is unavailable: ${describeError(error)}`, 'MATRIX_UNAVAILABLE', {
        details: { cohortId, prefix },
        cause: error
      });
    }
  }
}
