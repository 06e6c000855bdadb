import type { Logger } from '@cohortforge/shared';
import { IngestError } from '../errors';
import { RNA_SEQ_COUNTS_FILTER } from '../metadata/gdcClient';
import type { GdcClient, GdcFile } from '../metadata/gdcClient';
import type { ClinicalTable } from '../metadata/types';
import type { FeatureMatrix } from '../transform/types';
import type { ArtifactRef, SampleArtifact, SideChannel } from '../types';
import { loadClinicalTable } from './clinicalSource';
import type { ArtifactCatalog } from './types';

export type GdcArtifactCatalogOptions = {
  client: GdcClient;
  logger: Logger;
};

function sideChannelFor(file: GdcFile, cohortId: string): SideChannel {
  const firstCase = file.cases?.[0];
  const sideChannel: Record<string, string> = {
    'file-id': file.file_id,
    'file-name': file.file_name,
    project: firstCase?.project?.project_id ?? cohortId
  };
  if (firstCase?.submitter_id) {
    sideChannel['patient-id'] = firstCase.submitter_id;
  }
  return Object.freeze(sideChannel);
}

/**
 * Catalog that reads per-sample STAR count files straight from the GDC data
 * endpoint instead of a staged object store copy.
 */
export class GdcArtifactCatalog implements ArtifactCatalog {
  private readonly client: GdcClient;
  private readonly logger: Logger;
  // cohort id -> file id -> side channel, replaced on every listing
  private readonly sideChannels = new Map<string, Map<string, SideChannel>>();

  constructor(options: GdcArtifactCatalogOptions) {
    this.client = options.client;
    this.logger = options.logger;
  }

  async listArtifacts(cohortId: string): Promise<ArtifactRef[]> {
    const files = await this.client.listFiles({ projectId: cohortId, ...RNA_SEQ_COUNTS_FILTER });
    const sideChannels = new Map<string, SideChannel>();
    this.sideChannels.set(cohortId, sideChannels);
    const refs = files
      .map((file): ArtifactRef => {
        sideChannels.set(file.file_id, sideChannelFor(file, cohortId));
        const ref: ArtifactRef = {
          key: file.file_id,
          cohortId,
          sampleId: file.cases?.[0]?.submitter_id ?? file.file_id
        };
        if (typeof file.file_size === 'number') {
          ref.sizeBytes = file.file_size;
        }
        return ref;
      })
      .sort((a, b) => a.key.localeCompare(b.key));
    if (refs.length === 0) {
      this.logger.warn({ cohortId }, 'Empty cohort: no GDC files matched');
    } else {
      const totalBytes = refs.reduce((sum, ref) => sum + (ref.sizeBytes ?? 0), 0);
      this.logger.info({ cohortId, artifacts: refs.length, totalBytes }, 'Listed GDC files');
    }
    return refs;
  }

  async fetchSideChannel(ref: ArtifactRef): Promise<SampleArtifact> {
    const sideChannel =
      this.sideChannels.get(ref.cohortId)?.get(ref.key) ?? Object.freeze({ 'file-id': ref.key });
    return { ...ref, payload: Buffer.alloc(0), sideChannel };
  }

  async fetchArtifact(ref: ArtifactRef): Promise<SampleArtifact> {
    const artifact = await this.fetchSideChannel(ref);
    const payload = await this.client.downloadFile(ref.key);
    return { ...artifact, sizeBytes: payload.length, payload };
  }

  release(cohortId: string): void {
    this.sideChannels.delete(cohortId);
  }

  async fetchClinicalTable(cohortId: string): Promise<ClinicalTable> {
    return loadClinicalTable(this.client, cohortId, this.logger);
  }

  async fetchMatrix(cohortId: string): Promise<FeatureMatrix> {
    throw new IngestError(`GDC does not publish a cohort matrix for ${cohortId}`, 'MATRIX_UNAVAILABLE', {
      details: { cohortId }
    });
  }
}
