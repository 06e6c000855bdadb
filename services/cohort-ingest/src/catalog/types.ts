import type { ClinicalTable } from '../metadata/types';
import type { FeatureMatrix } from '../transform/types';
import type { ArtifactRef, SampleArtifact } from '../types';

export interface ArtifactCatalog {
  listArtifacts(cohortId: string): Promise<ArtifactRef[]>;
  fetchArtifact(ref: ArtifactRef): Promise<SampleArtifact>;
  /** Side-channel metadata only; the returned payload is empty. */
  fetchSideChannel(ref: ArtifactRef): Promise<SampleArtifact>;
  fetchClinicalTable(cohortId: string): Promise<ClinicalTable>;
  fetchMatrix(cohortId: string): Promise<FeatureMatrix>;
  /** Drops per-cohort state kept between listing and fetching. */
  release?(cohortId: string): void;
}
