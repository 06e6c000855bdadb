import type { ClinicalLookup } from '../metadata/clinical';
import type { FeatureFilterSet, SampleArtifact, TransformResult } from '../types';

export interface SampleTransformer {
  readonly orientation: 'row' | 'matrix';
  /** Whether the orchestrator must download the artifact payload. */
  readonly needsPayload: boolean;
  transform(artifact: SampleArtifact, filterSet: FeatureFilterSet, clinicalLookup: ClinicalLookup): TransformResult;
}

export type FeatureMatrix = {
  featureIds: readonly string[];
  featureNames: readonly (string | null)[] | null;
  samples: ReadonlyMap<string, readonly (number | null)[]>;
};
