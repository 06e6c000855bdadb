import type { ReconciliationPolicy } from '../config/serviceConfig';
import { transformError } from '../errors';
import { applyFeatureFilter } from '../features/featureFilter';
import type { ClinicalLookup } from '../metadata/clinical';
import type { FeatureFilterSet, FeatureValue, SampleArtifact, TransformResult } from '../types';
import { err, ok } from '../types';
import { reconcileMetadata } from './metadata';
import type { FeatureMatrix, SampleTransformer } from './types';

export type MatrixTransformerOptions = {
  reconciliation: ReconciliationPolicy;
  matrix: FeatureMatrix;
};

/**
 * Projects one sample's column out of a cohort matrix loaded before fan-out.
 * The artifact payload is not read.
 */
export class MatrixSourceTransformer implements SampleTransformer {
  readonly orientation = 'matrix' as const;
  readonly needsPayload = false;
  private readonly reconciliation: ReconciliationPolicy;
  private readonly matrix: FeatureMatrix;

  constructor(options: MatrixTransformerOptions) {
    this.reconciliation = options.reconciliation;
    this.matrix = options.matrix;
  }

  transform(artifact: SampleArtifact, filterSet: FeatureFilterSet, clinicalLookup: ClinicalLookup): TransformResult {
    const column = this.matrix.samples.get(artifact.sampleId);
    if (!column) {
      return err(transformError('SampleNotFound', `Sample ${artifact.sampleId} is not a matrix column`));
    }

    const projected: FeatureValue[] = this.matrix.featureIds.map((featureId, index) => ({
      featureId,
      featureName: this.matrix.featureNames?.[index] ?? null,
      value: column[index] ?? null
    }));
    const features = applyFeatureFilter(projected, filterSet);

    if (features.length === 0) {
      return err(transformError('EmptyAfterFilter', 'No features left after filtering'));
    }

    const reconciled = reconcileMetadata(artifact, clinicalLookup, this.reconciliation);
    if (!reconciled.ok) {
      return reconciled;
    }

    return ok(
      Object.freeze({
        artifactKey: artifact.key,
        cohortId: artifact.cohortId,
        sampleId: artifact.sampleId,
        valueColumn: artifact.sampleId,
        features: Object.freeze(features),
        metadata: reconciled.value.metadata,
        clinicalMatched: reconciled.value.clinicalMatched,
        duplicateFeatureCount: 0
      })
    );
  }
}
