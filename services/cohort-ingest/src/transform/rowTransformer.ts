import type { ReconciliationPolicy } from '../config/serviceConfig';
import { describeError, transformError } from '../errors';
import { applyFeatureFilter } from '../features/featureFilter';
import { stripVersion } from '../features/identifiers';
import type { ClinicalLookup } from '../metadata/clinical';
import { parseDelimited } from '../table/delimited';
import type { DelimitedTable } from '../table/delimited';
import type { FeatureFilterSet, FeatureValue, SampleArtifact, TransformResult } from '../types';
import { err, ok } from '../types';
import { findIdColumn, findNameColumn, findValueColumn, parseNumericCell } from './columns';
import { decodePayload } from './decode';
import { reconcileMetadata } from './metadata';
import type { SampleTransformer } from './types';

export type RowTransformerOptions = {
  reconciliation: ReconciliationPolicy;
};

/**
 * Transforms one per-sample measurement table (features as rows) into a
 * canonical unit.
 */
export class RowSourceTransformer implements SampleTransformer {
  readonly orientation = 'row' as const;
  readonly needsPayload = true;
  private readonly reconciliation: ReconciliationPolicy;

  constructor(options: RowTransformerOptions) {
    this.reconciliation = options.reconciliation;
  }

  transform(artifact: SampleArtifact, filterSet: FeatureFilterSet, clinicalLookup: ClinicalLookup): TransformResult {
    let table: DelimitedTable;
    try {
      table = parseDelimited(decodePayload(artifact.payload));
    } catch (error) {
      return err(transformError('DecodeFailed', describeError(error)));
    }

    const idIndex = findIdColumn(table.header);
    const nameIndex = findNameColumn(table.header, idIndex);
    const excluded = nameIndex === -1 ? [idIndex] : [idIndex, nameIndex];
    const valueIndex = findValueColumn(table.header, excluded);
    if (valueIndex === -1) {
      return err(
        transformError('NoValueColumn', `No value column among: ${table.header.join(', ')}`)
      );
    }

    const candidates: FeatureValue[] = [];
    for (const row of table.rows) {
      const featureId = stripVersion(row[idIndex]);
      if (featureId.length === 0) {
        continue;
      }
      const name = nameIndex === -1 ? '' : row[nameIndex].trim();
      candidates.push({
        featureId,
        featureName: name.length > 0 ? name : null,
        value: parseNumericCell(row[valueIndex])
      });
    }

    // first occurrence wins; duplicates are counted among the kept features
    const features: FeatureValue[] = [];
    const seen = new Set<string>();
    let duplicateFeatureCount = 0;
    for (const feature of applyFeatureFilter(candidates, filterSet)) {
      if (seen.has(feature.featureId)) {
        duplicateFeatureCount += 1;
        continue;
      }
      seen.add(feature.featureId);
      features.push(feature);
    }

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
        valueColumn: table.header[valueIndex],
        features: Object.freeze(features),
        metadata: reconciled.value.metadata,
        clinicalMatched: reconciled.value.clinicalMatched,
        duplicateFeatureCount
      })
    );
  }
}
