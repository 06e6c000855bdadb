import type { ReconciliationPolicy } from '../config/serviceConfig';
import { MatrixSourceTransformer } from './matrixTransformer';
import { RowSourceTransformer } from './rowTransformer';
import type { FeatureMatrix, SampleTransformer } from './types';

export type TransformerOptions =
  | { orientation: 'row'; reconciliation: ReconciliationPolicy }
  | { orientation: 'matrix'; reconciliation: ReconciliationPolicy; matrix: FeatureMatrix };

export function createTransformer(options: TransformerOptions): SampleTransformer {
  if (options.orientation === 'matrix') {
    return new MatrixSourceTransformer({ reconciliation: options.reconciliation, matrix: options.matrix });
  }
  return new RowSourceTransformer({ reconciliation: options.reconciliation });
}

export { MatrixSourceTransformer, RowSourceTransformer };
export type { FeatureMatrix, SampleTransformer };
