import type { TransformError, TransformErrorKind } from './errors';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export type ArtifactRef = {
  key: string;
  cohortId: string;
  sampleId: string;
  sizeBytes?: number;
};

export type SideChannel = Readonly<Record<string, string>>;

export type SampleArtifact = ArtifactRef & {
  readonly payload: Buffer;
  readonly sideChannel: SideChannel;
};

export type FeatureFilterSet = ReadonlySet<string>;

export type FeatureValue = {
  featureId: string;
  featureName: string | null;
  value: number | null;
};

export type CellValue = string | number | null;

export type SampleMetadata = Readonly<Record<string, CellValue>>;

export type TransformedUnit = {
  readonly artifactKey: string;
  readonly cohortId: string;
  readonly sampleId: string;
  readonly valueColumn: string;
  readonly features: readonly FeatureValue[];
  readonly metadata: SampleMetadata;
  readonly clinicalMatched: boolean;
  readonly duplicateFeatureCount: number;
};

export type TransformResult = Result<TransformedUnit, TransformError>;

export type ColumnRole = 'id' | 'metadata' | 'feature' | 'sample';
export type ColumnType = 'string' | 'double';

export type DatasetColumn = {
  name: string;
  role: ColumnRole;
  type: ColumnType;
};

export type AssembledDataset = {
  orientation: 'row' | 'matrix';
  columns: DatasetColumn[];
  rows: CellValue[][];
  samples: SampleMetadata[];
};

export type UnitFailure = {
  artifactKey: string;
  sampleId: string;
  kind: TransformErrorKind;
  message: string;
};

export type BatchReport = {
  cohortId: string;
  mode: 'concurrent' | 'sequential';
  attempted: number;
  succeeded: number;
  failed: number;
  failures: UnitFailure[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
};
