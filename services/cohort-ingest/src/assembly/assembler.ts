import { IngestError } from '../errors';
import type {
  AssembledDataset,
  CellValue,
  ColumnType,
  DatasetColumn,
  SampleMetadata,
  TransformedUnit
} from '../types';

export type Orientation = AssembledDataset['orientation'];

export type DatasetShape = {
  rows: number;
  columns: number;
  samples: number;
  features: number;
};

const ID_COLUMNS = ['sample_id', 'cohort_id'];

/** `double` when at least one value is present and every present value is a number. */
export function inferColumnType(values: Iterable<CellValue>): ColumnType {
  let sawNumber = false;
  for (const value of values) {
    if (value === null) {
      continue;
    }
    if (typeof value !== 'number') {
      return 'string';
    }
    sawNumber = true;
  }
  return sawNumber ? 'double' : 'string';
}

function sortedUnion(groups: Iterable<Iterable<string>>, exclude: readonly string[] = []): string[] {
  const names = new Set<string>();
  for (const group of groups) {
    for (const name of group) {
      if (!exclude.includes(name)) {
        names.add(name);
      }
    }
  }
  return Array.from(names).sort();
}

function metadataColumns(records: readonly SampleMetadata[]): DatasetColumn[] {
  const names = sortedUnion(records.map((record) => Object.keys(record)), ID_COLUMNS);
  return names.map((name): DatasetColumn => ({
    name,
    role: 'metadata',
    type: inferColumnType(records.map((record) => record[name] ?? null))
  }));
}

function assembleRows(units: readonly TransformedUnit[]): AssembledDataset {
  const metadata = metadataColumns(units.map((unit) => unit.metadata));
  const featureIds = sortedUnion(units.map((unit) => unit.features.map((feature) => feature.featureId)));

  const columns: DatasetColumn[] = [
    { name: 'sample_id', role: 'id', type: 'string' },
    { name: 'cohort_id', role: 'id', type: 'string' },
    ...metadata,
    ...featureIds.map((featureId): DatasetColumn => ({ name: featureId, role: 'feature', type: 'double' }))
  ];

  const rows = units.map((unit) => {
    const values = new Map(unit.features.map((feature) => [feature.featureId, feature.value]));
    return [
      unit.sampleId,
      unit.cohortId,
      ...metadata.map((column) => unit.metadata[column.name] ?? null),
      ...featureIds.map((featureId) => values.get(featureId) ?? null)
    ];
  });

  return { orientation: 'row', columns, rows, samples: units.map((unit) => unit.metadata) };
}

function uniqueSampleColumns(units: readonly TransformedUnit[]): string[] {
  const used = new Set<string>();
  return units.map((unit) => {
    let name = unit.sampleId;
    let ordinal = 1;
    while (used.has(name)) {
      ordinal += 1;
      name = `${unit.sampleId}_${ordinal}`;
    }
    used.add(name);
    return name;
  });
}

function assembleMatrix(units: readonly TransformedUnit[]): AssembledDataset {
  const featureIds = sortedUnion(units.map((unit) => unit.features.map((feature) => feature.featureId)));
  const names = new Map<string, string>();
  for (const unit of units) {
    for (const feature of unit.features) {
      if (feature.featureName !== null && !names.has(feature.featureId)) {
        names.set(feature.featureId, feature.featureName);
      }
    }
  }
  const withNames = names.size > 0;
  const sampleColumns = uniqueSampleColumns(units);

  const nameColumns: DatasetColumn[] = withNames ? [{ name: 'feature_name', role: 'id', type: 'string' }] : [];
  const columns: DatasetColumn[] = [
    { name: 'feature_id', role: 'id', type: 'string' },
    ...nameColumns,
    ...sampleColumns.map((name): DatasetColumn => ({ name, role: 'sample', type: 'double' }))
  ];

  const valueMaps = units.map(
    (unit) => new Map(unit.features.map((feature) => [feature.featureId, feature.value]))
  );
  const rows = featureIds.map((featureId) => {
    const row: CellValue[] = [featureId];
    if (withNames) {
      row.push(names.get(featureId) ?? null);
    }
    for (const values of valueMaps) {
      row.push(values.get(featureId) ?? null);
    }
    return row;
  });

  const samples = units.map((unit, index) => ({ ...unit.metadata, sample_column: sampleColumns[index] }));
  return { orientation: 'matrix', columns, rows, samples };
}

/**
 * Merges transformed units into one dataset. Row orientation yields one row
 * per unit in input order; matrix orientation yields one sample column per
 * unit over the sorted union of feature ids.
 */
export function assemble(units: readonly TransformedUnit[], orientation: Orientation = 'row'): AssembledDataset {
  if (units.length === 0) {
    throw new IngestError('Cannot assemble a dataset from zero units', 'EMPTY_INPUT');
  }
  return orientation === 'matrix' ? assembleMatrix(units) : assembleRows(units);
}

export function describeShape(dataset: AssembledDataset): DatasetShape {
  const features =
    dataset.orientation === 'row'
      ? dataset.columns.filter((column) => column.role === 'feature').length
      : dataset.rows.length;
  return {
    rows: dataset.rows.length,
    columns: dataset.columns.length,
    samples: dataset.samples.length,
    features
  };
}

/** Metadata-only table with one row per sample, in dataset order. */
export function buildSampleSheet(dataset: AssembledDataset): AssembledDataset {
  const metadata = metadataColumns(dataset.samples);
  const columns: DatasetColumn[] = [
    { name: 'sample_id', role: 'id', type: 'string' },
    { name: 'cohort_id', role: 'id', type: 'string' },
    ...metadata
  ];
  const rows = dataset.samples.map((record) => [
    record.sample_id ?? null,
    record.cohort_id ?? null,
    ...metadata.map((column) => record[column.name] ?? null)
  ]);
  return { orientation: 'row', columns, rows, samples: dataset.samples };
}
