import { stripVersion } from '../features/identifiers';
import { findIdColumn, findNameColumn, parseNumericCell } from '../transform/columns';
import { decodePayload } from '../transform/decode';
import type { FeatureMatrix } from '../transform/types';
import { parseDelimited } from './delimited';

/**
 * Parses a features-by-samples matrix. Every column other than the feature
 * id and optional `gene_name` column is a sample; repeated feature ids keep
 * their first row.
 */
export function parseFeatureMatrix(payload: Buffer): FeatureMatrix {
  const table = parseDelimited(decodePayload(payload));
  const idIndex = findIdColumn(table.header);
  const nameIndex = findNameColumn(table.header, idIndex);
  const sampleIndexes = table.header
    .map((_, index) => index)
    .filter((index) => index !== idIndex && index !== nameIndex);
  if (sampleIndexes.length === 0) {
    throw new Error('Matrix has no sample columns');
  }

  const featureIds: string[] = [];
  const featureNames: (string | null)[] = [];
  const columns: (number | null)[][] = sampleIndexes.map(() => []);
  const seen = new Set<string>();

  for (const row of table.rows) {
    const featureId = stripVersion(row[idIndex]);
    if (featureId.length === 0 || seen.has(featureId)) {
      continue;
    }
    seen.add(featureId);
    featureIds.push(featureId);
    const name = nameIndex === -1 ? '' : row[nameIndex].trim();
    featureNames.push(name.length > 0 ? name : null);
    sampleIndexes.forEach((columnIndex, position) => {
      columns[position].push(parseNumericCell(row[columnIndex]));
    });
  }

  const samples = new Map<string, readonly (number | null)[]>();
  sampleIndexes.forEach((columnIndex, position) => {
    const sampleId = table.header[columnIndex];
    if (!samples.has(sampleId)) {
      samples.set(sampleId, columns[position]);
    }
  });

  return {
    featureIds,
    featureNames: nameIndex === -1 ? null : featureNames,
    samples
  };
}
