import type { ReconciliationPolicy } from '../config/serviceConfig';
import { transformError } from '../errors';
import type { TransformError } from '../errors';
import type { ClinicalLookup } from '../metadata/clinical';
import { parseAge, parseSex } from '../metadata/demographics';
import type { CellValue, Result, SampleArtifact, SampleMetadata, SideChannel } from '../types';
import { err, ok } from '../types';

export type ReconciledMetadata = {
  metadata: SampleMetadata;
  clinicalMatched: boolean;
};

export function normalizeMetadataKey(key: string): string {
  return key.trim().toLowerCase().replace(/[-\s]+/g, '_');
}

export function normalizeSideChannel(sideChannel: SideChannel): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(sideChannel)) {
    const name = normalizeMetadataKey(key);
    if (name.length > 0) {
      normalized[name] = value;
    }
  }
  return normalized;
}

function valuesWithPrefix(source: Record<string, string>, prefixes: readonly string[]): string[] {
  return Object.keys(source)
    .filter((key) => prefixes.some((prefix) => key.startsWith(prefix)))
    .sort()
    .map((key) => source[key]);
}

/**
 * Builds the metadata record for one sample: normalised side-channel tags,
 * `clinical_*` fields for the owning case or patient, and derived `sex` and
 * `age`.
 */
export function reconcileMetadata(
  artifact: SampleArtifact,
  clinicalLookup: ClinicalLookup,
  policy: ReconciliationPolicy
): Result<ReconciledMetadata, TransformError> {
  const side = normalizeSideChannel(artifact.sideChannel);
  const ownerId = side.patient_id ?? side.case_id ?? artifact.sampleId;
  const record = clinicalLookup.resolve(ownerId);

  if (!record && policy === 'strict') {
    return err(transformError('ClinicalRecordMissing', `No clinical record for ${ownerId}`));
  }

  const clinical: Record<string, CellValue> = {};
  if (record) {
    for (const [key, value] of Object.entries(record.fields)) {
      clinical[`clinical_${key}`] = value;
    }
  }

  const sexCandidates: CellValue[] = [
    side.sex ?? null,
    side.gender ?? null,
    record?.fields.gender ?? null,
    ...valuesWithPrefix(side, ['characteristics'])
  ];
  const ageCandidates: CellValue[] = [
    side.age ?? null,
    record?.fields.age_years ?? null,
    ...valuesWithPrefix(side, ['characteristics', 'description'])
  ];

  const metadata: Record<string, CellValue> = {
    ...side,
    ...clinical,
    sex: parseSex(sexCandidates),
    age: parseAge(ageCandidates),
    sample_id: artifact.sampleId,
    cohort_id: artifact.cohortId
  };

  return ok({ metadata: Object.freeze(metadata), clinicalMatched: record !== undefined });
}
