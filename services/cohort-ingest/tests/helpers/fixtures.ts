import type { ClinicalRecord } from '../../src/metadata/types';
import type { FeatureValue, SampleArtifact, TransformedUnit } from '../../src/types';

export const STAR_COUNTS_TSV = [
  '# gene-model: GENCODE v36',
  'gene_id\tgene_name\tgene_type\tunstranded\tstranded_first\tstranded_second\ttpm_unstranded',
  'ENSG00000000003.15\tTSPAN6\tprotein_coding\t1205\t600\t605\t30.5',
  'ENSG00000000005.6\tTNMD\tprotein_coding\t3\t1\t2\t0.1',
  'ENSG00000000419.13\tDPM1\tprotein_coding\t980\t490\t490\t55.25'
].join('\n');

export function artifact(overrides: Partial<Omit<SampleArtifact, 'payload'>> & { payload?: Buffer | string } = {}): SampleArtifact {
  const payload = overrides.payload ?? STAR_COUNTS_TSV;
  return {
    key: overrides.key ?? 'raw/TCGA-TEST/samples/S1.tsv',
    cohortId: overrides.cohortId ?? 'TCGA-TEST',
    sampleId: overrides.sampleId ?? 'S1',
    payload: typeof payload === 'string' ? Buffer.from(payload) : payload,
    sideChannel: overrides.sideChannel ?? {}
  };
}

export function unit(
  sampleId: string,
  values: Record<string, number | null>,
  metadata: Record<string, string | number | null> = {}
): TransformedUnit {
  const features: FeatureValue[] = Object.entries(values).map(([featureId, value]) => ({
    featureId,
    featureName: null,
    value
  }));
  return {
    artifactKey: `raw/C1/samples/${sampleId}.csv`,
    cohortId: 'C1',
    sampleId,
    valueColumn: 'unstranded',
    features,
    metadata: { sample_id: sampleId, cohort_id: 'C1', ...metadata },
    clinicalMatched: false,
    duplicateFeatureCount: 0
  };
}

export function clinicalRecord(
  caseId: string,
  patientId: string,
  treatmentNumber: number | null,
  daysToTreatmentStart: number | null,
  fields: Record<string, string | number | null> = {}
): ClinicalRecord {
  return {
    caseId,
    patientId,
    treatmentNumber,
    daysToTreatmentStart,
    fields: {
      case_id: caseId,
      patient_id: patientId,
      treatment_number: treatmentNumber,
      days_to_treatment_start: daysToTreatmentStart,
      ...fields
    }
  };
}
