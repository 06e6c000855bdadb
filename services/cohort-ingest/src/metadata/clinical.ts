import type { TieBreakPolicy } from '../config/serviceConfig';
import type { CellValue } from '../types';
import type { GdcCase, GdcTreatment } from './gdcClient';
import type { ClinicalRecord, ClinicalTable } from './types';

export const CLINICAL_COLUMNS = [
  'case_id',
  'patient_id',
  'gender',
  'race',
  'ethnicity',
  'vital_status',
  'age_years',
  'days_to_death',
  'age_at_diagnosis',
  'primary_diagnosis',
  'tumor_stage',
  'tissue_or_organ_of_origin',
  'days_to_last_follow_up',
  'cigarettes_per_day',
  'pack_years_smoked',
  'years_smoked',
  'treatment_number',
  'treatment_type',
  'therapeutic_agents',
  'days_to_treatment_start',
  'days_to_treatment_end',
  'treatment_outcome'
] as const;

export type ClinicalColumn = (typeof CLINICAL_COLUMNS)[number];

const DAYS_PER_YEAR = 365.25;

function cell(value: string | number | null | undefined): CellValue {
  return value ?? null;
}

function treatmentsFor(entry: GdcCase): GdcTreatment[] {
  if (entry.treatments && entry.treatments.length > 0) {
    return entry.treatments;
  }
  return (entry.diagnoses ?? []).flatMap((diagnosis) => diagnosis.treatments ?? []);
}

function baseFields(entry: GdcCase): Record<ClinicalColumn, CellValue> {
  const demographic = entry.demographic ?? null;
  const diagnosis = entry.diagnoses?.[0];
  const exposure = entry.exposures?.[0];
  const daysToBirth = demographic?.days_to_birth ?? null;

  return {
    case_id: entry.case_id,
    patient_id: cell(entry.submitter_id),
    gender: cell(demographic?.gender),
    race: cell(demographic?.race),
    ethnicity: cell(demographic?.ethnicity),
    vital_status: cell(demographic?.vital_status),
    age_years: daysToBirth ? -daysToBirth / DAYS_PER_YEAR : null,
    days_to_death: cell(demographic?.days_to_death),
    age_at_diagnosis: cell(diagnosis?.age_at_diagnosis),
    primary_diagnosis: cell(diagnosis?.primary_diagnosis),
    tumor_stage: cell(diagnosis?.tumor_stage),
    tissue_or_organ_of_origin: cell(diagnosis?.tissue_or_organ_of_origin),
    days_to_last_follow_up: cell(diagnosis?.days_to_last_follow_up),
    cigarettes_per_day: cell(exposure?.cigarettes_per_day),
    pack_years_smoked: cell(exposure?.pack_years_smoked),
    years_smoked: cell(exposure?.years_smoked),
    treatment_number: null,
    treatment_type: null,
    therapeutic_agents: null,
    days_to_treatment_start: null,
    days_to_treatment_end: null,
    treatment_outcome: null
  };
}

function toRecord(fields: Record<ClinicalColumn, CellValue>, treatmentNumber: number | null, start: number | null): ClinicalRecord {
  return Object.freeze({
    caseId: String(fields.case_id),
    patientId: typeof fields.patient_id === 'string' ? fields.patient_id : null,
    treatmentNumber,
    daysToTreatmentStart: start,
    fields: Object.freeze({ ...fields })
  });
}

/**
 * Flattens nested case documents into one row per (case, treatment). A case
 * with N treatments yields N rows numbered 1..N in service order; a case
 * without treatments yields one row with a null treatment number.
 */
export function flattenClinicalCases(cases: readonly GdcCase[]): ClinicalRecord[] {
  const records: ClinicalRecord[] = [];
  for (const entry of cases) {
    const base = baseFields(entry);
    const treatments = treatmentsFor(entry);
    if (treatments.length === 0) {
      records.push(toRecord(base, null, null));
      continue;
    }
    treatments.forEach((treatment, index) => {
      const start = treatment.days_to_treatment_start ?? null;
      records.push(
        toRecord(
          {
            ...base,
            treatment_number: index + 1,
            treatment_type: cell(treatment.treatment_type),
            therapeutic_agents: cell(treatment.therapeutic_agents),
            days_to_treatment_start: start,
            days_to_treatment_end: cell(treatment.days_to_treatment_end),
            treatment_outcome: cell(treatment.treatment_outcome)
          },
          index + 1,
          start
        )
      );
    });
  }
  return records;
}

function compareTreatmentNumber(a: ClinicalRecord, b: ClinicalRecord): number {
  if (a.treatmentNumber === b.treatmentNumber) {
    return 0;
  }
  if (a.treatmentNumber === null) {
    return -1;
  }
  if (b.treatmentNumber === null) {
    return 1;
  }
  return a.treatmentNumber - b.treatmentNumber;
}

function compareStart(a: ClinicalRecord, b: ClinicalRecord): number {
  if (a.daysToTreatmentStart === b.daysToTreatmentStart) {
    return compareTreatmentNumber(a, b);
  }
  if (a.daysToTreatmentStart === null) {
    return 1;
  }
  if (b.daysToTreatmentStart === null) {
    return -1;
  }
  return a.daysToTreatmentStart - b.daysToTreatmentStart;
}

const comparators: Record<TieBreakPolicy, (a: ClinicalRecord, b: ClinicalRecord) => number> = {
  'first-record': compareTreatmentNumber,
  'earliest-start': compareStart
};

function pickPreferred(
  index: Map<string, ClinicalRecord>,
  key: string,
  candidate: ClinicalRecord,
  compare: (a: ClinicalRecord, b: ClinicalRecord) => number
): void {
  const current = index.get(key);
  if (!current || compare(candidate, current) < 0) {
    index.set(key, candidate);
  }
}

/**
 * Read-only index over a clinical table. Each case id and patient id
 * resolves to exactly one record chosen by the tie-break policy.
 */
export class ClinicalLookup {
  readonly policy: TieBreakPolicy;
  private readonly byCaseId: ReadonlyMap<string, ClinicalRecord>;
  private readonly byPatientId: ReadonlyMap<string, ClinicalRecord>;

  constructor(table: ClinicalTable, policy: TieBreakPolicy = 'first-record') {
    this.policy = policy;
    const compare = comparators[policy];
    const byCaseId = new Map<string, ClinicalRecord>();
    const byPatientId = new Map<string, ClinicalRecord>();
    for (const record of table) {
      pickPreferred(byCaseId, record.caseId, record, compare);
      if (record.patientId) {
        pickPreferred(byPatientId, record.patientId, record, compare);
      }
    }
    this.byCaseId = byCaseId;
    this.byPatientId = byPatientId;
  }

  static empty(): ClinicalLookup {
    return new ClinicalLookup([]);
  }

  get size(): number {
    return this.byCaseId.size;
  }

  resolve(id: string): ClinicalRecord | undefined {
    return this.byCaseId.get(id) ?? this.byPatientId.get(id);
  }
}
