import type { CellValue } from '../types';

export interface MetadataService<Filter, Record> {
  search(filter: Filter): Promise<string[]>;
  fetchDetails(ids: readonly string[]): Promise<Record[]>;
}

export type ClinicalRecord = {
  caseId: string;
  patientId: string | null;
  treatmentNumber: number | null;
  daysToTreatmentStart: number | null;
  fields: Readonly<Record<string, CellValue>>;
};

export type ClinicalTable = readonly ClinicalRecord[];
