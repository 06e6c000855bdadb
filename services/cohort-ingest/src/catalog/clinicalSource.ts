import type { Logger } from '@cohortforge/shared';
import { describeError } from '../errors';
import { flattenClinicalCases } from '../metadata/clinical';
import { RNA_SEQ_COUNTS_FILTER } from '../metadata/gdcClient';
import type { GdcCase, GdcCohortFilter } from '../metadata/gdcClient';
import type { ClinicalTable, MetadataService } from '../metadata/types';

export type ClinicalService = MetadataService<GdcCohortFilter, GdcCase>;

/**
 * Best-effort clinical table load. Any failure is logged and yields an
 * empty table.
 */
export async function loadClinicalTable(
  service: ClinicalService | null,
  cohortId: string,
  logger: Logger
): Promise<ClinicalTable> {
  if (!service) {
    return [];
  }
  try {
    const caseIds = await service.search({ projectId: cohortId, ...RNA_SEQ_COUNTS_FILTER });
    const cases = await service.fetchDetails(caseIds);
    const table = flattenClinicalCases(cases);
    logger.info(
      { cohortId, cases: cases.length, records: table.length },
      'Loaded clinical table'
    );
    return table;
  } catch (error) {
    logger.warn({ cohortId, err: describeError(error) }, 'Clinical table unavailable; continuing without it');
    return [];
  }
}
