import { z } from 'zod';
import { fetchBuffer, fetchJson } from './http';
import type { HttpOptions } from './http';
import type { MetadataService } from './types';

export const RNA_SEQ_COUNTS_FILTER = {
  dataCategory: 'Transcriptome Profiling',
  dataType: 'Gene Expression Quantification',
  experimentalStrategy: 'RNA-Seq',
  workflowType: 'STAR - Counts'
} as const;

export const CLINICAL_FIELDS = [
  'case_id',
  'submitter_id',
  'demographic.gender',
  'demographic.race',
  'demographic.ethnicity',
  'demographic.vital_status',
  'demographic.days_to_birth',
  'demographic.days_to_death',
  'diagnoses.age_at_diagnosis',
  'diagnoses.primary_diagnosis',
  'diagnoses.tumor_stage',
  'diagnoses.tissue_or_organ_of_origin',
  'diagnoses.days_to_last_follow_up',
  'exposures.cigarettes_per_day',
  'exposures.pack_years_smoked',
  'exposures.years_smoked',
  'treatments.treatment_type',
  'treatments.therapeutic_agents',
  'treatments.days_to_treatment_start',
  'treatments.days_to_treatment_end',
  'treatments.treatment_outcome'
];

const PAGE_SIZE = 10_000;
// Case ids per POST /cases body.
const DETAILS_BATCH_SIZE = 500;

export type GdcCohortFilter = {
  projectId: string;
  dataCategory?: string;
  dataType?: string;
  experimentalStrategy?: string;
  workflowType?: string;
};

type GdcFilterClause = {
  op: '=' | 'in';
  content: { field: string; value: string[] };
};

export type GdcFilter = { op: 'and'; content: GdcFilterClause[] };

const nullableNumber = z.number().nullable().optional();
const nullableString = z.string().nullable().optional();

const treatmentSchema = z
  .object({
    treatment_type: nullableString,
    therapeutic_agents: nullableString,
    days_to_treatment_start: nullableNumber,
    days_to_treatment_end: nullableNumber,
    treatment_outcome: nullableString
  })
  .passthrough();

export const gdcCaseSchema = z
  .object({
    case_id: z.string(),
    submitter_id: nullableString,
    demographic: z
      .object({
        gender: nullableString,
        race: nullableString,
        ethnicity: nullableString,
        vital_status: nullableString,
        days_to_birth: nullableNumber,
        days_to_death: nullableNumber
      })
      .passthrough()
      .nullable()
      .optional(),
    diagnoses: z
      .array(
        z
          .object({
            age_at_diagnosis: nullableNumber,
            primary_diagnosis: nullableString,
            tumor_stage: nullableString,
            tissue_or_organ_of_origin: nullableString,
            days_to_last_follow_up: nullableNumber,
            treatments: z.array(treatmentSchema).optional()
          })
          .passthrough()
      )
      .optional(),
    exposures: z
      .array(
        z
          .object({
            cigarettes_per_day: nullableNumber,
            pack_years_smoked: nullableNumber,
            years_smoked: nullableNumber
          })
          .passthrough()
      )
      .optional(),
    treatments: z.array(treatmentSchema).optional()
  })
  .passthrough();

export type GdcCase = z.infer<typeof gdcCaseSchema>;
export type GdcTreatment = z.infer<typeof treatmentSchema>;

export const gdcFileSchema = z
  .object({
    file_id: z.string(),
    file_name: z.string(),
    file_size: z.number().nullable().optional(),
    cases: z.array(z.object({ submitter_id: nullableString, project: z.object({ project_id: z.string() }).optional() })).optional()
  })
  .passthrough();

export type GdcFile = z.infer<typeof gdcFileSchema>;

function hitsEnvelope<T extends z.ZodTypeAny>(hit: T) {
  return z.object({
    data: z.object({
      hits: z.array(hit)
    })
  });
}

const caseIdEnvelope = hitsEnvelope(z.object({ case_id: z.string() }).passthrough());
const caseEnvelope = hitsEnvelope(gdcCaseSchema);
const fileEnvelope = hitsEnvelope(gdcFileSchema);

function clause(field: string, value: string | readonly string[]): GdcFilterClause {
  const values = typeof value === 'string' ? [value] : [...value];
  return { op: values.length > 1 ? 'in' : '=', content: { field, value: values } };
}

/**
 * Structured cohort filter for the `/cases` or `/files` endpoint. File-level
 * fields carry a `files.` prefix when querying cases.
 */
export function buildCohortFilter(filter: GdcCohortFilter, target: 'cases' | 'files'): GdcFilter {
  const filePrefix = target === 'cases' ? 'files.' : '';
  const projectField = target === 'cases' ? 'project.project_id' : 'cases.project.project_id';
  const content: GdcFilterClause[] = [clause(projectField, filter.projectId)];
  if (filter.dataCategory) {
    content.push(clause(`${filePrefix}data_category`, filter.dataCategory));
  }
  if (filter.dataType) {
    content.push(clause(`${filePrefix}data_type`, filter.dataType));
  }
  if (filter.experimentalStrategy) {
    content.push(clause(`${filePrefix}experimental_strategy`, filter.experimentalStrategy));
  }
  if (filter.workflowType) {
    content.push(clause(`${filePrefix}analysis.workflow_type`, filter.workflowType));
  }
  return { op: 'and', content };
}

export type GdcClientOptions = HttpOptions & {
  baseUrl: string;
};

export class GdcClient implements MetadataService<GdcCohortFilter, GdcCase> {
  private readonly baseUrl: string;
  private readonly http: HttpOptions;

  constructor(options: GdcClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.http = { fetchTimeoutMs: options.fetchTimeoutMs, userAgent: options.userAgent };
  }

  private buildUrl(endpoint: string, params: Record<string, string>): string {
    const url = new URL(`${this.baseUrl}/${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  async search(filter: GdcCohortFilter): Promise<string[]> {
    const url = this.buildUrl('cases', {
      filters: JSON.stringify(buildCohortFilter(filter, 'cases')),
      fields: 'case_id',
      format: 'JSON',
      size: String(PAGE_SIZE)
    });
    const envelope = await fetchJson(url, caseIdEnvelope, { method: 'GET' }, this.http);
    return envelope.data.hits.map((hit) => hit.case_id);
  }

  /**
   * Case documents for the given ids. The id filter goes in a POST body, in
   * batches, since a large cohort overflows a GET request line.
   */
  async fetchDetails(ids: readonly string[]): Promise<GdcCase[]> {
    const cases: GdcCase[] = [];
    for (let start = 0; start < ids.length; start += DETAILS_BATCH_SIZE) {
      const batch = ids.slice(start, start + DETAILS_BATCH_SIZE);
      const body = JSON.stringify({
        filters: { op: 'and', content: [clause('case_id', batch)] },
        fields: CLINICAL_FIELDS.join(','),
        format: 'JSON',
        size: String(batch.length)
      });
      const envelope = await fetchJson(
        `${this.baseUrl}/cases`,
        caseEnvelope,
        { method: 'POST', headers: { 'content-type': 'application/json' }, body },
        this.http
      );
      cases.push(...envelope.data.hits);
    }
    return cases;
  }

  async listFiles(filter: GdcCohortFilter): Promise<GdcFile[]> {
    const url = this.buildUrl('files', {
      filters: JSON.stringify(buildCohortFilter(filter, 'files')),
      fields: 'file_id,file_name,file_size,cases.submitter_id,cases.project.project_id',
      format: 'JSON',
      size: String(PAGE_SIZE)
    });
    const envelope = await fetchJson(url, fileEnvelope, { method: 'GET' }, this.http);
    return envelope.data.hits;
  }

  async downloadFile(fileId: string): Promise<Buffer> {
    return fetchBuffer(`${this.baseUrl}/data/${encodeURIComponent(fileId)}`, this.http);
  }
}
