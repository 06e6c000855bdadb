import { z } from 'zod';
import { fetchJson } from './http';
import type { HttpOptions } from './http';
import type { MetadataService } from './types';

export const DEFAULT_EUTILS_BASE_URL = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';

export type GeoSeriesFilter = {
  platform?: string;
  instrumentKeywords?: readonly string[];
  gdsType?: string;
  organism?: string;
  retmax?: number;
};

export type GeoSeriesRecord = {
  uid: string;
  accession: string;
  title: string;
  organism: string;
  platform: string;
  gdsType: string;
  samples: number;
  summary: string;
};

const esearchSchema = z.object({
  esearchresult: z.object({
    idlist: z.array(z.string()).default([])
  })
});

const summaryEntrySchema = z
  .object({
    acc: z.string().default(''),
    title: z.string().default(''),
    taxon: z.string().default(''),
    gpl: z.string().default(''),
    platform: z.string().optional(),
    gdstype: z.string().optional(),
    gdsType: z.string().optional(),
    n_samples: z.union([z.number(), z.string()]).optional(),
    samples: z.union([z.number(), z.string(), z.array(z.unknown())]).optional(),
    summary: z.string().default('')
  })
  .passthrough();

const esummarySchema = z.object({
  result: z.record(z.unknown()).default({})
});

function countSamples(entry: z.infer<typeof summaryEntrySchema>): number {
  const raw = entry.n_samples ?? entry.samples;
  if (Array.isArray(raw)) {
    return raw.length;
  }
  const parsed = Number(raw ?? 0);
  return Number.isFinite(parsed) ? parsed : 0;
}

function quote(value: string): string {
  return `"${value.replace(/"/g, '')}"`;
}

export function buildSearchTerm(filter: GeoSeriesFilter): string {
  const clauses: string[] = [];
  if (filter.platform) {
    clauses.push(`${quote(filter.platform)}[Platform]`);
  }
  const keywords = (filter.instrumentKeywords ?? []).filter((keyword) => keyword.trim().length > 0);
  if (keywords.length > 0) {
    clauses.push(`(${keywords.map((keyword) => `${quote(keyword)}[All Fields]`).join(' OR ')})`);
  }
  if (filter.gdsType) {
    clauses.push(`${quote(filter.gdsType)}[gdsType]`);
  }
  if (filter.organism) {
    clauses.push(`${quote(filter.organism)}[Organism]`);
  }
  if (clauses.length === 0) {
    throw new Error('At least one search clause is required');
  }
  return clauses.join(' AND ');
}

export type GeoSeriesSearchOptions = HttpOptions & {
  baseUrl?: string;
};

export class GeoSeriesSearch implements MetadataService<GeoSeriesFilter, GeoSeriesRecord> {
  private readonly baseUrl: string;
  private readonly http: HttpOptions;

  constructor(options: GeoSeriesSearchOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_EUTILS_BASE_URL).replace(/\/+$/, '');
    this.http = { fetchTimeoutMs: options.fetchTimeoutMs ?? 30_000, userAgent: options.userAgent };
  }

  async search(filter: GeoSeriesFilter): Promise<string[]> {
    const url = new URL(`${this.baseUrl}/esearch.fcgi`);
    url.searchParams.set('db', 'gds');
    url.searchParams.set('term', buildSearchTerm(filter));
    url.searchParams.set('retmax', String(filter.retmax ?? 100));
    url.searchParams.set('retmode', 'json');
    const payload = await fetchJson(url.toString(), esearchSchema, { method: 'GET' }, this.http);
    return payload.esearchresult.idlist;
  }

  async fetchDetails(ids: readonly string[]): Promise<GeoSeriesRecord[]> {
    if (ids.length === 0) {
      return [];
    }
    const url = new URL(`${this.baseUrl}/esummary.fcgi`);
    url.searchParams.set('db', 'gds');
    url.searchParams.set('id', ids.join(','));
    url.searchParams.set('retmode', 'json');
    const payload = await fetchJson(url.toString(), esummarySchema, { method: 'GET' }, this.http);

    const records: GeoSeriesRecord[] = [];
    for (const uid of ids) {
      const parsed = summaryEntrySchema.safeParse(payload.result[uid]);
      if (!parsed.success) {
        continue;
      }
      const entry = parsed.data;
      records.push({
        uid,
        accession: entry.acc,
        title: entry.title,
        organism: entry.taxon,
        platform: entry.platform ?? (entry.gpl ? `GPL${entry.gpl}` : ''),
        gdsType: entry.gdsType ?? entry.gdstype ?? '',
        samples: countSamples(entry),
        summary: entry.summary
      });
    }
    return records;
  }
}
