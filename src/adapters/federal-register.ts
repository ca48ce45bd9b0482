// Federal Register adapter
// Proposed rules, final rules, notices and presidential documents (no API key)
import { z } from 'zod';
import { BaseSourceAdapter, asText, type AdapterContext, type Search } from './base';
import type { RawItem, ScanQuery } from '../types/adapter';
import type { QueryValue } from '../utils/httpClient';
import { isoDay } from '../utils/dates';

const FIELDS = [
  'title', 'abstract', 'document_number', 'type',
  'publication_date', 'agencies', 'html_url', 'pdf_url',
  'action', 'dates', 'cfr_references', 'regulation_id_numbers'
];

const idLike = z.union([z.string(), z.number()]);

const documentSchema = z.object({
  document_number: z.string().nullish(),
  title: z.string().nullish(),
  abstract: z.string().nullish(),
  type: z.string().nullish(),
  publication_date: z.string().nullish(),
  html_url: z.string().nullish(),
  pdf_url: z.string().nullish(),
  action: z.string().nullish(),
  dates: z.string().nullish(),
  agencies: z.array(z.object({ id: z.number().nullish(), name: z.string().nullish() })).nullish(),
  cfr_references: z.array(z.object({ title: idLike.nullish(), part: idLike.nullish() })).nullish(),
  regulation_id_numbers: z.array(z.string()).nullish()
});

const responseSchema = z.object({
  count: z.number().optional(),
  total_pages: z.number().optional(),
  next_page_url: z.string().nullish(),
  results: z.array(documentSchema).default([])
});

export type FederalRegisterDocument = z.infer<typeof documentSchema>;

export function normalizeDocument(doc: FederalRegisterDocument): RawItem | null {
  const documentNumber = asText(doc.document_number);
  if (!documentNumber) return null;
  const agencies = doc.agencies ?? [];
  const cfrCitations = (doc.cfr_references ?? [])
    .filter((ref) => asText(ref.title) && asText(ref.part))
    .map((ref) => `${asText(ref.title)} CFR ${asText(ref.part)}`);

  return {
    source: 'federal_register',
    external_id: documentNumber,
    title: asText(doc.title),
    published_date: asText(doc.publication_date),
    payload: {
      abstract: asText(doc.abstract),
      url: asText(doc.html_url),
      pdf_url: asText(doc.pdf_url),
      document_type: asText(doc.type),
      agencies: agencies.map((agency) => asText(agency.name)).filter(Boolean),
      agency_ids: agencies.map((agency) => agency.id ?? 0),
      action: asText(doc.action),
      dates: asText(doc.dates),
      cfr_references: cfrCitations,
      regulation_ids: doc.regulation_id_numbers ?? []
    }
  };
}

export class FederalRegisterAdapter extends BaseSourceAdapter<'federal_register'> {
  constructor(context: AdapterContext<'federal_register'>) {
    super('federal_register', context);
  }

  protected searches(query: ScanQuery): Search[] {
    const since = isoDay(query.windowStart);
    const searches: Search[] = query.terms.map((term) => ({
      label: `term:${term}`,
      run: (signal) => this.paginate(`term:${term}`, {
        'conditions[term]': term,
        'conditions[publication_date][gte]': since,
        'conditions[type][]': this.config.documentTypes
      }, signal)
    }));

    // Agency sweep catches documents whose wording misses the search terms
    if (this.config.agencyIds.length > 0) {
      searches.push({
        label: 'agency-sweep',
        run: (signal) => this.paginate('agency-sweep', {
          'conditions[term]': this.config.agencySweepTerm,
          'conditions[agency_ids][]': this.config.agencyIds,
          'conditions[publication_date][gte]': since,
          'conditions[type][]': this.config.documentTypes.filter((type) => type !== 'PRESDOCU')
        }, signal)
      });
    }

    return searches;
  }

  private async *paginate(
    label: string,
    conditions: Record<string, QueryValue>,
    signal?: AbortSignal
  ): AsyncGenerator<RawItem[], void, undefined> {
    for (let page = 1; ; page++) {
      const response = await this.request({
        method: 'GET',
        url: `${this.config.baseUrl}/documents.json`,
        query: {
          ...conditions,
          per_page: this.config.pageSize,
          page,
          order: 'newest',
          'fields[]': FIELDS
        }
      }, responseSchema, signal);

      yield this.identified(response.results.map(normalizeDocument), label);

      if (!response.next_page_url || response.results.length === 0) break;
      if (this.reachedPageCeiling(page, label)) break;
    }
  }
}
