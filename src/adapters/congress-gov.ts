// Congress.gov adapter
// Bills and resolutions; requires a free API key (CONGRESS_API_KEY).
import { z } from 'zod';
import { BaseSourceAdapter, asText, type AdapterContext, type Search } from './base';
import type { RawItem, ScanQuery } from '../types/adapter';
import { isoDay } from '../utils/dates';

const billSchema = z.object({
  congress: z.union([z.number(), z.string()]),
  type: z.string(),
  number: z.union([z.string(), z.number()]),
  title: z.string().nullish(),
  updateDate: z.string().nullish(),
  url: z.string().nullish(),
  originChamber: z.string().nullish(),
  latestAction: z
    .object({
      actionDate: z.string().nullish(),
      text: z.string().nullish()
    })
    .nullish()
});

const responseSchema = z.object({
  bills: z.array(billSchema).default([]),
  pagination: z
    .object({
      count: z.number().optional(),
      next: z.string().nullish()
    })
    .optional()
});

export type CongressBill = z.infer<typeof billSchema>;

export function billExternalId(bill: Pick<CongressBill, 'congress' | 'type' | 'number'>): string {
  return `${asText(bill.congress)}-${bill.type.toLowerCase()}-${asText(bill.number)}`;
}

export function normalizeBill(bill: CongressBill): RawItem {
  const congress = asText(bill.congress);
  const type = bill.type.toLowerCase();
  const number = asText(bill.number);

  return {
    source: 'congress_gov',
    external_id: billExternalId(bill),
    title: asText(bill.title),
    published_date: asText(bill.updateDate),
    payload: {
      abstract: asText(bill.latestAction?.text),
      url: `https://www.congress.gov/bill/${congress}th-congress/${type}/${number}`,
      api_url: asText(bill.url),
      document_type: `${bill.type.toUpperCase()} ${number}`,
      congress,
      bill_type: type,
      bill_number: number,
      origin_chamber: asText(bill.originChamber),
      latest_action: asText(bill.latestAction?.text),
      latest_action_date: asText(bill.latestAction?.actionDate)
    }
  };
}

export class CongressGovAdapter extends BaseSourceAdapter<'congress_gov'> {
  constructor(context: AdapterContext<'congress_gov'>) {
    super('congress_gov', context);
  }

  protected searches(query: ScanQuery): Search[] {
    const fromDateTime = `${isoDay(query.windowStart)}T00:00:00Z`;
    const congress = this.config.congress;

    const targeted: Search[] = this.config.legislativeQueries.map(({ term, billType }) => ({
      label: `${billType}:${term}`,
      run: (signal) => this.paginate(`${billType}:${term}`, `/bill/${congress}/${billType}`, term, fromDateTime, signal)
    }));

    const broad: Search[] = query.terms.map((term) => ({
      label: `term:${term}`,
      run: (signal) => this.paginate(`term:${term}`, '/bill', term, fromDateTime, signal)
    }));

    return [...targeted, ...broad];
  }

  private async *paginate(
    label: string,
    path: string,
    term: string,
    fromDateTime: string,
    signal?: AbortSignal
  ): AsyncGenerator<RawItem[], void, undefined> {
    const limit = this.config.pageSize;

    for (let page = 1; ; page++) {
      const response = await this.request({
        method: 'GET',
        url: `${this.config.baseUrl}${path}`,
        query: {
          format: 'json',
          query: term,
          fromDateTime,
          sort: 'updateDate+desc',
          limit,
          offset: (page - 1) * limit
        },
        headers: { 'X-Api-Key': this.context.credential ?? '' }
      }, responseSchema, signal);

      yield response.bills.map(normalizeBill);

      if (!response.pagination?.next || response.bills.length === 0) break;
      if (this.reachedPageCeiling(page, label)) break;
    }
  }
}
