// USASpending.gov adapter
// Obligations for every tracked CFDA in the current federal fiscal year (no API key).
import { z } from 'zod';
import { BaseSourceAdapter, asText, type AdapterContext, type Search } from './base';
import type { RawItem, ScanQuery } from '../types/adapter';
import { fiscalYear, fiscalYearBounds } from '../utils/dates';

const FIELDS = [
  'Award ID', 'Recipient Name', 'Award Amount', 'Total Obligation',
  'Awarding Agency', 'Start Date', 'End Date', 'Description'
];

const amount = z.union([z.number(), z.string()]).nullish();

const awardSchema = z.object({
  internal_id: z.union([z.number(), z.string()]).nullish(),
  generated_internal_id: z.string().nullish(),
  'Award ID': z.string().nullish(),
  'Recipient Name': z.string().nullish(),
  'Award Amount': amount,
  'Total Obligation': amount,
  'Awarding Agency': z.string().nullish(),
  'Start Date': z.string().nullish(),
  'End Date': z.string().nullish(),
  Description: z.string().nullish()
});

const responseSchema = z.object({
  results: z.array(awardSchema).default([]),
  page_metadata: z
    .object({
      page: z.number().optional(),
      hasNext: z.boolean().default(false)
    })
    .optional()
});

export type SpendingAward = z.infer<typeof awardSchema>;

function toAmount(value: SpendingAward['Award Amount']): number {
  if (value === null || value === undefined || value === '') return 0;
  const parsed = typeof value === 'number' ? value : Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

export function normalizeAward(award: SpendingAward, cfda: string, programId: string, fy: number): RawItem | null {
  const internalId = asText(award.internal_id) || asText(award.generated_internal_id);
  if (!internalId) return null;

  const obligated = toAmount(award['Award Amount']) || toAmount(award['Total Obligation']);
  const recipient = asText(award['Recipient Name']);
  const awardId = asText(award['Award ID']) || cfda;
  const fyLabel = `FY${fy % 100}`;

  return {
    source: 'usaspending',
    external_id: `usa_${cfda}_${internalId}`,
    title: `${fyLabel} Obligation: ${awardId} - ${recipient}`,
    published_date: asText(award['Start Date']),
    payload: {
      abstract: asText(award.Description),
      url: `https://www.usaspending.gov/award/${asText(award.generated_internal_id) || internalId}`,
      document_type: 'obligation',
      agencies: [asText(award['Awarding Agency'])].filter(Boolean),
      award_amount: obligated,
      end_date: asText(award['End Date']),
      cfda,
      cfda_program_match: programId,
      recipient,
      fiscal_year: fy
    }
  };
}

export class USASpendingAdapter extends BaseSourceAdapter<'usaspending'> {
  constructor(context: AdapterContext<'usaspending'>) {
    super('usaspending', context);
  }

  protected searches(query: ScanQuery): Search[] {
    const fy = fiscalYear(this.now());
    return Object.entries(query.programs).map(([cfda, programId]) => ({
      label: `cfda:${cfda}`,
      run: (signal) => this.paginate(cfda, programId, fy, signal)
    }));
  }

  private async *paginate(
    cfda: string,
    programId: string,
    fy: number,
    signal?: AbortSignal
  ): AsyncGenerator<RawItem[], void, undefined> {
    const { start, end } = fiscalYearBounds(fy);

    for (let page = 1; ; page++) {
      const response = await this.request({
        method: 'POST',
        url: `${this.config.baseUrl}/search/spending_by_award/`,
        body: {
          filters: {
            time_period: [{ start_date: start, end_date: end }],
            award_type_codes: this.config.awardTypeCodes,
            program_numbers: [cfda]
          },
          fields: FIELDS,
          subawards: false,
          page,
          limit: this.config.pageSize,
          sort: 'Award Amount',
          order: 'desc'
        }
      }, responseSchema, signal);

      yield this.identified(
        response.results.map((award) => normalizeAward(award, cfda, programId, fy)),
        `cfda:${cfda}`
      );

      if (!response.page_metadata?.hasNext || response.results.length === 0) break;
      if (this.reachedPageCeiling(page, `cfda:${cfda}`)) break;
    }
  }
}
