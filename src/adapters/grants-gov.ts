// Grants.gov adapter
// Open and forecasted opportunities via the search2 API (no API key).
// Queried per tracked CFDA number and per search term.
import { z } from 'zod';
import { BaseSourceAdapter, asText, type AdapterContext, type Search } from './base';
import type { RawItem, ScanQuery } from '../types/adapter';
import { usDay } from '../utils/dates';

const opportunitySchema = z.object({
  id: z.union([z.string(), z.number()]),
  number: z.string().nullish(),
  title: z.string().nullish(),
  agencyCode: z.string().nullish(),
  agency: z.string().nullish(),
  openDate: z.string().nullish(),
  closeDate: z.string().nullish(),
  oppStatus: z.string().nullish(),
  docType: z.string().nullish(),
  synopsis: z.string().nullish(),
  awardCeiling: z.union([z.string(), z.number()]).nullish(),
  awardFloor: z.union([z.string(), z.number()]).nullish(),
  eligibleApplicants: z.union([z.string(), z.array(z.string())]).nullish(),
  alnist: z.array(z.string()).nullish()
});

const responseSchema = z
  .object({
    errorcode: z.number().optional(),
    msg: z.string().optional(),
    data: z
      .object({
        hitCount: z.number().default(0),
        startRecord: z.number().optional(),
        oppHits: z.array(opportunitySchema).default([])
      })
      .optional()
  })
  .refine((response) => !response.errorcode, (response) => ({
    message: `Grants.gov errorcode ${response.errorcode}: ${response.msg ?? 'no message'}`
  }));

export type GrantsGovOpportunity = z.infer<typeof opportunitySchema>;

export interface CfdaMatch {
  cfda: string;
  programId: string;
}

export function normalizeOpportunity(
  opp: GrantsGovOpportunity,
  tribalEligibilityCodes: string[],
  match?: CfdaMatch
): RawItem | null {
  const id = asText(opp.id);
  if (!id) return null;
  const eligibility = typeof opp.eligibleApplicants === 'string'
    ? [opp.eligibleApplicants]
    : opp.eligibleApplicants ?? [];
  const tribalEligible = eligibility.some((code) => tribalEligibilityCodes.includes(code));

  const payload: Record<string, unknown> = {
    opportunity_number: asText(opp.number),
    abstract: asText(opp.synopsis),
    url: `https://www.grants.gov/search-results-detail/${id}`,
    close_date: asText(opp.closeDate),
    status: asText(opp.oppStatus),
    document_type: 'grant_opportunity',
    agencies: [asText(opp.agencyCode)].filter(Boolean),
    award_ceiling: asText(opp.awardCeiling),
    award_floor: asText(opp.awardFloor),
    eligibility_codes: eligibility,
    tribal_eligible: tribalEligible
  };

  if (match) {
    payload.cfda = match.cfda;
    payload.cfda_program_match = match.programId;
  } else if (tribalEligible) {
    // Eligibility alone is enough to keep a keyword hit in scope downstream
    payload.tribal_eligibility_override = true;
  }

  return {
    source: 'grants_gov',
    external_id: id,
    title: asText(opp.title),
    published_date: asText(opp.openDate),
    payload
  };
}

export class GrantsGovAdapter extends BaseSourceAdapter<'grants_gov'> {
  constructor(context: AdapterContext<'grants_gov'>) {
    super('grants_gov', context);
  }

  protected searches(query: ScanQuery): Search[] {
    const byProgram: Search[] = Object.entries(query.programs).map(([cfda, programId]) => ({
      label: `cfda:${cfda}`,
      program: cfda,
      run: (signal) => this.paginate(`cfda:${cfda}`, { aln: cfda }, { cfda, programId }, signal)
    }));

    const postedFrom = usDay(query.windowStart);
    const byKeyword: Search[] = query.terms.map((term) => ({
      label: `term:${term}`,
      run: (signal) => this.paginate(`term:${term}`, { keyword: term, postedFrom }, undefined, signal)
    }));

    return [...byProgram, ...byKeyword];
  }

  private async *paginate(
    label: string,
    criteria: Record<string, string>,
    match: CfdaMatch | undefined,
    signal?: AbortSignal
  ): AsyncGenerator<RawItem[], void, undefined> {
    const rows = this.config.pageSize;

    for (let page = 1; ; page++) {
      const startRecordNum = (page - 1) * rows;
      const response = await this.request({
        method: 'POST',
        url: `${this.config.baseUrl}/v1/api/search2`,
        body: {
          ...criteria,
          oppStatuses: this.config.opportunityStatuses,
          sortBy: 'openDate|desc',
          rows,
          startRecordNum
        }
      }, responseSchema, signal);

      const hits = response.data?.oppHits ?? [];
      const hitCount = response.data?.hitCount ?? 0;
      yield this.identified(
        hits.map((opp) => normalizeOpportunity(opp, this.config.tribalEligibilityCodes, match)),
        label
      );

      if (hits.length === 0 || startRecordNum + hits.length >= hitCount) break;
      if (this.reachedPageCeiling(page, label)) break;
    }
  }
}
