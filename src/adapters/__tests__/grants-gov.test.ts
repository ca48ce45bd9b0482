/**
 * Tests for the Grants.gov adapter
 */

import { normalizeOpportunity, type GrantsGovOpportunity } from '../grants-gov';
import { PartialSourceError } from '../base';
import { failure, success } from '../../types/outcome';
import { buildAdapter, collect, query } from './helpers';

const hit = (id: number, extra: Partial<GrantsGovOpportunity> = {}): GrantsGovOpportunity => ({
  id,
  number: `OPP-${id}`,
  title: `Opportunity ${id}`,
  agencyCode: 'DOI-BIA',
  openDate: '05/20/2025',
  closeDate: '08/01/2025',
  ...extra
});

const response = (hitCount: number, oppHits: unknown[]) => success({ errorcode: 0, msg: 'Webservice Succeeds', data: { hitCount, oppHits } });

const cfdaQuery = { ...query, terms: [], programs: { '15.156': 'bia_tcr' } };

describe('normalizeOpportunity', () => {
  it('records the CFDA match for program searches', () => {
    const item = normalizeOpportunity(hit(101, { eligibleApplicants: ['07', '25'] }), ['06', '07', '11'], {
      cfda: '15.156',
      programId: 'bia_tcr'
    });

    expect(item).toMatchObject({
      source: 'grants_gov',
      external_id: '101',
      title: 'Opportunity 101',
      published_date: '05/20/2025',
      payload: {
        opportunity_number: 'OPP-101',
        url: 'https://www.grants.gov/search-results-detail/101',
        close_date: '08/01/2025',
        agencies: ['DOI-BIA'],
        eligibility_codes: ['07', '25'],
        tribal_eligible: true,
        cfda: '15.156',
        cfda_program_match: 'bia_tcr'
      }
    });
  });

  it('flags tribal eligibility on keyword hits without a CFDA', () => {
    const item = normalizeOpportunity(hit(7, { eligibleApplicants: '11' }), ['06', '07', '11']);

    expect(item?.payload.cfda).toBeUndefined();
    expect(item?.payload.tribal_eligible).toBe(true);
    expect(item?.payload.tribal_eligibility_override).toBe(true);
  });

  it('leaves ineligible keyword hits unflagged', () => {
    const item = normalizeOpportunity(hit(8, { eligibleApplicants: ['25'] }), ['06', '07', '11']);

    expect(item?.payload.tribal_eligible).toBe(false);
    expect(item?.payload.tribal_eligibility_override).toBeUndefined();
  });

  it('returns null for an opportunity without an id', () => {
    expect(normalizeOpportunity(hit(1, { id: '' }), ['07'])).toBeNull();
    expect(normalizeOpportunity(hit(1, { id: '   ' }), ['07'])).toBeNull();
  });
});

describe('GrantsGovAdapter', () => {
  it('searches each tracked CFDA and pages by startRecordNum', async () => {
    const { adapter, http } = buildAdapter('grants_gov', (_request, call) =>
      call === 1 ? response(3, [hit(1), hit(2)]) : response(3, [hit(3)])
    );

    const items = await adapter.fetchAll(cfdaQuery);

    expect(items.map((item) => item.external_id)).toEqual(['1', '2', '3']);
    expect(items.every((item) => item.payload.cfda === '15.156')).toBe(true);
    expect(http.requests.map((request) => request.body)).toEqual([
      { aln: '15.156', oppStatuses: 'forecasted|posted', sortBy: 'openDate|desc', rows: 2, startRecordNum: 0 },
      { aln: '15.156', oppStatuses: 'forecasted|posted', sortBy: 'openDate|desc', rows: 2, startRecordNum: 2 }
    ]);
    expect(http.requests[0]).toMatchObject({ method: 'POST', url: 'https://grants.example.test/v1/api/search2' });
  });

  it('limits keyword searches to the scan window', async () => {
    const { adapter, http } = buildAdapter('grants_gov', () => response(0, []));

    const items = await adapter.fetchAll(query);

    expect(items).toEqual([]);
    expect(http.requests).toHaveLength(1);
    expect(http.requests[0]?.body).toMatchObject({ keyword: 'tribal consultation', postedFrom: '05/18/2025' });
  });

  it('treats a non-zero errorcode as a failed search', async () => {
    const { adapter } = buildAdapter('grants_gov', () =>
      success({ errorcode: 1, msg: 'Invalid request', data: { hitCount: 0, oppHits: [] } })
    );

    const { error } = await collect(adapter.fetchPages(cfdaQuery));

    expect(error).toBeInstanceOf(PartialSourceError);
    if (error instanceof PartialSourceError) {
      expect(error.failures[0]?.error).toContain('Grants.gov errorcode 1: Invalid request');
    }
  });

  it('skips hits without an id and keeps the rest of the page', async () => {
    const { adapter } = buildAdapter('grants_gov', () => response(2, [hit(4), { id: '', title: 'Untitled' }]));

    const items = await adapter.fetchAll(cfdaQuery);

    expect(items.map((item) => item.external_id)).toEqual(['4']);
  });

  it('reports result counts of completed program searches', async () => {
    const { adapter } = buildAdapter('grants_gov', (_request, call) => {
      if (call === 1) return response(3, [hit(1), hit(2), hit(3)]);
      if (call === 2) return response(0, []);
      return response(1, [hit(1)]);
    });

    await adapter.fetchAll({ ...query, programs: { '15.156': 'bia_tcr', '15.020': 'bia_aid' } });

    expect(adapter.programResults?.()).toEqual([
      { program: '15.156', results: 3 },
      { program: '15.020', results: 0 }
    ]);
  });

  it('leaves failed program searches out of the result counts', async () => {
    const { adapter } = buildAdapter('grants_gov', (_request, call) =>
      call === 1 ? failure(new Error('HTTP 400'), false, 400) : response(1, [hit(5)])
    );

    const { error } = await collect(adapter.fetchPages({ ...cfdaQuery, programs: { '15.156': 'bia_tcr', '15.020': 'bia_aid' } }));

    expect(error).toBeInstanceOf(PartialSourceError);
    expect(adapter.programResults?.()).toEqual([{ program: '15.020', results: 1 }]);
  });
});
