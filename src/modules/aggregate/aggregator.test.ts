import { describe, expect, it } from 'vitest';
import type { BillRecord, Enactment, Legislator, StructuredCosponsor } from '../bills/types.js';
import { UnmatchedLog } from '../names/matcher.js';
import { aggregateBills } from './aggregator.js';
import { mergeBills } from './merge.js';
import { BillResolver } from './resolve.js';

function member(id: string, displayName: string, party: string): Legislator {
  return {
    id,
    displayName,
    firstName: null,
    lastName: null,
    party,
    chamber: 'house',
    stateOrDistrict: 'NY',
    session: 119,
  };
}

function cosponsor(id: string, flags: Partial<StructuredCosponsor> = {}): StructuredCosponsor {
  return { id, name: null, party: null, state: null, chamber: null, isOriginal: false, withdrawn: false, ...flags };
}

function nationalBill(
  number: number,
  sponsorId: string,
  cosponsors: StructuredCosponsor[],
  enactment: Enactment | null = null,
): BillRecord {
  return {
    billId: `119-hr-${number}`,
    source: 'national',
    session: 119,
    billType: 'hr',
    billNumber: number,
    chamber: 'house',
    title: null,
    primarySponsorName: null,
    primarySponsorId: sponsorId,
    chiefCoSponsorNames: [],
    coSponsorNames: [],
    cosponsors,
    enactment,
    filedDate: null,
    enactedDate: null,
    latestActionDate: null,
    latestActionText: null,
  };
}

const members = [
  member('A', 'Alice Adams', 'D'),
  member('B', 'Bob Brown', 'R'),
  member('C', 'Carol Clark', 'R'),
  member('D', 'Dan Davis', 'R'),
];

// A sponsors 2 bills co-sponsored by B; C sponsors 9, 8 co-sponsored by D and 1 by B
const scenario: BillRecord[] = [
  nationalBill(1, 'A', [cosponsor('B', { isOriginal: true })]),
  nationalBill(2, 'A', [cosponsor('B')]),
  ...[3, 4, 5, 6, 7, 8, 9, 10].map(n => nationalBill(n, 'C', [cosponsor('D')])),
  nationalBill(11, 'C', [cosponsor('B')], { lawType: 'public', lawNumber: '119-5' }),
];

describe('aggregateBills', () => {
  it('tallies sponsorship, co-sponsorship and laws per legislator', () => {
    const result = aggregateBills(scenario, new BillResolver(members));

    expect(result.rows.map(r => [r.legislatorId, r.sponsoredTotal, r.coSponsorTotal])).toEqual([
      ['C', 9, 0],
      ['A', 2, 0],
      ['B', 0, 3],
      ['D', 0, 8],
    ]);

    const byId = new Map(result.rows.map(r => [r.legislatorId, r]));
    expect(byId.get('B')).toMatchObject({
      originalCoSponsorTotal: 1,
      crossPartyCosponsorTotal: 2,
      samePartyCosponsorTotal: 1,
      bipartisanScoreRaw: 66.7,
      bipartisanScore: 36.4,
    });
    expect(byId.get('D')).toMatchObject({ bipartisanScoreRaw: 0, bipartisanScore: 7 });
    expect(byId.get('C')).toMatchObject({
      primarySponsorTotal: 9,
      enactedTotal: 1,
      publicLawCount: 1,
      privateLawCount: 0,
      lawNumbers: ['119-5'],
      bipartisanScoreRaw: null,
    });

    expect(result.laws).toEqual([{ billId: '119-hr-11', lawType: 'public', lawNumber: '119-5', sponsorId: 'C' }]);
    expect(result.unmatchedSponsors).toBe(0);
    expect(result.unmatchedCoSponsors).toBe(0);
  });

  it('skips every tally of a bill whose sponsor does not resolve', () => {
    const result = aggregateBills([nationalBill(1, 'ZZZ', [cosponsor('B')])], new BillResolver(members));

    expect(result.rows).toEqual([]);
    expect(result.unmatchedSponsors).toBe(1);
    expect(result.bills[0]?.primarySponsorId).toBe('ZZZ');
  });

  it('never counts the sponsor or a repeated co-sponsor twice', () => {
    const bill = nationalBill(1, 'A', [cosponsor('A'), cosponsor('B'), cosponsor('B', { isOriginal: true })]);
    const result = aggregateBills([bill], new BillResolver(members));
    const byId = new Map(result.rows.map(r => [r.legislatorId, r]));

    expect(byId.get('A')).toMatchObject({ sponsoredTotal: 1, coSponsorTotal: 0 });
    expect(byId.get('B')).toMatchObject({ coSponsorTotal: 1, originalCoSponsorTotal: 0 });
  });

  it('drops withdrawn co-sponsors and reports unknown ones', () => {
    const log = new UnmatchedLog();
    const bill = nationalBill(1, 'A', [cosponsor('D', { withdrawn: true }), cosponsor('Q')]);
    const result = aggregateBills([bill], new BillResolver(members), log);

    expect(result.rows.map(r => r.legislatorId)).toEqual(['A']);
    expect(result.unmatchedCoSponsors).toBe(1);
    expect(log.entries).toEqual([{ rawName: 'Q', chamberHint: 'house', normalizedKey: 'Q' }]);
  });

  it('resolves state bills by name and records the sponsor id', () => {
    const state: Legislator[] = [
      { ...member('103-house-1', 'Ann Lee', 'D'), session: 103 },
      { ...member('103-house-2', 'Thomas J. Weber', 'R'), session: 103 },
      { ...member('103-senate-1', 'Kim Park', 'D'), chamber: 'senate', session: 103 },
    ];
    const bill: BillRecord = {
      ...nationalBill(1, '', []),
      billId: '103-hb-1',
      source: 'state',
      session: 103,
      billType: 'hb',
      primarySponsorId: null,
      primarySponsorName: 'Ann Lee',
      chiefCoSponsorNames: ['Sen. Kim Park'],
      coSponsorNames: ['Tom Weber', 'Ghost Person'],
    };
    const log = new UnmatchedLog();
    const result = aggregateBills([bill], new BillResolver(state), log);
    const byId = new Map(result.rows.map(r => [r.legislatorId, r]));

    expect(byId.get('103-house-1')?.sponsoredTotal).toBe(1);
    expect(byId.get('103-senate-1')).toMatchObject({
      chiefCoSponsorTotal: 1,
      samePartyCosponsorTotal: 1,
      bipartisanScoreRaw: 0,
    });
    expect(byId.get('103-house-2')).toMatchObject({ coSponsorTotal: 1, bipartisanScoreRaw: 100 });
    expect(result.bills[0]?.primarySponsorId).toBe('103-house-1');
    expect(result.unmatchedCoSponsors).toBe(1);
    expect(log.entries).toEqual([{ rawName: 'Ghost Person', chamberHint: 'house', normalizedKey: 'ghost person' }]);
  });

  it('counts a chief co-sponsor listed again under another spelling only once', () => {
    const state: Legislator[] = [
      { ...member('103-house-1', 'Ann Lee', 'D'), session: 103 },
      { ...member('103-senate-1', 'Kim Park', 'D'), chamber: 'senate', session: 103 },
    ];
    const bill: BillRecord = {
      ...nationalBill(1, '', []),
      billId: '103-hb-1',
      source: 'state',
      session: 103,
      billType: 'hb',
      primarySponsorId: null,
      primarySponsorName: 'Ann Lee',
      chiefCoSponsorNames: ['Sen. Kim Park'],
      // Resolves to the same senator through the unique last name
      coSponsorNames: ['Kimberly Park'],
    };
    const result = aggregateBills([bill], new BillResolver(state));
    const byId = new Map(result.rows.map(r => [r.legislatorId, r]));

    expect(byId.get('103-senate-1')).toMatchObject({
      chiefCoSponsorTotal: 1,
      coSponsorTotal: 0,
      samePartyCosponsorTotal: 1,
      crossPartyCosponsorTotal: 0,
    });
    expect(result.links.map(l => [l.cosponsor.id, l.sponsor.id])).toEqual([['103-senate-1', '103-house-1']]);
  });

  it('gives the same result after an incremental merge as a full run', () => {
    const stored = scenario.slice(0, 10);
    const added = scenario[10];
    if (!added) throw new Error('scenario is missing its last bill');
    const resolver = new BillResolver(members);

    // A re-delivered bill plus one new bill on top of the stored set
    const { merged, deduped } = mergeBills([stored, [stored[0] ?? added, added]]);
    expect(deduped).toBe(1);

    expect(aggregateBills(merged, resolver)).toEqual(aggregateBills(scenario, resolver));
  });
});
