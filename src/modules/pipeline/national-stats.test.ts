import type Database from 'better-sqlite3';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { JsonObject } from '../bills/national.js';
import type { LawType, StructuredMember } from '../bills/types.js';
import { openDb } from '../state/db.js';
import { createBillModel } from '../state/models/bills.js';
import { createLegislatorModel } from '../state/models/legislators.js';
import { buildNationalStats, congressYears, type NationalFeed } from './national-stats.js';

function fakeFeed(bills: JsonObject[], laws: Partial<Record<LawType, JsonObject[]>> = {}) {
  return {
    listBills: vi.fn(async (_congress: number) => bills),
    listLaws: vi.fn(async (_congress: number, lawType: LawType) => laws[lawType] ?? []),
    fetchBillItem: vi.fn(async (_path: string): Promise<unknown> => {
      throw new Error('503 Service Unavailable');
    }),
    fetchCosponsors: vi.fn(async (_path: string): Promise<unknown[]> => [{ bioguideId: 'S1', party: 'D' }]),
    fetchMember: vi.fn(async (_bioguideId: string): Promise<StructuredMember | null> => null),
  } satisfies NationalFeed;
}

const HR1: JsonObject = {
  type: 'HR',
  number: '1',
  originChamber: 'House',
  latestAction: { actionDate: '2025-03-01', text: 'Became Public Law No: 119-3.' },
  sponsor: { bioguideId: 'S1', fullName: 'Rep. Ann Lee', party: 'D', state: 'NY' },
  cosponsors: [{ bioguideId: 'C1', fullName: 'Rep. Tom Weber', party: 'R', state: 'TX', isOriginalCosponsor: true }],
};

const HR2: JsonObject = {
  type: 'HR',
  number: '2',
  originChamber: 'House',
  latestAction: { actionDate: '2025-02-01', text: 'Referred to committee.' },
  sponsor: { bioguideId: 'C1', fullName: 'Rep. Tom Weber', party: 'R', state: 'TX' },
  cosponsors: { count: 1 },
};

// No sponsor in the list item, and the item endpoint fails
const S3: JsonObject = { type: 'S', number: '3', originChamber: 'Senate' };

const PUBLIC_LAWS: JsonObject[] = [{ type: 'HR', number: '1', laws: [{ number: '119-3', type: 'Public Law' }] }];

let db: Database.Database;

beforeEach(() => {
  db = openDb(':memory:');
});

afterEach(() => {
  db.close();
});

describe('congressYears', () => {
  it('maps a congress to its two calendar years', () => {
    expect(congressYears(119)).toBe('2025-2026');
    expect(congressYears(118)).toBe('2023-2024');
  });
});

describe('buildNationalStats', () => {
  it('collects bills, counts laws and survives a failed fetch', async () => {
    const feed = fakeFeed([HR1, HR2, S3], { public: PUBLIC_LAWS });

    const report = await buildNationalStats(feed, db, { congress: 119, incremental: false, concurrency: 2 });

    expect(report.rows.map(r => [r.legislatorId, r.sponsoredTotal, r.coSponsorTotal, r.originalCoSponsorTotal])).toEqual([
      ['S1', 1, 1, 0],
      ['C1', 1, 1, 1],
    ]);
    expect(report.rows[0]).toMatchObject({ displayName: 'Rep. Ann Lee', enactedTotal: 1, lawNumbers: ['119-3'] });
    expect(report.summary).toEqual({
      totalLegislators: 2,
      totalBills: 2,
      totalLaws: 1,
      publicLaws: 1,
      privateLaws: 0,
      newBills: 2,
      refreshedBills: 0,
      dedupedBills: 0,
      failedBills: 1,
    });
    expect(report.years).toBe('2025-2026');
    expect(feed.fetchCosponsors).toHaveBeenCalledTimes(1);
    expect(feed.fetchCosponsors).toHaveBeenCalledWith('/bill/119/hr/2');
    expect(createLegislatorModel(db).count('national', 119)).toBe(2);
    expect(createBillModel(db).count('national', 119)).toBe(2);
  });

  it('skips enacted and unchanged bills on an incremental run', async () => {
    await buildNationalStats(fakeFeed([HR1, HR2], { public: PUBLIC_LAWS }), db, {
      congress: 119,
      incremental: false,
      concurrency: 1,
    });

    const HR4: JsonObject = {
      type: 'HR',
      number: '4',
      originChamber: 'House',
      latestAction: { actionDate: '2025-04-02', text: 'Introduced in House' },
      sponsor: { bioguideId: 'S1', fullName: 'Rep. Ann Lee', party: 'D', state: 'NY' },
      cosponsors: { count: 0 },
    };
    const moved: JsonObject = { ...HR2, latestAction: { actionDate: '2025-04-01', text: 'Reported by committee.' } };
    const feed = fakeFeed([HR1, moved, HR4], { public: PUBLIC_LAWS });

    const report = await buildNationalStats(feed, db, { congress: 119, incremental: true, concurrency: 1 });

    expect(feed.fetchCosponsors.mock.calls).toEqual([['/bill/119/hr/2']]);
    expect(report.summary).toMatchObject({
      totalBills: 3,
      newBills: 1,
      refreshedBills: 1,
      dedupedBills: 1,
      failedBills: 0,
    });
    expect(report.rows.map(r => [r.legislatorId, r.sponsoredTotal, r.coSponsorTotal])).toEqual([
      ['S1', 2, 1],
      ['C1', 1, 1],
    ]);
  });

  it('applies a law to a stored bill without fetching it again', async () => {
    await buildNationalStats(fakeFeed([HR1, HR2], { public: PUBLIC_LAWS }), db, {
      congress: 119,
      incremental: false,
      concurrency: 1,
    });

    const feed = fakeFeed([HR1, HR2], {
      public: PUBLIC_LAWS,
      private: [{ bill: { type: 'HR', number: 2 }, lawNumber: '119-7' }],
    });
    const report = await buildNationalStats(feed, db, { congress: 119, incremental: true, concurrency: 1 });

    expect(feed.fetchCosponsors).not.toHaveBeenCalled();
    expect(report.summary).toMatchObject({ totalLaws: 2, publicLaws: 1, privateLaws: 1, newBills: 0 });
    const hr2 = createBillModel(db)
      .getBySession('national', 119)
      .find(b => b.billId === '119-hr-2');
    expect(hr2?.enactment).toEqual({ lawType: 'private', lawNumber: '119-7' });
  });

  it('fills missing member details from the member endpoint before scoring', async () => {
    const HR7: JsonObject = {
      type: 'HR',
      number: '7',
      originChamber: 'House',
      latestAction: { actionDate: '2025-05-01', text: 'Referred to committee.' },
      sponsor: { bioguideId: 'S1', fullName: 'Rep. Ann Lee', party: 'D', state: 'NY' },
      cosponsors: [
        { bioguideId: 'C9', fullName: 'Rep. Max Roe' },
        { bioguideId: 'C8', fullName: 'Rep. Ida Cole' },
      ],
    };
    const feed = fakeFeed([HR7]);
    feed.fetchMember.mockImplementation(async bioguideId => {
      if (bioguideId === 'C8') throw new Error('Congress.gov API 503: /member/C8');
      return { id: bioguideId, name: 'Max Roe', party: 'R', state: 'OH', chamber: 'house' };
    });

    const report = await buildNationalStats(feed, db, { congress: 119, incremental: false, concurrency: 1 });

    expect(feed.fetchMember.mock.calls).toEqual([['C9'], ['C8']]);
    const byId = new Map(report.rows.map(r => [r.legislatorId, r]));
    expect(byId.get('C9')).toMatchObject({
      displayName: 'Rep. Max Roe',
      party: 'R',
      stateOrDistrict: 'OH',
      crossPartyCosponsorTotal: 1,
      bipartisanScoreRaw: 100,
    });
    // A failed lookup leaves the party blank, so the link is not scored
    expect(byId.get('C8')).toMatchObject({ party: '', coSponsorTotal: 1, crossPartyCosponsorTotal: 0, bipartisanScoreRaw: null });
    expect(report.summary.failedBills).toBe(0);
    expect(
      createLegislatorModel(db)
        .getBySession('national', 119)
        .find(l => l.id === 'C9')?.party,
    ).toBe('R');
  });

  describe('with bulk bill status files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'national-bulk-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('takes sponsor and co-sponsors from the bulk document', async () => {
      await fs.writeFile(
        path.join(dir, 'BILLSTATUS-119hr5.xml'),
        `<billStatus><bill>
          <number>5</number><type>HR</type><originChamber>House</originChamber><congress>119</congress>
          <sponsors><item><bioguideId>S1</bioguideId><fullName>Rep. Ann Lee</fullName><party>D</party></item></sponsors>
          <cosponsors><item><bioguideId>C1</bioguideId><fullName>Rep. Tom Weber</fullName><party>R</party></item></cosponsors>
        </bill></billStatus>`,
      );
      const feed = fakeFeed([{ type: 'HR', number: '5', originChamber: 'House' }]);

      const report = await buildNationalStats(feed, db, {
        congress: 119,
        incremental: false,
        concurrency: 1,
        bulkDir: dir,
      });

      expect(feed.fetchBillItem).not.toHaveBeenCalled();
      expect(feed.fetchCosponsors).not.toHaveBeenCalled();
      expect(report.rows.map(r => [r.legislatorId, r.sponsoredTotal, r.coSponsorTotal])).toEqual([
        ['S1', 1, 0],
        ['C1', 0, 1],
      ]);
    });
  });
});
