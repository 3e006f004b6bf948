import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { BillRecord, Legislator } from '../bills/types.js';
import { openDb } from '../state/db.js';
import { createBillModel } from '../state/models/bills.js';
import { createLegislatorModel } from '../state/models/legislators.js';
import { buildNetworkView, buildTimelineView } from './network-view.js';

function member(id: string, displayName: string, party: string): Legislator {
  return { id, displayName, firstName: null, lastName: null, party, chamber: 'house', stateOrDistrict: '1', session: 104 };
}

function stateBill(billNumber: number, sponsorId: string, chiefs: string[], overrides: Partial<BillRecord> = {}): BillRecord {
  return {
    billId: `104-hb-${billNumber}`,
    source: 'state',
    session: 104,
    billType: 'hb',
    billNumber,
    chamber: 'house',
    title: null,
    primarySponsorName: null,
    primarySponsorId: sponsorId,
    chiefCoSponsorNames: chiefs,
    coSponsorNames: [],
    cosponsors: [],
    enactment: null,
    filedDate: null,
    enactedDate: null,
    latestActionDate: null,
    latestActionText: null,
    ...overrides,
  };
}

let db: Database.Database;

beforeEach(() => {
  db = openDb(':memory:');
  createLegislatorModel(db).upsertMany('state', [
    member('104-house-1', 'Alice Adams', 'D'),
    member('104-house-2', 'Bob Brown', 'R'),
  ]);
  createBillModel(db).upsertMany([
    stateBill(1, '104-house-1', ['Bob Brown'], { filedDate: '1/9/2025' }),
    stateBill(2, '104-house-2', ['Alice Adams'], {
      filedDate: '1/15/2025',
      enactment: { lawType: 'public', lawNumber: '104-0007' },
      enactedDate: '7/1/2025',
    }),
  ]);
});

afterEach(() => {
  db.close();
});

describe('buildNetworkView', () => {
  it('builds the edge-bundling view with its hierarchy from stored bills', () => {
    const view = buildNetworkView(db, 'state', 104, { minConnections: 1, view: 'edge-bundling' });

    expect(view.view).toBe('edge-bundling');
    expect(view.nodes).toHaveLength(2);
    expect(view.links).toEqual([{ source: '104-house-1', target: '104-house-2', value: 2 }]);
    expect(view.hierarchy?.name).toBe('Illinois GA');
    expect(view.hierarchy?.children[0]?.children.map(p => p.children.map(l => l.id))).toEqual([
      ['104-house-1'],
      ['104-house-2'],
    ]);
  });

  it('leaves the hierarchy out of the force view and applies the threshold', () => {
    const view = buildNetworkView(db, 'state', 104, { minConnections: 3 });

    expect(view.view).toBe('force');
    expect(view.hierarchy).toBeUndefined();
    expect(view).toMatchObject({ nodes: [], links: [], minConnections: 3 });
  });

  it('needs stored members', () => {
    expect(() => buildNetworkView(db, 'state', 103)).toThrow('No stored members for state session 103');
  });
});

describe('buildTimelineView', () => {
  it('counts stored filings and enactments by month', () => {
    expect(buildTimelineView(db, 'state', 104)).toEqual({
      source: 'state',
      session: 104,
      months: ['2025-01', '2025-07'],
      filed: [2, 0],
      enacted: [0, 1],
    });
  });
});
