import { describe, expect, it } from 'vitest';
import type { BillRecord, Chamber, Legislator } from '../bills/types.js';
import type { CosponsorLink } from './bipartisan.js';
import {
  buildEdgeBundlingHierarchy,
  buildNetwork,
  buildTimeline,
  monthKey,
  type EdgeBundlingHierarchy,
  type NetworkNode,
} from './network.js';

function member(id: string, displayName: string, party: string, chamber: Chamber): Legislator {
  return {
    id,
    displayName,
    firstName: null,
    lastName: null,
    party,
    chamber,
    stateOrDistrict: id.split('-')[2] ?? '',
    session: 104,
  };
}

const alice = member('104-house-1', 'Alice Adams', 'D', 'house');
const bob = member('104-house-2', 'Bob Brown', 'R', 'house');
const carol = member('104-senate-3', 'Carol Clark', 'D', 'senate');

function times(cosponsor: Legislator, sponsor: Legislator, n: number): CosponsorLink[] {
  return Array.from({ length: n }, () => ({ cosponsor, sponsor }));
}

function leafIds(hierarchy: EdgeBundlingHierarchy): string[] {
  return hierarchy.children.flatMap(chamber => chamber.children.flatMap(party => party.children.map(leaf => leaf.id)));
}

describe('buildNetwork', () => {
  it('weights each pair in both directions and drops weak pairs', () => {
    const graph = buildNetwork(
      [...times(bob, alice, 2), ...times(alice, bob, 2), ...times(carol, alice, 1), ...times(alice, alice, 5)],
      2,
    );

    expect(graph.links).toEqual([{ source: '104-house-1', target: '104-house-2', value: 4 }]);
    expect(graph.nodes).toEqual([
      { id: '104-house-1', name: 'Alice Adams', party: 'D', chamber: 'house', district: '1' },
      { id: '104-house-2', name: 'Bob Brown', party: 'R', chamber: 'house', district: '2' },
    ]);
    expect(graph.minConnections).toBe(2);
  });

  it('defaults to three connections', () => {
    const graph = buildNetwork([...times(bob, alice, 3), ...times(carol, alice, 2)]);
    expect(graph.links.map(l => [l.source, l.target, l.value])).toEqual([['104-house-1', '104-house-2', 3]]);
    expect(graph.nodes.map(n => n.id)).not.toContain('104-senate-3');
  });

  it('orders links by weight, then by ids', () => {
    const graph = buildNetwork([...times(carol, alice, 1), ...times(bob, carol, 2), ...times(bob, alice, 1)], 1);
    expect(graph.links.map(l => [l.source, l.target, l.value])).toEqual([
      ['104-house-2', '104-senate-3', 2],
      ['104-house-1', '104-house-2', 1],
      ['104-house-1', '104-senate-3', 1],
    ]);
  });
});

describe('buildEdgeBundlingHierarchy', () => {
  const nodes: NetworkNode[] = [alice, bob, carol].map(l => ({
    id: l.id,
    name: l.displayName,
    party: l.party,
    chamber: l.chamber,
    district: l.stateOrDistrict,
  }));
  const links = [
    { source: '104-house-1', target: '104-house-2', value: 4 },
    { source: '104-house-1', target: '104-senate-3', value: 2 },
  ];

  it('groups members by chamber and party', () => {
    const hierarchy = buildEdgeBundlingHierarchy(nodes, links, 'Illinois GA');

    expect(hierarchy.name).toBe('Illinois GA');
    expect(new Set(leafIds(hierarchy))).toEqual(new Set(['104-house-1', '104-house-2', '104-senate-3']));
    expect(hierarchy.children.map(c => [c.key, c.children.map(p => p.key)])).toEqual([
      ['house', ['D', 'R']],
      ['senate', ['D']],
    ]);
  });

  it('keeps each leaf’s connections for routing', () => {
    const hierarchy = buildEdgeBundlingHierarchy(nodes, links, 'Illinois GA');
    const house = hierarchy.children.find(c => c.key === 'house');
    const democrats = house?.children.find(p => p.key === 'D');
    const leaf = democrats?.children.find(m => m.id === '104-house-1');

    expect(leaf?.connectionIds).toEqual(['104-house-2', '104-senate-3']);
    expect(hierarchy.children[1]?.children[0]?.children[0]?.connectionIds).toEqual(['104-house-1']);
  });

  it('files members without chamber or party under unknown', () => {
    const hierarchy = buildEdgeBundlingHierarchy([{ id: 'X1', name: 'X', party: '', chamber: null, district: '' }], [], 'Congress');
    expect(hierarchy.children).toEqual([
      {
        key: 'unknown',
        name: 'Unknown',
        children: [
          {
            key: 'unknown',
            name: 'Unknown',
            children: [{ id: 'X1', name: 'X', party: '', chamber: null, district: '', connectionIds: [] }],
          },
        ],
      },
    ]);
  });
});

describe('monthKey', () => {
  it('reads both date styles', () => {
    expect(monthKey('1/9/2023')).toBe('2023-01');
    expect(monthKey('12/31/2024')).toBe('2024-12');
    expect(monthKey('2025-03-01')).toBe('2025-03');
    expect(monthKey('2025-03-01T12:00:00Z')).toBe('2025-03');
    expect(monthKey('March 2025')).toBeNull();
    expect(monthKey(null)).toBeNull();
  });
});

describe('buildTimeline', () => {
  function bill(billNumber: number, overrides: Partial<BillRecord>): BillRecord {
    return {
      billId: `104-hb-${billNumber}`,
      source: 'state',
      session: 104,
      billType: 'hb',
      billNumber,
      chamber: 'house',
      title: null,
      primarySponsorName: null,
      primarySponsorId: null,
      chiefCoSponsorNames: [],
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

  it('counts filings and enactments per month', () => {
    const timeline = buildTimeline([
      bill(1, { filedDate: '1/9/2025', enactment: { lawType: 'public', lawNumber: '104-0001' }, enactedDate: '6/30/2025' }),
      bill(2, { filedDate: '1/20/2025' }),
      bill(3, { filedDate: '2/3/2025' }),
      // An enactment date without a law does not count
      bill(4, { enactedDate: '6/1/2025' }),
    ]);

    expect(timeline).toEqual({
      months: ['2025-01', '2025-02', '2025-06'],
      filed: [2, 1, 0],
      enacted: [0, 0, 1],
    });
  });

  it('is empty without dates', () => {
    expect(buildTimeline([bill(1, {})])).toEqual({ months: [], filed: [], enacted: [] });
  });
});
