import type { BillRecord, Chamber, Legislator } from '../bills/types.js';
import type { CosponsorLink } from './bipartisan.js';

export const DEFAULT_MIN_CONNECTIONS = 3;

export interface NetworkNode {
  id: string;
  name: string;
  party: string;
  chamber: Chamber | null;
  district: string;
}

/** Undirected: `source` sorts before `target`. */
export interface NetworkLink {
  source: string;
  target: string;
  value: number;
}

export interface NetworkGraph {
  nodes: NetworkNode[];
  links: NetworkLink[];
  minConnections: number;
}

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function toNode(legislator: Legislator): NetworkNode {
  return {
    id: legislator.id,
    name: legislator.displayName,
    party: legislator.party,
    chamber: legislator.chamber,
    district: legislator.stateOrDistrict,
  };
}

/**
 * Co-sponsorship graph between members. Every link of the aggregate adds one
 * to the pair's weight regardless of direction. Pairs below `minConnections`
 * are dropped, and so are members left without a pair.
 */
export function buildNetwork(
  links: readonly CosponsorLink[],
  minConnections: number = DEFAULT_MIN_CONNECTIONS,
): NetworkGraph {
  const pairs = new Map<string, NetworkLink>();
  const members = new Map<string, Legislator>();

  for (const { cosponsor, sponsor } of links) {
    if (cosponsor.id === sponsor.id) continue;
    const [source, target] = compareIds(cosponsor.id, sponsor.id) < 0 ? [cosponsor, sponsor] : [sponsor, cosponsor];
    const key = `${source.id}\u0000${target.id}`;
    const pair = pairs.get(key);
    if (pair) pair.value += 1;
    else pairs.set(key, { source: source.id, target: target.id, value: 1 });
    members.set(source.id, source);
    members.set(target.id, target);
  }

  const kept = [...pairs.values()]
    .filter(link => link.value >= minConnections)
    .sort((a, b) => b.value - a.value || compareIds(a.source, b.source) || compareIds(a.target, b.target));

  const active = new Set(kept.flatMap(link => [link.source, link.target]));
  const nodes = [...members.values()]
    .filter(member => active.has(member.id))
    .map(toNode)
    .sort((a, b) => a.name.localeCompare(b.name) || compareIds(a.id, b.id));

  return { nodes, links: kept, minConnections };
}

// ─── Edge bundling ────────────────────────────────────────────────────────

export interface HierarchyLeaf extends NetworkNode {
  /** Ids this member shares a kept link with, sorted */
  connectionIds: string[];
}

export interface PartyGroup {
  key: string;
  name: string;
  children: HierarchyLeaf[];
}

export interface ChamberGroup {
  key: string;
  name: string;
  children: PartyGroup[];
}

export interface EdgeBundlingHierarchy {
  name: string;
  children: ChamberGroup[];
}

const CHAMBER_ORDER = ['house', 'senate', 'unknown'];
const CHAMBER_NAMES: Record<string, string> = { house: 'House', senate: 'Senate', unknown: 'Unknown' };

/**
 * Chamber → party → member tree for hierarchical edge bundling. Leaves keep
 * their neighbours so a renderer can route each link through the tree.
 */
export function buildEdgeBundlingHierarchy(
  nodes: readonly NetworkNode[],
  links: readonly NetworkLink[],
  rootName: string,
): EdgeBundlingHierarchy {
  const neighbours = new Map<string, Set<string>>();
  const connect = (from: string, to: string) => {
    const set = neighbours.get(from) ?? new Set<string>();
    set.add(to);
    neighbours.set(from, set);
  };
  for (const link of links) {
    connect(link.source, link.target);
    connect(link.target, link.source);
  }

  const chambers = new Map<string, Map<string, HierarchyLeaf[]>>();
  for (const node of nodes) {
    const chamberKey = node.chamber ?? 'unknown';
    const partyKey = node.party || 'unknown';
    const parties = chambers.get(chamberKey) ?? new Map<string, HierarchyLeaf[]>();
    const leaves = parties.get(partyKey) ?? [];
    leaves.push({ ...node, connectionIds: [...(neighbours.get(node.id) ?? [])].sort(compareIds) });
    parties.set(partyKey, leaves);
    chambers.set(chamberKey, parties);
  }

  const children = [...chambers.entries()]
    .sort(([a], [b]) => CHAMBER_ORDER.indexOf(a) - CHAMBER_ORDER.indexOf(b))
    .map(([key, parties]): ChamberGroup => ({
      key,
      name: CHAMBER_NAMES[key] ?? key,
      children: [...parties.entries()]
        .sort(([a], [b]) => compareIds(a, b))
        .map(([partyKey, leaves]) => ({
          key: partyKey,
          name: partyKey === 'unknown' ? 'Unknown' : partyKey,
          children: leaves.sort((a, b) => a.name.localeCompare(b.name) || compareIds(a.id, b.id)),
        })),
    }));

  return { name: rootName, children };
}

// ─── Timeline ─────────────────────────────────────────────────────────────

export interface Timeline {
  months: string[];
  filed: number[];
  enacted: number[];
}

/** `M/D/YYYY` or `YYYY-MM-DD...` → `YYYY-MM`; null for anything else. */
export function monthKey(date: string | null): string | null {
  if (!date) return null;
  const iso = /^(\d{4})-(\d{2})/.exec(date.trim());
  if (iso) return `${iso[1]}-${iso[2]}`;
  const us = /^(\d{1,2})\/\d{1,2}\/(\d{4})$/.exec(date.trim());
  if (us?.[1]) return `${us[2]}-${us[1].padStart(2, '0')}`;
  return null;
}

/** Bills filed and laws enacted per calendar month, months ascending. */
export function buildTimeline(bills: readonly BillRecord[]): Timeline {
  const filed = new Map<string, number>();
  const enacted = new Map<string, number>();

  for (const bill of bills) {
    const filedMonth = monthKey(bill.filedDate);
    if (filedMonth) filed.set(filedMonth, (filed.get(filedMonth) ?? 0) + 1);
    const enactedMonth = bill.enactment ? monthKey(bill.enactedDate) : null;
    if (enactedMonth) enacted.set(enactedMonth, (enacted.get(enactedMonth) ?? 0) + 1);
  }

  const months = [...new Set([...filed.keys(), ...enacted.keys()])].sort();
  return {
    months,
    filed: months.map(m => filed.get(m) ?? 0),
    enacted: months.map(m => enacted.get(m) ?? 0),
  };
}
