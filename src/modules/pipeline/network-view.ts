import type Database from 'better-sqlite3';
import { getLogger } from '../../utils/logger.js';
import { aggregateBills } from '../aggregate/aggregator.js';
import {
  buildEdgeBundlingHierarchy,
  buildNetwork,
  buildTimeline,
  DEFAULT_MIN_CONNECTIONS,
  type EdgeBundlingHierarchy,
  type NetworkGraph,
  type Timeline,
} from '../aggregate/network.js';
import { BillResolver } from '../aggregate/resolve.js';
import type { BillSource } from '../bills/types.js';
import { createBillModel } from '../state/models/bills.js';
import { createLegislatorModel } from '../state/models/legislators.js';

export type NetworkViewKind = 'force' | 'edge-bundling';

export interface NetworkView extends NetworkGraph {
  source: BillSource;
  session: number;
  view: NetworkViewKind;
  /** Present for the edge-bundling view */
  hierarchy?: EdgeBundlingHierarchy;
}

export interface TimelineView extends Timeline {
  source: BillSource;
  session: number;
}

export interface NetworkViewOptions {
  minConnections?: number;
  view?: NetworkViewKind;
}

const ROOT_NAMES: Record<BillSource, string> = {
  state: 'Illinois GA',
  national: 'Congress',
};

/**
 * Co-sponsorship network over the stored bills and members of one session.
 * Links are re-resolved from storage, so no feed is contacted.
 */
export function buildNetworkView(
  db: Database.Database,
  source: BillSource,
  session: number,
  opts: NetworkViewOptions = {},
): NetworkView {
  const members = createLegislatorModel(db).getBySession(source, session);
  if (members.length === 0) {
    throw new Error(`No stored members for ${source} session ${session}. Run a build first.`);
  }
  const bills = createBillModel(db).getBySession(source, session);
  const { links } = aggregateBills(bills, new BillResolver(members));

  const view = opts.view ?? 'force';
  const graph = buildNetwork(links, opts.minConnections ?? DEFAULT_MIN_CONNECTIONS);
  getLogger().debug(
    { source, session, view, bills: bills.length, nodes: graph.nodes.length, links: graph.links.length },
    'Built network view',
  );

  return {
    source,
    session,
    view,
    ...graph,
    ...(view === 'edge-bundling'
      ? { hierarchy: buildEdgeBundlingHierarchy(graph.nodes, graph.links, ROOT_NAMES[source]) }
      : {}),
  };
}

export function buildTimelineView(db: Database.Database, source: BillSource, session: number): TimelineView {
  return { source, session, ...buildTimeline(createBillModel(db).getBySession(source, session)) };
}
