import type Database from 'better-sqlite3';
import { getLogger } from '../../utils/logger.js';
import { runWithConcurrency } from '../../utils/async-queue.js';
import { aggregateBills } from '../aggregate/aggregator.js';
import { diffRefreshed, mergeBills, selectPendingBills } from '../aggregate/merge.js';
import { BillResolver, buildMemberDirectory, fillMemberGaps, hasMemberGaps } from '../aggregate/resolve.js';
import { loadBulkBillStatus, type BillStatusDocument } from '../bills/bill-status-xml.js';
import {
  buildLawLookup,
  collectNationalBill,
  latestAction,
  nationalBillId,
  type JsonObject,
  type NationalDetailSource,
} from '../bills/national.js';
import type { BillRecord, Chamber, Enactment, LawType, StructuredMember } from '../bills/types.js';
import { UnmatchedLog } from '../names/matcher.js';
import { createBillModel } from '../state/models/bills.js';
import { createLawModel } from '../state/models/laws.js';
import { createLegislatorModel } from '../state/models/legislators.js';
import { createStatsCacheModel } from '../state/models/stats-cache.js';
import { buildReport, type StatsReport } from './report.js';

/** What the national build needs from Congress.gov. `CongressApi` is the live one. */
export interface NationalFeed extends NationalDetailSource {
  listBills(congress: number): Promise<JsonObject[]>;
  listLaws(congress: number, lawType: LawType): Promise<JsonObject[]>;
  /** `/member/{bioguideId}`; null when the member is unknown */
  fetchMember(bioguideId: string): Promise<StructuredMember | null>;
}

export interface NationalStatsOptions {
  congress: number;
  incremental: boolean;
  concurrency: number;
  /** Directory of Bill Status bulk XML; bills found there skip the detail endpoints */
  bulkDir?: string | null;
  onProgress?: (done: number, total: number) => void;
}

interface MemberSighting {
  id: string;
  name: string | null;
  party: string | null;
  state: string | null;
  chamber: Chamber | null;
}

/** 119 → "2025-2026" */
export function congressYears(congress: number): string {
  const start = 1787 + congress * 2;
  return `${start}-${start + 1}`;
}

type Planned =
  | { kind: 'bulk'; doc: BillStatusDocument; refresh: boolean }
  | { kind: 'api'; item: JsonObject; refresh: boolean };

export async function buildNationalStats(
  feed: NationalFeed,
  db: Database.Database,
  opts: NationalStatsOptions,
): Promise<StatsReport> {
  const log = getLogger();
  const { congress } = opts;
  const legislatorModel = createLegislatorModel(db);
  const billModel = createBillModel(db);

  // ─── Laws and bulk documents ──────────────────────────────────────────
  const [publicLaws, privateLaws] = await Promise.all([
    feed.listLaws(congress, 'public'),
    feed.listLaws(congress, 'private'),
  ]);
  const lawLookup = buildLawLookup(congress, [
    ...publicLaws.map(item => ({ lawType: 'public' as const, item })),
    ...privateLaws.map(item => ({ lawType: 'private' as const, item })),
  ]);

  const bulk = opts.bulkDir
    ? await loadBulkBillStatus(congress, opts.bulkDir, opts.concurrency)
    : new Map<string, BillStatusDocument>();

  // ─── Plan ─────────────────────────────────────────────────────────────
  const listItems = await feed.listBills(congress);
  const stored = opts.incremental ? billModel.getBySession('national', congress) : [];
  const storedById = new Map(stored.map(b => [b.billId, b]));
  const pending = selectPendingBills(stored);

  // Stored bills enacted since the last run pick up their law from the lookup
  const lawUpdated: BillRecord[] = [];
  const storedWithLaws = stored.map(bill => {
    const enactment = bill.enactment ?? lawLookup.get(bill.billId) ?? null;
    if (enactment === bill.enactment) return bill;
    const updated = { ...bill, enactment, enactedDate: bill.enactedDate ?? bill.latestActionDate };
    lawUpdated.push(updated);
    return updated;
  });

  const planned: Planned[] = [];
  for (const item of listItems) {
    const id = nationalBillId(congress, item);
    if (!id) continue;
    const previous = storedById.get(id);
    if (previous) {
      if (previous.enactment !== null) continue;
      if ((latestAction(item).date ?? '') === (previous.latestActionDate ?? '')) continue;
    }
    const refresh = previous !== undefined;
    const doc = bulk.get(id);
    planned.push(doc?.sponsor ? { kind: 'bulk', doc, refresh } : { kind: 'api', item, refresh });
  }

  log.info(
    {
      congress,
      listed: listItems.length,
      stored: stored.length,
      planned: planned.length,
      fromBulk: planned.filter(p => p.kind === 'bulk').length,
    },
    'Planning national fetch',
  );

  // ─── Collect ──────────────────────────────────────────────────────────
  let failedBills = 0;
  const collected = await runWithConcurrency(
    planned,
    async (plan): Promise<{ refresh: boolean; record: BillRecord; sightings: MemberSighting[] } | null> => {
      if (plan.kind === 'bulk') {
        const { record, sponsor } = plan.doc;
        const enactment: Enactment | null = record.enactment ?? lawLookup.get(record.billId) ?? null;
        const enactedDate = enactment ? (record.enactedDate ?? record.latestActionDate) : null;
        return {
          refresh: plan.refresh,
          record: { ...record, enactment, enactedDate },
          sightings: sponsor ? [sponsor, ...record.cosponsors] : record.cosponsors,
        };
      }
      try {
        const bill = await collectNationalBill(congress, plan.item, feed, lawLookup);
        if (!bill) return null;
        return {
          refresh: plan.refresh,
          record: bill.record,
          sightings: bill.sponsor ? [bill.sponsor, ...bill.record.cosponsors] : bill.record.cosponsors,
        };
      } catch (err) {
        failedBills++;
        log.warn({ congress, bill: nationalBillId(congress, plan.item), err }, 'Failed to collect bill');
        return null;
      }
    },
    { concurrency: opts.concurrency, onProgress: opts.onProgress },
  );

  const fresh: BillRecord[] = [];
  const refetched: BillRecord[] = [];
  const sightings: MemberSighting[] = [];
  for (const entry of collected) {
    if (!entry) continue;
    (entry.refresh ? refetched : fresh).push(entry.record);
    sightings.push(...entry.sightings);
  }
  const refreshed = diffRefreshed(pending, refetched);

  // ─── Member directory ─────────────────────────────────────────────────
  for (const bill of stored) sightings.push(...bill.cosponsors);
  for (const legislator of legislatorModel.getBySession('national', congress)) {
    sightings.push({
      id: legislator.id,
      name: legislator.displayName,
      party: legislator.party,
      state: legislator.stateOrDistrict,
      chamber: legislator.chamber,
    });
  }
  const directory = buildMemberDirectory(sightings, congress);

  // Members still missing a party, state, chamber or name ask the member endpoint
  const thin = directory.filter(hasMemberGaps);
  if (thin.length > 0) log.info({ congress, members: thin.length }, 'Enriching member details');
  const enriched = new Map(
    (
      await runWithConcurrency(
        thin,
        async legislator => {
          try {
            const snapshot = await feed.fetchMember(legislator.id);
            return snapshot ? fillMemberGaps(legislator, snapshot) : legislator;
          } catch (err) {
            log.warn({ congress, member: legislator.id, err }, 'Failed to fetch member details');
            return legislator;
          }
        },
        { concurrency: opts.concurrency },
      )
    ).map(legislator => [legislator.id, legislator]),
  );
  const members = directory.map(legislator => enriched.get(legislator.id) ?? legislator);

  // ─── Merge and aggregate ──────────────────────────────────────────────
  const { merged, deduped } = mergeBills([storedWithLaws, fresh, refreshed]);
  const unmatched = new UnmatchedLog();
  const result = aggregateBills(merged, new BillResolver(members), unmatched);

  const report = buildReport({
    source: 'national',
    session: congress,
    years: congressYears(congress),
    result,
    totalBills: merged.length,
    newBills: fresh.length,
    refreshedBills: refreshed.length,
    dedupedBills: deduped,
    failedBills,
    unmatched: unmatched.entries,
    note:
      'Law counts come from the Congress.gov law endpoints and Bill Status law markers. ' +
      'Public and private laws are counted separately.',
  });

  log.info(
    {
      congress,
      bills: merged.length,
      legislators: report.rows.length,
      laws: report.laws.length,
      failedBills,
    },
    'National stats built',
  );

  // ─── Persist ──────────────────────────────────────────────────────────
  try {
    const changed = new Set([...lawUpdated, ...fresh, ...refreshed].map(b => b.billId));
    legislatorModel.upsertMany('national', members);
    billModel.upsertMany(result.bills.filter(b => changed.has(b.billId)));
    createLawModel(db).replaceForSession('national', congress, report.laws);
    createStatsCacheModel(db).save(report);
  } catch (err) {
    log.warn({ congress, err }, 'Failed to persist national stats');
  }

  return report;
}
