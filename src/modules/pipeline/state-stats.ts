import type Database from 'better-sqlite3';
import { ordinal } from '../../utils/format.js';
import { getLogger } from '../../utils/logger.js';
import { runWithConcurrency } from '../../utils/async-queue.js';
import { aggregateBills } from '../aggregate/aggregator.js';
import { diffRefreshed, mergeBills, selectPendingBills } from '../aggregate/merge.js';
import { BillResolver } from '../aggregate/resolve.js';
import { parseBillFilename, sessionYears, stateBillFilename } from '../bills/state-xml.js';
import { billKey, type BillRecord, type Legislator } from '../bills/types.js';
import { UnmatchedLog } from '../names/matcher.js';
import { createBillModel } from '../state/models/bills.js';
import { createLawModel } from '../state/models/laws.js';
import { createLegislatorModel } from '../state/models/legislators.js';
import { createStatsCacheModel } from '../state/models/stats-cache.js';
import { buildReport, type StatsReport } from './report.js';

/** What the state build needs from the ILGA mirror. `IlgaFtpClient` is the live one. */
export interface StateFeed {
  fetchMembers(session: number): Promise<Legislator[]>;
  listBillFiles(session: number): Promise<string[]>;
  fetchBill(session: number, filename: string): Promise<BillRecord | null>;
}

export interface StateStatsOptions {
  session: number;
  /** Reuse stored bills and only fetch new or still-pending ones */
  incremental: boolean;
  concurrency: number;
  onProgress?: (done: number, total: number) => void;
}

function fileBillId(filename: string): string | null {
  const parsed = parseBillFilename(filename);
  return parsed ? billKey(parsed.session, parsed.billType, parsed.billNumber) : null;
}

export async function buildStateStats(
  feed: StateFeed,
  db: Database.Database,
  opts: StateStatsOptions,
): Promise<StatsReport> {
  const log = getLogger();
  const { session } = opts;
  const legislatorModel = createLegislatorModel(db);
  const billModel = createBillModel(db);

  // ─── Members and file list ────────────────────────────────────────────
  const members = await feed.fetchMembers(session);
  if (members.length === 0) {
    throw new Error(`No members found for session ${session}`);
  }

  const files = await feed.listBillFiles(session);
  if (files.length === 0) {
    throw new Error(`No bill files found for session ${session}`);
  }

  // ─── Decide what to fetch ─────────────────────────────────────────────
  const stored = opts.incremental ? billModel.getBySession('state', session) : [];
  const storedIds = new Set(stored.map(b => b.billId));
  const newFiles = files.filter(f => {
    const id = fileBillId(f);
    return id !== null && !storedIds.has(id);
  });
  const pending = selectPendingBills(stored);
  const pendingFiles = pending.map(b => stateBillFilename(b.session, b.billType, b.billNumber));

  log.info(
    { session, files: files.length, stored: stored.length, new: newFiles.length, pending: pending.length },
    'Planning state fetch',
  );

  // ─── Fetch ────────────────────────────────────────────────────────────
  const queue = [
    ...newFiles.map(filename => ({ filename, refresh: false })),
    ...pendingFiles.map(filename => ({ filename, refresh: true })),
  ];
  let failedBills = 0;
  const fetched = await runWithConcurrency(
    queue,
    async ({ filename, refresh }) => {
      try {
        return { refresh, bill: await feed.fetchBill(session, filename) };
      } catch (err) {
        failedBills++;
        log.warn({ session, filename, err }, 'Failed to fetch bill');
        return { refresh, bill: null };
      }
    },
    { concurrency: opts.concurrency, onProgress: opts.onProgress },
  );

  const fresh: BillRecord[] = [];
  const refetched: BillRecord[] = [];
  for (const { refresh, bill } of fetched) {
    if (!bill) continue;
    (refresh ? refetched : fresh).push(bill);
  }
  const refreshed = diffRefreshed(pending, refetched);

  // ─── Merge and aggregate ──────────────────────────────────────────────
  const { merged, deduped } = mergeBills([stored, fresh, refreshed]);
  const unmatched = new UnmatchedLog();
  const result = aggregateBills(merged, new BillResolver(members), unmatched);

  const years = sessionYears(session);
  const report = buildReport({
    source: 'state',
    session,
    years,
    result,
    totalBills: merged.length,
    newBills: fresh.length,
    refreshedBills: refreshed.length,
    dedupedBills: deduped,
    failedBills,
    unmatched: unmatched.entries,
    note: `Data from Illinois General Assembly FTP XML files for the ${ordinal(session)} GA (${years}).`,
  });

  log.info(
    {
      session,
      bills: merged.length,
      legislators: report.rows.length,
      laws: report.laws.length,
      unmatchedSponsors: report.unmatchedSponsors,
      unmatchedCoSponsors: report.unmatchedCoSponsors,
    },
    'State stats built',
  );

  // ─── Persist ──────────────────────────────────────────────────────────
  try {
    const changed = new Set([...fresh, ...refreshed].map(b => b.billId));
    legislatorModel.upsertMany('state', members);
    billModel.upsertMany(result.bills.filter(b => changed.has(b.billId)));
    createLawModel(db).replaceForSession('state', session, report.laws);
    createStatsCacheModel(db).save(report);
  } catch (err) {
    log.warn({ session, err }, 'Failed to persist state stats');
  }

  return report;
}
