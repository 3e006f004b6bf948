import type { AggregateResult, EnactedLaw, SponsorRecord } from '../aggregate/aggregator.js';
import type { BillSource } from '../bills/types.js';
import type { UnmatchedName } from '../names/matcher.js';

export interface StatsSummary {
  totalLegislators: number;
  totalBills: number;
  totalLaws: number;
  publicLaws: number;
  privateLaws: number;
  newBills: number;
  refreshedBills: number;
  dedupedBills: number;
  /** Bills whose fetch failed; the build carried on without them */
  failedBills: number;
}

export interface StatsReport {
  source: BillSource;
  session: number;
  years: string;
  generatedAt: string;
  rows: SponsorRecord[];
  laws: EnactedLaw[];
  summary: StatsSummary;
  unmatchedSponsors: number;
  unmatchedCoSponsors: number;
  unmatched: UnmatchedName[];
  note: string;
}

export interface ReportInput {
  source: BillSource;
  session: number;
  years: string;
  result: AggregateResult;
  totalBills: number;
  newBills: number;
  refreshedBills: number;
  dedupedBills: number;
  failedBills: number;
  unmatched: UnmatchedName[];
  note: string;
  now?: Date;
}

export function buildReport(input: ReportInput): StatsReport {
  const { rows, laws } = input.result;
  return {
    source: input.source,
    session: input.session,
    years: input.years,
    generatedAt: (input.now ?? new Date()).toISOString(),
    rows,
    laws,
    summary: {
      totalLegislators: rows.length,
      totalBills: input.totalBills,
      totalLaws: laws.length,
      publicLaws: rows.reduce((sum, r) => sum + r.publicLawCount, 0),
      privateLaws: rows.reduce((sum, r) => sum + r.privateLawCount, 0),
      newBills: input.newBills,
      refreshedBills: input.refreshedBills,
      dedupedBills: input.dedupedBills,
      failedBills: input.failedBills,
    },
    unmatchedSponsors: input.result.unmatchedSponsors,
    unmatchedCoSponsors: input.result.unmatchedCoSponsors,
    unmatched: input.unmatched,
    note: input.note,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Shape check for reports read back from the cache. */
export function isStatsReport(value: unknown): value is StatsReport {
  if (!isRecord(value)) return false;
  return (
    (value.source === 'state' || value.source === 'national') &&
    typeof value.session === 'number' &&
    typeof value.generatedAt === 'string' &&
    Array.isArray(value.rows) &&
    Array.isArray(value.laws) &&
    Array.isArray(value.unmatched) &&
    isRecord(value.summary)
  );
}
