import type { SponsorRecord } from '../modules/aggregate/aggregator.js';
import type { StatsSummary } from '../modules/pipeline/report.js';

const NAME_WIDTH = 28;

/**
 * Truncate to `max` characters, marking the cut with an ellipsis.
 */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return text.slice(0, Math.max(0, max - 1)) + '…';
}

/** Fixed-width cell: truncated when long, padded when short. */
export function cell(text: string, width: number, align: 'left' | 'right' = 'left'): string {
  const clipped = truncate(text, width);
  return align === 'left' ? clipped.padEnd(width) : clipped.padStart(width);
}

/** 101 → `101st`, 112 → `112th` */
export function ordinal(n: number): string {
  const tens = n % 100;
  if (tens >= 11 && tens <= 13) return `${n}th`;
  switch (n % 10) {
    case 1:
      return `${n}st`;
    case 2:
      return `${n}nd`;
    case 3:
      return `${n}rd`;
    default:
      return `${n}th`;
  }
}

export function formatScore(score: number | null): string {
  return score === null ? '—' : score.toFixed(1);
}

/** `D-IL`, `R`, or `?` when the party is unknown. */
export function partyLabel(row: Pick<SponsorRecord, 'party' | 'stateOrDistrict'>, showDistrict = true): string {
  const party = row.party || '?';
  return showDistrict && row.stateOrDistrict ? `${party}-${row.stateOrDistrict}` : party;
}

export function rowHeader(): string {
  return [
    cell('#', 4, 'right'),
    cell('Legislator', NAME_WIDTH),
    cell('Party', 8),
    cell('Spons', 6, 'right'),
    cell('Chief', 6, 'right'),
    cell('Co', 6, 'right'),
    cell('Orig', 6, 'right'),
    cell('Laws', 5, 'right'),
    cell('Bipart', 7, 'right'),
  ].join(' ');
}

/**
 * One table line per legislator, in the column order of `rowHeader()`.
 */
export function formatRow(row: SponsorRecord, rank: number): string {
  return [
    cell(String(rank), 4, 'right'),
    cell(row.displayName, NAME_WIDTH),
    cell(partyLabel(row), 8),
    cell(String(row.sponsoredTotal), 6, 'right'),
    cell(String(row.chiefCoSponsorTotal), 6, 'right'),
    cell(String(row.coSponsorTotal), 6, 'right'),
    cell(String(row.originalCoSponsorTotal), 6, 'right'),
    cell(String(row.enactedTotal), 5, 'right'),
    cell(formatScore(row.bipartisanScore), 7, 'right'),
  ].join(' ');
}

export function formatSummary(summary: StatsSummary): string[] {
  const lines = [
    `Legislators: ${summary.totalLegislators}`,
    `Bills: ${summary.totalBills} (${summary.newBills} new, ${summary.refreshedBills} refreshed)`,
    `Laws: ${summary.totalLaws} (${summary.publicLaws} public, ${summary.privateLaws} private)`,
  ];
  if (summary.dedupedBills > 0) lines.push(`Deduplicated: ${summary.dedupedBills}`);
  if (summary.failedBills > 0) lines.push(`Failed fetches: ${summary.failedBills}`);
  return lines;
}
