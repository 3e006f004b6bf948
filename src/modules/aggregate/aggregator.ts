import type { BillRecord, Chamber, LawType, Legislator } from '../bills/types.js';
import type { UnmatchedCollector } from '../names/matcher.js';
import { scoreBipartisan, type CosponsorLink } from './bipartisan.js';
import type { BillResolver, ResolvedBill } from './resolve.js';

export interface SponsorRecord {
  legislatorId: string;
  displayName: string;
  party: string;
  chamber: Chamber | null;
  stateOrDistrict: string;

  sponsoredTotal: number;
  primarySponsorTotal: number;
  chiefCoSponsorTotal: number;
  coSponsorTotal: number;
  originalCoSponsorTotal: number;
  enactedTotal: number;
  publicLawCount: number;
  privateLawCount: number;
  lawNumbers: string[];

  crossPartyCosponsorTotal: number;
  samePartyCosponsorTotal: number;
  bipartisanScoreRaw: number | null;
  bipartisanScore: number | null;
}

export interface EnactedLaw {
  billId: string;
  lawType: LawType;
  lawNumber: string;
  sponsorId: string;
}

export interface AggregateResult {
  rows: SponsorRecord[];
  laws: EnactedLaw[];
  /** Input bills with `primarySponsorId` filled where the sponsor resolved */
  bills: BillRecord[];
  /** One entry per counted (co-sponsor, sponsor, bill) relationship */
  links: CosponsorLink[];
  unmatchedSponsors: number;
  unmatchedCoSponsors: number;
}

function emptyRecord(legislator: Legislator): SponsorRecord {
  return {
    legislatorId: legislator.id,
    displayName: legislator.displayName,
    party: legislator.party,
    chamber: legislator.chamber,
    stateOrDistrict: legislator.stateOrDistrict,
    sponsoredTotal: 0,
    primarySponsorTotal: 0,
    chiefCoSponsorTotal: 0,
    coSponsorTotal: 0,
    originalCoSponsorTotal: 0,
    enactedTotal: 0,
    publicLawCount: 0,
    privateLawCount: 0,
    lawNumbers: [],
    crossPartyCosponsorTotal: 0,
    samePartyCosponsorTotal: 0,
    bipartisanScoreRaw: null,
    bipartisanScore: null,
  };
}

/** `sponsoredTotal` descending, then display name ascending. */
export function compareRows(a: SponsorRecord, b: SponsorRecord): number {
  if (a.sponsoredTotal !== b.sponsoredTotal) return b.sponsoredTotal - a.sponsoredTotal;
  return a.displayName.localeCompare(b.displayName);
}

/**
 * Folds resolved bills into per-legislator counters. One instance covers
 * one build; feed it each bill exactly once (merge bills by identity first).
 */
export class SponsorAggregator {
  private readonly records = new Map<string, SponsorRecord>();
  private readonly links: CosponsorLink[] = [];
  private readonly laws: EnactedLaw[] = [];
  private readonly bills: BillRecord[] = [];
  private unmatchedSponsors = 0;
  private unmatchedCoSponsors = 0;

  private recordFor(legislator: Legislator): SponsorRecord {
    let record = this.records.get(legislator.id);
    if (!record) {
      record = emptyRecord(legislator);
      this.records.set(legislator.id, record);
    }
    return record;
  }

  add(resolved: ResolvedBill): void {
    const { bill, sponsor } = resolved;
    this.unmatchedCoSponsors += resolved.unmatchedCoSponsors;

    if (!sponsor) {
      this.unmatchedSponsors += 1;
      this.bills.push(bill);
      return;
    }
    this.bills.push({ ...bill, primarySponsorId: sponsor.id });

    // 1. Primary sponsor and enactment
    const sponsorRecord = this.recordFor(sponsor);
    sponsorRecord.sponsoredTotal += 1;
    sponsorRecord.primarySponsorTotal += 1;
    if (bill.enactment) {
      sponsorRecord.enactedTotal += 1;
      if (bill.enactment.lawType === 'public') sponsorRecord.publicLawCount += 1;
      else sponsorRecord.privateLawCount += 1;
      sponsorRecord.lawNumbers.push(bill.enactment.lawNumber);
      this.laws.push({ billId: bill.billId, ...bill.enactment, sponsorId: sponsor.id });
    }

    // 2. Chief co-sponsors
    const chiefSeen = new Set<string>();
    for (const chief of resolved.chiefCoSponsors) {
      if (chiefSeen.has(chief.id)) continue;
      chiefSeen.add(chief.id);
      this.recordFor(chief).chiefCoSponsorTotal += 1;
      this.links.push({ cosponsor: chief, sponsor });
    }

    // 3. Plain co-sponsors, never the bill's own sponsor or one already counted as chief
    const coSeen = new Set<string>([sponsor.id, ...chiefSeen]);
    for (const { legislator, isOriginal } of resolved.coSponsors) {
      if (coSeen.has(legislator.id)) continue;
      coSeen.add(legislator.id);
      const record = this.recordFor(legislator);
      record.coSponsorTotal += 1;
      if (isOriginal) record.originalCoSponsorTotal += 1;
      this.links.push({ cosponsor: legislator, sponsor });
    }
  }

  result(): AggregateResult {
    const rows = [...this.records.values()];
    const scores = scoreBipartisan(rows, this.links);
    for (const row of rows) {
      const score = scores.get(row.legislatorId);
      if (!score) continue;
      row.crossPartyCosponsorTotal = score.crossPartyCosponsorTotal;
      row.samePartyCosponsorTotal = score.samePartyCosponsorTotal;
      row.bipartisanScoreRaw = score.bipartisanScoreRaw;
      row.bipartisanScore = score.bipartisanScore;
    }
    rows.sort(compareRows);

    return {
      rows,
      laws: [...this.laws],
      bills: [...this.bills],
      links: [...this.links],
      unmatchedSponsors: this.unmatchedSponsors,
      unmatchedCoSponsors: this.unmatchedCoSponsors,
    };
  }
}

/** Resolve and fold a whole bill set in one pass. */
export function aggregateBills(
  bills: readonly BillRecord[],
  resolver: BillResolver,
  collector?: UnmatchedCollector,
): AggregateResult {
  const aggregator = new SponsorAggregator();
  for (const bill of bills) aggregator.add(resolver.resolve(bill, collector));
  return aggregator.result();
}
