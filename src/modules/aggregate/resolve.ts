import type { BillRecord, Chamber, Legislator } from '../bills/types.js';
import { chamberForBillType } from '../bills/types.js';
import { NameMatcher, type UnmatchedCollector } from '../names/matcher.js';
import { inferChamberFromTitle } from '../names/normalize.js';

export interface ResolvedCoSponsor {
  legislator: Legislator;
  isOriginal: boolean;
}

/** One bill with every named party resolved to a legislator where possible. */
export interface ResolvedBill {
  bill: BillRecord;
  sponsor: Legislator | null;
  chiefCoSponsors: Legislator[];
  coSponsors: ResolvedCoSponsor[];
  unmatchedCoSponsors: number;
}

/**
 * Resolves bill parties against one session's legislators. Ids are tried
 * first (national records, or state records resolved on an earlier run);
 * names go through the matcher with a chamber hint from the name's title,
 * else the bill's originating chamber.
 */
export class BillResolver {
  private readonly byId = new Map<string, Legislator>();
  private readonly matcher: NameMatcher;

  constructor(legislators: readonly Legislator[]) {
    for (const legislator of legislators) this.byId.set(legislator.id, legislator);
    this.matcher = new NameMatcher(legislators);
  }

  get legislatorCount(): number {
    return this.byId.size;
  }

  lookup(id: string | null | undefined): Legislator | null {
    return id ? this.byId.get(id) ?? null : null;
  }

  resolve(bill: BillRecord, collector?: UnmatchedCollector): ResolvedBill {
    const billChamber = bill.chamber ?? chamberForBillType(bill.billType);
    const byName = (name: string): Legislator | null =>
      this.matcher.match(name, inferChamberFromTitle(name) ?? billChamber, collector);

    const sponsor =
      this.lookup(bill.primarySponsorId) ?? (bill.primarySponsorName ? byName(bill.primarySponsorName) : null);

    let unmatchedCoSponsors = 0;

    const chiefCoSponsors: Legislator[] = [];
    for (const name of bill.chiefCoSponsorNames) {
      const legislator = byName(name);
      if (legislator) chiefCoSponsors.push(legislator);
      else unmatchedCoSponsors += 1;
    }

    const coSponsors: ResolvedCoSponsor[] = [];
    for (const name of bill.coSponsorNames) {
      const legislator = byName(name);
      if (legislator) coSponsors.push({ legislator, isOriginal: false });
      else unmatchedCoSponsors += 1;
    }

    for (const cosponsor of bill.cosponsors) {
      if (cosponsor.withdrawn) continue;
      const legislator = this.lookup(cosponsor.id);
      if (legislator) {
        coSponsors.push({ legislator, isOriginal: cosponsor.isOriginal });
        continue;
      }
      unmatchedCoSponsors += 1;
      collector?.record({
        rawName: cosponsor.name ?? cosponsor.id,
        chamberHint: cosponsor.chamber ?? billChamber,
        normalizedKey: cosponsor.id,
      });
    }

    return { bill, sponsor, chiefCoSponsors, coSponsors, unmatchedCoSponsors };
  }
}

/**
 * Legislator directory for the national feed, built from the structured
 * sponsor and co-sponsor objects. The first sighting of an id fixes its
 * chamber; later sightings only fill blanks.
 */
export function buildMemberDirectory(
  members: ReadonlyArray<{
    id: string;
    name: string | null;
    party: string | null;
    state: string | null;
    chamber: Chamber | null;
  }>,
  session: number,
): Legislator[] {
  const byId = new Map<string, Legislator>();
  for (const member of members) {
    const existing = byId.get(member.id);
    if (existing) {
      existing.displayName ||= member.name ?? '';
      existing.party ||= member.party ?? '';
      existing.chamber ??= member.chamber;
      existing.stateOrDistrict ||= member.state ?? '';
      continue;
    }
    byId.set(member.id, {
      id: member.id,
      displayName: member.name ?? '',
      firstName: null,
      lastName: null,
      party: member.party ?? '',
      chamber: member.chamber,
      stateOrDistrict: member.state ?? '',
      session,
    });
  }
  return [...byId.values()];
}

/** Directory entries with a blank name, party, state or chamber. */
export function hasMemberGaps(legislator: Legislator): boolean {
  return !legislator.displayName || !legislator.party || !legislator.stateOrDistrict || legislator.chamber === null;
}

/** Copy of `legislator` with its blanks taken from a member snapshot. */
export function fillMemberGaps(
  legislator: Legislator,
  snapshot: { name: string | null; party: string | null; state: string | null; chamber: Chamber | null },
): Legislator {
  return {
    ...legislator,
    displayName: legislator.displayName || snapshot.name || '',
    party: legislator.party || snapshot.party || '',
    stateOrDistrict: legislator.stateOrDistrict || snapshot.state || '',
    chamber: legislator.chamber ?? snapshot.chamber,
  };
}
