import type { Chamber, Legislator } from '../bills/types.js';

/** Pseudo-observations of the peer-group rate added to every legislator's sample. */
export const PRIOR_WEIGHT = 5;

/** A co-sponsorship relationship, owned by the co-sponsor. */
export interface CosponsorLink {
  cosponsor: Legislator;
  sponsor: Legislator;
}

export interface LinkTally {
  cross: number;
  same: number;
}

export interface ScoredMember {
  legislatorId: string;
  chamber: Chamber | null;
  party: string;
  crossPartyCosponsorTotal: number;
  samePartyCosponsorTotal: number;
  bipartisanScoreRaw: number | null;
  bipartisanScore: number | null;
}

/**
 * One decimal, rounding the exact binary value with ties to even. A double
 * sits exactly halfway between two tenths only when it is an odd multiple of
 * 0.25, and `toFixed` rounds every other value on its exact expansion.
 */
export function round1(value: number): number {
  const abs = Math.abs(value);
  const quarters = abs * 4;
  let rounded: number;
  if (Number.isInteger(quarters) && quarters % 2 === 1) {
    const down = Math.floor(abs * 10);
    rounded = (down % 2 === 0 ? down : down + 1) / 10;
  } else {
    rounded = Number(abs.toFixed(1));
  }
  return value < 0 ? -rounded : rounded;
}

function groupKey(chamber: Chamber | null, party: string): string {
  return `${chamber ?? ''}|${party}`;
}

/**
 * Cross/same-party counts per co-sponsor. Links where either side has no
 * declared party, and self-links, are not counted.
 */
export function tallyLinks(links: readonly CosponsorLink[]): Map<string, LinkTally> {
  const tallies = new Map<string, LinkTally>();
  for (const { cosponsor, sponsor } of links) {
    if (cosponsor.id === sponsor.id) continue;
    if (!cosponsor.party || !sponsor.party) continue;
    const tally = tallies.get(cosponsor.id) ?? { cross: 0, same: 0 };
    if (cosponsor.party === sponsor.party) tally.same += 1;
    else tally.cross += 1;
    tallies.set(cosponsor.id, tally);
  }
  return tallies;
}

/**
 * Raw and smoothed crossover scores. The smoothed score shrinks the raw rate
 * toward the (chamber, party) peer-group rate with weight `PRIOR_WEIGHT`.
 */
export function scoreBipartisan<T extends { legislatorId: string; chamber: Chamber | null; party: string }>(
  members: readonly T[],
  links: readonly CosponsorLink[],
): Map<string, ScoredMember> {
  const tallies = tallyLinks(links);

  const groups = new Map<string, LinkTally>();
  for (const member of members) {
    const tally = tallies.get(member.legislatorId);
    if (!tally) continue;
    const key = groupKey(member.chamber, member.party);
    const group = groups.get(key) ?? { cross: 0, same: 0 };
    group.cross += tally.cross;
    group.same += tally.same;
    groups.set(key, group);
  }

  const scored = new Map<string, ScoredMember>();
  for (const member of members) {
    const tally = tallies.get(member.legislatorId) ?? { cross: 0, same: 0 };
    const total = tally.cross + tally.same;
    const group = groups.get(groupKey(member.chamber, member.party));
    const groupTotal = group ? group.cross + group.same : 0;
    const baseline = group && groupTotal > 0 ? group.cross / groupTotal : 0;

    scored.set(member.legislatorId, {
      legislatorId: member.legislatorId,
      chamber: member.chamber,
      party: member.party,
      crossPartyCosponsorTotal: tally.cross,
      samePartyCosponsorTotal: tally.same,
      bipartisanScoreRaw: total > 0 ? round1((100 * tally.cross) / total) : null,
      bipartisanScore:
        total > 0 ? round1((100 * (tally.cross + PRIOR_WEIGHT * baseline)) / (total + PRIOR_WEIGHT)) : null,
    });
  }
  return scored;
}
