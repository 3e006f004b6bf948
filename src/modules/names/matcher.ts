import type { Chamber, Legislator } from '../bills/types.js';
import { lookupKey, normalize } from './normalize.js';

export interface UnmatchedName {
  rawName: string;
  chamberHint: Chamber | null;
  normalizedKey: string;
}

/** Receives names the matcher could not resolve, for match-rate reporting. */
export interface UnmatchedCollector {
  record(entry: UnmatchedName): void;
}

export class UnmatchedLog implements UnmatchedCollector {
  readonly entries: UnmatchedName[] = [];

  record(entry: UnmatchedName): void {
    this.entries.push(entry);
  }

  get size(): number {
    return this.entries.length;
  }
}

export type MatchStrategy = 'exact' | 'first-last' | 'last-name-chamber' | 'last-name-unique';

export type MatchResult =
  | { kind: 'matched'; legislator: Legislator; strategy: MatchStrategy }
  | { kind: 'unmatched'; entry: UnmatchedName }
  | { kind: 'empty' };

/**
 * Resolves free-text sponsor names to legislators of one session.
 * Lookup order: exact normalized name, then first+last (middle names
 * dropped), then last name narrowed by chamber, then a unique last name.
 * Ambiguous last names never match.
 */
export class NameMatcher {
  private readonly byExact = new Map<string, Legislator>();
  private readonly byFirstLast = new Map<string, Legislator>();
  private readonly byLast = new Map<string, Legislator[]>();

  constructor(legislators: readonly Legislator[]) {
    for (const legislator of legislators) {
      const exact = normalize(legislator.displayName);
      if (exact) this.byExact.set(exact, legislator);

      const nameParts = exact ? exact.split(' ') : [];
      const first = legislator.firstName?.trim().toLowerCase() || nameParts[0] || '';
      const last = legislator.lastName?.trim().toLowerCase() || nameParts[nameParts.length - 1] || '';

      if (first && last) {
        const simple = `${first} ${last}`;
        if (!this.byFirstLast.has(simple)) this.byFirstLast.set(simple, legislator);
      }

      if (last) {
        const bucket = this.byLast.get(last);
        if (bucket) bucket.push(legislator);
        else this.byLast.set(last, [legislator]);
      }
    }
  }

  resolve(rawName: string | null | undefined, chamberHint: Chamber | null = null): MatchResult {
    if (!rawName) return { kind: 'empty' };
    const exactKey = normalize(rawName);
    if (!exactKey) return { kind: 'empty' };

    const exact = this.byExact.get(exactKey);
    if (exact) return { kind: 'matched', legislator: exact, strategy: 'exact' };

    const simple = this.byFirstLast.get(lookupKey(rawName));
    if (simple) return { kind: 'matched', legislator: simple, strategy: 'first-last' };

    const parts = exactKey.split(' ');
    const candidates = this.byLast.get(parts[parts.length - 1] ?? '') ?? [];

    if (chamberHint && candidates.length > 0) {
      const inChamber = candidates.filter(c => c.chamber === chamberHint);
      const [only] = inChamber;
      if (inChamber.length === 1 && only) {
        return { kind: 'matched', legislator: only, strategy: 'last-name-chamber' };
      }
    }

    const [unique] = candidates;
    if (candidates.length === 1 && unique) {
      return { kind: 'matched', legislator: unique, strategy: 'last-name-unique' };
    }

    return { kind: 'unmatched', entry: { rawName, chamberHint, normalizedKey: exactKey } };
  }

  /** `resolve()` narrowed to the legislator; misses go to the collector when one is given. */
  match(
    rawName: string | null | undefined,
    chamberHint: Chamber | null = null,
    collector?: UnmatchedCollector,
  ): Legislator | null {
    const result = this.resolve(rawName, chamberHint);
    switch (result.kind) {
      case 'matched':
        return result.legislator;
      case 'unmatched':
        collector?.record(result.entry);
        return null;
      case 'empty':
        return null;
    }
  }
}
