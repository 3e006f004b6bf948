import { normalize, sameName, stripTitlePrefix, stripTrailingNoise } from '../names/normalize.js';

export interface ActionEntry {
  date: string | null;
  text: string;
  chamber: string | null;
}

export interface ParsedSponsorship {
  primarySponsorName: string | null;
  chiefCoSponsorNames: string[];
  coSponsorNames: string[];
}

export type ActionTrigger = 'add-chief' | 'remove-chief' | 'add-co' | 'remove-co';

// ─── Patterns ─────────────────────────────────────────────────────────────

const FILED_BY_PATTERN = /\b(?:Prefiled|Filed)\b.*\bby\b\s+(.+)$/i;
const SPONSOR_CHANGED_PATTERN = /\bChief\s+Sponsor\s+Changed\s+to\b\s*(.+)$/i;
const TITLE_TOKEN = /(?:Rep\.|Sen\.|Representative|Senator)/i;

// Checked in this order; the first hit claims the entry.
const TRIGGERS: ReadonlyArray<{ trigger: ActionTrigger; pattern: RegExp }> = [
  { trigger: 'add-chief', pattern: /\bAdded\s+Chief\s+Co-?Sponsors?\b/i },
  { trigger: 'remove-chief', pattern: /\bRemoved\s+Chief\s+Co-?Sponsors?\b/i },
  { trigger: 'add-co', pattern: /\bAdded\s+Co-?Sponsors?\b/i },
  { trigger: 'remove-co', pattern: /\bRemoved\s+Co-?Sponsors?\b/i },
];

const PUBLIC_ACT_PATTERN = /Public\s+Act\s*[.\s]*(\d{3}-\d{4})/i;

const LIST_TITLE_PREFIX = /^(?:Reps?\.|Sens?\.|Representatives?|Senators?)\s+/i;
const SUFFIX_COMMA = /,\s*(Jr\.?|Sr\.?|II|III|IV|V)\b/g;

// ─── Small helpers ────────────────────────────────────────────────────────

export function normalizeActionText(text: string | null | undefined): string {
  return (text ?? '').split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Parse an action date (`M/D/YYYY` from the state feed, `YYYY-MM-DD` from
 * the national feed) to epoch milliseconds. Anything else is null.
 */
export function parseActionDate(raw: string | null | undefined): number | null {
  if (!raw) return null;
  const value = raw.trim();

  const us = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(value);
  if (us) return validDate(Number(us[3]), Number(us[1]), Number(us[2]));

  const iso = /^(\d{4})-(\d{2})-(\d{2})(?:T.*)?$/.exec(value);
  if (iso) return validDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  return null;
}

function validDate(year: number, month: number, day: number): number | null {
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return ms;
}

/** Sort key: parsed dates ascending, undated entries after all dated ones, then document order. */
function compareChronological(
  a: { date: number | null; index: number },
  b: { date: number | null; index: number },
): number {
  const da = a.date ?? Number.POSITIVE_INFINITY;
  const db = b.date ?? Number.POSITIVE_INFINITY;
  if (da !== db) return da < db ? -1 : 1;
  return a.index - b.index;
}

/** `"Public Act . . . . . . . . . 103-0324"` → `"103-0324"` */
export function extractEnactmentMarker(text: string | null | undefined): string | null {
  if (!text) return null;
  const match = PUBLIC_ACT_PATTERN.exec(text);
  return match?.[1] ?? null;
}

// ─── Name lists ───────────────────────────────────────────────────────────

/**
 * Split the names trailing a trigger phrase, e.g.
 * `"Reps. Amy Briel and Rick Ryan"` → `['Amy Briel', 'Rick Ryan']`.
 * Suffix commas (`"Coffey, Jr."`) do not start a new name.
 */
export function splitNameList(raw: string | null | undefined): string[] {
  if (!raw) return [];

  let text = raw.trim();
  if (text.startsWith('(') && text.endsWith(')')) {
    text = text.slice(1, -1).trim();
  }

  text = text
    .replace(LIST_TITLE_PREFIX, '')
    .replace(SUFFIX_COMMA, ' $1')
    .replace(/\s+and\s+/gi, ', ');

  const names: string[] = [];
  for (const part of text.split(',')) {
    const cleaned = stripTrailingNoise(part.trim().replace(LIST_TITLE_PREFIX, ''));
    if (cleaned) names.push(cleaned);
  }
  return names;
}

export function extractNamesAfter(text: string, pattern: RegExp): string[] {
  const match = pattern.exec(text);
  if (!match) return [];
  const tail = text
    .slice(match.index + match[0].length)
    .trim()
    .replace(/^[:\-\s]+/, '');
  return splitNameList(tail);
}

// ─── Step 1: primary sponsor ──────────────────────────────────────────────

interface SponsorCandidate {
  date: number | null;
  index: number;
  name: string;
}

/**
 * Initial filer (earliest "Filed ... by Rep. X"), overridden by the latest
 * "Chief Sponsor Changed to" entry when one exists.
 */
export function extractPrimarySponsor(actions: readonly ActionEntry[]): string | null {
  const filed: SponsorCandidate[] = [];
  const changed: SponsorCandidate[] = [];

  actions.forEach((action, index) => {
    const text = normalizeActionText(action.text);
    if (!text) return;
    const date = parseActionDate(action.date);

    const change = SPONSOR_CHANGED_PATTERN.exec(text);
    if (change) {
      const name = stripTitlePrefix(stripTrailingNoise(change[1]));
      if (name) changed.push({ date, index, name });
      return;
    }

    const filing = FILED_BY_PATTERN.exec(text);
    if (!filing) return;
    const nameText = stripTrailingNoise(filing[1]);
    // "Filed with the Clerk by the Committee" is not a legislator
    if (!TITLE_TOKEN.test(nameText)) return;
    const name = stripTitlePrefix(nameText);
    if (name) filed.push({ date, index, name });
  });

  if (changed.length > 0) {
    changed.sort(compareChronological);
    return changed[changed.length - 1]?.name ?? null;
  }

  filed.sort(compareChronological);
  return filed[0]?.name ?? null;
}

// ─── Step 2: co-sponsor tiers ─────────────────────────────────────────────

export function classifyAction(text: string): ActionTrigger | null {
  for (const { trigger, pattern } of TRIGGERS) {
    if (pattern.test(text)) return trigger;
  }
  return null;
}

function triggerPattern(trigger: ActionTrigger): RegExp {
  const entry = TRIGGERS.find(t => t.trigger === trigger);
  if (!entry) throw new Error(`Unknown action trigger: ${trigger}`);
  return entry.pattern;
}

/** Insert unless an equal-normalized name is already present. */
export function addToTier(tier: string[], name: string): void {
  if (!normalize(name)) return;
  if (tier.some(existing => sameName(existing, name))) return;
  tier.push(name);
}

/** Remove the first equal-normalized entry, if any. */
export function removeFromTier(tier: string[], name: string): void {
  const idx = tier.findIndex(existing => sameName(existing, name));
  if (idx >= 0) tier.splice(idx, 1);
}

export function trackCoSponsorTiers(actions: readonly ActionEntry[]): {
  chiefCoSponsorNames: string[];
  coSponsorNames: string[];
} {
  const chief: string[] = [];
  const co: string[] = [];

  for (const action of actions) {
    const text = normalizeActionText(action.text);
    if (!text) continue;

    const trigger = classifyAction(text);
    if (!trigger) continue;

    const names = extractNamesAfter(text, triggerPattern(trigger));
    for (const name of names) {
      switch (trigger) {
        case 'add-chief':
          addToTier(chief, name);
          removeFromTier(co, name);
          break;
        case 'remove-chief':
          removeFromTier(chief, name);
          break;
        case 'add-co':
          if (chief.some(existing => sameName(existing, name))) break;
          addToTier(co, name);
          break;
        case 'remove-co':
          removeFromTier(co, name);
          break;
      }
    }
  }

  return { chiefCoSponsorNames: chief, coSponsorNames: co };
}

export function parseActionLog(actions: readonly ActionEntry[]): ParsedSponsorship {
  return {
    primarySponsorName: extractPrimarySponsor(actions),
    ...trackCoSponsorTiers(actions),
  };
}
