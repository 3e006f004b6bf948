import type { Chamber } from '../bills/types.js';

const TITLE_PATTERN = /^(?:Reps?\.|Sens?\.|Representatives?|Senators?)\s+/i;
const SUFFIX_PATTERN = /,?\s+(?:Jr\.?|Sr\.?|II|III|IV|V)$/i;
const SENATE_TITLE = /\b(?:Sens?\.|Senators?)(?=\s|$)/i;
const HOUSE_TITLE = /\b(?:Reps?\.|Representatives?)(?=\s|$)/i;

/**
 * Canonical comparison key for a legislator name: leading title and
 * trailing generational suffix removed, whitespace collapsed, lowercased.
 *
 * `normalize('Rep. John A. Smith, Jr.')` → `'john a. smith'`
 */
export function normalize(raw: string | null | undefined): string {
  if (!raw) return '';

  // Strip until stable so "Rep. Sen. X" or "X Jr. III" settle in one pass
  let name = raw.trim();
  for (;;) {
    const next = name.replace(TITLE_PATTERN, '').replace(SUFFIX_PATTERN, '').trim();
    if (next === name) break;
    name = next;
  }

  return name.split(/\s+/).filter(Boolean).join(' ').toLowerCase();
}

/**
 * Broader key that drops middle names and initials: `{first} {last}` once
 * three or more tokens remain.
 */
export function lookupKey(raw: string | null | undefined): string {
  const normalized = normalize(raw);
  const parts = normalized.split(' ');
  if (parts.length >= 3) return `${parts[0]} ${parts[parts.length - 1]}`;
  return normalized;
}

export function stripTitlePrefix(name: string | null | undefined): string {
  return (name ?? '').trim().replace(TITLE_PATTERN, '').trim();
}

/** Drops a trailing parenthetical and stray `,`/`;` left over from action text. */
export function stripTrailingNoise(name: string | null | undefined): string {
  if (!name) return '';
  const beforeParen = name.split('(')[0] ?? '';
  return beforeParen.trim().replace(/[\s,;]+$/, '');
}

export function inferChamberFromTitle(raw: string | null | undefined): Chamber | null {
  if (!raw) return null;
  if (SENATE_TITLE.test(raw)) return 'senate';
  if (HOUSE_TITLE.test(raw)) return 'house';
  return null;
}

export function sameName(a: string, b: string): boolean {
  const key = normalize(a);
  return key !== '' && key === normalize(b);
}
