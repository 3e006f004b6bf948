import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { extractEnactmentMarker, parseActionLog, type ActionEntry } from '../actions/action-log.js';
import { billKey, chamberForBillType, type BillRecord, type Chamber, type Legislator } from './types.js';

const BILL_FILE_PATTERN = /^(\d{3})00(HB|SB|HR|SR|HJR|SJR|HJRCA|SJRCA)(\d+)\.xml$/i;
const COUNTED_BILL_FILE = /^\d{3}00(HB|SB)\d+\.xml$/i;

const SESSION_YEARS: Readonly<Record<number, string>> = {
  104: '2025-2026',
  103: '2023-2024',
  102: '2021-2022',
  101: '2019-2020',
  100: '2017-2018',
};

export function sessionYears(session: number): string {
  return SESSION_YEARS[session] ?? String(session);
}

export function knownSessions(): Array<{ session: number; years: string }> {
  return Object.entries(SESSION_YEARS)
    .map(([session, years]) => ({ session: Number(session), years }))
    .sort((a, b) => b.session - a.session);
}

export interface StateBillFile {
  session: number;
  billType: string;
  billNumber: number;
}

/** `10400HB0001.xml` → `{ session: 104, billType: 'hb', billNumber: 1 }` */
export function parseBillFilename(filename: string): StateBillFile | null {
  const match = BILL_FILE_PATTERN.exec(filename);
  if (!match?.[1] || !match[2] || !match[3]) return null;
  return {
    session: Number(match[1]),
    billType: match[2].toLowerCase(),
    billNumber: Number(match[3]),
  };
}

export function stateBillFilename(session: number, billType: string, billNumber: number): string {
  return `${session}00${billType.toUpperCase()}${String(billNumber).padStart(4, '0')}.xml`;
}

/** House and Senate bills only; resolutions and amendments are not counted. */
export function isCountedBillFile(filename: string): boolean {
  return COUNTED_BILL_FILE.test(filename);
}

// ─── XML helpers ──────────────────────────────────────────────────────────

function childText<T extends AnyNode>(node: Cheerio<T>, names: readonly string[]): string {
  for (const name of names) {
    const value = node.children(name).first().text().trim();
    if (value) return value;
  }
  return '';
}

/** Text of a leaf element; elements with child elements have no text of their own here. */
function leafText<T extends AnyNode>(node: Cheerio<T>): string {
  if (node.length === 0 || node.children().length > 0) return '';
  return node.text().trim();
}

function firstText($: CheerioAPI, selectors: readonly string[]): string {
  for (const selector of selectors) {
    const value = $(selector).first().text().trim();
    if (value) return value;
  }
  return '';
}

// ─── Actions ──────────────────────────────────────────────────────────────

const STRUCTURED_SELECTORS = ['Actions > Action', 'Action', 'actions > action'];

function structuredActions($: CheerioAPI): ActionEntry[] {
  for (const selector of STRUCTURED_SELECTORS) {
    const actions: ActionEntry[] = [];
    $(selector).each((_, el) => {
      const node = $(el);
      const hasChildren = node.children().length > 0;
      // Lowercase leaf <action> elements belong to the flat layout
      if (!hasChildren && selector === 'actions > action') return;

      const text = hasChildren ? childText(node, ['Description', 'Action']) : node.text().trim();
      if (!text) return;
      actions.push({
        text,
        date: childText(node, ['Date', 'ActionDate']) || null,
        chamber: childText(node, ['Chamber', 'chamber']) || null,
      });
    });
    if (actions.length > 0) return actions;
  }
  return [];
}

/** `<actions><statusdate/><chamber/><action/>...</actions>`: each action closes one entry. */
function flatActions($: CheerioAPI): ActionEntry[] {
  let container = $('actions').first();
  if (container.length === 0) container = $('Actions').first();
  if (container.length === 0) return [];

  const actions: ActionEntry[] = [];
  let date: string | null = null;
  let chamber: string | null = null;

  container.children().each((_, el) => {
    const node = $(el);
    const text = node.text().trim();
    if (!text) return;
    switch (el.tagName.toLowerCase()) {
      case 'statusdate':
      case 'date':
      case 'actiondate':
        date = text;
        break;
      case 'chamber':
        chamber = text;
        break;
      case 'action':
      case 'description':
        actions.push({ text, date, chamber });
        date = null;
        chamber = null;
        break;
    }
  });
  return actions;
}

function readActions($: CheerioAPI): ActionEntry[] {
  const structured = structuredActions($);
  return structured.length > 0 ? structured : flatActions($);
}

// ─── Bills ────────────────────────────────────────────────────────────────

const SPONSOR_FALLBACK_PATHS = [
  'PrimarySponsor > Name',
  'PrimarySponsor',
  'ChiefSponsor > Name',
  'ChiefSponsor',
  'Sponsor > Name',
  'sponsor > sponsors',
  'Sponsors > Sponsor',
];

function sponsorFromBlock($: CheerioAPI): string | null {
  for (const selector of SPONSOR_FALLBACK_PATHS) {
    const text = leafText($(selector).first());
    if (!text) continue;
    // Comma-separated blocks list the primary sponsor first
    const first = text.split(',')[0]?.trim();
    if (first) return first;
  }
  return null;
}

function truncate(value: string, max: number): string | null {
  return value ? value.slice(0, max) : null;
}

/**
 * Parse one ILGA bill status document. Identity comes from the file name;
 * sponsorship comes from the action log, with the sponsor block as fallback.
 */
export function parseStateBillXml(xml: string, filename: string, session: number): BillRecord | null {
  const file = parseBillFilename(filename);
  if (!file) return null;

  const $ = cheerio.load(xml, { xml: true });
  const actions = readActions($);

  let publicAct: string | null = null;
  let enactedDate: string | null = null;
  let latestActionText: string | null = null;
  let latestActionDate: string | null = null;

  for (const action of actions) {
    const marker = extractEnactmentMarker(action.text);
    if (marker) {
      publicAct = marker;
      enactedDate = action.date;
    }
    latestActionText = action.text;
    latestActionDate = action.date;
  }

  const lastAction = $('lastaction').first();
  const lastActionText = childText(lastAction, ['action']);
  if (lastActionText) {
    latestActionText = lastActionText;
    latestActionDate = childText(lastAction, ['statusdate']) || latestActionDate;
    const marker = extractEnactmentMarker(lastActionText);
    if (marker) {
      publicAct = marker;
      enactedDate = latestActionDate;
    }
  }

  const parsed = parseActionLog(actions);

  return {
    billId: billKey(session, file.billType, file.billNumber),
    source: 'state',
    session,
    billType: file.billType,
    billNumber: file.billNumber,
    chamber: chamberForBillType(file.billType),
    title: truncate(firstText($, ['ShortTitle', 'Title']), 500),
    primarySponsorName: parsed.primarySponsorName ?? sponsorFromBlock($),
    primarySponsorId: null,
    chiefCoSponsorNames: parsed.chiefCoSponsorNames,
    coSponsorNames: parsed.coSponsorNames,
    cosponsors: [],
    enactment: publicAct ? { lawType: 'public', lawNumber: publicAct } : null,
    filedDate: actions.find(action => action.date)?.date ?? null,
    enactedDate: publicAct ? enactedDate : null,
    latestActionDate,
    latestActionText: latestActionText ? latestActionText.slice(0, 500) : null,
  };
}

// ─── Members ──────────────────────────────────────────────────────────────

export function parseMembersXml(xml: string, chamber: Chamber, session: number): Legislator[] {
  const $ = cheerio.load(xml, { xml: true });
  const members: Legislator[] = [];

  $('Member').each((_, el) => {
    const node = $(el);
    const firstName = childText(node, ['FirstName']) || null;
    const lastName = childText(node, ['LastName']) || null;
    const name =
      childText(node, ['Name', 'MemberName']) || [firstName, lastName].filter(Boolean).join(' ');
    const district = Number.parseInt(childText(node, ['District']), 10);
    const districtId = Number.isFinite(district) ? district : 0;

    members.push({
      id: `${session}-${chamber}-${districtId}`,
      displayName: name,
      firstName,
      lastName,
      party: childText(node, ['Party']),
      chamber,
      stateOrDistrict: String(districtId),
      session,
    });
  });

  return members;
}

// ─── Directory listing ────────────────────────────────────────────────────

/** File names linked from an HTML directory index, `*.xml` only. */
export function parseDirectoryListing(html: string): string[] {
  const $ = cheerio.load(html);
  const files: string[] = [];
  $('a[href]').each((_, el) => {
    const href = $(el).attr('href')?.trim();
    if (!href || href.startsWith('?')) return;
    const name = href.split('/').pop() ?? '';
    if (name.toLowerCase().endsWith('.xml')) files.push(name);
  });
  return files;
}
