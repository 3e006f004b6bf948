import {
  billKey,
  chamberForBillType,
  parseChamber,
  type BillRecord,
  type Chamber,
  type Enactment,
  type LawType,
  type StructuredCosponsor,
  type StructuredMember,
} from './types.js';

/**
 * Extraction helpers for Congress.gov JSON. The API has drifted between
 * versions (`sponsor` vs `sponsors`, `{ item: [...] }` wrappers, several
 * spellings of bioguide id), so every concept is read by probing a fixed
 * alias list in priority order.
 */

export type JsonObject = Record<string, unknown>;

export type Probe =
  | { kind: 'hit'; alias: string; value: unknown }
  | { kind: 'miss' };

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined || value === false) return false;
  if (typeof value === 'string') return value.trim() !== '';
  return true;
}

/** First alias whose value is present (non-empty string, non-null, not `false`). */
export function probe(obj: unknown, aliases: readonly string[]): Probe {
  if (!isObject(obj)) return { kind: 'miss' };
  for (const alias of aliases) {
    const value = obj[alias];
    if (isPresent(value)) return { kind: 'hit', alias, value };
  }
  return { kind: 'miss' };
}

export function probeString(obj: unknown, aliases: readonly string[]): string | null {
  const hit = probe(obj, aliases);
  if (hit.kind === 'miss') return null;
  if (typeof hit.value === 'string') return hit.value.trim();
  if (typeof hit.value === 'number') return String(hit.value);
  return null;
}

function probeList(obj: unknown, aliases: readonly string[]): unknown[] | null {
  const hit = probe(obj, aliases);
  return hit.kind === 'hit' && Array.isArray(hit.value) ? hit.value : null;
}

function probeObject(obj: unknown, aliases: readonly string[]): JsonObject | null {
  const hit = probe(obj, aliases);
  return hit.kind === 'hit' && isObject(hit.value) ? hit.value : null;
}

const BIOGUIDE_ALIASES = ['bioguideId', 'bioguideID', 'bioguide'] as const;
const NAME_ALIASES = ['fullName', 'name'] as const;
const WITHDRAWN_DATE_ALIASES = ['withdrawnDate', 'withdrawalDate', 'sponsorshipWithdrawnDate'] as const;
const WITHDRAWN_FLAG_ALIASES = ['withdrawn', 'isWithdrawn'] as const;
const ORIGINAL_ALIASES = ['isOriginalCosponsor', 'originalCosponsor', 'isOriginal'] as const;
const COUNT_ALIASES = ['count', 'totalCount', 'total', 'countAll'] as const;

/** true/t/yes/y/1 (any case), native booleans, nonzero integers. */
export function boolish(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isInteger(value) && value !== 0;
  if (typeof value === 'string') return ['true', 't', 'yes', 'y', '1'].includes(value.trim().toLowerCase());
  return false;
}

// ─── Bill list items ──────────────────────────────────────────────────────

/** List items sometimes arrive wrapped as `{ bill: {...} }`. */
export function unwrapBillItem(item: unknown): JsonObject | null {
  if (!isObject(item)) return null;
  const inner = item.bill;
  return isObject(inner) ? inner : item;
}

export function extractBillList(response: unknown): JsonObject[] {
  const data = isObject(response) ? response.data : undefined;
  const list =
    probeList(data, ['bills']) ??
    probeList(response, ['bills']) ??
    (Array.isArray(data) ? data : null) ??
    [];
  return list.map(unwrapBillItem).filter((b): b is JsonObject => b !== null);
}

export interface BillIdentity {
  congress: number;
  billType: string;
  billNumber: number;
}

export function billIdentity(congress: number, bill: JsonObject): BillIdentity | null {
  const billType = probeString(bill, ['type', 'billType'])?.toLowerCase();
  const billNumber = Number(probeString(bill, ['number', 'billNumber']));
  if (!billType || !Number.isInteger(billNumber) || billNumber <= 0) return null;
  const ownCongress = Number(probeString(bill, ['congress']));
  return { congress: Number.isInteger(ownCongress) && ownCongress > 0 ? ownCongress : congress, billType, billNumber };
}

/**
 * API path for the bill's item endpoint (`/bill/119/hr/3076`). Prefers the
 * `url` the API handed back.
 */
export function billItemPath(congress: number, bill: JsonObject): string | null {
  const url = probeString(bill, ['url']);
  if (url) {
    const idx = url.indexOf('/v3/');
    if (idx >= 0) return url.slice(idx + '/v3'.length).split('?')[0] ?? null;
  }
  const identity = billIdentity(congress, bill);
  if (!identity) return null;
  return `/bill/${identity.congress}/${identity.billType}/${identity.billNumber}`;
}

export function nationalBillId(congress: number, bill: JsonObject): string | null {
  const identity = billIdentity(congress, bill);
  return identity ? billKey(identity.congress, identity.billType, identity.billNumber) : null;
}

// ─── Sponsor ──────────────────────────────────────────────────────────────

function memberFrom(obj: JsonObject, fallbackChamber: Chamber | null): StructuredMember | null {
  const id = probeString(obj, BIOGUIDE_ALIASES);
  if (!id) return null;
  return {
    id,
    name: probeString(obj, NAME_ALIASES),
    party: probeString(obj, ['party', 'partyName']),
    state: probeString(obj, ['state']),
    chamber: parseChamber(probeString(obj, ['chamber'])) ?? fallbackChamber,
  };
}

function wrappedItems(value: unknown): unknown[] | null {
  if (Array.isArray(value)) return value;
  return probeList(value, ['item']);
}

/**
 * Primary sponsor from a list-level or item-level bill object: a single
 * `sponsor` object first, then the first entry of `sponsors`.
 */
export function extractPrimarySponsor(bill: JsonObject): StructuredMember | null {
  const inner = unwrapBillItem(bill) ?? bill;
  const originChamber = parseChamber(probeString(inner, ['originChamber']));

  const single = probeObject(inner, ['sponsor']);
  if (single) {
    const member = memberFrom(single, originChamber);
    if (member) return member;
  }

  const items = wrappedItems(inner.sponsors);
  const first = items?.[0];
  return isObject(first) ? memberFrom(first, originChamber) : null;
}

// ─── Member endpoint ──────────────────────────────────────────────────────

function lastObject(value: unknown): JsonObject | null {
  const items = wrappedItems(value);
  if (!items) return null;
  for (let i = items.length - 1; i >= 0; i--) {
    const item = items[i];
    if (isObject(item)) return item;
  }
  return null;
}

/**
 * Member details from `/member/{bioguideId}`. Chamber, and party or state
 * when the member object lacks them, come from the first `roles` entry or
 * else the latest of `terms`. Party falls back to the latest `partyHistory`.
 */
export function extractMemberSnapshot(bioguideId: string, response: unknown): StructuredMember | null {
  const member = probeObject(probeObject(response, ['data']), ['member']) ?? probeObject(response, ['member']);
  if (!member) return null;

  const firstRole = wrappedItems(member.roles)?.find(isObject) ?? null;
  const role = firstRole ?? lastObject(member.terms);
  const partyHistory = lastObject(member.partyHistory);

  return {
    id: bioguideId,
    name: probeString(member, ['directOrderName', 'name', 'fullName', 'invertedOrderName']),
    // Abbreviations first, to match the `party` codes on sponsor and co-sponsor items
    party:
      probeString(member, ['party']) ??
      probeString(role, ['party']) ??
      probeString(partyHistory, ['partyAbbreviation']) ??
      probeString(member, ['partyName']) ??
      probeString(partyHistory, ['partyName']),
    state: probeString(member, ['state']) ?? probeString(role, ['state', 'stateCode']),
    chamber: parseChamber(probeString(role, ['chamber'])),
  };
}

/** Bill object of an item endpoint response: `{ bill: {...} }` or `{ data: { bill: {...} } }`. */
export function extractItemBill(response: unknown): JsonObject | null {
  const data = probeObject(response, ['data']);
  return probeObject(data, ['bill']) ?? probeObject(response, ['bill']);
}

// ─── Co-sponsors ──────────────────────────────────────────────────────────

export function isWithdrawnCosponsor(item: JsonObject): boolean {
  if (probe(item, WITHDRAWN_DATE_ALIASES).kind === 'hit') return true;
  return WITHDRAWN_FLAG_ALIASES.some(alias => boolish(item[alias]));
}

export function isOriginalCosponsor(item: JsonObject): boolean {
  return ORIGINAL_ALIASES.some(alias => boolish(item[alias]));
}

export function normalizeCosponsorItem(item: unknown): StructuredCosponsor | null {
  if (!isObject(item)) return null;
  const member = memberFrom(item, null);
  if (!member) return null;
  return {
    ...member,
    isOriginal: isOriginalCosponsor(item),
    withdrawn: isWithdrawnCosponsor(item),
  };
}

/** Inline co-sponsor items: a bare list, `{ item: [...] }`, or `{ cosponsors: [...] }`. */
export function extractCosponsorItems(value: unknown): unknown[] | null {
  if (Array.isArray(value)) return value;
  return probeList(value, ['item']) ?? probeList(value, ['cosponsors']);
}

export function cosponsorCountHint(value: unknown): number | null {
  if (Array.isArray(value)) return value.length;
  if (!isObject(value)) return null;
  for (const alias of COUNT_ALIASES) {
    if (!(alias in value)) continue;
    const count = Number(value[alias] ?? 0);
    return Number.isFinite(count) ? Math.trunc(count) : null;
  }
  const items = probeList(value, ['item']);
  return items ? items.length : null;
}

/** Co-sponsor endpoint response, in any of its observed shapes. */
export function extractCosponsorsFromResponse(response: unknown): unknown[] {
  const data = probeObject(response, ['data']);
  for (const holder of [response, data]) {
    if (!isObject(holder)) continue;
    const value = holder.cosponsors;
    if (Array.isArray(value)) return value;
    const wrapped = probeList(value, ['item']);
    if (wrapped) return wrapped;
  }
  return [];
}

export function normalizeCosponsorList(items: readonly unknown[]): StructuredCosponsor[] {
  return items.map(normalizeCosponsorItem).filter((c): c is StructuredCosponsor => c !== null);
}

export function paginationCount(response: unknown): number | null {
  const pagination = probeObject(response, ['pagination']);
  const count = Number(probeString(pagination, ['count']));
  return Number.isFinite(count) && count > 0 ? count : null;
}

// ─── Laws ─────────────────────────────────────────────────────────────────

export function extractLawList(response: unknown): JsonObject[] {
  const data = isObject(response) ? response.data : undefined;
  const list =
    probeList(response, ['bills']) ??
    probeList(response, ['laws']) ??
    probeList(data, ['bills']) ??
    probeList(data, ['laws']) ??
    (Array.isArray(data) ? data : null) ??
    [];
  return list.filter(isObject);
}

/** Law number from a law list item: `laws[0].number` on bill-shaped items, else `number`. */
function lawNumberOf(law: JsonObject): string | null {
  const nested = probeList(law, ['laws'])?.find(isObject);
  return (nested && probeString(nested, ['number'])) ?? probeString(law, ['lawNumber', 'number']);
}

/**
 * Bill key (`119-hr-1234`) → enactment. Law items are either the bill itself
 * or carry a `bill` reference.
 */
export function buildLawLookup(
  congress: number,
  laws: ReadonlyArray<{ lawType: LawType; item: JsonObject }>,
): Map<string, Enactment> {
  const lookup = new Map<string, Enactment>();
  for (const { lawType, item } of laws) {
    const bill = probeObject(item, ['bill']) ?? item;
    const identity = billIdentity(congress, bill);
    const lawNumber = lawNumberOf(item);
    if (!identity || !lawNumber) continue;
    lookup.set(billKey(identity.congress, identity.billType, identity.billNumber), { lawType, lawNumber });
  }
  return lookup;
}

export interface LatestAction {
  text: string | null;
  date: string | null;
  code: string | null;
}

export function latestAction(bill: JsonObject): LatestAction {
  const action = probeObject(bill, ['latestAction']);
  return {
    text: probeString(action, ['text']),
    date: probeString(action, ['actionDate', 'date']),
    code: probeString(action, ['actionCode', 'code']),
  };
}

// Congress.gov action codes for "became public law" and "became private law"
const PUBLIC_LAW_CODES = { min: 36000, max: 39999 } as const;
const PRIVATE_LAW_CODES = { min: 41000, max: 44999 } as const;

/** Law number for an enactment found by action code when the text carries none. */
export const UNNUMBERED_LAW = 'unnumbered';

function actionCodeNumber(code: unknown): number | null {
  if (typeof code === 'number') return Number.isInteger(code) ? code : null;
  if (typeof code !== 'string' || !/^\s*\d+\s*$/.test(code)) return null;
  return Number(code);
}

/** Law type an action code stands for, or null when the code is no enactment. */
export function enactedLawType(code: unknown): LawType | null {
  const value = actionCodeNumber(code);
  if (value === null) return null;
  if (value >= PUBLIC_LAW_CODES.min && value <= PUBLIC_LAW_CODES.max) return 'public';
  if (value >= PRIVATE_LAW_CODES.min && value <= PRIVATE_LAW_CODES.max) return 'private';
  return null;
}

export function isEnactedActionCode(code: unknown): boolean {
  return enactedLawType(code) !== null;
}

/**
 * Enactment read off the latest action, for bills the law endpoints have not
 * listed yet. The number comes from "Became Public Law No: 119-3." style text.
 */
export function enactmentFromAction(action: LatestAction): Enactment | null {
  const lawType = enactedLawType(action.code);
  if (!lawType) return null;
  const numbered = /\b(?:public|private) law\s+(?:no\.?:?\s*)?(\d+-\d+)/i.exec(action.text ?? '');
  return { lawType, lawNumber: numbered?.[1] ?? UNNUMBERED_LAW };
}

// ─── Record assembly ──────────────────────────────────────────────────────

export interface NationalRecordInput {
  congress: number;
  billType: string;
  billNumber: number;
  title: string | null;
  sponsor: StructuredMember | null;
  cosponsors: StructuredCosponsor[];
  enactment: Enactment | null;
  filedDate: string | null;
  latestActionDate: string | null;
  latestActionText: string | null;
}

/** An enacted bill's law is its latest action, so that action's date is the enactment date. */
export function buildNationalRecord(input: NationalRecordInput): BillRecord {
  const billType = input.billType.toLowerCase();
  const chamber = chamberForBillType(billType);
  return {
    billId: billKey(input.congress, billType, input.billNumber),
    source: 'national',
    session: input.congress,
    billType,
    billNumber: input.billNumber,
    chamber,
    title: input.title,
    primarySponsorName: input.sponsor?.name ?? null,
    primarySponsorId: input.sponsor?.id ?? null,
    chiefCoSponsorNames: [],
    coSponsorNames: [],
    // Members without a chamber take the bill's originating chamber
    cosponsors: input.cosponsors.map(c => ({ ...c, chamber: c.chamber ?? chamber })),
    enactment: input.enactment,
    filedDate: input.filedDate,
    enactedDate: input.enactment ? input.latestActionDate : null,
    latestActionDate: input.latestActionDate,
    latestActionText: input.latestActionText,
  };
}

/** Per-bill endpoints the collector falls back to when the list item is thin. */
export interface NationalDetailSource {
  /** `GET {path}`; null when the bill does not exist. */
  fetchBillItem(path: string): Promise<unknown>;
  /** Every co-sponsor item for the bill, across pages. */
  fetchCosponsors(path: string): Promise<unknown[]>;
}

export interface CollectedNationalBill {
  record: BillRecord;
  sponsor: StructuredMember | null;
  fetchedItem: boolean;
  fetchedCosponsors: boolean;
}

/**
 * Resolve one list item into a full national record: sponsor from the list
 * level or the item endpoint, co-sponsors inline or from the co-sponsor
 * endpoint (skipped when the item reports a count of zero).
 */
export async function collectNationalBill(
  congress: number,
  listItem: JsonObject,
  source: NationalDetailSource,
  lawLookup: ReadonlyMap<string, Enactment>,
): Promise<CollectedNationalBill | null> {
  const identity = billIdentity(congress, listItem);
  const path = billItemPath(congress, listItem);
  if (!identity || !path) return null;

  let bill = listItem;
  let sponsor = extractPrimarySponsor(listItem);
  let fetchedItem = false;

  if (!sponsor) {
    const itemBill = extractItemBill(await source.fetchBillItem(path));
    fetchedItem = true;
    if (itemBill) {
      bill = { ...listItem, ...itemBill };
      sponsor = extractPrimarySponsor(itemBill);
    }
  }

  let cosponsors = normalizeCosponsorList(extractCosponsorItems(bill.cosponsors) ?? []);
  let fetchedCosponsors = false;
  if (cosponsors.length === 0 && cosponsorCountHint(bill.cosponsors) !== 0) {
    cosponsors = normalizeCosponsorList(await source.fetchCosponsors(path));
    fetchedCosponsors = true;
  }

  const action = latestAction(bill);
  const record = buildNationalRecord({
    congress: identity.congress,
    billType: identity.billType,
    billNumber: identity.billNumber,
    title: probeString(bill, ['title']),
    sponsor,
    cosponsors,
    enactment:
      lawLookup.get(billKey(identity.congress, identity.billType, identity.billNumber)) ?? enactmentFromAction(action),
    filedDate: probeString(bill, ['introducedDate']),
    latestActionDate: action.date,
    latestActionText: action.text,
  });

  return { record, sponsor, fetchedItem, fetchedCosponsors };
}
