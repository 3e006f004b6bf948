export type Chamber = 'house' | 'senate';

export type BillSource = 'state' | 'national';

export type LawType = 'public' | 'private';

export interface Legislator {
  /** `{session}-{chamber}-{district}` for the state feed, bioguide id for the national feed */
  id: string;
  displayName: string;
  firstName: string | null;
  lastName: string | null;
  /** Single-letter party code; empty string when unknown */
  party: string;
  chamber: Chamber | null;
  stateOrDistrict: string;
  session: number;
}

export interface Enactment {
  lawType: LawType;
  lawNumber: string;
}

export interface StructuredMember {
  id: string;
  name: string | null;
  party: string | null;
  state: string | null;
  chamber: Chamber | null;
}

export interface StructuredCosponsor extends StructuredMember {
  isOriginal: boolean;
  withdrawn: boolean;
}

/**
 * Per-bill normalized shape shared by both feeds. State records carry name
 * lists parsed from the action log; national records carry ids.
 */
export interface BillRecord {
  billId: string;
  source: BillSource;
  session: number;
  billType: string;
  billNumber: number;
  chamber: Chamber | null;
  title: string | null;
  primarySponsorName: string | null;
  primarySponsorId: string | null;
  chiefCoSponsorNames: string[];
  coSponsorNames: string[];
  cosponsors: StructuredCosponsor[];
  enactment: Enactment | null;
  /** Date of the first action (state) or `introducedDate` (national), as the feed writes it */
  filedDate: string | null;
  /** Date the bill became law; null while it has not */
  enactedDate: string | null;
  latestActionDate: string | null;
  latestActionText: string | null;
}

export function parseChamber(value: unknown): Chamber | null {
  if (typeof value !== 'string') return null;
  const lowered = value.trim().toLowerCase();
  if (lowered === 'house' || lowered === 'h' || lowered === 'house of representatives') return 'house';
  if (lowered === 'senate' || lowered === 's') return 'senate';
  return null;
}

const HOUSE_BILL_TYPES = new Set(['hb', 'hr', 'hjr', 'hjrca', 'hres', 'hjres', 'hconres']);

/** Originating chamber implied by a bill type code (`hb`, `sb`, `hjres`, ...). */
export function chamberForBillType(billType: string): Chamber {
  return HOUSE_BILL_TYPES.has(billType.toLowerCase()) ? 'house' : 'senate';
}

export function billKey(session: number, billType: string, billNumber: number): string {
  return `${session}-${billType.toLowerCase()}-${billNumber}`;
}
