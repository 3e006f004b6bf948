import { getLogger } from '../../utils/logger.js';
import {
  extractBillList,
  extractCosponsorsFromResponse,
  extractLawList,
  extractMemberSnapshot,
  paginationCount,
  type JsonObject,
  type NationalDetailSource,
} from '../bills/national.js';
import type { LawType, StructuredMember } from '../bills/types.js';

const PAGE_SIZE = 250;

const LAW_PATH_BY_TYPE: Record<LawType, string> = {
  public: 'pub',
  private: 'priv',
};

function sleep(ms: number): Promise<void> {
  return new Promise(r => setTimeout(r, ms));
}

export interface CongressApiOptions {
  baseUrl: string;
  delayMs: number;
}

export class CongressApi implements NationalDetailSource {
  private apiKey: string;
  private opts: CongressApiOptions;
  private log = getLogger();

  constructor(apiKey: string, opts: CongressApiOptions) {
    this.apiKey = apiKey;
    this.opts = opts;
  }

  private async fetch(endpoint: string, limit = PAGE_SIZE, offset = 0): Promise<unknown> {
    const sep = endpoint.includes('?') ? '&' : '?';
    const url = `${this.opts.baseUrl}${endpoint}${sep}api_key=${this.apiKey}&format=json&limit=${limit}&offset=${offset}`;

    const res = await fetch(url);
    if (!res.ok) {
      if (res.status === 404) return null;
      throw new Error(`Congress.gov API ${res.status}: ${endpoint}`);
    }
    const body: unknown = await res.json();
    if (this.opts.delayMs > 0) await sleep(this.opts.delayMs);
    return body;
  }

  /** Page through `endpoint` until a short page or the reported count is reached. */
  private async fetchAllPages<T>(endpoint: string, extract: (response: unknown) => T[]): Promise<T[]> {
    const results: T[] = [];
    let offset = 0;

    for (;;) {
      this.log.debug({ endpoint, offset }, 'Fetching page');
      const data = await this.fetch(endpoint, PAGE_SIZE, offset);
      const page = extract(data);
      results.push(...page);
      offset += page.length;

      const total = paginationCount(data);
      if (page.length < PAGE_SIZE || (total !== null && offset >= total)) break;
    }

    return results;
  }

  /** Every bill of a congress, list-level shape only. */
  async listBills(congress: number): Promise<JsonObject[]> {
    const bills = await this.fetchAllPages(`/bill/${congress}?sort=updateDate+desc`, extractBillList);
    this.log.info({ congress, bills: bills.length }, 'Listed bills');
    return bills;
  }

  async listLaws(congress: number, lawType: LawType): Promise<JsonObject[]> {
    const laws = await this.fetchAllPages(`/law/${congress}/${LAW_PATH_BY_TYPE[lawType]}`, extractLawList);
    this.log.info({ congress, lawType, laws: laws.length }, 'Listed laws');
    return laws;
  }

  async fetchBillItem(path: string): Promise<unknown> {
    return this.fetch(path, 1);
  }

  async fetchCosponsors(path: string): Promise<unknown[]> {
    return this.fetchAllPages(`${path}/cosponsors`, extractCosponsorsFromResponse);
  }

  /** Member snapshot for directory gaps; null for an unknown bioguide id. */
  async fetchMember(bioguideId: string): Promise<StructuredMember | null> {
    const data = await this.fetch(`/member/${encodeURIComponent(bioguideId)}`, 1);
    return extractMemberSnapshot(bioguideId, data);
  }
}
