import { getLogger } from '../../utils/logger.js';
import {
  isCountedBillFile,
  parseDirectoryListing,
  parseMembersXml,
  parseStateBillXml,
} from '../bills/state-xml.js';
import type { BillRecord, Chamber, Legislator } from '../bills/types.js';

function sleep(ms: number): Promise<void> {
  return new Promise(r => setTimeout(r, ms));
}

/** UTF-8 (BOM stripped) when the bytes are valid UTF-8, else Latin-1. */
export function decodeXml(bytes: ArrayBuffer | Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    // Some member files carry Latin-1 accented names
    return new TextDecoder('latin1').decode(bytes);
  }
}

export interface IlgaFtpOptions {
  root: string;
  delayMs: number;
}

/** Read-only client for the Illinois General Assembly FTP mirror. */
export class IlgaFtpClient {
  private opts: IlgaFtpOptions;
  private log = getLogger();

  constructor(opts: IlgaFtpOptions) {
    this.opts = opts;
  }

  private billsUrl(session: number): string {
    return `${this.opts.root}/legislation/${session}/BillStatus/XML`;
  }

  private async get(url: string): Promise<ArrayBuffer> {
    this.log.debug({ url }, 'GET');
    const res = await fetch(url);
    if (!res.ok) throw new Error(`ILGA FTP ${res.status}: ${url}`);
    return res.arrayBuffer();
  }

  async fetchXml(url: string): Promise<string> {
    return decodeXml(await this.get(url));
  }

  private async fetchChamber(session: number, chamber: Chamber): Promise<Legislator[]> {
    const file = chamber === 'house' ? 'HouseMembers' : 'SenateMembers';
    try {
      const members = parseMembersXml(
        await this.fetchXml(`${this.opts.root}/Members/${session}${file}.xml`),
        chamber,
        session,
      );
      this.log.info({ session, chamber, members: members.length }, 'Fetched members');
      return members;
    } catch (err) {
      this.log.warn({ session, chamber, err }, 'Failed to fetch members');
      return [];
    }
  }

  async fetchMembers(session: number): Promise<Legislator[]> {
    const house = await this.fetchChamber(session, 'house');
    await sleep(this.opts.delayMs);
    const senate = await this.fetchChamber(session, 'senate');
    return [...house, ...senate];
  }

  async listBillFiles(session: number): Promise<string[]> {
    const html = new TextDecoder().decode(await this.get(`${this.billsUrl(session)}/`));
    const files = parseDirectoryListing(html).filter(isCountedBillFile);
    this.log.info({ session, files: files.length }, 'Listed bill files');
    return files;
  }

  async fetchBill(session: number, filename: string): Promise<BillRecord | null> {
    const xml = await this.fetchXml(`${this.billsUrl(session)}/${filename}`);
    await sleep(this.opts.delayMs);
    return parseStateBillXml(xml, filename, session);
  }
}
