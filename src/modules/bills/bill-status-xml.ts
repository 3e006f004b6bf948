import fs from 'node:fs/promises';
import path from 'node:path';
import * as cheerio from 'cheerio';
import type { Cheerio } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { getLogger } from '../../utils/logger.js';
import { runWithConcurrency } from '../../utils/async-queue.js';
import { boolish, buildNationalRecord } from './national.js';
import {
  parseChamber,
  type BillRecord,
  type Chamber,
  type Enactment,
  type StructuredCosponsor,
  type StructuredMember,
} from './types.js';

/** One parsed Bill Status bulk file. */
export interface BillStatusDocument {
  congress: number;
  updateDate: string | null;
  sponsor: StructuredMember | null;
  record: BillRecord;
}

const BIOGUIDE_NAMES = ['bioguideId', 'bioguideID', 'bioguide'];

function findText<T extends AnyNode>(scope: Cheerio<T>, names: readonly string[]): string | null {
  for (const name of names) {
    const value = scope.find(name).first().text().trim();
    if (value) return value;
  }
  return null;
}

/** Child element first, then attribute of the same name. */
function readField<T extends AnyNode>(item: Cheerio<T>, names: readonly string[]): string | null {
  const fromChild = findText(item, names);
  if (fromChild) return fromChild;
  for (const name of names) {
    const attr = item.attr(name)?.trim();
    if (attr) return attr;
  }
  return null;
}

function readMember<T extends AnyNode>(item: Cheerio<T>, fallbackChamber: Chamber | null): StructuredMember | null {
  const id = readField(item, BIOGUIDE_NAMES);
  if (!id) return null;
  return {
    id,
    name: findText(item, ['fullName', 'name']),
    party: findText(item, ['party']),
    state: findText(item, ['state']),
    chamber: parseChamber(findText(item, ['chamber'])) ?? fallbackChamber,
  };
}

function lawFrom<T extends AnyNode>(root: Cheerio<T>): Enactment | null {
  const law = root.find('laws').first().children('item, law').first();
  if (law.length === 0) return null;
  const lawNumber = findText(law, ['number']);
  if (!lawNumber) return null;
  const type = findText(law, ['type']) ?? '';
  return { lawType: /private/i.test(type) ? 'private' : 'public', lawNumber };
}

/**
 * Parse one Bill Status XML payload. Returns null when the document lacks
 * a congress, bill type or bill number.
 */
export function parseBillStatusXml(xml: string): BillStatusDocument | null {
  const $ = cheerio.load(xml, { xml: true });
  const root = $.root();

  const congress = Number(findText(root, ['congress']));
  const billType = findText(root, ['billType', 'type'])?.toLowerCase();
  const billNumber = Number(findText(root, ['billNumber', 'number']));
  if (!Number.isInteger(congress) || congress <= 0) return null;
  if (!billType || !Number.isInteger(billNumber) || billNumber <= 0) return null;

  const originChamber = parseChamber(findText(root, ['originChamber']));

  const sponsor =
    root
      .find('sponsors')
      .first()
      .children('item, sponsor')
      .toArray()
      .map(el => readMember($(el), originChamber))
      .find((m): m is StructuredMember => m !== null) ?? null;

  const cosponsors: StructuredCosponsor[] = [];
  root
    .find('cosponsors')
    .first()
    .children('item, cosponsor')
    .each((_, el) => {
      const item = $(el);
      const member = readMember(item, null);
      if (!member) return;
      const withdrawnDate = readField(item, ['withdrawnDate', 'sponsorshipWithdrawnDate', 'withdrawalDate']);
      cosponsors.push({
        ...member,
        isOriginal: boolish(readField(item, ['isOriginalCosponsor', 'originalCosponsor', 'isOriginal'])),
        withdrawn: withdrawnDate !== null || boolish(readField(item, ['isWithdrawn', 'withdrawn'])),
      });
    });

  const latestAction = root.find('latestAction').first();

  return {
    congress,
    updateDate: findText(root, ['updateDateIncludingText', 'updateDate']),
    sponsor,
    record: buildNationalRecord({
      congress,
      billType,
      billNumber,
      title: findText(root, ['title']),
      sponsor,
      cosponsors,
      enactment: lawFrom(root),
      filedDate: findText(root, ['introducedDate']),
      latestActionDate: findText(latestAction, ['actionDate']),
      latestActionText: findText(latestAction, ['text']),
    }),
  };
}

async function discoverXmlFiles(baseDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(baseDir, { recursive: true });
  } catch {
    return [];
  }
  return entries
    .filter(entry => entry.toLowerCase().endsWith('.xml'))
    .map(entry => path.join(baseDir, entry))
    .sort();
}

/**
 * Load every Bill Status file under `baseDir` for one congress.
 * Returns bill id → parsed document; unreadable and foreign-congress files are skipped.
 */
export async function loadBulkBillStatus(
  congress: number,
  baseDir: string,
  concurrency = 4,
): Promise<Map<string, BillStatusDocument>> {
  const log = getLogger();
  const files = await discoverXmlFiles(baseDir);
  const out = new Map<string, BillStatusDocument>();
  if (files.length === 0) return out;

  const parsed = await runWithConcurrency(
    files,
    async file => {
      try {
        return parseBillStatusXml(await fs.readFile(file, 'utf-8'));
      } catch (err) {
        log.warn({ file, err }, 'Unreadable bill status file');
        return null;
      }
    },
    { concurrency },
  );

  for (const doc of parsed) {
    if (!doc || doc.congress !== congress) continue;
    out.set(doc.record.billId, doc);
  }

  log.info({ congress, files: files.length, bills: out.size }, 'Loaded bulk bill status');
  return out;
}
