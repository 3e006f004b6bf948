import type Database from 'better-sqlite3';
import {
  parseChamber,
  type BillRecord,
  type BillSource,
  type Enactment,
  type StructuredCosponsor,
} from '../../bills/types.js';

export interface BillRow {
  bill_id: string;
  source: string;
  session: number;
  bill_type: string;
  bill_number: number;
  chamber: string | null;
  title: string | null;
  primary_sponsor_name: string | null;
  primary_sponsor_id: string | null;
  chief_co_sponsors_json: string;
  co_sponsors_json: string;
  law_type: string | null;
  law_number: string | null;
  filed_date: string | null;
  enacted_date: string | null;
  latest_action_date: string | null;
  latest_action_text: string | null;
  updated_at: string;
}

export interface BillCosponsorRow {
  source: string;
  bill_id: string;
  legislator_id: string;
  name: string | null;
  party: string | null;
  state: string | null;
  chamber: string | null;
  is_original: number;
  withdrawn: number;
}

type BillParams = Omit<BillRow, 'updated_at'>;

/** Stored name lists are JSON arrays; anything else reads as empty. */
export function parseNameList(json: string | null): string[] {
  if (!json) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return [];
  }
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((name): name is string => typeof name === 'string' && name.trim() !== '');
}

function toEnactment(row: BillRow): Enactment | null {
  if (!row.law_number) return null;
  return { lawType: row.law_type === 'private' ? 'private' : 'public', lawNumber: row.law_number };
}

function toCosponsor(row: BillCosponsorRow): StructuredCosponsor {
  return {
    id: row.legislator_id,
    name: row.name,
    party: row.party,
    state: row.state,
    chamber: parseChamber(row.chamber),
    isOriginal: row.is_original === 1,
    withdrawn: row.withdrawn === 1,
  };
}

function toRecord(row: BillRow, source: BillSource, cosponsors: StructuredCosponsor[]): BillRecord {
  return {
    billId: row.bill_id,
    source,
    session: row.session,
    billType: row.bill_type,
    billNumber: row.bill_number,
    chamber: parseChamber(row.chamber),
    title: row.title,
    primarySponsorName: row.primary_sponsor_name,
    primarySponsorId: row.primary_sponsor_id,
    chiefCoSponsorNames: parseNameList(row.chief_co_sponsors_json),
    coSponsorNames: parseNameList(row.co_sponsors_json),
    cosponsors,
    enactment: toEnactment(row),
    filedDate: row.filed_date,
    enactedDate: row.enacted_date,
    latestActionDate: row.latest_action_date,
    latestActionText: row.latest_action_text,
  };
}

export function createBillModel(db: Database.Database) {
  const upsert = db.prepare<BillParams>(`
    INSERT INTO bills (
      bill_id, source, session, bill_type, bill_number, chamber, title,
      primary_sponsor_name, primary_sponsor_id, chief_co_sponsors_json, co_sponsors_json,
      law_type, law_number, filed_date, enacted_date, latest_action_date, latest_action_text
    ) VALUES (
      @bill_id, @source, @session, @bill_type, @bill_number, @chamber, @title,
      @primary_sponsor_name, @primary_sponsor_id, @chief_co_sponsors_json, @co_sponsors_json,
      @law_type, @law_number, @filed_date, @enacted_date, @latest_action_date, @latest_action_text
    )
    ON CONFLICT(source, bill_id) DO UPDATE SET
      chamber = excluded.chamber,
      title = excluded.title,
      primary_sponsor_name = excluded.primary_sponsor_name,
      primary_sponsor_id = excluded.primary_sponsor_id,
      chief_co_sponsors_json = excluded.chief_co_sponsors_json,
      co_sponsors_json = excluded.co_sponsors_json,
      law_type = excluded.law_type,
      law_number = excluded.law_number,
      filed_date = excluded.filed_date,
      enacted_date = excluded.enacted_date,
      latest_action_date = excluded.latest_action_date,
      latest_action_text = excluded.latest_action_text,
      updated_at = datetime('now')
  `);

  const clearCosponsors = db.prepare<[string, string]>(
    'DELETE FROM bill_cosponsors WHERE source = ? AND bill_id = ?',
  );

  const insertCosponsor = db.prepare<BillCosponsorRow>(`
    INSERT OR REPLACE INTO bill_cosponsors (
      source, bill_id, legislator_id, name, party, state, chamber, is_original, withdrawn
    ) VALUES (
      @source, @bill_id, @legislator_id, @name, @party, @state, @chamber, @is_original, @withdrawn
    )
  `);

  const bySession = db.prepare<[string, number], BillRow>(
    'SELECT * FROM bills WHERE source = ? AND session = ? ORDER BY bill_type, bill_number',
  );

  const cosponsorsBySession = db.prepare<[string, number], BillCosponsorRow>(`
    SELECT c.* FROM bill_cosponsors c
    JOIN bills b ON b.source = c.source AND b.bill_id = c.bill_id
    WHERE b.source = ? AND b.session = ?
    ORDER BY c.rowid
  `);

  const count = db.prepare<[string, number], { n: number }>(
    'SELECT COUNT(*) as n FROM bills WHERE source = ? AND session = ?',
  );

  const upsertMany = db.transaction((records: readonly BillRecord[]) => {
    for (const bill of records) {
      upsert.run({
        bill_id: bill.billId,
        source: bill.source,
        session: bill.session,
        bill_type: bill.billType,
        bill_number: bill.billNumber,
        chamber: bill.chamber,
        title: bill.title,
        primary_sponsor_name: bill.primarySponsorName,
        primary_sponsor_id: bill.primarySponsorId,
        chief_co_sponsors_json: JSON.stringify(bill.chiefCoSponsorNames),
        co_sponsors_json: JSON.stringify(bill.coSponsorNames),
        law_type: bill.enactment?.lawType ?? null,
        law_number: bill.enactment?.lawNumber ?? null,
        filed_date: bill.filedDate,
        enacted_date: bill.enactedDate,
        latest_action_date: bill.latestActionDate,
        latest_action_text: bill.latestActionText,
      });

      clearCosponsors.run(bill.source, bill.billId);
      for (const c of bill.cosponsors) {
        insertCosponsor.run({
          source: bill.source,
          bill_id: bill.billId,
          legislator_id: c.id,
          name: c.name,
          party: c.party,
          state: c.state,
          chamber: c.chamber,
          is_original: c.isOriginal ? 1 : 0,
          withdrawn: c.withdrawn ? 1 : 0,
        });
      }
    }
  });

  return {
    upsertMany(records: readonly BillRecord[]): void {
      upsertMany(records);
    },

    getBySession(source: BillSource, session: number): BillRecord[] {
      const cosponsors = new Map<string, StructuredCosponsor[]>();
      for (const row of cosponsorsBySession.all(source, session)) {
        const list = cosponsors.get(row.bill_id);
        if (list) list.push(toCosponsor(row));
        else cosponsors.set(row.bill_id, [toCosponsor(row)]);
      }
      return bySession.all(source, session).map(row => toRecord(row, source, cosponsors.get(row.bill_id) ?? []));
    },

    count(source: BillSource, session: number): number {
      return count.get(source, session)?.n ?? 0;
    },
  };
}

export type BillModel = ReturnType<typeof createBillModel>;
