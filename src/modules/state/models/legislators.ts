import type Database from 'better-sqlite3';
import { parseChamber, type BillSource, type Legislator } from '../../bills/types.js';

export interface LegislatorRow {
  id: string;
  source: string;
  session: number;
  display_name: string;
  first_name: string | null;
  last_name: string | null;
  party: string;
  chamber: string | null;
  state_or_district: string;
  updated_at: string;
}

type LegislatorParams = Omit<LegislatorRow, 'updated_at'>;

function toLegislator(row: LegislatorRow): Legislator {
  return {
    id: row.id,
    displayName: row.display_name,
    firstName: row.first_name,
    lastName: row.last_name,
    party: row.party,
    chamber: parseChamber(row.chamber),
    stateOrDistrict: row.state_or_district,
    session: row.session,
  };
}

export function createLegislatorModel(db: Database.Database) {
  const upsert = db.prepare<LegislatorParams>(`
    INSERT INTO legislators (
      id, source, session, display_name, first_name, last_name, party, chamber, state_or_district
    ) VALUES (
      @id, @source, @session, @display_name, @first_name, @last_name, @party, @chamber, @state_or_district
    )
    ON CONFLICT(source, session, id) DO UPDATE SET
      display_name = excluded.display_name,
      first_name = excluded.first_name,
      last_name = excluded.last_name,
      party = excluded.party,
      chamber = excluded.chamber,
      state_or_district = excluded.state_or_district,
      updated_at = datetime('now')
  `);

  const bySession = db.prepare<[string, number], LegislatorRow>(
    'SELECT * FROM legislators WHERE source = ? AND session = ? ORDER BY display_name',
  );

  const count = db.prepare<[string, number], { n: number }>(
    'SELECT COUNT(*) as n FROM legislators WHERE source = ? AND session = ?',
  );

  const upsertMany = db.transaction((source: BillSource, legislators: readonly Legislator[]) => {
    for (const l of legislators) {
      upsert.run({
        id: l.id,
        source,
        session: l.session,
        display_name: l.displayName,
        first_name: l.firstName,
        last_name: l.lastName,
        party: l.party,
        chamber: l.chamber,
        state_or_district: l.stateOrDistrict,
      });
    }
  });

  return {
    upsertMany(source: BillSource, legislators: readonly Legislator[]): void {
      upsertMany(source, legislators);
    },

    getBySession(source: BillSource, session: number): Legislator[] {
      return bySession.all(source, session).map(toLegislator);
    },

    count(source: BillSource, session: number): number {
      return count.get(source, session)?.n ?? 0;
    },
  };
}

export type LegislatorModel = ReturnType<typeof createLegislatorModel>;
