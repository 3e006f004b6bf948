import type Database from 'better-sqlite3';
import type { EnactedLaw } from '../../aggregate/aggregator.js';
import type { BillSource } from '../../bills/types.js';

interface LawRow {
  source: string;
  session: number;
  bill_id: string;
  law_type: string;
  law_number: string;
  sponsor_id: string;
}

export function createLawModel(db: Database.Database) {
  const clear = db.prepare<[string, number]>('DELETE FROM laws WHERE source = ? AND session = ?');

  const insert = db.prepare<LawRow>(`
    INSERT OR REPLACE INTO laws (source, session, bill_id, law_type, law_number, sponsor_id)
    VALUES (@source, @session, @bill_id, @law_type, @law_number, @sponsor_id)
  `);

  const bySession = db.prepare<[string, number], LawRow>(
    'SELECT * FROM laws WHERE source = ? AND session = ? ORDER BY law_number',
  );

  const replaceForSession = db.transaction((source: BillSource, session: number, laws: readonly EnactedLaw[]) => {
    clear.run(source, session);
    for (const law of laws) {
      insert.run({
        source,
        session,
        bill_id: law.billId,
        law_type: law.lawType,
        law_number: law.lawNumber,
        sponsor_id: law.sponsorId,
      });
    }
  });

  return {
    /** Laws are derived from the full merged bill set, so each build replaces the session's rows. */
    replaceForSession(source: BillSource, session: number, laws: readonly EnactedLaw[]): void {
      replaceForSession(source, session, laws);
    },

    getBySession(source: BillSource, session: number): EnactedLaw[] {
      return bySession.all(source, session).map(row => ({
        billId: row.bill_id,
        lawType: row.law_type === 'private' ? 'private' : 'public',
        lawNumber: row.law_number,
        sponsorId: row.sponsor_id,
      }));
    },
  };
}
