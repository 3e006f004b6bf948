import type Database from 'better-sqlite3';
import type { BillSource } from '../../bills/types.js';
import { getLogger } from '../../../utils/logger.js';
import { isStatsReport, type StatsReport } from '../../pipeline/report.js';

export function createStatsCacheModel(db: Database.Database) {
  const save = db.prepare<{ source: string; session: number; report_json: string; generated_at: string }>(`
    INSERT INTO stats_cache (source, session, report_json, generated_at)
    VALUES (@source, @session, @report_json, @generated_at)
    ON CONFLICT(source, session) DO UPDATE SET
      report_json = excluded.report_json,
      generated_at = excluded.generated_at
  `);

  const get = db.prepare<[string, number], { report_json: string }>(
    'SELECT report_json FROM stats_cache WHERE source = ? AND session = ?',
  );

  const sessions = db.prepare<[string], { session: number; generated_at: string }>(
    'SELECT session, generated_at FROM stats_cache WHERE source = ? ORDER BY session DESC',
  );

  return {
    save(report: StatsReport): void {
      save.run({
        source: report.source,
        session: report.session,
        report_json: JSON.stringify(report),
        generated_at: report.generatedAt,
      });
    },

    get(source: BillSource, session: number): StatsReport | null {
      const row = get.get(source, session);
      if (!row) return null;
      try {
        const parsed: unknown = JSON.parse(row.report_json);
        return isStatsReport(parsed) ? parsed : null;
      } catch (err) {
        getLogger().warn({ source, session, err }, 'Discarding unreadable cached report');
        return null;
      }
    },

    listSessions(source: BillSource): Array<{ session: number; generatedAt: string }> {
      return sessions.all(source).map(r => ({ session: r.session, generatedAt: r.generated_at }));
    },
  };
}
