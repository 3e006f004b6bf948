import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { getLogger } from '../../utils/logger.js';

let db: Database.Database | undefined;

const MIGRATIONS = [
  // Migration 000: Core tables
  `
  CREATE TABLE IF NOT EXISTS legislators (
    id TEXT NOT NULL,
    source TEXT NOT NULL,
    session INTEGER NOT NULL,
    display_name TEXT NOT NULL,
    first_name TEXT,
    last_name TEXT,
    party TEXT NOT NULL DEFAULT '',
    chamber TEXT,
    state_or_district TEXT NOT NULL DEFAULT '',
    updated_at TEXT NOT NULL DEFAULT (datetime('now')),
    PRIMARY KEY (source, session, id)
  );

  CREATE TABLE IF NOT EXISTS bills (
    bill_id TEXT NOT NULL,
    source TEXT NOT NULL,
    session INTEGER NOT NULL,
    bill_type TEXT NOT NULL,
    bill_number INTEGER NOT NULL,
    chamber TEXT,
    title TEXT,
    primary_sponsor_name TEXT,
    primary_sponsor_id TEXT,
    chief_co_sponsors_json TEXT NOT NULL DEFAULT '[]',
    co_sponsors_json TEXT NOT NULL DEFAULT '[]',
    law_type TEXT,
    law_number TEXT,
    latest_action_date TEXT,
    latest_action_text TEXT,
    updated_at TEXT NOT NULL DEFAULT (datetime('now')),
    PRIMARY KEY (source, bill_id)
  );

  CREATE TABLE IF NOT EXISTS bill_cosponsors (
    source TEXT NOT NULL,
    bill_id TEXT NOT NULL,
    legislator_id TEXT NOT NULL,
    name TEXT,
    party TEXT,
    state TEXT,
    chamber TEXT,
    is_original INTEGER NOT NULL DEFAULT 0,
    withdrawn INTEGER NOT NULL DEFAULT 0,
    PRIMARY KEY (source, bill_id, legislator_id)
  );

  CREATE INDEX IF NOT EXISTS idx_bills_session ON bills(source, session);
  CREATE INDEX IF NOT EXISTS idx_bills_pending ON bills(source, session, law_number);
  CREATE INDEX IF NOT EXISTS idx_legislators_session ON legislators(source, session);
  `,
  // Migration 001: Enacted laws and report cache
  `
  CREATE TABLE IF NOT EXISTS laws (
    source TEXT NOT NULL,
    session INTEGER NOT NULL,
    bill_id TEXT NOT NULL,
    law_type TEXT NOT NULL,
    law_number TEXT NOT NULL,
    sponsor_id TEXT NOT NULL,
    PRIMARY KEY (source, bill_id)
  );

  CREATE TABLE IF NOT EXISTS stats_cache (
    source TEXT NOT NULL,
    session INTEGER NOT NULL,
    report_json TEXT NOT NULL,
    generated_at TEXT NOT NULL DEFAULT (datetime('now')),
    PRIMARY KEY (source, session)
  );
  `,
  // Migration 002: Filing and enactment dates for the timeline
  `
  ALTER TABLE bills ADD COLUMN filed_date TEXT;
  ALTER TABLE bills ADD COLUMN enacted_date TEXT;
  `,
];

/** Open a database and bring it up to the latest migration. `:memory:` works for tests. */
export function openDb(dbPath: string): Database.Database {
  const log = getLogger();
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const conn = new Database(dbPath);
  if (dbPath !== ':memory:') conn.pragma('journal_mode = WAL');
  conn.pragma('foreign_keys = ON');

  conn.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const applied = new Set(
    conn
      .prepare<[], { id: number }>('SELECT id FROM _migrations')
      .all()
      .map(r => r.id),
  );

  const record = conn.prepare<[number]>('INSERT INTO _migrations (id) VALUES (?)');
  MIGRATIONS.forEach((sql, i) => {
    if (applied.has(i)) return;
    log.info(`Running migration ${i}`);
    conn.exec(sql);
    record.run(i);
  });

  return conn;
}

export function getDb(dbPath: string): Database.Database {
  if (db) return db;
  db = openDb(dbPath);
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = undefined;
  }
}
