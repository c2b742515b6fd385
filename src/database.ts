/**
 * Journal Database
 *
 * SQLite initialization and schema creation.
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { setDatabase as setJournalDb } from './services/journal.service';

export const MEMORY_DATABASE = ':memory:';

/**
 * Open (creating if needed) the journal database and inject it into the
 * journal service.
 */
export function openJournalDatabase(file: string): Database.Database {
  if (file !== MEMORY_DATABASE) {
    fs.mkdirSync(path.dirname(file), { recursive: true, mode: 0o700 });
  }

  const db = new Database(file);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');

  db.exec(`
    CREATE TABLE IF NOT EXISTS journal (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      event TEXT NOT NULL,
      step TEXT,
      target TEXT,
      status TEXT,
      detail TEXT,
      prev_hash TEXT NOT NULL,
      hash TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_journal_run ON journal(run_id);
    CREATE INDEX IF NOT EXISTS idx_journal_event ON journal(event);
  `);

  setJournalDb(db);
  return db;
}
