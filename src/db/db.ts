import Database from 'better-sqlite3';
import path from 'node:path';

let _db: Database.Database | null = null;
let _path: string | null = null;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS config (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS runs (
    run_id       TEXT NOT NULL,
    job_id       TEXT NOT NULL,
    display_name TEXT NOT NULL,
    command      TEXT NOT NULL,
    exit_code    TEXT NOT NULL,
    killed       INTEGER NOT NULL DEFAULT 0,
    succeeded    INTEGER NOT NULL DEFAULT 0,
    started_at   TEXT,
    finished_at  TEXT NOT NULL,
    error        TEXT,
    log_path     TEXT,
    PRIMARY KEY (run_id, job_id)
  );

  CREATE INDEX IF NOT EXISTS runs_finished_at ON runs(finished_at);
`;

export function dbPath() {
  return _path ?? process.env.DWGBATCH_DB ?? path.resolve(process.cwd(), 'dwgbatch.db');
}

export function getDB() {
  if (_db) return _db;
  const file = dbPath();
  _db = new Database(file);
  if (file !== ':memory:') {
    _db.pragma('journal_mode = WAL');
    _db.pragma('busy_timeout = 5000');
  }
  _db.exec(SCHEMA);
  return _db;
}

/** Point subsequent `getDB()` calls at another file (or `:memory:`). */
export function useDB(file: string) {
  closeDB();
  _path = file;
}

export function closeDB() {
  _db?.close();
  _db = null;
}
