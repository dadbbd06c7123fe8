import Database from 'better-sqlite3'

const CREATE_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS archive_records (
  path TEXT PRIMARY KEY,
  sha256 TEXT NOT NULL,
  last_archive TEXT NOT NULL,
  archive_url TEXT,
  updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%SZ', 'now'))
)`

/** Open/create the archive database, run CREATE TABLE IF NOT EXISTS, set WAL mode */
export function initializeArchiveDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath)

  db.pragma('journal_mode = WAL')
  db.exec(CREATE_TABLE_SQL)

  return db
}
