import type Database from "better-sqlite3";

/** What is remembered about a file after its last successful archive */
export interface ArchiveRecord {
  path: string;
  sha256: string;
  /** "YYYY-MM-DD"; anything else means "never archived" */
  lastArchive: string;
  archiveUrl: string | null;
}

export interface ArchiveStore {
  get(path: string): ArchiveRecord | undefined;
  /** Replace the whole record for `record.path` */
  put(record: ArchiveRecord): void;
  close(): void;
}

interface RawRow {
  path: string;
  sha256: string;
  last_archive: string;
  archive_url: string | null;
}

function rowToRecord(row: RawRow): ArchiveRecord {
  return {
    path: row.path,
    sha256: row.sha256,
    lastArchive: row.last_archive,
    archiveUrl: row.archive_url,
  };
}

export function createArchiveStore(db: Database.Database): ArchiveStore {
  const getStmt = db.prepare<{ path: string }>(
    "SELECT path, sha256, last_archive, archive_url FROM archive_records WHERE path = @path",
  );

  const putStmt = db.prepare<{
    path: string;
    sha256: string;
    last_archive: string;
    archive_url: string | null;
  }>(
    `INSERT INTO archive_records (path, sha256, last_archive, archive_url)
     VALUES (@path, @sha256, @last_archive, @archive_url)
     ON CONFLICT(path) DO UPDATE SET
       sha256 = excluded.sha256,
       last_archive = excluded.last_archive,
       archive_url = excluded.archive_url,
       updated_at = strftime('%Y-%m-%dT%H:%M:%SZ', 'now')`,
  );

  return {
    get(path) {
      const row = getStmt.get({ path }) as RawRow | undefined;
      return row ? rowToRecord(row) : undefined;
    },

    put(record) {
      putStmt.run({
        path: record.path,
        sha256: record.sha256,
        last_archive: record.lastArchive,
        archive_url: record.archiveUrl,
      });
    },

    close() {
      db.close();
    },
  };
}
