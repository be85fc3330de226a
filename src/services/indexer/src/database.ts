/**
 * Indexer Database
 *
 * SQLite initialization, schema creation, and migrations.
 */

import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { VERSION, isSchemaCompatible } from '../../../version';

export type CatalogDb = Database.Database;

// Columns added after the first release; applied to older databases on open
const LATE_COLUMNS: Array<{ name: string; ddl: string }> = [
  { name: 'favourite', ddl: 'ALTER TABLE catalog_entries ADD COLUMN favourite INTEGER NOT NULL DEFAULT 0' },
  { name: 'missing_dependencies', ddl: 'ALTER TABLE catalog_entries ADD COLUMN missing_dependencies INTEGER NOT NULL DEFAULT 0' },
];

/**
 * Open (or create) the catalog database and make sure the schema is current.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): CatalogDb {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  // WAL mode so progress polling reads don't block the persist phase
  const db = new Database(dbPath);
  if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');

  db.exec(`
    CREATE TABLE IF NOT EXISTS catalog_entries (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      short_id TEXT NOT NULL UNIQUE,
      kind TEXT NOT NULL CHECK (kind IN ('executable', 'static')),
      name TEXT NOT NULL,
      folder_path TEXT NOT NULL,
      primary_path TEXT NOT NULL,
      interface_path TEXT,
      port INTEGER,
      preview_path TEXT,

      -- Enrichment output
      description TEXT,
      short_desc TEXT,
      tech_stack TEXT,
      tags TEXT,
      category TEXT,
      enriched INTEGER NOT NULL DEFAULT 0,

      -- File analysis
      file_size INTEGER NOT NULL DEFAULT 0,
      last_modified TEXT,
      dependencies TEXT,

      created_at TEXT NOT NULL,
      last_scanned TEXT NOT NULL,
      UNIQUE (primary_path, folder_path)
    );
    CREATE INDEX IF NOT EXISTS idx_catalog_kind ON catalog_entries(kind);
    CREATE INDEX IF NOT EXISTS idx_catalog_folder ON catalog_entries(folder_path);

    -- Highest value ever handed out per kind, so deleted ids are never reissued
    CREATE TABLE IF NOT EXISTS short_id_sequences (
      kind TEXT PRIMARY KEY,
      last_value INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS catalog_meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS available_tags (
      tag TEXT PRIMARY KEY,
      category TEXT,
      usage_count INTEGER NOT NULL DEFAULT 0
    );
  `);

  const stored = db
    .prepare<[], { value: string }>("SELECT value FROM catalog_meta WHERE key = 'schema_version'")
    .get();
  if (stored && !isSchemaCompatible(stored.value)) {
    db.close();
    throw new Error(
      `Catalog schema ${stored.value} is older than ${VERSION.minCompatible.catalogSchema}; delete ${dbPath} and rescan`,
    );
  }

  const columns = new Set(
    db.prepare<[], { name: string }>('PRAGMA table_info(catalog_entries)').all().map((c) => c.name),
  );
  for (const col of LATE_COLUMNS) {
    if (!columns.has(col.name)) db.exec(col.ddl);
  }
  db.prepare("INSERT OR REPLACE INTO catalog_meta (key, value) VALUES ('schema_version', ?)").run(
    VERSION.components.catalogSchema,
  );

  return db;
}
