/**
 * Catalog Service
 *
 * Record store for discovered applications: upsert on re-discovery,
 * short-id allocation inside the insert transaction, preview bookkeeping,
 * liveness sweeps and tag usage.
 */

import * as fs from 'fs';
import type { CatalogDb } from '../database';
import { SHORT_ID_PREFIX, type EntryKind } from '../../../shared/constants';
import { createLogger, errorMessage } from '../../../shared/logger';
import { formatShortId } from './short-id';

const log = createLogger('catalog');

export type ProjectExport = Pick<
  CatalogEntry,
  | 'id'
  | 'shortId'
  | 'name'
  | 'kind'
  | 'description'
  | 'techStack'
  | 'tags'
  | 'primaryPath'
  | 'folderPath'
  | 'fileSize'
  | 'lastModified'
>;

export interface CatalogEntry {
  id: number;
  shortId: string;
  kind: EntryKind;
  name: string;
  folderPath: string;
  primaryPath: string;
  /** Companion page of an executable app */
  interfacePath: string | null;
  port: number | null;
  previewPath: string | null;
  description: string | null;
  shortDesc: string | null;
  techStack: string | null;
  tags: string | null;
  category: string | null;
  enriched: boolean;
  favourite: boolean;
  /** A declared import is not listed in the app's requirements.txt */
  missingDependencies: boolean;
  fileSize: number;
  lastModified: string | null;
  dependencies: string | null;
  createdAt: string;
  lastScanned: string;
}

export interface NewCatalogEntry {
  kind: EntryKind;
  name: string;
  folderPath: string;
  primaryPath: string;
  interfacePath?: string | null;
  port?: number | null;
  fileSize: number;
  lastModified: string | null;
  dependencies: string | null;
  missingDependencies?: boolean;
}

export interface UpsertResult {
  id: number;
  shortId: string;
  created: boolean;
  /** Metadata rewritten because the file changed since the last scan */
  refreshed: boolean;
}

export interface EnrichmentData {
  description: string | null;
  shortDesc: string | null;
  techStack: string | null;
  tags: string | null;
  category: string | null;
}

export interface TagUsage {
  tag: string;
  category: string | null;
  usageCount: number;
}

interface CatalogRow {
  id: number;
  short_id: string;
  kind: EntryKind;
  name: string;
  folder_path: string;
  primary_path: string;
  interface_path: string | null;
  port: number | null;
  preview_path: string | null;
  description: string | null;
  short_desc: string | null;
  tech_stack: string | null;
  tags: string | null;
  category: string | null;
  enriched: number;
  favourite: number;
  missing_dependencies: number;
  file_size: number;
  last_modified: string | null;
  dependencies: string | null;
  created_at: string;
  last_scanned: string;
}

function toEntry(row: CatalogRow): CatalogEntry {
  return {
    id: row.id,
    shortId: row.short_id,
    kind: row.kind,
    name: row.name,
    folderPath: row.folder_path,
    primaryPath: row.primary_path,
    interfacePath: row.interface_path,
    port: row.port,
    previewPath: row.preview_path,
    description: row.description,
    shortDesc: row.short_desc,
    techStack: row.tech_stack,
    tags: row.tags,
    category: row.category,
    enriched: row.enriched === 1,
    favourite: row.favourite === 1,
    missingDependencies: row.missing_dependencies === 1,
    fileSize: row.file_size,
    lastModified: row.last_modified,
    dependencies: row.dependencies,
    createdAt: row.created_at,
    lastScanned: row.last_scanned,
  };
}

export interface CatalogStoreOptions {
  now?: () => Date;
  fileExists?: (filePath: string) => boolean;
}

export class CatalogStore {
  private readonly now: () => Date;
  private readonly fileExists: (filePath: string) => boolean;

  constructor(private readonly db: CatalogDb, options: CatalogStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.fileExists = options.fileExists ?? fs.existsSync;
  }

  /**
   * Next short id for a kind: one past the larger of the highest id in the
   * table and the highest id ever issued. Call inside the insert transaction.
   */
  nextShortId(kind: EntryKind): string {
    const prefix = SHORT_ID_PREFIX[kind];
    const inTable = this.db
      .prepare<[string], { max: number | null }>(
        'SELECT MAX(CAST(SUBSTR(short_id, 2) AS INTEGER)) AS max FROM catalog_entries WHERE short_id LIKE ?',
      )
      .get(`${prefix}%`);
    const issued = this.db
      .prepare<[string], { last_value: number }>('SELECT last_value FROM short_id_sequences WHERE kind = ?')
      .get(kind);

    const next = Math.max(inTable?.max ?? 0, issued?.last_value ?? 0) + 1;
    this.db
      .prepare(
        `INSERT INTO short_id_sequences (kind, last_value) VALUES (?, ?)
         ON CONFLICT(kind) DO UPDATE SET last_value = excluded.last_value`,
      )
      .run(kind, next);
    return formatShortId(kind, next);
  }

  /**
   * Insert or update an entry keyed by (primary path, folder path).
   * An unchanged modification time only bumps last_scanned.
   */
  upsert(entry: NewCatalogEntry): UpsertResult {
    const txn = this.db.transaction((input: NewCatalogEntry): UpsertResult => {
      const timestamp = this.now().toISOString();
      const existing = this.db
        .prepare<[string, string], { id: number; short_id: string; last_modified: string | null }>(
          'SELECT id, short_id, last_modified FROM catalog_entries WHERE primary_path = ? AND folder_path = ?',
        )
        .get(input.primaryPath, input.folderPath);

      if (existing) {
        const changed =
          input.lastModified !== null &&
          existing.last_modified !== null &&
          input.lastModified !== existing.last_modified;

        if (changed) {
          this.db
            .prepare(
              `UPDATE catalog_entries
               SET kind = ?, name = ?, interface_path = ?, port = ?, file_size = ?,
                   last_modified = ?, dependencies = ?, missing_dependencies = ?, last_scanned = ?
               WHERE id = ?`,
            )
            .run(
              input.kind,
              input.name,
              input.interfacePath ?? null,
              input.port ?? null,
              input.fileSize,
              input.lastModified,
              input.dependencies,
              input.missingDependencies ? 1 : 0,
              timestamp,
              existing.id,
            );
        } else {
          this.db.prepare('UPDATE catalog_entries SET last_scanned = ? WHERE id = ?').run(timestamp, existing.id);
        }
        return { id: existing.id, shortId: existing.short_id, created: false, refreshed: changed };
      }

      const shortId = this.nextShortId(input.kind);
      const info = this.db
        .prepare(
          `INSERT INTO catalog_entries
             (short_id, kind, name, folder_path, primary_path, interface_path, port,
              file_size, last_modified, dependencies, missing_dependencies, created_at, last_scanned)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          shortId,
          input.kind,
          input.name,
          input.folderPath,
          input.primaryPath,
          input.interfacePath ?? null,
          input.port ?? null,
          input.fileSize,
          input.lastModified,
          input.dependencies,
          input.missingDependencies ? 1 : 0,
          timestamp,
          timestamp,
        );
      return { id: Number(info.lastInsertRowid), shortId, created: true, refreshed: false };
    });

    return txn.immediate(entry);
  }

  getAll(): CatalogEntry[] {
    return this.db.prepare<[], CatalogRow>('SELECT * FROM catalog_entries ORDER BY name, id').all().map(toEntry);
  }

  getById(id: number): CatalogEntry | null {
    const row = this.db.prepare<[number], CatalogRow>('SELECT * FROM catalog_entries WHERE id = ?').get(id);
    return row ? toEntry(row) : null;
  }

  getByShortId(shortId: string): CatalogEntry | null {
    const row = this.db
      .prepare<[string], CatalogRow>('SELECT * FROM catalog_entries WHERE short_id = ?')
      .get(shortId);
    return row ? toEntry(row) : null;
  }

  getByPrimaryOrInterfacePath(filePath: string): CatalogEntry | null {
    const row = this.db
      .prepare<[string, string], CatalogRow>(
        'SELECT * FROM catalog_entries WHERE primary_path = ? OR interface_path = ? ORDER BY id LIMIT 1',
      )
      .get(filePath, filePath);
    return row ? toEntry(row) : null;
  }

  setPreviewPath(id: number, previewPath: string | null): boolean {
    return this.db.prepare('UPDATE catalog_entries SET preview_path = ? WHERE id = ?').run(previewPath, id).changes > 0;
  }

  /**
   * Entries with no preview, or whose preview file is gone.
   */
  entriesNeedingPreview(): CatalogEntry[] {
    return this.getAll().filter((e) => !e.previewPath || !this.fileExists(e.previewPath));
  }

  search(query: string, options: { tags?: string[]; category?: string } = {}): CatalogEntry[] {
    const like = `%${query}%`;
    let sql =
      'SELECT * FROM catalog_entries WHERE (name LIKE ? OR description LIKE ? OR tech_stack LIKE ? OR tags LIKE ?)';
    const params: string[] = [like, like, like, like];

    if (options.tags && options.tags.length > 0) {
      sql += ` AND (${options.tags.map(() => 'tags LIKE ?').join(' OR ')})`;
      params.push(...options.tags.map((t) => `%${t}%`));
    }
    if (options.category) {
      sql += ' AND category = ?';
      params.push(options.category);
    }
    sql += ' ORDER BY name, id';

    return this.db.prepare<string[], CatalogRow>(sql).all(...params).map(toEntry);
  }

  /**
   * Liveness sweep: delete entries whose primary file no longer exists.
   * Restricted to `paths` when given. Returns the number removed.
   */
  removeIfMissing(paths?: string[]): number {
    const only = paths ? new Set(paths) : null;
    const gone = this.getAll().filter(
      (e) => (only === null || only.has(e.primaryPath)) && !this.fileExists(e.primaryPath),
    );
    for (const entry of gone) this.deleteEntry(entry);
    if (gone.length > 0) log.info('removed entries with missing files', { count: gone.length });
    return gone.length;
  }

  removeById(id: number): boolean {
    const entry = this.getById(id);
    if (!entry) return false;
    this.deleteEntry(entry);
    return true;
  }

  removeByFolder(folderPath: string): number {
    const rows = this.db
      .prepare<[string], CatalogRow>('SELECT * FROM catalog_entries WHERE folder_path = ?')
      .all(folderPath);
    for (const row of rows) this.deleteEntry(toEntry(row));
    return rows.length;
  }

  removeAll(): number {
    const entries = this.getAll();
    for (const entry of entries) this.deleteEntry(entry);
    this.db.exec('DELETE FROM available_tags');
    return entries.length;
  }

  toggleFavourite(id: number): boolean {
    return this.db.prepare('UPDATE catalog_entries SET favourite = 1 - favourite WHERE id = ?').run(id).changes > 0;
  }

  getFavourites(): CatalogEntry[] {
    return this.db
      .prepare<[], CatalogRow>('SELECT * FROM catalog_entries WHERE favourite = 1 ORDER BY name, id')
      .all()
      .map(toEntry);
  }

  updateDescription(id: number, description: string): boolean {
    return this.db.prepare('UPDATE catalog_entries SET description = ? WHERE id = ?').run(description, id).changes > 0;
  }

  setEnrichment(id: number, data: EnrichmentData): boolean {
    return (
      this.db
        .prepare(
          `UPDATE catalog_entries
           SET description = ?, short_desc = ?, tech_stack = ?, tags = ?, category = ?, enriched = 1
           WHERE id = ?`,
        )
        .run(data.description, data.shortDesc, data.techStack, data.tags, data.category, id).changes > 0
    );
  }

  addTagUsage(tags: string[]): void {
    const bump = this.db.prepare(
      `INSERT INTO available_tags (tag, usage_count) VALUES (?, 1)
       ON CONFLICT(tag) DO UPDATE SET usage_count = usage_count + 1`,
    );
    const txn = this.db.transaction((list: string[]) => {
      for (const tag of list) bump.run(tag);
    });
    txn(tags);
  }

  getAvailableTags(): TagUsage[] {
    return this.db
      .prepare<[], { tag: string; category: string | null; usage_count: number }>(
        'SELECT tag, category, usage_count FROM available_tags ORDER BY usage_count DESC, tag',
      )
      .all()
      .map((r) => ({ tag: r.tag, category: r.category, usageCount: r.usage_count }));
  }

  /** Flat project list for handing the catalog to other tools. */
  exportProjects(): ProjectExport[] {
    return this.getAll().map((e) => ({
      id: e.id,
      shortId: e.shortId,
      name: e.name,
      kind: e.kind,
      description: e.description,
      techStack: e.techStack,
      tags: e.tags,
      primaryPath: e.primaryPath,
      folderPath: e.folderPath,
      fileSize: e.fileSize,
      lastModified: e.lastModified,
    }));
  }

  private deleteEntry(entry: CatalogEntry): void {
    if (entry.previewPath && this.fileExists(entry.previewPath)) {
      try {
        fs.unlinkSync(entry.previewPath);
      } catch (e) {
        log.warn('could not delete preview image', { path: entry.previewPath, error: errorMessage(e) });
      }
    }
    this.db.prepare('DELETE FROM catalog_entries WHERE id = ?').run(entry.id);
  }
}
