/**
 * SQLite repository for users and themes.
 * Uses better-sqlite3 for synchronous, fast SQLite access. Used in
 * development and tests; production runs on the PostgreSQL adapter.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { generatePublicId } from '../identity';
import { ConflictError, NotFoundError } from '../errors';
import {
  DEFAULT_THEME_SLOTS,
  PUBLIC_ID_ATTEMPTS,
  type CreateThemeParams,
  type DbTheme,
  type DbUser,
  type PublicThemeSummary,
  type ThemeRepository,
  type Visibility,
} from './types';

// =============================================================================
// Schema
// =============================================================================

const SCHEMA = `
  -- Users table
  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    display_name TEXT,
    theme_slots INTEGER NOT NULL DEFAULT ${DEFAULT_THEME_SLOTS},
    is_banned INTEGER NOT NULL DEFAULT 0,
    created_at TEXT DEFAULT (datetime('now'))
  );

  -- Themes table
  CREATE TABLE IF NOT EXISTS themes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    public_id TEXT NOT NULL UNIQUE,
    owner_id TEXT NOT NULL,
    name TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    visibility TEXT NOT NULL DEFAULT 'public' CHECK (visibility IN ('public', 'private')),
    content_ref TEXT NOT NULL,
    content_hash TEXT NOT NULL UNIQUE,
    preview_ref TEXT NOT NULL,
    created_at TEXT DEFAULT (datetime('now')),
    FOREIGN KEY (owner_id) REFERENCES users(id)
  );

  -- Index for fast lookups
  CREATE INDEX IF NOT EXISTS idx_themes_owner_id ON themes(owner_id);
  CREATE INDEX IF NOT EXISTS idx_themes_visibility ON themes(visibility);
`;

// =============================================================================
// Row types
// =============================================================================

interface UserRow {
  id: string;
  display_name: string | null;
  theme_slots: number;
  is_banned: number;
  created_at: string;
}

interface ThemeRow {
  id: number;
  public_id: string;
  owner_id: string;
  name: string;
  description: string;
  visibility: Visibility;
  content_ref: string;
  content_hash: string;
  preview_ref: string;
  created_at: string;
}

function mapUser(row: UserRow): DbUser {
  return {
    id: row.id,
    display_name: row.display_name,
    theme_slots: row.theme_slots,
    is_banned: row.is_banned === 1,
    created_at: row.created_at,
  };
}

// =============================================================================
// Constraint classification
// =============================================================================

type Violation = 'content_hash' | 'public_id' | 'owner' | null;

function classifyViolation(err: unknown): Violation {
  if (!(err instanceof Database.SqliteError)) return null;
  if (err.code === 'SQLITE_CONSTRAINT_FOREIGNKEY') return 'owner';
  if (err.code !== 'SQLITE_CONSTRAINT_UNIQUE') return null;
  if (err.message.includes('themes.content_hash')) return 'content_hash';
  if (err.message.includes('themes.public_id')) return 'public_id';
  return null;
}

// =============================================================================
// Connection
// =============================================================================

/**
 * Open (or create) a SQLite database with the theme schema applied.
 * Pass ':memory:' for a throwaway database.
 */
export function openSqlite(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    const dataDir = path.dirname(dbPath);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const db = new Database(dbPath);

  // WAL for concurrent readers; foreign keys are off by default in SQLite
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA);

  return db;
}

export interface SqliteRepositoryOptions {
  generatePublicId?: () => string;
}

// =============================================================================
// Repository
// =============================================================================

export class SqliteRepository implements ThemeRepository {
  private readonly nextPublicId: () => string;

  constructor(
    readonly db: Database.Database,
    options: SqliteRepositoryOptions = {}
  ) {
    this.nextPublicId = options.generatePublicId ?? generatePublicId;
  }

  // ---------------------------------------------------------------------------
  // Users
  // ---------------------------------------------------------------------------

  /**
   * Create the user on first contact. Existing quota and ban state are never
   * touched; a changed display name is refreshed.
   */
  async upsertUser(id: string, displayName?: string | null): Promise<DbUser> {
    this.db.prepare<[string, string | null]>(`
      INSERT INTO users (id, display_name) VALUES (?, ?)
      ON CONFLICT(id) DO UPDATE SET display_name = COALESCE(excluded.display_name, users.display_name)
    `).run(id, displayName || null);

    const user = await this.getUser(id);
    if (!user) {
      throw new Error(`User ${id} missing after upsert`);
    }
    return user;
  }

  async getUser(id: string): Promise<DbUser | null> {
    const row = this.db.prepare<[string], UserRow>(`SELECT * FROM users WHERE id = ?`).get(id);
    return row ? mapUser(row) : null;
  }

  async setBanStatus(id: string, banned: boolean): Promise<boolean> {
    const result = this.db.prepare<[number, string]>(`
      UPDATE users SET is_banned = ? WHERE id = ?
    `).run(banned ? 1 : 0, id);
    return result.changes > 0;
  }

  async isBanned(id: string): Promise<boolean> {
    const row = this.db.prepare<[string], { is_banned: number }>(`
      SELECT is_banned FROM users WHERE id = ?
    `).get(id);
    return row?.is_banned === 1;
  }

  async grantSlots(id: string, count: number): Promise<boolean> {
    const result = this.db.prepare<[number, string]>(`
      UPDATE users SET theme_slots = theme_slots + ? WHERE id = ?
    `).run(count, id);
    return result.changes > 0;
  }

  async listActiveUserIds(): Promise<string[]> {
    const rows = this.db.prepare<[], { id: string }>(`
      SELECT id FROM users WHERE is_banned = 0 ORDER BY created_at ASC, id ASC
    `).all();
    return rows.map(row => row.id);
  }

  // ---------------------------------------------------------------------------
  // Themes
  // ---------------------------------------------------------------------------

  async countThemesOwnedBy(ownerId: string): Promise<number> {
    const row = this.db.prepare<[string], { count: number }>(`
      SELECT COUNT(*) AS count FROM themes WHERE owner_id = ?
    `).get(ownerId);
    return row?.count ?? 0;
  }

  async hashExists(contentHash: string): Promise<boolean> {
    const row = this.db.prepare<[string], { found: number }>(`
      SELECT 1 AS found FROM themes WHERE content_hash = ?
    `).get(contentHash);
    return !!row;
  }

  /**
   * Insert a theme under a fresh public id. The UNIQUE constraint on
   * content_hash is the dedup authority: a concurrent submission of the same
   * bytes loses here even if it passed the earlier hashExists check.
   */
  async createTheme(params: CreateThemeParams): Promise<DbTheme> {
    const insert = this.db.prepare<[string, string, string, string, Visibility, string, string, string]>(`
      INSERT INTO themes (public_id, owner_id, name, description, visibility, content_ref, content_hash, preview_ref)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    for (let attempt = 1; attempt <= PUBLIC_ID_ATTEMPTS; attempt++) {
      try {
        const result = insert.run(
          this.nextPublicId(),
          params.ownerId,
          params.name,
          params.description,
          params.visibility,
          params.contentRef,
          params.contentHash,
          params.previewRef
        );
        const theme = await this.getThemeById(Number(result.lastInsertRowid));
        if (!theme) {
          throw new Error('Theme missing after insert');
        }
        return theme;
      } catch (err) {
        const violation = classifyViolation(err);
        if (violation === 'public_id') {
          console.warn(`[db] public id collision, retrying (attempt ${attempt})`);
          continue;
        }
        if (violation === 'content_hash') throw new ConflictError('content_hash', { cause: err });
        if (violation === 'owner') throw new NotFoundError('User');
        throw err;
      }
    }

    throw new ConflictError('public_id');
  }

  async listThemesOwnedBy(ownerId: string): Promise<DbTheme[]> {
    return this.db.prepare<[string], ThemeRow>(`
      SELECT * FROM themes WHERE owner_id = ? ORDER BY created_at DESC, id DESC
    `).all(ownerId);
  }

  async getThemeById(id: number): Promise<DbTheme | null> {
    const row = this.db.prepare<[number], ThemeRow>(`SELECT * FROM themes WHERE id = ?`).get(id);
    return row || null;
  }

  async getThemeByPublicId(publicId: string): Promise<DbTheme | null> {
    const row = this.db.prepare<[string], ThemeRow>(`SELECT * FROM themes WHERE public_id = ?`).get(publicId);
    return row || null;
  }

  async deleteTheme(id: number, ownerId: string): Promise<boolean> {
    const result = this.db.prepare<[number, string]>(`
      DELETE FROM themes WHERE id = ? AND owner_id = ?
    `).run(id, ownerId);
    return result.changes > 0;
  }

  async adminDeleteTheme(id: number): Promise<boolean> {
    const result = this.db.prepare<[number]>(`DELETE FROM themes WHERE id = ?`).run(id);
    return result.changes > 0;
  }

  async setVisibility(id: number, ownerId: string, visibility: Visibility): Promise<boolean> {
    const result = this.db.prepare<[Visibility, number, string]>(`
      UPDATE themes SET visibility = ? WHERE id = ? AND owner_id = ?
    `).run(visibility, id, ownerId);
    return result.changes > 0;
  }

  async listPublicThemes(offset: number, limit: number): Promise<PublicThemeSummary[]> {
    return this.db.prepare<[number, number], PublicThemeSummary>(`
      SELECT t.id, t.public_id, t.name, t.description, t.owner_id,
             u.display_name AS owner_display_name, t.preview_ref, t.created_at
      FROM themes t JOIN users u ON t.owner_id = u.id
      WHERE t.visibility = 'public'
      ORDER BY t.created_at DESC, t.id DESC
      LIMIT ? OFFSET ?
    `).all(limit, offset);
  }

  async countPublicThemes(): Promise<number> {
    const row = this.db.prepare<[], { count: number }>(`
      SELECT COUNT(*) AS count FROM themes WHERE visibility = 'public'
    `).get();
    return row?.count ?? 0;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
