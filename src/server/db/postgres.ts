/**
 * PostgreSQL repository using Drizzle ORM.
 * Used in production when DATABASE_URL is set.
 */

import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { eq, desc, and, sql } from 'drizzle-orm';
import * as schema from './schema';
import { generatePublicId } from '../identity';
import { ConflictError, NotFoundError } from '../errors';
import {
  PUBLIC_ID_ATTEMPTS,
  type CreateThemeParams,
  type DbTheme,
  type DbUser,
  type PublicThemeSummary,
  type ThemeRepository,
  type Visibility,
} from './types';

type Db = NodePgDatabase<typeof schema>;

// =============================================================================
// Row mapping
// =============================================================================

function mapUser(row: schema.User): DbUser {
  return {
    id: row.id,
    display_name: row.displayName,
    theme_slots: row.themeSlots,
    is_banned: row.isBanned,
    created_at: row.createdAt.toISOString(),
  };
}

function mapTheme(row: schema.Theme): DbTheme {
  return {
    id: row.id,
    public_id: row.publicId,
    owner_id: row.ownerId,
    name: row.name,
    description: row.description,
    visibility: row.visibility,
    content_ref: row.contentRef,
    content_hash: row.contentHash,
    preview_ref: row.previewRef,
    created_at: row.createdAt.toISOString(),
  };
}

// =============================================================================
// Constraint classification
// =============================================================================

interface PgErrorFields {
  code?: string;
  constraint?: string;
}

/** Pull the driver's error fields, looking through ORM wrappers via `cause`. */
function pgErrorFields(err: unknown, depth: number = 0): PgErrorFields | null {
  if (typeof err !== 'object' || err === null || depth > 3) return null;
  const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  const constraint = 'constraint' in err && typeof err.constraint === 'string' ? err.constraint : undefined;
  if (code) return { code, constraint };
  return 'cause' in err ? pgErrorFields(err.cause, depth + 1) : null;
}

type Violation = 'content_hash' | 'public_id' | 'owner' | null;

function classifyViolation(err: unknown): Violation {
  const fields = pgErrorFields(err);
  if (!fields) return null;
  // 23503 foreign_key_violation, 23505 unique_violation
  if (fields.code === '23503') return 'owner';
  if (fields.code !== '23505') return null;
  if (fields.constraint?.includes('content_hash')) return 'content_hash';
  if (fields.constraint?.includes('public_id')) return 'public_id';
  return null;
}

// =============================================================================
// Connection
// =============================================================================

/**
 * Ensure tables exist in PostgreSQL.
 * A safety net in case drizzle-kit push hasn't been run yet; constraint names
 * match the ones drizzle-kit generates.
 */
async function ensureTablesExist(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      display_name TEXT,
      theme_slots INTEGER DEFAULT 10 NOT NULL,
      is_banned BOOLEAN DEFAULT false NOT NULL,
      created_at TIMESTAMP DEFAULT NOW() NOT NULL
    )
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS themes (
      id SERIAL PRIMARY KEY,
      public_id TEXT NOT NULL,
      owner_id TEXT NOT NULL REFERENCES users(id),
      name TEXT NOT NULL,
      description TEXT DEFAULT '' NOT NULL,
      visibility TEXT DEFAULT 'public' NOT NULL,
      content_ref TEXT NOT NULL,
      content_hash TEXT NOT NULL,
      preview_ref TEXT NOT NULL,
      created_at TIMESTAMP DEFAULT NOW() NOT NULL,
      CONSTRAINT themes_public_id_unique UNIQUE (public_id),
      CONSTRAINT themes_content_hash_unique UNIQUE (content_hash)
    )
  `);

  await pool.query(`CREATE INDEX IF NOT EXISTS idx_themes_owner_id ON themes(owner_id)`);
  await pool.query(`CREATE INDEX IF NOT EXISTS idx_themes_visibility ON themes(visibility)`);
}

/**
 * Connect once at startup and hand the repository to the services that need it.
 */
export async function initPostgres(connectionString: string): Promise<PostgresRepository> {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 20000,
    connectionTimeoutMillis: 10000, // fail fast if can't connect in 10s
  });

  await ensureTablesExist(pool);
  console.log('✅ PostgreSQL connected');

  return new PostgresRepository(pool, drizzle(pool, { schema }));
}

// =============================================================================
// Repository
// =============================================================================

export class PostgresRepository implements ThemeRepository {
  constructor(
    private readonly pool: Pool,
    private readonly db: Db,
    private readonly nextPublicId: () => string = generatePublicId
  ) {}

  // ---------------------------------------------------------------------------
  // Users
  // ---------------------------------------------------------------------------

  async upsertUser(id: string, displayName?: string | null): Promise<DbUser> {
    const rows = await this.db.insert(schema.users)
      .values({ id, displayName: displayName || null })
      .onConflictDoUpdate({
        target: schema.users.id,
        set: { displayName: sql`COALESCE(excluded.display_name, ${schema.users.displayName})` },
      })
      .returning();
    return mapUser(rows[0]);
  }

  async getUser(id: string): Promise<DbUser | null> {
    const rows = await this.db.select().from(schema.users).where(eq(schema.users.id, id)).limit(1);
    return rows.length > 0 ? mapUser(rows[0]) : null;
  }

  async setBanStatus(id: string, banned: boolean): Promise<boolean> {
    const rows = await this.db.update(schema.users)
      .set({ isBanned: banned })
      .where(eq(schema.users.id, id))
      .returning({ id: schema.users.id });
    return rows.length > 0;
  }

  async isBanned(id: string): Promise<boolean> {
    const user = await this.getUser(id);
    return user?.is_banned ?? false;
  }

  async grantSlots(id: string, count: number): Promise<boolean> {
    const rows = await this.db.update(schema.users)
      .set({ themeSlots: sql`${schema.users.themeSlots} + ${count}` })
      .where(eq(schema.users.id, id))
      .returning({ id: schema.users.id });
    return rows.length > 0;
  }

  async listActiveUserIds(): Promise<string[]> {
    const rows = await this.db.select({ id: schema.users.id })
      .from(schema.users)
      .where(eq(schema.users.isBanned, false))
      .orderBy(schema.users.createdAt, schema.users.id);
    return rows.map(row => row.id);
  }

  // ---------------------------------------------------------------------------
  // Themes
  // ---------------------------------------------------------------------------

  async countThemesOwnedBy(ownerId: string): Promise<number> {
    const rows = await this.db.select({ count: sql<number>`count(*)::int` })
      .from(schema.themes)
      .where(eq(schema.themes.ownerId, ownerId));
    return rows[0]?.count ?? 0;
  }

  async hashExists(contentHash: string): Promise<boolean> {
    const rows = await this.db.select({ id: schema.themes.id })
      .from(schema.themes)
      .where(eq(schema.themes.contentHash, contentHash))
      .limit(1);
    return rows.length > 0;
  }

  async createTheme(params: CreateThemeParams): Promise<DbTheme> {
    for (let attempt = 1; attempt <= PUBLIC_ID_ATTEMPTS; attempt++) {
      try {
        const rows = await this.db.insert(schema.themes)
          .values({
            publicId: this.nextPublicId(),
            ownerId: params.ownerId,
            name: params.name,
            description: params.description,
            visibility: params.visibility,
            contentRef: params.contentRef,
            contentHash: params.contentHash,
            previewRef: params.previewRef,
          })
          .returning();
        return mapTheme(rows[0]);
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
    const rows = await this.db.select()
      .from(schema.themes)
      .where(eq(schema.themes.ownerId, ownerId))
      .orderBy(desc(schema.themes.createdAt), desc(schema.themes.id));
    return rows.map(mapTheme);
  }

  async getThemeById(id: number): Promise<DbTheme | null> {
    const rows = await this.db.select().from(schema.themes).where(eq(schema.themes.id, id)).limit(1);
    return rows.length > 0 ? mapTheme(rows[0]) : null;
  }

  async getThemeByPublicId(publicId: string): Promise<DbTheme | null> {
    const rows = await this.db.select().from(schema.themes).where(eq(schema.themes.publicId, publicId)).limit(1);
    return rows.length > 0 ? mapTheme(rows[0]) : null;
  }

  async deleteTheme(id: number, ownerId: string): Promise<boolean> {
    const rows = await this.db.delete(schema.themes)
      .where(and(eq(schema.themes.id, id), eq(schema.themes.ownerId, ownerId)))
      .returning({ id: schema.themes.id });
    return rows.length > 0;
  }

  async adminDeleteTheme(id: number): Promise<boolean> {
    const rows = await this.db.delete(schema.themes)
      .where(eq(schema.themes.id, id))
      .returning({ id: schema.themes.id });
    return rows.length > 0;
  }

  async setVisibility(id: number, ownerId: string, visibility: Visibility): Promise<boolean> {
    const rows = await this.db.update(schema.themes)
      .set({ visibility })
      .where(and(eq(schema.themes.id, id), eq(schema.themes.ownerId, ownerId)))
      .returning({ id: schema.themes.id });
    return rows.length > 0;
  }

  async listPublicThemes(offset: number, limit: number): Promise<PublicThemeSummary[]> {
    const rows = await this.db.select({
      id: schema.themes.id,
      publicId: schema.themes.publicId,
      name: schema.themes.name,
      description: schema.themes.description,
      ownerId: schema.themes.ownerId,
      ownerDisplayName: schema.users.displayName,
      previewRef: schema.themes.previewRef,
      createdAt: schema.themes.createdAt,
    })
      .from(schema.themes)
      .innerJoin(schema.users, eq(schema.themes.ownerId, schema.users.id))
      .where(eq(schema.themes.visibility, 'public'))
      .orderBy(desc(schema.themes.createdAt), desc(schema.themes.id))
      .limit(limit)
      .offset(offset);

    return rows.map(row => ({
      id: row.id,
      public_id: row.publicId,
      name: row.name,
      description: row.description,
      owner_id: row.ownerId,
      owner_display_name: row.ownerDisplayName,
      preview_ref: row.previewRef,
      created_at: row.createdAt.toISOString(),
    }));
  }

  async countPublicThemes(): Promise<number> {
    const rows = await this.db.select({ count: sql<number>`count(*)::int` })
      .from(schema.themes)
      .where(eq(schema.themes.visibility, 'public'));
    return rows[0]?.count ?? 0;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
