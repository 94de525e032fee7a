/**
 * Database types shared between SQLite and PostgreSQL adapters.
 * Both adapters map their rows onto these shapes.
 */

export type Visibility = 'public' | 'private';

export const DEFAULT_THEME_SLOTS = 10;

export interface DbUser {
  id: string;
  display_name: string | null;
  theme_slots: number;
  is_banned: boolean;
  created_at: string;
}

export interface DbTheme {
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

/** Row shape for the public catalog: theme joined with its owner. */
export interface PublicThemeSummary {
  id: number;
  public_id: string;
  name: string;
  description: string;
  owner_id: string;
  owner_display_name: string | null;
  preview_ref: string;
  created_at: string;
}

export interface CreateThemeParams {
  ownerId: string;
  name: string;
  description: string;
  visibility: Visibility;
  contentRef: string;
  contentHash: string;
  previewRef: string;
}

/**
 * Storage contract implemented by every adapter.
 *
 * Each mutation touches one row plus at most one uniqueness check, so no
 * operation needs a multi-statement transaction.
 */
export interface ThemeRepository {
  // users
  upsertUser(id: string, displayName?: string | null): Promise<DbUser>;
  getUser(id: string): Promise<DbUser | null>;
  setBanStatus(id: string, banned: boolean): Promise<boolean>;
  isBanned(id: string): Promise<boolean>;
  grantSlots(id: string, count: number): Promise<boolean>;
  listActiveUserIds(): Promise<string[]>;

  // themes
  countThemesOwnedBy(ownerId: string): Promise<number>;
  hashExists(contentHash: string): Promise<boolean>;
  createTheme(params: CreateThemeParams): Promise<DbTheme>;
  listThemesOwnedBy(ownerId: string): Promise<DbTheme[]>;
  getThemeById(id: number): Promise<DbTheme | null>;
  getThemeByPublicId(publicId: string): Promise<DbTheme | null>;
  deleteTheme(id: number, ownerId: string): Promise<boolean>;
  adminDeleteTheme(id: number): Promise<boolean>;
  setVisibility(id: number, ownerId: string, visibility: Visibility): Promise<boolean>;
  listPublicThemes(offset: number, limit: number): Promise<PublicThemeSummary[]>;
  countPublicThemes(): Promise<number>;

  close(): Promise<void>;
}

/** Public ids are regenerated this many times before a collision is reported. */
export const PUBLIC_ID_ATTEMPTS = 5;
