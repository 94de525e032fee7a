/**
 * Theme catalog - everything that happens to a theme after it is published.
 *
 * Owner listings, public browsing, share links, visibility and deletion,
 * artifact downloads, plus the slot and moderation operations used by the
 * billing and admin routes.
 */

import type { Config } from '../lib/config';
import type { DbTheme, DbUser, PublicThemeSummary, ThemeRepository, Visibility } from './db/types';
import { discardArtifacts, type ArtifactStore } from './storage';
import { isWellFormedPublicId } from './identity';
import { ForbiddenError, NotFoundError, ValidationError } from './errors';

// =============================================================================
// Types
// =============================================================================

export interface OwnedThemeSummary {
  id: number;
  publicId: string;
  name: string;
  visibility: Visibility;
  createdAt: string;
}

export interface BrowsePage {
  items: PublicThemeSummary[];
  page: number;
  pageSize: number;
  total: number;
  hasNext: boolean;
  hasPrev: boolean;
}

export interface SharedTheme {
  theme: DbTheme;
  ownerDisplayName: string | null;
}

export interface ThemeArtifact {
  bytes: Buffer;
  contentType: string;
  filename: string;
}

export interface AccountSummary {
  user: DbUser;
  used: number;
  remainingSlots: number;
}

export type CatalogOptions = Pick<Config, 'browsePageSize' | 'themeFileExtension'>;

export const MAX_PAGE_SIZE = 50;

/** File name offered for download, derived from the theme name. */
export function downloadFilename(name: string, extension: string): string {
  const base = name
    .trim()
    .replace(/[^A-Za-z0-9 _-]+/g, '')
    .replace(/\s+/g, '_')
    .slice(0, 64);
  return `${base || 'theme'}${extension}`;
}

// =============================================================================
// Catalog
// =============================================================================

export class ThemeCatalog {
  constructor(
    private readonly repo: ThemeRepository,
    private readonly store: ArtifactStore,
    private readonly options: CatalogOptions
  ) {}

  async getAccount(userId: string): Promise<AccountSummary> {
    const user = await this.repo.getUser(userId);
    if (!user) throw new NotFoundError('User');
    const used = await this.repo.countThemesOwnedBy(userId);
    return { user, used, remainingSlots: Math.max(0, user.theme_slots - used) };
  }

  async listOwned(ownerId: string): Promise<OwnedThemeSummary[]> {
    const themes = await this.repo.listThemesOwnedBy(ownerId);
    return themes.map(theme => ({
      id: theme.id,
      publicId: theme.public_id,
      name: theme.name,
      visibility: theme.visibility,
      createdAt: theme.created_at,
    }));
  }

  /**
   * Zero-based page of public themes, most recent first.
   */
  async browsePublic(page: number, pageSize: number = this.options.browsePageSize): Promise<BrowsePage> {
    if (!Number.isInteger(page) || page < 0) {
      throw new ValidationError('page must be a non-negative integer');
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw new ValidationError(`pageSize must be between 1 and ${MAX_PAGE_SIZE}`);
    }

    const [items, total] = await Promise.all([
      this.repo.listPublicThemes(page * pageSize, pageSize),
      this.repo.countPublicThemes(),
    ]);

    return {
      items,
      page,
      pageSize,
      total,
      hasNext: (page + 1) * pageSize < total,
      hasPrev: page > 0,
    };
  }

  /**
   * Resolve a share link. Visibility is not checked: holding the public id
   * is what grants access to a private theme.
   */
  async getShared(publicId: string): Promise<SharedTheme> {
    const theme = isWellFormedPublicId(publicId) ? await this.repo.getThemeByPublicId(publicId) : null;
    if (!theme) throw new NotFoundError('Theme');

    const owner = await this.repo.getUser(theme.owner_id);
    return { theme, ownerDisplayName: owner?.display_name ?? null };
  }

  async getOwnedTheme(ownerId: string, themeId: number): Promise<DbTheme> {
    const theme = await this.repo.getThemeById(themeId);
    if (!theme) throw new NotFoundError('Theme');
    if (theme.owner_id !== ownerId) throw new ForbiddenError('You do not own this theme');
    return theme;
  }

  /** Owner-scoped. False when the theme doesn't exist or isn't the caller's. */
  async toggleVisibility(ownerId: string, themeId: number, visibility: Visibility): Promise<boolean> {
    return this.repo.setVisibility(themeId, ownerId, visibility);
  }

  /** Owner-scoped delete; the theme's artifacts go with it. */
  async deleteOwned(ownerId: string, themeId: number): Promise<boolean> {
    const theme = await this.repo.getThemeById(themeId);
    if (!theme || theme.owner_id !== ownerId) return false;

    const deleted = await this.repo.deleteTheme(themeId, ownerId);
    if (deleted) {
      await discardArtifacts(this.store, [theme.content_ref, theme.preview_ref]);
    }
    return deleted;
  }

  // ---------------------------------------------------------------------------
  // Artifacts
  // ---------------------------------------------------------------------------

  /**
   * Look up a theme by internal id for a download. Public themes are open to
   * everyone; private ones only to their owner, and look missing to anyone else.
   */
  private async readableTheme(themeId: number, requesterId: string | null): Promise<DbTheme> {
    const theme = await this.repo.getThemeById(themeId);
    if (!theme) throw new NotFoundError('Theme');
    if (theme.visibility === 'private' && theme.owner_id !== requesterId) {
      throw new NotFoundError('Theme');
    }
    return theme;
  }

  private async themeFile(theme: DbTheme): Promise<ThemeArtifact> {
    return {
      bytes: await this.store.get(theme.content_ref),
      contentType: 'application/json',
      filename: downloadFilename(theme.name, this.options.themeFileExtension),
    };
  }

  private async previewImage(theme: DbTheme): Promise<ThemeArtifact> {
    return {
      bytes: await this.store.get(theme.preview_ref),
      contentType: 'image/jpeg',
      filename: downloadFilename(theme.name, '.jpg'),
    };
  }

  async openThemeFile(themeId: number, requesterId: string | null): Promise<ThemeArtifact> {
    return this.themeFile(await this.readableTheme(themeId, requesterId));
  }

  async openPreview(themeId: number, requesterId: string | null): Promise<ThemeArtifact> {
    return this.previewImage(await this.readableTheme(themeId, requesterId));
  }

  async openSharedFile(publicId: string): Promise<ThemeArtifact> {
    const { theme } = await this.getShared(publicId);
    return this.themeFile(theme);
  }

  async openSharedPreview(publicId: string): Promise<ThemeArtifact> {
    const { theme } = await this.getShared(publicId);
    return this.previewImage(theme);
  }

  // ---------------------------------------------------------------------------
  // Billing & moderation
  // ---------------------------------------------------------------------------

  /**
   * Add purchased slots. Returns the new slot total.
   */
  async grantSlots(userId: string, count: number): Promise<number> {
    if (!Number.isInteger(count) || count < 1) {
      throw new ValidationError('count must be a positive integer');
    }
    if (!(await this.repo.grantSlots(userId, count))) {
      throw new NotFoundError('User');
    }
    const user = await this.repo.getUser(userId);
    if (!user) throw new NotFoundError('User');

    console.log(`[billing] granted ${count} slot(s) to ${userId}, now ${user.theme_slots}`);
    return user.theme_slots;
  }

  /** Ids of every user who is not banned: the audience for announcements. */
  async listActiveUsers(): Promise<string[]> {
    return this.repo.listActiveUserIds();
  }

  async adminDeleteTheme(themeId: number): Promise<boolean> {
    const theme = await this.repo.getThemeById(themeId);
    if (!theme) return false;

    const deleted = await this.repo.adminDeleteTheme(themeId);
    if (deleted) {
      await discardArtifacts(this.store, [theme.content_ref, theme.preview_ref]);
      console.log(`[admin] deleted theme ${themeId} owned by ${theme.owner_id}`);
    }
    return deleted;
  }

  async setBanStatus(userId: string, banned: boolean): Promise<boolean> {
    const updated = await this.repo.setBanStatus(userId, banned);
    if (updated) {
      console.log(`[admin] ${banned ? 'banned' : 'unbanned'} ${userId}`);
    }
    return updated;
  }
}
