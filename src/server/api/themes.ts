/**
 * Theme catalog routes: owner listings, public browsing, share links and
 * artifact downloads.
 */

import type { Config } from '../../lib/config';
import type { DbTheme, PublicThemeSummary, ThemeRepository } from '../db/types';
import type { ThemeCatalog } from '../themes';
import { shareUrlFor } from '../submissions';
import { callerId, resolveCaller } from '../auth/identity';
import { NotFoundError } from '../errors';
import { sendArtifact, type ApiHandler } from './http';
import { pagingSchema, parseInput, themeIdSchema, visibilityUpdateSchema } from './validation';

export interface ThemeRouteDeps {
  repo: ThemeRepository;
  catalog: ThemeCatalog;
  config: Pick<Config, 'publicUrl'>;
}

// =============================================================================
// Response shapes
// =============================================================================

export function themeLinks(publicUrl: string, publicId: string) {
  const shareUrl = shareUrlFor(publicUrl, publicId);
  return {
    shareUrl,
    fileUrl: `${shareUrl}/file`,
    previewUrl: `${shareUrl}/preview`,
  };
}

export function themeResponse(theme: DbTheme, publicUrl: string) {
  return {
    id: theme.id,
    publicId: theme.public_id,
    name: theme.name,
    description: theme.description,
    visibility: theme.visibility,
    createdAt: theme.created_at,
    ...themeLinks(publicUrl, theme.public_id),
  };
}

function publicSummaryResponse(item: PublicThemeSummary, publicUrl: string) {
  return {
    id: item.id,
    publicId: item.public_id,
    name: item.name,
    description: item.description,
    ownerDisplayName: item.owner_display_name,
    createdAt: item.created_at,
    previewUrl: themeLinks(publicUrl, item.public_id).previewUrl,
  };
}

// =============================================================================
// Handlers
// =============================================================================

export function createThemeHandlers({ repo, catalog, config }: ThemeRouteDeps) {
  /**
   * GET /api/themes/mine
   */
  const listMine: ApiHandler = async (req, res) => {
    const user = await resolveCaller(req, repo);
    const themes = await catalog.listOwned(user.id);
    res.json({ success: true, themes });
  };

  /**
   * GET /api/themes/public?page=0&pageSize=5
   * Pages are zero-based.
   */
  const browse: ApiHandler = async (req, res) => {
    const { page, pageSize } = parseInput(pagingSchema, req.query);
    const result = await catalog.browsePublic(page, pageSize);
    res.json({
      success: true,
      items: result.items.map(item => publicSummaryResponse(item, config.publicUrl)),
      page: result.page,
      pageSize: result.pageSize,
      total: result.total,
      hasNext: result.hasNext,
      hasPrev: result.hasPrev,
    });
  };

  /**
   * PATCH /api/themes/:id/visibility
   * Body: { visibility: 'public' | 'private' }
   */
  const setVisibility: ApiHandler = async (req, res) => {
    const user = await resolveCaller(req, repo);
    const themeId = parseInput(themeIdSchema, req.params.id);
    const { visibility } = parseInput(visibilityUpdateSchema, req.body);

    if (!(await catalog.toggleVisibility(user.id, themeId, visibility))) {
      throw new NotFoundError('Theme');
    }
    res.json({ success: true, id: themeId, visibility });
  };

  /**
   * DELETE /api/themes/:id
   */
  const remove: ApiHandler = async (req, res) => {
    const user = await resolveCaller(req, repo);
    const themeId = parseInput(themeIdSchema, req.params.id);

    if (!(await catalog.deleteOwned(user.id, themeId))) {
      throw new NotFoundError('Theme');
    }
    res.json({ success: true, id: themeId });
  };

  /**
   * GET /api/themes/:id/file
   * Identity is optional: public themes are open to anyone.
   */
  const downloadFile: ApiHandler = async (req, res) => {
    const themeId = parseInput(themeIdSchema, req.params.id);
    sendArtifact(res, await catalog.openThemeFile(themeId, callerId(req)), 'attachment');
  };

  /**
   * GET /api/themes/:id/preview
   */
  const downloadPreview: ApiHandler = async (req, res) => {
    const themeId = parseInput(themeIdSchema, req.params.id);
    sendArtifact(res, await catalog.openPreview(themeId, callerId(req)), 'inline');
  };

  /**
   * GET /api/shared/:publicId
   */
  const shared: ApiHandler = async (req, res) => {
    const { theme, ownerDisplayName } = await catalog.getShared(req.params.publicId);
    res.json({
      success: true,
      theme: { ...themeResponse(theme, config.publicUrl), ownerDisplayName },
    });
  };

  /**
   * GET /api/shared/:publicId/file
   */
  const sharedFile: ApiHandler = async (req, res) => {
    sendArtifact(res, await catalog.openSharedFile(req.params.publicId), 'attachment');
  };

  /**
   * GET /api/shared/:publicId/preview
   */
  const sharedPreview: ApiHandler = async (req, res) => {
    sendArtifact(res, await catalog.openSharedPreview(req.params.publicId), 'inline');
  };

  return { listMine, browse, setVisibility, remove, downloadFile, downloadPreview, shared, sharedFile, sharedPreview };
}
