/**
 * Unit tests for catalog and share-link routes.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { createThemeHandlers } from '@/server/api/themes';
import { invoke, type ApiHandler } from '@/server/api/http';
import { ThemeCatalog } from '@/server/themes';
import { LocalArtifactStore, generateArtifactKey } from '@/server/storage';
import { NotFoundError } from '@/server/errors';
import type { SqliteRepository } from '@/server/db/sqlite';
import type { DbTheme, Visibility } from '@/server/db/types';
import { createTestRepository, createThemeFileBytes, resetCounters, seedTheme, seedUser } from '../../utils/testDb';
import { MockResponse, createMockRequest, type MockRequestOptions } from '../../utils/http';

const PUBLIC_URL = 'https://themes.test';

describe('theme routes', () => {
  let root: string;
  let repo: SqliteRepository;
  let store: LocalArtifactStore;
  let handlers: ReturnType<typeof createThemeHandlers>;

  async function call(handler: ApiHandler, options: MockRequestOptions = {}): Promise<MockResponse> {
    const res = new MockResponse();
    await invoke(handler, createMockRequest(options), res);
    return res;
  }

  async function seedStoredTheme(ownerId: string, name: string, visibility: Visibility = 'public'): Promise<DbTheme> {
    const contentRef = await store.put(generateArtifactKey('themes', '.fptheme'), createThemeFileBytes({ font: name }), 'application/json');
    const previewRef = await store.put(generateArtifactKey('previews', '.jpg'), Buffer.from(`preview of ${name}`), 'image/jpeg');
    return seedTheme(repo, ownerId, { name, visibility, contentRef, previewRef });
  }

  beforeEach(async () => {
    resetCounters();
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'theme-routes-'));
    repo = createTestRepository();
    store = new LocalArtifactStore(root);
    const catalog = new ThemeCatalog(repo, store, { browsePageSize: 5, themeFileExtension: '.fptheme' });
    handlers = createThemeHandlers({ repo, catalog, config: { publicUrl: PUBLIC_URL } });

    await seedUser(repo, { id: 'user-a', displayName: 'alice' });
    await seedUser(repo, { id: 'user-b', displayName: 'bob' });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await repo.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('GET /themes/mine', () => {
    it('lists the caller\'s themes only', async () => {
      const mine = await seedTheme(repo, 'user-a', { name: 'Mine', visibility: 'private' });
      await seedTheme(repo, 'user-b', { name: 'Theirs' });

      const res = await call(handlers.listMine, { userId: 'user-a' });

      expect(res.jsonBody).toEqual({
        success: true,
        themes: [{
          id: mine.id,
          publicId: mine.public_id,
          name: 'Mine',
          visibility: 'private',
          createdAt: mine.created_at,
        }],
      });
    });

    it('requires a caller id', async () => {
      const res = await call(handlers.listMine);

      expect(res.statusCode).toBe(401);
    });
  });

  describe('GET /themes/public', () => {
    beforeEach(async () => {
      for (let i = 1; i <= 7; i++) {
        await seedTheme(repo, 'user-a', { name: `Public ${i}` });
      }
      await seedTheme(repo, 'user-b', { name: 'Hidden', visibility: 'private' });
    });

    it('defaults to the first page', async () => {
      const res = await call(handlers.browse);

      expect(res.body).toMatchObject({ success: true, page: 0, pageSize: 5, total: 7, hasNext: true, hasPrev: false });
      expect(res.body.items).toHaveLength(5);
    });

    it('reads paging from the query string', async () => {
      const res = await call(handlers.browse, { query: { page: '1', pageSize: '5' } });

      expect(res.body).toMatchObject({ page: 1, pageSize: 5, total: 7, hasNext: false, hasPrev: true });
      expect(res.body.items).toHaveLength(2);
    });

    it('shows owner names and preview links', async () => {
      const res = await call(handlers.browse, { query: { pageSize: '1' } });
      const [latest] = await repo.listPublicThemes(0, 1);

      expect(res.body.items).toEqual([{
        id: latest.id,
        publicId: latest.public_id,
        name: latest.name,
        description: '',
        ownerDisplayName: 'alice',
        createdAt: latest.created_at,
        previewUrl: `${PUBLIC_URL}/api/shared/${latest.public_id}/preview`,
      }]);
    });

    it('rejects a page size above the maximum', async () => {
      const res = await call(handlers.browse, { query: { pageSize: '500' } });

      expect(res.statusCode).toBe(400);
      expect(res.jsonBody).toEqual({
        success: false,
        error: 'pageSize: Number must be less than or equal to 50',
        code: 'VALIDATION_ERROR',
      });
    });

    it('rejects a negative page', async () => {
      const res = await call(handlers.browse, { query: { page: '-1' } });

      expect(res.statusCode).toBe(400);
      expect(res.body.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('PATCH /themes/:id/visibility', () => {
    it('lets the owner change visibility', async () => {
      const theme = await seedTheme(repo, 'user-a', { visibility: 'public' });

      const res = await call(handlers.setVisibility, {
        userId: 'user-a',
        params: { id: String(theme.id) },
        body: { visibility: 'private' },
      });

      expect(res.jsonBody).toEqual({ success: true, id: theme.id, visibility: 'private' });
      expect((await repo.getThemeById(theme.id))?.visibility).toBe('private');
    });

    it('answers 404 for someone else\'s theme', async () => {
      const theme = await seedTheme(repo, 'user-a');

      const res = await call(handlers.setVisibility, {
        userId: 'user-b',
        params: { id: String(theme.id) },
        body: { visibility: 'private' },
      });

      expect(res.statusCode).toBe(404);
      expect(res.jsonBody).toEqual({ success: false, error: 'Theme not found', code: 'NOT_FOUND' });
      expect((await repo.getThemeById(theme.id))?.visibility).toBe('public');
    });

    it('validates the visibility value', async () => {
      const theme = await seedTheme(repo, 'user-a');

      const res = await call(handlers.setVisibility, {
        userId: 'user-a',
        params: { id: String(theme.id) },
        body: { visibility: 'hidden' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.body.error).toBe('visibility: visibility must be "public" or "private"');
    });

    it('validates the theme id', async () => {
      const res = await call(handlers.setVisibility, {
        userId: 'user-a',
        params: { id: 'abc' },
        body: { visibility: 'private' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.body.error).toBe('Theme id must be a number');
    });
  });

  describe('DELETE /themes/:id', () => {
    it('deletes the theme and its artifacts', async () => {
      const theme = await seedStoredTheme('user-a', 'Doomed');

      const res = await call(handlers.remove, { userId: 'user-a', params: { id: String(theme.id) } });

      expect(res.jsonBody).toEqual({ success: true, id: theme.id });
      expect(await repo.getThemeById(theme.id)).toBeNull();
      await expect(store.get(theme.content_ref)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('answers 404 for someone else\'s theme', async () => {
      const theme = await seedStoredTheme('user-a', 'Kept');

      const res = await call(handlers.remove, { userId: 'user-b', params: { id: String(theme.id) } });

      expect(res.statusCode).toBe(404);
      expect(await repo.getThemeById(theme.id)).not.toBeNull();
    });
  });

  describe('downloads by id', () => {
    it('serves a public theme file to anyone', async () => {
      const theme = await seedStoredTheme('user-a', 'Cyberpunk Neon');

      const res = await call(handlers.downloadFile, { params: { id: String(theme.id) } });

      expect(res.statusCode).toBe(200);
      expect(res.sentBody).toEqual(createThemeFileBytes({ font: 'Cyberpunk Neon' }));
      expect(res.headers.get('content-type')).toBe('application/json');
      expect(res.headers.get('content-disposition')).toBe('attachment; filename="Cyberpunk_Neon.fptheme"');
    });

    it('serves the preview inline', async () => {
      const theme = await seedStoredTheme('user-a', 'Cyberpunk Neon');

      const res = await call(handlers.downloadPreview, { params: { id: String(theme.id) } });

      expect(res.sentBody).toEqual(Buffer.from('preview of Cyberpunk Neon'));
      expect(res.headers.get('content-type')).toBe('image/jpeg');
      expect(res.headers.get('content-disposition')).toBe('inline; filename="Cyberpunk_Neon.jpg"');
    });

    it('hides private themes from everyone but the owner', async () => {
      const theme = await seedStoredTheme('user-a', 'Secret', 'private');

      const anonymous = await call(handlers.downloadFile, { params: { id: String(theme.id) } });
      const other = await call(handlers.downloadFile, { userId: 'user-b', params: { id: String(theme.id) } });
      const owner = await call(handlers.downloadFile, { userId: 'user-a', params: { id: String(theme.id) } });

      expect(anonymous.statusCode).toBe(404);
      expect(other.statusCode).toBe(404);
      expect(owner.statusCode).toBe(200);
    });
  });

  describe('share links', () => {
    it('resolves a private theme by public id', async () => {
      const theme = await seedStoredTheme('user-a', 'Secret', 'private');

      const res = await call(handlers.shared, { params: { publicId: theme.public_id } });

      expect(res.body.theme).toEqual({
        id: theme.id,
        publicId: theme.public_id,
        name: 'Secret',
        description: '',
        visibility: 'private',
        createdAt: theme.created_at,
        shareUrl: `${PUBLIC_URL}/api/shared/${theme.public_id}`,
        fileUrl: `${PUBLIC_URL}/api/shared/${theme.public_id}/file`,
        previewUrl: `${PUBLIC_URL}/api/shared/${theme.public_id}/preview`,
        ownerDisplayName: 'alice',
      });
    });

    it('serves the file and preview behind the link', async () => {
      const theme = await seedStoredTheme('user-a', 'Secret', 'private');

      const file = await call(handlers.sharedFile, { params: { publicId: theme.public_id } });
      const preview = await call(handlers.sharedPreview, { params: { publicId: theme.public_id } });

      expect(file.sentBody).toEqual(createThemeFileBytes({ font: 'Secret' }));
      expect(preview.sentBody).toEqual(Buffer.from('preview of Secret'));
    });

    it('answers 404 for unknown links', async () => {
      const res = await call(handlers.shared, { params: { publicId: 'nope' } });

      expect(res.statusCode).toBe(404);
      expect(res.jsonBody).toEqual({ success: false, error: 'Theme not found', code: 'NOT_FOUND' });
    });
  });
});
