/**
 * Unit tests for the submission dialog routes.
 *
 * Handlers are driven through `invoke` with plain request/response doubles.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { createSubmissionHandlers } from '@/server/api/submissions';
import { invoke, type ApiHandler } from '@/server/api/http';
import { SubmissionService } from '@/server/submissions';
import { ThemeCatalog } from '@/server/themes';
import { LocalArtifactStore } from '@/server/storage';
import { PreviewRenderer, type Renderer } from '@/server/render/renderPreview';
import { RenderError } from '@/server/errors';
import type { SqliteRepository } from '@/server/db/sqlite';
import { createTestRepository, createThemeFileBytes, resetCounters, seedTheme, seedUser } from '../../utils/testDb';
import { MockResponse, createMockRequest, uploadedFile, type MockRequestOptions } from '../../utils/http';

const PUBLIC_URL = 'https://themes.test';

describe('submission routes', () => {
  let root: string;
  let repo: SqliteRepository;
  let store: LocalArtifactStore;
  let handlers: ReturnType<typeof createSubmissionHandlers>;

  function setup(renderer?: Renderer): void {
    const submissions = new SubmissionService(
      repo,
      store,
      renderer ?? new PreviewRenderer({ width: 160, height: 90, quality: 85, fetchTimeoutMs: 1000, barOpacity: 0.85 }),
      { themeFileExtension: '.fptheme', maxFileSizeBytes: 1024, workDir: path.join(root, 'tmp'), publicUrl: PUBLIC_URL }
    );
    const catalog = new ThemeCatalog(repo, store, { browsePageSize: 5, themeFileExtension: '.fptheme' });
    handlers = createSubmissionHandlers({ repo, submissions, catalog, config: { publicUrl: PUBLIC_URL } });
  }

  async function call(handler: ApiHandler, options: MockRequestOptions = {}): Promise<MockResponse> {
    const res = new MockResponse();
    await invoke(handler, createMockRequest(options), res);
    return res;
  }

  /** Run the dialog up to the visibility question. */
  async function reachVisibility(userId: string, bytes: Buffer = createThemeFileBytes()): Promise<void> {
    expect((await call(handlers.start, { userId })).statusCode).toBe(201);
    expect((await call(handlers.file, { userId, file: uploadedFile('neon.fptheme', bytes) })).statusCode).toBe(200);
    expect((await call(handlers.name, { userId, body: { text: 'Cyberpunk Neon' } })).statusCode).toBe(200);
    expect((await call(handlers.description, { userId, body: { text: 'Neon city vibes' } })).statusCode).toBe(200);
  }

  beforeEach(() => {
    resetCounters();
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'submission-routes-'));
    repo = createTestRepository();
    store = new LocalArtifactStore(path.join(root, 'artifacts'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    setup();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await repo.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('identity', () => {
    it('requires a caller id', async () => {
      const res = await call(handlers.start);

      expect(res.statusCode).toBe(401);
      expect(res.jsonBody).toEqual({ success: false, error: 'x-user-id header is required', code: 'UNAUTHORIZED' });
    });

    it('rejects banned callers', async () => {
      await seedUser(repo, { id: 'user-banned', banned: true });

      const res = await call(handlers.start, { userId: 'user-banned' });

      expect(res.statusCode).toBe(403);
      expect(res.jsonBody).toEqual({ success: false, error: 'Account is banned', code: 'BANNED' });
    });

    it('registers first-time callers on /me', async () => {
      const res = await call(handlers.me, { userId: 'user-new', userName: 'Ada' });

      expect(res.statusCode).toBe(200);
      expect(res.body.stage).toBeNull();
      expect(res.body.user).toMatchObject({
        id: 'user-new',
        displayName: 'Ada',
        themeSlots: 10,
        usedSlots: 0,
        remainingSlots: 10,
      });
    });
  });

  describe('happy path', () => {
    it('publishes a public theme in five steps', async () => {
      const start = await call(handlers.start, { userId: 'user-1' });
      expect(start.statusCode).toBe(201);
      expect(start.jsonBody).toEqual({ success: true, stage: 'awaiting_file', remainingSlots: 10 });

      const file = await call(handlers.file, { userId: 'user-1', file: uploadedFile('neon.fptheme', createThemeFileBytes()) });
      expect(file.jsonBody).toEqual({ success: true, stage: 'awaiting_name', remainingSlots: 10 });

      const name = await call(handlers.name, { userId: 'user-1', body: { text: 'Cyberpunk Neon' } });
      expect(name.jsonBody).toEqual({ success: true, stage: 'awaiting_description' });

      const description = await call(handlers.description, { userId: 'user-1', body: { text: 'Neon city vibes' } });
      expect(description.jsonBody).toEqual({ success: true, stage: 'awaiting_visibility' });

      const done = await call(handlers.visibility, { userId: 'user-1', body: { visibility: 'public' } });
      expect(done.statusCode).toBe(201);
      expect(done.body.success).toBe(true);
      expect(done.body.shareUrl).toBeNull();

      const [theme] = await repo.listThemesOwnedBy('user-1');
      expect(done.body.theme).toEqual({
        id: theme.id,
        publicId: theme.public_id,
        name: 'Cyberpunk Neon',
        description: 'Neon city vibes',
        visibility: 'public',
        createdAt: theme.created_at,
        shareUrl: `${PUBLIC_URL}/api/shared/${theme.public_id}`,
        fileUrl: `${PUBLIC_URL}/api/shared/${theme.public_id}/file`,
        previewUrl: `${PUBLIC_URL}/api/shared/${theme.public_id}/preview`,
      });
    });

    it('hands out a share link for private themes', async () => {
      await reachVisibility('user-1');

      const done = await call(handlers.visibility, { userId: 'user-1', body: { visibility: 'Private' } });

      const [theme] = await repo.listThemesOwnedBy('user-1');
      expect(done.statusCode).toBe(201);
      expect(theme.visibility).toBe('private');
      expect(done.body.shareUrl).toBe(`${PUBLIC_URL}/api/shared/${theme.public_id}`);
    });

    it('counts the published theme against the quota', async () => {
      await reachVisibility('user-1');
      await call(handlers.visibility, { userId: 'user-1', body: { visibility: 'public' } });

      const me = await call(handlers.me, { userId: 'user-1' });

      expect(me.body.stage).toBeNull();
      expect(me.body.user).toMatchObject({ usedSlots: 1, remainingSlots: 9 });
    });
  });

  describe('start', () => {
    it('reports an exhausted quota with usage numbers', async () => {
      await seedUser(repo, { id: 'user-full', slots: 1 });
      await seedTheme(repo, 'user-full');

      const res = await call(handlers.start, { userId: 'user-full' });

      expect(res.statusCode).toBe(403);
      expect(res.jsonBody).toEqual({
        success: false,
        error: 'No free theme slots (1/1)',
        code: 'QUOTA_EXCEEDED',
        used: 1,
        slots: 1,
      });
    });
  });

  describe('file', () => {
    it('requires a file field', async () => {
      await call(handlers.start, { userId: 'user-1' });

      const res = await call(handlers.file, { userId: 'user-1' });

      expect(res.statusCode).toBe(400);
      expect(res.jsonBody).toEqual({
        success: false,
        error: 'No file provided. Send it as multipart field "file".',
        code: 'VALIDATION_ERROR',
      });
    });

    it('needs an open submission', async () => {
      const res = await call(handlers.file, { userId: 'user-1', file: uploadedFile('neon.fptheme', createThemeFileBytes()) });

      expect(res.statusCode).toBe(409);
      expect(res.jsonBody).toEqual({ success: false, error: 'Start an upload first', code: 'NO_ACTIVE_SUBMISSION' });
    });

    it('rejects the wrong extension', async () => {
      await call(handlers.start, { userId: 'user-1' });

      const res = await call(handlers.file, { userId: 'user-1', file: uploadedFile('neon.json', createThemeFileBytes()) });

      expect(res.statusCode).toBe(400);
      expect(res.jsonBody).toEqual({
        success: false,
        error: 'Theme files must use the .fptheme extension',
        code: 'INVALID_FORMAT',
        expectedExtension: '.fptheme',
      });
    });

    it('rejects oversized files', async () => {
      await call(handlers.start, { userId: 'user-1' });

      const res = await call(handlers.file, { userId: 'user-1', file: uploadedFile('big.fptheme', Buffer.alloc(2048, 0x20)) });

      expect(res.statusCode).toBe(413);
      expect(res.jsonBody).toEqual({
        success: false,
        error: 'File too large. Maximum size is 1024 bytes.',
        code: 'FILE_TOO_LARGE',
        maxBytes: 1024,
      });
    });

    it('reports structural problems', async () => {
      await call(handlers.start, { userId: 'user-1' });

      const bytes = createThemeFileBytes({ font: undefined });
      const res = await call(handlers.file, { userId: 'user-1', file: uploadedFile('neon.fptheme', bytes) });

      expect(res.statusCode).toBe(400);
      expect(res.jsonBody).toEqual({ success: false, error: 'font is required', code: 'INVALID_STRUCTURE' });
    });

    it('rejects content someone already published', async () => {
      const bytes = createThemeFileBytes({ font: 'Orbitron' });
      await reachVisibility('user-1', bytes);
      await call(handlers.visibility, { userId: 'user-1', body: { visibility: 'public' } });

      await call(handlers.start, { userId: 'user-2' });
      const res = await call(handlers.file, { userId: 'user-2', file: uploadedFile('copy.fptheme', bytes) });

      expect(res.statusCode).toBe(409);
      expect(res.jsonBody).toEqual({
        success: false,
        error: 'This theme has already been uploaded',
        code: 'DUPLICATE_CONTENT',
      });
    });
  });

  describe('name and description', () => {
    it('rejects steps out of order with the current stage', async () => {
      await call(handlers.start, { userId: 'user-1' });

      const res = await call(handlers.name, { userId: 'user-1', body: { text: 'Too early' } });

      expect(res.statusCode).toBe(409);
      expect(res.jsonBody).toEqual({
        success: false,
        error: 'This step is not expected now (current stage: awaiting_file)',
        code: 'WRONG_STAGE',
        stage: 'awaiting_file',
      });
    });

    it('rejects an empty name and keeps waiting for one', async () => {
      await call(handlers.start, { userId: 'user-1' });
      await call(handlers.file, { userId: 'user-1', file: uploadedFile('neon.fptheme', createThemeFileBytes()) });

      const res = await call(handlers.name, { userId: 'user-1', body: { text: '' } });
      const me = await call(handlers.me, { userId: 'user-1' });

      expect(res.statusCode).toBe(400);
      expect(res.jsonBody).toEqual({ success: false, error: 'Name must not be empty', code: 'INVALID_NAME' });
      expect(me.body.stage).toBe('awaiting_name');
    });

    it('validates the request body', async () => {
      await call(handlers.start, { userId: 'user-1' });
      await call(handlers.file, { userId: 'user-1', file: uploadedFile('neon.fptheme', createThemeFileBytes()) });

      const res = await call(handlers.name, { userId: 'user-1', body: {} });

      expect(res.statusCode).toBe(400);
      expect(res.jsonBody).toEqual({ success: false, error: 'text: text is required', code: 'VALIDATION_ERROR' });
    });

    it('accepts an empty description', async () => {
      await call(handlers.start, { userId: 'user-1' });
      await call(handlers.file, { userId: 'user-1', file: uploadedFile('neon.fptheme', createThemeFileBytes()) });
      await call(handlers.name, { userId: 'user-1', body: { text: 'Plain' } });

      const res = await call(handlers.description, { userId: 'user-1', body: { text: '' } });

      expect(res.jsonBody).toEqual({ success: true, stage: 'awaiting_visibility' });
    });
  });

  describe('visibility', () => {
    it('rejects an unknown choice and keeps the draft', async () => {
      await reachVisibility('user-1');

      const res = await call(handlers.visibility, { userId: 'user-1', body: { visibility: 'friends' } });
      const me = await call(handlers.me, { userId: 'user-1' });

      expect(res.statusCode).toBe(400);
      expect(res.jsonBody).toEqual({
        success: false,
        error: 'visibility must be "public" or "private"',
        code: 'INVALID_VISIBILITY',
      });
      expect(me.body.stage).toBe('awaiting_visibility');
    });

    it('answers 500 when the preview cannot be rendered', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      setup({ mimeType: 'image/jpeg', render: async () => { throw new RenderError('Failed to compose preview image'); } });
      await reachVisibility('user-1');

      const res = await call(handlers.visibility, { userId: 'user-1', body: { visibility: 'public' } });

      expect(res.statusCode).toBe(500);
      expect(res.jsonBody).toEqual({
        success: false,
        error: 'Could not render a preview for this theme. Please start over.',
        code: 'RENDER_FAILED',
      });
      expect(await repo.countThemesOwnedBy('user-1')).toBe(0);
    });

    it('lets unexpected failures reach the error handler', async () => {
      setup({ mimeType: 'image/jpeg', render: async () => { throw new TypeError('renderer crashed'); } });
      await reachVisibility('user-1');

      const res = new MockResponse();
      const req = createMockRequest({ userId: 'user-1', body: { visibility: 'public' } });

      await expect(invoke(handlers.visibility, req, res)).rejects.toThrow('renderer crashed');
    });
  });

  describe('cancel', () => {
    it('reports whether a draft was open', async () => {
      await call(handlers.start, { userId: 'user-1' });

      const first = await call(handlers.cancel, { userId: 'user-1' });
      const second = await call(handlers.cancel, { userId: 'user-1' });

      expect(first.jsonBody).toEqual({ success: true, cancelled: true });
      expect(second.jsonBody).toEqual({ success: true, cancelled: false });
    });
  });
});
