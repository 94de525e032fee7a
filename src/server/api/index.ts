import { Router } from 'express';
import type { Config } from '../../lib/config';
import type { ThemeRepository } from '../db/types';
import type { SubmissionService } from '../submissions';
import type { ThemeCatalog } from '../themes';
import { createRateLimits } from '../rateLimit';
import { createThemeUpload } from '../upload';
import { route } from './http';
import { createSubmissionHandlers } from './submissions';
import { createThemeHandlers } from './themes';
import { createAdminHandlers } from './admin';

export interface ApiDeps {
  repo: ThemeRepository;
  submissions: SubmissionService;
  catalog: ThemeCatalog;
  config: Pick<Config, 'isDev' | 'publicUrl' | 'maxFileSizeBytes' | 'adminIds' | 'billingSecret'>;
}

export function createApiRouter(deps: ApiDeps): Router {
  const router = Router();
  const limits = createRateLimits(deps.config);
  const upload = createThemeUpload(deps.config.maxFileSizeBytes);

  const dialog = createSubmissionHandlers(deps);
  const themes = createThemeHandlers(deps);
  const admin = createAdminHandlers(deps);

  // Account
  router.get('/me', limits.general, route(dialog.me));

  // Submission dialog
  router.post('/submissions', limits.submission, route(dialog.start));
  router.post('/submissions/file', limits.upload, upload, route(dialog.file));
  router.post('/submissions/name', limits.submission, route(dialog.name));
  router.post('/submissions/description', limits.submission, route(dialog.description));
  router.post('/submissions/visibility', limits.submission, route(dialog.visibility));
  router.delete('/submissions', limits.submission, route(dialog.cancel));

  // Catalog
  router.get('/themes/mine', limits.general, route(themes.listMine));
  router.get('/themes/public', limits.general, route(themes.browse));
  router.patch('/themes/:id/visibility', limits.general, route(themes.setVisibility));
  router.delete('/themes/:id', limits.general, route(themes.remove));
  router.get('/themes/:id/file', limits.general, route(themes.downloadFile));
  router.get('/themes/:id/preview', limits.general, route(themes.downloadPreview));

  // Share links
  router.get('/shared/:publicId', limits.general, route(themes.shared));
  router.get('/shared/:publicId/file', limits.general, route(themes.sharedFile));
  router.get('/shared/:publicId/preview', limits.general, route(themes.sharedPreview));

  // Billing & moderation
  router.post('/billing/slots', limits.admin, route(admin.grantSlots));
  router.get('/admin/users', limits.admin, route(admin.listUsers));
  router.delete('/admin/themes/:id', limits.admin, route(admin.deleteTheme));
  router.post('/admin/users/:id/ban', limits.admin, route(admin.ban));
  router.post('/admin/users/:id/unban', limits.admin, route(admin.unban));

  return router;
}
