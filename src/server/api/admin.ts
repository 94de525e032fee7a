/**
 * Billing and moderation routes.
 *
 * Slot grants come from the billing collaborator and are authenticated with a
 * shared secret; moderation is limited to configured admin ids.
 */

import type { Config } from '../../lib/config';
import type { ThemeCatalog } from '../themes';
import { requireAdmin, requireBillingSecret } from '../auth/identity';
import { NotFoundError } from '../errors';
import type { ApiHandler } from './http';
import { callerIdSchema, parseInput, slotGrantSchema, themeIdSchema } from './validation';

export interface AdminRouteDeps {
  catalog: ThemeCatalog;
  config: Pick<Config, 'adminIds' | 'billingSecret'>;
}

export function createAdminHandlers({ catalog, config }: AdminRouteDeps) {
  /**
   * POST /api/billing/slots
   * Body: { userId: string, count: number }
   * Called once per confirmed payment.
   */
  const grantSlots: ApiHandler = async (req, res) => {
    requireBillingSecret(req, config.billingSecret);
    const { userId, count } = parseInput(slotGrantSchema, req.body);
    const themeSlots = await catalog.grantSlots(userId, count);
    res.json({ success: true, userId, themeSlots });
  };

  /**
   * GET /api/admin/users
   * Users that can be reached with an announcement.
   */
  const listUsers: ApiHandler = async (req, res) => {
    requireAdmin(req, config.adminIds);
    const userIds = await catalog.listActiveUsers();
    res.json({ success: true, userIds, total: userIds.length });
  };

  /**
   * DELETE /api/admin/themes/:id
   */
  const deleteTheme: ApiHandler = async (req, res) => {
    requireAdmin(req, config.adminIds);
    const themeId = parseInput(themeIdSchema, req.params.id);
    if (!(await catalog.adminDeleteTheme(themeId))) {
      throw new NotFoundError('Theme');
    }
    res.json({ success: true, id: themeId });
  };

  function banHandler(banned: boolean): ApiHandler {
    return async (req, res) => {
      requireAdmin(req, config.adminIds);
      const userId = parseInput(callerIdSchema, req.params.id);
      if (!(await catalog.setBanStatus(userId, banned))) {
        throw new NotFoundError('User');
      }
      res.json({ success: true, userId, banned });
    };
  }

  return {
    grantSlots,
    listUsers,
    deleteTheme,
    /** POST /api/admin/users/:id/ban */
    ban: banHandler(true),
    /** POST /api/admin/users/:id/unban */
    unban: banHandler(false),
  };
}
