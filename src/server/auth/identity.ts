/**
 * Caller identity for the command channel.
 *
 * The transport in front of the API has already authenticated the account and
 * forwards its id in `x-user-id`. Every identified request upserts the user so
 * first contact needs no separate sign-up.
 */

import crypto from 'crypto';
import type { DbUser, ThemeRepository } from '../db/types';
import { headerValue, type ApiRequest } from '../api/http';
import { callerIdSchema, displayNameSchema } from '../api/validation';
import { BannedError, ForbiddenError, UnauthorizedError, ValidationError } from '../errors';

export const USER_ID_HEADER = 'x-user-id';
export const USER_NAME_HEADER = 'x-user-name';
export const BILLING_SECRET_HEADER = 'x-billing-secret';

/** The caller's id, or null for anonymous requests. */
export function callerId(req: Pick<ApiRequest, 'headers'>): string | null {
  const raw = headerValue(req, USER_ID_HEADER);
  if (raw === null) return null;

  const parsed = callerIdSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`${USER_ID_HEADER}: ${parsed.error.issues[0].message}`);
  }
  return parsed.data;
}

/**
 * Identify the caller and refresh their user row.
 * Throws for anonymous and banned callers.
 */
export async function resolveCaller(req: Pick<ApiRequest, 'headers'>, repo: ThemeRepository): Promise<DbUser> {
  const id = callerId(req);
  if (!id) {
    throw new UnauthorizedError(`${USER_ID_HEADER} header is required`);
  }

  const name = displayNameSchema.safeParse(headerValue(req, USER_NAME_HEADER) ?? undefined);
  const user = await repo.upsertUser(id, name.success ? name.data : undefined);
  if (user.is_banned) {
    throw new BannedError();
  }
  return user;
}

export function requireAdmin(req: Pick<ApiRequest, 'headers'>, adminIds: readonly string[]): string {
  const id = callerId(req);
  if (!id) {
    throw new UnauthorizedError(`${USER_ID_HEADER} header is required`);
  }
  if (!adminIds.includes(id)) {
    throw new ForbiddenError('Admin access required');
  }
  return id;
}

/** Constant-time check of the billing collaborator's shared secret. */
export function requireBillingSecret(req: Pick<ApiRequest, 'headers'>, secret: string): void {
  if (!secret) {
    throw new ForbiddenError('Slot grants are disabled');
  }
  const presented = headerValue(req, BILLING_SECRET_HEADER) ?? '';
  const expected = crypto.createHash('sha256').update(secret).digest();
  const actual = crypto.createHash('sha256').update(presented).digest();
  if (!crypto.timingSafeEqual(expected, actual)) {
    throw new ForbiddenError('Invalid billing secret');
  }
}
