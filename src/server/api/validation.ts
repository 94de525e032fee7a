/**
 * Zod validation schemas for API inputs.
 */

import { z } from 'zod';
import { ValidationError } from '../errors';
import { MAX_PAGE_SIZE } from '../themes';

// Long enough for any chat message the dialog relays
export const MAX_TEXT_LENGTH = 4096;

export const callerIdSchema = z.string().trim().min(1, 'Caller id is empty').max(128, 'Caller id is too long');

export const displayNameSchema = z.string().trim().max(128).optional();

/** Name and description steps. Blank names are the dialog's call, not a schema error. */
export const textInputSchema = z.object({
  text: z.string({ required_error: 'text is required' }).max(MAX_TEXT_LENGTH, `text must be at most ${MAX_TEXT_LENGTH} characters`),
});

/** The dialog parses the choice itself so it can answer with its own outcome. */
export const visibilityChoiceSchema = z.object({
  visibility: z.string({ required_error: 'visibility is required' }).max(32),
});

export const visibilityUpdateSchema = z.object({
  visibility: z.enum(['public', 'private'], {
    errorMap: () => ({ message: 'visibility must be "public" or "private"' }),
  }),
});

export const themeIdSchema = z.coerce
  .number({ invalid_type_error: 'Theme id must be a number' })
  .int('Theme id must be an integer')
  .positive('Theme id must be positive');

export const pagingSchema = z.object({
  page: z.coerce.number().int().min(0).default(0),
  pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).optional(),
});

export const slotGrantSchema = z.object({
  userId: callerIdSchema,
  count: z.number().int().positive().max(10_000),
});

/**
 * Parse input against a schema, throwing ValidationError with the first issue.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, data: unknown): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new ValidationError(field ? `${field}: ${issue.message}` : issue.message);
  }
  return result.data;
}
