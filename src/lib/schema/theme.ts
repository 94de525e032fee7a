/**
 * Theme file schema - the structure of an uploaded `.fptheme` document.
 *
 * The check is structural: a JSON object carrying the three mandatory keys,
 * whatever their values.
 * Optional styling keys are typed when well formed and dropped to renderer
 * defaults when not; every other key is kept verbatim in `extras`.
 */

import { z } from 'zod';

// =============================================================================
// Field schemas
// =============================================================================

/** Optional string that degrades to undefined instead of failing the file. */
const lenientString = z.string().optional().catch(undefined);

/** Optional number; numeric strings ("8", "0.5") are accepted too. */
const lenientNumber = z
  .union([
    z.number().finite(),
    z.string().trim().regex(/^-?\d+(\.\d+)?$/).transform(Number),
  ])
  .optional()
  .catch(undefined);

/**
 * Mandatory key: only its presence is checked. A value that is not a string
 * becomes '', which the renderer treats as absent and replaces with its default.
 */
function requiredKey(key: string) {
  return z
    .unknown()
    .refine(value => value !== undefined, { message: `${key} is required` })
    .transform(value => (typeof value === 'string' ? value : ''));
}

export const ThemeFileSchema = z.object({
  // mandatory
  bgColor1: requiredKey('bgColor1'),
  font: requiredKey('font'),
  bgImage: requiredKey('bgImage'),

  // palette
  bgColor2: lenientString,
  containerBgColor: lenientString,
  textColor: lenientString,
  linkColor: lenientString,

  // geometry & background effects
  borderRadius: lenientNumber,
  bgBlur: lenientNumber,
  bgBrightness: lenientNumber, // percent, 100 = unchanged
});

export type ThemeFields = z.infer<typeof ThemeFileSchema>;

export type ThemeConfig = ThemeFields & {
  /** Unrecognized keys, passed through untouched */
  extras: Record<string, unknown>;
};

export const REQUIRED_THEME_KEYS = ['bgColor1', 'font', 'bgImage'] as const;

const KNOWN_KEYS = new Set<string>(Object.keys(ThemeFileSchema.shape));

// =============================================================================
// Validation
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed theme document, returning typed result or error.
 */
export function validateThemeDoc(data: unknown):
  { success: true; data: ThemeConfig } |
  { success: false; error: string } {
  if (!isPlainObject(data)) {
    return { success: false, error: 'Theme file must be a JSON object' };
  }

  const result = ThemeFileSchema.safeParse(data);
  if (!result.success) {
    const firstError = result.error.issues[0];
    return { success: false, error: firstError.message };
  }

  const extras: Record<string, unknown> = Object.fromEntries(
    Object.entries(data).filter(([key]) => !KNOWN_KEYS.has(key)),
  );

  return { success: true, data: { ...result.data, extras } };
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode and validate raw theme file bytes.
 * A leading BOM is ignored; invalid UTF-8 or JSON fails the file.
 */
export function validateThemeFile(bytes: Uint8Array):
  { success: true; data: ThemeConfig } |
  { success: false; error: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(utf8.decode(bytes));
  } catch (err) {
    return {
      success: false,
      error: `Theme file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
  return validateThemeDoc(parsed);
}
