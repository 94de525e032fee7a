export type Rgb = { r: number; g: number; b: number };
export type Rgba = Rgb & { alpha: number };

export const BLACK: Rgba = { r: 0, g: 0, b: 0, alpha: 1 };
export const WHITE: Rgba = { r: 255, g: 255, b: 255, alpha: 1 };

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Expand #rgb / #rgba shorthand and lowercase; null for anything else. */
export function normalizeHexColor(input: string): string | null {
  const value = input.trim().toLowerCase();

  if (/^#[0-9a-f]{6}([0-9a-f]{2})?$/.test(value)) return value;

  if (/^#[0-9a-f]{3,4}$/.test(value)) {
    return '#' + value.slice(1).split('').map(c => c + c).join('');
  }

  return null;
}

export function hexToRgba(hex: string): Rgba | null {
  const normalized = normalizeHexColor(hex);
  if (!normalized) return null;

  const channel = (offset: number) => Number.parseInt(normalized.slice(offset, offset + 2), 16);
  const alpha = normalized.length === 9 ? channel(7) / 255 : 1;

  return { r: channel(1), g: channel(3), b: channel(5), alpha };
}

const RGB_FUNCTION = /^rgba?\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*(?:,\s*(\d*\.?\d+)\s*)?\)$/i;

/** rgb(r, g, b) or rgba(r, g, b, a) with 0-255 channels and 0-1 alpha. */
export function rgbFunctionToRgba(input: string): Rgba | null {
  const match = RGB_FUNCTION.exec(input.trim());
  if (!match) return null;

  const [r, g, b] = [match[1], match[2], match[3]].map(Number);
  if ([r, g, b].some(n => n > 255)) return null;

  const alpha = match[4] === undefined ? 1 : Number(match[4]);
  if (Number.isNaN(alpha) || alpha > 1) return null;

  return { r, g, b, alpha };
}

export function parseColor(input: string | undefined): Rgba | null {
  if (!input) return null;
  return input.trim().startsWith('#') ? hexToRgba(input) : rgbFunctionToRgba(input);
}

/** Decode a theme color, substituting the fallback for anything malformed. */
export function parseColorOr(input: string | undefined, fallback: Rgba): Rgba {
  return parseColor(input) ?? fallback;
}

/** WCAG relative luminance, 0 (black) to 1 (white). */
export function relativeLuminance(rgb: Rgb): number {
  const linear = (channel: number) => {
    const c = channel / 255;
    return c <= 0.03928 ? c / 12.92 : Math.pow((c + 0.055) / 1.055, 2.4);
  };
  return 0.2126 * linear(rgb.r) + 0.7152 * linear(rgb.g) + 0.0722 * linear(rgb.b);
}

/** Black on light colors, white on dark ones. */
export function contrastingColor(rgb: Rgb): Rgba {
  return relativeLuminance(rgb) > 0.179 ? BLACK : WHITE;
}

export function rgbToCss(rgb: Rgb): string {
  return `rgb(${rgb.r}, ${rgb.g}, ${rgb.b})`;
}

export function withAlpha(color: Rgba, alpha: number): Rgba {
  return { ...color, alpha: clamp(alpha, 0, 1) };
}
