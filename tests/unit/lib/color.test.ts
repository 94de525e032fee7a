import { describe, it, expect } from 'vitest';
import {
  BLACK,
  WHITE,
  contrastingColor,
  hexToRgba,
  normalizeHexColor,
  parseColor,
  parseColorOr,
  rgbToCss,
  withAlpha,
} from '@/lib/color';

describe('color parsing', () => {
  it('normalizes hex shorthand', () => {
    expect(normalizeHexColor('#ABC')).toBe('#aabbcc');
    expect(normalizeHexColor('#abcd')).toBe('#aabbccdd');
    expect(normalizeHexColor(' #A1B2C3 ')).toBe('#a1b2c3');
    expect(normalizeHexColor('#abcde')).toBeNull();
    expect(normalizeHexColor('abc')).toBeNull();
  });

  it('decodes alpha from 8-digit hex', () => {
    expect(hexToRgba('#ff000080')).toEqual({ r: 255, g: 0, b: 0, alpha: 128 / 255 });
  });

  it('decodes rgb() and rgba()', () => {
    expect(parseColor('rgb(1, 2, 3)')).toEqual({ r: 1, g: 2, b: 3, alpha: 1 });
    expect(parseColor('rgba(0,0,0,0.5)')).toEqual({ r: 0, g: 0, b: 0, alpha: 0.5 });
  });

  it('rejects out-of-range and unknown syntax', () => {
    expect(parseColor('rgb(256, 0, 0)')).toBeNull();
    expect(parseColor('rgba(0, 0, 0, 1.5)')).toBeNull();
    expect(parseColor('red')).toBeNull();
    expect(parseColor('')).toBeNull();
    expect(parseColor(undefined)).toBeNull();
  });

  it('substitutes the fallback for malformed input', () => {
    expect(parseColorOr('#zzz', WHITE)).toBe(WHITE);
    expect(parseColorOr('#fff', BLACK)).toEqual({ r: 255, g: 255, b: 255, alpha: 1 });
  });
});

describe('color helpers', () => {
  it('picks black on light colors and white on dark ones', () => {
    expect(contrastingColor({ r: 255, g: 255, b: 255 })).toBe(BLACK);
    expect(contrastingColor({ r: 0, g: 153, b: 255 })).toBe(BLACK);
    expect(contrastingColor({ r: 26, g: 26, b: 46 })).toBe(WHITE);
  });

  it('formats CSS and clamps alpha', () => {
    expect(rgbToCss({ r: 1, g: 2, b: 3 })).toBe('rgb(1, 2, 3)');
    expect(withAlpha(BLACK, 1.7).alpha).toBe(1);
    expect(withAlpha(BLACK, -1).alpha).toBe(0);
  });
});
