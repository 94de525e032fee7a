/**
 * Preview renderer for theme files.
 *
 * Composes a fixed-size JPEG from a validated ThemeConfig:
 *   1. solid fill with the primary background color
 *   2. optional background image (cover-scaled, center-cropped, blurred, dimmed)
 *   3. rounded translucent control bar near the bottom edge
 *   4. one outlined swatch per palette color inside the bar
 *
 * Output is a pure function of the config and the renderer options, except
 * for remote background images, which are only as stable as their host.
 * Bad colors and unusable background images degrade; only a failure to
 * compose or encode raises RenderError.
 */

import sharp from 'sharp';
import type { ThemeConfig } from '../../lib/schema/theme';
import { BLACK, contrastingColor, parseColorOr, rgbToCss, withAlpha, type Rgba } from '../../lib/color';
import { RenderError } from '../errors';

// =============================================================================
// Configuration
// =============================================================================

export type ImageFetcher = (url: string, signal: AbortSignal) => Promise<Uint8Array>;

export interface RendererOptions {
  width: number;
  height: number;
  /** JPEG quality, 1-100 */
  quality: number;
  fetchTimeoutMs: number;
  /** Control bar opacity in [0, 1], multiplied with the container color's own alpha */
  barOpacity: number;
  /** Corner radius when the theme has no usable borderRadius */
  fallbackBarRadius?: number;
  /** Canvas color when bgColor1 is malformed */
  fallbackColor?: Rgba;
  fetchImage?: ImageFetcher;
}

export interface Renderer {
  readonly mimeType: string;
  render(theme: ThemeConfig): Promise<Buffer>;
}

/** Palette defaults for keys a theme file leaves out or gets wrong. */
export const DEFAULT_PALETTE = {
  bgColor1: '#000000',
  bgColor2: '#000000',
  containerBgColor: 'rgba(0,0,0,0.5)',
  textColor: '#ffffff',
  linkColor: '#0099ff',
} as const;

export const SWATCH_KEYS = ['bgColor1', 'bgColor2', 'containerBgColor', 'textColor', 'linkColor'] as const;

const MAX_REMOTE_IMAGE_BYTES = 20 * 1024 * 1024;
const DATA_URI = /^data:image\/[a-z0-9.+-]+;base64,(.+)$/is;

// =============================================================================
// Image resolution
// =============================================================================

export const fetchImageBytes: ImageFetcher = async (url, signal) => {
  const response = await fetch(url, { signal });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} fetching background image`);
  }
  const declared = Number(response.headers.get('content-length') || 0);
  if (declared > MAX_REMOTE_IMAGE_BYTES) {
    throw new Error(`Background image too large (${declared} bytes)`);
  }
  const bytes = new Uint8Array(await response.arrayBuffer());
  if (bytes.byteLength > MAX_REMOTE_IMAGE_BYTES) {
    throw new Error(`Background image too large (${bytes.byteLength} bytes)`);
  }
  return bytes;
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// =============================================================================
// SVG overlay
// =============================================================================

interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

function svgRect(box: Box, fill: Rgba, extra: string = ''): string {
  return `<rect x="${box.x}" y="${box.y}" width="${box.width}" height="${box.height}" ` +
    `fill="${rgbToCss(fill)}" fill-opacity="${fill.alpha.toFixed(3)}"${extra}/>`;
}

export function controlBarBox(width: number, height: number): Box {
  const margin = Math.round(Math.min(width, height) * 0.06);
  const barHeight = Math.max(24, Math.round(height * 0.16));
  return {
    x: margin,
    y: height - margin - barHeight,
    width: width - margin * 2,
    height: barHeight,
  };
}

/** Equal-width swatch boxes laid out left to right inside the bar. */
export function swatchBoxes(bar: Box, count: number): Box[] {
  const padding = Math.round(bar.height * 0.2);
  const gap = Math.max(2, Math.round(padding / 2));
  const swatchWidth = Math.floor((bar.width - padding * 2 - gap * (count - 1)) / count);
  const swatchHeight = bar.height - padding * 2;

  return Array.from({ length: count }, (_, i) => ({
    x: bar.x + padding + i * (swatchWidth + gap),
    y: bar.y + padding,
    width: swatchWidth,
    height: swatchHeight,
  }));
}

// =============================================================================
// Renderer
// =============================================================================

export class PreviewRenderer implements Renderer {
  readonly mimeType = 'image/jpeg';

  private readonly fetchImage: ImageFetcher;
  private readonly fallbackColor: Rgba;
  private readonly fallbackBarRadius: number;

  constructor(private readonly options: RendererOptions) {
    this.fetchImage = options.fetchImage ?? fetchImageBytes;
    this.fallbackColor = options.fallbackColor ?? BLACK;
    this.fallbackBarRadius = options.fallbackBarRadius ?? 8;
  }

  async render(theme: ThemeConfig): Promise<Buffer> {
    const { width, height, quality } = this.options;
    const fill = parseColorOr(theme.bgColor1, this.fallbackColor);

    const layers: sharp.OverlayOptions[] = [];

    const background = theme.bgImage.trim()
      ? await this.loadBackground(theme)
      : null;
    if (background) {
      layers.push({ input: background, top: 0, left: 0 });
    }
    layers.push({ input: Buffer.from(this.buildOverlaySvg(theme)), top: 0, left: 0 });

    try {
      return await sharp({
        create: {
          width,
          height,
          channels: 3,
          background: { r: fill.r, g: fill.g, b: fill.b },
        },
      })
        .composite(layers)
        .jpeg({ quality })
        .toBuffer();
    } catch (err) {
      throw new RenderError('Failed to compose preview image', { cause: err });
    }
  }

  /**
   * Resolve, scale and filter the background image. Any failure is logged and
   * reported as "no image" so the preview still renders.
   */
  private async loadBackground(theme: ThemeConfig): Promise<Buffer | null> {
    const { width, height } = this.options;
    try {
      const bytes = await this.resolveImage(theme.bgImage.trim());

      // cover = scale by max(cw/iw, ch/ih), then center crop to the canvas
      let image = sharp(bytes).resize(width, height, { fit: 'cover', position: 'centre' });

      const blur = theme.bgBlur ?? 0;
      if (blur > 0) {
        image = image.blur(clamp(blur, 0.3, 1000));
      }

      const brightness = clamp((theme.bgBrightness ?? 100) / 100, 0, 10);
      if (brightness !== 1) {
        image = image.modulate({ brightness });
      }

      return await image.png().toBuffer();
    } catch (err) {
      console.warn('[render] background image skipped:', err instanceof Error ? err.message : err);
      return null;
    }
  }

  private async resolveImage(ref: string): Promise<Uint8Array> {
    const inline = DATA_URI.exec(ref);
    if (inline) {
      return Buffer.from(inline[1], 'base64');
    }

    let url: URL;
    try {
      url = new URL(ref);
    } catch {
      throw new Error(`Unsupported background image reference: ${ref.slice(0, 80)}`);
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new Error(`Unsupported background image protocol: ${url.protocol}`);
    }

    return this.fetchImage(url.toString(), AbortSignal.timeout(this.options.fetchTimeoutMs));
  }

  private buildOverlaySvg(theme: ThemeConfig): string {
    const { width, height, barOpacity } = this.options;
    const bar = controlBarBox(width, height);

    const container = parseColorOr(theme.containerBgColor, parseColorOr(DEFAULT_PALETTE.containerBgColor, BLACK));
    const barFill = withAlpha(container, container.alpha * clamp(barOpacity, 0, 1));

    const requestedRadius = theme.borderRadius !== undefined && theme.borderRadius >= 0
      ? theme.borderRadius
      : this.fallbackBarRadius;
    const radius = Math.round(clamp(requestedRadius, 0, bar.height / 2));

    const swatches = swatchBoxes(bar, SWATCH_KEYS.length).map((box, i) => {
      const key = SWATCH_KEYS[i];
      const color = parseColorOr(theme[key], parseColorOr(DEFAULT_PALETTE[key], BLACK));
      const outline = contrastingColor(color);
      return svgRect(box, color, ` stroke="${rgbToCss(outline)}" stroke-width="2"`);
    });

    return [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">`,
      svgRect(bar, barFill, ` rx="${radius}" ry="${radius}"`),
      ...swatches,
      '</svg>',
    ].join('');
  }
}

export function createRenderer(options: RendererOptions): PreviewRenderer {
  return new PreviewRenderer(options);
}
