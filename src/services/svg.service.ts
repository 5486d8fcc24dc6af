import sharp from 'sharp';
import { Rgba } from '../models/icon.types';
import { ColorService } from './color.service';
import { RgbaBitmap } from './compositor.service';
import { BuiltinSymbolResolver, SymbolResolver } from './symbol.service';

/**
 * Where a layer's vector artwork comes from: raw SVG markup, or a symbol
 * (emoji) looked up through a `SymbolResolver` at render time.
 */
export type SvgSource =
  | { kind: 'markup'; svg: string }
  | { kind: 'symbol'; symbol: string };

export function svgMarkup(svg: string): SvgSource {
  return { kind: 'markup', svg };
}

export function svgSymbol(symbol: string): SvgSource {
  return { kind: 'symbol', symbol };
}

/**
 * Symbol source, or `undefined` when the resolver does not know the symbol
 */
export async function supportedSymbol(
  symbol: string,
  resolver: SymbolResolver
): Promise<SvgSource | undefined> {
  const markup = await resolver.resolve(symbol);
  return markup === undefined ? undefined : svgSymbol(symbol);
}

export function sameSource(a: SvgSource, b: SvgSource): boolean {
  if (a.kind === 'markup' && b.kind === 'markup') return a.svg === b.svg;
  if (a.kind === 'symbol' && b.kind === 'symbol') return a.symbol === b.symbol;
  return false;
}

// librsvg renders one user unit per pixel at 72 DPI
const BASE_DENSITY = 72;
const MIN_DENSITY = 1;
const MAX_DENSITY = 100000;

const PRESERVED_PAINT = new Set(['none', 'transparent']);

const colorService = new ColorService();

/**
 * Replace every double-quoted `name="..."` value with `value`, keeping
 * `none` and `transparent`. Textual, single pass; `style` is not touched.
 */
function replaceAttribute(svg: string, name: string, value: string): string {
  const pattern = `${name}="`;
  let result = '';
  let remaining = svg;

  let start = remaining.indexOf(pattern);
  while (start !== -1) {
    result += remaining.slice(0, start + pattern.length);
    remaining = remaining.slice(start + pattern.length);

    const end = remaining.indexOf('"');
    if (end === -1) break;

    const current = remaining.slice(0, end);
    result += PRESERVED_PAINT.has(current) ? current : value;
    remaining = remaining.slice(end);
    start = remaining.indexOf(pattern);
  }

  return result + remaining;
}

export class SvgService {
  constructor(private readonly symbols: SymbolResolver = new BuiltinSymbolResolver()) {}

  /**
   * Markup for a source, or `undefined` for an unknown symbol
   */
  async resolve(source: SvgSource): Promise<string | undefined> {
    if (source.kind === 'markup') return source.svg;
    return this.symbols.resolve(source.symbol);
  }

  /**
   * Recolor every `fill` and `stroke` attribute of monochrome markup
   */
  replaceColors(svg: string, color: Rgba): string {
    const hex = colorService.toHex(color);
    return replaceAttribute(replaceAttribute(svg, 'fill', hex), 'stroke', hex);
  }

  /**
   * Rasterize markup so its larger intrinsic dimension is exactly `size`
   * pixels, keeping the aspect ratio. `undefined` when the markup cannot be
   * parsed or `size` is not positive.
   */
  async render(svg: string, size: number): Promise<RgbaBitmap | undefined> {
    if (size <= 0) return undefined;

    const input = Buffer.from(svg);

    try {
      const metadata = await sharp(input).metadata();
      const intrinsicWidth = metadata.width ?? 0;
      const intrinsicHeight = metadata.height ?? 0;
      if (intrinsicWidth <= 0 || intrinsicHeight <= 0) return undefined;

      const scale = size / Math.max(intrinsicWidth, intrinsicHeight);
      // Tolerance keeps float noise (8.000000001) from adding a pixel row
      const width = Math.max(1, Math.ceil(intrinsicWidth * scale - 1e-6));
      const height = Math.max(1, Math.ceil(intrinsicHeight * scale - 1e-6));
      const density = Math.min(MAX_DENSITY, Math.max(MIN_DENSITY, BASE_DENSITY * scale));

      const rendered = await sharp(input, { density })
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });

      const data = await this.fitCanvas(rendered.data, rendered.info.width, rendered.info.height, width, height);
      return { data: this.clearTransparent(data), width, height };
    } catch (error) {
      console.warn(`[Svg] Could not rasterize markup: ${error instanceof Error ? error.message : error}`);
      return undefined;
    }
  }

  /**
   * Resolve and rasterize a source, recoloring it first when `fill` is given
   */
  async renderSource(source: SvgSource, size: number, fill?: Rgba): Promise<RgbaBitmap | undefined> {
    let svg: string | undefined;
    try {
      svg = await this.resolve(source);
    } catch (error) {
      console.warn(`[Svg] Symbol lookup failed: ${error instanceof Error ? error.message : error}`);
      return undefined;
    }

    if (svg === undefined) {
      if (source.kind === 'symbol') {
        console.warn(`[Svg] Unsupported symbol "${source.symbol}"`);
      }
      return undefined;
    }

    return this.render(fill ? this.replaceColors(svg, fill) : svg, size);
  }

  /**
   * Crop or pad with transparent pixels to exactly `width`x`height`. The
   * artwork is never resampled.
   */
  private async fitCanvas(
    data: Buffer,
    currentWidth: number,
    currentHeight: number,
    width: number,
    height: number
  ): Promise<Buffer> {
    let result = data;
    let w = currentWidth;
    let h = currentHeight;

    if (w > width || h > height) {
      const cropped = { left: 0, top: 0, width: Math.min(w, width), height: Math.min(h, height) };
      result = await sharp(result, { raw: { width: w, height: h, channels: 4 } })
        .extract(cropped)
        .raw()
        .toBuffer();
      w = cropped.width;
      h = cropped.height;
    }

    if (w < width || h < height) {
      result = await sharp(result, { raw: { width: w, height: h, channels: 4 } })
        .extend({ right: width - w, bottom: height - h, background: { r: 0, g: 0, b: 0, alpha: 0 } })
        .raw()
        .toBuffer();
    }

    return result;
  }

  /**
   * Fully transparent pixels become (0, 0, 0, 0) whatever color they carried
   */
  private clearTransparent(data: Buffer): Buffer {
    for (let i = 0; i < data.length; i += 4) {
      if (data[i + 3] === 0) {
        data[i] = 0;
        data[i + 1] = 0;
        data[i + 2] = 0;
      }
    }
    return data;
  }
}
