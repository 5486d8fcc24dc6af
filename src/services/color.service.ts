import { IconImage } from '../models/icon-image';
import { Rgba, rectBottom, rectRight } from '../models/icon.types';

export interface Hsl {
  h: number; // degrees [0, 360)
  s: number; // [0, 1]
  l: number; // [0, 1]
}

/** Returned when the sampled region has no visible pixel */
export const FALLBACK_COLOR: Rgba = { r: 128, g: 128, b: 128, a: 255 };

function hueToRgb(p: number, q: number, t: number): number {
  if (t < 0) t += 1;
  if (t > 1) t -= 1;
  if (t < 1 / 6) return p + (q - p) * 6 * t;
  if (t < 1 / 2) return q;
  if (t < 2 / 3) return p + (q - p) * (2 / 3 - t) * 6;
  return p;
}

function toByte(value: number): number {
  return Math.min(255, Math.max(0, Math.round(value * 255)));
}

export class ColorService {
  /**
   * RGB in [0, 1] to HSL
   */
  rgbToHsl(r: number, g: number, b: number): Hsl {
    const max = Math.max(r, g, b);
    const min = Math.min(r, g, b);
    const l = (max + min) / 2;
    let h = 0;
    let s = 0;

    if (max !== min) {
      const d = max - min;
      s = l > 0.5 ? d / (2 - max - min) : d / (max + min);

      if (max === r) {
        h = ((g - b) / d + (g < b ? 6 : 0)) / 6;
      } else if (max === g) {
        h = ((b - r) / d + 2) / 6;
      } else {
        h = ((r - g) / d + 4) / 6;
      }
    }

    return { h: h * 360, s, l };
  }

  /**
   * HSL to RGB in [0, 1]. Hue may be any angle.
   */
  hslToRgb({ h, s, l }: Hsl): { r: number; g: number; b: number } {
    if (s === 0) {
      return { r: l, g: l, b: l };
    }

    const q = l < 0.5 ? l * (1 + s) : l + s - l * s;
    const p = 2 * l - q;
    const hNorm = (((h % 360) + 360) % 360) / 360;

    return {
      r: hueToRgb(p, q, hNorm + 1 / 3),
      g: hueToRgb(p, q, hNorm),
      b: hueToRgb(p, q, hNorm - 1 / 3),
    };
  }

  /**
   * Shift the hue of an 8-bit color; alpha is untouched
   */
  rotateHue(color: Rgba, degrees: number): Rgba {
    const hsl = this.rgbToHsl(color.r / 255, color.g / 255, color.b / 255);
    const rotated = this.hslToRgb({ ...hsl, h: hsl.h + degrees });
    return { r: toByte(rotated.r), g: toByte(rotated.g), b: toByte(rotated.b), a: color.a };
  }

  /**
   * Lower HSL lightness by `amount` (floored at 0); alpha is untouched
   */
  darken(color: Rgba, amount: number): Rgba {
    const hsl = this.rgbToHsl(color.r / 255, color.g / 255, color.b / 255);
    const darker = this.hslToRgb({ ...hsl, l: Math.max(0, hsl.l - amount) });
    return { r: toByte(darker.r), g: toByte(darker.g), b: toByte(darker.b), a: color.a };
  }

  /**
   * Alpha-weighted average color over the content bounds (clipped to the
   * bitmap). The alpha of the result is the mean alpha of visible pixels.
   */
  sampleDominantColor(image: IconImage): Rgba {
    const bounds = image.contentBounds;
    const right = Math.min(rectRight(bounds), image.width);
    const bottom = Math.min(rectBottom(bounds), image.height);
    const data = image.data;

    let totalR = 0;
    let totalG = 0;
    let totalB = 0;
    let totalA = 0;
    let count = 0;

    for (let y = bounds.y; y < bottom; y++) {
      for (let x = bounds.x; x < right; x++) {
        const i = image.offset(x, y);
        const a = data[i + 3];
        if (a === 0) continue;

        totalR += data[i] * a;
        totalG += data[i + 1] * a;
        totalB += data[i + 2] * a;
        totalA += a;
        count++;
      }
    }

    if (count === 0 || totalA === 0) {
      return { ...FALLBACK_COLOR };
    }

    return {
      r: Math.floor(totalR / totalA),
      g: Math.floor(totalG / totalA),
      b: Math.floor(totalB / totalA),
      a: Math.floor(totalA / count),
    };
  }

  /**
   * `#rrggbb`, alpha dropped
   */
  toHex(color: Rgba): string {
    const hex = (v: number) => v.toString(16).padStart(2, '0');
    return `#${hex(color.r)}${hex(color.g)}${hex(color.b)}`;
  }
}
