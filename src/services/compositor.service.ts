import { IconImage } from '../models/icon-image';

/**
 * A straight-alpha RGBA bitmap not yet placed on an icon
 */
export interface RgbaBitmap {
  data: Buffer;
  width: number;
  height: number;
}

export class CompositorService {
  /**
   * Draw `src` over `dest` with its top-left corner at (x, y).
   * Source pixels that land outside `dest` are clipped. Returns a new image.
   */
  compositeOver(dest: IconImage, src: RgbaBitmap, x: number, y: number): IconImage {
    const out = Buffer.from(dest.data);

    for (let sy = 0; sy < src.height; sy++) {
      const dy = y + sy;
      if (dy < 0 || dy >= dest.height) continue;

      for (let sx = 0; sx < src.width; sx++) {
        const dx = x + sx;
        if (dx < 0 || dx >= dest.width) continue;

        const si = (sy * src.width + sx) * 4;
        const di = (dy * dest.width + dx) * 4;
        this.blendInto(out, di, src.data, si);
      }
    }

    return dest.withData(out);
  }

  /**
   * Source-over blend of one pixel, in normalized channel space:
   * out_a = sa + da(1 - sa), out_c = (s*sa + d*da*(1 - sa)) / out_a
   */
  blend(
    src: [number, number, number, number],
    dst: [number, number, number, number]
  ): [number, number, number, number] {
    const out = Buffer.from(dst);
    this.blendInto(out, 0, Buffer.from(src), 0);
    return [out[0], out[1], out[2], out[3]];
  }

  private blendInto(dest: Buffer, di: number, src: Buffer, si: number): void {
    const sa = src[si + 3] / 255;
    const da = dest[di + 3] / 255;
    const outA = sa + da * (1 - sa);

    if (outA === 0) {
      dest[di] = 0;
      dest[di + 1] = 0;
      dest[di + 2] = 0;
      dest[di + 3] = 0;
      return;
    }

    for (let c = 0; c < 3; c++) {
      const s = src[si + c] / 255;
      const d = dest[di + c] / 255;
      dest[di + c] = Math.round(((s * sa + d * da * (1 - sa)) / outA) * 255);
    }
    dest[di + 3] = Math.round(outA * 255);
  }
}
