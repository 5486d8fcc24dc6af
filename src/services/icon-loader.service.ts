import sharp from 'sharp';
import { IconImage } from '../models/icon-image';
import { RectPx } from '../models/icon.types';

export interface DecodeOptions {
  /** Display scale; defaults to the file's density / 72, else 1 */
  scale?: number;
  /** Shrink content bounds to the non-transparent pixels */
  trim?: boolean;
}

const BASE_DENSITY = 72;

interface RawIcon {
  data: Buffer;
  width: number;
  height: number;
  density?: number;
}

/**
 * The uploaded bytes are not an image sharp can read
 */
export class IconDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IconDecodeError';
  }
}

export class IconLoaderService {
  /**
   * Decode any image sharp reads (PNG, WebP, SVG, ...) into an RGBA icon
   */
  async decode(buffer: Buffer, options: DecodeOptions = {}): Promise<IconImage> {
    const { data, width, height, density } = await this.readRaw(buffer);

    const scale = options.scale ?? this.scaleFromDensity(density);
    const bounds = options.trim
      ? this.findContentBounds(data, width, height)
      : { x: 0, y: 0, width, height };

    return new IconImage(data, width, height, scale, bounds);
  }

  private async readRaw(buffer: Buffer): Promise<RawIcon> {
    try {
      const image = sharp(buffer);
      const metadata = await image.metadata();
      const { data, info } = await image
        .toColourspace('srgb')
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });
      return { data, width: info.width, height: info.height, density: metadata.density };
    } catch (error) {
      throw new IconDecodeError(`Could not decode icon: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Files store density in pixels per meter, so 144 DPI reads back as
   * 143.99: round to two decimals.
   */
  private scaleFromDensity(density: number | undefined): number {
    if (!density) return 1;
    return Math.round((density / BASE_DENSITY) * 100) / 100;
  }

  /**
   * PNG with the display scale recorded as density
   */
  async encodePng(image: IconImage): Promise<Buffer> {
    return sharp(image.data, {
      raw: { width: image.width, height: image.height, channels: 4 },
    })
      .withMetadata({ density: BASE_DENSITY * image.scale })
      .png()
      .toBuffer();
  }

  /**
   * Bounding box of pixels with non-zero alpha. A fully transparent image
   * keeps its full bounds.
   */
  findContentBounds(data: Buffer, width: number, height: number): RectPx {
    let minX = width;
    let minY = height;
    let maxX = -1;
    let maxY = -1;

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        if (data[(y * width + x) * 4 + 3] === 0) continue;
        if (x < minX) minX = x;
        if (x > maxX) maxX = x;
        if (y < minY) minY = y;
        if (y > maxY) maxY = y;
      }
    }

    if (maxX < 0) {
      return { x: 0, y: 0, width, height };
    }

    return { x: minX, y: minY, width: maxX - minX + 1, height: maxY - minY + 1 };
  }
}
