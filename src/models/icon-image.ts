import { RectPx, SizePx } from './icon.types';

const CHANNELS = 4;

/**
 * A single icon bitmap: RGBA pixels, display scale and content bounds.
 *
 * Treated as immutable once built. Layers that change pixels build a new
 * instance (see `withData`), so cached images can be shared safely.
 */
export class IconImage {
  constructor(
    readonly data: Buffer,
    readonly width: number,
    readonly height: number,
    readonly scale: number,
    readonly contentBounds: RectPx
  ) {
    if (data.length !== width * height * CHANNELS) {
      throw new RangeError(
        `Pixel buffer holds ${data.length} bytes, expected ${width * height * CHANNELS} for ${width}x${height} RGBA`
      );
    }
  }

  /**
   * Build an image whose content fills the whole bitmap
   */
  static fullContent(data: Buffer, width: number, height: number, scale: number = 1): IconImage {
    return new IconImage(data, width, height, scale, { x: 0, y: 0, width, height });
  }

  /**
   * Build an image filled with one color (handy for fixtures and placeholders)
   */
  static solid(
    width: number,
    height: number,
    color: [number, number, number, number],
    scale: number = 1
  ): IconImage {
    const data = Buffer.alloc(width * height * CHANNELS);
    for (let i = 0; i < data.length; i += CHANNELS) {
      data[i] = color[0];
      data[i + 1] = color[1];
      data[i + 2] = color[2];
      data[i + 3] = color[3];
    }
    return IconImage.fullContent(data, width, height, scale);
  }

  dimensions(): SizePx {
    return { width: this.width, height: this.height };
  }

  /**
   * Size the icon appears as, independent of resolution variant.
   * A 64x64 @2x icon has a logical size of 32x32.
   */
  logicalSize(): SizePx {
    return { width: this.width / this.scale, height: this.height / this.scale };
  }

  /** Byte offset of pixel (x, y) */
  offset(x: number, y: number): number {
    return (y * this.width + x) * CHANNELS;
  }

  pixel(x: number, y: number): [number, number, number, number] {
    const i = this.offset(x, y);
    return [this.data[i], this.data[i + 1], this.data[i + 2], this.data[i + 3]];
  }

  /**
   * Same geometry, new pixels
   */
  withData(data: Buffer): IconImage {
    return new IconImage(data, this.width, this.height, this.scale, this.contentBounds);
  }
}

/**
 * One icon at several sizes and scales (e.g. 16@1x, 16@2x, 32@1x).
 */
export class IconSet implements Iterable<IconImage> {
  private readonly images: IconImage[];

  constructor(images: IconImage[] = []) {
    this.images = [...images];
  }

  add(image: IconImage): void {
    this.images.push(image);
  }

  get size(): number {
    return this.images.length;
  }

  isEmpty(): boolean {
    return this.images.length === 0;
  }

  toArray(): IconImage[] {
    return [...this.images];
  }

  [Symbol.iterator](): Iterator<IconImage> {
    return this.images[Symbol.iterator]();
  }

  /**
   * Closest match on logical width. Ties go to the image added first.
   */
  findByLogicalSize(target: number): IconImage | undefined {
    let best: IconImage | undefined;
    let bestDistance = Infinity;

    for (const image of this.images) {
      const distance = Math.abs(image.logicalSize().width - target);
      if (best === undefined || distance < bestDistance) {
        best = image;
        bestDistance = distance;
      }
    }

    return best;
  }
}
