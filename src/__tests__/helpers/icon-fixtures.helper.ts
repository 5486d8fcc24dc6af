/**
 * Icon fixtures and an in-process SVG stand-in for pipeline tests
 */
import { IconImage, IconSet } from '../../models/icon-image';
import { Rgba } from '../../models/icon.types';
import { RgbaBitmap } from '../../services/compositor.service';
import { SvgService, SvgSource } from '../../services/svg.service';

export const RED: [number, number, number, number] = [255, 0, 0, 255];
export const GREEN: [number, number, number, number] = [0, 255, 0, 255];

export const SQUARE_SVG =
  '<svg xmlns="http://www.w3.org/2000/svg" width="10" height="10"><rect width="10" height="10" fill="#000000"/></svg>';

export function solidBitmap(width: number, height: number, color: Rgba): RgbaBitmap {
  const data = Buffer.alloc(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = color.r;
    data[i + 1] = color.g;
    data[i + 2] = color.b;
    data[i + 3] = color.a;
  }
  return { data, width, height };
}

/**
 * 16x16 red and 32x32 green, both @1x
 */
export function createTestIconSet(): IconSet {
  return new IconSet([IconImage.solid(16, 16, RED), IconImage.solid(32, 32, GREEN)]);
}

export interface RenderSourceCall {
  source: SvgSource;
  size: number;
  fill?: Rgba;
}

/**
 * Renders every source as a solid square: the recolor fill when given,
 * otherwise opaque blue. Sources whose markup is "broken" render nothing.
 */
export class StubSvgService extends SvgService {
  readonly calls: RenderSourceCall[] = [];

  async renderSource(source: SvgSource, size: number, fill?: Rgba): Promise<RgbaBitmap | undefined> {
    this.calls.push({ source, size, fill });
    if (source.kind === 'markup' && source.svg === 'broken') return undefined;
    return solidBitmap(size, size, fill ?? { r: 0, g: 0, b: 255, a: 255 });
  }
}
