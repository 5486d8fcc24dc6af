import { IconImage } from '../../models/icon-image';
import { ColorService } from '../../services/color.service';
import { DependencyVersion, LayerEffect } from '../layer';

/**
 * Rotate the hue of every visible pixel.
 *
 * Emits `dominantColor`, sampled after rotation, for the decal layer.
 */
export interface HueRotationConfig {
  /** Degrees in [0, 360) */
  readonly degrees: number;
}

/** Angles closer than this render the same */
const DEGREES_EPSILON = 0.001;

export function hueRotation(degrees: number): HueRotationConfig {
  return { degrees: ((degrees % 360) + 360) % 360 };
}

export function rotateImageHue(
  image: IconImage,
  degrees: number,
  colors: ColorService = new ColorService()
): IconImage {
  const out = Buffer.from(image.data);

  for (let i = 0; i < out.length; i += 4) {
    const a = out[i + 3];
    if (a === 0) continue;

    const rotated = colors.rotateHue({ r: out[i], g: out[i + 1], b: out[i + 2], a }, degrees);
    out[i] = rotated.r;
    out[i + 1] = rotated.g;
    out[i + 2] = rotated.b;
  }

  return image.withData(out);
}

export function createHueRotationEffect(
  colors: ColorService = new ColorService()
): LayerEffect<HueRotationConfig> {
  return {
    name: 'hue',

    differs(current, next) {
      return Math.abs(current.degrees - next.degrees) > DEGREES_EPSILON;
    },

    // Root layer
    dependencies() {
      return DependencyVersion.NONE;
    },

    async transform(config, ctx) {
      ctx.image = rotateImageHue(ctx.image, config.degrees, colors);
    },

    emit(_config, ctx) {
      ctx.set('dominantColor', colors.sampleDominantColor(ctx.image));
    },
  };
}
