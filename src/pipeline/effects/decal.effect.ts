import { Rgba } from '../../models/icon.types';
import { ColorService } from '../../services/color.service';
import { CompositorService } from '../../services/compositor.service';
import { SvgService, SvgSource, sameSource } from '../../services/svg.service';
import { DependencyVersion, LayerEffect } from '../layer';
import { RenderContext } from '../render-context';

/**
 * A monochrome SVG imprinted at the center of the content bounds.
 *
 * Every fill and stroke is replaced with the icon's dominant color,
 * darkened. The dominant color comes from hue rotation when that layer
 * published one, otherwise it is sampled from the current image. For
 * full-color artwork use the overlay layer.
 */
export interface DecalConfig {
  readonly source: SvgSource;
  /** Fraction of the smaller content-bounds dimension, [0, 1] */
  readonly scale: number;
}

export const DECAL_DARKEN_AMOUNT = 0.15;

const SCALE_EPSILON = 0.0001;

export function clampScale(scale: number): number {
  return Math.min(1, Math.max(0, scale));
}

export function decal(source: SvgSource, scale: number): DecalConfig {
  return { source, scale: clampScale(scale) };
}

/**
 * Color the decal will be painted with for the current render pass
 */
export function resolveDecalColor(ctx: RenderContext, colors: ColorService = new ColorService()): Rgba {
  const dominant = ctx.get('dominantColor') ?? colors.sampleDominantColor(ctx.image);
  return colors.darken(dominant, DECAL_DARKEN_AMOUNT);
}

export function createDecalEffect(
  svg: SvgService,
  colors: ColorService = new ColorService(),
  compositor: CompositorService = new CompositorService()
): LayerEffect<DecalConfig> {
  return {
    name: 'decal',

    differs(current, next) {
      return !sameSource(current.source, next.source) || Math.abs(current.scale - next.scale) > SCALE_EPSILON;
    },

    // Consumes the dominant color hue rotation emits
    dependencies(versions) {
      return DependencyVersion.of(versions.hue);
    },

    async transform(config, ctx) {
      const color = resolveDecalColor(ctx, colors);

      const bounds = ctx.image.contentBounds;
      const size = Math.floor(Math.min(bounds.width, bounds.height) * config.scale);
      if (size === 0) return;

      const bitmap = await svg.renderSource(config.source, size, color);
      if (!bitmap) return;

      const x = bounds.x + Math.trunc((bounds.width - bitmap.width) / 2);
      const y = bounds.y + Math.trunc((bounds.height - bitmap.height) / 2);
      ctx.image = compositor.compositeOver(ctx.image, bitmap, x, y);
    },
  };
}
