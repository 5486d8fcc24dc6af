import { OverlayPosition, RectPx } from '../../models/icon.types';
import { CompositorService } from '../../services/compositor.service';
import { SvgService, SvgSource, sameSource } from '../../services/svg.service';
import { DependencyVersion, LayerEffect } from '../layer';
import { clampScale } from './decal.effect';

/**
 * Full-color SVG (or symbol) drawn on top of everything else, at a corner
 * or the center of the content bounds.
 */
export interface OverlayConfig {
  readonly source: SvgSource;
  readonly position: OverlayPosition;
  /** Fraction of the smaller content-bounds dimension, [0, 1] */
  readonly scale: number;
}

const SCALE_EPSILON = 0.0001;

export function overlay(source: SvgSource, position: OverlayPosition, scale: number): OverlayConfig {
  return { source, position, scale: clampScale(scale) };
}

/**
 * Top-left corner of an overlay of the given size
 */
export function overlayOrigin(
  bounds: RectPx,
  position: OverlayPosition,
  width: number,
  height: number
): { x: number; y: number } {
  const right = bounds.x + bounds.width - width;
  const bottom = bounds.y + bounds.height - height;

  switch (position) {
    case 'top-left':
      return { x: bounds.x, y: bounds.y };
    case 'top-right':
      return { x: right, y: bounds.y };
    case 'bottom-left':
      return { x: bounds.x, y: bottom };
    case 'bottom-right':
      return { x: right, y: bottom };
    case 'center':
      return {
        x: bounds.x + Math.trunc((bounds.width - width) / 2),
        y: bounds.y + Math.trunc((bounds.height - height) / 2),
      };
  }
}

export function createOverlayEffect(
  svg: SvgService,
  compositor: CompositorService = new CompositorService()
): LayerEffect<OverlayConfig> {
  return {
    name: 'overlay',

    differs(current, next) {
      return (
        !sameSource(current.source, next.source) ||
        current.position !== next.position ||
        Math.abs(current.scale - next.scale) > SCALE_EPSILON
      );
    },

    // Reads no property, but its cached pixels contain every layer below
    dependencies(versions) {
      return DependencyVersion.of(versions.hue, versions.decal);
    },

    async transform(config, ctx) {
      const bounds = ctx.image.contentBounds;
      const size = Math.floor(Math.min(bounds.width, bounds.height) * config.scale);
      if (size === 0) return;

      const bitmap = await svg.renderSource(config.source, size);
      if (!bitmap) return;

      const { x, y } = overlayOrigin(bounds, config.position, bitmap.width, bitmap.height);
      ctx.image = compositor.compositeOver(ctx.image, bitmap, x, y);
    },
  };
}
