/**
 * Icon geometry and color types
 */

/**
 * A rectangle in pixel coordinates. Used for content bounds: the region of
 * an icon that holds artwork, excluding built-in padding.
 */
export interface RectPx {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface SizePx {
  width: number;
  height: number;
}

/** 8-bit straight-alpha color */
export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

export const OVERLAY_POSITIONS = [
  'top-left',
  'top-right',
  'bottom-left',
  'bottom-right',
  'center',
] as const;

export type OverlayPosition = (typeof OVERLAY_POSITIONS)[number];

export function rectRight(rect: RectPx): number {
  return rect.x + rect.width;
}

export function rectBottom(rect: RectPx): number {
  return rect.y + rect.height;
}
