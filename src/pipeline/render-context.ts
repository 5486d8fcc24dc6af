import { IconImage } from '../models/icon-image';
import { Rgba } from '../models/icon.types';

/**
 * Alpha-weighted average color of an icon's content bounds.
 * Published by hue rotation, consumed by the decal.
 */
export type DominantColor = Rgba;

/**
 * Every value a layer may publish for the layers after it. Adding a kind
 * means adding a slot here.
 */
export interface RenderProperties {
  dominantColor: DominantColor;
}

export type PropertyKind = keyof RenderProperties;

/**
 * Scratch space for one render pass: the image being processed plus the
 * values upstream layers published. Never cached; discarded when the pass
 * ends.
 */
export class RenderContext {
  private readonly properties: Partial<RenderProperties> = {};

  constructor(public image: IconImage) {}

  /**
   * Publish a value, replacing any earlier value of the same kind
   */
  set<K extends PropertyKind>(kind: K, value: RenderProperties[K]): void {
    this.properties[kind] = value;
  }

  get<K extends PropertyKind>(kind: K): RenderProperties[K] | undefined {
    return this.properties[kind];
  }

  has(kind: PropertyKind): boolean {
    return this.properties[kind] !== undefined;
  }
}
