import { IconImage } from '../models/icon-image';
import { SvgService } from '../services/svg.service';
import { DecalConfig, createDecalEffect } from './effects/decal.effect';
import { HueRotationConfig, createHueRotationEffect } from './effects/hue-rotation.effect';
import { OverlayConfig, createOverlayEffect } from './effects/overlay.effect';
import { CompositeLayer, DependencyVersion, Layer, LayerVersions, cacheKeyFor } from './layer';
import { RenderContext } from './render-context';

/**
 * The fixed layer stack and its caches.
 *
 * ```text
 * base image
 *   -> hue       (root)
 *   -> decal     (depends on hue: consumes its dominant color)
 *   -> overlay   (drawn last, on top)
 *   -> composite (depends on all three)
 * ```
 *
 * Configure layers directly (`pipeline.hue.setConfig(...)`); versions and
 * caches take care of invalidation.
 */
export class LayerPipeline {
  readonly hue: Layer<HueRotationConfig>;
  readonly decal: Layer<DecalConfig>;
  readonly overlay: Layer<OverlayConfig>;
  readonly composite = new CompositeLayer();

  constructor(svg: SvgService = new SvgService()) {
    this.hue = new Layer(createHueRotationEffect());
    this.decal = new Layer(createDecalEffect(svg));
    this.overlay = new Layer(createOverlayEffect(svg));
  }

  layerVersions(): LayerVersions {
    return {
      hue: this.hue.version(),
      decal: this.decal.version(),
      overlay: this.overlay.version(),
    };
  }

  compositeDependencies(): DependencyVersion {
    return DependencyVersion.of(this.hue.version(), this.decal.version(), this.overlay.version());
  }

  /**
   * Drop every cache, layer and composite alike
   */
  invalidateAll(): void {
    this.hue.invalidate();
    this.decal.invalidate();
    this.overlay.invalidate();
    this.composite.invalidate();
  }

  /**
   * Render one base image through every layer.
   *
   * A composite cache hit skips all layer work. Otherwise each layer runs in
   * order (hue, decal, overlay) and decides for itself between pass-through,
   * cache hit and recompute.
   */
  async render(base: IconImage): Promise<IconImage> {
    const key = cacheKeyFor(base);
    const deps = this.compositeDependencies();

    const cached = this.composite.getCached(key, deps);
    if (cached) return cached;

    const ctx = new RenderContext(base);
    const versions = this.layerVersions();

    await this.hue.apply(ctx, key, versions);
    await this.decal.apply(ctx, key, versions);
    await this.overlay.apply(ctx, key, versions);

    // A layer changed mid-render: the result is already stale
    if (this.compositeDependencies().equals(deps)) {
      this.composite.store(key, ctx.image, deps);
    }

    return ctx.image;
  }
}
