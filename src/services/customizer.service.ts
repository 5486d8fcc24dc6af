import { IconImage, IconSet } from '../models/icon-image';
import { decal } from '../pipeline/effects/decal.effect';
import { hueRotation } from '../pipeline/effects/hue-rotation.effect';
import { overlay } from '../pipeline/effects/overlay.effect';
import { LayerPipeline } from '../pipeline/layer-pipeline';
import { CustomizationProfile, settingsFromSource, sourceFromSettings } from './profile.service';
import { SvgService } from './svg.service';

export type LayerName = 'hue' | 'decal' | 'overlay';

export const LAYER_NAMES: readonly LayerName[] = ['hue', 'decal', 'overlay'];

/**
 * The part of a layer that does not depend on its configuration type
 */
export interface LayerControls {
  readonly name: string;
  isEnabled(): boolean;
  setEnabled(enabled: boolean): boolean;
  hasConfig(): boolean;
  isActive(): boolean;
  version(): number;
}

/** Which layers an `applyProfile` call actually changed */
export type ProfileChanges = Record<LayerName, boolean>;

/**
 * Applies the layer pipeline to a base icon set.
 *
 * The base set is never modified. Configure layers through `pipeline`,
 * or in bulk with `applyProfile`.
 */
export class IconCustomizer {
  readonly pipeline: LayerPipeline;

  constructor(private readonly baseIcons: IconSet, svg: SvgService = new SvgService()) {
    this.pipeline = new LayerPipeline(svg);
  }

  get icons(): IconSet {
    return this.baseIcons;
  }

  layer(name: LayerName): LayerControls {
    switch (name) {
      case 'hue':
        return this.pipeline.hue;
      case 'decal':
        return this.pipeline.decal;
      case 'overlay':
        return this.pipeline.overlay;
    }
  }

  /**
   * Render the base image closest to `logicalSize`.
   * `undefined` when the base set is empty.
   */
  async render(logicalSize: number): Promise<IconImage | undefined> {
    const base = this.baseIcons.findByLogicalSize(logicalSize);
    if (!base) return undefined;
    return this.pipeline.render(base);
  }

  /**
   * Render every base image, in base-set order
   */
  async renderAll(): Promise<IconSet> {
    const rendered: IconImage[] = [];
    for (const base of this.baseIcons) {
      rendered.push(await this.pipeline.render(base));
    }
    return new IconSet(rendered);
  }

  clearCache(): void {
    this.pipeline.invalidateAll();
  }

  /**
   * Set every layer from a profile. A layer missing from the profile loses
   * its configuration; its enabled flag is left alone.
   */
  applyProfile(profile: CustomizationProfile): ProfileChanges {
    const { hue, decal: decalLayer, overlay: overlayLayer } = this.pipeline;
    const changes: ProfileChanges = { hue: false, decal: false, overlay: false };

    if (profile.hueRotation) {
      const settings = profile.hueRotation;
      changes.hue = hue.setConfig(hueRotation(settings.degrees));
      changes.hue = hue.setEnabled(settings.enabled) || changes.hue;
    } else {
      changes.hue = hue.setConfig(undefined);
    }

    if (profile.decal) {
      const settings = profile.decal;
      changes.decal = decalLayer.setConfig(decal(sourceFromSettings(settings), settings.scale));
      changes.decal = decalLayer.setEnabled(settings.enabled) || changes.decal;
    } else {
      changes.decal = decalLayer.setConfig(undefined);
    }

    if (profile.overlay) {
      const settings = profile.overlay;
      changes.overlay = overlayLayer.setConfig(
        overlay(sourceFromSettings(settings), settings.position, settings.scale)
      );
      changes.overlay = overlayLayer.setEnabled(settings.enabled) || changes.overlay;
    } else {
      changes.overlay = overlayLayer.setConfig(undefined);
    }

    return changes;
  }

  /**
   * Current settings as a profile; unconfigured layers are omitted
   */
  exportProfile(): CustomizationProfile {
    const profile: CustomizationProfile = {};
    const { hue, decal: decalLayer, overlay: overlayLayer } = this.pipeline;

    const hueConfig = hue.config();
    if (hueConfig) {
      profile.hueRotation = { degrees: hueConfig.degrees, enabled: hue.isEnabled() };
    }

    const decalConfig = decalLayer.config();
    if (decalConfig) {
      profile.decal = {
        ...settingsFromSource(decalConfig.source),
        scale: decalConfig.scale,
        enabled: decalLayer.isEnabled(),
      };
    }

    const overlayConfig = overlayLayer.config();
    if (overlayConfig) {
      profile.overlay = {
        ...settingsFromSource(overlayConfig.source),
        position: overlayConfig.position,
        scale: overlayConfig.scale,
        enabled: overlayLayer.isEnabled(),
      };
    }

    return profile;
  }
}
