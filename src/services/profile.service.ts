import { z } from 'zod';
import { OVERLAY_POSITIONS } from '../models/icon.types';
import { SvgSource, svgMarkup, svgSymbol } from './svg.service';

/**
 * Serializable customization profile.
 *
 * Moves layer settings across a process boundary (browser <-> service) as
 * JSON. Pure data: no versions, no caches.
 *
 * ```json
 * {
 *   "hueRotation": { "degrees": 180, "enabled": true },
 *   "decal": { "svgData": "<svg>...</svg>", "scale": 0.5, "enabled": true },
 *   "overlay": { "emoji": "★", "position": "top-left", "scale": 0.25 }
 * }
 * ```
 */

const SourceFields = {
  svgData: z.string().optional(),
  emoji: z.string().optional(),
};

export const HueRotationSettings = z.object({
  degrees: z.number().finite(),
  enabled: z.boolean().default(true),
});
export type HueRotationSettings = z.infer<typeof HueRotationSettings>;

export const DecalSettings = z.object({
  ...SourceFields,
  scale: z.number().finite(),
  enabled: z.boolean().default(true),
});
export type DecalSettings = z.infer<typeof DecalSettings>;

export const OverlaySettings = z.object({
  ...SourceFields,
  position: z.enum(OVERLAY_POSITIONS).default('bottom-right'),
  scale: z.number().finite(),
  enabled: z.boolean().default(true),
});
export type OverlaySettings = z.infer<typeof OverlaySettings>;

export const CustomizationProfile = z.object({
  hueRotation: HueRotationSettings.optional(),
  decal: DecalSettings.optional(),
  overlay: OverlaySettings.optional(),
});
export type CustomizationProfile = z.infer<typeof CustomizationProfile>;

export interface ProfileIssue {
  path: string;
  message: string;
}

/**
 * A profile document that could not be parsed. Raised before any layer is
 * touched.
 */
export class ProfileParseError extends Error {
  constructor(message: string, readonly issues: ProfileIssue[] = []) {
    super(message);
    this.name = 'ProfileParseError';
  }
}

/**
 * Validate an already-decoded JSON value
 */
export function parseProfileObject(value: unknown): CustomizationProfile {
  const result = CustomizationProfile.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ProfileParseError('Invalid customization profile', issues);
  }
  return result.data;
}

export function parseProfile(json: string): CustomizationProfile {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    throw new ProfileParseError(
      `Profile is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseProfileObject(value);
}

export function serializeProfile(profile: CustomizationProfile, pretty: boolean = false): string {
  return JSON.stringify(profile, null, pretty ? 2 : undefined);
}

/**
 * `emoji` wins over `svgData`; neither gives empty markup (renders nothing)
 */
export function sourceFromSettings(settings: { svgData?: string; emoji?: string }): SvgSource {
  if (settings.emoji !== undefined) return svgSymbol(settings.emoji);
  return svgMarkup(settings.svgData ?? '');
}

export function settingsFromSource(source: SvgSource): { svgData?: string; emoji?: string } {
  return source.kind === 'symbol' ? { emoji: source.symbol } : { svgData: source.svg };
}

/**
 * Fluent construction of profiles
 */
export class ProfileBuilder {
  private readonly profile: CustomizationProfile = {};

  withHueRotation(settings: z.input<typeof HueRotationSettings>): this {
    this.profile.hueRotation = HueRotationSettings.parse(settings);
    return this;
  }

  withDecal(settings: z.input<typeof DecalSettings>): this {
    this.profile.decal = DecalSettings.parse(settings);
    return this;
  }

  withOverlay(settings: z.input<typeof OverlaySettings>): this {
    this.profile.overlay = OverlaySettings.parse(settings);
    return this;
  }

  build(): CustomizationProfile {
    return { ...this.profile };
  }
}
