import { IconImage } from '../models/icon-image';
import { RenderContext } from './render-context';

/**
 * Snapshot of every layer's version, handed to `LayerEffect.dependencies`
 */
export interface LayerVersions {
  readonly hue: number;
  readonly decal: number;
  readonly overlay: number;
}

/**
 * Versions are 32-bit counters that wrap
 */
export function nextVersion(version: number): number {
  return (version + 1) >>> 0;
}

/**
 * Signature of the upstream state a cached image was rendered against.
 *
 * Kept as the ordered list of upstream versions and compared element-wise,
 * so two different upstream states can never share a signature.
 */
export class DependencyVersion {
  /** Root layer: nothing upstream */
  static readonly NONE = new DependencyVersion([]);

  private constructor(private readonly parts: readonly number[]) {}

  static of(...versions: number[]): DependencyVersion {
    return versions.length === 0 ? DependencyVersion.NONE : new DependencyVersion([...versions]);
  }

  equals(other: DependencyVersion): boolean {
    if (this.parts.length !== other.parts.length) return false;
    return this.parts.every((part, i) => part === other.parts[i]);
  }

  toString(): string {
    return this.parts.length === 0 ? 'none' : this.parts.join(':');
  }
}

/**
 * Identifies which concrete rendering a cache entry belongs to:
 * pixel width, pixel height and the exact bit pattern of the scale.
 */
export type CacheKey = string;

const scaleView = new DataView(new ArrayBuffer(8));

export function cacheKey(width: number, height: number, scale: number): CacheKey {
  scaleView.setFloat64(0, scale);
  return `${width}x${height}@${scaleView.getBigUint64(0).toString(16)}`;
}

export function cacheKeyFor(image: IconImage): CacheKey {
  return cacheKey(image.width, image.height, image.scale);
}

/**
 * What a layer configuration type needs to plug into `Layer`.
 *
 * `transform` changes pixels; `emit` publishes values for downstream
 * layers. They are separate because only the pixels are cached: `emit`
 * runs again on every cache hit.
 */
export interface LayerEffect<C> {
  readonly name: string;

  /** True when `next` would render differently from `current` */
  differs(current: C, next: C): boolean;

  /** Upstream state this layer's cached pixels depend on */
  dependencies(versions: LayerVersions): DependencyVersion;

  transform(config: C, ctx: RenderContext): Promise<void>;

  emit?(config: C, ctx: RenderContext): void;
}

interface CacheEntry {
  image: IconImage;
  deps: DependencyVersion;
}

/**
 * Size-keyed image cache whose entries are tagged with the dependency
 * version they were rendered against.
 */
class ImageCache {
  private readonly entries = new Map<CacheKey, CacheEntry>();

  get(key: CacheKey, deps: DependencyVersion): IconImage | undefined {
    const entry = this.entries.get(key);
    return entry && entry.deps.equals(deps) ? entry.image : undefined;
  }

  set(key: CacheKey, image: IconImage, deps: DependencyVersion): void {
    this.entries.set(key, { image, deps });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * One pipeline step: optional configuration, enabled flag, version counter
 * and a per-size cache of rendered output.
 *
 * Disabling keeps the configuration. Any observable change (toggle, or a
 * configuration the effect reports as different) bumps the version and
 * empties the cache.
 */
export class Layer<C> {
  private currentConfig: C | undefined;
  private enabled = true;
  private currentVersion = 0;
  private readonly cache = new ImageCache();

  constructor(private readonly effect: LayerEffect<C>) {}

  get name(): string {
    return this.effect.name;
  }

  config(): C | undefined {
    return this.currentConfig;
  }

  hasConfig(): boolean {
    return this.currentConfig !== undefined;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /** Enabled and configured */
  isActive(): boolean {
    return this.enabled && this.currentConfig !== undefined;
  }

  version(): number {
    return this.currentVersion;
  }

  cacheSize(): number {
    return this.cache.size;
  }

  /**
   * @returns whether the enabled state flipped
   */
  setEnabled(enabled: boolean): boolean {
    if (this.enabled === enabled) return false;
    this.enabled = enabled;
    this.invalidate();
    return true;
  }

  /**
   * Replace the configuration (`undefined` removes it).
   *
   * @returns whether anything changed
   */
  setConfig(config: C | undefined): boolean {
    const current = this.currentConfig;
    let differs: boolean;
    if (current === undefined || config === undefined) {
      differs = current !== config;
    } else {
      differs = this.effect.differs(current, config);
    }

    if (!differs) return false;

    this.currentConfig = config;
    this.invalidate();
    return true;
  }

  /**
   * Bump the version and drop every cached image
   */
  invalidate(): void {
    this.currentVersion = nextVersion(this.currentVersion);
    this.cache.clear();
  }

  getCached(key: CacheKey, deps: DependencyVersion): IconImage | undefined {
    return this.cache.get(key, deps);
  }

  store(key: CacheKey, image: IconImage, deps: DependencyVersion): void {
    this.cache.set(key, image, deps);
  }

  /**
   * Run this layer against the render context.
   *
   * Inactive layers pass the image through. A cache hit adopts the cached
   * image and re-emits; a miss transforms, emits and caches. The result is
   * not cached if this layer changed while the transform was in flight.
   */
  async apply(ctx: RenderContext, key: CacheKey, versions: LayerVersions): Promise<void> {
    const config = this.currentConfig;
    if (!this.enabled || config === undefined) return;

    const deps = this.effect.dependencies(versions);

    const cached = this.cache.get(key, deps);
    if (cached) {
      ctx.image = cached;
      this.effect.emit?.(config, ctx);
      return;
    }

    const startVersion = this.currentVersion;
    await this.effect.transform(config, ctx);
    this.effect.emit?.(config, ctx);

    if (this.currentVersion === startVersion) {
      this.store(key, ctx.image, deps);
    }
  }
}

/**
 * Cache-only layer for fully assembled output. No configuration, no
 * enabled flag; entries are tagged with the combined layer versions.
 */
export class CompositeLayer {
  private currentVersion = 0;
  private readonly cache = new ImageCache();

  version(): number {
    return this.currentVersion;
  }

  cacheSize(): number {
    return this.cache.size;
  }

  invalidate(): void {
    this.currentVersion = nextVersion(this.currentVersion);
    this.cache.clear();
  }

  getCached(key: CacheKey, deps: DependencyVersion): IconImage | undefined {
    return this.cache.get(key, deps);
  }

  store(key: CacheKey, image: IconImage, deps: DependencyVersion): void {
    this.cache.set(key, image, deps);
  }
}
