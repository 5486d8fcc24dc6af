import { IconImage } from '../models/icon-image';
import { Rgba } from '../models/icon.types';
import { decal } from '../pipeline/effects/decal.effect';
import { hueRotation } from '../pipeline/effects/hue-rotation.effect';
import { overlay } from '../pipeline/effects/overlay.effect';
import { LayerPipeline } from '../pipeline/layer-pipeline';
import { RgbaBitmap } from '../services/compositor.service';
import { SvgService, SvgSource, svgMarkup } from '../services/svg.service';
import { RED, SQUARE_SVG, StubSvgService } from './helpers/icon-fixtures.helper';

const DARK_RED = { r: 179, g: 0, b: 0, a: 255 };
const DARK_GREEN = { r: 0, g: 179, b: 0, a: 255 };

describe('LayerPipeline', () => {
  let svg: StubSvgService;
  let pipeline: LayerPipeline;
  let base: IconImage;

  beforeEach(() => {
    svg = new StubSvgService();
    pipeline = new LayerPipeline(svg);
    base = IconImage.solid(16, 16, RED);
  });

  describe('render', () => {
    it('should return the base image when no layer is configured', async () => {
      const output = await pipeline.render(base);

      expect(output).toBe(base);
      expect(svg.calls).toHaveLength(0);
    });

    it('should rotate every pixel with hue rotation alone', async () => {
      pipeline.hue.setConfig(hueRotation(120));

      const output = await pipeline.render(base);

      expect(output.pixel(0, 0)).toEqual([0, 255, 0, 255]);
      expect(output.pixel(15, 15)).toEqual([0, 255, 0, 255]);
      expect(base.pixel(0, 0)).toEqual(RED);
    });

    it('should pass the base through once hue rotation is disabled', async () => {
      pipeline.hue.setConfig(hueRotation(120));
      await pipeline.render(base);
      pipeline.hue.setEnabled(false);

      const output = await pipeline.render(base);

      expect(output.pixel(0, 0)).toEqual([255, 0, 0, 255]);
      expect(pipeline.hue.config()).toEqual({ degrees: 120 });
    });

    it('should center a darkened decal on the content bounds', async () => {
      pipeline.decal.setConfig(decal(svgMarkup('<svg/>'), 0.5));

      const output = await pipeline.render(base);

      expect(svg.calls).toHaveLength(1);
      expect(svg.calls[0].size).toBe(8);
      expect(svg.calls[0].fill).toEqual(DARK_RED);
      expect(output.pixel(3, 3)).toEqual(RED);
      expect(output.pixel(4, 4)).toEqual([179, 0, 0, 255]);
      expect(output.pixel(11, 11)).toEqual([179, 0, 0, 255]);
      expect(output.pixel(12, 12)).toEqual(RED);
    });

    it('should paint the decal with the rotated dominant color', async () => {
      pipeline.hue.setConfig(hueRotation(120));
      pipeline.decal.setConfig(decal(svgMarkup('<svg/>'), 0.5));

      const output = await pipeline.render(base);

      expect(svg.calls[0].fill).toEqual(DARK_GREEN);
      expect(output.pixel(0, 0)).toEqual([0, 255, 0, 255]);
      expect(output.pixel(8, 8)).toEqual([0, 179, 0, 255]);
    });

    it('should place the overlay at the requested corner, above the decal', async () => {
      pipeline.decal.setConfig(decal(svgMarkup('<svg/>'), 1));
      pipeline.overlay.setConfig(overlay(svgMarkup('<svg/>'), 'bottom-right', 0.25));

      const output = await pipeline.render(base);

      expect(svg.calls[1].size).toBe(4);
      expect(svg.calls[1].fill).toBeUndefined();
      expect(output.pixel(12, 12)).toEqual([0, 0, 255, 255]);
      expect(output.pixel(11, 11)).toEqual([179, 0, 0, 255]);
    });

    it('should skip a decal that rounds to zero pixels', async () => {
      pipeline.decal.setConfig(decal(svgMarkup('<svg/>'), 0.05));

      const output = await pipeline.render(base);

      expect(svg.calls).toHaveLength(0);
      expect(output.data.equals(base.data)).toBe(true);
    });

    it('should skip a decal whose markup does not render', async () => {
      pipeline.decal.setConfig(decal(svgMarkup('broken'), 0.5));

      const output = await pipeline.render(base);

      expect(svg.calls).toHaveLength(1);
      expect(output.data.equals(base.data)).toBe(true);
    });
  });

  describe('caching', () => {
    beforeEach(() => {
      pipeline.hue.setConfig(hueRotation(120));
      pipeline.decal.setConfig(decal(svgMarkup('<svg/>'), 0.5));
    });

    it('should return the cached composite for an unchanged pipeline', async () => {
      const first = await pipeline.render(base);
      const second = await pipeline.render(base);

      expect(second).toBe(first);
      expect(svg.calls).toHaveLength(1);
    });

    it('should keep one composite per size', async () => {
      await pipeline.render(base);
      await pipeline.render(IconImage.solid(32, 32, RED));

      expect(pipeline.composite.cacheSize()).toBe(2);
    });

    it('should render identical pixels after every cache is dropped', async () => {
      const first = await pipeline.render(base);
      pipeline.invalidateAll();

      expect(pipeline.composite.cacheSize()).toBe(0);
      expect(pipeline.hue.cacheSize()).toBe(0);

      const second = await pipeline.render(base);

      expect(second).not.toBe(first);
      expect(second.data.equals(first.data)).toBe(true);
      expect(svg.calls).toHaveLength(2);
    });

    it('should recompute the decal when hue rotation is disabled', async () => {
      await pipeline.render(base);
      pipeline.hue.setEnabled(false);

      const output = await pipeline.render(base);

      expect(svg.calls).toHaveLength(2);
      expect(svg.calls[1].fill).toEqual(DARK_RED);
      expect(output.pixel(0, 0)).toEqual(RED);
      expect(output.pixel(8, 8)).toEqual([179, 0, 0, 255]);
    });

    it('should recompute the overlay when hue rotation changes', async () => {
      pipeline.overlay.setConfig(overlay(svgMarkup('<svg/>'), 'top-left', 0.25));
      await pipeline.render(base);
      expect(svg.calls).toHaveLength(2);

      pipeline.hue.setConfig(hueRotation(240));
      const output = await pipeline.render(base);

      expect(svg.calls).toHaveLength(4);
      expect(output.pixel(0, 0)).toEqual([0, 0, 255, 255]);
      expect(output.pixel(15, 15)).toEqual([0, 0, 255, 255]);
    });

    it('should reuse the decal cache when only the overlay changes', async () => {
      await pipeline.render(base);
      pipeline.overlay.setConfig(overlay(svgMarkup('<svg/>'), 'center', 0.25));

      await pipeline.render(base);

      const decalCalls = svg.calls.filter(call => call.fill !== undefined);
      expect(decalCalls).toHaveLength(1);
    });

    it('should restore the exact output when a layer is toggled back on', async () => {
      const before = await pipeline.render(base);

      pipeline.decal.setEnabled(false);
      const disabled = await pipeline.render(base);
      pipeline.decal.setEnabled(true);
      const after = await pipeline.render(base);

      expect(disabled.pixel(8, 8)).toEqual([0, 255, 0, 255]);
      expect(after.data.equals(before.data)).toBe(true);
    });
  });

  it('should not cache a composite when a layer changes mid-render', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });

    class GatedSvgService extends StubSvgService {
      async renderSource(source: SvgSource, size: number, fill?: Rgba): Promise<RgbaBitmap | undefined> {
        await gate;
        return super.renderSource(source, size, fill);
      }
    }

    const gated = new LayerPipeline(new GatedSvgService());
    gated.decal.setConfig(decal(svgMarkup('<svg/>'), 0.5));

    const pending = gated.render(base);
    gated.overlay.setConfig(overlay(svgMarkup('<svg/>'), 'top-left', 0.25));
    release();
    await pending;

    expect(gated.composite.cacheSize()).toBe(0);
  });

  it('should rasterize a real decal with sharp', async () => {
    const real = new LayerPipeline(new SvgService());
    real.decal.setConfig(decal(svgMarkup(SQUARE_SVG), 0.5));

    const output = await real.render(base);

    expect(output.pixel(0, 0)).toEqual(RED);
    expect(output.pixel(8, 8)).toEqual([179, 0, 0, 255]);
  });
});
