import { IconImage } from '../models/icon-image';
import { CompositorService } from '../services/compositor.service';
import { RED, solidBitmap } from './helpers/icon-fixtures.helper';

describe('CompositorService', () => {
  let service: CompositorService;

  beforeEach(() => {
    service = new CompositorService();
  });

  describe('blend', () => {
    it('should let an opaque source replace the destination', () => {
      expect(service.blend([0, 0, 255, 255], [255, 0, 0, 255])).toEqual([0, 0, 255, 255]);
    });

    it('should mix a half-transparent source over an opaque destination', () => {
      expect(service.blend([0, 0, 255, 128], [255, 0, 0, 255])).toEqual([127, 0, 128, 255]);
    });

    it('should combine two half-transparent pixels', () => {
      expect(service.blend([0, 0, 255, 128], [255, 0, 0, 128])).toEqual([85, 0, 170, 192]);
    });

    it('should give transparent black when both are transparent', () => {
      expect(service.blend([0, 0, 0, 0], [10, 20, 30, 0])).toEqual([0, 0, 0, 0]);
    });

    it('should keep source color over a transparent destination', () => {
      expect(service.blend([255, 255, 255, 128], [0, 0, 0, 0])).toEqual([255, 255, 255, 128]);
    });
  });

  describe('compositeOver', () => {
    it('should draw the source at the given offset', () => {
      const dest = IconImage.solid(10, 10, RED);
      const src = solidBitmap(4, 4, { r: 0, g: 0, b: 255, a: 255 });

      const out = service.compositeOver(dest, src, 3, 3);

      expect(out.pixel(5, 5)).toEqual([0, 0, 255, 255]);
      expect(out.pixel(3, 3)).toEqual([0, 0, 255, 255]);
      expect(out.pixel(7, 7)).toEqual([255, 0, 0, 255]);
      expect(out.pixel(0, 0)).toEqual([255, 0, 0, 255]);
    });

    it('should not modify the destination image', () => {
      const dest = IconImage.solid(4, 4, RED);
      service.compositeOver(dest, solidBitmap(2, 2, { r: 0, g: 0, b: 255, a: 255 }), 0, 0);

      expect(dest.pixel(0, 0)).toEqual([255, 0, 0, 255]);
    });

    it('should clip source pixels outside the destination', () => {
      const dest = IconImage.solid(4, 4, RED);
      const src = solidBitmap(4, 4, { r: 0, g: 0, b: 255, a: 255 });

      const out = service.compositeOver(dest, src, -2, 2);

      expect(out.pixel(0, 2)).toEqual([0, 0, 255, 255]);
      expect(out.pixel(1, 3)).toEqual([0, 0, 255, 255]);
      expect(out.pixel(2, 2)).toEqual([255, 0, 0, 255]);
      expect(out.pixel(0, 1)).toEqual([255, 0, 0, 255]);
    });

    it('should keep geometry and content bounds', () => {
      const dest = new IconImage(IconImage.solid(8, 8, RED).data, 8, 8, 2, { x: 1, y: 1, width: 6, height: 6 });
      const out = service.compositeOver(dest, solidBitmap(1, 1, { r: 0, g: 0, b: 0, a: 255 }), 0, 0);

      expect(out.scale).toBe(2);
      expect(out.contentBounds).toEqual({ x: 1, y: 1, width: 6, height: 6 });
    });
  });
});
