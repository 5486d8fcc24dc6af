import { decal } from '../pipeline/effects/decal.effect';
import { hueRotation } from '../pipeline/effects/hue-rotation.effect';
import { overlay, overlayOrigin } from '../pipeline/effects/overlay.effect';
import { svgMarkup } from '../services/svg.service';

describe('layer configurations', () => {
  it('should normalize hue angles into [0, 360)', () => {
    expect(hueRotation(360).degrees).toBe(0);
    expect(hueRotation(-90).degrees).toBe(270);
    expect(hueRotation(725).degrees).toBe(5);
  });

  it('should clamp decal and overlay scales', () => {
    expect(decal(svgMarkup('<svg/>'), -1).scale).toBe(0);
    expect(decal(svgMarkup('<svg/>'), 0.4).scale).toBe(0.4);
    expect(overlay(svgMarkup('<svg/>'), 'center', 2).scale).toBe(1);
  });
});

describe('overlayOrigin', () => {
  const bounds = { x: 2, y: 4, width: 20, height: 10 };

  it('should anchor to each corner of the content bounds', () => {
    expect(overlayOrigin(bounds, 'top-left', 4, 4)).toEqual({ x: 2, y: 4 });
    expect(overlayOrigin(bounds, 'top-right', 4, 4)).toEqual({ x: 18, y: 4 });
    expect(overlayOrigin(bounds, 'bottom-left', 4, 4)).toEqual({ x: 2, y: 10 });
    expect(overlayOrigin(bounds, 'bottom-right', 4, 4)).toEqual({ x: 18, y: 10 });
  });

  it('should center with truncation', () => {
    expect(overlayOrigin(bounds, 'center', 5, 5)).toEqual({ x: 9, y: 6 });
  });
});
