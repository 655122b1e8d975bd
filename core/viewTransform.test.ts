import { describe, it, expect } from 'vitest';
import {
  IDENTITY_TRANSFORM, accumulateWheel, clampZoom, imageToView, panBy, resetView, setZoomAnchored, viewToImage, zoomByStep
} from './viewTransform';

describe('viewTransform', () => {
  const t = { x: 10, y: 20, scale: 2 };

  it('maps image points to view points and back', () => {
    expect(imageToView(t, { x: 3, y: 4 })).toEqual({ x: 16, y: 28 });
    expect(viewToImage(t, { x: 16, y: 28 })).toEqual({ x: 3, y: 4 });
  });

  it.each([
    { x: 10, y: -5, scale: 0.25 },
    { x: -300, y: 40, scale: 3 },
    { x: 0, y: 0, scale: 40 }
  ])('round-trips through view space at %o', (view) => {
    const back = viewToImage(view, imageToView(view, { x: 12.5, y: -7.25 }));
    expect(back.x).toBeCloseTo(12.5);
    expect(back.y).toBeCloseTo(-7.25);
  });

  it('stays finite when the scale collapses to zero', () => {
    const p = viewToImage({ x: 0, y: 0, scale: 0 }, { x: 1, y: 1 });
    expect(Number.isFinite(p.x)).toBe(true);
    expect(Number.isFinite(p.y)).toBe(true);
  });

  it('clamps zoom to the default limits', () => {
    expect(clampZoom(100)).toBe(40);
    expect(clampZoom(0.01)).toBe(0.05);
    expect(clampZoom(1)).toBe(1);
    expect(clampZoom(5, { minZoom: 1, maxZoom: 2 })).toBe(2);
  });

  it('falls back to the minimum zoom for unusable requests', () => {
    expect(clampZoom(Number.NaN)).toBe(0.05);
    expect(clampZoom(-2)).toBe(0.05);
    expect(clampZoom(0)).toBe(0.05);
    expect(clampZoom(Number.POSITIVE_INFINITY)).toBe(40);
  });

  it.each([Number.NaN, 0, -1, Number.POSITIVE_INFINITY])('ignores an anchored zoom to %s', (zoom) => {
    expect(setZoomAnchored(t, zoom, { x: 10, y: 10 })).toBe(t);
  });

  it('keeps the anchored image point under the cursor', () => {
    const anchor = { x: 100, y: 50 };
    const zoomed = setZoomAnchored(IDENTITY_TRANSFORM, 2, anchor);
    expect(zoomed).toEqual({ x: -100, y: -50, scale: 2 });
    expect(viewToImage(zoomed, anchor)).toEqual({ x: 100, y: 50 });
  });

  it('steps zoom in and out by the configured factors', () => {
    expect(zoomByStep(IDENTITY_TRANSFORM, 1, { x: 0, y: 0 }).scale).toBe(1.25);
    expect(zoomByStep(IDENTITY_TRANSFORM, -1, { x: 0, y: 0 }).scale).toBe(0.8);
    expect(zoomByStep(t, 0, { x: 0, y: 0 })).toBe(t);
  });

  it('does not zoom past the maximum', () => {
    const atMax = { x: 0, y: 0, scale: 40 };
    expect(zoomByStep(atMax, 1, { x: 30, y: 30 })).toEqual(atMax);
  });

  describe('accumulateWheel', () => {
    it('carries pixel deltas until a whole notch builds up', () => {
      expect(accumulateWheel(0, 30, 0)).toEqual({ steps: 0, remainder: 0.3 });
      const next = accumulateWheel(0.3, 80, 0);
      expect(next.steps).toBe(1);
      expect(next.remainder).toBeCloseTo(0.1);
    });

    it('returns several notches for a large delta', () => {
      expect(accumulateWheel(0, -250, 0)).toEqual({ steps: -2, remainder: -0.5 });
    });

    it('counts three lines or one page as a notch', () => {
      expect(accumulateWheel(0, 3, 1)).toEqual({ steps: 1, remainder: 0 });
      expect(accumulateWheel(0, 1, 2)).toEqual({ steps: 1, remainder: 0 });
    });

    it('drops the carried fraction when the direction reverses', () => {
      const next = accumulateWheel(0.5, -20, 0);
      expect(next.steps).toBe(0);
      expect(next.remainder).toBeCloseTo(-0.2);
    });
  });

  it('pans by a view-space delta', () => {
    expect(panBy(t, { x: 5, y: -5 })).toEqual({ x: 15, y: 15, scale: 2 });
  });

  it('resets to a fresh identity transform', () => {
    const view = resetView();
    expect(view).toEqual(IDENTITY_TRANSFORM);
    expect(view).not.toBe(IDENTITY_TRANSFORM);
  });
});
