import type { Point, ViewTransform } from '../types';
import { DEFAULT_ENGINE_OPTIONS } from '../constants';

const MIN_DIVISOR = 1e-9;

export const IDENTITY_TRANSFORM: ViewTransform = { x: 0, y: 0, scale: 1 };

export interface ZoomLimits {
  minZoom: number;
  maxZoom: number;
}

const DEFAULT_LIMITS: ZoomLimits = {
  minZoom: DEFAULT_ENGINE_OPTIONS.minZoom,
  maxZoom: DEFAULT_ENGINE_OPTIONS.maxZoom
};

// NaN, zero and negative requests fall back to the minimum zoom.
export const clampZoom = (zoom: number, limits: ZoomLimits = DEFAULT_LIMITS) => {
  if (Number.isNaN(zoom) || zoom <= 0) return limits.minZoom;
  return Math.max(limits.minZoom, Math.min(limits.maxZoom, zoom));
};

const isUsableZoom = (zoom: number) => Number.isFinite(zoom) && zoom > 0;

export const imageToView = (t: ViewTransform, p: Point): Point => ({
  x: p.x * t.scale + t.x,
  y: p.y * t.scale + t.y
});

export const viewToImage = (t: ViewTransform, p: Point): Point => {
  const inv = 1 / Math.max(t.scale, MIN_DIVISOR);
  return { x: (p.x - t.x) * inv, y: (p.y - t.y) * inv };
};

/**
 * Changes zoom while keeping the image point under `anchor` fixed on screen.
 * A request that is not a finite positive number leaves `t` unchanged.
 */
export const setZoomAnchored = (
  t: ViewTransform,
  newZoom: number,
  anchor: Point,
  limits: ZoomLimits = DEFAULT_LIMITS
): ViewTransform => {
  if (!isUsableZoom(newZoom)) return t;
  const imgBefore = viewToImage(t, anchor);
  const scale = clampZoom(newZoom, limits);
  const after = imageToView({ ...t, scale }, imgBefore);
  return { scale, x: t.x + (anchor.x - after.x), y: t.y + (anchor.y - after.y) };
};

export const zoomByStep = (
  t: ViewTransform,
  direction: number,
  anchor: Point,
  factors: { zoomInFactor: number; zoomOutFactor: number } = DEFAULT_ENGINE_OPTIONS,
  limits: ZoomLimits = DEFAULT_LIMITS
): ViewTransform => {
  if (direction === 0) return t;
  const factor = direction > 0 ? factors.zoomInFactor : factors.zoomOutFactor;
  return setZoomAnchored(t, t.scale * factor, anchor, limits);
};

export interface WheelAccumulation {
  steps: number;
  remainder: number;
}

// Notch size per WheelEvent.deltaMode: pixels, lines, pages.
const WHEEL_UNITS_PER_NOTCH = [100, 3, 1];

/**
 * Folds one wheel delta into the running notch count. Whole notches come back
 * as `steps` (positive = scroll down); the fraction carries over. Reversing
 * direction drops the carried fraction.
 */
export const accumulateWheel = (remainder: number, deltaY: number, deltaMode: number): WheelAccumulation => {
  const perNotch = WHEEL_UNITS_PER_NOTCH[deltaMode] ?? WHEEL_UNITS_PER_NOTCH[0];
  const fraction = deltaY / perNotch;
  const carried = Math.sign(fraction) === -Math.sign(remainder) ? 0 : remainder;
  const total = carried + fraction;
  const steps = Math.trunc(total) || 0; // never -0
  return { steps, remainder: total - steps };
};

export const panBy = (t: ViewTransform, delta: Point): ViewTransform => ({
  ...t,
  x: t.x + delta.x,
  y: t.y + delta.y
});

export const resetView = (): ViewTransform => ({ ...IDENTITY_TRANSFORM });
