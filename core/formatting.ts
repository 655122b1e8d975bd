import type { CalibrationState, Measurement, Point } from '../types';
import { PIXEL_UNITS } from '../constants';

/**
 * Length label with precision tiered by magnitude: 1 decimal from 100 up,
 * 2 decimals from 10, 3 below. Uncalibrated pixel lengths always use 1 decimal.
 */
export const formatLength = (value: number, units: string): string => {
  if (units === PIXEL_UNITS) return `${value.toFixed(1)} ${PIXEL_UNITS}`;
  if (value >= 100) return `${value.toFixed(1)} ${units}`;
  if (value >= 10) return `${value.toFixed(2)} ${units}`;
  return `${value.toFixed(3)} ${units}`;
};

export const formatScale = (calibration: CalibrationState): string =>
  `${calibration.scaleUnitsPerPixel.toFixed(6)} ${calibration.units}/px`;

export const formatCursor = (p: Point): string => `${p.x.toFixed(1)}, ${p.y.toFixed(1)} px`;

const pad2 = (n: number) => String(n).padStart(2, '0');

export const formatClockTime = (d: Date): string =>
  `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;

export const formatHistoryEntry = (m: Measurement): string =>
  `[${formatClockTime(m.timestamp)}] ${m.kind}: ${m.displayLabel} (${m.points.length} pts)`;
