import type { CalibrationState, Measurement, MeasurementKind, Point } from '../types';
import { FALLBACK_UNITS, PIXEL_UNITS } from '../constants';
import { generateId } from '../utils';
import { pathLength, pixelDistance } from './geometry';
import { formatLength } from './formatting';
import { InvalidLengthError, ZeroDistanceError } from './errors';

export const resolveUnits = (unitsLabel: string, previous: CalibrationState): string => {
  const trimmed = unitsLabel.trim();
  if (trimmed) return trimmed;
  return previous.units !== PIXEL_UNITS ? previous.units : FALLBACK_UNITS;
};

const REAL_LENGTH_PATTERN = /^(\d+([.,]\d*)?|[.,]\d+)$/;

/**
 * Parses the typed reference length. A single `.` or `,` is the decimal
 * separator; anything else (signs, grouping, trailing text) gives NaN.
 */
export const parseRealLength = (text: string): number => {
  const trimmed = text.trim();
  if (!REAL_LENGTH_PATTERN.test(trimmed)) return Number.NaN;
  return Number(trimmed.replace(',', '.'));
};

/**
 * Derives units-per-pixel from a two-point reference of known real length.
 * Throws ZeroDistanceError or InvalidLengthError; nothing is mutated.
 */
export const finishCalibration = (
  a: Point,
  b: Point,
  realLength: number,
  unitsLabel: string,
  previous: CalibrationState
): CalibrationState => {
  const dpx = pixelDistance(a, b);
  if (!(dpx > 0)) throw new ZeroDistanceError();
  if (!Number.isFinite(realLength) || realLength <= 0) throw new InvalidLengthError(realLength);
  return {
    scaleUnitsPerPixel: realLength / dpx,
    units: resolveUnits(unitsLabel, previous)
  };
};

export const measureLength = (points: readonly Point[], calibration: CalibrationState) =>
  pathLength(points) * calibration.scaleUnitsPerPixel;

export const createMeasurement = (
  kind: MeasurementKind,
  points: readonly Point[],
  calibration: CalibrationState,
  timestamp: Date = new Date()
): Measurement => {
  const lengthValue = measureLength(points, calibration);
  return {
    id: generateId(),
    kind,
    points: points.map(p => ({ ...p })),
    lengthValue,
    units: calibration.units,
    displayLabel: formatLength(lengthValue, calibration.units),
    timestamp
  };
};

// Always from the stored pixel geometry, never from a previous scaled value.
export const recomputeMeasurement = (m: Measurement, calibration: CalibrationState): Measurement => {
  const lengthValue = measureLength(m.points, calibration);
  return {
    ...m,
    lengthValue,
    units: calibration.units,
    displayLabel: formatLength(lengthValue, calibration.units)
  };
};

export const recomputeAll = (history: readonly Measurement[], calibration: CalibrationState): Measurement[] =>
  history.map(m => recomputeMeasurement(m, calibration));
