import type { CalibrationState, EngineOptions, StrokeStyle } from './types';

export const PIXEL_UNITS = 'px';
export const FALLBACK_UNITS = 'units';

export const DEFAULT_CALIBRATION: CalibrationState = {
  scaleUnitsPerPixel: 1,
  units: PIXEL_UNITS
};

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  minZoom: 0.05,
  maxZoom: 40,
  zoomInFactor: 1.25,
  zoomOutFactor: 0.8,
  guides: { horizontal: true, vertical: true, diagonal: true }
};

// Calibration prompt defaults
export const DEFAULT_REAL_LENGTH = '100';
export const DEFAULT_CALIBRATION_UNITS = 'mm';
export const UNIT_SUGGESTIONS = ['mm', 'cm', 'm', 'in', 'ft', 'yd'];

// Pens
export const OUTLINE_PEN: StrokeStyle = { color: 'rgba(0, 0, 0, 0.86)', width: 4 };
export const MEASURE_PEN: StrokeStyle = { color: 'rgb(0, 200, 255)', width: 2 };
export const HANDLE_FILL = 'rgba(0, 200, 255, 0.63)';
export const HANDLE_RADIUS = 5;

export const GUIDE_DASH = [6, 6];
export const GUIDE_OUTER_COLOR = 'rgba(0, 0, 0, 0.78)';
export const GUIDE_INNER_COLOR = 'rgba(255, 255, 255, 0.9)';
export const GUIDE_OUTER_WIDTH = 4;
export const GUIDE_INNER_WIDTH = 2;
export const GUIDE_MIN_OUTER_WIDTH = 1;
export const GUIDE_MIN_INNER_WIDTH = 0.7;

// Label anchors, view px
export const LABEL_OFFSET = { x: 6, y: -6 };
export const TAIL_LABEL_OFFSET = { x: 8, y: -8 };
export const LABEL_FONT = '10pt sans-serif';
export const LABEL_BOX_FILL = 'rgba(0, 0, 0, 0.7)';

// Export
export const CSV_HEADER = ['timestamp', 'kind', 'units', 'length_value', 'length_label', 'points'];
export const CSV_DELIMITER = ';';
export const CSV_FILE_NAME = 'measurements.csv';
export const ANNOTATED_FILE_BASE = 'annotated';
export const JPEG_QUALITY = 0.92;
