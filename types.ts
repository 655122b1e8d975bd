export interface Point {
  x: number;
  y: number;
}

export type MeasurementKind = 'line' | 'polyline';

export interface Measurement {
  id: string;
  kind: MeasurementKind;
  points: Point[]; // image space
  lengthValue: number; // in `units` as of the last recompute
  units: string;
  displayLabel: string;
  timestamp: Date;
}

export interface CalibrationState {
  scaleUnitsPerPixel: number;
  units: string; // 'px' until the first successful calibration
}

export type ToolMode = 'idle' | 'calibrate' | 'line' | 'polyline';

export interface ViewTransform {
  x: number; // pan, view px
  y: number;
  scale: number; // zoom
}

export interface ImageDimensions {
  width: number;
  height: number;
}

export interface RasterImage extends ImageDimensions {
  src: string;
  name: string | null;
}

export interface GuideSettings {
  horizontal: boolean;
  vertical: boolean;
  diagonal: boolean;
}

export interface CursorInfo {
  view: Point;
  image: Point;
}

export type StatusType = 'success' | 'info' | 'error';

export interface StatusMessage {
  text: string;
  type: StatusType;
}

export type PointerButton = 'left' | 'middle' | 'right';

export interface InteractionState {
  toolMode: ToolMode;
  pendingPoints: Point[];
  guideAnchor: Point | null;
  awaitingCalibration: boolean;
}

export interface DragState {
  button: PointerButton;
  origin: Point;
  panOrigin: ViewTransform;
  current: Point; // last pointer position, view space
}

export interface EngineSnapshot {
  image: RasterImage | null;
  view: ViewTransform;
  calibration: CalibrationState;
  history: readonly Measurement[];
  interaction: InteractionState;
  guides: GuideSettings;
  cursor: CursorInfo | null;
  spaceHeld: boolean;
  isPanning: boolean;
}

export interface EngineOptions {
  minZoom: number;
  maxZoom: number;
  zoomInFactor: number;
  zoomOutFactor: number;
  guides: GuideSettings;
}

// --- Draw instructions consumed by the SVG view and the export canvas ---

export interface StrokeStyle {
  color: string;
  width: number;
  dash?: number[];
}

export type DrawCommand =
  | { type: 'segment'; from: Point; to: Point; stroke: StrokeStyle }
  | { type: 'guide'; from: Point; to: Point; stroke: StrokeStyle }
  | { type: 'handle'; at: Point; radius: number; fill: string }
  | { type: 'label'; at: Point; text: string };

export interface GuideFrame {
  anchor: Point; // view space
  thick: boolean;
  axes: GuideSettings;
}

export interface Scene {
  imageRect: { x: number; y: number; width: number; height: number } | null;
  commands: DrawCommand[];
  guides: GuideFrame | null;
}

export type ExportImageFormat = 'png' | 'jpeg';
