import type {
  DrawCommand, EngineSnapshot, GuideFrame, ImageDimensions, Measurement, Point, Scene, StrokeStyle,
  ViewTransform
} from '../types';
import {
  GUIDE_DASH, GUIDE_INNER_COLOR, GUIDE_INNER_WIDTH, GUIDE_MIN_INNER_WIDTH, GUIDE_MIN_OUTER_WIDTH,
  GUIDE_OUTER_COLOR, GUIDE_OUTER_WIDTH, HANDLE_FILL, HANDLE_RADIUS, LABEL_OFFSET, MEASURE_PEN, OUTLINE_PEN,
  TAIL_LABEL_OFFSET
} from '../constants';
import { halfwayPoint, midpoint, offsetPoint } from './geometry';
import { IDENTITY_TRANSFORM, imageToView } from './viewTransform';
import { measureLength } from './calibration';
import { formatLength } from './formatting';

// Black outline pass under the coloured pass, per segment.
const drawPath = (points: readonly Point[], t: ViewTransform): DrawCommand[] => {
  const commands: DrawCommand[] = [];
  for (let i = 0; i < points.length - 1; i++) {
    const from = imageToView(t, points[i]);
    const to = imageToView(t, points[i + 1]);
    commands.push({ type: 'segment', from, to, stroke: OUTLINE_PEN });
    commands.push({ type: 'segment', from, to, stroke: MEASURE_PEN });
  }
  return commands;
};

const labelAt = (imagePoint: Point, t: ViewTransform, offset: Point, text: string): DrawCommand => {
  const v = imageToView(t, imagePoint);
  return { type: 'label', at: offsetPoint(v, offset.x, offset.y), text };
};

/**
 * Draw instructions for one persisted measurement. Shared by the live view and
 * the annotated export, which passes the identity transform.
 */
export const drawMeasurement = (item: Measurement, t: ViewTransform): DrawCommand[] => {
  if (item.kind === 'line' && item.points.length === 2) {
    const [a, b] = item.points;
    return [...drawPath(item.points, t), labelAt(midpoint(a, b), t, LABEL_OFFSET, item.displayLabel)];
  }
  if (item.kind === 'polyline' && item.points.length >= 2) {
    return [...drawPath(item.points, t), labelAt(halfwayPoint(item.points), t, LABEL_OFFSET, item.displayLabel)];
  }
  return [];
};

export interface PendingDrawOptions {
  handles: boolean;
  cursor: Point | null; // image space; null disables the rubber band
}

export const drawPending = (
  snapshot: Pick<EngineSnapshot, 'interaction' | 'calibration'>,
  t: ViewTransform,
  opts: PendingDrawOptions
): DrawCommand[] => {
  const { toolMode, pendingPoints } = snapshot.interaction;
  const { calibration } = snapshot;
  const commands: DrawCommand[] = [];
  if (pendingPoints.length === 0) return commands;

  if (opts.handles) {
    pendingPoints.forEach((p, i) => {
      const v = imageToView(t, p);
      commands.push({ type: 'handle', at: v, radius: HANDLE_RADIUS, fill: HANDLE_FILL });
      commands.push({ type: 'label', at: offsetPoint(v, TAIL_LABEL_OFFSET.x, TAIL_LABEL_OFFSET.y), text: String(i + 1) });
    });
  }

  if (toolMode === 'line' || toolMode === 'calibrate') {
    let segment: Point[] | null = null;
    if (pendingPoints.length === 2) segment = pendingPoints;
    else if (pendingPoints.length === 1 && opts.cursor) segment = [pendingPoints[0], opts.cursor];
    if (segment) {
      const text = formatLength(measureLength(segment, calibration), calibration.units);
      commands.push(...drawPath(segment, t), labelAt(midpoint(segment[0], segment[1]), t, LABEL_OFFSET, text));
    }
  } else if (toolMode === 'polyline') {
    const path = opts.cursor ? [...pendingPoints, opts.cursor] : pendingPoints;
    if (path.length >= 2) {
      const text = formatLength(measureLength(path, calibration), calibration.units);
      commands.push(...drawPath(path, t), labelAt(path[path.length - 1], t, TAIL_LABEL_OFFSET, text));
    }
  }
  return commands;
};

export const guidePens = (thick: boolean): { outer: StrokeStyle; inner: StrokeStyle } => ({
  outer: {
    color: GUIDE_OUTER_COLOR,
    width: thick ? GUIDE_OUTER_WIDTH : Math.max(GUIDE_MIN_OUTER_WIDTH, GUIDE_OUTER_WIDTH / 3),
    dash: GUIDE_DASH
  },
  inner: {
    color: GUIDE_INNER_COLOR,
    width: thick ? GUIDE_INNER_WIDTH : Math.max(GUIDE_MIN_INNER_WIDTH, GUIDE_INNER_WIDTH / 3),
    dash: GUIDE_DASH
  }
});

export const guideFrame = (snapshot: EngineSnapshot): GuideFrame | null => {
  const { toolMode, guideAnchor, pendingPoints } = snapshot.interaction;
  if (toolMode === 'idle' || !guideAnchor) return null;
  return {
    anchor: imageToView(snapshot.view, guideAnchor),
    thick: pendingPoints.length > 0,
    axes: snapshot.guides
  };
};

export const drawGuides = (frame: GuideFrame, viewport: ImageDimensions): DrawCommand[] => {
  const { outer, inner } = guidePens(frame.thick);
  const { x, y } = frame.anchor;
  const lines: [Point, Point][] = [];
  if (frame.axes.horizontal) lines.push([{ x: 0, y }, { x: viewport.width, y }]);
  if (frame.axes.vertical) lines.push([{ x, y: 0 }, { x, y: viewport.height }]);
  if (frame.axes.diagonal) {
    const span = Math.max(viewport.width, viewport.height) * 2;
    lines.push([{ x: x - span, y: y - span }, { x: x + span, y: y + span }]);
    lines.push([{ x: x - span, y: y + span }, { x: x + span, y: y - span }]);
  }
  return lines.flatMap(([from, to]): DrawCommand[] => [
    { type: 'guide', from, to, stroke: outer },
    { type: 'guide', from, to, stroke: inner }
  ]);
};

/** Everything visible in the live view for the current snapshot. */
export const buildScene = (snapshot: EngineSnapshot, viewport: ImageDimensions): Scene => {
  const t = snapshot.view;
  const { image } = snapshot;
  const commands = snapshot.history.flatMap(m => drawMeasurement(m, t));
  commands.push(...drawPending(snapshot, t, { handles: true, cursor: snapshot.cursor?.image ?? null }));
  const guides = guideFrame(snapshot);
  if (guides) commands.push(...drawGuides(guides, viewport));
  return {
    imageRect: image ? { x: t.x, y: t.y, width: image.width * t.scale, height: image.height * t.scale } : null,
    commands,
    guides
  };
};

/**
 * Image-space scene for the annotated export: history plus any complete
 * pending geometry, without handles, rubber band or guides.
 */
export const buildExportScene = (snapshot: EngineSnapshot): Scene => {
  const { image } = snapshot;
  const commands = snapshot.history.flatMap(m => drawMeasurement(m, IDENTITY_TRANSFORM));
  commands.push(...drawPending(snapshot, IDENTITY_TRANSFORM, { handles: false, cursor: null }));
  return {
    imageRect: image ? { x: 0, y: 0, width: image.width, height: image.height } : null,
    commands,
    guides: null
  };
};
