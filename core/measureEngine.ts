import type {
  CalibrationState, CursorInfo, DragState, EngineOptions, EngineSnapshot, GuideSettings,
  InteractionState, Measurement, Point, PointerButton, RasterImage, StatusMessage, StatusType,
  ToolMode, ViewTransform
} from '../types';
import { DEFAULT_CALIBRATION, DEFAULT_ENGINE_OPTIONS } from '../constants';
import { pixelDistance } from './geometry';
import { panBy, resetView, setZoomAnchored, viewToImage, zoomByStep } from './viewTransform';
import { createMeasurement, finishCalibration, recomputeAll } from './calibration';
import { formatScale } from './formatting';
import { ZeroDistanceError, describeError, isMeasureError } from './errors';
import { createObserverHub, type Observer, type ObserverHub } from './observerHub';

export interface EngineEvents {
  historyChanged: void;
  measureAdded: Measurement;
  status: StatusMessage;
}

type EventHubs = { [K in keyof EngineEvents]: ObserverHub<EngineEvents[K]> };

const TOOL_HINTS: Record<Exclude<ToolMode, 'idle'>, string> = {
  calibrate: 'Calibration: click two points, then enter known length',
  line: 'Line: click two points to measure',
  polyline: 'Polyline: click points; right-click to finish'
};

// Points at which a tool completes on its own; polyline only completes on right-click.
const AUTO_COMPLETE_AT: Record<ToolMode, number | null> = {
  idle: null,
  calibrate: 2,
  line: 2,
  polyline: null
};

const idleInteraction = (): InteractionState => ({
  toolMode: 'idle',
  pendingPoints: [],
  guideAnchor: null,
  awaitingCalibration: false
});

/**
 * Owns the image, view transform, calibration and measurement history, and
 * runs the tool-mode state machine. All mutation is synchronous; observers are
 * notified once the mutation has completed. Internal state is replaced, never
 * mutated in place, so every snapshot stays valid after later changes.
 */
export class MeasureEngine {
  private readonly options: EngineOptions;
  private image: RasterImage | null = null;
  private view: ViewTransform = resetView();
  private calibration: CalibrationState = DEFAULT_CALIBRATION;
  private history: Measurement[] = [];
  private interaction: InteractionState = idleInteraction();
  private guides: GuideSettings;
  private cursor: CursorInfo | null = null;
  private spaceHeld = false;
  private drag: DragState | null = null;
  private snapshot: EngineSnapshot;

  private readonly changeHub = createObserverHub<void>();
  private readonly hubs: EventHubs = {
    historyChanged: createObserverHub<void>(),
    measureAdded: createObserverHub<Measurement>(),
    status: createObserverHub<StatusMessage>()
  };

  constructor(options: Partial<EngineOptions> = {}) {
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...options };
    this.guides = { ...this.options.guides };
    this.snapshot = this.buildSnapshot();
  }

  // --- observation ---

  subscribe = (listener: () => void): (() => void) => this.changeHub.subscribe(listener);

  getSnapshot = (): EngineSnapshot => this.snapshot;

  on<K extends keyof EngineEvents>(event: K, handler: Observer<EngineEvents[K]>): () => void {
    const hub: ObserverHub<EngineEvents[K]> = this.hubs[event];
    return hub.subscribe(handler);
  }

  private emit<K extends keyof EngineEvents>(event: K, value: EngineEvents[K]) {
    const hub: ObserverHub<EngineEvents[K]> = this.hubs[event];
    hub.notify(value);
  }

  private buildSnapshot(): EngineSnapshot {
    return {
      image: this.image,
      view: this.view,
      calibration: this.calibration,
      history: this.history,
      interaction: this.interaction,
      guides: this.guides,
      cursor: this.cursor,
      spaceHeld: this.spaceHeld,
      isPanning: this.drag !== null
    };
  }

  private commit() {
    this.snapshot = this.buildSnapshot();
    this.changeHub.notify();
  }

  setStatus(text: string, type: StatusType = 'info') {
    this.emit('status', { text, type });
  }

  reportError(err: unknown) {
    this.setStatus(describeError(err), 'error');
  }

  // --- image ---

  setImage(image: RasterImage) {
    this.image = image;
    this.view = resetView();
    this.interaction = { ...this.interaction, pendingPoints: [], guideAnchor: null, awaitingCalibration: false };
    this.drag = null;
    this.cursor = null;
    this.commit();
    this.setStatus(`Image loaded: ${image.width}x${image.height} px`, 'success');
  }

  // --- tool modes ---

  selectTool(mode: ToolMode) {
    this.interaction = {
      toolMode: mode,
      pendingPoints: [],
      guideAnchor: mode === 'idle' ? null : this.interaction.guideAnchor,
      awaitingCalibration: false
    };
    this.commit();
    if (mode !== 'idle') this.setStatus(TOOL_HINTS[mode]);
  }

  cancel() {
    this.interaction = idleInteraction();
    this.commit();
  }

  isInsideImage(p: Point): boolean {
    if (!this.image) return false;
    return p.x >= 0 && p.y >= 0 && p.x < this.image.width && p.y < this.image.height;
  }

  /**
   * Accepts an image-space click for the active tool. Returns false when the
   * click was ignored.
   */
  addPoint(p: Point): boolean {
    const { toolMode, pendingPoints, awaitingCalibration } = this.interaction;
    if (toolMode === 'idle' || awaitingCalibration || !this.isInsideImage(p)) return false;

    const pending = [...pendingPoints, { x: p.x, y: p.y }];
    this.interaction = { ...this.interaction, pendingPoints: pending, guideAnchor: { x: p.x, y: p.y } };

    if (pending.length !== AUTO_COMPLETE_AT[toolMode]) {
      this.commit();
      return true;
    }

    if (toolMode === 'line') {
      this.appendMeasurement(createMeasurement('line', pending, this.calibration));
      return true;
    }

    // calibrate: coincident points fail before asking for a length
    if (pixelDistance(pending[0], pending[1]) <= 0) {
      this.failCalibration(new ZeroDistanceError());
      return true;
    }
    this.interaction = { ...this.interaction, awaitingCalibration: true };
    this.commit();
    this.setStatus('Calibration: enter the known length of the reference');
    return true;
  }

  private appendMeasurement(item: Measurement) {
    this.history = [...this.history, item];
    this.interaction = { ...this.interaction, pendingPoints: [] };
    this.commit();
    this.emit('measureAdded', item);
    this.emit('historyChanged', undefined);
  }

  /** Right-click: finishes a polyline of two or more points, otherwise cancels. */
  finishOrCancel() {
    const { toolMode, pendingPoints } = this.interaction;
    if (toolMode === 'polyline' && pendingPoints.length >= 2) {
      this.appendMeasurement(createMeasurement('polyline', pendingPoints, this.calibration));
      return;
    }
    this.cancel();
  }

  // --- calibration ---

  finishCalibration(realLength: number, unitsLabel: string): boolean {
    const { awaitingCalibration, pendingPoints } = this.interaction;
    if (!awaitingCalibration || pendingPoints.length !== 2) return false;
    const [a, b] = pendingPoints;

    let next: CalibrationState;
    try {
      next = finishCalibration(a, b, realLength, unitsLabel, this.calibration);
    } catch (err) {
      if (!isMeasureError(err)) throw err;
      this.failCalibration(err);
      return false;
    }

    const hadHistory = this.history.length > 0;
    this.calibration = next;
    this.history = recomputeAll(this.history, next);
    this.interaction = idleInteraction();
    this.commit();
    this.setStatus(`Calibrated: ${formatScale(next)} (dpx=${pixelDistance(a, b).toFixed(2)})`, 'success');
    if (hadHistory) this.emit('historyChanged', undefined);
    return true;
  }

  cancelCalibration() {
    if (!this.interaction.awaitingCalibration) return;
    this.cancel();
    this.setStatus('Calibration canceled');
  }

  private failCalibration(err: unknown) {
    this.interaction = idleInteraction();
    this.commit();
    this.reportError(err);
  }

  recomputeAll() {
    if (this.history.length === 0) return;
    this.history = recomputeAll(this.history, this.calibration);
    this.commit();
    this.emit('historyChanged', undefined);
  }

  // --- pointer & keyboard gestures ---

  pointerDown(button: PointerButton, viewPos: Point) {
    if (button === 'middle' || (button === 'left' && this.spaceHeld)) {
      this.drag = { button, origin: { ...viewPos }, panOrigin: this.view, current: { ...viewPos } };
      this.commit();
      return;
    }
    if (button === 'right') {
      this.finishOrCancel();
      return;
    }
    if (!this.image) return;
    this.addPoint(viewToImage(this.view, viewPos));
  }

  pointerMove(viewPos: Point) {
    if (this.drag) {
      const { origin, panOrigin } = this.drag;
      this.view = panBy(panOrigin, { x: viewPos.x - origin.x, y: viewPos.y - origin.y });
      this.drag = { ...this.drag, current: { ...viewPos } };
      this.commit();
      return;
    }
    this.cursor = this.image ? { view: { ...viewPos }, image: viewToImage(this.view, viewPos) } : null;
    this.commit();
  }

  pointerUp(button: PointerButton) {
    if (!this.drag || this.drag.button !== button) return;
    this.drag = null;
    this.commit();
  }

  pointerLeave() {
    if (!this.cursor) return;
    this.cursor = null;
    this.commit();
  }

  setSpaceHeld(held: boolean) {
    if (this.spaceHeld === held) return;
    this.spaceHeld = held;
    this.commit();
  }

  /** One wheel notch: positive zooms in, negative zooms out, around `anchor`. */
  wheel(direction: number, anchor: Point) {
    if (!this.image || direction === 0) return;
    this.setView(zoomByStep(this.view, direction, anchor, this.options, this.options));
  }

  // --- view ---

  // A view change during a drag becomes the new base of that drag.
  private setView(view: ViewTransform) {
    this.view = view;
    if (this.drag) this.drag = { ...this.drag, origin: this.drag.current, panOrigin: view };
    this.commit();
  }

  setZoomAnchored(zoom: number, anchor: Point) {
    this.setView(setZoomAnchored(this.view, zoom, anchor, this.options));
  }

  pan(delta: Point) {
    this.setView(panBy(this.view, delta));
  }

  resetView() {
    this.setView(resetView());
  }

  setGuides(next: Partial<GuideSettings>) {
    this.guides = { ...this.guides, ...next };
    this.commit();
  }

  // --- history ---

  undoLast(): boolean {
    if (this.history.length === 0) return false;
    this.history = this.history.slice(0, -1);
    this.commit();
    this.setStatus('Last measurement undone');
    this.emit('historyChanged', undefined);
    return true;
  }

  /** Removes every listed position in one batch; returns how many were removed. */
  deleteAt(indices: readonly number[]): number {
    const valid = Array.from(new Set(indices))
      .filter(i => Number.isInteger(i) && i >= 0 && i < this.history.length)
      .sort((a, b) => b - a);
    if (valid.length === 0) return 0;

    const next = [...this.history];
    valid.forEach(i => next.splice(i, 1));
    this.history = next;
    this.commit();
    this.setStatus('Selected measurement(s) deleted');
    this.emit('historyChanged', undefined);
    return valid.length;
  }

  clearMeasurements() {
    const hadHistory = this.history.length > 0;
    this.history = [];
    this.interaction = { ...this.interaction, pendingPoints: [], guideAnchor: null, awaitingCalibration: false };
    this.commit();
    if (!hadHistory) return;
    this.setStatus('Measurements cleared');
    this.emit('historyChanged', undefined);
  }

  clearAll() {
    this.image = null;
    this.view = resetView();
    this.history = [];
    this.interaction = { ...this.interaction, pendingPoints: [], guideAnchor: null, awaitingCalibration: false };
    this.drag = null;
    this.cursor = null;
    this.commit();
    this.setStatus('Image and measurements cleared');
    this.emit('historyChanged', undefined);
  }
}
