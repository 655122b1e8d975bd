import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MeasureEngine } from './measureEngine';
import { parseRealLength } from './calibration';
import type { RasterImage, StatusMessage } from '../types';

const image: RasterImage = { src: 'data:image/png;base64,', name: 'test.png', width: 200, height: 100 };

describe('MeasureEngine', () => {
  let engine: MeasureEngine;
  let statuses: StatusMessage[];
  let historyChanges: number;

  const lastStatus = () => statuses[statuses.length - 1];

  beforeEach(() => {
    engine = new MeasureEngine();
    statuses = [];
    historyChanges = 0;
    engine.on('status', s => statuses.push(s));
    engine.on('historyChanged', () => { historyChanges++; });
  });

  const addLine = (a: { x: number; y: number }, b: { x: number; y: number }) => {
    engine.selectTool('line');
    engine.addPoint(a);
    engine.addPoint(b);
  };

  describe('image', () => {
    it('loads an image with a fresh view', () => {
      engine.pan({ x: 30, y: 30 });
      engine.setImage(image);
      const snap = engine.getSnapshot();
      expect(snap.image).toBe(image);
      expect(snap.view).toEqual({ x: 0, y: 0, scale: 1 });
      expect(lastStatus()).toEqual({ text: 'Image loaded: 200x100 px', type: 'success' });
    });

    it('resets the view and guide anchor of an active tool on a new image', () => {
      engine.setImage(image);
      engine.selectTool('polyline');
      engine.addPoint({ x: 40, y: 40 });
      engine.wheel(1, { x: 50, y: 50 });
      engine.pan({ x: 7, y: 3 });

      engine.setImage({ ...image, name: 'next.png' });
      const { view, interaction } = engine.getSnapshot();
      expect(view).toEqual({ x: 0, y: 0, scale: 1 });
      expect(interaction.toolMode).toBe('polyline');
      expect(interaction.guideAnchor).toBeNull();
      expect(interaction.pendingPoints).toEqual([]);
    });

    it('keeps history and calibration when the image is replaced', () => {
      engine.setImage(image);
      addLine({ x: 0, y: 0 }, { x: 3, y: 4 });
      engine.addPoint({ x: 50, y: 50 });
      engine.setImage({ ...image, name: 'other.png' });
      const snap = engine.getSnapshot();
      expect(snap.history).toHaveLength(1);
      expect(snap.interaction.pendingPoints).toEqual([]);
      expect(snap.interaction.guideAnchor).toBeNull();
      expect(snap.interaction.toolMode).toBe('line');
    });
  });

  describe('tools', () => {
    beforeEach(() => engine.setImage(image));

    it('shows the tool hint on selection', () => {
      engine.selectTool('line');
      expect(lastStatus()).toEqual({ text: 'Line: click two points to measure', type: 'info' });
      engine.selectTool('polyline');
      expect(lastStatus().text).toBe('Polyline: click points; right-click to finish');
    });

    it('ignores clicks while idle or outside the image', () => {
      expect(engine.addPoint({ x: 10, y: 10 })).toBe(false);
      engine.selectTool('line');
      expect(engine.addPoint({ x: 200, y: 50 })).toBe(false);
      expect(engine.addPoint({ x: -1, y: 50 })).toBe(false);
      expect(engine.getSnapshot().interaction.pendingPoints).toEqual([]);
    });

    it('completes a line on the second point and stays in line mode', () => {
      const added = vi.fn();
      engine.on('measureAdded', added);
      addLine({ x: 10, y: 10 }, { x: 13, y: 14 });

      const snap = engine.getSnapshot();
      expect(snap.history).toHaveLength(1);
      expect(snap.history[0]).toMatchObject({ kind: 'line', lengthValue: 5, units: 'px', displayLabel: '5.0 px' });
      expect(snap.interaction.toolMode).toBe('line');
      expect(snap.interaction.pendingPoints).toEqual([]);
      expect(snap.interaction.guideAnchor).toEqual({ x: 13, y: 14 });
      expect(added).toHaveBeenCalledTimes(1);
      expect(added).toHaveBeenCalledWith(snap.history[0]);
      expect(historyChanges).toBe(1);
    });

    it('finishes a polyline on right-click', () => {
      engine.selectTool('polyline');
      engine.addPoint({ x: 0, y: 0 });
      engine.addPoint({ x: 30, y: 40 });
      engine.addPoint({ x: 30, y: 50 });
      engine.pointerDown('right', { x: 0, y: 0 });

      const snap = engine.getSnapshot();
      expect(snap.history).toHaveLength(1);
      expect(snap.history[0]).toMatchObject({ kind: 'polyline', lengthValue: 60, displayLabel: '60.0 px' });
      expect(snap.history[0].points).toHaveLength(3);
      expect(snap.interaction.toolMode).toBe('polyline');
      expect(snap.interaction.pendingPoints).toEqual([]);
    });

    it('cancels a polyline of one point on right-click', () => {
      engine.selectTool('polyline');
      engine.addPoint({ x: 5, y: 5 });
      engine.finishOrCancel();
      const snap = engine.getSnapshot();
      expect(snap.history).toHaveLength(0);
      expect(snap.interaction.toolMode).toBe('idle');
      expect(snap.interaction.guideAnchor).toBeNull();
    });

    it('keeps the guide anchor across tool switches until idle', () => {
      engine.selectTool('line');
      engine.addPoint({ x: 20, y: 30 });
      engine.selectTool('polyline');
      expect(engine.getSnapshot().interaction.guideAnchor).toEqual({ x: 20, y: 30 });
      expect(engine.getSnapshot().interaction.pendingPoints).toEqual([]);
      engine.cancel();
      expect(engine.getSnapshot().interaction.guideAnchor).toBeNull();
    });
  });

  describe('calibration', () => {
    beforeEach(() => engine.setImage(image));

    const pickReference = (a = { x: 0, y: 0 }, b = { x: 100, y: 0 }) => {
      engine.selectTool('calibrate');
      engine.addPoint(a);
      engine.addPoint(b);
    };

    it('waits for the real length after two points', () => {
      pickReference();
      expect(engine.getSnapshot().interaction.awaitingCalibration).toBe(true);
      expect(lastStatus().text).toBe('Calibration: enter the known length of the reference');
      expect(engine.addPoint({ x: 50, y: 50 })).toBe(false);
    });

    it('applies the scale and returns to idle', () => {
      pickReference();
      expect(engine.finishCalibration(50, 'mm')).toBe(true);
      const snap = engine.getSnapshot();
      expect(snap.calibration).toEqual({ scaleUnitsPerPixel: 0.5, units: 'mm' });
      expect(snap.interaction.toolMode).toBe('idle');
      expect(snap.interaction.pendingPoints).toEqual([]);
      expect(lastStatus()).toEqual({ text: 'Calibrated: 0.500000 mm/px (dpx=100.00)', type: 'success' });
    });

    it('recomputes existing measurements in the new units', () => {
      addLine({ x: 0, y: 0 }, { x: 3, y: 4 });
      historyChanges = 0;
      pickReference();
      engine.finishCalibration(50, 'mm');
      const [m] = engine.getSnapshot().history;
      expect(m.lengthValue).toBe(2.5);
      expect(m.units).toBe('mm');
      expect(m.displayLabel).toBe('2.500 mm');
      expect(historyChanges).toBe(1);
    });

    it('does not notify history when there is none to recompute', () => {
      pickReference();
      engine.finishCalibration(50, 'mm');
      expect(historyChanges).toBe(0);
    });

    it('fails immediately on coincident points', () => {
      pickReference({ x: 5, y: 5 }, { x: 5, y: 5 });
      const snap = engine.getSnapshot();
      expect(lastStatus()).toEqual({ text: 'Calibration failed: zero distance', type: 'error' });
      expect(snap.interaction.toolMode).toBe('idle');
      expect(snap.interaction.awaitingCalibration).toBe(false);
      expect(snap.calibration).toEqual({ scaleUnitsPerPixel: 1, units: 'px' });
    });

    it('rejects a non-positive length and keeps the old scale', () => {
      pickReference();
      expect(engine.finishCalibration(Number.NaN, 'mm')).toBe(false);
      expect(lastStatus()).toEqual({ text: 'Calibration failed: enter a positive real length', type: 'error' });
      expect(engine.getSnapshot().calibration.units).toBe('px');
      expect(engine.getSnapshot().interaction.toolMode).toBe('idle');
    });

    it('can be canceled while waiting for the length', () => {
      pickReference();
      engine.cancelCalibration();
      expect(lastStatus().text).toBe('Calibration canceled');
      expect(engine.getSnapshot().interaction.awaitingCalibration).toBe(false);
      expect(engine.finishCalibration(50, 'mm')).toBe(false);
    });

    it('depends only on the latest reference', () => {
      addLine({ x: 0, y: 0 }, { x: 40, y: 0 });
      pickReference();
      engine.finishCalibration(50, 'mm');
      expect(engine.getSnapshot().history[0]).toMatchObject({ lengthValue: 20, displayLabel: '20.00 mm' });

      pickReference({ x: 0, y: 0 }, { x: 0, y: 40 });
      engine.finishCalibration(10, 'cm');
      expect(engine.getSnapshot().calibration).toEqual({ scaleUnitsPerPixel: 0.25, units: 'cm' });
      expect(engine.getSnapshot().history[0]).toMatchObject({ lengthValue: 10, displayLabel: '10.00 cm' });
    });

    it('rejects a length the prompt cannot fully parse', () => {
      pickReference();
      expect(engine.finishCalibration(parseRealLength('1.234,5'), 'mm')).toBe(false);
      expect(lastStatus()).toEqual({ text: 'Calibration failed: enter a positive real length', type: 'error' });
      expect(engine.getSnapshot().calibration).toEqual({ scaleUnitsPerPixel: 1, units: 'px' });
    });

    it('falls back to the previous units for a blank label', () => {
      pickReference();
      engine.finishCalibration(50, 'cm');
      pickReference({ x: 0, y: 0 }, { x: 0, y: 50 });
      engine.finishCalibration(10, ' ');
      expect(engine.getSnapshot().calibration).toEqual({ scaleUnitsPerPixel: 0.2, units: 'cm' });
    });
  });

  describe('pointer gestures', () => {
    beforeEach(() => engine.setImage(image));

    it('adds a point at the image position under a left click', () => {
      engine.selectTool('line');
      engine.setZoomAnchored(2, { x: 0, y: 0 });
      engine.pointerDown('left', { x: 40, y: 60 });
      expect(engine.getSnapshot().interaction.pendingPoints).toEqual([{ x: 20, y: 30 }]);
    });

    it('pans with a middle drag and ignores other buttons releasing', () => {
      engine.selectTool('line');
      engine.pointerDown('middle', { x: 0, y: 0 });
      engine.pointerMove({ x: 15, y: -5 });
      expect(engine.getSnapshot().view).toEqual({ x: 15, y: -5, scale: 1 });
      expect(engine.getSnapshot().isPanning).toBe(true);

      engine.pointerUp('left');
      expect(engine.getSnapshot().isPanning).toBe(true);
      engine.pointerUp('middle');
      expect(engine.getSnapshot().isPanning).toBe(false);
      expect(engine.getSnapshot().interaction.pendingPoints).toEqual([]);
    });

    it('pans with a left drag while space is held', () => {
      engine.selectTool('line');
      engine.setSpaceHeld(true);
      engine.pointerDown('left', { x: 10, y: 10 });
      engine.pointerMove({ x: 20, y: 30 });
      engine.pointerUp('left');
      const snap = engine.getSnapshot();
      expect(snap.view).toEqual({ x: 10, y: 20, scale: 1 });
      expect(snap.interaction.pendingPoints).toEqual([]);
    });

    it('keeps a wheel zoom made during a drag', () => {
      engine.pointerDown('middle', { x: 0, y: 0 });
      engine.pointerMove({ x: 10, y: 0 });
      engine.wheel(1, { x: 0, y: 0 });
      expect(engine.getSnapshot().view).toEqual({ x: 12.5, y: 0, scale: 1.25 });

      engine.pointerMove({ x: 15, y: 0 });
      expect(engine.getSnapshot().view).toEqual({ x: 17.5, y: 0, scale: 1.25 });
    });

    it('keeps a view reset made during a drag', () => {
      engine.pointerDown('middle', { x: 0, y: 0 });
      engine.pointerMove({ x: 10, y: 0 });
      engine.resetView();
      engine.pointerMove({ x: 14, y: 0 });
      expect(engine.getSnapshot().view).toEqual({ x: 4, y: 0, scale: 1 });
    });

    it('ignores a zoom request that is not a positive number', () => {
      engine.setZoomAnchored(2, { x: 0, y: 0 });
      engine.setZoomAnchored(Number.NaN, { x: 10, y: 10 });
      expect(engine.getSnapshot().view).toEqual({ x: 0, y: 0, scale: 2 });
    });

    it('zooms one wheel step around the cursor', () => {
      engine.wheel(1, { x: 100, y: 50 });
      expect(engine.getSnapshot().view).toEqual({ x: -25, y: -12.5, scale: 1.25 });
    });

    it('tracks the cursor in both coordinate spaces', () => {
      engine.pan({ x: 10, y: 0 });
      engine.setZoomAnchored(2, { x: 10, y: 0 });
      engine.pointerMove({ x: 30, y: 40 });
      expect(engine.getSnapshot().cursor).toEqual({ view: { x: 30, y: 40 }, image: { x: 10, y: 20 } });
      engine.pointerLeave();
      expect(engine.getSnapshot().cursor).toBeNull();
    });
  });

  it('ignores the wheel and clicks without an image', () => {
    const before = engine.getSnapshot();
    engine.wheel(1, { x: 10, y: 10 });
    engine.selectTool('line');
    engine.pointerDown('left', { x: 10, y: 10 });
    engine.pointerMove({ x: 5, y: 5 });
    const snap = engine.getSnapshot();
    expect(snap.view).toBe(before.view);
    expect(snap.cursor).toBeNull();
    expect(snap.interaction.pendingPoints).toEqual([]);
  });

  describe('history', () => {
    beforeEach(() => engine.setImage(image));

    it('ignores undo on an empty history', () => {
      const count = statuses.length;
      expect(engine.undoLast()).toBe(false);
      expect(statuses).toHaveLength(count);
      expect(historyChanges).toBe(0);
    });

    it('undoes the last measurement', () => {
      addLine({ x: 0, y: 0 }, { x: 10, y: 0 });
      addLine({ x: 0, y: 0 }, { x: 20, y: 0 });
      expect(engine.undoLast()).toBe(true);
      const { history } = engine.getSnapshot();
      expect(history).toHaveLength(1);
      expect(history[0].lengthValue).toBe(10);
      expect(lastStatus().text).toBe('Last measurement undone');
    });

    it('deletes several rows in one batch', () => {
      addLine({ x: 0, y: 0 }, { x: 10, y: 0 });
      addLine({ x: 0, y: 0 }, { x: 20, y: 0 });
      addLine({ x: 0, y: 0 }, { x: 30, y: 0 });
      historyChanges = 0;

      expect(engine.deleteAt([0, 2, 2, 7, -1, 1.5])).toBe(2);
      const { history } = engine.getSnapshot();
      expect(history.map(m => m.lengthValue)).toEqual([20]);
      expect(historyChanges).toBe(1);
      expect(lastStatus().text).toBe('Selected measurement(s) deleted');
    });

    it('does nothing when no index is valid', () => {
      addLine({ x: 0, y: 0 }, { x: 10, y: 0 });
      historyChanges = 0;
      expect(engine.deleteAt([5, -2])).toBe(0);
      expect(historyChanges).toBe(0);
      expect(engine.getSnapshot().history).toHaveLength(1);
    });

    it('clears measurements and notifies only when there were some', () => {
      engine.selectTool('line');
      engine.addPoint({ x: 5, y: 5 });
      const count = statuses.length;
      engine.clearMeasurements();
      expect(statuses).toHaveLength(count);
      expect(historyChanges).toBe(0);
      expect(engine.getSnapshot().interaction.pendingPoints).toEqual([]);

      addLine({ x: 0, y: 0 }, { x: 10, y: 0 });
      engine.clearMeasurements();
      expect(engine.getSnapshot().history).toEqual([]);
      expect(lastStatus().text).toBe('Measurements cleared');
    });

    it('clears the image and history but keeps calibration and tool', () => {
      engine.selectTool('calibrate');
      engine.addPoint({ x: 0, y: 0 });
      engine.addPoint({ x: 100, y: 0 });
      engine.finishCalibration(50, 'mm');
      addLine({ x: 0, y: 0 }, { x: 10, y: 0 });
      historyChanges = 0;

      engine.clearAll();
      const snap = engine.getSnapshot();
      expect(snap.image).toBeNull();
      expect(snap.history).toEqual([]);
      expect(snap.calibration).toEqual({ scaleUnitsPerPixel: 0.5, units: 'mm' });
      expect(snap.interaction.toolMode).toBe('line');
      expect(lastStatus().text).toBe('Image and measurements cleared');
      expect(historyChanges).toBe(1);
    });
  });

  describe('observation', () => {
    it('publishes a new snapshot without touching older ones', () => {
      engine.setImage(image);
      const listener = vi.fn();
      engine.subscribe(listener);
      const before = engine.getSnapshot();

      addLine({ x: 0, y: 0 }, { x: 10, y: 0 });

      expect(before.history).toHaveLength(0);
      expect(engine.getSnapshot().history).toHaveLength(1);
      expect(listener).toHaveBeenCalled();
    });

    it('stops notifying after unsubscribe', () => {
      const listener = vi.fn();
      const unsubscribe = engine.subscribe(listener);
      unsubscribe();
      engine.resetView();
      expect(listener).not.toHaveBeenCalled();
    });

    it('applies custom zoom limits', () => {
      const limited = new MeasureEngine({ maxZoom: 2 });
      limited.setImage(image);
      limited.setZoomAnchored(10, { x: 0, y: 0 });
      expect(limited.getSnapshot().view.scale).toBe(2);
    });
  });
});
