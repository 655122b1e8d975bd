import { useCallback, useEffect, useRef, type ChangeEvent } from 'react';
import type { ExportImageFormat, RasterImage } from '../types';
import type { MeasureEngine } from '../core/measureEngine';
import { buildExportScene } from '../core/scene';
import { isMeasureError } from '../core/errors';
import { imageFromPasteEvent, loadImageFile, readClipboardImage, releaseImage } from '../utils/imageUtils';
import { exportAnnotatedImage, exportMeasurementsCsv } from '../utils/exportUtils';
import { isTypingTarget } from '../utils';
import { CSV_FILE_NAME } from '../constants';

const AUTO_PASTE_TIP = 'Tip: copy a screenshot, then press Ctrl+V here. Or use Ctrl+O to open a file.';

/** Clear all, also revoking the object URL of the discarded image. */
export const discardImageAndMeasurements = (engine: MeasureEngine) => {
  releaseImage(engine.getSnapshot().image);
  engine.clearAll();
};

/**
 * Image loading (file, clipboard, paste event) and the two exports. Failures
 * become status messages; the engine keeps its last good state.
 */
export function useFileActions(engine: MeasureEngine) {
  const fileInputRef = useRef<HTMLInputElement>(null);

  const report = useCallback((err: unknown) => {
    if (!isMeasureError(err)) console.error('File action failed:', err);
    engine.reportError(err);
  }, [engine]);

  const applyImage = useCallback((image: RasterImage) => {
    releaseImage(engine.getSnapshot().image);
    engine.setImage(image);
  }, [engine]);

  const clearAll = useCallback(() => discardImageAndMeasurements(engine), [engine]);

  const openImageDialog = useCallback(() => fileInputRef.current?.click(), []);

  const handleFileChange = useCallback(async (e: ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    e.target.value = '';
    if (!file) return;
    try {
      applyImage(await loadImageFile(file));
    } catch (err) {
      report(err);
    }
  }, [applyImage, report]);

  const pasteFromClipboard = useCallback(async () => {
    try {
      applyImage(await readClipboardImage());
    } catch (err) {
      report(err);
    }
  }, [applyImage, report]);

  // Ctrl+V arrives as a paste event, which carries the data without a permission prompt.
  useEffect(() => {
    const handlePaste = (e: ClipboardEvent) => {
      if (isTypingTarget(e.target)) return;
      e.preventDefault();
      imageFromPasteEvent(e).then(applyImage, report);
    };
    window.addEventListener('paste', handlePaste);
    return () => window.removeEventListener('paste', handlePaste);
  }, [applyImage, report]);

  // One attempt at start-up; browsers may refuse clipboard reads without a gesture.
  useEffect(() => {
    let cancelled = false;
    readClipboardImage().then(
      image => {
        if (cancelled) releaseImage(image);
        else applyImage(image);
      },
      err => {
        if (cancelled) return;
        if (!isMeasureError(err)) console.warn('Clipboard auto-paste unavailable:', err);
        engine.setStatus(AUTO_PASTE_TIP);
      }
    );
    return () => { cancelled = true; };
  }, [engine, applyImage]);

  const exportCsv = useCallback(() => {
    const { history } = engine.getSnapshot();
    try {
      const count = exportMeasurementsCsv(history);
      if (count === 0) engine.setStatus('Nothing to export');
      else engine.setStatus(`Exported ${count} items to ${CSV_FILE_NAME}`, 'success');
    } catch (err) {
      report(err);
    }
  }, [engine, report]);

  const exportImage = useCallback(async (format: ExportImageFormat = 'png') => {
    const snapshot = engine.getSnapshot();
    if (!snapshot.image) {
      engine.setStatus('Nothing to export: no image');
      return;
    }
    try {
      const fileName = await exportAnnotatedImage(snapshot.image, buildExportScene(snapshot).commands, format);
      engine.setStatus(`Annotated image saved: ${fileName}`, 'success');
    } catch (err) {
      report(err);
    }
  }, [engine, report]);

  return { fileInputRef, openImageDialog, handleFileChange, pasteFromClipboard, exportCsv, exportImage, clearAll };
}
