import { useEffect } from 'react';
import type { MeasureEngine } from '../core/measureEngine';
import { isTypingTarget } from '../utils';

interface UseKeyboardShortcutsProps {
  engine: MeasureEngine;
  openImage: () => void;
  exportCsv: () => void;
}

/**
 * Global hotkeys: C / L / P select a tool, Esc cancels, R resets the view,
 * Ctrl+Z undoes, Ctrl+O opens, Ctrl+E exports CSV. Holding Space turns a
 * left-drag into a pan. Ctrl+V is handled by the paste listener.
 */
export function useKeyboardShortcuts({ engine, openImage, exportCsv }: UseKeyboardShortcutsProps) {
  useEffect(() => {
    const handleKeyDown = (e: KeyboardEvent) => {
      if (isTypingTarget(e.target)) return;
      const ctrl = e.ctrlKey || e.metaKey;

      if (e.code === 'Space') {
        e.preventDefault();
        engine.setSpaceHeld(true);
        return;
      }
      if (e.key === 'Escape') {
        engine.cancel();
        return;
      }

      if (ctrl) {
        switch (e.key.toLowerCase()) {
          case 'z': e.preventDefault(); engine.undoLast(); return;
          case 'o': e.preventDefault(); openImage(); return;
          case 'e': e.preventDefault(); exportCsv(); return;
        }
        return;
      }
      if (e.altKey || e.repeat) return;

      switch (e.key.toLowerCase()) {
        case 'c': engine.selectTool('calibrate'); break;
        case 'l': engine.selectTool('line'); break;
        case 'p': engine.selectTool('polyline'); break;
        case 'r': engine.resetView(); break;
      }
    };

    const handleKeyUp = (e: KeyboardEvent) => {
      if (e.code === 'Space') engine.setSpaceHeld(false);
    };
    // a lost window focus must not leave Space stuck down
    const handleBlur = () => engine.setSpaceHeld(false);

    window.addEventListener('keydown', handleKeyDown);
    window.addEventListener('keyup', handleKeyUp);
    window.addEventListener('blur', handleBlur);
    return () => {
      window.removeEventListener('keydown', handleKeyDown);
      window.removeEventListener('keyup', handleKeyUp);
      window.removeEventListener('blur', handleBlur);
    };
  }, [engine, openImage, exportCsv]);
}
