import { useState, useCallback, useEffect, useRef, type MouseEvent as ReactMouseEvent, type RefObject } from 'react';
import type { ImageDimensions, Point, PointerButton } from '../types';
import type { MeasureEngine } from '../core/measureEngine';
import { accumulateWheel } from '../core/viewTransform';

interface UseCanvasTransformProps {
  engine: MeasureEngine;
  containerRef: RefObject<HTMLDivElement | null>;
}

const BUTTONS: Record<number, PointerButton> = { 0: 'left', 1: 'middle', 2: 'right' };

/**
 * Binds DOM pointer and wheel events on the canvas container to the engine.
 * View space is the container's own pixel grid, origin top-left.
 */
export function useCanvasTransform({ engine, containerRef }: UseCanvasTransformProps) {
  const [viewport, setViewport] = useState<ImageDimensions>({ width: 0, height: 0 });

  const getViewPoint = useCallback((clientX: number, clientY: number): Point | null => {
    if (!containerRef.current) return null;
    const rect = containerRef.current.getBoundingClientRect();
    return { x: clientX - rect.left, y: clientY - rect.top };
  }, [containerRef]);

  useEffect(() => {
    const el = containerRef.current;
    if (!el) return;
    const observer = new ResizeObserver(entries => {
      const box = entries[0]?.contentRect;
      if (box) setViewport({ width: box.width, height: box.height });
    });
    observer.observe(el);
    return () => observer.disconnect();
  }, [containerRef]);

  const wheelRemainder = useRef(0);

  // React registers wheel listeners as passive, so zoom is bound natively.
  // Trackpads send many small deltas; only whole notches zoom.
  useEffect(() => {
    const el = containerRef.current;
    if (!el) return;
    const handleWheel = (e: WheelEvent) => {
      e.preventDefault();
      const p = getViewPoint(e.clientX, e.clientY);
      if (!p) return;
      const { steps, remainder } = accumulateWheel(wheelRemainder.current, e.deltaY, e.deltaMode);
      wheelRemainder.current = remainder;
      for (let i = 0; i < Math.abs(steps); i++) engine.wheel(-Math.sign(steps), p);
    };
    el.addEventListener('wheel', handleWheel, { passive: false });
    return () => el.removeEventListener('wheel', handleWheel);
  }, [containerRef, engine, getViewPoint]);

  const handleMouseDown = useCallback((e: ReactMouseEvent) => {
    const button = BUTTONS[e.button];
    const p = getViewPoint(e.clientX, e.clientY);
    if (!button || !p) return;
    if (button === 'middle') e.preventDefault(); // no autoscroll
    containerRef.current?.focus();
    engine.pointerDown(button, p);
  }, [engine, getViewPoint, containerRef]);

  const handleMouseMove = useCallback((e: ReactMouseEvent) => {
    const p = getViewPoint(e.clientX, e.clientY);
    if (p) engine.pointerMove(p);
  }, [engine, getViewPoint]);

  // Released outside the canvas still ends a pan drag.
  useEffect(() => {
    const handleMouseUp = (e: MouseEvent) => {
      const button = BUTTONS[e.button];
      if (button) engine.pointerUp(button);
    };
    window.addEventListener('mouseup', handleMouseUp);
    return () => window.removeEventListener('mouseup', handleMouseUp);
  }, [engine]);

  const handleMouseLeave = useCallback(() => engine.pointerLeave(), [engine]);

  const handleContextMenu = useCallback((e: ReactMouseEvent) => e.preventDefault(), []);

  return {
    viewport,
    handlers: {
      onMouseDown: handleMouseDown,
      onMouseMove: handleMouseMove,
      onMouseLeave: handleMouseLeave,
      onContextMenu: handleContextMenu
    }
  };
}
