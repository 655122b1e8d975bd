import { useEffect, useState, useSyncExternalStore } from 'react';
import type { EngineOptions, StatusMessage } from '../types';
import { MeasureEngine } from '../core/measureEngine';

/**
 * One engine per mounted app. The snapshot re-renders subscribers on every
 * engine change; `status` keeps the last message for the status bar.
 */
export function useMeasureEngine(options?: Partial<EngineOptions>) {
  const [engine] = useState(() => new MeasureEngine(options));
  const snapshot = useSyncExternalStore(engine.subscribe, engine.getSnapshot);
  const [status, setStatus] = useState<StatusMessage | null>(null);

  useEffect(() => engine.on('status', setStatus), [engine]);

  return { engine, snapshot, status };
}
