import React, { useMemo, useRef } from 'react';
import { ImagePlus } from 'lucide-react';
import type { EngineSnapshot } from '../types';
import type { MeasureEngine } from '../core/measureEngine';
import { buildScene } from '../core/scene';
import { useCanvasTransform } from '../hooks/useCanvasTransform';
import { SceneLayer } from './CanvasLayers';

interface ImageCanvasProps {
  engine: MeasureEngine;
  snapshot: EngineSnapshot;
}

const cursorFor = (snapshot: EngineSnapshot): string => {
  if (snapshot.isPanning) return 'grabbing';
  if (snapshot.spaceHeld) return 'grab';
  if (snapshot.interaction.toolMode !== 'idle') return 'crosshair';
  return 'default';
};

export const ImageCanvas: React.FC<ImageCanvasProps> = ({ engine, snapshot }) => {
  const containerRef = useRef<HTMLDivElement>(null);
  const { viewport, handlers } = useCanvasTransform({ engine, containerRef });
  const scene = useMemo(() => buildScene(snapshot, viewport), [snapshot, viewport]);

  return (
    <div
      ref={containerRef}
      tabIndex={0}
      className="relative flex-1 min-h-0 overflow-hidden bg-slate-950 outline-none select-none"
      style={{ cursor: cursorFor(snapshot) }}
      {...handlers}
    >
      {snapshot.image && scene.imageRect ? (
        <svg className="absolute inset-0" width={viewport.width} height={viewport.height}>
          <image
            href={snapshot.image.src}
            x={scene.imageRect.x}
            y={scene.imageRect.y}
            width={scene.imageRect.width}
            height={scene.imageRect.height}
            preserveAspectRatio="none"
            style={{ imageRendering: snapshot.view.scale >= 2 ? 'pixelated' : 'auto' }}
          />
          <SceneLayer commands={scene.commands} />
        </svg>
      ) : (
        <div className="absolute inset-0 flex flex-col items-center justify-center gap-3 text-slate-600 pointer-events-none">
          <ImagePlus size={48} strokeWidth={1} />
          <p className="text-sm">Paste a screenshot (Ctrl+V) or open an image (Ctrl+O)</p>
        </div>
      )}
    </div>
  );
};
