import React from 'react';
import { Scale, Ruler, Spline, MousePointer2, Maximize } from 'lucide-react';
import { Button } from '../Button';
import type { GuideSettings, ToolMode } from '../../types';

export interface MeasurementToolsPanelProps {
  toolMode: ToolMode;
  hasImage: boolean;
  guides: GuideSettings;
  selectTool: (mode: ToolMode) => void;
  setGuides: (next: Partial<GuideSettings>) => void;
  resetView: () => void;
}

const TOOLS: { mode: ToolMode; label: string; shortcut: string; icon: React.ReactNode }[] = [
  { mode: 'calibrate', label: 'Calibrate', shortcut: 'C', icon: <Scale size={14} /> },
  { mode: 'line', label: 'Line', shortcut: 'L', icon: <Ruler size={14} /> },
  { mode: 'polyline', label: 'Polyline', shortcut: 'P', icon: <Spline size={14} /> }
];

const GUIDE_TOGGLES: { key: keyof GuideSettings; label: string }[] = [
  { key: 'horizontal', label: 'Horizontal' },
  { key: 'vertical', label: 'Vertical' },
  { key: 'diagonal', label: 'Diagonal 45°' }
];

export const MeasurementToolsPanel: React.FC<MeasurementToolsPanelProps> = ({
  toolMode,
  hasImage,
  guides,
  selectTool,
  setGuides,
  resetView
}) => {
  return (
    <div className="space-y-4">
      <div className="grid grid-cols-1 gap-2">
        {TOOLS.map(tool => (
          <Button
            key={tool.mode}
            className="h-9"
            active={toolMode === tool.mode}
            onClick={() => selectTool(tool.mode)}
            icon={tool.icon}
            shortcut={tool.shortcut}
          >
            {tool.label}
          </Button>
        ))}
        <div className="grid grid-cols-2 gap-2">
          <Button variant="ghost" className="h-8" onClick={() => selectTool('idle')} disabled={toolMode === 'idle'} icon={<MousePointer2 size={14} />} shortcut="Esc">Idle</Button>
          <Button variant="ghost" className="h-8" onClick={resetView} disabled={!hasImage} icon={<Maximize size={14} />} shortcut="R">Reset view</Button>
        </div>
      </div>

      <div className="space-y-2 pt-2 border-t border-slate-800">
        <h3 className="text-[10px] font-bold text-slate-500 uppercase">Guides</h3>
        {GUIDE_TOGGLES.map(({ key, label }) => (
          <label key={key} className="flex items-center gap-2 text-[11px] text-slate-300 cursor-pointer">
            <input
              type="checkbox"
              checked={guides[key]}
              onChange={(e) => {
                const next: Partial<GuideSettings> = {};
                next[key] = e.target.checked;
                setGuides(next);
              }}
              className="accent-indigo-500"
            />
            {label}
          </label>
        ))}
      </div>
    </div>
  );
};
