import React from 'react';
import { Crosshair, Scale, Info } from 'lucide-react';
import type { CalibrationState, CursorInfo, StatusMessage } from '../types';
import { formatCursor, formatScale } from '../core/formatting';

interface StatusBarProps {
  cursor: CursorInfo | null;
  calibration: CalibrationState;
  zoom: number;
  status: StatusMessage | null;
}

const STATUS_COLORS = {
  info: 'text-slate-300',
  success: 'text-emerald-400',
  error: 'text-red-400'
};

export const StatusBar: React.FC<StatusBarProps> = ({ cursor, calibration, zoom, status }) => {
  return (
    <div className="h-9 bg-slate-900/90 backdrop-blur-md border-t border-slate-800 flex items-center justify-between px-4 shrink-0 gap-6">
      <div className="flex items-center gap-2 min-w-0">
        <Info size={14} className="text-indigo-400 shrink-0" />
        <span className={`text-[11px] truncate ${status ? STATUS_COLORS[status.type] : 'text-slate-600 italic'}`}>
          {status?.text ?? 'Ready'}
        </span>
      </div>

      <div className="flex items-center gap-6 shrink-0 font-mono text-[11px]">
        <div className="flex items-center gap-2">
          <Crosshair size={14} className="text-slate-500" />
          {cursor ? (
            <span className="text-white w-[140px]">{formatCursor(cursor.image)}</span>
          ) : (
            <span className="text-slate-600 italic w-[140px]">Outside image</span>
          )}
        </div>
        <div className="flex items-center gap-2">
          <Scale size={14} className="text-slate-500" />
          <span className="text-white">{formatScale(calibration)}</span>
        </div>
        <span className="text-slate-500 w-[52px] text-right">{Math.round(zoom * 100)}%</span>
      </div>
    </div>
  );
};
