import React, { useState, useEffect, useRef } from 'react';
import { Button } from './Button';
import { parseRealLength } from '../core/calibration';
import { DEFAULT_CALIBRATION_UNITS, DEFAULT_REAL_LENGTH, PIXEL_UNITS, UNIT_SUGGESTIONS } from '../constants';

interface PromptModalProps {
  isOpen: boolean;
  title: string;
  description?: string;
  /** Units of the current calibration; pixel units fall back to the default. */
  currentUnits: string;
  onConfirm: (realLength: number, units: string) => void;
  onCancel: () => void;
}

/** Asks for the known length of the reference segment and its units. */
export const PromptModal: React.FC<PromptModalProps> = ({
  isOpen,
  title,
  description,
  currentUnits,
  onConfirm,
  onCancel
}) => {
  const initialUnits = currentUnits === PIXEL_UNITS ? DEFAULT_CALIBRATION_UNITS : currentUnits;
  const [val, setVal] = useState(DEFAULT_REAL_LENGTH);
  const [unit, setUnit] = useState(initialUnits);
  const inputRef = useRef<HTMLInputElement>(null);

  useEffect(() => {
    if (!isOpen) return;
    setVal(DEFAULT_REAL_LENGTH);
    setUnit(initialUnits);
    const timer = setTimeout(() => inputRef.current?.select(), 50);
    return () => clearTimeout(timer);
  }, [isOpen, initialUnits]);

  if (!isOpen) return null;

  // Unparseable text becomes NaN and is rejected by the engine.
  const handleConfirm = () => onConfirm(parseRealLength(val), unit);

  const handleKeyDown = (e: React.KeyboardEvent) => {
    if (e.key === 'Enter') { e.stopPropagation(); handleConfirm(); }
    if (e.key === 'Escape') { e.stopPropagation(); onCancel(); }
  };

  return (
    <div className="fixed inset-0 z-[200] flex items-center justify-center bg-black/60 backdrop-blur-sm">
      <div className="bg-slate-900 border border-slate-700 p-6 rounded-xl shadow-2xl w-96 space-y-4">
        <div className="space-y-1">
          <h3 className="text-lg font-bold text-white">{title}</h3>
          {description && <p className="text-xs text-slate-400 leading-relaxed">{description}</p>}
        </div>

        <div className="flex gap-2">
          <input
            ref={inputRef}
            type="text"
            inputMode="decimal"
            value={val}
            onChange={(e) => setVal(e.target.value)}
            onKeyDown={handleKeyDown}
            className="flex-1 min-w-0 bg-slate-800 border border-slate-700 rounded-lg px-4 py-2 text-white outline-none focus:border-indigo-500 transition-colors"
            placeholder="Real length"
          />
          <input
            type="text"
            list="calibration-units"
            value={unit}
            onChange={(e) => setUnit(e.target.value)}
            onKeyDown={handleKeyDown}
            className="w-24 bg-slate-800 border border-slate-700 rounded-lg px-3 py-2 text-sm text-slate-200 outline-none focus:border-indigo-500 transition-colors"
            placeholder="units"
          />
          <datalist id="calibration-units">
            {UNIT_SUGGESTIONS.map(u => <option key={u} value={u} />)}
          </datalist>
        </div>

        <div className="flex gap-3 pt-2">
          <Button variant="secondary" className="flex-1 justify-center" onClick={onCancel}>Cancel</Button>
          <Button variant="primary" className="flex-1 justify-center" onClick={handleConfirm}>Calibrate</Button>
        </div>
      </div>
    </div>
  );
};
