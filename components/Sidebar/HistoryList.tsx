import React, { useEffect, useState } from 'react';
import type { Measurement } from '../../types';
import { formatHistoryEntry } from '../../core/formatting';

interface HistoryListProps {
  history: readonly Measurement[];
  deleteAt: (indices: readonly number[]) => number;
}

/**
 * Measurement log in insertion order. Click selects, Ctrl/Shift-click extends
 * the selection, Delete or Backspace removes the selected rows.
 */
export const HistoryList: React.FC<HistoryListProps> = ({ history, deleteAt }) => {
  const [selected, setSelected] = useState<ReadonlySet<number>>(new Set());
  const [anchor, setAnchor] = useState<number | null>(null);

  // Row indices shift whenever the list changes underneath.
  useEffect(() => {
    setSelected(new Set());
    setAnchor(null);
  }, [history]);

  const handleClick = (e: React.MouseEvent, index: number) => {
    if (e.shiftKey && anchor !== null) {
      const [lo, hi] = anchor < index ? [anchor, index] : [index, anchor];
      setSelected(new Set(Array.from({ length: hi - lo + 1 }, (_, i) => lo + i)));
      return;
    }
    setAnchor(index);
    if (e.ctrlKey || e.metaKey) {
      setSelected(prev => {
        const next = new Set(prev);
        if (next.has(index)) next.delete(index);
        else next.add(index);
        return next;
      });
    } else {
      setSelected(new Set([index]));
    }
  };

  const handleKeyDown = (e: React.KeyboardEvent) => {
    if ((e.key === 'Delete' || e.key === 'Backspace') && selected.size > 0) {
      e.preventDefault();
      deleteAt(Array.from(selected));
    }
  };

  if (history.length === 0) {
    return <div className="text-[10px] text-slate-600 italic px-1">No measurements yet</div>;
  }

  return (
    <ul
      tabIndex={0}
      role="listbox"
      aria-multiselectable
      onKeyDown={handleKeyDown}
      className="flex-1 min-h-0 overflow-y-auto space-y-0.5 outline-none focus:ring-1 focus:ring-indigo-500/40 rounded-lg"
    >
      {history.map((m, i) => (
        <li
          key={m.id}
          role="option"
          aria-selected={selected.has(i)}
          onClick={(e) => handleClick(e, i)}
          className={`px-2 py-1 rounded font-mono text-[10px] cursor-pointer truncate ${selected.has(i) ? 'bg-indigo-600/30 text-white' : 'text-slate-300 hover:bg-white/5'}`}
        >
          {formatHistoryEntry(m)}
        </li>
      ))}
    </ul>
  );
};
