import React, { useState } from 'react';
import { ChevronDown, ChevronRight, Wrench, History, FolderOpen, ClipboardPaste, FileSpreadsheet, ImageDown, Undo2, Eraser, Ruler } from 'lucide-react';
import { Button } from '../Button';
import { MeasurementToolsPanel } from './MeasurementToolsPanel';
import { HistoryList } from './HistoryList';
import type { EngineSnapshot, ExportImageFormat } from '../../types';
import type { MeasureEngine } from '../../core/measureEngine';
import { formatScale } from '../../core/formatting';
import { PIXEL_UNITS } from '../../constants';

export interface SidebarProps {
  engine: MeasureEngine;
  snapshot: EngineSnapshot;
  openImageDialog: () => void;
  pasteFromClipboard: () => void;
  exportCsv: () => void;
  exportImage: (format: ExportImageFormat) => void;
  /** Discards the image (and its object URL) and all measurements. */
  clearAll: () => void;
}

interface SectionProps {
  title: string;
  icon: React.ReactNode;
  isOpen: boolean;
  onToggle: () => void;
  children: React.ReactNode;
  grow?: boolean;
}

const Section: React.FC<SectionProps> = ({ title, icon, isOpen, onToggle, children, grow }) => (
  <div className={`flex flex-col ${isOpen && grow ? 'flex-1 min-h-0' : 'flex-initial'} border-b border-slate-900`}>
    <div className={`flex items-center px-4 py-2.5 hover:bg-white/5 transition-colors cursor-pointer ${isOpen ? 'bg-slate-900/40 border-l-2 border-indigo-500' : 'border-l-2 border-transparent'}`} onClick={onToggle}>
      <span className={`shrink-0 ${isOpen ? 'text-indigo-400' : 'text-slate-500'}`}>{icon}</span>
      <span className={`ml-3 text-[11px] font-black uppercase tracking-widest leading-none flex-1 truncate min-w-0 ${isOpen ? 'text-white' : 'text-slate-400'}`}>
        {title}
      </span>
      {isOpen ? <ChevronDown size={14} className="text-slate-700 shrink-0" /> : <ChevronRight size={14} className="text-slate-700 shrink-0" />}
    </div>
    {isOpen && (
      <div className="flex-1 min-h-0 px-4 pt-3 pb-4 overflow-hidden flex flex-col">
        {children}
      </div>
    )}
  </div>
);

type SectionId = 'file' | 'tools' | 'history';

export const Sidebar: React.FC<SidebarProps> = ({
  engine, snapshot, openImageDialog, pasteFromClipboard, exportCsv, exportImage, clearAll
}) => {
  const [openSections, setOpenSections] = useState<ReadonlySet<SectionId>>(new Set<SectionId>(['file', 'tools', 'history']));
  const toggleSection = (id: SectionId) => setOpenSections(prev => {
    const next = new Set(prev);
    if (next.has(id)) next.delete(id);
    else next.add(id);
    return next;
  });

  const { image, calibration, history, interaction, guides } = snapshot;
  const calibrated = calibration.units !== PIXEL_UNITS;

  return (
    <div className="w-full md:w-[320px] bg-slate-950 border-r border-slate-900 flex flex-col shadow-2xl overflow-hidden shrink-0 h-full text-slate-200">
      <div className="px-5 py-4 border-b border-slate-900 flex items-center justify-between bg-slate-900/30 backdrop-blur-md shrink-0">
        <div className="flex items-center gap-2.5">
          <Ruler className="text-indigo-500" size={20} />
          <span className="font-black text-[12px] text-white tracking-tighter uppercase leading-none">Image Scale Measure</span>
        </div>
        <button onClick={clearAll} className="text-[9px] text-slate-500 hover:text-red-400 font-bold uppercase transition-colors">Clear all</button>
      </div>

      <div className="flex-1 flex flex-col min-h-0 overflow-hidden">
        <Section title="Image" icon={<FolderOpen size={15} />} isOpen={openSections.has('file')} onToggle={() => toggleSection('file')}>
          <div className="space-y-2">
            <div className="grid grid-cols-2 gap-2">
              <Button variant="primary" className="h-9" onClick={openImageDialog} icon={<FolderOpen size={14} />} shortcut="^O">Open</Button>
              <Button className="h-9" onClick={pasteFromClipboard} icon={<ClipboardPaste size={14} />} shortcut="^V">Paste</Button>
            </div>
            <div className="grid grid-cols-3 gap-2">
              <Button variant="ghost" className="h-8" onClick={exportCsv} icon={<FileSpreadsheet size={14} />}>CSV</Button>
              <Button variant="ghost" className="h-8" onClick={() => exportImage('png')} disabled={!image} icon={<ImageDown size={14} />}>PNG</Button>
              <Button variant="ghost" className="h-8" onClick={() => exportImage('jpeg')} disabled={!image} icon={<ImageDown size={14} />}>JPG</Button>
            </div>
            {image && (
              <div className="text-[10px] font-mono text-slate-500 truncate px-1">{image.name ?? 'clipboard'} · {image.width}×{image.height} px</div>
            )}
          </div>
        </Section>

        <Section title="Tools" icon={<Wrench size={15} />} isOpen={openSections.has('tools')} onToggle={() => toggleSection('tools')}>
          <div className={`mb-4 px-3 py-2 rounded-xl border flex flex-col gap-1 ${calibrated ? 'bg-emerald-500/5 border-emerald-500/20' : 'bg-amber-500/5 border-amber-500/20'}`}>
            <span className="text-[9px] font-bold text-slate-500 uppercase">Scale</span>
            <span className={`font-mono text-sm ${calibrated ? 'text-emerald-400' : 'text-amber-400'}`}>{formatScale(calibration)}</span>
          </div>
          <MeasurementToolsPanel
            toolMode={interaction.toolMode}
            hasImage={image !== null}
            guides={guides}
            selectTool={(mode) => engine.selectTool(mode)}
            setGuides={(next) => engine.setGuides(next)}
            resetView={() => engine.resetView()}
          />
        </Section>

        <Section title={`History (${history.length})`} icon={<History size={15} />} isOpen={openSections.has('history')} onToggle={() => toggleSection('history')} grow>
          <div className="grid grid-cols-2 gap-2 mb-3 shrink-0">
            <Button variant="ghost" className="h-8" onClick={() => engine.undoLast()} disabled={history.length === 0} icon={<Undo2 size={14} />}>Undo</Button>
            <Button variant="danger" className="h-8" onClick={() => engine.clearMeasurements()} disabled={history.length === 0} icon={<Eraser size={14} />}>Clear</Button>
          </div>
          <HistoryList history={history} deleteAt={(indices) => engine.deleteAt(indices)} />
        </Section>
      </div>
    </div>
  );
};
