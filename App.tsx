import React from 'react';
import { useMeasureEngine } from './hooks/useMeasureEngine';
import { useFileActions } from './hooks/useFileActions';
import { useKeyboardShortcuts } from './hooks/useKeyboardShortcuts';
import { ImageCanvas } from './components/ImageCanvas';
import { Sidebar } from './components/Sidebar/Sidebar';
import { StatusBar } from './components/StatusBar';
import { PromptModal } from './components/PromptModal';
import { IMAGE_ACCEPT } from './utils/imageUtils';

export default function App() {
  const { engine, snapshot, status } = useMeasureEngine();
  const { fileInputRef, openImageDialog, handleFileChange, pasteFromClipboard, exportCsv, exportImage, clearAll } = useFileActions(engine);

  useKeyboardShortcuts({ engine, openImage: openImageDialog, exportCsv });

  return (
    <div className="h-screen w-screen flex flex-col md:flex-row bg-slate-950 text-slate-200 overflow-hidden">
      <input ref={fileInputRef} type="file" accept={IMAGE_ACCEPT} className="hidden" onChange={handleFileChange} />

      <Sidebar
        engine={engine}
        snapshot={snapshot}
        openImageDialog={openImageDialog}
        pasteFromClipboard={() => { void pasteFromClipboard(); }}
        exportCsv={exportCsv}
        exportImage={(format) => { void exportImage(format); }}
        clearAll={clearAll}
      />

      <main className="flex-1 min-w-0 flex flex-col">
        <ImageCanvas engine={engine} snapshot={snapshot} />
        <StatusBar cursor={snapshot.cursor} calibration={snapshot.calibration} zoom={snapshot.view.scale} status={status} />
      </main>

      <PromptModal
        isOpen={snapshot.interaction.awaitingCalibration}
        title="Calibration"
        description="Enter the known length of the reference segment and its units."
        currentUnits={snapshot.calibration.units}
        onConfirm={(length, units) => engine.finishCalibration(length, units)}
        onCancel={() => engine.cancelCalibration()}
      />
    </div>
  );
}
