import type { DrawCommand, ExportImageFormat, Measurement, RasterImage } from '../types';
import { ANNOTATED_FILE_BASE, CSV_DELIMITER, CSV_FILE_NAME, CSV_HEADER, JPEG_QUALITY } from '../constants';
import { ExportIOError } from '../core/errors';
import { annotatedFileName } from '../utils';
import { loadHtmlImage } from './imageUtils';
import { renderCommands } from './canvasRenderer';

const CSV_LINE_END = '\r\n';

// Minimal quoting: only fields holding the delimiter, a quote or a line break.
const csvField = (value: string): string =>
    /[;"\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

export const formatPoints = (m: Measurement): string =>
    m.points.map(p => `${p.x.toFixed(2)},${p.y.toFixed(2)}`).join('|');

export const buildMeasurementsCsv = (history: readonly Measurement[]): string => {
    const rows = [CSV_HEADER];
    history.forEach(m => {
        rows.push([
            m.timestamp.toISOString(),
            m.kind,
            m.units,
            m.lengthValue.toFixed(6),
            m.displayLabel,
            formatPoints(m)
        ]);
    });
    return rows.map(r => r.map(csvField).join(CSV_DELIMITER)).join(CSV_LINE_END) + CSV_LINE_END;
};

export const downloadBlob = (blob: Blob, fileName: string, what: string) => {
    try {
        const url = URL.createObjectURL(blob);
        const link = document.createElement('a');
        link.setAttribute('href', url);
        link.setAttribute('download', fileName);
        document.body.appendChild(link);
        link.click();
        document.body.removeChild(link);
        URL.revokeObjectURL(url);
    } catch (err) {
        throw new ExportIOError(what, err);
    }
};

/**
 * Downloads the history as CSV. Returns the number of rows written, 0 when
 * there was nothing to export.
 */
export const exportMeasurementsCsv = (history: readonly Measurement[]): number => {
    if (history.length === 0) return 0;
    const blob = new Blob([buildMeasurementsCsv(history)], { type: 'text/csv;charset=utf-8;' });
    downloadBlob(blob, CSV_FILE_NAME, CSV_FILE_NAME);
    return history.length;
};

const canvasToBlob = (canvas: HTMLCanvasElement, format: ExportImageFormat): Promise<Blob | null> =>
    new Promise(resolve => canvas.toBlob(resolve, `image/${format}`, format === 'jpeg' ? JPEG_QUALITY : undefined));

/**
 * Draws the base image and the export scene into an image-sized canvas and
 * downloads it. Returns the saved file name.
 */
export const exportAnnotatedImage = async (
    image: RasterImage,
    commands: readonly DrawCommand[],
    format: ExportImageFormat = 'png'
): Promise<string> => {
    const fileName = annotatedFileName(ANNOTATED_FILE_BASE, format);
    const base = await loadHtmlImage(image.src, image.name);

    const canvas = document.createElement('canvas');
    canvas.width = image.width;
    canvas.height = image.height;
    const ctx = canvas.getContext('2d');
    if (!ctx) throw new ExportIOError('annotated image', new Error('Failed to get 2D context'));

    ctx.drawImage(base, 0, 0, image.width, image.height);
    renderCommands(ctx, commands);

    const blob = await canvasToBlob(canvas, format);
    if (!blob) throw new ExportIOError('annotated image');
    downloadBlob(blob, fileName, 'annotated image');
    return fileName;
};
