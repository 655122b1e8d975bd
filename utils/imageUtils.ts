import type { RasterImage } from '../types';
import { ClipboardEmptyError, DecodeFailureError } from '../core/errors';

export const IMAGE_ACCEPT = '.png,.jpg,.jpeg,.bmp,.gif,.webp,.tif,.tiff';

export const loadHtmlImage = (src: string, name: string | null = null): Promise<HTMLImageElement> =>
  new Promise((resolve, reject) => {
    const img = new Image();
    img.onload = () => resolve(img);
    img.onerror = () => reject(new DecodeFailureError(name));
    img.src = src;
  });

/**
 * Decodes an image blob into a RasterImage backed by an object URL.
 */
export const decodeImageBlob = async (blob: Blob, name: string | null): Promise<RasterImage> => {
  const src = URL.createObjectURL(blob);
  try {
    const img = await loadHtmlImage(src, name);
    if (img.naturalWidth === 0 || img.naturalHeight === 0) throw new DecodeFailureError(name);
    return { src, name, width: img.naturalWidth, height: img.naturalHeight };
  } catch (err) {
    URL.revokeObjectURL(src);
    throw err instanceof DecodeFailureError ? err : new DecodeFailureError(name, err);
  }
};

export const loadImageFile = (file: File): Promise<RasterImage> => {
  if (file.type && !file.type.startsWith('image/')) {
    return Promise.reject(new DecodeFailureError(file.name));
  }
  return decodeImageBlob(file, file.name);
};

/** Reads the first image from the async Clipboard API. */
export const readClipboardImage = async (): Promise<RasterImage> => {
  if (typeof navigator === 'undefined' || !navigator.clipboard?.read) throw new ClipboardEmptyError();
  const items = await navigator.clipboard.read();
  for (const item of items) {
    const type = item.types.find(t => t.startsWith('image/'));
    if (type) return decodeImageBlob(await item.getType(type), null);
  }
  throw new ClipboardEmptyError();
};

/** Image carried by a paste event (Ctrl+V), if any. */
export const imageFromPasteEvent = (e: ClipboardEvent): Promise<RasterImage> => {
  const items = e.clipboardData ? Array.from(e.clipboardData.items) : [];
  const file = items.find(i => i.kind === 'file' && i.type.startsWith('image/'))?.getAsFile();
  if (!file) return Promise.reject(new ClipboardEmptyError());
  return decodeImageBlob(file, file.name || null);
};

export const releaseImage = (image: RasterImage | null) => {
  if (image?.src.startsWith('blob:')) URL.revokeObjectURL(image.src);
};
