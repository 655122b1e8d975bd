export type MeasureErrorCode =
  | 'ZERO_DISTANCE'
  | 'INVALID_LENGTH'
  | 'CLIPBOARD_EMPTY'
  | 'DECODE_FAILURE'
  | 'EXPORT_IO';

/**
 * Base for every recoverable failure. `message` is shown to the user as is.
 */
export class MeasureError extends Error {
  readonly code: MeasureErrorCode;

  constructor(code: MeasureErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ZeroDistanceError extends MeasureError {
  constructor() {
    super('ZERO_DISTANCE', 'Calibration failed: zero distance');
  }
}

export class InvalidLengthError extends MeasureError {
  constructor(readonly input: unknown) {
    super('INVALID_LENGTH', 'Calibration failed: enter a positive real length');
  }
}

export class ClipboardEmptyError extends MeasureError {
  constructor() {
    super('CLIPBOARD_EMPTY', 'Clipboard does not contain an image');
  }
}

export class DecodeFailureError extends MeasureError {
  constructor(source: string | null, cause?: unknown) {
    super('DECODE_FAILURE', source ? `Failed to load image: ${source}` : 'Failed to load image', { cause });
  }
}

export class ExportIOError extends MeasureError {
  constructor(what: string, cause?: unknown) {
    super('EXPORT_IO', `Failed to save ${what}`, { cause });
  }
}

export const isMeasureError = (err: unknown): err is MeasureError => err instanceof MeasureError;

export const describeError = (err: unknown): string => {
  if (isMeasureError(err)) return err.message;
  if (err instanceof Error) return `Unexpected error: ${err.message}`;
  return 'Unexpected error';
};
