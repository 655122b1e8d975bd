/**
 * Generates a unique ID using crypto when available, falling back to random string.
 */
export const generateId = (): string => {
    if (typeof crypto !== 'undefined' && typeof crypto.randomUUID === 'function') {
        return crypto.randomUUID();
    }
    return Math.random().toString(36).substring(2, 11) + '-' + Date.now().toString(36);
};

/**
 * Builds the download file name for an annotated image.
 */
export const annotatedFileName = (base: string, format: 'png' | 'jpeg'): string =>
    `${base}.${format === 'jpeg' ? 'jpg' : 'png'}`;

/**
 * True when keyboard focus sits in a text field, so shortcuts must stay quiet.
 */
export const isTypingTarget = (target: EventTarget | null): boolean => {
    if (typeof HTMLElement === 'undefined' || !(target instanceof HTMLElement)) return false;
    const tag = target.tagName;
    return tag === 'INPUT' || tag === 'SELECT' || tag === 'TEXTAREA' || target.isContentEditable;
};
