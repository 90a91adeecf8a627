import { MAX_TITLE_LENGTH } from '@/constants';

const WINDOWS_RESERVED = new Set([
    'CON', 'PRN', 'AUX', 'NUL',
    'COM1', 'COM2', 'COM3', 'COM4', 'COM5', 'COM6', 'COM7', 'COM8', 'COM9',
    'LPT1', 'LPT2', 'LPT3', 'LPT4', 'LPT5', 'LPT6', 'LPT7', 'LPT8', 'LPT9',
]);

/**
 * Turn an arbitrary title into something safe to use as a file stem on any
 * platform. The result is also the identity of a source in the artifact store.
 */
export const cleanFilename = (title: string): string => {
    let name = title
        .replace(/[<>:"/\\|?*]/g, '_')
        .replace(/[^\p{L}\p{N}\p{M}_\s\-.]/gu, '')
        .replace(/\s+/g, ' ')
        .replace(/^[.\s]+|[.\s]+$/g, '');

    if (!name) return 'unnamed';
    if (WINDOWS_RESERVED.has(name.toUpperCase())) name = `${name}_file`;
    const chars = Array.from(name);
    if (chars.length > MAX_TITLE_LENGTH) name = chars.slice(0, MAX_TITLE_LENGTH).join('').replace(/[.\s]+$/, '');
    return name;
};

export const safeStyleName = (styleId: string): string => styleId.replace(/[^\w-]+/g, '_');

/**
 * Returns `base`, `base_2`, `base_3`... whichever `taken` first rejects.
 */
export const uniqueName = (base: string, taken: (candidate: string) => boolean): string => {
    if (!taken(base)) return base;
    for (let i = 2; ; i++) {
        const candidate = `${base}_${i}`;
        if (!taken(candidate)) return candidate;
    }
};
