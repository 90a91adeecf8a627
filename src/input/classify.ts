import path from 'node:path';
import * as Storage from '@/util/storage';
import { AUDIO_URL_EXTENSIONS, MEDIA_EXTENSIONS } from '@/constants';
import type { InputKind } from './types';

const STREAMING_HOST = /^(www\.|m\.|music\.)?(youtube\.com|youtu\.be)$/i;

export const isHttpUrl = (input: string): boolean => /^https?:\/\//i.test(input.trim());

const parseUrl = (input: string): URL | undefined => {
    try {
        return new URL(input.trim());
    } catch {
        return undefined;
    }
};

/**
 * URL classification needs no I/O.
 */
export const classifyUrl = (input: string): InputKind => {
    const url = parseUrl(input);
    if (!url) return 'web-document';

    const pathname = url.pathname.toLowerCase();
    if (STREAMING_HOST.test(url.hostname)) {
        const isPlaylist = url.searchParams.has('list') && !url.searchParams.has('v') && !/^\/(watch|shorts)/.test(pathname);
        return isPlaylist ? 'streaming-playlist' : 'streaming-video';
    }
    if (AUDIO_URL_EXTENSIONS.includes(path.posix.extname(pathname))) {
        return 'audio-url';
    }
    if (pathname.endsWith('.rss') || pathname.endsWith('.xml') || pathname.endsWith('/feed') || /(^|\/)(rss|podcast|feeds?)(\/|$)/.test(pathname)) {
        return 'feed';
    }
    return 'web-document';
};

export const isMediaFile = (filePath: string): boolean => MEDIA_EXTENSIONS.includes(path.extname(filePath).toLowerCase());

export const classify = async (input: string, storage: Storage.Utility): Promise<InputKind> => {
    if (isHttpUrl(input)) return classifyUrl(input);
    if (await storage.isDirectory(input)) return 'directory';
    if (await storage.isFile(input)) return isMediaFile(input) ? 'media-file' : 'document-file';
    return 'missing';
};

// A literal `%` without hex digits is not valid percent-encoding.
const decodeSegment = (segment: string): string => {
    try {
        return decodeURIComponent(segment);
    } catch {
        return segment;
    }
};

export const titleFromUrl = (input: string): string => {
    const url = parseUrl(input);
    if (!url) return input;
    const videoId = url.searchParams.get('v');
    if (videoId) return `${url.hostname.replace(/^www\./, '')} ${videoId}`;
    const last = url.pathname.split('/').filter(Boolean).pop();
    if (last) return decodeSegment(last).replace(/\.[a-z0-9]+$/i, '');
    return url.hostname.replace(/^www\./, '');
};

export const titleFromPath = (filePath: string): string => path.basename(filePath, path.extname(filePath));
