/**
 * HTTP adapters: podcast feeds, episode downloads and web/file documents.
 * PDF and Word documents go through pdfjs-dist and mammoth, both loaded on
 * first use.
 */

import path from 'node:path';
import * as fs from 'node:fs/promises';
import { createWriteStream } from 'node:fs';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { htmlToText } from 'html-to-text';
import * as Logging from '@/logging';
import * as Storage from '@/util/storage';
import { DEFAULT_FETCH_TIMEOUT_MS, UNSUPPORTED_DOCUMENT_EXTENSIONS } from '@/constants';
import {
    LocalProcessingError,
    ProviderRejectedError,
    SourceUnavailableError,
    TransientNetworkError,
    errorMessage,
} from '@/errors';
import type { DocumentExtractor, MediaDownloader, TextWithMetadata } from '@/acquisition';
import type { Feed, FeedEpisode, FeedReader } from '@/input';
import { isHttpUrl, titleFromUrl } from '@/input/classify';

const DOWNLOAD_TIMEOUT_MS = 30 * 60 * 1000;

class HttpStatusError extends Error {
    readonly status: number;

    constructor(status: number, url: string) {
        super(`HTTP ${status} fetching ${url}`);
        this.name = 'HttpStatusError';
        this.status = status;
    }
}

const checkResponse = (response: Response, url: string): Response => {
    if (response.ok) return response;
    const error = new HttpStatusError(response.status, url);
    if (response.status === 404 || response.status === 410) {
        throw new SourceUnavailableError(error.message, { cause: error });
    }
    if (response.status === 408 || response.status === 429 || response.status >= 500) {
        throw new TransientNetworkError(error.message, { cause: error });
    }
    throw new ProviderRejectedError(error.message, { cause: error });
};

const fetchChecked = async (url: string, timeoutMs: number): Promise<Response> =>
    checkResponse(await fetch(url, { signal: AbortSignal.timeout(timeoutMs), redirect: 'follow' }), url);

export const stripHtml = (html: string): string =>
    htmlToText(html, {
        wordwrap: false,
        selectors: [
            { selector: 'script', format: 'skip' },
            { selector: 'style', format: 'skip' },
            { selector: 'nav', format: 'skip' },
            { selector: 'footer', format: 'skip' },
            { selector: 'img', format: 'skip' },
            { selector: 'a', options: { ignoreHref: true } },
        ],
    }).replace(/\n{3,}/g, '\n\n').trim();

const htmlTitle = (html: string): string | undefined => {
    const match = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html);
    return match ? decodeEntities(match[1]).trim() || undefined : undefined;
};

const decodeEntities = (value: string): string =>
    value
        .replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, '$1')
        .replace(/&lt;/g, '<')
        .replace(/&gt;/g, '>')
        .replace(/&quot;/g, '"')
        .replace(/&#39;|&apos;/g, '\'')
        .replace(/&amp;/g, '&');

const tag = (xml: string, name: string): string | undefined => {
    const escaped = name.replace(':', '\\:');
    const match = new RegExp(`<${escaped}(?:\\s[^>]*)?>([\\s\\S]*?)</${escaped}>`, 'i').exec(xml);
    if (!match) return undefined;
    const value = decodeEntities(match[1]).trim();
    return value || undefined;
};

const attribute = (xml: string, name: string, attr: string): string | undefined => {
    const match = new RegExp(`<${name}\\s[^>]*${attr}=["']([^"']+)["']`, 'i').exec(xml);
    return match ? decodeEntities(match[1]) : undefined;
};

export const parseItunesDuration = (value: string | undefined): number | undefined => {
    if (!value) return undefined;
    const parts = value.trim().split(':').map(Number);
    if (parts.length === 0 || parts.some((n) => !Number.isFinite(n))) return undefined;
    return parts.reduce((total, n) => total * 60 + n, 0);
};

/**
 * Minimal RSS 2.0 reader: enough for podcast feeds, which is all we need.
 */
export const parseFeed = (xml: string): Feed => {
    const channelHead = xml.split(/<item[\s>]/i)[0];
    const episodes: FeedEpisode[] = [];
    for (const match of xml.matchAll(/<item[\s>]([\s\S]*?)<\/item>/gi)) {
        const item = match[1];
        const audioUrl = attribute(item, 'enclosure', 'url');
        if (!audioUrl) continue;
        const published = tag(item, 'pubDate');
        episodes.push({
            title: tag(item, 'title') ?? titleFromUrl(audioUrl),
            audioUrl,
            link: tag(item, 'link'),
            author: tag(item, 'itunes:author') ?? tag(item, 'author'),
            publishedAt: published && !isNaN(Date.parse(published)) ? new Date(published).toISOString() : undefined,
            durationSeconds: parseItunesDuration(tag(item, 'itunes:duration')),
            description: tag(item, 'itunes:summary') ?? tag(item, 'description'),
        });
    }
    return { title: tag(channelHead, 'title'), episodes };
};

export const createFeedReader = (): FeedReader => {
    const read = async (url: string): Promise<Feed> => {
        const response = await fetchChecked(url, DEFAULT_FETCH_TIMEOUT_MS);
        return parseFeed(await response.text());
    };
    return { read };
};

export const createEpisodeDownloader = (): MediaDownloader => {
    const logger = Logging.getLogger();

    const download = async (url: string, destinationDir: string, stem: string) => {
        const response = await fetchChecked(url, DOWNLOAD_TIMEOUT_MS);
        const ext = path.posix.extname(new URL(url).pathname) || '.mp3';
        const target = path.join(destinationDir, `${stem}${ext}`);
        if (!response.body) {
            throw new SourceUnavailableError(`Empty response fetching ${url}`);
        }
        await fs.mkdir(destinationDir, { recursive: true });
        try {
            await pipeline(Readable.fromWeb(response.body), createWriteStream(target));
        } catch (error) {
            await fs.rm(target, { force: true });
            throw error;
        }
        logger.debug('Downloaded %s to %s', url, target);
        return { path: target };
    };

    return { download };
};

type BinaryFormat = 'pdf' | 'docx';

const normalizeText = (text: string): string =>
    text.replace(/\u0000/g, '').replace(/[ \t]+\n/g, '\n').replace(/\n{3,}/g, '\n\n').trim();

const binaryFormatOf = (ext: string, contentType = ''): BinaryFormat | undefined => {
    if (ext === '.pdf' || contentType.includes('application/pdf')) return 'pdf';
    if (ext === '.docx' || contentType.includes('officedocument.wordprocessingml')) return 'docx';
    return undefined;
};

export const extractPdf = async (data: Uint8Array): Promise<string> => {
    const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
    const pdf = await pdfjs.getDocument({ data, isEvalSupported: false }).promise;
    const pages: string[] = [];
    try {
        for (let i = 1; i <= pdf.numPages; i++) {
            const page = await pdf.getPage(i);
            const content = await page.getTextContent();
            pages.push(content.items.map((item) => ('str' in item ? item.str : '')).join(' '));
        }
    } finally {
        await pdf.destroy();
    }
    return normalizeText(pages.join('\n'));
};

export const extractDocx = async (buffer: Buffer): Promise<string> => {
    const { default: mammoth } = await import('mammoth');
    const result = await mammoth.extractRawText({ buffer });
    return normalizeText(result.value);
};

const extractBinary = async (format: BinaryFormat, buffer: Buffer, source: string): Promise<string> => {
    try {
        return format === 'pdf' ? await extractPdf(new Uint8Array(buffer)) : await extractDocx(buffer);
    } catch (error) {
        throw new LocalProcessingError(`Could not read ${format.toUpperCase()} ${source}: ${errorMessage(error)}`, { cause: error });
    }
};

export const createDocumentExtractor = (): DocumentExtractor => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: (message, ...args) => logger.debug(message, ...args) });

    const extractUrl = async (url: string): Promise<TextWithMetadata> => {
        const response = await fetchChecked(url, DEFAULT_FETCH_TIMEOUT_MS);
        const contentType = response.headers.get('content-type') ?? '';
        const format = binaryFormatOf(path.posix.extname(new URL(url).pathname).toLowerCase(), contentType);
        if (format) {
            const text = await extractBinary(format, Buffer.from(await response.arrayBuffer()), url);
            return { text, metadata: { sourceUrl: url } };
        }
        const body = await response.text();
        if (contentType.includes('html') || /^\s*<(!doctype|html)/i.test(body)) {
            return { text: stripHtml(body), metadata: { title: htmlTitle(body), sourceUrl: url } };
        }
        return { text: body.trim(), metadata: { sourceUrl: url } };
    };

    const extractFile = async (filePath: string): Promise<TextWithMetadata> => {
        if (!(await storage.isFile(filePath))) {
            throw new SourceUnavailableError(`Document not found: ${filePath}`);
        }
        const ext = path.extname(filePath).toLowerCase();
        if (UNSUPPORTED_DOCUMENT_EXTENSIONS.includes(ext)) {
            throw new SourceUnavailableError(`Unsupported document type ${ext}: ${filePath}`);
        }
        const format = binaryFormatOf(ext);
        if (format) {
            return { text: await extractBinary(format, await fs.readFile(filePath), filePath) };
        }
        const content = await storage.readFile(filePath);
        if (ext === '.html' || ext === '.htm') {
            return { text: stripHtml(content), metadata: { title: htmlTitle(content) } };
        }
        return { text: content.trim() };
    };

    const extract = (source: string): Promise<TextWithMetadata> =>
        isHttpUrl(source) ? extractUrl(source) : extractFile(source);

    return { extract };
};
