/**
 * yt-dlp adapters: playlist/title lookup, caption fetch and audio download
 * for streaming platforms.
 */

import path from 'node:path';
import os from 'node:os';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import * as Logging from '@/logging';
import * as Storage from '@/util/storage';
import { run } from '@/util/child';
import {
    LocalProcessingError,
    SourceUnavailableError,
    TransientNetworkError,
    errorMessage,
} from '@/errors';
import { PROGRAM_NAME } from '@/constants';
import type { SourceMetadata } from '@/util/metadata';
import type { CaptionFetcher, MediaDownloader, TextWithMetadata } from '@/acquisition';
import type { StreamingEntry, StreamingLister } from '@/input';

const YT_DLP = 'yt-dlp';
const CAPTION_LANGUAGES = 'en.*,zh.*,ja.*,ko.*,es.*,fr.*,de.*';

const InfoSchema = z.object({
    id: z.string().optional(),
    title: z.string().optional(),
    webpage_url: z.string().optional(),
    url: z.string().optional(),
    uploader: z.string().optional(),
    channel: z.string().optional(),
    upload_date: z.string().optional(),
    duration: z.number().optional(),
    tags: z.array(z.string()).optional(),
    description: z.string().optional(),
    language: z.string().optional(),
});

const PlaylistSchema = InfoSchema.extend({
    entries: z.array(InfoSchema).optional(),
});

type Info = z.infer<typeof InfoSchema>;

const stderrOf = (error: unknown): string => {
    if (typeof error !== 'object' || error === null) return '';
    const stderr: unknown = Reflect.get(error, 'stderr');
    return typeof stderr === 'string' ? stderr : '';
};

/**
 * yt-dlp reports everything through stderr text; sort it into the error
 * taxonomy by what it says.
 */
export const toTaxonomyError = (error: unknown, action: string): Error => {
    const detail = (stderrOf(error) || errorMessage(error)).trim();
    const lower = detail.toLowerCase();
    const message = `${action} failed: ${detail.split('\n').filter(Boolean).pop() ?? detail}`;
    if (/video unavailable|private video|does not exist|has been removed|not available|members-only/.test(lower)) {
        return new SourceUnavailableError(message, { cause: error });
    }
    if (/http error (429|5\d\d)|timed out|connection reset|temporary failure|unable to download webpage/.test(lower)) {
        return new TransientNetworkError(message, { cause: error });
    }
    if (Reflect.get(Object(error), 'code') === 'ENOENT') {
        return new LocalProcessingError(`${YT_DLP} is not installed or not on PATH`, { cause: error });
    }
    return new LocalProcessingError(message, { cause: error });
};

/**
 * WebVTT to plain text: drop the header, cue timings, inline tags and the
 * rolling duplicates auto-generated captions repeat line after line.
 */
export const vttToText = (vtt: string): string => {
    const lines: string[] = [];
    for (const raw of vtt.replace(/\r\n/g, '\n').split('\n')) {
        const line = raw.replace(/<[^>]+>/g, '').replace(/&nbsp;/g, ' ').replace(/&amp;/g, '&').trim();
        if (!line) continue;
        if (/^(WEBVTT|Kind:|Language:|NOTE\b|STYLE\b)/.test(line)) continue;
        if (/-->/.test(line)) continue;
        if (/^\d+$/.test(line)) continue;
        if (lines[lines.length - 1] === line) continue;
        lines.push(line);
    }
    return lines.join(' ').replace(/\s+/g, ' ').trim();
};

const metadataFromInfo = (info: Info): SourceMetadata => ({
    title: info.title,
    sourceUrl: info.webpage_url,
    author: info.uploader ?? info.channel,
    publishedAt: info.upload_date,
    durationSeconds: info.duration,
    tags: info.tags,
    description: info.description,
    language: info.language,
});

const entryUrl = (entry: Info): string | undefined => {
    if (entry.webpage_url) return entry.webpage_url;
    if (entry.url && /^https?:\/\//.test(entry.url)) return entry.url;
    return entry.id ? `https://www.youtube.com/watch?v=${entry.id}` : undefined;
};

export const createLister = (): StreamingLister => {
    const list = async (url: string): Promise<StreamingEntry[]> => {
        let stdout: string;
        try {
            ({ stdout } = await run(YT_DLP, ['--flat-playlist', '--dump-single-json', '--no-warnings', url]));
        } catch (error) {
            throw toTaxonomyError(error, `Lookup of ${url}`);
        }
        const info = PlaylistSchema.parse(JSON.parse(stdout));
        if (info.entries) {
            return info.entries.flatMap((entry) => {
                const entryLink = entryUrl(entry);
                return entryLink ? [{ url: entryLink, title: entry.title ?? entryLink }] : [];
            });
        }
        return [{ url: info.webpage_url ?? url, title: info.title ?? url, metadata: metadataFromInfo(info) }];
    };

    return { list };
};

export const createCaptionFetcher = (tempRoot: string = os.tmpdir()): CaptionFetcher => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: (message, ...args) => logger.debug(message, ...args) });

    const fetchCaptions = async (url: string): Promise<TextWithMetadata | undefined> => {
        await storage.createDirectory(tempRoot);
        const workDir = await fs.mkdtemp(path.join(tempRoot, `${PROGRAM_NAME}-captions-`));
        try {
            try {
                await run(YT_DLP, [
                    '--skip-download',
                    '--write-subs',
                    '--write-auto-subs',
                    '--sub-langs', CAPTION_LANGUAGES,
                    '--sub-format', 'vtt',
                    '--no-warnings',
                    '-o', path.join(workDir, 'captions.%(ext)s'),
                    url,
                ]);
            } catch (error) {
                throw toTaxonomyError(error, `Caption fetch for ${url}`);
            }
            const files = await storage.listFiles(workDir, '*.vtt');
            if (files.length === 0) return undefined;
            const text = vttToText(await storage.readFile(files[0]));
            return text ? { text } : undefined;
        } finally {
            await storage.deleteDirectory(workDir);
        }
    };

    return { fetchCaptions };
};

export const createDownloader = (): MediaDownloader => {
    const logger = Logging.getLogger();

    const download = async (url: string, destinationDir: string, stem: string) => {
        await fs.mkdir(destinationDir, { recursive: true });
        let stdout: string;
        try {
            ({ stdout } = await run(YT_DLP, [
                '-f', 'bestaudio/best',
                '--no-playlist',
                '--no-warnings',
                '--print', 'after_move:filepath',
                '-o', path.join(destinationDir, `${stem}.%(ext)s`),
                url,
            ]));
        } catch (error) {
            throw toTaxonomyError(error, `Download of ${url}`);
        }
        const downloaded = stdout.trim().split('\n').filter(Boolean).pop();
        if (!downloaded) {
            throw new LocalProcessingError(`${YT_DLP} did not report a file for ${url}`);
        }
        logger.debug('Downloaded %s to %s', url, downloaded);
        return { path: downloaded };
    };

    return { download };
};
