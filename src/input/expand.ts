/**
 * Input Expansion
 *
 * Turns what the user typed (URLs, files, folders, feeds, playlists) into
 * source descriptors. Source kinds are fixed here and never change later.
 */

import path from 'node:path';
import * as Logging from '@/logging';
import * as Storage from '@/util/storage';
import type { Reporter } from '@/reporter';
import type { SourceDescriptor } from '@/acquisition';
import { DOCUMENT_EXTENSIONS, MEDIA_EXTENSIONS } from '@/constants';
import { errorMessage } from '@/errors';
import { classify, titleFromPath, titleFromUrl } from './classify';
import type { ExpansionServices, FeedEpisode, FeedRange, InputSpec } from './types';

export interface ExpanderOptions {
    services: ExpansionServices;
    reporter: Reporter;
    feedRange?: FeedRange;
}

export interface Expander {
    expand(inputs: readonly InputSpec[]): Promise<SourceDescriptor[]>;
}

export const sliceRange = <T>(items: readonly T[], range?: FeedRange): T[] => {
    if (!range) return [...items];
    const start = Math.max(1, range.start) - 1;
    return items.slice(start, range.end === 0 ? undefined : range.end);
};

const episodeDescriptor = (episode: FeedEpisode, feedUrl: string, jobId?: number): SourceDescriptor => ({
    sourcePath: episode.link ?? episode.audioUrl,
    sourceKind: 'feed-episode',
    displayTitle: episode.title,
    audioUrl: episode.audioUrl,
    jobId,
    metadata: {
        sourceUrl: episode.link ?? episode.audioUrl,
        author: episode.author,
        publishedAt: episode.publishedAt,
        durationSeconds: episode.durationSeconds,
        description: episode.description,
        title: episode.title,
        sourceType: `feed:${feedUrl}`,
    },
});

export const create = (options: ExpanderOptions): Expander => {
    const { services, reporter, feedRange } = options;
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: (message, ...args) => logger.debug(message, ...args) });

    const listDirectory = async (directory: string, jobId?: number): Promise<SourceDescriptor[]> => {
        const extensions = [...MEDIA_EXTENSIONS, ...DOCUMENT_EXTENSIONS].map((ext) => ext.slice(1));
        const files = await storage.listFiles(directory, `*.{${extensions.join(',')}}`);
        return files.map((file): SourceDescriptor => {
            const media = MEDIA_EXTENSIONS.includes(path.extname(file).toLowerCase());
            return {
                sourcePath: file,
                sourceKind: media ? 'local-media-file' : 'extractable-document',
                displayTitle: titleFromPath(file),
                jobId,
            };
        });
    };

    const expandOne = async ({ input, jobId }: InputSpec): Promise<SourceDescriptor[]> => {
        const trimmed = input.trim();
        const kind = await classify(trimmed, storage);
        logger.debug('Input %s classified as %s', trimmed, kind);

        switch (kind) {
            case 'streaming-video':
            case 'streaming-playlist': {
                try {
                    const entries = await services.streaming.list(trimmed);
                    return entries.map((entry): SourceDescriptor => ({
                        sourcePath: entry.url,
                        sourceKind: 'streaming-media-url',
                        displayTitle: entry.title,
                        jobId,
                        metadata: entry.metadata,
                    }));
                } catch (error) {
                    if (kind === 'streaming-playlist') {
                        reporter.status(`Could not list playlist ${trimmed}: ${errorMessage(error)}`, 'warning');
                        return [];
                    }
                    logger.warn('Could not look up title for %s: %s', trimmed, errorMessage(error));
                    return [{ sourcePath: trimmed, sourceKind: 'streaming-media-url', displayTitle: titleFromUrl(trimmed), jobId }];
                }
            }
            case 'feed': {
                try {
                    const feed = await services.feeds.read(trimmed);
                    const episodes = sliceRange(feed.episodes, feedRange);
                    logger.info('Feed %s: %d of %d episode(s) selected', feed.title ?? trimmed, episodes.length, feed.episodes.length);
                    return episodes.map((episode) => episodeDescriptor(episode, trimmed, jobId));
                } catch (error) {
                    reporter.status(`Could not read feed ${trimmed}: ${errorMessage(error)}`, 'warning');
                    return [];
                }
            }
            case 'audio-url':
                return [{ sourcePath: trimmed, sourceKind: 'feed-episode', displayTitle: titleFromUrl(trimmed), audioUrl: trimmed, jobId }];
            case 'web-document':
                return [{ sourcePath: trimmed, sourceKind: 'extractable-document', displayTitle: titleFromUrl(trimmed), jobId }];
            case 'directory':
                return listDirectory(trimmed, jobId);
            case 'media-file':
                return [{ sourcePath: path.resolve(trimmed), sourceKind: 'local-media-file', displayTitle: titleFromPath(trimmed), jobId }];
            case 'document-file':
                return [{ sourcePath: path.resolve(trimmed), sourceKind: 'extractable-document', displayTitle: titleFromPath(trimmed), jobId }];
            case 'missing':
                reporter.status(`Input not found, skipping: ${trimmed}`, 'warning');
                return [];
        }
    };

    const expand = async (inputs: readonly InputSpec[]): Promise<SourceDescriptor[]> => {
        const descriptors: SourceDescriptor[] = [];
        for (const spec of inputs) {
            if (!spec.input.trim()) continue;
            descriptors.push(...await expandOne(spec));
        }
        return descriptors;
    };

    return { expand };
};
