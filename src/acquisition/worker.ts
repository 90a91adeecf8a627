/**
 * Acquisition Worker
 *
 * Turns one task into one result. Every step that leaves the process goes
 * through one of the coordinator's pools, one pool at a time, and every
 * error is converted into a failure result before it can reach the
 * coordinator.
 */

import path from 'node:path';
import type { Logger } from 'winston';
import * as Storage from '@/util/storage';
import { type RetryOptions, withRetry } from '@/util/retry';
import type { Semaphore } from '@/util/semaphore';
import { type SourceMetadata, normalize } from '@/util/metadata';
import type { ArtifactStore } from '@/store';
import type { Policy } from '@/policy';
import { PROGRAM_NAME } from '@/constants';
import {
    RefineryError,
    SourceUnavailableError,
    classifyError,
    errorMessage,
} from '@/errors';
import type { AcquisitionServices, TextWithMetadata } from './collaborators';
import type { AcquisitionConfig, AcquisitionMethod, AcquisitionResult, AcquisitionTask } from './types';

/** Per-unit scratch directories live under this root. */
export const workRoot = (tempDir: string): string => path.join(tempDir, `${PROGRAM_NAME}-work`);

export interface Pools {
    process: Semaphore;
    network: Semaphore;
    transcription: Semaphore;
}

export interface WorkerDeps {
    config: AcquisitionConfig;
    policy: Policy;
    services: AcquisitionServices;
    store: ArtifactStore;
    pools: Pools;
    isCancelled: () => boolean;
    retry?: RetryOptions;
    logger: Logger;
}

export interface Worker {
    acquire(task: AcquisitionTask): Promise<AcquisitionResult>;
}

class UnitCancelled extends Error {
    constructor() {
        super('cancelled');
        this.name = 'UnitCancelled';
    }
}

interface Acquired extends TextWithMetadata {
    method: AcquisitionMethod;
    mediaPath?: string;
}

interface UnitScratch {
    workDir: string;
    keepMedia?: string;
}

export const joinTranscripts = (parts: ReadonlyArray<string | undefined>): string =>
    parts
        .filter((part): part is string => typeof part === 'string' && part.trim().length > 0)
        .join(' ')
        .replace(/\s+/g, ' ')
        .trim();

export const create = (deps: WorkerDeps): Worker => {
    const { config, policy, services, store, pools, isCancelled, logger } = deps;
    const storage = Storage.create({ log: (message, ...args) => logger.debug(message, ...args) });
    const asrModel = policy.entry(config.asrModel);

    const network = <T>(label: string, call: () => Promise<T>): Promise<T> =>
        pools.network.run(() => withRetry(call, {
            ...deps.retry,
            onRetry: (attempt, error, delayMs) => {
                logger.warn('%s failed (attempt %d), retrying in %d ms: %s', label, attempt, Math.round(delayMs), errorMessage(error));
            },
        }));

    const transcribeMedia = async (task: AcquisitionTask, mediaPath: string, scratch: UnitScratch): Promise<string> => {
        if (!asrModel) {
            throw new RefineryError('configuration', `Unknown ASR model ${config.asrModel}`);
        }
        if (isCancelled()) throw new UnitCancelled();

        const audioPath = await pools.process.run(() => services.audio.extractAudio(mediaPath, scratch.workDir));
        scratch.keepMedia = scratch.keepMedia ?? audioPath;

        const maxChunk = policy.chunkDurationSeconds(asrModel.id);
        const minChunk = policy.minChunkDurationSeconds(maxChunk);
        const chunkDir = path.join(scratch.workDir, 'chunks');
        try {
            if (isCancelled()) throw new UnitCancelled();
            const chunks = await pools.process.run(() => services.audio.splitAudio(audioPath, maxChunk, minChunk, chunkDir));
            logger.debug('%s: transcribing %d chunk(s) with %s', task.id, chunks.length, asrModel.id);

            const transcripts: Array<string | undefined> = new Array<string | undefined>(chunks.length);
            const failures: unknown[] = [];
            let skipped = 0;

            await Promise.all(chunks.map((chunk, index) => pools.transcription.run(async () => {
                if (isCancelled()) {
                    skipped++;
                    return;
                }
                try {
                    transcripts[index] = await withRetry(() => services.transcriber.transcribe(chunk, asrModel), deps.retry);
                } catch (error) {
                    logger.warn('%s: chunk %d/%d failed: %s', task.id, index + 1, chunks.length, errorMessage(error));
                    failures.push(error);
                }
            })));

            if (skipped > 0) throw new UnitCancelled();

            const text = joinTranscripts(transcripts);
            if (!text) {
                const first = failures[0];
                const reason = first === undefined ? 'no speech recognized' : errorMessage(first);
                throw new RefineryError(
                    first === undefined ? 'local-processing' : classifyError(first),
                    `All ${chunks.length} chunk transcription(s) failed: ${reason}`,
                    { cause: first },
                );
            }
            return text;
        } finally {
            // Chunks are never kept, whatever the outcome.
            await storage.deleteDirectory(chunkDir);
        }
    };

    const downloadAndTranscribe = async (
        task: AcquisitionTask,
        url: string,
        downloader: AcquisitionServices['streamingDownloader'],
        scratch: UnitScratch,
    ): Promise<Acquired> => {
        if (isCancelled()) throw new UnitCancelled();
        const downloaded = await network(`Download of ${task.id}`, () => downloader.download(url, scratch.workDir, task.id));
        scratch.keepMedia = downloaded.path;
        const text = await transcribeMedia(task, downloaded.path, scratch);
        return { text, metadata: downloaded.metadata, method: 'transcription' };
    };

    const acquireStreaming = async (task: AcquisitionTask, scratch: UnitScratch): Promise<Acquired> => {
        if (config.preferCaptions) {
            try {
                const captions = await network(`Caption fetch for ${task.id}`, () => services.captions.fetchCaptions(task.sourcePath));
                if (captions && captions.text.trim()) {
                    return { ...captions, method: 'captions' };
                }
                logger.debug('%s: no captions available', task.id);
            } catch (error) {
                logger.info('%s: caption fetch failed: %s', task.id, errorMessage(error));
            }
        }
        if (!config.transcribe) {
            throw new SourceUnavailableError('No captions available and transcription is disabled');
        }
        return downloadAndTranscribe(task, task.sourcePath, services.streamingDownloader, scratch);
    };

    const acquireText = async (task: AcquisitionTask, scratch: UnitScratch): Promise<Acquired> => {
        switch (task.sourceKind) {
            case 'streaming-media-url':
                return acquireStreaming(task, scratch);
            case 'feed-episode':
                return downloadAndTranscribe(task, task.audioUrl ?? task.sourcePath, services.episodeDownloader, scratch);
            case 'local-media-file': {
                const text = await transcribeMedia(task, task.sourcePath, scratch);
                return { text, method: 'transcription' };
            }
            case 'extractable-document': {
                const extracted = await network(`Extraction of ${task.id}`, () => services.documents.extract(task.sourcePath));
                if (!extracted.text.trim()) {
                    throw new SourceUnavailableError(`No text could be extracted from ${task.sourcePath}`);
                }
                return { ...extracted, method: 'document' };
            }
        }
    };

    const buildMetadata = (task: AcquisitionTask, acquired: Acquired): SourceMetadata => normalize({
        title: task.displayTitle,
        sourceType: task.sourceKind,
        sourceUrl: /^https?:\/\//i.test(task.sourcePath) ? task.sourcePath : undefined,
        ...task.metadata,
        ...acquired.metadata,
        fetchedAt: new Date().toISOString(),
        modelUsed: acquired.method === 'transcription' ? config.asrModel : undefined,
    });

    const acquire = async (task: AcquisitionTask): Promise<AcquisitionResult> => {
        const base = { id: task.id, title: task.displayTitle, sourceKind: task.sourceKind, jobId: task.jobId };
        const scratch: UnitScratch = { workDir: path.join(workRoot(config.tempDir), task.id) };
        try {
            const acquired = await acquireText(task, scratch);
            const metadata = buildMetadata(task, acquired);

            let mediaPath: string | undefined;
            if (config.saveMedia && scratch.keepMedia) {
                mediaPath = await store.moveMedia(task.id, scratch.keepMedia, config.mediaDir);
            }
            const artifactPath = await store.saveArtifact(task.id, acquired.text, metadata, { method: acquired.method, mediaPath });
            return { ...base, status: 'success', method: acquired.method, rawText: acquired.text, artifactPath, metadata, mediaPath };
        } catch (error) {
            if (error instanceof UnitCancelled) {
                return { ...base, status: 'cancelled' };
            }
            return { ...base, status: 'failure', category: classifyError(error), error: errorMessage(error) };
        } finally {
            try {
                await storage.deleteDirectory(scratch.workDir);
            } catch (error) {
                logger.warn('Could not remove working directory %s: %s', scratch.workDir, errorMessage(error));
            }
        }
    };

    return { acquire };
};
