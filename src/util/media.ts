import ffmpeg, { type FfprobeData } from 'fluent-ffmpeg';
import type { Logger } from 'winston';
import path from 'node:path';
import * as Storage from '@/util/storage';
import { LocalProcessingError } from '@/errors';

export interface Segment {
    start: number;
    end: number;
}

export interface Media {
    getDuration: (filePath: string) => Promise<number>;
    extractAudio: (mediaPath: string, outputDir: string) => Promise<string>;
    detectSilences: (audioPath: string) => Promise<number[]>;
    splitAudio: (audioPath: string, maxChunkSeconds: number, minChunkSeconds: number, outputDir: string) => Promise<string[]>;
}

const SILENCE_FILTER = 'silencedetect=noise=-30dB:d=0.5';

const ffprobeAsync = (filePath: string): Promise<FfprobeData> => {
    return new Promise((resolve, reject) => {
        ffmpeg.ffprobe(filePath, (err: Error | null, metadata: FfprobeData) => {
            if (err) return reject(err);
            resolve(metadata);
        });
    });
};

/**
 * Cut [0, duration) into segments no longer than `max` seconds, preferring
 * to cut at the latest silence point that leaves at least `min` seconds in
 * the segment. Without a usable silence the cut falls at exactly `max`.
 */
export const planSegments = (duration: number, silences: number[], max: number, min: number): Segment[] => {
    const segments: Segment[] = [];
    const points = [...silences].sort((a, b) => a - b);
    let cursor = 0;

    while (duration - cursor > max) {
        const limit = cursor + max;
        const candidates = points.filter((p) => p >= cursor + min && p <= limit);
        const cut = candidates.length > 0 ? candidates[candidates.length - 1] : limit;
        segments.push({ start: cursor, end: cut });
        cursor = cut;
    }
    if (duration > cursor) {
        segments.push({ start: cursor, end: duration });
    }
    return segments;
};

export const parseSilenceLine = (line: string): { start?: number; end?: number } => {
    const start = /silence_start:\s*(-?[\d.]+)/.exec(line);
    if (start) return { start: parseFloat(start[1]) };
    const end = /silence_end:\s*(-?[\d.]+)/.exec(line);
    if (end) return { end: parseFloat(end[1]) };
    return {};
};

export const create = (logger: Logger): Media => {
    const storage = Storage.create({ log: (message, ...args) => logger.debug(message, ...args) });

    const getDuration = async (filePath: string): Promise<number> => {
        try {
            const metadata = await ffprobeAsync(filePath);
            const duration = Number(metadata.format.duration);
            if (!Number.isFinite(duration) || duration <= 0) {
                throw new Error('no duration in probe output');
            }
            return duration;
        } catch (error) {
            throw new LocalProcessingError(`Failed to probe ${filePath}: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
        }
    };

    // Mono 16 kHz mp3 is small and accepted by every ASR provider we talk to.
    const extractAudio = async (mediaPath: string, outputDir: string): Promise<string> => {
        await storage.createDirectory(outputDir);
        const stem = path.basename(mediaPath, path.extname(mediaPath));
        const outputPath = path.join(outputDir, `${stem}_audio.mp3`);
        logger.debug('Extracting audio from %s to %s', mediaPath, outputPath);

        return new Promise<string>((resolve, reject) => {
            ffmpeg(mediaPath)
                .noVideo()
                .audioChannels(1)
                .audioFrequency(16000)
                .audioBitrate('64k')
                .toFormat('mp3')
                .output(outputPath)
                .on('end', () => resolve(outputPath))
                .on('error', (err: Error) => {
                    reject(new LocalProcessingError(`Failed to extract audio from ${mediaPath}: ${err.message}`, { cause: err }));
                })
                .run();
        });
    };

    const detectSilences = async (audioPath: string): Promise<number[]> => {
        return new Promise<number[]>((resolve, reject) => {
            const midpoints: number[] = [];
            let pendingStart: number | undefined;

            ffmpeg(audioPath)
                .audioFilters(SILENCE_FILTER)
                .format('null')
                .output('-')
                .on('stderr', (line: string) => {
                    const parsed = parseSilenceLine(line);
                    if (parsed.start !== undefined) {
                        pendingStart = Math.max(0, parsed.start);
                    } else if (parsed.end !== undefined && pendingStart !== undefined) {
                        midpoints.push((pendingStart + parsed.end) / 2);
                        pendingStart = undefined;
                    }
                })
                .on('end', () => resolve(midpoints))
                .on('error', (err: Error) => {
                    reject(new LocalProcessingError(`Silence detection failed for ${audioPath}: ${err.message}`, { cause: err }));
                })
                .run();
        });
    };

    const cutSegment = (audioPath: string, segment: Segment, outputPath: string): Promise<void> => {
        return new Promise<void>((resolve, reject) => {
            ffmpeg(audioPath)
                .setStartTime(segment.start)
                .setDuration(segment.end - segment.start)
                .audioCodec('copy')
                .output(outputPath)
                .on('end', () => resolve())
                .on('error', (err: Error) => {
                    reject(new LocalProcessingError(`Failed to cut ${outputPath}: ${err.message}`, { cause: err }));
                })
                .run();
        });
    };

    const splitAudio = async (audioPath: string, maxChunkSeconds: number, minChunkSeconds: number, outputDir: string): Promise<string[]> => {
        const duration = await getDuration(audioPath);
        const silences = duration > maxChunkSeconds ? await detectSilences(audioPath) : [];
        const segments = planSegments(duration, silences, maxChunkSeconds, minChunkSeconds);
        logger.debug('Splitting %s (%d s) into %d chunk(s)', audioPath, Math.round(duration), segments.length);

        await storage.createDirectory(outputDir);
        const ext = path.extname(audioPath);
        const stem = path.basename(audioPath, ext);
        const chunks: string[] = [];
        for (const [index, segment] of segments.entries()) {
            const outputPath = path.join(outputDir, `${stem}_chunk${String(index + 1).padStart(3, '0')}${ext}`);
            await cutSegment(audioPath, segment, outputPath);
            chunks.push(outputPath);
        }
        return chunks;
    };

    return {
        getDuration,
        extractAudio,
        detectSilences,
        splitAudio,
    };
};
