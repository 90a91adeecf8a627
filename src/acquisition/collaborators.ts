/**
 * Acquisition Collaborators
 *
 * The coordinator only talks to the outside world through these. Concrete
 * implementations live in src/providers; tests pass in-process fakes.
 */

import type { ModelEntry } from '@/policy';
import type { SourceMetadata } from '@/util/metadata';

export interface TextWithMetadata {
    text: string;
    metadata?: SourceMetadata;
}

export interface CaptionFetcher {
    /** Resolves undefined when the source has no captions. */
    fetchCaptions(url: string): Promise<TextWithMetadata | undefined>;
}

export interface DownloadedMedia {
    path: string;
    metadata?: SourceMetadata;
}

export interface MediaDownloader {
    download(url: string, destinationDir: string, stem: string): Promise<DownloadedMedia>;
}

export interface AudioProcessor {
    extractAudio(mediaPath: string, outputDir: string): Promise<string>;
    /** Ordered chunk paths, none longer than `maxChunkSeconds`. */
    splitAudio(audioPath: string, maxChunkSeconds: number, minChunkSeconds: number, outputDir: string): Promise<string[]>;
}

export interface Transcriber {
    transcribe(chunkPath: string, model: ModelEntry): Promise<string>;
}

export interface DocumentExtractor {
    extract(source: string): Promise<TextWithMetadata>;
}

export interface AcquisitionServices {
    captions: CaptionFetcher;
    streamingDownloader: MediaDownloader;
    episodeDownloader: MediaDownloader;
    audio: AudioProcessor;
    transcriber: Transcriber;
    documents: DocumentExtractor;
}
