import type { SourceMetadata } from '@/util/metadata';

export type InputKind =
    | 'streaming-video'
    | 'streaming-playlist'
    | 'feed'
    | 'audio-url'
    | 'web-document'
    | 'directory'
    | 'media-file'
    | 'document-file'
    | 'missing';

export interface InputSpec {
    input: string;
    jobId?: number;
}

export interface FeedRange {
    /** 1-based. */
    start: number;
    /** Inclusive; 0 means through the last episode. */
    end: number;
}

export interface StreamingEntry {
    url: string;
    title: string;
    metadata?: SourceMetadata;
}

export interface StreamingLister {
    /** One entry for a single video, one per item for a playlist. */
    list(url: string): Promise<StreamingEntry[]>;
}

export interface FeedEpisode {
    title: string;
    audioUrl: string;
    link?: string;
    author?: string;
    publishedAt?: string;
    durationSeconds?: number;
    description?: string;
}

export interface Feed {
    title?: string;
    episodes: FeedEpisode[];
}

export interface FeedReader {
    read(url: string): Promise<Feed>;
}

export interface ExpansionServices {
    streaming: StreamingLister;
    feeds: FeedReader;
}
