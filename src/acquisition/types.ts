/**
 * Acquisition Types
 */

import type { ErrorCategory } from '@/errors';
import type { SourceMetadata } from '@/util/metadata';

export const SOURCE_KINDS = ['streaming-media-url', 'local-media-file', 'feed-episode', 'extractable-document'] as const;
export type SourceKind = typeof SOURCE_KINDS[number];

/**
 * What input expansion finds, before an identity is assigned.
 */
export interface SourceDescriptor {
    sourcePath: string;
    sourceKind: SourceKind;
    displayTitle: string;
    audioUrl?: string;
    jobId?: number;
    metadata?: SourceMetadata;
}

export interface AcquisitionTask extends Readonly<SourceDescriptor> {
    /** Sanitized title, suffixed `_2`, `_3`... when titles collide. Also the artifact name. */
    readonly id: string;
}

export const ACQUISITION_METHODS = ['captions', 'transcription', 'document'] as const;
export type AcquisitionMethod = typeof ACQUISITION_METHODS[number];

interface ResultBase {
    id: string;
    title: string;
    sourceKind: SourceKind;
    jobId?: number;
}

export interface AcquisitionSuccess extends ResultBase {
    status: 'success';
    method: AcquisitionMethod;
    rawText: string;
    artifactPath: string;
    metadata: SourceMetadata;
    mediaPath?: string;
}

export interface AcquisitionReused extends ResultBase {
    status: 'reused';
    rawText: string;
    artifactPath: string;
    metadata: SourceMetadata;
    /** Recorded by the run that produced the artifact, when it recorded one. */
    method?: AcquisitionMethod;
    mediaPath?: string;
}

export interface AcquisitionFailure extends ResultBase {
    status: 'failure';
    category: ErrorCategory;
    error: string;
}

export interface AcquisitionCancelled extends ResultBase {
    status: 'cancelled';
}

export type AcquisitionResult = AcquisitionSuccess | AcquisitionReused | AcquisitionFailure | AcquisitionCancelled;

export interface AcquisitionConfig {
    asrModel: string;
    maxAsyncWorkers: number;
    maxProcessWorkers: number;
    /** Try platform captions before downloading audio. */
    preferCaptions: boolean;
    /** When false, streaming videos without captions fail instead of being transcribed. */
    transcribe: boolean;
    saveMedia: boolean;
    resume: boolean;
    mediaDir: string;
    tempDir: string;
}

export const hasText = (result: AcquisitionResult): result is AcquisitionSuccess | AcquisitionReused =>
    result.status === 'success' || result.status === 'reused';
