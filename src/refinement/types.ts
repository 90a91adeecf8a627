/**
 * Refinement Types
 */

import type { ErrorCategory } from '@/errors';
import type { ModelEntry } from '@/policy';

export interface RefinementSource {
    identity: string;
    /** Path of the raw-text artifact. */
    path: string;
    jobId?: number;
}

export interface JobOverrides {
    styles?: string[];
    language?: string;
    outputSubdir?: string;
}

export interface RefinementTask {
    /** `{identity}_{styleId}` */
    readonly id: string;
    readonly identity: string;
    readonly sourceDocumentRef: string;
    readonly styleId: string;
    readonly stylePromptTemplate: string;
    readonly language: string;
    readonly outputPath: string;
    readonly jobId?: number;
}

interface ResultBase {
    id: string;
    identity: string;
    styleId: string;
    jobId?: number;
}

export interface RefinementSuccess extends ResultBase {
    status: 'success';
    outputPath: string;
}

export interface RefinementSkipped extends ResultBase {
    status: 'skipped';
    outputPath: string;
}

export interface RefinementFailure extends ResultBase {
    status: 'failure';
    category: ErrorCategory;
    error: string;
}

export interface RefinementCancelled extends ResultBase {
    status: 'cancelled';
}

export type RefinementResult = RefinementSuccess | RefinementSkipped | RefinementFailure | RefinementCancelled;

export interface RefinementConfig {
    refineModel: string;
    maxAsyncWorkers: number;
    /** Word count above which text is refined in pieces. */
    chunkSize: number;
    skipExisting: boolean;
    enhance: boolean;
}

export interface LlmClient {
    complete(prompt: string, model: ModelEntry): Promise<string>;
}

export interface RefinementServices {
    llm: LlmClient;
}
