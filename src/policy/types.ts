export const PROVIDERS = ['openai', 'deepseek', 'zai', 'gemini'] as const;
export type Provider = typeof PROVIDERS[number];

export type ModelKind = 'asr' | 'refinement';

export interface ModelEntry {
    id: string;
    label: string;
    provider: Provider;
    modelName: string;
    default?: boolean;
    /** Ceiling on simultaneous in-flight calls; absent means the run default. */
    maxConcurrency?: number;
    /** Longest audio chunk the provider accepts, ASR models only. */
    maxChunkDurationSeconds?: number;
}

export interface ModelCatalog {
    asr: readonly ModelEntry[];
    refinement: readonly ModelEntry[];
}

export interface Policy {
    readonly catalog: ModelCatalog;
    entry(id: string): ModelEntry | undefined;
    requireModel(kind: ModelKind, id: string): ModelEntry;
    defaultModel(kind: ModelKind): string;
    maxConcurrency(id: string, fallback: number): number;
    chunkDurationSeconds(id: string): number;
    minChunkDurationSeconds(maxChunkSeconds: number): number;
}
