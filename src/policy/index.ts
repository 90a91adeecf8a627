/**
 * Model Policy
 *
 * Typed lookup of per-model concurrency ceilings and chunk limits. Built once
 * at run start from the built-in catalog, optionally replaced list-by-list by
 * a models file, and never re-read during the run.
 */

import yaml from 'js-yaml';
import { z } from 'zod';
import * as Storage from '@/util/storage';
import * as Logging from '@/logging';
import { ConfigurationError } from '@/errors';
import {
    DEFAULT_MAX_CHUNK_DURATION_SECONDS,
    MIN_CHUNK_DURATION_SECONDS,
    MIN_CHUNK_DURATION_SHORT_SECONDS,
    SHORT_CHUNK_THRESHOLD_SECONDS,
} from '@/constants';
import { DEFAULT_CATALOG } from './defaults';
import { PROVIDERS } from './types';
import type { ModelCatalog, ModelEntry, ModelKind, Policy } from './types';

export * from './types';
export { DEFAULT_CATALOG } from './defaults';

const ModelEntrySchema = z.object({
    id: z.string().min(1),
    label: z.string().optional(),
    provider: z.enum(PROVIDERS),
    model_name: z.string().min(1),
    default: z.boolean().optional(),
    max_concurrency: z.number().int().positive().optional(),
    max_chunk_duration_seconds: z.number().positive().optional(),
}).transform((raw): ModelEntry => ({
    id: raw.id,
    label: raw.label ?? raw.id,
    provider: raw.provider,
    modelName: raw.model_name,
    default: raw.default,
    maxConcurrency: raw.max_concurrency,
    maxChunkDurationSeconds: raw.max_chunk_duration_seconds,
}));

export const ModelsFileSchema = z.object({
    asr_models: z.array(ModelEntrySchema).optional(),
    refinement_models: z.array(ModelEntrySchema).optional(),
});

const freezeEntries = (entries: readonly ModelEntry[]): readonly ModelEntry[] =>
    Object.freeze(entries.map((entry) => Object.freeze({ ...entry })));

export const create = (catalog: ModelCatalog = DEFAULT_CATALOG): Policy => {
    const frozen: ModelCatalog = Object.freeze({
        asr: freezeEntries(catalog.asr),
        refinement: freezeEntries(catalog.refinement),
    });

    const entry = (id: string): ModelEntry | undefined =>
        frozen.asr.find((m) => m.id === id) ?? frozen.refinement.find((m) => m.id === id);

    const requireModel = (kind: ModelKind, id: string): ModelEntry => {
        const found = frozen[kind].find((m) => m.id === id);
        if (!found) {
            const known = frozen[kind].map((m) => m.id).join(', ');
            throw new ConfigurationError(`Unknown ${kind} model "${id}". Known models: ${known}`);
        }
        return found;
    };

    const defaultModel = (kind: ModelKind): string => {
        const models = frozen[kind];
        const chosen = models.find((m) => m.default === true) ?? models[0];
        if (!chosen) throw new ConfigurationError(`No ${kind} models configured`);
        return chosen.id;
    };

    const maxConcurrency = (id: string, fallback: number): number => entry(id)?.maxConcurrency ?? fallback;

    const chunkDurationSeconds = (id: string): number =>
        entry(id)?.maxChunkDurationSeconds ?? DEFAULT_MAX_CHUNK_DURATION_SECONDS;

    const minChunkDurationSeconds = (maxChunkSeconds: number): number =>
        maxChunkSeconds <= SHORT_CHUNK_THRESHOLD_SECONDS ? MIN_CHUNK_DURATION_SHORT_SECONDS : MIN_CHUNK_DURATION_SECONDS;

    return {
        catalog: frozen,
        entry,
        requireModel,
        defaultModel,
        maxConcurrency,
        chunkDurationSeconds,
        minChunkDurationSeconds,
    };
};

export const parseModelsFile = (content: string, source: string): Partial<ModelCatalog> => {
    const parsed = ModelsFileSchema.safeParse(yaml.load(content));
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new ConfigurationError(`Invalid models file ${source}: ${issues}`);
    }
    const catalog: Partial<ModelCatalog> = {};
    if (parsed.data.asr_models && parsed.data.asr_models.length > 0) catalog.asr = parsed.data.asr_models;
    if (parsed.data.refinement_models && parsed.data.refinement_models.length > 0) catalog.refinement = parsed.data.refinement_models;
    return catalog;
};

/**
 * Load the policy, replacing each built-in list that the models file
 * provides. A missing file is not an error.
 */
export const load = async (modelsFile?: string): Promise<Policy> => {
    if (!modelsFile) return create();
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: (message, ...args) => logger.debug(message, ...args) });

    if (!(await storage.exists(modelsFile))) {
        logger.warn('Models file %s not found, using built-in models', modelsFile);
        return create();
    }
    const overrides = parseModelsFile(await storage.readFile(modelsFile), modelsFile);
    logger.debug('Loaded model overrides from %s', modelsFile);
    return create({
        asr: overrides.asr ?? DEFAULT_CATALOG.asr,
        refinement: overrides.refinement ?? DEFAULT_CATALOG.refinement,
    });
};
