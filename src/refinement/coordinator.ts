/**
 * Refinement Coordinator
 *
 * Runs every (transcript × style) task through one semaphore sized by the
 * refinement model's ceiling. All LLM calls for a task, enhancement
 * included, happen while it holds its slot.
 */

import * as Logging from '@/logging';
import * as Semaphore from '@/util/semaphore';
import { type RetryOptions, withRetry } from '@/util/retry';
import { needsEnhancement, type SourceMetadata } from '@/util/metadata';
import { stringifyDocument } from '@/util/frontmatter';
import type { ArtifactStore } from '@/store';
import type { ModelEntry, Policy } from '@/policy';
import type { Reporter } from '@/reporter';
import { RefineryError, classifyError, errorMessage } from '@/errors';
import { refine } from './refiner';
import { buildEnhancementPrompt, mergeEnhancement, parseEnhancement } from './enhancer';
import type { RefinementConfig, RefinementResult, RefinementServices, RefinementTask } from './types';

export interface CoordinatorOptions {
    config: RefinementConfig;
    policy: Policy;
    services: RefinementServices;
    store: ArtifactStore;
    reporter: Reporter;
    isCancelled: () => boolean;
    retry?: RetryOptions;
}

export interface Coordinator {
    readonly concurrency: number;
    run(tasks: readonly RefinementTask[]): Promise<Map<string, RefinementResult>>;
}

export const create = (options: CoordinatorOptions): Coordinator => {
    const { config, policy, services, store, reporter, isCancelled } = options;
    const logger = Logging.getLogger();
    const concurrency = Math.max(1, policy.maxConcurrency(config.refineModel, config.maxAsyncWorkers));

    const run = async (tasks: readonly RefinementTask[]): Promise<Map<string, RefinementResult>> => {
        const model: ModelEntry | undefined = policy.entry(config.refineModel);
        const results = new Map<string, RefinementResult>();
        const slots = Semaphore.create(concurrency);
        const enhanced = new Map<string, Promise<SourceMetadata>>();
        const total = tasks.length;
        let done = 0;

        const record = (result: RefinementResult) => {
            results.set(result.id, result);
            done++;
            reporter.progress(total === 0 ? 1 : done / total);
        };

        const complete = (llm: ModelEntry) => (prompt: string): Promise<string> =>
            withRetry(() => services.llm.complete(prompt, llm), {
                ...options.retry,
                onRetry: (attempt, error, delayMs) => {
                    logger.warn('LLM call failed (attempt %d), retrying in %d ms: %s', attempt, Math.round(delayMs), errorMessage(error));
                },
            });

        const enhance = (task: RefinementTask, llm: ModelEntry, text: string, metadata: SourceMetadata): Promise<SourceMetadata> => {
            const cached = enhanced.get(task.identity);
            if (cached) return cached;
            const pending = complete(llm)(buildEnhancementPrompt(text, metadata))
                .then((reply) => mergeEnhancement(metadata, parseEnhancement(reply)))
                .catch((error: unknown) => {
                    logger.warn('Metadata enhancement failed for %s: %s', task.identity, errorMessage(error));
                    return metadata;
                });
            enhanced.set(task.identity, pending);
            return pending;
        };

        const refineOne = async (task: RefinementTask): Promise<RefinementResult> => {
            const base = { id: task.id, identity: task.identity, styleId: task.styleId, jobId: task.jobId };
            try {
                if (!model) {
                    throw new RefineryError('configuration', `Unknown refinement model ${config.refineModel}`);
                }
                const text = await store.loadText(task.sourceDocumentRef);
                let metadata = await store.loadMetadata(task.identity);

                const body = await refine(complete(model), task.stylePromptTemplate, text, task.language, config.chunkSize);
                if (config.enhance && needsEnhancement(metadata)) {
                    metadata = await enhance(task, model, text, metadata);
                }
                const document = stringifyDocument({
                    metadata,
                    style: task.styleId,
                    language: task.language,
                    transcriptChars: text.length,
                    modelUsed: model.id,
                }, body);
                await store.saveDocument(task.outputPath, document);
                return { ...base, status: 'success', outputPath: task.outputPath };
            } catch (error) {
                return { ...base, status: 'failure', category: classifyError(error), error: errorMessage(error) };
            }
        };

        const inFlight: Array<Promise<void>> = [];
        for (const task of tasks) {
            const base = { id: task.id, identity: task.identity, styleId: task.styleId, jobId: task.jobId };
            if (config.skipExisting && await store.documentExists(task.outputPath)) {
                reporter.status(`Skipping ${task.id}: output already exists`, 'info');
                record({ ...base, status: 'skipped', outputPath: task.outputPath });
                continue;
            }
            inFlight.push(slots.run(async () => {
                if (isCancelled()) {
                    record({ ...base, status: 'cancelled' });
                    return;
                }
                reporter.status(`Refining ${task.identity} [${task.styleId}]`, 'info');
                const result = await refineOne(task);
                if (result.status === 'failure') {
                    reporter.status(`Refinement failed for ${task.id}: ${result.error}`, 'error');
                }
                record(result);
            }));
        }
        await Promise.all(inFlight);

        logger.debug('Refinement finished: %d task(s), concurrency %d', total, concurrency);
        return results;
    };

    return { concurrency, run };
};
