/**
 * Acquisition Coordinator
 *
 * Fans a task list out over three independent pools:
 *
 *   process        ffmpeg extraction and chunking (child processes)
 *   network        caption fetch, downloads, document extraction
 *   transcription  ASR calls, capped by the model's declared ceiling
 *
 * A unit holds at most one pool slot at a time. Results are collected
 * locally and handed back keyed by task identity; the caller merges them
 * into the shared context.
 */

import os from 'node:os';
import * as Logging from '@/logging';
import * as Semaphore from '@/util/semaphore';
import type { RetryOptions } from '@/util/retry';
import type { ArtifactStore } from '@/store';
import type { Policy } from '@/policy';
import type { Reporter } from '@/reporter';
import { errorMessage } from '@/errors';
import * as Worker from './worker';
import type { AcquisitionServices } from './collaborators';
import type { AcquisitionConfig, AcquisitionResult, AcquisitionTask } from './types';

export interface CoordinatorOptions {
    config: AcquisitionConfig;
    policy: Policy;
    services: AcquisitionServices;
    store: ArtifactStore;
    reporter: Reporter;
    isCancelled: () => boolean;
    retry?: RetryOptions;
}

export interface PoolSizes {
    process: number;
    network: number;
    transcription: number;
    units: number;
}

export interface Coordinator {
    readonly poolSizes: PoolSizes;
    run(tasks: readonly AcquisitionTask[]): Promise<Map<string, AcquisitionResult>>;
}

export const resolvePoolSizes = (config: AcquisitionConfig, policy: Policy, cpuCount: number = os.availableParallelism()): PoolSizes => {
    const network = Math.max(1, config.maxAsyncWorkers);
    const process = Math.max(1, Math.min(config.maxProcessWorkers, cpuCount));
    return {
        process,
        network,
        transcription: Math.max(1, policy.maxConcurrency(config.asrModel, network)),
        units: network + process,
    };
};

export const create = (options: CoordinatorOptions): Coordinator => {
    const { config, policy, services, store, reporter, isCancelled } = options;
    const logger = Logging.getLogger();
    const poolSizes = resolvePoolSizes(config, policy);

    const run = async (tasks: readonly AcquisitionTask[]): Promise<Map<string, AcquisitionResult>> => {
        const results = new Map<string, AcquisitionResult>();
        const total = tasks.length;
        let done = 0;

        const record = (result: AcquisitionResult) => {
            results.set(result.id, result);
            done++;
            reporter.progress(total === 0 ? 1 : done / total);
        };

        // Resume is decided up front so reused units never touch a pool.
        const pending: AcquisitionTask[] = [];
        for (const task of tasks) {
            if (config.resume && await store.hasArtifact(task.id)) {
                try {
                    const artifact = await store.loadArtifact(task.id);
                    reporter.status(`Reusing existing transcript for ${task.displayTitle}`, 'info');
                    record({
                        id: task.id,
                        title: task.displayTitle,
                        sourceKind: task.sourceKind,
                        jobId: task.jobId,
                        status: 'reused',
                        rawText: artifact.text,
                        artifactPath: artifact.path,
                        metadata: artifact.metadata,
                        method: artifact.provenance?.method,
                        mediaPath: artifact.provenance?.mediaPath,
                    });
                    continue;
                } catch (error) {
                    logger.warn('Existing artifact for %s is unreadable, acquiring again: %s', task.id, errorMessage(error));
                }
            }
            pending.push(task);
        }

        const pools: Worker.Pools = {
            process: Semaphore.create(poolSizes.process),
            network: Semaphore.create(poolSizes.network),
            transcription: Semaphore.create(poolSizes.transcription),
        };
        const units = Semaphore.create(poolSizes.units);
        const worker = Worker.create({ config, policy, services, store, pools, isCancelled, retry: options.retry, logger });

        logger.debug('Acquiring %d source(s): process=%d network=%d transcription=%d',
            pending.length, poolSizes.process, poolSizes.network, poolSizes.transcription);

        const inFlight: Array<Promise<void>> = [];
        for (const task of pending) {
            const release = await units.acquire();
            if (isCancelled()) {
                release();
                record({ id: task.id, title: task.displayTitle, sourceKind: task.sourceKind, jobId: task.jobId, status: 'cancelled' });
                continue;
            }
            reporter.status(`Acquiring ${task.displayTitle}`, 'info');
            inFlight.push(worker.acquire(task).then((result) => {
                if (result.status === 'failure') {
                    reporter.status(`Failed to acquire ${task.displayTitle}: ${result.error}`, 'error');
                } else if (result.status === 'success') {
                    reporter.status(`Acquired ${task.displayTitle} via ${result.method}`, 'info');
                }
                record(result);
            }).finally(release));
        }
        await Promise.all(inFlight);

        return results;
    };

    return { poolSizes, run };
};
