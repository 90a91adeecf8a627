import * as Acquisition from '@/acquisition';
import type { Station } from '@/flow';
import type { SharedContext } from '@/pipeline/types';

export type AcquireSignal = 'done';

export interface AcquireInput {
    tasks: Acquisition.AcquisitionTask[];
    coordinator: Acquisition.Coordinator;
}

export const acquisitionConfig = (context: SharedContext): Acquisition.AcquisitionConfig => {
    const { config } = context;
    return {
        asrModel: config.asrModel,
        maxAsyncWorkers: config.maxAsyncWorkers,
        maxProcessWorkers: config.maxProcessWorkers,
        preferCaptions: config.preferCaptions,
        transcribe: config.transcribe,
        saveMedia: config.saveMedia,
        resume: config.resume,
        mediaDir: config.mediaDir,
        tempDir: config.tempDir,
    };
};

export const create = (): Station<SharedContext, AcquireSignal, AcquireInput, Map<string, Acquisition.AcquisitionResult>> => ({
    name: 'acquire',

    async prepare(context) {
        return {
            tasks: context.state.tasks,
            coordinator: Acquisition.create({
                config: acquisitionConfig(context),
                policy: context.policy,
                services: context.services.acquisition,
                store: context.store,
                reporter: context.reporter,
                isCancelled: context.isCancelled,
                retry: context.retry,
            }),
        };
    },

    async execute({ tasks, coordinator }) {
        return coordinator.run(tasks);
    },

    async finalize(context, _input, results) {
        for (const [id, result] of results) {
            context.state.acquisitions.set(id, result);
        }
        return 'done';
    },
});
