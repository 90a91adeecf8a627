import * as Refinement from '@/refinement';
import type { Station } from '@/flow';
import type { SharedContext } from '@/pipeline/types';

export type RefineSignal = 'done';

export interface RefineInput {
    tasks: Refinement.RefinementTask[];
    coordinator: Refinement.Coordinator;
}

export const create = (): Station<SharedContext, RefineSignal, RefineInput, Map<string, Refinement.RefinementResult>> => ({
    name: 'refine',

    async prepare(context) {
        const { config } = context;
        return {
            tasks: context.state.refinementTasks,
            coordinator: Refinement.create({
                config: {
                    refineModel: config.refineModel,
                    maxAsyncWorkers: config.maxAsyncWorkers,
                    chunkSize: config.chunkSize,
                    skipExisting: config.skipExisting,
                    enhance: config.enhance,
                },
                policy: context.policy,
                services: context.services.refinement,
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
            context.state.refinements.set(id, result);
        }
        return 'done';
    },
});
