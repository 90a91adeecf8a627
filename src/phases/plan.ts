import { hasText } from '@/acquisition';
import { phasesOf } from '@/config';
import { createRefinementTasks, type RefinementSource, type RefinementTask, type TaskPlan } from '@/refinement';
import type { ArtifactStore } from '@/store';
import type { Station } from '@/flow';
import type { SharedContext } from '@/pipeline/types';

export type PlanSignal = 'refine' | 'no-tasks';

export interface PlanInput {
    plan: TaskPlan;
    /** Also pick up artifacts already in the store from earlier runs. */
    discover: boolean;
    store: ArtifactStore;
}

/**
 * Sources acquired in this run come first, in input order; discovered
 * artifacts whose identity is not among them follow.
 */
export const collectSources = async (acquired: readonly RefinementSource[], store: ArtifactStore, discover: boolean): Promise<RefinementSource[]> => {
    const sources = [...acquired];
    if (!discover) return sources;
    const known = new Set(sources.map((source) => source.identity));
    for (const ref of await store.discover()) {
        if (known.has(ref.identity)) continue;
        known.add(ref.identity);
        sources.push({ identity: ref.identity, path: ref.path });
    }
    return sources;
};

export const create = (): Station<SharedContext, PlanSignal, PlanInput, RefinementTask[]> => ({
    name: 'plan',

    async prepare(context) {
        const { config, state } = context;
        const acquired: RefinementSource[] = [];
        for (const task of state.tasks) {
            const result = state.acquisitions.get(task.id);
            if (result && hasText(result)) {
                acquired.push({ identity: result.id, path: result.artifactPath, jobId: result.jobId });
            }
        }
        return {
            plan: {
                sources: acquired,
                styles: config.styles,
                language: config.language,
                outputDir: config.outputDir,
                jobs: state.jobs,
            },
            discover: !phasesOf(config.phase).acquire || config.resume,
            store: context.store,
        };
    },

    async execute({ plan, discover, store }) {
        const sources = await collectSources(plan.sources, store, discover);
        return createRefinementTasks({ ...plan, sources });
    },

    async finalize(context, _input, tasks) {
        context.state.refinementTasks = tasks;
        if (tasks.length === 0) {
            context.reporter.status('Nothing to refine', 'warning');
            return 'no-tasks';
        }
        return 'refine';
    },
});
