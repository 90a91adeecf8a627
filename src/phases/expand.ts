import * as Input from '@/input';
import { assignIdentities, type AcquisitionTask } from '@/acquisition';
import type { Station } from '@/flow';
import type { SharedContext } from '@/pipeline/types';
import { validateRun } from '@/pipeline/validate';

export type ExpandSignal = 'acquire' | 'no-input';

export interface ExpandInput {
    inputs: Input.InputSpec[];
    expander: Input.Expander;
}

/**
 * Expands the run's inputs into identified acquisition tasks.
 */
export const create = (): Station<SharedContext, ExpandSignal, ExpandInput, AcquisitionTask[]> => ({
    name: 'expand',

    async prepare(context) {
        return {
            inputs: context.state.inputs,
            expander: Input.create({
                services: context.services.expansion,
                reporter: context.reporter,
                feedRange: context.config.feedRange,
            }),
        };
    },

    async execute({ inputs, expander }) {
        return assignIdentities(await expander.expand(inputs));
    },

    async finalize(context, _input, tasks) {
        context.state.tasks = tasks;
        if (tasks.length === 0) {
            context.reporter.status('No sources found in the given inputs', 'warning');
            return 'no-input';
        }
        validateRun(context.config, context.policy, context.credentials, tasks.map((task) => task.sourceKind));
        context.reporter.status(`Found ${tasks.length} source(s)`, 'info');
        return 'acquire';
    },
});
