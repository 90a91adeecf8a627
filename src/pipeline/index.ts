/**
 * Pipeline
 *
 * Builds the station graph for the selected phases and runs it over one
 * shared context:
 *
 *   expand -acquire-> acquire -done-> plan -refine-> refine -done-> cleanup -done-> complete
 *      \--no-input------------------------------------------------------> cleanup
 *                                      \--no-tasks-------------------> cleanup
 *
 * Acquire-only drops plan and refine; refine-only starts at plan.
 */

import * as Flow from '@/flow';
import * as Store from '@/store';
import * as Logging from '@/logging';
import * as Reporting from '@/reporter';
import { phasesOf, type Config, type Phase } from '@/config';
import { ConfigurationError } from '@/errors';
import type { Policy } from '@/policy';
import type { Reporter } from '@/reporter';
import type { RetryOptions } from '@/util/retry';
import type { InputSpec } from '@/input';
import type { JobOverrides } from '@/refinement';
import { Acquire, Cleanup, Complete, Expand, Plan, Refine } from '@/phases';
import type { CompletionReport, PipelineServices, SharedContext } from './types';
import { validateRun, type Credentials } from './validate';

export * from './types';
export { buildReport, summarize } from './report';
export { validateRun } from './validate';
export type { Credentials } from './validate';

export const createFlowForPhases = (acquire: boolean, refine: boolean): Flow.Flow<SharedContext> => {
    if (!acquire && !refine) {
        throw new ConfigurationError('At least one of acquisition or refinement must be selected');
    }
    const cleanup = Cleanup.create();
    const complete = Complete.create();

    if (acquire) {
        const expand = Expand.create();
        const acquisition = Acquire.create();
        const flow = Flow.create<SharedContext>(expand);
        flow.connect(expand, 'no-input', cleanup);
        flow.connect(expand, 'acquire', acquisition);
        if (refine) {
            const plan = Plan.create();
            const refinement = Refine.create();
            flow.connect(acquisition, 'done', plan);
            flow.connect(plan, 'refine', refinement);
            flow.connect(plan, 'no-tasks', cleanup);
            flow.connect(refinement, 'done', cleanup);
        } else {
            flow.connect(acquisition, 'done', cleanup);
        }
        flow.connect(cleanup, 'done', complete);
        return flow;
    }

    const plan = Plan.create();
    const refinement = Refine.create();
    const flow = Flow.create<SharedContext>(plan);
    flow.connect(plan, 'refine', refinement);
    flow.connect(plan, 'no-tasks', cleanup);
    flow.connect(refinement, 'done', cleanup);
    flow.connect(cleanup, 'done', complete);
    return flow;
};

export interface RunOptions {
    config: Config;
    policy: Policy;
    services: PipelineServices;
    /** Providers that have an API key. */
    credentials: Credentials;
    inputs?: InputSpec[];
    jobs?: Map<number, JobOverrides>;
    reporter?: Reporter;
    isCancelled?: () => boolean;
    retry?: RetryOptions;
}

export const createContext = (options: RunOptions): SharedContext => ({
    config: options.config,
    policy: options.policy,
    services: options.services,
    credentials: options.credentials,
    store: Store.create(options.config.intermediateDir),
    reporter: options.reporter ?? Reporting.fromLogger(Logging.getLogger()),
    isCancelled: options.isCancelled ?? (() => false),
    retry: options.retry,
    state: {
        inputs: options.inputs ?? [],
        jobs: options.jobs ?? new Map(),
        tasks: [],
        acquisitions: new Map(),
        refinementTasks: [],
        refinements: new Map(),
        startedAt: new Date(),
    },
});

export const run = async (options: RunOptions): Promise<CompletionReport> => {
    const logger = Logging.getLogger();
    const phase: Phase = options.config.phase;
    const phases = phasesOf(phase);
    validateRun(options.config, options.policy, options.credentials);

    const context = createContext(options);
    const flow = createFlowForPhases(phases.acquire, phases.refine);
    const result = await flow.run(context);
    logger.debug('Flow finished: %s', result.transitions.map((t) => `${t.station}:${t.signal}`).join(' '));

    if (!context.state.report) {
        throw new Error(`Flow ended at ${result.lastStation} without a completion report`);
    }
    return context.state.report;
};
