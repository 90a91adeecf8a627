import * as Logging from '@/logging';
import { RefineryError, classifyError, errorMessage } from '@/errors';
import type { AnyStation, Flow, FlowOptions, FlowResult, SignalOf, Transition } from './types';

const DEFAULT_MAX_TRANSITIONS = 100;

export type StationPhase = 'prepare' | 'execute' | 'finalize';

export class StationError extends RefineryError {
    readonly station: string;
    readonly phase: StationPhase;

    constructor(station: string, phase: StationPhase, cause: unknown) {
        super(classifyError(cause), `Station "${station}" failed during ${phase}: ${errorMessage(cause)}`, { cause });
        this.name = 'StationError';
        this.station = station;
        this.phase = phase;
    }
}

export class FlowLoopError extends Error {
    constructor(limit: number) {
        super(`Flow exceeded ${limit} transitions; the graph probably has a cycle`);
        this.name = 'FlowLoopError';
    }
}

const guard = async <T>(station: string, phase: StationPhase, step: () => Promise<T>): Promise<T> => {
    try {
        return await step();
    } catch (error) {
        if (error instanceof StationError) throw error;
        throw new StationError(station, phase, error);
    }
};

export const create = <C>(start: AnyStation<C>, options: FlowOptions = {}): Flow<C> => {
    const logger = Logging.getLogger();
    const maxTransitions = options.maxTransitions ?? DEFAULT_MAX_TRANSITIONS;
    const edges = new Map<AnyStation<C>, Map<string, AnyStation<C>>>();

    const flow: Flow<C> = {
        start,

        connect<T extends AnyStation<C>>(from: T, signal: SignalOf<T>, to: AnyStation<C>): Flow<C> {
            const outgoing = edges.get(from) ?? new Map<string, AnyStation<C>>();
            if (outgoing.has(signal)) {
                throw new Error(`Station "${from.name}" already has an edge for signal "${signal}"`);
            }
            outgoing.set(signal, to);
            edges.set(from, outgoing);
            return flow;
        },

        successor(from: AnyStation<C>, signal: string): AnyStation<C> | undefined {
            return edges.get(from)?.get(signal);
        },

        async run(context: C): Promise<FlowResult> {
            const transitions: Transition[] = [];
            let current: AnyStation<C> | undefined = start;
            let lastStation = start.name;
            let lastSignal = '';

            while (current) {
                if (transitions.length >= maxTransitions) {
                    throw new FlowLoopError(maxTransitions);
                }
                const station: AnyStation<C> = current;
                logger.debug('Entering station %s', station.name);

                const input = await guard(station.name, 'prepare', () => station.prepare(context));
                const output = await guard(station.name, 'execute', () => station.execute(input));
                const signal = await guard(station.name, 'finalize', () => station.finalize(context, input, output));

                transitions.push({ station: station.name, signal });
                lastStation = station.name;
                lastSignal = signal;
                current = flow.successor(station, signal);
                logger.debug('Station %s emitted "%s" -> %s', station.name, signal, current?.name ?? '(end)');
            }

            return { transitions, lastStation, lastSignal };
        },
    };

    return flow;
};
