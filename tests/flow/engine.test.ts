import { describe, it, expect } from 'vitest';
import * as Flow from '@/flow';
import { StationError, FlowLoopError } from '@/flow';
import { SourceUnavailableError } from '@/errors';

interface Ctx {
    log: string[];
    value: number;
}

const station = <S extends string>(name: string, decide: (ctx: Ctx) => S): Flow.Station<Ctx, S, number, number> => ({
    name,
    async prepare(ctx) {
        ctx.log.push(`${name}:prepare`);
        return ctx.value;
    },
    async execute(input) {
        return input + 1;
    },
    async finalize(ctx, _input, output) {
        ctx.value = output;
        ctx.log.push(`${name}:finalize`);
        return decide(ctx);
    },
});

describe('flow engine', () => {
    it('follows the edge chosen by each signal', async () => {
        const start = station('start', (ctx): 'big' | 'small' => (ctx.value > 5 ? 'big' : 'small'));
        const big = station('big', (): 'done' => 'done');
        const small = station('small', (): 'done' => 'done');
        const flow = Flow.create<Ctx>(start)
            .connect(start, 'big', big)
            .connect(start, 'small', small);

        const ctx: Ctx = { log: [], value: 0 };
        const result = await flow.run(ctx);

        expect(result.transitions).toEqual([
            { station: 'start', signal: 'small' },
            { station: 'small', signal: 'done' },
        ]);
        expect(result.lastStation).toBe('small');
        expect(ctx.value).toBe(2);
        expect(ctx.log).toEqual(['start:prepare', 'start:finalize', 'small:prepare', 'small:finalize']);
    });

    it('ends when a signal has no edge', async () => {
        const only = station('only', (): 'done' => 'done');
        const result = await Flow.create<Ctx>(only).run({ log: [], value: 0 });
        expect(result.transitions).toHaveLength(1);
        expect(result.lastSignal).toBe('done');
    });

    it('refuses a second edge for the same signal', () => {
        const a = station('a', (): 'next' => 'next');
        const b = station('b', (): 'done' => 'done');
        const flow = Flow.create<Ctx>(a).connect(a, 'next', b);
        expect(() => flow.connect(a, 'next', b)).toThrow('already has an edge');
    });

    it('wraps failures with the station and phase, keeping the category', async () => {
        const failing: Flow.Station<Ctx, 'done', number, number> = {
            name: 'fetch',
            async prepare() {
                return 1;
            },
            async execute() {
                throw new SourceUnavailableError('gone');
            },
            async finalize() {
                return 'done';
            },
        };

        const error = await Flow.create<Ctx>(failing).run({ log: [], value: 0 }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(StationError);
        if (!(error instanceof StationError)) return;
        expect(error.station).toBe('fetch');
        expect(error.phase).toBe('execute');
        expect(error.category).toBe('source-unavailable');
        expect(error.message).toBe('Station "fetch" failed during execute: gone');
    });

    it('stops a cycle at the transition limit', async () => {
        const ping = station('ping', (): 'again' => 'again');
        const flow = Flow.create<Ctx>(ping, { maxTransitions: 5 }).connect(ping, 'again', ping);
        await expect(flow.run({ log: [], value: 0 })).rejects.toBeInstanceOf(FlowLoopError);
    });
});
