/**
 * Flow Types
 *
 * A flow is a directed graph of stations sharing one mutable context. Each
 * station declares the closed set of signals its finalize step can return,
 * and edges are registered per (station, signal).
 */

export interface Station<C, S extends string, P = unknown, R = unknown> {
    readonly name: string;
    /** Read what execute needs out of the shared context. */
    prepare(context: C): Promise<P>;
    /** Do the work. Must not touch the shared context. */
    execute(input: P): Promise<R>;
    /** Merge results back into the context and choose the outgoing edge. */
    finalize(context: C, input: P, output: R): Promise<S>;
}

// Method syntax keeps parameters bivariant, so any concrete station fits here.
export type AnyStation<C> = Station<C, string, unknown, unknown>;

export type SignalOf<T> = T extends { finalize(...args: never[]): Promise<infer S extends string> } ? S : never;

export interface Transition {
    station: string;
    signal: string;
}

export interface FlowResult {
    transitions: Transition[];
    lastStation: string;
    lastSignal: string;
}

export interface FlowOptions {
    maxTransitions?: number;
}

export interface Flow<C> {
    readonly start: AnyStation<C>;
    connect<T extends AnyStation<C>>(from: T, signal: SignalOf<T>, to: AnyStation<C>): Flow<C>;
    successor(from: AnyStation<C>, signal: string): AnyStation<C> | undefined;
    run(context: C): Promise<FlowResult>;
}
