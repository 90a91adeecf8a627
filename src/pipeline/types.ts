/**
 * Pipeline Types
 *
 * The shared context every station reads from and merges into. Only
 * prepare and finalize touch it; execute works on what prepare handed over.
 */

import type { Config } from '@/config';
import type { Policy, Provider } from '@/policy';
import type { Reporter } from '@/reporter';
import type { ArtifactStore } from '@/store';
import type { RetryOptions } from '@/util/retry';
import type { ErrorCategory } from '@/errors';
import type { AcquisitionResult, AcquisitionServices, AcquisitionTask } from '@/acquisition';
import type { ExpansionServices, InputSpec } from '@/input';
import type { JobOverrides, RefinementResult, RefinementServices, RefinementTask } from '@/refinement';

export interface PipelineServices {
    expansion: ExpansionServices;
    acquisition: AcquisitionServices;
    refinement: RefinementServices;
}

export interface RunState {
    inputs: InputSpec[];
    jobs: Map<number, JobOverrides>;
    tasks: AcquisitionTask[];
    acquisitions: Map<string, AcquisitionResult>;
    refinementTasks: RefinementTask[];
    refinements: Map<string, RefinementResult>;
    startedAt: Date;
    report?: CompletionReport;
}

export interface SharedContext {
    readonly config: Config;
    readonly policy: Policy;
    readonly services: PipelineServices;
    /** Providers that have an API key. */
    readonly credentials: Partial<Record<Provider, string>>;
    readonly store: ArtifactStore;
    readonly reporter: Reporter;
    readonly isCancelled: () => boolean;
    readonly retry?: RetryOptions;
    readonly state: RunState;
}

export type ReportPhase = 'acquire' | 'refine';

export interface ReportLine {
    phase: ReportPhase;
    id: string;
    status: AcquisitionResult['status'] | RefinementResult['status'];
    detail: string;
    category?: ErrorCategory;
}

export interface ReportCounts {
    acquired: number;
    reused: number;
    acquisitionFailures: number;
    refined: number;
    skipped: number;
    refinementFailures: number;
    cancelled: number;
}

export interface CompletionReport {
    counts: ReportCounts;
    lines: ReportLine[];
    cancelled: boolean;
    durationMs: number;
    /** True when nothing failed. Cancelled units are not failures. */
    ok: boolean;
}
