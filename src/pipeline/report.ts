import type { AcquisitionResult } from '@/acquisition';
import type { RefinementResult } from '@/refinement';
import type { CompletionReport, ReportCounts, ReportLine, RunState } from './types';

const acquisitionLine = (result: AcquisitionResult): ReportLine => {
    switch (result.status) {
        case 'success':
            return { phase: 'acquire', id: result.id, status: result.status, detail: `${result.method} -> ${result.artifactPath}` };
        case 'reused':
            return {
                phase: 'acquire',
                id: result.id,
                status: result.status,
                detail: result.method ? `${result.method} -> ${result.artifactPath}` : result.artifactPath,
            };
        case 'failure':
            return { phase: 'acquire', id: result.id, status: result.status, detail: result.error, category: result.category };
        case 'cancelled':
            return { phase: 'acquire', id: result.id, status: result.status, detail: 'cancelled before it started' };
    }
};

const refinementLine = (result: RefinementResult): ReportLine => {
    switch (result.status) {
        case 'success':
            return { phase: 'refine', id: result.id, status: result.status, detail: result.outputPath };
        case 'skipped':
            return { phase: 'refine', id: result.id, status: result.status, detail: `exists: ${result.outputPath}` };
        case 'failure':
            return { phase: 'refine', id: result.id, status: result.status, detail: result.error, category: result.category };
        case 'cancelled':
            return { phase: 'refine', id: result.id, status: result.status, detail: 'cancelled before it started' };
    }
};

/**
 * Lines follow task order: acquisition tasks, then refinement tasks.
 */
export const buildReport = (state: RunState, cancelled: boolean, now: Date = new Date()): CompletionReport => {
    const acquisitions: AcquisitionResult[] = [];
    for (const task of state.tasks) {
        const result = state.acquisitions.get(task.id);
        if (result) acquisitions.push(result);
    }
    const refinements: RefinementResult[] = [];
    for (const task of state.refinementTasks) {
        const result = state.refinements.get(task.id);
        if (result) refinements.push(result);
    }

    const counts: ReportCounts = {
        acquired: acquisitions.filter((r) => r.status === 'success').length,
        reused: acquisitions.filter((r) => r.status === 'reused').length,
        acquisitionFailures: acquisitions.filter((r) => r.status === 'failure').length,
        refined: refinements.filter((r) => r.status === 'success').length,
        skipped: refinements.filter((r) => r.status === 'skipped').length,
        refinementFailures: refinements.filter((r) => r.status === 'failure').length,
        cancelled: acquisitions.filter((r) => r.status === 'cancelled').length
            + refinements.filter((r) => r.status === 'cancelled').length,
    };

    return {
        counts,
        lines: [...acquisitions.map(acquisitionLine), ...refinements.map(refinementLine)],
        cancelled,
        durationMs: now.getTime() - state.startedAt.getTime(),
        ok: counts.acquisitionFailures === 0 && counts.refinementFailures === 0,
    };
};

export const summarize = (report: CompletionReport): string => {
    const { counts } = report;
    const parts = [
        `${counts.acquired} acquired`,
        `${counts.reused} reused`,
        `${counts.acquisitionFailures} failed to acquire`,
        `${counts.refined} refined`,
        `${counts.skipped} skipped`,
        `${counts.refinementFailures} failed to refine`,
    ];
    if (counts.cancelled > 0) parts.push(`${counts.cancelled} cancelled`);
    return `${parts.join(', ')} in ${(report.durationMs / 1000).toFixed(1)} s`;
};
