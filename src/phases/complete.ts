import { buildReport, summarize } from '@/pipeline/report';
import type { Station } from '@/flow';
import type { CompletionReport, SharedContext } from '@/pipeline/types';

export type CompleteSignal = 'done';

export const create = (): Station<SharedContext, CompleteSignal, CompletionReport, CompletionReport> => ({
    name: 'complete',

    async prepare(context) {
        return buildReport(context.state, context.isCancelled());
    },

    async execute(report) {
        return report;
    },

    async finalize(context, _input, report) {
        context.state.report = report;
        const severity = report.ok ? 'info' : 'warning';
        context.reporter.status(`${report.cancelled ? 'Cancelled' : 'Finished'}: ${summarize(report)}`, severity);
        return 'done';
    },
});
