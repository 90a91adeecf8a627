import type { Logger } from 'winston';

export type Severity = 'info' | 'warning' | 'error';

/**
 * The two hooks a caller gives a run. Either may be called from any worker
 * continuation; callers that need a particular context must marshal.
 */
export interface Reporter {
    status(message: string, severity: Severity): void;
    progress(fraction: number): void;
}

export const fromLogger = (logger: Logger): Reporter => ({
    status: (message, severity) => {
        if (severity === 'error') logger.error(message);
        else if (severity === 'warning') logger.warn(message);
        else logger.info(message);
    },
    progress: (fraction) => logger.debug('Progress %d%%', Math.round(fraction * 100)),
});
