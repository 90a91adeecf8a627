import { describe, it, expect, afterEach, vi } from 'vitest';
import winston from 'winston';
import { getLogger, setLogLevel } from '@/logging';
import { fromLogger } from '@/reporter';
import { PROGRAM_NAME } from '@/constants';

describe('logging', () => {
    afterEach(() => {
        vi.restoreAllMocks();
        setLogLevel('info');
    });

    it('starts at info level', () => {
        expect(getLogger().level).toBe('info');
    });

    it('replaces the logger when the level changes', () => {
        const createLogger = vi.spyOn(winston, 'createLogger');
        const before = getLogger();

        setLogLevel('debug');

        expect(getLogger()).not.toBe(before);
        expect(getLogger().level).toBe('debug');
        expect(createLogger).toHaveBeenCalledTimes(1);
        expect(createLogger.mock.calls[0][0]?.defaultMeta).toEqual({ service: PROGRAM_NAME });
    });

    it('routes reporter severities to logger levels', () => {
        const logger = getLogger();
        const info = vi.spyOn(logger, 'info').mockReturnValue(logger);
        const warn = vi.spyOn(logger, 'warn').mockReturnValue(logger);
        const error = vi.spyOn(logger, 'error').mockReturnValue(logger);
        const reporter = fromLogger(logger);

        reporter.status('fine', 'info');
        reporter.status('careful', 'warning');
        reporter.status('broken', 'error');

        expect(info).toHaveBeenCalledWith('fine');
        expect(warn).toHaveBeenCalledWith('careful');
        expect(error).toHaveBeenCalledWith('broken');
    });
});
