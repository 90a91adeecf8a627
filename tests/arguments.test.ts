import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import * as Arguments from '@/arguments';
import { DEFAULT_CONFIG_FILE } from '@/constants';

describe('arguments', () => {
    describe('parse', () => {
        it('collects inputs and only the options given', () => {
            const args = Arguments.parse(['--styles', 'summary,key_points', '-o', 'out', 'talk.mp4', 'notes.md'], 'user');

            expect(args.inputs).toEqual(['talk.mp4', 'notes.md']);
            expect(args.configFile).toBe(DEFAULT_CONFIG_FILE);
            expect(args.csv).toBeUndefined();
            expect(args.overrides).toEqual({ styles: ['summary', 'key_points'], outputDir: 'out' });
        });

        it('maps negated flags onto their configuration keys', () => {
            const args = Arguments.parse(['--no-captions', '--no-transcribe'], 'user');

            expect(args.overrides).toEqual({ preferCaptions: false, transcribe: false });
        });

        it('parses numbers, ranges and the phase', () => {
            const args = Arguments.parse(
                ['--phase', 'refine', '--feed-range', '2:4', '--max-async-workers', '8', '--models', 'models.yaml', '--csv', 'jobs.csv', '-c', 'my.yaml'],
                'user',
            );

            expect(args.overrides).toEqual({
                phase: 'refine',
                feedRange: { start: 2, end: 4 },
                maxAsyncWorkers: 8,
                modelsFile: 'models.yaml',
            });
            expect(args.csv).toBe('jobs.csv');
            expect(args.configFile).toBe('my.yaml');
        });

        it('leaves overrides empty without options', () => {
            expect(Arguments.parse([], 'user').overrides).toEqual({});
        });
    });

    describe('parseFeedRange', () => {
        it('reads the three forms', () => {
            expect(Arguments.parseFeedRange('3')).toEqual({ start: 3, end: 0 });
            expect(Arguments.parseFeedRange('3:5')).toEqual({ start: 3, end: 5 });
            expect(Arguments.parseFeedRange(':5')).toEqual({ start: 1, end: 5 });
        });

        it('rejects malformed ranges', () => {
            expect(() => Arguments.parseFeedRange('x')).toThrow('Expected START, START:END or :END.');
            expect(() => Arguments.parseFeedRange(':')).toThrow(InvalidArgumentError);
        });

        it('rejects ranges that start at zero or run backwards', () => {
            expect(() => Arguments.parseFeedRange('0')).toThrow('START must be at least 1 and END not before START.');
            expect(() => Arguments.parseFeedRange('5:3')).toThrow(InvalidArgumentError);
        });
    });

    it('accepts positive integers only', () => {
        expect(Arguments.parsePositiveInt('4')).toBe(4);
        for (const value of ['0', '-1', '1.5', 'four']) {
            expect(() => Arguments.parsePositiveInt(value)).toThrow('Must be a positive integer.');
        }
    });

    it('splits styles on commas', () => {
        expect(Arguments.parseStyles('summary, key_points,')).toEqual(['summary', 'key_points']);
    });
});
