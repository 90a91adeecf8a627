import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import path from 'node:path';
import * as Acquisition from '@/acquisition';
import * as Pipeline from '@/pipeline';
import * as Store from '@/store';
import { DEFAULT_CONFIG, type Config } from '@/config';
import { ConfigurationError } from '@/errors';
import { StationError } from '@/flow';
import {
    concurrencyGauge,
    fakeAcquisitionServices,
    noRetryDelay,
    recorder,
    sleep,
    tempDir,
    testPolicy,
    type FakeOptions,
} from '../fakes';

const url = (id: string) => `https://www.youtube.com/watch?v=${id}`;
const CREDENTIALS = { openai: 'test-secret', zai: 'test-secret' };

describe('pipeline', () => {
    let root: string;

    beforeEach(async () => {
        root = await tempDir('pipeline-test');
    });

    afterEach(async () => {
        await fs.rm(root, { recursive: true, force: true });
    });

    const config = (overrides: Partial<Config> = {}): Config => ({
        ...DEFAULT_CONFIG,
        outputDir: path.join(root, 'output'),
        intermediateDir: path.join(root, 'intermediate'),
        mediaDir: path.join(root, 'media'),
        tempDir: path.join(root, 'tmp'),
        asrModel: 'test/asr',
        refineModel: 'test/llm',
        styles: ['summary', 'key_points'],
        ...overrides,
    });

    const services = (options: FakeOptions = {}, complete: (prompt: string) => Promise<string> = async () => 'refined') => ({
        expansion: {
            streaming: {
                list: async (target: string) => [{ url: target, title: `Video ${target.slice(-1).toUpperCase()}` }],
            },
            feeds: {
                read: async () => ({ episodes: [] }),
            },
        },
        acquisition: fakeAcquisitionServices(options).services,
        refinement: {
            llm: { complete: (prompt: string) => complete(prompt) },
        },
    });

    it('acquires three videos and refines each in two styles, one call at a time', async () => {
        const gauge = concurrencyGauge();
        const { reporter } = recorder();

        const report = await Pipeline.run({
            config: config(),
            policy: testPolicy(),
            credentials: CREDENTIALS,
            inputs: [{ input: url('a') }, { input: url('b') }, { input: url('c') }],
            services: services(
                { captions: { [url('a')]: 'captions for a', [url('b')]: 'captions for b' }, chunks: 2 },
                (prompt) => gauge.measure(async () => {
                    await sleep(2);
                    return `refined ${prompt.length}`;
                }),
            ),
            reporter,
            retry: noRetryDelay,
        });

        expect(report.counts).toEqual({
            acquired: 3,
            reused: 0,
            acquisitionFailures: 0,
            refined: 6,
            skipped: 0,
            refinementFailures: 0,
            cancelled: 0,
        });
        expect(report.ok).toBe(true);
        expect(report.lines.filter((l) => l.phase === 'acquire').map((l) => [l.id, l.detail.split(' ')[0]])).toEqual([
            ['Video A', 'captions'],
            ['Video B', 'captions'],
            ['Video C', 'transcription'],
        ]);
        expect(report.lines.filter((l) => l.phase === 'refine').map((l) => l.id)).toEqual([
            'Video A_summary',
            'Video A_key_points',
            'Video B_summary',
            'Video B_key_points',
            'Video C_summary',
            'Video C_key_points',
        ]);
        expect(gauge.peak).toBe(1);
        expect((await fs.readdir(path.join(root, 'output'))).sort()).toEqual([
            'Video A [key_points].md',
            'Video A [summary].md',
            'Video B [key_points].md',
            'Video B [summary].md',
            'Video C [key_points].md',
            'Video C [summary].md',
        ]);
        expect(await fs.readFile(path.join(root, 'intermediate', 'Video C_raw_transcript.txt'), 'utf-8')).toBe('chunk0 chunk1');
    });

    it('keeps going when one source fails', async () => {
        const report = await Pipeline.run({
            config: config({ transcribe: false, styles: ['summary'] }),
            policy: testPolicy(),
            credentials: { zai: 'test-secret' },
            inputs: [{ input: url('a') }, { input: url('b') }],
            services: services({ captions: { [url('a')]: 'captions for a' } }),
            reporter: recorder().reporter,
            retry: noRetryDelay,
        });

        expect(report.counts.acquired).toBe(1);
        expect(report.counts.acquisitionFailures).toBe(1);
        expect(report.counts.refined).toBe(1);
        expect(report.ok).toBe(false);
        expect(report.lines[1]).toEqual({
            phase: 'acquire',
            id: 'Video B',
            status: 'failure',
            detail: 'No captions available and transcription is disabled',
            category: 'source-unavailable',
        });
    });

    it('refines stored artifacts when only refinement runs', async () => {
        const store = Store.create(path.join(root, 'intermediate'));
        await store.saveArtifact('first', 'one', { title: 'First' });
        await store.saveArtifact('second', 'two', { title: 'Second' });

        const report = await Pipeline.run({
            config: config({ phase: 'refine', styles: ['summary'] }),
            policy: testPolicy(),
            credentials: { zai: 'test-secret' },
            services: services(),
            reporter: recorder().reporter,
            retry: noRetryDelay,
        });

        expect(report.lines.map((l) => [l.id, l.status])).toEqual([
            ['first_summary', 'success'],
            ['second_summary', 'success'],
        ]);
    });

    it('writes no documents when only acquisition runs', async () => {
        const report = await Pipeline.run({
            config: config({ phase: 'acquire' }),
            policy: testPolicy(),
            credentials: { openai: 'test-secret' },
            inputs: [{ input: url('a') }],
            services: services({ captions: { [url('a')]: 'captions' } }),
            reporter: recorder().reporter,
            retry: noRetryDelay,
        });

        expect(report.counts.acquired).toBe(1);
        expect(report.counts.refined).toBe(0);
        await expect(fs.access(path.join(root, 'output'))).rejects.toThrow();
    });

    it('finishes with an empty report when no input expands, cleaning up scratch space', async () => {
        const scratch = Acquisition.workRoot(path.join(root, 'tmp'));
        await fs.mkdir(path.join(scratch, 'stale'), { recursive: true });
        const { reporter, messages } = recorder();
        const report = await Pipeline.run({
            config: config(),
            policy: testPolicy(),
            credentials: CREDENTIALS,
            inputs: [{ input: path.join(root, 'missing.mp3') }],
            services: services(),
            reporter,
        });

        expect(report.lines).toEqual([]);
        expect(report.ok).toBe(true);
        expect(messages.map(([message]) => message)).toContain('No sources found in the given inputs');
        await expect(fs.access(scratch)).rejects.toThrow();
    });

    it('requires the ASR key for local media even when transcription is off', async () => {
        await fs.writeFile(path.join(root, 'talk.mp3'), '');

        const running = Pipeline.run({
            config: config({ transcribe: false }),
            policy: testPolicy(),
            credentials: { zai: 'test-secret' },
            inputs: [{ input: path.join(root, 'talk.mp3') }],
            services: services(),
            reporter: recorder().reporter,
            retry: noRetryDelay,
        });

        await expect(running).rejects.toThrow(StationError);
        await expect(running).rejects.toThrow('Station "expand" failed during finalize: Missing API key(s): OPENAI_API_KEY (for test/asr)');
        await expect(fs.access(path.join(root, 'intermediate'))).rejects.toThrow();
    });

    it('records every unit as cancelled when cancelled up front', async () => {
        const report = await Pipeline.run({
            config: config(),
            policy: testPolicy(),
            credentials: CREDENTIALS,
            inputs: [{ input: url('a') }, { input: url('b') }],
            services: services(),
            reporter: recorder().reporter,
            isCancelled: () => true,
        });

        expect(report.cancelled).toBe(true);
        expect(report.counts.cancelled).toBe(2);
        expect(report.counts.refined).toBe(0);
    });

    describe('validateRun', () => {
        it('requires a key for every model the run calls', () => {
            expect(() => Pipeline.validateRun(config(), testPolicy(), { openai: 'test-secret' }))
                .toThrow('Missing API key(s): ZAI_API_KEY (for test/llm)');
        });

        it('does not need an ASR key when transcription is off', () => {
            expect(() => Pipeline.validateRun(config({ transcribe: false }), testPolicy(), { zai: 'test-secret' })).not.toThrow();
        });

        it('needs the ASR key once local media or feed episodes are listed', () => {
            const noTranscription = config({ transcribe: false });
            expect(() => Pipeline.validateRun(noTranscription, testPolicy(), { zai: 'test-secret' }, ['streaming-media-url'])).not.toThrow();
            expect(() => Pipeline.validateRun(noTranscription, testPolicy(), { zai: 'test-secret' }, ['local-media-file']))
                .toThrow('Missing API key(s): OPENAI_API_KEY (for test/asr)');
            expect(() => Pipeline.validateRun(noTranscription, testPolicy(), { zai: 'test-secret' }, ['feed-episode']))
                .toThrow('Missing API key(s): OPENAI_API_KEY (for test/asr)');
        });

        it('rejects unknown models', () => {
            expect(() => Pipeline.validateRun(config({ refineModel: 'nope/model' }), testPolicy(), CREDENTIALS)).toThrow(ConfigurationError);
        });
    });

    describe('createFlowForPhases', () => {
        it('needs at least one phase', () => {
            expect(() => Pipeline.createFlowForPhases(false, false)).toThrow(ConfigurationError);
        });

        it('starts at expansion when acquiring and at planning otherwise', () => {
            expect(Pipeline.createFlowForPhases(true, true).start.name).toBe('expand');
            expect(Pipeline.createFlowForPhases(true, false).start.name).toBe('expand');
            expect(Pipeline.createFlowForPhases(false, true).start.name).toBe('plan');
        });

        it('sends an empty expansion through cleanup', () => {
            const flow = Pipeline.createFlowForPhases(true, true);
            const cleanup = flow.successor(flow.start, 'no-input');
            expect(cleanup?.name).toBe('cleanup');
            if (!cleanup) return;
            expect(flow.successor(cleanup, 'done')?.name).toBe('complete');
        });

        it('skips planning and refinement in acquisition-only runs', () => {
            const flow = Pipeline.createFlowForPhases(true, false);
            const acquire = flow.successor(flow.start, 'acquire');
            expect(acquire?.name).toBe('acquire');
            if (!acquire) return;
            expect(flow.successor(acquire, 'done')?.name).toBe('cleanup');
        });
    });
});
