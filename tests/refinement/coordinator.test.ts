import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import path from 'node:path';
import * as Refinement from '@/refinement';
import * as Store from '@/store';
import { parseDocument } from '@/util/frontmatter';
import { ProviderRejectedError } from '@/errors';
import type { SourceMetadata } from '@/util/metadata';
import { concurrencyGauge, noRetryDelay, recorder, sleep, tempDir, testPolicy } from '../fakes';

describe('refinement coordinator', () => {
    let root: string;
    let store: Store.ArtifactStore;
    let outputDir: string;

    beforeEach(async () => {
        root = await tempDir('refinement-test');
        store = Store.create(path.join(root, 'intermediate'));
        outputDir = path.join(root, 'output');
    });

    afterEach(async () => {
        await fs.rm(root, { recursive: true, force: true });
    });

    const source = async (identity: string, text: string, metadata: SourceMetadata = { title: identity }): Promise<Refinement.RefinementSource> => ({
        identity,
        path: await store.saveArtifact(identity, text, metadata),
    });

    const config = (overrides: Partial<Refinement.RefinementConfig> = {}): Refinement.RefinementConfig => ({
        refineModel: 'test/llm',
        maxAsyncWorkers: 4,
        chunkSize: 1000,
        skipExisting: false,
        enhance: false,
        ...overrides,
    });

    const coordinator = (
        complete: (prompt: string) => Promise<string>,
        overrides: Partial<Refinement.RefinementConfig> = {},
        isCancelled: () => boolean = () => false,
    ) => {
        const { reporter, messages } = recorder();
        const instance = Refinement.create({
            config: config(overrides),
            policy: testPolicy(),
            services: { llm: { complete: (prompt) => complete(prompt) } },
            store,
            reporter,
            isCancelled,
            retry: noRetryDelay,
        });
        return { instance, messages };
    };

    const tasksFor = (sources: Refinement.RefinementSource[], styles: string[]) =>
        Refinement.createRefinementTasks({ sources, styles, language: 'English', outputDir });

    it('writes one document per task with front matter', async () => {
        const tasks = tasksFor([await source('talk', 'the raw words', { title: 'Talk', sourceType: 'local-media-file' })], ['summary']);

        const results = await coordinator(async () => '# Refined\n\nText.').instance.run(tasks);

        expect(results.get('talk_summary')).toEqual({
            id: 'talk_summary',
            identity: 'talk',
            styleId: 'summary',
            jobId: undefined,
            status: 'success',
            outputPath: path.join(outputDir, 'talk [summary].md'),
        });
        const document = parseDocument(await fs.readFile(path.join(outputDir, 'talk [summary].md'), 'utf-8'));
        expect(document.body).toBe('# Refined\n\nText.');
        expect(document.data).toMatchObject({
            title: 'Talk',
            source_type: 'local-media-file',
            language: 'English',
            style: 'summary',
            transcript_chars: 13,
            model_used: 'test/llm',
        });
    });

    it('runs one task at a time on a model with a ceiling of one', async () => {
        const gauge = concurrencyGauge();
        const tasks = tasksFor([await source('a', 'one'), await source('b', 'two')], ['summary', 'key_points']);

        const { instance } = coordinator((prompt) => gauge.measure(async () => {
            await sleep(5);
            return `reply to ${prompt.length}`;
        }));
        const results = await instance.run(tasks);

        expect(instance.concurrency).toBe(1);
        expect(results.size).toBe(4);
        expect(gauge.peak).toBe(1);
    });

    it('skips tasks whose output exists', async () => {
        const tasks = tasksFor([await source('talk', 'words')], ['summary', 'key_points']);
        await fs.mkdir(outputDir, { recursive: true });
        await fs.writeFile(path.join(outputDir, 'talk [summary].md'), 'keep me');
        const prompts: string[] = [];

        const results = await coordinator(async (prompt) => {
            prompts.push(prompt);
            return 'new';
        }, { skipExisting: true }).instance.run(tasks);

        expect(results.get('talk_summary')?.status).toBe('skipped');
        expect(results.get('talk_key_points')?.status).toBe('success');
        expect(prompts).toHaveLength(1);
        expect(await fs.readFile(path.join(outputDir, 'talk [summary].md'), 'utf-8')).toBe('keep me');
    });

    it('captures a failing task without stopping the rest', async () => {
        const tasks = tasksFor([await source('good', 'fine text'), await source('bad', 'BAD text')], ['summary']);

        const results = await coordinator(async (prompt) => {
            if (prompt.includes('BAD')) throw new ProviderRejectedError('content refused');
            return 'ok';
        }).instance.run(tasks);

        expect(results.get('good_summary')?.status).toBe('success');
        expect(results.get('bad_summary')).toMatchObject({ status: 'failure', category: 'provider-rejected', error: 'content refused' });
    });

    it('enhances metadata once per source and writes it to every document', async () => {
        const tasks = tasksFor([await source('talk', 'words about testing')], ['summary', 'key_points']);
        let enhancementCalls = 0;

        const results = await coordinator(async (prompt) => {
            if (prompt.startsWith('Describe the following')) {
                enhancementCalls++;
                return '{"description": "All about testing", "tags": ["Testing", "ci", "quality"]}';
            }
            return 'refined';
        }, { enhance: true }).instance.run(tasks);

        expect([...results.values()].map((r) => r.status)).toEqual(['success', 'success']);
        expect(enhancementCalls).toBe(1);
        for (const file of ['talk [summary].md', 'talk [key_points].md']) {
            const document = parseDocument(await fs.readFile(path.join(outputDir, file), 'utf-8'));
            expect(document.data.description).toBe('All about testing');
            expect(document.data.tags).toEqual(['testing', 'ci', 'quality']);
        }
    });

    it('still writes the document when enhancement fails', async () => {
        const tasks = tasksFor([await source('talk', 'words')], ['summary']);

        const results = await coordinator(async (prompt) =>
            prompt.startsWith('Describe the following') ? 'no json here' : 'refined', { enhance: true }).instance.run(tasks);

        expect(results.get('talk_summary')?.status).toBe('success');
        const document = parseDocument(await fs.readFile(path.join(outputDir, 'talk [summary].md'), 'utf-8'));
        expect(document.data.description).toBeUndefined();
    });

    it('marks every task cancelled once cancellation is requested', async () => {
        const tasks = tasksFor([await source('talk', 'words')], ['summary', 'key_points']);
        let calls = 0;

        const results = await coordinator(async () => {
            calls++;
            return 'x';
        }, {}, () => true).instance.run(tasks);

        expect([...results.values()].map((r) => r.status)).toEqual(['cancelled', 'cancelled']);
        expect(calls).toBe(0);
    });
});
