/**
 * CSV Batch Input
 *
 * Header row required. Columns: input (required), styles, language,
 * output_subdir. Each data row is one job, numbered from 1.
 */

import { ConfigurationError } from '@/errors';
import { isStyleId, styleIds } from '@/prompt/styles';
import type { JobOverrides } from '@/refinement';
import type { InputSpec } from './types';

export interface BatchJob extends JobOverrides {
    jobId: number;
    input: string;
}

export interface Batch {
    jobs: BatchJob[];
    inputs: InputSpec[];
    overrides: Map<number, JobOverrides>;
}

export const parseCsvLine = (line: string): string[] => {
    const out: string[] = [];
    let cur = '';
    let inQuotes = false;
    for (let i = 0; i < line.length; i++) {
        const ch = line[i];
        if (ch === '"') {
            if (inQuotes && line[i + 1] === '"') {
                cur += '"';
                i++;
                continue;
            }
            inQuotes = !inQuotes;
            continue;
        }
        if (ch === ',' && !inQuotes) {
            out.push(cur);
            cur = '';
            continue;
        }
        cur += ch;
    }
    out.push(cur);
    return out;
};

export const parseBatch = (content: string): Batch => {
    const lines = content
        .replace(/^\uFEFF/, '')
        .replace(/\r\n/g, '\n')
        .split('\n')
        .filter((line) => line.trim().length > 0);
    if (lines.length === 0) {
        throw new ConfigurationError('CSV file is empty');
    }

    const header = parseCsvLine(lines[0]).map((h) => h.trim().toLowerCase());
    const column = (name: string) => header.indexOf(name);
    const inputColumn = column('input');
    if (inputColumn === -1) {
        throw new ConfigurationError('CSV file has no "input" column');
    }

    const jobs: BatchJob[] = [];
    for (let i = 1; i < lines.length; i++) {
        const cells = parseCsvLine(lines[i]).map((cell) => cell.trim());
        const cell = (name: string): string | undefined => {
            const index = column(name);
            const value = index === -1 ? undefined : cells[index];
            return value ? value : undefined;
        };

        const jobId = jobs.length + 1;
        const input = cells[inputColumn];
        if (!input) {
            throw new ConfigurationError(`CSV row ${i + 1} has an empty input`);
        }

        const styles = cell('styles')?.split(',').map((s) => s.trim()).filter(Boolean);
        const unknown = styles?.filter((s) => !isStyleId(s)) ?? [];
        if (unknown.length > 0) {
            throw new ConfigurationError(`CSV row ${i + 1} names unknown style(s) ${unknown.join(', ')}; available: ${styleIds().join(', ')}`);
        }

        jobs.push({
            jobId,
            input,
            styles,
            language: cell('language'),
            outputSubdir: cell('output_subdir'),
        });
    }

    return {
        jobs,
        inputs: jobs.map((job) => ({ input: job.input, jobId: job.jobId })),
        overrides: new Map(jobs.map((job) => [job.jobId, { styles: job.styles, language: job.language, outputSubdir: job.outputSubdir }])),
    };
};
