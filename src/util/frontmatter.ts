/**
 * Front matter for refined documents, written with gray-matter.
 */

import matter from 'gray-matter';
import { type SourceMetadata, formatDuration, normalize } from '@/util/metadata';
import { PIPELINE_VERSION } from '@/constants';

export interface DocumentFields {
    metadata: SourceMetadata;
    style: string;
    language?: string;
    transcriptChars: number;
    modelUsed?: string;
}

export interface ParsedDocument {
    data: Record<string, unknown>;
    body: string;
}

/**
 * Fixed key order; empty values are left out.
 */
export function buildFrontmatter(fields: DocumentFields): Record<string, unknown> {
    const metadata = normalize(fields.metadata);
    const entries: Array<[string, unknown]> = [
        ['title', metadata.title],
        ['source_type', metadata.sourceType],
        ['source_url', metadata.sourceUrl],
        ['author', metadata.author],
        ['published_at', metadata.publishedAt],
        ['fetched_at', metadata.fetchedAt],
        ['language', fields.language ?? metadata.language],
        ['style', fields.style],
        ['description', metadata.description],
        ['tags', metadata.tags],
        ['duration', formatDuration(metadata.durationSeconds)],
        ['transcript_chars', fields.transcriptChars],
        ['model_used', fields.modelUsed ?? metadata.modelUsed],
        ['pipeline_version', PIPELINE_VERSION],
    ];

    const fm: Record<string, unknown> = {};
    for (const [key, value] of entries) {
        if (value === undefined || value === '') continue;
        if (Array.isArray(value) && value.length === 0) continue;
        fm[key] = value;
    }
    return fm;
}

export function stringifyDocument(fields: DocumentFields, body: string): string {
    return matter.stringify(body.trim() + '\n', buildFrontmatter(fields));
}

export function parseDocument(content: string): ParsedDocument {
    const parsed = matter(content);
    return { data: parsed.data, body: parsed.content.trim() };
}
