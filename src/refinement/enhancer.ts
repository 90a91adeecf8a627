import { z } from 'zod';
import { MAX_DESCRIPTION_LENGTH } from '@/constants';
import { type SourceMetadata, normalize, normalizeTags, truncateDescription } from '@/util/metadata';
import { ProviderRejectedError } from '@/errors';

const ENHANCEMENT_SAMPLE_CHARS = 6000;

const EnhancementSchema = z.object({
    description: z.string().min(1),
    tags: z.array(z.string()).min(3).max(5),
});

export type Enhancement = z.infer<typeof EnhancementSchema>;

export const buildEnhancementPrompt = (text: string, metadata: SourceMetadata): string => {
    const lines = [
        'Describe the following material for a notes library.',
        `Reply with JSON only: {"description": string of at most ${MAX_DESCRIPTION_LENGTH} characters, "tags": array of 3 to 5 lowercase keywords}.`,
    ];
    if (metadata.title) lines.push(`Title: ${metadata.title}`);
    lines.push('', text.slice(0, ENHANCEMENT_SAMPLE_CHARS));
    return lines.join('\n');
};

/**
 * Pull the first JSON object out of a model reply, tolerating code fences
 * and chatter around it.
 */
export const parseEnhancement = (reply: string): Enhancement => {
    const start = reply.indexOf('{');
    const end = reply.lastIndexOf('}');
    if (start === -1 || end <= start) {
        throw new ProviderRejectedError('Enhancement reply contained no JSON object');
    }
    let raw: unknown;
    try {
        raw = JSON.parse(reply.slice(start, end + 1));
    } catch (error) {
        throw new ProviderRejectedError('Enhancement reply was not valid JSON', { cause: error });
    }
    const parsed = EnhancementSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ProviderRejectedError(`Enhancement reply had the wrong shape: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }
    return parsed.data;
};

/**
 * Only fills what is missing; factual fields are never touched.
 */
export const mergeEnhancement = (metadata: SourceMetadata, enhancement: Enhancement): SourceMetadata => normalize({
    ...metadata,
    description: metadata.description ?? truncateDescription(enhancement.description),
    tags: metadata.tags && metadata.tags.length > 0 ? metadata.tags : normalizeTags(enhancement.tags),
});
