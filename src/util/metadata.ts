import { MAX_DESCRIPTION_LENGTH, MAX_TAGS } from '@/constants';

/**
 * Factual fields describing where a piece of raw text came from. Persisted
 * as the metadata sidecar next to each raw-text artifact.
 */
export interface SourceMetadata {
    title?: string;
    sourceType?: string;
    sourceUrl?: string;
    author?: string;
    publishedAt?: string;
    fetchedAt?: string;
    durationSeconds?: number;
    language?: string;
    description?: string;
    tags?: string[];
    modelUsed?: string;
}

/**
 * Accepts ISO-8601 strings and compact `yyyymmdd`. Date-only values stay
 * date-only; anything with a time becomes a full UTC ISO string.
 */
export const normalizeDate = (value: string | undefined): string | undefined => {
    if (!value) return undefined;
    const trimmed = value.trim();

    const compact = /^(\d{4})(\d{2})(\d{2})$/.exec(trimmed);
    if (compact) {
        const iso = `${compact[1]}-${compact[2]}-${compact[3]}`;
        return isNaN(Date.parse(iso)) ? undefined : iso;
    }
    if (/^\d{4}-\d{2}-\d{2}$/.test(trimmed)) {
        return isNaN(Date.parse(trimmed)) ? undefined : trimmed;
    }

    const parsed = Date.parse(trimmed);
    return isNaN(parsed) ? undefined : new Date(parsed).toISOString();
};

export const normalizeTag = (tag: string): string =>
    tag
        .toLowerCase()
        .trim()
        .replace(/[\s_]+/g, '-')
        .replace(/[^\p{L}\p{N}-]/gu, '')
        .replace(/-+/g, '-')
        .replace(/^-|-$/g, '');

export const normalizeTags = (tags: readonly string[] | undefined): string[] | undefined => {
    if (!tags) return undefined;
    const unique: string[] = [];
    for (const tag of tags) {
        const normalized = normalizeTag(tag);
        if (normalized && !unique.includes(normalized)) unique.push(normalized);
        if (unique.length === MAX_TAGS) break;
    }
    return unique.length > 0 ? unique : undefined;
};

export const formatDuration = (seconds: number | undefined): string | undefined => {
    if (seconds === undefined || !Number.isFinite(seconds) || seconds < 0) return undefined;
    const total = Math.round(seconds);
    const h = Math.floor(total / 3600);
    const m = Math.floor((total % 3600) / 60);
    const s = total % 60;
    return [h, m, s].map((n) => String(n).padStart(2, '0')).join(':');
};

export const truncateDescription = (description: string | undefined): string | undefined => {
    if (!description) return undefined;
    const trimmed = description.replace(/\s+/g, ' ').trim();
    if (!trimmed) return undefined;
    return trimmed.length > MAX_DESCRIPTION_LENGTH ? trimmed.slice(0, MAX_DESCRIPTION_LENGTH).trimEnd() : trimmed;
};

export const normalize = (metadata: SourceMetadata): SourceMetadata => {
    const result: SourceMetadata = { ...metadata };
    result.publishedAt = normalizeDate(metadata.publishedAt);
    result.fetchedAt = normalizeDate(metadata.fetchedAt);
    result.tags = normalizeTags(metadata.tags);
    result.description = truncateDescription(metadata.description);
    if (result.durationSeconds !== undefined && (!Number.isFinite(result.durationSeconds) || result.durationSeconds < 0)) {
        result.durationSeconds = undefined;
    }
    for (const key of Object.keys(result)) {
        if (Reflect.get(result, key) === undefined) Reflect.deleteProperty(result, key);
    }
    return result;
};

export const needsEnhancement = (metadata: SourceMetadata): boolean =>
    !metadata.description || !metadata.tags || metadata.tags.length === 0;
