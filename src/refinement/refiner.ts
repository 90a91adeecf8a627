/**
 * Refiner
 *
 * Builds the prompts for one (text, style) pair and runs them in order.
 * Long text is split on paragraph boundaries; each piece after the first
 * is marked as a continuation.
 */

import { FULL_TEXT_PLACEHOLDER, LANGUAGE_PLACEHOLDER } from '@/prompt/styles';

export const CONTINUATION_NOTE = '\n\n[This continues the previous part of the same text. Keep refining in the same style.]\n\n';

export const countWords = (text: string): number => text.split(/\s+/).filter(Boolean).length;

/**
 * Paragraphs are packed greedily until adding the next one would pass
 * `chunkSize` words. A single paragraph longer than that is cut by words.
 */
export const splitIntoChunks = (text: string, chunkSize: number): string[] => {
    const paragraphs = text.split(/\n\s*\n/).map((p) => p.trim()).filter(Boolean);
    const chunks: string[] = [];
    let current: string[] = [];
    let currentWords = 0;

    const flush = () => {
        if (current.length > 0) {
            chunks.push(current.join('\n\n'));
            current = [];
            currentWords = 0;
        }
    };

    for (const paragraph of paragraphs) {
        const words = countWords(paragraph);
        if (words > chunkSize) {
            flush();
            const tokens = paragraph.split(/\s+/).filter(Boolean);
            for (let i = 0; i < tokens.length; i += chunkSize) {
                chunks.push(tokens.slice(i, i + chunkSize).join(' '));
            }
            continue;
        }
        if (currentWords + words > chunkSize) flush();
        current.push(paragraph);
        currentWords += words;
    }
    flush();
    return chunks;
};

export const buildPrompts = (template: string, text: string, language: string, chunkSize: number): string[] => {
    const prompt = template.split(LANGUAGE_PLACEHOLDER).join(language);
    if (prompt.includes(FULL_TEXT_PLACEHOLDER)) {
        return [prompt.split(FULL_TEXT_PLACEHOLDER).join(text)];
    }
    if (chunkSize > 0 && countWords(text) > chunkSize) {
        return splitIntoChunks(text, chunkSize).map((chunk, index) =>
            index === 0 ? prompt + chunk : prompt + CONTINUATION_NOTE + chunk);
    }
    return [prompt + text];
};

export const refine = async (
    complete: (prompt: string) => Promise<string>,
    template: string,
    text: string,
    language: string,
    chunkSize: number,
): Promise<string> => {
    const outputs: string[] = [];
    for (const prompt of buildPrompts(template, text, language, chunkSize)) {
        outputs.push((await complete(prompt)).trim());
    }
    return outputs.join('\n\n');
};
