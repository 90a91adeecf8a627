import { describe, it, expect } from 'vitest';
import { CONTINUATION_NOTE, buildPrompts, countWords, refine, splitIntoChunks } from '@/refinement';

const TEMPLATE = 'Write in [Language].\n\nSource:\n\n';

describe('refiner', () => {
    it('counts words on any whitespace', () => {
        expect(countWords('  one two\nthree\t four ')).toBe(4);
        expect(countWords('')).toBe(0);
    });

    describe('splitIntoChunks', () => {
        it('packs whole paragraphs up to the word limit', () => {
            expect(splitIntoChunks('a b c\n\nd e\n\nf g h i', 5)).toEqual(['a b c\n\nd e', 'f g h i']);
        });

        it('cuts an oversized paragraph by words', () => {
            expect(splitIntoChunks('w1 w2 w3 w4 w5 w6 w7', 3)).toEqual(['w1 w2 w3', 'w4 w5 w6', 'w7']);
        });
    });

    describe('buildPrompts', () => {
        it('fills the language and appends the text', () => {
            expect(buildPrompts(TEMPLATE, 'one two three', 'German', 10)).toEqual(['Write in German.\n\nSource:\n\none two three']);
        });

        it('splits long text and marks continuations', () => {
            expect(buildPrompts(TEMPLATE, 'a b c\n\nd e f', 'German', 3)).toEqual([
                'Write in German.\n\nSource:\n\na b c',
                `Write in German.\n\nSource:\n\n${CONTINUATION_NOTE}d e f`,
            ]);
        });

        it('never splits a template that takes the full text', () => {
            const prompts = buildPrompts('Minutes in [Language]:\n\n[full_transcript_text]\n\nEnd.', 'a b c d e f', 'French', 2);
            expect(prompts).toEqual(['Minutes in French:\n\na b c d e f\n\nEnd.']);
        });
    });

    it('refines pieces in order and joins the replies', async () => {
        const seen: string[] = [];
        const output = await refine(async (prompt) => {
            seen.push(prompt);
            return `  part ${seen.length}  `;
        }, TEMPLATE, 'a b c\n\nd e f', 'English', 3);

        expect(seen).toHaveLength(2);
        expect(output).toBe('part 1\n\npart 2');
    });
});
