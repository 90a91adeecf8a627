/**
 * Refinement Styles
 *
 * Each style is a persona plus constraints, rendered into a single prompt
 * template. Templates carry two placeholders:
 *
 *   [Language]              the output language
 *   [full_transcript_text]  where the whole transcript goes; when present,
 *                           the text is never chunked
 *
 * Templates without the second placeholder get the text appended.
 */

import { ConfigurationError } from '@/errors';

export const LANGUAGE_PLACEHOLDER = '[Language]';
export const FULL_TEXT_PLACEHOLDER = '[full_transcript_text]';

export interface StyleDefinition {
    label: string;
    persona: string;
    constraints: string[];
    /** Replaces the default "text follows" trailer. */
    trailer?: string;
}

export interface Style {
    id: string;
    label: string;
    template: string;
}

export const STYLES: Record<string, StyleDefinition> = {
    summary: {
        label: 'Summary',
        persona: 'You are an editor who writes concise, faithful summaries of spoken and written material.',
        constraints: [
            'Write in [Language].',
            'Open with a two or three sentence overview, then list the main points as short paragraphs.',
            'Never add facts that are not in the source text.',
            'Use Markdown headings and lists where they help reading.',
        ],
    },
    detailed_notes: {
        label: 'Detailed notes',
        persona: 'You are a careful note-taker turning a raw transcript into well organised study notes.',
        constraints: [
            'Write in [Language].',
            'Keep every substantive point, example and number from the source.',
            'Remove filler words, false starts and repetitions.',
            'Group related material under Markdown headings that follow the order of the source.',
        ],
    },
    key_points: {
        label: 'Key points',
        persona: 'You extract the essential takeaways from long material.',
        constraints: [
            'Write in [Language].',
            'Return a bulleted Markdown list of at most fifteen key points.',
            'Each bullet is one sentence and stands on its own.',
        ],
    },
    translation: {
        label: 'Cleaned translation',
        persona: 'You are a professional translator producing a readable written version of a transcript.',
        constraints: [
            'Translate the full text into [Language]; do not summarise.',
            'Fix punctuation and paragraphing, drop filler words, keep the speaker\'s meaning and tone.',
        ],
    },
    meeting_minutes: {
        label: 'Meeting minutes',
        persona: 'You are a secretary writing minutes from a meeting recording.',
        constraints: [
            'Write the minutes in the language the meeting was held in.',
            'Sections: Attendees (if named), Agenda, Discussion, Decisions, Action items with owners.',
            'Do not invent attendees, owners or dates.',
        ],
        trailer: `Meeting transcript:\n\n${FULL_TEXT_PLACEHOLDER}`,
    },
};

export const renderTemplate = (definition: StyleDefinition): string => {
    const lines = [
        definition.persona,
        '',
        ...definition.constraints.map((c) => `- ${c}`),
        '',
        definition.trailer ?? 'Source text:\n\n',
    ];
    return lines.join('\n');
};

export const styleIds = (): string[] => Object.keys(STYLES);

export const isStyleId = (id: string): boolean => Object.prototype.hasOwnProperty.call(STYLES, id);

export const getStyle = (id: string): Style => {
    if (!isStyleId(id)) {
        throw new ConfigurationError(`Unknown style "${id}". Available styles: ${styleIds().join(', ')}`);
    }
    const definition = STYLES[id];
    return { id, label: definition.label, template: renderTemplate(definition) };
};
