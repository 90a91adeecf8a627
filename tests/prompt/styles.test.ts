import { describe, it, expect } from 'vitest';
import * as Styles from '@/prompt/styles';
import { ConfigurationError } from '@/errors';

describe('styles', () => {
    it('lists the built-in styles', () => {
        expect(Styles.styleIds()).toEqual(['summary', 'detailed_notes', 'key_points', 'translation', 'meeting_minutes']);
    });

    it('only knows its own ids', () => {
        expect(Styles.isStyleId('key_points')).toBe(true);
        expect(Styles.isStyleId('toString')).toBe(false);
    });

    it('renders persona, constraints and the source trailer', () => {
        const style = Styles.getStyle('key_points');

        expect(style.label).toBe('Key points');
        expect(style.template).toBe([
            'You extract the essential takeaways from long material.',
            '',
            '- Write in [Language].',
            '- Return a bulleted Markdown list of at most fifteen key points.',
            '- Each bullet is one sentence and stands on its own.',
            '',
            'Source text:\n\n',
        ].join('\n'));
    });

    it('places the full text inside the meeting minutes template', () => {
        const { template } = Styles.getStyle('meeting_minutes');

        expect(template.endsWith(`Meeting transcript:\n\n${Styles.FULL_TEXT_PLACEHOLDER}`)).toBe(true);
    });

    it('rejects unknown styles', () => {
        expect(() => Styles.getStyle('poem')).toThrow(ConfigurationError);
    });
});
