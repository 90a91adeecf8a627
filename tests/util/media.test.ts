import { describe, it, expect } from 'vitest';
import * as Media from '@/util/media';

describe('media', () => {
    describe('planSegments', () => {
        it('cuts at the latest silence inside each window', () => {
            expect(Media.planSegments(1500, [1100, 550, 200], 600, 30)).toEqual([
                { start: 0, end: 550 },
                { start: 550, end: 1100 },
                { start: 1100, end: 1500 },
            ]);
        });

        it('cuts at the maximum length without silences', () => {
            expect(Media.planSegments(1300, [], 600, 30)).toEqual([
                { start: 0, end: 600 },
                { start: 600, end: 1200 },
                { start: 1200, end: 1300 },
            ]);
        });

        it('ignores silences that would leave a segment too short', () => {
            expect(Media.planSegments(700, [10], 600, 30)).toEqual([
                { start: 0, end: 600 },
                { start: 600, end: 700 },
            ]);
        });

        it('keeps short media whole', () => {
            expect(Media.planSegments(600, [300], 600, 30)).toEqual([{ start: 0, end: 600 }]);
        });
    });

    describe('parseSilenceLine', () => {
        it('reads silence starts and ends', () => {
            expect(Media.parseSilenceLine('[silencedetect @ 0x1] silence_start: 12.5')).toEqual({ start: 12.5 });
            expect(Media.parseSilenceLine('[silencedetect @ 0x1] silence_end: 14 | silence_duration: 1.5')).toEqual({ end: 14 });
        });

        it('ignores other output', () => {
            expect(Media.parseSilenceLine('size=N/A time=00:01:00.00')).toEqual({});
        });
    });
});
