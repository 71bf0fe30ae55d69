import { describe, it, expect } from 'vitest';
import { PlaybackSynchronizer } from './PlaybackSynchronizer';
import type { BabelLyrics } from '../models/BabelLyrics';

const EN = '11111111-1111-4111-8111-111111111111';

describe('PlaybackSynchronizer', () => {
    const sync = new PlaybackSynchronizer();
    const lyrics: BabelLyrics = {
        metadata: {
            agents: [{ id: 'v1' }],
            translations: [{ language: 'en', id: EN }]
        },
        lyrics: {
            lines: [
                {
                    begin: 1000,
                    end: 3000,
                    agent_id: 'v1',
                    uuid: 'line-1',
                    original: [
                        { begin: 1000, end: 1500, text: 'Guten', translations: [[EN, [1]]] },
                        { begin: 1500, end: 1500, text: ' ', translations: [[EN, []]] },
                        { begin: 1500, end: 2500, text: 'Tag', translations: [[EN, [0]]] }
                    ],
                    translations: [[EN, ['day', 'good']]]
                },
                {
                    begin: 3000,
                    end: 4000,
                    agent_id: 'v1',
                    uuid: 'line-2',
                    original: [
                        { begin: 3000, end: 4000, text: 'Servus', translations: [[EN, []]] }
                    ],
                    translations: [[EN, []]]
                }
            ]
        }
    };

    it('should find correct line using binary search', () => {
        // Before first line
        expect(sync.findLineIndex(lyrics, 0)).toBe(-1);
        expect(sync.findLineIndex(lyrics, 999)).toBe(-1);

        expect(sync.findLineIndex(lyrics, 1000)).toBe(0);
        expect(sync.findLineIndex(lyrics, 2999)).toBe(0);
        expect(sync.findLineIndex(lyrics, 3000)).toBe(1);
        expect(sync.findLineIndex(lyrics, 99999)).toBe(1);
    });

    it('should calculate progress', () => {
        const line = lyrics.lyrics.lines[0];
        expect(sync.calculateLineProgress(line, 500)).toBe(0);
        expect(sync.calculateLineProgress(line, 2000)).toBe(0.5);
        expect(sync.calculateLineProgress(line, 5000)).toBe(1);

        const instant = { ...line, begin: 2000, end: 2000 };
        expect(sync.calculateLineProgress(instant, 0)).toBe(1);
    });

    it('should exclude both boundaries from the active range', () => {
        const span = { begin: 1000, end: 2000 };
        expect(sync.isActive(span, 1000)).toBe(false);
        expect(sync.isActive(span, 1001)).toBe(true);
        expect(sync.isActive(span, 1999)).toBe(true);
        expect(sync.isActive(span, 2000)).toBe(false);
    });

    it('should highlight sung segments and their linked translation words', () => {
        const captions = sync.buildCaptions(lyrics, 1200);

        expect(captions).toEqual([{
            uuid: 'line-1',
            agentId: 'v1',
            active: true,
            progress: 0.1,
            segments: [
                { text: 'Guten', highlighted: true },
                { text: ' ', highlighted: false },
                { text: 'Tag', highlighted: false }
            ],
            translations: [{
                languageId: EN,
                language: 'en',
                words: [
                    { text: 'day', highlighted: false },
                    { text: 'good', highlighted: true }
                ]
            }]
        }]);
    });

    it('should show no captions on a line boundary', () => {
        expect(sync.buildCaptions(lyrics, 1000)).toEqual([]);
        expect(sync.buildCaptions(lyrics, 3000)).toEqual([]);
    });

    it('should leave out languages without words', () => {
        const captions = sync.buildCaptions(lyrics, 3500);

        expect(captions).toHaveLength(1);
        expect(captions[0].uuid).toBe('line-2');
        expect(captions[0].segments).toEqual([{ text: 'Servus', highlighted: true }]);
        expect(captions[0].translations).toEqual([]);
    });

    it('should list every line in the lyrics view', () => {
        const view = sync.buildLyricsView(lyrics, 3500);

        expect(view.map(line => line.active)).toEqual([false, true]);
        expect(view[0].segments.every(segment => !segment.highlighted)).toBe(true);
        expect(view[0].translations).toEqual([]);
        expect(view[0].progress).toBe(1);
    });

    it('should label languages missing from the metadata with an empty name', () => {
        const undeclared: BabelLyrics = {
            ...lyrics,
            metadata: { ...lyrics.metadata, translations: [] }
        };
        const captions = sync.buildCaptions(undeclared, 2000);

        expect(captions[0].translations[0].language).toBe('');
        expect(captions[0].translations[0].words.map(w => w.highlighted)).toEqual([true, false]);
    });
});
