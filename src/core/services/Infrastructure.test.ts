import { describe, it, expect, vi, beforeEach } from 'vitest';
import { parseBlob } from 'music-metadata';
import { saveAs } from 'file-saver';
import { TtmlImporter, splitTranslationWords } from './TtmlImporter';
import { LyricsFileService } from './LyricsFileService';
import type { LyricsSource } from './LyricsFileService';
import { AudioLoader } from './AudioLoader';
import { MetadataService } from './MetadataService';
import type { AudioMetadata } from './MetadataService';
import { LyricsParseError } from '../errors/LyricsParseError';
import type { TtmlLyrics } from '../models/TtmlLyrics';

vi.mock('music-metadata', () => ({ parseBlob: vi.fn() }));
vi.mock('file-saver', () => ({ saveAs: vi.fn() }));

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function source(name: string, content: string): LyricsSource {
    return { name, text: async () => content };
}

describe('TtmlImporter', () => {
    const importer = new TtmlImporter();
    const ttml: TtmlLyrics = {
        agents: ['v1'],
        lines: [
            {
                startTime: 1000,
                endTime: 2000,
                agent: 'v2',
                words: [
                    { startTime: 1000, endTime: 1400, word: 'Hallo' },
                    { startTime: 1400, endTime: 1400, word: ' ' },
                    { startTime: 1400, endTime: 2000, word: 'Welt' }
                ],
                translations: [{ lang: 'en', text: 'Hello  world' }],
                isBackground: false
            },
            {
                startTime: 2000,
                endTime: 3000,
                agent: 'v1',
                words: [{ startTime: 2000, endTime: 3000, word: 'Tschüss' }],
                translations: [],
                isBackground: false
            }
        ]
    };

    it('should convert lines and words', () => {
        const lyrics = importer.toBabelLyrics(ttml);
        const [first, second] = lyrics.lyrics.lines;

        expect(lyrics.metadata.agents).toEqual([{ id: 'v1' }, { id: 'v2' }]);
        expect(first.begin).toBe(1000);
        expect(first.end).toBe(2000);
        expect(first.agent_id).toBe('v2');
        expect(first.original.map(segment => [segment.begin, segment.end, segment.text])).toEqual([
            [1000, 1400, 'Hallo'],
            [1400, 1400, ' '],
            [1400, 2000, 'Welt']
        ]);
        expect(first.uuid).toMatch(UUID_PATTERN);
        expect(second.uuid).toMatch(UUID_PATTERN);
        expect(first.uuid).not.toBe(second.uuid);
    });

    it('should turn translation languages into editable word lists', () => {
        const lyrics = importer.toBabelLyrics(ttml);
        const [entry] = lyrics.metadata.translations;
        const [first, second] = lyrics.lyrics.lines;

        expect(lyrics.metadata.translations).toHaveLength(1);
        expect(entry.language).toBe('en');
        expect(entry.id).toMatch(UUID_PATTERN);
        expect(first.translations).toEqual([[entry.id, ['Hello', ' ', 'world']]]);
        expect(first.original[0].translations).toEqual([[entry.id, []]]);
        expect(second.translations).toEqual([[entry.id, []]]);
    });

    it('should join several translation spans of one language', () => {
        const lyrics = importer.toBabelLyrics({
            agents: [],
            lines: [{
                startTime: 0,
                endTime: 1000,
                agent: '',
                words: [{ startTime: 0, endTime: 1000, word: 'Hallo Welt' }],
                translations: [
                    { lang: 'en', text: 'Hello' },
                    { lang: 'en', text: '' },
                    { lang: 'en', text: 'world' }
                ],
                isBackground: false
            }]
        });
        const [entry] = lyrics.metadata.translations;

        expect(lyrics.metadata.translations).toHaveLength(1);
        expect(lyrics.lyrics.lines[0].translations).toEqual([[entry.id, ['Hello', ' ', 'world']]]);
    });

    it('should split translations keeping whitespace as single words', () => {
        expect(splitTranslationWords('你好 世界')).toEqual(['你好', ' ', '世界']);
        expect(splitTranslationWords('  a\tb ')).toEqual([' ', 'a', ' ', 'b', ' ']);
        expect(splitTranslationWords('')).toEqual([]);
    });
});

describe('LyricsFileService', () => {
    const service = new LyricsFileService();
    const EN = '11111111-1111-4111-8111-111111111111';

    beforeEach(() => {
        vi.mocked(saveAs).mockClear();
    });

    it('should load and repair a lyrics JSON file', async () => {
        const json = JSON.stringify({
            metadata: { agents: [], translations: [{ language: 'en', id: EN }] },
            lyrics: {
                lines: [{
                    begin: 0,
                    end: 1000,
                    agent_id: '',
                    uuid: '22222222-2222-4222-8222-222222222222',
                    original: [{ begin: 0, end: 1000, text: 'la', translations: [[EN, [3]]] }],
                    translations: []
                }]
            }
        });

        const loaded = await service.loadJson(source('song.json', json));
        const line = loaded.lyrics.lyrics.lines[0];

        expect(loaded.fileName).toBe('song.json');
        expect(line.translations).toEqual([[EN, []]]);
        expect(line.original[0].translations).toEqual([[EN, []]]);
    });

    it('should import a TTML file', async () => {
        const ttml = '<tt><body><div><p begin="00:01.000" end="00:02.000">Hallo</p></div></body></tt>';

        const loaded = await service.loadTtml(source('song.ttml', ttml));

        expect(loaded.fileName).toBe('song.ttml');
        expect(loaded.lyrics.lyrics.lines).toHaveLength(1);
        expect(loaded.lyrics.lyrics.lines[0].original[0].text).toBe('Hallo');
    });

    it('should reject files that fail to parse', async () => {
        await expect(service.loadJson(source('broken.json', '{'))).rejects.toBeInstanceOf(LyricsParseError);
        await expect(service.loadTtml(source('broken.ttml', '<root/>'))).rejects.toBeInstanceOf(LyricsParseError);
    });

    it('should save exported lyrics as JSON', () => {
        const lyrics = { metadata: { agents: [], translations: [] }, lyrics: { lines: [] } };

        service.exportJson(lyrics, 'song.json');

        expect(saveAs).toHaveBeenCalledTimes(1);
        const [blob, fileName] = vi.mocked(saveAs).mock.calls[0];
        expect(fileName).toBe('song.json');
        expect(blob).toBeInstanceOf(Blob);
        if (blob instanceof Blob) {
            expect(blob.type).toBe('application/json;charset=utf-8');
        }
    });

    it('should use the default file name', () => {
        service.exportJson({ metadata: { agents: [], translations: [] }, lyrics: { lines: [] } });
        expect(vi.mocked(saveAs).mock.calls[0][1]).toBe('lyrics.json');
    });
});

class StubMetadataService extends MetadataService {
    constructor(private readonly result: AudioMetadata) {
        super();
    }

    public async parse(): Promise<AudioMetadata> {
        return this.result;
    }
}

describe('AudioLoader', () => {
    let counter: number;
    const revoked: string[] = [];

    beforeEach(() => {
        counter = 0;
        revoked.length = 0;
        Object.defineProperty(URL, 'createObjectURL', {
            configurable: true,
            writable: true,
            value: vi.fn(() => `blob:track-${++counter}`)
        });
        Object.defineProperty(URL, 'revokeObjectURL', {
            configurable: true,
            writable: true,
            value: vi.fn((url: string) => revoked.push(url))
        });
    });

    it('should create an object URL and carry metadata', async () => {
        const loader = new AudioLoader(new StubMetadataService({ title: 'Lied', artist: 'Band', duration: 183000 }));
        const file = new File(['abc'], 'lied.mp3', { type: 'audio/mpeg' });

        const audio = await loader.load(file);

        expect(audio).toEqual({
            url: 'blob:track-1',
            fileName: 'lied.mp3',
            fileSize: 3,
            duration: 183000,
            title: 'Lied',
            artist: 'Band'
        });
    });

    it('should revoke the previous URL when a new track is loaded', async () => {
        const loader = new AudioLoader(new StubMetadataService({}));

        await loader.load(new File(['a'], 'one.wav'));
        const second = await loader.load(new File(['b'], 'two.wav'));

        expect(second.url).toBe('blob:track-2');
        expect(second.duration).toBeUndefined();
        expect(revoked).toEqual(['blob:track-1']);

        loader.release();
        expect(revoked).toEqual(['blob:track-1', 'blob:track-2']);
    });
});

describe('MetadataService', () => {
    const file = new File(['x'], 'lied.flac');

    it('should copy tags and convert the duration to ms', async () => {
        const service = new MetadataService(async () => ({
            common: { title: 'Lied', artist: 'Band', album: 'Platte' },
            format: { duration: 183.4 }
        }));

        expect(await service.parse(file)).toEqual({ title: 'Lied', artist: 'Band', album: 'Platte', duration: 183400 });
    });

    it('should leave out a duration that is not finite', async () => {
        const service = new MetadataService(async () => ({
            common: { title: 'Stream' },
            format: { duration: Number.POSITIVE_INFINITY }
        }));

        expect(await service.parse(file)).toEqual({ title: 'Stream' });
    });

    it('should return empty metadata when the file cannot be read', async () => {
        vi.mocked(parseBlob).mockRejectedValueOnce(new Error('Unsupported format'));

        const metadata = await new MetadataService().parse(new File(['x'], 'noise.bin'));

        expect(metadata).toEqual({});
    });
});
