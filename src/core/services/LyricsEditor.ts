import { v4 as uuidv4 } from "uuid";
import type {
    BabelLyrics,
    LineTranslation,
    LyricsLine,
    LyricsSegment,
    SegmentTranslation
} from "../models/BabelLyrics";
import { Logger } from "../utils/Logger";

/**
 * Editing operations on a Babel lyrics document.
 *
 * Every operation returns a new document and leaves its input untouched, so the
 * result can go straight into React state. Operations addressing a line, segment,
 * language or word that does not exist return the input document unchanged.
 *
 * Invariants kept by all operations:
 * - every line and segment carries exactly one translation pair per language in the metadata;
 * - segment word indices stay within the owning line's word list for that language.
 */
export class LyricsEditor {
    public addLanguage(doc: BabelLyrics, language: string = ""): { lyrics: BabelLyrics; id: string } {
        const id = uuidv4();
        const linePair: LineTranslation = [id, []];
        const segmentPair: SegmentTranslation = [id, []];
        const lyrics: BabelLyrics = {
            metadata: {
                ...doc.metadata,
                translations: [...doc.metadata.translations, { language, id }]
            },
            lyrics: {
                lines: doc.lyrics.lines.map(line => ({
                    ...line,
                    translations: [...line.translations, linePair],
                    original: line.original.map(segment => ({
                        ...segment,
                        translations: [...segment.translations, segmentPair]
                    }))
                }))
            }
        };
        return { lyrics, id };
    }

    public renameLanguage(doc: BabelLyrics, id: string, language: string): BabelLyrics {
        if (!doc.metadata.translations.some(entry => entry.id === id)) return doc;
        return {
            ...doc,
            metadata: {
                ...doc.metadata,
                translations: doc.metadata.translations.map(entry => (entry.id === id ? { ...entry, language } : entry))
            }
        };
    }

    public removeLanguage(doc: BabelLyrics, id: string): BabelLyrics {
        if (!doc.metadata.translations.some(entry => entry.id === id)) return doc;
        return {
            metadata: {
                ...doc.metadata,
                translations: doc.metadata.translations.filter(entry => entry.id !== id)
            },
            lyrics: {
                lines: doc.lyrics.lines.map(line => ({
                    ...line,
                    translations: line.translations.filter(([langId]) => langId !== id),
                    original: line.original.map(segment => ({
                        ...segment,
                        translations: segment.translations.filter(([langId]) => langId !== id)
                    }))
                }))
            }
        };
    }

    public addLine(doc: BabelLyrics): BabelLyrics {
        const line: LyricsLine = {
            begin: 0,
            end: 0,
            agent_id: "",
            original: [],
            uuid: uuidv4(),
            translations: doc.metadata.translations.map((entry): LineTranslation => [entry.id, []])
        };
        return {
            ...doc,
            lyrics: { lines: [...doc.lyrics.lines, line] }
        };
    }

    public removeLine(doc: BabelLyrics, lineUuid: string): BabelLyrics {
        if (!doc.lyrics.lines.some(line => line.uuid === lineUuid)) return doc;
        return {
            ...doc,
            lyrics: { lines: doc.lyrics.lines.filter(line => line.uuid !== lineUuid) }
        };
    }

    public setLineAgent(doc: BabelLyrics, lineUuid: string, agentId: string): BabelLyrics {
        return updateLine(doc, lineUuid, line => ({ ...line, agent_id: agentId }));
    }

    public setLineTiming(doc: BabelLyrics, lineUuid: string, begin: number, end: number): BabelLyrics {
        return updateLine(doc, lineUuid, line => ({ ...line, begin, end }));
    }

    /**
     * Sets the line's range to cover all of its segments.
     */
    public fitLineToSegments(doc: BabelLyrics, lineUuid: string): BabelLyrics {
        return updateLine(doc, lineUuid, line => {
            if (line.original.length === 0) return line;
            return {
                ...line,
                begin: Math.min(...line.original.map(s => s.begin)),
                end: Math.max(...line.original.map(s => s.end))
            };
        });
    }

    public addTranslationWord(doc: BabelLyrics, lineUuid: string, langId: string): BabelLyrics {
        return updateLine(doc, lineUuid, line => {
            if (!line.translations.some(([id]) => id === langId)) return line;
            return {
                ...line,
                translations: line.translations.map(([id, words]): LineTranslation =>
                    id === langId ? [id, [...words, ""]] : [id, words]
                )
            };
        });
    }

    public setTranslationWord(doc: BabelLyrics, lineUuid: string, langId: string, index: number, text: string): BabelLyrics {
        return updateLine(doc, lineUuid, line => {
            const words = wordsOf(line, langId);
            if (!words || !inRange(index, words.length)) return line;
            return {
                ...line,
                translations: line.translations.map(([id, list]): LineTranslation =>
                    id === langId ? [id, list.map((word, i) => (i === index ? text : word))] : [id, list]
                )
            };
        });
    }

    /**
     * Deletes a translated word and re-points segment links past it.
     */
    public removeTranslationWord(doc: BabelLyrics, lineUuid: string, langId: string, index: number): BabelLyrics {
        return updateLine(doc, lineUuid, line => {
            const words = wordsOf(line, langId);
            if (!words || !inRange(index, words.length)) return line;
            return {
                ...line,
                translations: line.translations.map(([id, list]): LineTranslation =>
                    id === langId ? [id, list.filter((_, i) => i !== index)] : [id, list]
                ),
                original: line.original.map(segment => ({
                    ...segment,
                    translations: segment.translations.map(([id, indices]): SegmentTranslation =>
                        id === langId
                            ? [id, indices.filter(x => x !== index).map(x => (x > index ? x - 1 : x))]
                            : [id, indices]
                    )
                }))
            };
        });
    }

    /**
     * Links or unlinks a segment and a translated word.
     */
    public setSegmentLink(
        doc: BabelLyrics,
        lineUuid: string,
        segmentIndex: number,
        langId: string,
        wordIndex: number,
        linked: boolean
    ): BabelLyrics {
        return updateLine(doc, lineUuid, line => {
            const words = wordsOf(line, langId);
            if (!words || !inRange(wordIndex, words.length)) return line;
            return updateSegmentIn(line, segmentIndex, segment => {
                if (!segment.translations.some(([id]) => id === langId)) return segment;
                return {
                    ...segment,
                    translations: segment.translations.map(([id, indices]): SegmentTranslation => {
                        if (id !== langId) return [id, indices];
                        if (linked) return indices.includes(wordIndex) ? [id, indices] : [id, [...indices, wordIndex]];
                        return [id, indices.filter(x => x !== wordIndex)];
                    })
                };
            });
        });
    }

    public removeSegment(doc: BabelLyrics, lineUuid: string, index: number): BabelLyrics {
        return updateLine(doc, lineUuid, line => {
            if (!inRange(index, line.original.length)) return line;
            return { ...line, original: line.original.filter((_, i) => i !== index) };
        });
    }

    /**
     * Inserts an empty segment before `index`; `index` may equal the segment count to append.
     */
    public insertSegment(doc: BabelLyrics, lineUuid: string, index: number): BabelLyrics {
        const segment: LyricsSegment = {
            begin: 0,
            end: 0,
            text: "",
            translations: doc.metadata.translations.map((entry): SegmentTranslation => [entry.id, []])
        };
        return updateLine(doc, lineUuid, line => {
            if (!Number.isInteger(index) || index < 0 || index > line.original.length) return line;
            const original = [...line.original];
            original.splice(index, 0, segment);
            return { ...line, original };
        });
    }

    /**
     * Swaps two segments (the editor's up/down arrows pass neighbours).
     */
    public moveSegment(doc: BabelLyrics, lineUuid: string, from: number, to: number): BabelLyrics {
        return updateLine(doc, lineUuid, line => {
            if (!inRange(from, line.original.length) || !inRange(to, line.original.length) || from === to) return line;
            const original = [...line.original];
            [original[from], original[to]] = [original[to], original[from]];
            return { ...line, original };
        });
    }

    public setSegmentText(doc: BabelLyrics, lineUuid: string, index: number, text: string): BabelLyrics {
        return updateLine(doc, lineUuid, line => updateSegmentIn(line, index, segment => ({ ...segment, text })));
    }

    public setSegmentBegin(doc: BabelLyrics, lineUuid: string, index: number, begin: number): BabelLyrics {
        return updateLine(doc, lineUuid, line => updateSegmentIn(line, index, segment => ({ ...segment, begin })));
    }

    public setSegmentEnd(doc: BabelLyrics, lineUuid: string, index: number, end: number): BabelLyrics {
        return updateLine(doc, lineUuid, line => updateSegmentIn(line, index, segment => ({ ...segment, end })));
    }

    /**
     * Repairs a loaded document so the editor invariants hold.
     * Repeated languages are dropped (first entry wins), repeated line uuids are
     * replaced, missing pairs are added, pairs for unknown or repeated languages
     * dropped and out-of-range word indices removed.
     */
    public normalize(doc: BabelLyrics): BabelLyrics {
        const languages = doc.metadata.translations.filter(
            (entry, index, all) => all.findIndex(other => other.id === entry.id) === index
        );
        const droppedLanguages = doc.metadata.translations.length - languages.length;
        if (droppedLanguages > 0) {
            Logger.warn(`[LyricsEditor] Dropped ${droppedLanguages} repeated translation languages`);
        }
        const langIds = languages.map(entry => entry.id);
        const seenUuids = new Set<string>();

        const lines = doc.lyrics.lines.map(line => {
            let uuid = line.uuid;
            if (seenUuids.has(uuid)) {
                uuid = uuidv4();
                Logger.warn(`[LyricsEditor] Line uuid ${line.uuid} is repeated, replaced with ${uuid}`);
            }
            seenUuids.add(uuid);

            const lineAligned = alignPairs(line.translations, langIds, () => []);
            let repairs = lineAligned.repairs;
            const translations: LineTranslation[] = lineAligned.pairs;

            const original = line.original.map(segment => {
                const segmentAligned = alignPairs(segment.translations, langIds, () => []);
                repairs += segmentAligned.repairs;
                return {
                    ...segment,
                    translations: segmentAligned.pairs.map(([id, indices]): SegmentTranslation => {
                        const wordCount = translations.find(([langId]) => langId === id)?.[1].length ?? 0;
                        const kept = indices.filter(x => x < wordCount);
                        repairs += indices.length - kept.length;
                        return [id, kept];
                    })
                };
            });

            if (repairs > 0) {
                Logger.warn(`[LyricsEditor] Repaired ${repairs} translation entries in line ${uuid}`);
            }
            return { ...line, uuid, translations, original };
        });

        return {
            metadata: { ...doc.metadata, translations: languages },
            lyrics: { lines }
        };
    }
}

/**
 * Orders translation pairs by `langIds`, one per language. Every added,
 * unknown or repeated pair counts as a repair.
 */
function alignPairs<T>(pairs: [string, T][], langIds: string[], empty: () => T): { pairs: [string, T][]; repairs: number } {
    let missing = 0;
    const aligned = langIds.map((id): [string, T] => {
        const pair = pairs.find(([langId]) => langId === id);
        if (!pair) {
            missing++;
            return [id, empty()];
        }
        return [id, pair[1]];
    });
    const kept = langIds.length - missing;
    return { pairs: aligned, repairs: missing + pairs.length - kept };
}

function updateLine(doc: BabelLyrics, lineUuid: string, update: (line: LyricsLine) => LyricsLine): BabelLyrics {
    const index = doc.lyrics.lines.findIndex(line => line.uuid === lineUuid);
    if (index === -1) return doc;

    const current = doc.lyrics.lines[index];
    const updated = update(current);
    if (updated === current) return doc;

    return {
        ...doc,
        lyrics: { lines: doc.lyrics.lines.map((line, i) => (i === index ? updated : line)) }
    };
}

function updateSegmentIn(line: LyricsLine, index: number, update: (segment: LyricsSegment) => LyricsSegment): LyricsLine {
    if (!inRange(index, line.original.length)) return line;
    const current = line.original[index];
    const updated = update(current);
    if (updated === current) return line;
    return { ...line, original: line.original.map((segment, i) => (i === index ? updated : segment)) };
}

function wordsOf(line: LyricsLine, langId: string): string[] | undefined {
    return line.translations.find(([id]) => id === langId)?.[1];
}

function inRange(index: number, length: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < length;
}
