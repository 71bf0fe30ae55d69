import type { BabelLyrics, LyricsLine, TimedSpan } from "../models/BabelLyrics";

export interface CaptionWord {
    text: string;
    highlighted: boolean;
}

export interface CaptionTranslation {
    languageId: string;
    /** Label from the metadata, empty when the language is not declared. */
    language: string;
    words: CaptionWord[];
}

export interface CaptionLine {
    uuid: string;
    agentId: string;
    active: boolean;
    /** 0.0 - 1.0 within the line */
    progress: number;
    segments: CaptionWord[];
    /** Only filled for active lines. */
    translations: CaptionTranslation[];
}

/**
 * Handles time-based synchronization between the player clock and the lyrics.
 */
export class PlaybackSynchronizer {
    /**
     * Finds the last line starting at or before the given time.
     * Used as the scroll anchor of the lyrics window; assumes lines are ordered by `begin`.
     * @returns The line index, or -1 before the first line.
     */
    public findLineIndex(lyrics: BabelLyrics, currentTimeMs: number): number {
        const lines = lyrics.lyrics.lines;
        if (lines.length === 0) return -1;

        // Binary search to find the line that starts <= currentTime
        let low = 0;
        let high = lines.length - 1;
        let result = -1;

        while (low <= high) {
            const mid = Math.floor((low + high) / 2);
            if (lines[mid].begin <= currentTimeMs) {
                result = mid; // Candidate found
                low = mid + 1; // Try to find a later one that is still <= current
            } else {
                high = mid - 1;
            }
        }

        return result;
    }

    /**
     * Calculates the progress (0.0 - 1.0) within a line.
     */
    public calculateLineProgress(line: LyricsLine, currentTimeMs: number): number {
        const duration = line.end - line.begin;
        if (duration <= 0) return 1;

        const elapsed = currentTimeMs - line.begin;
        return Math.min(1, Math.max(0, elapsed / duration));
    }

    /**
     * A line or segment is active strictly inside its range; both boundaries are excluded.
     */
    public isActive(span: TimedSpan, currentTimeMs: number): boolean {
        return currentTimeMs > span.begin && currentTimeMs < span.end;
    }

    /**
     * Builds the caption rows for every line active at the given time.
     */
    public buildCaptions(lyrics: BabelLyrics, currentTimeMs: number): CaptionLine[] {
        return lyrics.lyrics.lines
            .filter(line => this.isActive(line, currentTimeMs))
            .map(line => this.buildActiveLine(lyrics, line, currentTimeMs));
    }

    /**
     * Builds every line for the lyrics window: active lines as in the captions,
     * the rest with their original text only.
     */
    public buildLyricsView(lyrics: BabelLyrics, currentTimeMs: number): CaptionLine[] {
        return lyrics.lyrics.lines.map(line => {
            if (this.isActive(line, currentTimeMs)) {
                return this.buildActiveLine(lyrics, line, currentTimeMs);
            }
            return {
                uuid: line.uuid,
                agentId: line.agent_id,
                active: false,
                progress: this.calculateLineProgress(line, currentTimeMs),
                segments: line.original.map(segment => ({ text: segment.text, highlighted: false })),
                translations: []
            };
        });
    }

    private buildActiveLine(lyrics: BabelLyrics, line: LyricsLine, currentTimeMs: number): CaptionLine {
        // Word indices linked from the segments being sung, per language
        const linked = new Map<string, Set<number>>();

        const segments = line.original.map(segment => {
            const highlighted = this.isActive(segment, currentTimeMs);
            if (highlighted) {
                for (const [langId, indices] of segment.translations) {
                    const set = linked.get(langId) ?? new Set<number>();
                    indices.forEach(i => set.add(i));
                    linked.set(langId, set);
                }
            }
            return { text: segment.text, highlighted };
        });

        const translations = line.translations
            .filter(([, words]) => words.length > 0)
            .map(([langId, words]): CaptionTranslation => {
                const set = linked.get(langId);
                return {
                    languageId: langId,
                    language: lyrics.metadata.translations.find(entry => entry.id === langId)?.language ?? "",
                    words: words.map((text, index) => ({ text, highlighted: set?.has(index) ?? false }))
                };
            });

        return {
            uuid: line.uuid,
            agentId: line.agent_id,
            active: true,
            progress: this.calculateLineProgress(line, currentTimeMs),
            segments,
            translations
        };
    }
}
