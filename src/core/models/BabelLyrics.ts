/**
 * A translation language declared by the document.
 */
export interface TranslationEntry {
    /** Free-form language label, e.g. "en" or "English". */
    language: string;

    /** UUID referenced by every line/segment translation pair. */
    id: string;
}

/**
 * A singer or voice. Lines reference it through `agent_id`.
 */
export interface Agent {
    id: string;
}

export interface LyricsMetadata {
    agents: Agent[];
    translations: TranslationEntry[];
}

/**
 * Pair of `(language id, word indices)`.
 * The indices point into the owning line's word list for the same language.
 */
export type SegmentTranslation = [string, number[]];

/**
 * Pair of `(language id, translated words)`.
 * Whitespace between words is kept as separate `" "` entries.
 */
export type LineTranslation = [string, string[]];

/**
 * A single timed word of the original lyrics.
 */
export interface LyricsSegment {
    /** Absolute start time in ms */
    begin: number;

    /** Absolute end time in ms */
    end: number;

    text: string;

    /**
     * Which translated words this segment maps to, per language.
     * A segment may map to several words and a word may be shared by several segments.
     */
    translations: SegmentTranslation[];
}

/**
 * A single line of lyrics with its word-level timing and translations.
 */
export interface LyricsLine {
    /** Absolute start time in ms */
    begin: number;

    /** Absolute end time in ms */
    end: number;

    /** Serialized in snake case to stay compatible with exported files. */
    agent_id: string;

    original: LyricsSegment[];

    uuid: string;

    translations: LineTranslation[];
}

export interface Lyrics {
    lines: LyricsLine[];
}

/**
 * The complete lyrics document, as stored in the JSON interchange file.
 */
export interface BabelLyrics {
    metadata: LyricsMetadata;
    lyrics: Lyrics;
}

/** Anything with an absolute time range. */
export interface TimedSpan {
    begin: number;
    end: number;
}
