/**
 * Intermediate result of reading an AMLL TTML file, before it becomes a `BabelLyrics` document.
 */
export interface TtmlWord {
    /** Absolute start time in ms */
    startTime: number;

    /** Absolute end time in ms */
    endTime: number;

    word: string;
}

export interface TtmlTranslation {
    /** `xml:lang` of the translation span, empty when absent. */
    lang: string;

    text: string;
}

export interface TtmlLine {
    startTime: number;
    endTime: number;

    /** `ttm:agent` of the paragraph, empty when absent. */
    agent: string;

    words: TtmlWord[];
    translations: TtmlTranslation[];

    /** Lines built from `x-bg` (background vocal) spans. */
    isBackground: boolean;
}

export interface TtmlLyrics {
    /** Agent ids declared in the document head, in order. */
    agents: string[];

    lines: TtmlLine[];
}
