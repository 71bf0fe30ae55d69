export type LyricsFormat = "json" | "ttml";

/**
 * Raised when a lyrics file cannot be read into a `BabelLyrics` document.
 */
export class LyricsParseError extends Error {
    public readonly format: LyricsFormat;

    /** Location hints, e.g. zod issue paths like `lyrics.lines.0.begin`. */
    public readonly details: string[];

    constructor(format: LyricsFormat, message: string, details: string[] = [], options?: { cause?: unknown }) {
        super(message, options);
        this.name = "LyricsParseError";
        this.format = format;
        this.details = details;
    }
}
