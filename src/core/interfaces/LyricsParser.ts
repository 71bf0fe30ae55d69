/**
 * Interface for lyrics parsing strategies.
 * Design Pattern: Strategy Pattern.
 */
export interface LyricsParser<T> {
    /**
     * Parses raw lyrics text into structured data.
     * @param rawText The content of the lyrics file.
     * @throws LyricsParseError when the text is not in the expected format.
     */
    parse(rawText: string): T;
}
