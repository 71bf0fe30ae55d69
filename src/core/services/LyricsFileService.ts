import { saveAs } from "file-saver";
import type { BabelLyrics } from "../models/BabelLyrics";
import { BabelJsonParser } from "../parsers/BabelJsonParser";
import { TtmlParser } from "../parsers/TtmlParser";
import { TtmlImporter } from "./TtmlImporter";
import { LyricsEditor } from "./LyricsEditor";
import { LyricsParseError } from "../errors/LyricsParseError";
import { DEFAULT_EXPORT_FILE_NAME } from "../config/PlayerConfig";
import { Logger } from "../utils/Logger";

/** The part of a picked `File` the loaders need. */
export type LyricsSource = Pick<File, "name" | "text">;

export interface LoadedLyrics {
    lyrics: BabelLyrics;
    fileName: string;
}

/**
 * Reads lyrics files picked by the user and saves exported documents.
 */
export class LyricsFileService {
    private jsonParser = new BabelJsonParser();
    private ttmlParser = new TtmlParser();
    private importer = new TtmlImporter();
    private editor = new LyricsEditor();

    /**
     * Loads a Babel lyrics JSON file, repairing translation entries the editor relies on.
     * @throws LyricsParseError
     */
    public async loadJson(file: LyricsSource): Promise<LoadedLyrics> {
        const text = await file.text();
        try {
            const lyrics = this.editor.normalize(this.jsonParser.parse(text));
            Logger.info(`[LyricsFile] Loaded ${file.name}: ${lyrics.lyrics.lines.length} lines`);
            return { lyrics, fileName: file.name };
        } catch (e) {
            this.logFailure(file.name, e);
            throw e;
        }
    }

    /**
     * Imports an AMLL TTML file as a new Babel lyrics document.
     * @throws LyricsParseError
     */
    public async loadTtml(file: LyricsSource): Promise<LoadedLyrics> {
        const text = await file.text();
        try {
            const lyrics = this.importer.toBabelLyrics(this.ttmlParser.parse(text));
            return { lyrics, fileName: file.name };
        } catch (e) {
            this.logFailure(file.name, e);
            throw e;
        }
    }

    public exportJson(lyrics: BabelLyrics, fileName: string = DEFAULT_EXPORT_FILE_NAME) {
        const blob = new Blob([this.jsonParser.stringify(lyrics)], { type: "application/json;charset=utf-8" });
        saveAs(blob, fileName);
        Logger.info(`[LyricsFile] Exported ${lyrics.lyrics.lines.length} lines as ${fileName}`);
    }

    private logFailure(fileName: string, e: unknown) {
        if (e instanceof LyricsParseError) {
            Logger.error(`[LyricsFile] Failed to parse ${e.format} file ${fileName}: ${e.message}`, e.details);
        } else {
            Logger.error(`[LyricsFile] Failed to load ${fileName}`, e);
        }
    }
}
