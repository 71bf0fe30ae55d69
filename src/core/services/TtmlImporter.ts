import { v4 as uuidv4 } from "uuid";
import type { Agent, BabelLyrics, LineTranslation, LyricsLine, SegmentTranslation, TranslationEntry } from "../models/BabelLyrics";
import type { TtmlLine, TtmlLyrics } from "../models/TtmlLyrics";
import { Logger } from "../utils/Logger";

/**
 * Converts parsed AMLL TTML into an editable Babel lyrics document.
 */
export class TtmlImporter {
    public toBabelLyrics(ttml: TtmlLyrics): BabelLyrics {
        const translations = this.collectLanguages(ttml.lines);
        const agents = this.collectAgents(ttml);

        const lines: LyricsLine[] = ttml.lines.map(line => ({
            begin: line.startTime,
            end: line.endTime,
            agent_id: line.agent,
            original: line.words.map(word => ({
                begin: word.startTime,
                end: word.endTime,
                text: word.word,
                translations: translations.map((entry): SegmentTranslation => [entry.id, []])
            })),
            uuid: uuidv4(),
            translations: translations.map((entry): LineTranslation => {
                // Several spans of one language are read as one text
                const texts = line.translations.filter(t => t.lang === entry.language && t.text !== "").map(t => t.text);
                return [entry.id, splitTranslationWords(texts.join(" "))];
            })
        }));

        Logger.info(`[TtmlImporter] Imported ${lines.length} lines, ${agents.length} agents, ${translations.length} translation languages`);

        return {
            metadata: { agents, translations },
            lyrics: { lines }
        };
    }

    private collectLanguages(lines: TtmlLine[]): TranslationEntry[] {
        const entries: TranslationEntry[] = [];
        for (const line of lines) {
            for (const translation of line.translations) {
                if (!entries.some(e => e.language === translation.lang)) {
                    entries.push({ language: translation.lang, id: uuidv4() });
                }
            }
        }
        return entries;
    }

    private collectAgents(ttml: TtmlLyrics): Agent[] {
        const ids = [...ttml.agents];
        for (const line of ttml.lines) {
            if (line.agent && !ids.includes(line.agent)) ids.push(line.agent);
        }
        return ids.map(id => ({ id }));
    }
}

/**
 * Splits translated text into words, keeping each whitespace run as a single `" "` word
 * so the editor can show and link it like the original segments.
 */
export function splitTranslationWords(text: string): string[] {
    return text
        .split(/(\s+)/)
        .filter(part => part !== "")
        .map(part => (/^\s+$/.test(part) ? " " : part));
}
