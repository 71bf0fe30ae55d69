import { XMLParser, XMLValidator } from "fast-xml-parser";
import type { LyricsParser } from "../interfaces/LyricsParser";
import type { TtmlLine, TtmlLyrics, TtmlTranslation, TtmlWord } from "../models/TtmlLyrics";
import { LyricsParseError } from "../errors/LyricsParseError";

/**
 * A node of fast-xml-parser's ordered output:
 * `{ span: [...children], ":@": { "@_begin": "..." } }` or `{ "#text": "..." }`.
 */
type XmlNode = Record<string, unknown>;

interface LineContent {
    words: ParsedWord[];
    translations: TtmlTranslation[];
    backgrounds: TtmlLine[];
}

interface ParsedWord extends TtmlWord {
    /** False for bare text inside `<p>`, whose timing is inherited. */
    timed: boolean;
}

/**
 * Parses AMLL TTML word-by-word lyrics.
 * Format: the TTML2 subset written by AMLL TTML Tool (https://www.w3.org/TR/ttml2/).
 */
export class TtmlParser implements LyricsParser<TtmlLyrics> {
    // [[hh:]mm:]ss[.fff][s]
    private static CLOCK_REGEX = /^(?:(?:(\d+):)?(\d+):)?(\d+(?:\.\d+)?)s?$/;
    private static MILLIS_REGEX = /^(\d+(?:\.\d+)?)ms$/;

    private xmlParser = new XMLParser({
        preserveOrder: true,
        ignoreAttributes: false,
        attributeNamePrefix: "@_",
        removeNSPrefix: true,
        ignoreDeclaration: true,
        trimValues: false,
        parseTagValue: false,
        parseAttributeValue: false
    });

    public parse(rawText: string): TtmlLyrics {
        const validation = XMLValidator.validate(rawText);
        if (validation !== true) {
            const { msg, line, col } = validation.err;
            throw new LyricsParseError("ttml", `Invalid XML: ${msg}`, [`line ${line}, column ${col}`]);
        }

        const document: unknown = this.xmlParser.parse(rawText);
        const tt = nodeList(document).find(node => tagOf(node) === "tt");
        if (!tt) {
            throw new LyricsParseError("ttml", "Missing <tt> root element");
        }

        const body = childrenOf(tt).find(node => tagOf(node) === "body");
        if (!body) {
            throw new LyricsParseError("ttml", "Missing <body> element");
        }

        const head = childrenOf(tt).find(node => tagOf(node) === "head");
        const agents = head
            ? findAll(head, "agent").map(node => attrOf(node, "id")).filter((id): id is string => !!id)
            : [];

        const lines: TtmlLine[] = [];
        for (const paragraph of findAll(body, "p")) {
            lines.push(...this.parseParagraph(paragraph));
        }

        return { agents, lines };
    }

    /**
     * Parses a TTML clock value into milliseconds.
     */
    public static parseTimestamp(value: string): number {
        const trimmed = value.trim();

        const millisMatch = trimmed.match(TtmlParser.MILLIS_REGEX);
        if (millisMatch) {
            return Math.round(parseFloat(millisMatch[1]));
        }

        const match = trimmed.match(TtmlParser.CLOCK_REGEX);
        if (!match) {
            throw new LyricsParseError("ttml", `Invalid timestamp "${value}"`);
        }

        const hours = match[1] ? parseInt(match[1], 10) : 0;
        const minutes = match[2] ? parseInt(match[2], 10) : 0;
        const seconds = parseFloat(match[3]);
        return Math.round(((hours * 60 + minutes) * 60 + seconds) * 1000);
    }

    /**
     * Returns the main line followed by any background-vocal lines.
     */
    private parseParagraph(paragraph: XmlNode): TtmlLine[] {
        const agent = attrOf(paragraph, "agent") ?? "";
        const line = this.buildLine(paragraph, agent, false);
        return [line.line, ...line.backgrounds];
    }

    private buildLine(element: XmlNode, agent: string, isBackground: boolean): { line: TtmlLine; backgrounds: TtmlLine[] } {
        const begin = optionalTimestamp(attrOf(element, "begin"));
        const end = optionalTimestamp(attrOf(element, "end"));
        const content = this.parseContent(childrenOf(element), agent, begin ?? 0);

        const timedWords = content.words.filter(w => w.timed);
        const startTime = begin ?? (timedWords.length > 0 ? Math.min(...timedWords.map(w => w.startTime)) : 0);
        const endTime = end ?? (timedWords.length > 0 ? Math.max(...timedWords.map(w => w.endTime)) : startTime);

        // Line-synced paragraph: the bare text spans the whole line
        if (timedWords.length === 0) {
            content.words.forEach(w => {
                w.startTime = startTime;
                w.endTime = endTime;
            });
        }

        const words: TtmlWord[] = tidyWhitespace(content.words).map(({ startTime, endTime, word }) => ({ startTime, endTime, word }));

        return {
            line: {
                startTime,
                endTime,
                agent,
                words,
                translations: content.translations,
                isBackground
            },
            backgrounds: content.backgrounds
        };
    }

    private parseContent(children: XmlNode[], agent: string, lineBegin: number): LineContent {
        const content: LineContent = { words: [], translations: [], backgrounds: [] };

        const previousEnd = () => {
            const last = content.words[content.words.length - 1];
            return last ? last.endTime : lineBegin;
        };

        for (const child of children) {
            const text = textOf(child);
            if (text !== undefined) {
                pushBareText(content.words, text, previousEnd());
                continue;
            }

            if (tagOf(child) !== "span") continue;

            const role = attrOf(child, "role");
            if (role === "x-translation") {
                content.translations.push({
                    lang: attrOf(child, "lang") ?? "",
                    text: collectText(child).trim()
                });
            } else if (role === "x-bg") {
                const background = this.buildLine(child, agent, true);
                content.backgrounds.push(background.line, ...background.backgrounds);
            } else if (role === "x-roman") {
                continue;
            } else {
                const begin = optionalTimestamp(attrOf(child, "begin"));
                const end = optionalTimestamp(attrOf(child, "end"));
                const word = collectText(child);
                if (begin === undefined || end === undefined) {
                    pushBareText(content.words, word, previousEnd());
                } else {
                    content.words.push({ startTime: begin, endTime: end, word, timed: true });
                }
            }
        }

        return content;
    }
}

function pushBareText(words: ParsedWord[], text: string, at: number) {
    const match = text.match(/^(\s*)(.*?)(\s*)$/s);
    if (!match) return;
    const [, leading, core, trailing] = match;

    if (leading) words.push({ startTime: at, endTime: at, word: " ", timed: false });
    if (core) words.push({ startTime: at, endTime: at, word: core, timed: false });
    if (trailing && core) words.push({ startTime: at, endTime: at, word: " ", timed: false });
}

/**
 * Drops leading/trailing space words and collapses consecutive ones.
 */
function tidyWhitespace(words: ParsedWord[]): ParsedWord[] {
    const result: ParsedWord[] = [];
    for (const word of words) {
        const isSpace = word.word === " " && !word.timed;
        if (isSpace && (result.length === 0 || result[result.length - 1].word === " ")) continue;
        result.push(word);
    }
    while (result.length > 0 && result[result.length - 1].word === " " && !result[result.length - 1].timed) {
        result.pop();
    }
    return result;
}

function optionalTimestamp(value: string | undefined): number | undefined {
    return value === undefined ? undefined : TtmlParser.parseTimestamp(value);
}

function isNode(value: unknown): value is XmlNode {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nodeList(value: unknown): XmlNode[] {
    return Array.isArray(value) ? value.filter(isNode) : [];
}

function tagOf(node: XmlNode): string | undefined {
    return Object.keys(node).find(key => key !== ":@" && key !== "#text");
}

function childrenOf(node: XmlNode): XmlNode[] {
    const tag = tagOf(node);
    return tag ? nodeList(node[tag]) : [];
}

function textOf(node: XmlNode): string | undefined {
    const value = node["#text"];
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    return undefined;
}

function attrOf(node: XmlNode, name: string): string | undefined {
    const attrs = node[":@"];
    if (!isNode(attrs)) return undefined;
    const value = attrs[`@_${name}`];
    if (value === undefined || value === null) return undefined;
    return String(value);
}

function collectText(node: XmlNode): string {
    const text = textOf(node);
    if (text !== undefined) return text;
    return childrenOf(node).map(collectText).join("");
}

/** Depth-first search for elements with the given tag, not descending into matches. */
function findAll(node: XmlNode, tag: string): XmlNode[] {
    const found: XmlNode[] = [];
    for (const child of childrenOf(node)) {
        if (tagOf(child) === tag) {
            found.push(child);
        } else {
            found.push(...findAll(child, tag));
        }
    }
    return found;
}
