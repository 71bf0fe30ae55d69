import { z } from "zod";
import type { LyricsParser } from "../interfaces/LyricsParser";
import type { BabelLyrics } from "../models/BabelLyrics";
import { LyricsParseError } from "../errors/LyricsParseError";

// Durations are integer milliseconds and may be negative in hand-edited files.
const millis = z.number().int();
const uuid = z.string().uuid();

const segmentSchema = z.object({
    begin: millis,
    end: millis,
    text: z.string(),
    translations: z.array(z.tuple([uuid, z.array(z.number().int().nonnegative())]))
});

const lineSchema = z.object({
    begin: millis,
    end: millis,
    agent_id: z.string(),
    original: z.array(segmentSchema),
    uuid: uuid,
    translations: z.array(z.tuple([uuid, z.array(z.string())]))
});

export const babelLyricsSchema: z.ZodType<BabelLyrics> = z.object({
    metadata: z.object({
        agents: z.array(z.object({ id: z.string() })),
        translations: z.array(z.object({ language: z.string(), id: uuid }))
    }),
    lyrics: z.object({
        lines: z.array(lineSchema)
    })
});

/**
 * Reads and writes the Babel lyrics JSON interchange file.
 */
export class BabelJsonParser implements LyricsParser<BabelLyrics> {
    public parse(rawText: string): BabelLyrics {
        let raw: unknown;
        try {
            raw = JSON.parse(rawText);
        } catch (e) {
            throw new LyricsParseError("json", `Invalid JSON: ${e instanceof Error ? e.message : String(e)}`, [], { cause: e });
        }

        const result = babelLyricsSchema.safeParse(raw);
        if (!result.success) {
            const details = result.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
            throw new LyricsParseError("json", `Lyrics file does not match the expected layout (${details.length} issue(s))`, details);
        }
        return result.data;
    }

    public stringify(lyrics: BabelLyrics): string {
        return JSON.stringify(lyrics);
    }
}
