import { z } from "zod";
import { Logger } from "../utils/Logger";

const settingsSchema = z.object({
    showLyricsWindow: z.boolean(),
    showCaptionsWindow: z.boolean(),
    showLyricsEditor: z.boolean()
});

export type PlayerSettings = z.infer<typeof settingsSchema>;

export const DEFAULT_SETTINGS: PlayerSettings = {
    showLyricsWindow: false,
    showCaptionsWindow: false,
    showLyricsEditor: false
};

/**
 * Persists the window toggles in localStorage.
 */
export class SettingsStore {
    private readonly STORAGE_KEY = "babel_player_settings_v1";

    public load(): PlayerSettings {
        try {
            const raw = localStorage.getItem(this.STORAGE_KEY);
            if (!raw) return { ...DEFAULT_SETTINGS };

            const parsed = settingsSchema.partial().safeParse(JSON.parse(raw));
            if (!parsed.success) {
                Logger.warn("[Settings] Ignoring invalid stored settings", parsed.error.issues);
                return { ...DEFAULT_SETTINGS };
            }
            return { ...DEFAULT_SETTINGS, ...parsed.data };
        } catch (e) {
            Logger.warn("[Settings] Failed to read settings", e);
            return { ...DEFAULT_SETTINGS };
        }
    }

    public save(settings: PlayerSettings) {
        try {
            localStorage.setItem(this.STORAGE_KEY, JSON.stringify(settings));
        } catch (e) {
            Logger.error("[Settings] Failed to save settings", e);
        }
    }
}
