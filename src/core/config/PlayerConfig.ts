export const AUDIO_EXTENSIONS = ['.mp3', '.flac', '.wav', '.ogg', '.m4a'];
export const LYRICS_JSON_EXTENSIONS = ['.json'];
export const TTML_EXTENSIONS = ['.ttml', '.xml'];

/** Step of the seek slider in ms. */
export const SEEK_DRAG_STEP_MS = 100;

/** Entries kept in the log viewer. */
export const LOG_BUFFER_SIZE = 100;

export const DEFAULT_EXPORT_FILE_NAME = 'lyrics.json';

export const Colors = {
    ORANGE_500: '#f97316',
    GRAY_500: '#6b7280',
    GRAY_700: '#374151',
    BLUE_300: '#93c5fd',
} as const;

