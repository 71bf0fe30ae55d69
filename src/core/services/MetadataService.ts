import { parseBlob } from 'music-metadata';
import { Logger } from '../utils/Logger';

export interface AudioMetadata {
    title?: string;
    artist?: string;
    album?: string;
    /** Track duration in ms */
    duration?: number;
}

/** The parts of a music-metadata result read here; duration is in seconds. */
export interface AudioTags {
    common: { title?: string; artist?: string; album?: string };
    format: { duration?: number };
}

export type TagReader = (file: File) => Promise<AudioTags>;

const readWithMusicMetadata: TagReader = file => parseBlob(file, { duration: true });

export class MetadataService {
    constructor(private readonly readTags: TagReader = readWithMusicMetadata) { }

    /**
     * Parse metadata from an audio file.
     * Returns partial metadata (what is found); an unreadable file yields `{}`.
     */
    public async parse(file: File): Promise<AudioMetadata> {
        try {
            const metadata = await this.readTags(file);
            const common = metadata.common;

            const result: AudioMetadata = {};

            if (common.title) result.title = common.title;
            if (common.artist) result.artist = common.artist;
            if (common.album) result.album = common.album;
            if (metadata.format.duration !== undefined && Number.isFinite(metadata.format.duration)) {
                result.duration = Math.round(metadata.format.duration * 1000);
            }

            Logger.info(`[Metadata] Parsed ${file.name}`, result);
            return result;
        } catch (error) {
            Logger.warn(`[Metadata] Failed to parse ${file.name}`, error);
            return {};
        }
    }
}
