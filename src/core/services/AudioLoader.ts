import { MetadataService } from './MetadataService';
import { Logger } from '../utils/Logger';

export interface LoadedAudio {
    /** Object URL for the `<audio>` element. */
    url: string;
    fileName: string;
    /** Bytes */
    fileSize: number;
    /** Track length in ms, undefined when the metadata did not tell. */
    duration?: number;
    title?: string;
    artist?: string;
}

/**
 * Prepares a picked audio file for playback.
 * Owns the object URL of the current track and revokes it when replaced.
 */
export class AudioLoader {
    private currentUrl: string | null = null;

    constructor(private readonly metadataService: MetadataService = new MetadataService()) { }

    public async load(file: File): Promise<LoadedAudio> {
        Logger.info(`[AudioLoader] Loading ${file.name} (${file.size} bytes)`);

        const metadata = await this.metadataService.parse(file);
        if (metadata.duration === undefined) {
            Logger.warn(`[AudioLoader] Duration unknown for ${file.name}`);
        }

        this.release();
        this.currentUrl = URL.createObjectURL(file);

        return {
            url: this.currentUrl,
            fileName: file.name,
            fileSize: file.size,
            duration: metadata.duration,
            title: metadata.title,
            artist: metadata.artist
        };
    }

    public release() {
        if (this.currentUrl) {
            URL.revokeObjectURL(this.currentUrl);
            this.currentUrl = null;
        }
    }
}
