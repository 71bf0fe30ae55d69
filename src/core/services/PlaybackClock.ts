export type PlayerState = "stopped" | "paused" | "playing";

export interface ClockEvent {
    state: PlayerState;
    /** Timestamp in ms at the moment of the change. */
    timestamp: number;
    /** True when the position jumped (seek or reset) and the audio must follow. */
    seeked: boolean;
}

type ClockListener = (event: ClockEvent) => void;

/**
 * Player clock driving the lyrics display.
 *
 * While playing, `timestamp = offset + (now - startInstant)`. Pausing folds the
 * elapsed time into `offset`, so resuming continues from the same position.
 */
export class PlaybackClock {
    private state: PlayerState = "stopped";
    private offset = 0;
    private startInstant: number | null = null;
    private duration: number | null = null;
    private listeners: ClockListener[] = [];

    constructor(private readonly now: () => number = () => performance.now()) { }

    public subscribe(listener: ClockListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    public getState(): PlayerState {
        return this.state;
    }

    public getDuration(): number | null {
        return this.duration;
    }

    /**
     * Sets the total length used to clamp seeks; `null` when unknown.
     */
    public setDuration(duration: number | null) {
        this.duration = duration;
    }

    public getTimestamp(): number {
        if (this.state === "playing" && this.startInstant !== null) {
            return this.offset + Math.round(this.now() - this.startInstant);
        }
        return this.offset;
    }

    public play() {
        if (this.state !== "stopped") return;
        this.start();
    }

    public resume() {
        if (this.state !== "paused") return;
        this.start();
    }

    public pause() {
        if (this.state !== "playing") return;
        this.offset = this.getTimestamp();
        this.startInstant = null;
        this.state = "paused";
        this.emit(false);
    }

    public reset() {
        if (this.state === "stopped" && this.offset === 0) return;
        this.state = "stopped";
        this.offset = 0;
        this.startInstant = null;
        this.emit(true);
    }

    /**
     * Moves the playhead. While playing the seek delta is added to the offset,
     * so the clock keeps running from the new position.
     */
    public seek(timestampMs: number) {
        const max = this.duration ?? Number.MAX_SAFE_INTEGER;
        const target = Math.min(max, Math.max(0, Math.round(timestampMs)));
        const current = this.getTimestamp();

        if (this.state === "playing") {
            this.offset += target - current;
        } else {
            this.offset = target;
        }
        this.emit(true);
    }

    private start() {
        this.startInstant = this.now();
        this.state = "playing";
        this.emit(true);
    }

    private emit(seeked: boolean) {
        const event: ClockEvent = { state: this.state, timestamp: this.getTimestamp(), seeked };
        this.listeners.forEach(l => l(event));
    }
}
