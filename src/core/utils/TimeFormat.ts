export interface TimestampParts {
    minutes: number;
    seconds: number;
    milliseconds: number;
}

/**
 * Formats a millisecond timestamp as `H:MM:SS.mmm`.
 */
export function formatTimestamp(ms: number): string {
    const total = Math.max(0, Math.trunc(ms));
    const hours = Math.trunc(total / 3_600_000);
    const minutes = Math.trunc(total / 60_000) % 60;
    const seconds = Math.trunc(total / 1_000) % 60;
    const millis = total % 1_000;

    return `${hours}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(millis, 3)}`;
}

export function formatFileSize(bytes: number): string {
    return `${(bytes / (1024 * 1024)).toFixed(2)} MiB`;
}

/**
 * Splits a timestamp into the minute/second/millisecond fields of the segment editor.
 * Minutes are not wrapped, so a timestamp past one hour shows e.g. 75m.
 */
export function splitTimestamp(ms: number): TimestampParts {
    const total = Math.max(0, Math.trunc(ms));
    return {
        minutes: Math.trunc(total / 60_000),
        seconds: Math.trunc(total / 1_000) % 60,
        milliseconds: total % 1_000
    };
}

/**
 * Inverse of `splitTimestamp`. Each field is clamped to the range its editor allows.
 */
export function composeTimestamp(parts: TimestampParts): number {
    const minutes = clamp(parts.minutes, 0, 59);
    const seconds = clamp(parts.seconds, 0, 59);
    const milliseconds = clamp(parts.milliseconds, 0, 999);
    return minutes * 60_000 + seconds * 1_000 + milliseconds;
}

function clamp(value: number, min: number, max: number): number {
    if (!Number.isFinite(value)) return min;
    return Math.min(max, Math.max(min, Math.trunc(value)));
}

function pad(value: number, width: number): string {
    return String(value).padStart(width, '0');
}
