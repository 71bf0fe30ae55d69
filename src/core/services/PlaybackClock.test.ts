import { describe, it, expect, beforeEach } from 'vitest';
import { PlaybackClock } from './PlaybackClock';
import type { ClockEvent } from './PlaybackClock';

describe('PlaybackClock', () => {
    let now: number;
    let clock: PlaybackClock;
    let events: ClockEvent[];

    beforeEach(() => {
        now = 0;
        clock = new PlaybackClock(() => now);
        events = [];
        clock.subscribe(event => events.push(event));
    });

    it('should start stopped at zero', () => {
        expect(clock.getState()).toBe('stopped');
        expect(clock.getTimestamp()).toBe(0);
        expect(clock.getDuration()).toBeNull();
    });

    it('should advance while playing and hold while paused', () => {
        clock.play();
        now = 1500;
        expect(clock.getTimestamp()).toBe(1500);

        clock.pause();
        now = 5000;
        expect(clock.getState()).toBe('paused');
        expect(clock.getTimestamp()).toBe(1500);

        clock.resume();
        now = 6000;
        expect(clock.getState()).toBe('playing');
        expect(clock.getTimestamp()).toBe(2500);
    });

    it('should keep running from the seek target', () => {
        clock.play();
        now = 1000;
        clock.seek(10000);
        expect(clock.getTimestamp()).toBe(10000);

        now = 1500;
        expect(clock.getTimestamp()).toBe(10500);
    });

    it('should clamp seeks to the known duration', () => {
        clock.setDuration(3000);
        clock.seek(5000);
        expect(clock.getTimestamp()).toBe(3000);

        clock.seek(-10);
        expect(clock.getTimestamp()).toBe(0);

        clock.setDuration(null);
        clock.seek(5000.4);
        expect(clock.getTimestamp()).toBe(5000);
    });

    it('should reset to stopped at zero', () => {
        clock.play();
        now = 800;
        clock.reset();

        expect(clock.getState()).toBe('stopped');
        expect(clock.getTimestamp()).toBe(0);
        expect(events[events.length - 1]).toEqual({ state: 'stopped', timestamp: 0, seeked: true });
    });

    it('should only take transitions valid from the current state', () => {
        clock.resume();
        clock.pause();
        clock.reset();
        expect(events).toEqual([]);

        clock.play();
        clock.play();
        expect(events).toHaveLength(1);
    });

    it('should notify subscribers of state changes', () => {
        clock.play();
        now = 200;
        clock.pause();
        clock.seek(1000);

        expect(events).toEqual([
            { state: 'playing', timestamp: 0, seeked: true },
            { state: 'paused', timestamp: 200, seeked: false },
            { state: 'paused', timestamp: 1000, seeked: true }
        ]);
    });

    it('should stop notifying after unsubscribe', () => {
        const received: ClockEvent[] = [];
        const unsubscribe = clock.subscribe(event => received.push(event));
        unsubscribe();

        clock.play();
        expect(received).toEqual([]);
        expect(events).toHaveLength(1);
    });
});
