import { describe, it, expect, vi, afterEach } from 'vitest';
import { createDebugObserver, type DebugEvent } from '../../src/observability/DebugObserver.js';

describe('createDebugObserver()', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should return a custom handler as-is', () => {
        const handler = vi.fn();
        expect(createDebugObserver(handler)).toBe(handler);
    });

    it('should print resolve events', () => {
        const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
        const observer = createDebugObserver();

        observer({
            type: 'resolve',
            requested: 'icon-camera',
            set: 'default',
            name: 'camera',
            path: '/icons/camera.svg',
            durationMs: 2,
            timestamp: 0,
        });

        expect(spy).toHaveBeenCalledWith('[svg-iconsets] resolve   icon-camera → default/camera 2.0ms');
    });

    it('should print one line per event type', () => {
        const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
        const observer = createDebugObserver();

        const events: DebugEvent[] = [
            { type: 'cache', path: '/icons/camera.svg', hit: true, timestamp: 0 },
            { type: 'not-found', requested: 'money', set: 'default', name: 'money', timestamp: 0 },
            { type: 'files', set: 'default', count: 2, filtered: true, timestamp: 0 },
            { type: 'files', set: 'heroicons', count: 9, filtered: false, timestamp: 0 },
        ];
        events.forEach(observer);

        expect(spy.mock.calls.map(call => call[0])).toEqual([
            '[svg-iconsets] cache     /icons/camera.svg hit',
            '[svg-iconsets] NOT FOUND money (last set: default)',
            '[svg-iconsets] files     default 2 (filtered)',
            '[svg-iconsets] files     heroicons 9',
        ]);
    });
});
