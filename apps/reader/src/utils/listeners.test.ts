import { afterEach, describe, expect, it, vi } from 'vitest';
import { logger } from '@/ui/logger';
import { Listeners } from './listeners';

type Events = {
    saved: { id: string };
};

describe('Listeners', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('stops delivering after unsubscribe', () => {
        const listeners = new Listeners<Events>();
        const seen: string[] = [];
        const off = listeners.on('saved', ({ id }) => seen.push(id));

        listeners.emit('saved', { id: 'a' });
        off();
        listeners.emit('saved', { id: 'b' });

        expect(seen).toEqual(['a']);
    });

    it('keeps notifying the others when one listener throws', () => {
        const warn = vi.spyOn(logger, 'warn');
        const listeners = new Listeners<Events>();
        const seen: string[] = [];
        listeners.on('saved', () => {
            throw new Error('render failed');
        });
        listeners.on('saved', ({ id }) => seen.push(id));

        listeners.emit('saved', { id: 'a' });

        expect(seen).toEqual(['a']);
        expect(warn).toHaveBeenCalledTimes(1);
    });
});
