import { logger } from '@/ui/logger';

type Handlers<Events> = { [K in keyof Events]?: Set<(payload: Events[K]) => void> };

/**
 * Typed listener registry. `on` returns its own unsubscribe function.
 */
export class Listeners<Events extends Record<string, unknown>> {
    private handlers: Handlers<Events> = {};

    on<K extends keyof Events>(event: K, handler: (payload: Events[K]) => void): () => void {
        const set = this.handlers[event] ?? new Set<(payload: Events[K]) => void>();
        this.handlers[event] = set;
        set.add(handler);
        return () => {
            set.delete(handler);
        };
    }

    emit<K extends keyof Events>(event: K, payload: Events[K]): void {
        const set = this.handlers[event];
        if (!set) return;
        for (const handler of [...set]) {
            try {
                handler(payload);
            } catch (error) {
                // A broken subscriber must not abort the transition that emitted the event.
                logger.warn(`[EVENTS] Listener for "${String(event)}" threw`, error);
            }
        }
    }
}
