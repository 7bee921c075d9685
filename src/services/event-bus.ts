import type {
    DispatchEvent,
    DispatchEventListener,
    DispatchEventType,
    EventSink,
} from '../types/events.js';

type Subscription = DispatchEventType | '*';

/**
 * In-process fan-out for dispatch events.
 *
 * Delivery is synchronous and fire-and-forget: a throwing listener is reported and skipped,
 * never surfaced to the emitter.
 */
export class DispatchEventBus implements EventSink {
    readonly #listeners: Map<Subscription, Set<DispatchEventListener>> = new Map();

    /** Subscribe to one event type, or `'*'` for all. Returns an unsubscribe function. */
    on(eventType: Subscription, listener: DispatchEventListener): () => void {
        let set = this.#listeners.get(eventType);
        if (!set) {
            set = new Set();
            this.#listeners.set(eventType, set);
        }
        set.add(listener);

        return () => {
            set?.delete(listener);
        };
    }

    onAny(listener: DispatchEventListener): () => void {
        return this.on('*', listener);
    }

    emit(event: DispatchEvent): void {
        for (const key of [event.type, '*'] as const) {
            const listeners = this.#listeners.get(key);
            if (!listeners) continue;

            for (const listener of listeners) {
                try {
                    listener(event);
                } catch (listenerErr) {
                    console.error(`[DispatchEventBus] Listener for '${event.type}' threw an error:`, listenerErr);
                }
            }
        }
    }

    listenerCount(eventType?: Subscription): number {
        if (eventType) {
            return this.#listeners.get(eventType)?.size ?? 0;
        }
        let total = 0;
        for (const set of this.#listeners.values()) total += set.size;
        return total;
    }
}
