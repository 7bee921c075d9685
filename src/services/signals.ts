import type { DispatchEvent, EventSink, MetricTags, MetricsSink } from '../types/events.js';
import { errorMessage } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';

/**
 * Emits events and counters for one component. Sinks are fire-and-forget: a sink that throws
 * is logged under the component's tag and the caller carries on.
 */
export class SignalEmitter {
    readonly #source: string;
    readonly #events?: EventSink;
    readonly #metrics?: MetricsSink;

    constructor(source: string, events?: EventSink, metrics?: MetricsSink) {
        this.#source = source;
        this.#events = events;
        this.#metrics = metrics;
    }

    emit(event: DispatchEvent): void {
        if (!this.#events) return;
        try {
            this.#events.emit(event);
        } catch (err) {
            void logThought(`[${this.#source}] Event sink failed on '${event.type}': ${errorMessage(err)}`);
        }
    }

    count(metric: string, tags: MetricTags = {}, by = 1): void {
        if (!this.#metrics) return;
        try {
            this.#metrics.increment(metric, by, tags);
        } catch (err) {
            void logThought(`[${this.#source}] Metrics sink failed on '${metric}': ${errorMessage(err)}`);
        }
    }
}
