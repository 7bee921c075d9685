import type { MetricTags, MetricsSink } from '../types/events.js';

export interface CounterSnapshot {
    metric: string;
    tags: MetricTags;
    value: number;
}

function seriesKey(metric: string, tags: MetricTags): string {
    const parts = Object.keys(tags)
        .sort()
        .map((key) => `${key}=${tags[key]}`);
    return parts.length > 0 ? `${metric}{${parts.join(',')}}` : metric;
}

/** In-memory tagged counters. One series per metric name and tag set. */
export class MetricsRegistry implements MetricsSink {
    readonly #series: Map<string, CounterSnapshot> = new Map();

    increment(metric: string, by = 1, tags: MetricTags = {}): void {
        const key = seriesKey(metric, tags);
        const existing = this.#series.get(key);
        if (existing) {
            existing.value += by;
            return;
        }
        this.#series.set(key, { metric, tags: { ...tags }, value: by });
    }

    /** Sum across every tag set when `tags` is omitted. */
    get(metric: string, tags?: MetricTags): number {
        if (tags) {
            return this.#series.get(seriesKey(metric, tags))?.value ?? 0;
        }
        let total = 0;
        for (const series of this.#series.values()) {
            if (series.metric === metric) total += series.value;
        }
        return total;
    }

    snapshot(): CounterSnapshot[] {
        return [...this.#series.values()]
            .map((series) => ({ metric: series.metric, tags: { ...series.tags }, value: series.value }))
            .sort((left, right) => seriesKey(left.metric, left.tags).localeCompare(seriesKey(right.metric, right.tags)));
    }

    reset(): void {
        this.#series.clear();
    }
}
