import { isChannel, type Channel, type MessageSender } from '../types/messaging.js';

export interface SenderBinding {
    /** Provider service name; keys the circuit breaker (e.g. 'twilio_sms'). */
    provider: string;
    sender: MessageSender;
}

/** Channel to provider/sender binding. One provider per channel. */
export class SenderRegistry {
    readonly #bindings: Map<Channel, SenderBinding> = new Map();

    constructor(bindings: Partial<Record<Channel, SenderBinding>> = {}) {
        for (const [channel, binding] of Object.entries(bindings)) {
            if (binding && isChannel(channel)) this.register(channel, binding);
        }
    }

    register(channel: Channel, binding: SenderBinding): void {
        if (!binding.provider.trim()) {
            throw new Error(`[SenderRegistry] Provider name for channel '${channel}' cannot be empty.`);
        }
        this.#bindings.set(channel, binding);
    }

    resolve(channel: Channel): SenderBinding | null {
        return this.#bindings.get(channel) ?? null;
    }

    providers(): string[] {
        return [...new Set([...this.#bindings.values()].map((binding) => binding.provider))].sort();
    }

    channels(): Channel[] {
        return [...this.#bindings.keys()];
    }
}
