import { readConfig } from './config/relay-config.js';
import { createRelayRuntime, type RelayRuntime, type RelayRuntimeOptions } from './runtime.js';
import type { SenderRegistry } from './services/sender-registry.js';
import { logThought } from './utils/logger.js';

export interface StartRelayOptions extends RelayRuntimeOptions {
    /** Config file path; falls back to `RELAY_CONFIG_PATH`, then `./relay.config.json`. */
    configPath?: string;
    /** Stop and exit on SIGINT / SIGTERM. @default true */
    handleSignals?: boolean;
}

/**
 * Load configuration, start attempt processing, and serve the control-plane API.
 * Senders are supplied by the host application, one binding per channel.
 */
export async function startRelay(senders: SenderRegistry, options: StartRelayOptions = {}): Promise<RelayRuntime> {
    const config = await readConfig(options.configPath);
    const runtime = createRelayRuntime(config, senders, options);

    runtime.start();
    await runtime.listen();

    if (options.handleSignals ?? true) {
        // ── Signal Handlers ──────────────────────────────────────────────────────
        for (const signal of ['SIGINT', 'SIGTERM'] as const) {
            process.once(signal, () => {
                runtime
                    .close()
                    .then(() => logThought(`[Relay] Process received ${signal}; services stopped.`))
                    .then(() => process.exit(0))
                    .catch((err: unknown) => {
                        console.error(`[Relay] Shutdown after ${signal} failed:`, err);
                        process.exit(1);
                    });
            });
        }
    }

    return runtime;
}
