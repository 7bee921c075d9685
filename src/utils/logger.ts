import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const DEFAULT_LOG_DIR = 'logs';
const REDACTED = '[REDACTED]';
const SENSITIVE_KEY_PATTERN = /(secret|token|password|passwd|api[_-]?key|auth)/i;
const MIN_SECRET_LENGTH = 8;

const KEY_VALUE_PATTERN =
    /\b([A-Za-z0-9_-]*(?:secret|token|password|passwd|api[_-]?key|authorization|auth)[A-Za-z0-9_-]*)(\s*[:=]\s*)("[^"]*"|'[^']*'|[^\s,;]+)/gi;

function resolveLogDir(): string {
    const configured = process.env.RELAY_LOG_DIR;
    return path.resolve(configured && configured.trim() !== '' ? configured : DEFAULT_LOG_DIR);
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function collectSensitiveEnvValues(): string[] {
    const values: string[] = [];
    for (const [key, value] of Object.entries(process.env)) {
        if (!value || value.length < MIN_SECRET_LENGTH) continue;
        if (SENSITIVE_KEY_PATTERN.test(key)) {
            values.push(value);
        }
    }
    // Longest first so a value containing another is redacted whole.
    return values.sort((left, right) => right.length - left.length);
}

/**
 * Redact credentials from free text before it is written anywhere.
 *
 * Handles `key=value` / `key: value` pairs whose key looks secret, and raw values of
 * secret-like environment variables wherever they appear.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text.replace(KEY_VALUE_PATTERN, (_match, key: string, separator: string) => {
        return `${key}${separator}${REDACTED}`;
    });

    for (const secret of collectSensitiveEnvValues()) {
        scrubbed = scrubbed.replace(new RegExp(escapeRegExp(secret), 'g'), REDACTED);
    }

    return scrubbed;
}

/** Append an entry to today's relay log (`<RELAY_LOG_DIR>/<YYYY-MM-DD>.md`). */
export async function logThought(message: string): Promise<void> {
    const now = new Date();
    const dir = resolveLogDir();
    const file = path.join(dir, `${now.toISOString().slice(0, 10)}.md`);
    const entry = `\n## Thought @ ${now.toISOString()}\n${scrubSensitiveText(message)}\n`;

    try {
        await mkdir(dir, { recursive: true });
        await appendFile(file, entry, 'utf8');
    } catch (err) {
        console.error(
            `[Logger] Failed to write log entry to ${file}:`,
            err instanceof Error ? err.message : String(err),
        );
    }
}
