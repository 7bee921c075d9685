import type { Channel } from '../types/messaging.js';

/** `jane.doe@example.com` → `j******e@example.com`. */
export function maskEmail(email: string): string {
    const at = email.indexOf('@');
    if (at === -1) return '***';

    const local = email.slice(0, at);
    const domain = email.slice(at + 1);
    if (local.length <= 2) {
        return `${'*'.repeat(local.length)}@${domain}`;
    }

    return `${local[0]}${'*'.repeat(local.length - 2)}${local[local.length - 1]}@${domain}`;
}

/** Keeps the first two and last two characters of the normalized number. */
export function maskPhone(phone: string): string {
    const cleaned = phone.replace(/[^0-9+]/g, '');
    if (cleaned.length <= 4) {
        return '*'.repeat(cleaned.length);
    }

    return `${cleaned.slice(0, 2)}${'*'.repeat(cleaned.length - 4)}${cleaned.slice(-2)}`;
}

export function maskApiKey(key: string): string {
    if (key.length <= 8) {
        return '*'.repeat(key.length);
    }

    return `${key.slice(0, 4)}${'*'.repeat(key.length - 8)}${key.slice(-4)}`;
}

export function maskRecipient(channel: Channel, to: string): string {
    return channel === 'email' ? maskEmail(to) : maskPhone(to);
}
