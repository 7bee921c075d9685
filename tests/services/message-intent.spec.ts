import { describe, expect, it } from 'vitest';
import {
    createMessageIntent,
    intentFromSerialized,
    parseMessageIntent,
    parseSerializedIntent,
    serializeIntent,
    serializedIntentSize,
} from '../../src/services/message-intent.js';
import { IntentValidationError } from '../../src/utils/errors.js';

function issuesOf(fn: () => unknown): string[] {
    try {
        fn();
    } catch (err) {
        if (err instanceof IntentValidationError) return err.issues;
        throw err;
    }
    throw new Error('expected an IntentValidationError');
}

describe('createMessageIntent', () => {
    it('builds a frozen intent with defaults for omitted fields', () => {
        const intent = createMessageIntent({ channel: 'sms', to: '+15551234567', text: 'Your code is 1234' });

        expect(intent).toEqual({
            channel: 'sms',
            to: '+15551234567',
            subject: null,
            text: 'Your code is 1234',
            html: null,
            templateKey: null,
            templateData: {},
            mediaUrls: [],
            metadata: {},
            idempotencyKey: null,
            sendAt: null,
        });
        expect(Object.isFrozen(intent)).toBe(true);
        expect(Object.isFrozen(intent.templateData)).toBe(true);
    });

    it('parses an ISO sendAt into a Date', () => {
        const intent = createMessageIntent({
            channel: 'email',
            to: 'ops@example.com',
            subject: 'Report',
            sendAt: '2026-03-01T10:00:00.000Z',
        });

        expect(intent.sendAt?.toISOString()).toBe('2026-03-01T10:00:00.000Z');
    });

    it('copies a Date sendAt instead of keeping the caller reference', () => {
        const sendAt = new Date('2026-03-01T10:00:00.000Z');
        const intent = createMessageIntent({ channel: 'sms', to: '+15551234567', sendAt });
        sendAt.setFullYear(2030);

        expect(intent.sendAt?.toISOString()).toBe('2026-03-01T10:00:00.000Z');
    });

    it('rejects an unknown channel', () => {
        expect(issuesOf(() => parseMessageIntent({ channel: 'fax', to: '+15551234567' }))).toEqual([
            'channel: Must be one of: sms, whatsapp, email',
        ]);
    });

    it('rejects a malformed email recipient', () => {
        expect(issuesOf(() => createMessageIntent({ channel: 'email', to: 'not-an-email' }))).toEqual([
            "to: Invalid email address 'not-an-email' for email channel",
        ]);
    });

    it('rejects a phone number that is too short', () => {
        expect(issuesOf(() => createMessageIntent({ channel: 'whatsapp', to: '12345' }))).toEqual([
            "to: Invalid phone number '12345' for whatsapp channel (must be 8-20 digits)",
        ]);
    });

    it('rejects an idempotency key longer than 128 characters', () => {
        const issues = issuesOf(() =>
            createMessageIntent({ channel: 'sms', to: '+15551234567', idempotencyKey: 'k'.repeat(129) }),
        );
        expect(issues).toContain('idempotencyKey: Idempotency key cannot exceed 128 characters');
    });

    it('accepts an idempotency key of exactly 128 characters', () => {
        const key = 'k'.repeat(128);
        expect(createMessageIntent({ channel: 'sms', to: '+15551234567', idempotencyKey: key }).idempotencyKey).toBe(key);
    });

    it('rejects input that is not an object', () => {
        expect(() => parseMessageIntent('not an object')).toThrow(IntentValidationError);
        expect(issuesOf(() => parseMessageIntent('not an object'))).toHaveLength(1);
    });
});

describe('serialized intents', () => {
    it('rebuilds an equal intent from its stored form', () => {
        const intent = createMessageIntent({
            channel: 'email',
            to: 'jane.doe@example.com',
            subject: 'Welcome',
            templateKey: 'welcome',
            templateData: { name: 'Jane' },
            idempotencyKey: 'signup:42:email',
            sendAt: '2026-03-02T08:30:00.000Z',
        });

        const stored = JSON.stringify(serializeIntent(intent));
        expect(intentFromSerialized(parseSerializedIntent(stored))).toEqual(intent);
    });

    it('measures the UTF-8 size of the serialized intent', () => {
        const intent = createMessageIntent({ channel: 'sms', to: '+15551234567', text: 'héllo' });
        expect(serializedIntentSize(intent)).toBe(Buffer.byteLength(JSON.stringify(serializeIntent(intent)), 'utf8'));
        expect(serializedIntentSize(intent)).toBe(JSON.stringify(serializeIntent(intent)).length + 1);
    });

    it('refuses a stored payload with the wrong shape', () => {
        expect(() => parseSerializedIntent('{"channel":"sms"}')).toThrow();
    });
});
