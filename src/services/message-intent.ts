import { z } from 'zod';
import { CHANNELS, type MessageIntent, type SerializedIntent } from '../types/messaging.js';
import { IntentValidationError } from '../utils/errors.js';

const MAX_IDEMPOTENCY_KEY_LENGTH = 128;
const MIN_PHONE_DIGITS = 8;
const MAX_PHONE_DIGITS = 20;

const emailSchema = z.string().email();

const intentInputSchema = z
    .object({
        channel: z.enum(CHANNELS, {
            errorMap: () => ({ message: `Must be one of: ${CHANNELS.join(', ')}` }),
        }),
        to: z.string().trim().min(1, 'Recipient cannot be empty'),
        subject: z.string().nullish(),
        text: z.string().nullish(),
        html: z.string().nullish(),
        templateKey: z.string().nullish(),
        templateData: z.record(z.unknown()).nullish(),
        mediaUrls: z.array(z.string().url()).nullish(),
        metadata: z.record(z.unknown()).nullish(),
        idempotencyKey: z
            .string()
            .min(1, 'Idempotency key cannot be empty')
            .max(MAX_IDEMPOTENCY_KEY_LENGTH, `Idempotency key cannot exceed ${MAX_IDEMPOTENCY_KEY_LENGTH} characters`)
            .nullish(),
        sendAt: z.union([z.date(), z.string().datetime({ offset: true })]).nullish(),
    })
    .superRefine((value, ctx) => {
        if (value.channel === 'email') {
            if (!emailSchema.safeParse(value.to).success) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['to'],
                    message: `Invalid email address '${value.to}' for email channel`,
                });
            }
            return;
        }

        const digits = value.to.replace(/[^0-9+]/g, '');
        if (digits.length < MIN_PHONE_DIGITS || digits.length > MAX_PHONE_DIGITS) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['to'],
                message: `Invalid phone number '${value.to}' for ${value.channel} channel (must be ${MIN_PHONE_DIGITS}-${MAX_PHONE_DIGITS} digits)`,
            });
        }
    });

export type MessageIntentInput = z.input<typeof intentInputSchema>;

const serializedIntentSchema = z.object({
    channel: z.enum(CHANNELS),
    to: z.string(),
    subject: z.string().nullable(),
    text: z.string().nullable(),
    html: z.string().nullable(),
    templateKey: z.string().nullable(),
    templateData: z.record(z.unknown()),
    mediaUrls: z.array(z.string()),
    metadata: z.record(z.unknown()),
    idempotencyKey: z.string().nullable(),
    sendAt: z.string().nullable(),
});

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const field = issue.path.join('.');
        return field ? `${field}: ${issue.message}` : issue.message;
    });
}

/**
 * Validate raw input and build an immutable {@link MessageIntent}.
 * Throws {@link IntentValidationError}; an intent that exists is always dispatchable.
 */
export function createMessageIntent(input: MessageIntentInput): MessageIntent {
    return parseMessageIntent(input);
}

/** {@link createMessageIntent} for input of unknown shape, such as a request body. */
export function parseMessageIntent(input: unknown): MessageIntent {
    const parsed = intentInputSchema.safeParse(input);
    if (!parsed.success) {
        throw new IntentValidationError(formatIssues(parsed.error));
    }

    const value = parsed.data;
    const sendAt = value.sendAt instanceof Date
        ? new Date(value.sendAt.getTime())
        : typeof value.sendAt === 'string'
            ? new Date(value.sendAt)
            : null;

    return Object.freeze({
        channel: value.channel,
        to: value.to,
        subject: value.subject ?? null,
        text: value.text ?? null,
        html: value.html ?? null,
        templateKey: value.templateKey ?? null,
        templateData: Object.freeze({ ...(value.templateData ?? {}) }),
        mediaUrls: Object.freeze([...(value.mediaUrls ?? [])]),
        metadata: Object.freeze({ ...(value.metadata ?? {}) }),
        idempotencyKey: value.idempotencyKey ?? null,
        sendAt,
    });
}

export function serializeIntent(intent: MessageIntent): SerializedIntent {
    return {
        channel: intent.channel,
        to: intent.to,
        subject: intent.subject,
        text: intent.text,
        html: intent.html,
        templateKey: intent.templateKey,
        templateData: { ...intent.templateData },
        mediaUrls: [...intent.mediaUrls],
        metadata: { ...intent.metadata },
        idempotencyKey: intent.idempotencyKey,
        sendAt: intent.sendAt ? intent.sendAt.toISOString() : null,
    };
}

/** Parse a stored JSON payload column. Throws when the stored shape is not a serialized intent. */
export function parseSerializedIntent(json: string): SerializedIntent {
    return serializedIntentSchema.parse(JSON.parse(json));
}

/** Rebuild an intent from its stored form. Stored payloads are re-validated. */
export function intentFromSerialized(payload: SerializedIntent): MessageIntent {
    return createMessageIntent(payload);
}

/** UTF-8 byte length of the serialized intent, as checked against `maxPayloadBytes`. */
export function serializedIntentSize(intent: MessageIntent): number {
    return Buffer.byteLength(JSON.stringify(serializeIntent(intent)), 'utf8');
}
