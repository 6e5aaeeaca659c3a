import { isUtf8 } from "node:buffer";
import * as iconv from 'iconv-lite';
import { z } from 'zod';
import type { Archive, Message } from '../types';
import { errorMessage, ParseError } from '../utils/errors';
import { flattenMessageText, toMessageText } from '../utils/text.utils';

// ============================================================================
// TELEGRAM EXPORT SCHEMA
// ============================================================================

// Missing and null fields read as their zero value, unknown fields are dropped
const stringField = z.string().nullish().transform(value => value ?? '');

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

// 64-bit ids arrive as JSON numbers or, in the protobuf JSON mapping, as strings
const int64Field = z
    .union([z.number().int(), z.string().regex(/^-?\d+$/, 'Expected an integer string')])
    .nullish()
    .transform(value => (value === null || value === undefined ? 0n : BigInt(value)))
    .refine(value => value >= INT64_MIN && value <= INT64_MAX, 'Integer out of 64-bit range');

const messageSchema = z.object({
    id: int64Field,
    type: stringField,
    date: stringField,
    from: stringField,
    from_id: stringField,
    fromID: stringField,
    text: z.unknown()
});

const exportSchema = z.object({
    name: stringField,
    type: stringField,
    id: int64Field,
    messages: z.array(messageSchema).nullish().transform(value => value ?? [])
});

type RawMessage = z.infer<typeof messageSchema>;

// ============================================================================
// TELEGRAM PARSER
// ============================================================================

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

function toMessage(raw: RawMessage): Message {
    const text = toMessageText(raw.text);
    return {
        id: raw.id,
        type: raw.type,
        date: raw.date,
        from: raw.from,
        fromID: raw.from_id || raw.fromID,
        text,
        textContent: flattenMessageText(text)
    };
}

/**
 * Decodes a Telegram chat export (result.json) into an Archive.
 * The whole document is validated before anything is returned.
 */
export function parseTelegramExport(data: Uint8Array): Archive {
    const bytes = Buffer.from(data.buffer, data.byteOffset, data.byteLength);

    // iconv would silently turn invalid sequences into U+FFFD
    if (!isUtf8(bytes)) {
        throw new ParseError('Invalid UTF-8 in export file');
    }

    // iconv strips a leading BOM, which JSON.parse would reject
    const json = iconv.decode(bytes, 'utf8');

    let document: unknown;
    try {
        document = JSON.parse(json);
    } catch (error) {
        throw new ParseError(`Invalid JSON: ${errorMessage(error)}`);
    }

    const result = exportSchema.safeParse(document);
    if (!result.success) {
        throw new ParseError(`Unexpected export layout: ${formatIssues(result.error)}`);
    }

    const { name, type, id, messages } = result.data;
    return {
        name,
        type,
        id,
        messages: Object.freeze(messages.map(toMessage))
    };
}
