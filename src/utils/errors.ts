/**
 * Error hierarchy.
 *
 * Every failure of a run is one of these; the CLI reports it and exits non-zero.
 */

/** Base error for all chat statistics failures. */
export class ChatStatsError extends Error {
    constructor(message?: string) {
        super(message);
        this.name = 'ChatStatsError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** Raised when the export file cannot be read. */
export class FileReadError extends ChatStatsError {
    readonly path: string;

    constructor(path: string, message?: string) {
        super(message ?? `Cannot read file: ${path}`);
        this.name = 'FileReadError';
        this.path = path;
    }
}

/** Raised when the export is not valid JSON or does not match the archive layout. */
export class ParseError extends ChatStatsError {
    constructor(message?: string) {
        super(message);
        this.name = 'ParseError';
    }
}

/** Raised on malformed dates, unknown timezones and out-of-range limits. */
export class InvalidArgumentError extends ChatStatsError {
    constructor(message?: string) {
        super(message);
        this.name = 'InvalidArgumentError';
    }
}

/** Raised when the hourly histogram would be computed over zero messages. */
export class NoMatchingMessagesError extends ChatStatsError {
    constructor(message?: string) {
        super(message ?? 'No messages matched the given filters');
        this.name = 'NoMatchingMessagesError';
    }
}

/** Raised when a message date cannot be read as a UTC instant. */
export class UnparseableDateError extends ChatStatsError {
    readonly messageId: bigint;
    readonly date: string;

    constructor(messageId: bigint, date: string) {
        super(`Message ${messageId.toString()} has an unparseable date: "${date}"`);
        this.name = 'UnparseableDateError';
        this.messageId = messageId;
        this.date = date;
    }
}

/**
 * Extracts a printable message from any thrown value
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
