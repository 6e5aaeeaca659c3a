/**
 * Archive Type Definitions
 */

/**
 * Text payload of a message as it appears in the export.
 * Telegram writes plain messages as a bare string and formatted ones as an
 * array mixing strings with entity objects ({ type, text }).
 */
export type MessageText =
    | { kind: 'plain'; value: string }
    | { kind: 'rich'; segments: readonly string[] }
    | { kind: 'empty' };

/**
 * A single chat entry
 */
export type Message = {
    readonly id: bigint;
    readonly type: string;
    readonly date: string;          // UTC, no zone designator (e.g. "2023-04-01T18:22:05")
    readonly from: string;
    readonly fromID: string;
    readonly text: MessageText;
    readonly textContent: string;   // flattened text, "" when there is none
};

/**
 * One exported conversation
 */
export type Archive = {
    readonly name: string;
    readonly type: string;
    readonly id: bigint;
    readonly messages: readonly Message[];
};
