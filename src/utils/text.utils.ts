/**
 * Text Processing Utilities
 */

import type { MessageText } from '../types';
import { WORD_SEPARATOR } from './constants';

// ============================================================================
// MESSAGE TEXT
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Classifies the raw "text" field of an exported message.
 * Rich text keeps the strings and the `text` of every entity object;
 * anything else (numbers, objects, null) carries no text.
 */
export function toMessageText(raw: unknown): MessageText {
    if (typeof raw === 'string') {
        return { kind: 'plain', value: raw };
    }

    if (Array.isArray(raw)) {
        const segments: string[] = [];
        for (const entry of raw) {
            if (typeof entry === 'string') {
                segments.push(entry);
            } else if (isRecord(entry) && typeof entry.text === 'string') {
                segments.push(entry.text);
            }
        }
        return { kind: 'rich', segments };
    }

    return { kind: 'empty' };
}

/**
 * Flattens message text to the plain string the analyzers work on
 */
export function flattenMessageText(text: MessageText): string {
    switch (text.kind) {
        case 'plain':
            return text.value;
        case 'rich':
            return text.segments.join('');
        case 'empty':
            return '';
    }
}

// ============================================================================
// TOKENISATION
// ============================================================================

/**
 * Splits text on single spaces. "a  b" gives ["a", "", "b"]: empty words are
 * kept and counted. Empty text gives no words at all.
 */
export function tokeniseOnSpaces(text: string): string[] {
    if (text.length === 0) {
        return [];
    }
    return text.split(WORD_SEPARATOR);
}

/**
 * Lowercases a word without regard to the host locale
 */
export function normaliseWord(word: string): string {
    return word.toLowerCase();
}

/**
 * Orders two strings by UTF-16 code units
 */
export function compareCodeUnits(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
