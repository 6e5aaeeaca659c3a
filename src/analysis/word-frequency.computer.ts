/**
 * Word Frequency Computation
 */

import type { Message, WordCount, WordFrequencyOptions } from '../types';
import { InvalidArgumentError } from '../utils/errors';
import { compareCodeUnits, normaliseWord, tokeniseOnSpaces } from '../utils/text.utils';

// ============================================================================
// COUNTING
// ============================================================================

/**
 * Counts lowercased space-separated words over all messages
 */
export function countWords(messages: readonly Message[]): Map<string, number> {
    const wordCounts = new Map<string, number>();

    for (const message of messages) {
        for (const token of tokeniseOnSpaces(message.textContent)) {
            const word = normaliseWord(token);
            wordCounts.set(word, (wordCounts.get(word) ?? 0) + 1);
        }
    }

    return wordCounts;
}

// ============================================================================
// RANKING
// ============================================================================

/**
 * Orders word counts by count, most common first (or last when reversed).
 * Words sharing a count stay in alphabetical order: the list is sorted by
 * word first, then stably by count.
 */
export function rankWordCounts(entries: Iterable<WordCount>, reverse = false): WordCount[] {
    const ranked = Array.from(entries, ({ word, count }) => ({ word, count }));

    ranked.sort((a, b) => compareCodeUnits(a.word, b.word));
    ranked.sort(reverse ? (a, b) => a.count - b.count : (a, b) => b.count - a.count);

    return ranked;
}

/**
 * Keeps the first `limit` entries. A limit beyond the list length is an error,
 * not a silent clamp.
 */
export function applyLimit<T>(entries: T[], limit?: number): T[] {
    if (limit === undefined) {
        return entries;
    }
    if (!Number.isInteger(limit) || limit < 0) {
        throw new InvalidArgumentError(`Limit must be a non-negative integer, got ${limit}`);
    }
    if (limit > entries.length) {
        throw new InvalidArgumentError(`Limit ${limit} is out of range: only ${entries.length} words were found`);
    }
    return entries.slice(0, limit);
}

/**
 * Computes the ranked word-frequency list for a set of messages
 */
export function computeWordFrequency(
    messages: readonly Message[],
    options: WordFrequencyOptions = {}
): WordCount[] {
    const wordCounts = countWords(messages);
    const entries = Array.from(wordCounts, ([word, count]) => ({ word, count }));
    const ranked = rankWordCounts(entries, options.reverse ?? false);

    return applyLimit(ranked, options.limit);
}
