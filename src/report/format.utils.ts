import type { HourlyActivity, ReportFormat, WordCount } from '../types';

// ============================================================================
// FORMATTING FUNCTIONS
// ============================================================================

/**
 * Formats a word count as `"word" ⨉ count`
 */
export function formatWordCount(entry: WordCount, format: ReportFormat): string {
    return `"${entry.word}" ${format.countSeparator} ${entry.count}`;
}

export function formatWordCounts(entries: readonly WordCount[], format: ReportFormat): string[] {
    return entries.map(entry => formatWordCount(entry, format));
}

/**
 * Serialises word counts as a pretty-printed JSON array of { word, count }
 */
export function formatWordCountsJson(entries: readonly WordCount[], format: ReportFormat): string {
    return JSON.stringify(
        entries.map(({ word, count }) => ({ word, count })),
        null,
        format.jsonIndent
    );
}

/**
 * Formats an hour of the day as its label, e.g. 7 -> "07:00"
 */
export function formatHourLabel(hour: number, format: ReportFormat): string {
    return `${hour.toString().padStart(format.hourLabelDigits, '0')}:00`;
}

/**
 * Renders the hourly histogram, one line per hour from 00:00 to 23:00
 */
export function formatHourlyHistogram(activity: HourlyActivity, format: ReportFormat): string[] {
    return activity.percentages.map(
        (percentage, hour) => `${formatHourLabel(hour, format)} - ${format.marker.repeat(percentage)}`
    );
}
