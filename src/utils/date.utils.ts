/**
 * Date Parsing Utilities
 */

import {
    CALENDAR_DATE_SEPARATOR,
    INTEGER_REGEX,
    MESSAGE_DATE_REGEX
} from './constants';
import { InvalidArgumentError } from './errors';

// ============================================================================
// MESSAGE DATES
// ============================================================================

/**
 * Builds a UTC date and checks that no component overflowed into the next unit
 * (JavaScript silently turns 31/02 into 03/03)
 */
function utcDate(
    year: number,
    month: number,
    day: number,
    hour = 0,
    minute = 0,
    second = 0,
    millisecond = 0
): Date | null {
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    date.setUTCHours(hour, minute, second, millisecond);

    if (
        date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day ||
        date.getUTCHours() !== hour ||
        date.getUTCMinutes() !== minute ||
        date.getUTCSeconds() !== second
    ) {
        return null;
    }
    return date;
}

/**
 * Parses an export timestamp such as "2023-04-01T18:22:05" as a UTC instant.
 * Returns null when the string is not a valid date-time.
 */
export function parseMessageDate(value: string): Date | null {
    const match = MESSAGE_DATE_REGEX.exec(value);
    if (!match) {
        return null;
    }

    const [, year, month, day, hour, minute, second, fraction] = match;
    // ".5" -> 500ms, ".123456" -> 123ms
    const millisecond = fraction ? parseInt(fraction.slice(1, 4).padEnd(3, '0'), 10) : 0;

    return utcDate(
        parseInt(year, 10),
        parseInt(month, 10),
        parseInt(day, 10),
        parseInt(hour, 10),
        parseInt(minute, 10),
        parseInt(second, 10),
        millisecond
    );
}

// ============================================================================
// FILTER DATES
// ============================================================================

/**
 * Parses a "dd/mm/yyyy" calendar date as midnight UTC of that day.
 * Out-of-range components roll over like a lenient calendar: 31/02/2023 is
 * 3 March 2023, 01/13/2023 is 1 January 2024.
 */
export function parseCalendarDate(value: string): Date {
    const parts = value.split(CALENDAR_DATE_SEPARATOR);

    if (parts.length !== 3 || !parts.every(part => INTEGER_REGEX.test(part))) {
        throw new InvalidArgumentError(`Invalid date format: "${value}" (expected dd/mm/yyyy)`);
    }

    const [day, month, year] = parts.map(part => parseInt(part, 10));

    // setUTCFullYear rather than Date.UTC, which maps years 0-99 to 1900-1999
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    if (Number.isNaN(date.getTime())) {
        throw new InvalidArgumentError(`Invalid date: "${value}" is out of range`);
    }
    return date;
}

// ============================================================================
// TIMEZONES
// ============================================================================

export type HourResolver = (instant: Date) => number;

/**
 * Creates a function returning the civil hour (0-23) of an instant.
 * Without a timezone the UTC hour is used; an unknown IANA name is rejected
 * here, before any message is looked at.
 */
export function createHourResolver(timeZone?: string): HourResolver {
    if (timeZone === undefined) {
        return instant => instant.getUTCHours();
    }

    let formatter: Intl.DateTimeFormat;
    try {
        formatter = new Intl.DateTimeFormat('en-GB', {
            timeZone,
            hour: 'numeric',
            hourCycle: 'h23'
        });
    } catch (error) {
        if (error instanceof RangeError) {
            throw new InvalidArgumentError(`Invalid timezone code: ${timeZone}`);
        }
        throw error;
    }

    return instant => {
        const hourPart = formatter.formatToParts(instant).find(part => part.type === 'hour');
        if (!hourPart) {
            throw new InvalidArgumentError(`Timezone ${timeZone} produced no hour for ${instant.toISOString()}`);
        }
        // some ICU builds still print midnight as "24"
        return parseInt(hourPart.value, 10) % 24;
    };
}

/**
 * Throws InvalidArgumentError unless the IANA timezone name is known
 */
export function assertTimeZone(timeZone: string): void {
    createHourResolver(timeZone);
}
