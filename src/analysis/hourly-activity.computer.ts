/**
 * Hourly Activity Computation
 */

import type { HourlyActivity, HourlyActivityOptions, Message } from '../types';
import { DEFAULT_SCALE, HOURS_PER_DAY } from '../utils/constants';
import { createHourResolver, parseMessageDate } from '../utils/date.utils';
import { InvalidArgumentError, NoMatchingMessagesError, UnparseableDateError } from '../utils/errors';

// ============================================================================
// HOURLY HISTOGRAM
// ============================================================================

/**
 * Counts messages per civil hour and converts the counts to percentages.
 *
 * percentage[i] = round(counts[i] / total * 100) * scale, with Math.round
 * (half up, i.e. half away from zero for these non-negative values).
 */
export function computeHourlyActivity(
    messages: readonly Message[],
    options: HourlyActivityOptions = {}
): HourlyActivity {
    const scale = options.scale ?? DEFAULT_SCALE;
    if (!Number.isInteger(scale) || scale < 1) {
        throw new InvalidArgumentError(`Scale must be a positive integer, got ${scale}`);
    }

    // Resolved up front so an unknown timezone fails before any message is read
    const hourOf = createHourResolver(options.timeZone);

    const counts: number[] = Array(HOURS_PER_DAY).fill(0);
    let total = 0;

    for (const message of messages) {
        const date = parseMessageDate(message.date);
        if (!date) {
            throw new UnparseableDateError(message.id, message.date);
        }

        counts[hourOf(date)] += 1;
        total += 1;
    }

    if (total === 0) {
        throw new NoMatchingMessagesError();
    }

    const percentages = counts.map(count => Math.round((count / total) * 100) * scale);

    return { counts, total, percentages };
}
