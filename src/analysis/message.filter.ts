import type { Message, MessageFilter } from '../types';
import { parseMessageDate } from '../utils/date.utils';
import { UnparseableDateError } from '../utils/errors';

// ============================================================================
// MESSAGE FILTERING
// ============================================================================

/**
 * Returns the messages passing every predicate of the filter, in their
 * original order. The input list is not modified.
 *
 * The sender is checked first, so a message from somebody else is never
 * rejected for its date. Once a date bound is set, a candidate message whose
 * date cannot be parsed aborts the whole filter.
 */
export function filterMessages(messages: readonly Message[], filter: MessageFilter): Message[] {
    const { senderName, startDate, endDate } = filter;
    const hasDateBound = startDate !== undefined || endDate !== undefined;

    return messages.filter(message => {
        if (senderName !== undefined && message.from !== senderName) {
            return false;
        }

        if (!hasDateBound) {
            return true;
        }

        const date = parseMessageDate(message.date);
        if (!date) {
            throw new UnparseableDateError(message.id, message.date);
        }

        if (startDate !== undefined && date.getTime() < startDate.getTime()) {
            return false;
        }
        if (endDate !== undefined && date.getTime() > endDate.getTime()) {
            return false;
        }
        return true;
    });
}
