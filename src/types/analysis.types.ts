/**
 * Analysis Type Definitions
 */

/**
 * Predicates applied to the message list. Every specified field must match.
 */
export type MessageFilter = {
    senderName?: string;
    startDate?: Date;
    endDate?: Date;
};

export type WordCount = {
    word: string;
    count: number;
};

export type WordFrequencyOptions = {
    limit?: number;
    reverse?: boolean;      // least common words first
};

export type HourlyActivityOptions = {
    timeZone?: string;      // IANA name, UTC when omitted
    scale?: number;
};

/**
 * Message distribution over the 24 hours of the day
 */
export type HourlyActivity = {
    counts: number[];       // messages per hour (24 bins)
    total: number;
    percentages: number[];  // rounded share per hour, multiplied by the scale
};

/**
 * Layout of the printed reports, built once per run
 */
export type ReportFormat = {
    readonly marker: string;
    readonly countSeparator: string;
    readonly hourLabelDigits: number;
    readonly jsonIndent: number;
};
