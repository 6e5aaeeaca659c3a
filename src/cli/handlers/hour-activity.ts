import { computeHourlyActivity } from '../../analysis/hourly-activity.computer';
import { filterMessages } from '../../analysis/message.filter';
import { formatHourlyHistogram } from '../../report/format.utils';
import { REPORT_FORMAT } from '../../utils/constants';
import { assertTimeZone, parseCalendarDate } from '../../utils/date.utils';
import { logInfo, reportFailure } from '../cli.utils';
import { loadArchive } from '../file-processor';
import { printLines } from '../output';

export type HourActivityCommandOptions = {
    timezone?: string;
    from?: string;
    startDate?: string;
    endDate?: string;
    scale?: number;
    verbose?: boolean;
};

/** Handle the `hour-activity` CLI command. */
export function handleHourActivity(filePath: string, options: HourActivityCommandOptions): void {
    try {
        // Arguments are checked before the file is touched
        const startDate = options.startDate !== undefined ? parseCalendarDate(options.startDate) : undefined;
        const endDate = options.endDate !== undefined ? parseCalendarDate(options.endDate) : undefined;
        if (options.timezone !== undefined) {
            assertTimeZone(options.timezone);
        }

        const archive = loadArchive(filePath);
        if (options.verbose) {
            logInfo(`Parsed ${archive.messages.length} messages from "${archive.name}"`);
        }

        const messages = filterMessages(archive.messages, {
            senderName: options.from,
            startDate,
            endDate
        });
        if (options.verbose) {
            logInfo(`${messages.length} messages matched`);
        }

        const activity = computeHourlyActivity(messages, {
            timeZone: options.timezone,
            scale: options.scale
        });

        printLines(formatHourlyHistogram(activity, REPORT_FORMAT));
    } catch (error) {
        reportFailure(error);
    }
}
