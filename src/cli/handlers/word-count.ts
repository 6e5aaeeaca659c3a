import { filterMessages } from '../../analysis/message.filter';
import { computeWordFrequency } from '../../analysis/word-frequency.computer';
import { formatWordCounts, formatWordCountsJson } from '../../report/format.utils';
import { REPORT_FORMAT } from '../../utils/constants';
import { logInfo, logWarning, reportFailure } from '../cli.utils';
import { loadArchive } from '../file-processor';
import { printLines } from '../output';

export type WordCountCommandOptions = {
    limit?: number;
    from?: string;
    outputJson?: boolean;
    reverseSort?: boolean;
    verbose?: boolean;
};

/** Handle the `word-count` CLI command. */
export function handleWordCount(filePath: string, options: WordCountCommandOptions): void {
    try {
        const archive = loadArchive(filePath);
        if (options.verbose) {
            logInfo(`Parsed ${archive.messages.length} messages from "${archive.name}"`);
        }

        const messages = filterMessages(archive.messages, { senderName: options.from });
        if (options.verbose) {
            logInfo(`${messages.length} messages matched`);
        }

        const wordCounts = computeWordFrequency(messages, {
            limit: options.limit,
            reverse: options.reverseSort
        });

        if (options.outputJson) {
            printLines([formatWordCountsJson(wordCounts, REPORT_FORMAT)]);
            return;
        }

        if (wordCounts.length === 0) {
            logWarning(options.from !== undefined ? `No words found for "${options.from}"` : 'No words found');
            return;
        }
        printLines(formatWordCounts(wordCounts, REPORT_FORMAT));
    } catch (error) {
        reportFailure(error);
    }
}
