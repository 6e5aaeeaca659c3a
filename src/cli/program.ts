import { createRequire } from "node:module";
import { Command, InvalidArgumentError } from "commander";
import { DEFAULT_SCALE } from '../utils/constants';
import { handleHourActivity, handleWordCount } from './handlers';

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

/** Parse a string as a non-negative integer, throwing on invalid input. */
function parseNonNegativeInt(value: string): number {
    const n = Number(value);
    if (value.trim() === '' || !Number.isInteger(n) || n < 0) {
        throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}".`);
    }
    return n;
}

/** Parse a string as a positive integer, throwing on invalid input. */
function parsePositiveInt(value: string): number {
    const n = Number(value);
    if (value.trim() === '' || !Number.isInteger(n) || n <= 0) {
        throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
    }
    return n;
}

/**
 * Create the CLI program with both reports registered.
 */
export function createProgram(): Command {
    const program = new Command()
        .name("telegram-stats")
        .description("Make statistics about Telegram conversations")
        .version(version);

    program
        .command("word-count")
        .description("Count the number of occurrences of individual words")
        .addHelpText(
            "after",
            "\nWords are extracted by splitting messages on single spaces, then lowercased."
        )
        .argument("<file-path>", "The path of the JSON file to parse")
        .option("-l, --limit <n>", "Limit output to the first n results", parseNonNegativeInt)
        .option("--from <name>", "Only include messages from the specified user")
        .option("--output-json", "Output the results in JSON")
        .option("--reverse-sort", "Output the least common words first")
        .option("-v, --verbose", "Print progress information on stderr")
        .action(handleWordCount);

    program
        .command("hour-activity")
        .description("Show a graph with message percentage by hour")
        .argument("<file-path>", "The path of the JSON file to parse")
        .option("--timezone <tz>", "TZ database name of the timezone to convert to (eg: Europe/Paris)")
        .option("--from <name>", "Only include messages from the specified user")
        .option("--start-date <date>", "Start date in dd/mm/yyyy format")
        .option("--end-date <date>", "End date in dd/mm/yyyy format")
        .option("--scale <n>", "Scale the graph by the specified integer", parsePositiveInt, DEFAULT_SCALE)
        .option("-v, --verbose", "Print progress information on stderr")
        .action(handleHourActivity);

    return program;
}
