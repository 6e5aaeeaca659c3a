/**
 * CLI Utilities: colours and diagnostics
 *
 * Diagnostics go to stderr so that stdout only ever carries the report.
 */

import { ChatStatsError, errorMessage } from '../utils/errors';

export const ERROR_ICON = "✗";
export const INFO_ICON = "ℹ";
export const WARNING_ICON = "⚠";

// ============================================================================
// COLOR UTILITIES
// ============================================================================

export const colors = {
    reset: '\x1b[0m',
    red: '\x1b[31m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m'
};

/**
 * Colour is used only on an interactive stderr and never when NO_COLOR is set
 */
export function shouldColorize(): boolean {
    return !process.env.NO_COLOR && process.stderr.isTTY === true;
}

export function colorize(text: string, color: keyof typeof colors): string {
    if (!shouldColorize()) {
        return text;
    }
    return `${colors[color]}${text}${colors.reset}`;
}

// ============================================================================
// MESSAGE UTILITIES
// ============================================================================

export function logError(message: string): void {
    console.error(`${colorize(ERROR_ICON, 'red')} ${colorize(message, 'red')}`);
}

export function logInfo(message: string): void {
    console.error(`${colorize(INFO_ICON, 'blue')} ${colorize(message, 'blue')}`);
}

export function logWarning(message: string): void {
    console.error(`${colorize(WARNING_ICON, 'yellow')} ${colorize(message, 'yellow')}`);
}

// ============================================================================
// ERROR HANDLING
// ============================================================================

/**
 * Prints a failed run's diagnostic and marks the process as failed
 */
export function reportFailure(error: unknown): void {
    if (error instanceof ChatStatsError) {
        logError(`${error.name}: ${error.message}`);
    } else {
        logError(`Unexpected error: ${errorMessage(error)}`);
    }
    process.exitCode = 1;
}
