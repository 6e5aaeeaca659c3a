// ============================================================================
// OUTPUT UTILITIES
// ============================================================================

/**
 * Writes report lines to stdout, each terminated by a newline
 */
export function printLines(lines: readonly string[]): void {
    if (lines.length === 0) {
        return;
    }
    process.stdout.write(lines.join('\n') + '\n');
}
