import { createProgram } from './program';

// ============================================================================
// CLI MAIN LOGIC
// ============================================================================

/**
 * Main CLI execution function
 */
export async function runCLI(args: string[]): Promise<void> {
    await createProgram().parseAsync(args);
}
