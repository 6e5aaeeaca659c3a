#!/usr/bin/env -S node --import tsx
/**
 * Telegram Stats - Main Entry Point
 *
 * Word-frequency and hourly-activity reports for exported Telegram chats.
 *
 * Usage:
 *  npx tsx src/index.ts word-count path/to/result.json --limit 20
 *  npx tsx src/index.ts hour-activity path/to/result.json --timezone Europe/Paris
 */

import fs from "node:fs";
import { fileURLToPath } from "node:url";
import path from "node:path";
import { runCLI } from './cli';

// ============================================================================
// MAIN ENTRY POINT
// ============================================================================

/**
 * Checks if this script is being run directly (not imported as a module)
 */
function isMainModule(): boolean {
    const thisFile = fileURLToPath(import.meta.url);
    const entry = process.argv[1];
    if (!entry) {
        return false;
    }
    // npm links bin entries through a symlink
    const resolved = fs.existsSync(entry) ? fs.realpathSync(entry) : path.resolve(entry);
    return resolved === thisFile;
}

// Run CLI if this is the main module
if (isMainModule()) {
    runCLI(process.argv).catch((error: unknown) => {
        console.error("❌ Unexpected error:", error);
        process.exit(1);
    });
}

// ============================================================================
// LIBRARY EXPORTS
// ============================================================================

export * from './types';
export * from './parsers';
export * from './analysis';
export * from './report';
export * from './utils';
