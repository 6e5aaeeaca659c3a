import fs from "node:fs";
import path from "node:path";
import type { Archive } from '../types';
import { parseTelegramExport } from '../parsers/telegram.parser';
import { errorMessage, FileReadError } from '../utils/errors';

// ============================================================================
// FILE PROCESSING
// ============================================================================

/**
 * Reads the raw bytes of an export file
 */
export function readExportFile(filePath: string): Buffer {
    const absolutePath = path.resolve(filePath);
    try {
        return fs.readFileSync(absolutePath);
    } catch (error) {
        throw new FileReadError(absolutePath, `Cannot read ${absolutePath}: ${errorMessage(error)}`);
    }
}

/**
 * Reads and parses an export file into an Archive
 */
export function loadArchive(filePath: string): Archive {
    return parseTelegramExport(readExportFile(filePath));
}
