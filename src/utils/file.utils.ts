/**
 * File Utilities
 */

import fs from "fs";
import path from "path";
import { SourceNotFoundError } from './errors';

// ============================================================================
// READING
// ============================================================================

/**
 * Reads the export as raw bytes. Any failure to open or read the file is
 * reported as a missing source.
 */
export function readExportFile(filePath: string): Buffer {
    const absolutePath = path.resolve(filePath);
    try {
        return fs.readFileSync(absolutePath);
    } catch (error) {
        throw new SourceNotFoundError(absolutePath, { cause: error });
    }
}

// ============================================================================
// WRITING
// ============================================================================

/**
 * Writes a UTF-8 text file, creating parent directories as needed
 */
export function writeTextFile(filePath: string, content: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, "utf8");
}

export function writeJsonFile(filePath: string, data: unknown): void {
    writeTextFile(filePath, JSON.stringify(data, null, 2));
}

/**
 * Size of a file on disk, 0 when it does not exist
 */
export function fileSize(filePath: string): number {
    return fs.existsSync(filePath) ? fs.statSync(filePath).size : 0;
}
