#!/usr/bin/env -S npx tsx
/**
 * Chat Archive Stats - Main Entry Point
 *
 * Analytics over a conversation export (conversations.json): per-conversation
 * summaries, daily/weekly/monthly activity, gaps, content metrics and a
 * dashboard payload.
 *
 * Usage:
 *  npx tsx src/index.ts [summary|payload|prompts|first] [conversations.json]
 */

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
    return !!process.argv[1] && path.resolve(process.argv[1]) === thisFile;
}

// Run CLI if this is the main module
if (isMainModule()) {
    runCLI(process.argv)
        .then(code => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            console.error("✗ Unexpected error:", error);
            process.exitCode = 1;
        });
}

// ============================================================================
// LIBRARY EXPORTS
// ============================================================================

export * from './types';
export * from './parsers';
export * from './analysis';
export * from './utils';
export * from './cli';
