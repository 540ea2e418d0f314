import { z } from 'zod';
import type { ConversationRecord } from '../types';
import { conversationSchema } from '../types';
import { DEFAULT_INPUT_PATH } from '../utils/constants';
import { InvalidInputFormatError } from '../utils/errors';
import { readExportFile } from '../utils/file.utils';
import { decodeUtf8 } from '../utils/text.utils';

// ============================================================================
// CONVERSATION LOADER
// ============================================================================

const exportArraySchema = z.array(z.unknown());

/**
 * Parses export text as JSON without interpreting its shape
 */
export function parseExportJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new InvalidInputFormatError(`not valid JSON (${detail})`, { cause: error });
    }
}

/**
 * Turns a parsed export into conversation records. The top level must be an
 * array; entries that are not objects are dropped.
 */
export function normaliseConversations(data: unknown): ConversationRecord[] {
    const entries = exportArraySchema.safeParse(data);
    if (!entries.success) {
        throw new InvalidInputFormatError('expected a JSON array of conversations');
    }

    const conversations: ConversationRecord[] = [];
    for (const entry of entries.data) {
        const parsed = conversationSchema.safeParse(entry);
        if (parsed.success) {
            conversations.push(parsed.data);
        }
    }
    return conversations;
}

export function parseConversations(text: string): ConversationRecord[] {
    return normaliseConversations(parseExportJson(text));
}

/**
 * Reads the export as UTF-8 text
 *
 * @throws SourceNotFoundError when the file is missing or unreadable
 */
export function readExport(filePath: string = DEFAULT_INPUT_PATH): string {
    return decodeUtf8(readExportFile(filePath));
}

/**
 * Reads the raw export JSON (any shape) from disk
 */
export function loadExportJson(filePath: string = DEFAULT_INPUT_PATH): unknown {
    return parseExportJson(readExport(filePath));
}

/**
 * Loads conversation records from an export file.
 *
 * @throws SourceNotFoundError when the file is missing or unreadable
 * @throws InvalidInputFormatError when it is not a JSON array
 */
export function loadConversations(filePath: string = DEFAULT_INPUT_PATH): ConversationRecord[] {
    return normaliseConversations(loadExportJson(filePath));
}
