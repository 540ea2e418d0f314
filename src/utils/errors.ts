/**
 * Error Types
 *
 * Only boundary failures (the export file and its top-level format) surface
 * as errors. Problems inside individual records are absorbed by the engine.
 */

export type ChatStatsErrorCode = 'SOURCE_NOT_FOUND' | 'INVALID_INPUT_FORMAT';

export class ChatStatsError extends Error {
    readonly code: ChatStatsErrorCode;

    constructor(code: ChatStatsErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = 'ChatStatsError';
        this.code = code;
    }
}

/**
 * The export file is missing or cannot be read
 */
export class SourceNotFoundError extends ChatStatsError {
    readonly path: string;

    constructor(path: string, options?: { cause?: unknown }) {
        super('SOURCE_NOT_FOUND', `Conversation export not found: ${path}`, options);
        this.name = 'SourceNotFoundError';
        this.path = path;
    }
}

/**
 * The export is not valid JSON, or not an array of conversations
 */
export class InvalidInputFormatError extends ChatStatsError {
    constructor(detail: string, options?: { cause?: unknown }) {
        super('INVALID_INPUT_FORMAT', `Invalid input format: ${detail}`, options);
        this.name = 'InvalidInputFormatError';
    }
}

export function isChatStatsError(error: unknown): error is ChatStatsError {
    return error instanceof ChatStatsError;
}
