import path from "node:path";
import type { ConversationSummary, DailyRecord, GapRecord } from '../types';
import { DEFAULT_PAYLOAD_FILENAME } from '../utils/constants';
import { writeTextFile } from '../utils/file.utils';

// ============================================================================
// OUTPUT UTILITIES
// ============================================================================

/**
 * Default payload location: beside the input export
 */
export function getDefaultOutputPath(inputPath: string): string {
    const absolutePath = path.resolve(inputPath);
    return path.join(path.dirname(absolutePath), DEFAULT_PAYLOAD_FILENAME);
}

// ============================================================================
// CSV
// ============================================================================

type CsvValue = string | number | boolean | null | undefined;

function csvCell(value: CsvValue): string {
    if (value === null || value === undefined) return '';
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * RFC 4180 CSV (CRLF line endings) with the given columns, in order
 */
export function toCsv<T, K extends keyof T>(rows: readonly T[], fields: readonly K[]): string {
    const lines = [fields.map(field => csvCell(String(field))).join(',')];
    for (const row of rows) {
        lines.push(fields.map(field => csvCell(toCsvValue(row[field]))).join(','));
    }
    return lines.join('\r\n') + '\r\n';
}

/**
 * Primitive cells pass through; anything structured is left blank
 */
function toCsvValue(value: unknown): CsvValue {
    return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' ? value : null;
}

// ============================================================================
// ANALYTICS FILES
// ============================================================================

const SUMMARY_CSV_FIELDS = ['date', 'start_time', 'end_time', 'message_count', 'duration_minutes'] as const;
const DAILY_CSV_FIELDS = ['date', 'total_messages', 'total_chats', 'avg_messages_per_chat', 'max_messages_in_chat'] as const;
const GAP_CSV_FIELDS = ['start_timestamp', 'end_timestamp', 'length_days'] as const;

/**
 * Writes chat_summaries, daily_stats and (when there are any gaps)
 * message_gaps as both JSON and CSV. Returns the paths written.
 */
export function writeAnalyticsFiles(
    outputDir: string,
    summaries: readonly ConversationSummary[],
    records: readonly DailyRecord[],
    gaps: readonly GapRecord[]
): string[] {
    const written: string[] = [];
    const write = (fileName: string, content: string): void => {
        const filePath = path.join(outputDir, fileName);
        writeTextFile(filePath, content);
        written.push(filePath);
    };

    write('chat_summaries.json', JSON.stringify(summaries, null, 2));
    write('chat_summaries.csv', toCsv(summaries, SUMMARY_CSV_FIELDS));
    write('daily_stats.json', JSON.stringify(records, null, 2));
    write('daily_stats.csv', toCsv(records, DAILY_CSV_FIELDS));

    if (gaps.length > 0) {
        write('message_gaps.json', JSON.stringify(gaps, null, 2));
        write('message_gaps.csv', toCsv(gaps, GAP_CSV_FIELDS));
    }

    return written;
}

export const PROMPT_SEPARATOR = '-'.repeat(36);

/**
 * One prompt per block, each followed by a dashed separator line
 */
export function writePromptsFile(filePath: string, prompts: readonly string[]): void {
    writeTextFile(filePath, prompts.map(prompt => `${prompt}\n${PROMPT_SEPARATOR}\n`).join(''));
}
