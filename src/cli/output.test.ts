import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { dailyRecord, summary } from '../test-utils/fixtures';
import { getDefaultOutputPath, PROMPT_SEPARATOR, toCsv, writeAnalyticsFiles, writePromptsFile } from './output';

describe('toCsv', () => {
    it('writes a header and CRLF-terminated rows', () => {
        const rows = [{ a: 'x,y', b: 1, c: null }];
        expect(toCsv(rows, ['a', 'b', 'c'])).toBe('a,b,c\r\n"x,y",1,\r\n');
    });

    it('doubles embedded quotes and quotes line breaks', () => {
        const rows = [{ text: 'say "hi"' }, { text: 'two\nlines' }];
        expect(toCsv(rows, ['text'])).toBe('text\r\n"say ""hi"""\r\n"two\nlines"\r\n');
    });

    it('leaves structured values blank', () => {
        const rows = [{ id: 'c1', code_languages: ['python'] }];
        expect(toCsv(rows, ['id', 'code_languages'])).toBe('id,code_languages\r\nc1,\r\n');
    });
});

describe('files', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chat-stats-output-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('writes summaries and daily stats, plus gaps when there are any', () => {
        const outDir = path.join(dir, 'analytics');
        const summaries = [summary({ start_time: '2024-01-15T10:00:00+00:00', duration_minutes: 1.5 })];
        const records = [dailyRecord('2024-01-15', { total_chats: 1, total_messages: 2, avg_messages_per_chat: 2 })];

        const withoutGaps = writeAnalyticsFiles(outDir, summaries, records, []);
        expect(withoutGaps.map(p => path.basename(p))).toEqual([
            'chat_summaries.json',
            'chat_summaries.csv',
            'daily_stats.json',
            'daily_stats.csv',
        ]);
        expect(fs.readFileSync(path.join(outDir, 'chat_summaries.csv'), 'utf8')).toBe(
            'date,start_time,end_time,message_count,duration_minutes\r\n2024-01-15,2024-01-15T10:00:00+00:00,,2,1.5\r\n'
        );
        expect(JSON.parse(fs.readFileSync(path.join(outDir, 'daily_stats.json'), 'utf8'))).toEqual(records);

        const gap = { start_timestamp: '2024-01-10T00:00:00+00:00', end_timestamp: '2024-01-15T10:00:00+00:00', length_days: 5 };
        const withGaps = writeAnalyticsFiles(outDir, summaries, records, [gap]);
        expect(withGaps).toHaveLength(6);
        expect(fs.readFileSync(path.join(outDir, 'message_gaps.csv'), 'utf8')).toBe(
            'start_timestamp,end_timestamp,length_days\r\n2024-01-10T00:00:00+00:00,2024-01-15T10:00:00+00:00,5\r\n'
        );
    });

    it('writes prompts separated by dashed lines', () => {
        const file = path.join(dir, 'prompts.txt');
        writePromptsFile(file, ['first;', 'second']);

        expect(fs.readFileSync(file, 'utf8')).toBe(`first;\n${PROMPT_SEPARATOR}\nsecond\n${PROMPT_SEPARATOR}\n`);
        expect(PROMPT_SEPARATOR).toHaveLength(36);
    });
});

describe('getDefaultOutputPath', () => {
    it('places the payload beside the input', () => {
        expect(getDefaultOutputPath('/data/export/conversations.json')).toBe(path.join('/data/export', 'dashboard.json'));
    });
});
