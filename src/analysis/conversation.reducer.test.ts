import { describe, expect, it } from 'vitest';
import { conversation, epoch } from '../test-utils/fixtures';
import { processConversations } from './conversation.reducer';

const at = (iso: string): number => epoch(iso);

describe('processConversations', () => {
    it('summarises a conversation', () => {
        const result = processConversations([
            conversation([
                { role: 'user', text: 'hello there', time: at('2024-01-15T10:00:00Z') },
                { role: 'assistant', text: 'hi, how can I help', time: at('2024-01-15T10:01:00Z') },
            ], { id: 'abc', title: '  Greeting  ', createTime: at('2024-01-15T09:59:00Z') }),
        ]);

        expect(result.skipped).toBe(0);
        expect(result.summaries).toEqual([{
            id: 'abc',
            title: 'Greeting',
            date: '2024-01-15',
            created_at: '2024-01-15T09:59:00+00:00',
            updated_at: null,
            start_time: '2024-01-15T10:00:00+00:00',
            end_time: '2024-01-15T10:01:00+00:00',
            duration_minutes: 1,
            message_count: 2,
            user_messages: 1,
            assistant_messages: 1,
            user_words: 2,
            assistant_words: 5,
            response_ratio: 2.5,
            code_languages: [],
            first_user_message: 'hello there',
        }]);
        expect(result.dailyRecords).toHaveLength(1);
        expect(result.dailyRecords[0]).toMatchObject({ date: '2024-01-15', total_chats: 1, total_messages: 2 });
    });

    it('skips conversations without user or assistant messages', () => {
        const result = processConversations([
            conversation([{ role: 'system', text: 'setup', time: at('2024-01-15T10:00:00Z') }]),
            conversation([]),
        ]);

        expect(result.skipped).toBe(2);
        expect(result.summaries).toEqual([]);
        expect(result.dailyRecords).toEqual([]);
    });

    it('falls back to the creation time for the bucket date', () => {
        const [summary] = processConversations([
            conversation([{ role: 'user', text: 'undated' }], { createTime: at('2024-03-01T12:00:00Z') }),
        ]).summaries;

        expect(summary.date).toBe('2024-03-01');
        expect(summary.start_time).toBeNull();
        expect(summary.duration_minutes).toBe(0);
    });

    it('keeps undatable conversations out of the daily records', () => {
        const result = processConversations([conversation([{ role: 'user', text: 'no time at all' }])]);

        expect(result.summaries).toHaveLength(1);
        expect(result.summaries[0].date).toBeNull();
        expect(result.dailyRecords).toEqual([]);
    });

    it('merges conversations of the same day', () => {
        const day = '2024-01-15T';
        const result = processConversations([
            conversation([
                { role: 'user', text: 'a', time: at(`${day}08:00:00Z`) },
                { role: 'assistant', text: 'b', time: at(`${day}08:01:00Z`) },
            ]),
            conversation([
                { role: 'user', text: 'c', time: at(`${day}20:00:00Z`) },
                { role: 'assistant', text: 'd', time: at(`${day}20:01:00Z`) },
                { role: 'user', text: 'e', time: at(`${day}20:02:00Z`) },
                { role: 'assistant', text: 'f', time: at(`${day}20:03:00Z`) },
            ]),
            conversation([{ role: 'user', text: 'g', time: at('2024-01-10T08:00:00Z') }]),
        ]);

        expect(result.dailyRecords.map(r => r.date)).toEqual(['2024-01-10', '2024-01-15']);
        expect(result.dailyRecords[1]).toMatchObject({
            total_chats: 2,
            total_messages: 6,
            avg_messages_per_chat: 3,
            max_messages_in_chat: 4,
            user_msgs: 3,
            assistant_msgs: 3,
        });
        expect(result.timestamps).toHaveLength(7);
    });

    it('applies the UTC offset to dates and timestamps', () => {
        const [summary] = processConversations(
            [conversation([{ role: 'user', text: 'late', time: at('2024-01-15T23:30:00Z') }])],
            { utcOffsetMinutes: 60 }
        ).summaries;

        expect(summary.date).toBe('2024-01-16');
        expect(summary.start_time).toBe('2024-01-16T00:30:00+01:00');
    });

    it('truncates the first user message preview', () => {
        const [summary] = processConversations(
            [conversation([{ role: 'user', text: '   ' }, { role: 'user', text: 'hello world' }])],
            { previewLength: 5 }
        ).summaries;

        expect(summary.first_user_message).toBe('hello...');
    });

    it('leaves tool messages out of counts and time range', () => {
        const result = processConversations([
            conversation([
                { role: 'user', text: 'look it up', time: at('2024-01-15T10:00:00Z') },
                { role: 'assistant', text: 'found it', time: at('2024-01-15T10:01:00Z') },
                { role: 'tool', text: 'raw output', time: at('2024-01-15T10:30:00Z') },
            ]),
        ]);

        expect(result.summaries[0]).toMatchObject({ message_count: 2, end_time: '2024-01-15T10:01:00+00:00' });
        expect(result.timestamps).toHaveLength(3);
    });

    it('derives ids and titles when the export lacks them', () => {
        const untitled = conversation([{ role: 'user', text: 'x' }], { title: '   ' });
        const result = processConversations([
            untitled,
            { ...untitled, conversation_id: 'conv-2' },
        ]);

        expect(result.summaries.map(s => [s.id, s.title])).toEqual([
            ['conversation-1', 'Untitled Conversation'],
            ['conv-2', 'Untitled Conversation'],
        ]);
    });

    it('collects code languages across the thread', () => {
        const [summary] = processConversations([
            conversation([
                { role: 'user', text: '```python\nprint(1)\n```' },
                { role: 'assistant', text: '```bash\nls\n```\n```python\nx\n```' },
            ]),
        ]).summaries;

        expect(summary.code_languages).toEqual(['python', 'bash']);
    });
});
