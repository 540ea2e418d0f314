/**
 * Conversation Reduction
 *
 * Turns raw conversations into one summary each plus per-day activity
 * records. This is the only stage that looks at individual messages.
 */

import type {
    ActivityCounts,
    ConversationRecord,
    ConversationSummary,
    DailyRecord,
    FlatMessage,
    ProcessedConversations,
    ProcessOptions,
} from '../types';
import { flattenConversation } from '../parsers/message.flattener';
import { FIRST_MESSAGE_PREVIEW_LENGTH, MS_PER_MINUTE, UNTITLED_CONVERSATION } from '../utils/constants';
import { formatTimestamp, parseTimestamp, toDayKey } from '../utils/date.utils';
import { round, safeRatio, sum } from '../utils/number.utils';
import { truncatePreview } from '../utils/text.utils';

// ============================================================================
// COUNTS
// ============================================================================

export function emptyActivityCounts(): ActivityCounts {
    return {
        total_chats: 0,
        total_messages: 0,
        avg_messages_per_chat: 0,
        max_messages_in_chat: 0,
        user_words: 0,
        user_chars: 0,
        user_msgs: 0,
        user_code_msgs: 0,
        assistant_words: 0,
        assistant_chars: 0,
        assistant_msgs: 0,
        assistant_code_msgs: 0,
    };
}

/**
 * Adds `source` into `target`. The average is recomputed from the summed
 * totals rather than accumulated.
 */
export function mergeActivityCounts(target: ActivityCounts, source: ActivityCounts): void {
    target.total_chats += source.total_chats;
    target.total_messages += source.total_messages;
    target.max_messages_in_chat = Math.max(target.max_messages_in_chat, source.max_messages_in_chat);
    target.user_words += source.user_words;
    target.user_chars += source.user_chars;
    target.user_msgs += source.user_msgs;
    target.user_code_msgs += source.user_code_msgs;
    target.assistant_words += source.assistant_words;
    target.assistant_chars += source.assistant_chars;
    target.assistant_msgs += source.assistant_msgs;
    target.assistant_code_msgs += source.assistant_code_msgs;
    target.avg_messages_per_chat = safeRatio(target.total_messages, target.total_chats);
}

/**
 * Counts for a single conversation: one chat holding all of its messages
 */
function conversationCounts(userMessages: FlatMessage[], assistantMessages: FlatMessage[]): ActivityCounts {
    const messageCount = userMessages.length + assistantMessages.length;
    return {
        total_chats: 1,
        total_messages: messageCount,
        avg_messages_per_chat: messageCount,
        max_messages_in_chat: messageCount,
        user_words: sum(userMessages.map(m => m.wordCount)),
        user_chars: sum(userMessages.map(m => m.charCount)),
        user_msgs: userMessages.length,
        user_code_msgs: userMessages.filter(m => m.hasCode).length,
        assistant_words: sum(assistantMessages.map(m => m.wordCount)),
        assistant_chars: sum(assistantMessages.map(m => m.charCount)),
        assistant_msgs: assistantMessages.length,
        assistant_code_msgs: assistantMessages.filter(m => m.hasCode).length,
    };
}

// ============================================================================
// SUMMARIES
// ============================================================================

type ReducedConversation = {
    summary: ConversationSummary;
    counts: ActivityCounts;
};

function conversationId(conversation: ConversationRecord, index: number): string {
    return conversation.id ?? conversation.conversation_id ?? `conversation-${index + 1}`;
}

/**
 * Reduces one conversation, or returns null when its active thread holds no
 * user or assistant message
 */
function reduceConversation(
    conversation: ConversationRecord,
    messages: FlatMessage[],
    index: number,
    options: ProcessOptions
): ReducedConversation | null {
    const offset = options.utcOffsetMinutes ?? 0;
    const userMessages = messages.filter(m => m.role === 'user');
    const assistantMessages = messages.filter(m => m.role === 'assistant');

    if (userMessages.length === 0 && assistantMessages.length === 0) {
        return null;
    }

    let start: Date | null = null;
    let end: Date | null = null;
    const languages = new Set<string>();
    for (const message of messages) {
        if (message.role === 'tool') continue;
        const time = message.timestamp;
        if (time) {
            if (!start || time.getTime() < start.getTime()) start = time;
            if (!end || time.getTime() > end.getTime()) end = time;
        }
        message.codeLanguages.forEach(language => languages.add(language));
    }

    const created = parseTimestamp(conversation.create_time);
    const updated = parseTimestamp(conversation.update_time);
    const bucketDate = start ?? created;

    const counts = conversationCounts(userMessages, assistantMessages);
    const firstPrompt = userMessages.find(m => m.text.trim().length > 0);

    const summary: ConversationSummary = {
        id: conversationId(conversation, index),
        title: conversation.title?.trim() || UNTITLED_CONVERSATION,
        date: bucketDate ? toDayKey(bucketDate, offset) : null,
        created_at: created ? formatTimestamp(created, offset) : null,
        updated_at: updated ? formatTimestamp(updated, offset) : null,
        start_time: start ? formatTimestamp(start, offset) : null,
        end_time: end ? formatTimestamp(end, offset) : null,
        duration_minutes: start && end ? round((end.getTime() - start.getTime()) / MS_PER_MINUTE) : 0,
        message_count: counts.total_messages,
        user_messages: counts.user_msgs,
        assistant_messages: counts.assistant_msgs,
        user_words: counts.user_words,
        assistant_words: counts.assistant_words,
        response_ratio: safeRatio(counts.assistant_words, counts.user_words),
        code_languages: Array.from(languages),
        first_user_message: firstPrompt
            ? truncatePreview(firstPrompt.text, options.previewLength ?? FIRST_MESSAGE_PREVIEW_LENGTH)
            : null,
    };

    return { summary, counts };
}

// ============================================================================
// PROCESSING
// ============================================================================

/**
 * Flattens and reduces every conversation, grouping them into daily records
 * by the day of their first message
 */
export function processConversations(
    conversations: readonly ConversationRecord[],
    options: ProcessOptions = {}
): ProcessedConversations {
    const summaries: ConversationSummary[] = [];
    const timestamps: Date[] = [];
    const daily = new Map<string, DailyRecord>();
    let skipped = 0;

    conversations.forEach((conversation, index) => {
        const messages = flattenConversation(conversation, { branchPolicy: options.branchPolicy });

        for (const message of messages) {
            if (message.timestamp) timestamps.push(message.timestamp);
        }

        const reduced = reduceConversation(conversation, messages, index, options);
        if (!reduced) {
            skipped += 1;
            return;
        }

        summaries.push(reduced.summary);

        const date = reduced.summary.date;
        if (date === null) return;

        let record = daily.get(date);
        if (!record) {
            record = { date, ...emptyActivityCounts() };
            daily.set(date, record);
        }
        mergeActivityCounts(record, reduced.counts);
    });

    const dailyRecords = Array.from(daily.values()).sort((a, b) => a.date.localeCompare(b.date));

    return { summaries, dailyRecords, timestamps, skipped };
}
