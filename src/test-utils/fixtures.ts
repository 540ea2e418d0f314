/**
 * Synthetic export builders shared by the test suites
 */

import type { ConversationRecord, ConversationSummary, DailyRecord } from '../types';
import { emptyActivityCounts } from '../analysis/conversation.reducer';

/**
 * Epoch seconds for an ISO string, as the export stores them
 */
export function epoch(iso: string): number {
    return Date.parse(iso) / 1000;
}

export type MessageSpec = {
    role: string;
    text?: string;
    parts?: unknown[];
    time?: number | string | null;
};

export type ConversationSpec = {
    id?: string;
    title?: string | null;
    createTime?: number | string | null;
    updateTime?: number | string | null;
};

/**
 * Raw mapping node, shaped like the export
 */
export function node(
    id: string,
    parent: string | null,
    children: string[],
    message: MessageSpec | null
): Record<string, unknown> {
    return {
        id,
        parent,
        children,
        message: message && {
            author: { role: message.role },
            create_time: message.time ?? null,
            content: { content_type: 'text', parts: message.parts ?? [message.text ?? ''] },
        },
    };
}

/**
 * Linear conversation: an empty root node followed by one node per message,
 * with current_node on the last one
 */
export function conversation(messages: MessageSpec[], spec: ConversationSpec = {}): ConversationRecord {
    const mapping: Record<string, unknown> = {};
    const ids = messages.map((_, i) => `m${i + 1}`);

    mapping.root = node('root', null, ids.slice(0, 1), null);
    messages.forEach((message, i) => {
        mapping[ids[i]] = node(ids[i], i === 0 ? 'root' : ids[i - 1], ids.slice(i + 1, i + 2), message);
    });

    return {
        id: spec.id,
        title: spec.title ?? 'Test conversation',
        create_time: spec.createTime ?? null,
        update_time: spec.updateTime ?? null,
        current_node: ids.length > 0 ? ids[ids.length - 1] : null,
        mapping,
    };
}

export function dailyRecord(date: string, counts: Partial<Omit<DailyRecord, 'date'>> = {}): DailyRecord {
    return { date, ...emptyActivityCounts(), ...counts };
}

export function summary(fields: Partial<ConversationSummary> = {}): ConversationSummary {
    return {
        id: 'c1',
        title: 'Test conversation',
        date: '2024-01-15',
        created_at: null,
        updated_at: null,
        start_time: null,
        end_time: null,
        duration_minutes: 0,
        message_count: 2,
        user_messages: 1,
        assistant_messages: 1,
        user_words: 0,
        assistant_words: 0,
        response_ratio: 0,
        code_languages: [],
        first_user_message: null,
        ...fields,
    };
}
