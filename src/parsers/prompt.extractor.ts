import { z } from 'zod';
import type { ConversationRecord } from '../types';
import { mappingNodeSchema } from '../types';
import { parseTimestamp } from '../utils/date.utils';
import { extractText } from '../utils/text.utils';

// ============================================================================
// PROMPT EXTRACTION
// ============================================================================

/**
 * A user message whose content is made of text parts only
 */
const userPromptSchema = z.object({
    author: z.object({ role: z.literal('user') }),
    content: z.object({ parts: z.array(z.string()).min(1) }),
});

const recordSchema = z.record(z.unknown());

export type PromptExtractionOptions = {
    firstOnly?: boolean;    // keep only prompts containing ";", cut after it
};

/**
 * Cuts a prompt just after its first semicolon, or returns null when
 * there is none
 */
function cutAtSemicolon(prompt: string): string | null {
    const index = prompt.indexOf(';');
    return index === -1 ? null : prompt.slice(0, index + 1);
}

/**
 * Collects user prompts from anywhere in a parsed export, in document order.
 * Works on any JSON shape, so partial or nested exports are searched too.
 */
export function extractUserPrompts(data: unknown, options: PromptExtractionOptions = {}): string[] {
    const prompts: string[] = [];

    const visit = (value: unknown): void => {
        if (Array.isArray(value)) {
            value.forEach(visit);
            return;
        }

        const record = recordSchema.safeParse(value);
        if (!record.success) return;

        const prompt = userPromptSchema.safeParse(value);
        if (prompt.success) {
            const text = prompt.data.content.parts.join(' ');
            const cut = cutAtSemicolon(text);
            if (options.firstOnly) {
                if (cut !== null) prompts.push(cut);
            } else {
                prompts.push(cut ?? text);
            }
        }

        Object.values(record.data).forEach(visit);
    };

    visit(data);
    return prompts;
}

// ============================================================================
// EARLIEST CONVERSATION
// ============================================================================

export type TranscriptLine = {
    timestamp: Date | null;
    role: string;
    text: string;
};

export type EarliestConversation = {
    conversation: ConversationRecord;
    timestamp: Date;
};

/**
 * Every message in a conversation's mapping (all branches, system messages
 * included), oldest first. Lines without a timestamp sort before the rest.
 */
export function conversationTranscript(conversation: ConversationRecord): TranscriptLine[] {
    const lines: TranscriptLine[] = [];

    for (const value of Object.values(conversation.mapping)) {
        const node = mappingNodeSchema.safeParse(value);
        const message = node.success ? node.data.message : null;
        if (!message) continue;

        lines.push({
            timestamp: parseTimestamp(message.create_time),
            role: message.author.role,
            text: extractText(message.content?.parts ?? []),
        });
    }

    // Array.prototype.sort is stable, so equal timestamps keep mapping order
    return lines.sort((a, b) => (a.timestamp?.getTime() ?? 0) - (b.timestamp?.getTime() ?? 0));
}

/**
 * The conversation holding the oldest message timestamp in the archive.
 * The first conversation wins a tie.
 */
export function findEarliestConversation(conversations: readonly ConversationRecord[]): EarliestConversation | null {
    let earliest: EarliestConversation | null = null;

    for (const conversation of conversations) {
        for (const line of conversationTranscript(conversation)) {
            if (line.timestamp && (!earliest || line.timestamp.getTime() < earliest.timestamp.getTime())) {
                earliest = { conversation, timestamp: line.timestamp };
            }
        }
    }

    return earliest;
}
