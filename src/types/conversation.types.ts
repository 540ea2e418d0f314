/**
 * Raw Export Type Definitions
 *
 * The export is untrusted: every field may be missing or of the wrong type.
 * Field-level `.catch()` fallbacks turn bad values into neutral ones so a
 * single malformed field never rejects its whole record.
 */

import { z } from 'zod';

/**
 * Epoch seconds (number or numeric string) or an ISO string; validated later
 */
export const timestampInputSchema = z.union([z.number(), z.string()]).nullable().catch(null);

export const messageContentSchema = z.object({
    content_type: z.string().optional().catch(undefined),
    parts: z.array(z.unknown()).catch([]),
}).nullable().catch(null);

export const rawMessageSchema = z.object({
    author: z.object({
        role: z.string(),
        name: z.string().nullish().catch(undefined),
    }),
    create_time: timestampInputSchema,
    content: messageContentSchema,
});

/**
 * One entry of a conversation's `mapping`. A message that lacks an author
 * role collapses to null, like the export's own placeholder nodes.
 */
export const mappingNodeSchema = z.object({
    id: z.string().optional().catch(undefined),
    parent: z.string().nullable().catch(null),
    children: z.array(z.unknown())
        .catch([])
        .transform(children => children.filter((child): child is string => typeof child === 'string')),
    message: rawMessageSchema.nullable().catch(null),
});

export const conversationSchema = z.object({
    id: z.string().optional().catch(undefined),
    conversation_id: z.string().optional().catch(undefined),
    title: z.string().nullable().catch(null),
    create_time: timestampInputSchema,
    update_time: timestampInputSchema,
    current_node: z.string().nullable().catch(null),
    mapping: z.record(z.unknown()).catch({}),
});

export type RawMessage = z.infer<typeof rawMessageSchema>;
export type MappingNode = z.infer<typeof mappingNodeSchema>;
export type ConversationRecord = z.infer<typeof conversationSchema>;
