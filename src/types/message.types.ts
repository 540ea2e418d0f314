/**
 * Message Type Definitions
 */

import type { MappingNode } from './conversation.types';

/**
 * Roles that survive flattening. System messages are dropped entirely.
 */
export type MessageRole = 'user' | 'assistant' | 'tool';

/**
 * A single message on a conversation's active thread, with content metrics
 */
export type FlatMessage = {
    role: MessageRole;
    timestamp: Date | null;     // null when missing or unparseable
    text: string;
    wordCount: number;
    charCount: number;
    hasCode: boolean;
    codeLanguages: string[];
};

/**
 * A child candidate at a branching point of the node graph
 */
export type BranchCandidate = {
    id: string;
    node: MappingNode;
};

/**
 * Picks which child the active thread continues into. Receives at least one
 * candidate; returns the chosen id, or undefined to end the thread.
 */
export type BranchPolicy = (candidates: readonly BranchCandidate[]) => string | undefined;

export type FlattenOptions = {
    branchPolicy?: BranchPolicy;
};
