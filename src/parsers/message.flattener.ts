import type {
    BranchCandidate,
    BranchPolicy,
    ConversationRecord,
    FlatMessage,
    FlattenOptions,
    MappingNode,
    MessageRole,
} from '../types';
import { mappingNodeSchema } from '../types';
import { parseTimestamp } from '../utils/date.utils';
import {
    countCharacters,
    countWords,
    detectCodeLanguages,
    extractText,
    hasCodeFence,
} from '../utils/text.utils';

// ============================================================================
// MESSAGE FLATTENER
// ============================================================================

/**
 * Node graph of one conversation, addressed by id. Nothing here assumes the
 * graph is a tree: parent and child links may dangle or loop.
 */
type NodeIndex = {
    nodes: Map<string, MappingNode>;
    children: Map<string, string[]>;
};

/**
 * Default branch policy: follow the most recently created child. Children
 * without a valid timestamp rank below timestamped ones; ties go to the child
 * listed last (the latest regeneration in export order).
 */
export const selectActiveChild: BranchPolicy = (candidates) => {
    let chosen: BranchCandidate | undefined;
    let chosenTime = Number.NEGATIVE_INFINITY;

    for (const candidate of candidates) {
        const time = parseTimestamp(candidate.node.message?.create_time)?.getTime() ?? Number.NEGATIVE_INFINITY;
        if (!chosen || time >= chosenTime) {
            chosen = candidate;
            chosenTime = time;
        }
    }

    return chosen?.id;
};

/**
 * Builds the id lookup. Child lists come from each node's `children` plus any
 * node naming it as `parent`, so exports carrying only one side of the link
 * still connect.
 */
function indexNodes(mapping: Record<string, unknown>): NodeIndex {
    const nodes = new Map<string, MappingNode>();

    for (const [id, value] of Object.entries(mapping)) {
        const parsed = mappingNodeSchema.safeParse(value);
        if (parsed.success) {
            nodes.set(id, parsed.data);
        }
    }

    const children = new Map<string, string[]>();
    for (const [id, node] of nodes) {
        children.set(id, node.children.filter(childId => nodes.has(childId)));
    }
    for (const [id, node] of nodes) {
        if (node.parent === null) continue;
        const siblings = children.get(node.parent);
        if (siblings && !siblings.includes(id)) {
            siblings.push(id);
        }
    }

    return { nodes, children };
}

/**
 * Path from the root down to `leafId`, built by walking parent links up
 */
function walkUpFrom(leafId: string, index: NodeIndex): string[] {
    const path: string[] = [];
    const visited = new Set<string>();
    let currentId: string | null = leafId;

    while (currentId !== null && !visited.has(currentId)) {
        const node = index.nodes.get(currentId);
        if (!node) break;
        visited.add(currentId);
        path.push(currentId);
        currentId = node.parent;
    }

    return path.reverse();
}

/**
 * Depth-first walk from every root, continuing into one child per node as
 * chosen by the branch policy
 */
function walkDownFromRoots(index: NodeIndex, policy: BranchPolicy): string[] {
    const path: string[] = [];
    const visited = new Set<string>();

    for (const [rootId, root] of index.nodes) {
        const isRoot = root.parent === null || !index.nodes.has(root.parent);
        if (!isRoot) continue;

        let currentId: string | undefined = rootId;
        while (currentId !== undefined && !visited.has(currentId)) {
            visited.add(currentId);
            path.push(currentId);

            const candidates: BranchCandidate[] = [];
            for (const childId of index.children.get(currentId) ?? []) {
                const child = index.nodes.get(childId);
                if (child && !visited.has(childId)) {
                    candidates.push({ id: childId, node: child });
                }
            }
            currentId = candidates.length > 0 ? policy(candidates) : undefined;
        }
    }

    return path;
}

function threadIds(conversation: ConversationRecord, index: NodeIndex, options: FlattenOptions): string[] {
    const currentNode = conversation.current_node;
    if (currentNode !== null && index.nodes.has(currentNode)) {
        return walkUpFrom(currentNode, index);
    }
    return walkDownFromRoots(index, options.branchPolicy ?? selectActiveChild);
}

/**
 * Node ids on the active thread, root first. The node the export marks as
 * current wins; without one every root is walked down via the branch policy.
 */
export function activeThread(conversation: ConversationRecord, options: FlattenOptions = {}): string[] {
    return threadIds(conversation, indexNodes(conversation.mapping), options);
}

function toMessageRole(role: string): MessageRole | null {
    return role === 'user' || role === 'assistant' || role === 'tool' ? role : null;
}

/**
 * Flattens a conversation into the messages of its active thread.
 * System messages, placeholder nodes and unknown roles are left out.
 */
export function flattenConversation(conversation: ConversationRecord, options: FlattenOptions = {}): FlatMessage[] {
    const index = indexNodes(conversation.mapping);
    const messages: FlatMessage[] = [];

    for (const id of threadIds(conversation, index, options)) {
        const message = index.nodes.get(id)?.message;
        if (!message) continue;

        const role = toMessageRole(message.author.role);
        if (!role) continue;

        const text = extractText(message.content?.parts ?? []);
        messages.push({
            role,
            timestamp: parseTimestamp(message.create_time),
            text,
            wordCount: countWords(text),
            charCount: countCharacters(text),
            hasCode: hasCodeFence(text),
            codeLanguages: detectCodeLanguages(text),
        });
    }

    return messages;
}
