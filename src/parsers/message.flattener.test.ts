import { describe, expect, it } from 'vitest';
import type { BranchCandidate, ConversationRecord } from '../types';
import { conversation, epoch, node } from '../test-utils/fixtures';
import { activeThread, flattenConversation, selectActiveChild } from './message.flattener';

function record(mapping: Record<string, unknown>, currentNode: string | null = null): ConversationRecord {
    return { title: 'Test', create_time: null, update_time: null, current_node: currentNode, mapping };
}

function candidate(id: string, time: number | null): BranchCandidate {
    return {
        id,
        node: {
            parent: 'p',
            children: [],
            message: { author: { role: 'assistant' }, create_time: time, content: null },
        },
    };
}

describe('selectActiveChild', () => {
    it('prefers the most recent child', () => {
        expect(selectActiveChild([candidate('new', 200), candidate('old', 100)])).toBe('new');
    });

    it('ranks children without a timestamp below timestamped ones', () => {
        expect(selectActiveChild([candidate('dated', 5), candidate('undated', null)])).toBe('dated');
    });

    it('breaks ties in favour of the child listed last', () => {
        expect(selectActiveChild([candidate('a', 5), candidate('b', 5)])).toBe('b');
        expect(selectActiveChild([candidate('a', null), candidate('b', null)])).toBe('b');
    });
});

describe('flattenConversation', () => {
    it('follows the current node and drops system messages', () => {
        const messages = flattenConversation(record({
            root: node('root', null, ['sys'], null),
            sys: node('sys', 'root', ['u1'], { role: 'system', text: 'You are helpful', time: 1 }),
            u1: node('u1', 'sys', ['a1', 'a2'], { role: 'user', text: 'Hi', time: 2 }),
            a1: node('a1', 'u1', [], { role: 'assistant', text: 'First answer', time: 3 }),
            a2: node('a2', 'u1', [], { role: 'assistant', text: 'Regenerated answer', time: 4 }),
        }, 'a1'));

        expect(messages.map(m => [m.role, m.text])).toEqual([
            ['user', 'Hi'],
            ['assistant', 'First answer'],
        ]);
    });

    it('uses the branch policy when no current node is marked', () => {
        const mapping = {
            root: node('root', null, ['u1'], null),
            u1: node('u1', 'root', ['a2', 'a1'], { role: 'user', text: 'Hi', time: 100 }),
            a1: node('a1', 'u1', [], { role: 'assistant', text: 'newest', time: 300 }),
            a2: node('a2', 'u1', [], { role: 'assistant', text: 'older', time: 200 }),
        };

        expect(flattenConversation(record(mapping)).map(m => m.text)).toEqual(['Hi', 'newest']);

        const firstListed = (candidates: readonly BranchCandidate[]): string | undefined => candidates[0]?.id;
        expect(flattenConversation(record(mapping), { branchPolicy: firstListed }).map(m => m.text))
            .toEqual(['Hi', 'older']);
    });

    it('falls back to the root walk when the current node is unknown', () => {
        const messages = flattenConversation(record({
            root: node('root', null, ['u1'], null),
            u1: node('u1', 'root', [], { role: 'user', text: 'Hi', time: 1 }),
        }, 'ghost'));

        expect(messages.map(m => m.text)).toEqual(['Hi']);
    });

    it('connects nodes linked only through their parent', () => {
        const messages = flattenConversation(record({
            root: node('root', null, [], null),
            u1: node('u1', 'root', [], { role: 'user', text: 'orphan link', time: 1 }),
        }));

        expect(messages.map(m => m.text)).toEqual(['orphan link']);
    });

    it('treats a node with a dangling parent as a root', () => {
        const messages = flattenConversation(record({
            u1: node('u1', 'ghost', ['missing-child'], { role: 'user', text: 'still here', time: 1 }),
        }));

        expect(messages.map(m => m.text)).toEqual(['still here']);
    });

    it('terminates on parent cycles', () => {
        const mapping = {
            a: node('a', 'b', ['b'], { role: 'user', text: 'a', time: 1 }),
            b: node('b', 'a', ['a'], { role: 'assistant', text: 'b', time: 2 }),
        };

        expect(activeThread(record(mapping, 'a'))).toEqual(['b', 'a']);
        expect(flattenConversation(record(mapping))).toEqual([]);
    });

    it('keeps tool messages and skips unknown or malformed ones', () => {
        const messages = flattenConversation(record({
            root: node('root', null, ['u1'], null),
            u1: node('u1', 'root', ['t1'], { role: 'user', text: 'search', time: 1 }),
            t1: node('t1', 'u1', ['c1'], { role: 'tool', text: 'results', time: 2 }),
            c1: node('c1', 't1', ['bad'], { role: 'critic', text: 'hmm', time: 3 }),
            bad: { id: 'bad', parent: 'c1', children: ['a1'], message: { content: { parts: ['no author'] } } },
            a1: node('a1', 'bad', [], { role: 'assistant', text: 'done', time: 4 }),
        }));

        expect(messages.map(m => m.role)).toEqual(['user', 'tool', 'assistant']);
    });

    it('computes content metrics per message', () => {
        const [message] = flattenConversation(conversation([
            { role: 'assistant', text: 'Here:\n```js\nx\n```', time: epoch('2024-01-15T10:00:00Z') },
        ]));

        expect(message).toEqual({
            role: 'assistant',
            timestamp: new Date('2024-01-15T10:00:00Z'),
            text: 'Here:\n```js\nx\n```',
            wordCount: 4,
            charCount: 17,
            hasCode: true,
            codeLanguages: ['js'],
        });
    });

    it('tolerates non-text parts and bad timestamps', () => {
        const [message] = flattenConversation(conversation([
            { role: 'user', parts: [{ asset_pointer: 'file-1' }], time: 'not a time' },
        ]));

        expect(message.text).toBe('');
        expect(message.wordCount).toBe(0);
        expect(message.timestamp).toBeNull();
    });
});
