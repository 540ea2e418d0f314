import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import type { DashboardPayload } from '../types';
import { conversation, epoch } from '../test-utils/fixtures';
import { buildPayload } from './payload.assembler';
import type { PayloadBuilder } from './payload.cache';
import { createFilePayloadCache, PayloadCache } from './payload.cache';

const first = buildPayload([], { now: new Date('2024-01-01T00:00:00Z') });
const second = buildPayload([], { now: new Date('2024-01-02T00:00:00Z') });

function manualClock(start: number = 0): { clock: () => number; advance: (ms: number) => void } {
    let now = start;
    return { clock: () => now, advance: ms => { now += ms; } };
}

function gate(): { promise: Promise<DashboardPayload>; release: (payload: DashboardPayload) => void } {
    let release: (payload: DashboardPayload) => void = () => undefined;
    const promise = new Promise<DashboardPayload>(resolve => { release = resolve; });
    return { promise, release };
}

describe('PayloadCache', () => {
    it('serves the cached payload until the TTL expires', async () => {
        const { clock, advance } = manualClock(1_000);
        const builder = vi.fn<PayloadBuilder>().mockReturnValueOnce(first).mockReturnValueOnce(second);
        const cache = new PayloadCache(builder, { ttlMs: 1_000, clock });

        expect(cache.builtAt).toBeNull();
        expect(await cache.get()).toBe(first);
        expect(cache.builtAt).toBe(1_000);

        advance(999);
        expect(await cache.get()).toBe(first);
        expect(builder).toHaveBeenCalledTimes(1);

        advance(1);
        expect(await cache.get()).toBe(second);
        expect(builder).toHaveBeenCalledTimes(2);
        expect(cache.builtAt).toBe(2_000);
    });

    it('rebuilds on a forced refresh', async () => {
        const builder = vi.fn<PayloadBuilder>().mockReturnValueOnce(first).mockReturnValueOnce(second);
        const cache = new PayloadCache(builder, { clock: manualClock().clock });

        await cache.get();
        expect(await cache.get({ forceRefresh: true })).toBe(second);
        expect(builder).toHaveBeenCalledTimes(2);
    });

    it('shares one build between concurrent callers', async () => {
        const pending = gate();
        const builder = vi.fn<PayloadBuilder>(() => pending.promise);
        const cache = new PayloadCache(builder);

        const a = cache.get();
        const b = cache.get({ forceRefresh: true });
        pending.release(first);

        expect(await Promise.all([a, b])).toEqual([first, first]);
        expect(builder).toHaveBeenCalledTimes(1);
    });

    it('keeps the previous payload when a rebuild fails', async () => {
        const builder = vi.fn<PayloadBuilder>()
            .mockReturnValueOnce(first)
            .mockImplementationOnce(() => {
                throw new Error('export unreadable');
            });
        const cache = new PayloadCache(builder, { clock: manualClock().clock });

        await cache.get();
        await expect(cache.get({ forceRefresh: true })).rejects.toThrow('export unreadable');
        expect(await cache.get()).toBe(first);
        expect(builder).toHaveBeenCalledTimes(2);
    });

    it('rebuilds after invalidation', async () => {
        const builder = vi.fn<PayloadBuilder>().mockReturnValueOnce(first).mockReturnValueOnce(second);
        const cache = new PayloadCache(builder, { clock: manualClock().clock });

        await cache.get();
        cache.invalidate();

        expect(cache.builtAt).toBeNull();
        expect(await cache.get()).toBe(second);
    });

    it('does not store a build that started before invalidation', async () => {
        const pending = gate();
        const builder = vi.fn<PayloadBuilder>()
            .mockImplementationOnce(() => pending.promise)
            .mockReturnValueOnce(second);
        const cache = new PayloadCache(builder, { clock: manualClock().clock });

        const stale = cache.get();
        cache.invalidate();
        pending.release(first);

        expect(await stale).toBe(first);
        expect(cache.builtAt).toBeNull();
        expect(await cache.get()).toBe(second);
    });

    it('starts a new build for callers after invalidation', async () => {
        const pending = gate();
        const builder = vi.fn<PayloadBuilder>()
            .mockImplementationOnce(() => pending.promise)
            .mockReturnValueOnce(second);
        const cache = new PayloadCache(builder, { clock: manualClock().clock });

        const stale = cache.get();
        cache.invalidate();
        const fresh = cache.get();
        pending.release(first);

        expect(await stale).toBe(first);
        expect(await fresh).toBe(second);
        expect(builder).toHaveBeenCalledTimes(2);
        expect(await cache.get()).toBe(second);
    });
});

describe('createFilePayloadCache', () => {
    it('rebuilds from the export file when refreshed', async () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chat-stats-cache-'));
        const file = path.join(dir, 'conversations.json');
        const chat = conversation([{ role: 'user', text: 'hi', time: epoch('2024-01-15T10:00:00Z') }]);

        try {
            fs.writeFileSync(file, JSON.stringify([chat]), 'utf8');
            const cache = createFilePayloadCache(file, { now: new Date('2024-02-01T00:00:00Z') });
            expect((await cache.get()).summary.total_chats).toBe(1);

            fs.writeFileSync(file, JSON.stringify([chat, chat]), 'utf8');
            expect((await cache.get()).summary.total_chats).toBe(1);
            expect((await cache.get({ forceRefresh: true })).summary.total_chats).toBe(2);
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });
});
