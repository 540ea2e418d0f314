/**
 * @fileoverview Single-entry cache with TTL for the dashboard payload.
 *
 * Rebuilding means re-reading and re-analysing the whole export, so the
 * payload is kept until it goes stale and concurrent callers share one build.
 */

import type { DashboardPayload, PayloadOptions } from '../types';
import { DEFAULT_CACHE_TTL_MS, DEFAULT_INPUT_PATH } from '../utils/constants';
import { buildPayloadFromFile } from './payload.assembler';

export type PayloadBuilder = () => DashboardPayload | Promise<DashboardPayload>;

export type PayloadCacheOptions = {
    /** Time-to-live in milliseconds (default: one hour) */
    ttlMs?: number;
    /** Millisecond clock, injectable for tests */
    clock?: () => number;
};

/**
 * Internal cache entry structure
 */
type CacheEntry = {
    payload: DashboardPayload;
    builtAt: number;
};

type InFlightBuild = {
    promise: Promise<DashboardPayload>;
    generation: number;
};

/**
 * Holds the last built payload.
 *
 * @example
 * ```typescript
 * const cache = new PayloadCache(() => buildPayloadFromFile('conversations.json'));
 *
 * const payload = await cache.get();                      // builds
 * const same = await cache.get();                         // served from cache
 * const fresh = await cache.get({ forceRefresh: true });  // rebuilds
 * ```
 */
export class PayloadCache {
    private entry: CacheEntry | null = null;

    /** Shared by every caller of the same generation while a rebuild runs */
    private inFlight: InFlightBuild | null = null;

    /** Bumped by invalidate(); builds started earlier are not stored */
    private generation = 0;

    private readonly ttlMs: number;
    private readonly clock: () => number;

    constructor(private readonly builder: PayloadBuilder, options: PayloadCacheOptions = {}) {
        this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
        this.clock = options.clock ?? Date.now;
    }

    /**
     * Returns the cached payload while it is younger than the TTL, otherwise
     * rebuilds. A failed rebuild rejects every waiting caller and leaves the
     * previous payload in place.
     */
    get(options: { forceRefresh?: boolean } = {}): Promise<DashboardPayload> {
        const entry = this.entry;
        if (!options.forceRefresh && entry && this.clock() - entry.builtAt < this.ttlMs) {
            return Promise.resolve(entry.payload);
        }
        return this.rebuild();
    }

    /**
     * Drops the cached payload; the next get() starts a fresh build even
     * while an older one is still running
     */
    invalidate(): void {
        this.entry = null;
        this.generation += 1;
    }

    /**
     * When the cached payload was built, or null when nothing is cached
     */
    get builtAt(): number | null {
        return this.entry?.builtAt ?? null;
    }

    private rebuild(): Promise<DashboardPayload> {
        const generation = this.generation;
        if (this.inFlight && this.inFlight.generation === generation) {
            return this.inFlight.promise;
        }

        const pending: Promise<DashboardPayload> = Promise.resolve()
            .then(() => this.builder())
            .then(payload => {
                if (generation === this.generation) {
                    this.entry = { payload, builtAt: this.clock() };
                }
                return payload;
            })
            .finally(() => {
                if (this.inFlight?.promise === pending) {
                    this.inFlight = null;
                }
            });

        this.inFlight = { promise: pending, generation };
        return pending;
    }
}

/**
 * Cache over an export file on disk
 */
export function createFilePayloadCache(
    filePath: string = DEFAULT_INPUT_PATH,
    payloadOptions: PayloadOptions = {},
    cacheOptions: PayloadCacheOptions = {}
): PayloadCache {
    return new PayloadCache(() => buildPayloadFromFile(filePath, payloadOptions), cacheOptions);
}
