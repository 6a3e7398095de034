import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { CacheEntry } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Returned by `get`/`lookup` when nothing is known about an id.
 */
export const MISS = Object.freeze({ miss: true as const });
export type Miss = typeof MISS;

export function isMiss(value: CacheEntry | Miss): value is Miss {
    return value === MISS;
}

/**
 * Source of supplementary place facts.
 */
export interface GazetteerClient {
    readonly name: string;
    fetchPlace(externalId: string): Promise<CacheEntry>;
}

export const cacheEntrySchema = z.object({
    name: z.string(),
    country: z.string(),
    localName: z.string().optional(),
    wikidataId: z.string().optional(),
}) satisfies z.ZodType<CacheEntry>;

const cacheFileSchema = z.record(z.string(), cacheEntrySchema);

export interface GeoCacheOptions {
    /** Fetch missing ids and rewrite the file on flush */
    fetch: boolean;
    client?: GazetteerClient;
}

export interface GeoCacheStats {
    path: string;
    entries: number;
    fetched: number;
    failed: number;
    dirty: boolean;
}

/**
 * Place facts keyed by gazetteer id, backed by one JSON file read in full
 * at startup and rewritten in full on flush.
 *
 * With fetching enabled, each missing id is requested from the gazetteer
 * at most once per run; a failed request is logged and the id stays a miss.
 */
export class GeoCache {
    private readonly entries = new Map<string, CacheEntry>();
    private readonly attempted = new Set<string>();
    private dirty = false;
    private fetched = 0;
    private failed = 0;

    constructor(
        private readonly path: string,
        private readonly options: GeoCacheOptions = { fetch: false }
    ) {
        if (options.fetch && !options.client) {
            throw new Error('GeoCache: fetching enabled without a gazetteer client');
        }
    }

    /**
     * Create a cache and read its file. A missing file is an empty cache;
     * an unparsable one is logged and treated as empty.
     */
    static load(path: string, options?: GeoCacheOptions): GeoCache {
        const cache = new GeoCache(path, options);
        cache.read();
        return cache;
    }

    get(externalId: string): CacheEntry | Miss {
        return this.entries.get(externalId) ?? MISS;
    }

    put(externalId: string, entry: CacheEntry): void {
        this.entries.set(externalId, entry);
        this.dirty = true;
    }

    has(externalId: string): boolean {
        return this.entries.has(externalId);
    }

    get size(): number {
        return this.entries.size;
    }

    /**
     * Read-through lookup. Never touches the network with fetching disabled.
     */
    async lookup(externalId: string): Promise<CacheEntry | Miss> {
        const cached = this.get(externalId);
        if (!isMiss(cached) || !this.options.fetch || !this.options.client) {
            return cached;
        }
        if (this.attempted.has(externalId)) {
            return MISS;
        }

        this.attempted.add(externalId);
        const client = this.options.client;
        try {
            const entry = await client.fetchPlace(externalId);
            this.put(externalId, entry);
            this.fetched++;
            getLogger().debug({ externalId, name: entry.name, source: client.name }, 'Place fetched');
            return entry;
        } catch (error) {
            this.failed++;
            getLogger().warn(
                { externalId, source: client.name, error: error instanceof Error ? error.message : String(error) },
                'Gazetteer lookup failed, treating as miss'
            );
            return MISS;
        }
    }

    /**
     * Rewrite the cache file if fetching is enabled and something was put.
     * @returns whether the file was written
     */
    flush(): boolean {
        if (!this.options.fetch || !this.dirty) {
            return false;
        }

        const sorted = [...this.entries.entries()].sort(([a], [b]) => a.localeCompare(b, 'en', { numeric: true }));
        mkdirSync(dirname(this.path), { recursive: true });
        writeFileSync(this.path, JSON.stringify(Object.fromEntries(sorted), null, 2) + '\n', 'utf-8');
        this.dirty = false;

        getLogger().info({ path: this.path, entries: this.entries.size }, 'Gazetteer cache written');
        return true;
    }

    /**
     * Forget every entry and delete the cache file.
     */
    clear(): void {
        this.entries.clear();
        this.attempted.clear();
        this.dirty = false;
        rmSync(this.path, { force: true });
    }

    getStats(): GeoCacheStats {
        return {
            path: this.path,
            entries: this.entries.size,
            fetched: this.fetched,
            failed: this.failed,
            dirty: this.dirty,
        };
    }

    private read(): void {
        if (!existsSync(this.path)) {
            getLogger().debug({ path: this.path }, 'No gazetteer cache file, starting empty');
            return;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(readFileSync(this.path, 'utf-8'));
        } catch (error) {
            getLogger().warn(
                { path: this.path, error: error instanceof Error ? error.message : String(error) },
                'Gazetteer cache unreadable, starting empty'
            );
            return;
        }

        const parsed = cacheFileSchema.safeParse(raw);
        if (!parsed.success) {
            getLogger().warn(
                { path: this.path, issues: parsed.error.issues.length },
                'Gazetteer cache malformed, starting empty'
            );
            return;
        }

        for (const [externalId, entry] of Object.entries(parsed.data)) {
            this.entries.set(externalId, entry);
        }
        getLogger().debug({ path: this.path, entries: this.entries.size }, 'Gazetteer cache loaded');
    }
}
