/**
 * Minimal in-memory LRU cache with TTL expiration.
 *
 * Uses Map insertion order for LRU eviction.
 */

interface CacheEntry<T> {
    value: T;
    expiresAt: number;
}

export interface LruCacheOptions {
    /** Entry time-to-live in milliseconds */
    ttl: number;
    /** @default 1000 */
    maxSize?: number | undefined;
    /** @default Date.now */
    clock?: (() => number) | undefined;
}

export class LruCache<T> {
    readonly #maxSize: number;
    readonly #ttl: number;
    readonly #clock: () => number;
    readonly #entries = new Map<string, CacheEntry<T>>();

    constructor(options: LruCacheOptions) {
        if (typeof options.ttl !== "number" || options.ttl <= 0) {
            throw new RangeError("ttl must be a positive number");
        }
        if (options.maxSize !== undefined && (!Number.isInteger(options.maxSize) || options.maxSize <= 0)) {
            throw new RangeError("maxSize must be a positive integer");
        }
        this.#ttl = options.ttl;
        this.#maxSize = options.maxSize ?? 1000;
        this.#clock = options.clock ?? Date.now;
    }

    get(key: string): T | undefined {
        const entry = this.#entries.get(key);
        if (!entry) return undefined;

        if (this.#clock() >= entry.expiresAt) {
            this.#entries.delete(key);
            return undefined;
        }

        // Move to end (most recently used)
        this.#entries.delete(key);
        this.#entries.set(key, entry);
        return entry.value;
    }

    set(key: string, value: T): void {
        this.#entries.delete(key);

        if (this.#entries.size >= this.#maxSize) {
            const oldest = this.#entries.keys().next();
            if (!oldest.done) {
                this.#entries.delete(oldest.value);
            }
        }

        this.#entries.set(key, { value, expiresAt: this.#clock() + this.#ttl });
    }

    delete(key: string): boolean {
        return this.#entries.delete(key);
    }

    clear(): void {
        this.#entries.clear();
    }

    get size(): number {
        return this.#entries.size;
    }
}
