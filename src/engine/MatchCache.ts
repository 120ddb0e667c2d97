import { LRUCache } from "lru-cache";
import { MatchSpan } from "../types.js";
import { computeContentHash } from "../utils/ContentHash.js";

interface CachedLookup {
    span: MatchSpan | null;
}

/**
 * Size-bounded memo of matcher lookups keyed by the content hashes of the
 * document and the search fragment. Owned by whoever drives the applicator;
 * nothing in the engine keeps one globally.
 */
export class MatchCache {
    private readonly entries: LRUCache<string, CachedLookup>;
    private hits = 0;
    private misses = 0;

    constructor(maxEntries: number) {
        this.entries = new LRUCache<string, CachedLookup>({ max: Math.max(1, maxEntries) });
    }

    public keyFor(document: string, search: string): string {
        return `${computeContentHash(document)}:${computeContentHash(search)}:${document.length}:${search.length}`;
    }

    public lookup(key: string): CachedLookup | undefined {
        const entry = this.entries.get(key);
        if (entry) {
            this.hits++;
        } else {
            this.misses++;
        }
        return entry;
    }

    public store(key: string, span: MatchSpan | null): void {
        this.entries.set(key, { span: span ? { ...span } : null });
    }

    public get size(): number {
        return this.entries.size;
    }

    public stats(): { hits: number; misses: number; size: number } {
        return { hits: this.hits, misses: this.misses, size: this.entries.size };
    }

    public clear(): void {
        this.entries.clear();
        this.hits = 0;
        this.misses = 0;
    }
}
