import * as XXH from "xxhashjs";

const HASH_SEED = 0xabcd;

export function computeContentHash(content: string): string {
    return XXH.h64(content, HASH_SEED).toString(16);
}
