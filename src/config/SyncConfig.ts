import * as path from "path";
import { SyncConfig } from "../types.js";
import { DEFAULT_MAX_ATTEMPTS, DEFAULT_MIN_ATTEMPT_INTERVAL_MS } from "../sync/ConflictResolver.js";

const DEFAULT_REF = "main";
const DEFAULT_MATCH_CACHE_SIZE = 256;
const DEFAULT_PENDING_CONFLICTS = 64;

export function resolveSyncConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SyncConfig {
    const rootPath = path.resolve(nonEmpty(env.PATCH_SYNC_ROOT) ?? process.cwd());
    const databasePath = nonEmpty(env.PATCH_SYNC_DB_PATH)
        ?? path.join(rootPath, ".patch-sync", "store.db");

    return {
        maxAttempts: parsePositiveInt(env.PATCH_SYNC_MAX_ATTEMPTS) ?? DEFAULT_MAX_ATTEMPTS,
        minAttemptIntervalMs: parseNonNegativeInt(env.PATCH_SYNC_MIN_ATTEMPT_INTERVAL_MS) ?? DEFAULT_MIN_ATTEMPT_INTERVAL_MS,
        defaultRef: nonEmpty(env.PATCH_SYNC_DEFAULT_REF) ?? DEFAULT_REF,
        store: normalizeStore(env.PATCH_SYNC_STORE),
        databasePath,
        rootPath,
        matchCacheSize: parsePositiveInt(env.PATCH_SYNC_MATCH_CACHE_SIZE) ?? DEFAULT_MATCH_CACHE_SIZE,
        pendingConflictLimit: parsePositiveInt(env.PATCH_SYNC_PENDING_CONFLICTS) ?? DEFAULT_PENDING_CONFLICTS
    };
}

function normalizeStore(value: string | undefined): SyncConfig["store"] {
    if (!value) return "sqlite";
    const normalized = value.trim().toLowerCase();
    if (normalized === "filesystem" || normalized === "fs") return "filesystem";
    return "sqlite";
}

function nonEmpty(value: string | undefined): string | undefined {
    if (!value) return undefined;
    return value.trim() || undefined;
}

function parseNonNegativeInt(value: string | undefined): number | undefined {
    if (!value) return undefined;
    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
}

function parsePositiveInt(value: string | undefined): number | undefined {
    const parsed = parseNonNegativeInt(value);
    return parsed !== undefined && parsed > 0 ? parsed : undefined;
}
