import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import * as crypto from "crypto";
import { LRUCache } from "lru-cache";
import { ConflictOutcome, ResolutionStrategy, SaveConflict, SyncConfig, VersionedStore } from "./types.js";
import { resolveSyncConfigFromEnv } from "./config/SyncConfig.js";
import { parseEditResponse } from "./engine/EditBlockParser.js";
import { MatchCache } from "./engine/MatchCache.js";
import { PatchApplicator } from "./engine/PatchApplicator.js";
import { renderPositionalDiff, summarizeDiff } from "./engine/PositionalDiff.js";
import { ConflictResolver, ConflictResolverOptions } from "./sync/ConflictResolver.js";
import { createStoreFromConfig } from "./sync/StoreFactory.js";
import { ErrorEnhancer } from "./errors/ErrorEnhancer.js";
import { InvalidInputError, TransportError, describeError } from "./errors/SyncErrors.js";
import { createLogger } from "./utils/StructuredLogger.js";
import { metrics } from "./utils/MetricsCollector.js";

export * from "./types.js";
export { PatchMatcher } from "./engine/PatchMatcher.js";
export { PatchApplicator, createEditBlock, describeApplyResult } from "./engine/PatchApplicator.js";
export { parseEditResponse } from "./engine/EditBlockParser.js";
export { stripLineNumbers, trimTrailingWhitespace } from "./engine/LineAnchorNormalizer.js";
export { buildPositionalDiff, conflictedLineNumbers, renderPositionalDiff, summarizeDiff } from "./engine/PositionalDiff.js";
export { MatchCache } from "./engine/MatchCache.js";
export { ConflictResolver, deriveCopyPath } from "./sync/ConflictResolver.js";
export { SqliteVersionedStore } from "./sync/SqliteVersionedStore.js";
export { FileSystemVersionedStore } from "./sync/FileSystemVersionedStore.js";
export * from "./errors/SyncErrors.js";

type ToolResponse = {
    isError?: boolean;
    content: Array<{ type: "text"; text: string }>;
};

type ToolArgs = Record<string, unknown>;

const STRATEGIES = ["keep-mine", "keep-theirs", "manual-merge", "save-as-copy"] as const;
type StrategyName = typeof STRATEGIES[number];

function isStrategyName(value: string): value is StrategyName {
    return STRATEGIES.some(strategy => strategy === value);
}

function requireString(args: ToolArgs, key: string): string {
    const value = args[key];
    if (typeof value !== "string" || value.length === 0) {
        throw new InvalidInputError(`Missing required parameter: ${key}`, { parameter: key });
    }
    return value;
}

function optionalString(args: ToolArgs, key: string): string | undefined {
    const value = args[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "string") {
        throw new InvalidInputError(`Parameter ${key} must be a string`, { parameter: key });
    }
    return value;
}

function optionalBoolean(args: ToolArgs, key: string): boolean {
    const value = args[key];
    if (value === undefined || value === null) return false;
    if (typeof value !== "boolean") {
        throw new InvalidInputError(`Parameter ${key} must be a boolean`, { parameter: key });
    }
    return value;
}

export interface PatchSyncServerOptions {
    config?: SyncConfig;
    /** Supplying a store skips the one the config would create; the caller keeps ownership. */
    store?: VersionedStore;
    resolver?: Omit<ConflictResolverOptions, "maxAttempts" | "minAttemptIntervalMs">;
}

export class PatchSyncServer {
    private readonly server: Server;
    private readonly logger = createLogger("PatchSyncServer");
    private readonly config: SyncConfig;
    private readonly store: VersionedStore;
    private readonly closeStore: () => void;
    private readonly applicator = new PatchApplicator();
    private readonly resolver: ConflictResolver;
    private readonly matchCache: MatchCache;
    private readonly pendingConflicts: LRUCache<string, SaveConflict>;

    constructor(options: PatchSyncServerOptions = {}) {
        this.server = new Server({
            name: "patch-sync-mcp",
            version: "0.1.0",
        }, {
            capabilities: { tools: {} },
        });

        this.config = options.config ?? resolveSyncConfigFromEnv();
        if (options.store) {
            this.store = options.store;
            this.closeStore = () => undefined;
        } else {
            const managed = createStoreFromConfig(this.config);
            this.store = managed.store;
            this.closeStore = managed.close;
        }

        this.resolver = new ConflictResolver(this.store, {
            ...options.resolver,
            maxAttempts: this.config.maxAttempts,
            minAttemptIntervalMs: this.config.minAttemptIntervalMs
        });
        this.matchCache = new MatchCache(this.config.matchCacheSize);
        this.pendingConflicts = new LRUCache<string, SaveConflict>({ max: this.config.pendingConflictLimit });

        this.setupHandlers();
    }

    private setupHandlers(): void {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools: this.listTools(),
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            return this.handleCallTool(request.params.name, request.params.arguments ?? {});
        });
    }

    public listTools() {
        return [
            {
                name: "read_file",
                description: "Read a file from the versioned store together with its current version token.",
                inputSchema: {
                    type: "object" as const,
                    properties: {
                        path: { type: "string" },
                        ref: { type: "string" }
                    },
                    required: ["path"]
                }
            },
            {
                name: "apply_edits",
                description: "Apply search/replace edit blocks to a file and save it with optimistic concurrency. Conflicts are parked under a conflictId.",
                inputSchema: {
                    type: "object" as const,
                    properties: {
                        path: { type: "string" },
                        ref: { type: "string" },
                        edits: { type: "string", description: "Model output with <block><search>…</search><replace>…</replace></block> or SEARCH/REPLACE markers." },
                        content: { type: "string", description: "Local working copy. Defaults to the stored content." },
                        baseVersionToken: { type: "string" },
                        message: { type: "string" },
                        dryRun: { type: "boolean" }
                    },
                    required: ["path", "edits"]
                }
            },
            {
                name: "resolve_conflict",
                description: "Resolve a parked write conflict.",
                inputSchema: {
                    type: "object" as const,
                    properties: {
                        conflictId: { type: "string" },
                        strategy: { type: "string", enum: [...STRATEGIES] },
                        mergedContent: { type: "string" },
                        message: { type: "string" }
                    },
                    required: ["conflictId", "strategy"]
                }
            },
            {
                name: "server_stats",
                description: "Counters for match tiers, saves and retries, plus match cache usage.",
                inputSchema: {
                    type: "object" as const,
                    properties: {}
                }
            },
            {
                name: "file_history",
                description: "List recent revisions of a file, when the store keeps them.",
                inputSchema: {
                    type: "object" as const,
                    properties: {
                        path: { type: "string" },
                        ref: { type: "string" },
                        limit: { type: "number" }
                    },
                    required: ["path"]
                }
            }
        ];
    }

    public async handleCallTool(name: string, args: ToolArgs): Promise<ToolResponse> {
        try {
            switch (name) {
                case "read_file":
                    return this.jsonResponse(await this.readFileRaw(args));
                case "apply_edits":
                    return this.jsonResponse(await this.applyEditsRaw(args));
                case "resolve_conflict":
                    return this.jsonResponse(await this.resolveConflictRaw(args));
                case "file_history":
                    return this.jsonResponse(await this.fileHistoryRaw(args));
                case "server_stats":
                    return this.jsonResponse({
                        ...metrics.snapshot(),
                        matchCache: this.matchCache.stats(),
                        pendingConflicts: this.pendingConflicts.size
                    });
                default:
                    return this.errorResponse("UnknownTool", `Unknown tool: ${name}`);
            }
        } catch (error) {
            if (error instanceof InvalidInputError) {
                return this.errorResponse("InvalidInput", error.message, error.details);
            }
            if (error instanceof TransportError) {
                return this.errorResponse("TransportError", error.message);
            }
            this.logger.error("Tool call failed", { tool: name, error: describeError(error) });
            return this.errorResponse("InternalError", describeError(error));
        }
    }

    private async readFileRaw(args: ToolArgs) {
        const path = requireString(args, "path");
        const ref = optionalString(args, "ref") ?? this.config.defaultRef;
        const file = await this.store.getContent(path, ref);
        return { path, ref, content: file.content, versionToken: file.versionToken };
    }

    private async applyEditsRaw(args: ToolArgs) {
        const path = requireString(args, "path");
        const edits = requireString(args, "edits");
        const ref = optionalString(args, "ref") ?? this.config.defaultRef;
        const message = optionalString(args, "message") ?? `Apply edits to ${path}`;
        const dryRun = optionalBoolean(args, "dryRun");
        const workingCopy = optionalString(args, "content");
        const explicitBase = optionalString(args, "baseVersionToken");

        const parsed = parseEditResponse(edits);
        if (parsed.blocks.length === 0) {
            return { path, ref, summary: parsed.summary, applied: false, statusMessage: "No edit blocks found" };
        }

        let document: string;
        let baseVersionToken: string;
        if (workingCopy !== undefined && explicitBase !== undefined) {
            document = workingCopy;
            baseVersionToken = explicitBase;
        } else {
            const stored = await this.store.getContent(path, ref);
            document = workingCopy ?? stored.content;
            baseVersionToken = explicitBase ?? stored.versionToken;
        }

        const result = this.applicator.applyEdits(document, parsed.blocks, { cache: this.matchCache });
        const report = {
            path,
            ref,
            summary: parsed.summary,
            statusMessage: result.statusMessage,
            totalApplied: result.totalApplied,
            totalFailed: result.totalFailed,
            blocks: result.reports,
            failures: ErrorEnhancer.enhanceMatchFailures(result)
        };

        if (dryRun || result.totalApplied === 0 || result.newContent === document) {
            return { ...report, saved: false, newContent: dryRun ? result.newContent : undefined };
        }

        const outcome = await this.resolver.save({
            path,
            localContent: result.newContent,
            baseVersionToken,
            ref,
            message
        });
        return { ...report, saved: outcome.kind === "success", outcome: this.presentOutcome(outcome) };
    }

    private async resolveConflictRaw(args: ToolArgs) {
        const conflictId = requireString(args, "conflictId");
        const strategyName = requireString(args, "strategy");
        const message = optionalString(args, "message");

        if (!isStrategyName(strategyName)) {
            throw new InvalidInputError(`Unknown strategy: ${strategyName}`, { allowed: [...STRATEGIES] });
        }
        const conflict = this.pendingConflicts.get(conflictId);
        if (!conflict) {
            throw new InvalidInputError(`No pending conflict with id ${conflictId}`, { conflictId });
        }

        const strategy: ResolutionStrategy = strategyName === "manual-merge"
            ? { type: "manual-merge", mergedContent: requireString(args, "mergedContent") }
            : { type: strategyName };

        const outcome = await this.resolver.resolve(conflict, strategy, { message });
        if (outcome.kind === "success") {
            this.pendingConflicts.delete(conflictId);
        }

        return {
            conflictId,
            strategy: strategy.type,
            outcome: this.presentOutcome(outcome),
            remoteContent: strategy.type === "keep-theirs" && outcome.kind === "success" ? conflict.remoteContent : undefined
        };
    }

    private async fileHistoryRaw(args: ToolArgs) {
        const path = requireString(args, "path");
        const ref = optionalString(args, "ref") ?? this.config.defaultRef;
        const limitArg = args.limit;
        const limit = typeof limitArg === "number" && limitArg > 0 ? Math.floor(limitArg) : 20;
        if (!this.store.listRevisions) {
            return { path, ref, revisions: [], supported: false };
        }
        return { path, ref, revisions: await this.store.listRevisions(path, ref, limit), supported: true };
    }

    private presentOutcome(outcome: ConflictOutcome) {
        switch (outcome.kind) {
            case "success":
                return outcome;
            case "error":
                return outcome;
            case "conflict": {
                const conflictId = crypto.randomUUID();
                this.pendingConflicts.set(conflictId, outcome);
                metrics.gauge("server.pendingConflicts", this.pendingConflicts.size);
                return {
                    kind: outcome.kind,
                    conflictId,
                    path: outcome.path,
                    ref: outcome.ref,
                    remoteVersionToken: outcome.remoteVersionToken,
                    conflictedLineNumbers: outcome.conflictedLineNumbers,
                    diffSummary: summarizeDiff(outcome.diff),
                    diff: renderPositionalDiff(outcome.diff)
                };
            }
        }
    }

    private jsonResponse(payload: unknown): ToolResponse {
        return {
            content: [{ type: "text", text: JSON.stringify(payload, null, 2) }]
        };
    }

    private errorResponse(errorCode: string, message: string, details?: unknown): ToolResponse {
        return {
            isError: true,
            content: [{ type: "text", text: JSON.stringify({ errorCode, message, details }) }]
        };
    }

    public async run(): Promise<void> {
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        this.logger.info("patch-sync-mcp listening on stdio", { store: this.config.store, defaultRef: this.config.defaultRef });
    }

    public async shutdown(): Promise<void> {
        await this.server.close();
        this.closeStore();
    }
}
