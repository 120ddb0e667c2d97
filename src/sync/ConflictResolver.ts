import { setTimeout as delay } from "timers/promises";
import {
    ConflictOutcome,
    ConflictPolicy,
    ResolutionStrategy,
    SaveConflict,
    SaveError,
    SaveSuccess,
    SyncErrorCode,
    VersionToken,
    VersionedStore
} from "../types.js";
import { VersionConflictError, describeError, isAbortError } from "../errors/SyncErrors.js";
import { buildPositionalDiff, conflictedLineNumbers } from "../engine/PositionalDiff.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { metrics } from "../utils/MetricsCollector.js";

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_MIN_ATTEMPT_INTERVAL_MS = 500;

export interface ConflictResolverOptions {
    maxAttempts?: number;
    /** Floor between the starts of two consecutive write attempts. */
    minAttemptIntervalMs?: number;
    now?: () => number;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
    currentDate?: () => Date;
}

export interface SaveRequest {
    path: string;
    localContent: string;
    baseVersionToken: VersionToken;
    ref: string;
    message: string;
    signal?: AbortSignal;
    /** `surface` (default) hands the first conflict back to the caller; `retry` refetches and retries. */
    conflictPolicy?: ConflictPolicy;
}

export interface ResolveOptions {
    message?: string;
    signal?: AbortSignal;
}

interface PendingWrite {
    path: string;
    content: string;
    ref: string;
    message: string;
}

interface WriteLoopState {
    readonly attempt: number;
    readonly token: VersionToken;
    readonly lastAttemptAt: number | null;
}

type WriteLoopResult = SaveSuccess | SaveError | { kind: "conflict-detected"; attempts: number };

/**
 * Build `dir/Name.conflict-YYYY-MM-DD-HHmmss.ext` next to the original file.
 * Names without an extension (and dotfiles) get the segment at the end.
 */
export function deriveCopyPath(originalPath: string, date: Date): string {
    const pad = (value: number) => String(value).padStart(2, "0");
    const timestamp = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`
        + `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;

    const lastSlash = originalPath.lastIndexOf("/");
    const directory = lastSlash >= 0 ? originalPath.slice(0, lastSlash + 1) : "";
    const fileName = lastSlash >= 0 ? originalPath.slice(lastSlash + 1) : originalPath;

    const dotIndex = fileName.lastIndexOf(".");
    const name = dotIndex > 0 ? fileName.slice(0, dotIndex) : fileName;
    const extension = dotIndex > 0 ? fileName.slice(dotIndex) : "";

    return `${directory}${name}.conflict-${timestamp}${extension}`;
}

/**
 * Saves documents against a {@link VersionedStore} with compare-and-swap
 * semantics. A first conflict on `save` is surfaced to the caller with a
 * positional diff; the resolution strategies then write with the remote's
 * token and retry on renewed conflicts, at most `maxAttempts` writes per call
 * and never closer together than `minAttemptIntervalMs`.
 */
export class ConflictResolver {
    private readonly logger = createLogger("ConflictResolver");
    private readonly maxAttempts: number;
    private readonly minAttemptIntervalMs: number;
    private readonly now: () => number;
    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
    private readonly currentDate: () => Date;

    constructor(private readonly store: VersionedStore, options: ConflictResolverOptions = {}) {
        this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
        this.minAttemptIntervalMs = Math.max(0, options.minAttemptIntervalMs ?? DEFAULT_MIN_ATTEMPT_INTERVAL_MS);
        this.now = options.now ?? (() => Date.now());
        this.sleep = options.sleep ?? ((ms, signal) => delay(ms, undefined, { signal }));
        this.currentDate = options.currentDate ?? (() => new Date());
    }

    public async save(request: SaveRequest): Promise<ConflictOutcome> {
        const pending: PendingWrite = {
            path: request.path,
            content: request.localContent,
            ref: request.ref,
            message: request.message
        };
        const policy = request.conflictPolicy ?? "surface";
        this.logger.info("Saving file", { path: request.path, ref: request.ref, policy });

        const result = await this.runWriteLoop(pending, request.baseVersionToken, policy, request.signal);
        if (result.kind !== "conflict-detected") {
            return this.finish("save", request.path, result);
        }

        metrics.inc("sync.conflicts.detected");
        const outcome = await this.describeConflict(pending, result.attempts, request.signal);
        return this.finish("save", request.path, outcome);
    }

    public async keepMine(conflict: SaveConflict, options: ResolveOptions = {}): Promise<ConflictOutcome> {
        const pending: PendingWrite = {
            path: conflict.path,
            content: conflict.localContent,
            ref: conflict.ref,
            message: options.message ?? "Resolve conflict: keep local changes"
        };
        const result = await this.runWriteLoop(pending, conflict.remoteVersionToken, "retry", options.signal);
        return this.finish("keep-mine", conflict.path, result);
    }

    public async keepTheirs(conflict: SaveConflict): Promise<ConflictOutcome> {
        return this.finish("keep-theirs", conflict.path, {
            kind: "success",
            newVersionToken: conflict.remoteVersionToken,
            message: "Local changes discarded. File reverted to remote version."
        });
    }

    public async manualMerge(conflict: SaveConflict, mergedContent: string, options: ResolveOptions = {}): Promise<ConflictOutcome> {
        const pending: PendingWrite = {
            path: conflict.path,
            content: mergedContent,
            ref: conflict.ref,
            message: options.message ?? "Resolve conflict: manual merge"
        };
        const result = await this.runWriteLoop(pending, conflict.remoteVersionToken, "retry", options.signal);
        return this.finish("manual-merge", conflict.path, result);
    }

    public async saveAsCopy(conflict: SaveConflict, options: ResolveOptions = {}): Promise<ConflictOutcome> {
        const copyPath = deriveCopyPath(conflict.path, this.currentDate());
        if (options.signal?.aborted) {
            return this.finish("save-as-copy", conflict.path, this.failure("cancelled", "Save cancelled before writing the copy", 0));
        }

        try {
            const receipt = await this.store.write({
                path: copyPath,
                content: conflict.localContent,
                versionToken: null,
                ref: conflict.ref,
                message: options.message ?? "Save conflicted version as copy"
            }, options.signal);
            return this.finish("save-as-copy", conflict.path, {
                kind: "success",
                newVersionToken: receipt.versionToken,
                message: `Local changes saved as: ${copyPath}`,
                savedPath: copyPath
            });
        } catch (error) {
            if (isAbortError(error) || options.signal?.aborted) {
                return this.finish("save-as-copy", conflict.path, this.failure("cancelled", "Save cancelled while writing the copy", 1));
            }
            if (error instanceof VersionConflictError) {
                return this.finish("save-as-copy", conflict.path,
                    this.failure("transport", `Failed to create copy: ${copyPath} already exists`, 1));
            }
            return this.finish("save-as-copy", conflict.path,
                this.failure("transport", `Failed to create copy ${copyPath}: ${describeError(error)}`, 1));
        }
    }

    public async resolve(conflict: SaveConflict, strategy: ResolutionStrategy, options: ResolveOptions = {}): Promise<ConflictOutcome> {
        switch (strategy.type) {
            case "keep-mine":
                return this.keepMine(conflict, options);
            case "keep-theirs":
                return this.keepTheirs(conflict);
            case "manual-merge":
                return this.manualMerge(conflict, strategy.mergedContent, options);
            case "save-as-copy":
                return this.saveAsCopy(conflict, options);
        }
    }

    /**
     * Sequential compare-and-swap loop. Each pass carries a fresh state
     * record forward; nothing is mutated across iterations. Only the
     * `surface` policy can stop at a detected conflict.
     */
    private runWriteLoop(
        pending: PendingWrite,
        initialToken: VersionToken,
        policy: "retry",
        signal?: AbortSignal
    ): Promise<SaveSuccess | SaveError>;
    private runWriteLoop(
        pending: PendingWrite,
        initialToken: VersionToken,
        policy: ConflictPolicy,
        signal?: AbortSignal
    ): Promise<WriteLoopResult>;
    private async runWriteLoop(
        pending: PendingWrite,
        initialToken: VersionToken,
        policy: ConflictPolicy,
        signal?: AbortSignal
    ): Promise<WriteLoopResult> {
        let state: WriteLoopState = { attempt: 1, token: initialToken, lastAttemptAt: null };

        for (;;) {
            const completed = state.attempt - 1;
            if (signal?.aborted) {
                return this.failure("cancelled", "Save cancelled before the write was attempted", completed);
            }
            if (state.lastAttemptAt !== null) {
                try {
                    await this.waitForSpacing(state.lastAttemptAt, signal);
                } catch (error) {
                    if (isAbortError(error) || signal?.aborted) {
                        return this.failure("cancelled", "Save cancelled while waiting to retry", completed);
                    }
                    throw error;
                }
            }

            const startedAt = this.now();
            try {
                const receipt = await this.store.write({ ...pending, versionToken: state.token }, signal);
                return { kind: "success", newVersionToken: receipt.versionToken };
            } catch (error) {
                if (isAbortError(error) || signal?.aborted) {
                    return this.failure("cancelled", "Save cancelled during the write", state.attempt);
                }
                if (!(error instanceof VersionConflictError)) {
                    return this.failure("transport", describeError(error), state.attempt);
                }
                if (state.attempt === 1 && policy === "surface") {
                    return { kind: "conflict-detected", attempts: state.attempt };
                }
                if (state.attempt >= this.maxAttempts) {
                    return this.failure(
                        "retry-exhausted",
                        `Version conflict persisted after ${state.attempt} attempts on ${pending.path}`,
                        state.attempt
                    );
                }
            }

            metrics.inc("sync.retries");
            this.logger.warn("Version conflict, retrying with the latest remote token", {
                path: pending.path,
                attempt: state.attempt,
                maxAttempts: this.maxAttempts
            });

            try {
                const remote = await this.store.getContent(pending.path, pending.ref, signal);
                state = { attempt: state.attempt + 1, token: remote.versionToken, lastAttemptAt: startedAt };
            } catch (error) {
                if (isAbortError(error) || signal?.aborted) {
                    return this.failure("cancelled", "Save cancelled while refreshing the remote version", state.attempt);
                }
                return this.failure("transport", `Failed to fetch remote version: ${describeError(error)}`, state.attempt);
            }
        }
    }

    private async waitForSpacing(lastAttemptAt: number, signal?: AbortSignal): Promise<void> {
        const remaining = this.minAttemptIntervalMs - (this.now() - lastAttemptAt);
        if (remaining > 0) {
            await this.sleep(remaining, signal);
        }
    }

    private async describeConflict(pending: PendingWrite, attempts: number, signal?: AbortSignal): Promise<ConflictOutcome> {
        try {
            const remote = await this.store.getContent(pending.path, pending.ref, signal);
            const diff = buildPositionalDiff(pending.content, remote.content);
            return {
                kind: "conflict",
                path: pending.path,
                ref: pending.ref,
                localContent: pending.content,
                remoteContent: remote.content,
                remoteVersionToken: remote.versionToken,
                diff,
                conflictedLineNumbers: conflictedLineNumbers(diff)
            };
        } catch (error) {
            if (isAbortError(error) || signal?.aborted) {
                return this.failure("cancelled", "Save cancelled while fetching the remote version", attempts);
            }
            return this.failure("transport", `Failed to fetch remote version: ${describeError(error)}`, attempts);
        }
    }

    private failure(code: SyncErrorCode, message: string, attempts: number): SaveError {
        return { kind: "error", code, message, attempts };
    }

    private finish(operation: string, path: string, outcome: ConflictOutcome): ConflictOutcome {
        switch (outcome.kind) {
            case "success":
                metrics.inc(`sync.${operation}.success`);
                this.logger.info("Write succeeded", { operation, path, versionToken: outcome.newVersionToken });
                break;
            case "conflict":
                metrics.inc(`sync.${operation}.conflict`);
                this.logger.warn("Write conflict needs resolution", {
                    operation,
                    path,
                    conflictedLines: outcome.conflictedLineNumbers.length
                });
                break;
            case "error":
                metrics.inc(`sync.${operation}.error.${outcome.code}`);
                this.logger.error("Write failed", { operation, path, code: outcome.code, message: outcome.message });
                break;
        }
        return outcome;
    }
}
