export type MatchStatus =
    | "pending"
    | "exact"
    | "normalized"
    | "fuzzy"
    | "line-range"
    | "not-found";

/** Tiers that can actually locate a span, in the order they are tried. */
export type MatchTier = "exact" | "normalized" | "fuzzy" | "line-range";

export const MATCH_TIERS: readonly MatchTier[] = ["exact", "normalized", "fuzzy", "line-range"];

export interface EditBlock {
    readonly search: string;
    readonly replace: string;
    readonly matchStatus: MatchStatus;
}

/** Half-open character range `[start, end)` of the document a tier accepted. */
export interface MatchSpan {
    tier: MatchTier;
    start: number;
    end: number;
}

export interface NearestLineHint {
    /** 1-based line of the document closest to the fragment's first anchor line. */
    lineNumber: number;
    text: string;
    similarity: number;
}

export interface BlockReport {
    /** 1-based position of the block in the input. */
    blockNumber: number;
    status: MatchStatus;
    hint?: NearestLineHint;
}

export interface ApplyResult {
    newContent: string;
    appliedBlocks: EditBlock[];
    failedBlockNumbers: number[];
    totalApplied: number;
    totalFailed: number;
    isFullyApplied: boolean;
    reports: BlockReport[];
    statusMessage: string;
}

export interface ParsedEdits {
    blocks: EditBlock[];
    summary: string;
    format: "xml" | "markers" | "none";
}

/** Opaque identifier of a stored state, compared and forwarded only. */
export type VersionToken = string;

export type DiffLine =
    | { kind: "unchanged"; lineIndex: number; text: string }
    | { kind: "added"; lineIndex: number; text: string }
    | { kind: "removed"; lineIndex: number; text: string }
    | { kind: "modified"; lineIndex: number; localText: string; remoteText: string };

export interface DiffSummary {
    unchanged: number;
    added: number;
    removed: number;
    modified: number;
}

export type SyncErrorCode = "transport" | "retry-exhausted" | "cancelled" | "invalid-input";

export interface SaveSuccess {
    kind: "success";
    newVersionToken: VersionToken;
    message?: string;
    savedPath?: string;
}

export interface SaveConflict {
    kind: "conflict";
    path: string;
    ref: string;
    localContent: string;
    remoteContent: string;
    remoteVersionToken: VersionToken;
    diff: DiffLine[];
    conflictedLineNumbers: number[];
}

export interface SaveError {
    kind: "error";
    code: SyncErrorCode;
    message: string;
    attempts: number;
}

export type ConflictOutcome = SaveSuccess | SaveConflict | SaveError;

export type ResolutionStrategy =
    | { type: "keep-mine" }
    | { type: "keep-theirs" }
    | { type: "manual-merge"; mergedContent: string }
    | { type: "save-as-copy" };

export type ConflictPolicy = "surface" | "retry";

export interface StoredFile {
    content: string;
    versionToken: VersionToken;
}

export interface WriteRequest {
    path: string;
    content: string;
    /** `null` creates a new resource and fails if one already exists. */
    versionToken: VersionToken | null;
    ref: string;
    message: string;
}

export interface WriteReceipt {
    versionToken: VersionToken;
}

export interface RevisionEntry {
    path: string;
    ref: string;
    versionToken: VersionToken;
    message: string;
    createdAt: number;
}

/**
 * Remote content-addressed store. `write` rejects with `VersionConflictError`
 * when `versionToken` no longer matches; any other rejection is treated as a
 * transport failure.
 */
export interface VersionedStore {
    getContent(path: string, ref: string, signal?: AbortSignal): Promise<StoredFile>;
    write(request: WriteRequest, signal?: AbortSignal): Promise<WriteReceipt>;
    listRevisions?(path: string, ref: string, limit?: number): Promise<RevisionEntry[]>;
}

export interface SyncConfig {
    maxAttempts: number;
    minAttemptIntervalMs: number;
    defaultRef: string;
    store: "sqlite" | "filesystem";
    databasePath: string;
    rootPath: string;
    matchCacheSize: number;
    pendingConflictLimit: number;
}
