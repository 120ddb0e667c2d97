import Database from "better-sqlite3";
import { RevisionEntry, StoredFile, VersionedStore, WriteReceipt, WriteRequest } from "../types.js";
import { OperationCancelledError, TransportError, VersionConflictError } from "../errors/SyncErrors.js";
import { computeContentHash } from "../utils/ContentHash.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { metrics } from "../utils/MetricsCollector.js";

interface FileRow {
    content: string;
    version_token: string;
}

interface RevisionRow {
    path: string;
    ref: string;
    version_token: string;
    message: string | null;
    created_at: number;
}

function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new OperationCancelledError();
    }
}

/**
 * Content-addressed store on SQLite. Each `(ref, path)` holds its current
 * content and token; every accepted write is appended to `revisions`.
 * Compare-and-swap runs inside a single transaction.
 */
export class SqliteVersionedStore implements VersionedStore {
    private readonly db: Database.Database;
    private readonly logger = createLogger("SqliteVersionedStore");
    private readonly now: () => number;

    constructor(db: Database.Database, options: { now?: () => number } = {}) {
        this.db = db;
        this.now = options.now ?? (() => Date.now());
        this.ensureSchema();
    }

    public static open(filename: string): SqliteVersionedStore {
        const db = new Database(filename);
        db.pragma("journal_mode = WAL");
        return new SqliteVersionedStore(db);
    }

    private ensureSchema(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS files (
                ref TEXT NOT NULL,
                path TEXT NOT NULL,
                content TEXT NOT NULL,
                version_token TEXT NOT NULL,
                updated_at INTEGER NOT NULL,
                PRIMARY KEY (ref, path)
            );

            CREATE TABLE IF NOT EXISTS revisions (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                ref TEXT NOT NULL,
                path TEXT NOT NULL,
                version_token TEXT NOT NULL,
                message TEXT,
                created_at INTEGER NOT NULL
            );

            CREATE INDEX IF NOT EXISTS idx_revisions_ref_path
                ON revisions(ref, path, id DESC);
        `);
    }

    public async getContent(path: string, ref: string, signal?: AbortSignal): Promise<StoredFile> {
        throwIfAborted(signal);
        const row = this.db.prepare<[string, string], FileRow>(`
            SELECT content, version_token FROM files WHERE ref = ? AND path = ?
        `).get(ref, path);
        if (!row) {
            throw new TransportError(`File not found: ${path}@${ref}`);
        }
        return { content: row.content, versionToken: row.version_token };
    }

    public async write(request: WriteRequest, signal?: AbortSignal): Promise<WriteReceipt> {
        throwIfAborted(signal);
        const versionToken = computeContentHash(request.content);
        const timestamp = this.now();

        const commit = this.db.transaction(() => {
            const current = this.db.prepare<[string, string], Pick<FileRow, "version_token">>(`
                SELECT version_token FROM files WHERE ref = ? AND path = ?
            `).get(request.ref, request.path);

            if (request.versionToken === null) {
                if (current) {
                    throw new VersionConflictError(`File already exists: ${request.path}@${request.ref}`, {
                        path: request.path,
                        expectedToken: null,
                        actualToken: current.version_token
                    });
                }
            } else if (!current) {
                throw new TransportError(`File not found: ${request.path}@${request.ref}`);
            } else if (current.version_token !== request.versionToken) {
                throw new VersionConflictError(`Version token mismatch for ${request.path}@${request.ref}`, {
                    path: request.path,
                    expectedToken: request.versionToken,
                    actualToken: current.version_token
                });
            }

            this.db.prepare(`
                INSERT INTO files (ref, path, content, version_token, updated_at)
                VALUES (?, ?, ?, ?, ?)
                ON CONFLICT(ref, path) DO UPDATE SET
                    content = excluded.content,
                    version_token = excluded.version_token,
                    updated_at = excluded.updated_at
            `).run(request.ref, request.path, request.content, versionToken, timestamp);

            this.db.prepare(`
                INSERT INTO revisions (ref, path, version_token, message, created_at)
                VALUES (?, ?, ?, ?, ?)
            `).run(request.ref, request.path, versionToken, request.message, timestamp);
        });

        try {
            commit();
        } catch (error) {
            if (error instanceof VersionConflictError) {
                metrics.inc("store.conflicts");
                this.logger.debug("Rejected stale write", { path: request.path, ref: request.ref });
            }
            throw error;
        }

        metrics.inc("store.writes");
        return { versionToken };
    }

    public async listRevisions(path: string, ref: string, limit: number = 20): Promise<RevisionEntry[]> {
        const rows = this.db.prepare<[string, string, number], RevisionRow>(`
            SELECT path, ref, version_token, message, created_at
            FROM revisions
            WHERE ref = ? AND path = ?
            ORDER BY id DESC
            LIMIT ?
        `).all(ref, path, limit);

        return rows.map(row => ({
            path: row.path,
            ref: row.ref,
            versionToken: row.version_token,
            message: row.message ?? "",
            createdAt: row.created_at
        }));
    }

    public close(): void {
        this.db.close();
    }
}
