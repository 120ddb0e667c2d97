import * as path from "path";
import { StoredFile, VersionedStore, WriteReceipt, WriteRequest } from "../types.js";
import { IFileSystem, isNotFoundError } from "../platform/FileSystem.js";
import {
    InvalidInputError,
    OperationCancelledError,
    TransportError,
    VersionConflictError,
    describeError
} from "../errors/SyncErrors.js";
import { computeContentHash } from "../utils/ContentHash.js";
import { createLogger } from "../utils/StructuredLogger.js";

function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new OperationCancelledError();
    }
}

/**
 * Treats a working directory as the versioned store: the token of a file is
 * the hash of what is on disk right now, so an external editor saving the
 * file moves the token. Refs are ignored. Writes from this process are
 * serialized per path; writers outside it are only caught by the token check.
 */
export class FileSystemVersionedStore implements VersionedStore {
    private readonly logger = createLogger("FileSystemVersionedStore");
    private readonly pathLocks = new Map<string, Promise<void>>();

    constructor(private readonly fileSystem: IFileSystem) {}

    public async getContent(filePath: string, _ref: string, signal?: AbortSignal): Promise<StoredFile> {
        throwIfAborted(signal);
        const relative = this.validatePath(filePath);
        const content = await this.readExisting(relative);
        if (content === null) {
            throw new TransportError(`File not found: ${relative}`);
        }
        return { content, versionToken: computeContentHash(content) };
    }

    public async write(request: WriteRequest, signal?: AbortSignal): Promise<WriteReceipt> {
        throwIfAborted(signal);
        const relative = this.validatePath(request.path);

        return this.withPathLock(relative, async () => {
            throwIfAborted(signal);
            const current = await this.readExisting(relative);
            const currentToken = current === null ? null : computeContentHash(current);

            if (request.versionToken === null && currentToken !== null) {
                throw new VersionConflictError(`File already exists: ${relative}`, {
                    path: relative,
                    expectedToken: null,
                    actualToken: currentToken
                });
            }
            if (request.versionToken !== null && currentToken === null) {
                throw new TransportError(`File not found: ${relative}`);
            }
            if (request.versionToken !== null && currentToken !== request.versionToken) {
                throw new VersionConflictError(`Version token mismatch for ${relative}`, {
                    path: relative,
                    expectedToken: request.versionToken,
                    actualToken: currentToken ?? undefined
                });
            }

            try {
                await this.fileSystem.writeFile(relative, request.content);
            } catch (error) {
                throw new TransportError(`Failed to write ${relative}: ${describeError(error)}`, { cause: error });
            }
            this.logger.debug("File written", { path: relative, message: request.message });
            return { versionToken: computeContentHash(request.content) };
        });
    }

    private validatePath(filePath: string): string {
        const normalized = path.posix.normalize(filePath.replace(/\\/g, "/"));
        if (!normalized || normalized === "." || path.posix.isAbsolute(normalized) || normalized.startsWith("../") || normalized === "..") {
            throw new InvalidInputError(`Path must be relative to the workspace root: ${filePath}`, { path: filePath });
        }
        return normalized;
    }

    private async readExisting(relative: string): Promise<string | null> {
        try {
            return await this.fileSystem.readFile(relative);
        } catch (error) {
            if (isNotFoundError(error)) {
                return null;
            }
            throw new TransportError(`Failed to read ${relative}: ${describeError(error)}`, { cause: error });
        }
    }

    private async withPathLock<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.pathLocks.get(key) ?? Promise.resolve();
        const run = previous.then(task);
        const settled = run.then(() => undefined, () => undefined);
        this.pathLocks.set(key, settled);
        try {
            return await run;
        } finally {
            if (this.pathLocks.get(key) === settled) {
                this.pathLocks.delete(key);
            }
        }
    }
}
