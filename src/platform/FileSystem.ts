import * as path from "path";
import { promises as fsPromises } from "fs";

export interface IFileSystem {
    readFile(path: string): Promise<string>;
    /** Creates missing parent directories. */
    writeFile(path: string, content: string): Promise<void>;
}

function hasErrorCode(error: unknown, code: string): boolean {
    return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

export function isNotFoundError(error: unknown): boolean {
    return hasErrorCode(error, "ENOENT");
}

function resolveUnder(rootPath: string, targetPath: string): string {
    if (!targetPath) {
        return rootPath;
    }
    return path.isAbsolute(targetPath)
        ? path.normalize(targetPath)
        : path.join(rootPath, targetPath);
}

export class NodeFileSystem implements IFileSystem {
    private readonly rootPath: string;

    constructor(rootPath: string) {
        this.rootPath = path.resolve(rootPath);
    }

    async readFile(targetPath: string): Promise<string> {
        return fsPromises.readFile(resolveUnder(this.rootPath, targetPath), "utf-8");
    }

    async writeFile(targetPath: string, content: string): Promise<void> {
        const resolved = resolveUnder(this.rootPath, targetPath);
        await fsPromises.mkdir(path.dirname(resolved), { recursive: true });
        await fsPromises.writeFile(resolved, content, "utf-8");
    }
}

class MemoryFsError extends Error {
    constructor(public readonly code: string, message: string) {
        super(message);
        this.name = "MemoryFsError";
    }
}

export class MemoryFileSystem implements IFileSystem {
    private readonly rootPath: string;
    private readonly files = new Map<string, string>();

    constructor(rootPath: string = process.cwd()) {
        this.rootPath = path.resolve(rootPath);
    }

    async readFile(targetPath: string): Promise<string> {
        const resolved = resolveUnder(this.rootPath, targetPath);
        const content = this.files.get(resolved);
        if (content === undefined) {
            throw new MemoryFsError("ENOENT", `ENOENT: no such file, open '${resolved}'`);
        }
        return content;
    }

    async writeFile(targetPath: string, content: string): Promise<void> {
        this.files.set(resolveUnder(this.rootPath, targetPath), content);
    }
}
