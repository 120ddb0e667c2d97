import { describe, it, expect, beforeEach } from "@jest/globals";
import * as path from "path";
import { FileSystemVersionedStore } from "../sync/FileSystemVersionedStore.js";
import { MemoryFileSystem } from "../platform/FileSystem.js";
import { InvalidInputError, TransportError, VersionConflictError } from "../errors/SyncErrors.js";
import { computeContentHash } from "../utils/ContentHash.js";

describe("FileSystemVersionedStore", () => {
    const rootPath = path.resolve("/__patch_sync_workspace__");
    let fileSystem: MemoryFileSystem;
    let store: FileSystemVersionedStore;

    beforeEach(async () => {
        fileSystem = new MemoryFileSystem(rootPath);
        await fileSystem.writeFile("src/app.ts", "export const x = 1;\n");
        store = new FileSystemVersionedStore(fileSystem);
    });

    it("derives the token from what is on disk", async () => {
        await expect(store.getContent("src/app.ts", "main")).resolves.toEqual({
            content: "export const x = 1;\n",
            versionToken: computeContentHash("export const x = 1;\n")
        });
    });

    it("writes when the token still matches", async () => {
        const { versionToken } = await store.getContent("src/app.ts", "main");
        const receipt = await store.write({
            path: "src/app.ts",
            content: "export const x = 2;\n",
            versionToken,
            ref: "main",
            message: "bump"
        });

        expect(receipt.versionToken).toBe(computeContentHash("export const x = 2;\n"));
        expect(await fileSystem.readFile("src/app.ts")).toBe("export const x = 2;\n");
    });

    it("detects a change made behind its back", async () => {
        const { versionToken } = await store.getContent("src/app.ts", "main");
        await fileSystem.writeFile("src/app.ts", "export const x = 42;\n");

        await expect(store.write({ path: "src/app.ts", content: "mine", versionToken, ref: "main", message: "m" }))
            .rejects.toBeInstanceOf(VersionConflictError);
        expect(await fileSystem.readFile("src/app.ts")).toBe("export const x = 42;\n");
    });

    it("creates new files with a null token and refuses to overwrite with one", async () => {
        await store.write({ path: "docs/new.md", content: "# New\n", versionToken: null, ref: "main", message: "add" });
        expect(await fileSystem.readFile("docs/new.md")).toBe("# New\n");

        await expect(store.write({ path: "docs/new.md", content: "x", versionToken: null, ref: "main", message: "add" }))
            .rejects.toBeInstanceOf(VersionConflictError);
    });

    it("reports missing files as transport failures", async () => {
        await expect(store.getContent("missing.ts", "main")).rejects.toBeInstanceOf(TransportError);
        await expect(store.write({ path: "missing.ts", content: "x", versionToken: "abc", ref: "main", message: "m" }))
            .rejects.toBeInstanceOf(TransportError);
    });

    it("rejects paths outside the workspace", async () => {
        await expect(store.getContent("../escape.txt", "main")).rejects.toBeInstanceOf(InvalidInputError);
        await expect(store.getContent("/etc/hosts", "main")).rejects.toBeInstanceOf(InvalidInputError);
    });

    it("lets only one of two racing writers with the same token win", async () => {
        const { versionToken } = await store.getContent("src/app.ts", "main");
        const results = await Promise.allSettled([
            store.write({ path: "src/app.ts", content: "first\n", versionToken, ref: "main", message: "a" }),
            store.write({ path: "src/app.ts", content: "second\n", versionToken, ref: "main", message: "b" })
        ]);

        const [first, second] = results;
        expect(first.status).toBe("fulfilled");
        expect(second.status).toBe("rejected");
        expect(second.status === "rejected" ? second.reason : undefined).toBeInstanceOf(VersionConflictError);
        expect(await fileSystem.readFile("src/app.ts")).toBe("first\n");
    });
});
