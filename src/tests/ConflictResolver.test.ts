import { describe, it, expect, beforeEach } from "@jest/globals";
import { ConflictResolver, deriveCopyPath } from "../sync/ConflictResolver.js";
import { OperationCancelledError } from "../errors/SyncErrors.js";
import { ConflictOutcome, SaveConflict } from "../types.js";
import { metrics } from "../utils/MetricsCollector.js";
import { ScriptedVersionedStore } from "./helpers/ScriptedVersionedStore.js";

const COPY_DATE = new Date(Date.UTC(2024, 0, 15, 9, 5, 7));

function expectConflict(outcome: ConflictOutcome): SaveConflict {
    if (outcome.kind !== "conflict") {
        throw new Error(`Expected a conflict, got ${outcome.kind}`);
    }
    return outcome;
}

describe("ConflictResolver", () => {
    let store: ScriptedVersionedStore;
    let resolver: ConflictResolver;
    let sleeps: number[];

    beforeEach(() => {
        metrics.reset();
        store = new ScriptedVersionedStore();
        sleeps = [];
        resolver = new ConflictResolver(store, {
            maxAttempts: 3,
            minAttemptIntervalMs: 0,
            sleep: async (ms) => { sleeps.push(ms); },
            currentDate: () => COPY_DATE
        });
    });

    async function surfaceConflict(): Promise<SaveConflict> {
        const base = store.seed("doc.txt", "line one\nline two\n");
        store.externalEdit("doc.txt", "line one\nline 2\n");
        return expectConflict(await resolver.save({
            path: "doc.txt",
            localContent: "line one\nline two changed\n",
            baseVersionToken: base,
            ref: "main",
            message: "Edit doc"
        }));
    }

    describe("save", () => {
        it("writes once when the base token is current", async () => {
            const base = store.seed("doc.txt", "hello\n");
            const outcome = await resolver.save({
                path: "doc.txt",
                localContent: "hello world\n",
                baseVersionToken: base,
                ref: "main",
                message: "Edit doc"
            });

            expect(outcome).toEqual({ kind: "success", newVersionToken: "v2" });
            expect(store.peek("doc.txt")?.content).toBe("hello world\n");
            expect(store.writes).toHaveLength(1);
        });

        it("surfaces the first conflict with a positional diff", async () => {
            const conflict = await surfaceConflict();

            expect(conflict.remoteContent).toBe("line one\nline 2\n");
            expect(conflict.remoteVersionToken).toBe("v2");
            expect(conflict.localContent).toBe("line one\nline two changed\n");
            expect(conflict.conflictedLineNumbers).toEqual([1]);
            expect(conflict.diff[1]).toEqual({
                kind: "modified",
                lineIndex: 1,
                localText: "line two changed",
                remoteText: "line 2"
            });
            expect(store.writes).toHaveLength(1);
            expect(metrics.counter("sync.conflicts.detected")).toBe(1);
        });

        it("retries up to the attempt limit under the retry policy", async () => {
            const base = store.seed("doc.txt", "v1 content");
            store.forceConflicts(3);

            const outcome = await resolver.save({
                path: "doc.txt",
                localContent: "mine",
                baseVersionToken: base,
                ref: "main",
                message: "Edit doc",
                conflictPolicy: "retry"
            });

            expect(outcome).toEqual({
                kind: "error",
                code: "retry-exhausted",
                message: "Version conflict persisted after 3 attempts on doc.txt",
                attempts: 3
            });
            expect(store.writes).toHaveLength(3);
            expect(store.reads).toHaveLength(2);
            expect(metrics.counter("sync.retries")).toBe(2);
        });

        it("does not retry transport failures", async () => {
            const base = store.seed("doc.txt", "hello\n");
            store.failNextWrite(new Error("connection reset"));

            const outcome = await resolver.save({
                path: "doc.txt",
                localContent: "bye\n",
                baseVersionToken: base,
                ref: "main",
                message: "Edit doc",
                conflictPolicy: "retry"
            });

            expect(outcome).toEqual({ kind: "error", code: "transport", message: "connection reset", attempts: 1 });
            expect(store.writes).toHaveLength(1);
            expect(store.reads).toHaveLength(0);
        });

        it("reports a transport error when the remote cannot be fetched after a conflict", async () => {
            const base = store.seed("doc.txt", "hello\n");
            store.externalEdit("doc.txt", "hi\n");
            store.failNextRead(new Error("timeout"));

            const outcome = await resolver.save({
                path: "doc.txt",
                localContent: "bye\n",
                baseVersionToken: base,
                ref: "main",
                message: "Edit doc"
            });

            expect(outcome).toEqual({
                kind: "error",
                code: "transport",
                message: "Failed to fetch remote version: timeout",
                attempts: 1
            });
        });

        it("does nothing when cancelled before starting", async () => {
            const base = store.seed("doc.txt", "hello\n");
            const controller = new AbortController();
            controller.abort();

            const outcome = await resolver.save({
                path: "doc.txt",
                localContent: "bye\n",
                baseVersionToken: base,
                ref: "main",
                message: "Edit doc",
                signal: controller.signal
            });

            expect(outcome).toEqual({
                kind: "error",
                code: "cancelled",
                message: "Save cancelled before the write was attempted",
                attempts: 0
            });
            expect(store.writes).toHaveLength(0);
        });

        it("stops when cancelled while waiting to retry", async () => {
            const controller = new AbortController();
            const cancelling = new ConflictResolver(store, {
                minAttemptIntervalMs: 500,
                now: () => 0,
                sleep: async () => {
                    controller.abort();
                    throw new OperationCancelledError();
                }
            });
            const base = store.seed("doc.txt", "hello\n");
            store.forceConflicts(5);

            const outcome = await cancelling.save({
                path: "doc.txt",
                localContent: "bye\n",
                baseVersionToken: base,
                ref: "main",
                message: "Edit doc",
                signal: controller.signal,
                conflictPolicy: "retry"
            });

            expect(outcome).toEqual({
                kind: "error",
                code: "cancelled",
                message: "Save cancelled while waiting to retry",
                attempts: 1
            });
            expect(store.writes).toHaveLength(1);
        });

        it("keeps consecutive attempt starts apart by the minimum interval", async () => {
            let clock = 0;
            const spaced = new ConflictResolver(store, {
                minAttemptIntervalMs: 500,
                now: () => clock,
                sleep: async (ms) => {
                    sleeps.push(ms);
                    clock += ms;
                }
            });
            store.onWrite = () => { clock += 200; };
            const base = store.seed("doc.txt", "hello\n");
            store.forceConflicts(1);

            const outcome = await spaced.save({
                path: "doc.txt",
                localContent: "bye\n",
                baseVersionToken: base,
                ref: "main",
                message: "Edit doc",
                conflictPolicy: "retry"
            });

            expect(outcome.kind).toBe("success");
            expect(sleeps).toEqual([300]);
            expect(clock).toBe(700);
        });
    });

    describe("resolution strategies", () => {
        it("keep-mine writes the local content over the remote", async () => {
            const conflict = await surfaceConflict();
            const outcome = await resolver.keepMine(conflict);

            expect(outcome).toEqual({ kind: "success", newVersionToken: "v3" });
            expect(store.peek("doc.txt")?.content).toBe("line one\nline two changed\n");
            expect(store.writes[1].versionToken).toBe("v2");
        });

        it("keep-mine gives up after the attempt limit", async () => {
            const conflict = await surfaceConflict();
            store.forceConflicts(3);
            const writesBefore = store.writes.length;
            const readsBefore = store.reads.length;

            const outcome = await resolver.keepMine(conflict);

            expect(outcome.kind).toBe("error");
            expect(outcome.kind === "error" && outcome.code).toBe("retry-exhausted");
            expect(store.writes.length - writesBefore).toBe(3);
            expect(store.reads.length - readsBefore).toBe(2);
        });

        it("keep-theirs returns the remote token without writing", async () => {
            const conflict = await surfaceConflict();
            const outcome = await resolver.keepTheirs(conflict);

            expect(outcome).toEqual({
                kind: "success",
                newVersionToken: "v2",
                message: "Local changes discarded. File reverted to remote version."
            });
            expect(store.writes).toHaveLength(1);
        });

        it("manual merge writes the merged text", async () => {
            const conflict = await surfaceConflict();
            const outcome = await resolver.resolve(conflict, { type: "manual-merge", mergedContent: "line one\nline 2 changed\n" });

            expect(outcome.kind).toBe("success");
            expect(store.peek("doc.txt")?.content).toBe("line one\nline 2 changed\n");
        });

        it("manual merge retries past a fresh conflict instead of surfacing it", async () => {
            const conflict = await surfaceConflict();
            store.forceConflicts(1);

            const outcome = await resolver.manualMerge(conflict, "line one\nmerged\n");

            expect(outcome).toEqual({ kind: "success", newVersionToken: "v3" });
            expect(store.writes.map(write => write.versionToken)).toEqual(["v1", "v2", "v2"]);
            expect(store.peek("doc.txt")?.content).toBe("line one\nmerged\n");
        });

        it("save-as-copy writes the local content to a new path", async () => {
            const conflict = await surfaceConflict();
            const outcome = await resolver.resolve(conflict, { type: "save-as-copy" });

            expect(outcome).toEqual({
                kind: "success",
                newVersionToken: "v3",
                message: "Local changes saved as: doc.conflict-2024-01-15-090507.txt",
                savedPath: "doc.conflict-2024-01-15-090507.txt"
            });
            expect(store.peek("doc.conflict-2024-01-15-090507.txt")?.content).toBe("line one\nline two changed\n");
            expect(store.peek("doc.txt")?.content).toBe("line one\nline 2\n");
            expect(store.writes[1].versionToken).toBeNull();
        });

        it("save-as-copy fails without retrying when the copy path is taken", async () => {
            const conflict = await surfaceConflict();
            store.seed("doc.conflict-2024-01-15-090507.txt", "taken");

            const outcome = await resolver.saveAsCopy(conflict);

            expect(outcome.kind).toBe("error");
            expect(outcome.kind === "error" && outcome.code).toBe("transport");
            expect(outcome.kind === "error" && outcome.message)
                .toBe("Failed to create copy: doc.conflict-2024-01-15-090507.txt already exists");
            expect(store.writes).toHaveLength(2);
        });

        it("save-as-copy keeps transport failures apart from a taken path", async () => {
            const conflict = await surfaceConflict();
            store.failNextWrite(new Error("connection reset"));

            const outcome = await resolver.saveAsCopy(conflict);

            expect(outcome).toEqual({
                kind: "error",
                code: "transport",
                message: "Failed to create copy doc.conflict-2024-01-15-090507.txt: connection reset",
                attempts: 1
            });
        });
    });
});

describe("deriveCopyPath", () => {
    it("inserts the timestamp before the extension", () => {
        expect(deriveCopyPath("src/app/main.ts", COPY_DATE)).toBe("src/app/main.conflict-2024-01-15-090507.ts");
        expect(deriveCopyPath("archive.tar.gz", COPY_DATE)).toBe("archive.tar.conflict-2024-01-15-090507.gz");
    });

    it("appends the timestamp to dotfiles and names without an extension", () => {
        expect(deriveCopyPath(".env", COPY_DATE)).toBe(".env.conflict-2024-01-15-090507");
        expect(deriveCopyPath("build/Makefile", COPY_DATE)).toBe("build/Makefile.conflict-2024-01-15-090507");
    });
});
