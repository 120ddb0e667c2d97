import * as fs from "fs";
import * as path from "path";
import { SyncConfig, VersionedStore } from "../types.js";
import { NodeFileSystem } from "../platform/FileSystem.js";
import { FileSystemVersionedStore } from "./FileSystemVersionedStore.js";
import { SqliteVersionedStore } from "./SqliteVersionedStore.js";

export interface ManagedStore {
    store: VersionedStore;
    close(): void;
}

export function createStoreFromConfig(config: SyncConfig): ManagedStore {
    if (config.store === "filesystem") {
        return {
            store: new FileSystemVersionedStore(new NodeFileSystem(config.rootPath)),
            close: () => undefined
        };
    }

    if (config.databasePath !== ":memory:") {
        fs.mkdirSync(path.dirname(config.databasePath), { recursive: true });
    }
    const store = SqliteVersionedStore.open(config.databasePath);
    return { store, close: () => store.close() };
}
