#!/usr/bin/env node
import "./utils/StdoutGuard.js";
import { PatchSyncServer } from "./index.js";
import { resolveSyncConfigFromEnv } from "./config/SyncConfig.js";
import { createLogger } from "./utils/StructuredLogger.js";

const logger = createLogger("cli");

async function main(): Promise<void> {
    const config = resolveSyncConfigFromEnv();
    const server = new PatchSyncServer({ config });

    const stop = () => {
        server.shutdown()
            .catch(error => logger.error("Shutdown failed", { error: String(error) }))
            .finally(() => process.exit(0));
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);

    await server.run();
}

main().catch(error => {
    logger.error("patch-sync-mcp failed to start", { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
});
