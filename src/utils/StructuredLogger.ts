const ENABLE_DEBUG_LOGS = process.env.PATCH_SYNC_DEBUG === "true";
const ENV_LOG_LEVEL = (process.env.PATCH_SYNC_LOG_LEVEL ?? "").toLowerCase();

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
    debug(message: string, fields?: Record<string, unknown>): void;
    info(message: string, fields?: Record<string, unknown>): void;
    warn(message: string, fields?: Record<string, unknown>): void;
    error(message: string, fields?: Record<string, unknown>): void;
}

const levelPriority: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(levelPriority, value);
}

export function createLogger(component: string): Logger {
    const configuredLevel: LogLevel = isLogLevel(ENV_LOG_LEVEL)
        ? ENV_LOG_LEVEL
        : (ENABLE_DEBUG_LOGS ? "debug" : "info");
    const log = (level: LogLevel, message: string, fields?: Record<string, unknown>) => {
        if (levelPriority[level] < levelPriority[configuredLevel]) {
            return;
        }
        const payload = {
            timestamp: new Date().toISOString(),
            level,
            component,
            message,
            ...(fields ?? {})
        };
        const sink = level === "error" ? console.error
            : level === "warn" ? console.warn
            : level === "debug" ? console.debug
            : console.info;
        sink(payload);
    };

    return {
        debug: (message, fields) => log("debug", message, fields),
        info: (message, fields) => log("info", message, fields),
        warn: (message, fields) => log("warn", message, fields),
        error: (message, fields) => log("error", message, fields)
    };
}
