export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogMeta = Record<string, unknown>;

let debugEnabled = false;

export function setDebugLogging(enabled: boolean): void {
    debugEnabled = enabled;
}

function ts() {
    return new Date().toISOString();
}

function log(level: LogLevel, msg: string, meta?: LogMeta) {
    if (level === "debug" && !debugEnabled) return;
    const base: LogMeta = { t: ts(), level, msg };
    if (meta) Object.assign(base, meta);
    // stdout carries only the report
    console.error(JSON.stringify(base));
}

export const logger = {
    debug: (msg: string, meta?: LogMeta) => log("debug", msg, meta),
    info: (msg: string, meta?: LogMeta) => log("info", msg, meta),
    warn: (msg: string, meta?: LogMeta) => log("warn", msg, meta),
    error: (msg: string, meta?: LogMeta) => log("error", msg, meta),
};
