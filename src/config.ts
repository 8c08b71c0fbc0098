import dotenv from "dotenv";
import { ConfigError } from "./domain/errors.js";

dotenv.config();

export type Env = Record<string, string | undefined>;
export type OutputFormat = "json" | "text";

function str(env: Env, ...names: string[]): string {
    for (const name of names) {
        const raw = env[name];
        if (raw) return raw;
    }
    return "";
}

function num(env: Env, name: string, def: number): number {
    const raw = env[name];
    if (!raw) return def;
    const n = Number(raw);
    return Number.isFinite(n) ? n : def;
}

function bool(env: Env, name: string): boolean {
    return (env[name] || "false").toLowerCase() === "true";
}

export interface Config {
    x: {
        appKey: string;
        appSecret: string;
        accessToken: string;
        accessSecret: string;
        username?: string;
    };

    maxTimelineTweets: number;
    outputFormat: OutputFormat;
    dbPath: string;
    useFakeSource: boolean;
    debugVerbose: boolean;
}

export function loadConfig(env: Env = process.env): Config {
    const format = str(env, "OUTPUT_FORMAT").toLowerCase();
    return {
        // lowercase names are accepted for older container setups
        x: {
            appKey: str(env, "X_APP_KEY", "api_key"),
            appSecret: str(env, "X_APP_SECRET", "api_secret"),
            accessToken: str(env, "X_ACCESS_TOKEN", "access_token"),
            accessSecret: str(env, "X_ACCESS_SECRET", "access_secret"),
            username: str(env, "X_USERNAME", "username") || undefined,
        },

        maxTimelineTweets: Math.max(
            0,
            Math.floor(num(env, "MAX_TIMELINE_TWEETS", 100)),
        ),
        outputFormat: format === "text" ? "text" : "json",
        dbPath: str(env, "DB_PATH") || "./data/stats.sqlite.db",
        useFakeSource: bool(env, "USE_FAKE_SOURCE"),
        debugVerbose: bool(env, "DEBUG_VERBOSE"),
    };
}

export const config: Config = loadConfig();

export function validateConfig(cfg: Config = config): void {
    if (cfg.useFakeSource) return;
    const missing: string[] = [];
    if (!cfg.x.appKey) missing.push("X_APP_KEY");
    if (!cfg.x.appSecret) missing.push("X_APP_SECRET");
    if (!cfg.x.accessToken) missing.push("X_ACCESS_TOKEN");
    if (!cfg.x.accessSecret) missing.push("X_ACCESS_SECRET");
    if (missing.length) {
        throw new ConfigError(`Missing required env: ${missing.join(",")}`);
    }
}
