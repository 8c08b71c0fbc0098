import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { config } from "./config.js";

export type BetterSqlite3Database = Database.Database;
export type BetterSqlite3Statement<TArgs extends unknown[] = unknown[]> =
    Database.Statement<TArgs>;

let currentDb: BetterSqlite3Database | null = null;
let currentPath = config.dbPath;

function applyPragmas(conn: BetterSqlite3Database) {
    conn.pragma("journal_mode = WAL");
    conn.pragma("synchronous = NORMAL");
    conn.pragma("busy_timeout = 5000");
}

function ensureConnection(): BetterSqlite3Database {
    if (!currentDb) {
        if (currentPath !== ":memory:") {
            fs.mkdirSync(path.dirname(currentPath), { recursive: true });
        }
        const db = new Database(currentPath);
        applyPragmas(db);
        currentDb = db;
    }
    return currentDb;
}

export function setDbPath(newPath: string): void {
    closeDb();
    currentPath = newPath;
}

export function closeDb(): void {
    if (currentDb) {
        currentDb.close();
        currentDb = null;
    }
}

export const db = {
    exec(sql: string): void {
        ensureConnection().exec(sql);
    },
    prepare<T extends unknown[] = unknown[]>(
        sql: string,
    ): BetterSqlite3Statement<T> {
        return ensureConnection().prepare(
            sql,
        ) as unknown as BetterSqlite3Statement<T>;
    },
    transaction<T>(fn: () => T): T {
        return ensureConnection().transaction(fn)();
    },
    get raw(): BetterSqlite3Database {
        return ensureConnection();
    },
};
