import { promises as fs } from "node:fs";
import path from "node:path";
import { db } from "./db.js";
import { logger } from "./logger.js";

export class MigrationRunner {
    constructor(private migrationsDir: string) {}

    async runMigrations(): Promise<string[]> {
        this.ensureMigrationsTable();
        const files = await this.getMigrationFiles();
        const applied: string[] = [];
        for (const file of files) {
            const name = path.basename(file);
            if (this.hasRun(name)) continue;
            await this.runSingle(file, name);
            applied.push(name);
        }
        return applied;
    }

    private ensureMigrationsTable() {
        db.exec(
            "CREATE TABLE IF NOT EXISTS migrations (name TEXT PRIMARY KEY, executed_at TEXT DEFAULT CURRENT_TIMESTAMP)",
        );
    }

    private async getMigrationFiles(): Promise<string[]> {
        try {
            const entries = await fs.readdir(this.migrationsDir);
            return entries
                .filter((f) => f.endsWith(".sql"))
                .sort()
                .map((f) => path.join(this.migrationsDir, f));
        } catch (e) {
            if (isErrnoException(e) && e.code === "ENOENT") return [];
            throw e;
        }
    }

    private hasRun(name: string): boolean {
        const row = db
            .prepare<[string]>(
                "SELECT 1 AS found FROM migrations WHERE name = ? LIMIT 1",
            )
            .get(name);
        return row !== undefined;
    }

    private async runSingle(filePath: string, name: string) {
        const sql = await fs.readFile(filePath, "utf8");
        db.exec("BEGIN");
        try {
            db.exec(sql);
            db.prepare<[string]>("INSERT INTO migrations (name) VALUES (?)").run(
                name,
            );
            db.exec("COMMIT");
            logger.info("Applied migration", { name });
        } catch (e) {
            db.exec("ROLLBACK");
            throw e;
        }
    }
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
    return e instanceof Error && "code" in e;
}

export function createMigrationRunner(
    dir = path.resolve(process.cwd(), "migrations"),
): MigrationRunner {
    return new MigrationRunner(dir);
}
