import { config as defaultConfig, Config, validateConfig } from "./config.js";
import { closeDb, setDbPath } from "./db.js";
import { logger, setDebugLogging } from "./logger.js";
import { createMigrationRunner } from "./migrations.js";
import { StatsCollector } from "./application/statsCollector.js";
import { diffReports, formatReport, toPoints } from "./application/report.js";
import { StatsSource } from "./domain/ports/statsSource.js";
import { SnapshotRepository } from "./domain/ports/snapshotRepository.js";
import { FakeStatsSource } from "./infra/fake/fakeStatsSource.js";
import { SqliteSnapshotRepository } from "./infra/sqlite/snapshotRepository.js";
import { TwitterStatsSource } from "./infra/twitter/twitterStatsSource.js";

export interface JobDeps {
    config?: Config;
    source?: StatsSource;
    repo?: SnapshotRepository;
    print?: (line: string) => void;
}

function createSource(cfg: Config): StatsSource {
    if (cfg.useFakeSource) return new FakeStatsSource();
    return new TwitterStatsSource({
        appKey: cfg.x.appKey,
        appSecret: cfg.x.appSecret,
        accessToken: cfg.x.accessToken,
        accessSecret: cfg.x.accessSecret,
    });
}

/** One collection run. Resolves to the process exit status. */
export async function runJob(deps: JobDeps = {}): Promise<number> {
    const cfg = deps.config ?? defaultConfig;
    const print =
        deps.print ?? ((line: string) => process.stdout.write(`${line}\n`));
    setDebugLogging(cfg.debugVerbose);

    try {
        validateConfig(cfg);
    } catch (e) {
        logger.error("Invalid configuration", { error: String(e) });
        return 1;
    }

    try {
        setDbPath(cfg.dbPath);
        await createMigrationRunner().runMigrations();

        const repo = deps.repo ?? new SqliteSnapshotRepository();
        const collector = new StatsCollector({
            source: deps.source ?? createSource(cfg),
            config: {
                username: cfg.x.username,
                maxTimelineTweets: cfg.maxTimelineTweets,
            },
        });

        const { user, report, collectedAt } = await collector.collect();
        const points = toPoints(report, user.username, collectedAt);
        const previous = repo.latest(user.username);
        repo.save(points);

        if (cfg.outputFormat === "text") {
            print(
                formatReport(
                    user.username,
                    report,
                    diffReports(report, previous),
                ),
            );
        } else {
            print(JSON.stringify(points));
        }
        return 0;
    } catch (e) {
        logger.error("Collection failed", {
            error: e instanceof Error ? e.name : "Error",
            message: e instanceof Error ? e.message : String(e),
        });
        return 1;
    } finally {
        closeDb();
    }
}
