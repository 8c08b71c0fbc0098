import { StatsReport, UserProfile } from "../domain/models.js";
import { StatsSource } from "../domain/ports/statsSource.js";
import { logger } from "../logger.js";
import {
    PROFILE_METRICS,
    TIMELINE_METRICS,
    createReport,
    increment,
} from "./report.js";

export interface CollectorConfig {
    username?: string;
    maxTimelineTweets: number;
}

export interface CollectionResult {
    user: UserProfile;
    report: StatsReport;
    collectedAt: Date;
}

const MAX_PAGE_SIZE = 100;
const MIN_PAGE_SIZE = 5;

export class StatsCollector {
    constructor(
        private readonly deps: {
            source: StatsSource;
            config: CollectorConfig;
        },
    ) {}

    async collect(): Promise<CollectionResult> {
        const { source, config } = this.deps;
        const collectedAt = new Date();

        const me = await source.authenticate();
        const user = await this.resolveTarget(me);

        const report = createReport();
        for (const metric of PROFILE_METRICS) {
            increment(report, metric, user[metric]);
        }

        if (config.maxTimelineTweets > 0) {
            await this.collectTimeline(user, report);
        }

        logger.info("Collection complete", {
            username: user.username,
            metrics: report.size,
        });
        return { user, report, collectedAt };
    }

    private async resolveTarget(me: UserProfile): Promise<UserProfile> {
        const wanted = this.deps.config.username?.replace(/^@/, "");
        if (!wanted || wanted.toLowerCase() === me.username.toLowerCase()) {
            return me;
        }
        return this.deps.source.lookupUser(wanted);
    }

    private async collectTimeline(
        user: UserProfile,
        report: StatsReport,
    ): Promise<void> {
        const max = this.deps.config.maxTimelineTweets;
        // timeline metrics are reported even when the timeline is empty
        for (const metric of TIMELINE_METRICS) {
            increment(report, metric, 0);
        }

        let read = 0;
        let cursor: string | undefined;
        let pages = 0;
        do {
            const remaining = max - read;
            const page = await this.deps.source.timelinePage(user.id, {
                cursor,
                pageSize: Math.min(
                    MAX_PAGE_SIZE,
                    Math.max(MIN_PAGE_SIZE, remaining),
                ),
            });
            pages++;
            for (const tweet of page.tweets.slice(0, remaining)) {
                increment(report, "timeline_tweets");
                increment(report, "likes", tweet.likes);
                increment(report, "retweets", tweet.retweets);
                increment(report, "replies", tweet.replies);
                increment(report, "quotes", tweet.quotes);
                read++;
            }
            cursor = page.tweets.length ? page.nextCursor : undefined;
        } while (cursor && read < max);

        logger.debug("Timeline read", { username: user.username, read, pages });
    }
}
