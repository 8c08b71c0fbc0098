import { NotFoundError } from "../../domain/errors.js";
import { TimelinePage, TimelineTweet, UserProfile } from "../../domain/models.js";
import {
    StatsSource,
    TimelinePageRequest,
} from "../../domain/ports/statsSource.js";
import { logger } from "../../logger.js";

const DEFAULT_ACCOUNT: UserProfile = {
    id: "fake-1",
    username: "fake_account",
    name: "Fake Account",
    followers: 1200,
    following: 180,
    tweets: 42,
    listed: 7,
};

function defaultTimeline(): TimelineTweet[] {
    return Array.from({ length: 12 }, (_, i) => ({
        id: `fake-tweet-${i + 1}`,
        likes: 10 + i,
        retweets: i % 3,
        replies: i % 2,
        quotes: i === 0 ? 1 : 0,
    }));
}

/** In-memory source for dry runs; cursors are offsets into the timeline. */
export class FakeStatsSource implements StatsSource {
    constructor(
        private readonly account: UserProfile = DEFAULT_ACCOUNT,
        private readonly timeline: TimelineTweet[] = defaultTimeline(),
    ) {}

    async authenticate(): Promise<UserProfile> {
        logger.info("[FAKE] Authenticated", { username: this.account.username });
        return this.account;
    }

    async lookupUser(username: string): Promise<UserProfile> {
        if (username.toLowerCase() !== this.account.username.toLowerCase()) {
            throw new NotFoundError(`User @${username} not found`);
        }
        return this.account;
    }

    async timelinePage(
        userId: string,
        request: TimelinePageRequest,
    ): Promise<TimelinePage> {
        if (userId !== this.account.id) return { tweets: [] };
        const start = request.cursor ? Number(request.cursor) : 0;
        const end = start + request.pageSize;
        const tweets = this.timeline.slice(start, end);
        return end < this.timeline.length
            ? { tweets, nextCursor: String(end) }
            : { tweets };
    }
}
