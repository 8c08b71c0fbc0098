import { describe, it, expect, vi } from "vitest";
import { StatsCollector } from "../src/application/statsCollector.js";
import {
    AuthenticationError,
    RateLimitExceededError,
} from "../src/domain/errors.js";
import { TimelineTweet, UserProfile } from "../src/domain/models.js";
import { StatsSource } from "../src/domain/ports/statsSource.js";

function makeUser(
    username: string,
    overrides: Partial<UserProfile> = {},
): UserProfile {
    return {
        id: `id-${username}`,
        username,
        followers: 250,
        following: 40,
        tweets: 900,
        listed: 3,
        ...overrides,
    };
}

function makeTweet(id: string, likes: number, retweets = 0): TimelineTweet {
    return { id, likes, retweets, replies: 1, quotes: 0 };
}

const makeSource = () =>
    ({
        authenticate: vi.fn(),
        lookupUser: vi.fn(),
        timelinePage: vi.fn(),
    }) as unknown as StatsSource;

describe("StatsCollector", () => {
    it("reports the authenticated account when no username is configured", async () => {
        const source = makeSource();
        vi.mocked(source.authenticate).mockResolvedValue(makeUser("me"));

        const collector = new StatsCollector({
            source,
            config: { maxTimelineTweets: 0 },
        });
        const { user, report } = await collector.collect();

        expect(user.username).toBe("me");
        expect([...report]).toEqual([
            ["followers", 250],
            ["following", 40],
            ["tweets", 900],
            ["listed", 3],
        ]);
        expect(source.lookupUser).not.toHaveBeenCalled();
        expect(source.timelinePage).not.toHaveBeenCalled();
    });

    it("looks up a configured username other than the authenticated one", async () => {
        const source = makeSource();
        vi.mocked(source.authenticate).mockResolvedValue(makeUser("me"));
        vi.mocked(source.lookupUser).mockResolvedValue(
            makeUser("target", { followers: 7 }),
        );

        const collector = new StatsCollector({
            source,
            config: { username: "@target", maxTimelineTweets: 0 },
        });
        const { user, report } = await collector.collect();

        expect(source.authenticate).toHaveBeenCalledTimes(1);
        expect(source.lookupUser).toHaveBeenCalledWith("target");
        expect(user.id).toBe("id-target");
        expect(report.get("followers")).toBe(7);
    });

    it("skips the lookup when the username is the authenticated one", async () => {
        const source = makeSource();
        vi.mocked(source.authenticate).mockResolvedValue(makeUser("Me"));

        const collector = new StatsCollector({
            source,
            config: { username: "me", maxTimelineTweets: 0 },
        });
        await collector.collect();

        expect(source.lookupUser).not.toHaveBeenCalled();
    });

    it("sums timeline metrics across pages following the cursor", async () => {
        const source = makeSource();
        vi.mocked(source.authenticate).mockResolvedValue(makeUser("me"));
        vi.mocked(source.timelinePage)
            .mockResolvedValueOnce({
                tweets: [makeTweet("t1", 5, 1), makeTweet("t2", 3)],
                nextCursor: "c2",
            })
            .mockResolvedValueOnce({ tweets: [makeTweet("t3", 10, 2)] });

        const collector = new StatsCollector({
            source,
            config: { maxTimelineTweets: 50 },
        });
        const { report } = await collector.collect();

        expect(source.timelinePage).toHaveBeenCalledTimes(2);
        expect(source.timelinePage).toHaveBeenNthCalledWith(1, "id-me", {
            cursor: undefined,
            pageSize: 50,
        });
        expect(source.timelinePage).toHaveBeenNthCalledWith(2, "id-me", {
            cursor: "c2",
            pageSize: 48,
        });
        expect(report.get("timeline_tweets")).toBe(3);
        expect(report.get("likes")).toBe(18);
        expect(report.get("retweets")).toBe(3);
        expect(report.get("replies")).toBe(3);
        expect(report.get("quotes")).toBe(0);
    });

    it("stops at the cap and ignores tweets past it", async () => {
        const source = makeSource();
        vi.mocked(source.authenticate).mockResolvedValue(makeUser("me"));
        vi.mocked(source.timelinePage).mockResolvedValue({
            tweets: [
                makeTweet("t1", 1),
                makeTweet("t2", 2),
                makeTweet("t3", 4),
                makeTweet("t4", 8),
                makeTweet("t5", 16),
            ],
            nextCursor: "more",
        });

        const collector = new StatsCollector({
            source,
            config: { maxTimelineTweets: 3 },
        });
        const { report } = await collector.collect();

        expect(source.timelinePage).toHaveBeenCalledTimes(1);
        expect(source.timelinePage).toHaveBeenCalledWith("id-me", {
            cursor: undefined,
            pageSize: 5,
        });
        expect(report.get("timeline_tweets")).toBe(3);
        expect(report.get("likes")).toBe(7);
    });

    it("reports zero timeline metrics for an empty timeline", async () => {
        const source = makeSource();
        vi.mocked(source.authenticate).mockResolvedValue(makeUser("me"));
        vi.mocked(source.timelinePage).mockResolvedValue({
            tweets: [],
            nextCursor: "ignored",
        });

        const collector = new StatsCollector({
            source,
            config: { maxTimelineTweets: 200 },
        });
        const { report } = await collector.collect();

        expect(source.timelinePage).toHaveBeenCalledTimes(1);
        expect(report.get("timeline_tweets")).toBe(0);
        expect(report.get("likes")).toBe(0);
    });

    it("propagates authentication failures without retrying", async () => {
        const source = makeSource();
        vi.mocked(source.authenticate).mockRejectedValue(
            new AuthenticationError("bad token", 401),
        );

        const collector = new StatsCollector({
            source,
            config: { maxTimelineTweets: 10 },
        });

        await expect(collector.collect()).rejects.toBeInstanceOf(
            AuthenticationError,
        );
        expect(source.authenticate).toHaveBeenCalledTimes(1);
        expect(source.timelinePage).not.toHaveBeenCalled();
    });

    it("propagates a rate limit hit mid-timeline", async () => {
        const source = makeSource();
        vi.mocked(source.authenticate).mockResolvedValue(makeUser("me"));
        vi.mocked(source.timelinePage)
            .mockResolvedValueOnce({
                tweets: [makeTweet("t1", 1)],
                nextCursor: "c2",
            })
            .mockRejectedValueOnce(
                new RateLimitExceededError("limited", 1_700_000_900, 0, 900),
            );

        const collector = new StatsCollector({
            source,
            config: { maxTimelineTweets: 100 },
        });

        await expect(collector.collect()).rejects.toBeInstanceOf(
            RateLimitExceededError,
        );
        expect(source.timelinePage).toHaveBeenCalledTimes(2);
    });
});
