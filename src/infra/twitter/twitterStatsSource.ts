import {
    TwitterApi,
    TweetV2,
    TweetV2UserTimelineResult,
    UserV2,
    UserV2Result,
} from "twitter-api-v2";
import {
    AuthenticationError,
    NetworkError,
    NotFoundError,
    RateLimitExceededError,
} from "../../domain/errors.js";
import {
    Credentials,
    TimelinePage,
    TimelineTweet,
    UserProfile,
} from "../../domain/models.js";
import {
    StatsSource,
    TimelinePageRequest,
} from "../../domain/ports/statsSource.js";
import { logger } from "../../logger.js";
import { toIso } from "../../util/time.js";
import { Endpoint, RateControl, parseRate } from "./rateControl.js";

const USER_FIELDS = "public_metrics,username,name";
const TWEET_FIELDS = "public_metrics,created_at";

const NETWORK_CODES = new Set([
    "ECONNRESET",
    "ECONNREFUSED",
    "ENOTFOUND",
    "EAI_AGAIN",
    "ETIMEDOUT",
    "EPIPE",
]);

export class TwitterStatsSource implements StatsSource {
    private client: TwitterApi;
    private rates: RateControl;

    constructor(
        credentials: Credentials,
        opts: { client?: TwitterApi; rates?: RateControl } = {},
    ) {
        this.client = opts.client ?? new TwitterApi({ ...credentials });
        this.rates =
            opts.rates ?? new RateControl(tokenOwner(credentials.accessToken));
    }

    async authenticate(): Promise<UserProfile> {
        const res = await this.call("me", "authenticate", () =>
            this.client.v2.get<UserV2Result>(
                "users/me",
                { "user.fields": USER_FIELDS },
                { fullResponse: true },
            ),
        );
        if (!res.data.data) {
            throw new AuthenticationError(
                "Authenticated account could not be read",
            );
        }
        const user = toProfile(res.data.data);
        logger.info("[X] Authenticated", {
            component: "TwitterStatsSource",
            action: "authenticate",
            username: user.username,
        });
        return user;
    }

    async lookupUser(username: string): Promise<UserProfile> {
        const res = await this.call("user", "lookupUser", () =>
            this.client.v2.get<UserV2Result>(
                "users/by/username/:username",
                { "user.fields": USER_FIELDS },
                { params: { username }, fullResponse: true },
            ),
        );
        // unknown handles come back as 200 with an `errors` array
        if (!res.data.data) {
            throw new NotFoundError(`User @${username} not found`);
        }
        return toProfile(res.data.data);
    }

    async timelinePage(
        userId: string,
        request: TimelinePageRequest,
    ): Promise<TimelinePage> {
        const query: Record<string, string> = {
            max_results: String(request.pageSize),
            exclude: "retweets,replies",
            "tweet.fields": TWEET_FIELDS,
        };
        if (request.cursor) query.pagination_token = request.cursor;

        const res = await this.call("timeline", "timelinePage", () =>
            this.client.v2.get<TweetV2UserTimelineResult>(
                "users/:id/tweets",
                query,
                { params: { id: userId }, fullResponse: true },
            ),
        );
        // `data` is omitted on an empty page
        const tweets = (res.data.data ?? []).map(toTimelineTweet);
        const nextCursor = res.data.meta?.next_token;
        logger.debug("[X] Timeline page", {
            component: "TwitterStatsSource",
            action: "timelinePage",
            userId,
            count: tweets.length,
            hasNext: !!nextCursor,
        });
        return nextCursor ? { tweets, nextCursor } : { tweets };
    }

    private async call<T>(
        endpoint: Endpoint,
        action: string,
        fn: () => Promise<T>,
    ): Promise<T> {
        this.rates.guard(endpoint);
        try {
            const res = await fn();
            const state = this.rates.onSuccess(endpoint, res);
            logger.debug("[X] Request done", {
                component: "TwitterStatsSource",
                action,
                remaining: state.remaining,
                reset: state.reset,
            });
            return res;
        } catch (e) {
            const err = classifyError(e);
            const state = this.rates.onError(
                endpoint,
                e,
                err instanceof RateLimitExceededError,
            );
            if (err instanceof RateLimitExceededError) {
                err.resetAt ??= state.reset;
                err.remaining ??= state.remaining;
                err.limit ??= state.limit;
                logger.warn("[X] Rate limited", {
                    component: "TwitterStatsSource",
                    action,
                    endpoint,
                    resetAt: err.resetAt,
                    resetAtIso: toIso(err.resetAt),
                });
            } else {
                logger.error("[X] Request failed", {
                    component: "TwitterStatsSource",
                    action,
                    endpoint,
                    error: String(e),
                });
            }
            throw err;
        }
    }
}

/** OAuth 1.0a access tokens are `<user id>-<secret part>`. */
export function tokenOwner(accessToken: string): string | undefined {
    const match = /^(\d+)-/.exec(accessToken);
    return match?.[1];
}

function count(n: number | undefined): number {
    return n !== undefined && Number.isFinite(n) && n > 0 ? Math.floor(n) : 0;
}

export function toProfile(user: UserV2): UserProfile {
    const m = user.public_metrics;
    return {
        id: user.id,
        username: user.username,
        name: user.name,
        followers: count(m?.followers_count),
        following: count(m?.following_count),
        tweets: count(m?.tweet_count),
        listed: count(m?.listed_count),
    };
}

export function toTimelineTweet(tweet: TweetV2): TimelineTweet {
    const m = tweet.public_metrics;
    return {
        id: tweet.id,
        likes: count(m?.like_count),
        retweets: count(m?.retweet_count),
        replies: count(m?.reply_count),
        quotes: count(m?.quote_count),
    };
}

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === "object" && v !== null;
}

/**
 * Maps a transport failure onto the domain errors. Errors that fit none of
 * them come back unchanged.
 */
export function classifyError(e: unknown): unknown {
    if (
        e instanceof AuthenticationError ||
        e instanceof NetworkError ||
        e instanceof NotFoundError ||
        e instanceof RateLimitExceededError
    ) {
        return e;
    }
    if (!isRecord(e)) return e;

    const message = e instanceof Error ? e.message : String(e);
    const code = e.code;

    if (code === 429 || e.rateLimitError === true) {
        const info = parseRate(e);
        return new RateLimitExceededError(
            message,
            info?.reset,
            info?.remaining,
            info?.limit,
        );
    }
    if (code === 401 || code === 403) {
        return new AuthenticationError(message, code);
    }
    if (code === 404) {
        return new NotFoundError(message);
    }
    if (typeof code === "number" && code >= 500) {
        return new NetworkError(message, code);
    }
    if (e.type === "request" || e.type === "partial-response") {
        return new NetworkError(message);
    }
    if (typeof code === "string" && NETWORK_CODES.has(code)) {
        return new NetworkError(message);
    }
    return e;
}
