export interface Credentials {
    appKey: string;
    appSecret: string;
    accessToken: string;
    accessSecret: string;
}

export interface UserProfile {
    id: string;
    username: string;
    name?: string;
    followers: number;
    following: number;
    tweets: number;
    listed: number;
}

export interface TimelineTweet {
    id: string;
    likes: number;
    retweets: number;
    replies: number;
    quotes: number;
}

export interface TimelinePage {
    tweets: TimelineTweet[];
    nextCursor?: string;
}

/** Metric name to non-negative integer count, in insertion order. */
export type StatsReport = Map<string, number>;

export interface MetricPoint {
    measurement: string;
    tags: { user: string };
    time: string; // YYYY-MM-DDTHH:MM:SSZ
    fields: { value: number };
}
