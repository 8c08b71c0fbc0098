import { TimelinePage, UserProfile } from "../models.js";

export interface TimelinePageRequest {
    cursor?: string;
    pageSize: number; // 5..100
}

export interface StatsSource {
    /** Verifies the credentials and returns the authenticated account. */
    authenticate(): Promise<UserProfile>;
    lookupUser(username: string): Promise<UserProfile>;
    timelinePage(
        userId: string,
        request: TimelinePageRequest,
    ): Promise<TimelinePage>;
}
