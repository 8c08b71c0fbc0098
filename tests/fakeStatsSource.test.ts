import { describe, it, expect } from "vitest";
import { FakeStatsSource } from "../src/infra/fake/fakeStatsSource.js";
import { NotFoundError } from "../src/domain/errors.js";

describe("FakeStatsSource", () => {
    it("pages the canned timeline by offset", async () => {
        const source = new FakeStatsSource();
        const me = await source.authenticate();

        const first = await source.timelinePage(me.id, { pageSize: 10 });
        expect(first.tweets).toHaveLength(10);
        expect(first.nextCursor).toBe("10");

        const last = await source.timelinePage(me.id, {
            cursor: first.nextCursor,
            pageSize: 10,
        });
        expect(last.tweets.map((t) => t.id)).toEqual([
            "fake-tweet-11",
            "fake-tweet-12",
        ]);
        expect(last.nextCursor).toBeUndefined();
    });

    it("only knows its own account", async () => {
        const source = new FakeStatsSource();
        expect((await source.lookupUser("FAKE_ACCOUNT")).id).toBe("fake-1");
        await expect(source.lookupUser("someone")).rejects.toBeInstanceOf(
            NotFoundError,
        );
        expect(await source.timelinePage("other", { pageSize: 5 })).toEqual({
            tweets: [],
        });
    });
});
