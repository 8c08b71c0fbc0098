import { MetricPoint, StatsReport } from "../domain/models.js";
import { toPointTime } from "../util/time.js";

export const PROFILE_METRICS = [
    "followers",
    "following",
    "tweets",
    "listed",
] as const;

export const TIMELINE_METRICS = [
    "timeline_tweets",
    "likes",
    "retweets",
    "replies",
    "quotes",
] as const;

export function createReport(): StatsReport {
    return new Map();
}

export function increment(
    report: StatsReport,
    metric: string,
    amount = 1,
): void {
    if (!Number.isSafeInteger(amount) || amount < 0) {
        throw new RangeError(
            `Metric ${metric} can only grow by a non-negative integer, got ${amount}`,
        );
    }
    report.set(metric, (report.get(metric) ?? 0) + amount);
}

export function get(report: StatsReport, metric: string): number {
    return report.get(metric) ?? 0;
}

export function toPoints(
    report: StatsReport,
    username: string,
    time: Date,
): MetricPoint[] {
    const stamp = toPointTime(time);
    return [...report].map(([measurement, value]) => ({
        measurement,
        tags: { user: username },
        time: stamp,
        fields: { value },
    }));
}

export function diffReports(
    current: StatsReport,
    previous: StatsReport | null,
): Map<string, number> {
    const delta = new Map<string, number>();
    if (!previous) return delta;
    for (const [metric, value] of current) {
        const before = previous.get(metric);
        if (before !== undefined) delta.set(metric, value - before);
    }
    return delta;
}

function signed(n: number): string {
    return n > 0 ? `+${n}` : String(n);
}

export function formatReport(
    username: string,
    report: StatsReport,
    delta?: Map<string, number>,
): string {
    const lines = [`@${username}`];
    for (const [metric, value] of report) {
        const change = delta?.get(metric);
        lines.push(
            change === undefined
                ? `${metric} ${value}`
                : `${metric} ${value} (${signed(change)})`,
        );
    }
    return lines.join("\n");
}
