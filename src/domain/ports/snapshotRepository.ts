import { MetricPoint, StatsReport } from "../models.js";

export interface SnapshotRepository {
    save(points: MetricPoint[]): void;
    /** Report of the newest stored run for `username`. */
    latest(username: string): StatsReport | null;
}
