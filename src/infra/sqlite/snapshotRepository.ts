import { db } from "../../db.js";
import { MetricPoint, StatsReport } from "../../domain/models.js";
import { SnapshotRepository } from "../../domain/ports/snapshotRepository.js";

interface PointRow {
    measurement: string;
    value: number;
}

export class SqliteSnapshotRepository implements SnapshotRepository {
    save(points: MetricPoint[]): void {
        if (!points.length) return;
        const insert = db.prepare<[string, string, string, number]>(
            `INSERT INTO metric_points (username, measurement, time, value)
             VALUES (?,?,?,?)`,
        );
        db.transaction(() => {
            for (const p of points) {
                insert.run(p.tags.user, p.measurement, p.time, p.fields.value);
            }
        });
    }

    latest(username: string): StatsReport | null {
        const timeRow = db
            .prepare<[string]>(
                "SELECT MAX(time) AS time FROM metric_points WHERE username=?",
            )
            .get(username) as { time: string | null } | undefined;
        if (!timeRow?.time) return null;

        const rows = db
            .prepare<[string, string]>(
                "SELECT measurement, value FROM metric_points WHERE username=? AND time=? ORDER BY id",
            )
            .all(username, timeRow.time) as PointRow[];
        const report: StatsReport = new Map();
        for (const row of rows) report.set(row.measurement, row.value);
        return report;
    }
}
