import type Database from "better-sqlite3";

export type AuditRunKind = "audit" | "lint";

export type AuditRunRecord = {
    id: number;
    kind: AuditRunKind;
    generatedAt: string;
    windowMs: number;
    total: number;
    deadRules: number;
    missingLabels: number;
    conflicts: number;
};

export type NewAuditRun = Omit<AuditRunRecord, "id"> & {
    reportJson: string;
};

type AuditRunRow = {
    id: number;
    kind: AuditRunKind;
    generated_at: string;
    window_ms: number;
    total: number;
    dead_rules: number;
    missing_labels: number;
    conflicts: number;
};

function toModel(row: AuditRunRow): AuditRunRecord {
    return {
        id: row.id,
        kind: row.kind,
        generatedAt: row.generated_at,
        windowMs: row.window_ms,
        total: row.total,
        deadRules: row.dead_rules,
        missingLabels: row.missing_labels,
        conflicts: row.conflicts,
    };
}

export class AuditRunRepository {
    private readonly insertStmt;
    private readonly listRecentStmt;
    private readonly reportJsonStmt;

    constructor(db: Database.Database) {
        this.insertStmt = db.prepare(`
            INSERT INTO audit_runs (kind, generated_at, window_ms, total, dead_rules, missing_labels, conflicts, report_json)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `);
        this.listRecentStmt = db.prepare(`
            SELECT id, kind, generated_at, window_ms, total, dead_rules, missing_labels, conflicts
            FROM audit_runs
            ORDER BY generated_at DESC, id DESC
            LIMIT ?
        `);
        this.reportJsonStmt = db.prepare("SELECT report_json FROM audit_runs WHERE id = ?");
    }

    record(run: NewAuditRun): AuditRunRecord {
        const result = this.insertStmt.run(
            run.kind,
            run.generatedAt,
            run.windowMs,
            run.total,
            run.deadRules,
            run.missingLabels,
            run.conflicts,
            run.reportJson
        );
        const { reportJson: _reportJson, ...summary } = run;
        return { id: Number(result.lastInsertRowid), ...summary };
    }

    listRecent(limit: number): AuditRunRecord[] {
        const rows = this.listRecentStmt.all(limit) as AuditRunRow[];
        return rows.map(toModel);
    }

    reportJson(id: number): string | null {
        const row = this.reportJsonStmt.get(id) as { report_json: string } | undefined;
        return row?.report_json ?? null;
    }
}

export class ActivityLogRepository {
    private readonly insertStmt;

    constructor(db: Database.Database) {
        this.insertStmt = db.prepare("INSERT INTO activity_log (event, payload_json, created_at) VALUES (?, ?, ?)");
    }

    append(event: string, payload: Record<string, unknown>, createdAt: string): void {
        this.insertStmt.run(event, JSON.stringify(payload), createdAt);
    }
}
