import type Database from "better-sqlite3";

type Migration = {
    id: string;
    statements: string[];
};

const migrations: Migration[] = [
    {
        id: "001_audit_history",
        statements: [
            `
            CREATE TABLE IF NOT EXISTS audit_runs (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                kind TEXT NOT NULL CHECK(kind IN ('audit', 'lint')),
                generated_at TEXT NOT NULL,
                window_ms INTEGER NOT NULL,
                total INTEGER NOT NULL,
                dead_rules INTEGER NOT NULL,
                missing_labels INTEGER NOT NULL,
                conflicts INTEGER NOT NULL,
                report_json TEXT NOT NULL
            )
            `,
            `
            CREATE INDEX IF NOT EXISTS idx_audit_runs_generated_at ON audit_runs(generated_at)
            `,
            `
            CREATE TABLE IF NOT EXISTS activity_log (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                event TEXT NOT NULL,
                payload_json TEXT NOT NULL,
                created_at TEXT NOT NULL
            )
            `,
        ],
    },
];

function ensureMigrationsTable(db: Database.Database): void {
    db.exec(`
        CREATE TABLE IF NOT EXISTS schema_migrations (
            id TEXT PRIMARY KEY,
            applied_at TEXT NOT NULL
        )
    `);
}

export function runMigrations(db: Database.Database): void {
    ensureMigrationsTable(db);
    const applied = db.prepare("SELECT id FROM schema_migrations").all() as Array<{ id: string }>;
    const appliedSet = new Set(applied.map((row) => row.id));

    const insertMigration = db.prepare("INSERT INTO schema_migrations (id, applied_at) VALUES (?, ?)");

    for (const migration of migrations) {
        if (appliedSet.has(migration.id)) {
            continue;
        }

        const apply = db.transaction(() => {
            for (const statement of migration.statements) {
                db.exec(statement);
            }
            insertMigration.run(migration.id, new Date().toISOString());
        });

        apply();
    }
}
