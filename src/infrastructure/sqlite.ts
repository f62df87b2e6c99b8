import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import { runMigrations } from "./sqliteMigrations";

let dbSingleton: Database.Database | null = null;

function resolveDatabasePath(configured: string | undefined): string {
    if (configured === ":memory:") {
        return configured;
    }
    if (configured) {
        return path.isAbsolute(configured) ? configured : path.join(process.cwd(), configured);
    }
    return path.join(process.cwd(), "data", "mailrule-audit.db");
}

function configureDatabase(db: Database.Database): void {
    db.pragma("foreign_keys = ON");
    db.pragma("journal_mode = WAL");
    db.pragma("busy_timeout = 5000");
}

export function openDatabase(configuredPath?: string): Database.Database {
    const dbPath = resolveDatabasePath(configuredPath);
    if (dbPath !== ":memory:") {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    configureDatabase(db);
    runMigrations(db);
    return db;
}

export function getDatabase(configuredPath?: string): Database.Database {
    if (dbSingleton) {
        return dbSingleton;
    }
    dbSingleton = openDatabase(configuredPath);
    return dbSingleton;
}

export function closeDatabase(): void {
    if (!dbSingleton) {
        return;
    }
    dbSingleton.close();
    dbSingleton = null;
}
