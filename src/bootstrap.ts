import type Database from "better-sqlite3";
import { AuditService } from "./application/audit/auditService";
import type { MailboxConnector } from "./domain/gmail/types";
import type { FilterExportLoader } from "./domain/rules/filterExport";
import { TokenStore } from "./infrastructure/auth/tokenStore";
import type { Env } from "./infrastructure/config/env";
import { createOAuth2Client, loadClientSecret } from "./infrastructure/gmail/googleMailboxClient";
import { GoogleSession } from "./infrastructure/gmail/googleSession";
import { FileExportLoader, GmailctlRunner } from "./infrastructure/gmailctl/exportLoaders";
import { createEventLogger, type EventLogger } from "./infrastructure/logging/eventLogger";
import { TokenBucket } from "./infrastructure/rate/tokenBucket";
import { ActivityLogRepository, AuditRunRepository } from "./infrastructure/repositories/auditRunRepository";
import { getDatabase } from "./infrastructure/sqlite";

/** A saved export wins over running gmailctl. */
export function createExportLoader(env: Pick<Env, "FILTER_EXPORT_PATH" | "GMAILCTL_BINARY" | "GMAILCTL_CONFIG_DIR">, exportPath?: string): FilterExportLoader {
    const filePath = exportPath?.trim() || env.FILTER_EXPORT_PATH;
    if (filePath) {
        return new FileExportLoader(filePath);
    }
    return new GmailctlRunner({ binary: env.GMAILCTL_BINARY, configDir: env.GMAILCTL_CONFIG_DIR });
}

export type Runtime = {
    db: Database.Database;
    runs: AuditRunRepository;
    logger: EventLogger;
    session: GoogleSession;
    auditServiceFor: (connector: MailboxConnector) => AuditService;
};

export function createRuntime(env: Env, options: { writeLog?: (line: string) => void; exportPath?: string } = {}): Runtime {
    const db = getDatabase(env.DB_PATH);
    const runs = new AuditRunRepository(db);
    const logger = createEventLogger({ write: options.writeLog, activity: new ActivityLogRepository(db) });
    const session = new GoogleSession(
        createOAuth2Client(loadClientSecret(env.GOOGLE_CREDENTIALS_PATH)),
        new TokenStore(env.TOKEN_PATH, env.TOKEN_ENCRYPTION_KEY),
        logger
    );
    const limiter = new TokenBucket(env.GMAIL_RPS);
    const loader = createExportLoader(env, options.exportPath);

    return {
        db,
        runs,
        logger,
        session,
        auditServiceFor: (connector) => new AuditService({ connector, limiter, loader, logger, history: runs }),
    };
}
