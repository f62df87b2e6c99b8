import express from "express";
import cors from "cors";
import { shouldFail, parseFailOn, renderLintSummary, DEFAULT_FAIL_ON } from "../application/audit/lint";
import { toReportDocument } from "../application/audit/reportOutput";
import { DAY_MS, type AuditService } from "../application/audit/auditService";
import { AuditError, errorMessage, errorStatus } from "../domain/errors";
import type { MailboxConnector } from "../domain/gmail/types";
import type { AuthStatus } from "../infrastructure/gmail/googleSession";
import type { AuditRunRepository } from "../infrastructure/repositories/auditRunRepository";
import type { EventLogger } from "../infrastructure/logging/eventLogger";

type ApiErrorCode = "BAD_REQUEST" | "UNAUTHORIZED" | "NOT_FOUND" | "INTERNAL_ERROR";

const AUTH_ERROR = "Not authenticated with Google OAuth";
const MAX_WINDOW_DAYS = 365;
const MAX_TOP_N = 500;

export interface SessionGateway {
    authUrl(): string;
    completeOAuth(code: string): Promise<void>;
    status(): AuthStatus;
    logout(): void;
    connector(): MailboxConnector | null;
}

export type ServerSettings = {
    auditDays: number;
    lintDays: number;
    topN: number;
    frontendRedirectUrl?: string;
    corsOrigin?: string;
};

export type ServerAppDeps = {
    session: SessionGateway;
    auditServiceFor: (connector: MailboxConnector) => AuditService;
    runs: Pick<AuditRunRepository, "listRecent" | "reportJson">;
    logger: EventLogger;
    settings: ServerSettings;
};

export type HttpError = {
    status: number;
    code: ApiErrorCode;
    message: string;
    details?: string;
};

function sendError(res: express.Response, error: HttpError) {
    return res.status(error.status).json({
        message: "error",
        error: {
            code: error.code,
            message: error.message,
            ...(error.details ? { details: error.details } : {}),
        },
    });
}

export function parseLimit(
    rawLimit: unknown,
    options: { name: string; fallback: number; min: number; max: number }
): { value: number; error?: string } {
    const { name, fallback, min, max } = options;
    if (rawLimit === undefined) {
        return { value: fallback };
    }

    const parsed = typeof rawLimit === "string" ? Number(rawLimit) : Number.NaN;
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
        return { value: fallback, error: `${name} must be an integer between ${min} and ${max}` };
    }

    return { value: parsed };
}

/** Maps a failed audit or lint run onto the HTTP error envelope. */
export function httpErrorFor(err: unknown): HttpError {
    if (err instanceof AuditError && err.code === "CONFIG_ERROR") {
        return { status: 400, code: "BAD_REQUEST", message: err.message, details: err.code };
    }
    if (errorStatus(err) === 401) {
        return { status: 401, code: "UNAUTHORIZED", message: AUTH_ERROR };
    }
    return {
        status: 500,
        code: "INTERNAL_ERROR",
        message: errorMessage(err),
        ...(err instanceof AuditError ? { details: err.code } : {}),
    };
}

export function allowedOriginsFrom(corsOrigin: string | undefined): string[] {
    return corsOrigin
        ? corsOrigin
              .split(",")
              .map((origin) => origin.trim())
              .filter((origin) => origin.length > 0)
        : [];
}

/** Looks up the report document stored with a recorded run. */
export function storedRunReport(
    runs: Pick<AuditRunRepository, "reportJson">,
    rawId: string
): { report: unknown } | { error: HttpError } {
    const id = /^\d+$/.test(rawId) ? Number(rawId) : Number.NaN;
    if (!Number.isSafeInteger(id) || id < 1) {
        return {
            error: { status: 400, code: "BAD_REQUEST", message: "Invalid path parameter", details: "id must be a positive integer" },
        };
    }
    const stored = runs.reportJson(id);
    if (stored === null) {
        return { error: { status: 404, code: "NOT_FOUND", message: `Audit run ${id} not found` } };
    }
    const report: unknown = JSON.parse(stored);
    return { report };
}

/** Aborts the in-flight run when the client goes away before the response is written. */
function requestSignal(req: express.Request, res: express.Response): AbortSignal {
    const controller = new AbortController();
    req.on("close", () => {
        if (!res.writableEnded) {
            controller.abort(new Error("client disconnected"));
        }
    });
    return controller.signal;
}

export function createServerApp(deps: ServerAppDeps) {
    const { session, logger, runs, settings } = deps;
    const app = express();
    app.use(express.json());

    const allowedOrigins = allowedOriginsFrom(settings.corsOrigin);
    app.use(
        cors({
            origin: (origin, callback) => {
                if (!origin || allowedOrigins.length === 0 || allowedOrigins.includes(origin)) {
                    return callback(null, true);
                }
                return callback(new Error("CORS origin denied"));
            },
        })
    );

    app.use((req, res, next) => {
        const startedAt = Date.now();
        res.on("finish", () => {
            logger.info("http_request", {
                method: req.method,
                path: req.originalUrl,
                status: res.statusCode,
                durationMs: Date.now() - startedAt,
            });
        });
        next();
    });

    function requireAuditService(res: express.Response): AuditService | null {
        const connector = session.connector();
        if (!connector) {
            sendError(res, { status: 401, code: "UNAUTHORIZED", message: AUTH_ERROR });
            return null;
        }
        return deps.auditServiceFor(connector);
    }

    app.get("/health", (req, res) => {
        res.json({ status: "ok" });
    });

    app.get("/auth/google", (req, res) => {
        res.redirect(session.authUrl());
    });

    app.get("/oauth2callback", async (req, res) => {
        const code = req.query.code;
        if (typeof code !== "string" || !code) {
            return sendError(res, { status: 400, code: "BAD_REQUEST", message: "Missing code" });
        }
        try {
            await session.completeOAuth(code);
        } catch (err) {
            logger.error("auth_oauth_failed", { reason: errorMessage(err) });
            return sendError(res, { status: 500, code: "INTERNAL_ERROR", message: errorMessage(err) });
        }
        if (settings.frontendRedirectUrl) {
            return res.redirect(`${settings.frontendRedirectUrl}?oauth=success`);
        }
        return res.json({ message: "OAuth successful" });
    });

    app.get("/auth/status", (req, res) => {
        res.json(session.status());
    });

    app.post("/auth/logout", (req, res) => {
        session.logout();
        res.json({ message: "logged_out" });
    });

    app.get("/audit", async (req, res) => {
        const days = parseLimit(req.query.days, { name: "days", fallback: settings.auditDays, min: 1, max: MAX_WINDOW_DAYS });
        const top = parseLimit(req.query.top, { name: "top", fallback: settings.topN, min: 1, max: MAX_TOP_N });
        const invalid = days.error ?? top.error;
        if (invalid) {
            return sendError(res, { status: 400, code: "BAD_REQUEST", message: "Invalid query parameter", details: invalid });
        }

        const service = requireAuditService(res);
        if (!service) return;

        try {
            const report = await service.run({ windowMs: days.value * DAY_MS, topN: top.value }, requestSignal(req, res));
            return res.json({ message: "ok", report: toReportDocument(report) });
        } catch (err) {
            return sendError(res, httpErrorFor(err));
        }
    });

    app.get("/lint", async (req, res) => {
        const days = parseLimit(req.query.days, { name: "days", fallback: settings.lintDays, min: 1, max: MAX_WINDOW_DAYS });
        if (days.error) {
            return sendError(res, { status: 400, code: "BAD_REQUEST", message: "Invalid query parameter", details: days.error });
        }
        const rawFailOn = req.query.failOn;
        if (rawFailOn !== undefined && typeof rawFailOn !== "string") {
            return sendError(res, {
                status: 400,
                code: "BAD_REQUEST",
                message: "Invalid query parameter",
                details: "failOn must be a comma-separated string",
            });
        }

        const service = requireAuditService(res);
        if (!service) return;

        try {
            const report = await service.runLint({ windowMs: days.value * DAY_MS }, requestSignal(req, res));
            return res.json({
                message: "ok",
                shouldFail: shouldFail(report, parseFailOn(rawFailOn ?? DEFAULT_FAIL_ON)),
                summary: renderLintSummary(report),
                findings: report.findings,
            });
        } catch (err) {
            return sendError(res, httpErrorFor(err));
        }
    });

    app.get("/audit/runs", (req, res) => {
        const limit = parseLimit(req.query.limit, { name: "limit", fallback: 20, min: 1, max: 100 });
        if (limit.error) {
            return sendError(res, { status: 400, code: "BAD_REQUEST", message: "Invalid query parameter", details: limit.error });
        }
        res.json({ message: "ok", items: runs.listRecent(limit.value) });
    });

    app.get("/audit/runs/:id", (req, res) => {
        const result = storedRunReport(runs, req.params.id);
        if ("error" in result) {
            return sendError(res, result.error);
        }
        res.json({ message: "ok", report: result.report });
    });

    app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
        if (err instanceof SyntaxError && "body" in err) {
            return sendError(res, { status: 400, code: "BAD_REQUEST", message: "Invalid JSON body" });
        }
        return next(err);
    });

    return app;
}
