import { createServerApp } from "./api/serverApp";
import { DEFAULT_LINT_WINDOW_DAYS } from "./application/audit/lint";
import { createRuntime } from "./bootstrap";
import { getEnv } from "./infrastructure/config/env";
import { closeDatabase } from "./infrastructure/sqlite";

export function startServer() {
    const env = getEnv();
    const runtime = createRuntime(env);
    const app = createServerApp({
        session: runtime.session,
        auditServiceFor: runtime.auditServiceFor,
        runs: runtime.runs,
        logger: runtime.logger,
        settings: {
            auditDays: env.AUDIT_WINDOW_DAYS,
            lintDays: DEFAULT_LINT_WINDOW_DAYS,
            topN: env.AUDIT_TOP_N,
            frontendRedirectUrl: env.FRONTEND_REDIRECT_URL,
            corsOrigin: env.CORS_ORIGIN,
        },
    });

    const server = app.listen(env.PORT, () => {
        console.log(`Server running on http://localhost:${env.PORT}`);
    });
    const shutdown = () => {
        server.close(() => closeDatabase());
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
    return server;
}

if (require.main === module) {
    startServer();
}
