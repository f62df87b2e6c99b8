import { createRuntime, type Runtime } from "../bootstrap";
import { AuditError, ConfigError, errorMessage } from "../domain/errors";
import type { MailboxConnector } from "../domain/gmail/types";
import { getEnv, type Env } from "../infrastructure/config/env";
import { closeDatabase } from "../infrastructure/sqlite";

export type CliContext = {
    env: Env;
    runtime: Runtime;
    connector: MailboxConnector;
    signal: AbortSignal;
};

function writeStderr(line: string): void {
    process.stderr.write(`${line}\n`);
}

/**
 * Shared CLI lifecycle: SIGINT/SIGTERM abort the run, logs go to stderr so
 * stdout carries only the report, and the exit code is whatever `body`
 * returns (1 on any error).
 */
export async function runCli(
    body: (ctx: CliContext) => Promise<number>,
    options: { exportPath?: string; env?: Env } = {}
): Promise<void> {
    const controller = new AbortController();
    const onSignal = (signal: NodeJS.Signals) => controller.abort(new Error(`received ${signal}`));
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);

    try {
        const env = options.env ?? getEnv();
        const runtime = createRuntime(env, { writeLog: writeStderr, exportPath: options.exportPath });
        const connector = runtime.session.connector();
        if (!connector) {
            throw new ConfigError("not authenticated with Google OAuth; start the server and open /auth/google");
        }
        process.exitCode = await body({ env, runtime, connector, signal: controller.signal });
    } catch (err) {
        const code = err instanceof AuditError ? ` [${err.code}]` : "";
        writeStderr(`error${code}: ${errorMessage(err)}`);
        process.exitCode = 1;
    } finally {
        process.off("SIGINT", onSignal);
        process.off("SIGTERM", onSignal);
        closeDatabase();
    }
}

export function printUsage(usage: string): void {
    process.stdout.write(`${usage}\n`);
}
