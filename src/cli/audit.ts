#!/usr/bin/env node
import { DAY_MS } from "../application/audit/auditService";
import { renderHumanReport, writeReportJson } from "../application/audit/reportOutput";
import { errorMessage } from "../domain/errors";
import { getEnv } from "../infrastructure/config/env";
import { AUDIT_USAGE, parseAuditArgs, type AuditArgs } from "./args";
import { printUsage, runCli } from "./runner";

async function main(): Promise<void> {
    let args: AuditArgs;
    try {
        const env = getEnv();
        args = parseAuditArgs(process.argv.slice(2), {
            days: env.AUDIT_WINDOW_DAYS,
            top: env.AUDIT_TOP_N,
            pageSize: env.AUDIT_PAGE_SIZE,
        });
    } catch (err) {
        process.stderr.write(`error: ${errorMessage(err)}\n${AUDIT_USAGE}\n`);
        process.exitCode = 1;
        return;
    }
    if (args.help) {
        printUsage(AUDIT_USAGE);
        return;
    }

    await runCli(
        async ({ runtime, connector, signal }) => {
            const report = await runtime
                .auditServiceFor(connector)
                .run({ windowMs: args.days * DAY_MS, topN: args.top, pageSize: args.pageSize }, signal);

            process.stdout.write(renderHumanReport(report));
            if (args.jsonPath !== undefined) {
                const written = await writeReportJson(report, args.jsonPath);
                runtime.logger.info("audit_report_written", { path: written });
            }
            return 0;
        },
        { exportPath: args.exportPath }
    );
}

void main();
