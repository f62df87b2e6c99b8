#!/usr/bin/env node
import { DAY_MS } from "../application/audit/auditService";
import { DEFAULT_FAIL_ON, DEFAULT_LINT_WINDOW_DAYS, parseFailOn, renderLintSummary, shouldFail } from "../application/audit/lint";
import { errorMessage } from "../domain/errors";
import { LINT_USAGE, parseLintArgs, type LintArgs } from "./args";
import { printUsage, runCli } from "./runner";

async function main(): Promise<void> {
    let args: LintArgs;
    try {
        args = parseLintArgs(process.argv.slice(2), { days: DEFAULT_LINT_WINDOW_DAYS, failOn: DEFAULT_FAIL_ON });
    } catch (err) {
        process.stderr.write(`error: ${errorMessage(err)}\n${LINT_USAGE}\n`);
        process.exitCode = 1;
        return;
    }
    if (args.help) {
        printUsage(LINT_USAGE);
        return;
    }

    await runCli(
        async ({ runtime, connector, signal }) => {
            const report = await runtime.auditServiceFor(connector).runLint({ windowMs: args.days * DAY_MS }, signal);
            process.stdout.write(renderLintSummary(report));
            return shouldFail(report, parseFailOn(args.failOn)) ? 1 : 0;
        },
        { exportPath: args.exportPath }
    );
}

void main();
