import type { LintReport } from "../../domain/audit/types";
import { formatDuration } from "./reportOutput";

export type FailCondition = "dead" | "missing-label" | "conflict";

export const DEFAULT_FAIL_ON = "dead,conflict,missing-label";
export const DEFAULT_LINT_WINDOW_DAYS = 30;

function canonicalToken(token: string): string {
    return token.trim().toLowerCase();
}

export function parseFailOn(input: string): string[] {
    if (!input.trim()) return [];
    return input
        .split(",")
        .map(canonicalToken)
        .filter((token) => token.length > 0);
}

/** True when any requested condition has findings. Unknown tokens are ignored. */
export function shouldFail(report: LintReport, failOn: readonly string[]): boolean {
    const present: Record<FailCondition, boolean> = {
        dead: report.findings.deadRules.length > 0,
        "missing-label": report.findings.missingLabels.length > 0,
        conflict: report.findings.conflicts.length > 0,
    };
    return failOn.some((raw) => {
        const token = canonicalToken(raw);
        return (token === "dead" || token === "missing-label" || token === "conflict") && present[token];
    });
}

function byText(a: string, b: string): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

export function renderLintSummary(report: LintReport): string {
    const lines = [`mailrule lint — window ${formatDuration(report.windowMs)} (${report.total} messages checked)`];
    const { deadRules, missingLabels, conflicts } = report.findings;

    if (deadRules.length === 0 && missingLabels.length === 0 && conflicts.length === 0) {
        lines.push("no findings");
        return `${lines.join("\n")}\n`;
    }

    if (deadRules.length > 0) {
        lines.push("dead rules:");
        for (const finding of [...deadRules].sort((a, b) => byText(a.name, b.name))) {
            lines.push(`  ${finding.name} — ${finding.reason}`);
        }
    }
    if (missingLabels.length > 0) {
        lines.push("missing labels:");
        for (const label of [...missingLabels].sort(byText)) {
            lines.push(`  ${label}`);
        }
    }
    if (conflicts.length > 0) {
        lines.push("conflicts:");
        const sorted = [...conflicts].sort((a, b) => byText(a.rules.join("|"), b.rules.join("|")));
        for (const conflict of sorted) {
            lines.push(`  ${conflict.rules.join(", ")} — ${conflict.description}`);
        }
    }
    return `${lines.join("\n")}\n`;
}
