import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { AuditReport } from "../../domain/audit/types";
import { OutputError, errorMessage } from "../../domain/errors";

const PREVIEW_SUBJECT_DISPLAY_LIMIT = 60;
/** The JSON `window` field is an integer count of nanoseconds. */
const NANOS_PER_MS = 1_000_000;

const ruleFindingSchema = z.object({ name: z.string(), reason: z.string() });
const conflictSchema = z.object({ rules: z.array(z.string()), description: z.string() });

export const reportDocumentSchema = z.object({
    generated_at: z.string().datetime(),
    window: z.number().int().positive(),
    total: z.number().int().nonnegative(),
    top_senders: z.array(
        z.object({ domain: z.string(), count: z.number().int().positive(), preview_subject: z.string() })
    ),
    top_lists: z.array(
        z.object({ list_id: z.string(), count: z.number().int().positive(), preview_subject: z.string() })
    ),
    coverage: z.record(z.number().int().nonnegative()),
    suggestions: z.object({
        archive_rules: z.array(z.string()),
        remove_rules: z.array(ruleFindingSchema),
        smells: z.array(conflictSchema),
    }),
    findings: z.object({
        dead_rules: z.array(ruleFindingSchema),
        missing_labels: z.array(z.string()),
        conflicts: z.array(conflictSchema),
    }),
});

export type ReportDocument = z.infer<typeof reportDocumentSchema>;

/** Renders a millisecond span as hours, minutes and seconds, e.g. `48h0m0s`. */
export function formatDuration(ms: number): string {
    if (ms === 0) return "0s";
    const sign = ms < 0 ? "-" : "";
    const abs = Math.abs(ms);
    const hours = Math.floor(abs / 3_600_000);
    const minutes = Math.floor((abs % 3_600_000) / 60_000);
    const seconds = (abs % 60_000) / 1000;
    if (hours > 0) return `${sign}${hours}h${minutes}m${seconds}s`;
    if (minutes > 0) return `${sign}${minutes}m${seconds}s`;
    return `${sign}${seconds}s`;
}

function sortedRecord(record: Readonly<Record<string, number>>): Record<string, number> {
    return Object.fromEntries(Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export function toReportDocument(report: AuditReport): ReportDocument {
    const conflicts = (items: AuditReport["findings"]["conflicts"]) =>
        items.map((conflict) => ({ rules: [...conflict.rules], description: conflict.description }));
    const ruleFindings = (items: AuditReport["findings"]["deadRules"]) =>
        items.map((finding) => ({ name: finding.name, reason: finding.reason }));

    return {
        generated_at: report.generatedAt.toISOString(),
        window: report.windowMs * NANOS_PER_MS,
        total: report.total,
        top_senders: report.topSenders.map((stat) => ({
            domain: stat.domain,
            count: stat.count,
            preview_subject: stat.previewSubject,
        })),
        top_lists: report.topLists.map((stat) => ({
            list_id: stat.listId,
            count: stat.count,
            preview_subject: stat.previewSubject,
        })),
        coverage: sortedRecord(report.coverage),
        suggestions: {
            archive_rules: [...report.suggestions.archiveRules],
            remove_rules: ruleFindings(report.suggestions.removeRules),
            smells: conflicts(report.suggestions.smells),
        },
        findings: {
            dead_rules: ruleFindings(report.findings.deadRules),
            missing_labels: [...report.findings.missingLabels],
            conflicts: conflicts(report.findings.conflicts),
        },
    };
}

export function serializeReport(report: AuditReport): string {
    const document = toReportDocument(report);
    const parsed = reportDocumentSchema.safeParse(document);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
        throw new OutputError(`Report failed validation: ${issues}`);
    }
    // zod rebuilds records without a `__proto__` key, so the validated document itself is written.
    return `${JSON.stringify(document, null, 2)}\n`;
}

export function resolveOutputPath(rawPath: string, cwd: string): string {
    const trimmed = rawPath.trim();
    if (!trimmed) {
        throw new OutputError("path must not be empty");
    }
    const clean = path.normalize(trimmed);
    if (path.isAbsolute(clean)) {
        throw new OutputError(`output path must be relative, got ${clean}`);
    }
    if (clean === ".." || clean.startsWith(`..${path.sep}`)) {
        throw new OutputError(`output path ${clean} escapes working directory`);
    }
    return path.join(cwd, clean);
}

export async function writeReportJson(report: AuditReport, rawPath: string, cwd: string = process.cwd()): Promise<string> {
    const target = resolveOutputPath(rawPath, cwd);
    const body = serializeReport(report);
    try {
        await fs.writeFile(target, body, { encoding: "utf-8", mode: 0o600 });
    } catch (err) {
        throw new OutputError(`create ${target}: ${errorMessage(err)}`, { cause: err });
    }
    return target;
}

function truncate(value: string, limit: number): string {
    const chars = [...value];
    if (chars.length <= limit) return value;
    return `${chars.slice(0, limit - 1).join("")}…`;
}

export function renderHumanReport(report: AuditReport): string {
    const lines: string[] = [`mailrule audit — window ${formatDuration(report.windowMs)} (${report.total} messages)`];

    if (report.topSenders.length > 0) {
        lines.push("", "Top senders:");
        for (const stat of report.topSenders) {
            lines.push(
                `  ${stat.domain.padEnd(30)} ${String(stat.count).padStart(4)} ${truncate(stat.previewSubject, PREVIEW_SUBJECT_DISPLAY_LIMIT)}`
            );
        }
    }
    if (report.topLists.length > 0) {
        lines.push("", "Top lists:");
        for (const stat of report.topLists) {
            lines.push(
                `  ${stat.listId.padEnd(30)} ${String(stat.count).padStart(4)} ${truncate(stat.previewSubject, PREVIEW_SUBJECT_DISPLAY_LIMIT)}`
            );
        }
    }
    if (report.suggestions.archiveRules.length > 0) {
        lines.push("", "Suggested gmailctl snippets:");
        for (const snippet of report.suggestions.archiveRules) {
            lines.push(snippet, "");
        }
    }

    const { deadRules, missingLabels, conflicts } = report.findings;
    if (deadRules.length > 0 || missingLabels.length > 0 || conflicts.length > 0) {
        lines.push("", "Lint findings:");
        for (const finding of deadRules) {
            lines.push(`  dead rule: ${finding.name} — ${finding.reason}`);
        }
        for (const label of missingLabels) {
            lines.push(`  missing label: ${label}`);
        }
        for (const conflict of conflicts) {
            lines.push(`  conflict: ${conflict.rules.join(", ")} (${conflict.description})`);
        }
    }
    return `${lines.join("\n")}\n`;
}
