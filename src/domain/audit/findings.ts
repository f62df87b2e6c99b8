import type { MessageId } from "../gmail/types";
import type { CompiledRule, RuleAction } from "../rules/compileRules";
import type { ReplayResult } from "./replay";
import type { Conflict, Findings, RuleFinding } from "./types";

export const DEAD_RULE_REASON = "no messages matched in lookback";
export const ARCHIVE_STAR_CONFLICT = "archive and star rules overlap";

type RuleSummary = {
    name: string;
    action: RuleAction;
};

export function detectDeadRules(rules: readonly CompiledRule[], replay: ReplayResult): RuleFinding[] {
    const dead: RuleFinding[] = [];
    const reported = new Set<string>();
    for (const rule of rules) {
        if (rule.evaluation.status !== "evaluable") continue;
        const matched = replay.get(rule.name);
        if (matched && matched.length > 0) continue;
        if (reported.has(rule.name)) continue;
        reported.add(rule.name);
        dead.push({ name: rule.name, reason: DEAD_RULE_REASON });
    }
    return dead;
}

export function detectMissingLabels(rules: readonly CompiledRule[], existingLabelNames: ReadonlySet<string>): string[] {
    const missing = new Set<string>();
    for (const rule of rules) {
        for (const label of rule.action.labels) {
            if (!existingLabelNames.has(label)) {
                missing.add(label);
            }
        }
    }
    return [...missing];
}

function summariesByMessage(rules: readonly CompiledRule[], replay: ReplayResult): Map<MessageId, RuleSummary[]> {
    const byMessage = new Map<MessageId, RuleSummary[]>();
    for (const rule of rules) {
        // Replay is keyed by name; an opaque rule sharing a name must not borrow its matches.
        if (rule.evaluation.status !== "evaluable") continue;
        const ids = replay.get(rule.name);
        if (!ids || ids.length === 0) continue;
        const summary: RuleSummary = { name: rule.name, action: rule.action };
        for (const id of ids) {
            const existing = byMessage.get(id);
            if (existing) {
                existing.push(summary);
            } else {
                byMessage.set(id, [summary]);
            }
        }
    }
    return byMessage;
}

/**
 * A message that one rule archives while another stars it is a conflict.
 * Findings are keyed by the sorted rule-name set, so the same clash seen on
 * many messages is reported once and the output does not depend on sample order.
 */
export function detectConflicts(rules: readonly CompiledRule[], replay: ReplayResult): Conflict[] {
    const byKey = new Map<string, Conflict>();
    for (const summaries of summariesByMessage(rules, replay).values()) {
        const archiveRules = new Set<string>();
        const starRules = new Set<string>();
        for (const summary of summaries) {
            if (summary.action.archive) archiveRules.add(summary.name);
            if (summary.action.star) starRules.add(summary.name);
        }
        if (archiveRules.size === 0 || starRules.size === 0) continue;

        const combined = [...new Set([...archiveRules, ...starRules])].sort();
        const key = combined.join("|");
        if (!byKey.has(key)) {
            byKey.set(key, { rules: combined, description: ARCHIVE_STAR_CONFLICT });
        }
    }
    return [...byKey.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([, conflict]) => conflict);
}

export function deriveFindings(
    rules: readonly CompiledRule[],
    replay: ReplayResult,
    existingLabelNames: ReadonlySet<string>
): Findings {
    return {
        deadRules: detectDeadRules(rules, replay),
        missingLabels: detectMissingLabels(rules, existingLabelNames),
        conflicts: detectConflicts(rules, replay),
    };
}
