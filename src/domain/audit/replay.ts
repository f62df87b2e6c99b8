import type { MessageId, MessageMetadata } from "../gmail/types";
import type { CompiledRule } from "../rules/compileRules";
import { ruleMatches } from "../rules/matchers";

export type ReplayResult = ReadonlyMap<string, readonly MessageId[]>;

/**
 * Replays every evaluable rule against the sample. Each evaluable rule
 * gets an entry, empty when nothing matched; non-evaluable rules get none
 * so "ran and matched nothing" stays distinct from "never ran".
 */
export function replayRules(rules: readonly CompiledRule[], messages: readonly MessageMetadata[]): ReplayResult {
    const matches = new Map<string, MessageId[]>();
    for (const rule of rules) {
        if (rule.evaluation.status !== "evaluable") continue;
        const ids = matches.get(rule.name) ?? [];
        for (const meta of messages) {
            if (ruleMatches(rule, meta)) {
                ids.push(meta.id);
            }
        }
        matches.set(rule.name, ids);
    }
    return matches;
}
