import { INBOX_LABEL, STARRED_LABEL, UNREAD_LABEL, type LabelId } from "../gmail/types";
import type { FilterAction, FilterCriteria, FilterExport } from "./filterExport";
import { normalizeListId, splitCandidates, type Matcher, type SubstringMatcherKind } from "./matchers";

export type RuleAction = {
    archive: boolean;
    markRead: boolean;
    star: boolean;
    labels: string[];
};

export type RuleEvaluation =
    | { status: "evaluable"; matchers: Matcher[] }
    | { status: "non-evaluable"; reason: string };

export type CompiledRule = {
    name: string;
    action: RuleAction;
    evaluation: RuleEvaluation;
};

const FALLBACK_RULE_NAME = "gmailctl-rule";

const QUERY_PREFIXES: Array<{ prefix: string; kind: SubstringMatcherKind | "list" }> = [
    { prefix: "list:", kind: "list" },
    { prefix: "from:", kind: "from" },
    { prefix: "to:", kind: "to" },
    { prefix: "subject:", kind: "subject" },
];

function nonEvaluable(reason: string): RuleEvaluation {
    return { status: "non-evaluable", reason };
}

function substringMatcher(kind: SubstringMatcherKind, raw: string | undefined): Matcher | null {
    if (!raw?.trim()) return null;
    const candidates = splitCandidates(raw);
    return candidates.length > 0 ? { kind, candidates } : null;
}

function matcherFromQueryToken(token: string): Matcher | null {
    const lower = token.toLowerCase();
    for (const { prefix, kind } of QUERY_PREFIXES) {
        if (!lower.startsWith(prefix)) continue;
        const value = token.slice(prefix.length);
        if (kind === "list") {
            const listId = normalizeListId(value);
            return listId ? { kind, listId } : null;
        }
        return substringMatcher(kind, value);
    }
    return null;
}

/**
 * Translates a free-text gmailctl query into matchers. Negations and
 * anything that is not a recognised `prefix:value` token abort the whole
 * translation: an approximated negation could report a live rule as dead.
 */
export function parseQueryMatchers(query: string): { matchers: Matcher[] } | { reason: string } {
    const matchers: Matcher[] = [];
    for (const raw of query.trim().split(/\s+/)) {
        const token = raw.replace(/^[()"']+|[()"']+$/g, "");
        if (!token || token.toUpperCase() === "OR") continue;
        if (token.startsWith("-")) {
            return { reason: `negated query token "${token}" is not replayed` };
        }
        const matcher = matcherFromQueryToken(token);
        if (!matcher) {
            return { reason: `unsupported query token "${token}"` };
        }
        matchers.push(matcher);
    }
    if (matchers.length === 0) {
        return { reason: "query has no replayable tokens" };
    }
    return { matchers };
}

export function buildMatchers(criteria: FilterCriteria): RuleEvaluation {
    const matchers: Matcher[] = [];
    const from = substringMatcher("from", criteria.from);
    if (from) matchers.push(from);
    const to = substringMatcher("to", criteria.to);
    if (to) matchers.push(to);
    const subject = substringMatcher("subject", criteria.subject);
    if (subject) matchers.push(subject);

    const listId = normalizeListId(criteria.list);
    if (listId) matchers.push({ kind: "list", listId });

    if (criteria.query?.trim()) {
        const parsed = parseQueryMatchers(criteria.query);
        if ("reason" in parsed) return nonEvaluable(parsed.reason);
        matchers.push(...parsed.matchers);
    }

    if (matchers.length === 0) {
        return nonEvaluable("no replayable criteria");
    }
    return { status: "evaluable", matchers };
}

export function mapActions(action: FilterAction, labelNames: ReadonlyMap<LabelId, string>): RuleAction {
    const labels = new Set<string>();
    let star = false;
    for (const id of action.addLabelIds) {
        if (id === STARRED_LABEL) {
            star = true;
            continue;
        }
        const name = labelNames.get(id);
        if (name) labels.add(name);
    }

    return {
        archive: action.removeLabelIds.includes(INBOX_LABEL),
        markRead: action.removeLabelIds.includes(UNREAD_LABEL),
        star,
        labels: [...labels].sort(),
    };
}

export function describeCriteria(criteria: FilterCriteria): string {
    if (criteria.from?.trim()) return `from:${criteria.from.trim()}`;
    if (criteria.list?.trim()) return `list:${criteria.list.trim()}`;
    if (criteria.subject?.trim()) return `subject:${criteria.subject.trim()}`;
    if (criteria.query?.trim()) return criteria.query.trim();
    return FALLBACK_RULE_NAME;
}

export function mergeLabelNames(
    liveLabelsById: ReadonlyMap<LabelId, string>,
    exportLabels: FilterExport["labels"]
): Map<LabelId, string> {
    const merged = new Map(liveLabelsById);
    for (const label of exportLabels) {
        if (label.id && label.name) {
            merged.set(label.id, label.name);
        }
    }
    return merged;
}

export function compileRules(filterExport: FilterExport, liveLabelsById: ReadonlyMap<LabelId, string>): CompiledRule[] {
    const labelNames = mergeLabelNames(liveLabelsById, filterExport.labels);
    return filterExport.filters.map((filter) => ({
        name: filter.name?.trim() || filter.id?.trim() || describeCriteria(filter.criteria),
        action: mapActions(filter.action, labelNames),
        evaluation: buildMatchers(filter.criteria),
    }));
}
