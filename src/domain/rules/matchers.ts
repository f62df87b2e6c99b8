import { headerValue, type MessageMetadata } from "../gmail/types";
import type { CompiledRule } from "./compileRules";

export type SubstringMatcherKind = "from" | "to" | "subject";

export type Matcher =
    | { kind: SubstringMatcherKind; candidates: string[] }
    | { kind: "list"; listId: string };

const HEADER_BY_KIND: Record<SubstringMatcherKind, string> = {
    from: "From",
    to: "To",
    subject: "Subject",
};

/**
 * Splits a criterion value into lower-cased candidate substrings.
 * Separators are `,` `;` `|` and whitespace; wrapping quotes and
 * parentheses are stripped and `OR` connectives are dropped.
 */
export function splitCandidates(raw: string): string[] {
    const spaced = raw.replace(/[,;|]/g, " ").trim();
    if (!spaced) return [];

    const out: string[] = [];
    for (const part of spaced.split(/\s+/)) {
        const token = part.replace(/^["'()]+|["'()]+$/g, "").toLowerCase();
        if (!token || token === "or") continue;
        out.push(token);
    }
    return out;
}

export function normalizeListId(raw: string | undefined): string {
    let value = (raw ?? "").trim();
    if (!value) return "";
    value = value.replace(/^[<\s]*/, "").replace(/[>\s]*$/, "");
    value = value.replace(/^["\s]+|["\s]+$/g, "");
    return value.toLowerCase();
}

function containsAny(header: string, candidates: readonly string[]): boolean {
    const haystack = header.toLowerCase();
    return candidates.some((candidate) => haystack.includes(candidate));
}

// Loose on purpose: `list:example.com` also hits `alerts.example.com`.
function matchListId(header: string, listId: string): boolean {
    const normalized = normalizeListId(header);
    return normalized === listId || normalized.includes(listId);
}

export function matcherMatches(matcher: Matcher, meta: MessageMetadata): boolean {
    switch (matcher.kind) {
        case "from":
        case "to":
        case "subject":
            return containsAny(headerValue(meta, HEADER_BY_KIND[matcher.kind]), matcher.candidates);
        case "list":
            return matchListId(headerValue(meta, "List-Id"), matcher.listId);
    }
}

/** A rule matches when every one of its matchers does; non-evaluable rules never match. */
export function ruleMatches(rule: CompiledRule, meta: MessageMetadata): boolean {
    if (rule.evaluation.status !== "evaluable") return false;
    return rule.evaluation.matchers.every((matcher) => matcherMatches(matcher, meta));
}
