import addressparser from "nodemailer/lib/addressparser";
import { headerValue, type LabelId, type MessageMetadata } from "../gmail/types";
import { normalizeListId } from "../rules/matchers";
import type { ListStat, SenderStat } from "./types";

export const MAX_ARCHIVE_SUGGESTIONS = 10;

type Tally = {
    count: number;
    previewSubject: string;
};

function domainFromAddress(address: string): string {
    const lower = address.trim().toLowerCase();
    const at = lower.lastIndexOf("@");
    if (at === -1) return "";
    return lower.slice(at + 1).replace(/^[.\s]+|[.\s]+$/g, "");
}

export function domainOf(from: string): string {
    const raw = from.trim();
    if (!raw) return "";

    for (const entry of addressparser(raw)) {
        if (!("address" in entry)) continue;
        const domain = domainFromAddress(entry.address);
        if (domain) return domain;
    }
    return domainFromAddress(raw);
}

function tally(table: Map<string, Tally>, key: string, subject: string): void {
    const current = table.get(key) ?? { count: 0, previewSubject: "" };
    current.count += 1;
    if (!current.previewSubject && subject) {
        current.previewSubject = subject;
    }
    table.set(key, current);
}

function compareKeys(a: string, b: string): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

function rank(table: Map<string, Tally>, topN: number): Array<[string, Tally]> {
    return [...table.entries()]
        .sort(([keyA, a], [keyB, b]) => b.count - a.count || compareKeys(keyA, keyB))
        .slice(0, Math.max(0, topN));
}

export function buildRankings(
    messages: readonly MessageMetadata[],
    topN: number
): { topSenders: SenderStat[]; topLists: ListStat[] } {
    const senders = new Map<string, Tally>();
    const lists = new Map<string, Tally>();
    for (const meta of messages) {
        const subject = headerValue(meta, "Subject");
        const domain = domainOf(headerValue(meta, "From"));
        if (domain) tally(senders, domain, subject);
        const listId = normalizeListId(headerValue(meta, "List-Id"));
        if (listId) tally(lists, listId, subject);
    }

    return {
        topSenders: rank(senders, topN).map(([domain, stat]) => ({ domain, ...stat })),
        topLists: rank(lists, topN).map(([listId, stat]) => ({ listId, ...stat })),
    };
}

export function buildCoverage(
    messages: readonly MessageMetadata[],
    labelNamesById: ReadonlyMap<LabelId, string>
): Record<string, number> {
    // Label names are user data: `constructor` or `__proto__` must count like any other key.
    const counts = new Map<string, number>();
    for (const meta of messages) {
        for (const labelId of meta.labelIds) {
            const name = labelNamesById.get(labelId);
            if (name !== undefined) {
                counts.set(name, (counts.get(name) ?? 0) + 1);
            }
        }
    }
    return Object.fromEntries(counts);
}

function listSnippet(listId: string): string {
    return [
        "{",
        `  filter: { list: "${listId}" },`,
        "  actions: { archive: true, markRead: true },",
        "}",
    ].join("\n");
}

function senderSnippet(domain: string): string {
    return [
        "{",
        `  filter: { from: "*@${domain}" },`,
        "  actions: { archive: true, markRead: true },",
        "}",
    ].join("\n");
}

/** gmailctl (Jsonnet) snippets: mailing lists first, then sender domains. */
export function buildArchiveRules(lists: readonly ListStat[], senders: readonly SenderStat[]): string[] {
    const snippets = [
        ...lists.map((list) => listSnippet(list.listId)),
        ...senders.map((sender) => senderSnippet(sender.domain)),
    ];
    return snippets.slice(0, MAX_ARCHIVE_SUGGESTIONS);
}
