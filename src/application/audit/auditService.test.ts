import { describe, expect, it, vi } from "vitest";
import { ARCHIVE_STAR_CONFLICT, DEAD_RULE_REASON } from "../../domain/audit/findings";
import { ConfigError, ExportError, FetchError } from "../../domain/errors";
import type { LabelCatalog, ListPage, MailboxConnector, MessageMetadata } from "../../domain/gmail/types";
import { parseFilterExport, type FilterExportLoader } from "../../domain/rules/filterExport";
import { createEventLogger } from "../../infrastructure/logging/eventLogger";
import type { NewAuditRun } from "../../infrastructure/repositories/auditRunRepository";
import { AuditService, DAY_MS, newerThanQuery } from "./auditService";
import { toReportDocument } from "./reportOutput";

class FakeMailbox implements MailboxConnector {
    readonly queries: Array<{ query: string; pageToken: string | null; pageSize: number }> = [];

    constructor(
        private readonly pages: string[][],
        private readonly messages: Map<string, MessageMetadata>,
        private readonly labels: Array<[string, string]> = []
    ) {}

    async listMessages(query: string, pageToken: string | null, pageSize: number): Promise<ListPage> {
        this.queries.push({ query, pageToken, pageSize });
        const index = pageToken ? Number(pageToken) : 0;
        const next = index + 1 < this.pages.length ? String(index + 1) : null;
        return { ids: this.pages[index] ?? [], nextPageToken: next };
    }

    async getMetadata(id: string): Promise<MessageMetadata> {
        const meta = this.messages.get(id);
        if (!meta) throw new Error(`no message ${id}`);
        return meta;
    }

    async listLabels(): Promise<LabelCatalog> {
        return {
            byId: new Map(this.labels),
            byName: new Map(this.labels.map(([id, name]) => [name, id])),
        };
    }

    async ensureLabel(name: string): Promise<string> {
        return name;
    }

    async batchModify(): Promise<void> {
        return undefined;
    }
}

function mailbox(messages: MessageMetadata[], labels: Array<[string, string]> = [], pageSize = 100): FakeMailbox {
    const pages: string[][] = [];
    for (let i = 0; i < messages.length; i += pageSize) {
        pages.push(messages.slice(i, i + pageSize).map((meta) => meta.id));
    }
    return new FakeMailbox(pages.length > 0 ? pages : [[]], new Map(messages.map((meta) => [meta.id, meta])), labels);
}

function loaderFor(raw: unknown) {
    return { exportFilters: vi.fn(async (_signal?: AbortSignal) => parseFilterExport(raw)) };
}

function listMessage(id: string, listId: string, extra: Partial<MessageMetadata> = {}): MessageMetadata {
    return {
        id,
        headers: { From: `news@${listId}`, Subject: `Issue ${id}`, "List-Id": `<${listId}>` },
        labelIds: [],
        ...extra,
    };
}

const fixedClock = () => new Date("2024-03-01T12:00:00.000Z");

describe("newerThanQuery", () => {
    it("rounds the window up to whole days", () => {
        expect(newerThanQuery(36 * 60 * 60 * 1000)).toBe("newer_than:2d");
        expect(newerThanQuery(60 * 1000)).toBe("newer_than:1d");
        expect(newerThanQuery(60 * DAY_MS)).toBe("newer_than:60d");
    });
});

describe("AuditService.run", () => {
    it("reports a clean rule whose label exists and matches every message", async () => {
        const connector = mailbox(
            [
                listMessage("m1", "bulk.example.com", { labelIds: ["Label_bulk"] }),
                listMessage("m2", "bulk.example.com", { labelIds: ["Label_bulk"] }),
            ],
            [
                ["Label_bulk", "bulk"],
                ["INBOX", "INBOX"],
            ]
        );
        const loader = loaderFor({
            filters: [
                {
                    name: "bulk-lists",
                    criteria: { list: "bulk.example.com" },
                    action: { addLabelIds: ["Label_bulk"], removeLabelIds: ["INBOX", "UNREAD"] },
                },
            ],
            labels: [{ id: "Label_bulk", name: "bulk" }],
        });

        const report = await new AuditService({ connector, loader, clock: fixedClock }).run({ windowMs: 2 * DAY_MS });

        expect(report.total).toBe(2);
        expect(report.findings).toEqual({ deadRules: [], missingLabels: [], conflicts: [] });
        expect(report.coverage).toEqual({ bulk: 2 });
        expect(report.topLists).toEqual([{ listId: "bulk.example.com", count: 2, previewSubject: "Issue m1" }]);
        expect(report.topSenders).toEqual([{ domain: "bulk.example.com", count: 2, previewSubject: "Issue m1" }]);
        expect(report.suggestions.archiveRules).toHaveLength(2);
        expect(report.generatedAt.toISOString()).toBe("2024-03-01T12:00:00.000Z");
    });

    it("reports an archive/star conflict on a shared message", async () => {
        const connector = mailbox([listMessage("m1", "vip.example.com")]);
        const loader = loaderFor({
            filters: [
                { name: "star-vip", criteria: { list: "vip.example.com" }, action: { addLabelIds: ["STARRED"] } },
                { name: "archive-vip", criteria: { list: "vip.example.com" }, action: { removeLabelIds: ["INBOX"] } },
            ],
        });

        const report = await new AuditService({ connector, loader }).run({ windowMs: DAY_MS });

        expect(report.findings.conflicts).toEqual([
            { rules: ["archive-vip", "star-vip"], description: ARCHIVE_STAR_CONFLICT },
        ]);
        expect(report.suggestions.smells).toEqual(report.findings.conflicts);
    });

    it("reports a rule that matched nothing as dead", async () => {
        const connector = mailbox([listMessage("m1", "a.example.com")]);
        const loader = loaderFor({
            filters: [{ name: "never", criteria: { list: "never.example.com" } }],
        });

        const report = await new AuditService({ connector, loader }).run({ windowMs: DAY_MS });

        expect(report.findings.deadRules).toEqual([{ name: "never", reason: DEAD_RULE_REASON }]);
        expect(report.suggestions.removeRules).toEqual([{ name: "never", reason: DEAD_RULE_REASON }]);
    });

    it("reports labels the mailbox does not have", async () => {
        const connector = mailbox([listMessage("m1", "a.example.com")], [["Label_1", "work"]]);
        const loader = loaderFor({
            filters: [{ name: "tag", criteria: { list: "a.example.com" }, action: { addLabelIds: ["Label_2"] } }],
            labels: [{ id: "Label_2", name: "receipts" }],
        });

        const report = await new AuditService({ connector, loader }).run({ windowMs: DAY_MS });

        expect(report.findings.missingLabels).toEqual(["receipts"]);
    });

    it("returns an empty report without loading rules for an empty sample", async () => {
        const connector = mailbox([]);
        const loader = loaderFor({ filters: [{ name: "never", criteria: { list: "x.example.com" } }] });

        const report = await new AuditService({ connector, loader, clock: fixedClock }).run({ windowMs: DAY_MS });

        expect(report.total).toBe(0);
        expect(report.topSenders).toEqual([]);
        expect(report.topLists).toEqual([]);
        expect(report.findings).toEqual({ deadRules: [], missingLabels: [], conflicts: [] });
        expect(loader.exportFilters).not.toHaveBeenCalled();
    });

    it("skips rule analysis when no loader is configured", async () => {
        const connector = mailbox([listMessage("m1", "a.example.com")]);
        const report = await new AuditService({ connector }).run({ windowMs: DAY_MS });
        expect(report.total).toBe(1);
        expect(report.findings).toEqual({ deadRules: [], missingLabels: [], conflicts: [] });
    });

    it("walks every page with the window query and page size", async () => {
        const messages = Array.from({ length: 5 }, (_, i) => listMessage(`m${i}`, "a.example.com"));
        const connector = mailbox(messages, [], 2);

        const report = await new AuditService({ connector }).run({ windowMs: 3 * DAY_MS, pageSize: 2 });

        expect(report.total).toBe(5);
        expect(connector.queries).toEqual([
            { query: "newer_than:3d", pageToken: null, pageSize: 2 },
            { query: "newer_than:3d", pageToken: "1", pageSize: 2 },
            { query: "newer_than:3d", pageToken: "2", pageSize: 2 },
        ]);
    });

    it("clamps an oversized page size and defaults topN", async () => {
        const messages = Array.from({ length: 25 }, (_, i) => listMessage(`m${i}`, `l${i}.example.com`));
        const connector = mailbox(messages);

        const report = await new AuditService({ connector }).run({ windowMs: DAY_MS, pageSize: 5000, topN: 0 });

        expect(connector.queries[0].pageSize).toBe(500);
        expect(report.topLists).toHaveLength(20);
    });

    it("treats fractions below one as unset", async () => {
        const messages = Array.from({ length: 25 }, (_, i) => listMessage(`m${i}`, `l${i}.example.com`));
        const connector = mailbox(messages);

        const report = await new AuditService({ connector }).run({ windowMs: DAY_MS, pageSize: 0.5, topN: 0.9 });

        expect(connector.queries[0].pageSize).toBe(500);
        expect(report.topLists).toHaveLength(20);
    });

    it("is deterministic apart from the generation time", async () => {
        const messages = [
            listMessage("m1", "vip.example.com"),
            listMessage("m2", "b.example.com"),
            listMessage("m3", "a.example.com"),
        ];
        const raw = {
            filters: [
                { name: "star-vip", criteria: { list: "vip.example.com" }, action: { addLabelIds: ["STARRED"] } },
                { name: "archive-vip", criteria: { list: "vip.example.com" }, action: { removeLabelIds: ["INBOX"] } },
                { name: "never", criteria: { from: "nobody@example.com" } },
            ],
        };
        let tick = 0;
        const service = new AuditService({
            connector: mailbox(messages),
            loader: loaderFor(raw),
            clock: () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++)),
        });

        const first = toReportDocument(await service.run({ windowMs: DAY_MS }));
        const second = toReportDocument(await service.run({ windowMs: DAY_MS }));

        expect(first.generated_at).not.toBe(second.generated_at);
        expect({ ...first, generated_at: "" }).toEqual({ ...second, generated_at: "" });
    });

    it("rejects a non-positive window", async () => {
        const service = new AuditService({ connector: mailbox([]) });
        await expect(service.run({ windowMs: 0 })).rejects.toThrow(new ConfigError("window must be positive"));
        await expect(service.run({ windowMs: -DAY_MS })).rejects.toBeInstanceOf(ConfigError);
    });

    it("stops with a fetch error once the signal is aborted", async () => {
        const controller = new AbortController();
        controller.abort();
        const service = new AuditService({ connector: mailbox([listMessage("m1", "a.example.com")]) });

        const failure = service.run({ windowMs: DAY_MS }, controller.signal);
        await expect(failure).rejects.toBeInstanceOf(FetchError);
        await expect(failure).rejects.toThrow(/^list labels: /);
    });

    it("stops paging metadata as soon as the run is aborted", async () => {
        const controller = new AbortController();
        const connector = mailbox([
            listMessage("m1", "a.example.com"),
            listMessage("m2", "a.example.com"),
            listMessage("m3", "a.example.com"),
        ]);
        const fetchOne = connector.getMetadata.bind(connector);
        const getMetadata = vi.spyOn(connector, "getMetadata").mockImplementation(async (id: string) => {
            controller.abort();
            return fetchOne(id);
        });
        const loader = loaderFor({ filters: [{ name: "a", criteria: { list: "a.example.com" } }] });
        const history = { record: vi.fn((run: NewAuditRun) => ({ id: 1, ...run })) };

        const failure = new AuditService({ connector, loader, history }).run({ windowMs: DAY_MS }, controller.signal);

        await expect(failure).rejects.toBeInstanceOf(FetchError);
        await expect(failure).rejects.toThrow(/^rate limit metadata: /);
        expect(getMetadata.mock.calls.map(([id]) => id)).toEqual(["m1"]);
        expect(loader.exportFilters).not.toHaveBeenCalled();
        expect(history.record).not.toHaveBeenCalled();
    });

    it("wraps metadata failures with the message id", async () => {
        const connector = new FakeMailbox([["m1"]], new Map());
        const service = new AuditService({ connector });

        await expect(service.run({ windowMs: DAY_MS })).rejects.toThrow(new FetchError("get metadata m1: no message m1"));
    });

    it("wraps loader failures as export errors", async () => {
        const connector = mailbox([listMessage("m1", "a.example.com")]);
        const loader: FilterExportLoader = {
            exportFilters: async () => {
                throw new Error("gmailctl missing");
            },
        };

        const failure = new AuditService({ connector, loader }).run({ windowMs: DAY_MS });
        await expect(failure).rejects.toBeInstanceOf(ExportError);
        await expect(failure).rejects.toThrow("load filter export: gmailctl missing");
    });

    it("passes export errors through unchanged", async () => {
        const connector = mailbox([listMessage("m1", "a.example.com")]);
        const loader = loaderFor({});

        await expect(new AuditService({ connector, loader }).run({ windowMs: DAY_MS })).rejects.toThrow(
            new ExportError("Filter export contains no filters or labels")
        );
    });

    it("records the run and logs its lifecycle", async () => {
        const record = vi.fn((run: NewAuditRun) => ({ id: 1, ...run }));
        const lines: string[] = [];
        const logger = createEventLogger({ write: (line) => lines.push(line), clock: fixedClock });
        const service = new AuditService({
            connector: mailbox([listMessage("m1", "a.example.com")]),
            loader: loaderFor({ filters: [{ name: "never", criteria: { list: "x.example.com" } }] }),
            logger,
            history: { record },
            clock: fixedClock,
        });

        await service.run({ windowMs: DAY_MS });

        expect(record).toHaveBeenCalledTimes(1);
        const run = record.mock.calls[0][0];
        expect(run).toMatchObject({
            kind: "audit",
            generatedAt: "2024-03-01T12:00:00.000Z",
            windowMs: DAY_MS,
            total: 1,
            deadRules: 1,
            missingLabels: 0,
            conflicts: 0,
        });
        expect(JSON.parse(run.reportJson).window).toBe(86_400_000_000_000);
        expect(lines.map((line) => JSON.parse(line).event)).toEqual([
            "audit_run_started",
            "audit_sample_fetched",
            "audit_rules_replayed",
            "audit_run_completed",
        ]);
    });

    it("logs the failure code when a run fails", async () => {
        const lines: string[] = [];
        const logger = createEventLogger({ write: (line) => lines.push(line), clock: fixedClock });
        const service = new AuditService({ connector: new FakeMailbox([["m1"]], new Map()), logger });

        await expect(service.run({ windowMs: DAY_MS })).rejects.toBeInstanceOf(FetchError);

        expect(JSON.parse(lines[lines.length - 1])).toEqual({
            ts: "2024-03-01T12:00:00.000Z",
            level: "error",
            event: "audit_run_failed",
            kind: "audit",
            code: "FETCH_ERROR",
            reason: "get metadata m1: no message m1",
        });
    });
});

describe("AuditService.runLint", () => {
    it("returns only the findings and records a lint run", async () => {
        const record = vi.fn((run: NewAuditRun) => ({ id: 7, ...run }));
        const service = new AuditService({
            connector: mailbox([listMessage("m1", "a.example.com")]),
            loader: loaderFor({ filters: [{ name: "never", criteria: { list: "x.example.com" } }] }),
            history: { record },
        });

        const report = await service.runLint({ windowMs: 30 * DAY_MS });

        expect(report).toEqual({
            windowMs: 30 * DAY_MS,
            total: 1,
            findings: {
                deadRules: [{ name: "never", reason: DEAD_RULE_REASON }],
                missingLabels: [],
                conflicts: [],
            },
        });
        expect(record.mock.calls[0][0].kind).toBe("lint");
    });
});
