import { buildArchiveRules, buildCoverage, buildRankings } from "../../domain/audit/rankings";
import { deriveFindings } from "../../domain/audit/findings";
import { replayRules } from "../../domain/audit/replay";
import { emptyFindings, freezeReport, type AuditReport, type Findings, type LintReport } from "../../domain/audit/types";
import { AuditError, ConfigError, ExportError, FetchError, errorMessage } from "../../domain/errors";
import {
    DEFAULT_METADATA_HEADERS,
    type LabelCatalog,
    type ListPage,
    type MailboxConnector,
    type MessageMetadata,
} from "../../domain/gmail/types";
import { compileRules } from "../../domain/rules/compileRules";
import type { FilterExport, FilterExportLoader } from "../../domain/rules/filterExport";
import type { RateLimiter } from "../../infrastructure/rate/tokenBucket";
import type { AuditRunKind, AuditRunRepository } from "../../infrastructure/repositories/auditRunRepository";
import { silentLogger, type EventLogger } from "../../infrastructure/logging/eventLogger";
import { toReportDocument } from "./reportOutput";

export const DAY_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_TOP_N = 20;
export const MAX_PAGE_SIZE = 500;

export type AuditOptions = {
    windowMs: number;
    topN?: number;
    pageSize?: number;
    headers?: readonly string[];
};

export type AuditServiceDeps = {
    connector: MailboxConnector;
    limiter?: RateLimiter;
    loader?: FilterExportLoader;
    logger?: EventLogger;
    history?: Pick<AuditRunRepository, "record">;
    clock?: () => Date;
};

export function daysFromWindow(windowMs: number): number {
    return Math.max(1, Math.ceil(windowMs / DAY_MS));
}

export function newerThanQuery(windowMs: number): string {
    return `newer_than:${daysFromWindow(windowMs)}d`;
}

function normalizeOptions(options: AuditOptions): Required<AuditOptions> {
    if (!Number.isFinite(options.windowMs) || options.windowMs <= 0) {
        throw new ConfigError("window must be positive");
    }
    const requestedTop = Math.floor(options.topN ?? 0);
    const topN = requestedTop > 0 ? requestedTop : DEFAULT_TOP_N;
    const requestedPage = Math.floor(options.pageSize ?? 0);
    const pageSize = requestedPage > 0 && requestedPage <= MAX_PAGE_SIZE ? requestedPage : MAX_PAGE_SIZE;
    const headers = options.headers && options.headers.length > 0 ? options.headers : DEFAULT_METADATA_HEADERS;
    return { windowMs: options.windowMs, topN, pageSize, headers };
}

export class AuditService {
    private readonly connector: MailboxConnector;
    private readonly limiter?: RateLimiter;
    private readonly loader?: FilterExportLoader;
    private readonly logger: EventLogger;
    private readonly history?: Pick<AuditRunRepository, "record">;
    private readonly clock: () => Date;

    constructor(deps: AuditServiceDeps) {
        this.connector = deps.connector;
        this.limiter = deps.limiter;
        this.loader = deps.loader;
        this.logger = deps.logger ?? silentLogger;
        this.history = deps.history;
        this.clock = deps.clock ?? (() => new Date());
    }

    async run(options: AuditOptions, signal?: AbortSignal): Promise<AuditReport> {
        const report = await this.execute("audit", options, signal);
        this.recordRun("audit", report);
        return report;
    }

    /** Same analysis as `run`, reduced to what a CI gate needs. */
    async runLint(options: AuditOptions, signal?: AbortSignal): Promise<LintReport> {
        const report = await this.execute("lint", options, signal);
        this.recordRun("lint", report);
        return Object.freeze({
            windowMs: report.windowMs,
            total: report.total,
            findings: report.findings,
        });
    }

    private async execute(kind: AuditRunKind, options: AuditOptions, signal?: AbortSignal): Promise<AuditReport> {
        const opts = normalizeOptions(options);
        this.logger.info("audit_run_started", { kind, windowMs: opts.windowMs, topN: opts.topN });
        try {
            const report = await this.analyse(opts, signal);
            this.logger.info("audit_run_completed", {
                kind,
                total: report.total,
                deadRules: report.findings.deadRules.length,
                missingLabels: report.findings.missingLabels.length,
                conflicts: report.findings.conflicts.length,
            });
            return report;
        } catch (err) {
            this.logger.error("audit_run_failed", {
                kind,
                code: err instanceof AuditError ? err.code : "UNKNOWN",
                reason: errorMessage(err),
            });
            throw err;
        }
    }

    private async analyse(opts: Required<AuditOptions>, signal?: AbortSignal): Promise<AuditReport> {
        const catalog = await this.listLabels(signal);
        const messages = await this.fetchSample(opts, signal);

        if (messages.length === 0) {
            return freezeReport({
                generatedAt: this.clock(),
                windowMs: opts.windowMs,
                total: 0,
                topSenders: [],
                topLists: [],
                coverage: {},
                suggestions: { archiveRules: [], removeRules: [], smells: [] },
                findings: emptyFindings(),
            });
        }

        const { topSenders, topLists } = buildRankings(messages, opts.topN);
        const coverage = buildCoverage(messages, catalog.byId);
        const findings = await this.analyseRules(messages, catalog, signal);

        return freezeReport({
            generatedAt: this.clock(),
            windowMs: opts.windowMs,
            total: messages.length,
            topSenders,
            topLists,
            coverage,
            suggestions: {
                archiveRules: buildArchiveRules(topLists, topSenders),
                removeRules: findings.deadRules,
                smells: findings.conflicts,
            },
            findings,
        });
    }

    private async analyseRules(
        messages: readonly MessageMetadata[],
        catalog: LabelCatalog,
        signal?: AbortSignal
    ): Promise<Findings> {
        if (!this.loader) {
            return emptyFindings();
        }

        const filterExport = await this.loadExport(this.loader, signal);
        const rules = compileRules(filterExport, catalog.byId);
        const replay = replayRules(rules, messages);
        const findings = deriveFindings(rules, replay, new Set(catalog.byName.keys()));
        this.logger.info("audit_rules_replayed", {
            rules: rules.length,
            evaluable: rules.filter((rule) => rule.evaluation.status === "evaluable").length,
        });
        return findings;
    }

    private async loadExport(loader: FilterExportLoader, signal?: AbortSignal): Promise<FilterExport> {
        try {
            return await loader.exportFilters(signal);
        } catch (err) {
            if (err instanceof ExportError) throw err;
            throw new ExportError(`load filter export: ${errorMessage(err)}`, { cause: err });
        }
    }

    private async listLabels(signal?: AbortSignal): Promise<LabelCatalog> {
        await this.pace("list labels", signal);
        try {
            return await this.connector.listLabels(signal);
        } catch (err) {
            throw new FetchError(`list labels: ${errorMessage(err)}`, { cause: err });
        }
    }

    private async fetchSample(opts: Required<AuditOptions>, signal?: AbortSignal): Promise<MessageMetadata[]> {
        const query = newerThanQuery(opts.windowMs);
        const messages: MessageMetadata[] = [];
        let pageToken: string | null = null;

        do {
            const page = await this.listPage(query, pageToken, opts.pageSize, signal);
            for (const id of page.ids) {
                await this.pace("rate limit metadata", signal);
                try {
                    messages.push(await this.connector.getMetadata(id, opts.headers, signal));
                } catch (err) {
                    throw new FetchError(`get metadata ${id}: ${errorMessage(err)}`, { cause: err });
                }
            }
            pageToken = page.nextPageToken;
        } while (pageToken);

        this.logger.info("audit_sample_fetched", { query, total: messages.length });
        return messages;
    }

    private async listPage(
        query: string,
        pageToken: string | null,
        pageSize: number,
        signal?: AbortSignal
    ): Promise<ListPage> {
        await this.pace("rate limit messages", signal);
        try {
            return await this.connector.listMessages(query, pageToken, pageSize, signal);
        } catch (err) {
            throw new FetchError(`list messages: ${errorMessage(err)}`, { cause: err });
        }
    }

    private async pace(operation: string, signal?: AbortSignal): Promise<void> {
        try {
            signal?.throwIfAborted();
            await this.limiter?.wait(signal);
        } catch (err) {
            throw new FetchError(`${operation}: ${errorMessage(err)}`, { cause: err });
        }
    }

    private recordRun(kind: AuditRunKind, report: AuditReport): void {
        if (!this.history) return;
        this.history.record({
            kind,
            generatedAt: report.generatedAt.toISOString(),
            windowMs: report.windowMs,
            total: report.total,
            deadRules: report.findings.deadRules.length,
            missingLabels: report.findings.missingLabels.length,
            conflicts: report.findings.conflicts.length,
            reportJson: JSON.stringify(toReportDocument(report)),
        });
    }
}
