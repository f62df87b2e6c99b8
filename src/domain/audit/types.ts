export type SenderStat = {
    domain: string;
    count: number;
    previewSubject: string;
};

export type ListStat = {
    listId: string;
    count: number;
    previewSubject: string;
};

export type RuleFinding = {
    name: string;
    reason: string;
};

export type Conflict = {
    rules: string[];
    description: string;
};

export type Findings = {
    deadRules: RuleFinding[];
    missingLabels: string[];
    conflicts: Conflict[];
};

export type Suggestions = {
    archiveRules: string[];
    removeRules: RuleFinding[];
    smells: Conflict[];
};

type DeepReadonly<T> = T extends Date
    ? T
    : T extends Array<infer Item>
      ? ReadonlyArray<DeepReadonly<Item>>
      : T extends object
        ? { readonly [Key in keyof T]: DeepReadonly<T[Key]> }
        : T;

export type AuditReportData = {
    generatedAt: Date;
    windowMs: number;
    total: number;
    topSenders: SenderStat[];
    topLists: ListStat[];
    coverage: Record<string, number>;
    suggestions: Suggestions;
    findings: Findings;
};

export type AuditReport = DeepReadonly<AuditReportData>;

export type LintReport = DeepReadonly<{
    windowMs: number;
    total: number;
    findings: Findings;
}>;

export function emptyFindings(): Findings {
    return { deadRules: [], missingLabels: [], conflicts: [] };
}

export function freezeReport(data: AuditReportData): AuditReport {
    const { suggestions, findings } = data;
    return Object.freeze({
        ...data,
        topSenders: Object.freeze(data.topSenders.map((stat) => Object.freeze({ ...stat }))),
        topLists: Object.freeze(data.topLists.map((stat) => Object.freeze({ ...stat }))),
        coverage: Object.freeze({ ...data.coverage }),
        suggestions: Object.freeze({
            archiveRules: Object.freeze([...suggestions.archiveRules]),
            removeRules: Object.freeze(suggestions.removeRules.map((finding) => Object.freeze({ ...finding }))),
            smells: Object.freeze(suggestions.smells.map(freezeConflict)),
        }),
        findings: freezeFindings(findings),
    });
}

function freezeConflict(conflict: Conflict) {
    return Object.freeze({ ...conflict, rules: Object.freeze([...conflict.rules]) });
}

export function freezeFindings(findings: Findings): DeepReadonly<Findings> {
    return Object.freeze({
        deadRules: Object.freeze(findings.deadRules.map((finding) => Object.freeze({ ...finding }))),
        missingLabels: Object.freeze([...findings.missingLabels]),
        conflicts: Object.freeze(findings.conflicts.map(freezeConflict)),
    });
}
