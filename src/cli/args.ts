import { ConfigError } from "../domain/errors";

export type AuditArgs = {
    days: number;
    top: number;
    pageSize: number;
    jsonPath?: string;
    exportPath?: string;
    help: boolean;
};

export type LintArgs = {
    days: number;
    failOn: string;
    exportPath?: string;
    help: boolean;
};

export const AUDIT_USAGE = `Usage: mailrule-audit [--days 60] [--top 30] [--page-size 500] [--json report.json] [--export filters.json]`;
export const LINT_USAGE = `Usage: mailrule-lint [--days 30] [--fail-on dead,conflict,missing-label] [--export filters.json]`;

type Flag = { name: string; value?: string };

/** Splits `--name value` and `--name=value` pairs; bare words are rejected. */
function readFlags(argv: string[], valued: ReadonlySet<string>): Flag[] {
    const flags: Flag[] = [];
    for (let i = 0; i < argv.length; i += 1) {
        const token = argv[i];
        if (token === "-h" || token === "--help") {
            flags.push({ name: "help" });
            continue;
        }
        if (!token.startsWith("--")) {
            throw new ConfigError(`unexpected argument "${token}"`);
        }

        const eq = token.indexOf("=");
        const name = eq === -1 ? token.slice(2) : token.slice(2, eq);
        if (!valued.has(name)) {
            throw new ConfigError(`unknown flag --${name}`);
        }
        if (eq !== -1) {
            flags.push({ name, value: token.slice(eq + 1) });
            continue;
        }
        const value = argv[i + 1];
        if (value === undefined || value.startsWith("--")) {
            throw new ConfigError(`flag --${name} needs a value`);
        }
        flags.push({ name, value });
        i += 1;
    }
    return flags;
}

function positiveInt(name: string, value: string): number {
    const parsed = Number(value);
    if (!value.trim() || !Number.isInteger(parsed) || parsed <= 0) {
        throw new ConfigError(`--${name} must be a positive integer, got "${value}"`);
    }
    return parsed;
}

export function parseAuditArgs(
    argv: string[],
    defaults: { days: number; top: number; pageSize: number }
): AuditArgs {
    const args: AuditArgs = { ...defaults, help: false };
    for (const flag of readFlags(argv, new Set(["days", "top", "page-size", "json", "export"]))) {
        const value = flag.value ?? "";
        switch (flag.name) {
            case "help":
                args.help = true;
                break;
            case "days":
                args.days = positiveInt(flag.name, value);
                break;
            case "top":
                args.top = positiveInt(flag.name, value);
                break;
            case "page-size":
                args.pageSize = positiveInt(flag.name, value);
                break;
            case "json":
                args.jsonPath = value;
                break;
            case "export":
                args.exportPath = value;
                break;
        }
    }
    return args;
}

export function parseLintArgs(argv: string[], defaults: { days: number; failOn: string }): LintArgs {
    const args: LintArgs = { ...defaults, help: false };
    for (const flag of readFlags(argv, new Set(["days", "fail-on", "export"]))) {
        const value = flag.value ?? "";
        switch (flag.name) {
            case "help":
                args.help = true;
                break;
            case "days":
                args.days = positiveInt(flag.name, value);
                break;
            case "fail-on":
                args.failOn = value;
                break;
            case "export":
                args.exportPath = value;
                break;
        }
    }
    return args;
}
