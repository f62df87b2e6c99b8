export type AuditErrorCode = "CONFIG_ERROR" | "FETCH_ERROR" | "EXPORT_ERROR" | "OUTPUT_ERROR";

export class AuditError extends Error {
    readonly code: AuditErrorCode;

    constructor(code: AuditErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export class ConfigError extends AuditError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("CONFIG_ERROR", message, options);
    }
}

export class FetchError extends AuditError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("FETCH_ERROR", message, options);
    }
}

export class ExportError extends AuditError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("EXPORT_ERROR", message, options);
    }
}

export class OutputError extends AuditError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("OUTPUT_ERROR", message, options);
    }
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}

/** HTTP-ish status carried by googleapis (GaxiosError) and similar client errors. */
export function errorStatus(err: unknown): number | undefined {
    let current: unknown = err;
    while (typeof current === "object" && current !== null) {
        if ("status" in current && typeof current.status === "number") return current.status;
        if ("code" in current && typeof current.code === "number") return current.code;
        current = "cause" in current ? current.cause : undefined;
    }
    return undefined;
}
