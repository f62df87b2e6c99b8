import { execFile } from "child_process";
import fs from "fs/promises";
import { promisify } from "util";
import { ExportError, errorMessage } from "../../domain/errors";
import { parseFilterExportJson, type FilterExport, type FilterExportLoader } from "../../domain/rules/filterExport";

const execFileAsync = promisify(execFile);

const MAX_EXPORT_BYTES = 16 * 1024 * 1024;

export type ExecFn = (
    file: string,
    args: readonly string[],
    options: { signal?: AbortSignal; maxBuffer: number }
) => Promise<{ stdout: string; stderr: string }>;

const defaultExec: ExecFn = (file, args, options) =>
    execFileAsync(file, [...args], { ...options, encoding: "utf-8" });

function stderrOf(err: unknown): string {
    if (typeof err === "object" && err !== null && "stderr" in err && typeof err.stderr === "string") {
        return err.stderr.trim();
    }
    return "";
}

export type GmailctlRunnerOptions = {
    binary?: string;
    configDir?: string;
    exec?: ExecFn;
};

/** Loads filters by running `gmailctl compile --format=json`. */
export class GmailctlRunner implements FilterExportLoader {
    private readonly binary: string;
    private readonly configDir?: string;
    private readonly exec: ExecFn;

    constructor(options: GmailctlRunnerOptions = {}) {
        this.binary = options.binary || "gmailctl";
        this.configDir = options.configDir;
        this.exec = options.exec ?? defaultExec;
    }

    args(): string[] {
        const args = ["compile", "--format=json"];
        if (this.configDir) {
            args.push("--config", this.configDir);
        }
        return args;
    }

    async exportFilters(signal?: AbortSignal): Promise<FilterExport> {
        let stdout: string;
        try {
            ({ stdout } = await this.exec(this.binary, this.args(), { signal, maxBuffer: MAX_EXPORT_BYTES }));
        } catch (err) {
            const detail = stderrOf(err) || errorMessage(err);
            throw new ExportError(`run gmailctl: ${detail}`, { cause: err });
        }
        return parseFilterExportJson(stdout);
    }
}

/** Loads a previously saved `gmailctl compile --format=json` output. */
export class FileExportLoader implements FilterExportLoader {
    constructor(private readonly filePath: string) {}

    async exportFilters(signal?: AbortSignal): Promise<FilterExport> {
        let text: string;
        try {
            text = await fs.readFile(this.filePath, { encoding: "utf-8", signal });
        } catch (err) {
            throw new ExportError(`read filter export ${this.filePath}: ${errorMessage(err)}`, { cause: err });
        }
        return parseFilterExportJson(text);
    }
}
