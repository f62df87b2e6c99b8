import { z } from "zod";
import { ExportError } from "../errors";

const optionalText = z
    .string()
    .nullish()
    .transform((value) => value ?? undefined);

const labelIdList = z
    .array(z.string())
    .nullish()
    .transform((value) => value ?? []);

export const filterCriteriaSchema = z.object({
    from: optionalText,
    to: optionalText,
    subject: optionalText,
    query: optionalText,
    list: optionalText,
});

export const filterActionSchema = z.object({
    addLabelIds: labelIdList,
    removeLabelIds: labelIdList,
    forward: optionalText,
});

export const filterSchema = z.object({
    id: optionalText,
    name: optionalText,
    criteria: filterCriteriaSchema.nullish().transform((value) => value ?? filterCriteriaSchema.parse({})),
    action: filterActionSchema.nullish().transform((value) => value ?? filterActionSchema.parse({})),
});

export const exportLabelSchema = z.object({
    id: z.string().default(""),
    name: z.string().default(""),
    type: optionalText,
});

/** Shape of `gmailctl compile --format=json` output. */
export const filterExportSchema = z.object({
    filters: z
        .array(filterSchema)
        .nullish()
        .transform((value) => value ?? []),
    labels: z
        .array(exportLabelSchema)
        .nullish()
        .transform((value) => value ?? []),
});

export type FilterCriteria = z.infer<typeof filterCriteriaSchema>;
export type FilterAction = z.infer<typeof filterActionSchema>;
export type FilterExport = z.infer<typeof filterExportSchema>;

export function parseFilterExport(raw: unknown): FilterExport {
    const parsed = filterExportSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
        throw new ExportError(`Malformed filter export: ${issues}`);
    }
    if (parsed.data.filters.length === 0 && parsed.data.labels.length === 0) {
        throw new ExportError("Filter export contains no filters or labels");
    }
    return parsed.data;
}

export function parseFilterExportJson(text: string): FilterExport {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        throw new ExportError("Filter export is not valid JSON", { cause: err });
    }
    return parseFilterExport(raw);
}

/** Produces the compiled filter export for one run (gmailctl subprocess, saved file, ...). */
export interface FilterExportLoader {
    exportFilters(signal?: AbortSignal): Promise<FilterExport>;
}
