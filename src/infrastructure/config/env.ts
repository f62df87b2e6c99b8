import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

function positiveInt(name: string, fallback: number) {
    return z
        .string()
        .optional()
        .transform((value) => (value && value.trim() ? Number(value) : fallback))
        .refine((value) => Number.isInteger(value) && value > 0, `${name} must be a positive integer`);
}

const optionalText = z
    .string()
    .optional()
    .transform((value) => value?.trim() || undefined);

const blankAsUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const envSchema = z.object({
    PORT: positiveInt("PORT", 3000),
    FRONTEND_REDIRECT_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
    CORS_ORIGIN: optionalText,
    TOKEN_ENCRYPTION_KEY: optionalText,
    DB_PATH: optionalText,
    GOOGLE_CREDENTIALS_PATH: z.string().default("credentials.json"),
    TOKEN_PATH: z.string().default("data/token.json"),
    AUDIT_WINDOW_DAYS: positiveInt("AUDIT_WINDOW_DAYS", 60),
    AUDIT_TOP_N: positiveInt("AUDIT_TOP_N", 30),
    AUDIT_PAGE_SIZE: positiveInt("AUDIT_PAGE_SIZE", 500).refine(
        (value) => value <= 500,
        "AUDIT_PAGE_SIZE must not exceed 500"
    ),
    GMAIL_RPS: positiveInt("GMAIL_RPS", 4),
    GMAILCTL_BINARY: z.string().default("gmailctl"),
    GMAILCTL_CONFIG_DIR: optionalText,
    FILTER_EXPORT_PATH: optionalText,
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
    const parsed = envSchema.safeParse(source);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
        throw new Error(`Invalid environment configuration: ${issues}`);
    }
    return parsed.data;
}

let cached: Env | null = null;

export function getEnv(): Env {
    if (!cached) {
        cached = parseEnv(process.env);
    }
    return cached;
}
