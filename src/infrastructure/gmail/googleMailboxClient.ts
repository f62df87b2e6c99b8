import fs from "fs";
import path from "path";
import { google } from "googleapis";
import type { gmail_v1 } from "googleapis";
import type { Credentials, OAuth2Client } from "google-auth-library";
import { z } from "zod";
import {
    INBOX_LABEL,
    UNREAD_LABEL,
    type LabelCatalog,
    type LabelId,
    type ListPage,
    type MailboxConnector,
    type MessageId,
    type MessageMetadata,
    type ModifyOps,
} from "../../domain/gmail/types";

export const SCOPES = ["https://www.googleapis.com/auth/gmail.readonly"];

const BATCH_MODIFY_LIMIT = 1000;

const clientSecretSchema = z.object({
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
    redirect_uris: z.array(z.string()).min(1),
});

const credentialsFileSchema = z
    .object({
        web: clientSecretSchema.optional(),
        installed: clientSecretSchema.optional(),
    })
    .refine((value) => value.web || value.installed, "expected a `web` or `installed` client entry");

export type ClientSecret = z.infer<typeof clientSecretSchema>;

export function loadClientSecret(credentialsPath: string): ClientSecret {
    const filePath = path.isAbsolute(credentialsPath) ? credentialsPath : path.join(process.cwd(), credentialsPath);
    if (!fs.existsSync(filePath)) {
        throw new Error(`Missing OAuth credentials file (${credentialsPath})`);
    }
    const parsed = credentialsFileSchema.safeParse(JSON.parse(fs.readFileSync(filePath, "utf-8")));
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => issue.message).join("; ");
        throw new Error(`Invalid OAuth credentials file (${credentialsPath}): ${issues}`);
    }
    const secret = parsed.data.web ?? parsed.data.installed;
    if (!secret) {
        throw new Error(`Invalid OAuth credentials file (${credentialsPath})`);
    }
    return secret;
}

export function createOAuth2Client(secret: ClientSecret): OAuth2Client {
    return new google.auth.OAuth2(secret.client_id, secret.client_secret, secret.redirect_uris[0]);
}

export function getAuthUrl(client: OAuth2Client, scopes: string[] = SCOPES): string {
    return client.generateAuthUrl({
        access_type: "offline",
        prompt: "consent",
        scope: scopes,
    });
}

export async function exchangeCodeForTokens(client: OAuth2Client, code: string): Promise<Credentials> {
    const { tokens } = await client.getToken(code);
    return tokens;
}

type RequestOptions = { signal?: AbortSignal };

/** The slice of `gmail.users` the connector calls; `google.gmail(...).users` satisfies it. */
export type GmailUsersApi = {
    messages: {
        list(
            params: gmail_v1.Params$Resource$Users$Messages$List,
            options?: RequestOptions
        ): Promise<{ data: gmail_v1.Schema$ListMessagesResponse }>;
        get(
            params: gmail_v1.Params$Resource$Users$Messages$Get,
            options?: RequestOptions
        ): Promise<{ data: gmail_v1.Schema$Message }>;
        batchModify(
            params: gmail_v1.Params$Resource$Users$Messages$Batchmodify,
            options?: RequestOptions
        ): Promise<unknown>;
    };
    labels: {
        list(
            params: gmail_v1.Params$Resource$Users$Labels$List,
            options?: RequestOptions
        ): Promise<{ data: gmail_v1.Schema$ListLabelsResponse }>;
        create(
            params: gmail_v1.Params$Resource$Users$Labels$Create,
            options?: RequestOptions
        ): Promise<{ data: gmail_v1.Schema$Label }>;
    };
};

export function createGmailUsersApi(auth: OAuth2Client): GmailUsersApi {
    return google.gmail({ version: "v1", auth }).users;
}

function canonicalHeaders(
    headers: gmail_v1.Schema$MessagePartHeader[] | undefined,
    requested: readonly string[]
): Record<string, string> {
    const canonicalByLower = new Map(requested.map((name) => [name.toLowerCase(), name]));
    const out: Record<string, string> = {};
    for (const header of headers ?? []) {
        if (!header.name) continue;
        const key = canonicalByLower.get(header.name.toLowerCase()) ?? header.name;
        if (!(key in out)) {
            out[key] = header.value ?? "";
        }
    }
    return out;
}

function removalsFor(ops: ModifyOps): LabelId[] {
    const removals = new Set(ops.removeLabelIds ?? []);
    if (ops.archive) removals.add(INBOX_LABEL);
    if (ops.markRead) removals.add(UNREAD_LABEL);
    return [...removals];
}

export class GoogleMailboxClient implements MailboxConnector {
    constructor(
        private readonly users: GmailUsersApi,
        private readonly userId: string = "me"
    ) {}

    async listMessages(
        query: string,
        pageToken: string | null,
        pageSize: number,
        signal?: AbortSignal
    ): Promise<ListPage> {
        const res = await this.users.messages.list(
            {
                userId: this.userId,
                q: query,
                maxResults: pageSize,
                pageToken: pageToken || undefined,
            },
            { signal }
        );
        const ids = (res.data.messages ?? [])
            .map((message) => message.id)
            .filter((id): id is string => typeof id === "string" && id.length > 0);
        return { ids, nextPageToken: res.data.nextPageToken || null };
    }

    async getMetadata(id: MessageId, headerNames: readonly string[], signal?: AbortSignal): Promise<MessageMetadata> {
        const res = await this.users.messages.get(
            {
                userId: this.userId,
                id,
                format: "metadata",
                metadataHeaders: [...headerNames],
            },
            { signal }
        );
        return {
            id,
            headers: canonicalHeaders(res.data.payload?.headers, headerNames),
            labelIds: res.data.labelIds ?? [],
        };
    }

    async listLabels(signal?: AbortSignal): Promise<LabelCatalog> {
        const res = await this.users.labels.list({ userId: this.userId }, { signal });
        const byName = new Map<string, LabelId>();
        const byId = new Map<LabelId, string>();
        for (const label of res.data.labels ?? []) {
            if (!label.id || !label.name) continue;
            byName.set(label.name, label.id);
            byId.set(label.id, label.name);
        }
        return { byName, byId };
    }

    async ensureLabel(name: string, signal?: AbortSignal): Promise<LabelId> {
        const { byName } = await this.listLabels(signal);
        const existing = byName.get(name);
        if (existing) {
            return existing;
        }
        const created = await this.users.labels.create(
            { userId: this.userId, requestBody: { name } },
            { signal }
        );
        if (!created.data.id) {
            throw new Error(`create label "${name}": response carried no id`);
        }
        return created.data.id;
    }

    async batchModify(ids: readonly MessageId[], ops: ModifyOps, signal?: AbortSignal): Promise<void> {
        const addLabelIds = ops.addLabelIds ?? [];
        const removeLabelIds = removalsFor(ops);
        for (let start = 0; start < ids.length; start += BATCH_MODIFY_LIMIT) {
            await this.users.messages.batchModify(
                {
                    userId: this.userId,
                    requestBody: {
                        ids: ids.slice(start, start + BATCH_MODIFY_LIMIT),
                        ...(addLabelIds.length > 0 ? { addLabelIds } : {}),
                        ...(removeLabelIds.length > 0 ? { removeLabelIds } : {}),
                    },
                },
                { signal }
            );
        }
    }
}
