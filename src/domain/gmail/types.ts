export type MessageId = string;
export type LabelId = string;

export const INBOX_LABEL: LabelId = "INBOX";
export const UNREAD_LABEL: LabelId = "UNREAD";
export const STARRED_LABEL: LabelId = "STARRED";

export const DEFAULT_METADATA_HEADERS = [
    "From",
    "To",
    "Subject",
    "List-Id",
    "Auto-Submitted",
    "Precedence",
] as const;

export type MessageMetadata = {
    id: MessageId;
    headers: Readonly<Record<string, string>>;
    labelIds: readonly LabelId[];
};

export type ListPage = {
    ids: MessageId[];
    nextPageToken: string | null;
};

export type LabelCatalog = {
    byName: ReadonlyMap<string, LabelId>;
    byId: ReadonlyMap<LabelId, string>;
};

export type ModifyOps = {
    addLabelIds?: LabelId[];
    removeLabelIds?: LabelId[];
    archive?: boolean;
    markRead?: boolean;
};

/**
 * Narrow view of the mailbox the audit needs. The googleapis client in
 * infrastructure implements it; tests use in-memory fakes.
 */
export interface MailboxConnector {
    listMessages(query: string, pageToken: string | null, pageSize: number, signal?: AbortSignal): Promise<ListPage>;
    getMetadata(id: MessageId, headerNames: readonly string[], signal?: AbortSignal): Promise<MessageMetadata>;
    listLabels(signal?: AbortSignal): Promise<LabelCatalog>;
    ensureLabel(name: string, signal?: AbortSignal): Promise<LabelId>;
    batchModify(ids: readonly MessageId[], ops: ModifyOps, signal?: AbortSignal): Promise<void>;
}

export function headerValue(meta: MessageMetadata, name: string): string {
    const direct = meta.headers[name];
    if (direct !== undefined) return direct;
    const lower = name.toLowerCase();
    for (const [key, value] of Object.entries(meta.headers)) {
        if (key.toLowerCase() === lower) return value;
    }
    return "";
}
