import type { gmail_v1 } from "googleapis";
import { describe, expect, it, vi } from "vitest";
import { GoogleMailboxClient, type GmailUsersApi } from "./googleMailboxClient";

function stubUsers(options: {
    page?: gmail_v1.Schema$ListMessagesResponse;
    message?: gmail_v1.Schema$Message;
    labels?: gmail_v1.Schema$Label[];
} = {}) {
    const list = vi.fn(async (_params: gmail_v1.Params$Resource$Users$Messages$List) => ({ data: options.page ?? {} }));
    const get = vi.fn(async (_params: gmail_v1.Params$Resource$Users$Messages$Get) => ({ data: options.message ?? {} }));
    const batchModify = vi.fn(async (_params: gmail_v1.Params$Resource$Users$Messages$Batchmodify) => ({ data: {} }));
    const listLabels = vi.fn(async (_params: gmail_v1.Params$Resource$Users$Labels$List) => ({
        data: { labels: options.labels ?? [] },
    }));
    const createLabel = vi.fn(async (params: gmail_v1.Params$Resource$Users$Labels$Create) => ({
        data: { id: "Label_new", name: params.requestBody?.name },
    }));
    const users: GmailUsersApi = {
        messages: { list, get, batchModify },
        labels: { list: listLabels, create: createLabel },
    };
    return { users, list, get, batchModify, createLabel };
}

describe("GoogleMailboxClient.listMessages", () => {
    it("passes the query and keeps only usable ids", async () => {
        const stub = stubUsers({ page: { messages: [{ id: "m1" }, { id: null }, {}, { id: "m2" }], nextPageToken: "" } });
        const client = new GoogleMailboxClient(stub.users);

        expect(await client.listMessages("newer_than:2d", null, 500)).toEqual({ ids: ["m1", "m2"], nextPageToken: null });
        expect(stub.list.mock.calls[0][0]).toEqual({
            userId: "me",
            q: "newer_than:2d",
            maxResults: 500,
            pageToken: undefined,
        });
    });

    it("forwards the page token", async () => {
        const stub = stubUsers({ page: { messages: [], nextPageToken: "p3" } });
        const client = new GoogleMailboxClient(stub.users);

        expect(await client.listMessages("q", "p2", 10)).toEqual({ ids: [], nextPageToken: "p3" });
        expect(stub.list.mock.calls[0][0].pageToken).toBe("p2");
    });
});

describe("GoogleMailboxClient.getMetadata", () => {
    it("requests metadata and files headers under the requested names", async () => {
        const stub = stubUsers({
            message: {
                labelIds: ["INBOX", "Label_1"],
                payload: {
                    headers: [
                        { name: "from", value: "a@example.com" },
                        { name: "Subject", value: "Hi" },
                        { name: "X-Other", value: "1" },
                        { name: "FROM", value: "duplicate@example.com" },
                    ],
                },
            },
        });
        const client = new GoogleMailboxClient(stub.users);

        expect(await client.getMetadata("m1", ["From", "Subject"])).toEqual({
            id: "m1",
            headers: { From: "a@example.com", Subject: "Hi", "X-Other": "1" },
            labelIds: ["INBOX", "Label_1"],
        });
        expect(stub.get.mock.calls[0][0]).toEqual({
            userId: "me",
            id: "m1",
            format: "metadata",
            metadataHeaders: ["From", "Subject"],
        });
    });
});

describe("GoogleMailboxClient labels", () => {
    const labels = [
        { id: "INBOX", name: "INBOX" },
        { id: "Label_1", name: "bulk" },
        { id: "Label_broken" },
    ];

    it("indexes labels by name and id", async () => {
        const client = new GoogleMailboxClient(stubUsers({ labels }).users);
        const catalog = await client.listLabels();
        expect([...catalog.byName.entries()]).toEqual([
            ["INBOX", "INBOX"],
            ["bulk", "Label_1"],
        ]);
        expect(catalog.byId.get("Label_1")).toBe("bulk");
    });

    it("reuses an existing label", async () => {
        const stub = stubUsers({ labels });
        expect(await new GoogleMailboxClient(stub.users).ensureLabel("bulk")).toBe("Label_1");
        expect(stub.createLabel).not.toHaveBeenCalled();
    });

    it("creates a missing label", async () => {
        const stub = stubUsers({ labels });
        expect(await new GoogleMailboxClient(stub.users).ensureLabel("receipts")).toBe("Label_new");
        expect(stub.createLabel.mock.calls[0][0]).toEqual({ userId: "me", requestBody: { name: "receipts" } });
    });
});

describe("GoogleMailboxClient.batchModify", () => {
    it("chunks ids and turns archive and markRead into label removals", async () => {
        const stub = stubUsers();
        const ids = Array.from({ length: 2500 }, (_, i) => `m${i}`);

        await new GoogleMailboxClient(stub.users).batchModify(ids, {
            addLabelIds: ["Label_1"],
            archive: true,
            markRead: true,
        });

        const bodies = stub.batchModify.mock.calls.map(([params]) => params.requestBody);
        expect(bodies.map((body) => body?.ids?.length)).toEqual([1000, 1000, 500]);
        expect(bodies[0]?.addLabelIds).toEqual(["Label_1"]);
        expect(bodies[0]?.removeLabelIds).toEqual(["INBOX", "UNREAD"]);
        expect(bodies[2]?.ids?.[0]).toBe("m2000");
    });

    it("sends nothing for an empty id list", async () => {
        const stub = stubUsers();
        await new GoogleMailboxClient(stub.users).batchModify([], { archive: true });
        expect(stub.batchModify).not.toHaveBeenCalled();
    });
});
