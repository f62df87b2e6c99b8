import crypto from "crypto";
import type { Credentials } from "google-auth-library";

export type EncryptedEnvelope = {
    v: 1;
    alg: "aes-256-gcm";
    iv: string;
    tag: string;
    data: string;
};

function deriveAesKey(secret: string): Buffer {
    return crypto.createHash("sha256").update(secret).digest();
}

export function isEncryptedEnvelope(value: unknown): value is EncryptedEnvelope {
    if (!value || typeof value !== "object") return false;
    const candidate: Partial<Record<keyof EncryptedEnvelope, unknown>> = value;
    return (
        candidate.v === 1 &&
        candidate.alg === "aes-256-gcm" &&
        typeof candidate.iv === "string" &&
        typeof candidate.tag === "string" &&
        typeof candidate.data === "string"
    );
}

export function encryptOAuthTokens(tokens: Credentials, secret: string): EncryptedEnvelope {
    const iv = crypto.randomBytes(12);
    const cipher = crypto.createCipheriv("aes-256-gcm", deriveAesKey(secret), iv);
    const encrypted = Buffer.concat([cipher.update(JSON.stringify(tokens), "utf-8"), cipher.final()]);
    return {
        v: 1,
        alg: "aes-256-gcm",
        iv: iv.toString("base64"),
        tag: cipher.getAuthTag().toString("base64"),
        data: encrypted.toString("base64"),
    };
}

export function decryptOAuthTokens(envelope: EncryptedEnvelope, secret: string): Credentials {
    const decipher = crypto.createDecipheriv("aes-256-gcm", deriveAesKey(secret), Buffer.from(envelope.iv, "base64"));
    decipher.setAuthTag(Buffer.from(envelope.tag, "base64"));
    const decrypted = Buffer.concat([decipher.update(Buffer.from(envelope.data, "base64")), decipher.final()]);
    return JSON.parse(decrypted.toString("utf-8")) as Credentials;
}
