import { describe, expect, it } from "vitest";
import { decryptOAuthTokens, encryptOAuthTokens, isEncryptedEnvelope } from "./oauthTokenCrypto";

describe("oauthTokenCrypto", () => {
    it("decrypts what it encrypted", () => {
        const envelope = encryptOAuthTokens({ access_token: "test-access" }, "test-secret");
        expect(envelope.v).toBe(1);
        expect(envelope.alg).toBe("aes-256-gcm");
        expect(decryptOAuthTokens(envelope, "test-secret")).toEqual({ access_token: "test-access" });
    });

    it("fails with the wrong key", () => {
        const envelope = encryptOAuthTokens({ access_token: "test-access" }, "test-secret");
        expect(() => decryptOAuthTokens(envelope, "other-secret")).toThrow();
    });

    it("recognises envelopes", () => {
        expect(isEncryptedEnvelope(encryptOAuthTokens({}, "test-secret"))).toBe(true);
        expect(isEncryptedEnvelope({ access_token: "test-access" })).toBe(false);
        expect(isEncryptedEnvelope(null)).toBe(false);
    });
});
