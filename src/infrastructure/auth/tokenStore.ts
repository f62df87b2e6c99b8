import fs from "fs";
import path from "path";
import type { Credentials } from "google-auth-library";
import { decryptOAuthTokens, encryptOAuthTokens, isEncryptedEnvelope } from "../oauthTokenCrypto";

export type GoogleTokens = Credentials;

export function mergeTokensForPersistence(params: {
    nextTokens: GoogleTokens;
    currentTokens?: GoogleTokens | null;
    persistedTokens?: GoogleTokens | null;
}): GoogleTokens {
    const { nextTokens, currentTokens, persistedTokens } = params;
    const existingRefreshToken =
        nextTokens.refresh_token ?? currentTokens?.refresh_token ?? persistedTokens?.refresh_token;

    return {
        ...currentTokens,
        ...nextTokens,
        ...(existingRefreshToken ? { refresh_token: existingRefreshToken } : {}),
    };
}

/** File-backed OAuth credentials. Encrypted at rest whenever a key is configured. */
export class TokenStore {
    private readonly tokenPath: string;

    constructor(
        tokenPath: string,
        private readonly encryptionKey?: string
    ) {
        this.tokenPath = path.isAbsolute(tokenPath) ? tokenPath : path.join(process.cwd(), tokenPath);
    }

    present(): boolean {
        return fs.existsSync(this.tokenPath);
    }

    load(): GoogleTokens | null {
        if (!this.present()) {
            return null;
        }

        const parsed: unknown = JSON.parse(fs.readFileSync(this.tokenPath, "utf-8"));
        if (isEncryptedEnvelope(parsed)) {
            if (!this.encryptionKey) {
                throw new Error("Token file is encrypted but TOKEN_ENCRYPTION_KEY is not configured");
            }
            return decryptOAuthTokens(parsed, this.encryptionKey);
        }
        return parsed as GoogleTokens;
    }

    save(tokens: GoogleTokens): void {
        fs.mkdirSync(path.dirname(this.tokenPath), { recursive: true });
        const body = this.encryptionKey ? encryptOAuthTokens(tokens, this.encryptionKey) : tokens;
        fs.writeFileSync(this.tokenPath, JSON.stringify(body, null, 2), { encoding: "utf-8", mode: 0o600 });
    }

    /** Persists `nextTokens`, carrying over a refresh token Google left out. */
    persist(nextTokens: GoogleTokens, currentTokens?: GoogleTokens | null): GoogleTokens {
        const merged = mergeTokensForPersistence({
            nextTokens,
            currentTokens,
            persistedTokens: this.load(),
        });
        this.save(merged);
        return merged;
    }

    clear(): void {
        fs.rmSync(this.tokenPath, { force: true });
    }
}
