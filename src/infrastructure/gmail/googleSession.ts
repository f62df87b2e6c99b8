import type { OAuth2Client } from "google-auth-library";
import type { MailboxConnector } from "../../domain/gmail/types";
import type { TokenStore } from "../auth/tokenStore";
import type { EventLogger } from "../logging/eventLogger";
import { errorMessage } from "../../domain/errors";
import { GoogleMailboxClient, createGmailUsersApi, exchangeCodeForTokens, getAuthUrl } from "./googleMailboxClient";

export type AuthStatus = {
    authenticated: boolean;
    hasRefreshToken: boolean;
    tokenFilePresent: boolean;
};

/** One OAuth2 client bound to the persisted token file. */
export class GoogleSession {
    constructor(
        private readonly client: OAuth2Client,
        private readonly tokens: TokenStore,
        private readonly logger: EventLogger
    ) {
        const persisted = tokens.load();
        if (persisted) {
            client.setCredentials(persisted);
        }
        client.on("tokens", (next) => {
            try {
                tokens.persist(next, client.credentials);
            } catch (err) {
                logger.error("auth_token_persist_failed", { reason: errorMessage(err) });
            }
        });
    }

    authUrl(): string {
        return getAuthUrl(this.client);
    }

    async completeOAuth(code: string): Promise<void> {
        const next = await exchangeCodeForTokens(this.client, code);
        const merged = this.tokens.persist(next, this.client.credentials);
        this.client.setCredentials(merged);
        this.logger.info("auth_oauth_success", { hasRefreshToken: Boolean(merged.refresh_token) });
    }

    status(): AuthStatus {
        const creds = this.client.credentials;
        return {
            authenticated: Boolean(creds?.access_token || creds?.refresh_token),
            hasRefreshToken: Boolean(creds?.refresh_token),
            tokenFilePresent: this.tokens.present(),
        };
    }

    logout(): void {
        this.tokens.clear();
        this.client.setCredentials({});
        this.logger.info("auth_logout");
    }

    /** A connector over the current credentials, or null before the OAuth flow has run. */
    connector(): MailboxConnector | null {
        if (!this.status().authenticated) {
            return null;
        }
        return new GoogleMailboxClient(createGmailUsersApi(this.client));
    }
}
