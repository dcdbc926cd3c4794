/**
 * Credential strategies for the Notion API.
 *
 * The transport asks its `AuthProvider` for fresh headers on every attempt,
 * so an OAuth token that expires mid-retry is refreshed before the next one.
 */

import { z } from "zod";
import type { Logger } from "../core/index.js";
import type { NotionConfig, OAuthSettings } from "./config.js";
import { NotionAuthError } from "./errors.js";

export const DEFAULT_OAUTH_BASE_URL = "https://api.notion.com/v1/oauth";

/** Tokens within this many ms of expiry are treated as expired. */
export const REFRESH_MARGIN_MS = 30_000;

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface AuthProvider {
  readonly kind: "integration_token" | "oauth";
  headers(): Promise<Record<string, string>>;
  isValid(): boolean;
}

const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

// ─── Integration token ───

export class IntegrationTokenAuth implements AuthProvider {
  readonly kind = "integration_token";
  private readonly token: string;

  constructor(token: string, logger: Logger = noopLogger) {
    const trimmed = token.trim();
    if (!trimmed) {
      throw new NotionAuthError("Integration token is required");
    }
    if (!trimmed.startsWith("secret_") && !trimmed.startsWith("ntn_")) {
      logger.warn("Integration token does not use a known Notion prefix (secret_ or ntn_)");
    }
    this.token = trimmed;
  }

  async headers(): Promise<Record<string, string>> {
    return {
      Authorization: `Bearer ${this.token}`,
      "Content-Type": "application/json",
    };
  }

  isValid(): boolean {
    return this.token.length > 10;
  }
}

// ─── OAuth ───

const tokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string().optional(),
    expires_in: z.number().positive().optional(),
    bot_id: z.string().optional(),
    workspace_id: z.string().optional(),
    workspace_name: z.string().nullable().optional(),
  })
  .passthrough();

export type OAuthTokenResponse = z.infer<typeof tokenResponseSchema>;

export interface OAuthOptions {
  fetch?: FetchFn;
  now?: () => number;
  logger?: Logger;
  oauthBaseUrl?: string;
}

export class OAuthAuth implements AuthProvider {
  readonly kind = "oauth";

  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly redirectUri: string;
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;
  private readonly logger: Logger;

  private accessToken: string | undefined;
  private refreshToken: string | undefined;
  private expiresAt: number | undefined;
  private inflightRefresh: Promise<OAuthTokenResponse> | null = null;

  constructor(settings: OAuthSettings, opts: OAuthOptions = {}) {
    if (!settings.clientId || !settings.clientSecret || !settings.redirectUri) {
      throw new NotionAuthError("OAuth requires clientId, clientSecret and redirectUri");
    }
    this.clientId = settings.clientId;
    this.clientSecret = settings.clientSecret;
    this.redirectUri = settings.redirectUri;
    this.accessToken = settings.accessToken;
    this.refreshToken = settings.refreshToken;
    this.expiresAt = settings.expiresAt;
    this.baseUrl = (opts.oauthBaseUrl ?? DEFAULT_OAUTH_BASE_URL).replace(/\/+$/, "");
    this.fetchFn = opts.fetch ?? fetch;
    this.now = opts.now ?? Date.now;
    this.logger = opts.logger ?? noopLogger;
  }

  get tokens(): { accessToken?: string; refreshToken?: string; expiresAt?: number } {
    return {
      accessToken: this.accessToken,
      refreshToken: this.refreshToken,
      expiresAt: this.expiresAt,
    };
  }

  authorizationUrl(state?: string): string {
    const params = new URLSearchParams({
      client_id: this.clientId,
      response_type: "code",
      redirect_uri: this.redirectUri,
    });
    if (state !== undefined) params.set("state", state);
    return `${this.baseUrl}/authorize?${params.toString()}`;
  }

  async exchangeCode(code: string): Promise<OAuthTokenResponse> {
    if (!code) {
      throw new NotionAuthError("Authorization code is required");
    }
    const tokens = await this.requestToken({
      grant_type: "authorization_code",
      code,
      redirect_uri: this.redirectUri,
    });
    this.applyTokens(tokens, false);
    this.logger.info("Exchanged OAuth authorization code", {
      workspace: tokens.workspace_name ?? tokens.workspace_id,
    });
    return tokens;
  }

  /**
   * Refresh the access token. Concurrent callers share one request.
   */
  refresh(): Promise<OAuthTokenResponse> {
    if (!this.inflightRefresh) {
      this.inflightRefresh = this.doRefresh().finally(() => {
        this.inflightRefresh = null;
      });
    }
    return this.inflightRefresh;
  }

  isExpired(): boolean {
    if (this.expiresAt === undefined) return false;
    return this.now() >= this.expiresAt - REFRESH_MARGIN_MS;
  }

  isValid(): boolean {
    return this.accessToken !== undefined && !this.isExpired();
  }

  async headers(): Promise<Record<string, string>> {
    if (this.isExpired() && this.refreshToken) {
      await this.refresh();
    }
    if (!this.accessToken) {
      throw new NotionAuthError(
        "No OAuth access token available; complete the authorization flow first",
      );
    }
    return {
      Authorization: `Bearer ${this.accessToken}`,
      "Content-Type": "application/json",
    };
  }

  private async doRefresh(): Promise<OAuthTokenResponse> {
    const refreshToken = this.refreshToken;
    if (!refreshToken) {
      throw new NotionAuthError("No refresh token available");
    }
    this.logger.debug("Refreshing OAuth access token");
    const tokens = await this.requestToken({
      grant_type: "refresh_token",
      refresh_token: refreshToken,
    });
    this.applyTokens(tokens, true);
    return tokens;
  }

  private applyTokens(tokens: OAuthTokenResponse, keepRefreshToken: boolean): void {
    this.accessToken = tokens.access_token;
    if (tokens.refresh_token) {
      this.refreshToken = tokens.refresh_token;
    } else if (!keepRefreshToken) {
      this.refreshToken = undefined;
    }
    this.expiresAt =
      tokens.expires_in === undefined ? undefined : this.now() + tokens.expires_in * 1000;
  }

  private async requestToken(body: Record<string, string>): Promise<OAuthTokenResponse> {
    const credentials = Buffer.from(`${this.clientId}:${this.clientSecret}`).toString("base64");
    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(`${this.baseUrl}/token`, {
        method: "POST",
        headers: {
          Authorization: `Basic ${credentials}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
      });
      text = await response.text();
    } catch (err) {
      throw new NotionAuthError(
        `OAuth token request failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    if (!response.ok) {
      throw new NotionAuthError(
        `OAuth token request failed with status ${response.status}: ${text}`,
        { status: response.status },
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (err) {
      throw new NotionAuthError("OAuth token response is not valid JSON", { cause: err });
    }
    const parsed = tokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new NotionAuthError("OAuth token response is missing access_token", {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}

// ─── Selection ───

/**
 * Pick a credential strategy: bearer token first, then OAuth.
 */
export function createAuthFromConfig(
  config: Pick<NotionConfig, "token" | "oauth">,
  opts: OAuthOptions = {},
): AuthProvider {
  if (config.token) {
    return new IntegrationTokenAuth(config.token, opts.logger);
  }
  if (config.oauth) {
    return new OAuthAuth(config.oauth, opts);
  }
  throw new NotionAuthError(
    "No Notion credentials configured: set NOTION_API_TOKEN or the NOTION_OAUTH_* variables",
  );
}
