/**
 * NotionClient: one transport plus the resource endpoints bound to it.
 *
 * Build one with `new NotionClient({ auth })`, or through `fromToken`,
 * `fromOAuth` or `fromEnv`. Each instance owns its own rate-limit window
 * and close state.
 */

import type { Logger } from "../core/index.js";
import { createLogger } from "../core/index.js";
import { createAuthFromConfig, IntegrationTokenAuth, OAuthAuth } from "./auth.js";
import type { AuthProvider, FetchFn } from "./auth.js";
import { loadConfig } from "./config.js";
import type { Environment, OAuthSettings } from "./config.js";
import {
  BlocksEndpoint,
  DatabasesEndpoint,
  PagesEndpoint,
  SearchEndpoint,
  UsersEndpoint,
} from "./endpoints/index.js";
import { isNotionClientError } from "./errors.js";
import { HttpClient } from "./http-client.js";
import type { User } from "./models/index.js";
import { RetryPolicy } from "./retry-policy.js";
import type { RetryPolicyOptions } from "./retry-policy.js";

export interface NotionClientOptions {
  auth: AuthProvider;
  apiVersion?: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** Backoff tuning beyond `maxRetries`. */
  retry?: Omit<RetryPolicyOptions, "maxRetries">;
  maxRequestsPerSecond?: number;
  logger?: Logger;
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
}

export type ClientOptions = Omit<NotionClientOptions, "auth">;

export type WorkspaceInfo =
  | {
      connectionStatus: "connected";
      botUser: User;
      workspaceName: string | null;
      apiVersion: string;
    }
  | { connectionStatus: "failed"; error: string };

export class NotionClient {
  readonly pages: PagesEndpoint;
  readonly blocks: BlocksEndpoint;
  readonly databases: DatabasesEndpoint;
  readonly users: UsersEndpoint;
  readonly search: SearchEndpoint;

  readonly auth: AuthProvider;
  private readonly http: HttpClient;
  private readonly logger: Logger;

  constructor(opts: NotionClientOptions) {
    this.auth = opts.auth;
    this.logger = opts.logger ?? createLogger("notion", "warn");
    this.http = new HttpClient({
      auth: opts.auth,
      apiVersion: opts.apiVersion,
      baseUrl: opts.baseUrl,
      timeoutMs: opts.timeoutMs,
      retryPolicy: new RetryPolicy({ ...opts.retry, maxRetries: opts.maxRetries }),
      maxRequestsPerSecond: opts.maxRequestsPerSecond,
      logger: this.logger,
      fetch: opts.fetch,
      sleep: opts.sleep,
    });

    this.pages = new PagesEndpoint(this.http, this.logger);
    this.blocks = new BlocksEndpoint(this.http, this.logger);
    this.databases = new DatabasesEndpoint(this.http, this.logger);
    this.users = new UsersEndpoint(this.http, this.logger);
    this.search = new SearchEndpoint(this.http, this.logger);
  }

  static fromToken(token: string, options: ClientOptions = {}): NotionClient {
    return new NotionClient({ ...options, auth: new IntegrationTokenAuth(token, options.logger) });
  }

  static fromOAuth(settings: OAuthSettings, options: ClientOptions = {}): NotionClient {
    const auth = new OAuthAuth(settings, { fetch: options.fetch, logger: options.logger });
    return new NotionClient({ ...options, auth });
  }

  /**
   * Build a client from `NOTION_*` variables. Explicit options win over the
   * environment.
   */
  static fromEnv(env: Environment = process.env, options: ClientOptions = {}): NotionClient {
    const config = loadConfig(env);
    const logger = options.logger ?? createLogger("notion", config.logLevel);
    const auth = createAuthFromConfig(config, { fetch: options.fetch, logger });
    return new NotionClient({
      apiVersion: config.apiVersion,
      timeoutMs: config.timeoutMs,
      maxRetries: config.maxRetries,
      maxRequestsPerSecond: config.maxRequestsPerSecond,
      ...options,
      logger,
      auth,
    });
  }

  get apiVersion(): string {
    return this.http.apiVersion;
  }

  get closed(): boolean {
    return this.http.closed;
  }

  /** True when the credentials can fetch the bot user. */
  async testConnection(): Promise<boolean> {
    try {
      await this.users.me();
      this.logger.info("Connection test successful");
      return true;
    } catch (err) {
      if (!isNotionClientError(err)) throw err;
      this.logger.error(`Connection test failed: ${err.message}`, { kind: err.kind });
      return false;
    }
  }

  async getWorkspaceInfo(): Promise<WorkspaceInfo> {
    try {
      const botUser = await this.users.me();
      return {
        connectionStatus: "connected",
        botUser,
        workspaceName: botUser.type === "bot" ? (botUser.bot?.workspace_name ?? null) : null,
        apiVersion: this.http.apiVersion,
      };
    } catch (err) {
      if (!isNotionClientError(err)) throw err;
      return { connectionStatus: "failed", error: err.message };
    }
  }

  close(): void {
    this.http.close();
  }
}
