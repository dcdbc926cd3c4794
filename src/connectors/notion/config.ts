/**
 * Environment-driven configuration for the Notion client.
 *
 * Only the facade and the CLI read the environment; everything below them
 * takes explicit options.
 */

import { z } from "zod";
import { LOG_LEVELS } from "../core/index.js";
import type { LogLevel } from "../core/index.js";
import { NotionConfigError } from "./errors.js";

export const DEFAULT_API_VERSION = "2022-06-28";
export const DEFAULT_BASE_URL = "https://api.notion.com/v1/";
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_REQUESTS_PER_SECOND = 3;

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const envSchema = z.object({
  NOTION_API_TOKEN: optionalString,
  NOTION_OAUTH_CLIENT_ID: optionalString,
  NOTION_OAUTH_CLIENT_SECRET: optionalString,
  NOTION_OAUTH_REDIRECT_URI: optionalString,
  NOTION_OAUTH_ACCESS_TOKEN: optionalString,
  NOTION_OAUTH_REFRESH_TOKEN: optionalString,
  // Unix seconds
  NOTION_OAUTH_TOKEN_EXPIRY: z.preprocess(
    blankToUndefined,
    z.coerce.number().positive().optional(),
  ),
  NOTION_API_VERSION: z.preprocess(
    blankToUndefined,
    z.string().default(DEFAULT_API_VERSION),
  ),
  // Seconds
  NOTION_REQUEST_TIMEOUT: z.preprocess(
    blankToUndefined,
    z.coerce.number().positive().default(DEFAULT_TIMEOUT_MS / 1000),
  ),
  NOTION_MAX_RETRIES: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(0).max(10).default(DEFAULT_MAX_RETRIES),
  ),
  NOTION_RATE_LIMIT: z.preprocess(
    blankToUndefined,
    z.coerce.number().positive().default(DEFAULT_REQUESTS_PER_SECOND),
  ),
  NOTION_LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default("warn")),
});

export interface OAuthSettings {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  accessToken?: string;
  refreshToken?: string;
  /** Epoch milliseconds. */
  expiresAt?: number;
}

export interface NotionConfig {
  token?: string;
  oauth?: OAuthSettings;
  apiVersion: string;
  timeoutMs: number;
  maxRetries: number;
  maxRequestsPerSecond: number;
  logLevel: LogLevel;
}

export type Environment = Record<string, string | undefined>;

export function loadConfig(env: Environment = process.env): NotionConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new NotionConfigError(`Invalid Notion configuration: ${problems}`);
  }
  const vars = parsed.data;

  const config: NotionConfig = {
    apiVersion: vars.NOTION_API_VERSION,
    timeoutMs: vars.NOTION_REQUEST_TIMEOUT * 1000,
    maxRetries: vars.NOTION_MAX_RETRIES,
    maxRequestsPerSecond: vars.NOTION_RATE_LIMIT,
    logLevel: vars.NOTION_LOG_LEVEL,
  };

  if (vars.NOTION_API_TOKEN) {
    config.token = vars.NOTION_API_TOKEN;
  }

  const clientId = vars.NOTION_OAUTH_CLIENT_ID;
  const clientSecret = vars.NOTION_OAUTH_CLIENT_SECRET;
  const redirectUri = vars.NOTION_OAUTH_REDIRECT_URI;
  if (clientId && clientSecret && redirectUri) {
    config.oauth = {
      clientId,
      clientSecret,
      redirectUri,
      accessToken: vars.NOTION_OAUTH_ACCESS_TOKEN,
      refreshToken: vars.NOTION_OAUTH_REFRESH_TOKEN,
      expiresAt:
        vars.NOTION_OAUTH_TOKEN_EXPIRY === undefined
          ? undefined
          : vars.NOTION_OAUTH_TOKEN_EXPIRY * 1000,
    };
  }

  return config;
}
