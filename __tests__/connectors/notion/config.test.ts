import { describe, expect, it } from "vitest";
import { loadConfig } from "../../../src/connectors/notion/config.js";
import { NotionConfigError } from "../../../src/connectors/notion/errors.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      apiVersion: "2022-06-28",
      timeoutMs: 30_000,
      maxRetries: 3,
      maxRequestsPerSecond: 3,
      logLevel: "warn",
    });
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({
      NOTION_API_TOKEN: "  test-secret  ",
      NOTION_REQUEST_TIMEOUT: "2.5",
      NOTION_MAX_RETRIES: "0",
      NOTION_RATE_LIMIT: "10",
      NOTION_LOG_LEVEL: "debug",
    });

    expect(config).toEqual({
      token: "test-secret",
      apiVersion: "2022-06-28",
      timeoutMs: 2500,
      maxRetries: 0,
      maxRequestsPerSecond: 10,
      logLevel: "debug",
    });
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ NOTION_API_TOKEN: " ", NOTION_MAX_RETRIES: "", NOTION_API_VERSION: "" });

    expect(config.token).toBeUndefined();
    expect(config.maxRetries).toBe(3);
    expect(config.apiVersion).toBe("2022-06-28");
  });

  it("names the offending variable", () => {
    expect(() => loadConfig({ NOTION_MAX_RETRIES: "20" })).toThrow(NotionConfigError);
    expect(() => loadConfig({ NOTION_MAX_RETRIES: "20" })).toThrow(
      "Invalid Notion configuration: NOTION_MAX_RETRIES: Number must be less than or equal to 10",
    );
    expect(() => loadConfig({ NOTION_LOG_LEVEL: "loud" })).toThrow(/NOTION_LOG_LEVEL/);
  });

  it("reads OAuth settings only when the app triple is complete", () => {
    const partial = loadConfig({ NOTION_OAUTH_CLIENT_ID: "client", NOTION_OAUTH_CLIENT_SECRET: "test-secret" });
    const full = loadConfig({
      NOTION_OAUTH_CLIENT_ID: "client",
      NOTION_OAUTH_CLIENT_SECRET: "test-secret",
      NOTION_OAUTH_REDIRECT_URI: "https://example.com/callback",
      NOTION_OAUTH_ACCESS_TOKEN: "test-access",
      NOTION_OAUTH_REFRESH_TOKEN: "test-refresh",
      NOTION_OAUTH_TOKEN_EXPIRY: "1700000000",
    });

    expect(partial.oauth).toBeUndefined();
    expect(full.oauth).toEqual({
      clientId: "client",
      clientSecret: "test-secret",
      redirectUri: "https://example.com/callback",
      accessToken: "test-access",
      refreshToken: "test-refresh",
      expiresAt: 1_700_000_000_000,
    });
  });
});
