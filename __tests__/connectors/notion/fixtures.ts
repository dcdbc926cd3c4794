import { vi } from "vitest";
import type { JsonObject, Logger } from "../../../src/connectors/core/index.js";
import type {
  NotionTransport,
  QueryParams,
  SendOptions,
} from "../../../src/connectors/notion/http-client.js";

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/** Deterministic 32-hex-character ID. */
export function hexId(n: number): string {
  return n.toString(16).padStart(32, "0");
}

export function textItem(text: string): JsonObject {
  return {
    type: "text",
    text: { content: text, link: null },
    annotations: {
      bold: false,
      italic: false,
      strikethrough: false,
      underline: false,
      code: false,
      color: "default",
    },
    plain_text: text,
    href: null,
  };
}

const timestamps = {
  created_time: "2024-01-01T00:00:00.000Z",
  last_edited_time: "2024-01-02T00:00:00.000Z",
};

export function pageJson(id: string, title = "Untitled", extra: JsonObject = {}): JsonObject {
  return {
    object: "page",
    id,
    ...timestamps,
    archived: false,
    in_trash: false,
    parent: { type: "workspace", workspace: true },
    properties: {
      Name: { id: "title", type: "title", title: [textItem(title)] },
    },
    url: `https://www.notion.so/${id}`,
    ...extra,
  };
}

export function databaseJson(id: string, title = "Tasks", extra: JsonObject = {}): JsonObject {
  return {
    object: "database",
    id,
    ...timestamps,
    title: [textItem(title)],
    description: [],
    properties: {
      Name: { id: "title", name: "Name", type: "title", title: {} },
    },
    parent: { type: "page_id", page_id: hexId(999) },
    url: `https://www.notion.so/${id}`,
    archived: false,
    in_trash: false,
    is_inline: false,
    ...extra,
  };
}

export function blockJson(
  id: string,
  text: string,
  opts: { hasChildren?: boolean; type?: string } = {},
): JsonObject {
  const type = opts.type ?? "paragraph";
  return {
    object: "block",
    id,
    type,
    [type]: { rich_text: [textItem(text)], color: "default" },
    parent: { type: "page_id", page_id: hexId(999) },
    ...timestamps,
    has_children: opts.hasChildren ?? false,
    archived: false,
    in_trash: false,
  };
}

export function personJson(id: string, name: string, email: string): JsonObject {
  return { object: "user", id, type: "person", name, avatar_url: null, person: { email } };
}

export function botJson(id: string, name: string, workspaceName: string | null = null): JsonObject {
  return {
    object: "user",
    id,
    type: "bot",
    name,
    avatar_url: null,
    bot: { owner: { type: "workspace", workspace: true }, workspace_name: workspaceName },
  };
}

export function listJson(results: JsonObject[], nextCursor: string | null = null): JsonObject {
  return {
    object: "list",
    results,
    has_more: nextCursor !== null,
    next_cursor: nextCursor,
  };
}

export function mockTransport() {
  return {
    get: vi.fn(async (_path: string, _params?: QueryParams): Promise<JsonObject> => ({})),
    post: vi.fn(
      async (_path: string, _body?: JsonObject, _options?: SendOptions): Promise<JsonObject> => ({}),
    ),
    patch: vi.fn(
      async (_path: string, _body?: JsonObject, _options?: SendOptions): Promise<JsonObject> => ({}),
    ),
    delete: vi.fn(async (_path: string, _params?: QueryParams): Promise<JsonObject> => ({})),
  } satisfies NotionTransport;
}

export function jsonResponse(
  status: number,
  body: JsonObject,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}
