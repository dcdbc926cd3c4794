/**
 * Operator CLI over `NotionClient`. The program is built by `buildProgram`
 * so tests can run commands against a stub client; `bin.ts` is the entry.
 */

import { Command, Option } from "commander";
import { stringify as yamlStringify } from "yaml";
import type { JsonObject, JsonValue } from "../core/index.js";
import { NotionClient } from "./client.js";
import type { BlockTreeNode, SearchResult } from "./endpoints/index.js";
import { objectFilter, resultTitle } from "./endpoints/index.js";
import {
  blockPlainText,
  jsonObjectSchema,
  pageTitle,
  readBlockContent,
  userEmail,
} from "./models/index.js";
import type { Page, User } from "./models/index.js";

export const OUTPUT_FORMATS = ["text", "json", "yaml"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type Row = Record<string, JsonValue>;

export class CommandFailure extends Error {}

// ─── Formatting ───

function cell(value: JsonValue): string {
  if (value === null) return "";
  return typeof value === "object" ? JSON.stringify(value) : String(value);
}

/**
 * Render rows as tab-separated text, pretty JSON or YAML.
 */
export function formatRows(rows: readonly Row[], format: OutputFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify(rows, null, 2);
    case "yaml":
      return yamlStringify(rows).trimEnd();
    case "text":
      return rows.map((row) => Object.values(row).map(cell).join("\t")).join("\n");
  }
}

export function formatRecord(record: Row, format: OutputFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify(record, null, 2);
    case "yaml":
      return yamlStringify(record).trimEnd();
    case "text":
      return Object.entries(record)
        .map(([key, value]) => `${key}: ${cell(value)}`)
        .join("\n");
  }
}

export function searchResultRow(result: SearchResult): Row {
  return { id: result.id, object: result.object, title: resultTitle(result), url: result.url };
}

export function userRow(user: User): Row {
  return {
    id: user.id,
    type: user.type ?? "unknown",
    name: user.name ?? "",
    email: userEmail(user) ?? "",
  };
}

export function pageRecord(page: Page): Row {
  const properties: JsonObject = {};
  for (const [name, value] of Object.entries(page.properties)) {
    properties[name] = value.type === "unknown" ? value.originalType : value.type;
  }
  return {
    id: page.id,
    title: pageTitle(page),
    url: page.url,
    archived: page.archived,
    in_trash: page.in_trash,
    properties,
  };
}

export function treeToJson(node: BlockTreeNode): JsonObject {
  return {
    id: node.block.id,
    type: node.block.type,
    text: blockPlainText(readBlockContent(node.block)),
    children: node.children.map(treeToJson),
  };
}

/** Indented outline, one line per block. */
export function treeToLines(node: BlockTreeNode, depth = 0): string[] {
  const text = blockPlainText(readBlockContent(node.block));
  const line = `${"  ".repeat(depth)}- ${node.block.type}${text ? `: ${text}` : ""}`;
  return [line, ...node.children.flatMap((child) => treeToLines(child, depth + 1))];
}

function parseJsonOption(value: string, name: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new CommandFailure(`--${name} must be valid JSON`);
  }
  const object = jsonObjectSchema.safeParse(parsed);
  if (!object.success) {
    throw new CommandFailure(`--${name} must be a JSON object`);
  }
  return object.data;
}

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1) {
    throw new CommandFailure(`Expected a positive integer, got "${value}"`);
  }
  return n;
}

// ─── Program ───

export interface CliDeps {
  createClient: (opts: { token?: string }) => NotionClient;
  write: (text: string) => void;
}

const defaultDeps: CliDeps = {
  createClient: ({ token }) => (token ? NotionClient.fromToken(token) : NotionClient.fromEnv()),
  write: (text) => console.log(text),
};

interface GlobalOptions {
  token?: string;
  format: OutputFormat;
}

export function buildProgram(deps: CliDeps = defaultDeps): Command {
  const program = new Command()
    .name("notion-client")
    .description("Query a Notion workspace from the command line")
    .version("0.1.0")
    .option("--token <token>", "Integration token (defaults to NOTION_API_TOKEN)")
    .addOption(
      new Option("--format <format>", "Output format").choices(OUTPUT_FORMATS).default("text"),
    )
    .exitOverride();

  const run = async (fn: (client: NotionClient, format: OutputFormat) => Promise<void>) => {
    const globals = program.opts<GlobalOptions>();
    const client = deps.createClient({ token: globals.token });
    try {
      await fn(client, globals.format);
    } finally {
      client.close();
    }
  };

  program
    .command("test-connection")
    .description("Check that the credentials reach the API")
    .action(() =>
      run(async (client) => {
        if (!(await client.testConnection())) {
          throw new CommandFailure("Connection failed");
        }
        deps.write("✓ Connected to Notion");
      }),
    );

  program
    .command("workspace-info")
    .description("Show the bot user and workspace behind the credentials")
    .action(() =>
      run(async (client, format) => {
        const info = await client.getWorkspaceInfo();
        if (info.connectionStatus === "failed") {
          throw new CommandFailure(`Connection failed: ${info.error}`);
        }
        deps.write(
          formatRecord(
            {
              connection_status: info.connectionStatus,
              workspace_name: info.workspaceName,
              bot_id: info.botUser.id,
              bot_name: info.botUser.name ?? null,
              api_version: info.apiVersion,
            },
            format,
          ),
        );
      }),
    );

  program
    .command("search")
    .description("Search pages and databases")
    .argument("[query]", "Text to search for")
    .addOption(new Option("--type <type>", "Limit to one object type").choices(["page", "database"]))
    .option("--exact", "Only titles equal to the query")
    .option("--limit <n>", "Maximum results to print", parsePositiveInt)
    .action((query: string | undefined, opts: { type?: "page" | "database"; exact?: boolean; limit?: number }) =>
      run(async (client, format) => {
        let results: SearchResult[];
        if (opts.exact && query) {
          results = await client.search.searchByTitle(query, {
            objectType: opts.type,
            exactMatch: true,
          });
        } else {
          results = [];
          const filter = opts.type ? objectFilter(opts.type) : undefined;
          for await (const result of client.search.iterateResults({ query, filter })) {
            results.push(result);
            if (opts.limit !== undefined && results.length >= opts.limit) break;
          }
        }
        const limited = opts.limit === undefined ? results : results.slice(0, opts.limit);
        deps.write(formatRows(limited.map(searchResultRow), format));
      }),
    );

  program
    .command("page")
    .description("Show a page by ID or exact title")
    .argument("<idOrTitle>", "Page ID or title")
    .action((idOrTitle: string) =>
      run(async (client, format) => {
        const page = await client.search.findPageByIdOrTitle(idOrTitle);
        if (!page) {
          throw new CommandFailure(`No page found for "${idOrTitle}"`);
        }
        deps.write(formatRecord(pageRecord(page), format));
      }),
    );

  program
    .command("blocks")
    .description("Print the block tree under a page or block")
    .argument("<blockId>", "Page or block ID")
    .option("--depth <n>", "Maximum nesting depth", parsePositiveInt, 10)
    .action((blockId: string, opts: { depth: number }) =>
      run(async (client, format) => {
        const tree = await client.blocks.getBlockTree(blockId, opts.depth);
        if (format === "text") {
          deps.write(treeToLines(tree).join("\n"));
        } else {
          deps.write(formatRecord(treeToJson(tree), format));
        }
      }),
    );

  program
    .command("query")
    .description("List the pages of a database")
    .argument("<databaseId>", "Database ID")
    .option("--filter <json>", "Filter object as JSON")
    .option("--sort <json>", "Sort object as JSON")
    .option("--limit <n>", "Maximum pages to print", parsePositiveInt)
    .action((databaseId: string, opts: { filter?: string; sort?: string; limit?: number }) =>
      run(async (client, format) => {
        const pages: Page[] = [];
        const iterator = client.databases.iteratePages(databaseId, {
          filter: opts.filter === undefined ? undefined : parseJsonOption(opts.filter, "filter"),
          sorts: opts.sort === undefined ? undefined : [parseJsonOption(opts.sort, "sort")],
        });
        for await (const page of iterator) {
          pages.push(page);
          if (opts.limit !== undefined && pages.length >= opts.limit) break;
        }
        const rows = pages.map((page) => ({
          id: page.id,
          title: pageTitle(page),
          url: page.url,
        }));
        deps.write(formatRows(rows, format));
      }),
    );

  program
    .command("users")
    .description("List workspace users")
    .option("--bots", "Only bot users")
    .option("--people", "Only people")
    .action((opts: { bots?: boolean; people?: boolean }) =>
      run(async (client, format) => {
        const users = opts.bots
          ? await client.users.getBots()
          : opts.people
            ? await client.users.getWorkspaceMembers()
            : await client.users.listAll();
        deps.write(formatRows(users.map(userRow), format));
      }),
    );

  return program;
}
