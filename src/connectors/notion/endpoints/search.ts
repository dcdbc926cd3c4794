import type { JsonObject, Logger } from "../../core/index.js";
import { NotionApiError, NotionNotFoundError } from "../errors.js";
import { isNotionId } from "../ids.js";
import { databaseTitle, pageTitle } from "../models/index.js";
import type { Database, ListResponse, Page } from "../models/index.js";
import type { NotionTransport } from "../http-client.js";
import { fetchListPage, paginate } from "../pagination.js";
import type { CursorPaginator } from "../pagination.js";
import { BaseEndpoint, compact } from "./base.js";
import { DatabasesEndpoint, parseDatabase } from "./databases.js";
import { PagesEndpoint, parsePage } from "./pages.js";

export type SearchObjectType = "page" | "database";
export type SearchResult = Page | Database;

export interface SearchParams {
  query?: string;
  sort?: JsonObject;
  filter?: JsonObject;
  pageSize?: number;
}

export interface SearchByTitleOptions {
  objectType?: SearchObjectType;
  exactMatch?: boolean;
}

export function objectFilter(value: SearchObjectType): JsonObject {
  return { value, property: "object" };
}

/** Dispatch a raw search result to a page or a database by its `object` tag. */
export function parseSearchResult(raw: JsonObject): SearchResult {
  switch (raw.object) {
    case "page":
      return parsePage(raw);
    case "database":
      return parseDatabase(raw);
    default:
      throw new NotionApiError(
        `Unexpected response shape for search result: object ${JSON.stringify(raw.object ?? null)}`,
      );
  }
}

export function resultTitle(result: SearchResult): string {
  return result.object === "page" ? pageTitle(result) : databaseTitle(result);
}

export class SearchEndpoint extends BaseEndpoint {
  private readonly pages: PagesEndpoint;
  private readonly databases: DatabasesEndpoint;

  constructor(transport: NotionTransport, logger: Logger) {
    super(transport, logger);
    this.pages = new PagesEndpoint(transport, logger);
    this.databases = new DatabasesEndpoint(transport, logger);
  }

  /** One raw page of search results. */
  search(params: SearchParams & { startCursor?: string } = {}): Promise<ListResponse<JsonObject>> {
    return fetchListPage(
      this.transport,
      { path: "search", method: "POST", body: this.body(params), pageSize: params.pageSize },
      params.startCursor,
    );
  }

  iterateResults(params: SearchParams = {}): CursorPaginator<SearchResult> {
    return paginate(
      this.transport,
      { path: "search", method: "POST", body: this.body(params), pageSize: params.pageSize },
      parseSearchResult,
    );
  }

  searchAll(params: SearchParams = {}): Promise<SearchResult[]> {
    return this.iterateResults(params).collect();
  }

  async searchPages(query?: string, params: Omit<SearchParams, "query" | "filter"> = {}): Promise<Page[]> {
    const results = await this.searchAll({ ...params, query, filter: objectFilter("page") });
    return results.filter((result): result is Page => result.object === "page");
  }

  async searchDatabases(
    query?: string,
    params: Omit<SearchParams, "query" | "filter"> = {},
  ): Promise<Database[]> {
    const results = await this.searchAll({ ...params, query, filter: objectFilter("database") });
    return results.filter((result): result is Database => result.object === "database");
  }

  /**
   * Search by title. The API matches loosely, so `exactMatch` filters the
   * results on the client.
   */
  async searchByTitle(title: string, opts: SearchByTitleOptions = {}): Promise<SearchResult[]> {
    const results = await this.searchAll({
      query: title,
      filter: opts.objectType ? objectFilter(opts.objectType) : undefined,
    });
    if (!opts.exactMatch) return results;
    return results.filter((result) => resultTitle(result) === title);
  }

  async findPageByIdOrTitle(identifier: string): Promise<Page | undefined> {
    if (isNotionId(identifier)) {
      try {
        return await this.pages.retrieve(identifier);
      } catch (err) {
        if (!(err instanceof NotionNotFoundError)) throw err;
        this.logger.debug(`No page with ID ${identifier}, searching by title`);
      }
    }
    const pages = await this.searchPages(identifier);
    return pages.find((page) => pageTitle(page) === identifier);
  }

  async findDatabaseByIdOrTitle(identifier: string): Promise<Database | undefined> {
    if (isNotionId(identifier)) {
      try {
        return await this.databases.retrieve(identifier);
      } catch (err) {
        if (!(err instanceof NotionNotFoundError)) throw err;
        this.logger.debug(`No database with ID ${identifier}, searching by title`);
      }
    }
    const databases = await this.searchDatabases(identifier);
    return databases.find((database) => databaseTitle(database) === identifier);
  }

  private body(params: SearchParams): JsonObject {
    return compact({ query: params.query, sort: params.sort, filter: params.filter });
  }
}
