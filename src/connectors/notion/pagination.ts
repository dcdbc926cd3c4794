/**
 * Cursor pagination over Notion list endpoints.
 *
 * A `CursorPaginator` is single-pass and lazy: it requests the next page only
 * once its buffer is empty and the caller asks for more, and never requests a
 * page before the previous page's cursor is known.
 */

import type { JsonObject } from "../core/index.js";
import type { NotionTransport, QueryParams } from "./http-client.js";
import { MAX_PAGE_SIZE, validatePageSize } from "./ids.js";
import { parseModel, rawListSchema } from "./models/index.js";
import type { ListResponse } from "./models/index.js";

export interface PageOf<T> {
  items: T[];
  nextCursor: string | null;
  hasMore: boolean;
}

export type PageFetcher<T> = (cursor: string | undefined) => Promise<PageOf<T>>;

export interface PaginateRequest {
  path: string;
  method?: "GET" | "POST";
  params?: QueryParams;
  body?: JsonObject;
  pageSize?: number;
}

export class CursorPaginator<T> implements AsyncIterableIterator<T> {
  private buffer: T[] = [];
  private index = 0;
  private cursor: string | undefined;
  private finished = false;
  private inflight: Promise<void> | null = null;
  private fetched = 0;

  constructor(private readonly fetchPage: PageFetcher<T>) {}

  /** Number of pages requested so far. */
  get pagesFetched(): number {
    return this.fetched;
  }

  /** True once the last page has been fetched and every item consumed. */
  get exhausted(): boolean {
    return this.finished && this.index >= this.buffer.length;
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  async next(): Promise<IteratorResult<T>> {
    while (this.index >= this.buffer.length) {
      if (this.finished) {
        return { done: true, value: undefined };
      }
      await this.load();
    }
    const value = this.buffer[this.index];
    this.index += 1;
    return { done: false, value };
  }

  /** Stop early; no further pages are requested. */
  async return(): Promise<IteratorResult<T>> {
    this.finished = true;
    this.buffer = [];
    this.index = 0;
    return { done: true, value: undefined };
  }

  async collect(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }

  private load(): Promise<void> {
    if (!this.inflight) {
      this.inflight = this.loadPage().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async loadPage(): Promise<void> {
    const page = await this.fetchPage(this.cursor);
    this.fetched += 1;
    this.buffer = page.items;
    this.index = 0;
    if (page.hasMore && page.nextCursor) {
      this.cursor = page.nextCursor;
    } else {
      this.finished = true;
    }
  }
}

/**
 * Fetch one page of a list endpoint. The cursor and page size go in the
 * query string for GET and in the body for POST.
 */
export async function fetchListPage(
  transport: NotionTransport,
  req: PaginateRequest,
  cursor?: string,
): Promise<ListResponse<JsonObject>> {
  const pageSize = req.pageSize ?? MAX_PAGE_SIZE;
  validatePageSize(pageSize);

  const raw =
    req.method === "POST"
      ? await transport.post(req.path, {
          ...req.body,
          page_size: pageSize,
          ...(cursor ? { start_cursor: cursor } : {}),
        })
      : await transport.get(req.path, {
          ...req.params,
          page_size: pageSize,
          start_cursor: cursor,
        });

  return parseModel(rawListSchema, raw, `list ${req.path}`);
}

export function paginate<T>(
  transport: NotionTransport,
  req: PaginateRequest,
  parse: (item: JsonObject) => T,
): CursorPaginator<T> {
  validatePageSize(req.pageSize ?? MAX_PAGE_SIZE);
  return new CursorPaginator(async (cursor) => {
    const page = await fetchListPage(transport, req, cursor);
    return {
      items: page.results.map(parse),
      nextCursor: page.next_cursor,
      hasMore: page.has_more,
    };
  });
}

export function collectAll<T>(
  transport: NotionTransport,
  req: PaginateRequest,
  parse: (item: JsonObject) => T,
): Promise<T[]> {
  return paginate(transport, req, parse).collect();
}
