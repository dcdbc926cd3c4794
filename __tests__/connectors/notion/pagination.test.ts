import { describe, expect, it } from "vitest";
import type { JsonObject } from "../../../src/connectors/core/index.js";
import { LocalValidationError, NotionApiError } from "../../../src/connectors/notion/errors.js";
import { collectAll, fetchListPage, paginate } from "../../../src/connectors/notion/pagination.js";
import { listJson, mockTransport } from "./fixtures.js";

const item = (id: string): JsonObject => ({ id });
const identity = (raw: JsonObject) => raw;

describe("paginate", () => {
  it("concatenates every page in order", async () => {
    const transport = mockTransport();
    transport.get
      .mockResolvedValueOnce(listJson([item("a"), item("b")], "c1"))
      .mockResolvedValueOnce(listJson([item("c")], "c2"))
      .mockResolvedValueOnce(listJson([item("d")]));

    const items = await collectAll(transport, { path: "users" }, identity);

    expect(items.map((i) => i.id)).toEqual(["a", "b", "c", "d"]);
    expect(transport.get).toHaveBeenCalledTimes(3);
    expect(transport.get).toHaveBeenNthCalledWith(1, "users", {
      page_size: 100,
      start_cursor: undefined,
    });
    expect(transport.get).toHaveBeenNthCalledWith(2, "users", { page_size: 100, start_cursor: "c1" });
    expect(transport.get).toHaveBeenNthCalledWith(3, "users", { page_size: 100, start_cursor: "c2" });
  });

  it("fetches nothing until the first item is requested", () => {
    const transport = mockTransport();
    paginate(transport, { path: "users" }, identity);
    expect(transport.get).not.toHaveBeenCalled();
  });

  it("stops after one fetch when only the first item is consumed", async () => {
    const transport = mockTransport();
    transport.get
      .mockResolvedValueOnce(listJson([item("a"), item("b")], "c1"))
      .mockResolvedValueOnce(listJson([item("c")]));

    const pager = paginate(transport, { path: "users" }, identity);
    let first: JsonObject | undefined;
    for await (const value of pager) {
      first = value;
      break;
    }

    expect(first).toEqual({ id: "a" });
    expect(transport.get).toHaveBeenCalledTimes(1);
    expect(pager.pagesFetched).toBe(1);
    await expect(pager.next()).resolves.toEqual({ done: true, value: undefined });
    expect(transport.get).toHaveBeenCalledTimes(1);
  });

  it("puts the cursor in the body for POST endpoints", async () => {
    const transport = mockTransport();
    transport.post
      .mockResolvedValueOnce(listJson([item("a")], "c1"))
      .mockResolvedValueOnce(listJson([item("b")]));
    const filter = { property: "Done", checkbox: { equals: true } };

    await collectAll(
      transport,
      { path: "databases/x/query", method: "POST", body: { filter }, pageSize: 50 },
      identity,
    );

    expect(transport.post).toHaveBeenNthCalledWith(1, "databases/x/query", {
      filter,
      page_size: 50,
    });
    expect(transport.post).toHaveBeenNthCalledWith(2, "databases/x/query", {
      filter,
      page_size: 50,
      start_cursor: "c1",
    });
    expect(transport.get).not.toHaveBeenCalled();
  });

  it("stops when has_more is set without a cursor", async () => {
    const transport = mockTransport();
    transport.get.mockResolvedValueOnce({
      object: "list",
      results: [item("a")],
      has_more: true,
      next_cursor: null,
    });
    const pager = paginate(transport, { path: "users" }, identity);
    await expect(pager.collect()).resolves.toEqual([{ id: "a" }]);
    expect(pager.exhausted).toBe(true);
    expect(transport.get).toHaveBeenCalledTimes(1);
  });

  it("applies the parser to each item", async () => {
    const transport = mockTransport();
    transport.get.mockResolvedValueOnce(listJson([item("a"), item("b")]));
    const ids = await collectAll(transport, { path: "users" }, (raw) => String(raw.id).toUpperCase());
    expect(ids).toEqual(["A", "B"]);
  });

  it.each([0, 101, 2.5])("rejects page size %s before any request", (pageSize) => {
    const transport = mockTransport();
    expect(() => paginate(transport, { path: "users", pageSize }, identity)).toThrow(
      LocalValidationError,
    );
    expect(transport.get).not.toHaveBeenCalled();
  });

  it("rejects a malformed list envelope", async () => {
    const transport = mockTransport();
    transport.get.mockResolvedValueOnce({ object: "list", results: "nope" });
    await expect(fetchListPage(transport, { path: "users" })).rejects.toThrow(NotionApiError);
  });
});
