import { describe, expect, it } from "vitest";
import { DatabasesEndpoint } from "../../../src/connectors/notion/endpoints/index.js";
import { pageParent, richText } from "../../../src/connectors/notion/helpers.js";
import { databaseTitle, pageTitle } from "../../../src/connectors/notion/models/index.js";
import { databaseJson, hexId, listJson, mockTransport, pageJson, silentLogger } from "./fixtures.js";

function setup() {
  const transport = mockTransport();
  return { transport, databases: new DatabasesEndpoint(transport, silentLogger) };
}

const rows = (from: number, count: number) =>
  Array.from({ length: count }, (_, i) => pageJson(hexId(from + i), `Row ${from + i}`));

describe("DatabasesEndpoint", () => {
  it("queries every page of results", async () => {
    const { transport, databases } = setup();
    const filter = { property: "Done", checkbox: { equals: false } };
    transport.post
      .mockResolvedValueOnce(listJson(rows(1, 100), "cursor-2"))
      .mockResolvedValueOnce(listJson(rows(101, 37)));

    const pages = await databases.queryAll(hexId(50), { filter });

    expect(pages).toHaveLength(137);
    expect(pageTitle(pages[136])).toBe("Row 137");
    expect(transport.post).toHaveBeenNthCalledWith(1, `databases/${hexId(50)}/query`, {
      filter,
      page_size: 100,
    });
    expect(transport.post).toHaveBeenNthCalledWith(2, `databases/${hexId(50)}/query`, {
      filter,
      page_size: 100,
      start_cursor: "cursor-2",
    });
  });

  it("returns one raw page from query", async () => {
    const { transport, databases } = setup();
    transport.post.mockResolvedValueOnce(listJson(rows(1, 2), "next"));

    const page = await databases.query(hexId(50), { pageSize: 2, startCursor: "here" });

    expect(page.results).toHaveLength(2);
    expect(page.has_more).toBe(true);
    expect(page.next_cursor).toBe("next");
    expect(transport.post).toHaveBeenCalledWith(`databases/${hexId(50)}/query`, {
      page_size: 2,
      start_cursor: "here",
    });
  });

  it("rejects an oversized page", async () => {
    const { transport, databases } = setup();

    await expect(databases.query(hexId(50), { pageSize: 101 })).rejects.toThrow(
      "Invalid page size 101: must be an integer between 1 and 100",
    );
    expect(() => databases.iteratePages(hexId(50), { pageSize: 0 })).toThrow(
      "Invalid page size 0",
    );
    expect(transport.post).not.toHaveBeenCalled();
  });

  it("creates a full-page database without retries", async () => {
    const { transport, databases } = setup();
    transport.post.mockResolvedValueOnce(databaseJson(hexId(3), "Bugs"));

    const db = await databases.create({
      parent: pageParent(hexId(2)),
      title: [richText("Bugs")],
      properties: { Name: { title: {} } },
    });

    expect(databaseTitle(db)).toBe("Bugs");
    expect(transport.post).toHaveBeenCalledWith(
      "databases",
      {
        parent: { type: "page_id", page_id: hexId(2) },
        title: [richText("Bugs")],
        properties: { Name: { title: {} } },
        is_inline: false,
      },
      { retry: false },
    );
  });

  it("edits the property schema", async () => {
    const { transport, databases } = setup();
    transport.patch.mockResolvedValue(databaseJson(hexId(3)));

    await databases.addProperty(hexId(3), "Due", { date: {} });
    await databases.removeProperty(hexId(3), "Old");
    await databases.renameProperty(hexId(3), "Owner", "Assignee");

    expect(transport.patch.mock.calls.map((call) => call[1])).toEqual([
      { properties: { Due: { date: {} } } },
      { properties: { Old: null } },
      { properties: { Owner: { name: "Assignee" } } },
    ]);
  });

  it("parses unknown property kinds without failing", async () => {
    const { transport, databases } = setup();
    transport.get.mockResolvedValueOnce(
      databaseJson(hexId(3), "Tasks", {
        properties: {
          Name: { id: "title", name: "Name", type: "title", title: {} },
          Launch: { id: "b1", name: "Launch", type: "button", button: {} },
        },
      }),
    );

    const db = await databases.retrieve(hexId(3));

    expect(db.properties.Launch).toMatchObject({ type: "unknown", originalType: "button" });
    expect(transport.get).toHaveBeenCalledWith(`databases/${hexId(3)}`);
  });

  it("archives through the update path", async () => {
    const { transport, databases } = setup();
    transport.patch.mockResolvedValueOnce(databaseJson(hexId(3), "Tasks", { archived: true }));

    const db = await databases.archive(hexId(3));

    expect(db.archived).toBe(true);
    expect(transport.patch).toHaveBeenCalledWith(`databases/${hexId(3)}`, { archived: true });
  });
});
