import { describe, expect, it } from "vitest";
import { NotionApiError } from "../../../src/connectors/notion/errors.js";
import {
  blockPlainText,
  blockSchema,
  databaseSchema,
  databaseTitle,
  pageSchema,
  pageTitle,
  parseDatabaseProperty,
  parseModel,
  parsePropertyValue,
  propertyOptions,
  propertyValueToJson,
  readBlockContent,
} from "../../../src/connectors/notion/models/index.js";
import { blockJson, databaseJson, hexId, pageJson, textItem } from "./fixtures.js";

describe("property values", () => {
  it("round-trips a title value unchanged", () => {
    const raw = { id: "title", type: "title", title: [textItem("Q3 plan")] };
    const value = parsePropertyValue(raw);
    expect(value.type).toBe("title");
    expect(propertyValueToJson(value)).toEqual(raw);
  });

  it("keeps unknown kinds verbatim", () => {
    const raw = { id: "btn", type: "button", button: { label: "Go" } };
    const value = parsePropertyValue(raw);
    expect(value).toMatchObject({ type: "unknown", id: "btn", originalType: "button" });
    expect(propertyValueToJson(value)).toEqual(raw);
  });

  it("treats a malformed known kind as unknown", () => {
    const value = parsePropertyValue({ id: "n", type: "number", number: "seven" });
    expect(value).toMatchObject({ type: "unknown", originalType: "number" });
  });

  it("narrows documented kinds", () => {
    const value = parsePropertyValue({
      id: "s",
      type: "select",
      select: { id: "o1", name: "Doing", color: "blue" },
    });
    expect(value.type === "select" ? value.select?.name : undefined).toBe("Doing");
  });
});

describe("database properties", () => {
  it("reads select options and keeps unknown configs", () => {
    const status = parseDatabaseProperty({
      id: "s",
      name: "Stage",
      type: "select",
      select: { options: [{ id: "1", name: "Todo", color: "red" }, { name: "Done" }] },
    });
    const fancy = parseDatabaseProperty({ id: "f", name: "Fancy", type: "button", button: {} });

    expect(propertyOptions(status)).toEqual(["Todo", "Done"]);
    expect(fancy).toMatchObject({ type: "unknown", name: "Fancy", originalType: "button" });
    expect(propertyOptions(fancy)).toEqual([]);
  });
});

describe("pages", () => {
  it("parses a page and keeps unmodelled fields", () => {
    const page = parseModel(pageSchema, pageJson(hexId(1), "Roadmap", { extra_field: "kept" }), "page");
    expect(pageTitle(page)).toBe("Roadmap");
    expect(page.parent.type).toBe("workspace");
    expect(page["extra_field"]).toBe("kept");
  });

  it("finds the title property under any name", () => {
    const raw = pageJson(hexId(1));
    raw.properties = { Task: { id: "title", type: "title", title: [textItem("Ship it")] } };
    expect(pageTitle(parseModel(pageSchema, raw, "page"))).toBe("Ship it");
  });

  it("reads a database parent", () => {
    const page = parseModel(
      pageSchema,
      pageJson(hexId(1), "Row", { parent: { type: "database_id", database_id: hexId(2) } }),
      "page",
    );
    expect(page.parent.type === "database_id" ? page.parent.database_id : "").toBe(hexId(2));
  });

  it("raises NotionApiError for an unexpected shape", () => {
    const raw = pageJson(hexId(1));
    delete raw.id;
    expect(() => parseModel(pageSchema, raw, "page")).toThrow(NotionApiError);
    expect(() => parseModel(pageSchema, raw, "page")).toThrow(
      /^Unexpected response shape for page at id: /,
    );
  });
});

describe("databases", () => {
  it("parses title and property schema", () => {
    const db = parseModel(databaseSchema, databaseJson(hexId(3), "Tasks"), "database");
    expect(databaseTitle(db)).toBe("Tasks");
    expect(db.properties.Name.type).toBe("title");
  });
});

describe("blocks", () => {
  it("reads typed content", () => {
    const block = parseModel(blockSchema, blockJson(hexId(4), "Hello"), "block");
    const content = readBlockContent(block);
    expect(content.type).toBe("paragraph");
    expect(blockPlainText(content)).toBe("Hello");
  });

  it("reads a to-do with its checked flag", () => {
    const raw = blockJson(hexId(5), "Buy milk", { type: "to_do" });
    raw.to_do = { rich_text: [textItem("Buy milk")], checked: true, color: "default" };
    const content = readBlockContent(parseModel(blockSchema, raw, "block"));
    expect(content.type === "to_do" && content.to_do.checked).toBe(true);
  });

  it("keeps unsupported block kinds raw", () => {
    const raw = blockJson(hexId(6), "", { type: "ai_block" });
    raw.ai_block = { prompt: "summarize" };
    const content = readBlockContent(parseModel(blockSchema, raw, "block"));
    expect(content).toEqual({
      type: "unsupported",
      originalType: "ai_block",
      raw: { prompt: "summarize" },
    });
    expect(blockPlainText(content)).toBe("");
  });
});
