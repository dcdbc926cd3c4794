/**
 * Builders for request payloads: rich text, parents, blocks, property values,
 * icons and covers. Everything here is pure and returns plain JSON.
 */

import type { JsonObject } from "../core/index.js";
import { LocalValidationError } from "./errors.js";

export interface TextStyle {
  bold?: boolean;
  italic?: boolean;
  strikethrough?: boolean;
  underline?: boolean;
  code?: boolean;
  color?: string;
  /** Turns the text into a link. */
  url?: string;
}

// ─── Rich text ───

export function richText(text: string, style: TextStyle = {}): JsonObject {
  const content: JsonObject = { content: text };
  if (style.url) content.link = { url: style.url };
  return {
    type: "text",
    text: content,
    annotations: {
      bold: style.bold ?? false,
      italic: style.italic ?? false,
      strikethrough: style.strikethrough ?? false,
      underline: style.underline ?? false,
      code: style.code ?? false,
      color: style.color ?? "default",
    },
    plain_text: text,
    href: style.url ?? null,
  };
}

/** Concatenated `plain_text` of a rich-text array from any payload. */
export function plainText(items: ReadonlyArray<{ plain_text?: string }>): string {
  return items.map((item) => item.plain_text ?? "").join("");
}

// ─── Parents ───

export function pageParent(pageId: string): JsonObject {
  return { type: "page_id", page_id: pageId };
}

export function databaseParent(databaseId: string): JsonObject {
  return { type: "database_id", database_id: databaseId };
}

export function workspaceParent(): JsonObject {
  return { type: "workspace", workspace: true };
}

// ─── Blocks ───

export type TextBlockType =
  | "paragraph"
  | "heading_1"
  | "heading_2"
  | "heading_3"
  | "bulleted_list_item"
  | "numbered_list_item"
  | "quote"
  | "toggle";

export function textBlock(
  text: string,
  blockType: TextBlockType = "paragraph",
  color = "default",
  style: TextStyle = {},
): JsonObject {
  return {
    type: blockType,
    [blockType]: { rich_text: [richText(text, style)], color },
  };
}

export function paragraph(text: string, style: TextStyle = {}): JsonObject {
  return textBlock(text, "paragraph", "default", style);
}

export function heading(
  text: string,
  level = 1,
  opts: { color?: string; isToggleable?: boolean; style?: TextStyle } = {},
): JsonObject {
  if (level !== 1 && level !== 2 && level !== 3) {
    throw new LocalValidationError("Heading level must be 1, 2, or 3");
  }
  const blockType = `heading_${level}`;
  const content: JsonObject = {
    rich_text: [richText(text, opts.style)],
    color: opts.color ?? "default",
  };
  if (opts.isToggleable) content.is_toggleable = true;
  return { type: blockType, [blockType]: content };
}

export function todo(text: string, checked = false, style: TextStyle = {}): JsonObject {
  return {
    type: "to_do",
    to_do: { rich_text: [richText(text, style)], checked, color: "default" },
  };
}

export function bulletedItem(text: string, style: TextStyle = {}): JsonObject {
  return textBlock(text, "bulleted_list_item", "default", style);
}

export function numberedItem(text: string, style: TextStyle = {}): JsonObject {
  return textBlock(text, "numbered_list_item", "default", style);
}

export function quote(text: string, style: TextStyle = {}): JsonObject {
  return textBlock(text, "quote", "default", style);
}

export function callout(text: string, emoji?: string, color = "default"): JsonObject {
  const content: JsonObject = { rich_text: [richText(text)], color };
  if (emoji) content.icon = emojiIcon(emoji);
  return { type: "callout", callout: content };
}

export function code(source: string, language = "plain text", caption?: string): JsonObject {
  return {
    type: "code",
    code: {
      rich_text: [richText(source)],
      language,
      caption: caption ? [richText(caption)] : [],
    },
  };
}

export function divider(): JsonObject {
  return { type: "divider", divider: {} };
}

export function image(url: string, caption?: string): JsonObject {
  return {
    type: "image",
    image: {
      type: "external",
      external: { url },
      caption: caption ? [richText(caption)] : [],
    },
  };
}

export function bookmark(url: string, caption?: string): JsonObject {
  return {
    type: "bookmark",
    bookmark: { url, caption: caption ? [richText(caption)] : [] },
  };
}

// ─── Property values ───

export function titleValue(text: string): JsonObject {
  return { title: [richText(text)] };
}

export function richTextValue(text: string): JsonObject {
  return { rich_text: [richText(text)] };
}

export function numberValue(value: number | null): JsonObject {
  return { number: value };
}

export function selectValue(name: string | null): JsonObject {
  return { select: name === null ? null : { name } };
}

export function multiSelectValue(names: readonly string[]): JsonObject {
  return { multi_select: names.map((name) => ({ name })) };
}

export function statusValue(name: string): JsonObject {
  return { status: { name } };
}

export function checkboxValue(checked: boolean): JsonObject {
  return { checkbox: checked };
}

export function urlValue(url: string | null): JsonObject {
  return { url };
}

export function relationValue(pageIds: readonly string[]): JsonObject {
  return { relation: pageIds.map((id) => ({ id })) };
}

export function dateValue(
  start: string | Date,
  opts: { end?: string | Date; includeTime?: boolean; timeZone?: string } = {},
): JsonObject {
  return { date: formatNotionDate(start, opts) };
}

// ─── Dates ───

/**
 * Build a Notion date object. `Date` values are written in UTC, as a bare
 * date unless `includeTime` is set; strings pass through unchanged.
 */
export function formatNotionDate(
  start: string | Date,
  opts: { end?: string | Date; includeTime?: boolean; timeZone?: string } = {},
): JsonObject {
  const format = (value: string | Date): string => {
    if (typeof value === "string") return value;
    const iso = value.toISOString();
    return opts.includeTime ? iso : iso.slice(0, 10);
  };
  const date: JsonObject = { start: format(start) };
  if (opts.end !== undefined) date.end = format(opts.end);
  if (opts.timeZone) date.time_zone = opts.timeZone;
  return date;
}

// ─── Options, icons, covers ───

export function selectOption(name: string, color = "default", description?: string): JsonObject {
  const option: JsonObject = { name, color };
  if (description) option.description = description;
  return option;
}

export function emojiIcon(emoji: string): JsonObject {
  return { type: "emoji", emoji };
}

export function externalIcon(url: string): JsonObject {
  return { type: "external", external: { url } };
}

export function externalCover(url: string): JsonObject {
  return { type: "external", external: { url } };
}
