import { z } from "zod";
import type { JsonObject } from "../../core/index.js";
import {
  fileObjectSchema,
  iconSchema,
  jsonObjectSchema,
  parentSchema,
  partialUserSchema,
  richTextSchema,
  richTextToPlain,
} from "./common.js";

export const blockSchema = z
  .object({
    object: z.literal("block"),
    id: z.string(),
    type: z.string(),
    parent: parentSchema,
    created_time: z.string(),
    last_edited_time: z.string(),
    created_by: partialUserSchema.optional(),
    last_edited_by: partialUserSchema.optional(),
    has_children: z.boolean(),
    archived: z.boolean(),
    in_trash: z.boolean().default(false),
  })
  .passthrough();

export type Block = z.infer<typeof blockSchema>;

// ─── Typed content ───

const color = z.string().default("default");
const richText = z.array(richTextSchema);

const textContent = z.object({ rich_text: richText, color });
const headingContent = textContent.extend({ is_toggleable: z.boolean().default(false) });
const mediaContent = fileObjectSchema;
const urlContent = z.object({ url: z.string(), caption: richText.optional() });

const knownBlockContentSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("paragraph"), paragraph: textContent }),
  z.object({ type: z.literal("heading_1"), heading_1: headingContent }),
  z.object({ type: z.literal("heading_2"), heading_2: headingContent }),
  z.object({ type: z.literal("heading_3"), heading_3: headingContent }),
  z.object({ type: z.literal("bulleted_list_item"), bulleted_list_item: textContent }),
  z.object({ type: z.literal("numbered_list_item"), numbered_list_item: textContent }),
  z.object({ type: z.literal("to_do"), to_do: textContent.extend({ checked: z.boolean() }) }),
  z.object({ type: z.literal("toggle"), toggle: textContent }),
  z.object({ type: z.literal("quote"), quote: textContent }),
  z.object({
    type: z.literal("callout"),
    callout: textContent.extend({ icon: iconSchema.nullable().optional() }),
  }),
  z.object({
    type: z.literal("code"),
    code: z.object({ rich_text: richText, language: z.string(), caption: richText.optional() }),
  }),
  z.object({ type: z.literal("equation"), equation: z.object({ expression: z.string() }) }),
  z.object({ type: z.literal("divider"), divider: jsonObjectSchema }),
  z.object({ type: z.literal("breadcrumb"), breadcrumb: jsonObjectSchema }),
  z.object({
    type: z.literal("table_of_contents"),
    table_of_contents: z.object({ color }),
  }),
  z.object({ type: z.literal("image"), image: mediaContent }),
  z.object({ type: z.literal("video"), video: mediaContent }),
  z.object({ type: z.literal("audio"), audio: mediaContent }),
  z.object({ type: z.literal("file"), file: mediaContent }),
  z.object({ type: z.literal("pdf"), pdf: mediaContent }),
  z.object({ type: z.literal("bookmark"), bookmark: urlContent }),
  z.object({ type: z.literal("embed"), embed: urlContent }),
  z.object({ type: z.literal("link_preview"), link_preview: z.object({ url: z.string() }) }),
  z.object({ type: z.literal("child_page"), child_page: z.object({ title: z.string() }) }),
  z.object({ type: z.literal("child_database"), child_database: z.object({ title: z.string() }) }),
  z.object({
    type: z.literal("table"),
    table: z.object({
      table_width: z.number(),
      has_column_header: z.boolean(),
      has_row_header: z.boolean(),
    }),
  }),
  z.object({ type: z.literal("table_row"), table_row: z.object({ cells: z.array(richText) }) }),
  z.object({ type: z.literal("column_list"), column_list: jsonObjectSchema }),
  z.object({ type: z.literal("column"), column: jsonObjectSchema }),
  z.object({
    type: z.literal("synced_block"),
    synced_block: z.object({
      synced_from: z.object({ block_id: z.string() }).nullable(),
    }),
  }),
  z.object({ type: z.literal("link_to_page"), link_to_page: jsonObjectSchema }),
  z.object({ type: z.literal("template"), template: z.object({ rich_text: richText }) }),
]);

export type KnownBlockContent = z.infer<typeof knownBlockContentSchema>;
export type BlockType = KnownBlockContent["type"];

export interface UnsupportedBlockContent {
  type: "unsupported";
  originalType: string;
  raw: JsonObject;
}

export type BlockContent = KnownBlockContent | UnsupportedBlockContent;

/**
 * Read a block's type-specific payload as a tagged union.
 */
export function readBlockContent(block: Block): BlockContent {
  const payload: unknown = block[block.type];
  const known = knownBlockContentSchema.safeParse({ type: block.type, [block.type]: payload });
  if (known.success) return known.data;

  const raw = jsonObjectSchema.safeParse(payload);
  return {
    type: "unsupported",
    originalType: block.type,
    raw: raw.success ? raw.data : {},
  };
}

/** Plain text of a text-bearing block, or "" for blocks without text. */
export function blockPlainText(content: BlockContent): string {
  switch (content.type) {
    case "paragraph":
      return richTextToPlain(content.paragraph.rich_text);
    case "heading_1":
      return richTextToPlain(content.heading_1.rich_text);
    case "heading_2":
      return richTextToPlain(content.heading_2.rich_text);
    case "heading_3":
      return richTextToPlain(content.heading_3.rich_text);
    case "bulleted_list_item":
      return richTextToPlain(content.bulleted_list_item.rich_text);
    case "numbered_list_item":
      return richTextToPlain(content.numbered_list_item.rich_text);
    case "to_do":
      return richTextToPlain(content.to_do.rich_text);
    case "toggle":
      return richTextToPlain(content.toggle.rich_text);
    case "quote":
      return richTextToPlain(content.quote.rich_text);
    case "callout":
      return richTextToPlain(content.callout.rich_text);
    case "code":
      return richTextToPlain(content.code.rich_text);
    case "template":
      return richTextToPlain(content.template.rich_text);
    case "equation":
      return content.equation.expression;
    case "child_page":
      return content.child_page.title;
    case "child_database":
      return content.child_database.title;
    default:
      return "";
  }
}
