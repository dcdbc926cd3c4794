/**
 * Building blocks shared by the Notion resource models.
 */

import { z } from "zod";
import type { JsonObject, JsonValue } from "../../core/index.js";
import { NotionApiError } from "../errors.js";

// ─── JSON ───

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

/**
 * Parse an API payload, raising `NotionApiError` when it does not fit.
 */
export function parseModel<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  what: string,
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new NotionApiError(
      `Unexpected response shape for ${what}${where}: ${issue?.message ?? "invalid"}`,
      { cause: result.error },
    );
  }
  return result.data;
}

// ─── Rich text ───

export const annotationsSchema = z.object({
  bold: z.boolean().default(false),
  italic: z.boolean().default(false),
  strikethrough: z.boolean().default(false),
  underline: z.boolean().default(false),
  code: z.boolean().default(false),
  color: z.string().default("default"),
});
export type Annotations = z.infer<typeof annotationsSchema>;

export const richTextSchema = z.object({
  type: z.enum(["text", "mention", "equation"]),
  plain_text: z.string(),
  href: z.string().nullable().optional(),
  annotations: annotationsSchema.optional(),
  text: z
    .object({
      content: z.string(),
      link: z.object({ url: z.string() }).nullable().optional(),
    })
    .optional(),
  mention: jsonObjectSchema.optional(),
  equation: z.object({ expression: z.string() }).optional(),
});
export type RichText = z.infer<typeof richTextSchema>;

export function richTextToPlain(items: readonly RichText[]): string {
  return items.map((item) => item.plain_text).join("");
}

// ─── Parent ───

export const parentSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("database_id"), database_id: z.string() }),
  z.object({ type: z.literal("page_id"), page_id: z.string() }),
  z.object({ type: z.literal("block_id"), block_id: z.string() }),
  z.object({ type: z.literal("workspace"), workspace: z.literal(true) }),
]);
export type Parent = z.infer<typeof parentSchema>;

// ─── Users (partial) ───

export const partialUserSchema = z.object({
  object: z.literal("user"),
  id: z.string(),
});
export type PartialUser = z.infer<typeof partialUserSchema>;

// ─── Files, icons, covers ───

const externalFileSchema = z.object({
  type: z.literal("external"),
  external: z.object({ url: z.string() }),
  name: z.string().optional(),
  caption: z.array(richTextSchema).optional(),
});

const hostedFileSchema = z.object({
  type: z.literal("file"),
  file: z.object({ url: z.string(), expiry_time: z.string().optional() }),
  name: z.string().optional(),
  caption: z.array(richTextSchema).optional(),
});

export const fileObjectSchema = z.discriminatedUnion("type", [
  externalFileSchema,
  hostedFileSchema,
]);
export type FileObject = z.infer<typeof fileObjectSchema>;

export function fileUrl(file: FileObject): string {
  return file.type === "external" ? file.external.url : file.file.url;
}

export const iconSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("emoji"), emoji: z.string() }),
  externalFileSchema.pick({ type: true, external: true }),
  hostedFileSchema.pick({ type: true, file: true }),
  z.object({
    type: z.literal("custom_emoji"),
    custom_emoji: z.object({ id: z.string(), name: z.string().optional(), url: z.string().optional() }),
  }),
]);
export type Icon = z.infer<typeof iconSchema>;

export const coverSchema = z.discriminatedUnion("type", [
  externalFileSchema.pick({ type: true, external: true }),
  hostedFileSchema.pick({ type: true, file: true }),
]);
export type Cover = z.infer<typeof coverSchema>;

// ─── Select ───

export const selectOptionSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  color: z.string().optional(),
});
export type SelectOption = z.infer<typeof selectOptionSchema>;

export const dateValueSchema = z.object({
  start: z.string(),
  end: z.string().nullable().optional(),
  time_zone: z.string().nullable().optional(),
});
export type DateValue = z.infer<typeof dateValueSchema>;
