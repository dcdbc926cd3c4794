import { z } from "zod";
import {
  coverSchema,
  iconSchema,
  parentSchema,
  partialUserSchema,
  richTextSchema,
  richTextToPlain,
} from "./common.js";
import { databasePropertySchema } from "./property.js";

export const databaseSchema = z
  .object({
    object: z.literal("database"),
    id: z.string(),
    created_time: z.string(),
    last_edited_time: z.string(),
    created_by: partialUserSchema.optional(),
    last_edited_by: partialUserSchema.optional(),
    title: z.array(richTextSchema),
    description: z.array(richTextSchema).default([]),
    properties: z.record(databasePropertySchema),
    parent: parentSchema,
    url: z.string(),
    public_url: z.string().nullable().optional(),
    archived: z.boolean(),
    in_trash: z.boolean().default(false),
    is_inline: z.boolean().default(false),
    icon: iconSchema.nullable().optional(),
    cover: coverSchema.nullable().optional(),
  })
  .passthrough();

export type Database = z.infer<typeof databaseSchema>;

export function databaseTitle(database: Database): string {
  return richTextToPlain(database.title);
}
