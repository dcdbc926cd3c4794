import { z } from "zod";
import {
  coverSchema,
  iconSchema,
  parentSchema,
  partialUserSchema,
  richTextToPlain,
} from "./common.js";
import { propertyValueSchema } from "./property.js";
import type { PropertyValue } from "./property.js";

export const pageSchema = z
  .object({
    object: z.literal("page"),
    id: z.string(),
    created_time: z.string(),
    last_edited_time: z.string(),
    created_by: partialUserSchema.optional(),
    last_edited_by: partialUserSchema.optional(),
    archived: z.boolean(),
    in_trash: z.boolean().default(false),
    parent: parentSchema,
    icon: iconSchema.nullable().optional(),
    cover: coverSchema.nullable().optional(),
    properties: z.record(propertyValueSchema),
    url: z.string(),
    public_url: z.string().nullable().optional(),
  })
  .passthrough();

export type Page = z.infer<typeof pageSchema>;

/** The property of kind `title`, if the page has one. */
export function findTitleProperty(page: Page): PropertyValue | undefined {
  return Object.values(page.properties).find((value) => value.type === "title");
}

/**
 * Plain-text title of a page; "" when it has no title property.
 */
export function pageTitle(page: Page): string {
  const title = findTitleProperty(page);
  return title?.type === "title" ? richTextToPlain(title.title) : "";
}

/** Single page property, paginated or not, as returned by the property endpoint. */
export const propertyItemSchema = z
  .object({
    object: z.enum(["property_item", "list"]),
    type: z.string().optional(),
  })
  .passthrough();

export type PropertyItem = z.infer<typeof propertyItemSchema>;
