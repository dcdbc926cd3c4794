/**
 * Page property values and database property configurations.
 *
 * Both are a closed set of documented kinds plus an `unknown` variant. Every
 * parsed value keeps the payload it came from in `raw`, so unknown kinds
 * survive a read-modify-write cycle untouched.
 */

import { z } from "zod";
import type { JsonObject } from "../../core/index.js";
import {
  dateValueSchema,
  fileObjectSchema,
  jsonObjectSchema,
  jsonValueSchema,
  partialUserSchema,
  richTextSchema,
  selectOptionSchema,
} from "./common.js";

// ─── Property values ───

const id = z.string().optional();

const formulaSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("string"), string: z.string().nullable() }),
  z.object({ type: z.literal("number"), number: z.number().nullable() }),
  z.object({ type: z.literal("boolean"), boolean: z.boolean().nullable() }),
  z.object({ type: z.literal("date"), date: dateValueSchema.nullable() }),
]);

const rollupSchema = z.object({
  type: z.string(),
  function: z.string().optional(),
  number: z.number().nullable().optional(),
  date: dateValueSchema.nullable().optional(),
  array: z.array(jsonValueSchema).optional(),
});

const knownPropertyValueSchema = z.discriminatedUnion("type", [
  z.object({ id, type: z.literal("title"), title: z.array(richTextSchema) }),
  z.object({ id, type: z.literal("rich_text"), rich_text: z.array(richTextSchema) }),
  z.object({ id, type: z.literal("number"), number: z.number().nullable() }),
  z.object({ id, type: z.literal("select"), select: selectOptionSchema.nullable() }),
  z.object({ id, type: z.literal("multi_select"), multi_select: z.array(selectOptionSchema) }),
  z.object({ id, type: z.literal("status"), status: selectOptionSchema.nullable() }),
  z.object({ id, type: z.literal("date"), date: dateValueSchema.nullable() }),
  z.object({ id, type: z.literal("people"), people: z.array(partialUserSchema) }),
  z.object({ id, type: z.literal("files"), files: z.array(fileObjectSchema) }),
  z.object({ id, type: z.literal("checkbox"), checkbox: z.boolean() }),
  z.object({ id, type: z.literal("url"), url: z.string().nullable() }),
  z.object({ id, type: z.literal("email"), email: z.string().nullable() }),
  z.object({ id, type: z.literal("phone_number"), phone_number: z.string().nullable() }),
  z.object({ id, type: z.literal("formula"), formula: formulaSchema }),
  z.object({
    id,
    type: z.literal("relation"),
    relation: z.array(z.object({ id: z.string() })),
    has_more: z.boolean().optional(),
  }),
  z.object({ id, type: z.literal("rollup"), rollup: rollupSchema }),
  z.object({ id, type: z.literal("created_time"), created_time: z.string() }),
  z.object({ id, type: z.literal("created_by"), created_by: partialUserSchema }),
  z.object({ id, type: z.literal("last_edited_time"), last_edited_time: z.string() }),
  z.object({ id, type: z.literal("last_edited_by"), last_edited_by: partialUserSchema }),
  z.object({
    id,
    type: z.literal("unique_id"),
    unique_id: z.object({ prefix: z.string().nullable(), number: z.number().nullable() }),
  }),
  z.object({
    id,
    type: z.literal("verification"),
    verification: z.object({
      state: z.string(),
      verified_by: partialUserSchema.nullable().optional(),
      date: dateValueSchema.nullable().optional(),
    }),
  }),
]);

export type KnownPropertyValue = z.infer<typeof knownPropertyValueSchema>;
export type PropertyType = KnownPropertyValue["type"];

export interface UnknownPropertyValue {
  type: "unknown";
  id?: string;
  /** The `type` the server sent, or "unknown" when it sent none. */
  originalType: string;
}

export type PropertyValue = (KnownPropertyValue | UnknownPropertyValue) & { raw: JsonObject };

function typeField(raw: JsonObject): string {
  return typeof raw.type === "string" ? raw.type : "unknown";
}

function idField(raw: JsonObject): string | undefined {
  return typeof raw.id === "string" ? raw.id : undefined;
}

export function parsePropertyValue(raw: JsonObject): PropertyValue {
  const known = knownPropertyValueSchema.safeParse(raw);
  if (known.success) {
    return { ...known.data, raw };
  }
  return { type: "unknown", id: idField(raw), originalType: typeField(raw), raw };
}

/** Wire shape of a parsed property value. */
export function propertyValueToJson(value: PropertyValue): JsonObject {
  return value.raw;
}

export const propertyValueSchema = jsonObjectSchema.transform(parsePropertyValue);

// ─── Database property configurations ───

const emptyConfig = z.object({}).passthrough();
const optionsConfig = z.object({ options: z.array(selectOptionSchema).default([]) });
const base = { id: z.string(), name: z.string() };

const knownDatabasePropertySchema = z.discriminatedUnion("type", [
  z.object({ ...base, type: z.literal("title"), title: emptyConfig }),
  z.object({ ...base, type: z.literal("rich_text"), rich_text: emptyConfig }),
  z.object({
    ...base,
    type: z.literal("number"),
    number: z.object({ format: z.string().default("number") }),
  }),
  z.object({ ...base, type: z.literal("select"), select: optionsConfig }),
  z.object({ ...base, type: z.literal("multi_select"), multi_select: optionsConfig }),
  z.object({
    ...base,
    type: z.literal("status"),
    status: optionsConfig.extend({
      groups: z
        .array(
          z.object({
            id: z.string().optional(),
            name: z.string(),
            color: z.string().optional(),
            option_ids: z.array(z.string()).default([]),
          }),
        )
        .default([]),
    }),
  }),
  z.object({ ...base, type: z.literal("date"), date: emptyConfig }),
  z.object({ ...base, type: z.literal("people"), people: emptyConfig }),
  z.object({ ...base, type: z.literal("files"), files: emptyConfig }),
  z.object({ ...base, type: z.literal("checkbox"), checkbox: emptyConfig }),
  z.object({ ...base, type: z.literal("url"), url: emptyConfig }),
  z.object({ ...base, type: z.literal("email"), email: emptyConfig }),
  z.object({ ...base, type: z.literal("phone_number"), phone_number: emptyConfig }),
  z.object({ ...base, type: z.literal("formula"), formula: z.object({ expression: z.string() }) }),
  z.object({
    ...base,
    type: z.literal("relation"),
    relation: z.object({ database_id: z.string() }).passthrough(),
  }),
  z.object({
    ...base,
    type: z.literal("rollup"),
    rollup: z
      .object({
        relation_property_name: z.string().optional(),
        rollup_property_name: z.string().optional(),
        function: z.string(),
      })
      .passthrough(),
  }),
  z.object({ ...base, type: z.literal("created_time"), created_time: emptyConfig }),
  z.object({ ...base, type: z.literal("created_by"), created_by: emptyConfig }),
  z.object({ ...base, type: z.literal("last_edited_time"), last_edited_time: emptyConfig }),
  z.object({ ...base, type: z.literal("last_edited_by"), last_edited_by: emptyConfig }),
  z.object({
    ...base,
    type: z.literal("unique_id"),
    unique_id: z.object({ prefix: z.string().nullable().optional() }),
  }),
  z.object({ ...base, type: z.literal("verification"), verification: emptyConfig }),
]);

export type KnownDatabaseProperty = z.infer<typeof knownDatabasePropertySchema>;

export interface UnknownDatabaseProperty {
  type: "unknown";
  id?: string;
  name?: string;
  originalType: string;
}

export type DatabaseProperty = (KnownDatabaseProperty | UnknownDatabaseProperty) & {
  raw: JsonObject;
};

export function parseDatabaseProperty(raw: JsonObject): DatabaseProperty {
  const known = knownDatabasePropertySchema.safeParse(raw);
  if (known.success) {
    return { ...known.data, raw };
  }
  return {
    type: "unknown",
    id: idField(raw),
    name: typeof raw.name === "string" ? raw.name : undefined,
    originalType: typeField(raw),
    raw,
  };
}

export const databasePropertySchema = jsonObjectSchema.transform(parseDatabaseProperty);

/** Option names of a select, multi-select or status property. */
export function propertyOptions(property: DatabaseProperty): string[] {
  switch (property.type) {
    case "select":
      return property.select.options.map((option) => option.name);
    case "multi_select":
      return property.multi_select.options.map((option) => option.name);
    case "status":
      return property.status.options.map((option) => option.name);
    default:
      return [];
  }
}
