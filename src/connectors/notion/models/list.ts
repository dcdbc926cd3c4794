import { z } from "zod";
import { jsonObjectSchema } from "./common.js";

/** A list envelope whose results are still raw objects. */
export const rawListSchema = z.object({
  object: z.literal("list"),
  results: z.array(jsonObjectSchema),
  has_more: z.boolean(),
  next_cursor: z.string().nullable(),
});

export interface ListResponse<T> {
  object: "list";
  results: T[];
  has_more: boolean;
  next_cursor: string | null;
}
