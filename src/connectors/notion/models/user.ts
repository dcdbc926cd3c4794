import { z } from "zod";

export const userSchema = z
  .object({
    object: z.literal("user"),
    id: z.string(),
    type: z.enum(["person", "bot"]).optional(),
    name: z.string().nullable().optional(),
    avatar_url: z.string().nullable().optional(),
    person: z.object({ email: z.string().optional() }).optional(),
    bot: z
      .object({
        owner: z
          .object({ type: z.string(), workspace: z.boolean().optional() })
          .passthrough()
          .optional(),
        workspace_name: z.string().nullable().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type User = z.infer<typeof userSchema>;

export function isBot(user: User): boolean {
  return user.type === "bot";
}

export function userEmail(user: User): string | undefined {
  return user.person?.email;
}
