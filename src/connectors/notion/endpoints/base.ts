import type { JsonObject, JsonValue, Logger } from "../../core/index.js";
import type { NotionTransport } from "../http-client.js";
import { validateId } from "../ids.js";

/**
 * Drop `undefined` entries so optional fields are omitted from the body.
 * `null` is kept: Notion uses it to clear a value.
 */
export function compact(fields: Record<string, JsonValue | undefined>): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export abstract class BaseEndpoint {
  constructor(
    protected readonly transport: NotionTransport,
    protected readonly logger: Logger,
  ) {}

  protected validateId(id: string, objectType: string): void {
    validateId(id, objectType);
  }
}
