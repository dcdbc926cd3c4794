import { LocalValidationError } from "./errors.js";

const HEX_ID = /^[0-9a-fA-F]{32}$/;

export const MAX_PAGE_SIZE = 100;

/**
 * Strip the dashes from a Notion ID.
 */
export function normalizeId(id: string): string {
  return id.replace(/-/g, "");
}

export function isNotionId(id: string): boolean {
  return HEX_ID.test(normalizeId(id));
}

/**
 * Throw a `LocalValidationError` unless `id` is 32 hex characters once
 * dashes are removed.
 */
export function validateId(id: string, objectType = "object"): void {
  if (typeof id !== "string" || id.length === 0) {
    throw new LocalValidationError(`Invalid ${objectType} ID: must be a non-empty string`);
  }
  const clean = normalizeId(id);
  if (clean.length !== 32) {
    throw new LocalValidationError(
      `Invalid ${objectType} ID format: expected 32 characters, got ${clean.length}`,
    );
  }
  if (!HEX_ID.test(clean)) {
    throw new LocalValidationError(`Invalid ${objectType} ID format: must be hexadecimal`);
  }
}

/**
 * Format an ID in 8-4-4-4-12 UUID form.
 */
export function formatId(id: string): string {
  validateId(id);
  const c = normalizeId(id).toLowerCase();
  return `${c.slice(0, 8)}-${c.slice(8, 12)}-${c.slice(12, 16)}-${c.slice(16, 20)}-${c.slice(20)}`;
}

export function validatePageSize(pageSize: number): void {
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw new LocalValidationError(
      `Invalid page size ${pageSize}: must be an integer between 1 and ${MAX_PAGE_SIZE}`,
    );
  }
}
