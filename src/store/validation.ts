/**
 * Argument checks shared by store implementations.
 */

import { validate as isUuid } from "uuid";
import { ValidationError } from "../errors.js";
import type { ListSessionsOptions } from "./types.js";

export const MAX_TITLE_LENGTH = 200;
export const DEFAULT_PAGE_LIMIT = 50;
export const MAX_PAGE_LIMIT = 100;

export function assertId(value: string, field: string): void {
  if (!isUuid(value)) {
    throw new ValidationError(`Invalid ${field} (must be UUID): ${value}`, "INVALID_ID", {
      field,
    });
  }
}

/** Trim and length-check a session title. Length counts code points. */
export function normalizeTitle(title: string): string {
  const trimmed = title.trim();
  const length = Array.from(trimmed).length;
  if (length === 0 || length > MAX_TITLE_LENGTH) {
    throw new ValidationError(
      `Title must be 1-${MAX_TITLE_LENGTH} characters`,
      "INVALID_TITLE",
      { length },
    );
  }
  return trimmed;
}

export function normalizePagination(options: ListSessionsOptions): {
  limit: number;
  offset: number;
} {
  const limit = options.limit ?? DEFAULT_PAGE_LIMIT;
  const offset = options.offset ?? 0;
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_LIMIT) {
    throw new ValidationError(
      `limit must be an integer in 1..${MAX_PAGE_LIMIT}`,
      "INVALID_PAGINATION",
      { limit },
    );
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new ValidationError("offset must be a non-negative integer", "INVALID_PAGINATION", {
      offset,
    });
  }
  return { limit, offset };
}
