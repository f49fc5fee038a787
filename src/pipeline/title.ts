import { ValidationError } from "../errors.js";
import { MAX_TITLE_LENGTH } from "../store/validation.js";

export const DEFAULT_TITLE_MAX_LENGTH = 50;

const ELLIPSIS = "...";

/** Longest cut that still fits a stored title once "..." is appended. */
export const MAX_DERIVED_TITLE_LENGTH = MAX_TITLE_LENGTH - ELLIPSIS.length;

export function assertTitleMaxLength(maxLength: number): void {
  if (
    !Number.isInteger(maxLength) ||
    maxLength < 1 ||
    maxLength > MAX_DERIVED_TITLE_LENGTH
  ) {
    throw new ValidationError(
      `titleMaxLength must be an integer in 1..${MAX_DERIVED_TITLE_LENGTH}`,
      "INVALID_TITLE",
      { titleMaxLength: maxLength },
    );
  }
}

/**
 * Session title from the first user message: whitespace collapsed, cut to
 * `maxLength` code points plus "..." when longer. Blank text has no title.
 */
export function deriveTitle(
  plaintext: string,
  maxLength: number = DEFAULT_TITLE_MAX_LENGTH,
): string | undefined {
  const text = plaintext.replace(/\s+/g, " ").trim();
  if (text.length === 0) return undefined;
  const codePoints = Array.from(text);
  if (codePoints.length <= maxLength) return text;
  return codePoints.slice(0, maxLength).join("") + ELLIPSIS;
}
