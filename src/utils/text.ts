export const DEFAULT_MAX_FILENAME_LENGTH = 100;

export function normalizeWhitespace(value: string): string {
  return value.replace(/\r/g, "\n").replace(/\t/g, " ").replace(/ {2,}/g, " ").trim();
}

/** Upper-cases the first letter of every alphabetic run and lower-cases the rest. */
export function titleCase(value: string): string {
  return value.replace(/\p{L}+/gu, (word) => `${word.charAt(0).toUpperCase()}${word.slice(1).toLowerCase()}`);
}

/**
 * Turns a concept name into a directory/file name: spaces become underscores, anything other
 * than letters, digits, `_`, `-` and `.` is dropped, underscore runs collapse, the result is cut
 * to `maxLength` code points and trailing `_`/`.` are removed.
 */
export function sanitizeFileName(name: string, maxLength = DEFAULT_MAX_FILENAME_LENGTH): string {
  const cleaned = name
    .replace(/ /g, "_")
    .replace(/[^\p{L}\p{N}_.-]/gu, "")
    .replace(/_+/g, "_");

  const truncated = Array.from(cleaned).slice(0, maxLength).join("");
  return truncated.replace(/[_.]+$/, "");
}
