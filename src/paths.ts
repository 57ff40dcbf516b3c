import * as path from "node:path";
import * as fs from "node:fs/promises";

const BASE_FILENAME_CHARS = "/.-_+,#$%~=";

// Listing entries may contain these, so they are treated as part of a name.
const WIDENED_FILENAME_CHARS = " &(),;=[]{}";

export const ENTRY_NAME_CHARS = BASE_FILENAME_CHARS + WIDENED_FILENAME_CHARS;

/** Extra filename characters, or a predicate deciding for every character. */
export type NameChars = string | ((ch: string) => boolean);

/** A listing line holds exactly one entry: everything but a line break is part of its name. */
export const LISTING_LINE_CHARS: NameChars = (ch) => ch !== "\n" && ch !== "\r";

function isNameChar(ch: string, nameChars: NameChars): boolean {
  if (typeof nameChars === "function") {
    return nameChars(ch);
  }
  if (/[\p{L}\p{N}]/u.test(ch)) {
    return true;
  }
  return nameChars.includes(ch);
}

/**
 * Returns the filename token under `column`, or the first one after it when the
 * cursor sits on a separator. Whitespace around the token is trimmed.
 */
export function extractEntryToken(
  lineText: string,
  column: number,
  nameChars: NameChars = ENTRY_NAME_CHARS
): string | undefined {
  const chars = Array.from(lineText);
  let start = Math.max(0, Math.min(column, chars.length));

  while (start < chars.length && !isNameChar(chars[start] ?? "", nameChars)) {
    start++;
  }
  if (start >= chars.length) {
    return undefined;
  }

  let end = start;
  while (end < chars.length && isNameChar(chars[end] ?? "", nameChars)) {
    end++;
  }
  while (start > 0 && isNameChar(chars[start - 1] ?? "", nameChars)) {
    start--;
  }

  const token = chars.slice(start, end).join("").trim();
  return token.length > 0 ? token : undefined;
}

export function stripTrailingSeparator(p: string): string {
  let result = p;
  while (result.length > 1 && (result.endsWith("/") || result.endsWith(path.sep))) {
    result = result.slice(0, -1);
  }
  return result;
}

export function isParentOrSelf(name: string): boolean {
  const bare = stripTrailingSeparator(name);
  return bare === "." || bare === "..";
}

export function resolveEntryPath(
  directory: string,
  lineText: string,
  column: number
): string | undefined {
  const name = extractEntryToken(lineText, column, LISTING_LINE_CHARS);
  if (!name || isParentOrSelf(name)) {
    return undefined;
  }
  return stripTrailingSeparator(path.resolve(directory, name));
}

export async function dirExists(p: string): Promise<boolean> {
  try {
    const stat = await fs.stat(p);
    return stat.isDirectory();
  } catch {
    return false;
  }
}
