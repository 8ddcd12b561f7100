import type { PathSegment } from "@formwork/types";

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export function isIdentifierKey(key: string): boolean {
  return IDENTIFIER.test(key);
}

/**
 * Renders error location segments as a dotted/indexed path.
 * Keys that are not identifiers are bracketed and quoted.
 *
 * @example
 * formatPath(["items", 1, "price"]) => "items[1].price"
 * formatPath(["labels", "en-US"]) => 'labels["en-US"]'
 * formatPath([]) => ""
 */
export function formatPath(loc: readonly PathSegment[]): string {
  let path = "";
  for (const segment of loc) {
    if (typeof segment === "number") {
      path += `[${segment}]`;
    } else if (isIdentifierKey(segment)) {
      path += path ? `.${segment}` : segment;
    } else {
      path += `[${JSON.stringify(segment)}]`;
    }
  }
  return path;
}

/** Appends segments to a parent location without mutating it. */
export function joinPath(parent: readonly PathSegment[], ...segments: PathSegment[]): PathSegment[] {
  return [...parent, ...segments];
}
