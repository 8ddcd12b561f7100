import type { ErrorKind, PathSegment } from "@formwork/types";

export type Issue = {
  kind: ErrorKind;
  code: string;
  message: string;
  input: unknown;
};

/**
 * Errors as produced during a run. Locations are relative: a `nested` node
 * prefixes everything below it with one path segment.
 */
export type ErrorNode =
  | { type: "issue"; issue: Issue }
  | { type: "nested"; segment: PathSegment; children: ErrorNode[] };

export function issueNode(kind: ErrorKind, code: string, message: string, input: unknown): ErrorNode {
  return { type: "issue", issue: { kind, code, message, input } };
}

export function nestedNode(segment: PathSegment, children: ErrorNode[]): ErrorNode {
  return { type: "nested", segment, children };
}
