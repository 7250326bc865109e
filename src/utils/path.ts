import type { PathSegment } from "../validator/Violation.js";

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$-]*$/;

/**
 * Render a document path: `plugins[0].source.repo`.
 * Keys that are not identifiers are quoted (`mcpServers["my server"]`),
 * and the empty path renders as `(root)`.
 *
 * @param segments
 * @returns
 */
export function formatPath(segments: readonly PathSegment[]): string {
  if (segments.length === 0) return "(root)";

  let out = "";
  for (const segment of segments) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else if (IDENTIFIER.test(segment)) {
      out += out ? `.${segment}` : segment;
    } else {
      out += `[${JSON.stringify(segment)}]`;
    }
  }

  return out;
}

/**
 * Append a token to a JSON pointer, escaping `~` and `/`.
 *
 * @param pointer
 * @param tokens
 * @returns
 */
export function appendPointer(pointer: string, ...tokens: PathSegment[]): string {
  return tokens.reduce<string>(
    (acc, token) => `${acc}/${encodePointerToken(String(token))}`,
    pointer
  );
}

export function encodePointerToken(token: string): string {
  return token.replace(/~/g, "~0").replace(/\//g, "~1");
}

export function decodePointerToken(token: string): string {
  return token.replace(/~1/g, "/").replace(/~0/g, "~");
}

/**
 * Join all path parts with "/" and remove duplicate slashes.
 *
 * @param parts
 * @returns
 */
export function joinPath(...parts: string[]): string {
  return parts.join("/").replace(/\/+/g, "/");
}

/**
 * Lower-cased extension of the last path segment, without the dot.
 *
 * @param path
 * @returns
 */
export function extname(path: string): string {
  const last = path.split("/").pop() ?? "";
  const dot = last.lastIndexOf(".");

  return dot > 0 ? last.slice(dot + 1).toLowerCase() : "";
}
