// RFC 3986 unreserved characters; their percent-encodings mean the same path
const ENCODED_UNRESERVED = /%(2[dD]|2[eE]|3[0-9]|[46][1-9a-fA-F]|[57][0-9aA]|5[fF]|7[eE])/g;

/**
 * The path the tracking server will act on, with encoded unreserved characters decoded. Null
 * when the path cannot be authorized as written: dot segments (plain or percent-encoded),
 * backslashes, encoded slashes, or a leading `//` that an HTTP client would read as another host.
 */
export function canonicalPath(raw: string): string | null {
  if (!raw.startsWith("/") || raw.startsWith("//")) return null;
  if (raw.includes("\\") || /%(5c|2f)/i.test(raw)) return null;
  const path = raw.replace(ENCODED_UNRESERVED, (hex) =>
    String.fromCharCode(Number.parseInt(hex.slice(1), 16)),
  );
  const segments = path.split("/");
  if (segments.some((s) => s === "." || s === "..")) return null;
  return path;
}

/** `/static` matches `/static` and `/static/...`, never `/static-files`. */
export function hasPathPrefix(path: string, prefix: string): boolean {
  return path === prefix || path.startsWith(prefix + "/");
}

/** The `?query` part of a request url, including the `?`; empty when there is none. */
export function searchOf(url: string): string {
  const index = url.indexOf("?");
  return index === -1 ? "" : url.slice(index);
}
