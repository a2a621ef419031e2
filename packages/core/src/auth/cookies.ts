import type { ResponseLike, RequestLike } from "../http/http-server.js";
import { headerValue } from "./authenticator.js";

export type CookieOptions = {
  httpOnly?: boolean;
  secure?: boolean;
  path?: string;
  sameSite?: "Lax" | "Strict" | "None";
  domain?: string;
  maxAgeSec?: number;
};

function serializeCookie(
  name: string,
  value: string,
  opts: CookieOptions,
  now: () => number,
): string {
  const parts: string[] = [];
  parts.push(`${encodeURIComponent(name)}=${encodeURIComponent(value)}`);
  parts.push(`Path=${opts.path ?? "/"}`);
  if (opts.httpOnly !== false) parts.push("HttpOnly");
  if (opts.sameSite) parts.push(`SameSite=${opts.sameSite}`);
  if (opts.secure) parts.push("Secure");
  if (opts.domain) parts.push(`Domain=${opts.domain}`);
  if (opts.maxAgeSec != null) {
    parts.push(`Max-Age=${Math.floor(opts.maxAgeSec)}`);
    const expires = new Date(now() + opts.maxAgeSec * 1000);
    parts.push(`Expires=${expires.toUTCString()}`);
  }
  return parts.join("; ");
}

function withDefaults(opts: CookieOptions): CookieOptions {
  return {
    httpOnly: opts.httpOnly ?? true,
    sameSite: opts.sameSite ?? "Lax",
    secure: opts.secure ?? false,
    path: opts.path ?? "/",
    domain: opts.domain,
    maxAgeSec: opts.maxAgeSec,
  };
}

export function setCookie(
  res: ResponseLike,
  name: string,
  value: string,
  opts: CookieOptions = {},
  now: () => number = Date.now,
) {
  res.header("Set-Cookie", serializeCookie(name, value, withDefaults(opts), now));
}

export function clearCookie(res: ResponseLike, name: string, opts: CookieOptions = {}) {
  res.header("Set-Cookie", serializeCookie(name, "", { ...withDefaults(opts), maxAgeSec: 0 }, Date.now));
}

function safeDecode(s: string): string {
  try {
    return decodeURIComponent(s);
  } catch {
    return s;
  }
}

export function parseCookies(req: RequestLike): Record<string, string> {
  const header = headerValue(req, "cookie") ?? "";
  const out: Record<string, string> = {};
  if (!header) return out;
  for (const pair of header.split(/;\s*/)) {
    const idx = pair.indexOf("=");
    if (idx === -1) continue;
    out[safeDecode(pair.slice(0, idx).trim())] = safeDecode(pair.slice(idx + 1).trim());
  }
  return out;
}
