import { readFileSync } from "node:fs";
import { z } from "zod";
import type { AppConfig } from "../config/config.js";
import type { SessionStore } from "../auth/session-store.js";
import { clearCookie, parseCookies, setCookie, type CookieOptions } from "../auth/cookies.js";
import type { HttpServer } from "../http/http-server.js";
import { UNAUTHENTICATED_MESSAGE } from "../internal/errors.js";
import { createAuthLogger } from "../observability/logger.js";
import type { PermissionStore } from "../store/types.js";

const LOGIN_PAGE = readFileSync(new URL("./login.html", import.meta.url), "utf8");

const LoginBody = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
  next: z.string().optional(),
});

export type LoginRouteDeps = {
  store: PermissionStore;
  sessions: SessionStore;
  config: Pick<
    AppConfig,
    "SESSION_COOKIE_NAME" | "SESSION_LIFETIME_SEC" | "AUTH_COOKIE_SECURE" | "AUTH_COOKIE_DOMAIN"
  >;
  now?: () => number;
};

/** Same-origin relative paths only; anything else lands on the start page. */
export function safeNext(next: string | undefined): string {
  if (!next || !next.startsWith("/") || next.startsWith("//") || next.startsWith("/\\")) return "/";
  return next;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function registerLoginRoutes(server: HttpServer, deps: LoginRouteDeps) {
  const { store, sessions, config } = deps;
  const now = deps.now ?? Date.now;
  const log = createAuthLogger();
  const cookie: CookieOptions = {
    httpOnly: true,
    sameSite: "Lax",
    secure: config.AUTH_COOKIE_SECURE,
    domain: config.AUTH_COOKIE_DOMAIN,
    path: "/",
  };

  server.get("/login", (req, res) => {
    const next = typeof req.query.next === "string" ? safeNext(req.query.next) : "/";
    res
      .status(200)
      .header("Content-Type", "text/html; charset=utf-8")
      .sendBuffer(Buffer.from(LOGIN_PAGE.replace("{{next}}", escapeHtml(next))));
  });

  server.post("/login", async (req, res) => {
    const parsed = LoginBody.safeParse(req.body);
    if (!parsed.success || !(await store.authenticateUser(parsed.data.username, parsed.data.password))) {
      log.info({ username: parsed.success ? parsed.data.username : undefined }, "Login failed");
      res.status(401).text(UNAUTHENTICATED_MESSAGE);
      return;
    }
    const { username, next } = parsed.data;
    const user = await store.getUser(username);
    const sessionId = await sessions.create(
      { username, userId: user.id, isAdmin: user.isAdmin, loginTime: now() },
      config.SESSION_LIFETIME_SEC,
    );
    setCookie(res, config.SESSION_COOKIE_NAME, sessionId, { ...cookie, maxAgeSec: config.SESSION_LIFETIME_SEC }, now);
    log.info({ username }, "Logged in");
    res.redirect(safeNext(next), 302);
  });

  server.get("/logout", async (req, res) => {
    const sessionId = parseCookies(req)[config.SESSION_COOKIE_NAME];
    if (sessionId) await sessions.destroy(sessionId);
    clearCookie(res, config.SESSION_COOKIE_NAME, cookie);
    res.redirect("/login", 302);
  });
}
