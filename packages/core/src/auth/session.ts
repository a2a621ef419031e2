import type { RequestLike } from "../http/http-server.js";
import type { PermissionStore } from "../store/types.js";
import { createAuthLogger } from "../observability/logger.js";
import { headerValue, unauthenticated, type AuthOutcome, type Authenticator } from "./authenticator.js";
import { parseCookies } from "./cookies.js";
import type { SessionData, SessionStore } from "./session-store.js";

export type SessionAuthenticatorOptions = {
  store: PermissionStore;
  sessions: SessionStore;
  cookieName: string;
  lifetimeSec: number;
  now?: () => number;
};

export function isSessionExpired(session: SessionData, lifetimeSec: number, now: number): boolean {
  return now - session.loginTime > lifetimeSec * 1000;
}

/** Server-side sessions keyed by a cookie. Browsers are sent to the login page instead of a 401. */
export class SessionAuthenticator implements Authenticator {
  readonly strategy = "session" as const;
  private readonly log = createAuthLogger();
  private readonly now: () => number;

  constructor(private readonly opts: SessionAuthenticatorOptions) {
    this.now = opts.now ?? Date.now;
  }

  async authenticate(req: RequestLike): Promise<AuthOutcome> {
    const sessionId = parseCookies(req)[this.opts.cookieName];
    if (!sessionId) return this.challenge(req);

    const session = await this.opts.sessions.get(sessionId);
    if (!session) return this.challenge(req);

    if (isSessionExpired(session, this.opts.lifetimeSec, this.now())) {
      await this.opts.sessions.destroy(sessionId);
      this.log.info({ username: session.username }, "Session expired");
      return this.challenge(req);
    }

    if (!(await this.opts.store.hasUser(session.username))) {
      await this.opts.sessions.destroy(sessionId);
      this.log.info({ username: session.username }, "Session of a deleted user dropped");
      return this.challenge(req);
    }

    return {
      kind: "identity",
      identity: { username: session.username, userId: session.userId, source: this.strategy },
    };
  }

  private challenge(req: RequestLike): AuthOutcome {
    const accept = headerValue(req, "accept") ?? "";
    if (!accept.includes("text/html")) return unauthenticated();
    const location =
      req.method.toUpperCase() === "GET" ? `/login?next=${encodeURIComponent(req.url)}` : "/login";
    return unauthenticated({ kind: "redirect", status: 302, location });
  }
}
