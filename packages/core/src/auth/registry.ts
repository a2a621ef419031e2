import type { AppConfig, AuthStrategy } from "../config/config.js";
import type { PermissionStore } from "../store/types.js";
import type { Authenticator } from "./authenticator.js";
import { BasicAuthenticator } from "./basic.js";
import { SessionAuthenticator } from "./session.js";
import type { SessionStore } from "./session-store.js";

export type AuthenticatorDeps = {
  store: PermissionStore;
  sessions: SessionStore;
  config: Pick<AppConfig, "SESSION_COOKIE_NAME" | "SESSION_LIFETIME_SEC">;
  now?: () => number;
};

const AUTHENTICATORS: Record<AuthStrategy, (deps: AuthenticatorDeps) => Authenticator> = {
  basic: (deps) => new BasicAuthenticator(deps.store),
  session: (deps) =>
    new SessionAuthenticator({
      store: deps.store,
      sessions: deps.sessions,
      cookieName: deps.config.SESSION_COOKIE_NAME,
      lifetimeSec: deps.config.SESSION_LIFETIME_SEC,
      now: deps.now,
    }),
};

export function createAuthenticator(strategy: AuthStrategy, deps: AuthenticatorDeps): Authenticator {
  return AUTHENTICATORS[strategy](deps);
}
