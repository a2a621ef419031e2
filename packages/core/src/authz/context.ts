import type { AuthStrategy, AppConfig } from "../config/config.js";
import type { Authenticator } from "../auth/authenticator.js";
import { createAuthenticator } from "../auth/registry.js";
import type { SessionStore } from "../auth/session-store.js";
import type { PermissionStore } from "../store/types.js";
import type { TrackingStore } from "../upstream/tracking-client.js";
import { ResourceResolver } from "./resolver.js";
import type { RouteTable } from "./route-table.js";

export type AuthzConfig = Pick<
  AppConfig,
  "DEFAULT_PERMISSION" | "UNMATCHED_API_ROUTE" | "SESSION_COOKIE_NAME" | "SESSION_LIFETIME_SEC"
> & { AUTH_STRATEGY: AuthStrategy };

/** Everything the interceptor and the management routes share. Built once at startup. */
export type AuthzContext = {
  config: AuthzConfig;
  store: PermissionStore;
  tracking: TrackingStore;
  sessions: SessionStore;
  authenticator: Authenticator;
  routes: RouteTable;
  resolver: ResourceResolver;
  now: () => number;
};

export type AuthzContextDeps = Omit<AuthzContext, "authenticator" | "resolver" | "now"> & {
  now?: () => number;
};

export function createAuthzContext(deps: AuthzContextDeps): AuthzContext {
  const now = deps.now ?? Date.now;
  return {
    ...deps,
    now,
    resolver: new ResourceResolver(deps.tracking),
    authenticator: createAuthenticator(deps.config.AUTH_STRATEGY, {
      store: deps.store,
      sessions: deps.sessions,
      config: deps.config,
      now,
    }),
  };
}
