import type { AuthStrategy } from "../config/config.js";
import type { RequestLike } from "../http/http-server.js";
import { UNAUTHENTICATED_MESSAGE } from "../internal/errors.js";

export type AuthenticatedIdentity = {
  username: string;
  userId: number;
  source: AuthStrategy;
};

/** What an unauthenticated caller gets back, written by the interceptor. */
export type AuthChallenge =
  | { kind: "text"; status: 401; body: string }
  | { kind: "redirect"; status: 302; location: string };

export type AuthOutcome =
  | { kind: "identity"; identity: AuthenticatedIdentity }
  | { kind: "unauthenticated"; response: AuthChallenge };

export interface Authenticator {
  readonly strategy: AuthStrategy;
  authenticate(req: RequestLike): Promise<AuthOutcome>;
}

// No WWW-Authenticate header: browsers must not pop up a credentials dialog.
export const UNAUTHENTICATED_TEXT: AuthChallenge = {
  kind: "text",
  status: 401,
  body: UNAUTHENTICATED_MESSAGE,
};

export function unauthenticated(response: AuthChallenge = UNAUTHENTICATED_TEXT): AuthOutcome {
  return { kind: "unauthenticated", response };
}

export function headerValue(req: RequestLike, name: string): string | undefined {
  const value = req.headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}
