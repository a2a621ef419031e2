import type { PermissionStore } from "../store/types.js";
import type { RequestLike } from "../http/http-server.js";
import { createAuthLogger } from "../observability/logger.js";
import { headerValue, unauthenticated, type AuthOutcome, type Authenticator } from "./authenticator.js";

export function parseBasicCredentials(
  header: string | undefined,
): { username: string; password: string } | null {
  if (!header) return null;
  const match = /^Basic\s+(\S+)\s*$/i.exec(header);
  if (!match?.[1]) return null;
  const decoded = Buffer.from(match[1], "base64").toString("utf8");
  const sep = decoded.indexOf(":");
  if (sep <= 0) return null;
  return { username: decoded.slice(0, sep), password: decoded.slice(sep + 1) };
}

/** `Authorization: Basic` verified against the stored password hash on every request. */
export class BasicAuthenticator implements Authenticator {
  readonly strategy = "basic" as const;
  private readonly log = createAuthLogger();

  constructor(private readonly store: PermissionStore) {}

  async authenticate(req: RequestLike): Promise<AuthOutcome> {
    const credentials = parseBasicCredentials(headerValue(req, "authorization"));
    if (!credentials) return unauthenticated();
    const { username, password } = credentials;
    if (!(await this.store.authenticateUser(username, password))) {
      this.log.info({ username }, "Rejected credentials");
      return unauthenticated();
    }
    const user = await this.store.getUser(username);
    return { kind: "identity", identity: { username, userId: user.id, source: this.strategy } };
  }
}
