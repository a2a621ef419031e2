// Structured allow/deny log line for every authorization decision.

import type { AuthzDecisionReason } from "../observability/metrics.js";
import { createAuthzLogger } from "../observability/logger.js";
import type { Capability } from "./permissions.js";

export type DecisionEvent = {
  decision: "ALLOW" | "DENY";
  reason: AuthzDecisionReason;
  method: string;
  path: string;
  operation?: string;
  username?: string;
  capability?: Capability;
  resource?: string;
};

const log = createAuthzLogger();

export function logDecision(ev: DecisionEvent) {
  if (ev.decision === "DENY") log.info({ kind: "authz_decision", ...ev }, "Authorization decision");
  else log.debug({ kind: "authz_decision", ...ev }, "Authorization decision");
}
