import type { AuthChallenge } from "../auth/authenticator.js";
import { UNAUTHENTICATED_TEXT } from "../auth/authenticator.js";
import type { RequestLike, ResponseLike } from "../http/http-server.js";
import { canonicalPath, hasPathPrefix } from "../http/paths.js";
import {
  AuthzError,
  PERMISSION_DENIED_MESSAGE,
  toErrorResponse,
  type ErrorResponse,
} from "../internal/errors.js";
import { createAuthzLogger } from "../observability/logger.js";
import {
  recordAuthzDecision,
  recordAuthzFilter,
  type AuthzDecisionReason,
} from "../observability/metrics.js";
import type { AuthzContext } from "./context.js";
import { logDecision } from "./decisionLog.js";
import { filterSearchResponse } from "./filters.js";
import type { Capability } from "./permissions.js";
import { afterRuleFor, beforeRuleFor, type AfterRule } from "./policy.js";
import { RequestParams } from "./request-params.js";
import type { MatchedRoute } from "./route-table.js";
import { artifactCapabilityFor, checkArtifactAccess, checkBeforeRule } from "./validators.js";

const ALLOW_LIST_PREFIXES = ["/static", "/health"];
const ALLOW_LIST_PATHS = new Set(["/favicon.ico", "/login", "/signup"]);

export function isAllowListed(path: string): boolean {
  return ALLOW_LIST_PATHS.has(path) || ALLOW_LIST_PREFIXES.some((p) => hasPathPrefix(path, p));
}

type Verdict = {
  allowed: boolean;
  reason: AuthzDecisionReason;
  operation?: string;
  capability?: Capability;
};

export interface AuthorizationInterceptor {
  /** Runs before routing. "handled" means the response was already written. */
  beforeRequest(req: RequestLike, res: ResponseLike): Promise<"continue" | "handled">;
  /** The after-request rule for a request, when its response must be buffered. */
  afterRuleOf(req: RequestLike): AfterRule | undefined;
  /** Post-processes a successful upstream JSON body and returns what the caller receives. */
  afterRequest(req: RequestLike, status: number, body: unknown): Promise<unknown>;
}

export function writeChallenge(res: ResponseLike, challenge: AuthChallenge) {
  if (challenge.kind === "redirect") res.redirect(challenge.location, challenge.status);
  else res.status(challenge.status).text(challenge.body);
}

export function writeErrorResponse(res: ResponseLike, response: ErrorResponse) {
  if (response.kind === "text") res.status(response.status).text(response.body);
  else res.status(response.status).json(response.body);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringAt(value: unknown, ...path: string[]): string | undefined {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  if (typeof current === "number") return String(current);
  return typeof current === "string" && current !== "" ? current : undefined;
}

export function createAuthorizationInterceptor(ctx: AuthzContext): AuthorizationInterceptor {
  const log = createAuthzLogger();
  const validatorDeps = {
    store: ctx.store,
    resolver: ctx.resolver,
    defaultPermission: ctx.config.DEFAULT_PERMISSION,
  };
  // Requests from callers whose admin flag was set when the request was authorized
  const admins = new WeakSet<RequestLike>();

  function decide(req: RequestLike, verdict: Verdict, startedAt: number, username?: string) {
    logDecision({
      decision: verdict.allowed ? "ALLOW" : "DENY",
      reason: verdict.reason,
      method: req.method,
      path: req.path,
      operation: verdict.operation,
      username,
      capability: verdict.capability,
    });
    recordAuthzDecision({
      operation: verdict.operation ?? "unmatched",
      httpMethod: req.method,
      effect: verdict.allowed ? "allow" : "deny",
      reason: verdict.reason,
      capability: verdict.capability,
      durationMs: ctx.now() - startedAt,
    });
  }

  async function authorizeRoute(
    req: RequestLike,
    match: MatchedRoute,
    username: string,
  ): Promise<Verdict> {
    const rule = beforeRuleFor(match.operation);
    const operation = match.operation;
    if (rule.kind === "authenticated") return { allowed: true, reason: "AUTHENTICATED_ONLY", operation };
    const capability = "capability" in rule ? rule.capability : undefined;
    const allowed = await checkBeforeRule(rule, username, new RequestParams(req, match.params), validatorDeps);
    return { allowed, reason: allowed ? "VALIDATOR_PASSED" : "VALIDATOR_FAILED", operation, capability };
  }

  async function authorize(req: RequestLike, username: string): Promise<Verdict> {
    const match = ctx.routes.match(req.method, req.path);
    if (match) return authorizeRoute(req, match, username);

    const artifact = ctx.routes.matchArtifactProxy(req.path);
    const capability = artifact ? artifactCapabilityFor(req.method) : undefined;
    if (artifact && capability) {
      const allowed = await checkArtifactAccess(capability, artifact, username, validatorDeps);
      return {
        allowed,
        reason: allowed ? "VALIDATOR_PASSED" : "VALIDATOR_FAILED",
        operation: "ArtifactProxy",
        capability,
      };
    }

    if (ctx.routes.isApiPath(req.path)) {
      const allowed = ctx.config.UNMATCHED_API_ROUTE === "allow";
      return { allowed, reason: allowed ? "UNMATCHED_ALLOWED" : "UNMATCHED_DENIED" };
    }
    // UI pages and their assets
    return { allowed: true, reason: "AUTHENTICATED_ONLY" };
  }

  async function beforeRequest(req: RequestLike, res: ResponseLike): Promise<"continue" | "handled"> {
    const startedAt = ctx.now();
    // Authorize only the path the tracking server will resolve
    if (canonicalPath(req.path) !== req.path) {
      decide(req, { allowed: false, reason: "MALFORMED_PATH" }, startedAt);
      writeErrorResponse(res, toErrorResponse(AuthzError.invalidRequest("Invalid request path")));
      return "handled";
    }
    if (isAllowListed(req.path)) {
      decide(req, { allowed: true, reason: "ALLOW_LISTED" }, startedAt);
      return "continue";
    }

    let username: string | undefined;
    try {
      const outcome = await ctx.authenticator.authenticate(req);
      if (outcome.kind === "unauthenticated") {
        decide(req, { allowed: false, reason: "UNAUTHENTICATED" }, startedAt);
        writeChallenge(res, outcome.response);
        return "handled";
      }
      username = outcome.identity.username;

      const user = await ctx.store.getUser(username).catch((err: unknown) => {
        if (err instanceof AuthzError && err.kind === "NOT_FOUND") return null;
        throw err;
      });
      if (!user) {
        decide(req, { allowed: false, reason: "UNAUTHENTICATED" }, startedAt, username);
        writeChallenge(res, UNAUTHENTICATED_TEXT);
        return "handled";
      }
      req.user = outcome.identity;

      if (user.isAdmin) {
        admins.add(req);
        decide(req, { allowed: true, reason: "ADMIN" }, startedAt, username);
        return "continue";
      }

      const verdict = await authorize(req, username);
      decide(req, verdict, startedAt, username);
      if (verdict.allowed) return "continue";
      res.status(403).text(PERMISSION_DENIED_MESSAGE);
      return "handled";
    } catch (err) {
      decide(req, { allowed: false, reason: "ERROR" }, startedAt, username);
      writeErrorResponse(res, toErrorResponse(err));
      return "handled";
    }
  }

  function afterRuleOf(req: RequestLike): AfterRule | undefined {
    const match = ctx.routes.match(req.method, req.path);
    return match ? afterRuleFor(match.operation) : undefined;
  }

  async function grantOnCreate(rule: AfterRule, username: string, body: unknown) {
    try {
      if (rule.kind === "grant_experiment") {
        const experimentId = stringAt(body, "experiment_id");
        if (!experimentId) throw new Error("response carries no experiment_id");
        await ctx.store.upsertExperimentPermission(experimentId, username, "MANAGE");
      } else {
        const name = stringAt(body, "registered_model", "name");
        if (!name) throw new Error("response carries no registered_model.name");
        await ctx.store.upsertRegisteredModelPermission(name, username, "MANAGE");
      }
    } catch (err) {
      log.error({ err, username, rule: rule.kind }, "Granting MANAGE to the creator failed");
    }
  }

  async function afterRequest(req: RequestLike, status: number, body: unknown): Promise<unknown> {
    if (status >= 400) return body;
    const rule = afterRuleOf(req);
    const identity = req.user;
    if (!rule || !identity) return body;
    const params = new RequestParams(req);

    switch (rule.kind) {
      case "grant_experiment":
      case "grant_registered_model":
        await grantOnCreate(rule, identity.username, body);
        return body;
      case "delete_registered_model_grants":
        try {
          const name = params.get("name");
          const removed = await ctx.store.deleteRegisteredModelPermissions(name);
          log.debug({ name, removed }, "Dropped grants of a deleted registered model");
        } catch (err) {
          log.warn({ err }, "Dropping grants of a deleted registered model failed");
        }
        return body;
      case "rename_registered_model":
        try {
          await ctx.store.renameRegisteredModelPermissions(params.get("name"), params.get("new_name"));
        } catch (err) {
          log.error({ err }, "Moving grants to the renamed registered model failed");
        }
        return body;
      case "filter": {
        if (admins.has(req)) return body;
        if (!isRecord(body)) throw AuthzError.internal(`Search response for ${rule.search} is not an object`);
        try {
          const result = await filterSearchResponse(
            rule.search,
            body,
            params.toRecord(),
            identity.username,
            { store: ctx.store, tracking: ctx.tracking, defaultPermission: ctx.config.DEFAULT_PERMISSION },
            req.method.toUpperCase() === "GET" ? "GET" : undefined,
          );
          recordAuthzFilter({ operation: rule.search, refetches: result.refetches, removed: result.removed });
          return result.body;
        } catch (err) {
          throw AuthzError.internal(`Filtering ${rule.search} search results failed`, { cause: err });
        }
      }
    }
  }

  return { beforeRequest, afterRuleOf, afterRequest };
}
