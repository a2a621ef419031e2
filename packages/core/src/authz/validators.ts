import type { PermissionStore } from "../store/types.js";
import { hasCapability, type Capability, type PermissionLevel } from "./permissions.js";
import type { BeforeRule } from "./policy.js";
import type { RequestParams } from "./request-params.js";
import { effectivePermission, experimentIdFromArtifactPath, type ResourceResolver } from "./resolver.js";
import type { ArtifactProxyMatch } from "./route-table.js";

export type ValidatorDeps = {
  store: PermissionStore;
  resolver: ResourceResolver;
  defaultPermission: PermissionLevel;
};

/** Applies a catalog rule for a non-admin caller. */
export async function checkBeforeRule(
  rule: BeforeRule,
  username: string,
  params: RequestParams,
  deps: ValidatorDeps,
): Promise<boolean> {
  switch (rule.kind) {
    case "authenticated":
      return true;
    case "admin":
      return false;
    case "self":
      return params.get("username") === username;
    case "resource": {
      const resource = await deps.resolver.resolve(rule.resolve, params);
      const level = await effectivePermission(deps.store, resource, username, deps.defaultPermission);
      return hasCapability(level, rule.capability);
    }
    case "experiments": {
      for (const experimentId of params.getList("experiment_ids")) {
        const level = await effectivePermission(
          deps.store,
          { family: "experiment", experimentId },
          username,
          deps.defaultPermission,
        );
        if (!hasCapability(level, rule.capability)) return false;
      }
      return true;
    }
    case "runs": {
      for (const runId of params.getList(rule.param)) {
        const resource = await deps.resolver.runExperiment(runId);
        const level = await effectivePermission(deps.store, resource, username, deps.defaultPermission);
        if (!hasCapability(level, rule.capability)) return false;
      }
      return true;
    }
  }
}

const ARTIFACT_CAPABILITY: Partial<Record<string, Capability>> = {
  GET: "read",
  PUT: "update",
  DELETE: "manage",
};

export function artifactCapabilityFor(method: string): Capability | undefined {
  return ARTIFACT_CAPABILITY[method.toUpperCase()];
}

/**
 * Access to the artifact proxy. Paths without a leading experiment id (the bulk listing)
 * are judged by the default permission.
 */
export async function checkArtifactAccess(
  capability: Capability,
  match: ArtifactProxyMatch,
  username: string,
  deps: ValidatorDeps,
): Promise<boolean> {
  const experimentId = experimentIdFromArtifactPath(match.artifactPath);
  if (experimentId === undefined) return hasCapability(deps.defaultPermission, capability);
  const level = await effectivePermission(
    deps.store,
    { family: "experiment", experimentId },
    username,
    deps.defaultPermission,
  );
  return hasCapability(level, capability);
}
