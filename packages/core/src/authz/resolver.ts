import { AuthzError } from "../internal/errors.js";
import type { PermissionStore } from "../store/types.js";
import type { TrackingStore } from "../upstream/tracking-client.js";
import type { PermissionLevel } from "./permissions.js";
import type { ResolveStrategy } from "./policy.js";
import type { RequestParams } from "./request-params.js";

export type ResolvedResource =
  | { family: "experiment"; experimentId: string }
  | { family: "registered_model"; name: string };

const EXPERIMENT_ID_PREFIX = /^(\d+)\//;

/** Experiment id carried as the leading numeric segment of a proxied artifact path. */
export function experimentIdFromArtifactPath(artifactPath: string | undefined): string | undefined {
  if (!artifactPath) return undefined;
  return EXPERIMENT_ID_PREFIX.exec(artifactPath)?.[1];
}

/** Translates a request into the resource whose grant governs it. */
export class ResourceResolver {
  constructor(private readonly tracking: TrackingStore) {}

  async resolve(strategy: ResolveStrategy, params: RequestParams): Promise<ResolvedResource> {
    switch (strategy) {
      case "experiment_id":
        return { family: "experiment", experimentId: params.get("experiment_id") };
      case "experiment_name": {
        const name = params.get("experiment_name");
        const experimentId = await this.tracking.getExperimentIdByName(name);
        if (experimentId === null) {
          throw AuthzError.notFound(`Could not find experiment with name ${name}`);
        }
        return { family: "experiment", experimentId };
      }
      case "run":
        return this.runExperiment(params.get("run_id"));
      case "logged_model": {
        const modelId = params.get("model_id");
        const experimentId = await this.tracking.getLoggedModelExperimentId(modelId);
        if (experimentId === null) {
          throw AuthzError.notFound(`Logged model with id=${modelId} not found`);
        }
        return { family: "experiment", experimentId };
      }
      case "trace": {
        const requestId = params.get("request_id");
        const experimentId = await this.tracking.getTraceExperimentId(requestId);
        if (experimentId === null) {
          throw AuthzError.notFound(`Trace with request_id=${requestId} not found`);
        }
        return { family: "experiment", experimentId };
      }
      case "registered_model":
        return { family: "registered_model", name: params.get("name") };
    }
  }

  async runExperiment(runId: string): Promise<ResolvedResource> {
    const experimentId = await this.tracking.getRunExperimentId(runId);
    if (experimentId === null) throw AuthzError.notFound(`Run with id=${runId} not found`);
    return { family: "experiment", experimentId };
  }
}

/** The caller's grant on a resource, or the configured default when none is stored. */
export async function effectivePermission(
  store: PermissionStore,
  resource: ResolvedResource,
  username: string,
  defaultPermission: PermissionLevel,
): Promise<PermissionLevel> {
  try {
    const grant =
      resource.family === "experiment"
        ? await store.getExperimentPermission(resource.experimentId, username)
        : await store.getRegisteredModelPermission(resource.name, username);
    return grant.permission;
  } catch (err) {
    if (err instanceof AuthzError && err.kind === "NOT_FOUND") return defaultPermission;
    throw err;
  }
}
