import type { Capability } from "./permissions.js";

/** How a request names the resource whose grant decides it. */
export type ResolveStrategy =
  | "experiment_id"
  | "experiment_name"
  | "run"
  | "logged_model"
  | "trace"
  | "registered_model";

export type BeforeRule =
  | { kind: "resource"; capability: Capability; resolve: ResolveStrategy }
  // every id listed in `experiment_ids` must satisfy the capability
  | { kind: "experiments"; capability: Capability }
  // every run listed under `param` must satisfy the capability
  | { kind: "runs"; capability: Capability; param: "run_id" | "run_ids" }
  | { kind: "self" }
  | { kind: "admin" }
  | { kind: "authenticated"; reason: string };

export type SearchKind = "experiments" | "logged_models" | "registered_models" | "model_versions";

export type AfterRule =
  | { kind: "grant_experiment" }
  | { kind: "grant_registered_model" }
  | { kind: "delete_registered_model_grants" }
  | { kind: "rename_registered_model" }
  | { kind: "filter"; search: SearchKind };

const on = (capability: Capability, resolve: ResolveStrategy): BeforeRule => ({
  kind: "resource",
  capability,
  resolve,
});

const authenticated = (reason: string): BeforeRule => ({ kind: "authenticated", reason });

const SELF: BeforeRule = { kind: "self" };
const ADMIN: BeforeRule = { kind: "admin" };

// One entry per operation the gateway knows. The endpoint catalog is validated against these keys.
export const BEFORE_RULES = {
  // Experiments
  CreateExperiment: authenticated("any user may create; the creator is granted MANAGE"),
  GetExperiment: on("read", "experiment_id"),
  GetExperimentByName: on("read", "experiment_name"),
  SearchExperiments: authenticated("results are filtered to readable experiments"),
  DeleteExperiment: on("delete", "experiment_id"),
  RestoreExperiment: on("delete", "experiment_id"),
  UpdateExperiment: on("update", "experiment_id"),
  SetExperimentTag: on("update", "experiment_id"),
  DeleteExperimentTag: on("update", "experiment_id"),

  // Runs
  CreateRun: on("update", "experiment_id"),
  GetRun: on("read", "run"),
  UpdateRun: on("update", "run"),
  DeleteRun: on("delete", "run"),
  RestoreRun: on("delete", "run"),
  SearchRuns: { kind: "experiments", capability: "read" },
  LogMetric: on("update", "run"),
  LogParam: on("update", "run"),
  LogBatch: on("update", "run"),
  LogModel: on("update", "run"),
  LogInputs: on("update", "run"),
  SetTag: on("update", "run"),
  DeleteTag: on("update", "run"),
  LogOutputs: on("update", "run"),
  GetMetricHistory: on("read", "run"),
  GetMetricHistoryBulk: { kind: "runs", capability: "read", param: "run_id" },
  GetMetricHistoryBulkInterval: { kind: "runs", capability: "read", param: "run_ids" },
  ListArtifacts: on("read", "run"),
  SearchDatasets: { kind: "experiments", capability: "read" },

  // Traces
  StartTrace: on("update", "experiment_id"),
  EndTrace: on("update", "trace"),
  GetTraceInfo: on("read", "trace"),
  GetTraceArtifact: on("read", "trace"),
  SearchTraces: { kind: "experiments", capability: "read" },
  DeleteTraces: on("delete", "experiment_id"),
  SetTraceTag: on("update", "trace"),
  DeleteTraceTag: on("delete", "trace"),

  // Logged models
  CreateLoggedModel: on("update", "experiment_id"),
  SearchLoggedModels: authenticated("results are filtered by owning experiment"),
  GetLoggedModel: on("read", "logged_model"),
  FinalizeLoggedModel: on("update", "logged_model"),
  DeleteLoggedModel: on("delete", "logged_model"),
  SetLoggedModelTags: on("update", "logged_model"),
  DeleteLoggedModelTag: on("delete", "logged_model"),
  LogLoggedModelParams: on("update", "logged_model"),

  // Model registry
  CreateRegisteredModel: authenticated("any user may register; the creator is granted MANAGE"),
  RenameRegisteredModel: on("update", "registered_model"),
  UpdateRegisteredModel: on("update", "registered_model"),
  DeleteRegisteredModel: on("delete", "registered_model"),
  GetRegisteredModel: on("read", "registered_model"),
  SearchRegisteredModels: authenticated("results are filtered to readable models"),
  GetLatestVersions: on("read", "registered_model"),
  SetRegisteredModelTag: on("update", "registered_model"),
  DeleteRegisteredModelTag: on("update", "registered_model"),
  SetRegisteredModelAlias: on("update", "registered_model"),
  DeleteRegisteredModelAlias: on("delete", "registered_model"),
  GetModelVersionByAlias: on("read", "registered_model"),
  CreateModelVersion: on("update", "registered_model"),
  UpdateModelVersion: on("update", "registered_model"),
  TransitionModelVersionStage: on("update", "registered_model"),
  DeleteModelVersion: on("delete", "registered_model"),
  GetModelVersion: on("read", "registered_model"),
  SearchModelVersions: authenticated("results are filtered to readable models"),
  GetModelVersionDownloadUri: on("read", "registered_model"),
  SetModelVersionTag: on("update", "registered_model"),
  DeleteModelVersionTag: on("delete", "registered_model"),

  // Users
  CreateUser: ADMIN,
  GetUser: SELF,
  ListUsers: ADMIN,
  UpdateUserPassword: SELF,
  UpdateUserAdmin: ADMIN,
  DeleteUser: ADMIN,

  // Grants
  CreateExperimentPermission: on("manage", "experiment_id"),
  GetExperimentPermission: on("manage", "experiment_id"),
  ListExperimentPermissions: on("manage", "experiment_id"),
  UpdateExperimentPermission: on("manage", "experiment_id"),
  DeleteExperimentPermission: on("manage", "experiment_id"),
  CreateRegisteredModelPermission: on("manage", "registered_model"),
  GetRegisteredModelPermission: on("manage", "registered_model"),
  UpdateRegisteredModelPermission: on("manage", "registered_model"),
  DeleteRegisteredModelPermission: on("manage", "registered_model"),
} satisfies Record<string, BeforeRule>;

export type TrackingOperation = keyof typeof BEFORE_RULES;

/**
 * Tracking server routes left out of the catalog on purpose. Requests to them fall under the
 * unmatched API route setting, which denies non-admins unless configured otherwise.
 */
export const OMITTED_OPERATIONS: ReadonlyArray<{ path: string; methods: string[]; reason: string }> = [
  {
    path: "/mlflow/gateway-proxy",
    methods: ["GET", "POST"],
    reason: "forwards to AI gateway routes, which carry no experiment or model to check",
  },
  {
    path: "/mlflow/runs/create-promptlab-run",
    methods: ["POST"],
    reason: "calls an AI gateway route on the caller's behalf",
  },
  {
    path: "/mlflow/upload-artifact",
    methods: ["POST"],
    reason: "the run id is only known once the multipart body is read, after authorization",
  },
];

export const AFTER_RULES: Partial<Record<TrackingOperation, AfterRule>> = {
  CreateExperiment: { kind: "grant_experiment" },
  CreateRegisteredModel: { kind: "grant_registered_model" },
  DeleteRegisteredModel: { kind: "delete_registered_model_grants" },
  RenameRegisteredModel: { kind: "rename_registered_model" },
  SearchExperiments: { kind: "filter", search: "experiments" },
  SearchLoggedModels: { kind: "filter", search: "logged_models" },
  SearchRegisteredModels: { kind: "filter", search: "registered_models" },
  SearchModelVersions: { kind: "filter", search: "model_versions" },
};

export function isTrackingOperation(value: unknown): value is TrackingOperation {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(BEFORE_RULES, value);
}

export function beforeRuleFor(operation: TrackingOperation): BeforeRule {
  return BEFORE_RULES[operation];
}

export function afterRuleFor(operation: TrackingOperation): AfterRule | undefined {
  return AFTER_RULES[operation];
}
