import { z } from "zod";
import type { AuthzContext } from "../authz/context.js";
import { parsePermissionLevel } from "../authz/permissions.js";
import type { HttpServer } from "../http/http-server.js";
import { validate } from "../http/validate.js";
import { createStoreLogger } from "../observability/logger.js";
import { registerOperation } from "./operations.js";
import { experimentPermissionJson, registeredModelPermissionJson } from "./serializers.js";

// Ids arrive as strings in query strings and as numbers or strings in JSON bodies
const experimentId = z.union([z.string().min(1), z.number().int().transform(String)]);

const ExperimentGrantKey = z.object({ experiment_id: experimentId, username: z.string().min(1) });
const ExperimentGrant = ExperimentGrantKey.extend({ permission: z.string() });
const ExperimentOnly = z.object({ experiment_id: experimentId });

const ModelGrantKey = z.object({ name: z.string().min(1), username: z.string().min(1) });
const ModelGrant = ModelGrantKey.extend({ permission: z.string() });

export function registerPermissionRoutes(server: HttpServer, ctx: Pick<AuthzContext, "store" | "routes">) {
  const { store, routes } = ctx;
  const log = createStoreLogger();

  registerOperation(
    server,
    routes,
    "CreateExperimentPermission",
    validate(ExperimentGrant)(async (req, res, input) => {
      const grant = await store.createExperimentPermission(
        input.experiment_id,
        input.username,
        parsePermissionLevel(input.permission),
      );
      log.info({ ...experimentPermissionJson(grant), by: req.user?.username }, "Experiment permission granted");
      res.status(200).json({ experiment_permission: experimentPermissionJson(grant) });
    }),
  );

  registerOperation(
    server,
    routes,
    "GetExperimentPermission",
    validate(ExperimentGrantKey)(async (_req, res, input) => {
      const grant = await store.getExperimentPermission(input.experiment_id, input.username);
      res.status(200).json({ experiment_permission: experimentPermissionJson(grant) });
    }),
  );

  registerOperation(
    server,
    routes,
    "ListExperimentPermissions",
    validate(ExperimentOnly)(async (_req, res, input) => {
      const grants = await store.listExperimentPermissionsForExperiment(input.experiment_id);
      res.status(200).json({ experiment_permissions: grants.map(experimentPermissionJson) });
    }),
  );

  registerOperation(
    server,
    routes,
    "UpdateExperimentPermission",
    validate(ExperimentGrant)(async (_req, res, input) => {
      await store.updateExperimentPermission(
        input.experiment_id,
        input.username,
        parsePermissionLevel(input.permission),
      );
      res.status(200).json({});
    }),
  );

  registerOperation(
    server,
    routes,
    "DeleteExperimentPermission",
    validate(ExperimentGrantKey)(async (_req, res, input) => {
      await store.deleteExperimentPermission(input.experiment_id, input.username);
      res.status(200).json({});
    }),
  );

  registerOperation(
    server,
    routes,
    "CreateRegisteredModelPermission",
    validate(ModelGrant)(async (req, res, input) => {
      const grant = await store.createRegisteredModelPermission(
        input.name,
        input.username,
        parsePermissionLevel(input.permission),
      );
      log.info({ ...registeredModelPermissionJson(grant), by: req.user?.username }, "Registered model permission granted");
      res.status(200).json({ registered_model_permission: registeredModelPermissionJson(grant) });
    }),
  );

  registerOperation(
    server,
    routes,
    "GetRegisteredModelPermission",
    validate(ModelGrantKey)(async (_req, res, input) => {
      const grant = await store.getRegisteredModelPermission(input.name, input.username);
      res.status(200).json({ registered_model_permission: registeredModelPermissionJson(grant) });
    }),
  );

  registerOperation(
    server,
    routes,
    "UpdateRegisteredModelPermission",
    validate(ModelGrant)(async (_req, res, input) => {
      await store.updateRegisteredModelPermission(input.name, input.username, parsePermissionLevel(input.permission));
      res.status(200).json({});
    }),
  );

  registerOperation(
    server,
    routes,
    "DeleteRegisteredModelPermission",
    validate(ModelGrantKey)(async (_req, res, input) => {
      await store.deleteRegisteredModelPermission(input.name, input.username);
      res.status(200).json({});
    }),
  );
}
