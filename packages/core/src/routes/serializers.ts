import type { ExperimentPermission, RegisteredModelPermission, User } from "../store/types.js";

// Wire shapes of the management API (snake_case, as the tracking clients expect)

export function experimentPermissionJson(p: ExperimentPermission) {
  return { experiment_id: p.experimentId, user_id: p.userId, permission: p.permission };
}

export function registeredModelPermissionJson(p: RegisteredModelPermission) {
  return { name: p.name, user_id: p.userId, permission: p.permission };
}

export function userJson(
  user: User,
  grants: { experiments?: ExperimentPermission[]; registeredModels?: RegisteredModelPermission[] } = {},
) {
  return {
    id: user.id,
    username: user.username,
    is_admin: user.isAdmin,
    experiment_permissions: (grants.experiments ?? []).map(experimentPermissionJson),
    registered_model_permissions: (grants.registeredModels ?? []).map(registeredModelPermissionJson),
  };
}
