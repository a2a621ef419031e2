import { AuthzError } from "../internal/errors.js";

// Shared by every PermissionStore implementation so callers see identical errors.

export function userNotFound(username: string) {
  return AuthzError.notFound(`User with username=${username} not found`);
}

export function userIdNotFound(id: number) {
  return AuthzError.notFound(`User with ID=${id} not found`);
}

export function userExists(username: string) {
  return AuthzError.conflict(`User '${username}' already exists`);
}

export function experimentPermissionNotFound(experimentId: string, username: string) {
  return AuthzError.notFound(
    `Experiment permission with experiment_id=${experimentId} and username=${username} not found`,
  );
}

export function experimentPermissionExists(experimentId: string, username: string) {
  return AuthzError.conflict(
    `Experiment permission (experiment_id=${experimentId}, username=${username}) already exists`,
  );
}

export function registeredModelPermissionNotFound(name: string, username: string) {
  return AuthzError.notFound(
    `Registered model permission with name=${name} and username=${username} not found`,
  );
}

export function registeredModelPermissionExists(name: string, username: string) {
  return AuthzError.conflict(
    `Registered model permission (name=${name}, username=${username}) already exists`,
  );
}

export function validateCredentials(username: string, password: string) {
  if (!username) throw AuthzError.invalidRequest("Username cannot be empty.");
  if (!password) throw AuthzError.invalidRequest("Password cannot be empty.");
}
