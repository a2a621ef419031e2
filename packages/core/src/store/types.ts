import type { PermissionLevel } from "../authz/permissions.js";

export type User = {
  id: number;
  username: string;
  isAdmin: boolean;
};

export type ExperimentPermission = {
  experimentId: string;
  userId: number;
  username: string;
  permission: PermissionLevel;
};

export type RegisteredModelPermission = {
  name: string;
  userId: number;
  username: string;
  permission: PermissionLevel;
};

export type UserChanges = {
  password?: string;
  isAdmin?: boolean;
};

/**
 * Users and grants. Missing rows raise `AuthzError` of kind NOT_FOUND, duplicate
 * creates raise CONFLICT.
 */
export interface PermissionStore {
  createUser(username: string, password: string, isAdmin?: boolean): Promise<User>;
  hasUser(username: string): Promise<boolean>;
  getUser(username: string): Promise<User>;
  getUserById(id: number): Promise<User>;
  listUsers(): Promise<User[]>;
  authenticateUser(username: string, password: string): Promise<boolean>;
  updateUser(username: string, changes: UserChanges): Promise<User>;
  /** Removes the user together with every grant it holds. */
  deleteUser(username: string): Promise<void>;

  createExperimentPermission(
    experimentId: string,
    username: string,
    permission: PermissionLevel,
  ): Promise<ExperimentPermission>;
  getExperimentPermission(experimentId: string, username: string): Promise<ExperimentPermission>;
  listExperimentPermissions(username: string): Promise<ExperimentPermission[]>;
  listExperimentPermissionsForExperiment(experimentId: string): Promise<ExperimentPermission[]>;
  updateExperimentPermission(
    experimentId: string,
    username: string,
    permission: PermissionLevel,
  ): Promise<ExperimentPermission>;
  upsertExperimentPermission(
    experimentId: string,
    username: string,
    permission: PermissionLevel,
  ): Promise<ExperimentPermission>;
  deleteExperimentPermission(experimentId: string, username: string): Promise<void>;

  createRegisteredModelPermission(
    name: string,
    username: string,
    permission: PermissionLevel,
  ): Promise<RegisteredModelPermission>;
  getRegisteredModelPermission(name: string, username: string): Promise<RegisteredModelPermission>;
  listRegisteredModelPermissions(username: string): Promise<RegisteredModelPermission[]>;
  updateRegisteredModelPermission(
    name: string,
    username: string,
    permission: PermissionLevel,
  ): Promise<RegisteredModelPermission>;
  upsertRegisteredModelPermission(
    name: string,
    username: string,
    permission: PermissionLevel,
  ): Promise<RegisteredModelPermission>;
  deleteRegisteredModelPermission(name: string, username: string): Promise<void>;
  /** Drops every grant on a registered model; returns how many were removed. */
  deleteRegisteredModelPermissions(name: string): Promise<number>;
  /**
   * Re-keys all grants from `oldName` to `newName` in one transaction. Where a user already
   * holds a grant on `newName`, the stronger of the two levels is kept.
   */
  renameRegisteredModelPermissions(oldName: string, newName: string): Promise<void>;
}
