import { isUniqueViolation, withTransaction, type TransactionalPool } from "@trackward/db";
import { parsePermissionLevel, strongerOf, type PermissionLevel } from "../authz/permissions.js";
import { UNUSABLE_PASSWORD_HASH, hashPassword, verifyPassword } from "../auth/passwords.js";
import { AuthzError } from "../internal/errors.js";
import { createStoreLogger } from "../observability/logger.js";
import {
  experimentPermissionExists,
  experimentPermissionNotFound,
  registeredModelPermissionExists,
  registeredModelPermissionNotFound,
  userExists,
  userIdNotFound,
  userNotFound,
  validateCredentials,
} from "./messages.js";
import type {
  ExperimentPermission,
  PermissionStore,
  RegisteredModelPermission,
  User,
  UserChanges,
} from "./types.js";

type UserRow = { id: number; username: string; is_admin: boolean };
type ExperimentPermissionRow = {
  experiment_id: string;
  user_id: number;
  username: string;
  permission: string;
};
type RegisteredModelPermissionRow = {
  name: string;
  user_id: number;
  username: string;
  permission: string;
};
type RenameRow = { id: number; name: string; user_id: number; permission: string };

const USER_COLUMNS = "id, username, is_admin";

const EXPERIMENT_PERMISSION_SELECT = `
  SELECT p.experiment_id, p.user_id, u.username, p.permission
  FROM experiment_permissions p
  JOIN users u ON u.id = p.user_id`;

const REGISTERED_MODEL_PERMISSION_SELECT = `
  SELECT p.name, p.user_id, u.username, p.permission
  FROM registered_model_permissions p
  JOIN users u ON u.id = p.user_id`;

function toUser(row: UserRow): User {
  return { id: row.id, username: row.username, isAdmin: row.is_admin };
}

function toExperimentPermission(row: ExperimentPermissionRow): ExperimentPermission {
  return {
    experimentId: row.experiment_id,
    userId: row.user_id,
    username: row.username,
    permission: parsePermissionLevel(row.permission),
  };
}

function toRegisteredModelPermission(row: RegisteredModelPermissionRow): RegisteredModelPermission {
  return {
    name: row.name,
    userId: row.user_id,
    username: row.username,
    permission: parsePermissionLevel(row.permission),
  };
}

/** PermissionStore over the gateway's PostgreSQL tables (see packages/db/migrations). */
export class SqlPermissionStore implements PermissionStore {
  private readonly log = createStoreLogger();

  constructor(private readonly pool: TransactionalPool) {}

  async createUser(username: string, password: string, isAdmin = false): Promise<User> {
    validateCredentials(username, password);
    const passwordHash = await hashPassword(password);
    try {
      const res = await this.pool.query<UserRow>(
        `INSERT INTO users (username, password_hash, is_admin) VALUES ($1, $2, $3)
         RETURNING ${USER_COLUMNS}`,
        [username, passwordHash, isAdmin],
      );
      const row = res.rows[0];
      if (!row) throw AuthzError.internal("User insert returned no row");
      this.log.info({ username, isAdmin }, "User created");
      return toUser(row);
    } catch (err) {
      if (isUniqueViolation(err)) throw userExists(username);
      throw err;
    }
  }

  async hasUser(username: string): Promise<boolean> {
    const res = await this.pool.query<{ exists: boolean }>(
      "SELECT EXISTS(SELECT 1 FROM users WHERE username = $1) AS exists",
      [username],
    );
    return res.rows[0]?.exists === true;
  }

  async getUser(username: string): Promise<User> {
    const res = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
      [username],
    );
    const row = res.rows[0];
    if (!row) throw userNotFound(username);
    return toUser(row);
  }

  async getUserById(id: number): Promise<User> {
    const res = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [
      id,
    ]);
    const row = res.rows[0];
    if (!row) throw userIdNotFound(id);
    return toUser(row);
  }

  async listUsers(): Promise<User[]> {
    const res = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users ORDER BY username`,
    );
    return res.rows.map(toUser);
  }

  async authenticateUser(username: string, password: string): Promise<boolean> {
    const res = await this.pool.query<{ password_hash: string }>(
      "SELECT password_hash FROM users WHERE username = $1",
      [username],
    );
    // Unknown users cost the same scrypt work as known ones
    const hash = res.rows[0]?.password_hash ?? UNUSABLE_PASSWORD_HASH;
    const ok = await verifyPassword(password, hash);
    return ok && res.rows.length > 0;
  }

  async updateUser(username: string, changes: UserChanges): Promise<User> {
    if (changes.password !== undefined) validateCredentials(username, changes.password);
    const passwordHash =
      changes.password !== undefined ? await hashPassword(changes.password) : null;
    const res = await this.pool.query<UserRow>(
      `UPDATE users
       SET password_hash = COALESCE($2, password_hash), is_admin = COALESCE($3, is_admin)
       WHERE username = $1
       RETURNING ${USER_COLUMNS}`,
      [username, passwordHash, changes.isAdmin ?? null],
    );
    const row = res.rows[0];
    if (!row) throw userNotFound(username);
    return toUser(row);
  }

  async deleteUser(username: string): Promise<void> {
    await withTransaction(this.pool, async (tx) => {
      const found = await tx.query<{ id: number }>(
        "SELECT id FROM users WHERE username = $1 FOR UPDATE",
        [username],
      );
      const row = found.rows[0];
      if (!row) throw userNotFound(username);
      await tx.query("DELETE FROM experiment_permissions WHERE user_id = $1", [row.id]);
      await tx.query("DELETE FROM registered_model_permissions WHERE user_id = $1", [row.id]);
      await tx.query("DELETE FROM users WHERE id = $1", [row.id]);
    });
    this.log.info({ username }, "User deleted with all grants");
  }

  async createExperimentPermission(
    experimentId: string,
    username: string,
    permission: PermissionLevel,
  ): Promise<ExperimentPermission> {
    const level = parsePermissionLevel(permission);
    try {
      const res = await this.pool.query<Omit<ExperimentPermissionRow, "username">>(
        `INSERT INTO experiment_permissions (experiment_id, user_id, permission)
         SELECT $1, u.id, $3 FROM users u WHERE u.username = $2
         RETURNING experiment_id, user_id, permission`,
        [experimentId, username, level],
      );
      const row = res.rows[0];
      if (!row) throw userNotFound(username);
      return toExperimentPermission({ ...row, username });
    } catch (err) {
      if (isUniqueViolation(err)) throw experimentPermissionExists(experimentId, username);
      throw err;
    }
  }

  async getExperimentPermission(
    experimentId: string,
    username: string,
  ): Promise<ExperimentPermission> {
    const res = await this.pool.query<ExperimentPermissionRow>(
      `${EXPERIMENT_PERMISSION_SELECT} WHERE p.experiment_id = $1 AND u.username = $2`,
      [experimentId, username],
    );
    const row = res.rows[0];
    if (!row) throw experimentPermissionNotFound(experimentId, username);
    return toExperimentPermission(row);
  }

  async listExperimentPermissions(username: string): Promise<ExperimentPermission[]> {
    const res = await this.pool.query<ExperimentPermissionRow>(
      `${EXPERIMENT_PERMISSION_SELECT} WHERE u.username = $1 ORDER BY p.experiment_id`,
      [username],
    );
    return res.rows.map(toExperimentPermission);
  }

  async listExperimentPermissionsForExperiment(
    experimentId: string,
  ): Promise<ExperimentPermission[]> {
    const res = await this.pool.query<ExperimentPermissionRow>(
      `${EXPERIMENT_PERMISSION_SELECT} WHERE p.experiment_id = $1 ORDER BY u.username`,
      [experimentId],
    );
    return res.rows.map(toExperimentPermission);
  }

  async updateExperimentPermission(
    experimentId: string,
    username: string,
    permission: PermissionLevel,
  ): Promise<ExperimentPermission> {
    const level = parsePermissionLevel(permission);
    const res = await this.pool.query<ExperimentPermissionRow>(
      `UPDATE experiment_permissions p SET permission = $3
       FROM users u
       WHERE u.id = p.user_id AND p.experiment_id = $1 AND u.username = $2
       RETURNING p.experiment_id, p.user_id, u.username, p.permission`,
      [experimentId, username, level],
    );
    const row = res.rows[0];
    if (!row) throw experimentPermissionNotFound(experimentId, username);
    return toExperimentPermission(row);
  }

  async upsertExperimentPermission(
    experimentId: string,
    username: string,
    permission: PermissionLevel,
  ): Promise<ExperimentPermission> {
    const level = parsePermissionLevel(permission);
    const res = await this.pool.query<Omit<ExperimentPermissionRow, "username">>(
      `INSERT INTO experiment_permissions (experiment_id, user_id, permission)
       SELECT $1, u.id, $3 FROM users u WHERE u.username = $2
       ON CONFLICT (experiment_id, user_id) DO UPDATE SET permission = EXCLUDED.permission
       RETURNING experiment_id, user_id, permission`,
      [experimentId, username, level],
    );
    const row = res.rows[0];
    if (!row) throw userNotFound(username);
    return toExperimentPermission({ ...row, username });
  }

  async deleteExperimentPermission(experimentId: string, username: string): Promise<void> {
    const res = await this.pool.query(
      `DELETE FROM experiment_permissions p USING users u
       WHERE u.id = p.user_id AND p.experiment_id = $1 AND u.username = $2`,
      [experimentId, username],
    );
    if ((res.rowCount ?? 0) === 0) throw experimentPermissionNotFound(experimentId, username);
  }

  async createRegisteredModelPermission(
    name: string,
    username: string,
    permission: PermissionLevel,
  ): Promise<RegisteredModelPermission> {
    const level = parsePermissionLevel(permission);
    try {
      const res = await this.pool.query<Omit<RegisteredModelPermissionRow, "username">>(
        `INSERT INTO registered_model_permissions (name, user_id, permission)
         SELECT $1, u.id, $3 FROM users u WHERE u.username = $2
         RETURNING name, user_id, permission`,
        [name, username, level],
      );
      const row = res.rows[0];
      if (!row) throw userNotFound(username);
      return toRegisteredModelPermission({ ...row, username });
    } catch (err) {
      if (isUniqueViolation(err)) throw registeredModelPermissionExists(name, username);
      throw err;
    }
  }

  async getRegisteredModelPermission(
    name: string,
    username: string,
  ): Promise<RegisteredModelPermission> {
    const res = await this.pool.query<RegisteredModelPermissionRow>(
      `${REGISTERED_MODEL_PERMISSION_SELECT} WHERE p.name = $1 AND u.username = $2`,
      [name, username],
    );
    const row = res.rows[0];
    if (!row) throw registeredModelPermissionNotFound(name, username);
    return toRegisteredModelPermission(row);
  }

  async listRegisteredModelPermissions(username: string): Promise<RegisteredModelPermission[]> {
    const res = await this.pool.query<RegisteredModelPermissionRow>(
      `${REGISTERED_MODEL_PERMISSION_SELECT} WHERE u.username = $1 ORDER BY p.name`,
      [username],
    );
    return res.rows.map(toRegisteredModelPermission);
  }

  async updateRegisteredModelPermission(
    name: string,
    username: string,
    permission: PermissionLevel,
  ): Promise<RegisteredModelPermission> {
    const level = parsePermissionLevel(permission);
    const res = await this.pool.query<RegisteredModelPermissionRow>(
      `UPDATE registered_model_permissions p SET permission = $3
       FROM users u
       WHERE u.id = p.user_id AND p.name = $1 AND u.username = $2
       RETURNING p.name, p.user_id, u.username, p.permission`,
      [name, username, level],
    );
    const row = res.rows[0];
    if (!row) throw registeredModelPermissionNotFound(name, username);
    return toRegisteredModelPermission(row);
  }

  async upsertRegisteredModelPermission(
    name: string,
    username: string,
    permission: PermissionLevel,
  ): Promise<RegisteredModelPermission> {
    const level = parsePermissionLevel(permission);
    const res = await this.pool.query<Omit<RegisteredModelPermissionRow, "username">>(
      `INSERT INTO registered_model_permissions (name, user_id, permission)
       SELECT $1, u.id, $3 FROM users u WHERE u.username = $2
       ON CONFLICT (name, user_id) DO UPDATE SET permission = EXCLUDED.permission
       RETURNING name, user_id, permission`,
      [name, username, level],
    );
    const row = res.rows[0];
    if (!row) throw userNotFound(username);
    return toRegisteredModelPermission({ ...row, username });
  }

  async deleteRegisteredModelPermission(name: string, username: string): Promise<void> {
    const res = await this.pool.query(
      `DELETE FROM registered_model_permissions p USING users u
       WHERE u.id = p.user_id AND p.name = $1 AND u.username = $2`,
      [name, username],
    );
    if ((res.rowCount ?? 0) === 0) throw registeredModelPermissionNotFound(name, username);
  }

  async deleteRegisteredModelPermissions(name: string): Promise<number> {
    const res = await this.pool.query("DELETE FROM registered_model_permissions WHERE name = $1", [
      name,
    ]);
    return res.rowCount ?? 0;
  }

  async renameRegisteredModelPermissions(oldName: string, newName: string): Promise<void> {
    if (oldName === newName) return;
    await withTransaction(this.pool, async (tx) => {
      const { rows } = await tx.query<RenameRow>(
        `SELECT id, name, user_id, permission FROM registered_model_permissions
         WHERE name = $1 OR name = $2
         ORDER BY id
         FOR UPDATE`,
        [oldName, newName],
      );
      const existing = new Map<number, RenameRow>();
      for (const row of rows) {
        if (row.name === newName) existing.set(row.user_id, row);
      }
      for (const row of rows) {
        if (row.name !== oldName) continue;
        const clash = existing.get(row.user_id);
        if (!clash) continue;
        const current = parsePermissionLevel(clash.permission);
        const merged = strongerOf(current, parsePermissionLevel(row.permission));
        if (merged !== current) {
          await tx.query("UPDATE registered_model_permissions SET permission = $2 WHERE id = $1", [
            clash.id,
            merged,
          ]);
        }
        await tx.query("DELETE FROM registered_model_permissions WHERE id = $1", [row.id]);
      }
      await tx.query("UPDATE registered_model_permissions SET name = $2 WHERE name = $1", [
        oldName,
        newName,
      ]);
    });
    this.log.info({ oldName, newName }, "Registered model grants renamed");
  }
}
