import type { PermissionStore } from "../store/types.js";
import { AuthzError } from "../internal/errors.js";
import { createAuthLogger } from "../observability/logger.js";

/**
 * Create the configured admin account when it does not exist yet. Several processes may
 * start at once; losing the insert race to another one counts as success.
 *
 * Returns true if this call created the user.
 */
export async function ensureAdminUser(
  store: PermissionStore,
  username: string,
  password: string,
): Promise<boolean> {
  if (await store.hasUser(username)) return false;
  try {
    await store.createUser(username, password, true);
  } catch (err) {
    if (err instanceof AuthzError && err.kind === "CONFLICT") return false;
    throw err;
  }
  createAuthLogger().info({ username }, "Bootstrap: created admin user");
  return true;
}
