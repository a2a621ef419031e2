import { describe, expect, it, vi } from "vitest";

vi.mock("../auth/passwords.js", () => ({
  UNUSABLE_PASSWORD_HASH: "unusable",
  hashPassword: vi.fn(async (password: string) => `hashed:${password}`),
  verifyPassword: vi.fn(async (password: string, hash: string) => hash === `hashed:${password}`),
}));

import { verifyPassword } from "../auth/passwords.js";
import { SqlPermissionStore } from "./sql-permission-store.js";
import { AuthzError } from "../internal/errors.js";

type Row = Record<string, unknown>;

function createPool(poolRows: Row[][] = [], clientRows: (text: string) => Row[] = () => []) {
  const client = {
    query: vi
      .fn()
      .mockImplementation(async (text: string) => ({ rows: clientRows(text), rowCount: 0 })),
    release: vi.fn(),
  };
  const query = vi.fn();
  for (const rows of poolRows) query.mockResolvedValueOnce({ rows, rowCount: rows.length });
  const pool = { query, connect: vi.fn().mockResolvedValue(client) };
  return { pool, client };
}

async function captureError(run: () => Promise<unknown>): Promise<AuthzError> {
  const err = await run().then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(err instanceof AuthzError)) throw new Error("expected an AuthzError");
  return err;
}

describe("SqlPermissionStore", () => {
  it("stores the hashed password when creating a user", async () => {
    const { pool } = createPool([[{ id: 7, username: "alice", is_admin: false }]]);
    const store = new SqlPermissionStore(pool);

    const user = await store.createUser("alice", "pw");

    expect(user).toEqual({ id: 7, username: "alice", isAdmin: false });
    expect(pool.query.mock.calls[0]?.[1]).toEqual(["alice", "hashed:pw", false]);
  });

  it("maps a unique violation on user insert to a conflict", async () => {
    const { pool } = createPool();
    pool.query.mockRejectedValueOnce(Object.assign(new Error("dup"), { code: "23505" }));
    const store = new SqlPermissionStore(pool);

    const err = await captureError(() => store.createUser("alice", "pw"));

    expect(err.status).toBe(409);
    expect(err.code).toBe("RESOURCE_ALREADY_EXISTS");
    expect(err.message).toBe("User 'alice' already exists");
  });

  it("rejects empty credentials before touching the database", async () => {
    const { pool } = createPool();
    const store = new SqlPermissionStore(pool);

    const err = await captureError(() => store.createUser("", "pw"));

    expect(err.message).toBe("Username cannot be empty.");
    expect(pool.query).not.toHaveBeenCalled();
  });

  it("raises NOT_FOUND for an unknown user", async () => {
    const { pool } = createPool([[]]);
    const store = new SqlPermissionStore(pool);

    const err = await captureError(() => store.getUser("ghost"));

    expect(err.kind).toBe("NOT_FOUND");
    expect(err.message).toBe("User with username=ghost not found");
  });

  it("verifies passwords against the stored hash", async () => {
    const { pool } = createPool([[{ password_hash: "hashed:pw" }], []]);
    const store = new SqlPermissionStore(pool);

    expect(await store.authenticateUser("alice", "pw")).toBe(true);
    expect(await store.authenticateUser("ghost", "pw")).toBe(false);
  });

  it("runs the password check even when the user is unknown", async () => {
    const { pool } = createPool([[]]);
    const store = new SqlPermissionStore(pool);
    vi.mocked(verifyPassword).mockClear();

    expect(await store.authenticateUser("ghost", "unusable")).toBe(false);
    expect(verifyPassword).toHaveBeenCalledWith("unusable", "unusable");
  });

  it("deletes a user and every grant it holds in one transaction", async () => {
    const { pool, client } = createPool([], (text) =>
      text.startsWith("SELECT id FROM users") ? [{ id: 3 }] : [],
    );
    const store = new SqlPermissionStore(pool);

    await store.deleteUser("bob");

    expect(client.query.mock.calls).toEqual([
      ["BEGIN"],
      ["SELECT id FROM users WHERE username = $1 FOR UPDATE", ["bob"]],
      ["DELETE FROM experiment_permissions WHERE user_id = $1", [3]],
      ["DELETE FROM registered_model_permissions WHERE user_id = $1", [3]],
      ["DELETE FROM users WHERE id = $1", [3]],
      ["COMMIT"],
    ]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it("rolls back when the user to delete does not exist", async () => {
    const { pool, client } = createPool();
    const store = new SqlPermissionStore(pool);

    const err = await captureError(() => store.deleteUser("ghost"));

    expect(err.kind).toBe("NOT_FOUND");
    expect(client.query.mock.calls.at(-1)).toEqual(["ROLLBACK"]);
  });

  it("returns the created experiment grant with its username", async () => {
    const { pool } = createPool([[{ experiment_id: "1", user_id: 2, permission: "EDIT" }]]);
    const store = new SqlPermissionStore(pool);

    const grant = await store.createExperimentPermission("1", "alice", "EDIT");

    expect(grant).toEqual({ experimentId: "1", userId: 2, username: "alice", permission: "EDIT" });
  });

  it("replaces an existing experiment grant on upsert", async () => {
    const { pool } = createPool([[{ experiment_id: "7", user_id: 2, permission: "MANAGE" }]]);
    const store = new SqlPermissionStore(pool);

    const grant = await store.upsertExperimentPermission("7", "alice", "MANAGE");

    expect(grant).toEqual({ experimentId: "7", userId: 2, username: "alice", permission: "MANAGE" });
    expect(pool.query.mock.calls[0]?.[0]).toContain("ON CONFLICT (experiment_id, user_id) DO UPDATE");
    expect(pool.query.mock.calls[0]?.[1]).toEqual(["7", "alice", "MANAGE"]);
  });

  it("lists every user's grant on one experiment", async () => {
    const { pool } = createPool([
      [
        { experiment_id: "7", user_id: 2, username: "alice", permission: "READ" },
        { experiment_id: "7", user_id: 3, username: "bob", permission: "EDIT" },
      ],
    ]);
    const store = new SqlPermissionStore(pool);

    const grants = await store.listExperimentPermissionsForExperiment("7");

    expect(grants).toEqual([
      { experimentId: "7", userId: 2, username: "alice", permission: "READ" },
      { experimentId: "7", userId: 3, username: "bob", permission: "EDIT" },
    ]);
    expect(pool.query.mock.calls[0]?.[1]).toEqual(["7"]);
  });

  it("reports a missing user when a grant insert matches no user row", async () => {
    const { pool } = createPool([[]]);
    const store = new SqlPermissionStore(pool);

    const err = await captureError(() => store.createExperimentPermission("1", "ghost", "READ"));

    expect(err.message).toBe("User with username=ghost not found");
  });

  it("maps a duplicate experiment grant to a conflict", async () => {
    const { pool } = createPool();
    pool.query.mockRejectedValueOnce(Object.assign(new Error("dup"), { code: "23505" }));
    const store = new SqlPermissionStore(pool);

    const err = await captureError(() => store.createExperimentPermission("1", "alice", "READ"));

    expect(err.message).toBe("Experiment permission (experiment_id=1, username=alice) already exists");
  });

  it("raises NOT_FOUND when deleting a grant that does not exist", async () => {
    const { pool } = createPool([[]]);
    const store = new SqlPermissionStore(pool);

    const err = await captureError(() => store.deleteExperimentPermission("9", "alice"));

    expect(err.message).toBe(
      "Experiment permission with experiment_id=9 and username=alice not found",
    );
  });

  it("returns how many model grants were dropped", async () => {
    const { pool } = createPool([[{}, {}]]);
    const store = new SqlPermissionStore(pool);

    expect(await store.deleteRegisteredModelPermissions("m1")).toBe(2);
  });

  it("keeps the stronger level when a rename collides with an existing grant", async () => {
    const rows = [
      { id: 1, name: "old", user_id: 1, permission: "EDIT" },
      { id: 2, name: "new", user_id: 1, permission: "READ" },
      { id: 3, name: "old", user_id: 2, permission: "READ" },
    ];
    const { pool, client } = createPool([], (text) => (text.includes("FOR UPDATE") ? rows : []));
    const store = new SqlPermissionStore(pool);

    await store.renameRegisteredModelPermissions("old", "new");

    expect(client.query.mock.calls.slice(2)).toEqual([
      ["UPDATE registered_model_permissions SET permission = $2 WHERE id = $1", [2, "EDIT"]],
      ["DELETE FROM registered_model_permissions WHERE id = $1", [1]],
      ["UPDATE registered_model_permissions SET name = $2 WHERE name = $1", ["old", "new"]],
      ["COMMIT"],
    ]);
  });

  it("does nothing when renaming to the same name", async () => {
    const { pool } = createPool();
    const store = new SqlPermissionStore(pool);

    await store.renameRegisteredModelPermissions("m1", "m1");

    expect(pool.connect).not.toHaveBeenCalled();
  });
});
