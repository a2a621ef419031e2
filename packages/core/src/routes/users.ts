import { z } from "zod";
import type { AuthzContext } from "../authz/context.js";
import type { HttpServer } from "../http/http-server.js";
import { validate } from "../http/validate.js";
import { createStoreLogger } from "../observability/logger.js";
import { registerOperation } from "./operations.js";
import { userJson } from "./serializers.js";

const Username = z.object({ username: z.string().min(1) });
const Credentials = Username.extend({ password: z.string().min(1) });
const AdminFlag = Username.extend({
  is_admin: z.union([z.boolean(), z.enum(["true", "false"]).transform((v) => v === "true")]),
});

export function registerUserRoutes(server: HttpServer, ctx: Pick<AuthzContext, "store" | "routes">) {
  const { store, routes } = ctx;
  const log = createStoreLogger();

  registerOperation(
    server,
    routes,
    "CreateUser",
    validate(Credentials)(async (_req, res, input) => {
      const user = await store.createUser(input.username, input.password);
      log.info({ username: user.username }, "User created");
      res.status(200).json({ user: userJson(user) });
    }),
  );

  registerOperation(
    server,
    routes,
    "GetUser",
    validate(Username)(async (_req, res, { username }) => {
      const user = await store.getUser(username);
      const [experiments, registeredModels] = await Promise.all([
        store.listExperimentPermissions(username),
        store.listRegisteredModelPermissions(username),
      ]);
      res.status(200).json({ user: userJson(user, { experiments, registeredModels }) });
    }),
  );

  registerOperation(server, routes, "ListUsers", async (_req, res) => {
    const users = await store.listUsers();
    res.status(200).json({ users: users.map((u) => userJson(u)) });
  });

  registerOperation(
    server,
    routes,
    "UpdateUserPassword",
    validate(Credentials)(async (_req, res, input) => {
      await store.updateUser(input.username, { password: input.password });
      res.status(200).json({});
    }),
  );

  registerOperation(
    server,
    routes,
    "UpdateUserAdmin",
    validate(AdminFlag)(async (_req, res, input) => {
      await store.updateUser(input.username, { isAdmin: input.is_admin });
      log.info({ username: input.username, isAdmin: input.is_admin }, "Admin flag changed");
      res.status(200).json({});
    }),
  );

  registerOperation(
    server,
    routes,
    "DeleteUser",
    validate(Username)(async (_req, res, { username }) => {
      await store.deleteUser(username);
      log.info({ username }, "User deleted");
      res.status(200).json({});
    }),
  );
}
