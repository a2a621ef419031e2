import { pathToFileURL } from "node:url";
import { getPostgresClient, runMigrations, shutdownPostgresClient } from "@trackward/db";
import { ensureAdminUser } from "./auth/bootstrap.js";
import { PgSessionStore } from "./auth/session-store.js";
import { loadEndpointCatalog } from "./authz/catalog.js";
import { createAuthzContext } from "./authz/context.js";
import { createAuthorizationInterceptor } from "./authz/interceptor.js";
import { RouteTable } from "./authz/route-table.js";
import { loadConfig } from "./config/config.js";
import { createExpressServer } from "./http/express-server.js";
import { createTrackingProxy } from "./http/proxy.js";
import { logger } from "./observability/logger.js";
import { configureAuthzMetrics } from "./observability/setup.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerLoginRoutes } from "./routes/login.js";
import { registerPermissionRoutes } from "./routes/permissions.js";
import { registerUserRoutes } from "./routes/users.js";
import { SqlPermissionStore } from "./store/sql-permission-store.js";
import { TrackingClient } from "./upstream/tracking-client.js";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function main() {
  const config = loadConfig();

  const metricsHandle = configureAuthzMetrics(config);
  const forwardSignal = (signal: NodeJS.Signals) => {
    process.once(signal, () => {
      void (async () => {
        try {
          await metricsHandle.shutdown?.();
          await shutdownPostgresClient();
        } catch (err) {
          logger.warn({ signal, error: errorMessage(err) }, "Shutdown did not complete cleanly");
        } finally {
          process.kill(process.pid, signal);
        }
      })();
    });
  };
  forwardSignal("SIGTERM");
  forwardSignal("SIGINT");

  const postgres = await getPostgresClient({ connectionString: config.DATABASE_URL });
  const applied = await runMigrations({ pool: postgres.pool });
  if (applied.length > 0) logger.info({ applied }, "Migrations applied");

  const store = new SqlPermissionStore(postgres.pool);
  await ensureAdminUser(store, config.ADMIN_USERNAME, config.ADMIN_PASSWORD);

  const routes = new RouteTable(loadEndpointCatalog());
  const tracking = new TrackingClient({
    baseURL: config.TRACKING_SERVER_URL,
    timeoutMs: config.TRACKING_TIMEOUT_MS,
  });
  const sessions = new PgSessionStore(postgres.pool);
  const ctx = createAuthzContext({ config, store, tracking, sessions, routes });
  const interceptor = createAuthorizationInterceptor(ctx);

  const server = createExpressServer({ bodyLimit: config.PROXY_BODY_LIMIT });
  server.before(interceptor.beforeRequest);

  registerHealthRoutes(server, {
    authStrategy: config.AUTH_STRATEGY,
    checkDb: async () => {
      const result = await postgres.healthCheck();
      if (result.status !== "ok") throw new Error(result.details ?? "database unavailable");
    },
    checkTracking: async () => {
      await tracking.search("experiments", { max_results: 1 });
    },
  });
  if (config.AUTH_STRATEGY === "session") {
    registerLoginRoutes(server, { store, sessions, config });
  }
  registerUserRoutes(server, ctx);
  registerPermissionRoutes(server, ctx);
  server.fallback(
    createTrackingProxy({
      baseURL: config.TRACKING_SERVER_URL,
      timeoutMs: config.TRACKING_TIMEOUT_MS,
      interceptor,
    }),
  );

  await server.listen(config.PORT);
  logger.info(
    { port: config.PORT, tracking: config.TRACKING_SERVER_URL, auth: config.AUTH_STRATEGY },
    "Gateway listening",
  );
}

// Only run when executed directly
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    logger.error({ error: err }, "Failed to start gateway");
    process.exit(1);
  });
}
