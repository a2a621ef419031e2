import type { HttpServer } from "../http/http-server.js";

export type HealthChecks = {
  authStrategy: string;
  checkDb?: () => Promise<void>;
  checkTracking?: () => Promise<void>;
};

export function registerHealthRoutes(server: HttpServer, ctx: HealthChecks) {
  server.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok", auth: ctx.authStrategy });
  });

  server.get("/health/live", (_req, res) => {
    res.status(200).json({ status: "alive" });
  });

  server.get("/health/ready", async (_req, res) => {
    const results: Record<string, "ok" | "error"> = {};
    const checks: Array<[key: string, fn: (() => Promise<void>) | undefined]> = [
      ["db", ctx.checkDb],
      ["tracking", ctx.checkTracking],
    ];
    const errors: string[] = [];
    for (const [key, fn] of checks) {
      if (!fn) continue;
      try {
        await fn();
        results[key] = "ok";
      } catch (e) {
        results[key] = "error";
        errors.push(e instanceof Error ? e.message : String(e));
      }
    }
    if (errors.length === 0) {
      res.status(200).json({ status: "ready", components: results });
    } else {
      res.status(503).json({
        error_code: "NOT_READY",
        message: "One or more dependencies are not ready",
        components: results,
        details: { errors },
      });
    }
  });
}
