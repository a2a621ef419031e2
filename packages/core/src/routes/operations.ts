import type { RouteTable } from "../authz/route-table.js";
import type { TrackingOperation } from "../authz/policy.js";
import type { HttpHandler, HttpServer } from "../http/http-server.js";

/** Serves an operation the gateway answers itself, at every path the catalog lists for it. */
export function registerOperation(
  server: HttpServer,
  routes: RouteTable,
  operation: TrackingOperation,
  handler: HttpHandler,
) {
  const paths = routes.pathsFor(operation);
  if (paths.length === 0) throw new Error(`Operation ${operation} has no catalog entry`);
  for (const { method, path } of paths) {
    switch (method) {
      case "GET":
        server.get(path, handler);
        break;
      case "POST":
        server.post(path, handler);
        break;
      case "PATCH":
        server.patch(path, handler);
        break;
      case "DELETE":
        server.delete(path, handler);
        break;
      case "PUT":
        throw new Error(`Operation ${operation} is registered for PUT, which local routes do not serve`);
    }
  }
}
