import { describe, it, expect } from "vitest";
import { loadEndpointCatalog, parseEndpointCatalog } from "./catalog.js";
import { AFTER_RULES, BEFORE_RULES, OMITTED_OPERATIONS, isTrackingOperation } from "./policy.js";
import { RouteTable } from "./route-table.js";

describe("endpoint catalog", () => {
  const catalog = loadEndpointCatalog();

  it("gives every catalog operation an explicit before rule", () => {
    for (const endpoint of catalog.endpoints) {
      expect(isTrackingOperation(endpoint.operation)).toBe(true);
    }
  });

  it("serves every operation with a rule from at least one endpoint", () => {
    const served = new Set<string>(catalog.endpoints.map((e) => e.operation));
    const unserved = Object.keys(BEFORE_RULES).filter((operation) => !served.has(operation));
    expect(unserved).toEqual([]);
  });

  it("documents why an operation skips resource checks", () => {
    for (const rule of Object.values(BEFORE_RULES)) {
      if (rule.kind === "authenticated") {
        expect(rule.reason.length).toBeGreaterThan(0);
      }
    }
  });

  it("routes bulk metric, dataset, output and trace requests to their operations", () => {
    const routes = new RouteTable(catalog);
    const cases: Array<[string, string, string]> = [
      ["GET", "/ajax-api/2.0/mlflow/metrics/get-history-bulk-interval", "GetMetricHistoryBulkInterval"],
      ["GET", "/ajax-api/2.0/mlflow/metrics/get-history-bulk", "GetMetricHistoryBulk"],
      ["POST", "/ajax-api/2.0/mlflow/experiments/search-datasets", "SearchDatasets"],
      ["POST", "/api/2.0/mlflow/runs/outputs", "LogOutputs"],
      ["POST", "/api/2.0/mlflow/traces", "StartTrace"],
      ["GET", "/api/2.0/mlflow/traces", "SearchTraces"],
      ["POST", "/api/2.0/mlflow/traces/delete-traces", "DeleteTraces"],
      ["PATCH", "/api/2.0/mlflow/traces/tr-1", "EndTrace"],
      ["GET", "/api/2.0/mlflow/traces/tr-1/info", "GetTraceInfo"],
      ["PATCH", "/api/2.0/mlflow/traces/tr-1/tags", "SetTraceTag"],
      ["DELETE", "/api/2.0/mlflow/traces/tr-1/tags", "DeleteTraceTag"],
      ["GET", "/ajax-api/2.0/mlflow/get-trace-artifact", "GetTraceArtifact"],
    ];
    for (const [method, path, operation] of cases) {
      expect(routes.match(method, path)?.operation).toBe(operation);
    }
    expect(routes.match("GET", "/api/2.0/mlflow/traces/tr-1/info")?.params).toEqual({ request_id: "tr-1" });
  });

  it("documents every route left out of the catalog and keeps it unmatched", () => {
    const routes = new RouteTable(catalog);
    const cataloged = new Set(catalog.endpoints.map((e) => e.path));
    expect(OMITTED_OPERATIONS.length).toBeGreaterThan(0);
    for (const omitted of OMITTED_OPERATIONS) {
      expect(omitted.reason.length).toBeGreaterThan(0);
      expect(cataloged.has(omitted.path)).toBe(false);
      for (const prefix of catalog.prefixes) {
        for (const method of omitted.methods) {
          expect(routes.match(method, prefix + omitted.path)).toBeNull();
        }
      }
    }
  });

  it("only attaches after rules to known operations", () => {
    for (const operation of Object.keys(AFTER_RULES)) {
      expect(isTrackingOperation(operation)).toBe(true);
    }
  });

  it("rejects operations the policy does not know", () => {
    expect(() =>
      parseEndpointCatalog({
        prefixes: ["/api/2.0"],
        artifactProxyPath: "/mlflow-artifacts/artifacts",
        endpoints: [{ operation: "DropDatabase", path: "/mlflow/drop", methods: ["POST"] }],
      }),
    ).toThrow(/Invalid endpoint catalog: endpoints.0.operation: Unknown operation/);
  });
});
