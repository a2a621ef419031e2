import { describe, expect, it } from "vitest";
import { FakeTrackingStore } from "@tests/helpers/fake-tracking-store.js";
import { InMemoryPermissionStore } from "@tests/helpers/in-memory-permission-store.js";
import { makeRequest } from "@tests/helpers/request.js";
import { RequestParams } from "./request-params.js";
import { ResourceResolver, effectivePermission, experimentIdFromArtifactPath } from "./resolver.js";

const tracking = new FakeTrackingStore({
  experimentsByName: { churn: "7" },
  runs: { r1: "8" },
  loggedModels: { "m-1": "9" },
  traces: { "tr-1": "11" },
});
const resolver = new ResourceResolver(tracking);

const params = (query: Record<string, string>, pathParams: Record<string, string> = {}) =>
  new RequestParams(makeRequest({ method: "GET", query }), pathParams);

describe("ResourceResolver", () => {
  it("takes experiment ids as given", async () => {
    expect(await resolver.resolve("experiment_id", params({ experiment_id: "3" }))).toEqual({
      family: "experiment",
      experimentId: "3",
    });
  });

  it("resolves experiment names, runs and logged models to their experiment", async () => {
    expect(await resolver.resolve("experiment_name", params({ experiment_name: "churn" }))).toEqual({
      family: "experiment",
      experimentId: "7",
    });
    expect(await resolver.resolve("run", params({ run_uuid: "r1" }))).toEqual({
      family: "experiment",
      experimentId: "8",
    });
    expect(await resolver.resolve("logged_model", params({}, { model_id: "m-1" }))).toEqual({
      family: "experiment",
      experimentId: "9",
    });
  });

  it("resolves a trace through its request id", async () => {
    expect(await resolver.resolve("trace", params({}, { request_id: "tr-1" }))).toEqual({
      family: "experiment",
      experimentId: "11",
    });
    await expect(resolver.resolve("trace", params({ request_id: "tr-9" }))).rejects.toMatchObject({
      status: 404,
      message: "Trace with request_id=tr-9 not found",
    });
  });

  it("reports unknown indirect references as not found", async () => {
    await expect(resolver.resolve("experiment_name", params({ experiment_name: "nope" }))).rejects.toMatchObject({
      status: 404,
      code: "RESOURCE_DOES_NOT_EXIST",
      message: "Could not find experiment with name nope",
    });
    await expect(resolver.resolve("run", params({ run_id: "zz" }))).rejects.toMatchObject({ status: 404 });
    await expect(resolver.resolve("logged_model", params({ model_id: "zz" }))).rejects.toMatchObject({
      status: 404,
    });
  });

  it("keys registered models by name", async () => {
    expect(await resolver.resolve("registered_model", params({ name: "fraud" }))).toEqual({
      family: "registered_model",
      name: "fraud",
    });
  });
});

describe("effectivePermission", () => {
  it("uses the stored grant and falls back to the default", async () => {
    const store = new InMemoryPermissionStore();
    await store.createUser("alice", "pw");
    await store.createExperimentPermission("1", "alice", "MANAGE");

    expect(await effectivePermission(store, { family: "experiment", experimentId: "1" }, "alice", "READ")).toBe(
      "MANAGE",
    );
    expect(await effectivePermission(store, { family: "experiment", experimentId: "2" }, "alice", "READ")).toBe(
      "READ",
    );
    expect(
      await effectivePermission(store, { family: "registered_model", name: "m" }, "alice", "NO_PERMISSIONS"),
    ).toBe("NO_PERMISSIONS");
  });
});

describe("experimentIdFromArtifactPath", () => {
  it("reads the leading numeric segment", () => {
    expect(experimentIdFromArtifactPath("12/abc/artifacts/model.pkl")).toBe("12");
    expect(experimentIdFromArtifactPath("models/12/x")).toBeUndefined();
    expect(experimentIdFromArtifactPath("12")).toBeUndefined();
    expect(experimentIdFromArtifactPath(undefined)).toBeUndefined();
  });
});
