import { describe, expect, it, vi } from "vitest";

const logging = vi.hoisted(() => ({ created: 0, warn: vi.fn() }));

vi.mock("../observability/logger.js", async (importOriginal) => {
  const original = await importOriginal<typeof import("../observability/logger.js")>();
  return {
    ...original,
    createAuthzLogger: () => {
      logging.created += 1;
      return { warn: logging.warn };
    },
  };
});

import { InMemoryPermissionStore } from "@tests/helpers/in-memory-permission-store.js";
import { FakeTrackingStore } from "@tests/helpers/fake-tracking-store.js";
import { filterSearchResponse, maxResultsOf } from "./filters.js";
import { PAGE_TOKEN_CODECS } from "./page-token.js";

const experiments = (...ids: string[]) => ids.map((id) => ({ experiment_id: id, name: `exp-${id}` }));

async function setup(tracking: FakeTrackingStore) {
  const store = new InMemoryPermissionStore();
  await store.createUser("alice", "pw");
  return { store, deps: { store, tracking, defaultPermission: "READ" as const } };
}

describe("filterSearchResponse", () => {
  it("returns only the ungranted experiment when the other is NO_PERMISSIONS", async () => {
    const tracking = new FakeTrackingStore();
    const { store, deps } = await setup(tracking);
    await store.createExperimentPermission("1", "alice", "NO_PERMISSIONS");

    const result = await filterSearchResponse(
      "experiments",
      { experiments: experiments("1", "2") },
      {},
      "alice",
      deps,
    );

    expect(result.body).toEqual({ experiments: experiments("2") });
    expect(result.refetches).toBe(0);
    expect(result.removed).toBe(1);
  });

  it("hides ungranted experiments when the default is NO_PERMISSIONS", async () => {
    const tracking = new FakeTrackingStore();
    const { store, deps } = await setup(tracking);
    await store.createExperimentPermission("2", "alice", "EDIT");

    const result = await filterSearchResponse(
      "experiments",
      { experiments: experiments("1", "2", "3") },
      {},
      "alice",
      { ...deps, defaultPermission: "NO_PERMISSIONS" },
    );

    expect(result.body.experiments).toEqual(experiments("2"));
  });

  it("refills a short page and points the token at the first unconsumed row", async () => {
    const tracking = new FakeTrackingStore({ search: { experiments: experiments("1", "2", "3", "4", "5", "6") } });
    const { store, deps } = await setup(tracking);
    await store.createExperimentPermission("2", "alice", "NO_PERMISSIONS");
    await store.createExperimentPermission("3", "alice", "NO_PERMISSIONS");
    const params = { max_results: 2 };

    const first = await tracking.searchBody("experiments", "experiments", params);
    const result = await filterSearchResponse("experiments", first, params, "alice", deps);

    expect(result.body.experiments).toEqual(experiments("1", "4"));
    expect(result.refetches).toBe(1);
    const token = result.body.next_page_token;
    expect(typeof token === "string" && PAGE_TOKEN_CODECS.experiments.decode(token)).toEqual({ offset: 4 });
  });

  it("concatenates pages to exactly the filtered listing for any page size", async () => {
    const ids = Array.from({ length: 10 }, (_, i) => String(i + 1));
    const tracking = new FakeTrackingStore({ search: { experiments: experiments(...ids) } });
    const { store, deps } = await setup(tracking);
    for (const id of ["3", "6", "9"]) await store.createExperimentPermission(id, "alice", "NO_PERMISSIONS");
    const readable = experiments("1", "2", "4", "5", "7", "8", "10");

    for (const pageSize of [1, 2, 3, 4, 5, 7, 10, 20]) {
      const pages: unknown[][] = [];
      let token: string | undefined;
      do {
        const params: Record<string, unknown> = { max_results: pageSize };
        if (token) params.page_token = token;
        const upstream = await tracking.searchBody("experiments", "experiments", params);
        const { body } = await filterSearchResponse("experiments", upstream, params, "alice", deps);
        pages.push(Array.isArray(body.experiments) ? body.experiments : []);
        token = typeof body.next_page_token === "string" ? body.next_page_token : undefined;
      } while (token && pages.length < 50);

      expect(pages.flat()).toEqual(readable);
      for (const page of pages.slice(0, -1)) expect(page).toHaveLength(pageSize);
    }
  });

  it("clears the token when the refetched batch is empty", async () => {
    const tracking = new FakeTrackingStore({ search: { experiments: experiments("1") } });
    const { deps } = await setup(tracking);
    const stale = PAGE_TOKEN_CODECS.experiments.encode({ offset: 50 });

    const result = await filterSearchResponse(
      "experiments",
      { experiments: [], next_page_token: stale },
      { max_results: 5 },
      "alice",
      deps,
    );

    expect(result.body).toEqual({ experiments: [] });
    expect(result.refetches).toBe(1);
  });

  it("refills a GET search with the caller's query and verb", async () => {
    const tracking = new FakeTrackingStore({ search: { experiments: experiments("1", "2", "3", "4") } });
    const { store, deps } = await setup(tracking);
    await store.createExperimentPermission("1", "alice", "NO_PERMISSIONS");
    const query = { max_results: "2", order_by: "name" };

    const first = await tracking.searchBody("experiments", "experiments", query);
    const result = await filterSearchResponse("experiments", first, query, "alice", deps, "GET");

    expect(result.body.experiments).toEqual(experiments("2", "3"));
    expect(tracking.searches[1]).toEqual({
      kind: "experiments",
      params: { max_results: "2", order_by: "name", page_token: PAGE_TOKEN_CODECS.experiments.encode({ offset: 2 }) },
      method: "GET",
    });
  });

  it("keeps the upstream token when it cannot be decoded", async () => {
    const tracking = new FakeTrackingStore();
    const { deps } = await setup(tracking);

    const result = await filterSearchResponse(
      "experiments",
      { experiments: [], next_page_token: "%%%" },
      {},
      "alice",
      deps,
    );

    expect(result.body).toEqual({ experiments: [], next_page_token: "%%%" });
    expect(tracking.searches).toHaveLength(0);
  });

  it("filters registered models by name", async () => {
    const tracking = new FakeTrackingStore();
    const { store, deps } = await setup(tracking);
    await store.createRegisteredModelPermission("secret", "alice", "NO_PERMISSIONS");

    const result = await filterSearchResponse(
      "registered_models",
      { registered_models: [{ name: "secret" }, { name: "public" }] },
      {},
      "alice",
      deps,
    );

    expect(result.body.registered_models).toEqual([{ name: "public" }]);
  });

  it("filters model versions by their registered model name and refills from upstream", async () => {
    const versions = [
      { name: "secret", version: "1" },
      { name: "public", version: "1" },
      { name: "public", version: "2" },
    ];
    const tracking = new FakeTrackingStore({ search: { model_versions: versions } });
    const { store, deps } = await setup(tracking);
    await store.createRegisteredModelPermission("secret", "alice", "NO_PERMISSIONS");
    const params = { max_results: "2" };

    const first = await tracking.searchBody("model_versions", "model_versions", params);
    const result = await filterSearchResponse("model_versions", first, params, "alice", deps);

    expect(result.body).toEqual({
      model_versions: [
        { name: "public", version: "1" },
        { name: "public", version: "2" },
      ],
    });
  });

  it("re-encodes logged model tokens with the query they belong to", async () => {
    const models = [
      { info: { model_id: "m1", experiment_id: "2" } },
      { info: { model_id: "m2", experiment_id: "1" } },
      { info: { model_id: "m3", experiment_id: "1" } },
    ];
    const tracking = new FakeTrackingStore({ search: { logged_models: models } });
    const { store, deps } = await setup(tracking);
    await store.createExperimentPermission("2", "alice", "NO_PERMISSIONS");
    const params = { experiment_ids: ["1", "2"], max_results: 1 };

    const first = await tracking.searchBody("logged_models", "models", params);
    const result = await filterSearchResponse("logged_models", first, params, "alice", deps);

    expect(result.body.models).toEqual([models[1]]);
    const token = result.body.next_page_token;
    expect(typeof token === "string" && PAGE_TOKEN_CODECS.logged_models.decode(token)).toEqual({
      offset: 2,
      experiment_ids: ["1", "2"],
      filter_string: null,
      order_by: null,
    });
  });

  it("drops entries without a resource key", async () => {
    const { deps } = await setup(new FakeTrackingStore());

    const result = await filterSearchResponse(
      "experiments",
      { experiments: [{ name: "no id" }, { experiment_id: "1" }] },
      {},
      "alice",
      deps,
    );

    expect(result.body.experiments).toEqual([{ experiment_id: "1" }]);
  });
});

describe("maxResultsOf", () => {
  it("reads numbers and numeric strings and falls back per search", () => {
    expect(maxResultsOf("experiments", { max_results: 5 })).toBe(5);
    expect(maxResultsOf("registered_models", { max_results: ["7"] })).toBe(7);
    expect(maxResultsOf("experiments", {})).toBe(1000);
    expect(maxResultsOf("model_versions", { max_results: "zero" })).toBe(10000);
    expect(maxResultsOf("logged_models", { max_results: 0 })).toBe(100);
  });
});

describe("filter logging", () => {
  it("warns about an undecodable token through one shared logger", async () => {
    const tracking = new FakeTrackingStore();
    const { store, deps } = await setup(tracking);
    await store.createExperimentPermission("1", "alice", "NO_PERMISSIONS");
    logging.warn.mockClear();
    const body = { experiments: experiments("1"), next_page_token: "not-a-token" };

    for (let i = 0; i < 2; i++) {
      const result = await filterSearchResponse("experiments", body, {}, "alice", deps);
      expect(result.body).toEqual({ experiments: [], next_page_token: "not-a-token" });
    }

    expect(logging.created).toBe(1);
    expect(logging.warn).toHaveBeenCalledTimes(2);
    expect(logging.warn).toHaveBeenCalledWith({ kind: "experiments" }, "Undecodable page token; returning the page unfilled");
    expect(tracking.searches).toEqual([]);
  });
});
