import { Readable } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from "axios";
import type { AuthorizationInterceptor } from "../authz/interceptor.js";
import type { AfterRule } from "../authz/policy.js";
import { makeRequest } from "@tests/helpers/request.js";
import { createResponseCapture } from "@tests/helpers/response.js";
import { createTrackingProxy, forwardedRequestHeaders } from "./proxy.js";

type Reply = { status: number; data: unknown; headers?: Record<string, string> };

function stubInterceptor(rule?: AfterRule) {
  const afterRequest = vi.fn(async (_req: unknown, _status: number, body: unknown) => ({ rewritten: body }));
  const interceptor: AuthorizationInterceptor = {
    beforeRequest: async () => "continue",
    afterRuleOf: () => rule,
    afterRequest,
  };
  return { interceptor, afterRequest };
}

function proxyWith(interceptor: AuthorizationInterceptor, reply: (config: InternalAxiosRequestConfig) => Reply) {
  const seen: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    seen.push(config);
    const { status, data, headers } = reply(config);
    return { data, status, statusText: String(status), headers: headers ?? {}, config };
  };
  const handler = createTrackingProxy({ baseURL: "http://tracking.test/", timeoutMs: 1000, interceptor, adapter });
  return { handler, seen };
}

describe("createTrackingProxy", () => {
  it("streams responses of operations without an after-request rule", async () => {
    const { interceptor, afterRequest } = stubInterceptor();
    const body = Readable.from([Buffer.from("artifact bytes")]);
    const { handler, seen } = proxyWith(interceptor, () => ({
      status: 200,
      data: body,
      headers: { "content-type": "application/octet-stream", connection: "close" },
    }));
    const cap = createResponseCapture();

    await handler(
      makeRequest({ path: "/get-artifact", url: "/get-artifact?path=a.txt", headers: { host: "gw.test", accept: "*/*" } }),
      cap.res,
    );

    expect(seen[0]?.baseURL).toBe("http://tracking.test");
    expect(seen[0]?.url).toBe("/get-artifact?path=a.txt");
    expect(seen[0]?.responseType).toBe("stream");
    expect(seen[0]?.headers.has("host")).toBe(false);
    expect(cap.status).toBe(200);
    expect(cap.stream).toBe(body);
    expect(cap.headers).toEqual({ "content-type": "application/octet-stream" });
    expect(afterRequest).not.toHaveBeenCalled();
  });

  it("forwards the authorized path rather than the raw request target", async () => {
    const { interceptor } = stubInterceptor();
    const { handler, seen } = proxyWith(interceptor, () => ({ status: 200, data: Readable.from([]) }));

    await handler(
      makeRequest({
        path: "/api/2.0/mlflow/experiments/get",
        url: "http://other.test/api/2.0/mlflow/experiments/get?experiment_id=1",
      }),
      createResponseCapture().res,
    );

    expect(seen[0]?.url).toBe("/api/2.0/mlflow/experiments/get?experiment_id=1");
  });

  it("buffers JSON responses through the after-request hook", async () => {
    const { interceptor, afterRequest } = stubInterceptor({ kind: "filter", search: "experiments" });
    const { handler, seen } = proxyWith(interceptor, () => ({
      status: 200,
      data: Buffer.from(JSON.stringify({ experiments: [] })),
      headers: { "content-type": "application/json", "content-length": "18", "x-request-id": "r-1" },
    }));
    const cap = createResponseCapture();
    const req = makeRequest({
      method: "POST",
      path: "/api/2.0/mlflow/experiments/search",
      rawBody: Buffer.from("{}"),
      body: {},
    });

    await handler(req, cap.res);

    expect(seen[0]?.responseType).toBe("arraybuffer");
    expect(seen[0]?.data).toEqual(Buffer.from("{}"));
    expect(afterRequest).toHaveBeenCalledWith(req, 200, { experiments: [] });
    expect(cap.body).toEqual({ rewritten: { experiments: [] } });
    expect(cap.headers).toEqual({ "x-request-id": "r-1" });
  });

  it("passes upstream errors through without running the hook", async () => {
    const { interceptor, afterRequest } = stubInterceptor({ kind: "grant_experiment" });
    const error = Buffer.from(JSON.stringify({ error_code: "RESOURCE_ALREADY_EXISTS", message: "exists" }));
    const { handler } = proxyWith(interceptor, () => ({
      status: 400,
      data: error,
      headers: { "content-type": "application/json" },
    }));
    const cap = createResponseCapture();

    await handler(makeRequest({ method: "POST", path: "/api/2.0/mlflow/experiments/create" }), cap.res);

    expect(cap.status).toBe(400);
    expect(cap.buffer).toEqual(error);
    expect(cap.headers).toEqual({ "content-type": "application/json" });
    expect(afterRequest).not.toHaveBeenCalled();
  });

  it("reports an unreachable tracking server as an upstream failure", async () => {
    const { interceptor } = stubInterceptor();
    const handler = createTrackingProxy({
      baseURL: "http://tracking.test",
      timeoutMs: 1000,
      interceptor,
      adapter: async (config) => {
        throw new AxiosError("connect ECONNREFUSED", "ECONNREFUSED", config);
      },
    });

    await expect(handler(makeRequest({ path: "/" }), createResponseCapture().res)).rejects.toMatchObject({
      status: 502,
      code: "TEMPORARILY_UNAVAILABLE",
      message: "Tracking server request failed: connect ECONNREFUSED",
    });
  });
});

describe("forwardedRequestHeaders", () => {
  it("drops hop-by-hop headers and joins repeated values", () => {
    expect(
      forwardedRequestHeaders({
        Host: "gw.test",
        "transfer-encoding": "chunked",
        "x-forwarded-for": ["10.0.0.1", "10.0.0.2"],
        authorization: "Basic dGVzdA==",
        cookie: undefined,
      }),
    ).toEqual({ "x-forwarded-for": "10.0.0.1, 10.0.0.2", authorization: "Basic dGVzdA==" });
  });
});
