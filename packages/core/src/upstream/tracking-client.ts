import axios, { type AxiosAdapter, type AxiosError, type AxiosInstance } from "axios";
import { z, type ZodType } from "zod";
import type { SearchKind } from "../authz/policy.js";
import { AuthzError } from "../internal/errors.js";
import { createUpstreamLogger } from "../observability/logger.js";

export type SearchItem = Record<string, unknown>;

export type SearchPage = {
  items: SearchItem[];
  /** Absent when upstream reported no further page. */
  nextPageToken?: string;
};

/** Read-only view of the tracking server the resolver and the search filters depend on. */
export interface TrackingStore {
  getExperimentIdByName(name: string): Promise<string | null>;
  getRunExperimentId(runId: string): Promise<string | null>;
  getLoggedModelExperimentId(modelId: string): Promise<string | null>;
  getTraceExperimentId(requestId: string): Promise<string | null>;
  /** `method` overrides the endpoint's usual verb, for replaying a caller's GET search. */
  search(kind: SearchKind, params: Record<string, unknown>, method?: SearchMethod): Promise<SearchPage>;
}

export type SearchMethod = "GET" | "POST";

type SearchEndpoint = { method: SearchMethod; path: string; field: string };

export const SEARCH_ENDPOINTS: Record<SearchKind, SearchEndpoint> = {
  experiments: { method: "POST", path: "/experiments/search", field: "experiments" },
  logged_models: { method: "POST", path: "/logged-models/search", field: "models" },
  registered_models: { method: "GET", path: "/registered-models/search", field: "registered_models" },
  model_versions: { method: "GET", path: "/model-versions/search", field: "model_versions" },
};

const ExperimentResponse = z.object({ experiment: z.object({ experiment_id: z.string() }) });
const RunResponse = z.object({ run: z.object({ info: z.object({ experiment_id: z.string() }) }) });
const LoggedModelResponse = z.object({
  model: z.object({ info: z.object({ experiment_id: z.string() }) }),
});
const TraceInfoResponse = z.object({ trace_info: z.object({ experiment_id: z.string() }) });
const SearchResponse = z
  .object({ next_page_token: z.string().optional() })
  .catchall(z.unknown());
const SearchItems = z.array(z.record(z.unknown()));

type ErrorBody = { error_code?: string; message?: string };

export interface TrackingClientOptions {
  baseURL: string;
  timeoutMs?: number;
  /** Replaces the HTTP transport; tests pass an in-process adapter. */
  adapter?: AxiosAdapter;
}

/** TrackingStore over the tracking server's public REST API. */
export class TrackingClient implements TrackingStore {
  private readonly client: AxiosInstance;
  private readonly log = createUpstreamLogger();

  constructor(options: TrackingClientOptions) {
    this.client = axios.create({
      baseURL: `${options.baseURL.replace(/\/+$/, "")}/api/2.0/mlflow`,
      timeout: options.timeoutMs ?? 30000,
      headers: { "Content-Type": "application/json" },
      // repeated keys (order_by=a&order_by=b), the way the tracking API reads lists
      paramsSerializer: { indexes: null },
      adapter: options.adapter,
    });

    this.client.interceptors.response.use(
      (response) => response,
      (error: AxiosError<ErrorBody>) => {
        const status = error.response?.status;
        const message = error.response?.data?.message || error.message || "Request failed";
        if (status === 404) throw AuthzError.notFound(message);
        throw AuthzError.upstream(`Tracking server request failed: ${message}`, {
          status,
          code: error.response?.data?.error_code,
        });
      },
    );
  }

  private parse<T>(schema: ZodType<T>, data: unknown, what: string): T {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      this.log.warn({ what, issues: parsed.error.issues }, "Unexpected tracking server response");
      throw AuthzError.upstream(`Unexpected response from tracking server for ${what}`);
    }
    return parsed.data;
  }

  private async getOrNull<T>(
    path: string,
    params: Record<string, string> | undefined,
    schema: ZodType<T>,
  ): Promise<T | null> {
    try {
      const response = await this.client.get<unknown>(path, { params });
      return this.parse(schema, response.data, path);
    } catch (err) {
      if (err instanceof AuthzError && err.kind === "NOT_FOUND") return null;
      throw err;
    }
  }

  async getExperimentIdByName(name: string): Promise<string | null> {
    const found = await this.getOrNull(
      "/experiments/get-by-name",
      { experiment_name: name },
      ExperimentResponse,
    );
    return found?.experiment.experiment_id ?? null;
  }

  async getRunExperimentId(runId: string): Promise<string | null> {
    const found = await this.getOrNull("/runs/get", { run_id: runId }, RunResponse);
    return found?.run.info.experiment_id ?? null;
  }

  async getLoggedModelExperimentId(modelId: string): Promise<string | null> {
    const found = await this.getOrNull(
      `/logged-models/${encodeURIComponent(modelId)}`,
      undefined,
      LoggedModelResponse,
    );
    return found?.model.info.experiment_id ?? null;
  }

  async getTraceExperimentId(requestId: string): Promise<string | null> {
    const found = await this.getOrNull(
      `/traces/${encodeURIComponent(requestId)}/info`,
      undefined,
      TraceInfoResponse,
    );
    return found?.trace_info.experiment_id ?? null;
  }

  async search(
    kind: SearchKind,
    params: Record<string, unknown>,
    method?: SearchMethod,
  ): Promise<SearchPage> {
    const endpoint = SEARCH_ENDPOINTS[kind];
    const response =
      (method ?? endpoint.method) === "GET"
        ? await this.client.get<unknown>(endpoint.path, { params })
        : await this.client.post<unknown>(endpoint.path, params);
    const body = this.parse(SearchResponse, response.data, endpoint.path);
    const items = this.parse(SearchItems, body[endpoint.field] ?? [], endpoint.path);
    return {
      items,
      nextPageToken: body.next_page_token ? body.next_page_token : undefined,
    };
  }
}
