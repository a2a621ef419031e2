import type { Readable } from "node:stream";
import axios, {
  type AxiosAdapter,
  type AxiosError,
  type AxiosInstance,
  type AxiosResponse,
  type RawAxiosRequestHeaders,
} from "axios";
import type { AuthorizationInterceptor } from "../authz/interceptor.js";
import { AuthzError } from "../internal/errors.js";
import { createUpstreamLogger } from "../observability/logger.js";
import type { HttpHandler, RequestLike, ResponseLike } from "./http-server.js";
import { searchOf } from "./paths.js";

const HOP_BY_HOP = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
  "host",
]);

// Buffered bodies arrive decompressed; rewritten ones also get a fresh content type
const DECODED = new Set(["content-length", "content-encoding"]);
const REWRITTEN = new Set([...DECODED, "content-type"]);

export interface TrackingProxyOptions {
  baseURL: string;
  timeoutMs: number;
  interceptor: AuthorizationInterceptor;
  /** Replaces the HTTP transport; tests pass an in-process adapter. */
  adapter?: AxiosAdapter;
}

export function forwardedRequestHeaders(headers: RequestLike["headers"]): RawAxiosRequestHeaders {
  const out: RawAxiosRequestHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    const key = name.toLowerCase();
    if (value === undefined || HOP_BY_HOP.has(key)) continue;
    out[key] = Array.isArray(value) ? value.join(", ") : value;
  }
  return out;
}

export function forwardedResponseHeaders(
  headers: AxiosResponse["headers"],
  drop: ReadonlySet<string> = new Set(),
): Record<string, string | string[]> {
  const out: Record<string, string | string[]> = {};
  const entries: Array<[string, unknown]> = Object.entries(headers);
  for (const [name, value] of entries) {
    const key = name.toLowerCase();
    if (HOP_BY_HOP.has(key) || drop.has(key)) continue;
    if (typeof value === "string") out[key] = value;
    else if (typeof value === "number") out[key] = String(value);
    else if (Array.isArray(value)) out[key] = value.filter((v): v is string => typeof v === "string");
  }
  return out;
}

// The authorized path, never the raw request target (which may be absolute-form)
export function upstreamTarget(req: RequestLike): string {
  return req.path + searchOf(req.url);
}

function parseJson(bytes: Buffer): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(bytes.toString("utf8")) };
  } catch {
    return { ok: false };
  }
}

/**
 * Forwards everything the gateway does not answer itself to the tracking server. Responses of
 * operations with an after-request rule are buffered and passed through the interceptor;
 * everything else (artifact downloads, UI assets) is streamed back untouched.
 */
export function createTrackingProxy(options: TrackingProxyOptions): HttpHandler {
  const log = createUpstreamLogger();
  const client: AxiosInstance = axios.create({
    baseURL: options.baseURL.replace(/\/+$/, ""),
    timeout: options.timeoutMs,
    maxRedirects: 0,
    maxBodyLength: Infinity,
    maxContentLength: Infinity,
    validateStatus: () => true,
    adapter: options.adapter,
  });
  client.interceptors.response.use(
    (response) => response,
    (error: AxiosError) => {
      log.warn({ err: error, url: error.config?.url }, "Tracking server unreachable");
      throw AuthzError.upstream(`Tracking server request failed: ${error.message}`);
    },
  );

  async function buffered(req: RequestLike, res: ResponseLike) {
    const response = await client.request<ArrayBuffer>({
      method: req.method,
      url: upstreamTarget(req),
      headers: forwardedRequestHeaders(req.headers),
      data: req.rawBody ?? req.stream,
      responseType: "arraybuffer",
    });
    const bytes = Buffer.from(response.data);
    const parsed = response.status < 400 ? parseJson(bytes) : { ok: false as const };
    if (!parsed.ok) {
      res.status(response.status).sendBuffer(bytes, forwardedResponseHeaders(response.headers, DECODED));
      return;
    }

    const body = await options.interceptor.afterRequest(req, response.status, parsed.value);
    for (const [name, value] of Object.entries(forwardedResponseHeaders(response.headers, REWRITTEN))) {
      res.header(name, value);
    }
    res.status(response.status).json(body);
  }

  async function streamed(req: RequestLike, res: ResponseLike) {
    const response = await client.request<Readable>({
      method: req.method,
      url: upstreamTarget(req),
      headers: forwardedRequestHeaders(req.headers),
      data: req.rawBody ?? req.stream,
      responseType: "stream",
      decompress: false,
    });
    res.status(response.status).sendStream(response.data, forwardedResponseHeaders(response.headers));
  }

  return async (req, res) => {
    if (options.interceptor.afterRuleOf(req)) await buffered(req, res);
    else await streamed(req, res);
  };
}
