import express, {
  type ErrorRequestHandler,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import helmet from "helmet";
import cors from "cors";
import { pinoHttp } from "pino-http";
import { toErrorResponse } from "../internal/errors.js";
import { logger } from "../observability/logger.js";
import { canonicalPath, searchOf } from "./paths.js";
import type {
  BeforeHook,
  HttpHandler,
  HttpServer,
  QueryValues,
  RequestLike,
  ResponseLike,
} from "./http-server.js";

export interface ExpressServerOptions {
  /** Largest JSON or form body buffered for authorization, e.g. "10mb". */
  bodyLimit?: string;
}

const JSON_TYPES = ["application/json", "application/*+json"];
const FORM_TYPE = "application/x-www-form-urlencoded";

/** Query or form parameters; repeated keys collect into arrays. */
export function parseParams(search: string): QueryValues {
  const out: QueryValues = {};
  for (const [key, value] of new URLSearchParams(search)) {
    const existing = out[key];
    if (existing === undefined) out[key] = value;
    else out[key] = Array.isArray(existing) ? [...existing, value] : [existing, value];
  }
  return out;
}

export function queryOf(url: string): QueryValues {
  const index = url.indexOf("?");
  return index === -1 ? {} : parseParams(url.slice(index + 1));
}

/** JSON or form bytes decoded for parameter lookup; undefined when they do not decode. */
export function decodeBody(contentType: string | undefined, raw: Buffer): unknown {
  const type = (contentType ?? "").split(";")[0]?.trim().toLowerCase() ?? "";
  if (type === FORM_TYPE) return parseParams(raw.toString("utf8"));
  if (raw.length === 0) return undefined;
  try {
    return JSON.parse(raw.toString("utf8"));
  } catch {
    return undefined;
  }
}

function hasBody(req: Request): boolean {
  const length = req.headers["content-length"];
  return req.headers["transfer-encoding"] !== undefined || (length !== undefined && length !== "0");
}

function toRequestLike(req: Request): RequestLike {
  const raw: unknown = req.body;
  const buffered = Buffer.isBuffer(raw) ? raw : undefined;
  // Left raw when it has no canonical form; the authorization hook rejects it
  const path = canonicalPath(req.path) ?? req.path;
  return {
    method: req.method,
    path,
    url: path + searchOf(req.originalUrl),
    params: {},
    query: queryOf(req.originalUrl),
    body: buffered ? decodeBody(req.headers["content-type"], buffered) : undefined,
    rawBody: buffered,
    headers: req.headers,
    ip: req.ip,
    userAgent: req.headers["user-agent"],
    stream: !buffered && hasBody(req) ? req : undefined,
  };
}

function toResponseLike(res: Response): ResponseLike {
  const setHeaders = (headers?: Record<string, string | string[]>) => {
    for (const [name, value] of Object.entries(headers ?? {})) res.setHeader(name, value);
  };
  return {
    status(code) {
      res.status(code);
      return this;
    },
    json(payload) {
      res.json(payload);
    },
    text(body) {
      res.type("text/plain").send(body);
    },
    header(name, value) {
      res.setHeader(name, value);
      return this;
    },
    redirect(url, status) {
      if (status) res.redirect(status, url);
      else res.redirect(url);
    },
    sendStream(body, headers) {
      setHeaders(headers);
      body.once("error", (err: unknown) => {
        logger.warn({ err }, "Upstream stream failed");
        if (!res.headersSent) res.status(502);
        res.end();
      });
      res.once("close", () => {
        if ("destroy" in body && typeof body.destroy === "function") body.destroy();
      });
      body.pipe(res);
    },
    sendBuffer(body, headers) {
      setHeaders(headers);
      res.end(body);
    },
  };
}

/**
 * Express behind the HttpServer seam. Before hooks run ahead of every route; requests no route
 * takes go to the fallback handler, then to the JSON error handler.
 */
export function createExpressServer(options: ExpressServerOptions = {}): HttpServer {
  const app = express();
  const router = express.Router();
  const hooks: BeforeHook[] = [];
  const adapted = new WeakMap<Request, RequestLike>();
  let fallback: HttpHandler | undefined;

  const requestLike = (req: Request): RequestLike => {
    const existing = adapted.get(req);
    if (existing) return existing;
    const created = toRequestLike(req);
    adapted.set(req, created);
    return created;
  };

  // The proxied UI brings its own scripts
  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(cors());
  app.use(pinoHttp({ logger }));
  app.use(express.raw({ type: [...JSON_TYPES, FORM_TYPE], limit: options.bodyLimit ?? "10mb" }));

  app.use((req, res, next) => {
    const run = async () => {
      const reqLike = requestLike(req);
      const resLike = toResponseLike(res);
      for (const hook of hooks) {
        if ((await hook(reqLike, resLike)) === "handled") return;
      }
      next();
    };
    run().catch(next);
  });
  app.use(router);
  app.use((req, res, next) => {
    if (!fallback) {
      res.status(404).json({ error_code: "ENDPOINT_NOT_FOUND", message: "Not found" });
      return;
    }
    Promise.resolve(fallback(requestLike(req), toResponseLike(res))).catch(next);
  });

  const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const response = toErrorResponse(err);
    if (response.kind === "text") res.status(response.status).type("text/plain").send(response.body);
    else res.status(response.status).json(response.body);
  };
  app.use(errorHandler);

  const wrap =
    (h: HttpHandler): RequestHandler =>
    (req: Request, res: Response, next: NextFunction) => {
      const reqLike = requestLike(req);
      reqLike.params = { ...req.params };
      Promise.resolve(h(reqLike, toResponseLike(res))).catch(next);
    };

  return {
    get: (p, h) => {
      router.get(p, wrap(h));
    },
    post: (p, h) => {
      router.post(p, wrap(h));
    },
    patch: (p, h) => {
      router.patch(p, wrap(h));
    },
    delete: (p, h) => {
      router.delete(p, wrap(h));
    },
    before: (hook) => {
      hooks.push(hook);
    },
    fallback: (h) => {
      fallback = h;
    },
    listen: (port) =>
      new Promise((resolve) => {
        app.listen(port, () => {
          logger.info({ port }, "Listening");
          resolve();
        });
      }),
  };
}
