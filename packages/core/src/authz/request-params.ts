import type { RequestLike } from "../http/http-server.js";
import { AuthzError } from "../internal/errors.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function scalar(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) return scalar(value[0]);
  return undefined;
}

function list(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  const items = Array.isArray(value) ? value : [value];
  return items.map(scalar).filter((v): v is string => v !== undefined);
}

/**
 * Request parameters as the tracking API reads them: query string for GET and PUT,
 * JSON body for POST and PATCH, body-or-query for DELETE. Path parameters of the
 * matched route win over both.
 */
export class RequestParams {
  constructor(
    private readonly req: RequestLike,
    private readonly pathParams: Record<string, string> = {},
  ) {}

  private source(): Record<string, unknown> {
    const method = this.req.method.toUpperCase();
    switch (method) {
      case "GET":
      case "PUT":
        return this.req.query;
      case "POST":
      case "PATCH":
        return isRecord(this.req.body) ? this.req.body : {};
      case "DELETE":
        if (isRecord(this.req.body) && Object.keys(this.req.body).length > 0) return this.req.body;
        return this.req.query;
      default:
        throw AuthzError.unsupportedMethod(method);
    }
  }

  find(name: string): string | undefined {
    const fromPath = this.pathParams[name];
    if (fromPath !== undefined) return fromPath;
    const value = scalar(this.source()[name]);
    return value === "" ? undefined : value;
  }

  get(name: string): string {
    const value = name === "run_id" ? (this.find("run_id") ?? this.find("run_uuid")) : this.find(name);
    if (value === undefined) throw AuthzError.missingParameter(name);
    return value;
  }

  getList(name: string): string[] {
    return list(this.source()[name]);
  }

  /** The parameters as the tracking server received them, for replaying a search. */
  toRecord(): Record<string, unknown> {
    return { ...this.source() };
  }
}

export function getRequestParam(
  req: RequestLike,
  name: string,
  pathParams: Record<string, string> = {},
): string {
  return new RequestParams(req, pathParams).get(name);
}
