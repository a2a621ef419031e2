import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { RequestParams } from "../authz/request-params.js";
import { AuthzError } from "../internal/errors.js";
import type { HttpHandler, RequestLike, ResponseLike } from "./http-server.js";

export type ValidatedHandler<T> = (
  req: RequestLike,
  res: ResponseLike,
  input: T,
) => Promise<void> | void;

export function toInvalidRequest(error: ZodError): AuthzError {
  const issue = error.issues[0];
  const name = issue?.path.join(".") ?? "";
  if (issue?.code === "invalid_type" && issue.received === "undefined") {
    return AuthzError.missingParameter(name);
  }
  return AuthzError.invalidRequest(`Invalid value for parameter '${name}': ${issue?.message ?? "invalid"}`, {
    issues: error.issues,
  });
}

/** Parses the request parameters (query or body, by method) before the handler runs. */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return (handler: ValidatedHandler<T>): HttpHandler => {
    return async (req, res) => {
      const parsed = schema.safeParse(new RequestParams(req, req.params).toRecord());
      if (!parsed.success) throw toInvalidRequest(parsed.error);
      return handler(req, res, parsed.data);
    };
  };
}
