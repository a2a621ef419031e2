import { createRequestLogger } from "../observability/logger.js";

export class TrackwardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TrackwardError";
  }
}

export type AuthzErrorKind =
  | "UNAUTHENTICATED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "INVALID_REQUEST"
  | "CONFLICT"
  | "UPSTREAM"
  | "INTERNAL";

export interface AuthzErrorOptions {
  kind: AuthzErrorKind;
  code: string;
  status: number;
  message?: string;
  details?: unknown;
}

export const UNAUTHENTICATED_MESSAGE =
  "You are not authenticated. Please login at /login to access this resource.";
export const PERMISSION_DENIED_MESSAGE = "Permission denied";

export class AuthzError extends TrackwardError {
  readonly kind: AuthzErrorKind;
  readonly code: string;
  readonly status: number;
  readonly details?: unknown;

  constructor(opts: AuthzErrorOptions) {
    super(opts.message ?? opts.code);
    this.name = "AuthzError";
    this.kind = opts.kind;
    this.code = opts.code;
    this.status = opts.status;
    this.details = opts.details;
  }

  static unauthenticated() {
    return new AuthzError({
      kind: "UNAUTHENTICATED",
      code: "UNAUTHENTICATED",
      status: 401,
      message: UNAUTHENTICATED_MESSAGE,
    });
  }

  static forbidden() {
    return new AuthzError({
      kind: "FORBIDDEN",
      code: "PERMISSION_DENIED",
      status: 403,
      message: PERMISSION_DENIED_MESSAGE,
    });
  }

  static notFound(message: string, details?: unknown) {
    return new AuthzError({
      kind: "NOT_FOUND",
      code: "RESOURCE_DOES_NOT_EXIST",
      status: 404,
      message,
      details,
    });
  }

  static invalidRequest(message: string, details?: unknown) {
    return new AuthzError({
      kind: "INVALID_REQUEST",
      code: "INVALID_PARAMETER_VALUE",
      status: 400,
      message,
      details,
    });
  }

  static missingParameter(name: string) {
    return AuthzError.invalidRequest(
      `Missing value for required parameter '${name}'. ` +
        "See the API docs for more information about request parameters.",
      { parameter: name },
    );
  }

  static unsupportedMethod(method: string) {
    return AuthzError.invalidRequest(`Unsupported HTTP method '${method}'`);
  }

  static invalidPermissionLevel(value: string) {
    return AuthzError.invalidRequest(
      `Invalid permission '${value}'. Valid permissions are: READ, EDIT, MANAGE, NO_PERMISSIONS`,
    );
  }

  static conflict(message: string) {
    return new AuthzError({
      kind: "CONFLICT",
      code: "RESOURCE_ALREADY_EXISTS",
      status: 409,
      message,
    });
  }

  static upstream(message: string, details?: unknown) {
    return new AuthzError({
      kind: "UPSTREAM",
      code: "TEMPORARILY_UNAVAILABLE",
      status: 502,
      message,
      details,
    });
  }

  static internal(message: string, details?: unknown) {
    return new AuthzError({
      kind: "INTERNAL",
      code: "INTERNAL_ERROR",
      status: 500,
      message,
      details,
    });
  }
}

export function isAuthzError(err: unknown): err is AuthzError {
  return err instanceof AuthzError;
}

export type ErrorResponse =
  | { status: number; kind: "text"; body: string }
  | { status: number; kind: "json"; body: { error_code: string; message: string } };

const INTERNAL_MESSAGE = "An internal error occurred while processing the request";

function statusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err) {
    const { status } = err;
    if (typeof status === "number") return status;
  }
  return undefined;
}

/**
 * Single exception boundary: turns any thrown value into the response that leaves the gateway.
 * Unknown errors become 500 and are logged with their stack.
 */
export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof AuthzError) {
    switch (err.kind) {
      case "UNAUTHENTICATED":
      case "FORBIDDEN":
        return { status: err.status, kind: "text", body: err.message };
      case "INTERNAL":
        createRequestLogger().error(
          { err, details: err.details },
          "Internal authorization error",
        );
        return {
          status: err.status,
          kind: "json",
          body: { error_code: err.code, message: INTERNAL_MESSAGE },
        };
      default:
        return {
          status: err.status,
          kind: "json",
          body: { error_code: err.code, message: err.message },
        };
    }
  }

  // Framework errors (body parser limits, malformed JSON) carry a 4xx status
  const status = statusOf(err);
  if (status !== undefined && status >= 400 && status < 500) {
    return {
      status,
      kind: "json",
      body: {
        error_code: "BAD_REQUEST",
        message: err instanceof Error ? err.message : "Bad request",
      },
    };
  }

  createRequestLogger().error({ err }, "Unhandled error");
  return {
    status: 500,
    kind: "json",
    body: { error_code: "INTERNAL_ERROR", message: INTERNAL_MESSAGE },
  };
}
