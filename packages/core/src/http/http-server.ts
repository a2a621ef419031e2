import type { AuthenticatedIdentity } from "../auth/authenticator.js";

export type QueryValues = Record<string, string | string[] | undefined>;

export interface RequestLike {
  method: string;
  /** Path without the query string. */
  path: string;
  /** Canonical path plus the query string as received. */
  url: string;
  params: Record<string, string>;
  query: QueryValues;
  /** Decoded JSON or form body; undefined when absent or not decodable. */
  body?: unknown;
  /** Buffered bytes for JSON and form bodies, forwarded upstream unchanged. */
  rawBody?: Buffer;
  headers: Record<string, string | string[] | undefined>;
  ip?: string;
  userAgent?: string;
  // Set by the before hook once the caller is authenticated
  user?: AuthenticatedIdentity;
  /** Unbuffered request body (artifact uploads and other binary payloads). */
  stream?: NodeJS.ReadableStream;
}

export interface ResponseLike {
  status(code: number): ResponseLike;
  json(payload: unknown): void;
  text(body: string): void;
  header(name: string, value: string | string[]): ResponseLike;
  redirect(url: string, status?: number): void;
  sendStream(body: NodeJS.ReadableStream, headers?: Record<string, string | string[]>): void;
  sendBuffer(body: Buffer, headers?: Record<string, string | string[]>): void;
}

export type HttpHandler = (req: RequestLike, res: ResponseLike) => Promise<void> | void;

/** "handled" means the hook already wrote the response and routing stops. */
export type BeforeHook = (
  req: RequestLike,
  res: ResponseLike,
) => Promise<"continue" | "handled"> | "continue" | "handled";

export interface HttpServer {
  get(path: string, handler: HttpHandler): void;
  post(path: string, handler: HttpHandler): void;
  patch(path: string, handler: HttpHandler): void;
  delete(path: string, handler: HttpHandler): void;
  before(hook: BeforeHook): void;
  /** Handles every request no registered route matched. */
  fallback(handler: HttpHandler): void;
  listen(port: number): Promise<void>;
}
