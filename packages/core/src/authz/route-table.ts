import type { Endpoint, EndpointCatalog, HttpMethod } from "./catalog.js";
import type { TrackingOperation } from "./policy.js";

// Same literal form as used when registering local routes, e.g. "GET /api/2.0/mlflow/users/get"
export type RouteSignature = `${HttpMethod} ${string}`;

export type MatchedRoute = {
  operation: TrackingOperation;
  method: HttpMethod;
  /** Catalog path with prefix, angle-bracket parameters intact. */
  template: string;
  params: Record<string, string>;
};

export type ArtifactProxyMatch = {
  /** Undefined for the bare listing endpoint. */
  artifactPath?: string;
};

type PatternRoute = {
  method: HttpMethod;
  template: string;
  regex: RegExp;
  paramNames: string[];
  operation: TrackingOperation;
};

const PARAM = /<([A-Za-z_][A-Za-z0-9_]*)>/g;

function compilePath(template: string): { regex: RegExp; paramNames: string[] } {
  const paramNames: string[] = [];
  let source = "";
  let last = 0;
  for (const m of template.matchAll(PARAM)) {
    const index = m.index ?? 0;
    source += escapeRegex(template.slice(last, index)) + "([^/]+)";
    paramNames.push(m[1] ?? "");
    last = index + m[0].length;
  }
  source += escapeRegex(template.slice(last));
  return { regex: new RegExp(`^${source}$`), paramNames };
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function safeDecode(s: string): string {
  try {
    return decodeURIComponent(s);
  } catch {
    // malformed escapes are matched literally
    return s;
  }
}

function isHttpMethod(method: string): method is HttpMethod {
  return (
    method === "GET" ||
    method === "POST" ||
    method === "PUT" ||
    method === "PATCH" ||
    method === "DELETE"
  );
}

/**
 * Static projection of the endpoint catalog. Exact paths resolve through a map; templates with
 * `<param>` segments (logged models) fall back to a whole-path regex match.
 */
export class RouteTable {
  private readonly exact = new Map<RouteSignature, MatchedRoute>();
  private readonly patterns: PatternRoute[] = [];
  private readonly artifactRoots: string[];

  constructor(private readonly catalog: EndpointCatalog) {
    for (const prefix of catalog.prefixes) {
      for (const endpoint of catalog.endpoints) {
        this.register(prefix, endpoint);
      }
    }
    this.artifactRoots = catalog.prefixes.map((p) => p + catalog.artifactProxyPath);
  }

  private register(prefix: string, endpoint: Endpoint) {
    const template = prefix + endpoint.path;
    const parameterised = template.includes("<");
    const compiled = parameterised ? compilePath(template) : undefined;
    for (const method of endpoint.methods) {
      if (compiled) {
        this.patterns.push({
          method,
          template,
          regex: compiled.regex,
          paramNames: compiled.paramNames,
          operation: endpoint.operation,
        });
      } else {
        this.exact.set(`${method} ${template}`, {
          operation: endpoint.operation,
          method,
          template,
          params: {},
        });
      }
    }
  }

  match(method: string, path: string): MatchedRoute | null {
    const upper = method.toUpperCase();
    if (!isHttpMethod(upper)) return null;

    const hit = this.exact.get(`${upper} ${path}`);
    if (hit) return { ...hit, params: {} };

    for (const route of this.patterns) {
      if (route.method !== upper) continue;
      const m = route.regex.exec(path);
      if (!m) continue;
      const params: Record<string, string> = {};
      route.paramNames.forEach((name, i) => {
        params[name] = safeDecode(m[i + 1] ?? "");
      });
      return { operation: route.operation, method: upper, template: route.template, params };
    }
    return null;
  }

  matchArtifactProxy(path: string): ArtifactProxyMatch | null {
    for (const root of this.artifactRoots) {
      if (path === root || path === root + "/") return {};
      if (path.startsWith(root + "/")) {
        return { artifactPath: safeDecode(path.slice(root.length + 1)) };
      }
    }
    return null;
  }

  /** True for any path under one of the REST prefixes. */
  isApiPath(path: string): boolean {
    return this.catalog.prefixes.some((p) => path === p || path.startsWith(p + "/"));
  }

  /** Every concrete (method, path) pair registered for an operation, across all prefixes. */
  pathsFor(operation: TrackingOperation): Array<{ method: HttpMethod; path: string }> {
    const out: Array<{ method: HttpMethod; path: string }> = [];
    for (const prefix of this.catalog.prefixes) {
      for (const endpoint of this.catalog.endpoints) {
        if (endpoint.operation !== operation) continue;
        for (const method of endpoint.methods) out.push({ method, path: prefix + endpoint.path });
      }
    }
    return out;
  }
}
