import type { PermissionStore } from "../store/types.js";
import type { SearchItem, SearchMethod, TrackingStore } from "../upstream/tracking-client.js";
import { SEARCH_ENDPOINTS } from "../upstream/tracking-client.js";
import { createAuthzLogger } from "../observability/logger.js";
import { capabilitiesOf, type PermissionLevel } from "./permissions.js";
import { PAGE_TOKEN_CODECS } from "./page-token.js";
import type { SearchKind } from "./policy.js";

const log = createAuthzLogger();

export const DEFAULT_MAX_RESULTS: Record<SearchKind, number> = {
  experiments: 1000,
  logged_models: 100,
  registered_models: 100,
  model_versions: 10000,
};

export type SearchFilterDeps = {
  store: PermissionStore;
  tracking: TrackingStore;
  defaultPermission: PermissionLevel;
};

export type SearchFilterResult = {
  body: Record<string, unknown>;
  /** Extra upstream pages fetched to refill the page. */
  refetches: number;
  /** Items dropped as unreadable, across all pages seen. */
  removed: number;
};

function stringField(value: unknown, key: string): string | undefined {
  if (typeof value !== "object" || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : undefined;
}

// The key a grant is looked up by, per search family.
function resourceKeyOf(kind: SearchKind, item: SearchItem): string | undefined {
  switch (kind) {
    case "experiments":
      return stringField(item, "experiment_id");
    case "logged_models":
      return stringField(item.info, "experiment_id");
    case "registered_models":
    case "model_versions":
      return stringField(item, "name");
  }
}

async function loadReadAccess(
  kind: SearchKind,
  username: string,
  deps: SearchFilterDeps,
): Promise<(item: SearchItem) => boolean> {
  const canRead = new Map<string, boolean>();
  if (kind === "experiments" || kind === "logged_models") {
    for (const p of await deps.store.listExperimentPermissions(username)) {
      canRead.set(p.experimentId, capabilitiesOf(p.permission).canRead);
    }
  } else {
    for (const p of await deps.store.listRegisteredModelPermissions(username)) {
      canRead.set(p.name, capabilitiesOf(p.permission).canRead);
    }
  }
  const byDefault = capabilitiesOf(deps.defaultPermission).canRead;
  return (item) => {
    const key = resourceKeyOf(kind, item);
    if (key === undefined) return false;
    return canRead.get(key) ?? byDefault;
  };
}

export function maxResultsOf(kind: SearchKind, params: Record<string, unknown>): number {
  const raw = Array.isArray(params.max_results) ? params.max_results[0] : params.max_results;
  const n = typeof raw === "number" ? raw : typeof raw === "string" ? Number(raw) : NaN;
  return Number.isInteger(n) && n > 0 ? n : DEFAULT_MAX_RESULTS[kind];
}

function itemsOf(value: unknown): SearchItem[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is SearchItem => typeof v === "object" && v !== null && !Array.isArray(v));
}

/**
 * Drops unreadable entries from a search response and refills the page from upstream with
 * the original query, so a page only comes back short when the matching rows run out.
 * The returned token resumes at the first row this page did not consume. Refills go out with
 * `method` when given, so a GET search is replayed as a query string.
 */
export async function filterSearchResponse(
  kind: SearchKind,
  body: Record<string, unknown>,
  requestParams: Record<string, unknown>,
  username: string,
  deps: SearchFilterDeps,
  method?: SearchMethod,
): Promise<SearchFilterResult> {
  const field = SEARCH_ENDPOINTS[kind].field;
  const codec = PAGE_TOKEN_CODECS[kind];
  const canRead = await loadReadAccess(kind, username, deps);
  const maxResults = maxResultsOf(kind, requestParams);

  const firstPage = itemsOf(body[field]);
  const results = firstPage.filter(canRead);
  let removed = firstPage.length - results.length;
  let refetches = 0;
  const upstreamToken = stringField(body, "next_page_token");
  let token = upstreamToken ? upstreamToken : undefined;

  while (results.length < maxResults && token) {
    const current = codec.decode(token);
    if (!current) {
      log.warn({ kind }, "Undecodable page token; returning the page unfilled");
      break;
    }
    const batch = await deps.tracking.search(kind, { ...requestParams, page_token: token }, method);
    refetches += 1;
    if (batch.items.length === 0) {
      token = undefined;
      break;
    }

    let consumed = 0;
    for (const item of batch.items) {
      consumed += 1;
      if (!canRead(item)) {
        removed += 1;
        continue;
      }
      results.push(item);
      if (results.length >= maxResults) break;
    }

    const exhausted = consumed === batch.items.length && !batch.nextPageToken;
    token = exhausted ? undefined : codec.encode({ ...current, offset: current.offset + consumed });
  }

  const out: Record<string, unknown> = { ...body, [field]: results };
  if (token) out.next_page_token = token;
  else delete out.next_page_token;
  return { body: out, refetches, removed };
}
