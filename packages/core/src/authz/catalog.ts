import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { isTrackingOperation, type TrackingOperation } from "./policy.js";

export const HTTP_METHODS = ["GET", "POST", "PUT", "PATCH", "DELETE"] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

const EndpointSchema = z.object({
  operation: z.custom<TrackingOperation>(isTrackingOperation, {
    message: "Unknown operation",
  }),
  path: z.string().startsWith("/"),
  methods: z.array(z.enum(HTTP_METHODS)).min(1),
});

const CatalogSchema = z.object({
  prefixes: z.array(z.string().startsWith("/")).min(1),
  artifactProxyPath: z.string().startsWith("/"),
  endpoints: z.array(EndpointSchema).min(1),
});

export type Endpoint = z.infer<typeof EndpointSchema>;
export type EndpointCatalog = z.infer<typeof CatalogSchema>;

export const defaultCatalogPath = fileURLToPath(new URL("./endpoints.json", import.meta.url));

export function parseEndpointCatalog(input: unknown): EndpointCatalog {
  const parsed = CatalogSchema.safeParse(input);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
    throw new Error(`Invalid endpoint catalog: ${msg}`);
  }
  return parsed.data;
}

export function loadEndpointCatalog(file: string = defaultCatalogPath): EndpointCatalog {
  return parseEndpointCatalog(JSON.parse(readFileSync(file, "utf8")));
}
