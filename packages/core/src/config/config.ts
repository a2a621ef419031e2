import { z } from "zod";
import { PERMISSION_LEVELS } from "../authz/permissions.js";

const positiveInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) => Number(v))
    .pipe(z.number().int().positive());

const optionalBoolean = z
  .string()
  .optional()
  .transform((v) => (v == null ? undefined : v === "true"));

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),
  PORT: positiveInt("5001"),

  TRACKING_SERVER_URL: z.string().url("TRACKING_SERVER_URL must be a URL"),
  TRACKING_TIMEOUT_MS: positiveInt("30000"),
  PROXY_BODY_LIMIT: z.string().default("10mb"),

  // Authorization
  DEFAULT_PERMISSION: z.enum(PERMISSION_LEVELS).default("READ"),
  UNMATCHED_API_ROUTE: z.enum(["deny", "allow"]).default("deny"),
  ADMIN_USERNAME: z.string().min(1).default("admin"),
  ADMIN_PASSWORD: z.string().min(1).default("password1234"),

  // Authentication
  AUTH_STRATEGY: z.enum(["basic", "session"]).default("basic"),
  SESSION_LIFETIME_SEC: positiveInt("86400"),
  SESSION_COOKIE_NAME: z.string().min(1).default("tw_session"),
  AUTH_COOKIE_DOMAIN: z.string().optional(),
  AUTH_COOKIE_SECURE: optionalBoolean,

  AUTHZ_METRICS_ENABLED: z
    .string()
    .optional()
    .transform((v) => v === "true"),
  AUTHZ_METRICS_OTLP_URL: z.string().optional(),
  AUTHZ_METRICS_OTLP_HEADERS: z
    .string()
    .optional()
    .transform((v, ctx): Record<string, string> | undefined => {
      if (!v) return undefined;
      try {
        const parsed = z.record(z.string()).safeParse(JSON.parse(v));
        if (parsed.success) return parsed.data;
        throw new Error("expected JSON object of strings");
      } catch (e) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "Invalid AUTHZ_METRICS_OTLP_HEADERS: " + (e instanceof Error ? e.message : String(e)),
        });
        return z.NEVER;
      }
    }),
  AUTHZ_METRICS_SERVICE_NAME: z.string().optional(),
  AUTHZ_METRICS_SERVICE_NAMESPACE: z.string().optional(),
  AUTHZ_METRICS_SERVICE_INSTANCE_ID: z.string().optional(),
  AUTHZ_METRICS_EXPORT_INTERVAL_MS: z
    .string()
    .optional()
    .transform((v) => (v == null || v === "" ? undefined : Number(v)))
    .pipe(z.number().positive().optional()),
  AUTHZ_METRICS_EXPORT_TIMEOUT_MS: z
    .string()
    .optional()
    .transform((v) => (v == null || v === "" ? undefined : Number(v)))
    .pipe(z.number().positive().optional()),
  AUTHZ_METRICS_ENABLE_DIAGNOSTICS: optionalBoolean,
});

export type AppConfig = Omit<z.infer<typeof EnvSchema>, "AUTH_COOKIE_SECURE"> & {
  AUTH_COOKIE_SECURE: boolean;
};

export type AuthStrategy = AppConfig["AUTH_STRATEGY"];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
    throw new Error(`Invalid environment: ${msg}`);
  }
  const { AUTH_COOKIE_SECURE, ...rest } = parsed.data;
  return {
    ...rest,
    // Secure cookies unless explicitly disabled or running in development
    AUTH_COOKIE_SECURE: AUTH_COOKIE_SECURE ?? env.NODE_ENV !== "development",
  };
}
