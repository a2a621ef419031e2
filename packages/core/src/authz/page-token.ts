import { z, type ZodType } from "zod";
import type { SearchKind } from "./policy.js";

export interface PageTokenCodec<T extends { offset: number }> {
  encode(value: T): string;
  /** Null for anything that is not base64 JSON of the expected shape. */
  decode(token: string): T | null;
}

export function createPageTokenCodec<T extends { offset: number }>(
  schema: ZodType<T, z.ZodTypeDef, unknown>,
): PageTokenCodec<T> {
  return {
    encode(value) {
      return Buffer.from(JSON.stringify(value), "utf8").toString("base64");
    },
    decode(token) {
      let json: unknown;
      try {
        json = JSON.parse(Buffer.from(token, "base64").toString("utf8"));
      } catch {
        return null;
      }
      const parsed = schema.safeParse(json);
      return parsed.success ? parsed.data : null;
    },
  };
}

const offset = z.number().int().nonnegative();

/** `{ offset }`, used for experiments, registered models and model versions. */
export const OffsetToken = z.object({ offset }).passthrough();

/** Logged-model search also pins the query the offset belongs to. */
export const LoggedModelToken = z
  .object({
    offset,
    experiment_ids: z.array(z.string()),
    filter_string: z.string().nullish(),
    order_by: z.array(z.record(z.unknown())).nullish(),
  })
  .passthrough();

export type OffsetTokenValue = z.infer<typeof OffsetToken>;

export const PAGE_TOKEN_CODECS: Record<SearchKind, PageTokenCodec<OffsetTokenValue>> = {
  experiments: createPageTokenCodec(OffsetToken),
  registered_models: createPageTokenCodec(OffsetToken),
  model_versions: createPageTokenCodec(OffsetToken),
  logged_models: createPageTokenCodec(LoggedModelToken),
};
