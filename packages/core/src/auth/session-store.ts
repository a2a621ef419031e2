import { z } from "zod";
import type { Queryable } from "@trackward/db";
import { newSessionId, sha256Hex } from "./tokens.js";

export const SessionDataSchema = z.object({
  username: z.string().min(1),
  userId: z.number().int(),
  isAdmin: z.boolean(),
  /** Epoch milliseconds. */
  loginTime: z.number(),
});

export type SessionData = z.infer<typeof SessionDataSchema>;

export interface SessionStore {
  /** Stores the session and returns the id to hand to the client. */
  create(data: SessionData, ttlSec: number): Promise<string>;
  /** Null when unknown or when the stored data lacks identity fields. */
  get(sessionId: string): Promise<SessionData | null>;
  destroy(sessionId: string): Promise<void>;
}

/** Sessions in the `sessions` table. Only a hash of the id is stored. */
export class PgSessionStore implements SessionStore {
  constructor(
    private readonly db: Queryable,
    private readonly now: () => number = Date.now,
  ) {}

  async create(data: SessionData, ttlSec: number): Promise<string> {
    const sessionId = newSessionId();
    await this.db.query("INSERT INTO sessions (session_id, data, expiry) VALUES ($1, $2, $3)", [
      sha256Hex(sessionId),
      JSON.stringify(data),
      new Date(this.now() + ttlSec * 1000),
    ]);
    return sessionId;
  }

  async get(sessionId: string): Promise<SessionData | null> {
    const res = await this.db.query<{ data: unknown }>(
      "SELECT data FROM sessions WHERE session_id = $1",
      [sha256Hex(sessionId)],
    );
    const parsed = SessionDataSchema.safeParse(res.rows[0]?.data);
    return parsed.success ? parsed.data : null;
  }

  async destroy(sessionId: string): Promise<void> {
    await this.db.query("DELETE FROM sessions WHERE session_id = $1", [sha256Hex(sessionId)]);
  }

  /** Drops rows past their expiry; returns how many were removed. */
  async purgeExpired(): Promise<number> {
    const res = await this.db.query("DELETE FROM sessions WHERE expiry < $1", [new Date(this.now())]);
    return res.rowCount ?? 0;
  }
}
