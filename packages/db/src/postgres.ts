import pg from "pg";
import type { QueryResult, QueryResultRow } from "pg";
import pino from "pino";

const logger = pino({ name: "database", level: process.env.LOG_LEVEL || "info" });

export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
}

export interface TransactionClient extends Queryable {
  release(): void;
}

export interface TransactionalPool extends Queryable {
  connect(): Promise<TransactionClient>;
}

export interface PostgresOptions {
  connectionString: string;
  max?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

type HealthStatus = "ok" | "error";

export interface PostgresSingleton {
  pool: pg.Pool;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const STARTUP_RETRIES = 3;
const STARTUP_RETRY_DELAY_MS = 250;
const CONNECT_TIMEOUT_MS = 5000;

/** SQLSTATE raised by PostgreSQL on a unique constraint violation. */
export const UNIQUE_VIOLATION = "23505";

let singleton: PostgresSingleton | null = null;
let initPromise: Promise<PostgresSingleton> | null = null;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function withRetries<T>(operation: () => Promise<T>): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= STARTUP_RETRIES; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt < STARTUP_RETRIES) {
        await delay(STARTUP_RETRY_DELAY_MS * attempt);
      }
    }
  }

  throw lastError;
}

async function initialize(options: PostgresOptions): Promise<PostgresSingleton> {
  const pool = new pg.Pool({
    connectionString: options.connectionString,
    max: options.max ?? 10,
    idleTimeoutMillis: options.idleTimeoutMillis ?? 30000,
    connectionTimeoutMillis: options.connectionTimeoutMillis ?? CONNECT_TIMEOUT_MS,
  });

  await withRetries(async () => {
    await pool.query("SELECT 1");
  });

  logger.info("Postgres pool initialized");

  return {
    pool,
    async healthCheck() {
      try {
        await pool.query("SELECT 1");
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    },
  };
}

export async function getPostgresClient(options: PostgresOptions): Promise<PostgresSingleton> {
  if (singleton) {
    return singleton;
  }

  if (!initPromise) {
    initPromise = initialize(options);
  }

  try {
    singleton = await initPromise;
  } catch (error) {
    initPromise = null;
    throw error;
  }
  return singleton;
}

export async function shutdownPostgresClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  await singleton.pool.end();
  singleton = null;
  initPromise = null;
  logger.info("Postgres pool closed");
}

export async function withTransaction<T>(
  pool: TransactionalPool,
  operation: (client: Queryable) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query("BEGIN");
    const result = await operation(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

export function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === UNIQUE_VIOLATION
  );
}

export function resetPostgresClientForTests(): void {
  singleton = null;
  initPromise = null;
}
