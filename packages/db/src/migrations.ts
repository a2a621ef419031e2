import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { withTransaction, type TransactionalPool } from "./postgres.js";

const currentFilePath = fileURLToPath(import.meta.url);
export const defaultMigrationsDir = path.resolve(path.dirname(currentFilePath), "../migrations");

export interface RunMigrationsDependencies {
  pool: TransactionalPool;
  migrationsDir?: string;
  readdirFn?: (dir: string) => Promise<string[]>;
  readFileFn?: (file: string, encoding: "utf8") => Promise<string>;
}

/**
 * Applies every pending `*.sql` file in lexical order, one transaction per file,
 * and records it in `schema_migrations`. Returns the filenames applied by this call.
 */
export async function runMigrations(dependencies: RunMigrationsDependencies): Promise<string[]> {
  const { pool } = dependencies;
  const migrationsDir = dependencies.migrationsDir ?? defaultMigrationsDir;
  const readdirFn = dependencies.readdirFn ?? ((dir: string) => readdir(dir));
  const readFileFn = dependencies.readFileFn ?? readFile;

  const filenames = (await readdirFn(migrationsDir))
    .filter((name) => name.endsWith(".sql"))
    .sort();

  if (filenames.length === 0) {
    return [];
  }

  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      filename TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const appliedResult = await pool.query<{ filename: string }>(
    "SELECT filename FROM schema_migrations",
  );
  const alreadyApplied = new Set(appliedResult.rows.map((row) => row.filename));

  const applied: string[] = [];

  for (const filename of filenames) {
    if (alreadyApplied.has(filename)) {
      continue;
    }

    const migrationSql = (await readFileFn(path.join(migrationsDir, filename), "utf8")).replace(
      /^\uFEFF/,
      "",
    );

    await withTransaction(pool, async (client) => {
      await client.query(migrationSql);
      await client.query("INSERT INTO schema_migrations (filename) VALUES ($1)", [filename]);
    });

    applied.push(filename);
  }

  return applied;
}
