import { describe, expect, it, vi } from "vitest";
import { runMigrations } from "./migrations.js";

function createPool(appliedFilenames: string[]) {
  const client = {
    query: vi.fn().mockResolvedValue({ rows: [] }),
    release: vi.fn(),
  };
  const pool = {
    query: vi
      .fn()
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: appliedFilenames.map((filename) => ({ filename })) }),
    connect: vi.fn().mockResolvedValue(client),
  };
  return { pool, client };
}

describe("runMigrations", () => {
  it("returns without touching the database when no sql files exist", async () => {
    const { pool } = createPool([]);

    const applied = await runMigrations({
      pool,
      migrationsDir: "/migrations",
      readdirFn: vi.fn().mockResolvedValue(["README.md"]),
    });

    expect(applied).toEqual([]);
    expect(pool.query).not.toHaveBeenCalled();
  });

  it("applies only pending files in lexical order", async () => {
    const { pool, client } = createPool(["0001_init.sql"]);
    const readFileFn = vi.fn().mockResolvedValue("\uFEFFCREATE TABLE t (id INT);");

    const applied = await runMigrations({
      pool,
      migrationsDir: "/migrations",
      readdirFn: vi.fn().mockResolvedValue(["0002_next.sql", "0001_init.sql", "notes.txt"]),
      readFileFn,
    });

    expect(applied).toEqual(["0002_next.sql"]);
    expect(readFileFn).toHaveBeenCalledTimes(1);
    expect(readFileFn).toHaveBeenCalledWith("/migrations/0002_next.sql", "utf8");
    expect(client.query.mock.calls).toEqual([
      ["BEGIN"],
      ["CREATE TABLE t (id INT);"],
      ["INSERT INTO schema_migrations (filename) VALUES ($1)", ["0002_next.sql"]],
      ["COMMIT"],
    ]);
  });
});
