export {
  getPostgresClient,
  shutdownPostgresClient,
  withTransaction,
  isUniqueViolation,
  resetPostgresClientForTests,
  UNIQUE_VIOLATION,
} from "./postgres.js";
export type {
  Queryable,
  TransactionClient,
  TransactionalPool,
  PostgresOptions,
  PostgresSingleton,
} from "./postgres.js";
export { runMigrations, defaultMigrationsDir } from "./migrations.js";
export type { RunMigrationsDependencies } from "./migrations.js";
