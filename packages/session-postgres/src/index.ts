export type { QueryExecutor, QueryResult, QueryRow } from "./executors/query-executor.js";
export type { PgQueryable } from "./executors/pg-query-executor.js";
export { createPgQueryExecutor } from "./executors/pg-query-executor.js";
export type {
  TransactionCallback,
  TransactionManagerOptions,
  PostgresConnectionSource,
  PostgresTransactionClient,
} from "./transactions/transaction-manager.js";
export { PostgresTransactionManager } from "./transactions/transaction-manager.js";
export {
  DEFAULT_SESSION_TABLE_NAME,
  sessionMigrations,
  assertTableName,
  loadSessionSchema,
  applySessionSchema,
} from "./migrations/index.js";
export { PostgresSession } from "./postgres-session.js";
export type { PostgresSessionRepositoryOptions } from "./postgres-session-repository.js";
export {
  PostgresSessionRepository,
  createPostgresSessionRepository,
  DEFAULT_CLEANUP_BATCH_SIZE,
} from "./postgres-session-repository.js";
