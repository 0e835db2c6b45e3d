import { InvalidArgumentError } from "@strata-session/contracts";
import { createStrataLogger, describeError, type StrataLogger } from "@strata-session/telemetry";

import { createPgQueryExecutor, type PgQueryable } from "../executors/pg-query-executor.js";
import type { QueryExecutor } from "../executors/query-executor.js";

export type TransactionCallback<T> = (executor: QueryExecutor) => Promise<T>;

export interface PostgresTransactionClient extends PgQueryable {
  release(): void;
}

/**
 * Satisfied by a `pg` Pool.
 */
export interface PostgresConnectionSource {
  connect(): Promise<PostgresTransactionClient>;
}

export interface TransactionManagerOptions {
  readonly pool?: PostgresConnectionSource;
  readonly executor?: QueryExecutor;
  readonly logger?: StrataLogger;
}

type TransactionTarget =
  | { readonly kind: "pool"; readonly pool: PostgresConnectionSource }
  | { readonly kind: "inline"; readonly executor: QueryExecutor };

/**
 * Runs callbacks inside BEGIN/COMMIT on a dedicated pool client. Without a
 * pool the callback runs inline on the given executor, which is how the
 * in-process test database is driven.
 */
export class PostgresTransactionManager {
  private readonly target: TransactionTarget;
  private readonly logger: StrataLogger;

  constructor(options: TransactionManagerOptions) {
    if (options.pool) {
      this.target = { kind: "pool", pool: options.pool };
    } else if (options.executor) {
      this.target = { kind: "inline", executor: options.executor };
    } else {
      throw new InvalidArgumentError("PostgresTransactionManager requires a pool or query executor.");
    }
    this.logger = options.logger ?? createStrataLogger({ name: "session-postgres" });
  }

  async runInTransaction<T>(callback: TransactionCallback<T>): Promise<T> {
    if (this.target.kind === "inline") {
      return callback(this.target.executor);
    }

    const client = await this.target.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await callback(createPgQueryExecutor(client));
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await this.rollback(client, error);
      throw error;
    } finally {
      client.release();
    }
  }

  private async rollback(client: PostgresTransactionClient, cause: unknown): Promise<void> {
    try {
      await client.query("ROLLBACK");
      this.logger.warn("postgres.transaction.rolled_back", { error: describeError(cause) });
    } catch (rollbackError) {
      this.logger.error("postgres.transaction.rollback_failed", {
        error: describeError(rollbackError),
        cause: describeError(cause),
      });
    }
  }
}
