import type { QueryResult as PgQueryResult, QueryResultRow } from "pg";
import { describe, expect, it, vi } from "vitest";

import { InvalidArgumentError } from "@strata-session/contracts";
import type { StrataLogger } from "@strata-session/telemetry";

import {
  PostgresTransactionManager,
  type PostgresConnectionSource,
  type PostgresTransactionClient,
  type QueryExecutor,
} from "../src/index.js";

class RecordingClient implements PostgresTransactionClient {
  readonly statements: string[] = [];
  released = 0;

  constructor(private readonly failOn?: string) {}

  async query<Row extends QueryResultRow = QueryResultRow>(text: string): Promise<PgQueryResult<Row>> {
    this.statements.push(text);
    if (text === this.failOn) {
      throw new Error(`${text} failed`);
    }
    return { command: text, rowCount: 0, oid: 0, fields: [], rows: [] };
  }

  release(): void {
    this.released += 1;
  }
}

const poolFor = (client: RecordingClient): PostgresConnectionSource => ({
  connect: async () => client,
});

const createLogger = () => {
  const logger: StrataLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
};

describe("PostgresTransactionManager", () => {
  it("requires a pool or an executor", () => {
    const attempt = () => new PostgresTransactionManager({});

    expect(attempt).toThrow(InvalidArgumentError);
    expect(attempt).toThrow("PostgresTransactionManager requires a pool or query executor.");
  });

  it("wraps the callback in BEGIN and COMMIT on a pooled client", async () => {
    const client = new RecordingClient();
    const manager = new PostgresTransactionManager({ pool: poolFor(client), logger: createLogger() });

    const result = await manager.runInTransaction(async (executor) => {
      await executor.query("SELECT 1");
      return "done";
    });

    expect(result).toBe("done");
    expect(client.statements).toEqual(["BEGIN", "SELECT 1", "COMMIT"]);
    expect(client.released).toBe(1);
  });

  it("rolls back and releases the client when the callback fails", async () => {
    const client = new RecordingClient("INSERT");
    const logger = createLogger();
    const manager = new PostgresTransactionManager({ pool: poolFor(client), logger });

    await expect(
      manager.runInTransaction(async (executor) => {
        await executor.query("INSERT");
      }),
    ).rejects.toThrow("INSERT failed");

    expect(client.statements).toEqual(["BEGIN", "INSERT", "ROLLBACK"]);
    expect(client.released).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith("postgres.transaction.rolled_back", { error: "INSERT failed" });
  });

  it("logs a failed rollback and rethrows the original error", async () => {
    const client = new RecordingClient("ROLLBACK");
    const logger = createLogger();
    const manager = new PostgresTransactionManager({ pool: poolFor(client), logger });

    await expect(
      manager.runInTransaction(async () => {
        throw new Error("write failed");
      }),
    ).rejects.toThrow("write failed");

    expect(client.statements).toEqual(["BEGIN", "ROLLBACK"]);
    expect(logger.error).toHaveBeenCalledWith("postgres.transaction.rollback_failed", {
      error: "ROLLBACK failed",
      cause: "write failed",
    });
    expect(client.released).toBe(1);
  });

  it("runs the callback inline on an executor without a pool", async () => {
    const executor: QueryExecutor = { query: vi.fn(async () => ({ rows: [] })) };
    const manager = new PostgresTransactionManager({ executor });

    await manager.runInTransaction(async (inline) => {
      await inline.query("SELECT 1");
    });

    expect(executor.query).toHaveBeenCalledWith("SELECT 1");
  });
});
