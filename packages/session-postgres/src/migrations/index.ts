import { readFile } from "node:fs/promises";

import { InvalidArgumentError } from "@strata-session/contracts";

import type { QueryExecutor } from "../executors/query-executor.js";

export const DEFAULT_SESSION_TABLE_NAME = "strata_sessions";

const TABLE_NAME_PLACEHOLDER = /%TABLE_NAME%/g;
const tableNamePattern = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const sessionMigrations = [
  {
    id: "0001_session_schema",
    filename: "0001_session_schema.sql",
    description: "Session table plus one row per attribute",
  },
] as const;

export const assertTableName = (tableName: string): string => {
  if (!tableNamePattern.test(tableName)) {
    throw new InvalidArgumentError(`Invalid session table name '${tableName}'.`, { tableName });
  }
  return tableName;
};

/**
 * Reads every migration with the table placeholder filled in.
 */
export const loadSessionSchema = async (tableName: string = DEFAULT_SESSION_TABLE_NAME): Promise<string> => {
  const table = assertTableName(tableName);
  const statements: string[] = [];
  for (const migration of sessionMigrations) {
    const sql = await readFile(new URL(`./${migration.filename}`, import.meta.url), "utf8");
    statements.push(sql.replace(TABLE_NAME_PLACEHOLDER, table));
  }
  return statements.join("\n");
};

export const applySessionSchema = async (
  executor: QueryExecutor,
  tableName: string = DEFAULT_SESSION_TABLE_NAME,
): Promise<void> => {
  const statements = (await loadSessionSchema(tableName))
    .split(";")
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
  for (const statement of statements) {
    await executor.query(statement);
  }
};
