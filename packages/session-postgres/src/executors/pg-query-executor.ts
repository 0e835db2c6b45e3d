import type { QueryResult as PgQueryResult, QueryResultRow } from "pg";

import type { QueryExecutor, QueryResult, QueryRow } from "./query-executor.js";

/**
 * The part of a `pg` Pool or PoolClient the repository queries through.
 */
export interface PgQueryable {
  query<Row extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<PgQueryResult<Row>>;
}

export const createPgQueryExecutor = (queryable: PgQueryable): QueryExecutor => ({
  async query<Row extends QueryRow = QueryRow>(
    sql: string,
    params: ReadonlyArray<unknown> = [],
  ): Promise<QueryResult<Row>> {
    const { rows } = await queryable.query<Row>(sql, [...params]);
    return { rows };
  },
});
