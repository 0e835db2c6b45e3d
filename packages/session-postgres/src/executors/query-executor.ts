export type QueryRow = Record<string, unknown>;

export interface QueryResult<Row> {
  readonly rows: ReadonlyArray<Row>;
}

export interface QueryExecutor {
  query<Row extends QueryRow = QueryRow>(
    sql: string,
    params?: ReadonlyArray<unknown>,
  ): Promise<QueryResult<Row>>;
}
