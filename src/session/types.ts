import type { BuiltQuery } from '../builder/shared/types'
import type { SqlDialect } from '../sql-builder-dialect'
import type { RowMapper, RowReducer } from '../result-transformers'
import type { BoundValue, EncodedRow, Row } from '../types'

export interface InsertMultiResult {
  count: number
  /** Rows from `RETURNING`, empty unless requested. */
  rows: Row[]
}

export interface InsertMultiOptions {
  returning?: boolean
  /** Wraps the execution of each chunk; `run` resolves to rows written. */
  onStatement?: (
    statement: BuiltQuery,
    run: () => Promise<number>,
  ) => Promise<number>
}

/**
 * One database connection (or pool) as the store sees it. Sessions handed
 * to a `withTransaction` callback run every statement inside that
 * transaction.
 */
export interface Session {
  readonly dialect: SqlDialect
  readonly inTransaction: boolean

  executeDDL(sql: string): Promise<void>
  /** Returns the number of affected rows. */
  executeDML(sql: string, params?: readonly BoundValue[]): Promise<number>
  query<T>(
    sql: string,
    params: readonly BoundValue[],
    rowFn: RowMapper<T>,
  ): Promise<T[]>
  /** Streams rows from a cursor into `reduce`; the cursor is always closed. */
  fold<T, TResult>(
    sql: string,
    params: readonly BoundValue[],
    rowFn: RowMapper<T>,
    reduce: RowReducer<T, TResult>,
  ): Promise<TResult>
  insertMulti(
    table: string,
    rows: readonly EncodedRow[],
    options?: InsertMultiOptions,
  ): Promise<InsertMultiResult>
  /** Bulk load of a COPY text file. Only PostgreSQL sessions have it. */
  copyFromFile?(table: string, column: string, path: string): Promise<void>
  /** Nested calls join the transaction already open. */
  withTransaction<T>(fn: (session: Session) => Promise<T>): Promise<T>
  close(): Promise<void>
}
