import type { SqlDialect } from './sql-builder-dialect'

/** Values a codec may put in a row. */
export type SqlValue = string | number | boolean | Date | Uint8Array | null

/** Values callers may bind to a placeholder. */
export type SqlParam = SqlValue | bigint

/** Values after normalization, as handed to a driver. */
export type BoundValue = string | number | boolean | Uint8Array | null

/** A result row as the driver returns it. */
export type Row = Record<string, unknown>

/** A row produced by a codec's encoder. */
export type EncodedRow = Record<string, SqlValue>

/**
 * A domain record. Only `accession` is known to the store; every other
 * field belongs to the record type's codec.
 */
export interface SequenceRecord {
  accession: string
  [field: string]: unknown
}

/**
 * Result-set level reducer. Receives the decoded records as they are read
 * from the cursor; whatever it returns is the result of the call.
 */
export type ApplyFunc<TResult> = (
  records: AsyncIterable<SequenceRecord>,
) => TResult | Promise<TResult>

export interface QueryModifiers {
  /** Output columns. Bare names are qualified with the target table. */
  select?: readonly string[]
  /** Raw predicate ANDed after the accession condition, `?` placeholders. */
  where?: string
  /** Values for the placeholders in `where`, in order. */
  parameters?: readonly SqlParam[]
  /** Raw join clause spliced after the target table. Not sanitized. */
  join?: string
  /** Raw ORDER BY expression(s). */
  order?: string | readonly string[]
  offset?: number
  limit?: number
}

export interface ReducingModifiers<TResult> extends QueryModifiers {
  applyFunc: ApplyFunc<TResult>
}

export interface SqlResult {
  sql: string
  params?: readonly SqlParam[]
}

export type QueryStrategy = 'direct' | 'staged' | 'raw' | 'write' | 'ddl'

export interface QueryInfo {
  dialect: SqlDialect
  operation: string
  strategy: QueryStrategy
  table?: string
  tag?: string
  sql: string
  params: readonly unknown[]
  rowCount?: number
  duration: number
}

export interface InsertOptions {
  returning?: boolean
}
