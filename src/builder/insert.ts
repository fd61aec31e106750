import { getParamLimit, returningClause } from '../sql-builder-dialect'
import type { SqlDialect } from '../sql-builder-dialect'
import type { EncodedRow } from '../types'
import { chunkArray } from './shared/array-utils'
import { ACCESSION_COLUMN, SQL_SEPARATORS } from './shared/constants'
import { createParamStore } from './shared/param-store'
import { assertSafeTableRef, quote } from './shared/sql-utils'
import type { BuiltQuery } from './shared/types'

export interface InsertBuildOptions {
  returning?: boolean
}

/** Union of the rows' keys, in first-seen order. */
export function collectColumns(rows: readonly EncodedRow[]): string[] {
  const seen = new Set<string>()
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key)
  }
  return [...seen]
}

/**
 * One multi-row INSERT per chunk, each chunk sized to stay under the
 * backend's bound-parameter limit. Columns a row lacks are bound as NULL.
 */
export function buildInsertMulti(
  table: string,
  rows: readonly EncodedRow[],
  dialect: SqlDialect,
  options: InsertBuildOptions = {},
): BuiltQuery[] {
  assertSafeTableRef(table)
  if (rows.length === 0) return []

  const columns = collectColumns(rows)
  if (columns.length === 0) {
    throw new Error('Cannot insert rows without columns')
  }

  const columnList = columns.map(quote).join(SQL_SEPARATORS.FIELD_LIST)
  const returning = options.returning
    ? returningClause([quote(ACCESSION_COLUMN)])
    : ''
  const rowsPerStatement = Math.max(
    1,
    Math.floor(getParamLimit(dialect) / columns.length),
  )

  return chunkArray(rows, rowsPerStatement).map((chunk) => {
    const store = createParamStore(dialect)
    const tuples = chunk.map((row) => {
      const values = columns.map((column) => store.add(row[column] ?? null))
      return `(${values.join(SQL_SEPARATORS.FIELD_LIST)})`
    })

    return {
      sql: `INSERT INTO ${table} (${columnList}) VALUES ${tuples.join(SQL_SEPARATORS.FIELD_LIST)}${returning}`,
      params: store.snapshot(),
    }
  })
}
