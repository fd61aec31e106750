import { SQL_SEPARATORS } from './shared/constants'
import { qualifyColumn } from './shared/sql-utils'
import { isNonEmptyArray } from './shared/validators/type-guards'

/** `*` unless columns are requested; bare names get the table prefix. */
export function buildProjection(
  table: string,
  select?: readonly string[],
): string {
  if (!isNonEmptyArray(select)) return '*'

  const columns: string[] = []
  for (const column of select) {
    columns.push(qualifyColumn(table, column.trim()))
  }

  return columns.join(SQL_SEPARATORS.FIELD_LIST)
}

export function buildOrderClause(
  order: string | readonly string[] | undefined,
): string {
  if (order === undefined) return ''

  const parts = (typeof order === 'string' ? [order] : order)
    .map((part) => part.trim())
    .filter((part) => part.length > 0)

  if (parts.length === 0) return ''
  return `ORDER BY ${parts.join(SQL_SEPARATORS.FIELD_LIST)}`
}
