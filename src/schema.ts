import type { SchemaDescriptor } from './codec/types'
import { BINARY_PLACEHOLDER, SQL_SEPARATORS } from './builder/shared/constants'
import { assertSafeTableRef, quote } from './builder/shared/sql-utils'
import { isNonEmptyString } from './builder/shared/validators/type-guards'
import { binaryColumnType, type SqlDialect } from './sql-builder-dialect'

/**
 * Column definitions for `schema` on `dialect`. The `binary` placeholder
 * becomes the backend's binary type; every other column type passes through.
 */
export function materializeSchema(
  schema: SchemaDescriptor,
  dialect: SqlDialect,
): string[] {
  return schema.map((column) => {
    const type =
      column.type === BINARY_PLACEHOLDER ? binaryColumnType(dialect) : column.type

    const parts = [quote(column.name), type]
    if (isNonEmptyString(column.constraints)) parts.push(column.constraints)

    return parts.join(' ')
  })
}

export function createTableDDL(
  table: string,
  schema: SchemaDescriptor,
  dialect: SqlDialect,
): string {
  assertSafeTableRef(table)
  const columns = materializeSchema(schema, dialect)
  return `CREATE TABLE ${table} (${columns.join(SQL_SEPARATORS.FIELD_LIST)})`
}
