export type SqlDialect = 'postgres' | 'sqlite'

/** How a backend fills a staging table. */
export type StagingStrategy = 'copy' | 'insert'

export const SQL_DIALECTS: readonly SqlDialect[] = ['postgres', 'sqlite']

export function isSqlDialect(value: unknown): value is SqlDialect {
  return value === 'postgres' || value === 'sqlite'
}

function assertNonEmpty(value: string, name: string): void {
  if (!value || value.trim().length === 0) {
    throw new Error(`${name} is required and cannot be empty`)
  }
}

export function binaryColumnType(dialect: SqlDialect): string {
  return dialect === 'postgres' ? 'bytea' : 'blob'
}

export function stagingStrategy(dialect: SqlDialect): StagingStrategy {
  return dialect === 'postgres' ? 'copy' : 'insert'
}

/** Bound values allowed in one statement. */
export function getParamLimit(dialect: SqlDialect): number {
  return dialect === 'postgres' ? 32000 : 900
}

export function createTempTable(
  name: string,
  column: string,
  dialect: SqlDialect,
): string {
  assertNonEmpty(name, 'createTempTable name')

  if (dialect === 'postgres') {
    return `CREATE TEMP TABLE ${name} (${column} text) ON COMMIT DROP`
  }

  return `CREATE TEMP TABLE ${name} (${column} text)`
}

export function dropTempTable(name: string, dialect: SqlDialect): string {
  assertNonEmpty(name, 'dropTempTable name')

  if (dialect === 'postgres') {
    return `DROP TABLE IF EXISTS ${name}`
  }

  return `DROP TABLE IF EXISTS temp.${name}`
}

export function copyFromStdin(table: string, column: string): string {
  assertNonEmpty(table, 'copyFromStdin table')
  return `COPY ${table} (${column}) FROM STDIN`
}

/**
 * Renders the paging clause from already-allocated placeholders. SQLite has
 * no bare OFFSET, so it takes the `LIMIT offset, count` form, which keeps
 * the offset placeholder ahead of the limit one on both backends.
 */
export function paginationClause(
  offset: string | undefined,
  limit: string | undefined,
  dialect: SqlDialect,
): string {
  if (dialect === 'postgres') {
    const parts: string[] = []
    if (offset !== undefined) parts.push(`OFFSET ${offset}`)
    if (limit !== undefined) parts.push(`LIMIT ${limit}`)
    return parts.join(' ')
  }

  if (offset !== undefined && limit !== undefined) {
    return `LIMIT ${offset}, ${limit}`
  }
  if (offset !== undefined) return `LIMIT ${offset}, -1`
  if (limit !== undefined) return `LIMIT ${limit}`
  return ''
}

export function returningClause(columns: readonly string[]): string {
  if (columns.length === 0) return ''
  return ` RETURNING ${columns.join(', ')}`
}
