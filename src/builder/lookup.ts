import type { SqlDialect } from '../sql-builder-dialect'
import type { QueryModifiers } from '../types'
import { buildPagination } from './pagination'
import { buildOrderClause, buildProjection } from './select'
import { ACCESSION_COLUMN, SQL_SEPARATORS } from './shared/constants'
import { createParamStore } from './shared/param-store'
import { assertSafeTableRef } from './shared/sql-utils'
import type { BuiltQuery, ParamStore } from './shared/types'
import { isNonEmptyString } from './shared/validators/type-guards'
import { buildWhereFragment } from './where'

function joinClause(join: string | undefined): string {
  return isNonEmptyString(join) ? join.trim() : ''
}

function assembleSelect(
  table: string,
  modifiers: QueryModifiers,
  conditions: string[],
  store: ParamStore,
  extraJoin = '',
): string {
  const where = buildWhereFragment(
    store,
    modifiers.where,
    modifiers.parameters,
  )
  if (where) conditions.push(where)

  const parts = [
    `SELECT ${buildProjection(table, modifiers.select)}`,
    `FROM ${table}`,
  ]

  const join = joinClause(modifiers.join)
  if (join) parts.push(join)
  if (extraJoin) parts.push(extraJoin)

  if (conditions.length > 0) {
    parts.push(`WHERE ${conditions.join(SQL_SEPARATORS.CONDITION_AND)}`)
  }

  const order = buildOrderClause(modifiers.order)
  if (order) parts.push(order)

  const page = buildPagination(store, modifiers.offset, modifiers.limit)
  if (page) parts.push(page)

  return parts.join(SQL_SEPARATORS.CLAUSE)
}

/**
 * Accessions are bound one placeholder each, as given: duplicates stay and
 * the order of the list does not matter to the result.
 */
export function buildDirectLookup(
  table: string,
  accessions: readonly string[],
  modifiers: QueryModifiers,
  dialect: SqlDialect,
): BuiltQuery {
  assertSafeTableRef(table)
  if (accessions.length === 0) {
    throw new Error('buildDirectLookup requires at least one accession')
  }

  const store = createParamStore(dialect)
  const placeholders = accessions.map((accession) => store.add(accession))
  const inList = `${table}.${ACCESSION_COLUMN} IN (${placeholders.join(SQL_SEPARATORS.FIELD_LIST)})`

  const sql = assembleSelect(table, modifiers, [inList], store)
  return { sql, params: store.snapshot() }
}

/** Same shape as the direct lookup, filtered by joining the staging table. */
export function buildStagedLookup(
  table: string,
  staging: string,
  modifiers: QueryModifiers,
  dialect: SqlDialect,
): BuiltQuery {
  assertSafeTableRef(table)
  assertSafeTableRef(staging)

  const store = createParamStore(dialect)
  const stagingJoin = `INNER JOIN ${staging} ON ${table}.${ACCESSION_COLUMN} = ${staging}.${ACCESSION_COLUMN}`

  const sql = assembleSelect(table, modifiers, [], store, stagingJoin)
  return { sql, params: store.snapshot() }
}
