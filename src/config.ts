import Database from 'better-sqlite3'
import postgres from 'postgres'
import { createError } from './builder/shared/errors'
import {
  isNonEmptyString,
  isNotNullish,
} from './builder/shared/validators/type-guards'
import { createPostgresSession } from './session/postgres'
import { createSqliteSession } from './session/sqlite'
import type { Session } from './session/types'
import {
  SQL_DIALECTS,
  isSqlDialect,
  type SqlDialect,
} from './sql-builder-dialect'

export interface ConnectionParams {
  dbtype: SqlDialect
  /** Database name on PostgreSQL; file path or `:memory:` on SQLite. */
  dbname: string
  user?: string
  password?: string
  /** Defaults to 5432. */
  port?: number
  /** Server host. Defaults to 127.0.0.1. */
  domain?: string
  /** Pool size for PostgreSQL. */
  max?: number
}

export const DEFAULT_PORT = 5432
export const DEFAULT_DOMAIN = '127.0.0.1'

const CTX = { operation: 'connect' }

function assertPositiveInt(name: string, value: unknown, max?: number) {
  if (!isNotNullish(value)) return
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw createError(
      `${name} must be a positive integer`,
      CTX,
      'CONFIG_ERROR',
    )
  }
  if (max !== undefined && value > max) {
    throw createError(`${name} must be <= ${max}`, CTX, 'CONFIG_ERROR')
  }
}

/**
 * Checks the parameters before any connection is attempted. Throws
 * `ConfigError` naming the first problem found.
 */
export function validateConnectionParams(params: ConnectionParams): void {
  if (!isSqlDialect(params.dbtype)) {
    throw createError(
      `Must specify database type (dbtype): one of ${SQL_DIALECTS.join(', ')}`,
      CTX,
      'CONFIG_ERROR',
    )
  }

  if (!isNonEmptyString(params.dbname)) {
    throw createError(
      'Must specify database name (dbname)',
      CTX,
      'CONFIG_ERROR',
    )
  }

  if (params.dbtype === 'postgres') {
    if (!isNonEmptyString(params.user) || !isNonEmptyString(params.password)) {
      throw createError(
        'PostgreSQL connections need both user and password',
        CTX,
        'CONFIG_ERROR',
      )
    }
  }

  assertPositiveInt('port', params.port, 65535)
  assertPositiveInt('max', params.max)
}

/** Validates `params` and opens a session on the matching backend. */
export function connect(params: ConnectionParams): Session {
  validateConnectionParams(params)

  if (params.dbtype === 'sqlite') {
    return createSqliteSession(new Database(params.dbname))
  }

  const sql = postgres({
    host: params.domain ?? DEFAULT_DOMAIN,
    port: params.port ?? DEFAULT_PORT,
    database: params.dbname,
    username: params.user,
    password: params.password,
    max: params.max,
  })

  return createPostgresSession(sql)
}
