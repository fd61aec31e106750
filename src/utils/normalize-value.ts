import type { SqlDialect } from '../sql-builder-dialect'
import type { BoundValue, SqlParam } from '../types'

/**
 * Normalize values for SQL params.
 *
 * better-sqlite3 binds neither booleans nor dates, so both become their
 * numeric / ISO text forms there; postgres takes booleans as they are.
 */
export function normalizeValue(
  value: SqlParam,
  dialect: SqlDialect,
): BoundValue {
  // 1. Date → ISO string (with validation)
  if (value instanceof Date) {
    const t = value.getTime()
    if (!Number.isFinite(t)) {
      throw new Error('Invalid Date value in SQL params')
    }
    return value.toISOString()
  }

  // 2. BigInt → string
  if (typeof value === 'bigint') {
    return value.toString()
  }

  // 3. Boolean → 1/0 on sqlite
  if (typeof value === 'boolean' && dialect === 'sqlite') {
    return value ? 1 : 0
  }

  return value
}

export function normalizeParams(
  values: readonly SqlParam[],
  dialect: SqlDialect,
): BoundValue[] {
  return values.map((v) => normalizeValue(v, dialect))
}
