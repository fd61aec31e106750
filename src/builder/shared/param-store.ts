import type { SqlDialect } from '../../sql-builder-dialect'
import type { BoundValue, SqlParam } from '../../types'
import { normalizeValue } from '../../utils/normalize-value'
import type { ParamStore } from './types'

const MAX_PARAM_INDEX = Number.MAX_SAFE_INTEGER - 1000

function assertCanAddParam(currentIndex: number): void {
  if (currentIndex > MAX_PARAM_INDEX) {
    throw new Error(
      `CRITICAL: Cannot add param - would overflow MAX_SAFE_INTEGER. Current index: ${currentIndex}`,
    )
  }
}

const POSTGRES_POSITION_CACHE: string[] = new Array(500)
for (let i = 0; i < 500; i++) {
  POSTGRES_POSITION_CACHE[i] = `$${i + 1}`
}

function formatPositionPostgres(position: number): string {
  if (position <= 500) return POSTGRES_POSITION_CACHE[position - 1]
  return `$${position}`
}

function formatPositionSqlite(_position: number): string {
  return '?'
}

type ScanMode = 'normal' | 'single' | 'double' | 'lineComment' | 'blockComment'

/**
 * Rewrites every `?` placeholder of a raw SQL fragment. Placeholders inside
 * string literals, quoted identifiers and comments are left alone.
 */
export function replaceQuestionPlaceholders(
  sql: string,
  replace: () => string,
): { sql: string; count: number } {
  const s = String(sql)
  const n = s.length
  let i = 0
  let mode: ScanMode = 'normal'
  let out = ''
  let count = 0

  while (i < n) {
    const ch = s.charCodeAt(i)

    if (mode === 'normal') {
      if (ch === 39) {
        mode = 'single'
      } else if (ch === 34) {
        mode = 'double'
      } else if (ch === 45 && s.charCodeAt(i + 1) === 45) {
        out += '--'
        mode = 'lineComment'
        i += 2
        continue
      } else if (ch === 47 && s.charCodeAt(i + 1) === 42) {
        out += '/*'
        mode = 'blockComment'
        i += 2
        continue
      } else if (ch === 63) {
        count++
        out += replace()
        i++
        continue
      }

      out += s[i]
      i++
      continue
    }

    if (mode === 'single' || mode === 'double') {
      const quoteCode = mode === 'single' ? 39 : 34
      out += s[i]
      if (ch === quoteCode) {
        if (s.charCodeAt(i + 1) === quoteCode) {
          out += s[i + 1]
          i += 2
          continue
        }
        mode = 'normal'
      }
      i++
      continue
    }

    if (mode === 'lineComment') {
      out += s[i]
      if (ch === 10) mode = 'normal'
      i++
      continue
    }

    if (ch === 42 && s.charCodeAt(i + 1) === 47) {
      out += '*/'
      mode = 'normal'
      i += 2
      continue
    }

    out += s[i]
    i++
  }

  return { sql: out, count }
}

export function createParamStore(
  dialect: SqlDialect,
  startIndex = 1,
): ParamStore {
  if (!Number.isInteger(startIndex) || startIndex < 1) {
    throw new Error(`Start index must be integer >= 1, got ${startIndex}`)
  }

  let index = startIndex
  const params: BoundValue[] = []

  const formatPosition =
    dialect === 'sqlite' ? formatPositionSqlite : formatPositionPostgres

  function add(value: SqlParam): string {
    assertCanAddParam(index)
    const position = index
    params.push(normalizeValue(value, dialect))
    index++
    return formatPosition(position)
  }

  function addFragment(fragment: string, values: readonly SqlParam[]): string {
    let next = 0
    const { sql, count } = replaceQuestionPlaceholders(fragment, () => {
      const value = values[next]
      next++
      return value === undefined ? '?' : add(value)
    })

    if (count !== values.length) {
      throw new Error(
        `Parameter mismatch - fragment has ${count} placeholder(s) but ${values.length} parameter(s) were given: ${fragment}`,
      )
    }

    return sql
  }

  function snapshot(): BoundValue[] {
    return params.slice()
  }

  return {
    add,
    addFragment,
    snapshot,
    get index() {
      return index
    },
    get dialect() {
      return dialect
    },
  }
}
