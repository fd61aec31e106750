import { isEmptyString, isNonEmptyString } from './validators/type-guards'
import { REGEX_CACHE, SQL_KEYWORDS } from './constants'

function containsControlChars(s: string): boolean {
  for (let i = 0; i < s.length; i++) {
    const code = s.charCodeAt(i)
    if ((code >= 0 && code <= 31) || code === 127) {
      return true
    }
  }
  return false
}

function assertNoControlChars(label: string, s: string): void {
  if (containsControlChars(s)) {
    throw new Error(
      `${label} contains invalid characters: ${JSON.stringify(s)}`,
    )
  }
}

function quoteRawIdent(id: string): string {
  return `"${id.replace(/"/g, '""')}"`
}

function isIdentCharCode(c: number): boolean {
  return (
    (c >= 48 && c <= 57) ||
    (c >= 65 && c <= 90) ||
    (c >= 97 && c <= 122) ||
    c === 95
  )
}

function isIdentStartCharCode(c: number): boolean {
  return (c >= 65 && c <= 90) || (c >= 97 && c <= 122) || c === 95
}

const MAX_PARSE_ITERATIONS = 10000

function parseQuotedPart(input: string, start: number): number {
  const n = input.length
  let i = start + 1
  let sawAny = false
  let iterations = 0

  while (i < n) {
    if (++iterations > MAX_PARSE_ITERATIONS) {
      throw new Error('Table name parsing exceeded complexity limit')
    }

    const c = input.charCodeAt(i)
    if (c === 34) {
      const next = i + 1
      if (next < n && input.charCodeAt(next) === 34) {
        sawAny = true
        i += 2
        continue
      }
      if (!sawAny) {
        throw new Error(
          `qualified name has empty quoted identifier part: ${JSON.stringify(input)}`,
        )
      }
      return i + 1
    }
    if (c === 10 || c === 13 || c === 0) {
      throw new Error(
        `qualified name contains invalid characters: ${JSON.stringify(input)}`,
      )
    }
    sawAny = true
    i++
  }

  throw new Error(
    `qualified name has unterminated quoted identifier: ${JSON.stringify(input)}`,
  )
}

function parseUnquotedPart(input: string, start: number): number {
  const n = input.length
  let i = start

  if (i >= n) {
    throw new Error(`qualified name is invalid: ${JSON.stringify(input)}`)
  }

  const c0 = input.charCodeAt(i)
  if (!isIdentStartCharCode(c0)) {
    throw new Error(
      `qualified name must use identifiers (or quoted identifiers). Got: ${JSON.stringify(input)}`,
    )
  }
  i++

  while (i < n) {
    const c = input.charCodeAt(i)
    if (c === 46) break
    if (!isIdentCharCode(c)) {
      throw new Error(
        `qualified name contains invalid identifier characters: ${JSON.stringify(input)}`,
      )
    }
    i++
  }

  return i
}

function parseQualifiedNameParts(label: string, trimmed: string): void {
  let i = 0
  const n = trimmed.length
  let parts = 0

  while (i < n) {
    if (trimmed.charCodeAt(i) === 46) {
      throw new Error(
        `${label} has empty identifier part: ${JSON.stringify(trimmed)}`,
      )
    }

    i =
      trimmed.charCodeAt(i) === 34
        ? parseQuotedPart(trimmed, i)
        : parseUnquotedPart(trimmed, i)

    parts++
    if (parts > 2) {
      throw new Error(
        `${label} must be 'name' or 'qualifier.name' (max 2 parts). Got: ${JSON.stringify(trimmed)}`,
      )
    }

    if (i === n) break

    if (trimmed.charCodeAt(i) !== 46) {
      throw new Error(`${label} is invalid: ${JSON.stringify(trimmed)}`)
    }
    i++

    if (i === n) {
      throw new Error(
        `${label} cannot end with '.': ${JSON.stringify(trimmed)}`,
      )
    }
  }
}

function assertSafeQualifiedName(label: string, input: string): void {
  const raw = String(input)
  const trimmed = raw.trim()

  if (trimmed.length === 0) {
    throw new Error(`${label} is required and cannot be empty`)
  }

  if (raw !== trimmed) {
    throw new Error(
      `${label} must not contain leading/trailing whitespace: ${JSON.stringify(raw)}`,
    )
  }

  assertNoControlChars(label, trimmed)
  parseQualifiedNameParts(label, trimmed)
}

export function needsQuoting(id: string): boolean {
  if (!isNonEmptyString(id)) return true
  if (SQL_KEYWORDS.has(id.toLowerCase())) return true
  return !REGEX_CACHE.VALID_IDENTIFIER.test(id)
}

export function quote(id: string): string {
  if (isEmptyString(id)) {
    throw new Error('quote: identifier is required and cannot be empty')
  }

  assertNoControlChars('quote: identifier', id)

  if (needsQuoting(id)) {
    return quoteRawIdent(id)
  }

  return id
}

/** Accepts `table` or `schema.table`, plain or double-quoted. */
export function assertSafeTableRef(tableRef: string): void {
  assertSafeQualifiedName('table name', tableRef)
}

/**
 * Bare column names are qualified with `table`; `alias.column` references
 * are validated and kept as written.
 */
export function qualifyColumn(table: string, column: string): string {
  if (column.includes('.')) {
    assertSafeQualifiedName('column reference', column)
    return column
  }
  return `${table}.${quote(column)}`
}
