import { randomUUID } from 'node:crypto'
import {
  MAX_IDENTIFIER_LENGTH,
  SQL_KEYWORDS,
  STAGING_TABLE_PREFIX,
} from './constants'

function toSafeSqlIdentifier(input: string): string {
  const raw = String(input)
  const n = raw.length

  let out = ''
  for (let i = 0; i < n; i++) {
    const c = raw.charCodeAt(i)
    const isAZ = (c >= 65 && c <= 90) || (c >= 97 && c <= 122)
    const is09 = c >= 48 && c <= 57
    const isUnderscore = c === 95

    if (isAZ || is09 || isUnderscore) {
      out += raw[i]
    } else {
      out += '_'
    }
  }

  if (out.length === 0) out = '_t'

  const c0 = out.charCodeAt(0)
  const startsOk =
    (c0 >= 65 && c0 <= 90) || (c0 >= 97 && c0 <= 122) || c0 === 95
  if (!startsOk) out = `_${out}`

  const lowered = out.toLowerCase()
  return SQL_KEYWORDS.has(lowered) ? `_${lowered}` : lowered
}

/** `<prefix>_<uuid hex>`, clipped to the identifier length limit. */
export function createStagingName(
  prefix: string = STAGING_TABLE_PREFIX,
): string {
  const base = toSafeSqlIdentifier(prefix)
  const suffix = `_${randomUUID().replace(/-/g, '')}`
  const baseMax = Math.max(1, MAX_IDENTIFIER_LENGTH - suffix.length)
  const trimmedBase = base.length > baseMax ? base.slice(0, baseMax) : base

  return `${trimmedBase}${suffix}`
}
