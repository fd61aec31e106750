import { paginationClause } from '../sql-builder-dialect'
import type { ParamStore } from './shared/types'

const MAX_LIMIT_OFFSET = 2147483647

export function assertPageValue(
  name: 'offset' | 'limit',
  value: unknown,
): number | undefined {
  if (value === undefined || value === null) return undefined

  if (
    typeof value !== 'number' ||
    !Number.isFinite(value) ||
    !Number.isInteger(value)
  ) {
    throw new Error(`${name} must be an integer`)
  }
  if (value < 0) {
    throw new Error(`${name} must be >= 0`)
  }
  if (value > MAX_LIMIT_OFFSET) {
    throw new Error(`${name} must be <= ${MAX_LIMIT_OFFSET}`)
  }

  return value
}

/** Offset is always bound before limit. */
export function buildPagination(
  store: ParamStore,
  offset: unknown,
  limit: unknown,
): string {
  const offsetValue = assertPageValue('offset', offset)
  const limitValue = assertPageValue('limit', limit)

  const offsetPlaceholder =
    offsetValue === undefined ? undefined : store.add(offsetValue)
  const limitPlaceholder =
    limitValue === undefined ? undefined : store.add(limitValue)

  return paginationClause(offsetPlaceholder, limitPlaceholder, store.dialect)
}
