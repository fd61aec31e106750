import type { SqlParam } from '../types'
import type { ParamStore } from './shared/types'
import { isNonEmptyString } from './shared/validators/type-guards'

/**
 * Binds the caller's raw predicate. The fragment is written with `?`
 * placeholders and comes back parenthesized, renumbered for the store's
 * dialect. Returns '' when there is no predicate.
 */
export function buildWhereFragment(
  store: ParamStore,
  where: string | undefined,
  parameters: readonly SqlParam[] = [],
): string {
  if (!isNonEmptyString(where)) {
    if (parameters.length > 0) {
      throw new Error(
        `Got ${parameters.length} parameter(s) without a where clause`,
      )
    }
    return ''
  }

  return `(${store.addFragment(where.trim(), parameters)})`
}
