import type { SqlDialect } from '../../sql-builder-dialect'
import type { BoundValue, SqlParam } from '../../types'

export interface ErrorContext {
  operation?: string
  table?: string
  tag?: string
}

export interface BuiltQuery {
  readonly sql: string
  readonly params: BoundValue[]
}

export interface ParamStore {
  add(value: SqlParam): string
  addFragment(fragment: string, values: readonly SqlParam[]): string
  snapshot(): BoundValue[]
  readonly index: number
  readonly dialect: SqlDialect
}
