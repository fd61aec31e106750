// src/builder/shared/validators/type-guards.ts

/**
 * Type Guards and Checks
 * Pure type checking with no business logic
 */

import type { Row, SequenceRecord } from '../../../types'

// ═══════════════════════════════════════════════════════════════
// Basic Type Guards
// ═══════════════════════════════════════════════════════════════

export function isNotNullish<T>(
  value: T | null | undefined,
): value is NonNullable<T> {
  return value !== null && value !== undefined
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0
}

export function isEmptyString(value: unknown): boolean {
  return typeof value === 'string' && value.trim().length === 0
}

export function isNonEmptyArray<T>(
  value: readonly T[] | undefined,
): value is readonly T[] {
  return Array.isArray(value) && value.length > 0
}

export function isPlainObject(val: unknown): val is Record<string, unknown> {
  if (!isNotNullish(val)) return false
  if (Array.isArray(val)) return false
  if (typeof val !== 'object') return false
  return Object.prototype.toString.call(val) === '[object Object]'
}

// ═══════════════════════════════════════════════════════════════
// Row and Record Checks
// ═══════════════════════════════════════════════════════════════

export function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isSequenceRecord(value: unknown): value is SequenceRecord {
  return isPlainObject(value) && typeof value.accession === 'string'
}

export function isBytes(value: unknown): value is Uint8Array {
  return value instanceof Uint8Array
}
