import type { ErrorContext } from './types'
import { isNotNullish } from './validators/type-guards'

export type StoreErrorCode =
  | 'CONFIG_ERROR'
  | 'UNKNOWN_TYPE'
  | 'DECODE_ERROR'
  | 'ENCODE_ERROR'
  | 'QUERY_ERROR'
  | 'STAGING_ERROR'
  | 'WRITE_ERROR'

interface StoreErrorOptions {
  cause?: unknown
}

export class StoreError extends Error {
  public readonly code: StoreErrorCode
  public readonly context?: ErrorContext

  constructor(
    message: string,
    code: StoreErrorCode,
    context?: ErrorContext,
    options?: StoreErrorOptions,
  ) {
    super(message, options)
    this.name = 'StoreError'
    this.code = code
    this.context = context
  }
}

export class ConfigError extends StoreError {
  constructor(
    message: string,
    context?: ErrorContext,
    options?: StoreErrorOptions,
  ) {
    super(message, 'CONFIG_ERROR', context, options)
    this.name = 'ConfigError'
  }
}

export class UnknownTypeError extends StoreError {
  constructor(
    message: string,
    context?: ErrorContext,
    options?: StoreErrorOptions,
  ) {
    super(message, 'UNKNOWN_TYPE', context, options)
    this.name = 'UnknownTypeError'
  }
}

export class DecodeError extends StoreError {
  constructor(
    message: string,
    context?: ErrorContext,
    options?: StoreErrorOptions,
  ) {
    super(message, 'DECODE_ERROR', context, options)
    this.name = 'DecodeError'
  }
}

export class EncodeError extends StoreError {
  constructor(
    message: string,
    context?: ErrorContext,
    options?: StoreErrorOptions,
  ) {
    super(message, 'ENCODE_ERROR', context, options)
    this.name = 'EncodeError'
  }
}

export class QueryError extends StoreError {
  constructor(
    message: string,
    context?: ErrorContext,
    options?: StoreErrorOptions,
  ) {
    super(message, 'QUERY_ERROR', context, options)
    this.name = 'QueryError'
  }
}

export class StagingError extends StoreError {
  constructor(
    message: string,
    context?: ErrorContext,
    options?: StoreErrorOptions,
  ) {
    super(message, 'STAGING_ERROR', context, options)
    this.name = 'StagingError'
  }
}

export class WriteError extends StoreError {
  constructor(
    message: string,
    context?: ErrorContext,
    options?: StoreErrorOptions,
  ) {
    super(message, 'WRITE_ERROR', context, options)
    this.name = 'WriteError'
  }
}

function formatMessage(message: string, ctx: ErrorContext): string {
  const parts = [message]

  if (isNotNullish(ctx.operation)) {
    parts.push(`Operation: ${ctx.operation}`)
  }

  if (isNotNullish(ctx.table)) {
    parts.push(`Table: ${ctx.table}`)
  }

  if (isNotNullish(ctx.tag)) {
    parts.push(`Type: ${ctx.tag}`)
  }

  return parts.join('\n')
}

export function createError(
  message: string,
  ctx: ErrorContext,
  code: StoreErrorCode,
  cause?: unknown,
): StoreError {
  const text = formatMessage(message, ctx)
  const options = cause === undefined ? undefined : { cause }

  switch (code) {
    case 'CONFIG_ERROR':
      return new ConfigError(text, ctx, options)
    case 'UNKNOWN_TYPE':
      return new UnknownTypeError(text, ctx, options)
    case 'DECODE_ERROR':
      return new DecodeError(text, ctx, options)
    case 'ENCODE_ERROR':
      return new EncodeError(text, ctx, options)
    case 'QUERY_ERROR':
      return new QueryError(text, ctx, options)
    case 'STAGING_ERROR':
      return new StagingError(text, ctx, options)
    case 'WRITE_ERROR':
      return new WriteError(text, ctx, options)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Store errors raised further down keep their own code and context; any
 * other failure is wrapped under `code` with the underlying error as `cause`.
 */
export function wrapError(
  error: unknown,
  ctx: ErrorContext,
  code: StoreErrorCode,
): StoreError {
  if (error instanceof StoreError) return error
  return createError(errorMessage(error), ctx, code, error)
}
