// tests/unit/errors.test.ts
import { describe, it, expect } from 'vitest'
import {
  ConfigError,
  QueryError,
  StoreError,
  WriteError,
  createError,
  wrapError,
} from '../../src/builder/shared/errors'

describe('Store errors', () => {
  it('should append the context to the message', () => {
    const error = createError(
      'boom',
      { operation: 'lookup', table: 'seqs', tag: 'default' },
      'QUERY_ERROR',
    )

    expect(error).toBeInstanceOf(QueryError)
    expect(error).toBeInstanceOf(StoreError)
    expect(error.name).toBe('QueryError')
    expect(error.code).toBe('QUERY_ERROR')
    expect(error.message).toBe(
      'boom\nOperation: lookup\nTable: seqs\nType: default',
    )
  })

  it('should leave the message alone without context', () => {
    expect(createError('boom', {}, 'CONFIG_ERROR').message).toBe('boom')
  })

  it('should keep store errors raised further down', () => {
    const inner = new ConfigError('bad config')
    expect(wrapError(inner, { operation: 'insert' }, 'WRITE_ERROR')).toBe(
      inner,
    )
  })

  it('should wrap other failures with the underlying error as cause', () => {
    const cause = new Error('UNIQUE constraint failed: seqs.accession')
    const error = wrapError(
      cause,
      { operation: 'insert', table: 'seqs' },
      'WRITE_ERROR',
    )

    expect(error).toBeInstanceOf(WriteError)
    expect(error.cause).toBe(cause)
    expect(error.message).toBe(
      'UNIQUE constraint failed: seqs.accession\nOperation: insert\nTable: seqs',
    )
  })

  it('should wrap non-Error values by their string form', () => {
    const error = wrapError('plain text', {}, 'QUERY_ERROR')
    expect(error.message).toBe('plain text')
    expect(error.cause).toBe('plain text')
  })
})
