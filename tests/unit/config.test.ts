// tests/unit/config.test.ts
import { describe, it, expect } from 'vitest'
import {
  connect,
  validateConnectionParams,
  type ConnectionParams,
} from '../../src/config'
import { createSequenceStore } from '../../src'
import { ConfigError } from '../../src/builder/shared/errors'
import { createRecordingSession } from '../helpers/recording-session'

function untyped(json: string): ConnectionParams {
  return JSON.parse(json)
}

describe('validateConnectionParams', () => {
  it('should accept an sqlite database', () => {
    expect(() =>
      validateConnectionParams({ dbtype: 'sqlite', dbname: ':memory:' }),
    ).not.toThrow()
  })

  it('should accept postgres with credentials', () => {
    expect(() =>
      validateConnectionParams({
        dbtype: 'postgres',
        dbname: 'bio',
        user: 'tester',
        password: 'test-secret',
        port: 5433,
      }),
    ).not.toThrow()
  })

  it('should require a database type', () => {
    expect(() => validateConnectionParams(untyped('{"dbname":"bio"}'))).toThrow(
      'Must specify database type (dbtype): one of postgres, sqlite\nOperation: connect',
    )
  })

  it('should reject unsupported database types', () => {
    expect(() =>
      validateConnectionParams(untyped('{"dbtype":"mysql","dbname":"bio"}')),
    ).toThrow(ConfigError)
  })

  it('should require a database name', () => {
    expect(() =>
      validateConnectionParams({ dbtype: 'sqlite', dbname: '' }),
    ).toThrow(/Must specify database name/)
  })

  it('should require user and password for postgres', () => {
    expect(() =>
      validateConnectionParams({
        dbtype: 'postgres',
        dbname: 'bio',
        user: 'tester',
      }),
    ).toThrow(/need both user and password/)
  })

  it('should reject invalid ports', () => {
    expect(() =>
      validateConnectionParams({
        dbtype: 'sqlite',
        dbname: ':memory:',
        port: 0,
      }),
    ).toThrow(/port must be a positive integer/)
    expect(() =>
      validateConnectionParams({
        dbtype: 'sqlite',
        dbname: ':memory:',
        port: 70000,
      }),
    ).toThrow(/port must be <= 65535/)
  })
})

describe('connect', () => {
  it('should open an in-memory sqlite session', async () => {
    const session = connect({ dbtype: 'sqlite', dbname: ':memory:' })
    expect(session.dialect).toBe('sqlite')
    expect(session.inTransaction).toBe(false)
    await session.close()
  })

  it('should validate before connecting', () => {
    expect(() => connect({ dbtype: 'postgres', dbname: 'bio' })).toThrow(
      ConfigError,
    )
  })
})

describe('createSequenceStore', () => {
  it('should refuse both a session and connection parameters', () => {
    expect(() =>
      createSequenceStore({
        session: createRecordingSession(),
        connection: { dbtype: 'sqlite', dbname: ':memory:' },
      }),
    ).toThrow(ConfigError)
  })

  it('should refuse neither', () => {
    expect(() => createSequenceStore({})).toThrow(
      'A session or connection parameters are required\nOperation: connect',
    )
  })
})
