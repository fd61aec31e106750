// tests/unit/schema.test.ts
import { describe, it, expect } from 'vitest'
import { createTableDDL, materializeSchema } from '../../src/schema'
import { defaultCodec } from '../../src/codec/default-codec'
import { fastaCodec } from '../../src/codec/fasta'

describe('Schema materializer', () => {
  it('should resolve binary to bytea on postgres', () => {
    expect(materializeSchema(fastaCodec.schema(), 'postgres')).toEqual([
      'accession text PRIMARY KEY',
      'description text',
      'sequence bytea NOT NULL',
    ])
  })

  it('should resolve binary to blob on sqlite', () => {
    expect(materializeSchema(fastaCodec.schema(), 'sqlite')).toEqual([
      'accession text PRIMARY KEY',
      'description text',
      'sequence blob NOT NULL',
    ])
  })

  it('should pass non-placeholder types through untouched', () => {
    const schema = [
      { name: 'accession', type: 'varchar(32)', constraints: 'PRIMARY KEY' },
      { name: 'raw', type: 'bytea' },
    ]
    expect(materializeSchema(schema, 'sqlite')).toEqual([
      'accession varchar(32) PRIMARY KEY',
      'raw bytea',
    ])
  })

  it('should give the same result on every call', () => {
    const schema = fastaCodec.schema()
    const first = materializeSchema(schema, 'postgres')
    expect(materializeSchema(schema, 'postgres')).toEqual(first)
    expect(schema[2].type).toBe('binary')
  })

  it('should quote column names that are keywords', () => {
    const schema = [
      { name: 'accession', type: 'text', constraints: 'PRIMARY KEY' },
      { name: 'order', type: 'integer' },
    ]
    expect(materializeSchema(schema, 'postgres')[1]).toBe('"order" integer')
  })

  it('should build CREATE TABLE for the default codec', () => {
    expect(createTableDDL('seqs', defaultCodec.schema(), 'sqlite')).toBe(
      'CREATE TABLE seqs (accession text PRIMARY KEY, src text NOT NULL)',
    )
  })

  it('should accept schema-qualified table names', () => {
    expect(
      createTableDDL('bio.proteins', fastaCodec.schema(), 'postgres'),
    ).toBe(
      'CREATE TABLE bio.proteins (accession text PRIMARY KEY, description text, sequence bytea NOT NULL)',
    )
  })

  it('should reject unsafe table names', () => {
    expect(() =>
      createTableDDL('seqs; DROP TABLE x', defaultCodec.schema(), 'sqlite'),
    ).toThrow(/invalid identifier characters/)
  })
})
