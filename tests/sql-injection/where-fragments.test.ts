// tests/sql-injection/where-fragments.test.ts
import { describe, it, expect } from 'vitest'
import { buildDirectLookup } from '../../src/builder/lookup'

describe('SQL Injection - Raw where fragments', () => {
  it('should bind parameters, never splice them', () => {
    const value = "x'; DROP TABLE seqs; --"
    const { sql, params } = buildDirectLookup(
      'seqs',
      ['A1'],
      { where: 'src = ?', parameters: [value] },
      'postgres',
    )
    expect(sql).toBe(
      'SELECT * FROM seqs WHERE seqs.accession IN ($1) AND (src = $2)',
    )
    expect(params).toEqual(['A1', value])
  })

  it('should not count question marks inside string literals', () => {
    const { sql, params } = buildDirectLookup(
      'seqs',
      ['A1'],
      { where: "src LIKE '%?%' AND src <> ?", parameters: ['x'] },
      'postgres',
    )
    expect(sql).toBe(
      "SELECT * FROM seqs WHERE seqs.accession IN ($1) AND (src LIKE '%?%' AND src <> $2)",
    )
    expect(params).toEqual(['A1', 'x'])
  })

  it('should keep an OR in the predicate inside the accession filter', () => {
    const { sql } = buildDirectLookup(
      'seqs',
      ['A1'],
      { where: '1 = 1 OR 1 = 1' },
      'sqlite',
    )
    expect(sql).toBe(
      'SELECT * FROM seqs WHERE seqs.accession IN (?) AND (1 = 1 OR 1 = 1)',
    )
  })

  it('should refuse more values than placeholders', () => {
    expect(() =>
      buildDirectLookup(
        'seqs',
        ['A1'],
        { where: "src = '?'", parameters: ['x'] },
        'sqlite',
      ),
    ).toThrow(/Parameter mismatch - fragment has 0 placeholder/)
  })
})
