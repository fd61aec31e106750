// tests/unit/param-store.test.ts
import { describe, it, expect } from 'vitest'
import {
  createParamStore,
  replaceQuestionPlaceholders,
} from '../../src/builder/shared/param-store'
import { normalizeValue } from '../../src/utils/normalize-value'

describe('Param store', () => {
  it('should number postgres placeholders from 1', () => {
    const store = createParamStore('postgres')
    expect(store.add('A1')).toBe('$1')
    expect(store.add(2)).toBe('$2')
    expect(store.snapshot()).toEqual(['A1', 2])
    expect(store.index).toBe(3)
  })

  it('should use ? on sqlite', () => {
    const store = createParamStore('sqlite')
    expect(store.add('A1')).toBe('?')
    expect(store.add('A2')).toBe('?')
    expect(store.snapshot()).toEqual(['A1', 'A2'])
  })

  it('should renumber fragment placeholders after earlier params', () => {
    const store = createParamStore('postgres')
    store.add('A1')
    store.add('A2')
    expect(store.addFragment('src LIKE ? AND note = ?', ['%M%', 'x'])).toBe(
      'src LIKE $3 AND note = $4',
    )
    expect(store.snapshot()).toEqual(['A1', 'A2', '%M%', 'x'])
  })

  it('should leave question marks in literals and comments alone', () => {
    const store = createParamStore('postgres')
    const sql = store.addFragment(
      `a = '?' AND "we?ird" = ? /* ? */ AND b = ? -- ?`,
      [1, 2],
    )
    expect(sql).toBe(`a = '?' AND "we?ird" = $1 /* ? */ AND b = $2 -- ?`)
  })

  it('should handle escaped quotes inside literals', () => {
    const { sql, count } = replaceQuestionPlaceholders(
      `note = 'it''s ?' AND x = ?`,
      () => '$9',
    )
    expect(sql).toBe(`note = 'it''s ?' AND x = $9`)
    expect(count).toBe(1)
  })

  it('should throw on a placeholder/parameter mismatch', () => {
    const store = createParamStore('sqlite')
    expect(() => store.addFragment('a = ? AND b = ?', [1])).toThrow(
      /Parameter mismatch - fragment has 2 placeholder\(s\) but 1 parameter\(s\)/,
    )
    expect(() => store.addFragment('a = 1', [1])).toThrow(/Parameter mismatch/)
  })

  it('should snapshot a copy', () => {
    const store = createParamStore('postgres')
    store.add('A1')
    const snapshot = store.snapshot()
    store.add('A2')
    expect(snapshot).toEqual(['A1'])
  })

  it('should reject a start index below 1', () => {
    expect(() => createParamStore('postgres', 0)).toThrow(
      'Start index must be integer >= 1, got 0',
    )
  })
})

describe('normalizeValue', () => {
  it('should turn booleans into 1/0 on sqlite only', () => {
    expect(normalizeValue(true, 'sqlite')).toBe(1)
    expect(normalizeValue(false, 'sqlite')).toBe(0)
    expect(normalizeValue(true, 'postgres')).toBe(true)
  })

  it('should bind dates as ISO text', () => {
    const date = new Date('2024-03-01T12:00:00.000Z')
    expect(normalizeValue(date, 'postgres')).toBe('2024-03-01T12:00:00.000Z')
  })

  it('should reject invalid dates', () => {
    expect(() => normalizeValue(new Date('nope'), 'sqlite')).toThrow(
      'Invalid Date value in SQL params',
    )
  })

  it('should bind bigints as text', () => {
    expect(normalizeValue(9007199254740993n, 'postgres')).toBe(
      '9007199254740993',
    )
  })
})
