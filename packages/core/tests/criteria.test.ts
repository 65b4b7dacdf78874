import type { ToolRecord } from '../src/types/index.js'
import { describe, expect, test } from 'vitest'
import { PatternError } from '../src/errors.js'
import { SearchCriteria } from '../src/search/criteria.js'
import { tool } from './fixtures.js'

const readFile: ToolRecord = {
  name: 'read_file',
  title: 'Read File',
  description: 'Read the contents of a file from disk',
  inputSchema: {
    type: 'object',
    properties: {
      path: { type: 'string', description: 'Absolute path to the file' },
    },
    required: ['path'],
  },
}

describe('SearchCriteria', () => {
  describe('matchAll', () => {
    test('should match every tool', () => {
      const criteria = SearchCriteria.matchAll()

      expect(criteria.isMatchAll).toBe(true)
      expect(criteria.matches(readFile)).toBe(true)
      expect(criteria.matches(tool('no_description'))).toBe(true)
    })

    test('should still apply the minimum description length', () => {
      const criteria = SearchCriteria.matchAll().withMinDescriptionLength(10)

      expect(criteria.matches(tool('missing'))).toBe(false)
      expect(criteria.matches(tool('short', 'short'))).toBe(false)
      expect(criteria.matches(readFile)).toBe(true)
    })
  })

  describe('substring mode', () => {
    test('should match case-insensitively by default', () => {
      expect(SearchCriteria.withQuery('READ').matches(readFile)).toBe(true)
      expect(SearchCriteria.withQuery('nonexistent').matches(readFile)).toBe(false)
    })

    test('should respect case sensitivity', () => {
      const criteria = SearchCriteria.withQuery('READ').withCaseSensitive(true)

      expect(criteria.matches(readFile)).toBe(false)
      expect(SearchCriteria.withQuery('Read').withCaseSensitive(true).matches(readFile)).toBe(true)
    })

    test('should only search enabled fields', () => {
      const query = SearchCriteria.withQuery('contents')

      expect(query.matches(readFile)).toBe(true)
      expect(query.withFields({ description: false }).matches(readFile)).toBe(false)
    })

    test('should search the input schema when enabled', () => {
      const query = SearchCriteria.withQuery('absolute')

      expect(query.matches(readFile)).toBe(false)
      expect(query.withFields({ inputSchema: true }).matches(readFile)).toBe(true)
    })

    test('should match everything with an empty query', () => {
      expect(SearchCriteria.withQuery('').matches(readFile)).toBe(true)
    })
  })

  describe('regex mode', () => {
    test('should find the pattern anywhere in a field', () => {
      expect(SearchCriteria.withRegex('^read_').matches(readFile)).toBe(true)
      expect(SearchCriteria.withRegex('file').matches(readFile)).toBe(true)
      expect(SearchCriteria.withRegex('test.*tool').matches(tool('test_tool'))).toBe(true)
    })

    test('should match everything with an empty pattern', () => {
      expect(SearchCriteria.withRegex('').matches(readFile)).toBe(true)
      expect(SearchCriteria.withRegex('').matches(tool('x'))).toBe(true)
    })

    test('should leave case handling to the pattern', () => {
      expect(SearchCriteria.withRegex('^READ').matches(readFile)).toBe(false)
      expect(SearchCriteria.withRegex('(?:R|r)ead F').matches(readFile)).toBe(true)
    })

    test('should never match with an invalid pattern', () => {
      const criteria = SearchCriteria.withRegex('(')

      expect(criteria.patternError).toBeInstanceOf(PatternError)
      expect(criteria.patternError?.pattern).toBe('(')
      expect(criteria.matches(readFile)).toBe(false)
      expect(criteria.matches(tool('('))).toBe(false)
    })

    test('should compile when switching an existing query to regex mode', () => {
      const criteria = SearchCriteria.withQuery('^read').withMode('regex')

      expect(criteria.mode).toBe('regex')
      expect(criteria.patternError).toBeUndefined()
      expect(criteria.matches(readFile)).toBe(true)
    })
  })

  describe('keywords mode', () => {
    test('should require every keyword', () => {
      expect(SearchCriteria.withKeywords(['file', 'read']).matches(readFile)).toBe(true)
      expect(SearchCriteria.withKeywords(['read', 'missing']).matches(readFile)).toBe(false)
    })

    test('should not depend on keyword order', () => {
      const forward = SearchCriteria.withKeywords(['contents', 'disk'])
      const backward = SearchCriteria.withKeywords(['disk', 'contents'])

      expect(forward.matches(readFile)).toBe(true)
      expect(backward.matches(readFile)).toBe(true)
    })

    test('should require all keywords within one field', () => {
      // "read_file" only appears in the name and "disk" only in the description
      expect(SearchCriteria.withKeywords(['read_file', 'disk']).matches(readFile)).toBe(false)
    })

    test('should fold case unless case sensitive', () => {
      expect(SearchCriteria.withKeywords(['DISK']).matches(readFile)).toBe(true)
      expect(SearchCriteria.withKeywords(['DISK']).withCaseSensitive(true).matches(readFile)).toBe(false)
    })

    test('should match everything with an empty keyword list', () => {
      expect(SearchCriteria.withKeywords([]).matches(readFile)).toBe(true)
    })
  })

  describe('word-boundary mode', () => {
    const wordRead = SearchCriteria.withQuery('read').withMode('word-boundary')

    test('should match whole words only', () => {
      expect(wordRead.matches(tool('read_file'))).toBe(true)
      expect(wordRead.matches(tool('read'))).toBe(true)
      expect(wordRead.matches(tool('bread'))).toBe(false)
      expect(wordRead.matches(tool('reader'))).toBe(false)
    })

    test('should fold case unless case sensitive', () => {
      const upper = SearchCriteria.withQuery('READ').withMode('word-boundary')

      expect(upper.matches(tool('Read-File'))).toBe(true)
      expect(upper.withCaseSensitive(true).matches(tool('Read-File'))).toBe(false)
      expect(upper.withCaseSensitive(true).matches(tool('READ-FILE'))).toBe(true)
    })

    test('should treat the query literally', () => {
      const dotted = SearchCriteria.withQuery('a.b').withMode('word-boundary')

      expect(dotted.matches(tool('a.b'))).toBe(true)
      expect(dotted.matches(tool('axb'))).toBe(false)
    })

    test('should match any name holding a letter or digit with an empty query', () => {
      const empty = SearchCriteria.withQuery('').withMode('word-boundary')

      expect(empty.matches(tool('read'))).toBe(true)
      expect(empty.matches(tool('read_file'))).toBe(true)
      expect(empty.matches(tool('42'))).toBe(true)
      expect(empty.matches(tool('__'))).toBe(false)
    })
  })

  describe('exact name', () => {
    test('should compare names case-insensitively by default', () => {
      expect(SearchCriteria.withName('Test').matches(tool('test'))).toBe(true)
      expect(SearchCriteria.withName('Test').withCaseSensitive(true).matches(tool('test'))).toBe(false)
    })

    test('should ignore every other field', () => {
      expect(SearchCriteria.withName('read').matches(readFile)).toBe(false)
      expect(SearchCriteria.withName('read_file').matches(readFile)).toBe(true)
    })

    test('should bypass the minimum description length', () => {
      const criteria = SearchCriteria.withName('bare').withMinDescriptionLength(100)

      expect(criteria.matches(tool('bare'))).toBe(true)
    })
  })

  test('should return new instances from modifiers', () => {
    const original = SearchCriteria.withQuery('READ')
    const sensitive = original.withCaseSensitive(true)

    expect(sensitive).not.toBe(original)
    expect(original.caseSensitive).toBe(false)
    expect(original.fields).toEqual({ name: true, title: true, description: true, inputSchema: false })
    expect(original.withFields({ name: false }).fields.name).toBe(false)
    expect(original.fields.name).toBe(true)
  })
})
