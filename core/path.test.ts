import { describe, it, expect } from 'vitest'
import {
  splitPath,
  canonicalPath,
  joinPath,
  isRootPath,
  isSameOrDescendant,
  prefixes,
  escapeQuotes,
  ROOT_PATH,
} from './path.js'

describe('splitPath', () => {
  it('should collapse repeated, leading and trailing separators', () => {
    expect(splitPath('/a//b/c/')).toEqual({ dir: 'a/b', name: 'c', path: 'a/b/c' })
  })

  it('should return all-empty parts for empty input', () => {
    expect(splitPath('')).toEqual({ dir: '', name: '', path: '' })
  })

  it('should return all-empty parts for separator-only input', () => {
    expect(splitPath('///')).toEqual({ dir: '', name: '', path: '' })
  })

  it('should give a single segment an empty directory', () => {
    expect(splitPath('notes.txt')).toEqual({ dir: '', name: 'notes.txt', path: 'notes.txt' })
    expect(splitPath('/notes.txt')).toEqual({ dir: '', name: 'notes.txt', path: 'notes.txt' })
  })

  it('should keep spaces and quotes inside segments', () => {
    expect(splitPath("My Drive/it's here/a b.txt")).toEqual({
      dir: "My Drive/it's here",
      name: 'a b.txt',
      path: "My Drive/it's here/a b.txt",
    })
  })

  it('should map equivalent inputs to the same canonical path', () => {
    expect(splitPath('a/b').path).toBe(splitPath('//a///b//').path)
  })
})

describe('canonicalPath / joinPath', () => {
  it('should canonicalize', () => {
    expect(canonicalPath('/x//y/')).toBe('x/y')
    expect(canonicalPath('/')).toBe('')
  })

  it('should join fragments', () => {
    expect(joinPath('tmp', 'temp-1-2')).toBe('tmp/temp-1-2')
    expect(joinPath('', 'a', '/b/')).toBe('a/b')
  })
})

describe('isRootPath', () => {
  it('should accept separator-only input', () => {
    expect(isRootPath('/')).toBe(true)
    expect(isRootPath('//')).toBe(true)
    expect(isRootPath(ROOT_PATH)).toBe(true)
  })

  it('should reject blank input and real paths', () => {
    expect(isRootPath('')).toBe(false)
    expect(isRootPath('/a')).toBe(false)
  })
})

describe('isSameOrDescendant', () => {
  it('should match the path itself and paths below it', () => {
    expect(isSameOrDescendant('a/b', 'a/b')).toBe(true)
    expect(isSameOrDescendant('a/b/c', 'a/b')).toBe(true)
  })

  it('should not match siblings sharing a prefix', () => {
    expect(isSameOrDescendant('a/bc', 'a/b')).toBe(false)
  })
})

describe('prefixes', () => {
  it('should list every directory prefix shortest first', () => {
    expect(prefixes('a/b/c')).toEqual(['a', 'a/b', 'a/b/c'])
    expect(prefixes('')).toEqual([])
  })
})

describe('escapeQuotes', () => {
  it('should escape single quotes and backslashes', () => {
    expect(escapeQuotes("it's")).toBe("it\\'s")
    expect(escapeQuotes('a\\b')).toBe('a\\\\b')
  })

  it('should leave plain strings untouched', () => {
    expect(escapeQuotes('plain name')).toBe('plain name')
  })
})
