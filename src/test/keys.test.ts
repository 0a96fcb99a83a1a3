import { describe, it, expect } from 'vitest'
import {
  parseKey,
  formatKey,
  shortKeyName,
  toCamelot,
  getCompatibleRoots,
  describeCompatibleKeys,
} from '../utils/keys'
import { InvalidInputError } from '../utils/errors'

describe('parseKey', () => {
  it('should parse long and short forms', () => {
    expect(parseKey('C major')).toEqual({ root: 'C', mode: 'major' })
    expect(parseKey('F# minor')).toEqual({ root: 'F#', mode: 'minor' })
    expect(parseKey('Am')).toEqual({ root: 'A', mode: 'minor' })
    expect(parseKey('G')).toEqual({ root: 'G', mode: 'major' })
  })

  it('should fold flats into sharps', () => {
    expect(parseKey('Bbm')).toEqual({ root: 'A#', mode: 'minor' })
    expect(parseKey('Eb major')).toEqual({ root: 'D#', mode: 'major' })
  })

  it('should reject unknown roots and modes', () => {
    expect(() => parseKey('H major')).toThrow(InvalidInputError)
    expect(() => parseKey('C dorian')).toThrow('Invalid key: unknown mode in "C dorian"')
  })
})

describe('key formatting', () => {
  it('should format long and short names', () => {
    expect(formatKey({ root: 'C#', mode: 'minor' })).toBe('C# minor')
    expect(shortKeyName({ root: 'C#', mode: 'minor' })).toBe('C#m')
    expect(shortKeyName({ root: 'D', mode: 'major' })).toBe('D')
  })
})

describe('toCamelot', () => {
  it('should return correct Camelot key for major and minor keys', () => {
    expect(toCamelot({ root: 'C', mode: 'major' })).toBe('8B')
    expect(toCamelot({ root: 'A', mode: 'minor' })).toBe('8A')
    expect(toCamelot({ root: 'E', mode: 'minor' })).toBe('9A')
    expect(toCamelot({ root: 'G', mode: 'major' })).toBe('9B')
  })

  it('should handle enharmonic equivalents', () => {
    expect(toCamelot(parseKey('Bbm'))).toBe('3A')
  })
})

describe('compatible keys', () => {
  it('should list the root, its fourth, its fifth and its relative minor root', () => {
    expect(getCompatibleRoots('C')).toEqual(['C', 'F', 'G', 'A'])
    expect(getCompatibleRoots('A#')).toEqual(['A#', 'D#', 'F', 'G'])
  })

  it('should describe the keys a track mixes into', () => {
    expect(describeCompatibleKeys({ root: 'C', mode: 'major' })).toBe('F, G, Am')
    expect(describeCompatibleKeys({ root: 'A', mode: 'minor' })).toBe('Dm, Em, C')
  })

  it('should respell keys on sharp roots with sharp names', () => {
    expect(describeCompatibleKeys({ root: 'A#', mode: 'major' })).toBe('D#, F, Gm')
    expect(describeCompatibleKeys({ root: 'D#', mode: 'minor' })).toBe('G#m, A#m, F#')
    expect(describeCompatibleKeys({ root: 'F', mode: 'major' })).toBe('A#, C, Dm')
  })
})
