import { describe, expect, it } from 'vitest'
import { asInteger, asList, asString, parseFlags } from '../parse-flags.js'

describe('parseFlags', () => {
  it('parses single-token values and switches', () => {
    const flags = parseFlags(['--max-pages', '3', '--json'])
    expect(flags['max-pages']).toBe('3')
    expect(flags.json).toBe(true)
  })

  it('joins multi-token values', () => {
    const flags = parseFlags(['--title', 'MSI', 'RTX', '3060', '12GB', '--description', 'почти нова'])
    expect(flags.title).toBe('MSI RTX 3060 12GB')
    expect(flags.description).toBe('почти нова')
  })

  it('ignores positional tokens before the first flag', () => {
    expect(parseFlags(['ingest', '--all-pages'])).toEqual({ 'all-pages': true })
  })
})

describe('flag readers', () => {
  it('reads strings', () => {
    expect(asString('rtx')).toBe('rtx')
    expect(asString(true)).toBe('')
    expect(asString(undefined)).toBe('')
  })

  it('reads integers and flags bad ones as NaN', () => {
    expect(asInteger('12')).toBe(12)
    expect(asInteger(undefined)).toBeUndefined()
    expect(asInteger('two')).toBeNaN()
    expect(asInteger(true)).toBeNaN()
  })

  it('splits comma lists', () => {
    expect(asList('rtx, radeon rx,')).toEqual(['rtx', 'radeon rx'])
    expect(asList(' , ')).toBeUndefined()
    expect(asList(true)).toBeUndefined()
  })
})
