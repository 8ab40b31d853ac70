/**
 * Field readers shared by the chart parsers. Each one narrows an unknown
 * JSON value or raises a ParseError naming where it was found.
 */

import { ParseError } from '@beatscroll/shared'

export type JsonObject = { [key: string]: unknown }

export function isObject(v: unknown): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

export function expectObject(v: unknown, path: string): JsonObject {
  if (!isObject(v)) throw new ParseError(path, 'expected an object')
  return v
}

export function expectArray(v: unknown, path: string): unknown[] {
  if (!Array.isArray(v)) throw new ParseError(path, 'expected an array')
  return v
}

export function optionalArray(v: unknown, path: string): unknown[] {
  return v == null ? [] : expectArray(v, path)
}

/**
 * Finite number, or a numeric string as some exporters write them
 */
export function expectNumber(v: unknown, path: string): number {
  const n = typeof v === 'string' && v.trim() !== '' ? Number(v) : v
  if (typeof n !== 'number' || !Number.isFinite(n)) {
    throw new ParseError(path, `expected a finite number (got ${JSON.stringify(v)})`)
  }
  return n
}

export function optionalNumber(v: unknown, path: string): number | undefined {
  return v == null ? undefined : expectNumber(v, path)
}

export function optionalString(v: unknown, path: string): string | undefined {
  if (v == null) return undefined
  if (typeof v !== 'string') throw new ParseError(path, 'expected a string')
  return v
}

/**
 * Convert beat notation to a float.
 * Supports [whole, num, den], {bar, num, den}, or plain numbers.
 */
export function beatToValue(b: unknown, path: string): number {
  let whole: unknown
  let num: unknown
  let den: unknown

  if (Array.isArray(b) && b.length === 3) {
    [whole, num, den] = b
  } else if (isObject(b) && 'bar' in b && 'num' in b && 'den' in b) {
    whole = b.bar
    num = b.num
    den = b.den
  } else {
    return expectNumber(b, path)
  }

  const d = expectNumber(den, `${path}.den`)
  if (d === 0) throw new ParseError(path, 'beat fraction has a zero denominator')
  return expectNumber(whole, `${path}.bar`) + expectNumber(num, `${path}.num`) / d
}
