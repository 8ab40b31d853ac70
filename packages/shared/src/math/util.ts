/**
 * Math utility functions
 */

/**
 * Clamp a value between min and max
 */
export function clamp(x: number, a: number, b: number): number {
  return x < a ? a : x > b ? b : x
}

/**
 * Linear interpolation between two values
 */
export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t
}

/**
 * Index of the last item whose key is <= value, or 0 when value lies before
 * every item. Items must be sorted ascending by key and non-empty.
 */
export function floorIndex<T>(items: readonly T[], value: number, key: (item: T) => number): number {
  let lo = 0
  let hi = items.length
  while (lo + 1 < hi) {
    const mid = Math.floor((lo + hi) / 2)
    if (key(items[mid]) <= value) {
      lo = mid
    } else {
      hi = mid
    }
  }
  return lo
}

/**
 * Index of the first item whose key is >= value (items.length if none).
 * Items must be sorted ascending by key.
 */
export function lowerBound<T>(items: readonly T[], value: number, key: (item: T) => number): number {
  let lo = 0
  let hi = items.length
  while (lo < hi) {
    const mid = Math.floor((lo + hi) / 2)
    if (key(items[mid]) < value) {
      lo = mid + 1
    } else {
      hi = mid
    }
  }
  return lo
}

/**
 * Index of the first item whose key is > value (items.length if none)
 */
export function upperBound<T>(items: readonly T[], value: number, key: (item: T) => number): number {
  let lo = 0
  let hi = items.length
  while (lo < hi) {
    const mid = Math.floor((lo + hi) / 2)
    if (key(items[mid]) <= value) {
      lo = mid + 1
    } else {
      hi = mid
    }
  }
  return lo
}
