import type { Sequence } from './types'

export interface KeyedEntry<T> {
  key: number
  value: T | (() => T | Promise<T>)
}

const isThunk = <T>(
  value: T | (() => T | Promise<T>),
): value is () => T | Promise<T> => typeof value === 'function'

/**
 * Sequence over entries already sorted by ascending key
 */
export function keyedSource<T>(entries: readonly KeyedEntry<T>[]): Sequence<T> {
  const lowerBound = (key: number): number => {
    let lo = 0
    let hi = entries.length
    while (lo < hi) {
      const mid = (lo + hi) >>> 1
      if (entries[mid].key < key) lo = mid + 1
      else hi = mid
    }
    return lo
  }

  return {
    count: entries.length,
    keyAt: (index) => entries[index].key,
    lowerBound,
    resolve: (key) => {
      const entry = entries[lowerBound(key)]
      if (entry === undefined || entry.key !== key) {
        throw new RangeError(`No element at position ${key}`)
      }
      return isThunk(entry.value) ? entry.value() : entry.value
    },
  }
}

/**
 * Sequence whose keys are every integer of `[from, to]`, resolved lazily
 */
export function rangeSource<T>(
  from: number,
  to: number,
  resolve: (key: number) => T | Promise<T>,
): Sequence<T> {
  const count = Math.max(0, to - from + 1)
  return {
    count,
    keyAt: (index) => from + index,
    lowerBound: (key) => Math.min(Math.max(key - from, 0), count),
    resolve,
  }
}
