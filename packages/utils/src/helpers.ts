const HEX_REGEX = /^[0-9a-f]+$/

/**
 * Checks a lowercase, unprefixed hex string, optionally of an exact byte length
 */
export const isHexString = (input: string, byteLength?: number): boolean => {
  if (!HEX_REGEX.test(input) || input.length % 2 !== 0) return false
  return byteLength === undefined || input.length === byteLength * 2
}

/**
 * Exhaustiveness guard for tagged unions
 */
export const assertNever = (value: never, message?: string): never => {
  throw new Error(message ?? `Unexpected variant: ${JSON.stringify(value)}`)
}

export const utf8ToBytes = (input: string): Uint8Array =>
  new TextEncoder().encode(input)

export const bytesToUtf8 = (input: Uint8Array): string =>
  new TextDecoder('utf-8', { fatal: true }).decode(input)

/**
 * JSON.stringify that renders bigints as decimal strings
 */
export const stringifyWithBigInt = (value: unknown, space?: number): string =>
  JSON.stringify(
    value,
    (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v),
    space,
  )

export const bigIntSum = (values: Iterable<bigint>): bigint => {
  let total = BigInt(0)
  for (const value of values) total += value
  return total
}
