import { bytesToUtf8, utf8ToBytes } from '@chain-explorer/utils'
import { base64url } from '@scure/base'
import { InvalidCursorError } from '../errors'
import { type CursorKind, CursorKinds } from './types'

const SEPARATOR = '|'

export interface CursorPosition {
  kind: CursorKind
  scope: string
  key: number
}

const isCursorKind = (value: string): value is CursorKind =>
  CursorKinds.some((kind) => kind === value)

export function encodeCursor({ kind, scope, key }: CursorPosition): string {
  return base64url.encode(utf8ToBytes([kind, scope, key].join(SEPARATOR)))
}

/**
 * Decode an opaque cursor. Structural problems raise
 * {@link InvalidCursorError}; whether the position exists is checked by the
 * connection it is used with.
 */
export function decodeCursor(cursor: string): CursorPosition {
  let text: string
  try {
    text = bytesToUtf8(base64url.decode(cursor))
  } catch (err) {
    throw new InvalidCursorError('Cursor is not valid base64url', {
      cause: err,
    })
  }

  const parts = text.split(SEPARATOR)
  if (parts.length !== 3) {
    throw new InvalidCursorError('Malformed cursor')
  }
  const [kind, scope, rawKey] = parts
  if (!isCursorKind(kind)) {
    throw new InvalidCursorError(`Unknown cursor kind ${kind}`)
  }
  if (!/^\d+$/.test(rawKey)) {
    throw new InvalidCursorError('Cursor position is not an integer')
  }
  const key = Number(rawKey)
  if (!Number.isSafeInteger(key)) {
    throw new InvalidCursorError('Cursor position out of range')
  }
  return { kind, scope, key }
}

/**
 * Decode and check that the cursor was issued for `kind` within `scope`
 */
export function decodeCursorFor(
  cursor: string,
  kind: CursorKind,
  scope: string,
): number {
  const position = decodeCursor(cursor)
  if (position.kind !== kind || position.scope !== scope) {
    throw new InvalidCursorError(
      `Cursor belongs to ${position.kind} of ${position.scope}, expected ${kind} of ${scope}`,
    )
  }
  return position.key
}
