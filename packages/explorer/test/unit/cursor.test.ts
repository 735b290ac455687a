import { utf8ToBytes } from '@chain-explorer/utils'
import { base64url } from '@scure/base'
import { describe, expect, it } from 'vitest'
import { InvalidCursorError } from '../../src/errors'
import {
  decodeCursor,
  decodeCursorFor,
  encodeCursor,
} from '../../src/pagination'

const raw = (text: string) => base64url.encode(utf8ToBytes(text))

describe('cursor', () => {
  it('should decode what it encodes', () => {
    const cursor = encodeCursor({ kind: 'epoch-blocks', scope: '7', key: 42 })
    expect(cursor).toBe(raw('epoch-blocks|7|42'))
    expect(decodeCursor(cursor)).toEqual({
      kind: 'epoch-blocks',
      scope: '7',
      key: 42,
    })
  })

  it.each([
    ['not base64url', '!!!'],
    ['missing parts', raw('branch-blocks|42')],
    ['unknown kind', raw('peers|x|1')],
    ['negative key', raw('branch-blocks|x|-1')],
    ['fractional key', raw('branch-blocks|x|1.5')],
    ['unsafe key', raw('branch-blocks|x|99999999999999999999')],
  ])('should reject a cursor with %s', (_name, cursor) => {
    expect(() => decodeCursor(cursor)).toThrow(InvalidCursorError)
  })

  it('should only accept a cursor for its own sequence', () => {
    const cursor = encodeCursor({ kind: 'pool-blocks', scope: 'p', key: 3 })
    expect(decodeCursorFor(cursor, 'pool-blocks', 'p')).toBe(3)
    expect(() => decodeCursorFor(cursor, 'pool-blocks', 'q')).toThrow(
      InvalidCursorError,
    )
    expect(() => decodeCursorFor(cursor, 'epoch-blocks', 'p')).toThrow(
      InvalidCursorError,
    )
  })
})
