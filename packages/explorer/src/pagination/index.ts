export { resolveConnection } from './connection'
export type { ConnectionParams } from './connection'
export { decodeCursor, decodeCursorFor, encodeCursor } from './cursor'
export type { CursorPosition } from './cursor'
export { keyedSource, rangeSource } from './sources'
export type { KeyedEntry } from './sources'
export { CursorKinds } from './types'
export type {
  Connection,
  CursorKind,
  Edge,
  FieldError,
  PageInfo,
  PaginationArgs,
  Sequence,
} from './types'
