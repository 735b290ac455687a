// JSON-RPC 2.0
export const PARSE_ERROR = -32700
export const INVALID_REQUEST = -32600
export const METHOD_NOT_FOUND = -32601
export const INVALID_PARAMS = -32602
export const INTERNAL_ERROR = -32603

// explorer
export const INVALID_CURSOR = -32001
export const QUERY_CANCELLED = -32002
export const INTERNAL_CONSISTENCY = -32003
