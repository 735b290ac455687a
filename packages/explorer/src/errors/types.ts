/**
 * Error Type Definitions
 *
 * Defines error categories, codes, and types for structured error handling
 */

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  QUERY = 'query',
  INGESTION = 'ingestion',
  CONSISTENCY = 'consistency',
  VALIDATION = 'validation',
  STORAGE = 'storage',
  SYSTEM = 'system',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

/**
 * Error recovery type
 */
export enum ErrorRecoveryType {
  RECOVERABLE = 'recoverable',
  FATAL = 'fatal',
  TRANSIENT = 'transient',
  PERMANENT = 'permanent',
}

/**
 * Error codes for different error scenarios
 */
export enum ErrorCode {
  // Query errors
  NOT_FOUND = 'NOT_FOUND',
  INVALID_CURSOR = 'INVALID_CURSOR',
  INVALID_PAGINATION = 'INVALID_PAGINATION',
  QUERY_CANCELLED = 'QUERY_CANCELLED',

  // Ingestion errors
  ORPHAN_BLOCK = 'ORPHAN_BLOCK',
  DUPLICATE_BLOCK = 'DUPLICATE_BLOCK',

  // Consistency errors
  INTERNAL_CONSISTENCY = 'INTERNAL_CONSISTENCY',
  DEEP_REORG = 'DEEP_REORG',
  UNKNOWN_VARIANT = 'UNKNOWN_VARIANT',

  // Validation errors
  INVALID_INPUT = 'INVALID_INPUT',
  DECODE_FAILED = 'DECODE_FAILED',

  // Storage / system errors
  DATABASE_ERROR = 'DATABASE_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  SYSTEM_ERROR = 'SYSTEM_ERROR',
}

/**
 * Error metadata type
 */
export type ErrorMetadata = Record<string, unknown>

/**
 * Error context for debugging
 */
export interface ErrorContext {
  component?: string
  operation?: string
  blockId?: string
  branchId?: string
  cursor?: string
  [key: string]: unknown
}
