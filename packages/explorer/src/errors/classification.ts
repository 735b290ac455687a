/**
 * Error Classification Utilities
 */

import { ZodError } from 'zod'
import {
  ExplorerError,
  QueryCancelledError,
  SystemError,
  ValidationError,
} from './base'
import {
  ErrorCategory,
  ErrorCode,
  type ErrorContext,
  ErrorRecoveryType,
} from './types'

/**
 * Classify an unknown error into an ExplorerError
 */
export function classifyError(
  error: unknown,
  context?: ErrorContext,
): ExplorerError {
  if (error instanceof ExplorerError) {
    return error
  }

  if (error instanceof ZodError) {
    const issue = error.issues[0]
    const path = issue?.path.length
      ? `${issue.path.map(String).join('.')}: `
      : ''
    return new ValidationError(`${path}${issue?.message ?? error.message}`, {
      code: ErrorCode.DECODE_FAILED,
      context,
      cause: error,
    })
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new QueryCancelledError({ context, cause: error })
    }
    return new SystemError(error.message || 'Unknown error', {
      context,
      cause: error,
    })
  }

  return new SystemError(String(error), { context })
}

/**
 * Check if error is fatal
 */
export function isFatal(error: unknown): boolean {
  if (error instanceof ExplorerError) {
    return error.recoveryType === ErrorRecoveryType.FATAL
  }
  return false
}

/**
 * Check if error can be retried later, e.g. an orphan waiting for its parent
 */
export function isTransient(error: unknown): boolean {
  if (error instanceof ExplorerError) {
    return error.recoveryType === ErrorRecoveryType.TRANSIENT
  }
  return false
}

/**
 * Get error category from error
 */
export function getErrorCategory(error: unknown): ErrorCategory {
  if (error instanceof ExplorerError) {
    return error.category
  }
  return ErrorCategory.SYSTEM
}

/**
 * Create error context helper
 */
export function createErrorContext(
  component?: string,
  operation?: string,
  additional?: Record<string, unknown>,
): ErrorContext {
  return {
    component,
    operation,
    ...additional,
  }
}
