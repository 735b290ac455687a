/**
 * Base Error Classes
 *
 * Structured errors with categories, codes, and recovery strategies
 */

import {
  ErrorCategory,
  ErrorCode,
  type ErrorContext,
  type ErrorMetadata,
  ErrorRecoveryType,
  ErrorSeverity,
} from './types'

export interface ExplorerErrorOptions {
  code: ErrorCode
  category: ErrorCategory
  severity?: ErrorSeverity
  recoveryType?: ErrorRecoveryType
  metadata?: ErrorMetadata
  context?: ErrorContext
  cause?: unknown
}

type SubclassOptions = {
  metadata?: ErrorMetadata
  context?: ErrorContext
  cause?: unknown
}

/**
 * Base error class for all explorer errors
 */
export class ExplorerError extends Error {
  public readonly code: ErrorCode
  public readonly category: ErrorCategory
  public readonly severity: ErrorSeverity
  public readonly recoveryType: ErrorRecoveryType
  public readonly metadata?: ErrorMetadata
  public readonly context?: ErrorContext
  public readonly timestamp: number

  constructor(message: string, options: ExplorerErrorOptions) {
    super(message, { cause: options.cause })
    this.name = this.constructor.name
    this.code = options.code
    this.category = options.category
    this.severity = options.severity ?? ErrorSeverity.MEDIUM
    this.recoveryType = options.recoveryType ?? ErrorRecoveryType.RECOVERABLE
    this.metadata = options.metadata
    this.context = options.context
    this.timestamp = Date.now()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Serialize error for logging or RPC responses
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      recoveryType: this.recoveryType,
      metadata: this.metadata,
      context: this.context,
      timestamp: this.timestamp,
    }
  }

  /**
   * Short form attached to a field that failed to resolve
   */
  toFieldError(): { code: ErrorCode; message: string } {
    return { code: this.code, message: this.message }
  }
}

/**
 * An id based lookup missed
 */
export class NotFoundError extends ExplorerError {
  constructor(entity: string, id: string, options: SubclassOptions = {}) {
    super(`${entity} ${id} not found`, {
      ...options,
      code: ErrorCode.NOT_FOUND,
      category: ErrorCategory.QUERY,
      severity: ErrorSeverity.LOW,
      recoveryType: ErrorRecoveryType.PERMANENT,
      metadata: { entity, id, ...options.metadata },
    })
  }
}

/**
 * A pagination cursor that is malformed or belongs to another sequence
 */
export class InvalidCursorError extends ExplorerError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, {
      ...options,
      code: ErrorCode.INVALID_CURSOR,
      category: ErrorCategory.QUERY,
      severity: ErrorSeverity.LOW,
      recoveryType: ErrorRecoveryType.PERMANENT,
    })
  }
}

/**
 * Pagination arguments that cannot be normalized
 */
export class PaginationError extends ExplorerError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, {
      ...options,
      code: ErrorCode.INVALID_PAGINATION,
      category: ErrorCategory.QUERY,
      severity: ErrorSeverity.LOW,
      recoveryType: ErrorRecoveryType.PERMANENT,
    })
  }
}

/**
 * The consumer abandoned the request
 */
export class QueryCancelledError extends ExplorerError {
  constructor(options: SubclassOptions = {}) {
    super('Query cancelled', {
      ...options,
      code: ErrorCode.QUERY_CANCELLED,
      category: ErrorCategory.QUERY,
      severity: ErrorSeverity.LOW,
      recoveryType: ErrorRecoveryType.PERMANENT,
    })
  }
}

/**
 * Validation-related errors
 */
export class ValidationError extends ExplorerError {
  constructor(
    message: string,
    options: SubclassOptions & { code?: ErrorCode } = {},
  ) {
    super(message, {
      ...options,
      code: options.code ?? ErrorCode.INVALID_INPUT,
      category: ErrorCategory.VALIDATION,
      severity: ErrorSeverity.MEDIUM,
      recoveryType: ErrorRecoveryType.PERMANENT,
    })
  }
}

/**
 * The parent of an ingested block is not linked yet
 */
export class OrphanBlockError extends ExplorerError {
  public readonly blockId: string
  public readonly missingParentId: string

  constructor(
    blockId: string,
    missingParentId: string,
    options: SubclassOptions = {},
  ) {
    super(`Block ${blockId} references unknown parent ${missingParentId}`, {
      ...options,
      code: ErrorCode.ORPHAN_BLOCK,
      category: ErrorCategory.INGESTION,
      severity: ErrorSeverity.LOW,
      recoveryType: ErrorRecoveryType.TRANSIENT,
      context: { blockId, ...options.context },
    })
    this.blockId = blockId
    this.missingParentId = missingParentId
  }
}

/**
 * A different block was already stored under the same id
 */
export class DuplicateBlockError extends ExplorerError {
  constructor(blockId: string, options: SubclassOptions = {}) {
    super(`Block ${blockId} already stored with different content`, {
      ...options,
      code: ErrorCode.DUPLICATE_BLOCK,
      category: ErrorCategory.INGESTION,
      severity: ErrorSeverity.HIGH,
      recoveryType: ErrorRecoveryType.PERMANENT,
      context: { blockId, ...options.context },
    })
  }
}

/**
 * Stored state no longer matches an invariant. Fatal for the affected subgraph.
 */
export class InternalConsistencyError extends ExplorerError {
  constructor(
    message: string,
    options: SubclassOptions & { code?: ErrorCode } = {},
  ) {
    super(message, {
      ...options,
      code: options.code ?? ErrorCode.INTERNAL_CONSISTENCY,
      category: ErrorCategory.CONSISTENCY,
      severity: ErrorSeverity.CRITICAL,
      recoveryType: ErrorRecoveryType.FATAL,
    })
  }
}

/**
 * Durable store failures
 */
export class StorageError extends ExplorerError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, {
      ...options,
      code: ErrorCode.DATABASE_ERROR,
      category: ErrorCategory.STORAGE,
      severity: ErrorSeverity.CRITICAL,
      recoveryType: ErrorRecoveryType.FATAL,
    })
  }
}

export class ConfigurationError extends ExplorerError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, {
      ...options,
      code: ErrorCode.CONFIGURATION_ERROR,
      category: ErrorCategory.SYSTEM,
      severity: ErrorSeverity.CRITICAL,
      recoveryType: ErrorRecoveryType.FATAL,
    })
  }
}

/**
 * Anything that could not be classified more precisely
 */
export class SystemError extends ExplorerError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, {
      ...options,
      code: ErrorCode.SYSTEM_ERROR,
      category: ErrorCategory.SYSTEM,
      severity: ErrorSeverity.HIGH,
      recoveryType: ErrorRecoveryType.RECOVERABLE,
    })
  }
}
