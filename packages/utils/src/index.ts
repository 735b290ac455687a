/**
 * Assertion, encoding and JSON helpers
 */
export * from './helpers'
/**
 * Async mutual exclusion
 */
export * from './lock'
/**
 * Result tuples for fallible operations
 */
export * from './safe'
