/**
 * Driver Errors
 * Error classes raised by the driver, session, transaction and record layers
 */

/**
 * Base class for all graphwire errors
 */
export class GraphwireError extends Error {
  readonly code: string

  constructor(message: string, code: string = 'GRAPHWIRE_ERROR') {
    super(message)
    this.name = 'GraphwireError'
    this.code = code

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GraphwireError)
    }
  }
}

/**
 * Error when a connection URI uses a scheme other than bolt
 */
export class UnsupportedSchemeError extends GraphwireError {
  readonly scheme: string

  constructor(scheme: string, supported: readonly string[]) {
    super(
      `Unsupported URI scheme "${scheme}". Supported schemes: ${supported.join(', ')}`,
      'UNSUPPORTED_SCHEME'
    )
    this.name = 'UnsupportedSchemeError'
    this.scheme = scheme
  }
}

/**
 * Error when a connection URI cannot be parsed
 */
export class InvalidUriError extends GraphwireError {
  constructor(message: string) {
    super(`Invalid URI: ${message}`, 'INVALID_URI')
    this.name = 'InvalidUriError'
  }
}

/**
 * Error when driver configuration is invalid
 */
export class ConfigurationError extends GraphwireError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIGURATION')
    this.name = 'ConfigurationError'
  }
}

/**
 * Error when the server fails a RUN or PULL_ALL request.
 * Carries the server's failure code and message when it sent them.
 */
export class QueryFailureError extends GraphwireError {
  readonly statement: string
  readonly metadata: Record<string, unknown>

  constructor(statement: string, metadata: Record<string, unknown> = {}) {
    const code = typeof metadata.code === 'string' ? metadata.code : 'QUERY_FAILURE'
    const detail = typeof metadata.message === 'string' ? metadata.message : 'Query failed'
    super(detail, code)
    this.name = 'QueryFailureError'
    this.statement = statement
    this.metadata = metadata
  }
}

/**
 * Error when the session or transaction state machine is misused
 */
export class InvariantViolationError extends GraphwireError {
  constructor(message: string) {
    super(message, 'INVARIANT_VIOLATION')
    this.name = 'InvariantViolationError'
  }
}

/**
 * Error when a record has no field with the requested name or position
 */
export class FieldNotFoundError extends GraphwireError {
  readonly key: string | number

  constructor(key: string | number, available: readonly string[]) {
    const label = typeof key === 'number' ? 'index' : 'key'
    super(
      `This record has no field with ${label} '${key}'. Available keys: [${available.join(', ')}]`,
      'FIELD_NOT_FOUND'
    )
    this.name = 'FieldNotFoundError'
    this.key = key
  }
}

/**
 * Error when a record is indexed by something that is neither an integer nor a name
 */
export class IndexTypeError extends GraphwireError {
  constructor(key: unknown) {
    super(
      `Record index must be an integer or a field name, got ${typeof key} '${String(key)}'`,
      'INDEX_TYPE'
    )
    this.name = 'IndexTypeError'
  }
}

/**
 * Error when the peer sends bytes or messages the protocol does not allow
 */
export class ProtocolError extends GraphwireError {
  constructor(message: string) {
    super(message, 'PROTOCOL_ERROR')
    this.name = 'ProtocolError'
  }
}

/**
 * Error when the connection is closed, broken, or cannot be established
 */
export class ServiceUnavailableError extends GraphwireError {
  constructor(message: string, cause?: Error) {
    super(message, 'SERVICE_UNAVAILABLE')
    this.name = 'ServiceUnavailableError'
    if (cause) {
      this.cause = cause
    }
  }
}
