export type EngineErrorCode = 'MALFORMED_INPUT' | 'INVALID_CONFIGURATION' | 'PERSISTENCE_UNAVAILABLE'

export class EngineError extends Error {
  readonly code: EngineErrorCode
  readonly details: string[]

  constructor(code: EngineErrorCode, message: string, details: string[] = []) {
    super(message)
    this.name = 'EngineError'
    this.code = code
    this.details = details
  }
}

/** A request is missing a required field or carries a value of the wrong shape. */
export class MalformedInputError extends EngineError {
  constructor(message: string, details: string[] = []) {
    super('MALFORMED_INPUT', message, details)
    this.name = 'MalformedInputError'
  }
}

/** Raised while loading configuration; the previously published config stays active. */
export class InvalidConfigurationError extends EngineError {
  constructor(message: string, details: string[] = []) {
    super('INVALID_CONFIGURATION', message, details)
    this.name = 'InvalidConfigurationError'
  }
}

export class PersistenceUnavailableError extends EngineError {
  readonly underlying: unknown

  constructor(message: string, underlying?: unknown) {
    super('PERSISTENCE_UNAVAILABLE', message)
    this.name = 'PersistenceUnavailableError'
    this.underlying = underlying
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError
}
