export type ReactorErrorCode =
  | "DUPLICATE_REGISTRATION"
  | "NOT_REGISTERED"
  | "CAPACITY_EXCEEDED"
  | "INVALID_INTEREST"
  | "MULTIPLEXER_FAILURE"

export class ReactorError extends Error {
  constructor(
    public readonly code: ReactorErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

export class DuplicateRegistrationError extends ReactorError {
  constructor(public readonly descriptorId: number) {
    super(
      "DUPLICATE_REGISTRATION",
      `descriptor ${descriptorId} is already registered`,
    )
  }
}

export class NotRegisteredError extends ReactorError {
  constructor(public readonly descriptorId: number) {
    super("NOT_REGISTERED", `descriptor ${descriptorId} is not registered`)
  }
}

export class CapacityExceededError extends ReactorError {
  constructor(public readonly limit: number) {
    super("CAPACITY_EXCEEDED", `cannot watch more than ${limit} descriptors`)
  }
}

export class InvalidInterestError extends ReactorError {
  constructor(public readonly mask: number) {
    super("INVALID_INTEREST", `invalid interest mask: ${mask}`)
  }
}

export class MultiplexerFailureError extends ReactorError {
  constructor(cause: Error) {
    super("MULTIPLEXER_FAILURE", `multiplexer failed: ${cause.message}`, {
      cause,
    })
  }
}
