/**
 * Raised when a caller passes a value outside what an operation accepts:
 * a game count below 1, a door outside 1..N, an unsupported door count.
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "InvalidArgument"
  }
}

/**
 * Raised when internal round state breaks its invariants, e.g. an assignment
 * that does not hold exactly one prize.
 */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "InvalidState"
  }
}
