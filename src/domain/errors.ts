/**
 * Error types raised by the toolkit
 */

/**
 * Thrown by weighted searches running with `validate` when a caller
 * obligation (non-negative costs, consistent heuristic) is broken.
 */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

/**
 * Thrown when puzzle input cannot be converted to the requested shape.
 */
export class InputParseError extends Error {
  readonly token: string;

  constructor(message: string, token: string) {
    super(`${message}: ${JSON.stringify(token)}`);
    this.name = 'InputParseError';
    this.token = token;
  }
}
