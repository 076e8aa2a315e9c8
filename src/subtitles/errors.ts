/**
 * Thrown when timestamp text does not match HH:MM:SS,mmm
 */
export class FormatError extends Error {
  readonly input: string;

  constructor(message: string, input: string) {
    super(message);
    this.name = 'FormatError';
    this.input = input;
  }
}

/**
 * Thrown when a caller passes an argument outside an operation's contract,
 * e.g. a negative millisecond count to formatTimestamp
 */
export class PreconditionViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionViolation';
  }
}
