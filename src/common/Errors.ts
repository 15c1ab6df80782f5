/**
 * Custom error types for the hash table.
 *
 * Only construction (and putting a non-integer key) can fail. A missing key
 * is never an error: lookups return undefined instead.
 */

export type InvalidArgumentReason =
  | 'non-positive capacity'
  | 'capacity too large'
  | 'load factor out of range'
  | 'non-integer key';

export class HashTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HashTableError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidArgumentError extends HashTableError {
  public readonly reason: InvalidArgumentReason;
  public readonly argument: string;

  constructor(reason: InvalidArgumentReason, argument: string, value: unknown) {
    super(`InvalidArgument: ${reason} (${argument}=${String(value)})`);
    this.name = 'InvalidArgumentError';
    this.reason = reason;
    this.argument = argument;
  }
}
