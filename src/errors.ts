// src/errors.ts

export type BitValueErrorCode = "INVALID_ARGUMENT" | "OVERFLOW";

export class BitValueError extends Error {
  readonly code: BitValueErrorCode;

  constructor(code: BitValueErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad input at construction: negative or non-integral numbers, malformed literals. */
export class InvalidArgumentError extends BitValueError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

/** Only raised under the "throw" overflow policy. */
export class OverflowError extends BitValueError {
  constructor(message: string) {
    super("OVERFLOW", message);
  }
}
