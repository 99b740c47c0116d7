export type DecodeErrorKind =
  | "TruncatedInput"
  | "UnknownOpcode"
  | "ReservedEncoding";

/**
 * Base class for every failure `decode` reports. Malformed input never
 * surfaces as anything else.
 */
export abstract class DecodeError extends Error {
  abstract readonly kind: DecodeErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// The window ended before a word the instruction needs.
export class TruncatedInputError extends DecodeError {
  readonly kind = "TruncatedInput";

  constructor(
    readonly needed: number,
    readonly available: number,
  ) {
    super(`Truncated input: needed ${needed} bytes, ${available} available`);
  }
}

export class UnknownOpcodeError extends DecodeError {
  readonly kind = "UnknownOpcode";

  constructor(readonly rawWord: number) {
    super(`Illegal/unknown opcode: ${hex4(rawWord)}`);
  }
}

// Well-formed within its format, but undefined by the architecture.
export class ReservedEncodingError extends DecodeError {
  readonly kind = "ReservedEncoding";

  constructor(
    readonly rawWord: number,
    readonly reason: string,
  ) {
    super(`Reserved encoding ${hex4(rawWord)}: ${reason}`);
  }
}

export function hex4(word: number): string {
  return "0x" + word.toString(16).padStart(4, "0");
}
