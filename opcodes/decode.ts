import {
  DoubleOperandInstruction,
  Instruction,
  InstructionFormat,
  JumpInstruction,
  SingleOperandInstruction,
} from "./types";
import { TABLE_DOUBLE, TABLE_JUMP, TABLE_SINGLE } from "./tables";
import { WordCursor } from "./cursor";
import { DecodeError, UnknownOpcodeError } from "./errors";
import { resolveDestination, resolveSource } from "./operands";

export type DecodeResult =
  | { ok: true; instruction: Instruction }
  | { ok: false; error: DecodeError };

/**
 * Determine the format from the first word's leading bits. The three
 * prefixes never overlap; `undefined` means no format claims the word.
 */
export function classify(word: number): InstructionFormat | undefined {
  if (word >> 13 === 0b001) return "ConditionalJump";
  if (word >> 12 >= 0x4) return "DoubleOperand";
  // 0001 00xx x...: bits 9..7 pick one of seven single-operand opcodes
  const prefix = word >> 7;
  if (prefix >= 0x20 && prefix <= 0x26) return "SingleOperand";
  return undefined;
}

/**
 * Decode one instruction from the start of `bytes` (little-endian).
 * Consumes 2, 4 or 6 bytes; anything after that is ignored.
 * Throws a DecodeError on truncated or unassigned input.
 */
export function decode(bytes: ArrayLike<number>): Instruction {
  const cursor = new WordCursor(bytes);
  const first = cursor.takeWord();

  switch (classify(first)) {
    case "ConditionalJump":
      return decodeJump(first);
    case "DoubleOperand":
      return decodeDouble(cursor, first);
    case "SingleOperand":
      return decodeSingle(cursor, first);
    default:
      throw new UnknownOpcodeError(first);
  }
}

// Result-returning form of decode for callers scanning arbitrary windows
export function tryDecode(bytes: ArrayLike<number>): DecodeResult {
  try {
    return { ok: true, instruction: decode(bytes) };
  } catch (err) {
    if (err instanceof DecodeError) return { ok: false, error: err };
    throw err;
  }
}

function decodeJump(first: number): JumpInstruction {
  const desc = TABLE_JUMP[(first >> 10) & 0x07];
  const condition = desc?.condition;
  if (!desc || !condition) throw new UnknownOpcodeError(first);

  // 10-bit two's-complement word offset
  const raw = first & 0x03ff;
  const offset = raw & 0x0200 ? raw - 0x0400 : raw;

  const instr: JumpInstruction = {
    format: "ConditionalJump",
    mnemonic: desc.name,
    condition,
    offset,
    byteOffset: offset * 2,
    length: 2,
  };
  return Object.freeze(instr);
}

function decodeDouble(
  cursor: WordCursor,
  first: number,
): DoubleOperandInstruction {
  const opcode = first >> 12;
  const desc = TABLE_DOUBLE[opcode];
  if (!desc) throw new UnknownOpcodeError(first);

  const srcReg = (first >> 8) & 0x0f;
  const ad = (first >> 7) & 0x01;
  const size = first & 0x40 ? "byte" : "word";
  const as = (first >> 4) & 0x03;
  const dstReg = first & 0x0f;

  // The source extension word precedes the destination's
  const source = Object.freeze(resolveSource(cursor, srcReg, as, size));
  const destination = Object.freeze(
    resolveDestination(cursor, dstReg, ad, first),
  );

  const instr: DoubleOperandInstruction = {
    format: "DoubleOperand",
    mnemonic: desc.name,
    opcode,
    size,
    source,
    destination,
    length: cursor.consumed(),
  };
  return Object.freeze(instr);
}

function decodeSingle(
  cursor: WordCursor,
  first: number,
): SingleOperandInstruction {
  const opcode = (first >> 7) & 0x07;
  const desc = TABLE_SINGLE[opcode];
  if (!desc) throw new UnknownOpcodeError(first);

  if (desc.noOperand) {
    const reti: SingleOperandInstruction = {
      format: "SingleOperand",
      mnemonic: desc.name,
      opcode,
      size: "word",
      length: 2,
    };
    return Object.freeze(reti);
  }

  // Size-invariant operations ignore the B/W bit
  const size = desc.sized && first & 0x40 ? "byte" : "word";
  const as = (first >> 4) & 0x03;
  const register = first & 0x0f;
  const destination = Object.freeze(
    resolveSource(cursor, register, as, size),
  );

  const instr: SingleOperandInstruction = {
    format: "SingleOperand",
    mnemonic: desc.name,
    opcode,
    size,
    destination,
    length: cursor.consumed(),
  };
  return Object.freeze(instr);
}
