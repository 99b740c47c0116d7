// Strongly-typed, table-driven opcode metadata for the MSP430 core

export type Register = number; // 0..15

// Registers with a fixed role
export const REG = {
  PC: 0,
  SP: 1,
  SR: 2, // also constant generator 1
  CG1: 2,
  CG2: 3,
} as const;

export type OperationSize = "word" | "byte";
export type InstructionFormat =
  | "DoubleOperand"
  | "SingleOperand"
  | "ConditionalJump";

export type JumpCondition = "ne" | "eq" | "nc" | "c" | "n" | "ge" | "l" | "always";

export type ConstantValue = -1 | 0 | 1 | 2 | 4 | 8;

export type Operand =
  | { mode: "register"; register: Register }
  | { mode: "indexed"; register: Register; offset: number }
  | { mode: "symbolic"; offset: number } // indexed off the PC
  | { mode: "absolute"; address: number }
  | { mode: "indirect"; register: Register }
  | { mode: "autoincrement"; register: Register; increment: 1 | 2 }
  | { mode: "immediate"; value: number }
  | { mode: "constant"; value: ConstantValue };

export interface DoubleOperandInstruction {
  format: "DoubleOperand";
  mnemonic: string;
  opcode: number; // top nibble
  size: OperationSize;
  source: Operand;
  destination: Operand;
  length: number; // bytes consumed: 2, 4 or 6
}

export interface SingleOperandInstruction {
  format: "SingleOperand";
  mnemonic: string;
  opcode: number; // bits 9..7
  size: OperationSize;
  destination?: Operand; // absent for RETI
  length: number;
}

export interface JumpInstruction {
  format: "ConditionalJump";
  mnemonic: string;
  condition: JumpCondition;
  offset: number; // signed, in words
  byteOffset: number; // 2 * offset, relative to the next instruction
  length: 2;
}

export type Instruction =
  | DoubleOperandInstruction
  | SingleOperandInstruction
  | JumpInstruction;

export interface InstrDescriptor {
  name: string; // display name, e.g. "MOV", "JNE"
  format: InstructionFormat;
  opcode: number; // number within that format
  // Single-operand only: whether the B/W bit selects the size
  sized?: boolean;
  // Single-operand only: RETI has no operand fields
  noOperand?: boolean;
  // Jumps only
  condition?: JumpCondition;
}

// Tiny helpers to build descriptors with range checks
function mk(format: InstructionFormat, min: number, max: number) {
  return (
    opcode: number,
    init: Omit<InstrDescriptor, "format" | "opcode">,
  ): InstrDescriptor => {
    if (opcode < min || opcode > max)
      throw new Error(`${format} opcode out of range: ${opcode}`);
    return { format, opcode, ...init };
  };
}

export const d2 = mk("DoubleOperand", 0x4, 0xf);
export const d1 = mk("SingleOperand", 0x0, 0x7);
export const dj = mk("ConditionalJump", 0x0, 0x7);
