import {
  ConstantValue,
  Instruction,
  Operand,
  OperationSize,
  REG,
  Register,
} from "./types";

// Core instructions that assemblers print under a shorter alias
export interface EmulatedInstruction {
  mnemonic: string;
  size: OperationSize;
  operand?: Operand;
}

interface ConstantForm {
  base: string;
  constant: ConstantValue;
  alias: string;
}

// `base #constant, dst` -> `alias dst`
const CONSTANT_FORMS: readonly ConstantForm[] = [
  { base: "MOV", constant: 0, alias: "CLR" },
  { base: "ADD", constant: 1, alias: "INC" },
  { base: "ADD", constant: 2, alias: "INCD" },
  { base: "ADDC", constant: 0, alias: "ADC" },
  { base: "SUBC", constant: 0, alias: "SBC" },
  { base: "SUB", constant: 1, alias: "DEC" },
  { base: "SUB", constant: 2, alias: "DECD" },
  { base: "CMP", constant: 0, alias: "TST" },
  { base: "DADD", constant: 0, alias: "DADC" },
  { base: "XOR", constant: -1, alias: "INV" },
];

// `base #bit, SR` -> `alias`
const STATUS_FORMS: readonly ConstantForm[] = [
  { base: "BIC", constant: 1, alias: "CLRC" },
  { base: "BIC", constant: 2, alias: "CLRZ" },
  { base: "BIC", constant: 4, alias: "CLRN" },
  { base: "BIC", constant: 8, alias: "DINT" },
  { base: "BIS", constant: 1, alias: "SETC" },
  { base: "BIS", constant: 2, alias: "SETZ" },
  { base: "BIS", constant: 4, alias: "SETN" },
  { base: "BIS", constant: 8, alias: "EINT" },
];

function isRegister(op: Operand, register: Register): boolean {
  return op.mode === "register" && op.register === register;
}

function isConstant(op: Operand, value: ConstantValue): boolean {
  return op.mode === "constant" && op.value === value;
}

function lookup(
  forms: readonly ConstantForm[],
  base: string,
  source: Operand,
): string | undefined {
  if (source.mode !== "constant") return undefined;
  const value = source.value;
  return forms.find((f) => f.base === base && f.constant === value)?.alias;
}

// Whether source and destination name the same location
function sameLocation(src: Operand, dst: Operand): boolean {
  switch (src.mode) {
    case "register":
      return dst.mode === "register" && dst.register === src.register;
    case "indexed":
      return (
        dst.mode === "indexed" &&
        dst.register === src.register &&
        dst.offset === src.offset
      );
    case "absolute":
      return dst.mode === "absolute" && dst.address === src.address;
    case "symbolic":
      // PC-relative to each operand's own extension word, one word apart
      return dst.mode === "symbolic" && dst.offset === src.offset - 2;
    default:
      return false;
  }
}

/**
 * Recognise the emulated instruction a double-operand encoding stands for,
 * e.g. `MOV @SP+, PC` is `RET` and `XOR #-1, R5` is `INV R5`. Returns
 * undefined when the encoding has no alias.
 */
export function emulate(instr: Instruction): EmulatedInstruction | undefined {
  if (instr.format !== "DoubleOperand") return undefined;
  const { mnemonic, size, source, destination } = instr;

  if (mnemonic === "MOV") {
    if (isConstant(source, 0) && isRegister(destination, REG.CG2))
      return size === "word" ? { mnemonic: "NOP", size } : undefined;

    const popped = source.mode === "autoincrement" && source.register === REG.SP;
    if (popped && isRegister(destination, REG.PC))
      return size === "word" ? { mnemonic: "RET", size } : undefined;
    if (popped) return { mnemonic: "POP", size, operand: destination };

    if (isRegister(destination, REG.PC))
      return size === "word"
        ? { mnemonic: "BR", size, operand: source }
        : undefined;
  }

  if (isRegister(destination, REG.SR) && size === "word") {
    const status = lookup(STATUS_FORMS, mnemonic, source);
    if (status) return { mnemonic: status, size };
  }

  const alias = lookup(CONSTANT_FORMS, mnemonic, source);
  if (alias) return { mnemonic: alias, size, operand: destination };

  if (
    (mnemonic === "ADD" || mnemonic === "ADDC") &&
    sameLocation(source, destination)
  ) {
    return {
      mnemonic: mnemonic === "ADD" ? "RLA" : "RLC",
      size,
      operand: destination,
    };
  }

  return undefined;
}
