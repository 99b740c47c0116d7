import { Instruction, Operand, OperationSize, REG, Register } from "./types";
import { emulate } from "./emulated";

export interface FormatOptions {
  aliases?: boolean; // PC/SP/SR instead of R0-R2 (default true)
  hex?: boolean; // 0x-prefixed immediates, addresses and offsets (default false)
  emulated?: boolean; // print emulated aliases such as RET or CLR (default false)
}

const ALIASES = ["PC", "SP", "SR"];

export function registerName(register: Register, aliases = true): string {
  if (aliases && register < ALIASES.length) return ALIASES[register];
  return `R${register}`;
}

function num(value: number, hex: boolean): string {
  if (!hex) return value.toString();
  const sign = value < 0 ? "-" : "";
  return `${sign}0x${Math.abs(value).toString(16)}`;
}

export function formatOperand(
  operand: Operand,
  options: FormatOptions = {},
): string {
  const aliases = options.aliases ?? true;
  const hex = options.hex ?? false;

  switch (operand.mode) {
    case "register":
      return registerName(operand.register, aliases);
    case "indexed":
      return `${num(operand.offset, hex)}(${registerName(operand.register, aliases)})`;
    case "symbolic":
      return `${num(operand.offset, hex)}(${registerName(REG.PC, aliases)})`;
    case "absolute":
      return `&${num(operand.address, hex)}`;
    case "indirect":
      return `@${registerName(operand.register, aliases)}`;
    case "autoincrement":
      return `@${registerName(operand.register, aliases)}+`;
    case "immediate":
      return `#${num(operand.value, hex)}`;
    case "constant":
      return operand.value.toString();
  }
}

/**
 * Render an instruction as `MNEMONIC[.B] operand[, operand]`. Word size
 * carries no suffix. Jumps print their signed byte offset as `$+n`/`$-n`.
 */
export function formatInstruction(
  instr: Instruction,
  options: FormatOptions = {},
): string {
  if (options.emulated) {
    const alias = emulate(instr);
    if (alias) {
      const mnemonic = suffixed(alias.mnemonic, alias.size);
      return alias.operand
        ? `${mnemonic} ${formatOperand(alias.operand, options)}`
        : mnemonic;
    }
  }

  switch (instr.format) {
    case "ConditionalJump": {
      const sign = instr.byteOffset < 0 ? "-" : "+";
      return `${instr.mnemonic} $${sign}${num(Math.abs(instr.byteOffset), options.hex ?? false)}`;
    }
    case "DoubleOperand":
      return `${suffixed(instr.mnemonic, instr.size)} ${formatOperand(instr.source, options)}, ${formatOperand(instr.destination, options)}`;
    case "SingleOperand":
      if (!instr.destination) return instr.mnemonic;
      return `${suffixed(instr.mnemonic, instr.size)} ${formatOperand(instr.destination, options)}`;
  }
}

function suffixed(mnemonic: string, size: OperationSize): string {
  return size === "byte" ? `${mnemonic}.B` : mnemonic;
}
