import { WordCursor } from "./cursor";
import { ReservedEncodingError } from "./errors";
import { Operand, OperationSize, REG, Register } from "./types";

// Interpret a raw extension word as a two's-complement offset
export function toSigned16(word: number): number {
  return word & 0x8000 ? word - 0x10000 : word;
}

/**
 * Resolve a source-style operand from its 2-bit As field.
 *
 * R2 and R3 double as constant generators: outside register-direct mode
 * (and indexed mode, for R2) they yield a fixed value and never touch the
 * cursor. Every other indexed/symbolic/absolute/immediate form consumes one
 * extension word.
 */
export function resolveSource(
  cursor: WordCursor,
  register: Register,
  as: number,
  size: OperationSize,
): Operand {
  switch (as & 0x03) {
    case 0b00:
      if (register === REG.CG2) return { mode: "constant", value: 0 };
      return { mode: "register", register };

    case 0b01:
      if (register === REG.CG2) return { mode: "constant", value: 1 };
      if (register === REG.PC)
        return { mode: "symbolic", offset: toSigned16(cursor.takeWord()) };
      if (register === REG.SR)
        return { mode: "absolute", address: cursor.takeWord() };
      return {
        mode: "indexed",
        register,
        offset: toSigned16(cursor.takeWord()),
      };

    case 0b10:
      if (register === REG.SR) return { mode: "constant", value: 4 };
      if (register === REG.CG2) return { mode: "constant", value: 2 };
      return { mode: "indirect", register };

    default:
      if (register === REG.PC)
        return { mode: "immediate", value: cursor.takeWord() };
      if (register === REG.SR) return { mode: "constant", value: 8 };
      if (register === REG.CG2) return { mode: "constant", value: -1 };
      return {
        mode: "autoincrement",
        register,
        // SP stays word-aligned even for byte operations
        increment: size === "byte" && register !== REG.SP ? 1 : 2,
      };
  }
}

/**
 * Resolve a double-operand destination from its 1-bit Ad field. Only
 * register and indexed-family modes exist here; `rawWord` is reported when
 * the combination is reserved.
 */
export function resolveDestination(
  cursor: WordCursor,
  register: Register,
  ad: number,
  rawWord: number,
): Operand {
  if ((ad & 0x01) === 0) return { mode: "register", register };

  if (register === REG.CG2)
    throw new ReservedEncodingError(
      rawWord,
      "constant generator R3 used as an indexed destination",
    );
  if (register === REG.PC)
    return { mode: "symbolic", offset: toSigned16(cursor.takeWord()) };
  if (register === REG.SR)
    return { mode: "absolute", address: cursor.takeWord() };
  return { mode: "indexed", register, offset: toSigned16(cursor.takeWord()) };
}
