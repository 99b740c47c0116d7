import { decode } from "./opcodes/decode";
import { FormatOptions, formatInstruction } from "./opcodes/format";
import { Instruction } from "./opcodes/types";

export interface DecoderOptions extends FormatOptions {
  trace?: boolean; // log every decode to the console
}

/**
 * Configured front end over `decode`/`formatInstruction`. Holds only its
 * options; each call decodes one instruction independently of the last.
 */
class Decoder {
  private trace: boolean = false; // Enable debug logging
  private formatOptions: FormatOptions;

  constructor(options: DecoderOptions = {}) {
    this.trace = options.trace ?? false;
    this.formatOptions = {
      aliases: options.aliases ?? true,
      hex: options.hex ?? false,
      emulated: options.emulated ?? false,
    };
  }

  setTrace(enabled: boolean) {
    this.trace = enabled;
  }

  /**
   * Decode one instruction at the start of `bytes`. `address` only labels
   * the trace output; offsets in the result stay relative.
   */
  decode(bytes: ArrayLike<number>, address: number = 0): Instruction {
    let instr: Instruction;
    try {
      instr = decode(bytes);
    } catch (err) {
      if (this.trace) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`${hex(address, 4)}: decode failed: ${message}`);
      }
      throw err;
    }

    // Trace logging: show address and instruction bytes
    if (this.trace) {
      let traceOutput = `${hex(address, 4)}:`;
      for (let i = 0; i < instr.length; i++) {
        traceOutput += ` ${hex(bytes[i] & 0xff, 2)}`;
      }
      traceOutput += ` [${this.format(instr)}]`;
      console.log(traceOutput);
    }

    return instr;
  }

  format(instr: Instruction): string {
    return formatInstruction(instr, this.formatOptions);
  }

  // Decode and render in one step
  disassemble(bytes: ArrayLike<number>, address: number = 0): string {
    return this.format(this.decode(bytes, address));
  }
}

function hex(value: number, width: number): string {
  return value.toString(16).padStart(width, "0");
}

export { Decoder };
