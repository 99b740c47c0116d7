import { Decoder } from "./Decoder";
import { TruncatedInputError, UnknownOpcodeError } from "./opcodes/errors";
import { le } from "./opcodes/test-utils";

describe("Decoder", () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation();
    errorSpy = jest.spyOn(console, "error").mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("Constructor", () => {
    it("should default every format option", () => {
      // aliases on, decimal, no emulated forms
      const decoder = new Decoder();
      expect(decoder.disassemble(le(0x4130))).toBe("MOV @SP+, PC");
      expect(decoder.disassemble(le(0x4039, 0x0010))).toBe("MOV #16, R9");
    });

    it("should take format options", () => {
      const decoder = new Decoder({ hex: true, aliases: false });
      expect(decoder.disassemble(le(0x4130))).toBe("MOV @R1+, R0");
      expect(decoder.disassemble(le(0x4039, 0x0010))).toBe("MOV #0x10, R9");
    });

    it("should print emulated forms when asked", () => {
      const decoder = new Decoder({ emulated: true });
      expect(decoder.disassemble(le(0x4130))).toBe("RET");
    });
  });

  describe("decode", () => {
    it("should decode without logging by default", () => {
      const decoder = new Decoder();
      const instr = decoder.decode([0x06, 0x45]);
      expect(instr.mnemonic).toBe("MOV");
      expect(logSpy).not.toHaveBeenCalled();
    });

    it("should log address, bytes and text when tracing", () => {
      const decoder = new Decoder({ trace: true });
      decoder.decode([0x06, 0x45, 0xff, 0xff], 0xf000);
      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(logSpy).toHaveBeenCalledWith("f000: 06 45 [MOV R5, R6]");
    });

    it("should trace only the consumed bytes", () => {
      const decoder = new Decoder();
      decoder.setTrace(true);
      decoder.decode([0x35, 0x40, 0x04, 0x00, 0x06, 0x45]);
      expect(logSpy).toHaveBeenCalledWith("0000: 35 40 04 00 [MOV #4, R5]");
    });

    it("should trace with the configured format options", () => {
      const decoder = new Decoder({ trace: true, emulated: true });
      decoder.decode([0x30, 0x41], 0x8000);
      expect(logSpy).toHaveBeenCalledWith("8000: 30 41 [RET]");
    });

    it("should stop logging after setTrace(false)", () => {
      const decoder = new Decoder({ trace: true });
      decoder.setTrace(false);
      decoder.decode([0x06, 0x45]);
      expect(logSpy).not.toHaveBeenCalled();
    });

    it("should log and rethrow decode failures when tracing", () => {
      const decoder = new Decoder({ trace: true });
      expect(() => decoder.decode([0x06], 0x10)).toThrow(TruncatedInputError);
      expect(errorSpy).toHaveBeenCalledWith(
        "0010: decode failed: Truncated input: needed 2 bytes, 1 available",
      );
      expect(logSpy).not.toHaveBeenCalled();
    });

    it("should rethrow failures silently when not tracing", () => {
      const decoder = new Decoder();
      expect(() => decoder.decode([0x00, 0x00])).toThrow(UnknownOpcodeError);
      expect(errorSpy).not.toHaveBeenCalled();
    });
  });

  describe("disassemble", () => {
    it("should decode and render one instruction", () => {
      const decoder = new Decoder();
      expect(decoder.disassemble([0xf9, 0x23])).toBe("JNE $-14");
    });

    it("should apply hex and alias options", () => {
      const decoder = new Decoder({ hex: true, aliases: false });
      expect(decoder.disassemble([0x90, 0x50, 0x10, 0x00, 0xfa, 0xff])).toBe(
        "ADD 0x10(R0), -0x6(R0)",
      );
    });
  });
});
