export { Decoder, DecoderOptions } from "./Decoder";
export { decode, tryDecode, classify, DecodeResult } from "./opcodes/decode";
export {
  formatInstruction,
  formatOperand,
  registerName,
  FormatOptions,
} from "./opcodes/format";
export { emulate, EmulatedInstruction } from "./opcodes/emulated";
export { WordCursor } from "./opcodes/cursor";
export {
  DecodeError,
  DecodeErrorKind,
  TruncatedInputError,
  UnknownOpcodeError,
  ReservedEncodingError,
} from "./opcodes/errors";
export {
  REG,
  Register,
  OperationSize,
  InstructionFormat,
  JumpCondition,
  ConstantValue,
  Operand,
  Instruction,
  DoubleOperandInstruction,
  SingleOperandInstruction,
  JumpInstruction,
} from "./opcodes/types";
