/**
 * Common test utilities for decoder testing
 */

// Lay out 16-bit words as a little-endian byte window
export function le(...words: number[]): number[] {
  const bytes: number[] = [];
  for (const word of words) {
    bytes.push(word & 0xff, (word >> 8) & 0xff);
  }
  return bytes;
}

// Assemble a double-operand first word from its fields
export function doubleWord(fields: {
  opcode: number;
  src: number;
  ad: number;
  byte?: boolean;
  as: number;
  dst: number;
}): number {
  return (
    (fields.opcode << 12) |
    (fields.src << 8) |
    (fields.ad << 7) |
    (fields.byte ? 0x40 : 0) |
    (fields.as << 4) |
    fields.dst
  );
}

// Assemble a single-operand first word from its fields
export function singleWord(fields: {
  opcode: number;
  byte?: boolean;
  as: number;
  reg: number;
}): number {
  return (
    0x1000 |
    (fields.opcode << 7) |
    (fields.byte ? 0x40 : 0) |
    (fields.as << 4) |
    fields.reg
  );
}
