import { InstrDescriptor, d1, d2, dj } from "./types";

// Per-format opcode tables. Undefined entries = unassigned.
// DoubleOperand is indexed by the top nibble, SingleOperand by bits 9..7
// (under the 0001 00 prefix), ConditionalJump by the condition field.
export const TABLE_DOUBLE: Array<InstrDescriptor | undefined> = [];
export const TABLE_SINGLE: Array<InstrDescriptor | undefined> = [];
export const TABLE_JUMP: Array<InstrDescriptor | undefined> = [];

// --- Double-operand opcodes (0x4000-0xFFFF) ---
// 0x0-0x3 are not double-operand: 0x1 holds the single-operand group,
// 0x2-0x3 the jumps.
TABLE_DOUBLE[0x4] = d2(0x4, { name: "MOV" });
TABLE_DOUBLE[0x5] = d2(0x5, { name: "ADD" });
TABLE_DOUBLE[0x6] = d2(0x6, { name: "ADDC" });
TABLE_DOUBLE[0x7] = d2(0x7, { name: "SUBC" });
TABLE_DOUBLE[0x8] = d2(0x8, { name: "SUB" });
TABLE_DOUBLE[0x9] = d2(0x9, { name: "CMP" });
TABLE_DOUBLE[0xa] = d2(0xa, { name: "DADD" });
TABLE_DOUBLE[0xb] = d2(0xb, { name: "BIT" });
TABLE_DOUBLE[0xc] = d2(0xc, { name: "BIC" });
TABLE_DOUBLE[0xd] = d2(0xd, { name: "BIS" });
TABLE_DOUBLE[0xe] = d2(0xe, { name: "XOR" });
TABLE_DOUBLE[0xf] = d2(0xf, { name: "AND" });

// --- Single-operand opcodes (0x1000-0x137F) ---
TABLE_SINGLE[0x0] = d1(0x0, { name: "RRC", sized: true });
TABLE_SINGLE[0x1] = d1(0x1, { name: "SWPB" });
TABLE_SINGLE[0x2] = d1(0x2, { name: "RRA", sized: true });
TABLE_SINGLE[0x3] = d1(0x3, { name: "SXT" });
TABLE_SINGLE[0x4] = d1(0x4, { name: "PUSH", sized: true });
TABLE_SINGLE[0x5] = d1(0x5, { name: "CALL" });
TABLE_SINGLE[0x6] = d1(0x6, { name: "RETI", noOperand: true });
// TABLE_SINGLE[0x7] = unassigned on the base core

// --- Conditional jumps (0x2000-0x3FFF) ---
TABLE_JUMP[0x0] = dj(0x0, { name: "JNE", condition: "ne" }); // also JNZ
TABLE_JUMP[0x1] = dj(0x1, { name: "JEQ", condition: "eq" }); // also JZ
TABLE_JUMP[0x2] = dj(0x2, { name: "JNC", condition: "nc" }); // also JLO
TABLE_JUMP[0x3] = dj(0x3, { name: "JC", condition: "c" }); // also JHS
TABLE_JUMP[0x4] = dj(0x4, { name: "JN", condition: "n" });
TABLE_JUMP[0x5] = dj(0x5, { name: "JGE", condition: "ge" });
TABLE_JUMP[0x6] = dj(0x6, { name: "JL", condition: "l" });
TABLE_JUMP[0x7] = dj(0x7, { name: "JMP", condition: "always" });
