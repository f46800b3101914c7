// src/core/compiler/types.ts
// Instruction set, artifact layout and VM state types

import type { Span } from "../span";
import type { Val } from "../eval/values";
import type { Fail } from "../../outcome/outcome";

// ─────────────────────────────────────────────────────────────────
// Instructions
// ─────────────────────────────────────────────────────────────────

/**
 * Abstract instruction. `Func` carries its own body, which always ends in
 * `Return`; a compiled unit always ends in `Halt`.
 */
export type Instr =
  | { op: "PushNum"; value: number }          // Push a number
  | { op: "PushStr"; value: string }          // Push a string
  | { op: "Add" }                             // Pop r, l; push l + r
  | { op: "Sub" }                             // Pop r, l; push l - r
  | { op: "Mul" }                             // Pop r, l; push l * r
  | { op: "Div" }                             // Pop r, l; push l / r
  | { op: "Store"; name: string }             // Pop into the current frame
  | { op: "Load"; name: string }              // Push from frame, then globals
  | { op: "Call"; argc: number }              // Pop callee name, then argc args
  | { op: "Write" }                           // Pop and print
  | { op: "Halt" }                            // Stop execution
  | { op: "Pop" }                             // Discard top of stack
  | { op: "Func"; name: string; params: string[]; body: Instr[] }  // Define a function
  | { op: "Return" };                         // Pop result, leave the frame

export type OpName = Instr["op"];

/** One-byte tags, in wire order. */
export const OPCODES = {
  PushNum: 0,
  PushStr: 1,
  Add: 2,
  Sub: 3,
  Mul: 4,
  Div: 5,
  Store: 6,
  Load: 7,
  Call: 8,
  Write: 9,
  Halt: 10,
  Pop: 11,
  Func: 12,
  Return: 13,
} as const satisfies Record<OpName, number>;

/** Opcode names indexed by tag. */
export const OP_NAMES: readonly OpName[] = [
  "PushNum", "PushStr", "Add", "Sub", "Mul", "Div", "Store",
  "Load", "Call", "Write", "Halt", "Pop", "Func", "Return",
];

// ─────────────────────────────────────────────────────────────────
// Artifact header
// ─────────────────────────────────────────────────────────────────

/** "SBLC" */
export const ARTIFACT_MAGIC: readonly number[] = [0x53, 0x42, 0x4c, 0x43];
export const ARTIFACT_VERSION = 1;
export const HEADER_SIZE = ARTIFACT_MAGIC.length + 1;

/** Deepest `Func` nesting the decoder accepts. */
export const MAX_FUNC_NESTING = 256;

// ─────────────────────────────────────────────────────────────────
// Compiler output
// ─────────────────────────────────────────────────────────────────

export type SymbolKind = "variable" | "function" | "parameter";

export type SymbolEntry = {
  name: string;
  kind: SymbolKind;
  span: Span;
};

export type CompiledUnit = {
  /** Top-level instructions, ending in Halt */
  code: Instr[];
  /** Declared names, in declaration order */
  symbols: SymbolEntry[];
  /** Source span of each emitted instruction, keyed by identity */
  spans: Map<Instr, Span>;
};

export type CompileOptions = {
  /** Library names accepted by the import marker */
  libraries?: readonly string[];
  /** File name recorded in spans */
  file?: string;
};

// ─────────────────────────────────────────────────────────────────
// Decoding
// ─────────────────────────────────────────────────────────────────

export type DecodedInstr = {
  instr: Instr;
  /** Offset of the opcode byte */
  offset: number;
  /** Offset just past the instruction */
  next: number;
  /** For Func: offset of the first body instruction */
  bodyStart?: number;
};

export type DecodedArtifact = {
  version: number;
  code: Instr[];
  /** Bytes after the top-level Halt, never executed */
  trailingBytes: number;
};

// ─────────────────────────────────────────────────────────────────
// Source maps
// ─────────────────────────────────────────────────────────────────

export type SourceMapEntry = {
  offset: number;
  line: number;
  column: number;
  length: number;
};

export type SourceMap = {
  version: 1;
  file?: string;
  entries: SourceMapEntry[];
};

// ─────────────────────────────────────────────────────────────────
// VM
// ─────────────────────────────────────────────────────────────────

export type VMConfig = {
  /** Maximum operand stack depth */
  maxStackDepth: number;
  /** Maximum number of active function frames */
  maxCallDepth: number;
  /** Maximum instructions executed; 0 disables the limit */
  maxSteps: number;
};

export type FunctionEntry = {
  name: string;
  params: string[];
  /** Artifact holding the body */
  code: Uint8Array;
  /** Offset of the first body instruction */
  entry: number;
};

export type VMFrame = {
  /** Function name, "<main>" for the top level */
  name: string;
  code: Uint8Array;
  /** Byte offset of the next instruction */
  pc: number;
  /** The top-level frame's locals are the globals */
  locals: Map<string, Val>;
  /** Stack depth when the frame was entered */
  stackBase: number;
};

export type VMStatus = "running" | "halted" | "error";

export type VMState = {
  stack: Val[];
  globals: Map<string, Val>;
  functions: Map<string, FunctionEntry>;
  frames: VMFrame[];
  status: VMStatus;
  steps: number;
  /** Offset of the instruction being executed */
  lastOffset: number;
  /** Set when status is "error" */
  fault?: Fail;
  config: VMConfig;
  output: (line: string) => void;
};

export type VMResult = {
  steps: number;
  globals: Map<string, Val>;
  functions: Map<string, FunctionEntry>;
  /** Values left on the operand stack at Halt */
  stack: Val[];
};
