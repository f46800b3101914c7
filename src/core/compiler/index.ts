// src/core/compiler/index.ts
// Bytecode compiler, artifact codec and VM - module exports

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

export type {
  Instr,
  OpName,
  SymbolKind,
  SymbolEntry,
  CompiledUnit,
  CompileOptions,
  DecodedInstr,
  DecodedArtifact,
  SourceMapEntry,
  SourceMap,
  VMConfig,
  FunctionEntry,
  VMFrame,
  VMStatus,
  VMState,
  VMResult,
} from "./types";

export { OPCODES, OP_NAMES, ARTIFACT_MAGIC, ARTIFACT_VERSION, HEADER_SIZE, MAX_FUNC_NESTING } from "./types";

// ─────────────────────────────────────────────────────────────────
// Compilation
// ─────────────────────────────────────────────────────────────────

export { compile, countInstructions, formatInstr, disassemble, DEFAULT_LIBRARIES } from "./bytecode";

// ─────────────────────────────────────────────────────────────────
// Artifact codec
// ─────────────────────────────────────────────────────────────────

export { encodeProgram, decodeProgram, decodeInstruction, readHeader, encodedSize, codeSize } from "./codec";

// ─────────────────────────────────────────────────────────────────
// Source maps
// ─────────────────────────────────────────────────────────────────

export { buildSourceMap, lookupSpan, serializeSourceMap, parseSourceMap } from "./sourcemap";

// ─────────────────────────────────────────────────────────────────
// Virtual machine
// ─────────────────────────────────────────────────────────────────

export { defaultVMConfig, createVMState, step, run, execute, getCallStack, type VMOptions } from "./vm";

// ─────────────────────────────────────────────────────────────────
// Pipeline
// ─────────────────────────────────────────────────────────────────

export {
  compileSource,
  runSource,
  type PassName,
  type PassRecord,
  type CompilationResult,
  type CompileSourceOptions,
} from "./pipeline";
