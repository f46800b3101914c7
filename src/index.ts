// src/index.ts
// Sable - Public API
//
// Interface for the CLIs, editor tooling and embedders.

// ═══════════════════════════════════════════════════════════════════════════════
// FRONT END
// ═══════════════════════════════════════════════════════════════════════════════

export { type Span, span, formatSpan } from "./core/span";
export { type Token, type TokenKind, Lexer, tokenize, tokenSpan } from "./core/reader/tokenize";
export { parse, parseSource, describeToken, MAX_NESTING } from "./core/reader/parse";
export type { Program, Stmt, Expr, BinaryOp } from "./core/ast";

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES
// ═══════════════════════════════════════════════════════════════════════════════

export { type Val, VNum, VStr, kindOf, formatNumber, formatValue } from "./core/eval/values";

// ═══════════════════════════════════════════════════════════════════════════════
// COMPILER, CODEC & VM
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/compiler";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./outcome";
