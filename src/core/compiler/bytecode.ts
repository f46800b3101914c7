// src/core/compiler/bytecode.ts
// Single-pass bytecode generation from the AST, plus a disassembler

import type { Expr, Program, Stmt } from "../ast";
import type { Span } from "../span";
import type { Outcome, Fail } from "../../outcome/outcome";
import { done, diagnosticFail } from "../../outcome/constructors";
import { formatNumber } from "../eval/values";
import type { CompileOptions, CompiledUnit, Instr, SymbolEntry, SymbolKind } from "./types";

export const DEFAULT_LIBRARIES: readonly string[] = ["std"];

// ─────────────────────────────────────────────────────────────────
// Bytecode Generation Context
// ─────────────────────────────────────────────────────────────────

type BytecodeContext = {
  /** Instruction list currently being appended to */
  code: Instr[];
  symbols: SymbolEntry[];
  spans: Map<Instr, Span>;
  libraries: ReadonlySet<string>;
};

class CompileAbort extends Error {
  constructor(readonly outcome: Fail) {
    super(outcome.failure.message);
    this.name = "CompileAbort";
  }
}

function emit(ctx: BytecodeContext, instr: Instr, span: Span): void {
  ctx.code.push(instr);
  ctx.spans.set(instr, span);
}

function declare(ctx: BytecodeContext, name: string, kind: SymbolKind, span: Span): void {
  ctx.symbols.push({ name, kind, span });
}

/**
 * Compile `body` into a fresh instruction list, restoring the outer one
 * afterwards.
 */
function nested(ctx: BytecodeContext, body: () => void): Instr[] {
  const outer = ctx.code;
  const inner: Instr[] = [];
  ctx.code = inner;
  try {
    body();
  } finally {
    ctx.code = outer;
  }
  return inner;
}

// ─────────────────────────────────────────────────────────────────
// Expressions
// ─────────────────────────────────────────────────────────────────

const BINARY_OPS = {
  "+": "Add",
  "-": "Sub",
  "*": "Mul",
  "/": "Div",
} as const;

function compileExpr(ctx: BytecodeContext, expr: Expr): void {
  switch (expr.tag) {
    case "NumberLit":
      emit(ctx, { op: "PushNum", value: expr.value }, expr.span);
      return;
    case "StringLit":
      emit(ctx, { op: "PushStr", value: expr.value }, expr.span);
      return;
    case "Identifier":
      emit(ctx, { op: "Load", name: expr.name }, expr.span);
      return;
    case "Binary": {
      // `a + b + c` nests on the left without bound; walk that spine in a loop.
      const spine: Extract<Expr, { tag: "Binary" }>[] = [];
      let leftmost: Expr = expr;
      while (leftmost.tag === "Binary") {
        spine.push(leftmost);
        leftmost = leftmost.left;
      }
      compileExpr(ctx, leftmost);
      for (const node of spine.reverse()) {
        compileExpr(ctx, node.right);
        emit(ctx, { op: BINARY_OPS[node.op] }, node.span);
      }
      return;
    }
    case "Call":
      // Arguments in call order, then the callee's name on top.
      for (const arg of expr.args) compileExpr(ctx, arg);
      emit(ctx, { op: "PushStr", value: expr.callee }, expr.span);
      emit(ctx, { op: "Call", argc: expr.args.length }, expr.span);
      return;
    default:
      throw unsupported(expr);
  }
}

// ─────────────────────────────────────────────────────────────────
// Statements
// ─────────────────────────────────────────────────────────────────

function compileStmt(ctx: BytecodeContext, stmt: Stmt): void {
  switch (stmt.tag) {
    case "VarDecl":
      if (stmt.init) {
        compileExpr(ctx, stmt.init);
      } else {
        emit(ctx, { op: "PushNum", value: 0 }, stmt.span);
      }
      emit(ctx, { op: "Store", name: stmt.name }, stmt.span);
      declare(ctx, stmt.name, "variable", stmt.span);
      return;
    case "Write":
      compileExpr(ctx, stmt.expr);
      emit(ctx, { op: "Write" }, stmt.span);
      return;
    case "Import":
      if (!ctx.libraries.has(stmt.library)) {
        throw new CompileAbort(diagnosticFail("E0301", { name: stmt.library }, { span: stmt.span }));
      }
      return;
    case "ExprStmt":
      compileExpr(ctx, stmt.expr);
      emit(ctx, { op: "Pop" }, stmt.span);
      return;
    case "FuncDef":
      compileFunction(ctx, stmt);
      return;
    default:
      throw unsupported(stmt);
  }
}

/**
 * A function body yields its trailing expression statement's value, or 0
 * when it does not end in one.
 */
function compileFunction(ctx: BytecodeContext, def: Extract<Stmt, { tag: "FuncDef" }>): void {
  const seen = new Set<string>();
  for (const param of def.params) {
    if (seen.has(param)) {
      throw new CompileAbort(diagnosticFail("E0302", { name: param, fn: def.name }, { span: def.span }));
    }
    seen.add(param);
  }

  declare(ctx, def.name, "function", def.span);
  for (const param of def.params) declare(ctx, param, "parameter", def.span);

  const body = nested(ctx, () => {
    const last = def.body[def.body.length - 1];
    for (const stmt of def.body) {
      if (stmt === last && stmt.tag === "ExprStmt") {
        compileExpr(ctx, stmt.expr);
      } else {
        compileStmt(ctx, stmt);
      }
    }
    if (last?.tag !== "ExprStmt") {
      emit(ctx, { op: "PushNum", value: 0 }, def.span);
    }
    emit(ctx, { op: "Return" }, def.span);
  });

  emit(ctx, { op: "Func", name: def.name, params: [...def.params], body }, def.span);
}

function unsupported(node: { tag: string; span?: Span }): CompileAbort {
  return new CompileAbort(diagnosticFail("E0300", { construct: node.tag }, { span: node.span }));
}

// ─────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────

/**
 * Compile a program to a Halt-terminated instruction sequence.
 */
export function compile(program: Program, options: CompileOptions = {}): Outcome<CompiledUnit> {
  const ctx: BytecodeContext = {
    code: [],
    symbols: [],
    spans: new Map(),
    libraries: new Set(options.libraries ?? DEFAULT_LIBRARIES),
  };

  try {
    for (const stmt of program.statements) compileStmt(ctx, stmt);
  } catch (e) {
    if (e instanceof CompileAbort) return e.outcome;
    throw e;
  }

  const end = program.statements[program.statements.length - 1]?.span ?? { line: 1, column: 1, length: 0 };
  emit(ctx, { op: "Halt" }, end);
  return done({ code: ctx.code, symbols: ctx.symbols, spans: ctx.spans });
}

/**
 * Count instructions, including those inside function bodies.
 */
export function countInstructions(code: readonly Instr[]): number {
  let n = 0;
  for (const instr of code) {
    n++;
    if (instr.op === "Func") n += countInstructions(instr.body);
  }
  return n;
}

// ─────────────────────────────────────────────────────────────────
// Disassembly
// ─────────────────────────────────────────────────────────────────

export function formatInstr(instr: Instr): string {
  switch (instr.op) {
    case "PushNum":
      return `PushNum ${formatNumber(instr.value)}`;
    case "PushStr":
      return `PushStr ${JSON.stringify(instr.value)}`;
    case "Store":
    case "Load":
      return `${instr.op} ${instr.name}`;
    case "Call":
      return `Call ${instr.argc}`;
    case "Func":
      return `Func ${instr.name}(${instr.params.join(", ")})`;
    default:
      return instr.op;
  }
}

/**
 * One line per instruction, function bodies indented under their `Func`.
 */
export function disassemble(code: readonly Instr[], indent = ""): string {
  const lines: string[] = [];
  code.forEach((instr, i) => {
    lines.push(`${indent}${i.toString().padStart(4)}: ${formatInstr(instr)}`);
    if (instr.op === "Func") {
      lines.push(disassemble(instr.body, indent + "      "));
    }
  });
  return lines.join("\n");
}
