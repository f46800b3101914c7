// src/core/ast.ts
// Abstract syntax tree produced by the parser and consumed by the compiler.

import type { Span } from "./span";

export type BinaryOp = "+" | "-" | "*" | "/";

export type Expr =
  | { tag: "NumberLit"; value: number; span: Span }
  | { tag: "StringLit"; value: string; span: Span }
  | { tag: "Identifier"; name: string; span: Span }
  | { tag: "Binary"; op: BinaryOp; left: Expr; right: Expr; span: Span }
  | { tag: "Call"; callee: string; args: Expr[]; span: Span };

export type Stmt =
  | { tag: "VarDecl"; name: string; init?: Expr; span: Span }
  | { tag: "FuncDef"; name: string; params: string[]; body: Stmt[]; span: Span }
  | { tag: "Write"; expr: Expr; span: Span }
  | { tag: "Import"; library: string; span: Span }
  | { tag: "ExprStmt"; expr: Expr; span: Span };

export type Program = {
  readonly statements: Stmt[];
};
