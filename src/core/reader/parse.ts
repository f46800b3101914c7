// src/core/reader/parse.ts
// Recursive-descent parser: tokens -> Program

import type { Token, TokenKind } from "./tokenize";
import { tokenize, tokenSpan } from "./tokenize";
import type { BinaryOp, Expr, Program, Stmt } from "../ast";
import type { Outcome, Fail } from "../../outcome/outcome";
import { done, diagnosticFail } from "../../outcome/constructors";

/** Deepest expression or function-body nesting the parser accepts. */
export const MAX_NESTING = 256;

const KIND_TEXT: Partial<Record<TokenKind, string>> = {
  colon: "':'",
  assign: "'='",
  plus: "'+'",
  minus: "'-'",
  star: "'*'",
  slash: "'/'",
  lparen: "'('",
  rparen: "')'",
  lbrace: "'{'",
  rbrace: "'}'",
  semicolon: "';'",
  comma: "','",
  let: "'let'",
  def: "'def'",
  write: "'write'",
};

export function describeToken(tok: Token): string {
  switch (tok.kind) {
    case "eof":
      return "end of input";
    case "identifier":
      return `identifier '${tok.text}'`;
    case "number":
      return `number ${tok.text}`;
    case "string":
      return `string "${tok.text}"`;
    case "import":
      return `import marker ':${tok.text}:'`;
    default:
      return KIND_TEXT[tok.kind] ?? `'${tok.text}'`;
  }
}

/**
 * Unwinds the descent to `parse()`, which turns it back into a Fail.
 */
class ParseAbort extends Error {
  constructor(readonly outcome: Fail) {
    super(outcome.failure.message);
    this.name = "ParseAbort";
  }
}

class Parser {
  private i = 0;
  private depth = 0;

  constructor(private readonly toks: Token[], private readonly file?: string) {}

  program(): Program {
    const statements: Stmt[] = [];
    while (!this.check("eof")) statements.push(this.statement());
    return { statements };
  }

  // ─────────────────────────────────────────────────────────────────
  // Statements
  // ─────────────────────────────────────────────────────────────────

  private statement(): Stmt {
    const tok = this.peek();
    switch (tok.kind) {
      case "let":
        this.advance();
        return this.varDecl();
      case "def":
        this.advance();
        return this.funcDef();
      case "import":
        this.advance();
        this.expect("semicolon", "';' after import");
        return { tag: "Import", library: tok.text, span: this.span(tok) };
      case "write": {
        this.advance();
        const expr = this.expr();
        this.expect("semicolon", "';' after write");
        return { tag: "Write", expr, span: this.span(tok) };
      }
      default: {
        const expr = this.expr();
        this.expect("semicolon", "';' after expression");
        return { tag: "ExprStmt", expr, span: expr.span };
      }
    }
  }

  private varDecl(): Stmt {
    const name = this.expect("identifier", "variable name");
    let init: Expr | undefined;
    if (this.match("assign")) init = this.expr();
    this.expect("semicolon", "';' after variable declaration");
    const s = this.span(name);
    return init ? { tag: "VarDecl", name: name.text, init, span: s } : { tag: "VarDecl", name: name.text, span: s };
  }

  private funcDef(): Stmt {
    const name = this.expect("identifier", "function name");
    this.expect("lparen", "'(' after function name");
    const params: string[] = [];
    if (!this.check("rparen")) {
      do {
        params.push(this.expect("identifier", "parameter name").text);
      } while (this.match("comma"));
    }
    this.expect("rparen", "')' after parameters");
    this.expect("lbrace", "'{' before function body");
    const body: Stmt[] = [];
    while (!this.check("rbrace")) {
      if (this.check("eof")) {
        this.expect("rbrace", "'}' after function body");
      }
      body.push(this.nest(() => this.statement()));
    }
    this.advance();
    return { tag: "FuncDef", name: name.text, params, body, span: this.span(name) };
  }

  // ─────────────────────────────────────────────────────────────────
  // Expressions
  // ─────────────────────────────────────────────────────────────────

  private expr(): Expr {
    return this.nest(() => this.additive());
  }

  private additive(): Expr {
    let left = this.multiplicative();
    while (this.check("plus") || this.check("minus")) {
      const opTok = this.advance();
      const right = this.multiplicative();
      left = this.binary(opTok, left, right);
    }
    return left;
  }

  private multiplicative(): Expr {
    let left = this.unary();
    while (this.check("star") || this.check("slash")) {
      const opTok = this.advance();
      const right = this.unary();
      left = this.binary(opTok, left, right);
    }
    return left;
  }

  private unary(): Expr {
    if (this.check("minus")) {
      const minus = this.advance();
      const operand = this.nest(() => this.unary());
      const s = this.span(minus);
      return { tag: "Binary", op: "-", left: { tag: "NumberLit", value: 0, span: s }, right: operand, span: s };
    }
    return this.primary();
  }

  private primary(): Expr {
    const tok = this.peek();
    switch (tok.kind) {
      case "number":
        this.advance();
        return { tag: "NumberLit", value: Number(tok.text), span: this.span(tok) };
      case "string":
        this.advance();
        return { tag: "StringLit", value: tok.text, span: this.span(tok) };
      case "identifier": {
        this.advance();
        if (!this.match("lparen")) {
          return { tag: "Identifier", name: tok.text, span: this.span(tok) };
        }
        const args: Expr[] = [];
        if (!this.check("rparen")) {
          do {
            args.push(this.expr());
          } while (this.match("comma"));
        }
        this.expect("rparen", "')' after arguments");
        return { tag: "Call", callee: tok.text, args, span: this.span(tok) };
      }
      case "lparen": {
        this.advance();
        const inner = this.expr();
        this.expect("rparen", "')' after expression");
        return inner;
      }
      default:
        throw new ParseAbort(
          diagnosticFail("E0011", { found: describeToken(tok) }, { span: this.span(tok) })
        );
    }
  }

  /**
   * Run `parse` one level deeper, failing at the current token once the
   * nesting limit is reached.
   */
  private nest<T>(parse: () => T): T {
    if (this.depth >= MAX_NESTING) {
      throw new ParseAbort(
        diagnosticFail("E0012", { limit: MAX_NESTING }, { span: this.span(this.peek()) })
      );
    }
    this.depth++;
    const result = parse();
    this.depth--;
    return result;
  }

  private binary(opTok: Token, left: Expr, right: Expr): Expr {
    const op: BinaryOp =
      opTok.kind === "plus" ? "+" : opTok.kind === "minus" ? "-" : opTok.kind === "star" ? "*" : "/";
    return { tag: "Binary", op, left, right, span: this.span(opTok) };
  }

  // ─────────────────────────────────────────────────────────────────
  // Token cursor
  // ─────────────────────────────────────────────────────────────────

  private peek(): Token {
    const tok = this.toks[Math.min(this.i, this.toks.length - 1)];
    if (!tok) {
      throw new Error("parse: token stream must end with eof");
    }
    return tok;
  }

  private advance(): Token {
    const tok = this.peek();
    if (tok.kind !== "eof") this.i++;
    return tok;
  }

  private check(kind: TokenKind): boolean {
    return this.peek().kind === kind;
  }

  private match(kind: TokenKind): boolean {
    if (!this.check(kind)) return false;
    this.advance();
    return true;
  }

  private expect(kind: TokenKind, expected: string): Token {
    const tok = this.peek();
    if (tok.kind === kind) return this.advance();
    throw new ParseAbort(
      diagnosticFail("E0010", { expected, found: describeToken(tok) }, { span: this.span(tok) })
    );
  }

  private span(tok: Token) {
    return tokenSpan(tok, this.file);
  }
}

/**
 * Parse a filtered token stream (see `tokenize`). Fails on the first
 * missing or unexpected token; never returns a partial tree.
 */
export function parse(toks: Token[], file?: string): Outcome<Program> {
  const last = toks[toks.length - 1];
  if (last?.kind !== "eof") {
    toks = [...toks, { kind: "eof", text: "", line: last?.line ?? 1, column: (last?.column ?? 0) + (last?.length ?? 1), length: 0 }];
  }
  try {
    return done(new Parser(toks, file).program());
  } catch (e) {
    if (e instanceof ParseAbort) return e.outcome;
    throw e;
  }
}

/**
 * Source text -> Program.
 */
export function parseSource(source: string, file?: string): Outcome<Program> {
  const toks = tokenize(source, file);
  if (toks.tag === "Fail") return toks;
  return parse(toks.value, file);
}
