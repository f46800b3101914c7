// src/core/reader/tokenize.ts
// Lexer: source text -> positioned tokens

import type { Outcome } from "../../outcome/outcome";
import { done, diagnosticFail } from "../../outcome/constructors";
import { span, type Span } from "../span";

export type TokenKind =
  | "eof"
  | "identifier"
  | "number"
  | "string"
  | "colon"
  | "assign"
  | "plus"
  | "minus"
  | "star"
  | "slash"
  | "lparen"
  | "rparen"
  | "lbrace"
  | "rbrace"
  | "semicolon"
  | "comma"
  | "let"
  | "def"
  | "write"
  | "import"
  | "comment"
  | "unknown";

/**
 * A lexed token. For `string` tokens `text` is the unescaped value, for
 * `import` tokens it is the library name. `length` is the number of source
 * characters the token covers.
 */
export type Token = {
  readonly kind: TokenKind;
  readonly text: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ["let", "let"],
  ["def", "def"],
  ["write", "write"],
]);

const PUNCTUATION: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ["=", "assign"],
  ["+", "plus"],
  ["-", "minus"],
  ["*", "star"],
  ["/", "slash"],
  ["(", "lparen"],
  [")", "rparen"],
  ["{", "lbrace"],
  ["}", "rbrace"],
  [";", "semicolon"],
  [",", "comma"],
]);

const isWS = (c: string) => c === " " || c === "\t" || c === "\r" || c === "\n";
const isDigit = (c: string) => c >= "0" && c <= "9";
const isLetter = (c: string) => /\p{L}/u.test(c);
const isIdStart = (c: string) => c === "_" || isLetter(c);
const isIdPart = (c: string) => c === "_" || /[\p{L}\p{N}]/u.test(c);

export function tokenSpan(tok: Token, file?: string): Span {
  return span(tok.line, tok.column, Math.max(tok.length, 1), file);
}

/**
 * On-demand lexer. Call `nextToken()` until it yields an `eof` token; the
 * only state is the cursor and its line/column.
 */
export class Lexer {
  private readonly src: string[];
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(source: string, private readonly file?: string) {
    // Iterate by code point so columns count characters, not UTF-16 units.
    this.src = Array.from(source);
  }

  nextToken(): Outcome<Token> {
    this.skipWhitespace();
    const line = this.line;
    const column = this.column;
    const start = this.pos;

    if (this.atEnd()) {
      return done(this.make("eof", "", line, column, start));
    }

    const c = this.peek();

    if (isDigit(c)) {
      while (!this.atEnd() && isDigit(this.peek())) this.advance();
      return done(this.make("number", this.slice(start), line, column, start));
    }

    if (isIdStart(c)) {
      while (!this.atEnd() && isIdPart(this.peek())) this.advance();
      const word = this.slice(start);
      return done(this.make(KEYWORDS.get(word) ?? "identifier", word, line, column, start));
    }

    if (c === "\"") {
      return this.string(line, column, start);
    }

    if (c === "<") {
      while (!this.atEnd() && this.peek() !== "\n") this.advance();
      return done(this.make("comment", this.slice(start + 1), line, column, start));
    }

    if (c === ":") {
      return done(this.colonOrImport(line, column, start));
    }

    this.advance();
    return done(this.make(PUNCTUATION.get(c) ?? "unknown", c, line, column, start));
  }

  private string(line: number, column: number, start: number): Outcome<Token> {
    this.advance(); // opening quote
    let value = "";
    while (!this.atEnd() && this.peek() !== "\"") {
      if (this.peek() === "\\") {
        this.advance();
        if (this.atEnd()) break;
      }
      value += this.advance();
    }
    if (this.atEnd()) {
      return diagnosticFail("E0002", {}, { span: span(line, column, this.pos - start, this.file) });
    }
    this.advance(); // closing quote
    return done(this.make("string", value, line, column, start));
  }

  /**
   * `:name:` is an import marker. Anything else after a colon is left for
   * the next token, and the colon stands alone.
   */
  private colonOrImport(line: number, column: number, start: number): Token {
    this.advance();
    const mark = { pos: this.pos, line: this.line, column: this.column };

    if (!this.atEnd() && isLetter(this.peek())) {
      while (!this.atEnd() && isIdPart(this.peek())) this.advance();
      const name = this.slice(mark.pos);
      if (!this.atEnd() && this.peek() === ":") {
        this.advance();
        return this.make("import", name, line, column, start);
      }
    }

    this.pos = mark.pos;
    this.line = mark.line;
    this.column = mark.column;
    return this.make("colon", ":", line, column, start);
  }

  private make(kind: TokenKind, text: string, line: number, column: number, start: number): Token {
    return { kind, text, line, column, length: this.pos - start };
  }

  private slice(from: number): string {
    return this.src.slice(from, this.pos).join("");
  }

  private atEnd(): boolean {
    return this.pos >= this.src.length;
  }

  private peek(): string {
    return this.src[this.pos] ?? "";
  }

  private advance(): string {
    const ch = this.src[this.pos++] ?? "";
    if (ch === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  private skipWhitespace(): void {
    while (!this.atEnd() && isWS(this.peek())) this.advance();
  }
}

/**
 * Lex a whole source text into the token stream the parser consumes:
 * comments are dropped, an `unknown` token is a lexical failure, and the
 * stream always ends with exactly one `eof`.
 */
export function tokenize(source: string, file?: string): Outcome<Token[]> {
  const lexer = new Lexer(source, file);
  const toks: Token[] = [];

  while (true) {
    const next = lexer.nextToken();
    if (next.tag === "Fail") return next;

    const tok = next.value;
    if (tok.kind === "comment") continue;
    if (tok.kind === "unknown") {
      return diagnosticFail("E0001", { char: tok.text }, { span: tokenSpan(tok, file) });
    }
    toks.push(tok);
    if (tok.kind === "eof") return done(toks);
  }
}
