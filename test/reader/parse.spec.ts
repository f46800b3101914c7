import { describe, it, expect } from "vitest";
import { parseSource, parse, MAX_NESTING } from "../../src/core/reader/parse";
import { unwrap } from "../../src/outcome/matchers";
import { failureOf } from "../helpers/sableHarness";

const statements = (src: string) => unwrap(parseSource(src)).statements;

describe("parser", () => {
  describe("expressions", () => {
    it("binds * tighter than +", () => {
      expect(statements("write 2 + 3 * 4;")[0]).toMatchObject({
        tag: "Write",
        expr: {
          tag: "Binary",
          op: "+",
          left: { tag: "NumberLit", value: 2 },
          right: { tag: "Binary", op: "*", left: { value: 3 }, right: { value: 4 } },
        },
      });
    });

    it("associates to the left", () => {
      expect(statements("1 - 2 - 3;")[0]).toMatchObject({
        tag: "ExprStmt",
        expr: {
          op: "-",
          left: { op: "-", left: { value: 1 }, right: { value: 2 } },
          right: { value: 3 },
        },
      });
    });

    it("groups with parentheses", () => {
      expect(statements("(1 + 2) * 3;")[0]).toMatchObject({
        expr: { op: "*", left: { op: "+" }, right: { value: 3 } },
      });
    });

    it("desugars unary minus to subtraction from zero", () => {
      expect(statements("--5;")[0]).toMatchObject({
        expr: {
          tag: "Binary",
          op: "-",
          left: { tag: "NumberLit", value: 0 },
          right: { tag: "Binary", op: "-", left: { value: 0 }, right: { value: 5 } },
        },
      });
    });

    it("parses calls with arguments", () => {
      expect(statements('f(1, "a", g());')[0]).toMatchObject({
        expr: {
          tag: "Call",
          callee: "f",
          args: [{ tag: "NumberLit" }, { tag: "StringLit", value: "a" }, { tag: "Call", callee: "g", args: [] }],
        },
      });
    });

    it("spans a binary expression at its operator", () => {
      expect(statements("1 + 2;")[0]?.span).toEqual({ line: 1, column: 3, length: 1 });
    });
  });

  describe("statements", () => {
    it("parses declarations with and without initializers", () => {
      const [withInit, without] = statements("let x = 1; let y;");
      expect(withInit).toMatchObject({ tag: "VarDecl", name: "x", init: { value: 1 } });
      expect(without).toEqual({ tag: "VarDecl", name: "y", span: { line: 1, column: 16, length: 1 } });
    });

    it("parses function definitions", () => {
      expect(statements("def add(a, b) { a + b; }")[0]).toMatchObject({
        tag: "FuncDef",
        name: "add",
        params: ["a", "b"],
        body: [{ tag: "ExprStmt", expr: { op: "+" } }],
      });
    });

    it("parses import markers", () => {
      expect(statements(":std:;")[0]).toMatchObject({ tag: "Import", library: "std" });
    });

    it("accepts an empty program", () => {
      expect(statements("  < nothing here\n")).toEqual([]);
    });

    it("appends a missing end-of-input token", () => {
      const program = parse([{ kind: "number", text: "1", line: 1, column: 1, length: 1 }]);
      const f = failureOf(program);
      expect(f.failure.message).toBe("Expected ';' after expression, found end of input");
      expect(f.failure.diagnostics[0]?.span).toEqual({ line: 1, column: 2, length: 1 });
    });
  });

  describe("errors", () => {
    it("reports the expected token", () => {
      const f = failureOf(parseSource("let = 5;", "m.sable"));
      expect(f.failure.reason).toBe("syntax-error");
      expect(f.failure.diagnostics[0]).toMatchObject({
        code: "E0010",
        message: "Expected variable name, found '='",
        span: { file: "m.sable", line: 1, column: 5 },
      });
    });

    it("reports a missing semicolon at end of input", () => {
      expect(failureOf(parseSource("write 1")).failure.message).toBe(
        "Expected ';' after write, found end of input"
      );
    });

    it("reports an unexpected token in expression position", () => {
      const f = failureOf(parseSource("write );"));
      expect(f.failure.diagnostics[0]?.code).toBe("E0011");
      expect(f.failure.message).toBe("Unexpected ')'");
    });

    it("reports a malformed parameter list", () => {
      expect(failureOf(parseSource("def f(a { }")).failure.message).toBe(
        "Expected ')' after parameters, found '{'"
      );
    });

    it("reports an unclosed function body", () => {
      expect(failureOf(parseSource("def f() { write 1;")).failure.message).toBe(
        "Expected '}' after function body, found end of input"
      );
    });

    it("propagates lexical failures", () => {
      expect(failureOf(parseSource("let s = \"open;")).failure.reason).toBe("lexical-error");
    });
  });

  describe("nesting limit", () => {
    const parens = (n: number) => "write " + "(".repeat(n) + "1" + ")".repeat(n) + ";";

    it("accepts parentheses up to the limit", () => {
      expect(statements(parens(MAX_NESTING - 1))[0]).toMatchObject({ tag: "Write", expr: { value: 1 } });
    });

    it("rejects deeper parentheses at the first token past the limit", () => {
      const f = failureOf(parseSource(parens(20_000), "deep.sable"));
      expect(f.failure.reason).toBe("syntax-error");
      expect(f.failure.diagnostics[0]).toMatchObject({
        code: "E0012",
        message: "Nesting deeper than 256 levels",
        span: { file: "deep.sable", line: 1, column: 263 },
      });
    });

    it("counts each unary minus as a level", () => {
      const f = failureOf(parseSource("write " + "-".repeat(50_000) + "1;"));
      expect(f.failure.diagnostics[0]).toMatchObject({ code: "E0012", span: { column: 263 } });
    });

    it("counts nested function bodies", () => {
      const src = "def f() { ".repeat(300) + "}".repeat(300);
      expect(failureOf(parseSource(src)).failure.diagnostics[0]?.code).toBe("E0012");
    });

    it("does not limit left-associated operator chains", () => {
      const chain = Array.from({ length: 5_000 }, () => "1").join(" + ");
      expect(statements(`write ${chain};`)).toHaveLength(1);
    });
  });
});
