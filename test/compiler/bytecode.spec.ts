import { describe, it, expect } from "vitest";
import { compile, countInstructions, disassemble } from "../../src/core/compiler/bytecode";
import { OPCODES, OP_NAMES, type CompileOptions, type Instr } from "../../src/core/compiler/types";
import { parseSource } from "../../src/core/reader/parse";
import { unwrap } from "../../src/outcome/matchers";
import { failureOf } from "../helpers/sableHarness";

const compileText = (src: string, options: CompileOptions = {}) => compile(unwrap(parseSource(src)), options);
const codeOf = (src: string): Instr[] => unwrap(compileText(src)).code;

describe("bytecode generation", () => {
  it("assigns each opcode its tag", () => {
    OP_NAMES.forEach((name, tag) => expect(OPCODES[name]).toBe(tag));
    expect(OP_NAMES).toHaveLength(Object.keys(OPCODES).length);
  });

  it("compiles declarations and writes", () => {
    expect(codeOf("let x = 1 + 2; write x;")).toEqual([
      { op: "PushNum", value: 1 },
      { op: "PushNum", value: 2 },
      { op: "Add" },
      { op: "Store", name: "x" },
      { op: "Load", name: "x" },
      { op: "Write" },
      { op: "Halt" },
    ]);
  });

  it("initializes an uninitialized variable to zero", () => {
    expect(codeOf("let y;")).toEqual([
      { op: "PushNum", value: 0 },
      { op: "Store", name: "y" },
      { op: "Halt" },
    ]);
  });

  it("pops the value of an expression statement", () => {
    expect(codeOf("1;")).toEqual([{ op: "PushNum", value: 1 }, { op: "Pop" }, { op: "Halt" }]);
  });

  it("pushes call arguments in order, then the callee name", () => {
    expect(codeOf("f(1, 2);")).toEqual([
      { op: "PushNum", value: 1 },
      { op: "PushNum", value: 2 },
      { op: "PushStr", value: "f" },
      { op: "Call", argc: 2 },
      { op: "Pop" },
      { op: "Halt" },
    ]);
  });

  it("returns a function's trailing expression", () => {
    expect(codeOf("def add(a, b) { a + b; }")).toEqual([
      {
        op: "Func",
        name: "add",
        params: ["a", "b"],
        body: [{ op: "Load", name: "a" }, { op: "Load", name: "b" }, { op: "Add" }, { op: "Return" }],
      },
      { op: "Halt" },
    ]);
  });

  it("returns zero from a body without a trailing expression", () => {
    expect(codeOf("def g() { write 1; }")[0]).toEqual({
      op: "Func",
      name: "g",
      params: [],
      body: [{ op: "PushNum", value: 1 }, { op: "Write" }, { op: "PushNum", value: 0 }, { op: "Return" }],
    });
  });

  it("accepts imports of known libraries only", () => {
    expect(codeOf(":std:;")).toEqual([{ op: "Halt" }]);

    const f = failureOf(compileText(":math:;"));
    expect(f.failure.reason).toBe("compile-error");
    expect(f.failure.message).toBe("Unknown library: math");
    expect(f.failure.diagnostics[0]?.span).toEqual({ line: 1, column: 1, length: 6 });

    expect(compileText(":math:;", { libraries: ["std", "math"] }).tag).toBe("Done");
  });

  it("rejects duplicate parameters", () => {
    const f = failureOf(compileText("def f(a, a) { a; }"));
    expect(f.failure.diagnostics[0]?.code).toBe("E0302");
    expect(f.failure.message).toBe("Duplicate parameter a in function f");
  });

  it("records declared symbols in order", () => {
    const unit = unwrap(compileText("let x = 1; def f(p) { p; }"));
    expect(unit.symbols.map(s => [s.name, s.kind])).toEqual([
      ["x", "variable"],
      ["f", "function"],
      ["p", "parameter"],
    ]);
  });

  it("attributes a span to every instruction", () => {
    const unit = unwrap(compileText("let x = 1;\nwrite x;"));
    expect(unit.code.every(instr => unit.spans.has(instr))).toBe(true);
    expect(unit.spans.get(unit.code[2] ?? { op: "Halt" })).toEqual({ line: 2, column: 7, length: 1 });
  });
});

describe("disassembly", () => {
  const code = codeOf("def sq(n) { n * n; } write sq(3);");

  it("counts nested instructions", () => {
    expect(countInstructions(code)).toBe(10);
  });

  it("indents function bodies", () => {
    expect(disassemble(code).split("\n")).toEqual([
      "   0: Func sq(n)",
      "         0: Load n",
      "         1: Load n",
      "         2: Mul",
      "         3: Return",
      "   1: PushNum 3",
      '   2: PushStr "sq"',
      "   3: Call 1",
      "   4: Write",
      "   5: Halt",
    ]);
  });
});
