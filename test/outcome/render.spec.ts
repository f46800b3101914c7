import { describe, it, expect } from "vitest";
import { renderDiagnostic, renderFailure } from "../../src/outcome/render";
import { makeDiagnostic } from "../../src/outcome/codes";
import { failure } from "../../src/outcome/failure";
import { tokenize } from "../../src/core/reader/tokenize";
import { failureOf } from "../helpers/sableHarness";

describe("diagnostic rendering", () => {
  const source = { text: "let x = @;", file: "main.sable" };
  const lexFailure = failureOf(tokenize(source.text, source.file)).failure;

  it("underlines the span in its source line", () => {
    expect(renderFailure(lexFailure, source)).toBe(
      [
        "error[E0001]: Unexpected character '@'",
        " --> main.sable:1:9",
        "  |",
        "1 | let x = @;",
        "  |         ^",
      ].join("\n")
    );
  });

  it("gives only the location without source text", () => {
    expect(renderFailure(lexFailure)).toBe("error[E0001]: Unexpected character '@'\n --> main.sable:1:9");
  });

  it("widens the caret to the span length", () => {
    const diag = makeDiagnostic("E0101", { name: "total" }, { line: 2, column: 7, length: 5 });
    expect(renderDiagnostic(diag, { text: "let a = 1;\nwrite total;" }).split("\n")).toEqual([
      "error[E0101]: Undefined variable: total",
      " --> <input>:2:7",
      "  |",
      "2 | write total;",
      "  |       ^^^^^",
    ]);
  });

  it("points into the artifact when there is no span", () => {
    const diag = makeDiagnostic("E0200", { op: "Add", offset: 5 });
    expect(renderDiagnostic(diag)).toBe("error[E0200]: Stack underflow in Add\n --> <artifact> @ byte 5");
  });

  it("falls back to the message for failures without diagnostics", () => {
    expect(renderFailure(failure("io-error", "boom"))).toBe("error: boom");
  });
});
