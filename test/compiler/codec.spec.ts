import { describe, it, expect } from "vitest";
import {
  encodeProgram,
  decodeProgram,
  decodeInstruction,
  readHeader,
  codeSize,
  encodedSize,
} from "../../src/core/compiler/codec";
import { HEADER_SIZE, MAX_FUNC_NESTING, type Instr } from "../../src/core/compiler/types";
import { unwrap } from "../../src/outcome/matchers";
import { codeOf, failureOf, withBytes } from "../helpers/sableHarness";

const HEADER = [0x53, 0x42, 0x4c, 0x43, 0x01];

/**
 * `levels` functions named "f", each the only instruction in the body of the
 * one before it, then Halt. Built byte by byte: each Func header is 14 bytes
 * and the body at nesting k (innermost 0) is 1 + 15k bytes long.
 */
function nestedFuncs(levels: number): Uint8Array {
  const out = [...HEADER];
  for (let k = levels - 1; k >= 0; k--) {
    const len = 1 + 15 * k;
    out.push(0x0c, 1, 0, 0, 0, 0x66, 0, 0, 0, 0, len & 0xff, (len >> 8) & 0xff, (len >> 16) & 0xff, (len >>> 24) & 0xff);
  }
  for (let k = 0; k < levels; k++) out.push(0x0d);
  out.push(0x0a);
  return new Uint8Array(out);
}

describe("artifact encoding", () => {
  it("writes the header, tag and little-endian f64 payload", () => {
    expect(Array.from(encodeProgram([{ op: "PushNum", value: 1 }, { op: "Halt" }]))).toEqual([
      ...HEADER,
      0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0xf0, 0x3f,
      0x0a,
    ]);
  });

  it("writes strings as a u32 byte length and UTF-8 bytes", () => {
    expect(Array.from(encodeProgram([{ op: "PushStr", value: "hé" }]))).toEqual([
      ...HEADER,
      0x01, 0x03, 0x00, 0x00, 0x00, 0x68, 0xc3, 0xa9,
    ]);
  });

  it("writes the call argument count as a u64", () => {
    expect(Array.from(encodeProgram([{ op: "Call", argc: 2 }]))).toEqual([
      ...HEADER,
      0x08, 0x02, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
    ]);
  });

  it("sizes instructions exactly", () => {
    const code: Instr[] = [
      { op: "Func", name: "f", params: ["a"], body: [{ op: "Load", name: "a" }, { op: "Return" }] },
      { op: "PushStr", value: "x" },
      { op: "Halt" },
    ];
    expect(encodedSize(code[0] ?? { op: "Halt" })).toBe(1 + 5 + 4 + 5 + 4 + 6 + 1);
    expect(encodeProgram(code)).toHaveLength(HEADER_SIZE + codeSize(code));
  });
});

describe("artifact decoding", () => {
  it("round-trips a program with functions", () => {
    const code: Instr[] = [
      { op: "Func", name: "add", params: ["a", "b"], body: [{ op: "Load", name: "a" }, { op: "Load", name: "b" }, { op: "Add" }, { op: "Return" }] },
      { op: "PushNum", value: -2.5 },
      { op: "PushNum", value: 4 },
      { op: "PushStr", value: "add" },
      { op: "Call", argc: 2 },
      { op: "Write" },
      { op: "PushStr", value: "" },
      { op: "Store", name: "s" },
      { op: "Load", name: "s" },
      { op: "Sub" },
      { op: "Mul" },
      { op: "Div" },
      { op: "Pop" },
      { op: "Halt" },
    ];
    expect(unwrap(decodeProgram(encodeProgram(code)))).toEqual({ version: 1, code, trailingBytes: 0 });
  });

  it("reports where a function body starts", () => {
    const bytes = encodeProgram([
      { op: "Func", name: "f", params: [], body: [{ op: "PushNum", value: 0 }, { op: "Return" }] },
      { op: "Halt" },
    ]);
    expect(unwrap(decodeInstruction(bytes, HEADER_SIZE))).toMatchObject({ offset: 5, bodyStart: 19, next: 29 });
  });

  it("rejects a bad magic number", () => {
    const f = failureOf(decodeProgram(new Uint8Array([1, 2, 3, 4, 1, 10])));
    expect(f.failure.reason).toBe("artifact-error");
    expect(f.failure.message).toBe("Not a bytecode artifact (bad magic number)");
    expect(f.meta.offset).toBe(0);
  });

  it("rejects a buffer shorter than the header", () => {
    expect(codeOf(readHeader(new Uint8Array([0x53, 0x42])))).toBe("E0203");
  });

  it("rejects an unsupported version", () => {
    const f = failureOf(readHeader(new Uint8Array([0x53, 0x42, 0x4c, 0x43, 2, 10])));
    expect(f.failure.message).toBe("Unsupported artifact version 2");
    expect(f.meta.offset).toBe(4);
  });

  it("rejects a truncated string payload without reading past the end", () => {
    const f = failureOf(decodeProgram(new Uint8Array([...HEADER, 0x01, 0x05, 0x00, 0x00, 0x00, 0x61, 0x62])));
    expect(f.failure.message).toBe("Truncated PushStr instruction");
    expect(f.meta.offset).toBe(5);
  });

  it("rejects a truncated number payload", () => {
    expect(codeOf(decodeProgram(new Uint8Array([...HEADER, 0x00, 0x00, 0x00])))).toBe("E0202");
  });

  it("rejects an unknown opcode", () => {
    const f = failureOf(decodeProgram(new Uint8Array([...HEADER, 0xff])));
    expect(f.failure.message).toBe("Unknown opcode 255");
  });

  it("rejects a stream without Halt", () => {
    const f = failureOf(decodeProgram(encodeProgram([{ op: "PushNum", value: 1 }])));
    expect(f.failure.diagnostics[0]?.code).toBe("E0205");
    expect(f.meta.offset).toBe(14);
  });

  it("stops at Halt and counts trailing bytes", () => {
    const bytes = withBytes(encodeProgram([{ op: "Halt" }]), 0xff, 0xff);
    expect(unwrap(decodeProgram(bytes))).toEqual({ version: 1, code: [{ op: "Halt" }], trailingBytes: 2 });
  });

  it("rejects Return at the top level", () => {
    expect(codeOf(decodeProgram(encodeProgram([{ op: "Return" }, { op: "Halt" }])))).toBe("E0208");
  });

  it("rejects a function body that does not end in Return", () => {
    const bytes = encodeProgram([
      { op: "Func", name: "f", params: [], body: [{ op: "PushNum", value: 1 }] },
      { op: "Halt" },
    ]);
    expect(failureOf(decodeProgram(bytes)).failure.message).toBe("Malformed function f: body does not end in Return");
  });

  it("rejects Halt inside a function body", () => {
    const bytes = encodeProgram([
      { op: "Func", name: "f", params: [], body: [{ op: "Halt" }, { op: "PushNum", value: 0 }, { op: "Return" }] },
      { op: "Halt" },
    ]);
    const f = failureOf(decodeProgram(bytes));
    expect(f.failure.message).toBe("Malformed function f: body contains Halt");
    expect(f.meta.offset).toBe(5);
  });

  it("accepts functions nested up to the limit", () => {
    const decoded = unwrap(decodeProgram(nestedFuncs(MAX_FUNC_NESTING)));
    expect(decoded.code.map(i => i.op)).toEqual(["Func", "Halt"]);
    expect(decoded.trailingBytes).toBe(0);
  });

  it("rejects deeper nesting at the first Func past the limit", () => {
    const f = failureOf(decodeProgram(nestedFuncs(20_000)));
    expect(f.failure.reason).toBe("artifact-error");
    expect(f.failure.message).toBe("Malformed function f: functions nested more than 256 deep");
    expect(f.meta.offset).toBe(HEADER_SIZE + 14 * MAX_FUNC_NESTING);
  });

  it("rejects a function body running past the buffer", () => {
    const bytes = encodeProgram([
      { op: "Func", name: "f", params: [], body: [{ op: "PushNum", value: 0 }, { op: "Return" }] },
      { op: "Halt" },
    ]);
    const f = failureOf(decodeProgram(bytes.slice(0, 27)));
    expect(f.failure.message).toBe("Truncated Func instruction");
    expect(f.meta.offset).toBe(5);
  });
});
