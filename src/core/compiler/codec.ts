// src/core/compiler/codec.ts
// Binary artifact encoding and decoding (little-endian, tagged opcodes)

import type { Outcome } from "../../outcome/outcome";
import { done, diagnosticFail } from "../../outcome/constructors";
import {
  ARTIFACT_MAGIC,
  ARTIFACT_VERSION,
  HEADER_SIZE,
  MAX_FUNC_NESTING,
  OPCODES,
  OP_NAMES,
  type DecodedArtifact,
  type DecodedInstr,
  type Instr,
  type OpName,
} from "./types";

// ─────────────────────────────────────────────────────────────────
// Encoding
// ─────────────────────────────────────────────────────────────────

function strSize(s: string): number {
  return 4 + Buffer.byteLength(s, "utf8");
}

/**
 * Encoded size in bytes of one instruction, body included for `Func`.
 */
export function encodedSize(instr: Instr): number {
  switch (instr.op) {
    case "PushNum":
    case "Call":
      return 1 + 8;
    case "PushStr":
      return 1 + strSize(instr.value);
    case "Store":
    case "Load":
      return 1 + strSize(instr.name);
    case "Func":
      return 1 + funcHeaderSize(instr) + codeSize(instr.body);
    default:
      return 1;
  }
}

function funcHeaderSize(instr: Extract<Instr, { op: "Func" }>): number {
  let n = strSize(instr.name) + 4;
  for (const p of instr.params) n += strSize(p);
  return n + 4;
}

export function codeSize(code: readonly Instr[]): number {
  let n = 0;
  for (const instr of code) n += encodedSize(instr);
  return n;
}

class ByteWriter {
  private readonly view: DataView;
  offset = 0;

  constructor(readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  u8(v: number): void {
    this.view.setUint8(this.offset, v);
    this.offset += 1;
  }

  u32(v: number): void {
    this.view.setUint32(this.offset, v, true);
    this.offset += 4;
  }

  u64(v: number): void {
    this.view.setBigUint64(this.offset, BigInt(v), true);
    this.offset += 8;
  }

  f64(v: number): void {
    this.view.setFloat64(this.offset, v, true);
    this.offset += 8;
  }

  str(s: string): void {
    const encoded = Buffer.from(s, "utf8");
    this.u32(encoded.length);
    this.bytes.set(encoded, this.offset);
    this.offset += encoded.length;
  }
}

function writeInstr(w: ByteWriter, instr: Instr): void {
  w.u8(OPCODES[instr.op]);
  switch (instr.op) {
    case "PushNum":
      w.f64(instr.value);
      break;
    case "PushStr":
      w.str(instr.value);
      break;
    case "Store":
    case "Load":
      w.str(instr.name);
      break;
    case "Call":
      w.u64(instr.argc);
      break;
    case "Func":
      w.str(instr.name);
      w.u32(instr.params.length);
      for (const p of instr.params) w.str(p);
      w.u32(codeSize(instr.body));
      for (const inner of instr.body) writeInstr(w, inner);
      break;
    default:
      break;
  }
}

/**
 * Header followed by a one-to-one encoding of `code`, no padding.
 */
export function encodeProgram(code: readonly Instr[]): Uint8Array {
  const bytes = new Uint8Array(HEADER_SIZE + codeSize(code));
  const w = new ByteWriter(bytes);
  for (const b of ARTIFACT_MAGIC) w.u8(b);
  w.u8(ARTIFACT_VERSION);
  for (const instr of code) writeInstr(w, instr);
  return bytes;
}

// ─────────────────────────────────────────────────────────────────
// Decoding
// ─────────────────────────────────────────────────────────────────

/**
 * Bounds-checked reader over `bytes[offset, end)`. Every read returns
 * undefined instead of running past `end`.
 */
class ByteReader {
  private readonly view: DataView;

  constructor(private readonly bytes: Uint8Array, public offset: number, private readonly end: number) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  private has(n: number): boolean {
    return this.offset + n <= this.end;
  }

  u8(): number | undefined {
    if (!this.has(1)) return undefined;
    return this.view.getUint8(this.offset++);
  }

  u32(): number | undefined {
    if (!this.has(4)) return undefined;
    const v = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return v;
  }

  u64(): number | undefined {
    if (!this.has(8)) return undefined;
    const v = this.view.getBigUint64(this.offset, true);
    this.offset += 8;
    return v > BigInt(Number.MAX_SAFE_INTEGER) ? Number.MAX_SAFE_INTEGER : Number(v);
  }

  f64(): number | undefined {
    if (!this.has(8)) return undefined;
    const v = this.view.getFloat64(this.offset, true);
    this.offset += 8;
    return v;
  }

  str(): string | undefined {
    const len = this.u32();
    if (len === undefined || !this.has(len)) return undefined;
    const s = Buffer.from(this.bytes.buffer, this.bytes.byteOffset, this.bytes.byteLength)
      .toString("utf8", this.offset, this.offset + len);
    this.offset += len;
    return s;
  }
}

function truncated(op: OpName, offset: number): Outcome<never> {
  return diagnosticFail("E0202", { op }, { offset });
}

/**
 * Decode the instruction at `offset`, reading no further than `end`.
 */
export function decodeInstruction(
  bytes: Uint8Array,
  offset: number,
  end: number = bytes.length
): Outcome<DecodedInstr> {
  return decodeAt(bytes, offset, end, 0);
}

/** `depth` counts the `Func` bodies enclosing `offset`. */
function decodeAt(bytes: Uint8Array, offset: number, end: number, depth: number): Outcome<DecodedInstr> {
  const r = new ByteReader(bytes, offset, Math.min(end, bytes.length));
  const tag = r.u8();
  if (tag === undefined) {
    return diagnosticFail("E0205", {}, { offset });
  }
  const op = OP_NAMES[tag];
  if (op === undefined) {
    return diagnosticFail("E0201", { tag }, { offset });
  }

  const finish = (instr: Instr, bodyStart?: number): Outcome<DecodedInstr> =>
    done(bodyStart === undefined ? { instr, offset, next: r.offset } : { instr, offset, next: r.offset, bodyStart });

  switch (op) {
    case "PushNum": {
      const value = r.f64();
      return value === undefined ? truncated(op, offset) : finish({ op, value });
    }
    case "PushStr": {
      const value = r.str();
      return value === undefined ? truncated(op, offset) : finish({ op, value });
    }
    case "Store":
    case "Load": {
      const name = r.str();
      return name === undefined ? truncated(op, offset) : finish({ op, name });
    }
    case "Call": {
      const argc = r.u64();
      return argc === undefined ? truncated(op, offset) : finish({ op, argc });
    }
    case "Func":
      return decodeFunc(bytes, r, offset, end, depth, finish);
    default:
      return finish({ op });
  }
}

function decodeFunc(
  bytes: Uint8Array,
  r: ByteReader,
  offset: number,
  end: number,
  depth: number,
  finish: (instr: Instr, bodyStart?: number) => Outcome<DecodedInstr>
): Outcome<DecodedInstr> {
  const name = r.str();
  const paramCount = r.u32();
  if (name === undefined || paramCount === undefined) return truncated("Func", offset);
  if (depth >= MAX_FUNC_NESTING) {
    return diagnosticFail("E0206", { name, detail: `functions nested more than ${MAX_FUNC_NESTING} deep` }, { offset });
  }

  const params: string[] = [];
  for (let i = 0; i < paramCount; i++) {
    const p = r.str();
    if (p === undefined) return truncated("Func", offset);
    params.push(p);
  }

  const bodyLen = r.u32();
  const bodyStart = r.offset;
  if (bodyLen === undefined || bodyStart + bodyLen > Math.min(end, bytes.length)) {
    return truncated("Func", offset);
  }

  const body = decodeSequence(bytes, bodyStart, bodyStart + bodyLen, depth + 1);
  if (body.tag === "Fail") return body;

  const last = body.value[body.value.length - 1];
  if (last?.op !== "Return") {
    return diagnosticFail("E0206", { name, detail: "body does not end in Return" }, { offset });
  }
  if (body.value.some(instr => instr.op === "Halt")) {
    return diagnosticFail("E0206", { name, detail: "body contains Halt" }, { offset });
  }

  r.offset = bodyStart + bodyLen;
  return finish({ op: "Func", name, params, body: body.value }, bodyStart);
}

/**
 * Decode every instruction in `bytes[start, end)`.
 */
function decodeSequence(bytes: Uint8Array, start: number, end: number, depth: number): Outcome<Instr[]> {
  const code: Instr[] = [];
  let offset = start;
  while (offset < end) {
    const decoded = decodeAt(bytes, offset, end, depth);
    if (decoded.tag === "Fail") return decoded;
    code.push(decoded.value.instr);
    offset = decoded.value.next;
  }
  return done(code);
}

/**
 * Validate the header and return the artifact's format version.
 */
export function readHeader(bytes: Uint8Array): Outcome<number> {
  if (bytes.length < HEADER_SIZE || ARTIFACT_MAGIC.some((b, i) => bytes[i] !== b)) {
    return diagnosticFail("E0203", {}, { offset: 0 });
  }
  const version = bytes[ARTIFACT_MAGIC.length] ?? 0;
  if (version !== ARTIFACT_VERSION) {
    return diagnosticFail("E0204", { version }, { offset: ARTIFACT_MAGIC.length });
  }
  return done(version);
}

/**
 * Decode a whole artifact. Decoding stops at the first top-level Halt; bytes
 * after it are counted and ignored. A stream without a Halt, a truncated
 * payload, an unknown tag, or a top-level Return are all rejected.
 */
export function decodeProgram(bytes: Uint8Array): Outcome<DecodedArtifact> {
  const header = readHeader(bytes);
  if (header.tag === "Fail") return header;

  const code: Instr[] = [];
  let offset = HEADER_SIZE;
  while (true) {
    const decoded = decodeInstruction(bytes, offset);
    if (decoded.tag === "Fail") return decoded;

    const { instr, next } = decoded.value;
    if (instr.op === "Return") {
      return diagnosticFail("E0208", {}, { offset });
    }
    code.push(instr);
    if (instr.op === "Halt") {
      return done({ version: header.value, code, trailingBytes: bytes.length - next });
    }
    offset = next;
  }
}
