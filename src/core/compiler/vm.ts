// src/core/compiler/vm.ts
// Stack VM: executes an encoded artifact instruction by instruction

import type { Val } from "../eval/values";
import { VNum, VStr, formatValue, kindOf } from "../eval/values";
import type { Outcome, Fail } from "../../outcome/outcome";
import { done, diagnosticFail, budgetExceeded } from "../../outcome/constructors";
import { decodeInstruction, decodeProgram, readHeader } from "./codec";
import { HEADER_SIZE } from "./types";
import type { FunctionEntry, Instr, VMConfig, VMFrame, VMResult, VMState } from "./types";

// ─────────────────────────────────────────────────────────────────
// VM Configuration
// ─────────────────────────────────────────────────────────────────

export const defaultVMConfig: VMConfig = {
  maxStackDepth: 10_000,
  maxCallDepth: 1_000,
  maxSteps: 0,
};

export type VMOptions = {
  config?: Partial<VMConfig>;
  /** Receives one line per Write; defaults to stdout */
  output?: (line: string) => void;
  /** Existing bindings, mutated in place (REPL sessions pass these back in) */
  globals?: Map<string, Val>;
  functions?: Map<string, FunctionEntry>;
  /** Decode the whole artifact before running it (default true) */
  verify?: boolean;
};

const stdoutLine = (line: string): void => {
  process.stdout.write(line + "\n");
};

// ─────────────────────────────────────────────────────────────────
// VM State Management
// ─────────────────────────────────────────────────────────────────

/**
 * Create the initial state for `code`. The header is always checked; with
 * `verify` (the default) the whole artifact is decoded first so a malformed
 * artifact is rejected before it produces any output.
 */
export function createVMState(code: Uint8Array, options: VMOptions = {}): Outcome<VMState> {
  if (options.verify ?? true) {
    const decoded = decodeProgram(code);
    if (decoded.tag === "Fail") return decoded;
  } else {
    const header = readHeader(code);
    if (header.tag === "Fail") return header;
  }

  const globals = options.globals ?? new Map<string, Val>();
  const main: VMFrame = { name: "<main>", code, pc: HEADER_SIZE, locals: globals, stackBase: 0 };

  return done({
    stack: [],
    globals,
    functions: options.functions ?? new Map(),
    frames: [main],
    status: "running",
    steps: 0,
    lastOffset: HEADER_SIZE,
    config: { ...defaultVMConfig, ...options.config },
    output: options.output ?? stdoutLine,
  });
}

function currentFrame(state: VMState): VMFrame {
  const frame = state.frames[state.frames.length - 1];
  if (!frame) {
    throw new Error("VM has no active frame");
  }
  return frame;
}

/**
 * Names of the active frames, innermost last.
 */
export function getCallStack(state: VMState): string[] {
  return state.frames.map(f => f.name);
}

/**
 * Thrown inside a step, caught by `step` and recorded on the state.
 */
class VMFault extends Error {
  constructor(readonly outcome: Fail) {
    super(outcome.failure.message);
    this.name = "VMFault";
  }
}

function push(state: VMState, val: Val): void {
  if (state.stack.length >= state.config.maxStackDepth) {
    throw new VMFault(budgetExceeded("Stack depth", state.config.maxStackDepth, state.lastOffset));
  }
  state.stack.push(val);
}

/**
 * Pop within the current frame: a frame never consumes its caller's values.
 */
function pop(state: VMState, op: Instr["op"]): Val {
  const frame = currentFrame(state);
  const val = state.stack.length > frame.stackBase ? state.stack.pop() : undefined;
  if (val === undefined) {
    throw new VMFault(diagnosticFail("E0200", { op }, { offset: state.lastOffset }));
  }
  return val;
}

// ─────────────────────────────────────────────────────────────────
// Instruction Effects
// ─────────────────────────────────────────────────────────────────

const SYMBOLS = { Add: "+", Sub: "-", Mul: "*", Div: "/" } as const;

function arithmetic(state: VMState, op: keyof typeof SYMBOLS): void {
  const right = pop(state, op);
  const left = pop(state, op);

  if (left.tag === "Num" && right.tag === "Num") {
    const a = left.n;
    const b = right.n;
    switch (op) {
      case "Add": return push(state, VNum(a + b));
      case "Sub": return push(state, VNum(a - b));
      case "Mul": return push(state, VNum(a * b));
      case "Div": return push(state, VNum(a / b));
    }
  }
  if (op === "Add" && left.tag === "Str" && right.tag === "Str") {
    return push(state, VStr(left.s + right.s));
  }
  throw new VMFault(
    diagnosticFail(
      "E0100",
      { op: SYMBOLS[op], left: kindOf(left), right: kindOf(right) },
      { offset: state.lastOffset }
    )
  );
}

function load(state: VMState, frame: VMFrame, name: string): void {
  const val = frame.locals.get(name) ?? state.globals.get(name);
  if (val === undefined) {
    throw new VMFault(diagnosticFail("E0101", { name }, { offset: state.lastOffset }));
  }
  push(state, val);
}

function call(state: VMState, argc: number): void {
  const callee = pop(state, "Call");
  if (callee.tag !== "Str") {
    throw new VMFault(diagnosticFail("E0104", { actual: kindOf(callee) }, { offset: state.lastOffset }));
  }

  const args: Val[] = [];
  for (let i = 0; i < argc; i++) args.unshift(pop(state, "Call"));

  const fn = state.functions.get(callee.s);
  if (!fn) {
    throw new VMFault(diagnosticFail("E0103", { name: callee.s }, { offset: state.lastOffset }));
  }
  if (fn.params.length !== argc) {
    throw new VMFault(
      diagnosticFail(
        "E0102",
        { name: fn.name, expected: fn.params.length, actual: argc },
        { offset: state.lastOffset }
      )
    );
  }
  if (state.frames.length - 1 >= state.config.maxCallDepth) {
    throw new VMFault(budgetExceeded("Call depth", state.config.maxCallDepth, state.lastOffset));
  }

  const locals = new Map<string, Val>();
  fn.params.forEach((p, i) => {
    const arg = args[i];
    if (arg !== undefined) locals.set(p, arg);
  });
  state.frames.push({ name: fn.name, code: fn.code, pc: fn.entry, locals, stackBase: state.stack.length });
}

function ret(state: VMState): void {
  if (state.frames.length <= 1) {
    throw new VMFault(diagnosticFail("E0208", {}, { offset: state.lastOffset }));
  }
  const result = pop(state, "Return");
  const frame = currentFrame(state);
  state.stack.length = frame.stackBase;
  state.frames.pop();
  push(state, result);
}

function execute1(state: VMState, frame: VMFrame, instr: Instr, bodyStart: number | undefined): void {
  switch (instr.op) {
    case "PushNum":
      push(state, VNum(instr.value));
      break;
    case "PushStr":
      push(state, VStr(instr.value));
      break;
    case "Add":
    case "Sub":
    case "Mul":
    case "Div":
      arithmetic(state, instr.op);
      break;
    case "Store":
      frame.locals.set(instr.name, pop(state, "Store"));
      break;
    case "Load":
      load(state, frame, instr.name);
      break;
    case "Pop":
      pop(state, "Pop");
      break;
    case "Write":
      state.output(formatValue(pop(state, "Write")));
      break;
    case "Func":
      state.functions.set(instr.name, {
        name: instr.name,
        params: instr.params,
        code: frame.code,
        entry: bodyStart ?? frame.pc,
      });
      break;
    case "Call":
      call(state, instr.argc);
      break;
    case "Return":
      ret(state);
      break;
    case "Halt":
      state.status = "halted";
      break;
  }
}

// ─────────────────────────────────────────────────────────────────
// VM Execution
// ─────────────────────────────────────────────────────────────────

function fault(state: VMState, outcome: Fail): VMState {
  state.status = "error";
  state.fault = {
    ...outcome,
    failure: {
      ...outcome.failure,
      context: { ...outcome.failure.context, callStack: getCallStack(state) },
    },
  };
  return state;
}

/**
 * Decode and execute the instruction at the current frame's pc.
 */
export function step(state: VMState): VMState {
  if (state.status !== "running") {
    return state;
  }

  const frame = currentFrame(state);
  const { maxSteps } = state.config;
  if (maxSteps > 0 && state.steps >= maxSteps) {
    return fault(state, budgetExceeded("Step", maxSteps, frame.pc));
  }

  const decoded = decodeInstruction(frame.code, frame.pc);
  if (decoded.tag === "Fail") {
    return fault(state, decoded);
  }

  const { instr, offset, next, bodyStart } = decoded.value;
  state.lastOffset = offset;
  state.steps++;
  frame.pc = next;

  try {
    execute1(state, frame, instr, bodyStart);
  } catch (e) {
    if (e instanceof VMFault) return fault(state, e.outcome);
    throw e;
  }
  return state;
}

/**
 * Step until Halt or a fault.
 */
export function run(state: VMState): Outcome<VMResult> {
  while (state.status === "running") {
    step(state);
  }
  if (state.fault) {
    return state.fault;
  }
  return done({
    steps: state.steps,
    globals: state.globals,
    functions: state.functions,
    stack: state.stack,
  });
}

/**
 * Load and run an artifact.
 */
export function execute(code: Uint8Array, options: VMOptions = {}): Outcome<VMResult> {
  const state = createVMState(code, options);
  if (state.tag === "Fail") return state;
  return run(state.value);
}
