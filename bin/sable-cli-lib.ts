// bin/sable-cli-lib.ts
// Shared CLI utilities for the sablec compiler and the sable VM
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import {
  compileSource,
  decodeProgram,
  disassemble,
  execute,
  parseSourceMap,
  serializeSourceMap,
  lookupSpan,
  loadConfig,
  renderFailure,
  ioFailed,
  makeDiagnostic,
  renderDiagnostic,
  formatValue,
  type Fail,
  type FunctionEntry,
  type SableConfig,
  type SourceMap,
  type SourceText,
  type Val,
} from "../src";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CompilerArgs = {
  help?: boolean;
  version?: boolean;
  input?: string;
  output?: string;
  sourceMap?: boolean;
  disassemble?: boolean;
  config?: string;
  verbose?: boolean;
  /** Usage problems found while parsing */
  errors: string[];
};

export type VmArgs = {
  help?: boolean;
  version?: boolean;
  eval?: string;
  file?: string;
  sourceMap?: string;
  disassemble?: boolean;
  config?: string;
  verbose?: boolean;
  mode: "repl" | "exec";
  errors: string[];
};

/**
 * Everything the commands touch outside the process. `nodeIO` is the real
 * one; tests pass an in-memory one.
 */
export type CliIO = {
  readFile(file: string): Uint8Array;
  readText(file: string): string;
  writeFile(file: string, data: Uint8Array | string): void;
  exists(file: string): boolean;
  out(line: string): void;
  err(line: string): void;
  env: NodeJS.ProcessEnv;
  cwd: string;
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export function nodeIO(): CliIO {
  return {
    readFile: file => fs.readFileSync(file),
    readText: file => fs.readFileSync(file, "utf8"),
    writeFile: (file, data) => fs.writeFileSync(file, data),
    exists: file => fs.existsSync(file),
    out: line => console.log(line),
    err: line => console.error(line),
    env: process.env,
    cwd: process.cwd(),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

function takeValue(args: string[], i: number, flag: string, errors: string[]): string | undefined {
  const value = args[i + 1];
  if (value === undefined || value.startsWith("-")) {
    errors.push(`${flag} requires a value`);
    return undefined;
  }
  return value;
}

export function parseCompilerArgs(args: string[]): CompilerArgs {
  const result: CompilerArgs = { errors: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--output" || arg === "-o") {
      result.output = takeValue(args, i, arg, result.errors);
      if (result.output !== undefined) i++;
    } else if (arg === "--source-map") {
      result.sourceMap = true;
    } else if (arg === "--disassemble") {
      result.disassemble = true;
    } else if (arg === "--config") {
      result.config = takeValue(args, i, arg, result.errors);
      if (result.config !== undefined) i++;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg.startsWith("-")) {
      result.errors.push(`unknown option ${arg}`);
    } else if (result.input === undefined) {
      result.input = arg;
    } else {
      result.errors.push(`unexpected argument ${arg}`);
    }
  }

  return result;
}

export function parseVmArgs(args: string[]): VmArgs {
  const result: VmArgs = { mode: "repl", errors: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--eval" || arg === "-e") {
      // Code may itself start with '-', so take the next argument as is.
      const code = args[i + 1];
      if (code === undefined) {
        result.errors.push(`${arg} requires a value`);
      } else {
        result.eval = code;
        result.mode = "exec";
        i++;
      }
    } else if (arg === "--source-map") {
      result.sourceMap = takeValue(args, i, arg, result.errors);
      if (result.sourceMap !== undefined) i++;
    } else if (arg === "--disassemble") {
      result.disassemble = true;
    } else if (arg === "--config") {
      result.config = takeValue(args, i, arg, result.errors);
      if (result.config !== undefined) i++;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg.startsWith("-")) {
      result.errors.push(`unknown option ${arg}`);
    } else if (result.file === undefined) {
      result.file = arg;
      result.mode = "exec";
    } else {
      result.errors.push(`unexpected argument ${arg}`);
    }
  }

  if (result.eval !== undefined && result.file !== undefined) {
    result.errors.push("give either an artifact or --eval, not both");
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getCompilerHelpText(): string {
  return `
sablec - compile Sable source to a bytecode artifact

USAGE:
  sablec [options] <input.sable>

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -o, --output <file>                Artifact path (default: <input>.object)
  --source-map                       Also write <artifact>.map
  --disassemble                      Print the compiled instructions
  --config <file>                    Read settings from a JSON or YAML file
  --verbose                          Report pass timings on stderr

EXIT CODES:
  0  compiled
  1  lexical, syntax or compile error
  2  usage or file error
`.trim();
}

const REPL_HELP = `
REPL COMMANDS:
  :help, :h                          Show REPL help
  :quit, :q                          Exit the REPL
  :env                               Show global bindings
  :defs                              Show defined functions
`.trim();

export function getVmHelpText(): string {
  return `
sable - run Sable bytecode artifacts

USAGE:
  sable [options]                    Start the interactive REPL
  sable [options] <artifact>         Run a compiled artifact
  sable --eval <code>                Compile and run source text

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -e, --eval <code>                  Compile and run code, then exit
  --source-map <file>                Source map for error locations (default: <artifact>.map)
  --disassemble                      Print the artifact's instructions instead of running it
  --config <file>                    Read settings from a JSON or YAML file
  --verbose                          Report step counts on stderr

${REPL_HELP}
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(command: string): string {
  const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `${command} v${pkg.version}`;
    }
  } catch (e) {
    if (!(e instanceof Error)) throw e;
  }
  return `${command} v0.1.0`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED STEPS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Same directory and stem as the input, with the artifact extension.
 */
export function defaultOutputPath(input: string, extension: string): string {
  const parsed = path.parse(input);
  return path.join(parsed.dir, parsed.name + extension);
}

function resolveConfig(configFile: string | undefined, io: CliIO): SableConfig | Fail {
  const config = loadConfig({ configFile, env: io.env, cwd: io.cwd });
  return config.tag === "Done" ? config.value : config;
}

function readWith<A>(io: CliIO, file: string, read: (file: string) => A): A | Fail {
  try {
    return read(file);
  } catch (e) {
    return ioFailed(file, e instanceof Error ? e.message : String(e));
  }
}

function failed(v: unknown): v is Fail {
  return typeof v === "object" && v !== null && "tag" in v && v.tag === "Fail";
}

// ═══════════════════════════════════════════════════════════════════════════════
// COMPILER COMMAND
// ═══════════════════════════════════════════════════════════════════════════════

export function runCompiler(args: CompilerArgs, io: CliIO): number {
  if (args.help) {
    io.out(getCompilerHelpText());
    return EXIT_OK;
  }
  if (args.version) {
    io.out(getVersion("sablec"));
    return EXIT_OK;
  }
  if (args.errors.length > 0 || args.input === undefined) {
    for (const e of args.errors) io.err(`error: ${e}`);
    if (args.input === undefined) io.err("error: no input file");
    io.err("usage: sablec [options] <input.sable>");
    return EXIT_USAGE;
  }

  const config = resolveConfig(args.config, io);
  if (failed(config)) {
    io.err(renderFailure(config.failure));
    return EXIT_USAGE;
  }

  const input = args.input;
  const text = readWith(io, input, f => io.readText(f));
  if (failed(text)) {
    io.err(renderFailure(text.failure));
    return EXIT_USAGE;
  }

  const compiled = compileSource(text, { file: input, libraries: config.compiler.libraries });
  if (compiled.tag === "Fail") {
    io.err(renderFailure(compiled.failure, { text, file: input }));
    return EXIT_FAILURE;
  }

  const { bytes, unit, sourceMap, passes } = compiled.value;
  const output = args.output ?? defaultOutputPath(input, config.compiler.artifactExtension);
  const written: string[] = [output];
  try {
    io.writeFile(output, bytes);
    if (args.sourceMap || config.compiler.sourceMap) {
      io.writeFile(`${output}.map`, serializeSourceMap(sourceMap));
      written.push(`${output}.map`);
    }
  } catch (e) {
    io.err(renderFailure(ioFailed(output, e instanceof Error ? e.message : String(e)).failure));
    return EXIT_USAGE;
  }

  if (args.disassemble) {
    io.out(disassemble(unit.code));
  }
  if (args.verbose) {
    for (const pass of passes) {
      const metrics = Object.entries(pass.metrics).map(([k, v]) => `${k}=${v}`).join(" ");
      io.err(`[${pass.name}] ${pass.durationMs.toFixed(2)}ms ${metrics}`.trimEnd());
    }
    io.err(`wrote ${written.join(", ")}`);
  }
  return EXIT_OK;
}

// ═══════════════════════════════════════════════════════════════════════════════
// VM COMMAND
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Render a runtime failure, placing it in the source when a source map
 * knows the faulting instruction.
 */
export function renderRuntimeFailure(f: Fail, map?: SourceMap, source?: SourceText): string {
  const offset = f.meta.offset;
  const located = map && offset !== undefined ? lookupSpan(map, offset) : undefined;
  const diag = f.failure.diagnostics[0];
  if (!located || !diag) {
    return renderFailure(f.failure, source);
  }
  return renderDiagnostic({ ...diag, span: located }, source);
}

/** The source file a map names, when it can still be read. */
function mappedSource(map: SourceMap | undefined, io: CliIO): SourceText | undefined {
  if (map?.file === undefined || !io.exists(map.file)) return undefined;
  const file = map.file;
  const text = readWith(io, file, f => io.readText(f));
  return failed(text) ? undefined : { text, file };
}

function loadSourceMap(args: VmArgs, file: string, io: CliIO): SourceMap | Fail | undefined {
  const mapFile = args.sourceMap ?? `${file}.map`;
  if (args.sourceMap === undefined && !io.exists(mapFile)) return undefined;
  const text = readWith(io, mapFile, f => io.readText(f));
  if (failed(text)) return text;
  const parsed = parseSourceMap(text);
  return parsed.tag === "Done" ? parsed.value : parsed;
}

export function runVm(args: VmArgs, io: CliIO): number {
  if (args.help) {
    io.out(getVmHelpText());
    return EXIT_OK;
  }
  if (args.version) {
    io.out(getVersion("sable"));
    return EXIT_OK;
  }
  if (args.errors.length > 0) {
    for (const e of args.errors) io.err(`error: ${e}`);
    io.err("usage: sable [options] [<artifact> | --eval <code>]");
    return EXIT_USAGE;
  }

  const config = resolveConfig(args.config, io);
  if (failed(config)) {
    io.err(renderFailure(config.failure));
    return EXIT_USAGE;
  }

  if (args.eval !== undefined) {
    const source: SourceText = { text: args.eval, file: "<eval>" };
    const compiled = compileSource(source.text, { file: source.file, libraries: config.compiler.libraries });
    if (compiled.tag === "Fail") {
      io.err(renderFailure(compiled.failure, source));
      return EXIT_FAILURE;
    }
    const result = execute(compiled.value.bytes, { config: config.vm, output: io.out });
    if (result.tag === "Fail") {
      io.err(renderRuntimeFailure(result, compiled.value.sourceMap, source));
      return EXIT_FAILURE;
    }
    if (args.verbose) io.err(`halted after ${result.value.steps} steps`);
    return EXIT_OK;
  }

  if (args.file === undefined) {
    io.err("error: no artifact given");
    return EXIT_USAGE;
  }

  const file = args.file;
  const bytes = readWith(io, file, f => io.readFile(f));
  if (failed(bytes)) {
    io.err(renderFailure(bytes.failure));
    return EXIT_USAGE;
  }

  const map = loadSourceMap(args, file, io);
  if (failed(map)) {
    io.err(renderFailure(map.failure));
    return EXIT_USAGE;
  }

  const decoded = decodeProgram(bytes);
  if (decoded.tag === "Fail") {
    io.err(renderRuntimeFailure(decoded, map, mappedSource(map, io)));
    return EXIT_FAILURE;
  }
  if (decoded.value.trailingBytes > 0) {
    io.err(renderDiagnostic(makeDiagnostic("W0001", { count: decoded.value.trailingBytes })));
  }
  if (args.disassemble) {
    io.out(disassemble(decoded.value.code));
    return EXIT_OK;
  }

  const result = execute(bytes, { config: config.vm, output: io.out, verify: false });
  if (result.tag === "Fail") {
    io.err(renderRuntimeFailure(result, map, mappedSource(map, io)));
    return EXIT_FAILURE;
  }
  if (args.verbose) io.err(`halted after ${result.value.steps} steps`);
  return EXIT_OK;
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPL
// ═══════════════════════════════════════════════════════════════════════════════

export type ReplSession = {
  config: SableConfig;
  globals: Map<string, Val>;
  functions: Map<string, FunctionEntry>;
  /** Input lines awaiting a closing brace */
  buffer: string;
  inputs: number;
};

export type ReplResponse = {
  output: string[];
  exit: boolean;
  /** True while a multi-line input is still open */
  pending: boolean;
};

export function createReplSession(config: SableConfig): ReplSession {
  return { config, globals: new Map(), functions: new Map(), buffer: "", inputs: 0 };
}

type InputScan = {
  /** Open braces not yet closed */
  depth: number;
  /** Start of a `<` comment followed by nothing but whitespace, if any */
  trailingComment?: number;
};

function scanInput(text: string): InputScan {
  let depth = 0;
  let inString = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === "\\") i++;
      else if (ch === '"') inString = false;
    } else if (ch === '"') {
      inString = true;
    } else if (ch === "<") {
      const start = i;
      while (i < text.length && text[i] !== "\n") i++;
      if (text.slice(i).trim() === "") return { depth, trailingComment: start };
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
    }
  }
  return { depth };
}

function replCommand(session: ReplSession, command: string): ReplResponse {
  const reply = (output: string[], exit = false): ReplResponse => ({ output, exit, pending: false });
  switch (command) {
    case ":quit":
    case ":q":
      return reply([], true);
    case ":help":
    case ":h":
      return reply([REPL_HELP]);
    case ":env":
      return reply(
        session.globals.size === 0
          ? ["(no bindings)"]
          : [...session.globals].map(([name, v]) => `${name} = ${v.tag === "Str" ? JSON.stringify(v.s) : formatValue(v)}`)
      );
    case ":defs":
      return reply(
        session.functions.size === 0
          ? ["(no functions)"]
          : [...session.functions.values()].map(fn => `def ${fn.name}(${fn.params.join(", ")})`)
      );
    default:
      return reply([`Unknown command ${command}; try :help`]);
  }
}

/**
 * Feed one line to the session. Input is held until its braces balance; a
 * missing final ';' is supplied ahead of any trailing comment.
 */
export function processReplLine(session: ReplSession, line: string): ReplResponse {
  const trimmed = line.trim();
  if (session.buffer === "" && trimmed.startsWith(":")) {
    return replCommand(session, trimmed);
  }
  if (session.buffer === "" && trimmed === "") {
    return { output: [], exit: false, pending: false };
  }

  session.buffer += (session.buffer ? "\n" : "") + line;
  const scan = scanInput(session.buffer);
  if (scan.depth > 0) {
    return { output: [], exit: false, pending: true };
  }

  const buffered = session.buffer;
  session.buffer = "";
  // The statement ends before any trailing comment; a ';' goes there.
  const code = buffered.slice(0, scan.trailingComment ?? buffered.length).trimEnd();
  if (code === "") {
    return { output: [], exit: false, pending: false };
  }
  const text = code.endsWith(";") || code.endsWith("}") ? buffered : `${code};${buffered.slice(code.length)}`;

  session.inputs++;
  const source: SourceText = { text, file: `<repl:${session.inputs}>` };
  const output: string[] = [];
  const compiled = compileSource(text, { file: source.file, libraries: session.config.compiler.libraries });
  if (compiled.tag === "Fail") {
    output.push(renderFailure(compiled.failure, source));
    return { output, exit: false, pending: false };
  }
  const result = execute(compiled.value.bytes, {
    config: session.config.vm,
    output: l => output.push(l),
    globals: session.globals,
    functions: session.functions,
  });
  if (result.tag === "Fail") {
    output.push(renderRuntimeFailure(result, compiled.value.sourceMap, source));
  }
  return { output, exit: false, pending: false };
}
