// src/core/config/config.ts
// Configuration for the compiler and VM: defaults, environment, files, overrides

import * as fs from "fs";
import * as path from "path";
import type { Outcome } from "../../outcome/outcome";
import { done, ioFailed, validationFailed } from "../../outcome/constructors";
import type { VMConfig } from "../compiler/types";
import { defaultVMConfig } from "../compiler/vm";
import { DEFAULT_LIBRARIES } from "../compiler/bytecode";

// =========================================================================
// Configuration Types
// =========================================================================

export type CompilerSettings = {
  /** Library names the import marker accepts */
  libraries: string[];
  /** Extension given to artifacts when no output path is named */
  artifactExtension: string;
  /** Write `<artifact>.map` beside every artifact */
  sourceMap: boolean;
};

export type SableConfig = {
  compiler: CompilerSettings;
  vm: VMConfig;
};

/**
 * One configuration source. Only the fields the source actually sets are
 * present, so merging never resets a field to its default.
 */
export type ConfigLayer = {
  compiler?: Partial<CompilerSettings>;
  vm?: Partial<VMConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_COMPILER_SETTINGS: CompilerSettings = {
  libraries: [...DEFAULT_LIBRARIES],
  artifactExtension: ".object",
  sourceMap: false,
};

export const DEFAULT_VM_CONFIG: VMConfig = { ...defaultVMConfig };

export const DEFAULT_CONFIG: SableConfig = {
  compiler: DEFAULT_COMPILER_SETTINGS,
  vm: DEFAULT_VM_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["sable.config.json", "sable.config.yaml", "sable.config.yml"];

// =========================================================================
// Field Readers
// =========================================================================

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

const snake = (key: string): string => key.replace(/[A-Z]/g, c => `_${c.toLowerCase()}`);

/** Look a field up under its camelCase or snake_case name. */
function field(data: Record<string, unknown>, key: string): unknown {
  return key in data ? data[key] : data[snake(key)];
}

function readInt(value: unknown, name: string): Outcome<number | undefined> {
  if (value === undefined) return done(undefined);
  const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isInteger(n)) {
    return validationFailed(name, `expected an integer, got ${JSON.stringify(value)}`);
  }
  return done(n);
}

function readBool(value: unknown, name: string): Outcome<boolean | undefined> {
  if (value === undefined || typeof value === "boolean") return done(value);
  if (value === "true" || value === "1") return done(true);
  if (value === "false" || value === "0") return done(false);
  return validationFailed(name, `expected a boolean, got ${JSON.stringify(value)}`);
}

function readString(value: unknown, name: string): Outcome<string | undefined> {
  if (value === undefined || typeof value === "string") return done(value);
  return validationFailed(name, `expected a string, got ${JSON.stringify(value)}`);
}

/** A list, or a comma-separated string. */
function readList(value: unknown, name: string): Outcome<string[] | undefined> {
  if (value === undefined) return done(undefined);
  if (typeof value === "string") {
    return done(value.split(",").map(s => s.trim()).filter(s => s.length > 0));
  }
  if (Array.isArray(value) && value.every((v): v is string => typeof v === "string")) {
    return done(value);
  }
  return validationFailed(name, `expected a list of names, got ${JSON.stringify(value)}`);
}

/**
 * Read the known fields of one layer. `get` resolves a (section, key) pair
 * to its raw value, so environment variables and parsed files share the
 * same validation.
 */
function readLayer(get: (section: "compiler" | "vm", key: string) => unknown): Outcome<ConfigLayer> {
  const libraries = readList(get("compiler", "libraries"), "compiler.libraries");
  if (libraries.tag === "Fail") return libraries;
  const artifactExtension = readString(get("compiler", "artifactExtension"), "compiler.artifactExtension");
  if (artifactExtension.tag === "Fail") return artifactExtension;
  const sourceMap = readBool(get("compiler", "sourceMap"), "compiler.sourceMap");
  if (sourceMap.tag === "Fail") return sourceMap;

  const compiler: Partial<CompilerSettings> = {};
  if (libraries.value !== undefined) compiler.libraries = libraries.value;
  if (artifactExtension.value !== undefined) compiler.artifactExtension = artifactExtension.value;
  if (sourceMap.value !== undefined) compiler.sourceMap = sourceMap.value;

  const vm: Partial<VMConfig> = {};
  for (const key of ["maxStackDepth", "maxCallDepth", "maxSteps"] as const) {
    const n = readInt(get("vm", key), `vm.${key}`);
    if (n.tag === "Fail") return n;
    if (n.value !== undefined) vm[key] = n.value;
  }

  return done({ compiler, vm });
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Read `<PREFIX>_LIBRARIES`, `<PREFIX>_ARTIFACT_EXTENSION`,
 * `<PREFIX>_SOURCE_MAP`, `<PREFIX>_MAX_STACK_DEPTH`, `<PREFIX>_MAX_CALL_DEPTH`
 * and `<PREFIX>_MAX_STEPS`. Unset and empty variables are skipped.
 */
export function configFromEnv(prefix = "SABLE", env: NodeJS.ProcessEnv = process.env): Outcome<ConfigLayer> {
  return readLayer((_section, key) => {
    const value = env[`${prefix}_${snake(key).toUpperCase()}`];
    return value === "" ? undefined : value;
  });
}

/**
 * Create a layer from a plain object (e.g., parsed JSON/YAML). Keys may be
 * camelCase or snake_case.
 */
export function configFromObject(data: Record<string, unknown>): Outcome<ConfigLayer> {
  for (const section of ["compiler", "vm"] as const) {
    if (data[section] !== undefined && !isRecord(data[section])) {
      return validationFailed(section, "expected a section of key/value pairs");
    }
  }
  return readLayer((section, key) => {
    const sectionData = data[section];
    return isRecord(sectionData) ? field(sectionData, key) : undefined;
  });
}

/**
 * Load a layer from a JSON or YAML file.
 */
export function configFromFile(filePath: string): Outcome<ConfigLayer> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    return ioFailed(filePath, e instanceof Error ? e.message : String(e));
  }

  const ext = path.extname(filePath).toLowerCase();
  let data: unknown;
  if (ext === ".json") {
    try {
      data = JSON.parse(content);
    } catch (e) {
      return validationFailed(filePath, e instanceof Error ? e.message : String(e));
    }
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseSimpleYaml(content);
  } else {
    return validationFailed(filePath, `unsupported config file format: ${ext || "(none)"}`);
  }

  if (!isRecord(data)) {
    return validationFailed(filePath, "expected an object at the top level");
  }
  return configFromObject(data);
}

/**
 * Merge layers over the defaults, later ones overriding earlier ones.
 */
export function mergeConfigs(...layers: ConfigLayer[]): SableConfig {
  const result: SableConfig = {
    compiler: { ...DEFAULT_COMPILER_SETTINGS, libraries: [...DEFAULT_COMPILER_SETTINGS.libraries] },
    vm: { ...DEFAULT_VM_CONFIG },
  };

  for (const layer of layers) {
    if (layer.compiler) {
      result.compiler = { ...result.compiler, ...layer.compiler };
    }
    if (layer.vm) {
      result.vm = { ...result.vm, ...layer.vm };
    }
  }

  return result;
}

export type LoadConfigOptions = {
  /** Explicit config file; when absent the default names are tried in `cwd` */
  configFile?: string;
  overrides?: ConfigLayer;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

/**
 * Resolve the effective configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options: LoadConfigOptions = {}): Outcome<SableConfig> {
  const layers: ConfigLayer[] = [];

  const envLayer = configFromEnv("SABLE", options.env ?? process.env);
  if (envLayer.tag === "Fail") return envLayer;
  layers.push(envLayer.value);

  let file = options.configFile;
  if (file === undefined) {
    const cwd = options.cwd ?? process.cwd();
    file = DEFAULT_CONFIG_FILES.map(p => path.join(cwd, p)).find(p => fs.existsSync(p));
  }
  if (file !== undefined) {
    const fileLayer = configFromFile(file);
    if (fileLayer.tag === "Fail") return fileLayer;
    layers.push(fileLayer.value);
  }

  if (options.overrides) {
    layers.push(options.overrides);
  }

  return validateConfig(mergeConfigs(...layers));
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

function parseScalar(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  if (value.startsWith("[") && value.endsWith("]")) {
    return value
      .slice(1, -1)
      .split(",")
      .map(s => s.trim())
      .filter(s => s.length > 0)
      .map(s => parseScalar(s));
  }
  return value;
}

export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);
    if (indent < 0) continue;

    let top = stack[stack.length - 1];
    while (top && stack.length > 1 && top.indent >= indent) {
      stack.pop();
      top = stack[stack.length - 1];
    }
    if (!top) continue;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      top.obj[key] = nested;
      stack.push({ obj: nested, indent });
    } else {
      top.obj[key] = parseScalar(value);
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

const LIBRARY_NAME = /^[\p{L}_][\p{L}\p{N}_]*$/u;

export function validateConfig(config: SableConfig): Outcome<SableConfig> {
  const { vm, compiler } = config;

  if (vm.maxStackDepth < 1) {
    return validationFailed("vm.maxStackDepth", "must be at least 1");
  }
  if (vm.maxCallDepth < 1) {
    return validationFailed("vm.maxCallDepth", "must be at least 1");
  }
  if (vm.maxSteps < 0) {
    return validationFailed("vm.maxSteps", "must be 0 (unlimited) or positive");
  }
  if (!compiler.artifactExtension.startsWith(".") || compiler.artifactExtension.length < 2) {
    return validationFailed("compiler.artifactExtension", `must start with '.', got "${compiler.artifactExtension}"`);
  }
  const bad = compiler.libraries.find(lib => !LIBRARY_NAME.test(lib));
  if (bad !== undefined) {
    return validationFailed("compiler.libraries", `"${bad}" is not a library name`);
  }

  return done(config);
}
