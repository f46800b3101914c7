#!/usr/bin/env npx tsx
// bin/sable.ts
// Sable VM CLI - runs artifacts, evaluates source, or starts a REPL
//
// Run:  npx tsx bin/sable.ts [options] [artifact]

import * as readline from "readline";
import { loadConfig, renderFailure } from "../src";
import {
  parseVmArgs,
  runVm,
  nodeIO,
  getVersion,
  createReplSession,
  processReplLine,
  EXIT_USAGE,
  type VmArgs,
} from "./sable-cli-lib";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
  const args = parseVmArgs(process.argv.slice(2));

  if (args.mode === "exec" || args.help || args.version || args.errors.length > 0) {
    process.exitCode = runVm(args, nodeIO());
    return;
  }

  await replMode(args);
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPL MODE
// ═══════════════════════════════════════════════════════════════════════════════

async function replMode(args: VmArgs): Promise<void> {
  const config = loadConfig({ configFile: args.config });
  if (config.tag === "Fail") {
    console.error(renderFailure(config.failure));
    process.exitCode = EXIT_USAGE;
    return;
  }

  const session = createReplSession(config.value);
  const isTTY = process.stdin.isTTY === true;
  const rl = readline.createInterface({
    input: process.stdin,
    output: isTTY ? process.stdout : undefined,
    prompt: "sable> ",
  });

  if (isTTY) {
    console.log(`${getVersion("sable")} - :help for commands, :quit to exit`);
    rl.prompt();
  }

  try {
    for await (const line of rl) {
      const response = processReplLine(session, line);
      for (const out of response.output) console.log(out);
      if (response.exit) break;
      if (isTTY) {
        rl.setPrompt(response.pending ? "...... " : "sable> ");
        rl.prompt();
      }
    }
  } finally {
    rl.close();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

main().catch((error: unknown) => {
  console.error("Fatal error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
