#!/usr/bin/env npx tsx
// bin/sablec.ts
// Sable compiler CLI: source file -> bytecode artifact
//
// Run:  npx tsx bin/sablec.ts [options] <input.sable>

import { parseCompilerArgs, runCompiler, nodeIO } from "./sable-cli-lib";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
  const args = parseCompilerArgs(process.argv.slice(2));
  process.exitCode = runCompiler(args, nodeIO());
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
