#!/usr/bin/env node
/**
 * Production entry point for scriptrelay.
 *
 * Wires real dependencies (filesystem, process, TCP transport) into
 * CliDeps and dispatches to the CLI command handler.
 *
 * Usage:
 *   node dist/main.js ping
 *   node dist/main.js run --debug
 *   node dist/main.js exec scripts/clear_scene.py
 */

import { parseArgs, runCommand } from './cli.js';
import type { CliDeps } from './cli.js';
import { loadConfig } from './core/config-loader.js';
import { createRuntime } from './relay-runtime.js';

// ---------------------------------------------------------------------------
// main()
// ---------------------------------------------------------------------------

/**
 * Production main(): wires real deps and dispatches commands.
 *
 * @param argv - Process arguments (defaults to process.argv).
 * @returns Exit code (0 = success, non-zero = failure).
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const args = parseArgs(argv);

  const deps: CliDeps = {
    stdout: (msg: string) => process.stdout.write(`${msg}\n`),
    stderr: (msg: string) => process.stderr.write(`${msg}\n`),
    cwd: process.cwd(),
    env: process.env,
    loadConfig,
    createRuntime,
  };

  return runCommand(args.command, deps, args);
}

// ---------------------------------------------------------------------------
// Entry point, run when executed directly
// ---------------------------------------------------------------------------

/* c8 ignore next 7 */
main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  },
);
