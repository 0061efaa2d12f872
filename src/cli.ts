/**
 * scriptrelay CLI.
 *
 * Provides the `scriptrelay` command with subcommands:
 *   - `run`: Preflight, then the configured pipeline.
 *   - `resume`: Re-run from the stage that halted the last failed run.
 *   - `ping`: Preflight only.
 *   - `exec`: Send one script file.
 *   - `eval`: Send one inline snippet.
 *   - `stages`: List the configured stages.
 *
 * Exit codes: 0 success, 1 pipeline or command failure, 2 usage or
 * configuration error.
 *
 * All external dependencies are injected via {@link CliDeps} for testability.
 * The real `main()` wires production dependencies and calls `runCommand()`.
 */

import { basename, dirname, resolve } from 'node:path';
import { VERSION } from './index.js';
import { ConfigError, type RelayConfig } from './types/config.js';
import { ErrorKind } from './types/errors.js';
import { applyEnvOverrides, resolveConfigPath, withBaseTimeout } from './core/config-loader.js';
import { configureLogging } from './core/logger.js';
import { isRelayError, toRelayError } from './core/relay-error.js';
import { createCommand } from './ipc/codec.js';
import type { Command } from './types/protocol.js';
import type { PipelineResult } from './core/pipeline/types.js';
import type { RelayRuntime, RuntimeOptions } from './relay-runtime.js';

// ---------------------------------------------------------------------------
// CLI dependency injection
// ---------------------------------------------------------------------------

/** Injectable dependencies for CLI commands. */
export interface CliDeps {
  /** Write to stdout. */
  stdout: (msg: string) => void;
  /** Write to stderr. */
  stderr: (msg: string) => void;
  /** Working directory for relative paths. */
  cwd: string;
  /** Process environment. */
  env: Readonly<Record<string, string | undefined>>;
  /** Load and validate relay.toml. */
  loadConfig: (path: string) => RelayConfig;
  /** Build the services for a resolved config. */
  createRuntime: (config: RelayConfig, options: RuntimeOptions) => RelayRuntime;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Parsed CLI arguments. */
export interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

/** Flags that take a value (`--timeout 500` or `--timeout=500`). */
const VALUE_OPTIONS = new Set(['timeout', 'from', 'label', 'config']);

/**
 * Parse process.argv into a command, positionals, boolean flags and
 * valued options.
 *
 * Expects argv in the form: [node, script, command?, ...rest]
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};
  const positionals: string[] = [];
  let command = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg.startsWith('--') && arg.length > 2) {
      const eq = arg.indexOf('=');
      const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      if (VALUE_OPTIONS.has(name)) {
        if (eq !== -1) {
          options[name] = arg.slice(eq + 1);
        } else {
          const next = args[i + 1];
          if (next !== undefined) {
            options[name] = next;
            i++;
          }
        }
      } else {
        flags[name] = true;
      }
    } else if (!command) {
      command = arg;
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags, options };
}

// ---------------------------------------------------------------------------
// Command dispatch
// ---------------------------------------------------------------------------

export const USAGE = `Usage: scriptrelay <command> [options]

Commands:
  run              Check the host, then run the pipeline
  resume           Re-run from the stage where the last run halted
  ping             Check that the host is reachable
  exec <file>      Send one script file to the host
  eval <code>      Send one inline snippet to the host
  stages           List the configured stages

Options:
  --config <path>  Config file (default: relay.toml, or $SCRIPTRELAY_CONFIG)
  --debug          Fewer attempts and shorter timeouts
  --timeout <ms>   Base timeout for every stage
  --from <stage>   Start at a stage name or 1-based index (run)
  --label <text>   Label for exec/eval
  --version        Show version number
  --help           Show this help message`;

/** Exit codes. */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Dispatch a command string to the appropriate handler.
 *
 * @returns Process exit code.
 */
export async function runCommand(command: string, deps: CliDeps, args?: ParsedArgs): Promise<number> {
  const parsed = args ?? { command, positionals: [], flags: {}, options: {} };

  if (command === '--version' || (command === '' && parsed.flags['version'])) {
    deps.stdout(VERSION);
    return EXIT_OK;
  }

  if (command === '' || command === '--help' || parsed.flags['help']) {
    deps.stdout(USAGE);
    return EXIT_OK;
  }

  const handler = HANDLERS.get(command);
  if (!handler) {
    deps.stderr(`Unknown command: "${command}"\n`);
    deps.stdout(USAGE);
    return EXIT_USAGE;
  }

  try {
    return await handler(deps, parsed);
  } catch (err) {
    if (err instanceof UsageError) {
      deps.stderr(`${err.message}\n`);
      deps.stdout(USAGE);
      return EXIT_USAGE;
    }
    if (err instanceof ConfigError) {
      deps.stderr(`Configuration error: ${err.message}`);
      return EXIT_USAGE;
    }
    if (isRelayError(err) && err.kind === ErrorKind.INVALID_COMMAND) {
      deps.stderr(`Error: ${err.message}`);
      return EXIT_USAGE;
    }
    throw err;
  }
}

type Handler = (deps: CliDeps, args: ParsedArgs) => Promise<number>;

const HANDLERS = new Map<string, Handler>([
  ['run', (deps, args) => run(deps, args)],
  ['resume', (deps, args) => resume(deps, args)],
  ['ping', (deps, args) => ping(deps, args)],
  ['exec', (deps, args) => execFile(deps, args)],
  ['eval', (deps, args) => evalCode(deps, args)],
  ['stages', (deps, args) => listStages(deps, args)],
]);

// ---------------------------------------------------------------------------
// Shared setup
// ---------------------------------------------------------------------------

interface Session {
  runtime: RelayRuntime;
  configPath: string;
  debug: boolean;
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new UsageError(`--timeout must be a positive integer (milliseconds), got "${value}"`);
  }
  return Number(value);
}

/** Resolve config (file, env, flags), configure logging, build services. */
function openSession(deps: CliDeps, args: ParsedArgs): Session {
  const timeout = parseTimeout(args.options['timeout']);
  const configOption = args.options['config'];
  const configPath =
    configOption !== undefined
      ? resolve(deps.cwd, configOption)
      : resolveConfigPath(deps.env, deps.cwd);

  let config = applyEnvOverrides(deps.loadConfig(configPath), deps.env);
  if (timeout !== undefined) {
    config = withBaseTimeout(config, timeout);
  }
  const debug = args.flags['debug'] === true || config.retry.debug;
  configureLogging({ level: debug ? 'debug' : config.logging.level });

  const runtime = deps.createRuntime(config, { baseDir: dirname(configPath) });
  return { runtime, configPath, debug };
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

function printPipelineResult(deps: CliDeps, result: PipelineResult, total: number): void {
  for (const entry of result.entries) {
    if (entry.outcome === 'success') {
      deps.stdout(
        `  OK    ${entry.stage} (${plural(entry.attempts, 'attempt')}, ${entry.durationMs}ms)`,
      );
    } else {
      deps.stderr(
        `  FAIL  ${entry.stage}: ${entry.error.kind}: ${entry.error.message} (${plural(entry.attempts, 'attempt')})`,
      );
    }
  }

  if (result.status === 'succeeded') {
    deps.stdout(
      `\nPipeline "${result.pipeline}" succeeded: ${plural(result.entries.length, 'stage')}, ${plural(result.totalAttempts, 'attempt')}`,
    );
    return;
  }

  const halted = result.haltedAt;
  if (halted) {
    deps.stderr(
      `\nPipeline "${result.pipeline}" halted at stage ${halted.index}/${total} "${halted.stage}" after ${plural(result.totalAttempts, 'attempt')}`,
    );
    deps.stderr(`Resume with: scriptrelay resume`);
  }
}

async function runPipeline(
  deps: CliDeps,
  session: Session,
  fromStage: string | undefined,
): Promise<number> {
  const { orchestrator } = session.runtime;
  if (orchestrator.stages.length === 0) {
    deps.stderr(`No stages configured in ${session.configPath}`);
    return EXIT_USAGE;
  }

  const preflight = await orchestrator.preflight();
  if (!preflight.ok) {
    deps.stderr(preflight.message);
    return EXIT_FAILURE;
  }
  deps.stdout(preflight.message);

  const total = orchestrator.stages.length;
  const unsubscribe = orchestrator.onTransition((state) => {
    if (state.phase === 'running') {
      const stage = orchestrator.stages[state.index];
      deps.stdout(`[${state.index + 1}/${total}] ${stage?.label ?? state.stage}`);
    }
  });

  try {
    const result = await orchestrator.run({
      debug: session.debug,
      ...(fromStage !== undefined ? { fromStage } : {}),
    });
    printPipelineResult(deps, result, total);
    return result.status === 'succeeded' ? EXIT_OK : EXIT_FAILURE;
  } finally {
    unsubscribe();
  }
}

// ---------------------------------------------------------------------------
// run / resume
// ---------------------------------------------------------------------------

export async function run(deps: CliDeps, args: ParsedArgs): Promise<number> {
  const session = openSession(deps, args);
  try {
    return await runPipeline(deps, session, args.options['from']);
  } finally {
    session.runtime.close();
  }
}

export async function resume(deps: CliDeps, args: ParsedArgs): Promise<number> {
  const session = openSession(deps, args);
  try {
    const { journal, orchestrator } = session.runtime;
    if (!journal) {
      deps.stderr('The run journal is disabled ([journal] enabled = false); nothing to resume from');
      return EXIT_USAGE;
    }

    const point = journal.resumePoint(orchestrator.name);
    if (point === null) {
      const last = journal.lastRun(orchestrator.name);
      deps.stdout(
        last
          ? `Nothing to resume: the last run of "${orchestrator.name}" succeeded`
          : `Nothing to resume: "${orchestrator.name}" has no recorded runs`,
      );
      return EXIT_OK;
    }

    deps.stdout(`Resuming "${orchestrator.name}" from stage "${point}"`);
    return await runPipeline(deps, session, point);
  } finally {
    session.runtime.close();
  }
}

// ---------------------------------------------------------------------------
// ping
// ---------------------------------------------------------------------------

export async function ping(deps: CliDeps, args: ParsedArgs): Promise<number> {
  const session = openSession(deps, args);
  try {
    const result = await session.runtime.orchestrator.preflight();
    if (result.ok) {
      deps.stdout(result.message);
      return EXIT_OK;
    }
    deps.stderr(result.message);
    return EXIT_FAILURE;
  } finally {
    session.runtime.close();
  }
}

// ---------------------------------------------------------------------------
// exec / eval
// ---------------------------------------------------------------------------

async function sendOne(deps: CliDeps, session: Session, command: Command): Promise<number> {
  const { policy, config } = session.runtime;
  const outcome = await policy.run(command, {
    attempts: config.retry.max_attempts,
    baseTimeoutMs: config.retry.base_timeout_ms,
    debug: session.debug,
  });

  if (outcome.status === 'success') {
    deps.stdout(outcome.response.result ?? '');
    return EXIT_OK;
  }
  deps.stderr(
    `${command.label} failed: ${outcome.error.kind}: ${outcome.error.message} (${plural(outcome.attempts, 'attempt')})`,
  );
  return EXIT_FAILURE;
}

export async function execFile(deps: CliDeps, args: ParsedArgs): Promise<number> {
  const file = args.positionals[0];
  if (file === undefined) {
    throw new UsageError('exec requires a script file');
  }

  const session = openSession(deps, args);
  try {
    let code: string;
    try {
      code = await session.runtime.scripts.readScript(file);
    } catch (err) {
      deps.stderr(toRelayError(err).message);
      return EXIT_FAILURE;
    }
    const command = createCommand({
      kind: 'execute_code',
      payload: code,
      label: args.options['label'] ?? basename(file),
    });
    return await sendOne(deps, session, command);
  } finally {
    session.runtime.close();
  }
}

export async function evalCode(deps: CliDeps, args: ParsedArgs): Promise<number> {
  if (args.positionals.length === 0) {
    throw new UsageError('eval requires code to send');
  }

  const session = openSession(deps, args);
  try {
    const command = createCommand({
      kind: 'execute_code',
      payload: args.positionals.join(' '),
      label: args.options['label'] ?? 'code',
    });
    return await sendOne(deps, session, command);
  } finally {
    session.runtime.close();
  }
}

// ---------------------------------------------------------------------------
// stages
// ---------------------------------------------------------------------------

export async function listStages(deps: CliDeps, args: ParsedArgs): Promise<number> {
  const session = openSession(deps, args);
  try {
    const { orchestrator } = session.runtime;
    if (orchestrator.stages.length === 0) {
      deps.stdout(`Pipeline "${orchestrator.name}" has no stages`);
      return EXIT_OK;
    }

    deps.stdout(`Pipeline "${orchestrator.name}":`);
    orchestrator.stages.forEach((stage, i) => {
      const source =
        stage.source.kind === 'file'
          ? `${stage.source.path}${stage.sendAs === 'path' ? ' (by path)' : ''}`
          : 'inline';
      deps.stdout(
        `  ${i + 1}. ${stage.name} - ${stage.label} [${source}, ${plural(stage.attempts, 'attempt')}, ${stage.timeoutMs}ms]`,
      );
    });
    return EXIT_OK;
  } finally {
    session.runtime.close();
  }
}
