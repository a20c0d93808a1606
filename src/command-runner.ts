// src/command-runner.ts
import { spawnSync } from 'node:child_process';
import { ExecutionError, ExecutionTimeout, ProbeError } from './errors.js';

export interface Logger {
  log: (m: string) => void;
  error: (m: string) => void;
}

/**
 * Outcome of a finished (or killed) process. `timedOut` is set when the
 * watchdog terminated the process, in which case `exitCode` is -1.
 */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunOptions {
  timeoutMs?: number;
  cwd?: string;
}

/**
 * Process-execution interface. Implementations must run `argv[0]` with
 * the remaining elements as discrete arguments, never through a shell.
 * Failing to spawn the process at all is reported by throwing.
 */
export interface Runner {
  (argv: readonly string[], opts: RunOptions): CommandResult;
}

/**
 * Default runner backed by spawnSync with `shell: false` and UTF-8
 * decoding of both output streams.
 */
export const defaultRunner: Runner = (argv, opts) => {
  const [bin, ...args] = argv;
  if (bin === undefined) {
    throw new Error('Cannot run an empty argument vector');
  }

  const res = spawnSync(bin, args, {
    cwd: opts.cwd,
    encoding: 'utf8',
    stdio: 'pipe',
    shell: false,
    timeout: opts.timeoutMs,
  });

  if (res.error) {
    if ('code' in res.error && res.error.code === 'ETIMEDOUT') {
      return {
        exitCode: -1,
        stdout: res.stdout ?? '',
        stderr: res.stderr ?? '',
        timedOut: true,
      };
    }
    throw res.error;
  }

  return {
    exitCode: res.status ?? -1,
    stdout: res.stdout,
    stderr: res.stderr,
    timedOut: false,
  };
};

/**
 * Quote a shell argument for POSIX sh using single quotes. Embedded
 * single quotes are escaped by closing, inserting an escaped quote,
 * and reopening. Used for log lines only; commands are never handed
 * to a shell.
 */
export function shQuote(input: string): string {
  return `'${input.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render an argument vector as a single line for logs. Tokens that a
 * shell would split or interpret are quoted so the line is unambiguous.
 */
export function formatArgv(argv: readonly string[]): string {
  return argv
    .map((a) => (a.length > 0 && /^[\w@%+=:,./-]+$/.test(a) ? a : shQuote(a)))
    .join(' ');
}

export interface HostCmdOptions {
  runner: Runner;
  timeoutMs: number;
  cwd?: string;
}

/**
 * Execute a host command and return its result. All interactions are
 * logged to the provided logger. If the command produces no stdout,
 * "(no output)" is logged for traceability.
 *
 * A non-zero exit is logged together with the captured stdout and
 * stderr and then returned, so callers decide what it means. An error
 * thrown by the runner (for example a missing binary) is logged and
 * rethrown.
 *
 * @param argv Argument vector; the first element is the binary.
 * @param logger Logger used for structured logs.
 * @param opts Runner, watchdog and working directory.
 */
export function runHostCmd(
  argv: readonly string[],
  logger: Logger,
  opts: HostCmdOptions,
): CommandResult {
  const line = formatArgv(argv);
  logger.log(`$ ${line}`);

  let res: CommandResult;
  try {
    res = opts.runner(argv, { timeoutMs: opts.timeoutMs, cwd: opts.cwd });
  } catch (err: unknown) {
    logger.error(`Command failed: ${line}`);
    if (err instanceof Error && err.message.length > 0) {
      logger.error(err.message);
    }
    throw err;
  }

  if (res.timedOut) {
    logger.error(`Command timed out after ${opts.timeoutMs}ms: ${line}`);
    return res;
  }

  if (res.exitCode === 0) {
    const trimmed = res.stdout.trim();
    logger.log(trimmed.length > 0 ? trimmed : '(no output)');
    return res;
  }

  logger.error(`Command failed: ${line}`);
  const outTrimmed = res.stdout.trim();
  const errTrimmed = res.stderr.trim();
  if (outTrimmed.length > 0) {
    logger.error(outTrimmed);
  }
  if (errTrimmed.length > 0) {
    logger.error(errTrimmed);
  }
  return res;
}

/**
 * Run a command that changes host state. There is no retry: a timeout
 * becomes ExecutionTimeout, a non-zero exit ExecutionError carrying the
 * trimmed stderr, and a spawn failure ExecutionError with code 127.
 *
 * @returns Trimmed stdout of the command.
 */
export function execHostCmd(
  argv: readonly string[],
  logger: Logger,
  opts: HostCmdOptions,
): string {
  let res: CommandResult;
  try {
    res = runHostCmd(argv, logger, opts);
  } catch (err: unknown) {
    throw new ExecutionError(
      argv,
      127,
      err instanceof Error ? err.message : 'Unknown error while spawning',
    );
  }

  if (res.timedOut) {
    throw new ExecutionTimeout(argv, opts.timeoutMs);
  }
  if (res.exitCode !== 0) {
    throw new ExecutionError(argv, res.exitCode, res.stderr.trim());
  }
  return res.stdout.trim();
}

/**
 * Run a read-only command on behalf of a prober. Timeouts and spawn
 * failures become ProbeError; a non-zero exit is returned so the
 * caller can tell "not found" apart from a failed query.
 */
export function queryHostCmd(
  argv: readonly string[],
  logger: Logger,
  opts: HostCmdOptions,
): CommandResult {
  let res: CommandResult;
  try {
    res = runHostCmd(argv, logger, opts);
  } catch (err: unknown) {
    throw new ProbeError(
      `Could not run ${argv[0] ?? 'command'}`,
      err instanceof Error ? err.message : 'Unknown error while spawning',
    );
  }

  if (res.timedOut) {
    throw new ProbeError(
      `Query timed out after ${opts.timeoutMs}ms`,
      formatArgv(argv),
    );
  }
  return res;
}
