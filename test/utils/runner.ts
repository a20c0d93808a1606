import type { CommandResult, Runner } from '../../src/command-runner.js';

/**
 * A canned reply for every command whose argv starts with `prefix`.
 * Missing fields default to a successful, silent run.
 */
export interface ScriptedReply {
  prefix: string[];
  result?: Partial<CommandResult>;
  throws?: Error;
}

/**
 * Creates an in-process Runner that answers from a fixed script and
 * records every argv it is asked to run. The first reply whose prefix
 * matches wins; an unmatched command fails the test loudly.
 *
 * @param replies Replies in priority order.
 * @returns The runner and the list of recorded argument vectors.
 */
export function scriptedRunner(replies: ScriptedReply[]): {
  runner: Runner;
  calls: string[][];
} {
  const calls: string[][] = [];
  const runner: Runner = (argv) => {
    calls.push([...argv]);
    const reply = replies.find((r) =>
      r.prefix.every((tok, i) => argv[i] === tok),
    );
    if (reply === undefined) {
      throw new Error(`No scripted reply for: ${argv.join(' ')}`);
    }
    if (reply.throws !== undefined) {
      throw reply.throws;
    }
    return {
      exitCode: 0,
      stdout: '',
      stderr: '',
      timedOut: false,
      ...reply.result,
    };
  };
  return { runner, calls };
}

/**
 * A logger that keeps every line so tests can assert on them.
 */
export function memoryLogger(): {
  logger: { log: (m: string) => void; error: (m: string) => void };
  out: string[];
  err: string[];
} {
  const out: string[] = [];
  const err: string[] = [];
  return {
    logger: {
      log: (m: string) => {
        out.push(m);
      },
      error: (m: string) => {
        err.push(m);
      },
    },
    out,
    err,
  };
}
