import type { Logger, Runner } from './command-runner.js';
import type { ReconcilerConfig } from './plugin-config.js';

/**
 * A decided action and the human-readable reason behind it.
 */
export interface Decision<A extends string> {
  action: A;
  reason: string;
}

/**
 * What a dry run would have done. `commands` lists the argument vectors
 * that were built but not executed.
 */
export interface DryRunReport<A extends string> {
  action: A;
  reason: string;
  commands: string[][];
}

/**
 * Outcome of one reconciliation call. `changed` is true whenever the
 * action is not `noop`, including for dry runs.
 */
export interface ReconcileResult<A extends string> {
  changed: boolean;
  action: A;
  message: string;
  commands: string[][];
  dryRun?: DryRunReport<A>;
}

/**
 * Collaborators handed in by the host for a single invocation.
 */
export interface ReconcileContext {
  logger: Logger;
  config?: ReconcilerConfig;
  runner?: Runner;
  now?: () => Date;
}
