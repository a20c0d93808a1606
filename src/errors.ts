/// <reference path="./types/semantic-release-error.d.ts" />
import SemanticReleaseError from '@semantic-release/error';

/**
 * Raised when an operation's declared attributes are malformed or
 * contradict each other. Always thrown before anything is probed.
 */
export class ValidationError extends SemanticReleaseError {
  constructor(message: string, details?: string) {
    super(message, 'EVALIDATION', details);
    this.name = 'ValidationError';
  }
}

/**
 * Raised when the observed state of the host cannot be read. A failed
 * query is never treated as "not found".
 */
export class ProbeError extends SemanticReleaseError {
  constructor(message: string, details?: string) {
    super(message, 'EPROBEFAILED', details);
    this.name = 'ProbeError';
  }
}

/**
 * Raised when a mutating command exits non-zero or cannot be spawned.
 * The captured stderr is kept in `details` and `stderr`.
 */
export class ExecutionError extends SemanticReleaseError {
  readonly argv: readonly string[];
  readonly exitCode: number;
  readonly stderr: string;

  constructor(argv: readonly string[], exitCode: number, stderr: string) {
    super(
      `Command exited with code ${exitCode}: ${argv.join(' ')}`,
      'EEXECFAILED',
      stderr,
    );
    this.name = 'ExecutionError';
    this.argv = argv;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * Raised when a mutating command outlives the configured watchdog, so a
 * hang can be told apart from a failure.
 */
export class ExecutionTimeout extends SemanticReleaseError {
  readonly argv: readonly string[];
  readonly timeoutMs: number;

  constructor(argv: readonly string[], timeoutMs: number) {
    super(
      `Command timed out after ${timeoutMs}ms: ${argv.join(' ')}`,
      'EEXECTIMEOUT',
      `The command was terminated by the ${timeoutMs}ms watchdog.`,
    );
    this.name = 'ExecutionTimeout';
    this.argv = argv;
    this.timeoutMs = timeoutMs;
  }
}
