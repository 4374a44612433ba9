/* src/runner/errors.ts
 * Error taxonomy shared by the registry, supervisor, bridge and scheduler.
 * Only ConfigError is allowed to abort startup; everything else is reported
 * per script and leaves the rest of the application running.
 */

export type ErrorCode =
  | 'config'
  | 'not-found'
  | 'script'
  | 'stream-decode'
  | 'already-running'
  | 'stopped';

export abstract class ScriptdeckError extends Error {
  public abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or invalid declared script/widget. Fatal at load. */
export class ConfigError extends ScriptdeckError {
  public readonly code = 'config';

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}\n${issues.join('\n')}` : message);
  }
}

export class NotFoundError extends ScriptdeckError {
  public readonly code = 'not-found';

  constructor(
    public readonly what: 'script' | 'function',
    public readonly key: string,
  ) {
    super(`${what} not found: ${key}`);
  }
}

export type ScriptErrorKind =
  | 'spawn-failed'
  | 'non-zero-exit'
  | 'malformed-output'
  | 'timeout'
  | 'exited';

/** Recoverable, per-script failure of one invocation. */
export class ScriptError extends ScriptdeckError {
  public readonly code = 'script';

  private constructor(
    public readonly kind: ScriptErrorKind,
    public readonly key: string,
    message: string,
    public readonly detail: {
      exitCode?: number;
      signal?: NodeJS.Signals;
      stderr?: string;
      timeoutMs?: number;
    } = {},
    cause?: unknown,
  ) {
    super(`${key}: ${message}`, { cause });
  }

  static spawnFailed(key: string, cause: unknown): ScriptError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ScriptError(
      'spawn-failed',
      key,
      `could not start process (${reason})`,
      {},
      cause,
    );
  }

  static nonZeroExit(
    key: string,
    exitCode: number | null,
    signal: NodeJS.Signals | null,
    stderr: string,
  ): ScriptError {
    const how =
      exitCode !== null ? `exited with code ${exitCode}` : `killed by ${signal}`;
    return new ScriptError('non-zero-exit', key, how, {
      exitCode: exitCode ?? undefined,
      signal: signal ?? undefined,
      stderr,
    });
  }

  static malformedOutput(key: string, cause: unknown): ScriptError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ScriptError(
      'malformed-output',
      key,
      `output is not a JSON value (${reason})`,
      {},
      cause,
    );
  }

  /** A streaming process that ended on its own with status 0. */
  static exited(key: string, stderr: string): ScriptError {
    return new ScriptError('exited', key, 'stream ended unexpectedly', {
      exitCode: 0,
      stderr,
    });
  }

  static timeout(key: string, timeoutMs: number): ScriptError {
    return new ScriptError(
      'timeout',
      key,
      `exceeded ${timeoutMs}ms and was killed`,
      { timeoutMs },
    );
  }
}

/** A single corrupt frame. Dropped and counted, never thrown past the bridge. */
export class StreamDecodeError extends ScriptdeckError {
  public readonly code = 'stream-decode';
}

/** Duplicate trigger while the same script+function is still running. */
export class AlreadyRunningError extends ScriptdeckError {
  public readonly code = 'already-running';

  constructor(public readonly key: string) {
    super(`${key} is already running`);
  }
}

/** Request made after the scheduler has shut down. */
export class SchedulerStoppedError extends ScriptdeckError {
  public readonly code = 'stopped';

  constructor(public readonly key: string) {
    super(`cannot run ${key}: scheduler is stopped`);
  }
}

export const isScriptdeckError = (e: unknown): e is ScriptdeckError =>
  e instanceof ScriptdeckError;
