/* src/runner/exec/spawn.ts
 * Single-process spawning: piped stdio capture, state on stdin, termination
 * escalation (SIGTERM to the tree, grace, then SIGKILL of the tree).
 */
import {
  type ChildProcessWithoutNullStreams,
  spawn,
} from 'node:child_process';
import { once } from 'node:events';

import treeKill from 'tree-kill';

import { LineSplitter, sleep, TailBuffer } from '@/runner/exec/util';
import { debugFallback } from '@/runner/util/debug';
import {
  DBG_SCOPE_SUPERVISOR_KILL,
  DBG_SCOPE_SUPERVISOR_STDIN,
} from '@/runner/util/debug-scopes';
import { streamTrace } from '@/runner/util/trace';

/** The one interpreted runtime scripts run under. */
export type RuntimeSpec = {
  command: string;
  args: readonly string[];
};

export type ExitInfo = {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** True when the exit followed a terminate() request. */
  stopped: boolean;
};

export type SpawnHooks = {
  onStdoutLine?: (line: string) => void;
  onStderrLine?: (line: string) => void;
};

export type SpawnArgs = {
  /** Display key for logs and errors (script or script.function). */
  key: string;
  runtime: RuntimeSpec;
  scriptPath: string;
  fn?: string;
  /** Written to stdin, which is then closed. */
  stdin: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Accumulate full stdout (discrete). Streaming keeps lines only. */
  collectStdout?: boolean;
  hooks?: SpawnHooks;
};

export type SpawnedScript = {
  readonly key: string;
  readonly pid: number;
  readonly exited: Promise<ExitInfo>;
  isRunning(): boolean;
  stdout(): string;
  stderrTail(): string;
  /** SIGTERM the tree, wait up to graceMs, then SIGKILL it. Idempotent. */
  terminate(graceMs: number): Promise<ExitInfo>;
};

/**
 * After the process exits, how long its pipes may keep delivering output.
 * A descendant that inherited stdio can hold them open indefinitely.
 */
const STDIO_DRAIN_MS = 100;

/** Argument vector: runtime args, script path, optional function selector. */
export const buildArgv = (
  runtime: RuntimeSpec,
  scriptPath: string,
  fn?: string,
): string[] => [
  ...runtime.args,
  scriptPath,
  ...(fn ? ['--function', fn] : []),
];

const killTree = (pid: number, signal: NodeJS.Signals): Promise<void> =>
  new Promise<void>((resolveP) => {
    treeKill(pid, signal, (err) => {
      // ESRCH-style failures mean the process is already gone.
      if (err) debugFallback(DBG_SCOPE_SUPERVISOR_KILL, `${pid}: ${err.message}`);
      resolveP();
    });
  });

/**
 * Spawn a script and resolve once the OS process exists.
 * Rejects with the underlying error when the process cannot be created.
 */
export const spawnScript = async (args: SpawnArgs): Promise<SpawnedScript> => {
  const argv = buildArgv(args.runtime, args.scriptPath, args.fn);
  streamTrace.supervisor.spawn({ key: args.key, command: args.runtime.command, argv });

  const child: ChildProcessWithoutNullStreams = spawn(args.runtime.command, argv, {
    cwd: args.cwd,
    env: args.env ?? process.env,
    stdio: ['pipe', 'pipe', 'pipe'],
    windowsHide: true,
  });

  let out = '';
  const errTail = new TailBuffer();
  const outLines = new LineSplitter((line) => {
    streamTrace.supervisor.output(args.key, 'stdout', line);
    args.hooks?.onStdoutLine?.(line);
  });
  const errLines = new LineSplitter((line) => {
    streamTrace.supervisor.output(args.key, 'stderr', line);
    args.hooks?.onStderrLine?.(line);
  });
  child.stdout.setEncoding('utf8');
  child.stderr.setEncoding('utf8');
  child.stdout.on('data', (d: string) => {
    if (args.collectStdout) out += d;
    outLines.push(d);
  });
  child.stderr.on('data', (d: string) => {
    errTail.append(d);
    errLines.push(d);
  });
  // A script may exit without reading stdin; EPIPE must not surface as an uncaught error.
  child.stdin.on('error', (e) => {
    debugFallback(DBG_SCOPE_SUPERVISOR_STDIN, `${args.key}: ${e.message}`);
  });

  let running = true;
  let stopRequested = false;
  let stdioClosed = false;
  const closed = new Promise<void>((resolveP) => {
    child.once('close', () => {
      stdioClosed = true;
      resolveP();
    });
  });
  // Settles on process exit, not on 'close': a surviving grandchild that
  // inherited the pipes would otherwise keep the invocation alive.
  const exited = new Promise<ExitInfo>((resolveP) => {
    child.once('exit', (code, signal) => {
      running = false;
      const info = { code, signal, stopped: stopRequested };
      void Promise.race([closed, sleep(STDIO_DRAIN_MS)]).then(() => {
        if (!stdioClosed) {
          child.stdout.destroy();
          child.stderr.destroy();
        }
        outLines.flush();
        errLines.flush();
        streamTrace.supervisor.exit({ key: args.key, pid: child.pid, ...info });
        resolveP(info);
      });
    });
  });

  await once(child, 'spawn');
  const pid = child.pid;
  if (typeof pid !== 'number') throw new Error('process has no pid');

  child.stdin.end(args.stdin);

  let terminating: Promise<ExitInfo> | undefined;
  const terminate = (graceMs: number): Promise<ExitInfo> => {
    if (!running) return exited;
    if (terminating) return terminating;
    stopRequested = true;
    terminating = (async () => {
      streamTrace.supervisor.terminate({ key: args.key, pid, graceMs });
      // Descendants are found through the parent, so signal them while it lives.
      await killTree(pid, 'SIGTERM');
      let timer: NodeJS.Timeout | undefined;
      const graceful = await Promise.race([
        exited.then(() => true),
        new Promise<boolean>((resolveP) => {
          timer = setTimeout(() => resolveP(false), Math.max(0, graceMs));
        }),
      ]);
      if (timer) clearTimeout(timer);
      if (!graceful) await killTree(pid, 'SIGKILL');
      return exited;
    })();
    return terminating;
  };

  return {
    key: args.key,
    pid,
    exited,
    isRunning: () => running,
    stdout: () => out,
    stderrTail: () => errTail.toString(),
    terminate,
  };
};
