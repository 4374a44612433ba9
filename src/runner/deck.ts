/* src/runner/deck.ts
 * Wire the core together from a validated config: registry, store seeded
 * with widget defaults, supervisor and scheduler.
 */
import {
  type LoadedConfig,
  toDeclarations,
  widgetDefaults,
} from '@/cli/config/load';
import { ScriptRegistry } from '@/runner/registry';
import { ExecutionScheduler } from '@/runner/scheduler';
import { AppStateStore } from '@/runner/state/store';
import { StreamHub } from '@/runner/stream/hub';
import { ProcessSupervisor } from '@/runner/supervisor';
import { enableStreamTrace } from '@/runner/util/trace';

export type Deck = {
  registry: ScriptRegistry;
  store: AppStateStore;
  supervisor: ProcessSupervisor;
  scheduler: ExecutionScheduler;
};

/**
 * Build the core for a loaded config.
 *
 * @throws ConfigError when a script declaration is invalid.
 */
export const createDeck = (
  config: LoadedConfig,
  opts?: { env?: NodeJS.ProcessEnv; forwardOutput?: boolean },
): Deck => {
  if (config.debug.streaming) enableStreamTrace();
  const registry = ScriptRegistry.load(toDeclarations(config), {
    baseDir: config.dir,
  });
  const store = new AppStateStore(widgetDefaults(config));
  const { runtime } = config;
  const supervisor = new ProcessSupervisor({
    runtime: { command: runtime.command, args: runtime.args },
    timeoutMs: runtime.timeoutMs,
    stopGraceMs: runtime.stopGraceMs,
    bufferSize: runtime.bufferSize,
    cwd: config.dir,
    env: opts?.env,
  });
  const scheduler = new ExecutionScheduler({
    registry,
    supervisor,
    store,
    hub: new StreamHub(runtime.bufferSize),
    restart: runtime.restart,
    forwardOutput: opts?.forwardOutput,
  });
  return { registry, store, supervisor, scheduler };
};
