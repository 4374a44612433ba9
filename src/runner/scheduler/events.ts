/* src/runner/scheduler/events.ts
 * Non-blocking handoff from the scheduler to the UI loop. The UI drains the
 * queue once per frame; producers never wait on it.
 */
import type { ScriptdeckError } from '@/runner/errors';
import type { AppStateValue } from '@/runner/state/value';

import type { ScriptStatus } from './types';

export type ScriptEvent =
  | { type: 'status'; key: string; status: ScriptStatus }
  | { type: 'result'; key: string; value: AppStateValue }
  | { type: 'error'; key: string; error: ScriptdeckError }
  | {
      type: 'output';
      key: string;
      channel: 'stdout' | 'stderr';
      line: string;
    };

export class UiEventQueue {
  private items: ScriptEvent[] = [];
  private droppedCount = 0;

  constructor(private readonly capacity = 1000) {}

  public push(e: ScriptEvent): void {
    if (this.items.length >= this.capacity) {
      this.items.shift();
      this.droppedCount += 1;
    }
    this.items.push(e);
  }

  /** Take every pending event (oldest first). */
  public drain(): ScriptEvent[] {
    const out = this.items;
    this.items = [];
    return out;
  }

  public get size(): number {
    return this.items.length;
  }

  /** Events discarded because the UI fell behind. */
  public get dropped(): number {
    return this.droppedCount;
  }
}
