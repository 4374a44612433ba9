/* src/runner/state/store.ts
 * App State Store: one owned map of widget values and script results.
 *
 * All writers run on the event loop, so a set() is atomic with respect to
 * snapshot(). Snapshots are copy-on-write: the first snapshot after a write
 * builds a deep-frozen copy, later snapshots reuse it until the next write.
 */
import { type AppState, type AppStateValue, frozenCopy } from './value';

export type StateChangeListener = (key: string, value: AppStateValue) => void;

export class AppStateStore {
  private readonly values = new Map<string, AppStateValue>();
  private readonly listeners = new Set<StateChangeListener>();
  private cached: AppState | undefined;
  private rev = 0;

  constructor(initial?: Record<string, AppStateValue>) {
    if (initial) this.seed(initial);
  }

  /** Monotonic write counter. */
  public get version(): number {
    return this.rev;
  }

  public set(key: string, value: AppStateValue): void {
    // Copy on the way in so later mutation by the caller cannot leak into snapshots.
    const own = frozenCopy(value);
    this.values.set(key, own);
    this.rev += 1;
    this.cached = undefined;
    for (const l of this.listeners) l(key, own);
  }

  /** Bulk-set initial values (widget defaults). */
  public seed(entries: Record<string, AppStateValue>): void {
    for (const [k, v] of Object.entries(entries)) this.set(k, v);
  }

  public get(key: string): AppStateValue | undefined {
    return this.values.get(key);
  }

  public snapshot(): AppState {
    if (!this.cached) {
      // Values are already frozen copies; only the outer map needs building.
      // fromEntries defines own keys, so "__proto__" stays an ordinary key.
      this.cached = Object.freeze(Object.fromEntries(this.values));
    }
    return this.cached;
  }

  public onChange(listener: StateChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
