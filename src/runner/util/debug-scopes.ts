/* src/runner/util/debug-scopes.ts
 * Centralized labels for debugFallback notices.
 * Keeping these in one place ensures logs and tests remain consistent.
 */

/** help footer (config present but unreadable or invalid) */
export const DBG_SCOPE_CONFIG_LOAD = 'cli.config:load';

/** table result normalization (value looked like a table but failed the shape check) */
export const DBG_SCOPE_RESULT_TABLE = 'result.table:normalize';

/** scheduler (streaming restart gave up after max attempts) */
export const DBG_SCOPE_SCHEDULER_RESTART = 'scheduler:restart';

/** supervisor (signal delivery to an already-exited child) */
export const DBG_SCOPE_SUPERVISOR_KILL = 'supervisor:kill';

/** supervisor (stdin write failed; script exited without reading its state) */
export const DBG_SCOPE_SUPERVISOR_STDIN = 'supervisor:stdin';

/** bridge (a message listener threw; the message still reached the others) */
export const DBG_SCOPE_BRIDGE_LISTENER = 'bridge:listener';

// Note:
// Add new scope tokens here and adopt them across the codebase
// to keep debugFallback(...) calls uniform and easy to grep.
