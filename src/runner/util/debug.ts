/* src/runner/util/debug.ts
 * Opt-in debug logger for fallback paths.
 * Emits only when SCRIPTDECK_DEBUG=1 to avoid noisy output in normal mode.
 */

const on = (): boolean => process.env.SCRIPTDECK_DEBUG === '1';

/** Log a concise fallback notice under SCRIPTDECK_DEBUG=1 (scope: module:function; reason/message). */
export const debugFallback = (scope: string, reason: string): void => {
  if (!on()) return;
  // stderr to keep separation from normal logs
  console.error(`scriptdeck: debug: fallback: ${scope}: ${reason}`);
};
