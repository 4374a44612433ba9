/** Library entry point: the core runtime (no UI). */
export * from './runner/deck';
export * from './runner/errors';
export * from './runner/registry';
export * from './runner/result/table';
export * from './runner/scheduler';
export * from './runner/state/store';
export * from './runner/state/value';
export * from './runner/stream/bridge';
export * from './runner/stream/frame';
export * from './runner/stream/hub';
export * from './runner/stream/queue';
export * from './runner/supervisor';
export { loadConfig, type LoadedConfig } from './cli/config/load';
// Consolidated type re‑exports for documentation completeness.
export type { DeckConfig, LayoutConfig, RuntimeConfig, ScriptConfig } from './cli/config/schema';
