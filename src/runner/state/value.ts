/* src/runner/state/value.ts
 * JSON-compatible app state values: type, runtime schema and freezing helpers.
 */
import { z } from 'zod';

export type AppStateScalar = null | boolean | number | string;
export type AppStateValue =
  | AppStateScalar
  | AppStateValue[]
  | { [key: string]: AppStateValue };

/** Read-only view of the shared app state (widget ids and result keys). */
export type AppState = Readonly<Record<string, AppStateValue>>;

export const appStateValueSchema: z.ZodType<AppStateValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number().finite(),
    z.string(),
    z.array(appStateValueSchema),
    z.record(z.string(), appStateValueSchema),
  ]),
);

/** Validate an untyped value at a boundary (script output, CLI input, frame payload). */
export const toAppStateValue = (
  raw: unknown,
): { ok: true; value: AppStateValue } | { ok: false; reason: string } => {
  const parsed = appStateValueSchema.safeParse(raw);
  if (parsed.success) return { ok: true, value: parsed.data };
  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return { ok: false, reason: `${where}: ${issue?.message ?? 'invalid value'}` };
};

/** Parse text as one JSON value and validate it. Throws on either failure. */
export const parseAppStateValue = (text: string): AppStateValue => {
  const raw: unknown = JSON.parse(text);
  const checked = toAppStateValue(raw);
  if (!checked.ok) throw new Error(checked.reason);
  return checked.value;
};

/** Coerce a CLI/env string: JSON when it parses, otherwise the raw string. */
export const coerceCliValue = (text: string): AppStateValue => {
  try {
    return parseAppStateValue(text);
  } catch {
    return text;
  }
};

export const isRecord = (
  v: AppStateValue,
): v is { [key: string]: AppStateValue } =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

/** Deep copy then freeze; the result can be handed to any reader. */
export const frozenCopy = <T extends AppStateValue>(v: T): T => {
  const copy = structuredClone(v);
  deepFreeze(copy);
  return copy;
};

const deepFreeze = (v: AppStateValue): void => {
  if (Array.isArray(v)) {
    for (const item of v) deepFreeze(item);
    Object.freeze(v);
  } else if (isRecord(v)) {
    for (const item of Object.values(v)) deepFreeze(item);
    Object.freeze(v);
  }
};
