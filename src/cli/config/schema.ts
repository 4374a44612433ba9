/* src/cli/config/schema.ts
 * Zod schemas for scriptdeck configuration (scripts, layout ids, runtime).
 * Only the parts the core consumes are modeled; unknown layout keys pass
 * through untouched for the rendering layer.
 */
import { z } from 'zod';

import { resultKey } from '@/runner/registry';
import { appStateValueSchema } from '@/runner/state/value';

const nonEmpty = (what: string) =>
  z.string().trim().min(1, { message: `${what} must be a non-empty string` });

export const functionSchema = z
  .object({
    name: nonEmpty('function name'),
    display: z.string().optional(),
  })
  .strict();

export const scriptSchema = z
  .object({
    // "script.function" addresses a function, so names cannot contain a dot.
    name: nonEmpty('name').refine((n) => !n.includes('.'), {
      message: 'script name must not contain "."',
    }),
    path: nonEmpty('path'),
    type: z.enum(['discrete', 'streaming']),
    functions: z.array(functionSchema).default([]),
  })
  .strict();
export type ScriptConfig = z.infer<typeof scriptSchema>;

export const sliderSchema = z
  .object({
    id: nonEmpty('slider id'),
    label: z.string().optional(),
    min: z.number().finite().default(-10),
    max: z.number().finite().default(10),
    default: z.number().finite().default(0),
    tab: z.string().optional(),
  })
  .passthrough()
  .refine((s) => s.min <= s.max, { message: 'slider min must not exceed max' })
  .refine((s) => s.default >= s.min && s.default <= s.max, {
    message: 'slider default must lie within [min, max]',
  });

export const inputFieldSchema = z
  .object({
    id: nonEmpty('input field id'),
    label: z.string().optional(),
    default: appStateValueSchema.optional(),
    tab: z.string().optional(),
  })
  .passthrough();

export const plotSchema = z
  .object({
    streamId: nonEmpty('plot streamId'),
    title: z.string().optional(),
    tab: z.string().optional(),
  })
  .passthrough();

export const tableSchema = z
  .object({
    id: z.string().optional(),
    streamId: z.string().optional(),
    columns: z.array(z.string()).optional(),
    tab: z.string().optional(),
  })
  .passthrough();

export const layoutSchema = z
  .object({
    title: z.string().optional(),
    sliders: z.array(sliderSchema).default([]),
    inputFields: z.array(inputFieldSchema).default([]),
    plots: z.array(plotSchema).default([]),
    table: tableSchema.optional(),
  })
  .passthrough()
  .default({});
export type LayoutConfig = z.infer<typeof layoutSchema>;

const positiveInt = z.coerce.number().int().positive();

export const restartSchema = z
  .object({
    maxAttempts: z.coerce.number().int().min(0).optional(),
    baseDelayMs: positiveInt.optional(),
    maxDelayMs: positiveInt.optional(),
    factor: z.coerce.number().min(1).optional(),
    resetAfterMs: positiveInt.optional(),
  })
  .strict();

export const runtimeSchema = z
  .object({
    command: nonEmpty('runtime command').default('python3'),
    args: z.array(z.string()).default([]),
    timeoutMs: z.coerce.number().int().min(0).default(30_000),
    stopGraceMs: z.coerce.number().int().min(0).default(2_000),
    restart: restartSchema.default({}),
    bufferSize: positiveInt.default(10_000),
  })
  .strict()
  .default({});
export type RuntimeConfig = z.infer<typeof runtimeSchema>;

export const debugSchema = z
  .object({ streaming: z.boolean().default(false) })
  .strict()
  .default({});

export const deckConfigSchema = z
  .object({
    scripts: z.array(scriptSchema).default([]),
    layout: layoutSchema,
    runtime: runtimeSchema,
    debug: debugSchema,
  })
  .strict()
  .superRefine((cfg, ctx) => {
    // Ids that act as app-state keys or stream ids must be unique.
    const dup = (path: (string | number)[], ids: string[], what: string) => {
      const seen = new Set<string>();
      ids.forEach((id, i) => {
        if (seen.has(id))
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [...path, i],
            message: `duplicate ${what} "${id}"`,
          });
        seen.add(id);
      });
    };
    dup(['scripts'], cfg.scripts.map((s) => s.name), 'script name');
    const widgetIds = [
      ...cfg.layout.sliders.map((s) => s.id),
      ...cfg.layout.inputFields.map((f) => f.id),
    ];
    dup(['layout', 'widgets'], widgetIds, 'widget id');
    // One writer per key: script and function results own theirs.
    const resultKeys = new Set(
      cfg.scripts.flatMap((s) => [
        resultKey(s.name),
        ...s.functions.map((f) => resultKey(s.name, f.name)),
      ]),
    );
    widgetIds.forEach((id, i) => {
      if (resultKeys.has(id))
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['layout', 'widgets', i],
          message: `widget id "${id}" collides with a script result key`,
        });
    });
  });
export type DeckConfig = z.infer<typeof deckConfigSchema>;
