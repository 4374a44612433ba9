/* src/runner/result/table.ts
 * Table-shaped discrete results: { columns, data, error? }.
 * Cells are normalized to strings (null -> ""); a table carrying an error
 * is stored as its error message instead of the table.
 */
import { z } from 'zod';

import type { AppStateValue } from '@/runner/state/value';
import { isRecord } from '@/runner/state/value';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_RESULT_TABLE } from '@/runner/util/debug-scopes';

const cellSchema = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .transform((v) => (v === null ? '' : String(v)));

const tableSchema = z.object({
  columns: z.array(z.string()),
  data: z.array(z.array(cellSchema)),
  error: z.string().nullish(),
});

/** Candidate for table handling: a record with both columns and data. */
const looksLikeTable = (v: AppStateValue): boolean =>
  isRecord(v) && 'columns' in v && 'data' in v;

/**
 * Value to store under a result key. Non-table values pass through; table
 * values come back normalized, or as their error text.
 */
export const normalizeResult = (
  key: string,
  v: AppStateValue,
): AppStateValue => {
  if (!looksLikeTable(v)) return v;
  const parsed = tableSchema.safeParse(v);
  if (!parsed.success) {
    debugFallback(
      DBG_SCOPE_RESULT_TABLE,
      `${key}: not a table (${parsed.error.issues[0]?.message ?? 'shape'}); storing raw value`,
    );
    return v;
  }
  const { columns, data, error } = parsed.data;
  if (typeof error === 'string') return error;
  return { columns, data };
};
