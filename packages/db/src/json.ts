import { z } from 'zod';

export function serializeDbJson<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: T,
  opts: { field?: string; indent?: number } = {},
): string {
  const r = schema.safeParse(value);
  if (!r.success) {
    const field = opts.field ?? 'json';
    throw new Error(`Invalid value in ${field}: ${r.error.message}`);
  }
  return JSON.stringify(r.data, null, opts.indent);
}

const CHECK_STATUS_ALIASES: Record<string, 'Up' | 'Down'> = {
  up: 'Up',
  down: 'Down',
};

// Older revisions wrote lowercase/uppercase status strings.
export const checkStatusSchema = z.preprocess(
  (v) => (typeof v === 'string' ? (CHECK_STATUS_ALIASES[v.trim().toLowerCase()] ?? v) : v),
  z.enum(['Up', 'Down']),
);
export type CheckStatus = z.infer<typeof checkStatusSchema>;

// One persisted check result. Unknown keys are kept so a file written by a newer
// revision survives a round trip through an older one.
export const historyRecordSchema = z
  .object({
    resource: z.string().min(1),
    status: checkStatusSchema,
    timestamp: z.string().min(1),
    latency_ms: z.number().int().nonnegative().nullable().optional(),
    error: z.string().nullable().optional(),
  })
  .passthrough();
export type HistoryRecord = z.infer<typeof historyRecordSchema>;

// The file itself is only required to be an array; records are validated one by one.
export const historyFileSchema = z.array(z.unknown());

export const historyRecordsSchema = z.array(historyRecordSchema);
