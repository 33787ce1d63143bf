import { z } from 'zod';

const targetStatusSchema = z.enum(['Up', 'Down', 'Unknown']);

const publicTargetSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  status: targetStatusSchema,
  last_checked_at: z.string().nullable(),
  uptime_pct: z.number().min(0).max(100).nullable(),
  avg_latency_ms: z.number().int().nonnegative().nullable(),
  p95_latency_ms: z.number().int().nonnegative().nullable(),

  // File names under the output directory, derived with sanitizeTargetName().
  chart: z.string().min(1),
  sparkline: z.string().min(1),
});

export const statusSnapshotSchema = z.object({
  generated_at: z.string(),
  site_title: z.string().min(1),
  timezone: z.string().min(1),
  retention_days: z.number().int().positive(),
  last_checked_at: z.string().nullable(),
  targets: z.array(publicTargetSchema),
});

export type StatusSnapshot = z.infer<typeof statusSnapshotSchema>;
export type PublicTarget = z.infer<typeof publicTargetSchema>;
