import { z } from "zod";

export const OutputFormatSchema = z.enum(["json", "md", "csv"]);

export const ConfigSchema = z.object({
  schema_version: z.literal(1).optional(),
  results_dir: z.string().min(1).optional(),
  output_format: OutputFormatSchema.optional(),
  strict: z.boolean().optional(),
  percentiles: z.array(z.number().min(0).max(100)).optional(),
  boottime_partitions: z.array(z.string().min(1)).optional(),
});

// ============================================================
// Benchmark tool documents
// Only the fields the pipelines read are declared; the rest is stripped.
// ============================================================

export const FioJobOptionsSchema = z.object({
  rw: z.string(),
  bs: z.string(),
  filename: z.string(),
});

export const FioBandwidthSchema = z.object({
  bw: z.number().nonnegative(),
});

export const FioJobSchema = z.object({
  "job options": FioJobOptionsSchema,
  read: FioBandwidthSchema,
  write: FioBandwidthSchema,
});

export const FioReportSchema = z.object({
  jobs: z.array(FioJobSchema).min(1),
});

export const IperfIntervalSchema = z.object({
  sum: z.object({
    bits_per_second: z.number().nonnegative(),
  }),
});

export const IperfReportSchema = z.object({
  start: z.object({
    test_start: z.object({
      reverse: z.number(),
    }),
  }),
  intervals: z.array(IperfIntervalSchema),
});

export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type Config = z.infer<typeof ConfigSchema>;
