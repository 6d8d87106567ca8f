import { z } from 'zod';
import { ValidationError } from './errors.js';

function isCalendarDate(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
  .refine(isCalendarDate, 'not a calendar date');

export const ScopeFiltersSchema = z.record(z.unknown()).nullable().optional();

export const PipelineModeSchema = z.enum(['materialize', 'dry_run']);

export const PipelineRunRequestSchema = z.object({
  as_of_date: IsoDateSchema,
  pipeline_version: z.string().min(1).max(128),
  scope_filters: ScopeFiltersSchema,
  mode: PipelineModeSchema.default('materialize'),
  emit_exports: z.boolean().default(true),
});

export const SchedulerConfigSchema = z.object({
  daily_enabled: z.boolean().default(false),
  ingest_utc_hour: z.number().int().min(0).max(23).default(9),
  pipeline_utc_hour: z.number().int().min(0).max(23).default(10),
  pipeline_version: z.string().min(1).max(128).default('daily.v1'),
  emit_exports: z.boolean().default(false),
  lease_ttl_seconds: z.number().int().positive().default(900),
  poll_interval_seconds: z.number().int().positive().default(60),
});

export const FinpipeConfigSchema = z.object({
  instance_id: z.string().min(1),
  created_at: z.string(),
  version: z.string(),
  api: z
    .object({
      host: z.string().default('127.0.0.1'),
      port: z.number().int().min(1).max(65535).default(7800),
      allowed_origins: z
        .array(z.string())
        .default(['http://localhost', 'http://127.0.0.1', 'http://[::1]']),
    })
    .default({}),
  scheduler: SchedulerConfigSchema.default({}),
  sources: z
    .object({
      position_book: z.string().default('positions.yaml'),
      market_feed: z.string().default('market-prices.yaml'),
    })
    .default({}),
});

export type FinpipeConfig = z.infer<typeof FinpipeConfigSchema>;
export type FinpipeConfigInput = z.input<typeof FinpipeConfigSchema>;
export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;

/** Flatten zod issues into `path: message` lines. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/** Parse `value` or throw a ValidationError listing every issue. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, label: string): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ValidationError(`Invalid ${label}: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}
