/**
 * Zod validation schemas for the sector-analyst configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings (logging, output locations, industry)
 *  - scheduler (concurrency, retries, timeouts, backoff)
 *  - inference backend
 *  - data directory and dataset mapping
 *  - per-role overrides
 *  - full config document
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** Industry named in every prompt */
    industry: z.string().min(1),
    /** Directory that receives `<runId>/` artifact folders */
    output_dir: z.string().min(1),
    /** Run history database */
    database_path: z.string().min(1),
    /** Write chart specs next to the report */
    enable_charts: z.boolean(),
    /** Token ceiling per assembled prompt */
    token_ceiling: z.number().int().min(500),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Scheduler
// ---------------------------------------------------------------------------

export const SchedulerSettingsSchema = z
  .object({
    max_concurrent: z.number().int().min(1).max(64),
    max_retries: z.number().int().min(0).max(10),
    task_timeout_ms: z.number().int().positive(),
    base_delay_ms: z.number().int().min(0),
    max_delay_ms: z.number().int().min(0),
    jitter: z.boolean(),
  })
  .strict()

export type SchedulerSettings = z.infer<typeof SchedulerSettingsSchema>

// ---------------------------------------------------------------------------
// Inference backend
// ---------------------------------------------------------------------------

export const InferenceSettingsSchema = z
  .object({
    /** CLI binary that reads a prompt on stdin and answers on stdout */
    binary: z.string().min(1),
    args: z.array(z.string()),
    model: z.string().optional(),
    output_format: z.enum(['text', 'json']),
    /** Name of the environment variable that holds the API key */
    api_key_env: z.string().optional(),
    /** Extra environment for the inference process */
    env: z.record(z.string(), z.string()).optional(),
  })
  .strict()

export type InferenceSettings = z.infer<typeof InferenceSettingsSchema>

// ---------------------------------------------------------------------------
// Data
// ---------------------------------------------------------------------------

export const DataSettingsSchema = z
  .object({
    root_dir: z.string().min(1),
    /** YAML file mapping logical dataset names to files, relative to root_dir unless absolute */
    mapping_file: z.string().min(1),
    max_series_points: z.number().int().positive(),
  })
  .strict()

export type DataSettings = z.infer<typeof DataSettingsSchema>

// ---------------------------------------------------------------------------
// Per-role overrides
// ---------------------------------------------------------------------------

export const RoleSettingsSchema = z
  .object({
    enabled: z.boolean().optional(),
    /** Prerequisites whose failure should not block this role */
    optional_prerequisites: z.array(z.string()).optional(),
    temperature: z.number().min(0).max(2).optional(),
    max_tokens: z.number().int().positive().optional(),
    model: z.string().optional(),
  })
  .strict()

export type RoleSettings = z.infer<typeof RoleSettingsSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const AnalystConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    scheduler: SchedulerSettingsSchema,
    inference: InferenceSettingsSchema,
    data: DataSettingsSchema,
    roles: z.record(z.string(), RoleSettingsSchema),
  })
  .strict()
  .refine((c) => c.scheduler.max_delay_ms >= c.scheduler.base_delay_ms, {
    message: 'max_delay_ms must be greater than or equal to base_delay_ms',
    path: ['scheduler', 'max_delay_ms'],
  })

export type AnalystConfig = z.infer<typeof AnalystConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (one layer of the hierarchy before merging)
// ---------------------------------------------------------------------------

export const PartialAnalystConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    scheduler: SchedulerSettingsSchema.partial().optional(),
    inference: InferenceSettingsSchema.partial().optional(),
    data: DataSettingsSchema.partial().optional(),
    roles: z.record(z.string(), RoleSettingsSchema).optional(),
  })
  .strict()

export type PartialAnalystConfig = z.infer<typeof PartialAnalystConfigSchema>
