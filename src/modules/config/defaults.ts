/**
 * Built-in default values for the sector-analyst configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type {
  AnalystConfig,
  DataSettings,
  GlobalSettings,
  InferenceSettings,
  SchedulerSettings,
} from './config-schema.js'

/** Name of the project and user config directories */
export const CONFIG_DIR_NAME = '.sector-analyst'

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'warn',
  industry: 'new energy vehicle',
  output_dir: 'output',
  database_path: `${CONFIG_DIR_NAME}/runs.db`,
  enable_charts: true,
  token_ceiling: 6000,
}

export const DEFAULT_SCHEDULER_SETTINGS: SchedulerSettings = {
  max_concurrent: 3,
  max_retries: 2,
  task_timeout_ms: 120_000,
  base_delay_ms: 1_000,
  max_delay_ms: 30_000,
  jitter: true,
}

export const DEFAULT_INFERENCE_SETTINGS: InferenceSettings = {
  binary: 'llm',
  args: [],
  output_format: 'text',
}

export const DEFAULT_DATA_SETTINGS: DataSettings = {
  root_dir: 'data',
  mapping_file: 'mapping.yaml',
  max_series_points: 200,
}

export const DEFAULT_CONFIG: AnalystConfig = {
  config_format_version: '1',
  global: DEFAULT_GLOBAL_SETTINGS,
  scheduler: DEFAULT_SCHEDULER_SETTINGS,
  inference: DEFAULT_INFERENCE_SETTINGS,
  data: DEFAULT_DATA_SETTINGS,
  roles: {},
}
