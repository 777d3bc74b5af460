/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, coerceScalar, deepMerge, getByPath, setByPath } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  AnalystConfigSchema,
  PartialAnalystConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
} from './config-schema.js'
export type { AnalystConfig, PartialAnalystConfig, RoleSettings } from './config-schema.js'
export { CONFIG_DIR_NAME, DEFAULT_CONFIG } from './defaults.js'
