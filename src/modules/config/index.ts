/**
 * Barrel exports for the config module.
 */

export {
  createConfigSystem,
  ConfigSystemImpl,
  mergeConfig,
  mergeLayers,
  readEnvOverrides,
  resolveGlobalDir,
  CONFIG_FILE_NAME,
  WORKSPACE_CONFIG_FILE_NAME,
} from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions, ConfigLayerSource } from './config-system.js'
export {
  StoryloomConfigSchema,
  PartialStoryloomConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
} from './config-schema.js'
export type {
  StoryloomConfig,
  PartialStoryloomConfig,
  KanbanConfig,
  WorkspaceConfig,
  GitConfig,
  LocksConfig,
  ConflictPolicy,
} from './config-schema.js'
export { createDefaultConfig, DEFAULT_STAGES, DEFAULT_BRANCH_TEMPLATE } from './defaults.js'
