/**
 * ConfigSystem interface — public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type pino from 'pino'
import type { StoryloomConfig, PartialStoryloomConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * Options for initializing the config system.
 */
export interface ConfigSystemOptions {
  /** Installation-wide directory (default: $STORYLOOM_HOME or ~/.storyloom) */
  globalDir?: string
  /** Project root whose config.yaml forms the project layer */
  projectRoot?: string
  /** Path of a workspace-level override file (e.g. <cwd>/.storyloom.yaml) */
  workspaceConfigPath?: string
  /**
   * Additional values that override everything else.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialStoryloomConfig
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
  /** Logger of the invocation loading the configuration */
  logger?: pino.Logger
}

/** Where a layer came from, in application order */
export interface ConfigLayerSource {
  layer: 'defaults' | 'global' | 'project' | 'workspace' | 'env' | 'cli'
  path?: string
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global < project < workspace < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): StoryloomConfig

  /**
   * Return a single value by dot-notation key (e.g. "kanban.stages").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /**
   * Return the merged config with credentials masked.
   */
  getMasked(): unknown

  /** Layers that contributed to the loaded config */
  readonly sources: readonly ConfigLayerSource[]

  /** Installation-wide directory in use */
  readonly globalDir: string

  /**
   * Whether load() has been called and succeeded.
   */
  readonly isLoaded: boolean
}
